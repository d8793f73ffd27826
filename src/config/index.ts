// ============================================================
// CONFIG — Engine table, modes, context limits, environment
// ============================================================

import { z } from 'zod'
import type { EngineName, ModeConfig, ModeName } from '../types'
import { ConfigError } from '../services/errors'

export const VERSION = '1.0.0'

// Canonical fallback priority: premium → fast → fallback
export const ENGINE_PRIORITY: readonly EngineName[] = ['claude', 'gemini', 'openai']

export const ENGINE_ROLES: Record<EngineName, 'premium' | 'fast' | 'fallback'> = {
  claude: 'premium',
  gemini: 'fast',
  openai: 'fallback',
}

export const DEFAULT_MODELS: Record<EngineName, string> = {
  claude: 'claude-sonnet-4-20250514',
  gemini: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
}

// Rough per-query cost (USD), reported back to the caller
export const ENGINE_COST: Record<EngineName, number> = {
  claude: 0.015,
  gemini: 0.001,
  openai: 0.020,
}

export const DEFAULT_MAX_TOKENS = 2048

export const DEGRADED_RESPONSE =
  'All engines are unavailable right now. Please try again in a moment.'

export const SYSTEM_PROMPT = `You are a personal AI companion with persistent memory.
You receive recent conversation history, open insights and suggestions ahead of the user's query.
Be concise but go deep when needed. Answer in the language the user writes in.
Connect ideas to earlier context when it is relevant, and suggest concrete next steps.`

// ── Modes ─────────────────────────────────────────────────────
export const MODES: Record<ModeName, ModeConfig> = {
  balanced: {
    description: 'Default behaviour — router picks the engine, no extra instructions',
    forced_engine: null,
    prompt_addon: '',
    max_tokens: DEFAULT_MAX_TOKENS,
  },
  deep: {
    description: 'Extended analysis — structured reasoning on the premium engine',
    forced_engine: 'claude',
    prompt_addon: `Work through the problem step by step before answering.
Structure the answer in sections, state assumptions explicitly and close with a short recommendation.`,
    max_tokens: 4096,
  },
  brief: {
    description: 'Action-oriented brief — short bullets on the fast engine',
    forced_engine: 'gemini',
    prompt_addon: `Answer in at most five bullet points.
Lead with the action to take. No preamble, no closing summary.`,
    max_tokens: 512,
  },
  creative: {
    description: 'Creative persona — imaginative, playful voice',
    forced_engine: 'claude',
    prompt_addon: `Answer as a playful creative partner.
Use vivid imagery, take unexpected angles and treat uncertainty as material to play with.`,
    max_tokens: 3000,
  },
  ops: {
    description: 'Operations brief — status, risks, blockers and next actions',
    forced_engine: null,
    prompt_addon: `Frame the answer as an operations brief with the headings Status, Risks, Blockers and Next actions.
Keep each heading to two lines at most.`,
    max_tokens: 1024,
  },
}

export function isModeName(value: string): value is ModeName {
  return Object.prototype.hasOwnProperty.call(MODES, value)
}

export const MODE_NAMES: ModeName[] = Object.keys(MODES).filter(isModeName)

// ── Context assembly limits ───────────────────────────────────
export interface ContextLimits {
  history_query_chars: number
  history_response_chars: number
  insight_items: number
  insight_chars: number
  semantic_items: number
  semantic_chars: number
  suggestion_items: number
  suggestion_chars: number
}

export const CONTEXT_LIMITS: ContextLimits = {
  history_query_chars:    200,
  history_response_chars: 300,
  insight_items:          8,
  insight_chars:          150,
  semantic_items:         3,
  semantic_chars:         200,
  suggestion_items:       5,
  suggestion_chars:       200,
}

// Minimum cosine similarity for semantic matches; override with SEMANTIC_MATCH_THRESHOLD
export const DEFAULT_SEMANTIC_THRESHOLD = 0.5

// ── Environment ───────────────────────────────────────────────
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined))

const numberWithDefault = (fallback: number) =>
  z.preprocess(
    (v) => (v === '' ? undefined : v),
    z.coerce.number().positive().default(fallback),
  )

const envSchema = z.object({
  PORT:                     numberWithDefault(8000),
  HOST:                     z.string().default('0.0.0.0'),
  ANTHROPIC_API_KEY:        optionalString,
  CLAUDE_MODEL:             optionalString,
  GEMINI_API_KEY:           optionalString,
  GEMINI_MODEL:             optionalString,
  OPENAI_API_KEY:           optionalString,
  OPENAI_MODEL:             optionalString,
  OPENAI_BASE_URL:          optionalString,
  SUPABASE_URL:             optionalString.pipe(z.string().url().optional()),
  SUPABASE_KEY:             optionalString,
  ENGINE_TIMEOUT_MS:        numberWithDefault(30_000),
  CONTEXT_TIMEOUT_MS:       numberWithDefault(5_000),
  SEMANTIC_MATCH_THRESHOLD: z.preprocess(
    (v) => (v === '' ? undefined : v),
    z.coerce.number().min(0).max(1).default(DEFAULT_SEMANTIC_THRESHOLD),
  ),
  DEFAULT_MODE: z.preprocess(
    (v) => (typeof v === 'string' ? v.trim().toLowerCase() || undefined : v),
    z.string()
      .default('balanced')
      .refine(isModeName, { message: `expected one of ${Object.keys(MODES).join(', ')}` }),
  ),
})

export interface EngineCredentials {
  api_key: string
  model: string
  base_url?: string
}

export interface AppConfig {
  port: number
  host: string
  engines: Partial<Record<EngineName, EngineCredentials>>
  supabase: { url: string; key: string } | null
  openai_embedding_key: string | null
  engine_timeout_ms: number
  context_timeout_ms: number
  semantic_threshold: number
  default_mode: ModeName
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    )
  }
  const e = parsed.data

  const engines: AppConfig['engines'] = {}
  if (e.ANTHROPIC_API_KEY) {
    engines.claude = { api_key: e.ANTHROPIC_API_KEY, model: e.CLAUDE_MODEL ?? DEFAULT_MODELS.claude }
  }
  if (e.GEMINI_API_KEY) {
    engines.gemini = { api_key: e.GEMINI_API_KEY, model: e.GEMINI_MODEL ?? DEFAULT_MODELS.gemini }
  }
  if (e.OPENAI_API_KEY) {
    engines.openai = {
      api_key:  e.OPENAI_API_KEY,
      model:    e.OPENAI_MODEL ?? DEFAULT_MODELS.openai,
      base_url: e.OPENAI_BASE_URL,
    }
  }

  return {
    port:                 e.PORT,
    host:                 e.HOST,
    engines,
    supabase:             e.SUPABASE_URL && e.SUPABASE_KEY
      ? { url: e.SUPABASE_URL.replace(/\/$/, ''), key: e.SUPABASE_KEY }
      : null,
    openai_embedding_key: e.OPENAI_API_KEY ?? null,
    engine_timeout_ms:    e.ENGINE_TIMEOUT_MS,
    context_timeout_ms:   e.CONTEXT_TIMEOUT_MS,
    semantic_threshold:   e.SEMANTIC_MATCH_THRESHOLD,
    default_mode:         e.DEFAULT_MODE,
  }
}
