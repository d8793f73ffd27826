// ============================================================
// ENGINE ADAPTERS — One uniform contract over three providers
//   claude  → Anthropic Messages API        (premium)
//   gemini  → Google generateContent API    (fast / cheap)
//   openai  → OpenAI-compatible chat API    (fallback)
//
// Adapters never retry. Any failure surfaces as EngineError and
// the orchestrator moves on to the next engine in the chain.
// ============================================================

import { z } from 'zod'
import type { EngineName } from '../types'
import type { AppConfig, EngineCredentials } from '../config'
import { ENGINE_PRIORITY, ENGINE_ROLES, SYSTEM_PROMPT } from '../config'
import { EngineError, describeCause } from './errors'

export interface EngineAdapter {
  readonly name: EngineName
  readonly model: string
  generate(prompt: string, maxTokens: number): Promise<string>
}

export type AdapterSet = Partial<Record<EngineName, EngineAdapter>>

// ── Provider response shapes (only the fields we read) ────────
const anthropicResponse = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
})

const geminiResponse = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }).optional(),
  })).default([]),
})

const openaiResponse = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })),
})

// ── Shared HTTP helper ────────────────────────────────────────
async function postJson(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  timeoutMs: number,
): Promise<unknown> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs),
  })

  if (!response.ok) {
    const errText = await response.text().catch(() => '')
    throw new Error(`HTTP ${response.status}: ${errText.slice(0, 200)}`)
  }
  return response.json()
}

abstract class HttpEngineAdapter implements EngineAdapter {
  abstract readonly name: EngineName

  constructor(
    protected credentials: EngineCredentials,
    protected timeoutMs: number,
  ) {}

  get model(): string {
    return this.credentials.model
  }

  async generate(prompt: string, maxTokens: number): Promise<string> {
    try {
      const text = await this.request(prompt, maxTokens)
      if (!text.trim()) throw new Error('empty response')
      return text
    } catch (err) {
      console.error(`[${this.constructor.name}] ${describeCause(err).slice(0, 200)}`)
      throw new EngineError(this.name, err)
    }
  }

  protected abstract request(prompt: string, maxTokens: number): Promise<string>
}

// ── Claude ────────────────────────────────────────────────────
export class ClaudeAdapter extends HttpEngineAdapter {
  readonly name = 'claude' as const

  protected async request(prompt: string, maxTokens: number): Promise<string> {
    const data = await postJson(
      'https://api.anthropic.com/v1/messages',
      {
        'x-api-key': this.credentials.api_key,
        'anthropic-version': '2023-06-01',
      },
      {
        model: this.model,
        max_tokens: maxTokens,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }],
      },
      this.timeoutMs,
    )
    const parsed = anthropicResponse.parse(data)
    return parsed.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')
  }
}

// ── Gemini ────────────────────────────────────────────────────
export class GeminiAdapter extends HttpEngineAdapter {
  readonly name = 'gemini' as const

  protected async request(prompt: string, maxTokens: number): Promise<string> {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent`
    const data = await postJson(
      url,
      { 'x-goog-api-key': this.credentials.api_key },
      {
        systemInstruction: { parts: [{ text: SYSTEM_PROMPT }] },
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: { maxOutputTokens: maxTokens },
      },
      this.timeoutMs,
    )
    const parsed = geminiResponse.parse(data)
    const parts = parsed.candidates[0]?.content?.parts ?? []
    return parts.map((p) => p.text ?? '').join('')
  }
}

// ── OpenAI-compatible ─────────────────────────────────────────
export class OpenAIAdapter extends HttpEngineAdapter {
  readonly name = 'openai' as const

  protected async request(prompt: string, maxTokens: number): Promise<string> {
    const baseUrl = this.credentials.base_url?.replace(/\/$/, '') ?? 'https://api.openai.com/v1'
    const data = await postJson(
      `${baseUrl}/chat/completions`,
      { Authorization: `Bearer ${this.credentials.api_key}` },
      {
        model: this.model,
        max_tokens: maxTokens,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
      },
      this.timeoutMs,
    )
    const parsed = openaiResponse.parse(data)
    return parsed.choices[0]?.message.content ?? ''
  }
}

const ADAPTER_CLASSES = {
  claude: ClaudeAdapter,
  gemini: GeminiAdapter,
  openai: OpenAIAdapter,
} satisfies Record<EngineName, new (c: EngineCredentials, t: number) => EngineAdapter>

/**
 * Build an adapter for every engine whose credentials are present.
 * A missing key leaves the engine absent, which is a valid degraded state.
 */
export function createAdapters(config: Pick<AppConfig, 'engines' | 'engine_timeout_ms'>): AdapterSet {
  const adapters: AdapterSet = {}

  for (const name of ENGINE_PRIORITY) {
    const label = `${name} (${ENGINE_ROLES[name]})`
    const credentials = config.engines[name]
    if (!credentials) {
      console.warn(`[Engines] ${label}: no API key`)
      continue
    }
    try {
      adapters[name] = new ADAPTER_CLASSES[name](credentials, config.engine_timeout_ms)
      console.info(`[Engines] ${label}: ready (${credentials.model})`)
    } catch (err) {
      console.error(`[Engines] ${label}: ${describeCause(err)}`)
    }
  }

  return adapters
}
