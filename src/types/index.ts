// ============================================================
// ENSEMBLE MIND — Core Type Definitions
// ============================================================

export type EngineName = 'claude' | 'gemini' | 'openai'

export type Category =
  | 'creative'
  | 'complex'
  | 'data'
  | 'arabic'
  | 'long'
  | 'simple'
  | 'default'

export type ModeName = 'balanced' | 'deep' | 'brief' | 'creative' | 'ops'

// ─── Router ──────────────────────────────────────────────────
export interface RouteDecision {
  engine: EngineName
  category: Category
}

// ─── Modes ───────────────────────────────────────────────────
export interface ModeConfig {
  description: string
  forced_engine: EngineName | null
  prompt_addon: string
  max_tokens: number
}

// ─── Orchestrator ────────────────────────────────────────────
export type AttemptStatus = 'skipped' | 'failed' | 'succeeded'

export interface EngineAttempt {
  engine: EngineName
  status: AttemptStatus
  error?: string
  duration_ms: number
}

export interface ThinkOptions {
  context?: string
  mode?: ModeName
}

export type ThinkResult =
  | {
      outcome: 'answered'
      response: string
      engine: EngineName
      category: string        // may carry a "+<mode>" suffix
      mode: ModeName
      attempts: EngineAttempt[]
    }
  | {
      outcome: 'exhausted'
      response: string
      engine: null
      category: string
      mode: ModeName
      attempts: EngineAttempt[]
    }

export interface MindStats {
  version: string
  active_mode: ModeName
  engines_online: number
  engines: Record<EngineName, boolean>
  queries_by_engine: Partial<Record<EngineName, number>>
  queries_by_category: Record<string, number>
  total_queries: number
  last_category: string | null
}

// ─── Memory records ──────────────────────────────────────────
export interface Conversation {
  id: string
  query: string
  response: string
  engine: string
  category: string
  mode: string
  session_id: string
  timestamp: string
}

export interface NewConversation {
  query: string
  response: string
  engine: string
  category: string
  mode: string
  session_id: string
}

export type InsightType = 'decision' | 'idea' | 'task' | 'question' | 'connection' | 'preference'

export interface Insight {
  id: string
  insight_type: InsightType
  content: string
  project_tags: string[]
  confidence: number
  actioned: boolean
  conversation_id: string | null
  created_at: string
}

export interface NewInsight {
  conversation_id: string
  session_id: string
  insight_type: InsightType
  content: string
  project_tags: string[]
  confidence: number
}

export interface InsightFilter {
  type?: InsightType
  project?: string
  actioned?: boolean
  since?: string          // ISO timestamp, inclusive
  limit: number
}

export interface SemanticMatch {
  source_id: string
  source_type: string
  chunk_text: string
  similarity: number
}

export interface NewEmbedding {
  source_id: string
  source_type: 'conversation' | 'insight' | 'idea'
  embedding: number[]
  chunk_text: string
}

export interface Idea {
  id: string
  idea: string
  category: string
  created_at: string
}

export type SuggestionType = 'stale_task' | 'cross_topic' | 'continuity'

export interface Suggestion {
  type: SuggestionType
  text: string
  created_at: string
}

export interface Digest {
  digest_date: string     // YYYY-MM-DD (UTC)
  summary: string
  key_decisions: string[]
  open_tasks: string[]
  projects_mentioned: string[]
  conversation_count: number
}

export interface MemoryCounts {
  status: 'connected' | 'disconnected'
  conversations: number
  insights: number
  embeddings: number
  ideas: number
  digests: number
}

// ─── API Contracts ───────────────────────────────────────────
export interface ThinkResponse {
  response: string
  engine: EngineName | null
  category: string
  mode: ModeName
  outcome: ThinkResult['outcome']
  cost: number
  attempts: EngineAttempt[]
  conversation_id: string | null
  timestamp: string
}
