// ============================================================
// CONTEXT ASSEMBLER — Memory context injected before a query
//
// Four independent sources, fetched concurrently, rendered in a
// fixed order and joined by a blank line:
//   1. recent history     (rendered oldest → newest)
//   2. unresolved insights (newest first)
//   3. semantic matches    (query + embedder required)
//   4. proactive suggestions (newest first)
//
// Every source has its own timeout. A failing source drops its
// section only. No sources → empty string.
// ============================================================

import type { ContextLimits } from '../config'
import { CONTEXT_LIMITS, DEFAULT_SEMANTIC_THRESHOLD } from '../config'
import type { MemoryStore } from './storage'
import type { Embedder } from './embeddings'
import type { SuggestionSource } from './suggestions'
import { withTimeout } from './timeout'
import { describeCause } from './errors'

export const SECTION_HEADERS = {
  history:     '[Recent conversation history]',
  insights:    '[Active insights from past conversations]',
  semantic:    '[Relevant past context (semantic match)]',
  suggestions: '[Proactive suggestions]',
} as const

type SectionName = keyof typeof SECTION_HEADERS

export interface ContextAssemblerOptions {
  store: MemoryStore | null
  embedder?: Embedder | null
  suggestions?: SuggestionSource | null
  limits?: Partial<ContextLimits>
  timeoutMs?: number
  semanticThreshold?: number
}

export interface BuildContextParams {
  history_limit: number
  query?: string
}

export class ContextAssembler {
  private store: MemoryStore | null
  private embedder: Embedder | null
  private suggestions: SuggestionSource | null
  private limits: ContextLimits
  private timeoutMs: number
  private semanticThreshold: number

  constructor(options: ContextAssemblerOptions) {
    this.store             = options.store
    this.embedder          = options.embedder ?? null
    this.suggestions       = options.suggestions ?? null
    this.limits            = { ...CONTEXT_LIMITS, ...options.limits }
    this.timeoutMs         = options.timeoutMs ?? 5_000
    this.semanticThreshold = options.semanticThreshold ?? DEFAULT_SEMANTIC_THRESHOLD
  }

  async build(params: BuildContextParams): Promise<string> {
    const sections = await Promise.all([
      this.section('history',     () => this.history(params.history_limit)),
      this.section('insights',    () => this.insights()),
      this.section('semantic',    () => this.semantic(params.query)),
      this.section('suggestions', () => this.proactive()),
    ])
    return sections.filter((s): s is string => s !== null).join('\n\n')
  }

  // ── Sources ──────────────────────────────────────────────────

  private async history(limit: number): Promise<string[]> {
    if (!this.store || limit <= 0) return []
    const conversations = await this.store.getRecentConversations(limit)
    const lines: string[] = []
    // Store returns newest first; the model reads history chronologically
    for (const conv of conversations.slice(0, limit).reverse()) {
      lines.push(`User: ${clip(conv.query, this.limits.history_query_chars)}`)
      lines.push(`Assistant: ${clip(conv.response, this.limits.history_response_chars)}`)
    }
    return lines
  }

  private async insights(): Promise<string[]> {
    if (!this.store) return []
    const insights = await this.store.getInsights({ actioned: false, limit: this.limits.insight_items })
    return insights.slice(0, this.limits.insight_items).map((ins) => {
      const tags = ins.project_tags.length > 0 ? ` [${ins.project_tags.join(', ')}]` : ''
      return `- [${ins.insight_type}]${tags} ${clip(ins.content, this.limits.insight_chars)}`
    })
  }

  private async semantic(query: string | undefined): Promise<string[]> {
    if (!this.store || !query?.trim() || !this.embedder?.isAvailable()) return []
    const embedding = await this.embedder.embed(query)
    if (!embedding) return []

    const matches = await this.store.matchEmbeddings(
      embedding,
      this.limits.semantic_items,
      this.semanticThreshold,
    )
    return matches
      .slice(0, this.limits.semantic_items)
      .map((m) => `- (${Math.round(m.similarity * 100)}%) ${clip(m.chunk_text, this.limits.semantic_chars)}`)
  }

  private async proactive(): Promise<string[]> {
    if (!this.suggestions) return []
    const suggestions = await this.suggestions.getSuggestions(this.limits.suggestion_items)
    return suggestions
      .slice(0, this.limits.suggestion_items)
      .map((s) => `- ${clip(s.text, this.limits.suggestion_chars)}`)
  }

  // ── Isolation ────────────────────────────────────────────────

  private async section(name: SectionName, load: () => Promise<string[]>): Promise<string | null> {
    try {
      const lines = await withTimeout(load(), this.timeoutMs, `context:${name}`)
      if (lines.length === 0) return null
      return [SECTION_HEADERS[name], ...lines].join('\n')
    } catch (err) {
      console.warn(`[ContextAssembler] ${name} skipped: ${describeCause(err).slice(0, 120)}`)
      return null
    }
  }
}

// Counts code points, so a surrogate pair is never split
function clip(text: string, max: number): string {
  const chars = Array.from(text)
  return chars.length > max ? chars.slice(0, max).join('') : text
}
