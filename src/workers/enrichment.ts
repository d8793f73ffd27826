// ============================================================
// ENRICHMENT WORKER — Post-commit hooks for stored exchanges
//
// After an exchange is persisted the API enqueues a job here and
// returns immediately. Jobs run one at a time in the background:
//   1. Insight extraction — cheapest ready engine returns a JSON
//      array of { type, content, projects }
//   2. Embedding         — exchange text → vector → store
//
// Nothing in here can fail or block the response path.
// ============================================================

import { z } from 'zod'
import type { EngineName, NewInsight } from '../types'
import type { AdapterSet, EngineAdapter } from '../services/model-adapter'
import type { MemoryStore } from '../services/storage'
import type { Embedder } from '../services/embeddings'
import { describeCause } from '../services/errors'
import { parseJsonReply } from './json-reply'

export interface EnrichmentJob {
  conversation_id: string
  session_id: string
  query: string
  response: string
}

export const EXTRACTION_ORDER: readonly EngineName[] = ['gemini', 'openai', 'claude']

/** First configured engine in EXTRACTION_ORDER. */
export function cheapestEngine(engines: AdapterSet): EngineAdapter | undefined {
  return EXTRACTION_ORDER
    .map((name) => engines[name])
    .find((adapter) => adapter !== undefined)
}
export const EXTRACTION_MAX_TOKENS = 400
export const MAX_INSIGHTS_PER_EXCHANGE = 5
export const INSIGHT_CONFIDENCE = 0.8

const EXTRACTION_PROMPT = `Extract insights from this conversation between the user and the assistant.
Return ONLY a JSON array. Each object: {"type":"decision|idea|task|question|connection|preference","content":"concise text","projects":["ProjectName"]}.
If nothing notable, return []. No markdown.`

const extractedInsight = z.object({
  type:     z.enum(['decision', 'idea', 'task', 'question', 'connection', 'preference']).catch('idea'),
  content:  z.string().default(''),
  projects: z.array(z.string()).catch([]).default([]),
})

export type ExtractedInsight = z.output<typeof extractedInsight>

/**
 * Parse model output into insights. Accepts a bare JSON array or one
 * wrapped in a ``` fence; anything else yields an empty list.
 */
export function parseInsights(raw: string): ExtractedInsight[] {
  const data = parseJsonReply(raw)
  if (data === undefined) {
    console.debug('[EnrichmentQueue] insight extraction returned invalid JSON')
    return []
  }

  const parsed = z.array(z.unknown()).safeParse(data)
  if (!parsed.success) return []

  return parsed.data
    .map((item) => extractedInsight.safeParse(item))
    .flatMap((r) => (r.success && r.data.content.trim() ? [r.data] : []))
    .slice(0, MAX_INSIGHTS_PER_EXCHANGE)
}

export interface EnrichmentOptions {
  store: MemoryStore
  engines: AdapterSet
  embedder?: Embedder | null
}

export class EnrichmentQueue {
  private pending: EnrichmentJob[] = []
  private running: Promise<void> | null = null
  private processed = 0
  private failed    = 0

  constructor(private options: EnrichmentOptions) {}

  enqueue(job: EnrichmentJob): void {
    this.pending.push(job)
    if (!this.running) this.running = this.run()
  }

  /** Resolves once every queued job has been handled. */
  async drain(): Promise<void> {
    while (this.running) await this.running
  }

  stats(): { pending: number; processed: number; failed: number } {
    return { pending: this.pending.length, processed: this.processed, failed: this.failed }
  }

  private async run(): Promise<void> {
    let job = this.pending.shift()
    while (job) {
      try {
        await this.process(job)
        this.processed++
      } catch (err) {
        this.failed++
        console.warn(`[EnrichmentQueue] job ${job.conversation_id} failed: ${describeCause(err).slice(0, 120)}`)
      }
      job = this.pending.shift()
    }
    // Cleared in the same tick as the empty shift, so the next enqueue starts a new worker
    this.running = null
  }

  private async process(job: EnrichmentJob): Promise<void> {
    const [insights, embedding] = await Promise.allSettled([
      this.extractInsights(job),
      this.embedExchange(job),
    ])
    if (insights.status === 'fulfilled' && insights.value > 0) {
      console.info(`[EnrichmentQueue] extracted ${insights.value} insights`)
    }

    const errors = [insights, embedding]
      .flatMap((r) => (r.status === 'rejected' ? [describeCause(r.reason)] : []))
    if (errors.length > 0) throw new Error(errors.join('; '))
  }

  private async extractInsights(job: EnrichmentJob): Promise<number> {
    const engine = cheapestEngine(this.options.engines)
    if (!engine) return 0

    const raw = await engine.generate(
      `${EXTRACTION_PROMPT}\n\nUser: ${job.query}\nAssistant: ${job.response.slice(0, 800)}`,
      EXTRACTION_MAX_TOKENS,
    )

    let stored = 0
    for (const insight of parseInsights(raw)) {
      const record: NewInsight = {
        conversation_id: job.conversation_id,
        session_id:      job.session_id,
        insight_type:    insight.type,
        content:         insight.content,
        project_tags:    insight.projects,
        confidence:      INSIGHT_CONFIDENCE,
      }
      if (await this.options.store.storeInsight(record)) stored++
    }
    return stored
  }

  private async embedExchange(job: EnrichmentJob): Promise<void> {
    const embedder = this.options.embedder
    if (!embedder?.isAvailable()) return

    const text = `User: ${job.query}\nAssistant: ${job.response.slice(0, 500)}`
    const embedding = await embedder.embed(text)
    if (!embedding) return

    await this.options.store.storeEmbedding({
      source_id:   job.conversation_id,
      source_type: 'conversation',
      embedding,
      chunk_text:  text,
    })
  }
}
