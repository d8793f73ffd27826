// ============================================================
// DAILY DIGEST — One summary record per day
//
// Reads today's (UTC) exchanges and insights, asks the cheapest
// ready engine for a JSON summary and stores it in `digests`.
// Runs on demand through POST /api/v1/digest; there is no cron.
// ============================================================

import { z } from 'zod'
import type { Conversation, Digest, Insight } from '../types'
import type { AdapterSet } from '../services/model-adapter'
import type { MemoryStore } from '../services/storage'
import { describeCause } from '../services/errors'
import { cheapestEngine } from './enrichment'
import { parseJsonReply } from './json-reply'

export const DIGEST_MAX_TOKENS         = 600
export const DIGEST_CONVERSATION_LIMIT = 50
export const DIGEST_INSIGHT_LIMIT      = 30
export const DIGEST_PROMPT_EXCHANGES   = 25

const DIGEST_PROMPT = `Summarize the user's day from these conversations and insights.
Return ONLY JSON: {"summary":"2-3 sentences","key_decisions":["..."],"open_tasks":["..."],"projects_mentioned":["..."]}. No markdown.`

const digestReply = z.object({
  summary:            z.string().catch(''),
  key_decisions:      z.array(z.string()).catch([]),
  open_tasks:         z.array(z.string()).catch([]),
  projects_mentioned: z.array(z.string()).catch([]),
})

export type DigestOutcome =
  | { status: 'created'; digest: Digest; stored: boolean }
  | { status: 'empty'; digest_date: string }
  | { status: 'failed'; error: string }

export interface DigestOptions {
  store: MemoryStore
  engines: AdapterSet
  now?: () => Date
}

export function buildDigestPrompt(conversations: Conversation[], insights: Insight[]): string {
  const lines = [DIGEST_PROMPT, '', 'Conversations:']
  for (const conv of conversations.slice(0, DIGEST_PROMPT_EXCHANGES)) {
    lines.push(`User: ${conv.query.slice(0, 100)} → [${conv.engine}]: ${conv.response.slice(0, 150)}`)
  }
  if (insights.length > 0) {
    lines.push('', 'Insights:')
    for (const ins of insights) lines.push(`[${ins.insight_type}] ${ins.content.slice(0, 100)}`)
  }
  return lines.join('\n')
}

export class DigestService {
  private now: () => Date

  constructor(private options: DigestOptions) {
    this.now = options.now ?? (() => new Date())
  }

  async generate(): Promise<DigestOutcome> {
    const digestDate = this.now().toISOString().slice(0, 10)
    const since = `${digestDate}T00:00:00Z`
    const { store } = this.options

    const [conversations, insights] = await Promise.all([
      store.getConversationsSince(since, DIGEST_CONVERSATION_LIMIT),
      store.getInsights({ since, limit: DIGEST_INSIGHT_LIMIT }),
    ])
    if (conversations.length === 0) return { status: 'empty', digest_date: digestDate }

    const engine = cheapestEngine(this.options.engines)
    if (!engine) return { status: 'failed', error: 'No engine available for the digest' }

    let raw: string
    try {
      raw = await engine.generate(buildDigestPrompt(conversations, insights), DIGEST_MAX_TOKENS)
    } catch (err) {
      const error = describeCause(err)
      console.warn(`[DigestService] generation failed: ${error.slice(0, 120)}`)
      return { status: 'failed', error }
    }

    const parsed = digestReply.safeParse(parseJsonReply(raw))
    if (!parsed.success) {
      console.warn('[DigestService] reply was not a JSON object')
      return { status: 'failed', error: 'Digest reply was not a JSON object' }
    }

    const digest: Digest = {
      digest_date:        digestDate,
      ...parsed.data,
      conversation_count: conversations.length,
    }
    const stored = await store.storeDigest(digest)
    console.info(`[DigestService] ${digestDate}: ${conversations.length} conversations, stored=${stored}`)
    return { status: 'created', digest, stored }
  }
}
