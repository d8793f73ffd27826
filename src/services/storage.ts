// ============================================================
// MEMORY STORE — Persistent conversations, insights, vectors
//
// The core only depends on the MemoryStore interface. The live
// implementation talks to Supabase over PostgREST (/rest/v1) and
// uses the match_embeddings RPC for pgvector similarity search.
//
// Reads return [] and writes return null/false on failure; the
// failure is logged, never thrown.
//
// Tables (public schema):
//   conversations(id uuid, query, response, engine, category,
//                 mode, session_id, timestamp timestamptz)
//   insights(id uuid, conversation_id, session_id, insight_type,
//            content, project_tags text[], confidence float,
//            actioned bool, created_at timestamptz)
//   embeddings(id uuid, source_id, source_type, chunk_text,
//              embedding vector(1536))
//   ideas(id uuid, idea, category, created_at timestamptz)
//   digests(id uuid, digest_date date, summary, key_decisions text[],
//           open_tasks text[], projects_mentioned text[],
//           conversation_count int)
//
//   match_embeddings(query_embedding vector, match_count int,
//                    match_threshold float)
//     returns (source_id, source_type, chunk_text, similarity)
// ============================================================

import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type {
  Conversation,
  Digest,
  Idea,
  Insight,
  InsightFilter,
  MemoryCounts,
  NewConversation,
  NewEmbedding,
  NewInsight,
  SemanticMatch,
} from '../types'
import { describeCause } from './errors'

export interface MemoryStore {
  getRecentConversations(limit: number, offset?: number): Promise<Conversation[]>
  /** Oldest first, from `since` (inclusive) onwards. */
  getConversationsSince(since: string, limit: number): Promise<Conversation[]>
  storeConversation(conversation: NewConversation): Promise<string | null>
  getInsights(filter: InsightFilter): Promise<Insight[]>
  storeInsight(insight: NewInsight): Promise<boolean>
  actionInsight(id: string): Promise<boolean>
  matchEmbeddings(embedding: number[], count: number, threshold: number): Promise<SemanticMatch[]>
  storeEmbedding(record: NewEmbedding): Promise<boolean>
  storeIdea(idea: string, category: string): Promise<string | null>
  getIdeas(category: string | undefined, limit: number): Promise<Idea[]>
  storeDigest(digest: Digest): Promise<boolean>
  getLatestDigest(): Promise<Digest | null>
  getCounts(): Promise<MemoryCounts>
}

// ── Row schemas ───────────────────────────────────────────────
const conversationRow = z.object({
  id:         z.string(),
  query:      z.string().default(''),
  response:   z.string().default(''),
  engine:     z.string().default('unknown'),
  category:   z.string().default('unknown'),
  mode:       z.string().default('balanced'),
  session_id: z.string().default('web'),
  timestamp:  z.string(),
})

const insightRow = z.object({
  id:              z.string(),
  insight_type:    z.enum(['decision', 'idea', 'task', 'question', 'connection', 'preference']).catch('idea'),
  content:         z.string(),
  project_tags:    z.array(z.string()).nullable().transform((t) => t ?? []),
  confidence:      z.number().default(0.8),
  actioned:        z.boolean().default(false),
  conversation_id: z.string().nullable().default(null),
  created_at:      z.string(),
})

const matchRow = z.object({
  source_id:   z.string(),
  source_type: z.string().default('conversation'),
  chunk_text:  z.string().default(''),
  similarity:  z.number(),
})

const ideaRow = z.object({
  id:         z.string(),
  idea:       z.string(),
  category:   z.string().default('general'),
  created_at: z.string(),
})

const digestRow = z.object({
  digest_date:        z.string(),
  summary:            z.string().default(''),
  key_decisions:      z.array(z.string()).nullable().transform((t) => t ?? []),
  open_tasks:         z.array(z.string()).nullable().transform((t) => t ?? []),
  projects_mentioned: z.array(z.string()).nullable().transform((t) => t ?? []),
  conversation_count: z.number().int().default(0),
})

const TABLES = {
  conversations: 'conversations',
  insights:      'insights',
  embeddings:    'embeddings',
  ideas:         'ideas',
  digests:       'digests',
} as const

export const MAX_STORED_RESPONSE_CHARS = 5000
export const MAX_STORED_INSIGHT_CHARS  = 500
export const MAX_STORED_CHUNK_CHARS    = 1000

export class SupabaseMemoryStore implements MemoryStore {
  private headers: Record<string, string>
  private baseUrl: string

  constructor(
    supabaseUrl: string,          // e.g. https://xxxx.supabase.co
    serviceKey: string,
    private timeoutMs = 15_000,
  ) {
    this.baseUrl = `${supabaseUrl.replace(/\/$/, '')}/rest/v1`
    this.headers = {
      'Content-Type':  'application/json',
      'apikey':        serviceKey,
      'Authorization': `Bearer ${serviceKey}`,
    }
  }

  // ── Conversations ────────────────────────────────────────────
  async getRecentConversations(limit: number, offset = 0): Promise<Conversation[]> {
    return this.select(TABLES.conversations, conversationRow, {
      select: 'id,query,response,engine,category,mode,session_id,timestamp',
      order:  'timestamp.desc',
      limit:  String(limit),
      offset: String(offset),
    })
  }

  async getConversationsSince(since: string, limit: number): Promise<Conversation[]> {
    return this.select(TABLES.conversations, conversationRow, {
      select:    'id,query,response,engine,category,mode,session_id,timestamp',
      timestamp: `gte.${since}`,
      order:     'timestamp.asc',
      limit:     String(limit),
    })
  }

  async storeConversation(conversation: NewConversation): Promise<string | null> {
    const id = randomUUID()
    const ok = await this.insert(TABLES.conversations, {
      id,
      ...conversation,
      response: conversation.response.slice(0, MAX_STORED_RESPONSE_CHARS),
    })
    return ok ? id : null
  }

  // ── Insights ─────────────────────────────────────────────────
  async getInsights(filter: InsightFilter): Promise<Insight[]> {
    const params: Record<string, string> = {
      select: 'id,insight_type,content,project_tags,confidence,actioned,conversation_id,created_at',
      order:  'created_at.desc',
      limit:  String(filter.limit),
    }
    if (filter.type)                   params.insight_type = `eq.${filter.type}`
    if (filter.project)                params.project_tags = `cs.{"${filter.project}"}`
    if (filter.actioned !== undefined) params.actioned     = `eq.${filter.actioned}`
    if (filter.since)                  params.created_at   = `gte.${filter.since}`

    return this.select(TABLES.insights, insightRow, params)
  }

  async storeInsight(insight: NewInsight): Promise<boolean> {
    return this.insert(TABLES.insights, {
      ...insight,
      content: insight.content.slice(0, MAX_STORED_INSIGHT_CHARS),
    })
  }

  async actionInsight(id: string): Promise<boolean> {
    const query = new URLSearchParams({ id: `eq.${id}` })
    return this.send('PATCH', `/${TABLES.insights}?${query}`, { actioned: true }, 'actionInsight')
  }

  // ── Embeddings ───────────────────────────────────────────────
  async matchEmbeddings(embedding: number[], count: number, threshold: number): Promise<SemanticMatch[]> {
    try {
      const res = await this.request('/rpc/match_embeddings', {
        method: 'POST',
        body: JSON.stringify({
          query_embedding: `[${embedding.join(',')}]`,   // pgvector literal format
          match_count:     count,
          match_threshold: threshold,
        }),
      })
      if (!res.ok) {
        await this.logFailure('matchEmbeddings', res)
        return []
      }
      return z.array(matchRow).parse(await res.json())
    } catch (err) {
      console.warn('[SupabaseMemoryStore] matchEmbeddings exception:', describeCause(err).slice(0, 120))
      return []
    }
  }

  async storeEmbedding(record: NewEmbedding): Promise<boolean> {
    return this.insert(TABLES.embeddings, {
      source_id:   record.source_id,
      source_type: record.source_type,
      chunk_text:  record.chunk_text.slice(0, MAX_STORED_CHUNK_CHARS),
      embedding:   `[${record.embedding.join(',')}]`,
    })
  }

  // ── Ideas ────────────────────────────────────────────────────
  async storeIdea(idea: string, category: string): Promise<string | null> {
    const id = randomUUID()
    const ok = await this.insert(TABLES.ideas, { id, idea, category })
    return ok ? id : null
  }

  async getIdeas(category: string | undefined, limit: number): Promise<Idea[]> {
    const params: Record<string, string> = {
      select: 'id,idea,category,created_at',
      order:  'created_at.desc',
      limit:  String(limit),
    }
    if (category) params.category = `eq.${category}`
    return this.select(TABLES.ideas, ideaRow, params)
  }

  // ── Digests ──────────────────────────────────────────────────
  async storeDigest(digest: Digest): Promise<boolean> {
    return this.insert(TABLES.digests, { id: randomUUID(), ...digest })
  }

  async getLatestDigest(): Promise<Digest | null> {
    const rows = await this.select(TABLES.digests, digestRow, {
      select: 'digest_date,summary,key_decisions,open_tasks,projects_mentioned,conversation_count',
      order:  'digest_date.desc',
      limit:  '1',
    })
    return rows[0] ?? null
  }

  // ── Stats ────────────────────────────────────────────────────
  async getCounts(): Promise<MemoryCounts> {
    const counts: MemoryCounts = {
      status: 'disconnected',
      conversations: 0,
      insights: 0,
      embeddings: 0,
      ideas: 0,
      digests: 0,
    }
    const tables = ['conversations', 'insights', 'embeddings', 'ideas', 'digests'] as const

    const results = await Promise.all(tables.map((t) => this.count(TABLES[t])))
    tables.forEach((t, i) => {
      const n = results[i]
      if (n !== null) {
        counts[t] = n
        counts.status = 'connected'
      }
    })
    return counts
  }

  // ── PostgREST helpers ────────────────────────────────────────
  private request(path: string, init: { method: string; body?: string; headers?: Record<string, string> }): Promise<Response> {
    return fetch(`${this.baseUrl}${path}`, {
      method:  init.method,
      body:    init.body,
      headers: { ...this.headers, ...init.headers },
      signal:  AbortSignal.timeout(this.timeoutMs),
    })
  }

  private async select<S extends z.ZodTypeAny>(
    table: string,
    schema: S,
    params: Record<string, string>,
  ): Promise<Array<z.output<S>>> {
    try {
      const res = await this.request(`/${table}?${new URLSearchParams(params)}`, { method: 'GET' })
      if (!res.ok) {
        await this.logFailure(`select ${table}`, res)
        return []
      }
      return z.array(schema).parse(await res.json())
    } catch (err) {
      console.warn(`[SupabaseMemoryStore] select ${table} exception:`, describeCause(err).slice(0, 120))
      return []
    }
  }

  private async insert(table: string, row: Record<string, unknown>): Promise<boolean> {
    return this.send('POST', `/${table}`, row, `insert ${table}`)
  }

  private async send(method: 'POST' | 'PATCH', path: string, body: unknown, label: string): Promise<boolean> {
    try {
      const res = await this.request(path, {
        method,
        body:    JSON.stringify(body),
        headers: { 'Prefer': 'return=minimal' },
      })
      if (!res.ok) {
        await this.logFailure(label, res)
        return false
      }
      return true
    } catch (err) {
      console.warn(`[SupabaseMemoryStore] ${label} exception:`, describeCause(err).slice(0, 120))
      return false
    }
  }

  private async count(table: string): Promise<number | null> {
    try {
      const res = await this.request(`/${table}?select=id&limit=1`, {
        method:  'GET',
        headers: { 'Prefer': 'count=exact' },
      })
      if (!res.ok) return null
      return parseContentRange(res.headers.get('content-range'))
    } catch (err) {
      console.warn(`[SupabaseMemoryStore] count ${table} exception:`, describeCause(err).slice(0, 120))
      return null
    }
  }

  private async logFailure(label: string, res: Response): Promise<void> {
    const errText = await res.text().catch(() => '')
    console.warn(`[SupabaseMemoryStore] ${label} error:`, res.status, errText.slice(0, 200))
  }
}

// "0-0/42" → 42, "*/0" → 0, "0-0/*" → 0
export function parseContentRange(header: string | null): number {
  if (!header) return 0
  const total = header.split('/').pop() ?? '*'
  const n = Number.parseInt(total, 10)
  return Number.isNaN(n) ? 0 : n
}
