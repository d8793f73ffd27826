// ============================================================
// MEMORY ROUTES — history, insights, ideas, suggestions, digest
// ============================================================

import { Hono } from 'hono'
import { z } from 'zod'
import { zValidator } from '@hono/zod-validator'
import type { AppEnv } from '../index'

const memory = new Hono<AppEnv>()

const limitParam = (fallback: number) => z.coerce.number().int().min(1).max(100).default(fallback)

const historyQuery = z.object({
  limit:  limitParam(20),
  offset: z.coerce.number().int().min(0).default(0),
})

const insightQuery = z.object({
  type:     z.enum(['decision', 'idea', 'task', 'question', 'connection', 'preference']).optional(),
  project:  z.string().optional(),
  actioned: z.enum(['true', 'false']).optional().transform((v) => (v === undefined ? undefined : v === 'true')),
  limit:    limitParam(20),
})

const ideaQuery = z.object({
  category: z.string().optional(),
  limit:    limitParam(20),
})

const createIdeaSchema = z.object({
  idea:     z.string().min(1).max(5000),
  category: z.string().min(1).max(50).default('general'),
})

const suggestionQuery = z.object({
  limit: limitParam(5),
})

// ── GET /api/v1/history — Recent exchanges, newest first ────
memory.get('/history', zValidator('query', historyQuery), async (c) => {
  const { limit, offset } = c.req.valid('query')
  const { store } = c.get('services')
  const conversations = store ? await store.getRecentConversations(limit, offset) : []
  return c.json({ conversations, total: conversations.length })
})

// ── GET /api/v1/insights — Filtered insights ────────────────
memory.get('/insights', zValidator('query', insightQuery), async (c) => {
  const filter = c.req.valid('query')
  const { store } = c.get('services')
  const insights = store ? await store.getInsights(filter) : []
  return c.json({ insights, total: insights.length })
})

// ── POST /api/v1/insights/:id/action — Mark as done ─────────
memory.post('/insights/:id/action', async (c) => {
  const { store } = c.get('services')
  if (!store) return c.json({ error: 'Memory not configured' }, 503)

  const actioned = await store.actionInsight(c.req.param('id'))
  return c.json({ actioned }, actioned ? 200 : 502)
})

// ── Ideas ────────────────────────────────────────────────────
memory.get('/ideas', zValidator('query', ideaQuery), async (c) => {
  const { category, limit } = c.req.valid('query')
  const { store } = c.get('services')
  const ideas = store ? await store.getIdeas(category, limit) : []
  return c.json({ ideas, total: ideas.length })
})

memory.post('/ideas', zValidator('json', createIdeaSchema), async (c) => {
  const { idea, category } = c.req.valid('json')
  const { store } = c.get('services')
  if (!store) return c.json({ error: 'Memory not configured' }, 503)

  const id = await store.storeIdea(idea, category)
  if (!id) return c.json({ error: 'Idea could not be stored' }, 502)
  return c.json({ stored: true, id, category }, 201)
})

// ── GET /api/v1/suggestions — Proactive nudges ──────────────
memory.get('/suggestions', zValidator('query', suggestionQuery), async (c) => {
  const { limit } = c.req.valid('query')
  const { suggestions } = c.get('services')
  const items = suggestions ? await suggestions.getSuggestions(limit) : []
  return c.json({ suggestions: items, total: items.length })
})

// ── Daily digest ─────────────────────────────────────────────
memory.get('/digest', async (c) => {
  const { store } = c.get('services')
  const digest = store ? await store.getLatestDigest() : null
  if (!digest) return c.json({ error: 'No digest yet' }, 404)
  return c.json(digest)
})

memory.post('/digest', async (c) => {
  const { digest } = c.get('services')
  if (!digest) return c.json({ error: 'Memory not configured' }, 503)

  const outcome = await digest.generate()
  if (outcome.status === 'empty') {
    return c.json({ message: 'No conversations today', digest_date: outcome.digest_date })
  }
  if (outcome.status === 'failed') return c.json({ error: outcome.error }, 502)
  return c.json({ ...outcome.digest, stored: outcome.stored }, 201)
})

export { memory }
