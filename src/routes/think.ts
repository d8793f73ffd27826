// ============================================================
// THINK ROUTES — /api/v1/think, /api/v1/route
// ============================================================

import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { z } from 'zod'
import type { AppEnv } from '../index'
import type { ThinkResponse } from '../types'
import { ENGINE_COST } from '../config'
import { ModeRegistry } from '../services/modes'
import { describeCause } from '../services/errors'

const thinkSchema = z.object({
  query:          z.string().min(1).max(10000),
  mode:           z.string().optional(),
  context_window: z.number().int().min(0).max(50).default(5),
  session_id:     z.string().min(1).max(100).default('web'),
})

const routeSchema = z.object({
  query: z.string().max(10000),
})

const think = new Hono<AppEnv>()

// ── POST /api/v1/think — Route, enrich, answer, persist ─────
think.post('/think', zValidator('json', thinkSchema), async (c) => {
  const body = c.req.valid('json')
  const { mind, context, store, enrichment } = c.get('services')

  // Invalid mode fails fast (400) before any engine is touched
  const mode = body.mode !== undefined ? ModeRegistry.parse(body.mode) : undefined

  let memoryContext = ''
  try {
    memoryContext = await context.build({ history_limit: body.context_window, query: body.query })
  } catch (err) {
    console.warn('[Think] context build failed (non-fatal):', describeCause(err).slice(0, 120))
  }

  const result = await mind.think(body.query, { context: memoryContext, mode })

  let conversationId: string | null = null
  if (store && result.outcome === 'answered') {
    conversationId = await store.storeConversation({
      query:      body.query,
      response:   result.response,
      engine:     result.engine,
      category:   result.category,
      mode:       result.mode,
      session_id: body.session_id,
    })
    if (conversationId && enrichment) {
      enrichment.enqueue({
        conversation_id: conversationId,
        session_id:      body.session_id,
        query:           body.query,
        response:        result.response,
      })
    }
  }

  const response: ThinkResponse = {
    response:        result.response,
    engine:          result.engine,
    category:        result.category,
    mode:            result.mode,
    outcome:         result.outcome,
    cost:            result.engine ? ENGINE_COST[result.engine] : 0,
    attempts:        result.attempts,
    conversation_id: conversationId,
    timestamp:       new Date().toISOString(),
  }
  return c.json(response)
})

// ── POST /api/v1/route — Routing decision only ──────────────
think.post('/route', zValidator('json', routeSchema), (c) => {
  const { query } = c.req.valid('json')
  return c.json(c.get('services').mind.route(query))
})

export { think }
