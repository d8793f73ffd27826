// ============================================================
// MIND ROUTES — /api/v1/modes, /api/v1/mode, /api/v1/stats
// ============================================================

import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { z } from 'zod'
import type { AppEnv } from '../index'
import { ModeRegistry } from '../services/modes'

const modeSchema = z.object({
  mode: z.string().min(1),
})

const mind = new Hono<AppEnv>()

mind.get('/modes', (c) => {
  const { modes } = c.get('services').mind
  return c.json({ active: modes.get().name, modes: modes.list() })
})

mind.get('/mode', (c) => {
  return c.json(c.get('services').mind.modes.get())
})

// ── PUT /api/v1/mode — Switch the process-wide mode ─────────
mind.put('/mode', zValidator('json', modeSchema), (c) => {
  const name = ModeRegistry.parse(c.req.valid('json').mode)
  const active = c.get('services').mind.modes.set(name)
  return c.json({ active })
})

// ── GET /api/v1/stats — Mind counters + memory counts ───────
mind.get('/stats', async (c) => {
  const { mind: ensemble, store, enrichment } = c.get('services')
  return c.json({
    mind:       ensemble.getStats(),
    memory:     store ? await store.getCounts() : { status: 'disconnected' },
    enrichment: enrichment ? enrichment.stats() : null,
  })
})

export { mind }
