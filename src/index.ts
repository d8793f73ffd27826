// ============================================================
// MAIN APP — Ensemble Mind HTTP surface
// createServices() wires the core once at startup; createApp()
// injects it into every request through a context variable.
// ============================================================

import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import type { AppConfig } from './config'
import { ENGINE_PRIORITY, VERSION } from './config'
import { createAdapters } from './services/model-adapter'
import { ModeRegistry } from './services/modes'
import { EnsembleMind } from './services/orchestrator'
import type { MemoryStore } from './services/storage'
import { SupabaseMemoryStore } from './services/storage'
import type { Embedder } from './services/embeddings'
import { EmbeddingService } from './services/embeddings'
import type { SuggestionSource } from './services/suggestions'
import { ProactiveSuggestionService } from './services/suggestions'
import { ContextAssembler } from './services/context'
import { EnrichmentQueue } from './workers/enrichment'
import { DigestService } from './workers/digest'
import { InvalidModeError, describeCause } from './services/errors'
import { think } from './routes/think'
import { mind } from './routes/mind'
import { memory } from './routes/memory'

export interface AppServices {
  mind:        EnsembleMind
  context:     ContextAssembler
  store:       MemoryStore | null
  embedder:    Embedder | null
  suggestions: SuggestionSource | null
  enrichment:  EnrichmentQueue | null
  digest:      DigestService | null
}

export type AppEnv = {
  Variables: {
    services: AppServices
  }
}

/** Throws NoEnginesError when no engine key is configured. */
export function createServices(config: AppConfig): AppServices {
  const adapters = createAdapters(config)
  const ensemble = EnsembleMind.fromAdapters(adapters, {
    modes: new ModeRegistry(config.default_mode),
  })

  const store = config.supabase
    ? new SupabaseMemoryStore(config.supabase.url, config.supabase.key)
    : null
  if (!store) console.warn('[Memory] Supabase not configured — memory disabled')

  const embedder = new EmbeddingService(config.openai_embedding_key, config.engines.openai?.base_url)
  if (!embedder.isAvailable()) console.warn('[Memory] no OpenAI key — semantic context disabled')

  const suggestions = store ? new ProactiveSuggestionService(store) : null

  return {
    mind: ensemble,
    context: new ContextAssembler({
      store,
      embedder,
      suggestions,
      timeoutMs:         config.context_timeout_ms,
      semanticThreshold: config.semantic_threshold,
    }),
    store,
    embedder,
    suggestions,
    enrichment: store ? new EnrichmentQueue({ store, engines: adapters, embedder }) : null,
    digest:     store ? new DigestService({ store, engines: adapters }) : null,
  }
}

export function createApp(services: AppServices): Hono<AppEnv> {
  const app = new Hono<AppEnv>()

  // ── Global Middleware ─────────────────────────────────────────
  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
  }))
  app.use('/api/*', logger())
  app.use('*', async (c, next) => {
    c.set('services', services)
    await next()
  })

  app.onError((err, c) => {
    if (err instanceof InvalidModeError) {
      return c.json({ error: err.message, valid_modes: err.validModes }, 400)
    }
    console.error('[App] unhandled error:', describeCause(err).slice(0, 200))
    return c.json({ error: 'Internal error' }, 500)
  })

  // ── Health / Meta ─────────────────────────────────────────────
  app.get('/api/v1/health', (c) => {
    const { mind: ensemble, store, embedder, enrichment } = c.get('services')
    const engines = Object.fromEntries(
      ENGINE_PRIORITY.map((e) => [e, ensemble.isReady(e) ? 'ready' : 'down']),
    )
    const online = ensemble.readyEngines().length

    return c.json({
      status: online > 0 ? 'alive' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      components: {
        mind: {
          engines,
          online: `${online}/${ENGINE_PRIORITY.length}`,
          active_mode: ensemble.modes.get().name,
        },
        memory:     { status: store ? 'active' : 'down' },
        embeddings: { status: embedder?.isAvailable() ? 'active' : 'down' },
        enrichment: enrichment ? enrichment.stats() : null,
      },
    })
  })

  app.get('/', (c) => c.json({
    name: 'Ensemble Mind',
    version: VERSION,
    health: '/api/v1/health',
  }))

  // ── API Routes ────────────────────────────────────────────────
  app.route('/api/v1', think)
  app.route('/api/v1', mind)
  app.route('/api/v1', memory)

  return app
}
