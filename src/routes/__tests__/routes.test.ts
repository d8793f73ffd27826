import { z } from 'zod'
import { createApp } from '../../index'
import type { AppServices } from '../../index'
import { EnsembleMind } from '../../services/orchestrator'
import { ContextAssembler } from '../../services/context'
import { ProactiveSuggestionService } from '../../services/suggestions'
import { EnrichmentQueue } from '../../workers/enrichment'
import { DigestService } from '../../workers/digest'
import { DEGRADED_RESPONSE, MODE_NAMES } from '../../config'
import { FakeAdapter, InMemoryStore, insight, silenceConsole } from '../../__tests__/fakes'

const jsonBody = z.record(z.unknown())

async function read(res: Response): Promise<Record<string, unknown>> {
  return jsonBody.parse(await res.json())
}

function jsonRequest(body: unknown, method = 'POST'): RequestInit {
  return { method, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) }
}

interface Harness {
  app: ReturnType<typeof createApp>
  services: AppServices
  store: InMemoryStore
  gemini: FakeAdapter
  claude: FakeAdapter
}

function harness(options: { memory?: boolean; adapters?: { gemini?: FakeAdapter; claude?: FakeAdapter } } = {}): Harness {
  const store = new InMemoryStore()
  const gemini = options.adapters?.gemini ?? new FakeAdapter('gemini')
  const claude = options.adapters?.claude ?? new FakeAdapter('claude')
  const memory = options.memory ?? true

  const services: AppServices = {
    mind:        new EnsembleMind({ gemini, claude }),
    context:     new ContextAssembler({ store: memory ? store : null }),
    store:       memory ? store : null,
    embedder:    null,
    suggestions: memory ? new ProactiveSuggestionService(store) : null,
    enrichment:  memory ? new EnrichmentQueue({ store, engines: { gemini } }) : null,
    digest:      memory ? new DigestService({ store, engines: { gemini } }) : null,
  }
  return { app: createApp(services), services, store, gemini, claude }
}

beforeEach(silenceConsole)
afterEach(() => jest.restoreAllMocks())

describe('POST /api/v1/think', () => {
  it('answers, stores the exchange and enqueues enrichment', async () => {
    const { app, services, store } = harness()

    const res = await app.request('/api/v1/think', jsonRequest({ query: 'hi' }))

    expect(res.status).toBe(200)
    const body = await read(res)
    expect(body).toMatchObject({
      response: 'gemini answer',
      engine:   'gemini',
      category: 'simple',
      mode:     'balanced',
      outcome:  'answered',
      cost:     0.001,
    })
    expect(store.conversations).toHaveLength(1)
    expect(body.conversation_id).toBe(store.conversations[0]?.id)
    expect(store.conversations[0]).toMatchObject({ query: 'hi', response: 'gemini answer', session_id: 'web' })

    await services.enrichment?.drain()
    expect(services.enrichment?.stats()).toEqual({ pending: 0, processed: 1, failed: 0 })
  })

  it('feeds earlier exchanges back as context', async () => {
    const { app, gemini } = harness()

    await app.request('/api/v1/think', jsonRequest({ query: 'hi' }))
    await app.request('/api/v1/think', jsonRequest({ query: 'hello again' }))

    const second = gemini.calls.find((c) => c.prompt.endsWith('User query: hello again'))
    expect(second?.prompt).toBe(
      '[CONTEXT FROM MEMORY]\n[Recent conversation history]\nUser: hi\nAssistant: gemini answer\n[END CONTEXT]\n\nUser query: hello again',
    )
  })

  it('applies a per-request mode', async () => {
    const { app, claude } = harness()

    const res = await app.request('/api/v1/think', jsonRequest({ query: 'hi', mode: 'Deep', context_window: 0 }))

    expect(await read(res)).toMatchObject({ engine: 'claude', category: 'simple+deep', mode: 'deep', cost: 0.015 })
    expect(claude.calls[0]?.maxTokens).toBe(4096)
  })

  it('rejects an unknown mode before touching any engine', async () => {
    const { app, gemini, claude } = harness()

    const res = await app.request('/api/v1/think', jsonRequest({ query: 'hi', mode: 'turbo' }))

    expect(res.status).toBe(400)
    expect(await read(res)).toEqual({
      error:       'Unknown mode "turbo". Valid modes: balanced, deep, brief, creative, ops',
      valid_modes: MODE_NAMES,
    })
    expect(gemini.calls).toHaveLength(0)
    expect(claude.calls).toHaveLength(0)
  })

  it('rejects a missing query', async () => {
    const { app } = harness()
    const res = await app.request('/api/v1/think', jsonRequest({ mode: 'deep' }))
    expect(res.status).toBe(400)
  })

  it('returns the degraded answer without storing it when every engine fails', async () => {
    const { app, store } = harness({
      adapters: {
        gemini: new FakeAdapter('gemini', new Error('down')),
        claude: new FakeAdapter('claude', new Error('down')),
      },
    })

    const res = await app.request('/api/v1/think', jsonRequest({ query: 'hi' }))

    expect(res.status).toBe(200)
    expect(await read(res)).toMatchObject({
      response:        DEGRADED_RESPONSE,
      engine:          null,
      outcome:         'exhausted',
      cost:            0,
      conversation_id: null,
    })
    expect(store.conversations).toEqual([])
  })

  it('skips enrichment when the exchange cannot be stored', async () => {
    const { app, services, store } = harness()
    store.failWrites = true

    const res = await app.request('/api/v1/think', jsonRequest({ query: 'hi' }))

    expect(await read(res)).toMatchObject({ engine: 'gemini', conversation_id: null })
    expect(services.enrichment?.stats()).toEqual({ pending: 0, processed: 0, failed: 0 })
  })

  it('still answers without memory', async () => {
    const { app } = harness({ memory: false })
    const res = await app.request('/api/v1/think', jsonRequest({ query: 'hi' }))
    expect(await read(res)).toMatchObject({ engine: 'gemini', conversation_id: null })
  })
})

describe('routing and modes', () => {
  it('returns the routing decision', async () => {
    const { app, claude } = harness()
    const res = await app.request('/api/v1/route', jsonRequest({ query: 'write me a poem' }))
    expect(await read(res)).toEqual({ engine: 'claude', category: 'creative' })
    expect(claude.calls).toHaveLength(0)
  })

  it('lists the modes with the active one', async () => {
    const { app } = harness()
    const body = await read(await app.request('/api/v1/modes'))
    expect(body.active).toBe('balanced')
    expect(z.array(z.object({ name: z.string() })).parse(body.modes).map((m) => m.name)).toEqual(MODE_NAMES)
  })

  it('switches the active mode', async () => {
    const { app } = harness()

    const put = await app.request('/api/v1/mode', jsonRequest({ mode: 'brief' }, 'PUT'))
    expect(put.status).toBe(200)
    expect(await read(put)).toMatchObject({ active: { name: 'brief', forced_engine: 'gemini', max_tokens: 512 } })

    expect(await read(await app.request('/api/v1/mode'))).toMatchObject({ name: 'brief' })
  })

  it('rejects an unknown mode switch', async () => {
    const { app, services } = harness()
    const res = await app.request('/api/v1/mode', jsonRequest({ mode: 'turbo' }, 'PUT'))
    expect(res.status).toBe(400)
    expect(services.mind.modes.get().name).toBe('balanced')
  })

  it('reports stats for the mind and memory', async () => {
    const { app } = harness()
    await app.request('/api/v1/think', jsonRequest({ query: 'hi' }))

    const body = await read(await app.request('/api/v1/stats'))

    expect(body.mind).toMatchObject({ total_queries: 1, queries_by_engine: { gemini: 1 }, last_category: 'simple' })
    expect(body.memory).toMatchObject({ status: 'connected', conversations: 1 })
  })
})

describe('memory routes', () => {
  it('pages through history', async () => {
    const { app } = harness()
    await app.request('/api/v1/think', jsonRequest({ query: 'hi' }))

    const body = await read(await app.request('/api/v1/history?limit=1'))

    expect(body.total).toBe(1)
    expect(body.conversations).toMatchObject([{ query: 'hi' }])
  })

  it('rejects an out-of-range limit', async () => {
    const { app } = harness()
    expect((await app.request('/api/v1/history?limit=0')).status).toBe(400)
  })

  it('filters insights and marks one as actioned', async () => {
    const { app, store } = harness()
    store.insights = [
      insight({ id: 'task-1', insight_type: 'task', content: 'ship it' }),
      insight({ id: 'idea-1', insight_type: 'idea', content: 'cache reads' }),
    ]

    const listed = await read(await app.request('/api/v1/insights?type=task&actioned=false'))
    expect(listed.insights).toMatchObject([{ id: 'task-1' }])

    const done = await app.request('/api/v1/insights/task-1/action', { method: 'POST' })
    expect(done.status).toBe(200)
    expect(await read(done)).toEqual({ actioned: true })

    const remaining = await read(await app.request('/api/v1/insights?actioned=false'))
    expect(remaining.insights).toMatchObject([{ id: 'idea-1' }])
  })

  it('reports a failed insight action', async () => {
    const { app } = harness()
    const res = await app.request('/api/v1/insights/missing/action', { method: 'POST' })
    expect(res.status).toBe(502)
  })

  it('stores and lists ideas by category', async () => {
    const { app } = harness()

    const created = await app.request('/api/v1/ideas', jsonRequest({ idea: 'voice notes', category: 'product' }))
    expect(created.status).toBe(201)
    expect(await read(created)).toMatchObject({ stored: true, category: 'product' })
    await app.request('/api/v1/ideas', jsonRequest({ idea: 'quiet hours' }))

    const product = await read(await app.request('/api/v1/ideas?category=product'))
    expect(product.ideas).toMatchObject([{ idea: 'voice notes' }])
    const all = await read(await app.request('/api/v1/ideas'))
    expect(all.total).toBe(2)
  })

  it('refuses to store an idea without memory', async () => {
    const { app } = harness({ memory: false })
    const res = await app.request('/api/v1/ideas', jsonRequest({ idea: 'voice notes' }))
    expect(res.status).toBe(503)
  })

  it('returns proactive suggestions', async () => {
    const { app, store } = harness()
    store.insights = [insight({ insight_type: 'task', content: 'renew domain', created_at: '2020-01-01T00:00:00.000Z' })]

    const body = await read(await app.request('/api/v1/suggestions?limit=3'))

    expect(body.total).toBe(1)
    expect(body.suggestions).toMatchObject([{ type: 'stale_task' }])
  })
})

describe('digest routes', () => {
  it('summarizes today, then serves the stored digest', async () => {
    const gemini = new FakeAdapter('gemini', 'gemini answer', '[]', '{"summary":"short day","open_tasks":["renew domain"]}')
    const { app, store } = harness({ adapters: { gemini } })
    await app.request('/api/v1/think', jsonRequest({ query: 'hi' }))

    const created = await app.request('/api/v1/digest', { method: 'POST' })

    expect(created.status).toBe(201)
    expect(await read(created)).toMatchObject({
      summary:            'short day',
      key_decisions:      [],
      open_tasks:         ['renew domain'],
      projects_mentioned: [],
      conversation_count: 1,
      stored:             true,
    })
    expect(store.digests).toHaveLength(1)

    const latest = await app.request('/api/v1/digest')
    expect(latest.status).toBe(200)
    expect(await read(latest)).toMatchObject({ summary: 'short day', conversation_count: 1 })
    expect((await read(await app.request('/api/v1/stats'))).memory).toMatchObject({ digests: 1 })
  })

  it('reports a day without conversations', async () => {
    const { app, gemini } = harness()

    const res = await app.request('/api/v1/digest', { method: 'POST' })

    expect(res.status).toBe(200)
    expect(await read(res)).toMatchObject({ message: 'No conversations today' })
    expect(gemini.calls).toHaveLength(0)
  })

  it('returns 404 before any digest exists and 503 without memory', async () => {
    expect((await harness().app.request('/api/v1/digest')).status).toBe(404)
    expect((await harness({ memory: false }).app.request('/api/v1/digest', { method: 'POST' })).status).toBe(503)
  })
})

describe('GET /api/v1/health', () => {
  it('reports engine readiness and component status', async () => {
    const { app } = harness({ memory: false })

    const body = await read(await app.request('/api/v1/health'))

    expect(body).toMatchObject({
      status:  'alive',
      version: '1.0.0',
      components: {
        mind:       { engines: { claude: 'ready', gemini: 'ready', openai: 'down' }, online: '2/3', active_mode: 'balanced' },
        memory:     { status: 'down' },
        embeddings: { status: 'down' },
        enrichment: null,
      },
    })
  })
})
