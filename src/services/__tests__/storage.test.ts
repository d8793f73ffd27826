import { MAX_STORED_RESPONSE_CHARS, SupabaseMemoryStore, parseContentRange } from '../storage'
import { silenceConsole } from '../../__tests__/fakes'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

let fetchMock: jest.SpiedFunction<typeof fetch>

function call(index = 0): { url: URL; init: RequestInit | undefined } {
  const [input, init] = fetchMock.mock.calls[index] ?? []
  return { url: new URL(String(input)), init }
}

beforeEach(() => {
  silenceConsole()
  fetchMock = jest.spyOn(global, 'fetch')
})
afterEach(() => jest.restoreAllMocks())

const store = new SupabaseMemoryStore('https://db.test/', 'test-secret')

describe('SupabaseMemoryStore', () => {
  it('reads recent conversations newest first with auth headers', async () => {
    fetchMock.mockResolvedValue(jsonResponse([
      { id: 'c1', query: 'q', response: 'r', engine: 'gemini', category: 'simple', mode: 'balanced', session_id: 'web', timestamp: '2026-03-01T00:00:00Z' },
    ]))

    const rows = await store.getRecentConversations(2, 4)

    expect(rows).toEqual([
      { id: 'c1', query: 'q', response: 'r', engine: 'gemini', category: 'simple', mode: 'balanced', session_id: 'web', timestamp: '2026-03-01T00:00:00Z' },
    ])
    const { url, init } = call()
    expect(url.origin + url.pathname).toBe('https://db.test/rest/v1/conversations')
    expect(url.searchParams.get('order')).toBe('timestamp.desc')
    expect(url.searchParams.get('limit')).toBe('2')
    expect(url.searchParams.get('offset')).toBe('4')
    expect(init?.headers).toMatchObject({ apikey: 'test-secret', Authorization: 'Bearer test-secret' })
  })

  it('returns an empty list when a read fails', async () => {
    fetchMock.mockResolvedValue(new Response('boom', { status: 500 }))
    await expect(store.getRecentConversations(5)).resolves.toEqual([])
    expect(console.warn).toHaveBeenCalledWith('[SupabaseMemoryStore] select conversations error:', 500, 'boom')
  })

  it('returns an empty list when the request throws', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNREFUSED'))
    await expect(store.getIdeas(undefined, 5)).resolves.toEqual([])
  })

  it('stores a conversation under a generated id and truncates the response', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 201 }))

    const id = await store.storeConversation({
      query: 'q', response: 'x'.repeat(6000), engine: 'claude', category: 'long', mode: 'balanced', session_id: 'web',
    })

    expect(id).toMatch(/^[0-9a-f-]{36}$/)
    const { url, init } = call()
    expect(url.pathname).toBe('/rest/v1/conversations')
    expect(init?.method).toBe('POST')
    const body: unknown = JSON.parse(String(init?.body))
    expect(body).toMatchObject({ id, engine: 'claude', response: 'x'.repeat(MAX_STORED_RESPONSE_CHARS) })
  })

  it('returns null when a write is rejected', async () => {
    fetchMock.mockResolvedValue(new Response('conflict', { status: 409 }))
    await expect(store.storeIdea('an idea', 'general')).resolves.toBeNull()
  })

  it('translates insight filters into PostgREST operators', async () => {
    fetchMock.mockResolvedValue(jsonResponse([
      { id: 'i1', insight_type: 'task', content: 'ship it', project_tags: null, created_at: '2026-03-01T00:00:00Z' },
    ]))

    const rows = await store.getInsights({ type: 'task', project: 'alpha', actioned: false, limit: 8 })

    expect(rows).toEqual([{
      id: 'i1', insight_type: 'task', content: 'ship it', project_tags: [], confidence: 0.8,
      actioned: false, conversation_id: null, created_at: '2026-03-01T00:00:00Z',
    }])
    const { url } = call()
    expect(url.searchParams.get('insight_type')).toBe('eq.task')
    expect(url.searchParams.get('project_tags')).toBe('cs.{"alpha"}')
    expect(url.searchParams.get('actioned')).toBe('eq.false')
    expect(url.searchParams.get('limit')).toBe('8')
  })

  it('reads a day of conversations oldest first and insights since a timestamp', async () => {
    fetchMock.mockImplementation(async () => jsonResponse([]))

    await store.getConversationsSince('2026-03-01T00:00:00Z', 50)
    await store.getInsights({ since: '2026-03-01T00:00:00Z', limit: 30 })

    const conversations = call(0).url
    expect(conversations.pathname).toBe('/rest/v1/conversations')
    expect(conversations.searchParams.get('timestamp')).toBe('gte.2026-03-01T00:00:00Z')
    expect(conversations.searchParams.get('order')).toBe('timestamp.asc')
    expect(conversations.searchParams.get('limit')).toBe('50')
    expect(call(1).url.searchParams.get('created_at')).toBe('gte.2026-03-01T00:00:00Z')
  })

  it('stores a digest and reads back the latest one', async () => {
    const digest = {
      digest_date: '2026-03-01', summary: 'quiet day', key_decisions: ['ship'],
      open_tasks: [], projects_mentioned: ['alpha'], conversation_count: 3,
    }
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 201 }))
    fetchMock.mockResolvedValueOnce(jsonResponse([{ ...digest, open_tasks: null }]))

    await expect(store.storeDigest(digest)).resolves.toBe(true)
    await expect(store.getLatestDigest()).resolves.toEqual(digest)

    expect(call(0).url.pathname).toBe('/rest/v1/digests')
    expect(JSON.parse(String(call(0).init?.body))).toMatchObject(digest)
    expect(call(1).url.searchParams.get('order')).toBe('digest_date.desc')
  })

  it('returns no digest when none is stored', async () => {
    fetchMock.mockResolvedValue(jsonResponse([]))
    await expect(store.getLatestDigest()).resolves.toBeNull()
  })

  it('marks an insight as actioned with a PATCH', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }))

    await expect(store.actionInsight('i1')).resolves.toBe(true)

    const { url, init } = call()
    expect(init?.method).toBe('PATCH')
    expect(url.searchParams.get('id')).toBe('eq.i1')
    expect(JSON.parse(String(init?.body))).toEqual({ actioned: true })
  })

  it('runs similarity search through the match_embeddings RPC', async () => {
    fetchMock.mockResolvedValue(jsonResponse([
      { source_id: 'c1', source_type: 'conversation', chunk_text: 'earlier', similarity: 0.71 },
    ]))

    const matches = await store.matchEmbeddings([0.1, 0.2], 3, 0.5)

    expect(matches).toEqual([{ source_id: 'c1', source_type: 'conversation', chunk_text: 'earlier', similarity: 0.71 }])
    const { url, init } = call()
    expect(url.pathname).toBe('/rest/v1/rpc/match_embeddings')
    expect(JSON.parse(String(init?.body))).toEqual({ query_embedding: '[0.1,0.2]', match_count: 3, match_threshold: 0.5 })
  })

  it('counts rows from the content-range header', async () => {
    fetchMock.mockImplementation(async () => new Response('[]', { status: 200, headers: { 'content-range': '0-0/42' } }))

    await expect(store.getCounts()).resolves.toEqual({
      status: 'connected', conversations: 42, insights: 42, embeddings: 42, ideas: 42, digests: 42,
    })
    expect(call(4).url.pathname).toBe('/rest/v1/digests')
  })

  it('reports disconnected when no count succeeds', async () => {
    fetchMock.mockImplementation(async () => new Response('nope', { status: 401 }))
    await expect(store.getCounts()).resolves.toMatchObject({ status: 'disconnected', conversations: 0 })
  })
})

describe('parseContentRange', () => {
  it('reads the total after the slash', () => {
    expect(parseContentRange('0-0/42')).toBe(42)
    expect(parseContentRange('*/0')).toBe(0)
    expect(parseContentRange('0-0/*')).toBe(0)
    expect(parseContentRange(null)).toBe(0)
  })
})
