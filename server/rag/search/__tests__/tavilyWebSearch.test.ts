import { afterEach, describe, expect, it, vi } from 'vitest'
import { joinSearchContent, TavilyWebSearch } from '../tavilyWebSearch'

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('joinSearchContent', () => {
  it('joins result contents with a single space', () => {
    const raw = JSON.stringify([
      { title: 'One', url: 'https://example.com/1', content: 'First snippet.' },
      { title: 'Two', url: 'https://example.com/2', content: 'Second snippet.' },
    ])

    expect(joinSearchContent(raw)).toBe('First snippet. Second snippet.')
  })

  it('accepts an already parsed array', () => {
    expect(joinSearchContent([{ content: 'Only one.' }])).toBe('Only one.')
  })

  it('returns an empty string for no results', () => {
    expect(joinSearchContent('[]')).toBe('')
  })

  it('returns an empty string for malformed output', () => {
    expect(joinSearchContent('not json')).toBe('')
    expect(joinSearchContent('{"results":"nope"}')).toBe('')
  })
})

describe('TavilyWebSearch', () => {
  it('posts the query and joins the result contents', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => jsonResponse({
      results: [
        { title: 'Pizza A', url: 'https://example.com/a', content: 'Wood-fired.' },
        { title: 'Pizza B', url: 'https://example.com/b', content: 'Thin crust.' },
      ],
    }))
    vi.stubGlobal('fetch', fetchMock)

    const content = await new TavilyWebSearch({ apiKey: 'test-key' }).search('best pizza', 2)

    expect(content).toBe('Wood-fired. Thin crust.')
    expect(fetchMock).toHaveBeenCalledTimes(1)
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body))
    expect(body).toMatchObject({ query: 'best pizza', max_results: 2 })
  })

  it('returns an empty string on an error status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'Unauthorized' }, 401)))

    await expect(new TavilyWebSearch({ apiKey: 'test-key' }).search('best pizza')).resolves.toBe('')
  })

  it('returns an empty string when the request fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed')
    }))

    await expect(new TavilyWebSearch({ apiKey: 'test-key' }).search('best pizza')).resolves.toBe('')
  })

  it('returns an empty string when the search outlives its timeout', async () => {
    vi.stubGlobal('fetch', vi.fn(() => new Promise<Response>((resolve) => {
      setTimeout(() => resolve(jsonResponse({ results: [{ content: 'late' }] })), 300)
    })))
    const before = performance.now()

    const content = await new TavilyWebSearch({ apiKey: 'test-key' }).search('best pizza', 3, { timeout: 20 })

    expect(content).toBe('')
    expect(performance.now() - before).toBeLessThan(250)
  })

  it('returns an empty string when the caller has cancelled', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ results: [{ content: 'unwanted' }] })))

    await expect(new TavilyWebSearch({ apiKey: 'test-key' }).search('best pizza', 3, { signal: AbortSignal.abort() })).resolves.toBe('')
  })
})
