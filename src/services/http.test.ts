import { beforeEach, describe, expect, it, vi } from 'vitest'
import { HttpError } from './errors'
import { fetchJson, fetchText } from './http'

const ok = (body: string) => new Response(body, { status: 200 })

describe('fetchWithRetry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('retries a 5xx and returns the next success', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(ok('{"n":1}'))
    vi.stubGlobal('fetch', fetchMock)

    const out = await fetchJson('https://example.test/x', {
      retries: 2,
      backoffMs: 0,
      map: body => (typeof body === 'object' && body !== null && 'n' in body ? body.n : null),
    })

    expect(out).toBe(1)
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('retries network errors', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(ok('a,b'))
    vi.stubGlobal('fetch', fetchMock)

    await expect(fetchText('/x.csv', { retries: 2, backoffMs: 0 })).resolves.toBe('a,b')
    expect(fetchMock).toHaveBeenCalledTimes(3)
  })

  it('does not retry a 4xx', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response('', { status: 404 }))
    vi.stubGlobal('fetch', fetchMock)

    const err = await fetchText('/x.csv', { retries: 2, backoffMs: 0 }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(HttpError)
    expect(err).toHaveProperty('status', 404)
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('gives up after the last retry with the last error', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response('', { status: 500 }))
    vi.stubGlobal('fetch', fetchMock)

    await expect(fetchText('/x.csv', { retries: 1, backoffMs: 0 })).rejects.toThrow('HTTP 500 for /x.csv')
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })
})
