import { afterEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import {
  AggregationAbortedError,
  HttpStatusError,
  MalformedPayloadError,
  NetworkError,
  TimeoutError,
} from '../../errors/index.js'
import type { FetchJson } from '../index.js'
import { buildUrl, defaultFetchJson, parsePayload, requestJson } from '../index.js'

const ENDPOINT = 'https://example.test/api'

describe('requestJson', () => {
  it('returns the body of a 2xx response', async () => {
    const fetchJson: FetchJson = vi.fn(async () => ({ status: 200, body: { ok: true } }))
    await expect(requestJson(fetchJson, ENDPOINT, { source: 'test', timeoutMs: 1000 })).resolves.toEqual({ ok: true })
    expect(fetchJson).toHaveBeenCalledWith(ENDPOINT, { timeoutMs: 1000 })
  })

  it('reissues once after a network error', async () => {
    const fetchJson = vi.fn<FetchJson>()
      .mockRejectedValueOnce(new NetworkError(ENDPOINT, new Error('ECONNRESET')))
      .mockResolvedValueOnce({ status: 200, body: [1] })
    await expect(requestJson(fetchJson, ENDPOINT, { source: 'test', timeoutMs: 1000 })).resolves.toEqual([1])
    expect(fetchJson).toHaveBeenCalledTimes(2)
  })

  it('gives up after the second network error', async () => {
    const fetchJson = vi.fn<FetchJson>().mockRejectedValue(new NetworkError(ENDPOINT, new Error('ECONNREFUSED')))
    await expect(requestJson(fetchJson, ENDPOINT, { source: 'test', timeoutMs: 1000 })).rejects.toBeInstanceOf(NetworkError)
    expect(fetchJson).toHaveBeenCalledTimes(2)
  })

  it('does not reissue after a timeout', async () => {
    const fetchJson = vi.fn<FetchJson>().mockRejectedValue(new TimeoutError(ENDPOINT, 50))
    await expect(requestJson(fetchJson, ENDPOINT, { source: 'test', timeoutMs: 50 })).rejects.toBeInstanceOf(TimeoutError)
    expect(fetchJson).toHaveBeenCalledTimes(1)
  })

  it('rejects non-2xx statuses and empty bodies', async () => {
    const notFound: FetchJson = async () => ({ status: 503, body: { error: 'busy' } })
    await expect(requestJson(notFound, ENDPOINT, { source: 'test', timeoutMs: 1000 })).rejects.toMatchObject({
      reason: 'http-status',
      status: 503,
    })
    const empty: FetchJson = async () => ({ status: 200, body: null })
    await expect(requestJson(empty, ENDPOINT, { source: 'test', timeoutMs: 1000 })).rejects.toBeInstanceOf(MalformedPayloadError)
  })
})

describe('defaultFetchJson', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('parses JSON and passes the status through', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('{"kp":3}', { status: 404 })))
    await expect(defaultFetchJson(ENDPOINT, { timeoutMs: 1000 })).resolves.toEqual({ status: 404, body: { kp: 3 } })
  })

  it('reads a non-JSON body as null', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>oops</html>', { status: 502 })))
    await expect(defaultFetchJson(ENDPOINT, { timeoutMs: 1000 })).resolves.toEqual({ status: 502, body: null })
  })

  it('times out a request that never answers', async () => {
    vi.stubGlobal('fetch', vi.fn((_url: string, init: RequestInit) => new Promise((_, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('aborted')))
    })))
    await expect(defaultFetchJson(ENDPOINT, { timeoutMs: 10 })).rejects.toBeInstanceOf(TimeoutError)
  })

  it('wraps connection failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed')
    }))
    await expect(defaultFetchJson(ENDPOINT, { timeoutMs: 1000 })).rejects.toBeInstanceOf(NetworkError)
  })

  it('refuses to start once the caller has aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(defaultFetchJson(ENDPOINT, { timeoutMs: 1000, signal: controller.signal }))
      .rejects.toBeInstanceOf(AggregationAbortedError)
  })
})

describe('helpers', () => {
  it('builds URLs with encoded parameters', () => {
    expect(buildUrl('https://example.test/api', 'rstt/oneday', { date: '2025-01-16', coords: '51.5000,-0.1000' }))
      .toBe('https://example.test/api/rstt/oneday?date=2025-01-16&coords=51.5000%2C-0.1000')
  })

  it('names the first mismatched path', () => {
    const schema = z.object({ data: z.object({ kp: z.number() }) })
    expect(parsePayload(schema, { data: { kp: 2 } }, 'test')).toEqual({ data: { kp: 2 } })
    expect(() => parsePayload(schema, { data: { kp: 'two' } }, 'test'))
      .toThrow('Unexpected payload from test: data.kp: Expected number, received string')
  })

  it('reports http failures with their status', () => {
    expect(new HttpStatusError(ENDPOINT, 500).message).toBe(`Request to ${ENDPOINT} returned HTTP 500`)
  })
})
