/**
 * sources — The one capability the core needs from the network:
 * "fetch JSON from URL with a timeout".
 *
 * `FetchJson` resolves with the status and parsed body for any HTTP response,
 * and rejects only with TimeoutError or NetworkError. Status and payload
 * checks happen in {@link requestJson}, so fakes in tests stay trivial.
 */

import type { z, ZodTypeAny } from 'zod'
import { AggregationAbortedError, HttpStatusError, MalformedPayloadError, NetworkError, TimeoutError } from '../errors/index.js'
import type { Logger } from '../logger/index.js'
import { silentLogger } from '../logger/index.js'

export interface FetchJsonOptions {
  timeoutMs: number
  /** Caller cancellation; aborts the request in flight */
  signal?: AbortSignal
}

export interface JsonResponse {
  status: number
  body: unknown
}

export type FetchJson = (url: string, options: FetchJsonOptions) => Promise<JsonResponse>

/**
 * FetchJson over Node's global fetch. Each call gets its own timer; a caller
 * abort rejects with AggregationAbortedError rather than a source error.
 */
export const defaultFetchJson: FetchJson = async (url, { timeoutMs, signal }) => {
  if (signal?.aborted) throw new AggregationAbortedError()

  const controller = new AbortController()
  let timedOut = false
  const timer = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  const onAbort = () => controller.abort()
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: { accept: 'application/json' },
    })
    const text = await response.text()
    let body: unknown = null
    if (text.length > 0) {
      try {
        body = JSON.parse(text)
      } catch {
        // Non-JSON bodies (HTML error pages) surface as a null body
        body = null
      }
    }
    return { status: response.status, body }
  } catch (err) {
    if (timedOut) throw new TimeoutError(url, timeoutMs)
    if (signal?.aborted) throw new AggregationAbortedError()
    throw new NetworkError(url, err)
  } finally {
    clearTimeout(timer)
    signal?.removeEventListener('abort', onAbort)
  }
}

export interface RequestJsonOptions extends FetchJsonOptions {
  /** Label for errors and logs, e.g. "usno" */
  source: string
  logger?: Logger
}

/**
 * GET a JSON body through `fetchJson`, reissuing once after a NetworkError.
 * Non-2xx statuses throw HttpStatusError; an empty body throws MalformedPayloadError.
 */
export async function requestJson(
  fetchJson: FetchJson,
  url: string,
  { source, logger = silentLogger, ...options }: RequestJsonOptions,
): Promise<unknown> {
  let response: JsonResponse
  try {
    response = await fetchJson(url, options)
  } catch (err) {
    if (!(err instanceof NetworkError) || options.signal?.aborted) throw err
    logger.debug(`${source}: reissuing after network error`, err.message)
    response = await fetchJson(url, options)
  }

  if (response.status < 200 || response.status >= 300) {
    throw new HttpStatusError(url, response.status)
  }
  if (response.body === null || response.body === undefined) {
    throw new MalformedPayloadError(source, 'empty or non-JSON body')
  }
  return response.body
}

/** Append query parameters to a base URL and path */
export function buildUrl(base: string, path: string, params: Record<string, string | number>): string {
  const url = new URL(path, base.endsWith('/') ? base : `${base}/`)
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value))
  }
  return url.toString()
}

/**
 * Validate a response body against a zod schema. Any mismatch is a soft
 * MalformedPayloadError naming the first offending path.
 */
export function parsePayload<S extends ZodTypeAny>(schema: S, body: unknown, source: string): z.output<S> {
  const result = schema.safeParse(body)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new MalformedPayloadError(
      source,
      issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch',
    )
  }
  return result.data
}
