/**
 * errors — Error taxonomy.
 *
 *   SourceError           a live source failed; recovered by fallback or
 *                         surfaced as an unavailable domain, never thrown to callers
 *   InvalidInputError     bad location or instant; fails the whole aggregation
 *   AggregationAbortedError  the caller abandoned an in-flight aggregation
 */

import type { FailureReason } from '../types.js'

/** Base class for every error this package throws on purpose. */
export class SkyBriefingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Malformed location or instant. */
export class InvalidInputError extends SkyBriefingError {}

/** The caller's AbortSignal fired before the aggregation finished. */
export class AggregationAbortedError extends SkyBriefingError {
  constructor() {
    super('Aggregation was aborted by the caller')
  }
}

// ─── Source failures ─────────────────────────────────────────────────────────

/** Query parameters whose values never appear in messages */
const SECRET_PARAMS = ['apiKey']

/** `url` with secret query values masked */
export function redactUrl(url: string): string {
  if (!URL.canParse(url)) return url
  const parsed = new URL(url)
  const secrets = SECRET_PARAMS.filter(name => parsed.searchParams.has(name))
  if (secrets.length === 0) return url
  for (const name of secrets) parsed.searchParams.set(name, 'redacted')
  return parsed.toString()
}

/** A live source did not produce a usable value. */
export abstract class SourceError extends SkyBriefingError {
  abstract readonly reason: FailureReason
}

export class TimeoutError extends SourceError {
  override readonly reason = 'timeout'

  readonly url: string

  constructor(url: string, readonly timeoutMs: number) {
    const shown = redactUrl(url)
    super(`Request to ${shown} timed out after ${timeoutMs} ms`)
    this.url = shown
  }
}

/** Connection-level failure: DNS, refused, reset. Eligible for one reissue. */
export class NetworkError extends SourceError {
  override readonly reason = 'network-error'

  readonly url: string

  constructor(url: string, cause: unknown) {
    const shown = redactUrl(url)
    super(`Request to ${shown} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
    this.url = shown
  }
}

export class HttpStatusError extends SourceError {
  override readonly reason = 'http-status'

  readonly url: string

  constructor(url: string, readonly status: number) {
    const shown = redactUrl(url)
    super(`Request to ${shown} returned HTTP ${status}`)
    this.url = shown
  }
}

/** The body parsed but does not have the expected shape or is incomplete. */
export class MalformedPayloadError extends SourceError {
  override readonly reason = 'malformed-payload'

  constructor(readonly source: string, detail: string) {
    super(`Unexpected payload from ${source}: ${detail}`)
  }
}

/** The live source is switched off in configuration. */
export class SourceDisabledError extends SourceError {
  override readonly reason = 'disabled'

  constructor(readonly domain: string, detail?: string) {
    super(`Live source for ${domain} is disabled${detail ? `: ${detail}` : ''}`)
  }
}

/** Failure reason for any thrown value: typed source errors keep theirs, anything else is internal. */
export function failureReasonOf(error: unknown): FailureReason {
  return error instanceof SourceError ? error.reason : 'internal-error'
}
