import { describe, expect, it } from 'vitest'
import {
  AggregationAbortedError,
  failureReasonOf,
  HttpStatusError,
  InvalidInputError,
  MalformedPayloadError,
  NetworkError,
  redactUrl,
  SkyBriefingError,
  SourceDisabledError,
  SourceError,
  TimeoutError,
} from '../index.js'

describe('errors', () => {
  it('names instances after their class', () => {
    const err = new InvalidInputError('bad latitude')
    expect(err.name).toBe('InvalidInputError')
    expect(err).toBeInstanceOf(SkyBriefingError)
    expect(new AggregationAbortedError().message).toBe('Aggregation was aborted by the caller')
  })

  it('maps source errors to failure reasons', () => {
    expect(failureReasonOf(new TimeoutError('https://example.test', 100))).toBe('timeout')
    expect(failureReasonOf(new NetworkError('https://example.test', new Error('ECONNRESET')))).toBe('network-error')
    expect(failureReasonOf(new HttpStatusError('https://example.test', 500))).toBe('http-status')
    expect(failureReasonOf(new MalformedPayloadError('usno', 'missing data'))).toBe('malformed-payload')
    expect(failureReasonOf(new SourceDisabledError('moon'))).toBe('disabled')
  })

  it('treats anything else as internal', () => {
    expect(failureReasonOf(new TypeError('x is undefined'))).toBe('internal-error')
    expect(failureReasonOf('string thrown')).toBe('internal-error')
    expect(new InvalidInputError('x')).not.toBeInstanceOf(SourceError)
  })

  it('keeps the cause of a network failure', () => {
    const cause = new Error('ECONNREFUSED')
    const err = new NetworkError('https://example.test', cause)
    expect(err.cause).toBe(cause)
    expect(err.message).toBe('Request to https://example.test failed: ECONNREFUSED')
  })

  it('masks API keys in request URLs', () => {
    const url = 'https://api.example.test/passes/1/2?apiKey=test-secret&days=1'
    expect(redactUrl(url)).toBe('https://api.example.test/passes/1/2?apiKey=redacted&days=1')
    expect(new HttpStatusError(url, 401).message).toBe(
      'Request to https://api.example.test/passes/1/2?apiKey=redacted&days=1 returned HTTP 401',
    )
    expect(new TimeoutError(url, 50).url).not.toContain('test-secret')
    expect(redactUrl('not a url')).toBe('not a url')
  })

  it('explains why a source is disabled', () => {
    expect(new SourceDisabledError('iss', 'no N2YO API key').message).toBe('Live source for iss is disabled: no N2YO API key')
    expect(new SourceDisabledError('moon').message).toBe('Live source for moon is disabled')
  })
})
