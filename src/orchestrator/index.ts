/**
 * orchestrator — Run every calculator for one (location, instant) and fold the
 * results into a DailyBriefing.
 *
 * Input is validated before anything runs. Calculators run concurrently and
 * share one context, so every domain sees the same instant. A calculator that
 * throws marks only its own domain unavailable. A caller abort rejects the
 * whole aggregation and discards partial results.
 */

import { buildBriefing, toTonightSummary } from '../briefing/index.js'
import { CALCULATORS, compute } from '../calculators/index.js'
import type { Calculator, CalculatorContext, CalculatorRegistry } from '../calculators/index.js'
import { resolveConfig } from '../config/index.js'
import type { ConfigOverrides } from '../config/index.js'
import { AggregationAbortedError } from '../errors/index.js'
import { createLogger } from '../logger/index.js'
import type { Logger } from '../logger/index.js'
import { assertValidLocation } from '../observer/index.js'
import { scoreViewingConditions } from '../scorer/index.js'
import { defaultFetchJson } from '../sources/index.js'
import type { FetchJson } from '../sources/index.js'
import { assertValidInstant, parseInstant } from '../time/index.js'
import type { DailyBriefing, DomainResults, GeoLocation, SourceResult, TonightSummary } from '../types.js'

export interface AggregateOptions {
  /** Settings layered over environment and defaults */
  config?: ConfigOverrides
  /** Environment to read settings from; defaults to process.env */
  env?: Record<string, string | undefined>
  /** Network capability; defaults to Node's fetch */
  fetchJson?: FetchJson
  logger?: Logger
  /** Abandons the aggregation; in-flight requests are cancelled */
  signal?: AbortSignal
  /** Replace individual calculators */
  calculators?: Partial<CalculatorRegistry>
}

/** Run one calculator; anything it throws, other than an abort, becomes an unavailable result. */
async function isolated<T>(calculator: Calculator<T>, ctx: CalculatorContext): Promise<SourceResult<T>> {
  try {
    return await compute(calculator, ctx)
  } catch (err) {
    if (err instanceof AggregationAbortedError) throw err
    ctx.logger.child(calculator.domain).error(
      'calculator failed',
      err instanceof Error ? err.message : String(err),
    )
    return { provenance: 'unavailable', reason: 'internal-error' }
  }
}

/** Reject as soon as `signal` fires, whether or not `work` observes it. */
async function abortable<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return work
  let onAbort = () => {}
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new AggregationAbortedError())
    // The signal may already have fired while the work was being started
    if (signal.aborted) onAbort()
    else signal.addEventListener('abort', onAbort, { once: true })
  })
  try {
    return await Promise.race([work, aborted])
  } finally {
    signal.removeEventListener('abort', onAbort)
  }
}

/**
 * Aggregate every domain for a location and instant.
 *
 * @param instant - Date or ISO 8601 string with a zone designator
 * @throws InvalidInputError for a malformed location, instant or configuration
 * @throws AggregationAbortedError when `options.signal` fires first
 */
export async function aggregate(
  location: GeoLocation,
  instant: Date | string = new Date(),
  options: AggregateOptions = {},
): Promise<DailyBriefing> {
  // The caller keeps its object; everything downstream sees this copy
  const observer: GeoLocation = { ...location }
  assertValidLocation(observer)
  const at = typeof instant === 'string' ? parseInstant(instant) : instant
  assertValidInstant(at)
  const config = resolveConfig(options.config, options.env)
  const { signal } = options
  if (signal?.aborted) throw new AggregationAbortedError()

  const logger = options.logger ?? createLogger({ level: config.logLevel })
  const calculators: CalculatorRegistry = { ...CALCULATORS, ...options.calculators }
  const ctx: CalculatorContext = {
    location: observer,
    instant: new Date(at.getTime()),
    config,
    fetchJson: options.fetchJson ?? defaultFetchJson,
    logger,
    signal,
  }

  const [sun, moon, planets, meteors, eclipses, spaceWeather, weather, iss] = await abortable(Promise.all([
    isolated(calculators.sun, ctx),
    isolated(calculators.moon, ctx),
    isolated(calculators.planets, ctx),
    isolated(calculators.meteors, ctx),
    isolated(calculators.eclipses, ctx),
    isolated(calculators.spaceWeather, ctx),
    isolated(calculators.weather, ctx),
    isolated(calculators.iss, ctx),
  ]), signal)
  if (signal?.aborted) throw new AggregationAbortedError()

  const results: DomainResults = { sun, moon, planets, meteors, eclipses, spaceWeather, weather, iss }
  const score = scoreViewingConditions({
    location: observer,
    instant: ctx.instant,
    sun,
    moon,
    weather,
    spaceWeather,
  })
  logger.debug('aggregated', Object.entries(results).map(([domain, r]) => `${domain}=${r.provenance}`).join(' '))

  return buildBriefing({ location: observer, instant: ctx.instant, results, score })
}

/** Aggregate, then project to the evening summary. */
export async function tonight(
  location: GeoLocation,
  instant: Date | string = new Date(),
  options: AggregateOptions = {},
): Promise<TonightSummary> {
  return toTonightSummary(await aggregate(location, instant, options))
}
