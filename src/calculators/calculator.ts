/**
 * The calculator contract and the live-then-local protocol every domain follows.
 */

import type { SkyBriefingConfig } from '../config/index.js'
import { isLiveDomain } from '../config/index.js'
import { AggregationAbortedError, failureReasonOf, SourceDisabledError } from '../errors/index.js'
import type { Logger } from '../logger/index.js'
import type { FetchJson } from '../sources/index.js'
import type { Domain, FailureReason, GeoLocation, SourceResult } from '../types.js'

/** Everything one calculator run may depend on. Identical for all domains in a run. */
export interface CalculatorContext {
  readonly location: GeoLocation
  readonly instant: Date
  readonly config: SkyBriefingConfig
  readonly fetchJson: FetchJson
  readonly logger: Logger
  readonly signal?: AbortSignal
}

/**
 * One domain. `computeLive` fetches from the network; `computeLocal` uses only
 * the math library or a calendar table. A domain has at least one of them.
 */
export interface Calculator<T> {
  readonly domain: Domain
  /** Label recorded as the source of a live result */
  readonly source?: string
  computeLive?(ctx: CalculatorContext): Promise<T>
  computeLocal?(ctx: CalculatorContext): T
}

/**
 * Run one calculator: live first when it has a live source that is enabled,
 * local on any live failure, unavailable when neither produced a value.
 *
 * Live failures never escape. Exceptions from `computeLocal` do; the
 * orchestrator isolates them per domain.
 */
export async function compute<T>(calculator: Calculator<T>, ctx: CalculatorContext): Promise<SourceResult<T>> {
  const log = ctx.logger.child(calculator.domain)
  let liveFailure: FailureReason | null = null

  if (calculator.computeLive) {
    const enabled = isLiveDomain(calculator.domain) && ctx.config.live[calculator.domain]
    if (!enabled) {
      const disabled = new SourceDisabledError(calculator.domain)
      log.debug(disabled.message)
      liveFailure = disabled.reason
    } else {
      try {
        const value = await calculator.computeLive(ctx)
        return { provenance: 'live', value, source: calculator.source ?? calculator.domain }
      } catch (err) {
        if (err instanceof AggregationAbortedError || ctx.signal?.aborted) throw new AggregationAbortedError()
        liveFailure = failureReasonOf(err)
        if (err instanceof SourceDisabledError) {
          log.debug(err.message)
        } else {
          log.warn(
            calculator.computeLocal ? 'live source failed, using local fallback' : 'live source failed, no fallback',
            err instanceof Error ? err.message : String(err),
          )
        }
      }
    }
  }

  if (calculator.computeLocal) {
    return { provenance: 'local-fallback', value: calculator.computeLocal(ctx), liveFailure }
  }
  return { provenance: 'unavailable', reason: liveFailure ?? 'internal-error' }
}
