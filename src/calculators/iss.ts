import { z } from 'zod'
import { MalformedPayloadError, SourceDisabledError } from '../errors/index.js'
import { buildUrl, parsePayload, requestJson } from '../sources/index.js'
import { MS_PER_DAY } from '../time/index.js'
import type { CompassPoint, IssPass } from '../types.js'
import type { Calculator, CalculatorContext } from './calculator.js'

const SOURCE = 'n2yo'

/** NORAD catalogue number of the ISS */
export const ISS_NORAD_ID = 25544

/** Days of predictions requested; the service counts from the current time */
const PREDICTION_DAYS = 2

/** Shortest sunlit-against-dark-sky stretch worth reporting, seconds */
const MIN_VISIBLE_SECONDS = 60

/** N2YO reports this magnitude when it has none */
const UNKNOWN_MAGNITUDE = 100_000

const COMPASS: readonly CompassPoint[] = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
]

/** Nearest of the 16 compass points to an azimuth in degrees */
export function compassPoint(azimuth: number): CompassPoint {
  const index = ((Math.round(azimuth / 22.5) % 16) + 16) % 16
  return COMPASS[index] ?? 'N'
}

/** N2YO "visual passes" payload, trimmed to what is used. Times are Unix seconds. */
const visualPassesSchema = z.object({
  passes: z.array(z.object({
    startAz: z.number(),
    startUTC: z.number().int(),
    maxEl: z.number(),
    maxUTC: z.number().int(),
    endAz: z.number(),
    endUTC: z.number().int(),
    mag: z.number().optional(),
  })).optional(),
})

const fromUnix = (seconds: number) => new Date(seconds * 1000)

/**
 * Convert an N2YO body into the passes that are still in view at or after
 * `instant` and rise within the following 24 hours, soonest first.
 */
export function parseIssPasses(body: unknown, instant: Date): IssPass[] {
  const { passes = [] } = parsePayload(visualPassesSchema, body, SOURCE)
  const from = instant.getTime()
  const until = from + MS_PER_DAY

  return passes
    .map((entry): IssPass => {
      if (entry.endUTC < entry.startUTC || entry.maxUTC < entry.startUTC || entry.maxUTC > entry.endUTC) {
        throw new MalformedPayloadError(SOURCE, `pass at ${entry.startUTC} is out of order`)
      }
      return {
        rise: fromUnix(entry.startUTC),
        culmination: fromUnix(entry.maxUTC),
        set: fromUnix(entry.endUTC),
        durationSeconds: entry.endUTC - entry.startUTC,
        maxElevationDeg: entry.maxEl,
        riseDirection: compassPoint(entry.startAz),
        setDirection: compassPoint(entry.endAz),
        magnitude: entry.mag === undefined || entry.mag >= UNKNOWN_MAGNITUDE ? null : entry.mag,
      }
    })
    .filter(pass => pass.set.getTime() >= from && pass.rise.getTime() < until)
    .sort((a, b) => a.rise.getTime() - b.rise.getTime())
}

/**
 * N2YO visual pass predictions. Needs an API key; there is no local fallback,
 * since orbit propagation is out of scope.
 */
export const issCalculator: Calculator<readonly IssPass[]> = {
  domain: 'iss',
  source: SOURCE,

  async computeLive(ctx: CalculatorContext): Promise<readonly IssPass[]> {
    const { location, config } = ctx
    if (config.n2yoApiKey === null) throw new SourceDisabledError('iss', 'no N2YO API key configured')

    const path = [
      'satellite/visualpasses',
      ISS_NORAD_ID,
      location.latitude.toFixed(4),
      location.longitude.toFixed(4),
      Math.round(location.elevation ?? 0),
      PREDICTION_DAYS,
      MIN_VISIBLE_SECONDS,
    ].join('/')
    const body = await requestJson(ctx.fetchJson, buildUrl(config.endpoints.n2yo, path, { apiKey: config.n2yoApiKey }), {
      source: SOURCE,
      timeoutMs: config.timeoutMs,
      signal: ctx.signal,
      logger: ctx.logger,
    })
    return parseIssPasses(body, ctx.instant)
  },
}
