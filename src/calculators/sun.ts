import { z } from 'zod'
import { MalformedPayloadError } from '../errors/index.js'
import { computeSunTimes } from '../solar/index.js'
import { buildUrl, parsePayload, requestJson } from '../sources/index.js'
import { localDateString, utcOffsetHours } from '../time/index.js'
import type { SkyEvent, SunTimes } from '../types.js'
import type { Calculator, CalculatorContext } from './calculator.js'

const SOURCE = 'sunrise-sunset.org'

const sunriseSunsetSchema = z.object({
  status: z.literal('OK'),
  results: z.object({
    sunrise: z.string(),
    sunset: z.string(),
    solar_noon: z.string(),
    day_length: z.number().nonnegative(),
    civil_twilight_begin: z.string(),
    civil_twilight_end: z.string(),
    nautical_twilight_begin: z.string(),
    nautical_twilight_end: z.string(),
    astronomical_twilight_begin: z.string(),
    astronomical_twilight_end: z.string(),
  }),
})

// The service reports polar day/night as the Unix epoch; treat anything before 1971 as that sentinel
const SENTINEL_BEFORE = Date.UTC(1971, 0, 1)

function parseInstantField(name: string, text: string): Date {
  const time = new Date(text)
  if (Number.isNaN(time.getTime())) {
    throw new MalformedPayloadError(SOURCE, `${name}: not a timestamp "${text}"`)
  }
  if (time.getTime() < SENTINEL_BEFORE) {
    throw new MalformedPayloadError(SOURCE, `${name}: event does not occur on this day`)
  }
  return time
}

/**
 * Convert a sunrise-sunset.org body (formatted=0) into SunTimes.
 * Polar sentinels and out-of-order events are rejected so the local
 * computation can take over.
 */
export function parseSunriseSunset(body: unknown): SunTimes {
  const { results } = parsePayload(sunriseSunsetSchema, body, SOURCE)

  const ordered: Array<[keyof SunTimes, string]> = [
    ['astronomicalDawn', results.astronomical_twilight_begin],
    ['nauticalDawn', results.nautical_twilight_begin],
    ['civilDawn', results.civil_twilight_begin],
    ['sunrise', results.sunrise],
    ['solarNoon', results.solar_noon],
    ['sunset', results.sunset],
    ['civilDusk', results.civil_twilight_end],
    ['nauticalDusk', results.nautical_twilight_end],
    ['astronomicalDusk', results.astronomical_twilight_end],
  ]
  const times = ordered.map(([name, text]) => parseInstantField(name, text))
  for (let i = 1; i < times.length; i++) {
    const prev = times[i - 1]
    const curr = times[i]
    if (prev && curr && curr.getTime() < prev.getTime()) {
      throw new MalformedPayloadError(SOURCE, `events out of order at ${ordered[i]?.[0] ?? i}`)
    }
  }

  const at = (i: number): SkyEvent => {
    const time = times[i]
    return time ? { type: 'at', time } : { type: 'unreported' }
  }

  return {
    astronomicalDawn: at(0),
    nauticalDawn: at(1),
    civilDawn: at(2),
    sunrise: at(3),
    solarNoon: at(4),
    sunset: at(5),
    civilDusk: at(6),
    nauticalDusk: at(7),
    astronomicalDusk: at(8),
    dayLengthMinutes: results.day_length / 60,
  }
}

export const sunCalculator: Calculator<SunTimes> = {
  domain: 'sun',
  source: SOURCE,

  async computeLive(ctx: CalculatorContext): Promise<SunTimes> {
    const { location, instant, config } = ctx
    const url = buildUrl(config.endpoints.sunriseSunset, 'json', {
      lat: location.latitude,
      lng: location.longitude,
      date: localDateString(instant, utcOffsetHours(location)),
      formatted: 0,
    })
    const body = await requestJson(ctx.fetchJson, url, {
      source: SOURCE,
      timeoutMs: config.timeoutMs,
      signal: ctx.signal,
      logger: ctx.logger,
    })
    return parseSunriseSunset(body)
  },

  computeLocal({ location, instant }: CalculatorContext): SunTimes {
    return computeSunTimes(location, instant)
  },
}
