import { z } from 'zod'
import { MalformedPayloadError } from '../errors/index.js'
import { computeMoonState, moonAgeDays, moonAltitude } from '../lunar/index.js'
import { buildUrl, parsePayload, requestJson } from '../sources/index.js'
import { dateToJD, localDateString, localDayStart, MS_PER_HOUR, utcOffsetHours } from '../time/index.js'
import type { MoonPhaseName, MoonState, SkyEvent } from '../types.js'
import type { Calculator, CalculatorContext } from './calculator.js'

const SOURCE = 'usno'

/** USNO "one day" rise/set/transit payload, trimmed to what is used */
const usnoSchema = z.object({
  properties: z.object({
    data: z.object({
      curphase: z.string(),
      fracillum: z.string(),
      moondata: z.array(z.object({ phen: z.string(), time: z.string() })).optional(),
    }),
  }),
})

const USNO_PHASES: Record<string, MoonPhaseName> = {
  'new moon': 'new-moon',
  'waxing crescent': 'waxing-crescent',
  'first quarter': 'first-quarter',
  'waxing gibbous': 'waxing-gibbous',
  'full moon': 'full-moon',
  'waning gibbous': 'waning-gibbous',
  'last quarter': 'last-quarter',
  'third quarter': 'last-quarter',
  'waning crescent': 'waning-crescent',
}

/** "93%" → 0.93 */
export function parsePercent(text: string): number | null {
  const match = /^\s*(\d+(?:\.\d+)?)\s*%\s*$/.exec(text)
  if (!match) return null
  const value = Number(match[1]) / 100
  return value >= 0 && value <= 1 ? value : null
}

/** "HH:MM" on the local day starting at `dayStart` → instant */
export function parseLocalClock(text: string, dayStart: Date): Date | null {
  const match = /^(\d{1,2}):(\d{2})/.exec(text.trim())
  if (!match) return null
  const hours = Number(match[1])
  const minutes = Number(match[2])
  if (hours > 23 || minutes > 59) return null
  return new Date(dayStart.getTime() + hours * MS_PER_HOUR + minutes * 60_000)
}

/**
 * Convert a USNO body into a MoonState; throws MalformedPayloadError on anything
 * unusable. USNO gives neither altitude nor age, so both are null here.
 */
export function parseUsnoMoon(body: unknown, dayStart: Date): MoonState {
  const { data } = parsePayload(usnoSchema, body, SOURCE).properties
  const phase = USNO_PHASES[data.curphase.trim().toLowerCase()]
  if (!phase) throw new MalformedPayloadError(SOURCE, `unknown phase "${data.curphase}"`)
  const illumination = parsePercent(data.fracillum)
  if (illumination === null) throw new MalformedPayloadError(SOURCE, `bad illumination "${data.fracillum}"`)

  const event = (phen: string): SkyEvent => {
    if (!data.moondata) return { type: 'unreported' }
    const entry = data.moondata.find(item => item.phen.toLowerCase() === phen)
    if (!entry) return { type: 'none', reason: 'not-this-day' }
    const time = parseLocalClock(entry.time, dayStart)
    if (!time) throw new MalformedPayloadError(SOURCE, `bad ${phen} time "${entry.time}"`)
    return { type: 'at', time }
  }

  return {
    phase,
    illumination,
    rise: event('rise'),
    set: event('set'),
    altitudeDeg: null,
    ageDays: null,
  }
}

export const moonCalculator: Calculator<MoonState> = {
  domain: 'moon',
  source: SOURCE,

  async computeLive(ctx: CalculatorContext): Promise<MoonState> {
    const { location, instant, config } = ctx
    const offset = utcOffsetHours(location)
    const url = buildUrl(config.endpoints.usno, 'rstt/oneday', {
      date: localDateString(instant, offset),
      coords: `${location.latitude.toFixed(4)},${location.longitude.toFixed(4)}`,
      tz: offset,
    })
    const body = await requestJson(ctx.fetchJson, url, {
      source: SOURCE,
      timeoutMs: config.timeoutMs,
      signal: ctx.signal,
      logger: ctx.logger,
    })
    const moon = parseUsnoMoon(body, localDayStart(instant, offset))
    // Altitude and age at the instant come from the local ephemeris
    return {
      ...moon,
      altitudeDeg: moonAltitude(dateToJD(instant), location.latitude, location.longitude),
      ageDays: moonAgeDays(instant),
    }
  },

  computeLocal({ location, instant }: CalculatorContext): MoonState {
    return computeMoonState(location, instant)
  },
}
