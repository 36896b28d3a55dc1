import { z } from 'zod'
import { MalformedPayloadError } from '../errors/index.js'
import { buildUrl, parsePayload, requestJson } from '../sources/index.js'
import { assessSpaceWeather } from '../space-weather/index.js'
import type { SpaceWeather } from '../types.js'
import type { Calculator, CalculatorContext } from './calculator.js'

const SOURCE = 'swpc'

export const KP_PATH = 'products/noaa-planetary-k-index.json'
export const PLASMA_PATH = 'products/solar-wind/plasma-7-day.json'

const cell = z.union([z.string(), z.number(), z.null()])

/** Older SWPC products: a header row followed by rows of strings */
const tableSchema = z.array(z.array(cell)).min(1)

/** Newer SWPC products: one object per row */
const recordsSchema = z.array(z.record(z.string(), cell))

const feedSchema = z.union([tableSchema, recordsSchema])

type Row = Record<string, string | number | null>

/** Normalise either feed layout into keyed rows. */
export function feedRows(body: unknown, label: string): Row[] {
  const feed = parsePayload(feedSchema, body, label)
  if (feed.length === 0) return []
  const [first, ...rest] = feed
  if (!Array.isArray(first)) {
    return feed.filter((row): row is Row => !Array.isArray(row))
  }
  const header = first.map(name => String(name))
  return rest.flatMap((row): Row[] => {
    if (!Array.isArray(row)) return []
    const keyed: Row = {}
    header.forEach((name, i) => { keyed[name] = row[i] ?? null })
    return [keyed]
  })
}

/** SWPC timestamps carry no zone and are UTC: "2025-01-16 03:00:00.000" or "2025-01-16T03:00:00" */
export function parseSwpcTime(text: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?/.exec(text.trim())
  if (!match) return null
  const time = new Date(Date.UTC(
    Number(match[1]), Number(match[2]) - 1, Number(match[3]),
    Number(match[4]), Number(match[5]), Number(match[6] ?? 0),
  ))
  return Number.isNaN(time.getTime()) ? null : time
}

function numberOf(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null
  const n = typeof value === 'number' ? value : Number(value)
  return Number.isFinite(n) ? n : null
}

interface Timed<T> {
  time: Date
  value: T
}

/** Latest entry not after `instant`; the latest overall when every entry is later. */
function latestAsOf<T>(entries: Timed<T>[], instant: Date): Timed<T> | null {
  const sorted = [...entries].sort((a, b) => a.time.getTime() - b.time.getTime())
  const past = sorted.filter(entry => entry.time.getTime() <= instant.getTime())
  return past.at(-1) ?? sorted.at(-1) ?? null
}

/** Planetary Kp reading in effect at `instant`. Throws MalformedPayloadError when none is usable. */
export function parseKp(body: unknown, instant: Date): { kp: number; observedAt: Date } {
  const entries = feedRows(body, SOURCE).flatMap((row): Timed<number>[] => {
    const time = typeof row['time_tag'] === 'string' ? parseSwpcTime(row['time_tag']) : null
    const kp = numberOf(row['Kp'] ?? row['kp'] ?? row['kp_index'])
    if (!time || kp === null || kp < 0 || kp > 9) return []
    return [{ time, value: kp }]
  })
  const latest = latestAsOf(entries, instant)
  if (!latest) throw new MalformedPayloadError(SOURCE, 'no usable Kp rows')
  return { kp: latest.value, observedAt: latest.time }
}

/** Solar wind speed and density at `instant`; nulls when the feed has no usable row. */
export function parsePlasma(body: unknown, instant: Date): { speed: number | null; density: number | null } {
  const entries = feedRows(body, `${SOURCE}-plasma`).flatMap((row): Timed<{ speed: number; density: number }>[] => {
    const time = typeof row['time_tag'] === 'string' ? parseSwpcTime(row['time_tag']) : null
    const speed = numberOf(row['speed'])
    const density = numberOf(row['density'])
    if (!time || speed === null || density === null) return []
    return [{ time, value: { speed, density } }]
  })
  const latest = latestAsOf(entries, instant)
  return latest ? latest.value : { speed: null, density: null }
}

/**
 * NOAA SWPC Kp plus solar-wind plasma. The plasma feed is optional: when it
 * fails the record keeps null wind values. No local fallback exists.
 */
export const spaceWeatherCalculator: Calculator<SpaceWeather> = {
  domain: 'spaceWeather',
  source: SOURCE,

  async computeLive(ctx: CalculatorContext): Promise<SpaceWeather> {
    const { config, instant } = ctx
    const request = (path: string, source: string) => requestJson(
      ctx.fetchJson,
      buildUrl(config.endpoints.swpc, path, {}),
      { source, timeoutMs: config.timeoutMs, signal: ctx.signal, logger: ctx.logger },
    )

    const [kpBody, plasmaBody] = await Promise.allSettled([
      request(KP_PATH, SOURCE),
      request(PLASMA_PATH, `${SOURCE}-plasma`),
    ])
    if (kpBody.status === 'rejected') throw kpBody.reason

    let wind: { speed: number | null; density: number | null } = { speed: null, density: null }
    if (plasmaBody.status === 'fulfilled') {
      try {
        wind = parsePlasma(plasmaBody.value, instant)
      } catch (err) {
        if (!(err instanceof MalformedPayloadError)) throw err
        ctx.logger.child('spaceWeather').info('solar wind feed unusable', err.message)
      }
    } else {
      const reason: unknown = plasmaBody.reason
      ctx.logger.child('spaceWeather').info(
        'solar wind feed unavailable',
        reason instanceof Error ? reason.message : String(reason),
      )
    }

    const { kp, observedAt } = parseKp(kpBody.value, instant)
    return assessSpaceWeather(
      { kp, observedAt, solarWindSpeed: wind.speed, solarWindDensity: wind.density },
      ctx.location,
    )
  },
}
