import { z } from 'zod'
import { computePlanetsVisibility, NAKED_EYE_LIMIT } from '../planets/index.js'
import { buildUrl, parsePayload, requestJson } from '../sources/index.js'
import { PLANET_NAMES } from '../types.js'
import type { PlanetVisibility } from '../types.js'
import type { Calculator, CalculatorContext } from './calculator.js'

const SOURCE = 'visibleplanets.dev'

// The service lists only bodies above the horizon, and includes the Sun, the Moon and deep-sky objects
const visiblePlanetsSchema = z.object({
  data: z.array(z.object({
    name: z.string(),
    aboveHorizon: z.boolean().optional(),
    altitude: z.number(),
    magnitude: z.number().optional(),
    nakedEyeObject: z.boolean().optional(),
  })),
})

const round1 = (x: number) => Math.round(x * 10) / 10

/** Convert a visibleplanets.dev body into one entry per tracked planet. */
export function parseVisiblePlanets(body: unknown): PlanetVisibility[] {
  const { data } = parsePayload(visiblePlanetsSchema, body, SOURCE)

  return PLANET_NAMES.map((name): PlanetVisibility => {
    const entry = data.find(item => item.name.toLowerCase() === name.toLowerCase())
    const above = entry !== undefined && (entry.aboveHorizon ?? entry.altitude > 0)
    if (!entry || !above) {
      return {
        name,
        visible: false,
        rise: { type: 'unreported' },
        set: { type: 'unreported' },
        magnitude: entry?.magnitude !== undefined ? round1(entry.magnitude) : null,
        altitudeDeg: entry ? round1(entry.altitude) : null,
        elongationDeg: null,
        bestViewing: 'Below the horizon right now',
      }
    }
    const nakedEye = entry.nakedEyeObject ?? (entry.magnitude !== undefined && entry.magnitude <= NAKED_EYE_LIMIT)
    return {
      name,
      visible: nakedEye,
      rise: { type: 'unreported' },
      set: { type: 'unreported' },
      magnitude: entry.magnitude !== undefined ? round1(entry.magnitude) : null,
      altitudeDeg: round1(entry.altitude),
      elongationDeg: null,
      bestViewing: nakedEye
        ? `Above the horizon now at ${Math.round(entry.altitude)}°`
        : 'Too faint for the naked eye; use binoculars or a telescope',
    }
  })
}

export const planetsCalculator: Calculator<PlanetVisibility[]> = {
  domain: 'planets',
  source: SOURCE,

  async computeLive(ctx: CalculatorContext): Promise<PlanetVisibility[]> {
    const { location, instant, config } = ctx
    const url = buildUrl(config.endpoints.visiblePlanets, 'v3', {
      latitude: location.latitude,
      longitude: location.longitude,
      time: instant.toISOString(),
    })
    const body = await requestJson(ctx.fetchJson, url, {
      source: SOURCE,
      timeoutMs: config.timeoutMs,
      signal: ctx.signal,
      logger: ctx.logger,
    })
    return parseVisiblePlanets(body)
  },

  computeLocal({ location, instant }: CalculatorContext): PlanetVisibility[] {
    return computePlanetsVisibility(location, instant)
  },
}
