/**
 * scorer — Viewing conditions score (0-100) for the instant.
 *
 * Factors and base weights:
 *   cloud        55   100 - cloud cover %
 *   moon         35   100 · (1 - illumination^0.7) while the Moon is up
 *   geomagnetic  10   60 + 40 · aurora proximity
 *
 * Weights are renormalised linearly over the factors whose domain produced a
 * value, then the weighted sum is scaled by a darkness multiplier from the
 * Sun's twilight phase. With no factor present there is no score.
 */

import { clamp } from '../math/index.js'
import { twilightPhaseAt } from '../solar/index.js'
import type {
  GeoLocation,
  MoonState,
  ScoreBreakdownEntry,
  ScoreFactor,
  ScoreResult,
  SourceResult,
  SpaceWeather,
  SunTimes,
  TwilightPhase,
  ViewingCategory,
  WeatherConditions,
} from '../types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

export const BASE_WEIGHTS: Readonly<Record<ScoreFactor, number>> = {
  cloud: 55,
  moon: 35,
  geomagnetic: 10,
}

export const DARKNESS_MULTIPLIERS: Readonly<Record<TwilightPhase, number>> = {
  night: 1.0,
  astronomical: 0.9,
  nautical: 0.7,
  civil: 0.4,
  day: 0.1,
}

/** Exponent softening the Moon's interference at partial phases */
const MOON_INTERFERENCE_EXPONENT = 0.7

// ─── Sub-scores ───────────────────────────────────────────────────────────────

export function cloudSubScore(cloudCover: number): number {
  return clamp(100 - cloudCover, 0, 100)
}

/** True unless the Moon is known to be below the horizon */
export function isMoonUp(moon: MoonState): boolean {
  return moon.altitudeDeg === null || moon.altitudeDeg > 0
}

export function moonSubScore(moon: MoonState): number {
  if (!isMoonUp(moon)) return 100
  return 100 * (1 - clamp(moon.illumination, 0, 1) ** MOON_INTERFERENCE_EXPONENT)
}

export function geomagneticSubScore(latitude: number, auroraLatitude: number): number {
  const proximity = clamp((Math.abs(latitude) - auroraLatitude + 10) / 10, 0, 1)
  return 60 + 40 * proximity
}

export function viewingCategory(score: number): ViewingCategory {
  if (score < 40) return 'Poor'
  if (score < 60) return 'Fair'
  if (score < 80) return 'Good'
  return 'Excellent'
}

// ─── Score ────────────────────────────────────────────────────────────────────

export interface ScoreInputs {
  location: GeoLocation
  instant: Date
  sun: SourceResult<SunTimes>
  moon: SourceResult<MoonState>
  weather: SourceResult<WeatherConditions>
  spaceWeather: SourceResult<SpaceWeather>
}

const valueOf = <T>(result: SourceResult<T>): T | null =>
  result.provenance === 'unavailable' ? null : result.value

export function scoreViewingConditions(inputs: ScoreInputs): ScoreResult {
  const weather = valueOf(inputs.weather)
  const moon = valueOf(inputs.moon)
  const space = valueOf(inputs.spaceWeather)
  const sun = valueOf(inputs.sun)

  const present: Array<[ScoreFactor, number]> = []
  if (weather) present.push(['cloud', cloudSubScore(weather.cloudCover)])
  if (moon) present.push(['moon', moonSubScore(moon)])
  if (space) present.push(['geomagnetic', geomagneticSubScore(inputs.location.latitude, space.auroraLatitude)])
  if (present.length === 0) return { status: 'unavailable' }

  const darkness = sun ? twilightPhaseAt(sun, inputs.instant) : null
  const multiplier = darkness ? DARKNESS_MULTIPLIERS[darkness] : 1.0

  const totalWeight = present.reduce((sum, [factor]) => sum + BASE_WEIGHTS[factor], 0)
  const breakdown: ScoreBreakdownEntry[] = present.map(([factor, subScore]) => {
    const weight = BASE_WEIGHTS[factor] / totalWeight
    return { factor, subScore, weight, contribution: weight * subScore * multiplier }
  })
  const raw = breakdown.reduce((sum, entry) => sum + entry.contribution, 0)
  const score = clamp(Math.round(raw), 0, 100)

  return {
    status: 'scored',
    score,
    category: viewingCategory(score),
    breakdown,
    darkness,
    darknessMultiplier: multiplier,
    recommendations: recommendations({ weather, moon, darkness }),
  }
}

// ─── Recommendations ──────────────────────────────────────────────────────────

/** Short observing hints; one per factor at most, plus a closing note in ideal conditions */
export function recommendations(args: {
  weather: WeatherConditions | null
  moon: MoonState | null
  darkness: TwilightPhase | null
}): string[] {
  const { weather, moon, darkness } = args
  const out: string[] = []

  if (weather) {
    if (weather.cloudCover > 75) out.push('Heavy cloud cover; wait for clearer skies')
    else if (weather.cloudCover > 50) out.push('Significant clouds; viewing may be intermittent')
    else if (weather.cloudCover > 25) out.push('Some clouds; look for gaps')
  }

  if (moon) {
    const up = isMoonUp(moon)
    if (moon.illumination > 0.8 && up) out.push('Bright moon; best for planets and the Moon itself')
    else if (moon.illumination > 0.5 && up) out.push('Moon is up; faint deep-sky objects may be washed out')
    else if (moon.illumination < 0.2) out.push('Dark moon; good for galaxies and nebulae')
  }

  if (darkness !== null && darkness !== 'night') out.push('Not fully dark; brighter objects only')

  if (weather && weather.cloudCover < 20 && moon && moon.illumination < 0.3 && darkness === 'night') {
    out.push('Excellent for deep-sky observing')
  }
  return out
}
