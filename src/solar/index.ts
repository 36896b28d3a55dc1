/**
 * solar — Sun position, sunrise/sunset and twilight.
 *
 * Position: Meeus Ch. 25 low-accuracy series (~0.01°), apparent longitude with
 * the dominant nutation/aberration term. Good to a few seconds of time for
 * rise/set, well inside the one-minute target.
 *
 * Events are found relative to solar transit (local apparent noon):
 *   dawn side:  [transit - 12h, transit]   altitude rises monotonically
 *   dusk side:  [transit, transit + 12h]   altitude falls monotonically
 * Within each half-day the crossing is bracketed by the endpoints, so one
 * capped bisection per threshold is enough, and the dawn/dusk ordering
 * astro ≤ nautical ≤ civil ≤ rise ≤ set ≤ civil ≤ nautical ≤ astro
 * follows from monotonicity. No sign change means the event does not occur.
 *
 * References:
 *   Meeus, Astronomical Algorithms (2nd ed.) — Ch. 15 (rising, transit, setting),
 *   Ch. 25 (solar coordinates)
 *   USNO Astronomical Applications — twilight definitions
 */

import { bisect, DEG2RAD, mod360, sind } from '../math/index.js'
import { altitudeOf, eclipticToEquatorial, hourAngle, meanObliquity } from '../observer/index.js'
import {
  dateToJD,
  jdToDate,
  julianCenturies,
  localDayStart,
  MS_PER_DAY,
  MS_PER_HOUR,
  utcOffsetHours,
} from '../time/index.js'
import type { DarkSkyWindow, Equatorial, GeoLocation, SkyEvent, SunTimes, TwilightPhase } from '../types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/**
 * Apparent sunrise/sunset altitude of the Sun's centre (degrees):
 * -34' refraction - 16' semi-diameter.
 */
export const SUN_RISE_SET_ALTITUDE = -0.8333

/** Solar altitude thresholds for the three twilights (degrees) */
export const TWILIGHT_ALTITUDES = {
  civil: -6,
  nautical: -12,
  astronomical: -18,
} as const

/** Sidereal rate of hour angle change, degrees per day */
const SIDEREAL_DEG_PER_DAY = 360.98564736629

/** 30 seconds, in days */
const EVENT_TOLERANCE_DAYS = 30 / 86400

// ─── Position ─────────────────────────────────────────────────────────────────

export interface SunPosition extends Equatorial {
  /** Apparent ecliptic longitude (degrees) */
  eclipticLon: number
  /** Earth-Sun distance in AU */
  distanceAU: number
}

/** Apparent geocentric position of the Sun at Julian Date jd. */
export function sunPosition(jd: number): SunPosition {
  const T = julianCenturies(jd)

  // Mean longitude L0 and mean anomaly M (degrees)
  const L0 = 280.46646 + 36000.76983 * T + 0.0003032 * T * T
  const M = mod360(357.52911 + 35999.05029 * T - 0.0001537 * T * T) * DEG2RAD
  const e = 0.016708634 - 0.000042037 * T - 0.0000001267 * T * T

  // Equation of centre (degrees)
  const C = (1.914602 - 0.004817 * T - 0.000014 * T * T) * Math.sin(M)
    + (0.019993 - 0.000101 * T) * Math.sin(2 * M)
    + 0.000289 * Math.sin(3 * M)

  const trueLon = L0 + C
  const nu = M + C * DEG2RAD
  const distanceAU = 1.000001018 * (1 - e * e) / (1 + e * Math.cos(nu))

  const omega = 125.04 - 1934.136 * T
  const eclipticLon = mod360(trueLon - 0.00569 - 0.00478 * sind(omega))
  const obliquity = meanObliquity(jd) + 0.00256 * Math.cos(omega * DEG2RAD)

  const { ra, dec } = eclipticToEquatorial(eclipticLon, 0, obliquity)
  return { ra, dec, eclipticLon, distanceAU }
}

/** Geometric altitude of the Sun's centre, degrees. */
export function sunAltitude(jd: number, latitude: number, longitude: number): number {
  return altitudeOf(sunPosition(jd), jd, latitude, longitude)
}

// ─── Transit ──────────────────────────────────────────────────────────────────

/**
 * Julian Date of solar transit during the local day that starts at `dayStart`.
 * Starts from local mean noon and removes the residual hour angle.
 */
export function solarTransitJD(dayStart: Date, longitude: number, offsetHours: number): number {
  let jd = dateToJD(dayStart) + (12 + offsetHours - longitude / 15) / 24
  for (let i = 0; i < 3; i++) {
    const H = hourAngle(jd, longitude, sunPosition(jd).ra)
    jd -= H / SIDEREAL_DEG_PER_DAY
  }
  return jd
}

// ─── Events ───────────────────────────────────────────────────────────────────

export interface SunTimesOptions {
  /**
   * Altitude of the Sun's centre at sunrise/sunset.
   * Defaults to the apparent horizon ({@link SUN_RISE_SET_ALTITUDE});
   * pass 0 for the geometric horizon.
   */
  horizonDeg?: number
}

/**
 * Sunrise, sunset and twilight for the location's local day containing `instant`.
 * Polar day and night yield `{ type: 'none' }` events.
 */
export function computeSunTimes(
  location: GeoLocation,
  instant: Date,
  options: SunTimesOptions = {},
): SunTimes {
  const { latitude, longitude } = location
  const offset = utcOffsetHours(location)
  const horizon = options.horizonDeg ?? SUN_RISE_SET_ALTITUDE

  const transit = solarTransitJD(localDayStart(instant, offset), longitude, offset)
  const altitude = (jd: number) => sunAltitude(jd, latitude, longitude)
  const noonAltitude = altitude(transit)

  const crossing = (threshold: number, side: 'dawn' | 'dusk'): SkyEvent => {
    const a = side === 'dawn' ? transit - 0.5 : transit
    const root = bisect(jd => altitude(jd) - threshold, a, a + 0.5, {
      tolerance: EVENT_TOLERANCE_DAYS,
      maxIterations: 40,
    })
    if (root === null) {
      return { type: 'none', reason: noonAltitude < threshold ? 'always-below' : 'always-above' }
    }
    return { type: 'at', time: jdToDate(root) }
  }

  const sunrise = crossing(horizon, 'dawn')
  const sunset = crossing(horizon, 'dusk')

  return {
    astronomicalDawn: crossing(TWILIGHT_ALTITUDES.astronomical, 'dawn'),
    nauticalDawn: crossing(TWILIGHT_ALTITUDES.nautical, 'dawn'),
    civilDawn: crossing(TWILIGHT_ALTITUDES.civil, 'dawn'),
    sunrise,
    solarNoon: { type: 'at', time: jdToDate(transit) },
    sunset,
    civilDusk: crossing(TWILIGHT_ALTITUDES.civil, 'dusk'),
    nauticalDusk: crossing(TWILIGHT_ALTITUDES.nautical, 'dusk'),
    astronomicalDusk: crossing(TWILIGHT_ALTITUDES.astronomical, 'dusk'),
    dayLengthMinutes: dayLengthMinutes(sunrise, sunset),
  }
}

/** Minutes between sunrise and sunset; 0 / 1440 for polar night / day; null when unknown. */
export function dayLengthMinutes(sunrise: SkyEvent, sunset: SkyEvent): number | null {
  if (sunrise.type === 'at' && sunset.type === 'at') {
    return (sunset.time.getTime() - sunrise.time.getTime()) / 60_000
  }
  if (sunrise.type === 'none' && sunset.type === 'none' && sunrise.reason === sunset.reason) {
    if (sunrise.reason === 'always-below') return 0
    if (sunrise.reason === 'always-above') return 1440
  }
  return null
}

// ─── Darkness ─────────────────────────────────────────────────────────────────

/** Twilight phase for a given solar altitude (degrees). */
export function twilightPhaseForAltitude(altitude: number): TwilightPhase {
  if (altitude >= SUN_RISE_SET_ALTITUDE) return 'day'
  if (altitude >= TWILIGHT_ALTITUDES.civil) return 'civil'
  if (altitude >= TWILIGHT_ALTITUDES.nautical) return 'nautical'
  if (altitude >= TWILIGHT_ALTITUDES.astronomical) return 'astronomical'
  return 'night'
}

/**
 * Twilight phase at `instant` derived from a day's event boundaries.
 * Returns null when a boundary needed for the decision was not reported.
 */
export function twilightPhaseAt(times: SunTimes, instant: Date): TwilightPhase | null {
  const levels: Array<[SkyEvent, SkyEvent, TwilightPhase]> = [
    [times.sunrise, times.sunset, 'day'],
    [times.civilDawn, times.civilDusk, 'civil'],
    [times.nauticalDawn, times.nauticalDusk, 'nautical'],
    [times.astronomicalDawn, times.astronomicalDusk, 'astronomical'],
  ]
  for (const [dawn, dusk, phase] of levels) {
    const below = isBelowLevel(dawn, dusk, instant)
    if (below === null) return null
    if (!below) return phase
  }
  return 'night'
}

/** Whether the Sun is below the threshold bounded by a dawn/dusk pair at `instant`. */
function isBelowLevel(dawn: SkyEvent, dusk: SkyEvent, instant: Date): boolean | null {
  const t = instant.getTime()
  if (dawn.type === 'unreported' || dusk.type === 'unreported') return null
  if (dawn.type === 'at' && dusk.type === 'at') {
    return t < dawn.time.getTime() || t > dusk.time.getTime()
  }
  if (dawn.type === 'none' && dusk.type === 'none') {
    return dawn.reason === 'always-below'
  }
  // One side only: a day on the edge of polar night or midnight sun
  if (dawn.type === 'at') return t < dawn.time.getTime()
  if (dusk.type === 'at') return t > dusk.time.getTime()
  return null
}

/** Astronomical dawn on the local day after the one containing `instant`. */
export function nextAstronomicalDawn(location: GeoLocation, instant: Date): SkyEvent {
  const tomorrow = new Date(localDayStart(instant, utcOffsetHours(location)).getTime() + MS_PER_DAY)
  return computeSunTimes(location, tomorrow).astronomicalDawn
}

/**
 * The stretch of full darkness from an evening's astronomical dusk to the next
 * morning's astronomical dawn, with its midpoint as the best time to observe.
 */
export function darkSkyWindow(dusk: SkyEvent, nextDawn: SkyEvent): DarkSkyWindow {
  if (dusk.type === 'none' && dusk.reason === 'always-above') return { type: 'none', reason: 'never-dark' }
  if (dusk.type === 'none' && dusk.reason === 'always-below') return { type: 'none', reason: 'always-dark' }
  if (dusk.type !== 'at' || nextDawn.type !== 'at') return { type: 'unreported' }

  const start = dusk.time.getTime()
  const end = nextDawn.time.getTime()
  if (end <= start) return { type: 'unreported' }
  return {
    type: 'window',
    start: new Date(start),
    end: new Date(end),
    durationHours: Math.round((end - start) / MS_PER_HOUR * 100) / 100,
    bestTime: new Date(start + (end - start) / 2),
  }
}
