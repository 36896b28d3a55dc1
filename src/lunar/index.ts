/**
 * lunar — Moon phase, illumination, position and rise/set.
 *
 * Phase uses mean synodic motion from a reference new moon. True new moons
 * wander up to ~14 hours from the mean cycle, which moves illumination by at
 * most a few percent and never more than one phase bin: ample for
 * "should I look up tonight".
 *
 * Position uses the low-precision lunar series of the Astronomical Almanac
 * (section D, ~0.3° in longitude), enough to time moonrise within minutes.
 *
 * References:
 *   The Astronomical Almanac — Section D, low-precision formulae for the Moon
 *   Meeus, Astronomical Algorithms (2nd ed.) — Ch. 15 (moonrise altitude h0),
 *   Ch. 49 (mean lunation)
 */

import { cosd, modPositive, sind } from '../math/index.js'
import { altitudeOf, eclipticToEquatorial, meanObliquity, riseAndSet } from '../observer/index.js'
import { dateToJD, julianCenturies, localDayStart, MS_PER_DAY, utcOffsetHours } from '../time/index.js'
import type { Equatorial, GeoLocation, MoonPhaseEvent, MoonPhaseName, MoonState } from '../types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Mean synodic month in days */
export const SYNODIC_MONTH = 29.53058867

/** Reference new moon: 2000 Jan 6, 18:14 UTC */
export const REFERENCE_NEW_MOON = new Date(Date.UTC(2000, 0, 6, 18, 14))

/**
 * Geocentric altitude of the Moon's centre at rise/set, degrees.
 * Meeus h0 = 0.7275·π − 0°34' with mean horizontal parallax π = 0.9508°.
 */
export const MOON_RISE_SET_ALTITUDE = 0.125

/** Phase names in cycle order, each owning a 45° bin centred on k·45° */
export const PHASE_ORDER: readonly MoonPhaseName[] = [
  'new-moon',
  'waxing-crescent',
  'first-quarter',
  'waxing-gibbous',
  'full-moon',
  'waning-gibbous',
  'last-quarter',
  'waning-crescent',
]

/** Display labels, capitalised for prose */
export const PHASE_DISPLAY: Record<MoonPhaseName, string> = {
  'new-moon': 'New Moon',
  'waxing-crescent': 'Waxing Crescent',
  'first-quarter': 'First Quarter',
  'waxing-gibbous': 'Waxing Gibbous',
  'full-moon': 'Full Moon',
  'waning-gibbous': 'Waning Gibbous',
  'last-quarter': 'Last Quarter',
  'waning-crescent': 'Waning Crescent',
}

// ─── Phase ────────────────────────────────────────────────────────────────────

/** Days since the most recent mean new moon, [0, SYNODIC_MONTH). */
export function moonAgeDays(instant: Date): number {
  const elapsed = (instant.getTime() - REFERENCE_NEW_MOON.getTime()) / MS_PER_DAY
  return modPositive(elapsed, SYNODIC_MONTH)
}

/** Sun-Moon phase angle along the cycle in degrees: 0 new, 90 first quarter, 180 full. */
export function moonPhaseAngle(instant: Date): number {
  return (moonAgeDays(instant) / SYNODIC_MONTH) * 360
}

/** Illuminated fraction of the disk for a phase angle in degrees, [0, 1]. */
export function illuminationFraction(phaseAngle: number): number {
  const k = (1 - cosd(phaseAngle)) / 2
  return Math.min(1, Math.max(0, k))
}

/**
 * Phase name for a phase angle. Eight equal 45° bins with New centred on 0°
 * and Full on 180°, so New covers [337.5°, 22.5°).
 */
export function phaseNameForAngle(phaseAngle: number): MoonPhaseName {
  const bin = Math.floor(modPositive(phaseAngle + 22.5, 360) / 45) % 8
  return PHASE_ORDER[bin] ?? 'new-moon'
}

/** Steps between two phase names along the cycle, 0-4 */
export function phaseDistance(a: MoonPhaseName, b: MoonPhaseName): number {
  const d = Math.abs(PHASE_ORDER.indexOf(a) - PHASE_ORDER.indexOf(b))
  return Math.min(d, 8 - d)
}

/**
 * The next `count` principal phases after `instant`, in time order.
 */
export function upcomingMoonPhases(instant: Date, count = 4): MoonPhaseEvent[] {
  const principal = ['new-moon', 'first-quarter', 'full-moon', 'last-quarter'] as const
  const cycles = (instant.getTime() - REFERENCE_NEW_MOON.getTime()) / (SYNODIC_MONTH * MS_PER_DAY)
  let quarter = Math.floor(cycles * 4) + 1
  const events: MoonPhaseEvent[] = []
  while (events.length < count) {
    const time = new Date(
      REFERENCE_NEW_MOON.getTime() + (quarter / 4) * SYNODIC_MONTH * MS_PER_DAY,
    )
    events.push({ phase: principal[modPositive(quarter, 4)] ?? 'new-moon', time })
    quarter++
  }
  return events
}

// ─── Position ─────────────────────────────────────────────────────────────────

/** Geocentric apparent RA/dec of the Moon at Julian Date jd (low precision). */
export function moonPosition(jd: number): Equatorial {
  const T = julianCenturies(jd)

  const lon = 218.32 + 481267.881 * T
    + 6.29 * sind(135.0 + 477198.87 * T)
    - 1.27 * sind(259.3 - 413335.36 * T)
    + 0.66 * sind(235.7 + 890534.22 * T)
    + 0.21 * sind(269.9 + 954397.74 * T)
    - 0.19 * sind(357.5 + 35999.05 * T)
    - 0.11 * sind(186.5 + 966404.03 * T)

  const lat = 5.13 * sind(93.3 + 483202.02 * T)
    + 0.28 * sind(228.2 + 960400.89 * T)
    - 0.28 * sind(318.3 + 6003.15 * T)
    - 0.17 * sind(217.6 - 407332.21 * T)

  return eclipticToEquatorial(lon, lat, meanObliquity(jd))
}

/** Geocentric altitude of the Moon's centre, degrees. */
export function moonAltitude(jd: number, latitude: number, longitude: number): number {
  return altitudeOf(moonPosition(jd), jd, latitude, longitude)
}

// ─── State ────────────────────────────────────────────────────────────────────

/**
 * Moon phase, illumination, altitude and the rise/set of the location's local
 * day, computed entirely from the formulae above.
 */
export function computeMoonState(location: GeoLocation, instant: Date): MoonState {
  const { latitude, longitude } = location
  const angle = moonPhaseAngle(instant)
  const dayStartJD = dateToJD(localDayStart(instant, utcOffsetHours(location)))
  const { rise, set } = riseAndSet(
    jd => moonAltitude(jd, latitude, longitude),
    dayStartJD,
    MOON_RISE_SET_ALTITUDE,
  )

  return {
    phase: phaseNameForAngle(angle),
    illumination: illuminationFraction(angle),
    rise,
    set,
    altitudeDeg: moonAltitude(dateToJD(instant), latitude, longitude),
    ageDays: moonAgeDays(instant),
  }
}
