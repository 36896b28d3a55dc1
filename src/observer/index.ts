/**
 * observer — Earth rotation and the observer's horizon.
 *
 * Transformation chain used by every body in this package:
 *   ecliptic (λ, β) → equatorial (α, δ) → hour angle → horizontal (az, alt)
 *
 * Positions are geocentric. Topocentric parallax matters only for the Moon
 * (~1°) and is folded into its rise/set threshold instead.
 *
 * References:
 *   Meeus, Astronomical Algorithms (2nd ed.) — Ch. 12 (sidereal time),
 *   Ch. 13 (coordinate transformations), Ch. 22 (obliquity)
 */

import { InvalidInputError } from '../errors/index.js'
import { DEG2RAD, RAD2DEG, findCrossings, mod360, normalizeDeg180 } from '../math/index.js'
import { J2000, jdToDate, julianCenturies } from '../time/index.js'
import type { AzAlt, Equatorial, GeoLocation, SkyEvent } from '../types.js'

// ─── Location ────────────────────────────────────────────────────────────────

/**
 * Throw InvalidInputError unless the location is usable:
 * finite lat ∈ [-90, 90], lon ∈ [-180, 180], offset ∈ [-12, 14].
 */
export function assertValidLocation(location: GeoLocation): void {
  const { latitude, longitude, elevation, utcOffsetHours } = location
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new InvalidInputError(`Latitude must be within [-90, 90], got ${latitude}`)
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new InvalidInputError(`Longitude must be within [-180, 180], got ${longitude}`)
  }
  if (elevation !== undefined && !Number.isFinite(elevation)) {
    throw new InvalidInputError(`Elevation must be a finite number, got ${elevation}`)
  }
  if (
    utcOffsetHours !== undefined &&
    (!Number.isFinite(utcOffsetHours) || utcOffsetHours < -12 || utcOffsetHours > 14)
  ) {
    throw new InvalidInputError(`UTC offset must be within [-12, 14] hours, got ${utcOffsetHours}`)
  }
}

// ─── Sidereal time ───────────────────────────────────────────────────────────

/**
 * Greenwich mean sidereal time in degrees, [0, 360).
 * Meeus eq. 12.4.
 */
export function greenwichMeanSiderealTime(jd: number): number {
  const T = julianCenturies(jd)
  return mod360(
    280.46061837 +
    360.98564736629 * (jd - J2000) +
    0.000387933 * T * T -
    (T * T * T) / 38710000,
  )
}

/** Local hour angle of a body in degrees, [-180, 180). Positive west of the meridian. */
export function hourAngle(jd: number, longitude: number, ra: number): number {
  return normalizeDeg180(greenwichMeanSiderealTime(jd) + longitude - ra)
}

// ─── Coordinate transforms ───────────────────────────────────────────────────

/** Mean obliquity of the ecliptic in degrees (Meeus eq. 22.2, truncated) */
export function meanObliquity(jd: number): number {
  const T = julianCenturies(jd)
  return 23.439291111 - 0.013004167 * T - 0.0000001638 * T * T + 0.0000005036 * T * T * T
}

/** Ecliptic longitude/latitude (degrees) → right ascension/declination (degrees). */
export function eclipticToEquatorial(lon: number, lat: number, obliquity: number): Equatorial {
  const l = lon * DEG2RAD
  const b = lat * DEG2RAD
  const e = obliquity * DEG2RAD
  const ra = Math.atan2(Math.sin(l) * Math.cos(e) - Math.tan(b) * Math.sin(e), Math.cos(l))
  const dec = Math.asin(Math.sin(b) * Math.cos(e) + Math.cos(b) * Math.sin(e) * Math.sin(l))
  return { ra: mod360(ra * RAD2DEG), dec: dec * RAD2DEG }
}

/**
 * Geocentric equatorial position → azimuth (from North, clockwise) and
 * geometric altitude, for an observer at (lat, lon) at Julian Date jd.
 */
export function equatorialToHorizontal(
  pos: Equatorial,
  jd: number,
  latitude: number,
  longitude: number,
): AzAlt {
  const H = hourAngle(jd, longitude, pos.ra) * DEG2RAD
  const phi = latitude * DEG2RAD
  const dec = pos.dec * DEG2RAD

  const sinAlt = Math.sin(phi) * Math.sin(dec) + Math.cos(phi) * Math.cos(dec) * Math.cos(H)
  const altitude = Math.asin(Math.max(-1, Math.min(1, sinAlt))) * RAD2DEG

  // Meeus 13.5 measures azimuth from South; shift to North-based
  const azSouth = Math.atan2(
    Math.sin(H),
    Math.cos(H) * Math.sin(phi) - Math.tan(dec) * Math.cos(phi),
  ) * RAD2DEG
  return { azimuth: mod360(azSouth + 180), altitude }
}

/** Geometric altitude only; the hot path for rise/set searches. */
export function altitudeOf(pos: Equatorial, jd: number, latitude: number, longitude: number): number {
  const H = hourAngle(jd, longitude, pos.ra) * DEG2RAD
  const phi = latitude * DEG2RAD
  const dec = pos.dec * DEG2RAD
  const sinAlt = Math.sin(phi) * Math.sin(dec) + Math.cos(phi) * Math.cos(dec) * Math.cos(H)
  return Math.asin(Math.max(-1, Math.min(1, sinAlt))) * RAD2DEG
}

// ─── Rise and set ────────────────────────────────────────────────────────────

/**
 * First rising and first setting of a body within the 24 hours from `dayStartJD`,
 * found on the altitude function `altitude(jd)` against `threshold` degrees.
 *
 * No crossing of either kind means the body stayed on one side all day.
 * A day with only one kind (the Moon skipping a rise) reports the other as
 * `not-this-day`.
 */
export function riseAndSet(
  altitude: (jd: number) => number,
  dayStartJD: number,
  threshold: number,
): { rise: SkyEvent; set: SkyEvent } {
  const crossings = findCrossings(jd => altitude(jd) - threshold, dayStartJD, dayStartJD + 1, 30 / 86400)

  if (crossings.length === 0) {
    const reason = altitude(dayStartJD) >= threshold ? 'always-above' : 'always-below'
    return { rise: { type: 'none', reason }, set: { type: 'none', reason } }
  }

  const event = (direction: 'up' | 'down'): SkyEvent => {
    const hit = crossings.find(c => c.direction === direction)
    return hit ? { type: 'at', time: jdToDate(hit.t) } : { type: 'none', reason: 'not-this-day' }
  }
  return { rise: event('up'), set: event('down') }
}
