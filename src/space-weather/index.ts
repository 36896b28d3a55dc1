/**
 * space-weather — Geomagnetic activity scale and aurora reach.
 *
 * References:
 *   NOAA SWPC Space Weather Scales (G1–G5)
 *   NOAA SWPC aurora viewline guidance (equatorward boundary vs. Kp)
 */

import type { GeomagneticActivity, GeoLocation, SpaceWeather } from '../types.js'

/** Lower Kp bound of each activity level, strongest first */
const ACTIVITY_LEVELS: ReadonlyArray<[number, GeomagneticActivity]> = [
  [9, 'G5 Extreme Storm'],
  [8, 'G4 Severe Storm'],
  [7, 'G3 Strong Storm'],
  [6, 'G2 Moderate Storm'],
  [5, 'G1 Minor Storm'],
  [4, 'Active'],
  [2, 'Unsettled'],
]

/** Solar wind speed above which the wind counts as elevated, km/s */
export const ELEVATED_WIND_SPEED = 500

/** Proton density above which the wind counts as elevated, per cm³ */
export const ELEVATED_WIND_DENSITY = 10

export function geomagneticActivity(kp: number): GeomagneticActivity {
  for (const [min, level] of ACTIVITY_LEVELS) {
    if (kp >= min) return level
  }
  return 'Quiet'
}

/** Lowest absolute geomagnetic-ish latitude where aurora may be seen at this Kp. */
export function auroraLatitude(kp: number): number {
  return Math.max(40, 67 - 3 * kp)
}

export function isSolarWindElevated(speed: number | null, density: number | null): boolean {
  return (speed !== null && speed > ELEVATED_WIND_SPEED)
    || (density !== null && density > ELEVATED_WIND_DENSITY)
}

export interface SpaceWeatherReading {
  kp: number
  observedAt: Date
  solarWindSpeed: number | null
  solarWindDensity: number | null
}

/** Derive the full space-weather record for a location from raw readings. */
export function assessSpaceWeather(reading: SpaceWeatherReading, location: GeoLocation): SpaceWeather {
  const boundary = auroraLatitude(reading.kp)
  return {
    kp: reading.kp,
    activity: geomagneticActivity(reading.kp),
    observedAt: reading.observedAt,
    solarWindSpeed: reading.solarWindSpeed,
    solarWindDensity: reading.solarWindDensity,
    solarWindElevated: isSolarWindElevated(reading.solarWindSpeed, reading.solarWindDensity),
    auroraLatitude: boundary,
    auroraVisible: Math.abs(location.latitude) >= boundary,
  }
}
