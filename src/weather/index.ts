/**
 * weather — Cloud cover over the coming night.
 */

import type { CloudCategory, WeatherConditions } from '../types.js'
import { MS_PER_HOUR } from '../time/index.js'

export interface HourlySample {
  /** Start of the hour, UTC */
  time: Date
  /** Percent, null when the model has no value */
  cloudCover: number | null
  isDay: boolean
}

export function cloudCategory(cloudCover: number): CloudCategory {
  if (cloudCover < 25) return 'Clear'
  if (cloudCover < 50) return 'Partly Cloudy'
  if (cloudCover < 75) return 'Mostly Cloudy'
  return 'Overcast'
}

/**
 * Mean cloud cover over the first run of night hours within 24 h of `instant`
 * (starting with the current hour if it is already dark). Under midnight sun
 * the current hour stands in. Null when no sample carries a value.
 */
export function nightCloudCover(samples: readonly HourlySample[], instant: Date): WeatherConditions | null {
  const hourStart = Math.floor(instant.getTime() / MS_PER_HOUR) * MS_PER_HOUR
  const window = samples
    .filter(s => s.time.getTime() >= hourStart && s.time.getTime() < hourStart + 24 * MS_PER_HOUR)
    .sort((a, b) => a.time.getTime() - b.time.getTime())

  const firstNight = window.findIndex(s => !s.isDay)
  let chosen: HourlySample[]
  if (firstNight < 0) {
    chosen = window.slice(0, 1)
  } else {
    const afterNight = window.findIndex((s, i) => i > firstNight && s.isDay)
    chosen = window.slice(firstNight, afterNight < 0 ? undefined : afterNight)
  }

  const values = chosen.flatMap(s => (s.cloudCover === null ? [] : [s.cloudCover]))
  if (values.length === 0) return null
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length
  const cloudCover = Math.round(mean * 10) / 10
  return { cloudCover, category: cloudCategory(cloudCover), samples: values.length }
}
