import { describe, expect, it } from 'vitest'
import type { HourlySample } from '../index.js'
import { cloudCategory, nightCloudCover } from '../index.js'

const HOUR = 3_600_000

/** Hourly samples from `start`, one per entry as [cloudCover, isDay] */
function hours(start: string, entries: ReadonlyArray<[number | null, boolean]>): HourlySample[] {
  const t0 = new Date(start).getTime()
  return entries.map(([cloudCover, isDay], i) => ({ time: new Date(t0 + i * HOUR), cloudCover, isDay }))
}

describe('cloudCategory', () => {
  it.each([
    [0, 'Clear'],
    [24.9, 'Clear'],
    [25, 'Partly Cloudy'],
    [50, 'Mostly Cloudy'],
    [74.9, 'Mostly Cloudy'],
    [75, 'Overcast'],
    [100, 'Overcast'],
  ])('%d%% is %s', (cover, category) => {
    expect(cloudCategory(cover)).toBe(category)
  })
})

describe('nightCloudCover', () => {
  it('averages the first run of night hours', () => {
    const samples = hours('2025-01-16T15:00:00Z', [
      [90, true],
      [80, true],
      [10, false],
      [20, false],
      [33, false],
      [100, true],
    ])
    expect(nightCloudCover(samples, new Date('2025-01-16T15:20:00Z'))).toEqual({
      cloudCover: 21,
      category: 'Clear',
      samples: 3,
    })
  })

  it('starts with the current hour when it is already dark', () => {
    const samples = hours('2025-01-16T20:00:00Z', [
      [60, false],
      [40, false],
      [0, true],
    ])
    expect(nightCloudCover(samples, new Date('2025-01-16T20:45:00Z'))?.cloudCover).toBe(50)
  })

  it('ignores hours before the current one', () => {
    const samples = hours('2025-01-16T18:00:00Z', [
      [100, false],
      [0, false],
      [0, false],
    ])
    expect(nightCloudCover(samples, new Date('2025-01-16T19:00:00Z'))?.cloudCover).toBe(0)
  })

  it('uses the current hour under the midnight sun', () => {
    const samples = hours('2025-06-21T22:00:00Z', [
      [55, true],
      [15, true],
    ])
    expect(nightCloudCover(samples, new Date('2025-06-21T22:10:00Z'))).toEqual({
      cloudCover: 55,
      category: 'Mostly Cloudy',
      samples: 1,
    })
  })

  it('skips missing values and is null when none remain', () => {
    const gaps = hours('2025-01-16T20:00:00Z', [
      [null, false],
      [30, false],
    ])
    expect(nightCloudCover(gaps, new Date('2025-01-16T20:00:00Z'))?.samples).toBe(1)
    expect(nightCloudCover(hours('2025-01-16T20:00:00Z', [[null, false]]), new Date('2025-01-16T20:00:00Z'))).toBeNull()
    expect(nightCloudCover([], new Date('2025-01-16T20:00:00Z'))).toBeNull()
  })
})
