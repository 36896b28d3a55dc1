import { describe, expect, it } from 'vitest'
import { assessSpaceWeather, auroraLatitude, geomagneticActivity, isSolarWindElevated } from '../index.js'

describe('geomagneticActivity', () => {
  it.each([
    [0, 'Quiet'],
    [1.67, 'Quiet'],
    [2, 'Unsettled'],
    [4, 'Active'],
    [5, 'G1 Minor Storm'],
    [6.33, 'G2 Moderate Storm'],
    [7, 'G3 Strong Storm'],
    [8.67, 'G4 Severe Storm'],
    [9, 'G5 Extreme Storm'],
  ])('Kp %d is %s', (kp, level) => {
    expect(geomagneticActivity(kp)).toBe(level)
  })
})

describe('auroraLatitude', () => {
  it('moves equatorward three degrees per Kp step', () => {
    expect(auroraLatitude(0)).toBe(67)
    expect(auroraLatitude(5)).toBe(52)
  })

  it('stops at 40 degrees', () => {
    expect(auroraLatitude(9)).toBe(40)
  })
})

describe('isSolarWindElevated', () => {
  it('looks at speed or density', () => {
    expect(isSolarWindElevated(650, 3)).toBe(true)
    expect(isSolarWindElevated(400, 12)).toBe(true)
    expect(isSolarWindElevated(500, 10)).toBe(false)
  })

  it('treats missing plasma values as calm', () => {
    expect(isSolarWindElevated(null, null)).toBe(false)
  })
})

describe('assessSpaceWeather', () => {
  const reading = {
    kp: 5.33,
    observedAt: new Date('2025-01-16T21:00:00Z'),
    solarWindSpeed: 520,
    solarWindDensity: null,
  }

  it('reports aurora at or poleward of the boundary in either hemisphere', () => {
    const north = assessSpaceWeather(reading, { latitude: 52, longitude: 0 })
    expect(north.activity).toBe('G1 Minor Storm')
    expect(north.auroraLatitude).toBeCloseTo(51.01, 9)
    expect(north.auroraVisible).toBe(true)
    expect(north.solarWindElevated).toBe(true)
    expect(assessSpaceWeather(reading, { latitude: -55, longitude: 147 }).auroraVisible).toBe(true)
  })

  it('keeps aurora out of reach at low latitude', () => {
    expect(assessSpaceWeather(reading, { latitude: 40.7, longitude: -74 }).auroraVisible).toBe(false)
  })
})
