import { describe, expect, it } from 'vitest'
import { dateToJD } from '../../time/index.js'
import { PLANET_NAMES } from '../../types.js'
import {
  apparentMagnitude,
  computePlanetsVisibility,
  computePlanetVisibility,
  heliocentricPosition,
  planetGeometry,
  solveKepler,
} from '../index.js'

const LONDON = { latitude: 51.5074, longitude: -0.1278, utcOffsetHours: 0 }
const EVENING = new Date('2025-01-16T22:00:00Z')

describe('solveKepler', () => {
  it('returns M for a circular orbit', () => {
    expect(solveKepler(1.234, 0)).toBeCloseTo(1.234, 12)
  })

  it.each([0.1, 0.5, 0.9])('satisfies E - e sin E = M for e = %s', e => {
    const M = 2.1
    const E = solveKepler(M, e)
    expect(E - e * Math.sin(E)).toBeCloseTo(M, 9)
  })
})

describe('geometry', () => {
  it('keeps the Earth-Moon barycentre about 1 AU from the Sun', () => {
    const [x, y, z] = heliocentricPosition('EarthMoon', dateToJD(EVENING))
    expect(Math.hypot(x, y, z)).toBeGreaterThan(0.98)
    expect(Math.hypot(x, y, z)).toBeLessThan(1.02)
  })

  it('puts Mars near opposition in mid-January 2025', () => {
    const g = planetGeometry('Mars', dateToJD(EVENING))
    expect(g.elongation).toBeGreaterThan(170)
    expect(apparentMagnitude('Mars', g)).toBeCloseTo(-1.4, 1)
  })

  it('puts Venus in the evening sky near greatest elongation', () => {
    const g = planetGeometry('Venus', dateToJD(EVENING))
    expect(g.eastOfSun).toBe(true)
    expect(g.elongation).toBeCloseTo(47, 0)
    expect(apparentMagnitude('Venus', g)).toBeCloseTo(-4.5, 1)
  })
})

describe('computePlanetVisibility', () => {
  it('marks Venus as an evening object best seen at the end of twilight', () => {
    const venus = computePlanetVisibility('Venus', LONDON, EVENING)
    expect(venus.visible).toBe(true)
    expect(venus.magnitude).toBe(-4.5)
    expect(venus.bestViewing).toBe('Evening sky, best around 17:20')
  })

  it('marks Mars at opposition as visible most of the night', () => {
    const mars = computePlanetVisibility('Mars', LONDON, EVENING)
    expect(mars.visible).toBe(true)
    expect(mars.bestViewing).toBe('Visible most of the night, highest around 00:00')
    expect(mars.rise.type).toBe('at')
  })

  it('places Jupiter in the evening sky', () => {
    expect(computePlanetVisibility('Jupiter', LONDON, EVENING).bestViewing).toBe('Evening sky, best around 21:00')
  })

  it('rejects Mercury in the Sun\'s glare', () => {
    const mercury = computePlanetVisibility('Mercury', LONDON, EVENING)
    expect(mercury.visible).toBe(false)
    expect(mercury.bestViewing).toBe('Too close to the Sun to observe')
    expect(mercury.elongationDeg).toBeLessThan(18)
  })

  it('rejects Neptune as too faint', () => {
    const neptune = computePlanetVisibility('Neptune', LONDON, EVENING)
    expect(neptune.visible).toBe(false)
    expect(neptune.bestViewing).toBe('Too faint for the naked eye; use binoculars or a telescope')
  })

  it('covers every tracked planet in order from the Sun', () => {
    const all = computePlanetsVisibility(LONDON, EVENING)
    expect(all.map(p => p.name)).toEqual([...PLANET_NAMES])
    for (const p of all) {
      expect(p.magnitude).not.toBeNull()
      expect(p.altitudeDeg).not.toBeNull()
    }
  })
})
