import { describe, expect, it } from 'vitest'
import {
  computeMoonState,
  illuminationFraction,
  moonAgeDays,
  moonPhaseAngle,
  phaseDistance,
  phaseNameForAngle,
  REFERENCE_NEW_MOON,
  SYNODIC_MONTH,
  upcomingMoonPhases,
} from '../index.js'
import { MS_PER_DAY } from '../../time/index.js'

const LONDON = { latitude: 51.5074, longitude: -0.1278, utcOffsetHours: 0 }

describe('phase', () => {
  it('is New with no illumination at the reference new moon', () => {
    const state = computeMoonState(LONDON, REFERENCE_NEW_MOON)
    expect(state.phase).toBe('new-moon')
    expect(state.illumination).toBeCloseTo(0, 9)
    expect(state.ageDays).toBeCloseTo(0, 9)
  })

  it('bins angles into eight 45° sectors centred on the principal phases', () => {
    expect(phaseNameForAngle(0)).toBe('new-moon')
    expect(phaseNameForAngle(22.4)).toBe('new-moon')
    expect(phaseNameForAngle(22.5)).toBe('waxing-crescent')
    expect(phaseNameForAngle(90)).toBe('first-quarter')
    expect(phaseNameForAngle(180)).toBe('full-moon')
    expect(phaseNameForAngle(270)).toBe('last-quarter')
    expect(phaseNameForAngle(337.5)).toBe('new-moon')
    expect(phaseNameForAngle(359.9)).toBe('new-moon')
  })

  it('is periodic in the phase angle', () => {
    for (const angle of [10, 100, 200, 300]) {
      expect(phaseNameForAngle(angle + 360)).toBe(phaseNameForAngle(angle))
      expect(phaseNameForAngle(angle - 720)).toBe(phaseNameForAngle(angle))
    }
  })

  it('repeats after whole synodic months', () => {
    const base = new Date('2025-01-16T22:00:00Z')
    const state = computeMoonState(LONDON, base)
    for (const months of [1, 12, 100]) {
      const later = new Date(base.getTime() + months * SYNODIC_MONTH * MS_PER_DAY)
      expect(phaseNameForAngle(moonPhaseAngle(later))).toBe(state.phase)
      expect(illuminationFraction(moonPhaseAngle(later))).toBeCloseTo(state.illumination, 6)
    }
  })

  it('keeps illumination inside [0, 1]', () => {
    for (let angle = -720; angle <= 720; angle += 7.5) {
      const k = illuminationFraction(angle)
      expect(k).toBeGreaterThanOrEqual(0)
      expect(k).toBeLessThanOrEqual(1)
    }
  })

  it('measures age in [0, synodic month) before the reference epoch too', () => {
    const age = moonAgeDays(new Date('1990-05-01T00:00:00Z'))
    expect(age).toBeGreaterThanOrEqual(0)
    expect(age).toBeLessThan(SYNODIC_MONTH)
  })

  it('counts steps around the cycle', () => {
    expect(phaseDistance('new-moon', 'waning-crescent')).toBe(1)
    expect(phaseDistance('new-moon', 'full-moon')).toBe(4)
    expect(phaseDistance('first-quarter', 'first-quarter')).toBe(0)
  })
})

describe('computeMoonState', () => {
  it('describes a waning gibbous Moon over London on 2025-01-16', () => {
    const state = computeMoonState(LONDON, new Date('2025-01-16T22:00:00Z'))
    expect(state.phase).toBe('waning-gibbous')
    expect(state.illumination).toBeCloseTo(0.934, 3)
    expect(state.altitudeDeg).toBeCloseTo(22.8, 0)

    expect(state.rise.type).toBe('at')
    expect(state.set.type).toBe('at')
    if (state.rise.type === 'at' && state.set.type === 'at') {
      expect(Math.abs(state.rise.time.getTime() - Date.parse('2025-01-16T19:24:13Z'))).toBeLessThan(60_000)
      expect(Math.abs(state.set.time.getTime() - Date.parse('2025-01-16T09:33:16Z'))).toBeLessThan(60_000)
    }
  })
})

describe('upcomingMoonPhases', () => {
  it('lists the next four principal phases a quarter cycle apart', () => {
    const events = upcomingMoonPhases(REFERENCE_NEW_MOON)
    expect(events.map(e => e.phase)).toEqual(['first-quarter', 'full-moon', 'last-quarter', 'new-moon'])
    const quarter = (SYNODIC_MONTH / 4) * MS_PER_DAY
    events.forEach((event, i) => {
      expect(event.time.getTime() - REFERENCE_NEW_MOON.getTime()).toBeCloseTo((i + 1) * quarter, -1)
    })
  })

  it('starts strictly after the instant', () => {
    const instant = new Date('2025-01-16T22:00:00Z')
    const [first] = upcomingMoonPhases(instant, 1)
    expect(first?.phase).toBe('last-quarter')
    expect(first?.time.getTime()).toBeGreaterThan(instant.getTime())
  })
})
