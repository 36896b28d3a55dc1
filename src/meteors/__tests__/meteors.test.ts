import { describe, expect, it } from 'vitest'
import type { MeteorShower } from '../../types.js'
import {
  daysToPeak,
  effectiveZhr,
  isShowerActive,
  METEOR_SHOWERS,
  meteorOutlook,
  parseShowerTable,
  showerActivity,
  showerRating,
} from '../index.js'

function shower(overrides: Partial<MeteorShower>): MeteorShower {
  return {
    name: 'Test Shower',
    start: { month: 12, day: 4 },
    end: { month: 12, day: 17 },
    peak: { month: 12, day: 14 },
    zhr: 100,
    parentBody: 'Test body',
    radiant: 'Test constellation',
    speedKmS: 35,
    ...overrides,
  }
}

const day = (iso: string) => new Date(`${iso}T00:00:00Z`)

function byName(name: string): MeteorShower {
  const found = METEOR_SHOWERS.find(s => s.name === name)
  if (!found) throw new Error(`missing shower ${name}`)
  return found
}

describe('isShowerActive', () => {
  it('is active inside a [Dec 4, Dec 17] window and not after it', () => {
    const s = shower({})
    expect(isShowerActive(s, day('2025-12-10'))).toBe(true)
    expect(isShowerActive(s, day('2025-12-20'))).toBe(false)
  })

  it('includes both ends of the window', () => {
    const s = shower({})
    expect(isShowerActive(s, day('2025-12-04'))).toBe(true)
    expect(isShowerActive(s, day('2025-12-17'))).toBe(true)
    expect(isShowerActive(s, day('2025-12-03'))).toBe(false)
  })

  it('wraps windows across New Year', () => {
    const s = shower({ start: { month: 12, day: 28 }, end: { month: 1, day: 12 }, peak: { month: 1, day: 4 } })
    expect(isShowerActive(s, day('2025-12-30'))).toBe(true)
    expect(isShowerActive(s, day('2026-01-05'))).toBe(true)
    expect(isShowerActive(s, day('2026-01-20'))).toBe(false)
  })
})

describe('peak distance', () => {
  it('counts signed days to the nearest peak', () => {
    const geminids = byName('Geminids')
    expect(daysToPeak(geminids, day('2025-12-10'))).toBe(4)
    expect(daysToPeak(geminids, day('2025-12-16'))).toBe(-2)
  })

  it('looks into the next year for a January peak', () => {
    expect(daysToPeak(byName('Quadrantids'), day('2025-12-30'))).toBe(5)
  })

  it('scales the rate by distance from the peak', () => {
    expect(effectiveZhr(150, 0)).toBe(150)
    expect(effectiveZhr(150, -2)).toBeCloseTo(105, 9)
    expect(effectiveZhr(150, 4)).toBeCloseTo(60, 9)
    expect(effectiveZhr(150, 10)).toBeCloseTo(30, 9)
  })

  it('rates by effective rate', () => {
    expect(showerRating(80)).toBe('Excellent')
    expect(showerRating(79.9)).toBe('Good')
    expect(showerRating(40)).toBe('Good')
    expect(showerRating(15)).toBe('Fair')
    expect(showerRating(14)).toBe('Poor')
  })

  it('summarises a shower on its peak night', () => {
    const activity = showerActivity(byName('Geminids'), day('2025-12-14'))
    expect(activity.daysToPeak).toBe(0)
    expect(activity.effectiveZhr).toBe(150)
    expect(activity.rating).toBe('Excellent')
  })
})

describe('meteorOutlook', () => {
  it('lists active showers strongest first and upcoming peaks soonest first', () => {
    const outlook = meteorOutlook(day('2025-12-10'), 14)
    expect(outlook.active.map(a => a.shower.name)).toEqual(['Geminids', 'Northern Taurids'])
    expect(outlook.active[0]?.effectiveZhr).toBe(60)
    expect(outlook.upcoming.map(a => [a.shower.name, a.daysToPeak])).toEqual([['Ursids', 12]])
  })

  it('accepts a custom calendar', () => {
    const outlook = meteorOutlook(day('2025-06-01'), 30, [shower({})])
    expect(outlook).toEqual({ active: [], upcoming: [] })
  })
})

describe('parseShowerTable', () => {
  it('rejects a table with an impossible month', () => {
    expect(() => parseShowerTable([{ ...shower({}), peak: { month: 13, day: 1 } }])).toThrow()
  })

  it('loads the bundled calendar frozen', () => {
    expect(METEOR_SHOWERS.length).toBe(11)
    expect(Object.isFrozen(METEOR_SHOWERS)).toBe(true)
  })

  it('freezes the window dates of every shower', () => {
    const perseids = byName('Perseids')
    expect(Object.isFrozen(perseids.peak)).toBe(true)
    expect(Object.isFrozen(perseids.start)).toBe(true)
    expect(Reflect.set(perseids.peak, 'day', 1)).toBe(false)
    expect(perseids.peak).toEqual({ month: 8, day: 12 })
  })
})
