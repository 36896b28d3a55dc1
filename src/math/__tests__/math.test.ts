import { describe, expect, it } from 'vitest'
import { bisect, clamp, findCrossings, mod360, modPositive, normalizeDeg180 } from '../index.js'

describe('angles', () => {
  it('wraps into [0, 360)', () => {
    expect(mod360(370)).toBe(10)
    expect(mod360(-30)).toBe(330)
  })

  it('wraps into [-180, 180)', () => {
    expect(normalizeDeg180(190)).toBe(-170)
    expect(normalizeDeg180(-190)).toBe(170)
  })

  it('keeps remainders positive', () => {
    expect(modPositive(-1, 8)).toBe(7)
    expect(clamp(120, 0, 100)).toBe(100)
  })
})

describe('bisect', () => {
  it('converges on a bracketed root', () => {
    const root = bisect(x => x * x - 2, 0, 2, { tolerance: 1e-9 })
    expect(root).toBeCloseTo(Math.SQRT2, 8)
  })

  it('returns null without a sign change', () => {
    expect(bisect(x => x * x + 1, -1, 1, { tolerance: 1e-6 })).toBeNull()
  })

  it('stops at the iteration cap', () => {
    let calls = 0
    bisect(x => { calls++; return x - 0.3 }, 0, 1, { tolerance: 0, maxIterations: 5 })
    expect(calls).toBe(2 + 5)
  })
})

describe('findCrossings', () => {
  it('finds both sign changes of a sine over a period with their directions', () => {
    const crossings = findCrossings(t => Math.sin(2 * Math.PI * t - 1), 0, 1, 1e-6)
    expect(crossings.map(c => c.direction)).toEqual(['up', 'down'])
    expect(crossings[0]?.t).toBeCloseTo(1 / (2 * Math.PI), 4)
    expect(crossings[1]?.t).toBeCloseTo((Math.PI + 1) / (2 * Math.PI), 4)
  })

  it('returns nothing for a function that stays positive', () => {
    expect(findCrossings(() => 1, 0, 1, 1e-6)).toEqual([])
  })
})
