/**
 * math — Core numerical utilities.
 *
 * All computation in this module is pure (no I/O, no state).
 * Every iterative routine carries an iteration cap and reports "no root"
 * instead of running unbounded.
 */

// ─── Angle utilities ─────────────────────────────────────────────────────────

/** Convert degrees to radians */
export const DEG2RAD = Math.PI / 180

/** Convert radians to degrees */
export const RAD2DEG = 180 / Math.PI

/** Normalize an angle in degrees to [0, 360) */
export function mod360(deg: number): number {
  return ((deg % 360) + 360) % 360
}

/** Normalize an angle in degrees to [-180, 180) */
export function normalizeDeg180(deg: number): number {
  deg = mod360(deg)
  return deg >= 180 ? deg - 360 : deg
}

/** sin of an angle in degrees */
export function sind(deg: number): number {
  return Math.sin(deg * DEG2RAD)
}

/** cos of an angle in degrees */
export function cosd(deg: number): number {
  return Math.cos(deg * DEG2RAD)
}

/** Clamp x into [lo, hi] */
export function clamp(x: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, x))
}

/** Positive remainder of x / m for any sign of x */
export function modPositive(x: number, m: number): number {
  return ((x % m) + m) % m
}

// ─── Root finding ─────────────────────────────────────────────────────────────

export interface BisectOptions {
  /** Stop when the bracket is narrower than this (same unit as t) */
  tolerance: number
  /** Hard cap on halvings */
  maxIterations?: number
}

/**
 * Find a root of f(t) in [a, b] by bisection.
 * Requires f(a) and f(b) to have opposite signs (or one of them to be zero).
 *
 * @returns Root location, or null if the bracket does not contain a sign change
 */
export function bisect(
  f: (t: number) => number,
  a: number,
  b: number,
  { tolerance, maxIterations = 40 }: BisectOptions,
): number | null {
  let fa = f(a)
  const fb = f(b)

  if (fa === 0) return a
  if (fb === 0) return b
  if (fa * fb > 0) return null

  let lo = a
  let hi = b
  for (let i = 0; i < maxIterations && hi - lo > tolerance; i++) {
    const mid = (lo + hi) / 2
    const fm = f(mid)
    if (fm === 0) return mid
    if (fa * fm < 0) {
      hi = mid
    } else {
      lo = mid
      fa = fm
    }
  }
  return (lo + hi) / 2
}

/** A sign change of f located by {@link findCrossings} */
export interface Crossing {
  t: number
  /** 'up' when f goes from negative to positive */
  direction: 'up' | 'down'
}

/**
 * Find every sign change of f(t) in [a, b] by a fixed-step scan followed by
 * bisection inside each bracketing step. Crossings closer together than one
 * step may be missed; for rise/set work a 10-minute step is adequate.
 *
 * @param steps - Number of scan steps (default 144: 10 minutes over a day)
 */
export function findCrossings(
  f: (t: number) => number,
  a: number,
  b: number,
  tolerance: number,
  steps = 144,
): Crossing[] {
  const dt = (b - a) / steps
  const crossings: Crossing[] = []
  let tPrev = a
  let fPrev = f(a)

  for (let i = 1; i <= steps; i++) {
    const t = a + i * dt
    const ft = f(t)

    if ((fPrev < 0 && ft >= 0) || (fPrev >= 0 && ft < 0)) {
      const root = bisect(f, tPrev, t, { tolerance })
      if (root !== null) {
        crossings.push({ t: root, direction: fPrev < 0 ? 'up' : 'down' })
      }
    }

    tPrev = t
    fPrev = ft
  }

  return crossings
}
