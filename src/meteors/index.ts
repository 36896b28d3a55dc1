/**
 * meteors — Annual meteor shower calendar.
 *
 * The calendar lives in data/meteor-showers.json and is read and validated
 * once when this module loads. Dates carry no year: a window whose end
 * precedes its start (e.g. Dec 28 - Jan 12) wraps across New Year.
 *
 * References:
 *   International Meteor Organization — Meteor Shower Calendar
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { deepFreeze } from '../freeze/index.js'
import { daysBetween } from '../time/index.js'
import type { MeteorOutlook, MeteorShower, MonthDay, ShowerActivity, ShowerRating } from '../types.js'

// ─── Calendar ─────────────────────────────────────────────────────────────────

const monthDaySchema = z.object({
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
})

const showerSchema = z.object({
  name: z.string().min(1),
  start: monthDaySchema,
  end: monthDaySchema,
  peak: monthDaySchema,
  zhr: z.number().positive(),
  parentBody: z.string(),
  radiant: z.string(),
  speedKmS: z.number().positive(),
})

/** Parse and deep-freeze a shower table; throws on any malformed entry. */
export function parseShowerTable(raw: unknown): readonly MeteorShower[] {
  const showers: readonly MeteorShower[] = z.array(showerSchema).min(1).parse(raw)
  return deepFreeze(showers)
}

function loadShowerTable(): readonly MeteorShower[] {
  const path = fileURLToPath(new URL('../../data/meteor-showers.json', import.meta.url))
  return parseShowerTable(JSON.parse(readFileSync(path, 'utf8')))
}

/** The major annual showers */
export const METEOR_SHOWERS: readonly MeteorShower[] = loadShowerTable()

// ─── Predicates ───────────────────────────────────────────────────────────────

function ordinal({ month, day }: MonthDay): number {
  return month * 100 + day
}

/**
 * Whether the shower is active on the UTC calendar date of `date`,
 * window ends inclusive.
 */
export function isShowerActive(shower: MeteorShower, date: Date): boolean {
  const today = ordinal({ month: date.getUTCMonth() + 1, day: date.getUTCDate() })
  const start = ordinal(shower.start)
  const end = ordinal(shower.end)
  return start <= end
    ? today >= start && today <= end
    : today >= start || today <= end
}

/** Signed days from the UTC date of `date` to the nearest occurrence of the shower's peak. */
export function daysToPeak(shower: MeteorShower, date: Date): number {
  const year = date.getUTCFullYear()
  let best: number | null = null
  for (const y of [year - 1, year, year + 1]) {
    const peak = new Date(Date.UTC(y, shower.peak.month - 1, shower.peak.day))
    const diff = daysBetween(date, peak)
    if (best === null || Math.abs(diff) < Math.abs(best)) best = diff
  }
  return best ?? 0
}

/** ZHR scaled by distance from the peak: ×1 on the day, ×0.7 within 2, ×0.4 within 5, else ×0.2. */
export function effectiveZhr(zhr: number, daysFromPeak: number): number {
  const off = Math.abs(daysFromPeak)
  if (off === 0) return zhr
  if (off <= 2) return zhr * 0.7
  if (off <= 5) return zhr * 0.4
  return zhr * 0.2
}

export function showerRating(effective: number): ShowerRating {
  if (effective >= 80) return 'Excellent'
  if (effective >= 40) return 'Good'
  if (effective >= 15) return 'Fair'
  return 'Poor'
}

/** Activity summary of one shower on a date. */
export function showerActivity(shower: MeteorShower, date: Date): ShowerActivity {
  const days = daysToPeak(shower, date)
  const effective = effectiveZhr(shower.zhr, days)
  return {
    shower,
    daysToPeak: days,
    effectiveZhr: Math.round(effective),
    rating: showerRating(effective),
  }
}

/**
 * Showers active on `date` (strongest first), plus inactive showers peaking
 * within `lookaheadDays` (soonest first).
 */
export function meteorOutlook(
  date: Date,
  lookaheadDays: number,
  showers: readonly MeteorShower[] = METEOR_SHOWERS,
): MeteorOutlook {
  const active: ShowerActivity[] = []
  const upcoming: ShowerActivity[] = []
  for (const shower of showers) {
    const activity = showerActivity(shower, date)
    if (isShowerActive(shower, date)) {
      active.push(activity)
    } else if (activity.daysToPeak > 0 && activity.daysToPeak <= lookaheadDays) {
      upcoming.push(activity)
    }
  }
  active.sort((a, b) => b.effectiveZhr - a.effectiveZhr || Math.abs(a.daysToPeak) - Math.abs(b.daysToPeak))
  upcoming.sort((a, b) => a.daysToPeak - b.daysToPeak)
  return { active, upcoming }
}
