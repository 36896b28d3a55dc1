/**
 * eclipses — Solar and lunar eclipse calendar, 2025-2030.
 *
 * Eclipse prediction is out of scope; the table in data/eclipses.json is taken
 * from published canons and filtered by date. Extend the file to cover later
 * years.
 *
 * References:
 *   Espenak & Meeus — Five Millennium Canon of Solar Eclipses (NASA TP-2006-214141)
 *   Espenak & Meeus — Five Millennium Canon of Lunar Eclipses (NASA TP-2009-214172)
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { deepFreeze } from '../freeze/index.js'
import { dateFromYMD, daysBetween } from '../time/index.js'
import type { EclipseEvent, EclipseOutlook } from '../types.js'

// ─── Calendar ─────────────────────────────────────────────────────────────────

const eclipseSchema = z.object({
  body: z.enum(['solar', 'lunar']),
  type: z.enum(['total', 'partial', 'annular', 'hybrid', 'penumbral']),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  maximum: z.string().datetime(),
  durationMinutes: z.number().positive().nullable(),
  magnitude: z.number().nonnegative(),
  regions: z.array(z.string()),
  notes: z.string().nullable(),
})

/**
 * Parse, sort by date and deep-freeze an eclipse table; throws on any malformed
 * entry. The `maximum` Dates stay table-owned: {@link eclipseOutlook} hands out copies.
 */
export function parseEclipseTable(raw: unknown): readonly EclipseEvent[] {
  const rows = z.array(eclipseSchema).parse(raw)
  const events = rows.map((row): EclipseEvent => ({
    ...row,
    maximum: new Date(row.maximum),
    visibility: describeVisibility(row.regions),
  }))
  events.sort((a, b) => a.maximum.getTime() - b.maximum.getTime())
  return deepFreeze(events)
}

/** A caller-owned copy of a table entry */
const copyOf = (event: EclipseEvent): EclipseEvent => ({ ...event, maximum: new Date(event.maximum.getTime()) })

function loadEclipseTable(): readonly EclipseEvent[] {
  const path = fileURLToPath(new URL('../../data/eclipses.json', import.meta.url))
  return parseEclipseTable(JSON.parse(readFileSync(path, 'utf8')))
}

/** Every tabulated eclipse, soonest first */
export const ECLIPSES: readonly EclipseEvent[] = loadEclipseTable()

// ─── Presentation ─────────────────────────────────────────────────────────────

/** "Visible from Americas, Europe and Africa" */
export function describeVisibility(regions: readonly string[]): string {
  if (regions.length === 0) return 'Visibility region not listed'
  return `Visible from ${joinWithAnd(regions)}`
}

/** "A, B and C" */
export function joinWithAnd(items: readonly string[]): string {
  if (items.length <= 1) return items.join('')
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`
}

/** "total solar eclipse" */
export function eclipseLabel(event: Pick<EclipseEvent, 'body' | 'type'>): string {
  return `${event.type} ${event.body} eclipse`
}

// ─── Predicates ───────────────────────────────────────────────────────────────

/**
 * Whether the eclipse falls within [date, date + horizonDays], comparing
 * UTC calendar dates, both ends inclusive.
 */
export function isEclipseUpcoming(event: EclipseEvent, date: Date, horizonDays: number): boolean {
  const days = daysBetween(date, dateFromYMD(event.date))
  return days >= 0 && days <= horizonDays
}

/**
 * The eclipse on `date` (if any) and those after it within `horizonDays`.
 */
export function eclipseOutlook(
  date: Date,
  horizonDays: number,
  eclipses: readonly EclipseEvent[] = ECLIPSES,
): EclipseOutlook {
  let today: EclipseEvent | null = null
  const upcoming: EclipseEvent[] = []
  for (const event of eclipses) {
    if (!isEclipseUpcoming(event, date, horizonDays)) continue
    if (daysBetween(date, dateFromYMD(event.date)) === 0) {
      today ??= copyOf(event)
    } else {
      upcoming.push(copyOf(event))
    }
  }
  return { today, upcoming, horizonDays }
}
