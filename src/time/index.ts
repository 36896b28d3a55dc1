/**
 * time — Julian Date arithmetic and local-day bookkeeping.
 *
 * Everything downstream works in UTC instants. The only notion of "local" is the
 * calendar day, which is the UTC instant shifted by a whole-or-fractional hour
 * offset. The offset comes from the location (explicit, or round(lon / 15)).
 *
 * Time scales: the low-order series used in this package are insensitive to
 * the ~70 s difference between UT and TT, so a single Julian Date (UTC) drives
 * both Earth rotation and the orbital arguments.
 *
 * References:
 *   Meeus, Astronomical Algorithms (2nd ed.) — Chapter 7, Julian Day
 */

import { InvalidInputError } from '../errors/index.js'
import type { GeoLocation } from '../types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Julian Date of J2000.0 epoch (2000 Jan 1, 12:00) */
export const J2000 = 2451545.0

/** Julian Date of the Unix epoch (1970 Jan 1, 00:00 UTC) */
export const JD_UNIX_EPOCH = 2440587.5

/** Milliseconds per day */
export const MS_PER_DAY = 86_400_000

/** Milliseconds per hour */
export const MS_PER_HOUR = 3_600_000

/** Days per Julian century */
export const DAYS_PER_JULIAN_CENTURY = 36525.0

// ─── Julian Date ──────────────────────────────────────────────────────────────

/** Convert a JS Date to Julian Date (UTC). */
export function dateToJD(date: Date): number {
  return date.getTime() / MS_PER_DAY + JD_UNIX_EPOCH
}

/** Convert a Julian Date (UTC) to a JS Date. */
export function jdToDate(jd: number): Date {
  return new Date((jd - JD_UNIX_EPOCH) * MS_PER_DAY)
}

/** Julian centuries since J2000.0 */
export function julianCenturies(jd: number): number {
  return (jd - J2000) / DAYS_PER_JULIAN_CENTURY
}

// ─── Instants ─────────────────────────────────────────────────────────────────

const ZONED_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i

/**
 * Parse an ISO 8601 instant. The string must name its zone (`Z` or `±hh:mm`):
 * a wall-clock time without a zone is not a point in time.
 */
export function parseInstant(text: string): Date {
  if (!ZONED_ISO.test(text.trim())) {
    throw new InvalidInputError(
      `Instant "${text}" must be ISO 8601 with a zone designator, e.g. 2025-03-20T12:00:00Z`,
    )
  }
  const date = new Date(text.trim())
  assertValidInstant(date)
  return date
}

/** Throw InvalidInputError unless the Date holds a real time value. */
export function assertValidInstant(date: Date): void {
  if (!(date instanceof Date) || isNaN(date.getTime())) {
    throw new InvalidInputError('Instant is not a valid date')
  }
}

// ─── Local day ────────────────────────────────────────────────────────────────

/** Hours east of UTC used to define the location's calendar day. */
export function utcOffsetHours(location: GeoLocation): number {
  return location.utcOffsetHours ?? Math.round(location.longitude / 15)
}

/** UTC instant of local midnight starting the local day that contains `instant`. */
export function localDayStart(instant: Date, offsetHours: number): Date {
  const shifted = instant.getTime() + offsetHours * MS_PER_HOUR
  const midnight = Math.floor(shifted / MS_PER_DAY) * MS_PER_DAY
  return new Date(midnight - offsetHours * MS_PER_HOUR)
}

/** Local calendar fields of an instant, via a shifted UTC Date. */
export function localFields(instant: Date, offsetHours: number): {
  year: number
  month: number
  day: number
  weekday: number
  hours: number
  minutes: number
} {
  const shifted = new Date(instant.getTime() + offsetHours * MS_PER_HOUR)
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    weekday: shifted.getUTCDay(),
    hours: shifted.getUTCHours(),
    minutes: shifted.getUTCMinutes(),
  }
}

/** Local calendar date as YYYY-MM-DD */
export function localDateString(instant: Date, offsetHours: number): string {
  const { year, month, day } = localFields(instant, offsetHours)
  return `${year}-${pad2(month)}-${pad2(day)}`
}

/** The local calendar date of an instant, as a UTC-midnight Date */
export function localCalendarDate(instant: Date, offsetHours: number): Date {
  const { year, month, day } = localFields(instant, offsetHours)
  return new Date(Date.UTC(year, month - 1, day))
}

/** Local wall-clock time as HH:MM (24-hour), rounded to the nearest minute */
export function formatLocalTime(instant: Date, offsetHours: number): string {
  const rounded = new Date(Math.round(instant.getTime() / 60_000) * 60_000)
  const { hours, minutes } = localFields(rounded, offsetHours)
  return `${pad2(hours)}:${pad2(minutes)}`
}

/** Whole calendar days from the UTC date of `from` to the UTC date of `to` */
export function daysBetween(from: Date, to: Date): number {
  const a = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate())
  const b = Date.UTC(to.getUTCFullYear(), to.getUTCMonth(), to.getUTCDate())
  return Math.round((b - a) / MS_PER_DAY)
}

/** UTC midnight Date for a YYYY-MM-DD string */
export function dateFromYMD(ymd: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(ymd)
  if (!match) throw new InvalidInputError(`Invalid date: ${ymd}. Use YYYY-MM-DD format.`)
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])))
  assertValidInstant(date)
  return date
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n)
}
