/**
 * Command implementations, separated from process wiring so they can be
 * driven with an injected output and network.
 */

import { toDict } from '../briefing/index.js'
import { describeVisibility, eclipseLabel, eclipseOutlook } from '../eclipses/index.js'
import { LIVE_DOMAINS } from '../config/index.js'
import type { ConfigOverrides, LiveDomain } from '../config/index.js'
import { SkyBriefingError } from '../errors/index.js'
import {
  illuminationFraction,
  moonAgeDays,
  moonPhaseAngle,
  phaseNameForAngle,
  PHASE_DISPLAY,
  upcomingMoonPhases,
} from '../lunar/index.js'
import { meteorOutlook } from '../meteors/index.js'
import { aggregate, tonight } from '../orchestrator/index.js'
import type { AggregateOptions } from '../orchestrator/index.js'
import type { FetchJson } from '../sources/index.js'
import { dateFromYMD, MS_PER_HOUR, parseInstant, utcOffsetHours } from '../time/index.js'
import { DOMAINS } from '../types.js'
import type { GeoLocation, SourceResult } from '../types.js'

export interface CliIO {
  out(line: string): void
  err(line: string): void
  env?: Record<string, string | undefined>
  fetchJson?: FetchJson
  /** Clock for defaults; tests pin it */
  now?: () => Date
}

const USAGE = `sky-briefing — What is happening in the sky, and is it worth looking up

Commands:
  briefing <lat> <lon> [when]   Full daily briefing as prose
  tonight <lat> <lon> [when]    Evening summary as prose
  json <lat> <lon> [when]       Full daily briefing as JSON
  phase [when]                  Moon phase and the next principal phases
  showers [date]                Active and upcoming meteor showers
  eclipses [date]               Eclipses in the coming year

  when: ISO 8601 instant with zone (2025-03-20T21:00:00Z) or YYYY-MM-DD (22:00 local)
  date: YYYY-MM-DD (default today)

Options:
  --offline          Use local computation only
  --tz <hours>       UTC offset of the local day (default longitude / 15)
  --timeout <ms>     Per-request timeout

Environment:
  SKY_BRIEFING_N2YO_API_KEY   Enables ISS pass predictions
  SKY_BRIEFING_OFFLINE=1      Same as --offline

Examples:
  sky-briefing briefing 51.5 -0.1
  sky-briefing tonight 40.71 -74.01 2025-08-12 --tz -4
  sky-briefing showers 2025-12-10`

/** Days the showers command looks ahead for peaks */
const SHOWER_LIST_DAYS = 30

/** Days the eclipses command looks ahead */
const ECLIPSE_LIST_DAYS = 365

/** Local hour a bare date stands for in location commands */
const EVENING_HOUR = 22

class UsageError extends SkyBriefingError {}

interface ParsedArgs {
  positional: string[]
  offline: boolean
  tz: number | undefined
  timeoutMs: number | undefined
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positional: [], offline: false, tz: undefined, timeoutMs: undefined }
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? ''
    if (arg === '--offline') {
      parsed.offline = true
    } else if (arg === '--tz' || arg === '--timeout') {
      const value = Number(argv[++i])
      if (!Number.isFinite(value)) throw new UsageError(`${arg} needs a number`)
      if (arg === '--tz') parsed.tz = value
      else parsed.timeoutMs = value
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option ${arg}`)
    } else {
      parsed.positional.push(arg)
    }
  }
  return parsed
}

function parseLocation(args: ParsedArgs, command: string): GeoLocation {
  const [latText, lonText] = args.positional
  const latitude = Number(latText)
  const longitude = Number(lonText)
  if (latText === undefined || lonText === undefined || Number.isNaN(latitude) || Number.isNaN(longitude)) {
    throw new UsageError(`Usage: sky-briefing ${command} <lat> <lon> [when]`)
  }
  return args.tz === undefined ? { latitude, longitude } : { latitude, longitude, utcOffsetHours: args.tz }
}

/** ISO instant as given; a bare date becomes that evening at the location */
function parseWhen(text: string | undefined, location: GeoLocation | null, now: Date): Date {
  if (text === undefined) return now
  if (/^\d{4}-\d{2}-\d{2}$/.test(text)) {
    const offset = location ? utcOffsetHours(location) : 0
    return new Date(dateFromYMD(text).getTime() + (EVENING_HOUR - offset) * MS_PER_HOUR)
  }
  return parseInstant(text)
}

function parseDate(text: string | undefined, now: Date): Date {
  if (text === undefined) return dateFromYMD(now.toISOString().slice(0, 10))
  return dateFromYMD(text)
}

function aggregateOptions(args: ParsedArgs, io: CliIO): AggregateOptions {
  const config: ConfigOverrides = {}
  if (args.timeoutMs !== undefined) config.timeoutMs = args.timeoutMs
  if (args.offline) {
    const live: Partial<Record<LiveDomain, boolean>> = {}
    for (const domain of LIVE_DOMAINS) live[domain] = false
    config.live = live
  }
  return { config, env: io.env, fetchJson: io.fetchJson }
}

function describeSource(result: SourceResult<unknown>): string {
  switch (result.provenance) {
    case 'live':
      return `live (${result.source})`
    case 'local-fallback':
      return result.liveFailure ? `local (live ${result.liveFailure})` : 'local'
    case 'unavailable':
      return `unavailable (${result.reason})`
  }
}

// ─── Commands ─────────────────────────────────────────────────────────────────

async function cmdBriefing(args: ParsedArgs, io: CliIO, now: Date): Promise<void> {
  const location = parseLocation(args, 'briefing')
  const briefing = await aggregate(location, parseWhen(args.positional[2], location, now), aggregateOptions(args, io))
  io.out(briefing.narrative)
  io.out('')
  io.out('Sources:')
  for (const domain of DOMAINS) {
    io.out(`  ${domain.padEnd(13)} ${describeSource(briefing.results[domain])}`)
  }
}

async function cmdTonight(args: ParsedArgs, io: CliIO, now: Date): Promise<void> {
  const location = parseLocation(args, 'tonight')
  const summary = await tonight(location, parseWhen(args.positional[2], location, now), aggregateOptions(args, io))
  io.out(summary.narrative)
}

async function cmdJson(args: ParsedArgs, io: CliIO, now: Date): Promise<void> {
  const location = parseLocation(args, 'json')
  const briefing = await aggregate(location, parseWhen(args.positional[2], location, now), aggregateOptions(args, io))
  io.out(JSON.stringify(toDict(briefing), null, 2))
}

/** "  Label:        value" with values aligned */
const row = (label: string, value: string) => `  ${`${label}:`.padEnd(15)}${value}`

function cmdPhase(args: ParsedArgs, io: CliIO, now: Date): void {
  const instant = parseWhen(args.positional[0], null, now)
  const angle = moonPhaseAngle(instant)
  io.out(`Moon phase at ${instant.toISOString().slice(0, 16)} UTC:`)
  io.out(row('Phase', PHASE_DISPLAY[phaseNameForAngle(angle)]))
  io.out(row('Illumination', `${(illuminationFraction(angle) * 100).toFixed(1)}%`))
  io.out(row('Age', `${moonAgeDays(instant).toFixed(1)} days`))
  for (const event of upcomingMoonPhases(instant)) {
    io.out(row(PHASE_DISPLAY[event.phase], `${event.time.toISOString().slice(0, 16)} UTC`))
  }
}

function cmdShowers(args: ParsedArgs, io: CliIO, now: Date): void {
  const date = parseDate(args.positional[0], now)
  const outlook = meteorOutlook(date, SHOWER_LIST_DAYS)
  const day = date.toISOString().slice(0, 10)
  if (outlook.active.length === 0) io.out(`No meteor showers active on ${day}.`)
  for (const a of outlook.active) {
    const when = a.daysToPeak === 0 ? 'peaks today' : a.daysToPeak > 0 ? `peaks in ${a.daysToPeak} d` : `peaked ${-a.daysToPeak} d ago`
    io.out(`Active:   ${a.shower.name}, ${when}, ~${a.effectiveZhr}/h (${a.rating})`)
  }
  for (const a of outlook.upcoming) {
    io.out(`Upcoming: ${a.shower.name}, peaks in ${a.daysToPeak} d, ZHR ${a.shower.zhr}`)
  }
}

function cmdEclipses(args: ParsedArgs, io: CliIO, now: Date): void {
  const date = parseDate(args.positional[0], now)
  const outlook = eclipseOutlook(date, ECLIPSE_LIST_DAYS)
  const events = outlook.today ? [outlook.today, ...outlook.upcoming] : outlook.upcoming
  if (events.length === 0) {
    io.out(`No eclipses listed within ${ECLIPSE_LIST_DAYS} days.`)
    return
  }
  for (const event of events) {
    io.out(`${event.date}  ${eclipseLabel(event)}. ${describeVisibility(event.regions)}.`)
  }
}

/** Run one command; resolves with the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const [command, ...rest] = argv
  const now = io.now?.() ?? new Date()
  try {
    const args = parseArgs(rest)
    switch (command) {
      case 'briefing':
        await cmdBriefing(args, io, now)
        return 0
      case 'tonight':
        await cmdTonight(args, io, now)
        return 0
      case 'json':
        await cmdJson(args, io, now)
        return 0
      case 'phase':
        cmdPhase(args, io, now)
        return 0
      case 'showers':
        cmdShowers(args, io, now)
        return 0
      case 'eclipses':
        cmdEclipses(args, io, now)
        return 0
      case undefined:
      case 'help':
      case '--help':
        io.out(USAGE)
        return 0
      default:
        io.err(`Unknown command: ${command}`)
        io.err(USAGE)
        return 1
    }
  } catch (err) {
    if (!(err instanceof SkyBriefingError)) throw err
    io.err(err.message)
    return 1
  }
}
