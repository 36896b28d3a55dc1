/**
 * Prose for screen readers. Each domain contributes at most a sentence or two;
 * a domain with nothing to report says nothing, and unavailable domains are
 * named once in a closing caveat.
 */

import { eclipseLabel, joinWithAnd } from '../eclipses/index.js'
import { PHASE_DISPLAY } from '../lunar/index.js'
import { formatLocalTime } from '../time/index.js'
import type {
  DarkSkyWindow,
  Domain,
  DomainResults,
  EclipseOutlook,
  IssPass,
  MeteorOutlook,
  MoonState,
  PlanetVisibility,
  ScoreResult,
  SkyEvent,
  SourceResult,
  SpaceWeather,
  SunTimes,
  WeatherConditions,
} from '../types.js'
import { DOMAINS } from '../types.js'

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

const DOMAIN_LABELS: Record<Domain, string> = {
  sun: 'sun',
  moon: 'moon',
  planets: 'planet',
  meteors: 'meteor shower',
  eclipses: 'eclipse',
  spaceWeather: 'space weather',
  weather: 'weather',
  iss: 'ISS',
}

/** Domains a tonight summary draws on */
export const TONIGHT_DOMAINS: readonly Domain[] = ['sun', 'moon', 'planets', 'meteors', 'spaceWeather', 'weather', 'iss']

const valueOf = <T>(result: SourceResult<T>): T | null =>
  result.provenance === 'unavailable' ? null : result.value

const capitalize = (text: string) => text.charAt(0).toUpperCase() + text.slice(1)

/** "2025-01-16" → "January 16, 2025" */
export function formatLongDate(ymd: string): string {
  const [year, month, day] = ymd.split('-').map(Number)
  const name = MONTHS[(month ?? 1) - 1] ?? ''
  return `${name} ${day ?? ''}, ${year ?? ''}`
}

/** 503.4 → "8h 23m" */
export function formatDuration(minutes: number): string {
  const total = Math.round(minutes)
  return `${Math.floor(total / 60)}h ${total % 60}m`
}

const withArticle = (phrase: string) => `${/^[aeiou]/i.test(phrase) ? 'an' : 'a'} ${phrase}`

const timeOf = (event: SkyEvent, offset: number): string | null =>
  event.type === 'at' ? formatLocalTime(event.time, offset) : null

// ─── Sentences ────────────────────────────────────────────────────────────────

export function sunSentence(sun: SunTimes, offset: number): string | null {
  const rise = timeOf(sun.sunrise, offset)
  const set = timeOf(sun.sunset, offset)
  if (rise && set) {
    const length = sun.dayLengthMinutes !== null ? ` (${formatDuration(sun.dayLengthMinutes)} of daylight)` : ''
    return `Sunrise at ${rise}, sunset at ${set}${length}.`
  }
  if (rise) return `Sunrise at ${rise}.`
  if (set) return `Sunset at ${set}.`
  if (sun.sunrise.type === 'none' && sun.sunrise.reason === 'always-above') return 'The Sun stays up all day.'
  if (sun.sunrise.type === 'none' && sun.sunrise.reason === 'always-below') return 'The Sun does not rise today.'
  return null
}

export function darknessSentence(sun: SunTimes, offset: number): string | null {
  const dusk = sun.astronomicalDusk
  if (dusk.type === 'at') return `Full darkness begins at ${formatLocalTime(dusk.time, offset)}.`
  if (dusk.type === 'none' && dusk.reason === 'always-above') return 'The sky does not get fully dark tonight.'
  return null
}

export function darkWindowSentence(window: DarkSkyWindow, offset: number): string | null {
  if (window.type === 'window') {
    const minutes = (window.end.getTime() - window.start.getTime()) / 60_000
    return `Full darkness lasts ${formatDuration(minutes)}, until ${formatLocalTime(window.end, offset)}; `
      + `the darkest point is around ${formatLocalTime(window.bestTime, offset)}.`
  }
  if (window.type === 'none' && window.reason === 'always-dark') return 'It stays fully dark around the clock.'
  return null
}

export function moonSentence(moon: MoonState, offset: number): string {
  const parts = [`The Moon is in its ${PHASE_DISPLAY[moon.phase]} phase, ${Math.round(moon.illumination * 100)}% illuminated`]
  const rise = timeOf(moon.rise, offset)
  const set = timeOf(moon.set, offset)
  const times = [rise && `rises at ${rise}`, set && `sets at ${set}`].filter((t): t is string => Boolean(t))
  if (times.length > 0) parts.push(`; it ${times.join(' and ')}`)
  return `${parts.join('')}.`
}

export function eclipseSentences(outlook: EclipseOutlook): string[] {
  const out: string[] = []
  if (outlook.today) {
    out.push(`Eclipse today: ${withArticle(eclipseLabel(outlook.today))}. ${outlook.today.visibility}.`)
  }
  const next = outlook.upcoming[0]
  if (next) out.push(`The next eclipse is ${withArticle(eclipseLabel(next))} on ${formatLongDate(next.date)}.`)
  return out
}

export function planetSentence(planets: readonly PlanetVisibility[]): string | null {
  const names = planets.filter(p => p.visible).map(p => p.name)
  if (names.length === 0) return null
  if (names.length === 1) return `${names[0] ?? ''} is visible tonight.`
  if (names.length === 2) return `${joinWithAnd(names)} are visible tonight.`
  return `Visible planets tonight: ${joinWithAnd(names)}.`
}

export function meteorSentence(outlook: MeteorOutlook): string | null {
  const [first, ...rest] = outlook.active
  if (first) {
    if (rest.length === 0) {
      return `The ${first.shower.name} meteor shower is active, about ${first.effectiveZhr} meteors per hour (${first.rating}).`
    }
    return `Active meteor showers: ${joinWithAnd(outlook.active.map(a => a.shower.name))}.`
  }
  const next = outlook.upcoming[0]
  if (!next) return null
  const when = next.daysToPeak === 1 ? 'tomorrow' : `in ${next.daysToPeak} days`
  return `The ${next.shower.name} meteor shower peaks ${when}.`
}

/** Passes beyond this many are counted but not listed */
const LISTED_ISS_PASSES = 4

export function issSentence(passes: readonly IssPass[], offset: number): string | null {
  const [first, ...rest] = passes
  if (!first) return null
  if (rest.length === 0) {
    const minutes = Math.max(1, Math.round(first.durationSeconds / 60))
    return `The ISS passes over at ${formatLocalTime(first.rise, offset)}, rising in the ${first.riseDirection} `
      + `and reaching ${Math.round(first.maxElevationDeg)}° for about ${minutes} minute${minutes === 1 ? '' : 's'}.`
  }
  const times = passes.slice(0, LISTED_ISS_PASSES).map(pass => formatLocalTime(pass.rise, offset))
  const more = passes.length > LISTED_ISS_PASSES ? ', among others' : ''
  return `The ISS makes ${passes.length} visible passes, at ${joinWithAnd(times)}${more}.`
}

export function spaceWeatherSentences(space: SpaceWeather): string[] {
  const out: string[] = []
  const kp = space.kp.toFixed(1)
  if (space.kp >= 5) out.push(`Space weather: ${space.activity} (Kp ${kp}).`)
  else if (space.kp >= 4) out.push(`Geomagnetic activity is elevated (Kp ${kp}).`)
  if (space.auroraVisible) out.push('Aurora may be visible from your location.')
  if (space.solarWindElevated && space.solarWindSpeed !== null) {
    out.push(`The solar wind is elevated at ${Math.round(space.solarWindSpeed)} km/s.`)
  }
  return out
}

export function weatherSentence(weather: WeatherConditions): string {
  return `Cloud cover tonight: ${weather.category} (${Math.round(weather.cloudCover)}%).`
}

export function scoreSentences(score: ScoreResult): string[] {
  if (score.status !== 'scored') return []
  const out = [`Viewing conditions: ${score.category} (${score.score} out of 100).`]
  const tip = score.recommendations[0]
  if (tip) out.push(`${tip}.`)
  return out
}

export function caveatSentence(results: DomainResults, domains: readonly Domain[] = DOMAINS): string | null {
  const missing = domains.filter(domain => results[domain].provenance === 'unavailable')
  if (missing.length === 0) return null
  const labels = missing.map(domain => DOMAIN_LABELS[domain])
  const verb = labels.length === 1 ? 'is' : 'are'
  return `${capitalize(joinWithAnd(labels))} data ${verb} unavailable right now.`
}

// ─── Narratives ───────────────────────────────────────────────────────────────

export function briefingNarrative(args: {
  localDate: string
  offset: number
  results: DomainResults
  score: ScoreResult
}): string {
  const { localDate, offset, results, score } = args
  const sun = valueOf(results.sun)
  const moon = valueOf(results.moon)
  const planets = valueOf(results.planets)
  const meteors = valueOf(results.meteors)
  const eclipses = valueOf(results.eclipses)
  const space = valueOf(results.spaceWeather)
  const weather = valueOf(results.weather)
  const iss = valueOf(results.iss)
  // Upcoming peaks belong to the showers listing, not the day's report
  const activeOnly: MeteorOutlook | null = meteors && { active: meteors.active, upcoming: [] }

  const sentences: Array<string | null> = [
    `Sky briefing for ${formatLongDate(localDate)}.`,
    sun && sunSentence(sun, offset),
    sun && darknessSentence(sun, offset),
    moon && moonSentence(moon, offset),
    ...(eclipses ? eclipseSentences(eclipses) : []),
    planets && planetSentence(planets),
    activeOnly && meteorSentence(activeOnly),
    iss && issSentence(iss, offset),
    ...(space ? spaceWeatherSentences(space) : []),
    weather && weatherSentence(weather),
    ...scoreSentences(score),
    caveatSentence(results),
  ]
  return sentences.filter((s): s is string => Boolean(s)).join(' ')
}

export function tonightNarrative(args: {
  offset: number
  results: DomainResults
  window: DarkSkyWindow
  score: ScoreResult
}): string {
  const { offset, results, window, score } = args
  const sun = valueOf(results.sun)
  const moon = valueOf(results.moon)
  const planets = valueOf(results.planets)
  const meteors = valueOf(results.meteors)
  const space = valueOf(results.spaceWeather)
  const weather = valueOf(results.weather)
  const iss = valueOf(results.iss)

  const activeOnly: MeteorOutlook | null = meteors && { active: meteors.active, upcoming: [] }

  const sentences: Array<string | null> = [
    ...scoreSentences(score),
    sun && darknessSentence(sun, offset),
    darkWindowSentence(window, offset),
    moon && moonSentence(moon, offset),
    planets && planetSentence(planets),
    activeOnly && meteorSentence(activeOnly),
    iss && issSentence(iss, offset),
    space?.auroraVisible ? 'Aurora may be visible from your location.' : null,
    weather && weatherSentence(weather),
    caveatSentence(results, TONIGHT_DOMAINS),
  ]
  const text = sentences.filter((s): s is string => Boolean(s)).join(' ')
  return text.length > 0 ? `Tonight: ${text}` : 'Tonight: no sky data is available right now.'
}
