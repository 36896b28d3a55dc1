/**
 * briefing — Assemble the per-domain results and the score into the report
 * records. Stateless; every call builds fresh, deeply frozen values. The
 * per-domain values and the score passed in are frozen in place.
 */

import { deepFreeze } from '../freeze/index.js'
import { darkSkyWindow, nextAstronomicalDawn } from '../solar/index.js'
import { localDateString, utcOffsetHours } from '../time/index.js'
import type {
  DailyBriefing,
  DomainResults,
  GeoLocation,
  ProvenanceSummary,
  ScoreResult,
  SkyEvent,
  TonightSummary,
} from '../types.js'
import { briefingNarrative, tonightNarrative } from './narrative.js'

export { toDict, toTonightDict, snakeCase } from './dict.js'
export type { Dict, DictValue } from './dict.js'
export {
  briefingNarrative,
  caveatSentence,
  darkWindowSentence,
  formatDuration,
  formatLongDate,
  issSentence,
  tonightNarrative,
  TONIGHT_DOMAINS,
} from './narrative.js'

export function provenanceSummary(results: DomainResults): ProvenanceSummary {
  return {
    sun: results.sun.provenance,
    moon: results.moon.provenance,
    planets: results.planets.provenance,
    meteors: results.meteors.provenance,
    eclipses: results.eclipses.provenance,
    spaceWeather: results.spaceWeather.provenance,
    weather: results.weather.provenance,
    iss: results.iss.provenance,
  }
}

export interface BriefingInputs {
  location: GeoLocation
  instant: Date
  results: DomainResults
  score: ScoreResult
}

export function buildBriefing({ location, instant, results, score }: BriefingInputs): DailyBriefing {
  const offset = utcOffsetHours(location)
  const localDate = localDateString(instant, offset)
  return deepFreeze({
    location: { ...location },
    instant: new Date(instant.getTime()),
    localDate,
    results: { ...results },
    provenance: provenanceSummary(results),
    score,
    narrative: briefingNarrative({ localDate, offset, results, score }),
  })
}

/**
 * The evening-focused projection of a briefing. The dark-sky window opens at
 * the reported dusk and closes at the next morning's dawn from the local solar model.
 */
export function toTonightSummary(briefing: DailyBriefing): TonightSummary {
  const { results, location } = briefing
  const offset = utcOffsetHours(location)

  const darknessBegins: SkyEvent = results.sun.provenance === 'unavailable'
    ? { type: 'unreported' }
    : results.sun.value.astronomicalDusk
  const nextDawn: SkyEvent = darknessBegins.type === 'at'
    ? nextAstronomicalDawn(location, briefing.instant)
    : { type: 'unreported' }
  const window = darkSkyWindow(darknessBegins, nextDawn)
  const visiblePlanets = results.planets.provenance === 'unavailable'
    ? []
    : results.planets.value.filter(p => p.visible).map(p => p.name)
  const activeShowers = results.meteors.provenance === 'unavailable'
    ? []
    : results.meteors.value.active.map(a => a.shower.name)
  const auroraVisible = results.spaceWeather.provenance === 'unavailable'
    ? null
    : results.spaceWeather.value.auroraVisible

  return deepFreeze({
    location,
    instant: briefing.instant,
    localDate: briefing.localDate,
    moon: results.moon,
    darknessBegins,
    darkSkyWindow: window,
    visiblePlanets,
    activeShowers,
    auroraVisible,
    score: briefing.score,
    narrative: tonightNarrative({ offset, results, window, score: briefing.score }),
  })
}
