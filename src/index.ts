/**
 * sky-briefing — What is happening in the sky at a place and time, and whether
 * it is worth looking up.
 *
 * Each domain (Sun, Moon, planets, meteor showers, eclipses, space weather,
 * weather, ISS passes) prefers a live source and falls back to local astronomy where one
 * exists. Every result records where it came from.
 *
 * Quick start:
 *   import { aggregate, toDict } from 'sky-briefing'
 *
 *   const briefing = await aggregate({ latitude: 51.5, longitude: -0.1 }, '2025-08-12T21:00:00Z')
 *   console.log(briefing.narrative)
 *   console.log(toDict(briefing))
 */

// ─── Primary API ──────────────────────────────────────────────────────────────

export { aggregate, tonight } from './orchestrator/index.js'
export type { AggregateOptions } from './orchestrator/index.js'
export {
  buildBriefing,
  provenanceSummary,
  toDict,
  toTonightDict,
  toTonightSummary,
  briefingNarrative,
  tonightNarrative,
} from './briefing/index.js'
export type { Dict, DictValue } from './briefing/index.js'
export { scoreViewingConditions, BASE_WEIGHTS, DARKNESS_MULTIPLIERS, viewingCategory } from './scorer/index.js'
export type { ScoreInputs } from './scorer/index.js'

// ─── Calculators ──────────────────────────────────────────────────────────────

export {
  CALCULATORS,
  compute,
  moonCalculator,
  sunCalculator,
  planetsCalculator,
  meteorsCalculator,
  eclipsesCalculator,
  spaceWeatherCalculator,
  weatherCalculator,
  issCalculator,
} from './calculators/index.js'
export type { Calculator, CalculatorContext, CalculatorRegistry, DomainValue } from './calculators/index.js'

// ─── Astronomy ────────────────────────────────────────────────────────────────

export { computeSunTimes, sunPosition, sunAltitude, twilightPhaseAt, dayLengthMinutes, darkSkyWindow } from './solar/index.js'
export type { SunTimesOptions } from './solar/index.js'
export {
  computeMoonState,
  moonAgeDays,
  moonPhaseAngle,
  illuminationFraction,
  phaseNameForAngle,
  upcomingMoonPhases,
  moonPosition,
  SYNODIC_MONTH,
  PHASE_DISPLAY,
} from './lunar/index.js'
export { computePlanetVisibility, computePlanetsVisibility, planetGeometry, apparentMagnitude } from './planets/index.js'
export { dateToJD, jdToDate, julianCenturies, parseInstant } from './time/index.js'

// ─── Calendars ────────────────────────────────────────────────────────────────

export { METEOR_SHOWERS, isShowerActive, meteorOutlook, showerActivity } from './meteors/index.js'
export { ECLIPSES, isEclipseUpcoming, eclipseOutlook } from './eclipses/index.js'
export { geomagneticActivity, auroraLatitude } from './space-weather/index.js'
export { cloudCategory } from './weather/index.js'

// ─── Infrastructure ───────────────────────────────────────────────────────────

export { resolveConfig, DEFAULT_CONFIG } from './config/index.js'
export type { SkyBriefingConfig, ConfigOverrides } from './config/index.js'
export { createLogger, silentLogger } from './logger/index.js'
export type { Logger, LogLevel, LogSink } from './logger/index.js'
export { defaultFetchJson } from './sources/index.js'
export type { FetchJson, FetchJsonOptions, JsonResponse } from './sources/index.js'
export {
  SkyBriefingError,
  InvalidInputError,
  AggregationAbortedError,
  SourceError,
  TimeoutError,
  NetworkError,
  HttpStatusError,
  MalformedPayloadError,
  SourceDisabledError,
} from './errors/index.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  GeoLocation,
  SkyEvent,
  NoEventReason,
  Provenance,
  FailureReason,
  SourceResult,
  Domain,
  MoonPhaseName,
  MoonState,
  MoonPhaseEvent,
  SunTimes,
  TwilightPhase,
  PlanetName,
  PlanetVisibility,
  MeteorShower,
  ShowerActivity,
  ShowerRating,
  MeteorOutlook,
  EclipseEvent,
  EclipseOutlook,
  SpaceWeather,
  GeomagneticActivity,
  WeatherConditions,
  CloudCategory,
  CompassPoint,
  IssPass,
  DarkSkyWindow,
  ScoreFactor,
  ScoreBreakdownEntry,
  ViewingCategory,
  ViewingConditionsScore,
  ScoreResult,
  DomainResults,
  ProvenanceSummary,
  DailyBriefing,
  TonightSummary,
} from './types.js'
export { DOMAINS, PLANET_NAMES } from './types.js'
