/**
 * Plain-data serialisation: nested objects and arrays whose leaves are only
 * strings, numbers, booleans and null. Keys are snake_case, instants ISO 8601.
 */

import type {
  DailyBriefing,
  DarkSkyWindow,
  Domain,
  EclipseEvent,
  EclipseOutlook,
  IssPass,
  MeteorOutlook,
  MoonState,
  PlanetVisibility,
  ScoreResult,
  ShowerActivity,
  SkyEvent,
  SourceResult,
  SpaceWeather,
  SunTimes,
  TonightSummary,
  WeatherConditions,
} from '../types.js'
import { DOMAINS } from '../types.js'

export type DictValue = string | number | boolean | null | DictValue[] | { [key: string]: DictValue }

export type Dict = { [key: string]: DictValue }

/** camelCase → snake_case */
export function snakeCase(name: string): string {
  return name.replace(/[A-Z]/g, letter => `_${letter.toLowerCase()}`)
}

// ─── Leaves ───────────────────────────────────────────────────────────────────

export function eventDict(event: SkyEvent): Dict {
  switch (event.type) {
    case 'at':
      return { status: 'at', time: event.time.toISOString(), reason: null }
    case 'none':
      return { status: 'none', time: null, reason: event.reason }
    case 'unreported':
      return { status: 'unreported', time: null, reason: null }
  }
}

function sourceDict<T>(result: SourceResult<T>, toDict: (value: T) => DictValue): Dict {
  switch (result.provenance) {
    case 'live':
      return { provenance: 'live', source: result.source, failure: null, value: toDict(result.value) }
    case 'local-fallback':
      return { provenance: 'local-fallback', source: 'local', failure: result.liveFailure, value: toDict(result.value) }
    case 'unavailable':
      return { provenance: 'unavailable', source: null, failure: result.reason, value: null }
  }
}

// ─── Domains ──────────────────────────────────────────────────────────────────

export function sunDict(sun: SunTimes): Dict {
  return {
    astronomical_dawn: eventDict(sun.astronomicalDawn),
    nautical_dawn: eventDict(sun.nauticalDawn),
    civil_dawn: eventDict(sun.civilDawn),
    sunrise: eventDict(sun.sunrise),
    solar_noon: eventDict(sun.solarNoon),
    sunset: eventDict(sun.sunset),
    civil_dusk: eventDict(sun.civilDusk),
    nautical_dusk: eventDict(sun.nauticalDusk),
    astronomical_dusk: eventDict(sun.astronomicalDusk),
    day_length_minutes: sun.dayLengthMinutes,
  }
}

export function moonDict(moon: MoonState): Dict {
  return {
    phase: moon.phase,
    illumination: moon.illumination,
    rise: eventDict(moon.rise),
    set: eventDict(moon.set),
    altitude_deg: moon.altitudeDeg,
    age_days: moon.ageDays,
  }
}

export function planetDict(planet: PlanetVisibility): Dict {
  return {
    name: planet.name,
    visible: planet.visible,
    rise: eventDict(planet.rise),
    set: eventDict(planet.set),
    magnitude: planet.magnitude,
    altitude_deg: planet.altitudeDeg,
    elongation_deg: planet.elongationDeg,
    best_viewing: planet.bestViewing,
  }
}

function showerDict(activity: ShowerActivity): Dict {
  const { shower } = activity
  return {
    name: shower.name,
    peak: `${String(shower.peak.month).padStart(2, '0')}-${String(shower.peak.day).padStart(2, '0')}`,
    zhr: shower.zhr,
    effective_zhr: activity.effectiveZhr,
    days_to_peak: activity.daysToPeak,
    rating: activity.rating,
    radiant: shower.radiant,
    parent_body: shower.parentBody,
  }
}

export function meteorsDict(outlook: MeteorOutlook): Dict {
  return {
    active: outlook.active.map(showerDict),
    upcoming: outlook.upcoming.map(showerDict),
  }
}

function eclipseDict(event: EclipseEvent): Dict {
  return {
    body: event.body,
    type: event.type,
    date: event.date,
    maximum: event.maximum.toISOString(),
    duration_minutes: event.durationMinutes,
    magnitude: event.magnitude,
    regions: [...event.regions],
    visibility: event.visibility,
    notes: event.notes,
  }
}

export function eclipsesDict(outlook: EclipseOutlook): Dict {
  return {
    today: outlook.today ? eclipseDict(outlook.today) : null,
    upcoming: outlook.upcoming.map(eclipseDict),
    horizon_days: outlook.horizonDays,
  }
}

export function spaceWeatherDict(space: SpaceWeather): Dict {
  return {
    kp: space.kp,
    activity: space.activity,
    observed_at: space.observedAt.toISOString(),
    solar_wind_speed: space.solarWindSpeed,
    solar_wind_density: space.solarWindDensity,
    solar_wind_elevated: space.solarWindElevated,
    aurora_latitude: space.auroraLatitude,
    aurora_visible: space.auroraVisible,
  }
}

export function weatherDict(weather: WeatherConditions): Dict {
  return {
    cloud_cover: weather.cloudCover,
    category: weather.category,
    samples: weather.samples,
  }
}

export function issPassDict(pass: IssPass): Dict {
  return {
    rise: pass.rise.toISOString(),
    culmination: pass.culmination.toISOString(),
    set: pass.set.toISOString(),
    duration_seconds: pass.durationSeconds,
    max_elevation_deg: pass.maxElevationDeg,
    rise_direction: pass.riseDirection,
    set_direction: pass.setDirection,
    magnitude: pass.magnitude,
  }
}

export function darkSkyWindowDict(window: DarkSkyWindow): Dict {
  switch (window.type) {
    case 'window':
      return {
        status: 'window',
        start: window.start.toISOString(),
        end: window.end.toISOString(),
        duration_hours: window.durationHours,
        best_time: window.bestTime.toISOString(),
        reason: null,
      }
    case 'none':
      return { status: 'none', start: null, end: null, duration_hours: 0, best_time: null, reason: window.reason }
    case 'unreported':
      return { status: 'unreported', start: null, end: null, duration_hours: null, best_time: null, reason: null }
  }
}

export function scoreDict(score: ScoreResult): Dict {
  if (score.status === 'unavailable') return { status: 'unavailable' }
  return {
    status: 'scored',
    score: score.score,
    category: score.category,
    darkness: score.darkness,
    darkness_multiplier: score.darknessMultiplier,
    breakdown: score.breakdown.map(entry => ({
      factor: entry.factor,
      sub_score: entry.subScore,
      weight: entry.weight,
      contribution: entry.contribution,
    })),
    recommendations: [...score.recommendations],
  }
}

// ─── Reports ──────────────────────────────────────────────────────────────────

function locationDict(briefing: Pick<DailyBriefing, 'location'>): Dict {
  const { location } = briefing
  return {
    latitude: location.latitude,
    longitude: location.longitude,
    elevation: location.elevation ?? null,
    utc_offset_hours: location.utcOffsetHours ?? null,
  }
}

/** Structured mapping of a DailyBriefing */
export function toDict(briefing: DailyBriefing): Dict {
  const { results } = briefing
  const provenance: Dict = {}
  for (const domain of DOMAINS) provenance[snakeCase(domain)] = briefing.provenance[domain]

  const domains: Record<Domain, Dict> = {
    sun: sourceDict(results.sun, sunDict),
    moon: sourceDict(results.moon, moonDict),
    planets: sourceDict(results.planets, planets => planets.map(planetDict)),
    meteors: sourceDict(results.meteors, meteorsDict),
    eclipses: sourceDict(results.eclipses, eclipsesDict),
    spaceWeather: sourceDict(results.spaceWeather, spaceWeatherDict),
    weather: sourceDict(results.weather, weatherDict),
    iss: sourceDict(results.iss, passes => passes.map(issPassDict)),
  }
  const dict: Dict = {
    location: locationDict(briefing),
    instant: briefing.instant.toISOString(),
    local_date: briefing.localDate,
    provenance,
  }
  for (const domain of DOMAINS) dict[snakeCase(domain)] = domains[domain]
  dict['score'] = scoreDict(briefing.score)
  dict['narrative'] = briefing.narrative
  return dict
}

/** Structured mapping of a TonightSummary */
export function toTonightDict(summary: TonightSummary): Dict {
  return {
    location: locationDict(summary),
    instant: summary.instant.toISOString(),
    local_date: summary.localDate,
    moon: sourceDict(summary.moon, moonDict),
    darkness_begins: eventDict(summary.darknessBegins),
    dark_sky_window: darkSkyWindowDict(summary.darkSkyWindow),
    visible_planets: [...summary.visiblePlanets],
    active_showers: [...summary.activeShowers],
    aurora_visible: summary.auroraVisible,
    score: scoreDict(summary.score),
    narrative: summary.narrative,
  }
}
