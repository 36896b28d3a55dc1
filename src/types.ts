// ─── Location and time ───────────────────────────────────────────────────────

/** Observer position. Immutable; passed by value into every calculation. */
export interface GeoLocation {
  /** Geodetic latitude in degrees (north positive), [-90, 90] */
  readonly latitude: number
  /** Longitude in degrees (east positive), [-180, 180] */
  readonly longitude: number
  /** Height above sea level in meters */
  readonly elevation?: number
  /**
   * Offset of local civil time from UTC in hours, [-12, 14].
   * Defines the local calendar day. Defaults to round(longitude / 15).
   */
  readonly utcOffsetHours?: number
}

/** Azimuth + altitude in degrees */
export interface AzAlt {
  /** Degrees from North, measured clockwise (0 = N, 90 = E, 180 = S, 270 = W) */
  azimuth: number
  /** Degrees above the horizon (negative = below) */
  altitude: number
}

/** Geocentric equatorial coordinates of date, degrees */
export interface Equatorial {
  ra: number
  dec: number
}

// ─── Events ──────────────────────────────────────────────────────────────────

/** Why a rise, set or twilight crossing has no time on a given day */
export type NoEventReason =
  /** The body stays above the threshold all day (e.g. midnight sun) */
  | 'always-above'
  /** The body stays below the threshold all day (e.g. polar night) */
  | 'always-below'
  /** The body crosses on neighbouring days but not on this one (typical for the Moon) */
  | 'not-this-day'

/**
 * A crossing instant. "Does not occur" and "the source did not report it"
 * are separate variants.
 */
export type SkyEvent =
  | { readonly type: 'at'; readonly time: Date }
  | { readonly type: 'none'; readonly reason: NoEventReason }
  | { readonly type: 'unreported' }

// ─── Provenance ──────────────────────────────────────────────────────────────

export type Provenance = 'live' | 'local-fallback' | 'unavailable'

/** Reason code carried by a failed live attempt or an unavailable result */
export type FailureReason =
  | 'timeout'
  | 'network-error'
  | 'http-status'
  | 'malformed-payload'
  | 'disabled'
  | 'internal-error'

export type SourceResult<T> =
  | {
    readonly provenance: 'live'
    readonly value: T
    /** Label of the endpoint that answered */
    readonly source: string
  }
  | {
    readonly provenance: 'local-fallback'
    readonly value: T
    /** Why the live attempt failed; null for domains computed locally only */
    readonly liveFailure: FailureReason | null
  }
  | {
    readonly provenance: 'unavailable'
    readonly reason: FailureReason
  }

/** Every domain the orchestrator runs, in report order */
export const DOMAINS = [
  'sun',
  'moon',
  'planets',
  'meteors',
  'eclipses',
  'spaceWeather',
  'weather',
  'iss',
] as const

export type Domain = typeof DOMAINS[number]

// ─── Moon ────────────────────────────────────────────────────────────────────

export type MoonPhaseName =
  | 'new-moon'
  | 'waxing-crescent'
  | 'first-quarter'
  | 'waxing-gibbous'
  | 'full-moon'
  | 'waning-gibbous'
  | 'last-quarter'
  | 'waning-crescent'

export interface MoonState {
  phase: MoonPhaseName
  /** Illuminated fraction of the disk [0, 1] */
  illumination: number
  rise: SkyEvent
  set: SkyEvent
  /** Geocentric altitude at the instant; null when the source does not give it */
  altitudeDeg: number | null
  /** Days since the last new moon; null when the source does not give it */
  ageDays: number | null
}

/** One principal lunar phase instant */
export interface MoonPhaseEvent {
  phase: 'new-moon' | 'first-quarter' | 'full-moon' | 'last-quarter'
  time: Date
}

// ─── Sun ─────────────────────────────────────────────────────────────────────

export interface SunTimes {
  astronomicalDawn: SkyEvent
  nauticalDawn: SkyEvent
  civilDawn: SkyEvent
  sunrise: SkyEvent
  solarNoon: SkyEvent
  sunset: SkyEvent
  civilDusk: SkyEvent
  nauticalDusk: SkyEvent
  astronomicalDusk: SkyEvent
  /** sunset - sunrise; 0 under polar night, 1440 under midnight sun, null if unknown */
  dayLengthMinutes: number | null
}

/** Where the Sun stands relative to the twilight thresholds */
export type TwilightPhase = 'day' | 'civil' | 'nautical' | 'astronomical' | 'night'

// ─── Planets ─────────────────────────────────────────────────────────────────

export const PLANET_NAMES = [
  'Mercury',
  'Venus',
  'Mars',
  'Jupiter',
  'Saturn',
  'Uranus',
  'Neptune',
] as const

export type PlanetName = typeof PLANET_NAMES[number]

export interface PlanetVisibility {
  name: PlanetName
  /** Worth looking for with the naked eye tonight */
  visible: boolean
  rise: SkyEvent
  set: SkyEvent
  /** Apparent visual magnitude; null when unknown */
  magnitude: number | null
  /** Altitude at the instant; null when unknown */
  altitudeDeg: number | null
  /** Angular distance from the Sun; null when unknown */
  elongationDeg: number | null
  /** Human hint on when to look, e.g. "Evening sky, best around 20:40" */
  bestViewing: string
}

// ─── ISS ─────────────────────────────────────────────────────────────────────

export type CompassPoint =
  | 'N' | 'NNE' | 'NE' | 'ENE'
  | 'E' | 'ESE' | 'SE' | 'SSE'
  | 'S' | 'SSW' | 'SW' | 'WSW'
  | 'W' | 'WNW' | 'NW' | 'NNW'

/** One naked-eye pass of the International Space Station */
export interface IssPass {
  /** Comes into view */
  rise: Date
  /** Highest point */
  culmination: Date
  /** Drops out of view */
  set: Date
  durationSeconds: number
  /** Highest altitude reached, degrees */
  maxElevationDeg: number
  riseDirection: CompassPoint
  setDirection: CompassPoint
  /** Brightest visual magnitude; null when the source does not give it */
  magnitude: number | null
}

// ─── Calendars ───────────────────────────────────────────────────────────────

/** Calendar day without a year */
export interface MonthDay {
  /** 1-12 */
  readonly month: number
  /** 1-31 */
  readonly day: number
}

export interface MeteorShower {
  name: string
  readonly start: MonthDay
  readonly end: MonthDay
  readonly peak: MonthDay
  /** Zenithal hourly rate at peak */
  zhr: number
  parentBody: string
  /** Where in the sky the meteors appear to come from */
  radiant: string
  /** Entry speed in km/s */
  speedKmS: number
}

export type ShowerRating = 'Excellent' | 'Good' | 'Fair' | 'Poor'

export interface ShowerActivity {
  shower: MeteorShower
  /** Signed whole days to the nearest peak: 0 on the peak day, negative once it has passed */
  daysToPeak: number
  /** ZHR scaled by distance from the peak */
  effectiveZhr: number
  rating: ShowerRating
}

export interface MeteorOutlook {
  /** Showers active on the local date */
  active: readonly ShowerActivity[]
  /** Inactive showers whose peak falls within the lookahead */
  upcoming: readonly ShowerActivity[]
}

export type EclipseBody = 'solar' | 'lunar'
export type EclipseType = 'total' | 'partial' | 'annular' | 'hybrid' | 'penumbral'

export interface EclipseEvent {
  body: EclipseBody
  type: EclipseType
  /** UTC calendar date YYYY-MM-DD */
  date: string
  /** Instant of greatest eclipse */
  maximum: Date
  /** Duration of the total/annular (solar) or umbral (lunar) phase, minutes; null when not applicable */
  durationMinutes: number | null
  /** Fraction of the Sun's (solar) or Moon's (lunar) diameter covered at maximum */
  magnitude: number
  regions: readonly string[]
  notes: string | null
  /** Plain description of where it can be seen */
  visibility: string
}

export interface EclipseOutlook {
  /** An eclipse on the local date, if any */
  today: EclipseEvent | null
  /** Eclipses after today within the horizon, soonest first */
  upcoming: readonly EclipseEvent[]
  horizonDays: number
}

// ─── Space weather and weather ───────────────────────────────────────────────

export type GeomagneticActivity =
  | 'Quiet'
  | 'Unsettled'
  | 'Active'
  | 'G1 Minor Storm'
  | 'G2 Moderate Storm'
  | 'G3 Strong Storm'
  | 'G4 Severe Storm'
  | 'G5 Extreme Storm'

export interface SpaceWeather {
  /** Planetary K index, 0-9 */
  kp: number
  activity: GeomagneticActivity
  observedAt: Date
  /** km/s; null when the plasma feed was not available */
  solarWindSpeed: number | null
  /** protons/cm³; null when the plasma feed was not available */
  solarWindDensity: number | null
  solarWindElevated: boolean
  /** Lowest absolute latitude where aurora may be seen at this Kp */
  auroraLatitude: number
  /** Aurora may be visible from the location */
  auroraVisible: boolean
}

export type CloudCategory = 'Clear' | 'Partly Cloudy' | 'Mostly Cloudy' | 'Overcast'

export interface WeatherConditions {
  /** Mean cloud cover over the coming night hours, percent */
  cloudCover: number
  category: CloudCategory
  /** Number of hourly samples behind the mean */
  samples: number
}

// ─── Score ───────────────────────────────────────────────────────────────────

export type ScoreFactor = 'cloud' | 'moon' | 'geomagnetic'

export type ViewingCategory = 'Poor' | 'Fair' | 'Good' | 'Excellent'

export interface ScoreBreakdownEntry {
  factor: ScoreFactor
  /** 0-100 */
  subScore: number
  /** Renormalised weight; present weights sum to 1 */
  weight: number
  /** weight * subScore * darkness multiplier; entries sum to the unrounded total */
  contribution: number
}

export interface ViewingConditionsScore {
  status: 'scored'
  /** 0-100 */
  score: number
  category: ViewingCategory
  breakdown: readonly ScoreBreakdownEntry[]
  darkness: TwilightPhase | null
  darknessMultiplier: number
  recommendations: readonly string[]
}

export type ScoreResult = ViewingConditionsScore | { status: 'unavailable' }

// ─── Reports ─────────────────────────────────────────────────────────────────

export interface DomainResults {
  sun: SourceResult<SunTimes>
  moon: SourceResult<MoonState>
  planets: SourceResult<readonly PlanetVisibility[]>
  meteors: SourceResult<MeteorOutlook>
  eclipses: SourceResult<EclipseOutlook>
  spaceWeather: SourceResult<SpaceWeather>
  weather: SourceResult<WeatherConditions>
  /** Passes over the 24 hours from the instant, soonest first */
  iss: SourceResult<readonly IssPass[]>
}

export type ProvenanceSummary = Record<Domain, Provenance>

export interface DailyBriefing {
  readonly location: GeoLocation
  readonly instant: Date
  /** Local calendar date YYYY-MM-DD */
  readonly localDate: string
  readonly results: Readonly<DomainResults>
  readonly provenance: Readonly<ProvenanceSummary>
  readonly score: ScoreResult
  readonly narrative: string
}

/** Astronomical darkness between this evening's dusk and the next morning's dawn */
export type DarkSkyWindow =
  | {
    readonly type: 'window'
    readonly start: Date
    readonly end: Date
    readonly durationHours: number
    /** Midpoint of the window */
    readonly bestTime: Date
  }
  | {
    readonly type: 'none'
    /** never-dark: twilight all night (high-latitude summer); always-dark: polar night */
    readonly reason: 'never-dark' | 'always-dark'
  }
  | { readonly type: 'unreported' }

/** The part of a briefing that answers "is tonight worth it" */
export interface TonightSummary {
  readonly location: GeoLocation
  readonly instant: Date
  readonly localDate: string
  readonly moon: SourceResult<MoonState>
  /** Start of full darkness, when known */
  readonly darknessBegins: SkyEvent
  readonly darkSkyWindow: DarkSkyWindow
  readonly visiblePlanets: readonly PlanetName[]
  readonly activeShowers: readonly string[]
  readonly auroraVisible: boolean | null
  readonly score: ScoreResult
  readonly narrative: string
}
