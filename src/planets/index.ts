/**
 * planets — Naked-eye planet positions, magnitudes and visibility.
 *
 * Positions come from mean Keplerian elements with linear rates (no
 * perturbation terms), valid 1800-2050 to a fraction of a degree for the
 * inner planets and about a degree for Saturn. Coordinates are referred to the
 * J2000 ecliptic and equator; precession over a few decades is below the
 * accuracy this module aims for.
 *
 * Magnitudes use the classical phase-angle formulae (Meeus Ch. 41); Saturn's
 * ring tilt is ignored, which can make it up to ~0.5 mag too faint.
 *
 * References:
 *   Standish, "Keplerian Elements for Approximate Positions of the Major Planets" (JPL SSD)
 *   Meeus, Astronomical Algorithms (2nd ed.) — Ch. 30 (Kepler's equation), Ch. 41 (magnitudes)
 */

import { clamp, DEG2RAD, RAD2DEG, mod360, normalizeDeg180 } from '../math/index.js'
import { altitudeOf, riseAndSet } from '../observer/index.js'
import { sunAltitude } from '../solar/index.js'
import {
  dateToJD,
  formatLocalTime,
  jdToDate,
  julianCenturies,
  localDayStart,
  utcOffsetHours,
} from '../time/index.js'
import type { Equatorial, GeoLocation, PlanetName, PlanetVisibility } from '../types.js'
import { PLANET_NAMES } from '../types.js'

// ─── Elements ─────────────────────────────────────────────────────────────────

/** [value at J2000, rate per Julian century] */
type Element = readonly [number, number]

interface OrbitalElements {
  /** Semi-major axis, AU */
  a: Element
  /** Eccentricity */
  e: Element
  /** Inclination, degrees */
  I: Element
  /** Mean longitude, degrees */
  L: Element
  /** Longitude of perihelion, degrees */
  peri: Element
  /** Longitude of the ascending node, degrees */
  node: Element
}

type Body = PlanetName | 'EarthMoon'

/** JPL Table 1 (1800 AD - 2050 AD), J2000 ecliptic and equinox */
export const ORBITAL_ELEMENTS: Record<Body, OrbitalElements> = {
  Mercury: {
    a: [0.38709927, 0.00000037], e: [0.20563593, 0.00001906], I: [7.00497902, -0.00594749],
    L: [252.2503235, 149472.67411175], peri: [77.45779628, 0.16047689], node: [48.33076593, -0.12534081],
  },
  Venus: {
    a: [0.72333566, 0.0000039], e: [0.00677672, -0.00004107], I: [3.39467605, -0.0007889],
    L: [181.9790995, 58517.81538729], peri: [131.60246718, 0.00268329], node: [76.67984255, -0.27769418],
  },
  EarthMoon: {
    a: [1.00000261, 0.00000562], e: [0.01671123, -0.00004392], I: [-0.00001531, -0.01294668],
    L: [100.46457166, 35999.37244981], peri: [102.93768193, 0.32327364], node: [0, 0],
  },
  Mars: {
    a: [1.52371034, 0.00001847], e: [0.0933941, 0.00007882], I: [1.84969142, -0.00813131],
    L: [-4.55343205, 19140.30268499], peri: [-23.94362959, 0.44441088], node: [49.55953891, -0.29257343],
  },
  Jupiter: {
    a: [5.202887, -0.00011607], e: [0.04838624, -0.00013253], I: [1.30439695, -0.00183714],
    L: [34.39644051, 3034.74612775], peri: [14.72847983, 0.21252668], node: [100.47390909, 0.20469106],
  },
  Saturn: {
    a: [9.53667594, -0.0012506], e: [0.05386179, -0.00050991], I: [2.48599187, 0.00193609],
    L: [49.95424423, 1222.49362201], peri: [92.59887831, -0.41897216], node: [113.66242448, -0.28867794],
  },
  Uranus: {
    a: [19.18916464, -0.00196176], e: [0.04725744, -0.00004397], I: [0.77263783, -0.00242939],
    L: [313.23810451, 428.48202785], peri: [170.9542763, 0.40805281], node: [74.01692503, 0.04240589],
  },
  Neptune: {
    a: [30.06992276, 0.00026291], e: [0.00859048, 0.00005105], I: [1.77004347, 0.00035372],
    L: [-55.12002969, 218.45945325], peri: [44.96476227, -0.32241464], node: [131.78422574, -0.00508664],
  },
}

/**
 * Magnitude model: V = V0 + 5·log10(r·Δ) + c1·i + c2·i² + c3·i³, i in degrees.
 */
const MAGNITUDE_COEFFICIENTS: Record<PlanetName, readonly [number, number, number, number]> = {
  Mercury: [-0.42, 0.038, -0.000273, 0.000002],
  Venus: [-4.4, 0.0009, 0.000239, -0.00000065],
  Mars: [-1.52, 0.016, 0, 0],
  Jupiter: [-9.4, 0.005, 0, 0],
  Saturn: [-8.88, 0.044, 0, 0],
  Uranus: [-7.19, 0, 0, 0],
  Neptune: [-6.87, 0, 0, 0],
}

const INNER_PLANETS: ReadonlySet<PlanetName> = new Set(['Mercury', 'Venus'])

/** Faintest magnitude counted as naked-eye under dark skies */
export const NAKED_EYE_LIMIT = 6.0

/** Planets closer than this to the Sun are lost in its glare */
export const MIN_ELONGATION = 10

/** Geometric altitude of a planet's centre at rise/set (refraction only) */
export const PLANET_RISE_SET_ALTITUDE = -0.5667

/** A planet must clear this altitude during darkness to count as visible */
const MIN_VIEWING_ALTITUDE = 5

/** Solar altitude below which the sky is dark enough for planets */
const PLANET_DARKNESS_ALTITUDE = -6

const OBLIQUITY_J2000 = 23.43928

// ─── Geometry ─────────────────────────────────────────────────────────────────

type Vec3 = readonly [number, number, number]

/** Solve Kepler's equation E - e·sin E = M (radians) by Newton iteration. */
export function solveKepler(M: number, e: number): number {
  let E = e < 0.8 ? M : Math.PI
  for (let i = 0; i < 30; i++) {
    const delta = (E - e * Math.sin(E) - M) / (1 - e * Math.cos(E))
    E -= delta
    if (Math.abs(delta) < 1e-10) break
  }
  return E
}

/** Heliocentric ecliptic position (AU) of a body at Julian Date jd. */
export function heliocentricPosition(body: Body, jd: number): Vec3 {
  const T = julianCenturies(jd)
  const el = ORBITAL_ELEMENTS[body]
  const at = ([v0, rate]: Element) => v0 + rate * T

  const a = at(el.a)
  const e = at(el.e)
  const I = at(el.I) * DEG2RAD
  const L = at(el.L)
  const peri = at(el.peri)
  const node = at(el.node)

  const omega = (peri - node) * DEG2RAD
  const Omega = node * DEG2RAD
  const M = normalizeDeg180(L - peri) * DEG2RAD
  const E = solveKepler(M, e)

  // Position in the orbital plane, x toward perihelion
  const xp = a * (Math.cos(E) - e)
  const yp = a * Math.sqrt(1 - e * e) * Math.sin(E)

  const cw = Math.cos(omega), sw = Math.sin(omega)
  const cO = Math.cos(Omega), sO = Math.sin(Omega)
  const cI = Math.cos(I), sI = Math.sin(I)

  return [
    (cw * cO - sw * sO * cI) * xp + (-sw * cO - cw * sO * cI) * yp,
    (cw * sO + sw * cO * cI) * xp + (-sw * sO + cw * cO * cI) * yp,
    sw * sI * xp + cw * sI * yp,
  ]
}

function norm(v: Vec3): number {
  return Math.hypot(v[0], v[1], v[2])
}

export interface PlanetGeometry extends Equatorial {
  /** Sun-planet distance, AU */
  r: number
  /** Earth-planet distance, AU */
  delta: number
  /** Sun-planet-Earth angle, degrees */
  phaseAngle: number
  /** Sun-Earth-planet angle, degrees */
  elongation: number
  /** Planet east of the Sun (evening sky) */
  eastOfSun: boolean
}

/** Geocentric position and Sun-Earth-planet geometry at Julian Date jd. */
export function planetGeometry(name: PlanetName, jd: number): PlanetGeometry {
  const p = heliocentricPosition(name, jd)
  const earth = heliocentricPosition('EarthMoon', jd)
  const g: Vec3 = [p[0] - earth[0], p[1] - earth[1], p[2] - earth[2]]

  const r = norm(p)
  const R = norm(earth)
  const delta = norm(g)

  const eps = OBLIQUITY_J2000 * DEG2RAD
  const xeq = g[0]
  const yeq = g[1] * Math.cos(eps) - g[2] * Math.sin(eps)
  const zeq = g[1] * Math.sin(eps) + g[2] * Math.cos(eps)

  const cosPhase = clamp((r * r + delta * delta - R * R) / (2 * r * delta), -1, 1)
  const cosElong = clamp((R * R + delta * delta - r * r) / (2 * R * delta), -1, 1)

  // Ecliptic longitude of the planet minus that of the Sun (= Earth + 180°)
  const planetLon = Math.atan2(g[1], g[0]) * RAD2DEG
  const sunLon = Math.atan2(-earth[1], -earth[0]) * RAD2DEG

  return {
    ra: mod360(Math.atan2(yeq, xeq) * RAD2DEG),
    dec: Math.atan2(zeq, Math.hypot(xeq, yeq)) * RAD2DEG,
    r,
    delta,
    phaseAngle: Math.acos(cosPhase) * RAD2DEG,
    elongation: Math.acos(cosElong) * RAD2DEG,
    eastOfSun: normalizeDeg180(planetLon - sunLon) > 0,
  }
}

/** Apparent visual magnitude from distances and phase angle. */
export function apparentMagnitude(name: PlanetName, geometry: PlanetGeometry): number {
  const [v0, c1, c2, c3] = MAGNITUDE_COEFFICIENTS[name]
  const i = geometry.phaseAngle
  return v0 + 5 * Math.log10(geometry.r * geometry.delta) + c1 * i + c2 * i * i + c3 * i * i * i
}

/** Geometric altitude of a planet, degrees. */
export function planetAltitude(name: PlanetName, jd: number, latitude: number, longitude: number): number {
  return altitudeOf(planetGeometry(name, jd), jd, latitude, longitude)
}

// ─── Visibility ───────────────────────────────────────────────────────────────

/** 20 minutes, in days */
const NIGHT_SAMPLE_STEP = 20 / 1440

/**
 * Visibility of one planet for the night that follows the local day's noon.
 *
 * The night is sampled every 20 minutes from local noon to the next local noon;
 * a sample counts when the Sun is below -6° and the planet above 5°. The
 * planet is visible when it is bright enough, clear of the Sun's glare and at
 * least one sample counts. The best sample (highest altitude) sets the hint.
 */
export function computePlanetVisibility(
  name: PlanetName,
  location: GeoLocation,
  instant: Date,
): PlanetVisibility {
  const { latitude, longitude } = location
  const offset = utcOffsetHours(location)
  const jd = dateToJD(instant)
  const dayStartJD = dateToJD(localDayStart(instant, offset))

  const geometry = planetGeometry(name, jd)
  const magnitude = apparentMagnitude(name, geometry)
  const minElongation = INNER_PLANETS.has(name) ? 18 : MIN_ELONGATION

  const { rise, set } = riseAndSet(
    t => planetAltitude(name, t, latitude, longitude),
    dayStartJD,
    PLANET_RISE_SET_ALTITUDE,
  )

  let best: { jd: number; altitude: number } | null = null
  let darkSamples = 0
  let visibleSamples = 0
  const nightStart = dayStartJD + 0.5
  for (let t = nightStart; t < nightStart + 1; t += NIGHT_SAMPLE_STEP) {
    if (sunAltitude(t, latitude, longitude) >= PLANET_DARKNESS_ALTITUDE) continue
    darkSamples++
    const altitude = planetAltitude(name, t, latitude, longitude)
    if (altitude < MIN_VIEWING_ALTITUDE) continue
    visibleSamples++
    if (!best || altitude > best.altitude) best = { jd: t, altitude }
  }

  const bright = magnitude <= NAKED_EYE_LIMIT
  const clearOfSun = geometry.elongation >= minElongation
  const visible = bright && clearOfSun && best !== null

  return {
    name,
    visible,
    rise,
    set,
    magnitude: Math.round(magnitude * 10) / 10,
    altitudeDeg: Math.round(planetAltitude(name, jd, latitude, longitude) * 10) / 10,
    elongationDeg: Math.round(geometry.elongation * 10) / 10,
    bestViewing: viewingHint({
      bright,
      clearOfSun,
      best,
      coverage: darkSamples > 0 ? visibleSamples / darkSamples : 0,
      eastOfSun: geometry.eastOfSun,
      offset,
    }),
  }
}

function viewingHint(args: {
  bright: boolean
  clearOfSun: boolean
  best: { jd: number; altitude: number } | null
  coverage: number
  eastOfSun: boolean
  offset: number
}): string {
  if (!args.bright) return 'Too faint for the naked eye; use binoculars or a telescope'
  if (!args.clearOfSun) return 'Too close to the Sun to observe'
  if (!args.best) return 'Not above the horizon during darkness'
  const at = formatLocalTime(jdToDate(args.best.jd), args.offset)
  if (args.coverage > 0.8) return `Visible most of the night, highest around ${at}`
  return args.eastOfSun
    ? `Evening sky, best around ${at}`
    : `Morning sky, best around ${at}`
}

/** Visibility for every tracked planet, in order from the Sun. */
export function computePlanetsVisibility(location: GeoLocation, instant: Date): PlanetVisibility[] {
  return PLANET_NAMES.map(name => computePlanetVisibility(name, location, instant))
}
