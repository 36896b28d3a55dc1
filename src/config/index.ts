/**
 * config — Runtime settings.
 *
 * Precedence: explicit overrides > environment > defaults. The merged result is
 * validated once; a bad value fails fast with the offending key in the message.
 *
 * Environment:
 *   SKY_BRIEFING_TIMEOUT_MS        per-request timeout (default 10000)
 *   SKY_BRIEFING_OFFLINE=1         disable every live source
 *   SKY_BRIEFING_DISABLE=moon,sun  disable some live sources
 *   SKY_BRIEFING_LOG_LEVEL         debug | info | warn | error | silent
 *   SKY_BRIEFING_N2YO_API_KEY      key for ISS pass predictions (none: no ISS data)
 */

import { z } from 'zod'
import { InvalidInputError } from '../errors/index.js'
import { LOG_LEVELS } from '../logger/index.js'
import type { LogLevel } from '../logger/index.js'

/** Domains with a live source */
export const LIVE_DOMAINS = ['moon', 'sun', 'planets', 'spaceWeather', 'weather', 'iss'] as const

export type LiveDomain = typeof LIVE_DOMAINS[number]

export const DEFAULT_ENDPOINTS = {
  usno: 'https://aa.usno.navy.mil/api',
  sunriseSunset: 'https://api.sunrise-sunset.org',
  visiblePlanets: 'https://api.visibleplanets.dev',
  swpc: 'https://services.swpc.noaa.gov',
  openMeteo: 'https://api.open-meteo.com',
  n2yo: 'https://api.n2yo.com/rest/v1',
} as const

export type EndpointName = keyof typeof DEFAULT_ENDPOINTS

export interface SkyBriefingConfig {
  /** Bound on each live request attempt, milliseconds */
  timeoutMs: number
  /** Per-domain switch for the live source */
  live: Record<LiveDomain, boolean>
  /** Base URLs of the live services */
  endpoints: Record<EndpointName, string>
  /** How far ahead to list eclipses, days */
  eclipseHorizonDays: number
  /** How far ahead to list shower peaks, days */
  showerLookaheadDays: number
  /** N2YO API key; ISS passes are unavailable without one */
  n2yoApiKey: string | null
  logLevel: LogLevel
}

/** Partial overrides; nested records merge key by key */
export interface ConfigOverrides {
  timeoutMs?: number
  live?: Partial<Record<LiveDomain, boolean>>
  endpoints?: Partial<Record<EndpointName, string>>
  eclipseHorizonDays?: number
  showerLookaheadDays?: number
  n2yoApiKey?: string | null
  logLevel?: LogLevel
}

const liveSchema = z.object({
  moon: z.boolean(),
  sun: z.boolean(),
  planets: z.boolean(),
  spaceWeather: z.boolean(),
  weather: z.boolean(),
  iss: z.boolean(),
})

const configSchema = z.object({
  timeoutMs: z.number().int().positive().max(120_000),
  live: liveSchema,
  endpoints: z.object({
    usno: z.string().url(),
    sunriseSunset: z.string().url(),
    visiblePlanets: z.string().url(),
    swpc: z.string().url(),
    openMeteo: z.string().url(),
    n2yo: z.string().url(),
  }),
  eclipseHorizonDays: z.number().int().min(0).max(3660),
  showerLookaheadDays: z.number().int().min(0).max(366),
  n2yoApiKey: z.string().min(1).nullable(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
})

export const DEFAULT_CONFIG: Readonly<SkyBriefingConfig> = Object.freeze({
  timeoutMs: 10_000,
  live: { moon: true, sun: true, planets: true, spaceWeather: true, weather: true, iss: true },
  endpoints: { ...DEFAULT_ENDPOINTS },
  eclipseHorizonDays: 30,
  showerLookaheadDays: 14,
  n2yoApiKey: null,
  logLevel: 'warn',
})

type Env = Record<string, string | undefined>

export function isLiveDomain(name: string): name is LiveDomain {
  return LIVE_DOMAINS.some(domain => domain === name)
}

function isLogLevel(name: string): name is LogLevel {
  return LOG_LEVELS.some(level => level === name)
}

/** Settings read from environment variables; unknown names are ignored. */
export function configFromEnv(env: Env): ConfigOverrides {
  const overrides: ConfigOverrides = {}

  const timeout = env['SKY_BRIEFING_TIMEOUT_MS']
  if (timeout !== undefined && timeout !== '') overrides.timeoutMs = Number(timeout)

  const live: Partial<Record<LiveDomain, boolean>> = {}
  if (env['SKY_BRIEFING_OFFLINE'] === '1' || env['SKY_BRIEFING_OFFLINE'] === 'true') {
    for (const domain of LIVE_DOMAINS) live[domain] = false
  }
  for (const name of (env['SKY_BRIEFING_DISABLE'] ?? '').split(',')) {
    const trimmed = name.trim()
    if (isLiveDomain(trimmed)) live[trimmed] = false
  }
  if (Object.keys(live).length > 0) overrides.live = live

  const key = env['SKY_BRIEFING_N2YO_API_KEY']?.trim()
  if (key) overrides.n2yoApiKey = key

  const level = env['SKY_BRIEFING_LOG_LEVEL']?.trim().toLowerCase()
  if (level !== undefined && isLogLevel(level)) overrides.logLevel = level

  return overrides
}

function merge(base: SkyBriefingConfig, overrides: ConfigOverrides): SkyBriefingConfig {
  return {
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
    live: { ...base.live, ...overrides.live },
    endpoints: { ...base.endpoints, ...overrides.endpoints },
    eclipseHorizonDays: overrides.eclipseHorizonDays ?? base.eclipseHorizonDays,
    showerLookaheadDays: overrides.showerLookaheadDays ?? base.showerLookaheadDays,
    n2yoApiKey: overrides.n2yoApiKey === undefined ? base.n2yoApiKey : overrides.n2yoApiKey,
    logLevel: overrides.logLevel ?? base.logLevel,
  }
}

/**
 * Merge defaults, environment and overrides, then validate.
 * Pass `env: {}` to ignore the process environment.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): SkyBriefingConfig {
  const merged = merge(merge(DEFAULT_CONFIG, configFromEnv(env)), overrides)
  const result = configSchema.safeParse(merged)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue ? issue.path.join('.') : 'config'
    throw new InvalidInputError(`Invalid configuration at ${where}: ${issue?.message ?? 'unknown error'}`)
  }
  return result.data
}
