import { describe, expect, it } from 'vitest'
import type { MoonState, SkyEvent, SourceResult, SpaceWeather, SunTimes, WeatherConditions } from '../../types.js'
import type { ScoreInputs } from '../index.js'
import {
  cloudSubScore,
  geomagneticSubScore,
  moonSubScore,
  recommendations,
  scoreViewingConditions,
  viewingCategory,
} from '../index.js'

const at = (iso: string): SkyEvent => ({ type: 'at', time: new Date(iso) })

const SUN: SunTimes = {
  astronomicalDawn: at('2025-01-16T06:05:00Z'),
  nauticalDawn: at('2025-01-16T06:45:00Z'),
  civilDawn: at('2025-01-16T07:24:00Z'),
  sunrise: at('2025-01-16T08:00:00Z'),
  solarNoon: at('2025-01-16T12:10:00Z'),
  sunset: at('2025-01-16T16:20:00Z'),
  civilDusk: at('2025-01-16T16:56:00Z'),
  nauticalDusk: at('2025-01-16T17:35:00Z'),
  astronomicalDusk: at('2025-01-16T18:15:00Z'),
  dayLengthMinutes: 500,
}

function moon(illumination: number, altitudeDeg: number | null = 30): MoonState {
  return {
    phase: illumination < 0.02 ? 'new-moon' : 'waxing-gibbous',
    illumination,
    rise: { type: 'unreported' },
    set: { type: 'unreported' },
    altitudeDeg,
    ageDays: null,
  }
}

const weather = (cloudCover: number): WeatherConditions => ({ cloudCover, category: 'Clear', samples: 6 })

function spaceWeather(auroraLatitude: number): SpaceWeather {
  return {
    kp: 5,
    activity: 'G1 Minor Storm',
    observedAt: new Date('2025-01-16T21:00:00Z'),
    solarWindSpeed: null,
    solarWindDensity: null,
    solarWindElevated: false,
    auroraLatitude,
    auroraVisible: false,
  }
}

const local = <T>(value: T): SourceResult<T> => ({ provenance: 'local-fallback', value, liveFailure: null })
const unavailable = { provenance: 'unavailable', reason: 'timeout' } as const

function inputs(overrides: Partial<ScoreInputs> = {}): ScoreInputs {
  return {
    location: { latitude: 51.5, longitude: -0.1 },
    instant: new Date('2025-01-16T22:00:00Z'),
    sun: local(SUN),
    moon: local(moon(0.5)),
    weather: local(weather(40)),
    spaceWeather: local(spaceWeather(52)),
    ...overrides,
  }
}

describe('sub-scores', () => {
  it('scores clear skies highest', () => {
    expect(cloudSubScore(0)).toBe(100)
    expect(cloudSubScore(40)).toBe(60)
  })

  it('penalises a bright Moon only while it is up', () => {
    expect(moonSubScore(moon(0))).toBe(100)
    expect(moonSubScore(moon(1))).toBe(0)
    expect(moonSubScore(moon(0.5))).toBeCloseTo(38.4428, 4)
    expect(moonSubScore(moon(1, -10))).toBe(100)
    expect(moonSubScore(moon(1, null))).toBe(0)
  })

  it('rises toward 100 near the aurora boundary', () => {
    expect(geomagneticSubScore(30, 52)).toBe(60)
    expect(geomagneticSubScore(51.5, 52)).toBeCloseTo(98, 9)
    expect(geomagneticSubScore(-70, 52)).toBe(100)
  })

  it.each([
    [0, 'Poor'],
    [39, 'Poor'],
    [40, 'Fair'],
    [60, 'Good'],
    [79, 'Good'],
    [80, 'Excellent'],
  ])('%d is %s', (score, category) => {
    expect(viewingCategory(score)).toBe(category)
  })
})

describe('scoreViewingConditions', () => {
  it('rates a clear moonless astronomical night Excellent without space weather', () => {
    const result = scoreViewingConditions(inputs({
      moon: local(moon(0, -20)),
      weather: local(weather(0)),
      spaceWeather: unavailable,
    }))
    expect(result).toMatchObject({ status: 'scored', score: 100, category: 'Excellent', darkness: 'night' })
    const twilight = scoreViewingConditions(inputs({
      instant: new Date('2025-01-16T17:50:00Z'),
      moon: local(moon(0)),
      weather: local(weather(0)),
      spaceWeather: unavailable,
    }))
    expect(twilight).toMatchObject({ score: 90, category: 'Excellent', darkness: 'astronomical', darknessMultiplier: 0.9 })
  })

  it('weights all three factors', () => {
    const result = scoreViewingConditions(inputs())
    if (result.status !== 'scored') throw new Error('expected a score')
    expect(result.score).toBe(56)
    expect(result.category).toBe('Fair')
    expect(result.breakdown.map(b => [b.factor, b.weight])).toEqual([
      ['cloud', 0.55],
      ['moon', 0.35],
      ['geomagnetic', 0.1],
    ])
  })

  it('renormalises linearly over the factors present', () => {
    const result = scoreViewingConditions(inputs({ spaceWeather: unavailable }))
    if (result.status !== 'scored') throw new Error('expected a score')
    expect(result.score).toBe(52)
    expect(result.breakdown.map(b => b.factor)).toEqual(['cloud', 'moon'])
    expect(result.breakdown[0]?.weight).toBeCloseTo(55 / 90, 12)
    expect(result.breakdown.reduce((sum, b) => sum + b.weight, 0)).toBeCloseTo(1, 12)
    expect(result.breakdown.reduce((sum, b) => sum + b.contribution, 0)).toBeCloseTo(51.6166, 4)
  })

  it('scales by the darkness multiplier', () => {
    const result = scoreViewingConditions(inputs({ instant: new Date('2025-01-16T17:50:00Z') }))
    expect(result).toMatchObject({ score: 51, darkness: 'astronomical' })
    const daytime = scoreViewingConditions(inputs({ instant: new Date('2025-01-16T12:00:00Z') }))
    expect(daytime).toMatchObject({ score: 6, category: 'Poor', darkness: 'day', darknessMultiplier: 0.1 })
  })

  it('assumes darkness when the Sun is unavailable', () => {
    expect(scoreViewingConditions(inputs({ sun: unavailable }))).toMatchObject({
      score: 56,
      darkness: null,
      darknessMultiplier: 1,
    })
  })

  it('has no score without any factor', () => {
    expect(scoreViewingConditions(inputs({
      moon: unavailable,
      weather: unavailable,
      spaceWeather: unavailable,
    }))).toEqual({ status: 'unavailable' })
  })
})

describe('recommendations', () => {
  it('warns about cloud, a bright Moon and twilight in that order', () => {
    expect(recommendations({ weather: weather(80), moon: moon(0.9), darkness: 'civil' })).toEqual([
      'Heavy cloud cover; wait for clearer skies',
      'Bright moon; best for planets and the Moon itself',
      'Not fully dark; brighter objects only',
    ])
  })

  it('calls out ideal deep-sky nights', () => {
    expect(recommendations({ weather: weather(10), moon: moon(0.1), darkness: 'night' })).toEqual([
      'Dark moon; good for galaxies and nebulae',
      'Excellent for deep-sky observing',
    ])
  })

  it('stays quiet about a bright Moon below the horizon', () => {
    expect(recommendations({ weather: weather(30), moon: moon(0.9, -5), darkness: null })).toEqual([
      'Some clouds; look for gaps',
    ])
  })
})
