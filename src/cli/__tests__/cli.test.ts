import { describe, expect, it, vi } from 'vitest'
import type { FetchJson } from '../../sources/index.js'
import type { CliIO } from '../run.js'
import { parseArgs, runCli } from '../run.js'

const refuse: FetchJson = async url => {
  throw new Error(`unexpected request to ${url}`)
}

function fakeIO(overrides: Partial<CliIO> = {}) {
  const out: string[] = []
  const err: string[] = []
  const io: CliIO = {
    out: line => out.push(line),
    err: line => err.push(line),
    env: { SKY_BRIEFING_LOG_LEVEL: 'silent' },
    fetchJson: refuse,
    now: () => new Date('2025-01-16T22:00:00Z'),
    ...overrides,
  }
  return { io, out, err }
}

describe('parseArgs', () => {
  it('separates options from positional arguments', () => {
    expect(parseArgs(['51.5', '--tz', '-5', '-0.1', '--offline', '--timeout', '2000'])).toEqual({
      positional: ['51.5', '-0.1'],
      offline: true,
      tz: -5,
      timeoutMs: 2000,
    })
  })

  it('rejects unknown options and missing numbers', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option --verbose')
    expect(() => parseArgs(['--tz'])).toThrow('--tz needs a number')
  })
})

describe('runCli', () => {
  it('prints usage for help', async () => {
    const { io, out } = fakeIO()
    expect(await runCli(['help'], io)).toBe(0)
    expect(out[0]?.startsWith('sky-briefing')).toBe(true)
  })

  it('fails on an unknown command', async () => {
    const { io, err } = fakeIO()
    expect(await runCli(['forecast'], io)).toBe(1)
    expect(err[0]).toBe('Unknown command: forecast')
  })

  it('prints the briefing and its sources offline', async () => {
    const fetchJson = vi.fn(refuse)
    const { io, out } = fakeIO({ fetchJson })
    const code = await runCli(['briefing', '51.5', '-0.1', '2025-01-16T22:00:00Z', '--offline', '--tz', '0'], io)
    expect(code).toBe(0)
    expect(fetchJson).not.toHaveBeenCalled()
    expect(out[0]?.startsWith('Sky briefing for January 16, 2025.')).toBe(true)
    expect(out.slice(1)).toEqual([
      '',
      'Sources:',
      '  sun           local (live disabled)',
      '  moon          local (live disabled)',
      '  planets       local (live disabled)',
      '  meteors       local',
      '  eclipses      local',
      '  spaceWeather  unavailable (disabled)',
      '  weather       unavailable (disabled)',
      '  iss           unavailable (disabled)',
    ])
  })

  it('reads a bare date as that evening', async () => {
    const { io, out } = fakeIO()
    expect(await runCli(['json', '51.5', '-0.1', '2025-08-12', '--offline', '--tz', '1'], io)).toBe(0)
    const dict: unknown = JSON.parse(out.join('\n'))
    expect(dict).toMatchObject({
      instant: '2025-08-12T21:00:00.000Z',
      local_date: '2025-08-12',
      provenance: { sun: 'local-fallback', weather: 'unavailable' },
    })
  })

  it('prints the evening summary', async () => {
    const { io, out } = fakeIO()
    expect(await runCli(['tonight', '51.5', '-0.1', '--offline'], io)).toBe(0)
    expect(out).toHaveLength(1)
    expect(out[0]?.startsWith('Tonight: ')).toBe(true)
  })

  it('reports bad input without a stack trace', async () => {
    const { io, err } = fakeIO()
    expect(await runCli(['briefing', 'north'], io)).toBe(1)
    expect(err).toEqual(['Usage: sky-briefing briefing <lat> <lon> [when]'])
    const second = fakeIO()
    expect(await runCli(['briefing', '95', '0', '--offline'], second.io)).toBe(1)
    expect(second.err).toEqual(['Latitude must be within [-90, 90], got 95'])
  })

  it('prints the Moon phase and the next principal phases', async () => {
    const { io, out } = fakeIO()
    expect(await runCli(['phase', '2000-01-06T18:14:00Z'], io)).toBe(0)
    expect(out.slice(0, 5)).toEqual([
      'Moon phase at 2000-01-06T18:14 UTC:',
      '  Phase:         New Moon',
      '  Illumination:  0.0%',
      '  Age:           0.0 days',
      '  First Quarter: 2000-01-14T03:25 UTC',
    ])
    expect(out).toHaveLength(8)
  })

  it('lists active and upcoming meteor showers', async () => {
    const { io, out } = fakeIO()
    expect(await runCli(['showers', '2025-12-10'], io)).toBe(0)
    expect(out).toEqual([
      'Active:   Geminids, peaks in 4 d, ~60/h (Good)',
      'Active:   Northern Taurids, peaked 28 d ago, ~1/h (Poor)',
      'Upcoming: Ursids, peaks in 12 d, ZHR 10',
      'Upcoming: Quadrantids, peaks in 25 d, ZHR 120',
    ])
  })

  it('says when no shower is active', async () => {
    const { io, out } = fakeIO()
    await runCli(['showers', '2025-06-01'], io)
    expect(out).toEqual(['No meteor showers active on 2025-06-01.'])
  })

  it('lists eclipses for the coming year', async () => {
    const { io, out } = fakeIO()
    expect(await runCli(['eclipses', '2025-03-01'], io)).toBe(0)
    expect(out.map(line => line.slice(0, 10))).toEqual(['2025-03-14', '2025-03-29', '2025-09-07', '2025-09-21', '2026-02-17'])
    expect(out[0]).toMatch(/^2025-03-14 {2}total lunar eclipse\. Visible from .+\.$/)
  })
})
