import { z } from 'zod'
import { MalformedPayloadError } from '../errors/index.js'
import { buildUrl, parsePayload, requestJson } from '../sources/index.js'
import { MS_PER_DAY } from '../time/index.js'
import type { WeatherConditions } from '../types.js'
import { nightCloudCover } from '../weather/index.js'
import type { HourlySample } from '../weather/index.js'
import type { Calculator, CalculatorContext } from './calculator.js'

const SOURCE = 'open-meteo'

const openMeteoSchema = z.object({
  hourly: z.object({
    time: z.array(z.string()),
    cloud_cover: z.array(z.number().min(0).max(100).nullable()),
    is_day: z.array(z.number().nullable()),
  }),
})

/** Open-Meteo hourly times under timezone=UTC look like "2025-01-16T18:00" */
function parseHour(text: string): Date {
  const time = new Date(/[zZ]|[+-]\d{2}:\d{2}$/.test(text) ? text : `${text}Z`)
  if (Number.isNaN(time.getTime())) throw new MalformedPayloadError(SOURCE, `bad hour "${text}"`)
  return time
}

/** Convert an Open-Meteo forecast body into night cloud cover at `instant`. */
export function parseOpenMeteo(body: unknown, instant: Date): WeatherConditions {
  const { hourly } = parsePayload(openMeteoSchema, body, SOURCE)
  if (hourly.cloud_cover.length !== hourly.time.length || hourly.is_day.length !== hourly.time.length) {
    throw new MalformedPayloadError(SOURCE, 'hourly arrays differ in length')
  }
  const samples = hourly.time.map((text, i): HourlySample => ({
    time: parseHour(text),
    cloudCover: hourly.cloud_cover[i] ?? null,
    isDay: hourly.is_day[i] === 1,
  }))
  const conditions = nightCloudCover(samples, instant)
  if (!conditions) throw new MalformedPayloadError(SOURCE, 'no cloud cover for the coming night')
  return conditions
}

/** Open-Meteo cloud cover; no local fallback */
export const weatherCalculator: Calculator<WeatherConditions> = {
  domain: 'weather',
  source: SOURCE,

  async computeLive(ctx: CalculatorContext): Promise<WeatherConditions> {
    const { location, instant, config } = ctx
    const url = buildUrl(config.endpoints.openMeteo, 'v1/forecast', {
      latitude: location.latitude,
      longitude: location.longitude,
      hourly: 'cloud_cover,is_day',
      timezone: 'UTC',
      start_date: instant.toISOString().slice(0, 10),
      end_date: new Date(instant.getTime() + MS_PER_DAY).toISOString().slice(0, 10),
    })
    const body = await requestJson(ctx.fetchJson, url, {
      source: SOURCE,
      timeoutMs: config.timeoutMs,
      signal: ctx.signal,
      logger: ctx.logger,
    })
    return parseOpenMeteo(body, instant)
  },
}
