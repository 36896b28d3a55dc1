import { meteorOutlook } from '../meteors/index.js'
import { localCalendarDate, utcOffsetHours } from '../time/index.js'
import type { MeteorOutlook } from '../types.js'
import type { Calculator } from './calculator.js'

/** Shower calendar lookup; no live source */
export const meteorsCalculator: Calculator<MeteorOutlook> = {
  domain: 'meteors',
  computeLocal: ({ location, instant, config }) =>
    meteorOutlook(localCalendarDate(instant, utcOffsetHours(location)), config.showerLookaheadDays),
}
