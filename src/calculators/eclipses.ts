import { eclipseOutlook } from '../eclipses/index.js'
import { localCalendarDate, utcOffsetHours } from '../time/index.js'
import type { EclipseOutlook } from '../types.js'
import type { Calculator } from './calculator.js'

/** Eclipse table lookup; no live source */
export const eclipsesCalculator: Calculator<EclipseOutlook> = {
  domain: 'eclipses',
  computeLocal: ({ location, instant, config }) =>
    eclipseOutlook(localCalendarDate(instant, utcOffsetHours(location)), config.eclipseHorizonDays),
}
