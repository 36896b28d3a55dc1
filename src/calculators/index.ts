/**
 * calculators — One calculator per domain, each following the live-then-local
 * protocol in {@link compute}.
 */

import type { Domain, DomainResults, SourceResult } from '../types.js'
import type { Calculator } from './calculator.js'
import { eclipsesCalculator } from './eclipses.js'
import { issCalculator } from './iss.js'
import { meteorsCalculator } from './meteors.js'
import { moonCalculator } from './moon.js'
import { planetsCalculator } from './planets.js'
import { spaceWeatherCalculator } from './space-weather.js'
import { sunCalculator } from './sun.js'
import { weatherCalculator } from './weather.js'

export { compute } from './calculator.js'
export type { Calculator, CalculatorContext } from './calculator.js'
export { moonCalculator, parseUsnoMoon } from './moon.js'
export { sunCalculator, parseSunriseSunset } from './sun.js'
export { planetsCalculator, parseVisiblePlanets } from './planets.js'
export { meteorsCalculator } from './meteors.js'
export { eclipsesCalculator } from './eclipses.js'
export { spaceWeatherCalculator, parseKp, parsePlasma } from './space-weather.js'
export { weatherCalculator, parseOpenMeteo } from './weather.js'
export { issCalculator, parseIssPasses, compassPoint, ISS_NORAD_ID } from './iss.js'

/** Value type a domain's calculator produces */
export type DomainValue<D extends Domain> = DomainResults[D] extends SourceResult<infer T> ? T : never

export type CalculatorRegistry = { readonly [D in Domain]: Calculator<DomainValue<D>> }

export const CALCULATORS: CalculatorRegistry = {
  sun: sunCalculator,
  moon: moonCalculator,
  planets: planetsCalculator,
  meteors: meteorsCalculator,
  eclipses: eclipsesCalculator,
  spaceWeather: spaceWeatherCalculator,
  weather: weatherCalculator,
  iss: issCalculator,
}
