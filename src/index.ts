/**
 * panchang-engine — Hindu lunisolar panchang and regional solar calendars.
 *
 * A self-contained Sun/Moon ephemeris (truncated VSOP87 and ELP2000-85
 * series, Lahiri ayanamsa, iterative sunrise) drives the calendar rules:
 * tithi at sunrise, amanta masa with adhika months, Saka/Vikram years, and
 * the Tamil, Bengali, Odia and Malayalam solar calendars.
 *
 * Quick start:
 *   import { getPanchang, getSolarDate } from 'panchang-engine'
 *
 *   const day = getPanchang({ year: 2025, month: 1, day: 18 })
 *   day.hinduDate   // Pausha Krishna 5, Saka 1946
 *
 *   getSolarDate(new Date('2025-04-14'), 'tamil')   // Chithirai 1, 1947
 */

// ─── Primary API ──────────────────────────────────────────────────────────────

export {
  CalendarSession,
  getPanchang,
  getMonthPanchang,
  getSolarDate,
  getSolarMonth,
  getGregorianDate,
  getSunTimes,
  getTithi,
  jdToDate,
  localCivilDate,
} from './api/index.js'

export type { CalendarOptions, DateInput, NamedSolarDate, SunTimes } from './api/index.js'

// ─── Calendar engines ─────────────────────────────────────────────────────────

export {
  lunarPhase,
  tithiAt,
  tithiAtSunrise,
  tithiFromPhase,
  tithiName,
  tithiLabel,
  findTithiBoundary,
} from './tithi/index.js'

export {
  masaFor,
  masaForDate,
  newMoonBefore,
  newMoonAfter,
  solarRashi,
  hinduYearSaka,
  hinduYearVikram,
} from './masa/index.js'

export {
  panchangForDate,
  gregorianToHindu,
  monthPanchang,
  formatTithi,
  formatHinduDate,
  formatDayReport,
  formatMonthTable,
} from './panchang/index.js'

export {
  SOLAR_CALENDARS,
  criticalTime,
  sankrantiJd,
  sankrantiBefore,
  sankrantiToCivilDay,
  solarDateFor,
  gregorianToSolar,
  solarToGregorian,
  monthSolarCalendar,
  solarMonthName,
  solarEraName,
  rashiName,
  parseSolarCalendarVariant,
  isSolarCalendarVariant,
  formatSolarDate,
} from './solar/index.js'

// ─── Ephemeris ────────────────────────────────────────────────────────────────

export { EphemerisState } from './state/index.js'
export {
  solarLongitude,
  solarDeclination,
  solarRightAscension,
  nutation,
  nutationAt,
  meanObliquity,
  meanObliquityAt,
  trueObliquityAt,
} from './sun/index.js'
export { lunarLongitude } from './moon/index.js'
export { ayanamsa, solarLongitudeSidereal } from './ayanamsa/index.js'
export { sunriseJD, sunsetJD, horizonAltitude } from './events/index.js'

// ─── Time ─────────────────────────────────────────────────────────────────────

export {
  gregorianToJD,
  jdToGregorian,
  civilDateToJD,
  jdToCivilDate,
  dayOfWeek,
  daysInMonth,
  jdToLocalTime,
  dateToJD,
  deltaT,
} from './time/index.js'

// ─── Configuration and errors ─────────────────────────────────────────────────

export { resolveSettings, parseLocation, DEFAULT_SETTINGS, NEW_DELHI } from './config/index.js'
export type { CalendarSettings, CalendarSettingsInput, LocationInput } from './config/index.js'
export { BracketError, EphemerisStateBusyError, SettingsError, UnknownCalendarError } from './errors/index.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  CivilDate,
  ClockTime,
  GregorianInstant,
  Weekday,
  Location,
  Nutation,
  Paksha,
  TithiMoment,
  TithiRecord,
  MasaRecord,
  HinduDate,
  PanchangDay,
  SolarCalendarVariant,
  SolarCalendarInfo,
  SolarDate,
} from './types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

export {
  SOLAR_CALENDAR_VARIANTS,
  RASHI_NAMES,
  MASA_NAMES,
  TITHI_NAMES,
  WEEKDAY_NAMES,
  WEEKDAY_SHORT,
} from './types.js'
