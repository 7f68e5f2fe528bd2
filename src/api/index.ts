/**
 * api — User-facing functions and the calendar session.
 *
 * This is the only module users need to import directly.
 * Everything else in src/ is internal plumbing.
 *
 * Two ways in:
 *
 * 1. One-shot functions: getPanchang(), getSolarDate() and friends validate
 *    their options, compute one answer on a fresh ephemeris state and return.
 *
 * 2. CalendarSession: holds a validated location, settings and one
 *    EphemerisState across many queries (a month grid, a year of sankrantis).
 *    A session is for one caller at a time; give each concurrent computation
 *    its own.
 *
 * Dates may be passed as CivilDate objects or as JavaScript Dates, whose
 * UTC calendar date is used (`new Date('2025-01-18')` is 18 January).
 */

import type {
  CivilDate,
  Location,
  Nutation,
  PanchangDay,
  SolarCalendarVariant,
  SolarDate,
  TithiMoment,
} from '../types.js'
import type { CalendarSettings, CalendarSettingsInput, LocationInput } from '../config/index.js'
import { NEW_DELHI, parseLocation, resolveSettings } from '../config/index.js'
import { EphemerisState } from '../state/index.js'
import { civilDateToJD, dateToJD, jdToGregorian } from '../time/index.js'
import {
  meanObliquityAt,
  nutationAt,
  solarDeclination,
  solarLongitude,
  solarRightAscension,
  trueObliquityAt,
} from '../sun/index.js'
import { lunarLongitude } from '../moon/index.js'
import { ayanamsa, solarLongitudeSidereal } from '../ayanamsa/index.js'
import { sunriseJD, sunsetJD } from '../events/index.js'
import { lunarPhase, tithiAt } from '../tithi/index.js'
import { monthPanchang, panchangForDate } from '../panchang/index.js'
import {
  monthSolarCalendar,
  parseSolarCalendarVariant,
  sankrantiBefore,
  solarDateFor,
  solarEraName,
  solarMonthName,
  solarToGregorian,
} from '../solar/index.js'

// ─── Options ──────────────────────────────────────────────────────────────────

export interface CalendarOptions {
  /** Observer location; defaults to settings.defaultLocation (New Delhi) */
  location?: LocationInput
  /** Overrides for the regional calendar constants */
  settings?: CalendarSettingsInput
}

/** A SolarDate with its display names filled in */
export interface NamedSolarDate extends SolarDate {
  variant: SolarCalendarVariant
  monthName: string
  era: string
}

/** Sunrise and sunset of a civil day; null on a polar day or night */
export interface SunTimes {
  sunrise: Date | null
  sunset: Date | null
}

export type DateInput = CivilDate | Date

// ─── Helpers ──────────────────────────────────────────────────────────────────

function toCivilDate(date: DateInput): CivilDate {
  if (date instanceof Date) {
    if (isNaN(date.getTime())) throw new RangeError('Invalid Date')
    return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() }
  }
  return date
}

/** JS Date (UTC) of a UT Julian Day */
export function jdToDate(jd: number): Date {
  return new Date(Math.round((jd - 2440587.5) * 86400000))
}

function toVariant(calendar: SolarCalendarVariant | string): SolarCalendarVariant {
  return parseSolarCalendarVariant(calendar)
}

// ─── Session ──────────────────────────────────────────────────────────────────

export class CalendarSession {
  readonly location: Location
  readonly settings: CalendarSettings
  readonly state = new EphemerisState()

  constructor(options: CalendarOptions = {}) {
    this.settings = resolveSettings(options.settings)
    this.location = options.location ? parseLocation(options.location) : this.settings.defaultLocation
  }

  // Positions, all at a UT Julian Day

  solarLongitude(jd: number): number {
    return solarLongitude(jd, this.state)
  }

  lunarLongitude(jd: number): number {
    return lunarLongitude(jd, this.state)
  }

  solarLongitudeSidereal(jd: number): number {
    return solarLongitudeSidereal(jd, this.state)
  }

  ayanamsa(jd: number): number {
    return ayanamsa(jd, this.state)
  }

  solarDeclination(jd: number): number {
    return solarDeclination(jd, this.state)
  }

  solarRightAscension(jd: number): number {
    return solarRightAscension(jd, this.state)
  }

  nutation(jd: number): Nutation {
    return nutationAt(jd, this.state)
  }

  meanObliquity(jd: number): number {
    return meanObliquityAt(jd, this.state)
  }

  trueObliquity(jd: number): number {
    return trueObliquityAt(jd, this.state)
  }

  lunarPhase(jd: number): number {
    return lunarPhase(jd, this.state)
  }

  tithiAt(jd: number): TithiMoment {
    return tithiAt(jd, this.state)
  }

  // Civil days

  sunrise(date: DateInput): number | null {
    return sunriseJD(civilDateToJD(toCivilDate(date)), this.location, this.state)
  }

  sunset(date: DateInput): number | null {
    return sunsetJD(civilDateToJD(toCivilDate(date)), this.location, this.state)
  }

  panchang(date: DateInput): PanchangDay {
    return panchangForDate(toCivilDate(date), this.location, this.state)
  }

  monthPanchang(year: number, month: number): PanchangDay[] {
    return monthPanchang(year, month, this.location, this.state)
  }

  // Solar calendars

  solarDate(date: DateInput, calendar: SolarCalendarVariant | string): NamedSolarDate {
    const variant = toVariant(calendar)
    const jd = civilDateToJD(toCivilDate(date))
    return this.named(solarDateFor(jd, this.location, variant, this.settings, this.state), variant)
  }

  solarMonth(year: number, month: number, calendar: SolarCalendarVariant | string): NamedSolarDate[] {
    const variant = toVariant(calendar)
    return monthSolarCalendar(year, month, this.location, variant, this.settings, this.state)
      .map(d => this.named(d, variant))
  }

  solarToGregorian(date: Pick<SolarDate, 'year' | 'month' | 'day'>, calendar: SolarCalendarVariant | string): CivilDate {
    return solarToGregorian(date, this.location, toVariant(calendar), this.settings, this.state)
  }

  /** JD (UT) of the latest sankranti at or before `jd` */
  sankrantiBefore(jd: number): number {
    return sankrantiBefore(jd, this.state)
  }

  private named(date: SolarDate, variant: SolarCalendarVariant): NamedSolarDate {
    return {
      ...date,
      variant,
      monthName: solarMonthName(date.month, variant),
      era: solarEraName(variant),
    }
  }
}

// ─── One-shot functions ───────────────────────────────────────────────────────

/**
 * Panchang for one civil day: sunrise, tithi, masa and the lunisolar date.
 *
 * @example
 *   const day = getPanchang({ year: 2025, month: 1, day: 18 })
 *   day.hinduDate.masaName   // 'Pausha'
 */
export function getPanchang(date: DateInput, options: CalendarOptions = {}): PanchangDay {
  return new CalendarSession(options).panchang(date)
}

export function getMonthPanchang(year: number, month: number, options: CalendarOptions = {}): PanchangDay[] {
  return new CalendarSession(options).monthPanchang(year, month)
}

/**
 * Regional solar date of a civil day.
 *
 * @param calendar - 'tamil', 'bengali', 'odia' or 'malayalam'
 * @throws UnknownCalendarError for any other name
 */
export function getSolarDate(
  date: DateInput,
  calendar: SolarCalendarVariant | string,
  options: CalendarOptions = {},
): NamedSolarDate {
  return new CalendarSession(options).solarDate(date, calendar)
}

export function getSolarMonth(
  year: number,
  month: number,
  calendar: SolarCalendarVariant | string,
  options: CalendarOptions = {},
): NamedSolarDate[] {
  return new CalendarSession(options).solarMonth(year, month, calendar)
}

/** Civil date of a regional solar date. */
export function getGregorianDate(
  date: Pick<SolarDate, 'year' | 'month' | 'day'>,
  calendar: SolarCalendarVariant | string,
  options: CalendarOptions = {},
): CivilDate {
  return new CalendarSession(options).solarToGregorian(date, calendar)
}

/** Sunrise and sunset of a civil day as JS Dates. */
export function getSunTimes(date: DateInput, options: CalendarOptions = {}): SunTimes {
  const session = new CalendarSession(options)
  const sunrise = session.sunrise(date)
  const sunset = session.sunset(date)
  return {
    sunrise: sunrise === null ? null : jdToDate(sunrise),
    sunset: sunset === null ? null : jdToDate(sunset),
  }
}

/** Tithi current at an instant (default: now). */
export function getTithi(at: Date = new Date()): TithiMoment {
  return tithiAt(dateToJD(at))
}

/** Civil date of a UT Julian Day in the given location's local time. */
export function localCivilDate(jd: number, location: Location = NEW_DELHI): CivilDate {
  const { year, month, day } = jdToGregorian(jd + location.utcOffset / 24)
  return { year, month, day }
}
