/**
 * time — Julian Day arithmetic, civil-date conversion and ΔT.
 *
 * All calendar work runs on Julian Days in UT. The ephemeris series want
 * Terrestrial Time, so every position query adds ΔT = TT − UT first:
 *
 *   1900–2050  yearly table, linearly interpolated at year + (month − 0.5)/12
 *   otherwise  Espenak & Meeus polynomials (precision degrades silently)
 *
 * References:
 *   Meeus, Astronomical Algorithms 2nd ed., Ch. 7 (Julian Day)
 *   Espenak & Meeus — ΔT polynomial expressions (Five Millennium Canon, 2009)
 */

import type { CivilDate, ClockTime, GregorianInstant, Weekday } from '../types.js'
import deltaTTable from './delta-t.json' with { type: 'json' }

// ─── Constants ────────────────────────────────────────────────────────────────

/** Julian Date of J2000.0 epoch (2000 Jan 1, 12:00 TT) */
export const J2000 = 2451545.0

/** Julian Date of J1900.0 (1899 Dec 31, 12:00) */
export const J1900 = 2415020.0

/** Seconds per day */
export const SECONDS_PER_DAY = 86400.0

/** Days per Julian century */
export const DAYS_PER_JULIAN_CENTURY = 36525.0

/** Minutes as a fraction of a day */
export const MINUTE = 1 / 1440

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6]

// ─── Julian Date ─────────────────────────────────────────────────────────────

/**
 * Proleptic-Gregorian calendar date to Julian Day.
 * `hour` is the fractional hour of the day in the same time scale as the result.
 */
export function gregorianToJD(year: number, month: number, day: number, hour = 0): number {
  let y = year
  let m = month
  if (m <= 2) {
    y -= 1
    m += 12
  }
  const a = Math.trunc(y / 100)
  const b = 2 - a + Math.trunc(a / 4)
  return Math.floor(365.25 * (y + 4716)) + Math.floor(30.6001 * (m + 1)) + day + hour / 24 + b - 1524.5
}

/** Julian Day to calendar date plus fractional hour. Exact inverse of gregorianToJD. */
export function jdToGregorian(jd: number): GregorianInstant {
  const jd5 = jd + 0.5
  const z = Math.floor(jd5)
  const f = jd5 - z
  let a = z
  if (z >= 2299161) {
    const alpha = Math.floor((z - 1867216.25) / 36524.25)
    a = z + 1 + alpha - Math.floor(alpha / 4)
  }
  const b = a + 1524
  const c = Math.floor((b - 122.1) / 365.25)
  const d = Math.floor(365.25 * c)
  const e = Math.floor((b - d) / 30.6001)
  const dayFrac = b - d - Math.floor(30.6001 * e) + f
  const day = Math.floor(dayFrac)
  const month = e < 14 ? e - 1 : e - 13
  const year = month > 2 ? c - 4716 : c - 4715
  return { year, month, day, hour: (dayFrac - day) * 24 }
}

/** Julian Day at 0h UT of a civil date */
export function civilDateToJD(date: CivilDate): number {
  return gregorianToJD(date.year, date.month, date.day)
}

/** The civil date containing a Julian Day (UT) */
export function jdToCivilDate(jd: number): CivilDate {
  const { year, month, day } = jdToGregorian(jd)
  return { year, month, day }
}

/** Day of week, 0 = Sunday. 2000-01-01 (JD 2451544.5) is a Saturday (6). */
export function dayOfWeek(jd: number): Weekday {
  return WEEKDAYS[((Math.floor(jd + 1.5) % 7) + 7) % 7]
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month < 1 || month > 12) throw new RangeError(`Month must be 1-12, got ${month}`)
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month - 1]
}

/**
 * Local clock time of a UT Julian Day, rounded to the nearest second.
 * Rounding carries into minutes and hours; 23:59:59.6 reads as 24:00:00.
 */
export function jdToLocalTime(jd: number, utcOffset: number): ClockTime {
  const localJd = jd + 0.5 + utcOffset / 24
  const hours = (localJd - Math.floor(localJd)) * 24
  let hour = Math.floor(hours)
  let minute = Math.floor((hours - hour) * 60)
  let second = Math.floor(((hours - hour) * 60 - minute) * 60 + 0.5)
  if (second === 60) { second = 0; minute++ }
  if (minute === 60) { minute = 0; hour++ }
  return { hour, minute, second }
}

/** Convert a JavaScript Date (UTC) to Julian Date. */
export function dateToJD(date: Date): number {
  return date.getTime() / 86400000 + 2440587.5
}

/** Julian centuries from J2000.0 */
export function jdToT(jd: number): number {
  return (jd - J2000) / DAYS_PER_JULIAN_CENTURY
}

// ─── ΔT ───────────────────────────────────────────────────────────────────────

const DT_START: number = deltaTTable.startYear
const DT_SECONDS: readonly number[] = deltaTTable.seconds

/** ΔT = TT − UT in seconds for a UT Julian Day. */
export function deltaTSeconds(jdUT: number): number {
  const { year, month } = jdToGregorian(jdUT)
  const y = year + (month - 0.5) / 12
  const idx = y - DT_START
  if (idx >= 0 && idx < DT_SECONDS.length) {
    const i = Math.min(Math.floor(idx), DT_SECONDS.length - 2)
    const frac = idx - i
    return DT_SECONDS[i] + frac * (DT_SECONDS[i + 1] - DT_SECONDS[i])
  }
  // Not continuous with the table: past 2051.0 ΔT steps from ~74.6 s to ~95 s
  return deltaTPolynomial(y)
}

/** ΔT in days */
export function deltaT(jdUT: number): number {
  return deltaTSeconds(jdUT) / SECONDS_PER_DAY
}

/**
 * ΔT polynomial: TT − UT in seconds for a decimal year.
 * Espenak & Meeus expressions, piecewise by year range.
 */
export function deltaTPolynomial(y: number): number {
  if (y < -500) {
    const u = (y - 1820) / 100
    return -20 + 32 * u * u
  } else if (y < 500) {
    const u = y / 100
    return (
      10583.6 - 1014.41 * u + 33.78311 * u * u - 5.952053 * u * u * u -
      0.1798452 * u ** 4 + 0.022174192 * u ** 5 + 0.0090316521 * u ** 6
    )
  } else if (y < 1600) {
    const u = (y - 1000) / 100
    return (
      1574.2 - 556.01 * u + 71.23472 * u * u + 0.319781 * u ** 3 -
      0.8503463 * u ** 4 - 0.005050998 * u ** 5 + 0.0083572073 * u ** 6
    )
  } else if (y < 1700) {
    const t = y - 1600
    return 120 - 0.9808 * t - 0.01532 * t * t + t ** 3 / 7129
  } else if (y < 1800) {
    const t = y - 1700
    return (
      8.83 + 0.1603 * t - 0.0059285 * t * t + 0.00013336 * t ** 3 - t ** 4 / 1174000
    )
  } else if (y < 1860) {
    const t = y - 1800
    return (
      13.72 - 0.332447 * t + 0.0068612 * t * t + 0.0041116 * t ** 3 -
      0.00037436 * t ** 4 + 0.0000121272 * t ** 5 -
      0.0000001699 * t ** 6 + 0.000000000875 * t ** 7
    )
  } else if (y < 1900) {
    const t = y - 1860
    return (
      7.62 + 0.5737 * t - 0.251754 * t * t + 0.01680668 * t ** 3 -
      0.0004473624 * t ** 4 + t ** 5 / 233174
    )
  } else if (y < 2150) {
    return -20 + 32 * ((y - 1820) / 100) ** 2 - 0.5628 * (2150 - y)
  } else {
    const u = (y - 1820) / 100
    return -20 + 32 * u * u
  }
}
