/**
 * solar — Regional sidereal solar calendars (Tamil, Bengali, Odia, Malayalam).
 *
 * A solar month begins when the Sun enters a sidereal sign (sankranti, the
 * crossing of a multiple of 30° in Lahiri longitude). The instant is the
 * same everywhere; the regional calendars differ in which civil day they
 * assign it to. Each compares the sankranti with a critical time on the
 * civil day it falls on:
 *
 *   Tamil      sunset − 8 min
 *   Bengali    local midnight + 24 min, with a tithi tie break
 *   Odia       22:12 local
 *   Malayalam  sunrise + 0.6 × daylight − 9.5 min
 *
 * At or before the critical time the month starts that day, after it the
 * month starts the next day. The minute offsets absorb a fixed difference
 * between this engine's ayanamsa and the almanacs the rules were fitted
 * against; all are in CalendarSettings.
 *
 * Years: Tamil and Odia count Saka years, Bengali the Bangabda, all turning
 * at Mesha. The Malayalam Kollam year turns at Simha, so its month 1 is
 * rashi 5.
 */

import type {
  CivilDate,
  Location,
  SolarCalendarInfo,
  SolarCalendarVariant,
  SolarDate,
} from '../types.js'
import { RASHI_NAMES, SOLAR_CALENDAR_VARIANTS } from '../types.js'
import type { CalendarSettings } from '../config/index.js'
import { DEFAULT_SETTINGS } from '../config/index.js'
import { UnknownCalendarError } from '../errors/index.js'
import { EphemerisState } from '../state/index.js'
import { bisectAngle } from '../math/index.js'
import { solarLongitudeSidereal } from '../ayanamsa/index.js'
import { sunriseJD, sunsetJD } from '../events/index.js'
import { tithiAtSunrise } from '../tithi/index.js'
import { MINUTE, civilDateToJD, daysInMonth, gregorianToJD, jdToCivilDate, jdToGregorian } from '../time/index.js'
import calendars from './calendars.json' with { type: 'json' }

// ─── Variants ─────────────────────────────────────────────────────────────────

export const SOLAR_CALENDARS: Record<SolarCalendarVariant, SolarCalendarInfo> = calendars

export function isSolarCalendarVariant(name: string): name is SolarCalendarVariant {
  return SOLAR_CALENDAR_VARIANTS.some(v => v === name)
}

/** Resolve a variant name (case-insensitive); throws UnknownCalendarError. */
export function parseSolarCalendarVariant(name: string): SolarCalendarVariant {
  const key = name.trim().toLowerCase()
  if (!isSolarCalendarVariant(key)) throw new UnknownCalendarError(name)
  return key
}

export function solarMonthName(month: number, variant: SolarCalendarVariant): string {
  if (month < 1 || month > 12) throw new RangeError(`Solar month must be 1-12, got ${month}`)
  return SOLAR_CALENDARS[variant].months[month - 1]
}

export function solarEraName(variant: SolarCalendarVariant): string {
  return SOLAR_CALENDARS[variant].era
}

export function rashiName(rashi: number): string {
  if (rashi < 1 || rashi > 12) throw new RangeError(`Rashi must be 1-12, got ${rashi}`)
  return RASHI_NAMES[rashi - 1]
}

/** Regional month number 1–12 for a rashi */
export function rashiToRegionalMonth(rashi: number, variant: SolarCalendarVariant): number {
  const m = rashi - SOLAR_CALENDARS[variant].firstRashi + 1
  return m <= 0 ? m + 12 : m
}

/** Rashi 1–12 that names regional month `month` */
export function regionalMonthToRashi(month: number, variant: SolarCalendarVariant): number {
  const r = month + SOLAR_CALENDARS[variant].firstRashi - 1
  return r > 12 ? r - 12 : r
}

// ─── Critical time ────────────────────────────────────────────────────────────

/** Local 06:00 and 18:00 stand in for sunrise and sunset on polar days. */
function riseOrMorning(jd: number, loc: Location, state: EphemerisState): number {
  return sunriseJD(jd, loc, state) ?? jd + 0.25 - loc.utcOffset / 24
}

function setOrEvening(jd: number, loc: Location, state: EphemerisState): number {
  return sunsetJD(jd, loc, state) ?? jd + 0.75 - loc.utcOffset / 24
}

/**
 * JD (UT) of the critical time on the civil day `jd` (as returned by
 * gregorianToJD): a sankranti at or before it starts the month that day.
 */
export function criticalTime(
  jd: number,
  loc: Location,
  variant: SolarCalendarVariant,
  settings: CalendarSettings = DEFAULT_SETTINGS,
  state = new EphemerisState(),
): number {
  const midnight = jd - loc.utcOffset / 24
  switch (variant) {
    case 'tamil':
      return setOrEvening(jd, loc, state) - settings.tamilSunsetOffsetMinutes * MINUTE
    case 'bengali':
      return midnight + settings.bengaliMidnightWindowMinutes * MINUTE
    case 'odia':
      return midnight + settings.odiaCutoffHour / 24
    case 'malayalam': {
      const rise = riseOrMorning(jd, loc, state)
      const set = setOrEvening(jd, loc, state)
      return rise + settings.malayalamDaytimeFraction * (set - rise) - settings.malayalamOffsetMinutes * MINUTE
    }
    default: {
      const unknown: never = variant
      throw new UnknownCalendarError(String(unknown))
    }
  }
}

// ─── Sankranti ────────────────────────────────────────────────────────────────

/**
 * Instant the sidereal Sun crosses `targetLongitude`, searched within
 * ±20 days of `jdApprox`. The bracket is widened backwards by a month when
 * the Sun is already past the target at its start.
 */
export function sankrantiJd(jdApprox: number, targetLongitude: number, state = new EphemerisState()): number {
  let lo = jdApprox - 20
  const hi = jdApprox + 20
  const lonAt = (jd: number) => solarLongitudeSidereal(jd, state)

  let diff = lonAt(lo) - targetLongitude
  if (diff > 180) diff -= 360
  if (diff < -180) diff += 360
  if (diff >= 0) lo -= 30

  return bisectAngle(lonAt, targetLongitude, lo, hi, 'sidereal solar longitude')
}

/** Rashi 1–12 the Sun is in at `jd`, and the degrees it has covered in it. */
function rashiAt(jd: number, state: EphemerisState): { rashi: number; target: number; degreesPast: number } {
  const lon = solarLongitudeSidereal(jd, state)
  const rashi = Math.min(Math.max(Math.floor(lon / 30) + 1, 1), 12)
  const target = (rashi - 1) * 30
  let degreesPast = lon - target
  if (degreesPast < 0) degreesPast += 360
  return { rashi, target, degreesPast }
}

/** The most recent sankranti at or before `jd`. The Sun moves about 1° a day. */
export function sankrantiBefore(jd: number, state = new EphemerisState()): number {
  const { target, degreesPast } = rashiAt(jd, state)
  return sankrantiJd(jd - degreesPast, target, state)
}

/**
 * Civil day (JD of its 0h, as from gregorianToJD) on which a regional month
 * opened by the sankranti at `jdSankranti` into `rashi` begins.
 */
export function sankrantiToCivilDay(
  jdSankranti: number,
  loc: Location,
  variant: SolarCalendarVariant,
  rashi: number,
  settings: CalendarSettings = DEFAULT_SETTINGS,
  state = new EphemerisState(),
): number {
  const jdDay = Math.floor(jdSankranti + loc.utcOffset / 24 + 0.5) - 0.5
  if (jdSankranti > criticalTime(jdDay, loc, variant, settings, state)) return jdDay + 1

  // Bengali: Karka always stays; Makara always moves to the next day; the
  // rest move when the tithi of the previous sunrise has already ended.
  if (variant === 'bengali' && settings.bengaliTithiRule && rashi !== 4) {
    if (rashi === 10) return jdDay + 1
    const previous = tithiAtSunrise(jdToCivilDate(jdDay - 1), loc, state)
    if (previous.jdEnd <= jdSankranti) return jdDay + 1
  }
  return jdDay
}

// ─── Conversion ───────────────────────────────────────────────────────────────

/** Regional year of the civil day `jd`, using the Gregorian year of `jdCrit`. */
function regionalYear(
  jdCrit: number,
  jd: number,
  loc: Location,
  variant: SolarCalendarVariant,
  settings: CalendarSettings,
  state: EphemerisState,
): number {
  const info = SOLAR_CALENDARS[variant]
  const { year: gy } = jdToGregorian(jdCrit)

  let startMonth = 3 + info.firstRashi
  if (startMonth > 12) startMonth -= 12
  const jdYearStart = sankrantiJd(gregorianToJD(gy, startMonth, 14), (info.firstRashi - 1) * 30, state)
  const jdYearCivil = sankrantiToCivilDay(jdYearStart, loc, variant, info.firstRashi, settings, state)

  return jd >= jdYearCivil ? gy - info.yearOffsetOn : gy - info.yearOffsetBefore
}

/**
 * Regional solar date of the civil day `jd` (JD of its 0h, as from
 * gregorianToJD).
 */
export function solarDateFor(
  jd: number,
  loc: Location,
  variant: SolarCalendarVariant,
  settings: CalendarSettings = DEFAULT_SETTINGS,
  state = new EphemerisState(),
): SolarDate {
  const jdCrit = criticalTime(jd, loc, variant, settings, state)
  const sign = rashiAt(jdCrit, state)
  let rashi = sign.rashi
  let jdSankranti = sankrantiJd(jdCrit - sign.degreesPast, sign.target, state)
  let day = Math.round(jd - sankrantiToCivilDay(jdSankranti, loc, variant, rashi, settings, state)) + 1

  // The Sun has entered the sign but the month starts tomorrow
  if (day <= 0) {
    rashi = rashi === 1 ? 12 : rashi - 1
    jdSankranti = sankrantiJd(jdSankranti - 28, (rashi - 1) * 30, state)
    day = Math.round(jd - sankrantiToCivilDay(jdSankranti, loc, variant, rashi, settings, state)) + 1
  }

  return {
    year: regionalYear(jdCrit, jd, loc, variant, settings, state),
    month: rashiToRegionalMonth(rashi, variant),
    day,
    rashi,
    jdSankranti,
  }
}

export function gregorianToSolar(
  date: CivilDate,
  loc: Location,
  variant: SolarCalendarVariant,
  settings: CalendarSettings = DEFAULT_SETTINGS,
  state = new EphemerisState(),
): SolarDate {
  return solarDateFor(civilDateToJD(date), loc, variant, settings, state)
}

/** Civil date of a regional solar date. The inverse of gregorianToSolar. */
export function solarToGregorian(
  date: Pick<SolarDate, 'year' | 'month' | 'day'>,
  loc: Location,
  variant: SolarCalendarVariant,
  settings: CalendarSettings = DEFAULT_SETTINGS,
  state = new EphemerisState(),
): CivilDate {
  const info = SOLAR_CALENDARS[variant]
  const rashi = regionalMonthToRashi(date.month, variant)

  // Months that wrap past December, or precede the year-start month, fall
  // in the next Gregorian year
  let gy = date.year + info.yearOffsetOn
  const rashiMonth = 3 + rashi
  const startMonth = 3 + info.firstRashi
  if (rashiMonth > 12 && startMonth <= 12) gy++
  else if (rashiMonth <= 12 && startMonth <= 12 && rashiMonth < startMonth) gy++

  const estimate = gregorianToJD(gy, rashiMonth > 12 ? rashiMonth - 12 : rashiMonth, 14)
  const jdSankranti = sankrantiJd(estimate, (rashi - 1) * 30, state)
  const jdStart = sankrantiToCivilDay(jdSankranti, loc, variant, rashi, settings, state)
  return jdToCivilDate(jdStart + (date.day - 1))
}

/** Regional date of every civil day of a Gregorian month. */
export function monthSolarCalendar(
  year: number,
  month: number,
  loc: Location,
  variant: SolarCalendarVariant,
  settings: CalendarSettings = DEFAULT_SETTINGS,
  state = new EphemerisState(),
): SolarDate[] {
  const days: SolarDate[] = []
  for (let day = 1; day <= daysInMonth(year, month); day++) {
    days.push(solarDateFor(gregorianToJD(year, month, day), loc, variant, settings, state))
  }
  return days
}

/** "Chithirai 1, 1947 (Saka)" */
export function formatSolarDate(date: SolarDate, variant: SolarCalendarVariant): string {
  return `${solarMonthName(date.month, variant)} ${date.day}, ${date.year} (${solarEraName(variant)})`
}
