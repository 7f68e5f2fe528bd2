/**
 * panchang — Lunisolar date of a civil day and month tables.
 *
 * Combines the tithi at sunrise with the amanta month that contains it.
 * Formatting helpers return plain strings; printing is left to the caller.
 */

import type { CivilDate, ClockTime, HinduDate, Location, PanchangDay, TithiMoment } from '../types.js'
import { MASA_NAMES, WEEKDAY_NAMES, WEEKDAY_SHORT } from '../types.js'
import { EphemerisState } from '../state/index.js'
import { sunsetJD } from '../events/index.js'
import { masaFor } from '../masa/index.js'
import { tithiAtSunrise, tithiLabel, tithiName } from '../tithi/index.js'
import { civilDateToJD, dayOfWeek, daysInMonth, jdToLocalTime } from '../time/index.js'

// ─── Computation ──────────────────────────────────────────────────────────────

/** Full panchang entry for one civil day. */
export function panchangForDate(date: CivilDate, loc: Location, state = new EphemerisState()): PanchangDay {
  const jd = civilDateToJD(date)
  const tithi = tithiAtSunrise(date, loc, state)
  const masa = masaFor(tithi.sampledAt, state)

  const sunriseJd = tithi.sunriseJd
  const sunsetJd = sunsetJD(jd, loc, state)

  const hinduDate: HinduDate = {
    yearSaka: masa.yearSaka,
    yearVikram: masa.yearVikram,
    masa: masa.number,
    masaName: masa.name,
    adhikaMasa: masa.adhika,
    paksha: tithi.paksha,
    tithi: tithi.pakshaTithi,
    adhikaTithi: tithi.adhika,
  }

  return { date, weekday: dayOfWeek(jd), sunriseJd, sunsetJd, tithi, masa, hinduDate }
}

/** Lunisolar date of a civil day. */
export function gregorianToHindu(date: CivilDate, loc: Location, state = new EphemerisState()): HinduDate {
  return panchangForDate(date, loc, state).hinduDate
}

/** Panchang for every civil day of a Gregorian month. */
export function monthPanchang(year: number, month: number, loc: Location, state = new EphemerisState()): PanchangDay[] {
  const days: PanchangDay[] = []
  for (let day = 1; day <= daysInMonth(year, month); day++) {
    days.push(panchangForDate({ year, month, day }, loc, state))
  }
  return days
}

// ─── Formatting ───────────────────────────────────────────────────────────────

const pad2 = (n: number) => String(n).padStart(2, '0')

export function formatCivilDate(date: CivilDate): string {
  return `${String(date.year).padStart(4, '0')}-${pad2(date.month)}-${pad2(date.day)}`
}

export function formatClockTime(time: ClockTime): string {
  return `${pad2(time.hour)}:${pad2(time.minute)}:${pad2(time.second)}`
}

/** Local HH:MM:SS of a UT JD, or "--:--:--" when absent */
export function formatLocalTime(jd: number | null, utcOffset: number): string {
  return jd === null ? '--:--:--' : formatClockTime(jdToLocalTime(jd, utcOffset))
}

/** "Krishna Panchami (K-5)" */
export function formatTithi(tithi: TithiMoment): string {
  const paksha = tithi.paksha === 'shukla' ? 'Shukla' : 'Krishna'
  return `${paksha} ${tithiName(tithi.index)} (${tithiLabel(tithi)})`
}

/** "Pausha Krishna 5, Saka 1946"; the Vikram year is appended when asked for. */
export function formatHinduDate(date: HinduDate, withVikram = false): string {
  const paksha = date.paksha === 'shukla' ? 'Shukla' : 'Krishna'
  const adhika = date.adhikaMasa ? 'Adhika ' : ''
  const text = `${adhika}${MASA_NAMES[date.masa - 1]} ${paksha} ${date.tithi}, Saka ${date.yearSaka}`
  return withVikram ? `${text} (Vikram ${date.yearVikram})` : text
}

/** Multi-line report for a single day */
export function formatDayReport(day: PanchangDay, loc: Location): string[] {
  const lines = [
    `Date:       ${formatCivilDate(day.date)} (${WEEKDAY_NAMES[day.weekday]})`,
    `Sunrise:    ${formatLocalTime(day.sunriseJd, loc.utcOffset)}`,
    `Sunset:     ${formatLocalTime(day.sunsetJd, loc.utcOffset)}`,
    `Tithi:      ${formatTithi(day.tithi)}`,
    `Hindu Date: ${formatHinduDate(day.hinduDate, true)}`,
  ]
  if (day.tithi.kshaya) lines.push('Note:       Kshaya tithi (next tithi is skipped)')
  if (day.hinduDate.adhikaTithi) lines.push('Note:       Adhika tithi (same tithi as previous day)')
  return lines
}

/** Header and one row per day, columns Date / Day / Sunrise / Tithi / Hindu Date */
export function formatMonthTable(days: readonly PanchangDay[], loc: Location): string[] {
  const row = (date: string, dow: string, sunrise: string, tithi: string, hindu: string) =>
    `${date.padEnd(12)} ${dow.padEnd(5)} ${sunrise.padEnd(10)} ${tithi.padEnd(28)} ${hindu}`

  const lines = [
    row('Date', 'Day', 'Sunrise', 'Tithi', 'Hindu Date'),
    row('----------', '---', '--------', '-'.repeat(28), '-'.repeat(28)),
  ]
  for (const day of days) {
    lines.push(row(
      formatCivilDate(day.date),
      WEEKDAY_SHORT[day.weekday],
      formatLocalTime(day.sunriseJd, loc.utcOffset),
      formatTithi(day.tithi),
      formatHinduDate(day.hinduDate),
    ))
  }
  return lines
}
