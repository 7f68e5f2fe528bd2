/**
 * masa — Amanta lunar month and Saka/Vikram years.
 *
 * A lunar month runs from one new moon to the next. It is named after the
 * sidereal sign the Sun occupies at the opening new moon: the Sun in rashi r
 * gives masa r + 1 (Sun in Meena → Chaitra). When no sankranti falls between
 * the two new moons, both see the Sun in the same sign and the month is
 * adhika (intercalary), sharing its name with the month that follows.
 *
 * New moons are located by bisection on the phase angle, then refined with
 * inverse Lagrange interpolation through 17 phase samples spanning ±2 days
 * of the root.
 */

import type { CivilDate, Location, MasaRecord } from '../types.js'
import { MASA_NAMES } from '../types.js'
import { EphemerisState } from '../state/index.js'
import { bisectAngle, inverseLagrange, unwrapAngles } from '../math/index.js'
import { solarLongitudeSidereal } from '../ayanamsa/index.js'
import { dayInstant, lunarPhase, tithiAt } from '../tithi/index.js'
import { civilDateToJD } from '../time/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Mean sidereal year, days */
export const SIDEREAL_YEAR = 365.25636

/** JD at which the day count for the Kali year starts */
const KALI_AHARGANA_EPOCH = 588465.5

/** Kali year minus Saka year */
const KALI_SAKA_OFFSET = 3179

/** Vikram Samvat minus Saka year */
export const VIKRAM_SAKA_OFFSET = 135

/** Lagrange sample spacing and count around the new moon */
const SAMPLE_STEP = 0.25
const SAMPLE_COUNT = 17

/**
 * Bisection half-width around the new-moon estimate, days. The estimate
 * assumes mean-length tithis and can miss by more than two days near
 * apogee; ±5 days still holds a single phase-0 crossing.
 */
const SEARCH_WINDOW = 5

// ─── New moon ─────────────────────────────────────────────────────────────────

function refineNewMoon(estimate: number, state: EphemerisState): number {
  const root = bisectAngle(
    jd => lunarPhase(jd, state),
    0,
    estimate - SEARCH_WINDOW,
    estimate + SEARCH_WINDOW,
    'new moon',
  )

  const half = (SAMPLE_COUNT - 1) / 2
  const x: number[] = []
  const y: number[] = []
  for (let i = 0; i < SAMPLE_COUNT; i++) {
    x.push((i - half) * SAMPLE_STEP)
    y.push(lunarPhase(root + x[i], state))
  }
  unwrapAngles(y)
  return root + inverseLagrange(x, y, 360)
}

/**
 * New moon preceding `jd`. `tithiHint` is the tithi index at `jd`, which
 * places the estimate within about a day of the event.
 */
export function newMoonBefore(jd: number, tithiHint: number, state = new EphemerisState()): number {
  return refineNewMoon(jd - tithiHint, state)
}

/** New moon following `jd`; see newMoonBefore. */
export function newMoonAfter(jd: number, tithiHint: number, state = new EphemerisState()): number {
  return refineNewMoon(jd + (30 - tithiHint), state)
}

// ─── Month and year ───────────────────────────────────────────────────────────

/** Sidereal sign 1–12 of the Sun; a longitude of exactly 0° counts as Meena. */
export function solarRashi(jdUT: number, state = new EphemerisState()): number {
  const rashi = Math.ceil(solarLongitudeSidereal(jdUT, state) / 30)
  return rashi <= 0 ? 12 : ((rashi - 1) % 12) + 1
}

/**
 * Saka year for an instant in masa `masa`. The month offset moves the
 * count so that the year turns over at Chaitra.
 */
export function hinduYearSaka(jdUT: number, masa: number): number {
  const ahargana = jdUT - KALI_AHARGANA_EPOCH
  const kali = Math.trunc((ahargana + (4 - masa) * 30) / SIDEREAL_YEAR)
  return kali - KALI_SAKA_OFFSET
}

export function hinduYearVikram(saka: number): number {
  return saka + VIKRAM_SAKA_OFFSET
}

/** Lunar month of the civil day `date`, sampled at local sunrise. */
export function masaForDate(date: CivilDate, loc: Location, state = new EphemerisState()): MasaRecord {
  const jdRise = dayInstant(civilDateToJD(date), loc, state)
  return masaFor(jdRise, state)
}

/** Lunar month containing an instant. */
export function masaFor(jdUT: number, state = new EphemerisState()): MasaRecord {
  const t = tithiAt(jdUT, state).index
  const jdNewMoonStart = newMoonBefore(jdUT, t, state)
  const jdNewMoonEnd = newMoonAfter(jdUT, t, state)

  const rashiStart = solarRashi(jdNewMoonStart, state)
  const rashiEnd = solarRashi(jdNewMoonEnd, state)

  const number = (rashiStart % 12) + 1
  const yearSaka = hinduYearSaka(jdUT, number)
  return {
    number,
    name: MASA_NAMES[number - 1],
    adhika: rashiStart === rashiEnd,
    yearSaka,
    yearVikram: hinduYearVikram(yearSaka),
    jdNewMoonStart,
    jdNewMoonEnd,
  }
}
