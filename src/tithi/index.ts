/**
 * tithi — Lunar day from the Moon–Sun elongation.
 *
 * A tithi is a 12° step of the phase angle (λ☾ − λ☉), numbered 1–30 from
 * new moon: 1–15 in the waxing (shukla) paksha, 16–30 in the waning
 * (krishna) paksha. The tithi of a civil day is the one current at local
 * sunrise.
 *
 * The phase is a difference of longitudes, so tropical and sidereal
 * coordinates give the same value and the ayanamsa is not needed here.
 *
 * Because a tithi lasts anywhere from ~19 to ~26 hours, consecutive
 * sunrises usually step the index by one, but a short tithi can begin and
 * end between two sunrises (kshaya, skipped) and a long one can span two
 * sunrises (adhika, repeated).
 */

import type { CivilDate, Location, Paksha, TithiMoment, TithiRecord } from '../types.js'
import { TITHI_NAMES } from '../types.js'
import { EphemerisState } from '../state/index.js'
import { bisectAngle, mod360 } from '../math/index.js'
import { lunarLongitude } from '../moon/index.js'
import { solarLongitude } from '../sun/index.js'
import { sunriseJD } from '../events/index.js'
import { civilDateToJD } from '../time/index.js'

/** Degrees of elongation per tithi */
export const TITHI_SPAN = 12

/** Search half-width around sunrise for the tithi boundaries, days */
const BOUNDARY_WINDOW = 2

// ─── Phase ────────────────────────────────────────────────────────────────────

/** Moon − Sun longitude in degrees [0, 360) */
export function lunarPhase(jdUT: number, state = new EphemerisState()): number {
  const moon = lunarLongitude(jdUT, state)
  const sun = solarLongitude(jdUT, state)
  return mod360(moon - sun)
}

/** Tithi index 1–30 for a phase angle */
export function tithiFromPhase(phase: number): number {
  return Math.min(Math.floor(phase / TITHI_SPAN) + 1, 30)
}

function describe(index: number, phase: number): TithiMoment {
  const paksha: Paksha = index <= 15 ? 'shukla' : 'krishna'
  return { index, paksha, pakshaTithi: index <= 15 ? index : index - 15, phase }
}

/** Tithi current at an instant. */
export function tithiAt(jdUT: number, state = new EphemerisState()): TithiMoment {
  const phase = lunarPhase(jdUT, state)
  return describe(tithiFromPhase(phase), phase)
}

/**
 * Time at which tithi `index` begins, searched in [lo, hi].
 * Throws BracketError if the phase does not cross (index − 1)·12° there.
 */
export function findTithiBoundary(lo: number, hi: number, index: number, state = new EphemerisState()): number {
  return bisectAngle(jd => lunarPhase(jd, state), (index - 1) * TITHI_SPAN, lo, hi, 'lunar phase')
}

// ─── Civil day ────────────────────────────────────────────────────────────────

/**
 * The instant a civil day is sampled at: local sunrise, or local noon when
 * the Sun does not rise.
 */
export function dayInstant(jd: number, loc: Location, state = new EphemerisState()): number {
  return sunriseJD(jd, loc, state) ?? localNoon(jd, loc)
}

function localNoon(jd: number, loc: Location): number {
  return jd + 0.5 - loc.utcOffset / 24
}

/** Tithi index at sunrise of the civil day `jd`, or null without a sunrise. */
function sunriseTithi(jd: number, loc: Location, state: EphemerisState): number | null {
  const rise = sunriseJD(jd, loc, state)
  return rise === null ? null : tithiAt(rise, state).index
}

/**
 * Tithi governing a civil day, with its exact start and end and whether the
 * day's sunrise sequence skips (kshaya) or repeats (adhika) a tithi.
 */
export function tithiAtSunrise(date: CivilDate, loc: Location, state = new EphemerisState()): TithiRecord {
  const jd = civilDateToJD(date)
  const sunriseJd = sunriseJD(jd, loc, state)
  const sampledAt = sunriseJd ?? localNoon(jd, loc)
  const moment = tithiAt(sampledAt, state)
  const t = moment.index

  const jdStart = findTithiBoundary(sampledAt - BOUNDARY_WINDOW, sampledAt, t, state)
  const jdEnd = findTithiBoundary(sampledAt, sampledAt + BOUNDARY_WINDOW, (t % 30) + 1, state)

  const next = sunriseTithi(jd + 1, loc, state)
  const kshaya = next !== null && (((next - t) % 30) + 30) % 30 > 1

  const previous = sunriseTithi(jd - 1, loc, state)
  const adhika = previous === t

  return { ...moment, jdStart, jdEnd, sunriseJd, sampledAt, kshaya, adhika }
}

// ─── Names ────────────────────────────────────────────────────────────────────

/** Name of tithi 1–30: Purnima for 15, Amavasya for 30. */
export function tithiName(index: number): string {
  if (index === 30) return 'Amavasya'
  return TITHI_NAMES[(index - 1) % 15]
}

/** Short label such as "S-5" or "K-14" */
export function tithiLabel(moment: TithiMoment): string {
  return `${moment.paksha === 'shukla' ? 'S' : 'K'}-${moment.pakshaTithi}`
}
