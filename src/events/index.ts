/**
 * events — Sunrise and sunset.
 *
 * Finding when the Sun crosses the horizon is solved in hour angle rather
 * than by sampling altitude:
 *
 *   cos H₀ = (sin h₀ − sin φ sin δ) / (cos φ cos δ)
 *
 * gives a first estimate from the noon position; the event is then refined
 * by Newton steps on the day fraction m, recomputing α and δ at each trial
 * time (Meeus Ch. 15). Usually 2–3 steps reach 1e-7 d.
 *
 * h₀ is the true altitude of the disc centre at the event: Sinclair
 * refraction at the horizon for 0 °C, with no semi-diameter term. At sea
 * level this is −0.6123°, which matches almanac sunrise times better than
 * the conventional −0.8333° (upper limb). Elevation lowers the pressure and
 * adds a dip of the horizon.
 *
 * When |cos H₀| > 1 the Sun does not cross h₀ that day (polar day or night)
 * and the functions return null.
 *
 * Reference: Meeus, Astronomical Algorithms 2nd ed., Ch. 12, 15
 *            Sinclair (1982), NAO Technical Note 59
 */

import type { Location } from '../types.js'
import { EphemerisState } from '../state/index.js'
import { DEG2RAD, RAD2DEG, mod360, normalizeDeg180 } from '../math/index.js'
import { meanObliquityAt, nutationAt, solarDeclination, solarRightAscension } from '../sun/index.js'
import { DAYS_PER_JULIAN_CENTURY, J2000, gregorianToJD, jdToGregorian } from '../time/index.js'

// ─── Altitude threshold constants ─────────────────────────────────────────────

/** Standard sea-level pressure, hPa */
export const STANDARD_PRESSURE = 1013.25

/** Refraction at the horizon under standard conditions, arcminutes */
const HORIZON_REFRACTION = 34.46

/** Air temperature assumed for the horizon refraction, °C */
const HORIZON_TEMPERATURE = 0

/** Newton refinement limits */
const MAX_ITERATIONS = 10
const CONVERGENCE = 1e-7

/** Sidereal degrees per solar day */
const SIDEREAL_RATE = 360.985647

// ─── Horizon ──────────────────────────────────────────────────────────────────

/**
 * Sinclair refraction at the horizon in degrees.
 *
 * @param pressure - Atmospheric pressure, hPa
 * @param temperature - Air temperature, °C
 */
export function sinclairRefraction(pressure: number, temperature: number): number {
  const r = HORIZON_REFRACTION
  return ((pressure - 80) / 930 / (1 + 0.00008 * (r + 39) * (temperature - 10)) * r) / 60
}

/**
 * True altitude of the solar centre at rise/set for an observer at
 * `elevation` metres. −0.6123° at sea level.
 */
export function horizonAltitude(elevation = 0): number {
  let pressure = STANDARD_PRESSURE
  if (elevation > 0) pressure = STANDARD_PRESSURE * (1 - 0.0065 * elevation / 288) ** 5.255
  let h0 = -sinclairRefraction(pressure, HORIZON_TEMPERATURE)
  if (elevation > 0) h0 -= 0.0353 * Math.sqrt(elevation)
  return h0
}

/** Greenwich mean sidereal time at 0h UT in degrees [0, 360) */
export function siderealTime0h(jd0h: number): number {
  const T = (jd0h - J2000) / DAYS_PER_JULIAN_CENTURY
  return mod360(100.46061837 + 36000.770053608 * T + 0.000387933 * T * T - T * T * T / 38710000)
}

// ─── Event finding ────────────────────────────────────────────────────────────

/**
 * Rise or set on the UT day starting at `jd0h`, or null when the Sun does not
 * reach `h0` that day. Rises after 18h UT fold back to the previous day and
 * sets before 6h UT forward to the next, so the result stays with the local
 * day at any longitude.
 */
function riseSetForDay(
  jd0h: number,
  loc: Location,
  h0: number,
  rising: boolean,
  state: EphemerisState,
): number | null {
  const phi = loc.latitude * DEG2RAD
  const lon = loc.longitude

  // Apparent sidereal time: add the equation of the equinoxes at noon
  const jdNoon = jd0h + 0.5
  const theta0 = siderealTime0h(jd0h) + nutationAt(jdNoon, state).dpsi * Math.cos(meanObliquityAt(jdNoon, state) * DEG2RAD)

  const ra = solarRightAscension(jdNoon, state)
  const decl = solarDeclination(jdNoon, state) * DEG2RAD

  const cosH0 = (Math.sin(h0 * DEG2RAD) - Math.sin(phi) * Math.sin(decl)) / (Math.cos(phi) * Math.cos(decl))
  if (cosH0 < -1 || cosH0 > 1) return null
  const H0 = Math.acos(cosH0) * RAD2DEG

  let m0 = (ra - lon - theta0) / 360
  m0 -= Math.floor(m0)
  let m = rising ? m0 - H0 / 360 : m0 + H0 / 360
  m -= Math.floor(m)

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const jd = jd0h + m
    const raI = solarRightAscension(jd, state)
    const declI = solarDeclination(jd, state) * DEG2RAD

    const H = normalizeDeg180(theta0 + SIDEREAL_RATE * m + lon - raI) * DEG2RAD
    const alt = Math.asin(Math.sin(phi) * Math.sin(declI) + Math.cos(phi) * Math.cos(declI) * Math.cos(H)) * RAD2DEG

    const denom = 360 * Math.cos(declI) * Math.cos(phi) * Math.sin(H)
    if (Math.abs(denom) < 1e-12) break
    const dm = (alt - h0) / denom
    m += dm
    if (Math.abs(dm) < CONVERGENCE) break
  }

  if (rising && m > 0.75) m -= 1
  if (!rising && m < 0.25) m += 1
  return jd0h + m
}

/**
 * First rise (or set) at or after the local midnight that opens the civil
 * day containing `jd`. Falls through to the next UT day when the event on
 * the first one comes earlier than that.
 */
function riseSet(jd: number, loc: Location, rising: boolean, state: EphemerisState): number | null {
  const h0 = horizonAltitude(loc.elevation)
  const jdStart = jd - loc.utcOffset / 24
  const { year, month, day } = jdToGregorian(jdStart)
  const jd0h = gregorianToJD(year, month, day)

  const event = riseSetForDay(jd0h, loc, h0, rising, state)
  if (event !== null && event >= jdStart - 0.0001) return event
  return riseSetForDay(jd0h + 1, loc, h0, rising, state)
}

/**
 * Sunrise for the civil day beginning at `jd` (JD of local midnight expressed
 * as a UT-date JD, i.e. `gregorianToJD(y, m, d)`).
 *
 * @returns JD (UT) of sunrise, or null on a polar day or night
 */
export function sunriseJD(jd: number, loc: Location, state = new EphemerisState()): number | null {
  return riseSet(jd, loc, true, state)
}

/**
 * Sunset for the civil day beginning at `jd`.
 *
 * @returns JD (UT) of sunset, or null on a polar day or night
 */
export function sunsetJD(jd: number, loc: Location, state = new EphemerisState()): number | null {
  return riseSet(jd, loc, false, state)
}
