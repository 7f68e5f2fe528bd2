/**
 * ayanamsa — Lahiri (Chitrapaksha) ayanamsa and sidereal solar longitude.
 *
 * The ayanamsa is fixed at 23°15′00.658″ on 1956 Mar 21.0 (JD 2435553.5)
 * and carried to the query date by IAU 1976 precession:
 *
 *   1. Equinox of date → J2000 equatorial  (transpose of P(t))
 *   2. J2000 → mean equator of 1956        (P(t₀))
 *   3. Equator → ecliptic of 1956          (mean obliquity at t₀)
 *
 * The longitude of the date's equinox in the 1956 ecliptic frame is the
 * precession accumulated since t₀. The result is the mean ayanamsa: nutation
 * stays in the tropical longitude, so sidereal longitudes are apparent.
 *
 * References:
 *   Lieske et al. (1977), A&A 58, 1 (precession angles)
 *   Indian Astronomical Ephemeris, Calendar Reform Committee (1955)
 */

import type { Vec3 } from '../types.js'
import type { Mat3 } from '../math/index.js'
import { EphemerisState } from '../state/index.js'
import { DEG2RAD, RAD2DEG, STR, mmmul, mod360, mtranspose, mvmul, rotX, rotY, rotZ } from '../math/index.js'
import { meanObliquity, solarLongitude } from '../sun/index.js'
import { jdToT } from '../time/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Reference epoch of the Lahiri ayanamsa, JD (TT) */
export const LAHIRI_EPOCH = 2435553.5

/** Ayanamsa at the reference epoch, degrees */
export const LAHIRI_AT_EPOCH = 23.245524743

// ─── Precession ───────────────────────────────────────────────────────────────

/**
 * IAU 1976 precession matrix from the J2000 mean equator to the mean
 * equator of `jdTT`.
 */
export function precessionMatrix(jdTT: number): Mat3 {
  const T = jdToT(jdTT)
  const zeta = ((0.017998 * T + 0.30188) * T + 2306.2181) * T * STR
  const z = ((0.018203 * T + 1.09468) * T + 2306.2181) * T * STR
  const theta = ((-0.041833 * T - 0.42665) * T + 2004.3109) * T * STR
  return mmmul(rotZ(-z), mmmul(rotY(theta), rotZ(-zeta)))
}

const EPOCH_PRECESSION = precessionMatrix(LAHIRI_EPOCH)
const EPOCH_OBLIQUITY = rotX(meanObliquity(jdToT(LAHIRI_EPOCH)) * DEG2RAD)

/** Lahiri ayanamsa in degrees for a TT Julian Day. */
export function ayanamsaTT(jdTT: number): number {
  const equinox: Vec3 = [1, 0, 0]
  let x = mvmul(mtranspose(precessionMatrix(jdTT)), equinox)
  x = mvmul(EPOCH_PRECESSION, x)
  x = mvmul(EPOCH_OBLIQUITY, x)
  return mod360(-Math.atan2(x[1], x[0]) * RAD2DEG + LAHIRI_AT_EPOCH)
}

// ─── Public API ───────────────────────────────────────────────────────────────

/** Lahiri ayanamsa in degrees at a UT Julian Day. */
export function ayanamsa(jdUT: number, state = new EphemerisState()): number {
  const epoch = state.epoch(jdUT)
  epoch.ayanamsa ??= ayanamsaTT(epoch.jdTT)
  return epoch.ayanamsa
}

/** Apparent sidereal (Lahiri) solar longitude in degrees [0, 360). */
export function solarLongitudeSidereal(jdUT: number, state = new EphemerisState()): number {
  return mod360(solarLongitude(jdUT, state) - ayanamsa(jdUT, state))
}
