/**
 * sun — Apparent geocentric solar longitude from a truncated planetary theory.
 *
 * Pipeline (all in TT):
 *   1. Heliocentric longitude of the Earth-Moon barycenter, J2000 ecliptic,
 *      from a truncated VSOP87-style harmonic series (~1″, 1900-2100)
 *   2. General precession in longitude to the ecliptic of date (IAU 1976)
 *   3. Barycenter → Earth offset from a short lunar series
 *   4. +180° to geocentric, + nutation in longitude
 *   5. Constant annual aberration (−20.496″)
 *
 * Nutation: IAU 1980, 13 largest terms (Meeus Ch. 22, Table 22.A)
 * Obliquity: Laskar's polynomial (Meeus eq. 22.3)
 *
 * The series table lives in earth-series.json as two parallel arrays, one
 * entry per term: `arguments` holds (harmonic, argument) pairs, `coefficients`
 * holds the polynomial-in-T amplitudes. An empty argument list marks a pure
 * polynomial term.
 *
 * References:
 *   Bretagnon & Francou (1988), VSOP87
 *   Meeus, Astronomical Algorithms 2nd ed., Ch. 22, 25
 */

import type { Nutation } from '../types.js'
import type { Epoch } from '../state/index.js'
import { EphemerisState, EARTH_ARGUMENT_COUNT } from '../state/index.js'
import { DEG2RAD, RAD2DEG, STR, combineHarmonics, fillHarmonics, mod360, mod3600 } from '../math/index.js'
import { J1900, J2000 } from '../time/index.js'
import earthSeries from './earth-series.json' with { type: 'json' }

// ─── Series tables ────────────────────────────────────────────────────────────

/** Parallel per-term tables of the Earth longitude series */
export interface EarthSeriesTables {
  /** Flattened (harmonic, argument number 1-9) pairs per term; empty for polynomial terms */
  arguments: readonly (readonly number[])[]
  /**
   * Periodic terms: cos/sin amplitude pairs from highest power of T to lowest.
   * Polynomial terms: coefficients from highest power to lowest.
   */
  coefficients: readonly (readonly number[])[]
}

export const EARTH_SERIES: EarthSeriesTables = earthSeries

/** Harmonic multipliers and 0-based argument indices of each term, split once from the pairs */
const TERM_MULTIPLIERS = EARTH_SERIES.arguments.map(pairs => pairs.filter((_, i) => i % 2 === 0))
const TERM_ARGUMENTS = EARTH_SERIES.arguments.map(pairs => pairs.filter((_, i) => i % 2 === 1).map(m => m - 1))

/** Mean motions of the fundamental arguments, arcseconds per 10000 Julian years */
const FREQS = [
  53810162868.8982, 21066413643.3548, 12959774228.3429,
  6890507749.3988, 1092566037.7991, 439960985.5372,
  154248119.3933, 78655032.0744, 52272245.1795,
] as const

/** Phases of the fundamental arguments at J2000, arcseconds */
const PHASES = [
  252.25090552 * 3600, 181.97980085 * 3600, 100.46645683 * 3600,
  355.43299958 * 3600, 34.35151874 * 3600, 50.07744430 * 3600,
  314.05500511 * 3600, 304.34866548 * 3600, 860492.1546,
] as const

/** Highest harmonic of each fundamental argument the series uses */
export const EARTH_MAX_HARMONIC = [1, 9, 14, 17, 5, 5, 2, 1, 0] as const

/** Days in the series time unit (10000 Julian years) */
const TIMESCALE = 3652500

const EARTH_MOON_MASS_RATIO = 1 / 0.0123000383

/** Annual aberration constant, arcseconds */
const ABERRATION = 20.496

// ─── Nutation ─────────────────────────────────────────────────────────────────

/** Multipliers of D, M, M′, F, Ω */
const NUTATION_ARGS = [
  [0, 0, 0, 0, 1], [-2, 0, 0, 2, 2], [0, 0, 0, 2, 2], [0, 0, 0, 0, 2],
  [0, 1, 0, 0, 0], [0, 0, 1, 0, 0], [-2, 1, 0, 2, 2], [0, 0, 0, 2, 1],
  [0, 0, 1, 2, 2], [-2, -1, 0, 2, 2], [-2, 0, 1, 0, 0], [-2, 0, 0, 2, 1],
  [0, 0, -1, 2, 2],
] as const

/** Δψ sine amplitudes and their rates per century, 0.0001″ */
const NUTATION_S0 = [-171996, -13187, -2274, 2062, 1426, 712, -517, -386, -301, 217, -158, 129, 123] as const
const NUTATION_S1 = [-174.2, -1.6, -0.2, 0.2, -3.4, 0.1, 1.2, -0.4, 0.0, -0.5, 0.0, 0.1, 0.0] as const
/** Δε cosine amplitudes and their rates per century, 0.0001″ */
const NUTATION_C0 = [92025, 5736, 977, -895, 54, -7, 224, 200, 129, -95, 0, -70, -53] as const
const NUTATION_C1 = [8.9, -3.1, -0.5, 0.5, -0.1, 0.0, -0.6, 0.0, -0.1, 0.3, 0.0, 0.0, 0.0] as const

/** Nutation in longitude and obliquity for T Julian centuries (TT) from J2000 */
export function nutation(T: number): Nutation {
  const T2 = T * T
  const T3 = T2 * T
  const D = (297.85036 + 445267.11148 * T - 0.0019142 * T2 + T3 / 189474) * DEG2RAD
  const M = (357.52772 + 35999.05034 * T - 0.0001603 * T2 - T3 / 300000) * DEG2RAD
  const Mp = (134.96298 + 477198.867398 * T + 0.0086972 * T2 + T3 / 56250) * DEG2RAD
  const F = (93.27191 + 483202.017538 * T - 0.0036825 * T2 + T3 / 327270) * DEG2RAD
  const Om = (125.04452 - 1934.136261 * T + 0.0020708 * T2 + T3 / 450000) * DEG2RAD

  let dpsi = 0
  let deps = 0
  for (let i = 0; i < NUTATION_ARGS.length; i++) {
    const [a, b, c, d, e] = NUTATION_ARGS[i]
    const arg = a * D + b * M + c * Mp + d * F + e * Om
    dpsi += (NUTATION_S0[i] + NUTATION_S1[i] * T) * Math.sin(arg)
    deps += (NUTATION_C0[i] + NUTATION_C1[i] * T) * Math.cos(arg)
  }
  return { dpsi: dpsi * 1e-4 / 3600, deps: deps * 1e-4 / 3600 }
}

/** Mean obliquity of the ecliptic in degrees (Laskar), T in Julian centuries (TT) */
export function meanObliquity(T: number): number {
  const U = T / 100
  let poly = 0
  for (const c of [2.45, 5.79, 27.87, 7.12, -39.05, -249.67, -51.38, 1999.25, -1.55, -4680.93]) {
    poly = (poly + c) * U
  }
  return 23 + 26 / 60 + 21.448 / 3600 + poly / 3600
}

function epochNutation(epoch: Epoch): Nutation {
  epoch.nutation ??= nutation(epoch.T)
  return epoch.nutation
}

function epochObliquity(epoch: Epoch): number {
  epoch.meanObliquity ??= meanObliquity(epoch.T)
  return epoch.meanObliquity
}

// ─── Series evaluation ────────────────────────────────────────────────────────

/** Heliocentric ecliptic J2000 longitude of the Earth-Moon barycenter, arcseconds. */
function barycenterLongitude(state: EphemerisState, jdTT: number): number {
  const T = (jdTT - J2000) / TIMESCALE

  for (let i = 0; i < EARTH_ARGUMENT_COUNT; i++) {
    const n = EARTH_MAX_HARMONIC[i]
    if (n === 0) continue
    const arg = (mod3600(FREQS[i] * T) + PHASES[i]) * STR
    fillHarmonics(state.earthSin[i], state.earthCos[i], arg, n)
  }

  const { arguments: args, coefficients } = EARTH_SERIES
  let sl = 0
  for (let term = 0; term < args.length; term++) {
    const pairs = args[term]
    const coeffs = coefficients[term]

    if (pairs.length === 0) {
      let cu = coeffs[0]
      for (let p = 1; p < coeffs.length; p++) cu = cu * T + coeffs[p]
      sl += mod3600(cu)
      continue
    }

    const [sv, cv] = combineHarmonics(TERM_MULTIPLIERS[term], state.earthSin, state.earthCos, TERM_ARGUMENTS[term])

    let cu = coeffs[0]
    let su = coeffs[1]
    for (let p = 2; p < coeffs.length; p += 2) {
      cu = cu * T + coeffs[p]
      su = su * T + coeffs[p + 1]
    }
    sl += cu * cv + su * sv
  }
  return sl
}

/**
 * Longitude offset from the Earth-Moon barycenter to the Earth, radians.
 * Uses a six-term lunar longitude, four-term latitude and five-term parallax.
 */
function barycenterToEarth(jdTT: number, lBarycenter: number): number {
  const T = (jdTT - J1900) / 36525

  const mp = mod360(((1.44e-5 * T + 0.009192) * T + 477198.8491) * T + 296.104608) * DEG2RAD
  const smp = Math.sin(mp)
  const cmp = Math.cos(mp)

  const d2 = 2 * mod360(((1.9e-6 * T - 0.001436) * T + 445267.1142) * T + 350.737486) * DEG2RAD
  const s2d = Math.sin(d2)
  const c2d = Math.cos(d2)

  const f = mod360(((-3e-7 * T - 0.003211) * T + 483202.0251) * T + 11.250889) * DEG2RAD
  const sf = Math.sin(f)
  const cf = Math.cos(f)

  const M = mod360(((-3.3e-6 * T - 1.5e-4) * T + 35999.0498) * T + 358.475833)

  // sin(2D − M′)
  const sx = s2d * cmp - c2d * smp
  const L = mod360(
    ((1.9e-6 * T - 0.001133) * T + 481267.8831) * T + 270.434164 +
    6.28875 * smp +
    1.274018 * sx +
    0.658309 * s2d +
    0.213616 * (2 * smp * cmp) -
    0.185596 * Math.sin(DEG2RAD * M) -
    0.114336 * (2 * sf * cf),
  )

  const B = (
    5.128189 * sf +
    0.280606 * (smp * cf + cmp * sf) +
    0.277693 * (smp * cf - cmp * sf) +
    0.173238 * (s2d * cf - c2d * sf)
  ) * DEG2RAD

  // cos(2D − M′)
  const cx = c2d * cmp + s2d * smp
  const parallax = (
    0.950724 +
    0.051818 * cmp +
    0.009531 * cx +
    0.007843 * c2d +
    0.002824 * (cmp * cmp - smp * smp)
  ) * DEG2RAD
  const rMoon = 4.263523e-5 / Math.sin(parallax)

  return -rMoon * Math.cos(B) * Math.sin(L * DEG2RAD - lBarycenter) / (EARTH_MOON_MASS_RATIO + 1)
}

function solarPosition(jdUT: number, state: EphemerisState): { longitude: number; declination: number } {
  const epoch = state.epoch(jdUT)
  if (epoch.sun) return epoch.sun

  const sun = state.run('solar longitude', s => {
    const { jdTT, T } = epoch
    const lBarycenterJ2000 = barycenterLongitude(s, jdTT) * STR
    const pA = (5029.0966 + 1.11113 * T - 0.000006 * T * T) * T
    const lBarycenter = lBarycenterJ2000 + pA * STR
    const lEarth = lBarycenter + barycenterToEarth(jdTT, lBarycenter)

    const nut = epochNutation(epoch)
    const apparent = lEarth + Math.PI + nut.dpsi * DEG2RAD - ABERRATION * STR
    const longitude = mod360(apparent * RAD2DEG)

    const eps = (epochObliquity(epoch) + nut.deps) * DEG2RAD
    const declination = Math.asin(Math.sin(eps) * Math.sin(longitude * DEG2RAD)) * RAD2DEG
    return { longitude, declination }
  })
  epoch.sun = sun
  return sun
}

// ─── Public API ───────────────────────────────────────────────────────────────

/** Apparent tropical solar longitude in degrees [0, 360), including nutation. */
export function solarLongitude(jdUT: number, state = new EphemerisState()): number {
  return solarPosition(jdUT, state).longitude
}

/** Apparent solar declination in degrees. */
export function solarDeclination(jdUT: number, state = new EphemerisState()): number {
  return solarPosition(jdUT, state).declination
}

/** Apparent solar right ascension in degrees [0, 360). */
export function solarRightAscension(jdUT: number, state = new EphemerisState()): number {
  const { longitude } = solarPosition(jdUT, state)
  const epoch = state.epoch(jdUT)
  const eps = (epochObliquity(epoch) + epochNutation(epoch).deps) * DEG2RAD
  const lam = longitude * DEG2RAD
  return mod360(Math.atan2(Math.cos(eps) * Math.sin(lam), Math.cos(lam)) * RAD2DEG)
}

/** Nutation angles in degrees at a UT Julian Day. */
export function nutationAt(jdUT: number, state = new EphemerisState()): Nutation {
  return epochNutation(state.epoch(jdUT))
}

/** Mean obliquity of the ecliptic in degrees at a UT Julian Day. */
export function meanObliquityAt(jdUT: number, state = new EphemerisState()): number {
  return epochObliquity(state.epoch(jdUT))
}

/** True obliquity (mean + Δε) in degrees at a UT Julian Day. */
export function trueObliquityAt(jdUT: number, state = new EphemerisState()): number {
  const epoch = state.epoch(jdUT)
  return epochObliquity(epoch) + epochNutation(epoch).deps
}
