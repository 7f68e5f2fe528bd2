/**
 * math — Core numerical utilities.
 *
 * All computation in this module is pure (no I/O, no state).
 */

import type { Vec3 } from '../types.js'
import { BracketError } from '../errors/index.js'

// ─── Angle utilities ─────────────────────────────────────────────────────────

/** Convert degrees to radians */
export const DEG2RAD = Math.PI / 180

/** Convert radians to degrees */
export const RAD2DEG = 180 / Math.PI

/** Radians per arcsecond */
export const STR = 4.8481368110953599359e-6

/** Arcseconds in a full circle */
export const ARCSEC_PER_CIRCLE = 1296000

/** Normalize an angle in degrees to [0, 360) */
export function mod360(deg: number): number {
  return ((deg % 360) + 360) % 360
}

/** Normalize an angle in arcseconds to [0, 1296000) */
export function mod3600(arcsec: number): number {
  return arcsec - ARCSEC_PER_CIRCLE * Math.floor(arcsec / ARCSEC_PER_CIRCLE)
}

/** Normalize an angle in degrees to [-180, 180) */
export function normalizeDeg180(deg: number): number {
  deg = mod360(deg)
  return deg >= 180 ? deg - 360 : deg
}

/**
 * Signed difference `angle − target` folded into [-180, 180].
 * 359° against a target of 1° is −2°, not 358°.
 */
export function angleDiff(angle: number, target: number): number {
  let diff = angle - target
  if (diff > 180) diff -= 360
  if (diff < -180) diff += 360
  return diff
}

/**
 * Make a sampled angle sequence monotonically increasing by adding 360°
 * wherever it wraps. Mutates and returns the input.
 */
export function unwrapAngles(angles: number[]): number[] {
  for (let i = 1; i < angles.length; i++) {
    if (angles[i] < angles[i - 1]) angles[i] += 360
  }
  return angles
}

// ─── Harmonic recurrence ─────────────────────────────────────────────────────

/**
 * Fill sin(k·arg) and cos(k·arg) for k = 1..n into slots 0..n−1,
 * using the angle-addition recurrence instead of n trig calls.
 */
export function fillHarmonics(sin: Float64Array, cos: Float64Array, arg: number, n: number): void {
  const su = Math.sin(arg)
  const cu = Math.cos(arg)
  sin[0] = su
  cos[0] = cu
  if (n < 2) return
  let sv = 2 * su * cu
  let cv = cu * cu - su * su
  sin[1] = sv
  cos[1] = cv
  for (let i = 2; i < n; i++) {
    const s = su * cv + cu * sv
    cv = cu * cv - su * sv
    sv = s
    sin[i] = sv
    cos[i] = cv
  }
}

/**
 * Sine and cosine of Σ jᵢ·argᵢ, read from precomputed harmonic tables.
 * `tables[i]` names the argument multiplier i applies to; without it the
 * multipliers map onto the tables in order. Zero multipliers are skipped,
 * and [0, 0] comes back when every multiplier is zero.
 */
export function combineHarmonics(
  multipliers: readonly number[],
  sin: readonly Float64Array[],
  cos: readonly Float64Array[],
  tables?: readonly number[],
): [number, number] {
  let started = false
  let sv = 0
  let cv = 0
  for (let i = 0; i < multipliers.length; i++) {
    const j = multipliers[i]
    if (j === 0) continue
    const k = Math.abs(j) - 1
    const m = tables ? tables[i] : i
    const su = j < 0 ? -sin[m][k] : sin[m][k]
    const cu = cos[m][k]
    if (!started) {
      sv = su
      cv = cu
      started = true
    } else {
      const t = su * cv + cu * sv
      cv = cu * cv - su * sv
      sv = t
    }
  }
  return [sv, cv]
}

// ─── 3×3 matrix operations ────────────────────────────────────────────────────

/** 3×3 matrix stored row-major as a 9-element tuple */
export type Mat3 = [
  number, number, number,
  number, number, number,
  number, number, number,
]

/** Multiply 3×3 matrix by 3-vector */
export function mvmul(m: Mat3, v: Vec3): Vec3 {
  return [
    m[0] * v[0] + m[1] * v[1] + m[2] * v[2],
    m[3] * v[0] + m[4] * v[1] + m[5] * v[2],
    m[6] * v[0] + m[7] * v[1] + m[8] * v[2],
  ]
}

/** Multiply two 3×3 matrices */
export function mmmul(a: Mat3, b: Mat3): Mat3 {
  return [
    a[0]*b[0] + a[1]*b[3] + a[2]*b[6],
    a[0]*b[1] + a[1]*b[4] + a[2]*b[7],
    a[0]*b[2] + a[1]*b[5] + a[2]*b[8],
    a[3]*b[0] + a[4]*b[3] + a[5]*b[6],
    a[3]*b[1] + a[4]*b[4] + a[5]*b[7],
    a[3]*b[2] + a[4]*b[5] + a[5]*b[8],
    a[6]*b[0] + a[7]*b[3] + a[8]*b[6],
    a[6]*b[1] + a[7]*b[4] + a[8]*b[7],
    a[6]*b[2] + a[7]*b[5] + a[8]*b[8],
  ]
}

/** Transpose a 3×3 matrix */
export function mtranspose(m: Mat3): Mat3 {
  return [m[0], m[3], m[6], m[1], m[4], m[7], m[2], m[5], m[8]]
}

/**
 * Rotation matrix around the X axis by angle θ (radians).
 * Follows right-hand rule.
 */
export function rotX(theta: number): Mat3 {
  const c = Math.cos(theta)
  const s = Math.sin(theta)
  return [1, 0, 0, 0, c, s, 0, -s, c]
}

/**
 * Rotation matrix around the Y axis by angle θ (radians).
 */
export function rotY(theta: number): Mat3 {
  const c = Math.cos(theta)
  const s = Math.sin(theta)
  return [c, 0, -s, 0, 1, 0, s, 0, c]
}

/**
 * Rotation matrix around the Z axis by angle θ (radians).
 */
export function rotZ(theta: number): Mat3 {
  const c = Math.cos(theta)
  const s = Math.sin(theta)
  return [c, s, 0, -s, c, 0, 0, 0, 1]
}

// ─── Root finding ─────────────────────────────────────────────────────────────

/** Default bisection iteration count; 50 halvings of a 40-day bracket reach ~3e-14 d */
export const BISECTION_ITERATIONS = 50

/**
 * Find the time at which an angle crosses `target` by bisection.
 *
 * `angleAt` must increase through `target` inside [lo, hi]: the folded
 * difference must be negative at `lo` and non-negative at `hi`. A bracket
 * without that sign change throws BracketError instead of converging on
 * a wrong answer.
 *
 * @param quantity - Label used in the error message
 * @returns Midpoint of the final bracket
 */
export function bisectAngle(
  angleAt: (t: number) => number,
  target: number,
  lo: number,
  hi: number,
  quantity: string,
  iterations = BISECTION_ITERATIONS,
): number {
  if (angleDiff(angleAt(lo), target) >= 0 || angleDiff(angleAt(hi), target) < 0) {
    throw new BracketError(quantity, target, lo, hi)
  }
  for (let i = 0; i < iterations; i++) {
    const mid = (lo + hi) / 2
    if (angleDiff(angleAt(mid), target) >= 0) hi = mid
    else lo = mid
  }
  return (lo + hi) / 2
}

// ─── Interpolation ───────────────────────────────────────────────────────────

/**
 * Inverse Lagrange interpolation: the x at which the polynomial through
 * (x[i], y[i]) takes the value `ya`. The y values must be distinct.
 */
export function inverseLagrange(x: readonly number[], y: readonly number[], ya: number): number {
  if (x.length !== y.length) {
    throw new RangeError(`Lagrange abscissae (${x.length}) and ordinates (${y.length}) differ in length`)
  }
  let total = 0
  for (let i = 0; i < x.length; i++) {
    let numer = 1
    let denom = 1
    for (let j = 0; j < x.length; j++) {
      if (j === i) continue
      numer *= ya - y[j]
      denom *= y[i] - y[j]
    }
    total += (numer * x[i]) / denom
  }
  return total
}
