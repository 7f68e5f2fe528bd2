/**
 * state — Mutable working set shared by the ephemeris stages.
 *
 * The solar and lunar series are evaluated in stages that write into and
 * read back from shared scratch space: harmonic sin/cos tables, the lunar
 * mean elements and the perturbation accumulators. That scratch space,
 * together with the per-epoch cache (ΔT, century powers, nutation, solar
 * position), lives in one EphemerisState.
 *
 * Ownership: one state per logical computation. A stage sequence runs
 * inside `run()`, which marks the state busy; entering a second sequence
 * before the first returns throws EphemerisStateBusyError. Independent
 * computations (e.g. separate days of a month grid) may each use their own
 * state, or share one sequentially.
 */

import type { Nutation } from '../types.js'
import { EphemerisStateBusyError } from '../errors/index.js'
import { deltaT, jdToT } from '../time/index.js'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Apparent solar position cached for one epoch, in degrees */
export interface SolarPositionCache {
  longitude: number
  declination: number
}

/**
 * Time quantities for a single UT Julian Day.
 * Derived fields are filled lazily by the engines and dropped with the epoch.
 */
export interface Epoch {
  jdUT: number
  jdTT: number
  /** ΔT in days */
  deltaT: number
  /** Julian centuries of TT from J2000 */
  T: number
  T2: number
  T3: number
  nutation?: Nutation
  /** Mean obliquity of date in degrees */
  meanObliquity?: number
  sun?: SolarPositionCache
  /** Tropical lunar longitude in degrees */
  moon?: number
  /** Lahiri ayanamsa in degrees */
  ayanamsa?: number
}

/** Lunar mean elements and perturbation accumulators, all in arcseconds */
export interface LunarWorkspace {
  /** Mean longitude of the Moon */
  meanLongitude: number
  /** Mean anomaly of the Sun */
  sunAnomaly: number
  /** Mean anomaly of the Moon */
  moonAnomaly: number
  /** Mean elongation of the Moon from the Sun */
  elongation: number
  /** Mean argument of latitude of the Moon */
  latitudeArgument: number
  venus: number
  earth: number
  mars: number
  jupiter: number
  saturn: number
  /** Longitude perturbations independent of T */
  lon: number
  /** Coefficients of T¹…T⁴ (units of 1e-5″) */
  lonT1: number
  lonT2: number
  lonT3: number
  lonT4: number
  /** Summed longitude before normalization */
  longitude: number
}

// ─── Constants ────────────────────────────────────────────────────────────────

/** Fundamental planetary arguments used by the Earth series (Mercury … Pluto) */
export const EARTH_ARGUMENT_COUNT = 9

/** Highest harmonic the Earth series asks of any argument */
export const EARTH_HARMONIC_SLOTS = 24

/** Highest harmonic per lunar argument: D, M, M′, F */
export const LUNAR_HARMONIC_COUNTS = [6, 4, 5, 4] as const

// ─── State ───────────────────────────────────────────────────────────────────

function emptyLunarWorkspace(): LunarWorkspace {
  return {
    meanLongitude: 0, sunAnomaly: 0, moonAnomaly: 0, elongation: 0, latitudeArgument: 0,
    venus: 0, earth: 0, mars: 0, jupiter: 0, saturn: 0,
    lon: 0, lonT1: 0, lonT2: 0, lonT3: 0, lonT4: 0, longitude: 0,
  }
}

export class EphemerisState {
  /** sin(k·argᵢ) for the Earth series, [argument][k − 1] */
  readonly earthSin: Float64Array[]
  readonly earthCos: Float64Array[]
  /** sin(k·argᵢ) for the lunar series, [D, M, M′, F][k − 1] */
  readonly lunarSin: Float64Array[]
  readonly lunarCos: Float64Array[]
  readonly lunar: LunarWorkspace = emptyLunarWorkspace()

  /** Number of epochs computed so far (cache misses) */
  epochMisses = 0

  private current: Epoch | null = null
  private owner: string | null = null

  constructor() {
    this.earthSin = Array.from({ length: EARTH_ARGUMENT_COUNT }, () => new Float64Array(EARTH_HARMONIC_SLOTS))
    this.earthCos = Array.from({ length: EARTH_ARGUMENT_COUNT }, () => new Float64Array(EARTH_HARMONIC_SLOTS))
    this.lunarSin = LUNAR_HARMONIC_COUNTS.map(n => new Float64Array(n))
    this.lunarCos = LUNAR_HARMONIC_COUNTS.map(n => new Float64Array(n))
  }

  /**
   * Time quantities for `jdUT`. Reuses the cached epoch only when `jdUT` is
   * identical to the last query; any other value replaces it, lazily filled
   * fields included.
   */
  epoch(jdUT: number): Epoch {
    if (this.current !== null && this.current.jdUT === jdUT) return this.current
    const dt = deltaT(jdUT)
    const jdTT = jdUT + dt
    const T = jdToT(jdTT)
    const T2 = T * T
    this.current = { jdUT, jdTT, deltaT: dt, T, T2, T3: T2 * T }
    this.epochMisses++
    return this.current
  }

  /** Name of the stage sequence currently running, or null when idle */
  get busyWith(): string | null {
    return this.owner
  }

  /**
   * Run a stage sequence with exclusive ownership of the state.
   * Throws EphemerisStateBusyError if another sequence holds it.
   */
  run<R>(stage: string, fn: (state: this) => R): R {
    if (this.owner !== null) throw new EphemerisStateBusyError(stage, this.owner)
    this.owner = stage
    try {
      return fn(this)
    } finally {
      this.owner = null
    }
  }
}
