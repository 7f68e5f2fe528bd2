import { describe, expect, it } from 'vitest'
import {
  EARTH_MAX_HARMONIC,
  EARTH_SERIES,
  meanObliquity,
  meanObliquityAt,
  nutation,
  solarDeclination,
  solarLongitude,
  solarRightAscension,
  trueObliquityAt,
} from '../index.js'
import { EphemerisState, EARTH_HARMONIC_SLOTS } from '../../state/index.js'
import { angleDiff } from '../../math/index.js'
import { gregorianToJD } from '../../time/index.js'

describe('solarLongitude', () => {
  it('is normalized to [0, 360)', () => {
    for (let m = 1; m <= 12; m++) {
      const lon = solarLongitude(gregorianToJD(2025, m, 10))
      expect(lon).toBeGreaterThanOrEqual(0)
      expect(lon).toBeLessThan(360)
    }
  })

  it('is 0° at the March 2025 equinox (Mar 20 09:01 UT)', () => {
    const jd = gregorianToJD(2025, 3, 20, 9 + 1 / 60)
    expect(Math.abs(angleDiff(solarLongitude(jd), 0))).toBeLessThan(0.01)
  })

  it('is 90° at the June 2025 solstice (Jun 21 02:42 UT)', () => {
    const jd = gregorianToJD(2025, 6, 21, 2 + 42 / 60)
    const state = new EphemerisState()
    expect(Math.abs(angleDiff(solarLongitude(jd, state), 90))).toBeLessThan(0.01)
    expect(solarDeclination(jd, state)).toBeCloseTo(trueObliquityAt(jd, state), 3)
    expect(solarRightAscension(jd, state)).toBeCloseTo(90, 1)
  })

  it('advances about a degree a day', () => {
    const a = solarLongitude(gregorianToJD(2025, 1, 1))
    const b = solarLongitude(gregorianToJD(2025, 1, 2))
    expect(angleDiff(b, a)).toBeGreaterThan(1.0)
    expect(angleDiff(b, a)).toBeLessThan(1.03)
  })
})

describe('nutation and obliquity', () => {
  // 1987 Apr 10 0h TT: Δψ = −3.788″, Δε = +9.443″, ε₀ = 23°26′27.407″
  const T = -0.127296372348

  it('matches the worked values within the truncation error', () => {
    const { dpsi, deps } = nutation(T)
    expect(Math.abs(dpsi * 3600 - -3.788)).toBeLessThan(0.5)
    expect(Math.abs(deps * 3600 - 9.443)).toBeLessThan(0.5)
  })

  it('mean obliquity at J2000 and in 1987', () => {
    expect(meanObliquity(0)).toBeCloseTo(23.4392911, 6)
    expect(meanObliquity(T)).toBeCloseTo(23 + 26 / 60 + 27.407 / 3600, 4)
  })

  it('caches obliquity on the epoch', () => {
    const state = new EphemerisState()
    const jd = gregorianToJD(2025, 1, 1)
    const first = meanObliquityAt(jd, state)
    expect(meanObliquityAt(jd, state)).toBe(first)
    expect(state.epochMisses).toBe(1)
  })
})

describe('EARTH_SERIES', () => {
  it('keeps every harmonic within the precomputed table', () => {
    for (const pairs of EARTH_SERIES.arguments) {
      for (let i = 0; i < pairs.length; i += 2) {
        const harmonic = Math.abs(pairs[i])
        const argument = pairs[i + 1]
        expect(harmonic).toBeLessThanOrEqual(EARTH_MAX_HARMONIC[argument - 1])
        expect(harmonic).toBeLessThanOrEqual(EARTH_HARMONIC_SLOTS)
      }
    }
  })

  it('pairs each argument list with coefficients', () => {
    expect(EARTH_SERIES.coefficients.length).toBe(EARTH_SERIES.arguments.length)
  })
})
