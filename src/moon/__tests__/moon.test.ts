import { describe, expect, it } from 'vitest'
import { LUNAR_SERIES, lunarLongitude } from '../index.js'
import { EphemerisState, LUNAR_HARMONIC_COUNTS } from '../../state/index.js'
import { solarLongitude } from '../../sun/index.js'
import { angleDiff, mod360 } from '../../math/index.js'
import { gregorianToJD } from '../../time/index.js'

function phaseAt(jd: number): number {
  const state = new EphemerisState()
  return mod360(lunarLongitude(jd, state) - solarLongitude(jd, state))
}

describe('lunarLongitude', () => {
  it('is normalized to [0, 360)', () => {
    for (let d = 1; d <= 28; d += 3) {
      const lon = lunarLongitude(gregorianToJD(2025, 2, d))
      expect(lon).toBeGreaterThanOrEqual(0)
      expect(lon).toBeLessThan(360)
    }
  })

  it('meets the Sun at the new moon of 2025 Jan 29 12:36 UT', () => {
    expect(Math.abs(angleDiff(phaseAt(gregorianToJD(2025, 1, 29, 12.6)), 0))).toBeLessThan(0.2)
  })

  it('opposes the Sun at the full moon of 2025 Jan 13 22:27 UT', () => {
    expect(Math.abs(angleDiff(phaseAt(gregorianToJD(2025, 1, 13, 22.45)), 180))).toBeLessThan(0.2)
  })

  it('moves 11° to 16° a day', () => {
    const a = lunarLongitude(gregorianToJD(2025, 3, 1))
    const b = lunarLongitude(gregorianToJD(2025, 3, 2))
    expect(angleDiff(b, a)).toBeGreaterThan(11)
    expect(angleDiff(b, a)).toBeLessThan(16)
  })

  it('returns the cached value for a repeated query', () => {
    const state = new EphemerisState()
    const jd = gregorianToJD(2025, 3, 1, 6)
    const first = lunarLongitude(jd, state)
    expect(lunarLongitude(jd, state)).toBe(first)
    expect(state.busyWith).toBeNull()
  })

  it('gives the same answer on a reused state as on a fresh one', () => {
    const state = new EphemerisState()
    lunarLongitude(gregorianToJD(1990, 5, 5), state)
    const jd = gregorianToJD(2025, 3, 1, 6)
    expect(lunarLongitude(jd, state)).toBe(lunarLongitude(jd))
  })
})

describe('LUNAR_SERIES', () => {
  it('keeps every multiplier within the harmonic tables', () => {
    const tables = [
      LUNAR_SERIES.mainMultipliers,
      LUNAR_SERIES.linearMultipliers,
      LUNAR_SERIES.quadraticMultipliers,
    ]
    for (const rows of tables) {
      for (const row of rows) {
        row.forEach((j, i) => expect(Math.abs(j)).toBeLessThanOrEqual(LUNAR_HARMONIC_COUNTS[i]))
      }
    }
  })

  it('pairs each multiplier row with an amplitude', () => {
    expect(LUNAR_SERIES.mainLongitude.length).toBe(LUNAR_SERIES.mainMultipliers.length)
    expect(LUNAR_SERIES.linearLongitude.length).toBe(LUNAR_SERIES.linearMultipliers.length)
    expect(LUNAR_SERIES.quadraticLongitude.length).toBe(LUNAR_SERIES.quadraticMultipliers.length)
  })
})
