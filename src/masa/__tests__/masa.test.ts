import { describe, expect, it } from 'vitest'
import {
  hinduYearSaka,
  hinduYearVikram,
  masaFor,
  masaForDate,
  newMoonAfter,
  newMoonBefore,
  solarRashi,
} from '../index.js'
import { EphemerisState } from '../../state/index.js'
import { NEW_DELHI } from '../../config/index.js'
import { lunarPhase, tithiAt } from '../../tithi/index.js'
import { angleDiff } from '../../math/index.js'
import { gregorianToJD } from '../../time/index.js'

describe('newMoonBefore / newMoonAfter', () => {
  it('finds the new moon of 2025 Jan 29 12:36 UT from both sides', () => {
    const state = new EphemerisState()
    const expected = gregorianToJD(2025, 1, 29, 12.6)

    const before = gregorianToJD(2025, 2, 5)
    const after = gregorianToJD(2025, 1, 20)
    const fromAfter = newMoonBefore(before, tithiAt(before, state).index, state)
    const fromBefore = newMoonAfter(after, tithiAt(after, state).index, state)

    expect(Math.abs(fromAfter - expected)).toBeLessThan(10 / 1440)
    expect(Math.abs(fromBefore - expected)).toBeLessThan(10 / 1440)
    expect(Math.abs(fromAfter - fromBefore)).toBeLessThan(1e-6)
    expect(Math.abs(angleDiff(lunarPhase(fromAfter, state), 0))).toBeLessThan(1e-4)
  })
})

describe('masaFor across apogee-lengthened months', () => {
  it('brackets every instant of 2021 between two new moons', () => {
    const state = new EphemerisState()
    const start = gregorianToJD(2021, 1, 1)
    const end = gregorianToJD(2022, 1, 1)
    for (let jd = start; jd < end; jd += 0.713) {
      const masa = masaFor(jd, state)
      expect(masa.jdNewMoonStart).toBeLessThanOrEqual(jd + 1e-6)
      expect(masa.jdNewMoonEnd).toBeGreaterThan(jd - 1e-6)
      const length = masa.jdNewMoonEnd - masa.jdNewMoonStart
      expect(length).toBeGreaterThan(29.2)
      expect(length).toBeLessThan(29.9)
    }
  })

  it('finds the 2021 Jul 10 01:17 UT new moon from late July', () => {
    const state = new EphemerisState()
    const expected = gregorianToJD(2021, 7, 10, 1 + 17 / 60)
    for (let day = 26; day <= 31; day++) {
      const masa = masaForDate({ year: 2021, month: 7, day }, NEW_DELHI, state)
      expect(Math.abs(masa.jdNewMoonStart - expected)).toBeLessThan(10 / 1440)
    }
  })
})

describe('solarRashi', () => {
  it('is Mesha a day after the April sankranti', () => {
    expect(solarRashi(gregorianToJD(2025, 4, 15))).toBe(1)
  })

  it('is Meena a day before it', () => {
    expect(solarRashi(gregorianToJD(2025, 4, 12))).toBe(12)
  })
})

describe('masaForDate (New Delhi)', () => {
  const cases: [number, number, number, number, boolean][] = [
    [2013, 1, 18, 10, false],
    [2013, 2, 10, 10, false],
    [2012, 8, 17, 5, false],
    [2012, 8, 18, 6, true],
    [2012, 9, 18, 6, false],
    [2025, 1, 1, 10, false],
    [2025, 1, 30, 11, false],
    [2025, 3, 30, 1, false],
    [2025, 4, 30, 2, false],
  ]

  it.each(cases)('%i-%i-%i is masa %i (adhika %s)', (year, month, day, number, adhika) => {
    const masa = masaForDate({ year, month, day }, NEW_DELHI)
    expect(masa.number).toBe(number)
    expect(masa.adhika).toBe(adhika)
  })

  it('names the month and brackets the date with new moons', () => {
    const masa = masaForDate({ year: 2025, month: 1, day: 18 }, NEW_DELHI)
    expect(masa.name).toBe('Pausha')
    const jd = gregorianToJD(2025, 1, 18)
    expect(masa.jdNewMoonStart).toBeLessThan(jd)
    expect(masa.jdNewMoonEnd).toBeGreaterThan(jd)
    const length = masa.jdNewMoonEnd - masa.jdNewMoonStart
    expect(length).toBeGreaterThan(29.2)
    expect(length).toBeLessThan(29.9)
  })
})

describe('Saka and Vikram years', () => {
  it('2025-01-18 falls in Saka 1946, Vikram 2081', () => {
    const masa = masaForDate({ year: 2025, month: 1, day: 18 }, NEW_DELHI)
    expect(masa.yearSaka).toBe(1946)
    expect(masa.yearVikram).toBe(2081)
  })

  it('2012-08-18 falls in Saka 1934, Vikram 2069', () => {
    const masa = masaForDate({ year: 2012, month: 8, day: 18 }, NEW_DELHI)
    expect(masa.yearSaka).toBe(1934)
    expect(masa.yearVikram).toBe(2069)
  })

  it('turns over at Chaitra', () => {
    const state = new EphemerisState()
    const phalguna = masaFor(gregorianToJD(2025, 3, 20), state)
    const chaitra = masaFor(gregorianToJD(2025, 4, 5), state)
    expect(phalguna.number).toBe(12)
    expect(chaitra.number).toBe(1)
    expect(chaitra.yearSaka).toBe(phalguna.yearSaka + 1)
  })

  it('Vikram is Saka + 135', () => {
    expect(hinduYearVikram(1947)).toBe(2082)
  })

  it('hinduYearSaka counts from the Kali epoch', () => {
    // Kali year of 2025-04-15 in Chaitra is 5126
    expect(hinduYearSaka(gregorianToJD(2025, 4, 15), 1)).toBe(1947)
  })
})
