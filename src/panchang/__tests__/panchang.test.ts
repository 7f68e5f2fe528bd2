import { describe, expect, it } from 'vitest'
import {
  formatCivilDate,
  formatDayReport,
  formatHinduDate,
  formatLocalTime,
  formatMonthTable,
  formatTithi,
  gregorianToHindu,
  monthPanchang,
  panchangForDate,
} from '../index.js'
import { EphemerisState } from '../../state/index.js'
import { NEW_DELHI } from '../../config/index.js'
import type { HinduDate } from '../../types.js'

describe('panchangForDate', () => {
  it('2025-01-18 in New Delhi', () => {
    const day = panchangForDate({ year: 2025, month: 1, day: 18 }, NEW_DELHI)
    expect(day.weekday).toBe(6)
    expect(day.sunriseJd).toBe(day.tithi.sunriseJd)
    expect(day.hinduDate).toEqual({
      yearSaka: 1946,
      yearVikram: 2081,
      masa: 10,
      masaName: 'Pausha',
      adhikaMasa: false,
      paksha: 'krishna',
      tithi: 5,
      adhikaTithi: false,
    })
  })

  it('carries the adhika month of 2012', () => {
    const hindu = gregorianToHindu({ year: 2012, month: 8, day: 18 }, NEW_DELHI)
    expect(hindu.masaName).toBe('Bhadrapada')
    expect(hindu.adhikaMasa).toBe(true)
    expect(formatHinduDate(hindu)).toBe('Adhika Bhadrapada Shukla 1, Saka 1934')
  })
})

describe('monthPanchang', () => {
  it('covers every day of January 2025', () => {
    const days = monthPanchang(2025, 1, NEW_DELHI, new EphemerisState())
    expect(days).toHaveLength(31)
    expect(days[0].date).toEqual({ year: 2025, month: 1, day: 1 })
    expect(days[28].tithi.index).toBe(30)
    expect(days[28].masa.name).toBe('Pausha')
    expect(days[29].masa.name).toBe('Magha')
    expect(days[29].hinduDate.tithi).toBe(1)
  })

  it('steps the tithi by one between sunrises except at kshaya and adhika days', () => {
    const days = monthPanchang(2025, 1, NEW_DELHI, new EphemerisState())
    for (let i = 1; i < days.length; i++) {
      const step = (days[i].tithi.index - days[i - 1].tithi.index + 30) % 30
      if (days[i].tithi.adhika) expect(step).toBe(0)
      else if (days[i - 1].tithi.kshaya) expect(step).toBe(2)
      else expect(step).toBe(1)
    }
  })
})

describe('panchangForDate over late July 2021', () => {
  it('computes every day', () => {
    const state = new EphemerisState()
    for (let day = 26; day <= 31; day++) {
      const p = panchangForDate({ year: 2021, month: 7, day }, NEW_DELHI, state)
      expect(p.masa.name).toBe('Ashadha')
      expect(p.hinduDate.paksha).toBe('krishna')
    }
  })
})

describe('formatting', () => {
  const hindu: HinduDate = {
    yearSaka: 1946,
    yearVikram: 2081,
    masa: 10,
    masaName: 'Pausha',
    adhikaMasa: false,
    paksha: 'krishna',
    tithi: 5,
    adhikaTithi: false,
  }

  it('formatCivilDate pads fields', () => {
    expect(formatCivilDate({ year: 2025, month: 1, day: 8 })).toBe('2025-01-08')
  })

  it('formatLocalTime', () => {
    expect(formatLocalTime(2451544.5, 5.5)).toBe('05:30:00')
    expect(formatLocalTime(null, 5.5)).toBe('--:--:--')
  })

  it('formatTithi', () => {
    expect(formatTithi({ index: 20, paksha: 'krishna', pakshaTithi: 5, phase: 235 })).toBe('Krishna Panchami (K-5)')
    expect(formatTithi({ index: 15, paksha: 'shukla', pakshaTithi: 15, phase: 175 })).toBe('Shukla Purnima (S-15)')
  })

  it('formatHinduDate', () => {
    expect(formatHinduDate(hindu)).toBe('Pausha Krishna 5, Saka 1946')
    expect(formatHinduDate(hindu, true)).toBe('Pausha Krishna 5, Saka 1946 (Vikram 2081)')
  })

  it('formatDayReport', () => {
    const lines = formatDayReport(panchangForDate({ year: 2025, month: 1, day: 18 }, NEW_DELHI), NEW_DELHI)
    expect(lines).toHaveLength(5)
    expect(lines[0]).toBe('Date:       2025-01-18 (Saturday)')
    expect(lines[1]).toMatch(/^Sunrise:    07:1\d:\d\d$/)
    expect(lines[2]).toMatch(/^Sunset:     17:\d\d:\d\d$/)
    expect(lines[3]).toBe('Tithi:      Krishna Panchami (K-5)')
    expect(lines[4]).toBe('Hindu Date: Pausha Krishna 5, Saka 1946 (Vikram 2081)')
  })

  it('formatDayReport notes an adhika tithi', () => {
    const lines = formatDayReport(panchangForDate({ year: 2025, month: 1, day: 19 }, NEW_DELHI), NEW_DELHI)
    expect(lines[lines.length - 1]).toBe('Note:       Adhika tithi (same tithi as previous day)')
  })

  it('formatMonthTable', () => {
    const state = new EphemerisState()
    const days = [18, 19].map(day => panchangForDate({ year: 2025, month: 1, day }, NEW_DELHI, state))
    const lines = formatMonthTable(days, NEW_DELHI)
    expect(lines).toHaveLength(4)
    expect(lines[0].startsWith('Date         Day   Sunrise    Tithi')).toBe(true)
    expect(lines[2].startsWith('2025-01-18   Sat   07:1')).toBe(true)
    expect(lines[3].startsWith('2025-01-19   Sun   07:1')).toBe(true)
    expect(lines[2].endsWith('Krishna Panchami (K-5)       Pausha Krishna 5, Saka 1946')).toBe(true)
  })
})
