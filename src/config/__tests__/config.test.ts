import { describe, expect, it } from 'vitest'
import { DEFAULT_SETTINGS, NEW_DELHI, parseLocation, resolveSettings } from '../index.js'
import { SettingsError } from '../../errors/index.js'

describe('resolveSettings', () => {
  it('fills every default', () => {
    expect(DEFAULT_SETTINGS.tamilSunsetOffsetMinutes).toBe(8)
    expect(DEFAULT_SETTINGS.malayalamDaytimeFraction).toBe(0.6)
    expect(DEFAULT_SETTINGS.malayalamOffsetMinutes).toBe(9.5)
    expect(DEFAULT_SETTINGS.bengaliMidnightWindowMinutes).toBe(24)
    expect(DEFAULT_SETTINGS.odiaCutoffHour).toBe(22.2)
    expect(DEFAULT_SETTINGS.bengaliTithiRule).toBe(true)
  })

  it('defaults the location to New Delhi', () => {
    expect(NEW_DELHI).toEqual({
      latitude: 28.6139,
      longitude: 77.209,
      elevation: 0,
      utcOffset: 5.5,
      name: 'New Delhi',
    })
  })

  it('keeps overrides and defaults the rest', () => {
    const settings = resolveSettings({ odiaCutoffHour: 21, bengaliTithiRule: false })
    expect(settings.odiaCutoffHour).toBe(21)
    expect(settings.bengaliTithiRule).toBe(false)
    expect(settings.tamilSunsetOffsetMinutes).toBe(8)
  })

  it('rejects an out-of-range value', () => {
    expect(() => resolveSettings({ malayalamDaytimeFraction: 1.5 })).toThrow(SettingsError)
  })

  it('names the offending setting', () => {
    try {
      resolveSettings({ tamilSunsetOffsetMinutes: -1 })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(SettingsError)
      if (err instanceof SettingsError) expect(err.issues[0]).toMatch(/^tamilSunsetOffsetMinutes: /)
    }
  })
})

describe('parseLocation', () => {
  it('defaults the elevation', () => {
    expect(parseLocation({ latitude: 13.08, longitude: 80.27, utcOffset: 5.5 })).toEqual({
      latitude: 13.08,
      longitude: 80.27,
      elevation: 0,
      utcOffset: 5.5,
    })
  })

  it('rejects an impossible latitude', () => {
    expect(() => parseLocation({ latitude: 95, longitude: 0, utcOffset: 0 })).toThrow(SettingsError)
  })
})
