import { describe, expect, it } from 'vitest'
import { horizonAltitude, siderealTime0h, sinclairRefraction, STANDARD_PRESSURE, sunriseJD, sunsetJD } from '../index.js'
import { EphemerisState } from '../../state/index.js'
import { NEW_DELHI } from '../../config/index.js'
import { gregorianToJD } from '../../time/index.js'
import type { Location } from '../../types.js'

/** Local clock hours of a UT JD */
function localHours(jd: number, utcOffset: number): number {
  const local = jd + 0.5 + utcOffset / 24
  return (local - Math.floor(local)) * 24
}

describe('horizon altitude', () => {
  it('is −0.6123° at sea level', () => {
    expect(horizonAltitude(0)).toBeCloseTo(-0.6123, 4)
  })

  it('scales the Sinclair refraction with temperature', () => {
    expect(sinclairRefraction(STANDARD_PRESSURE, 10)).toBeCloseTo(0.5763, 4)
  })

  it('drops with elevation', () => {
    expect(horizonAltitude(1000)).toBeLessThan(horizonAltitude(0))
  })
})

describe('siderealTime0h', () => {
  it('is 99.9678° on 2000 Jan 1 0h UT', () => {
    expect(siderealTime0h(2451544.5)).toBeCloseTo(99.9677947, 4)
  })
})

describe('sunriseJD / sunsetJD', () => {
  it('New Delhi, 2025 Jan 18', () => {
    const state = new EphemerisState()
    const jd = gregorianToJD(2025, 1, 18)
    const rise = sunriseJD(jd, NEW_DELHI, state)
    const set = sunsetJD(jd, NEW_DELHI, state)
    expect(rise).not.toBeNull()
    expect(set).not.toBeNull()
    if (rise === null || set === null) return
    // 07:15:35 IST
    expect(Math.abs(localHours(rise, 5.5) - (7 + 15 / 60 + 35 / 3600))).toBeLessThan(90 / 3600)
    expect(localHours(set, 5.5)).toBeGreaterThan(17.5)
    expect(localHours(set, 5.5)).toBeLessThan(18)
  })

  it('puts sunrise and sunset on the requested civil day', () => {
    const jd = gregorianToJD(2025, 1, 15)
    const rise = sunriseJD(jd, NEW_DELHI)
    const set = sunsetJD(jd, NEW_DELHI)
    if (rise === null || set === null) throw new Error('expected events')
    const dayStart = jd - NEW_DELHI.utcOffset / 24
    expect(rise).toBeGreaterThan(dayStart)
    expect(set).toBeLessThan(dayStart + 1)
    expect(localHours(rise, 5.5)).toBeGreaterThan(7)
    expect(localHours(rise, 5.5)).toBeLessThan(7.5)
    expect(localHours(set, 5.5)).toBeGreaterThan(17)
    expect(localHours(set, 5.5)).toBeLessThan(18)
  })

  it('handles a location west of Greenwich', () => {
    const newYork: Location = { latitude: 40.7128, longitude: -74.006, elevation: 0, utcOffset: -5 }
    const rise = sunriseJD(gregorianToJD(2025, 6, 21), newYork)
    if (rise === null) throw new Error('expected sunrise')
    expect(localHours(rise, -5)).toBeGreaterThan(4.3)
    expect(localHours(rise, -5)).toBeLessThan(4.6)
  })

  it('returns null through polar night and midnight sun', () => {
    const svalbard: Location = { latitude: 80, longitude: 15, elevation: 0, utcOffset: 1 }
    expect(sunriseJD(gregorianToJD(2025, 12, 21), svalbard)).toBeNull()
    expect(sunsetJD(gregorianToJD(2025, 12, 21), svalbard)).toBeNull()
    expect(sunriseJD(gregorianToJD(2025, 6, 21), svalbard)).toBeNull()
    expect(sunsetJD(gregorianToJD(2025, 6, 21), svalbard)).toBeNull()
  })
})
