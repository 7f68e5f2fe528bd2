import { describe, expect, it } from 'vitest'
import { LAHIRI_AT_EPOCH, LAHIRI_EPOCH, ayanamsa, ayanamsaTT, solarLongitudeSidereal } from '../index.js'
import { EphemerisState } from '../../state/index.js'
import { nutationAt, solarLongitude } from '../../sun/index.js'
import { mod360 } from '../../math/index.js'
import { gregorianToJD } from '../../time/index.js'

describe('ayanamsa', () => {
  it('equals the defining value at the reference epoch', () => {
    expect(ayanamsaTT(LAHIRI_EPOCH)).toBeCloseTo(LAHIRI_AT_EPOCH, 9)
  })

  it('is about 24°12′ at the start of 2025', () => {
    expect(Math.abs(ayanamsa(gregorianToJD(2025, 1, 1)) - 24.206)).toBeLessThan(0.02)
  })

  it('grows by about 50.3″ a year', () => {
    const growth = ayanamsa(gregorianToJD(2050, 1, 1)) - ayanamsa(gregorianToJD(2000, 1, 1))
    expect(Math.abs(growth - 0.698)).toBeLessThan(0.005)
  })

  it('is cached per epoch', () => {
    const state = new EphemerisState()
    const jd = gregorianToJD(2025, 4, 14)
    const first = ayanamsa(jd, state)
    expect(state.epoch(jd).ayanamsa).toBe(first)
  })
})

describe('solarLongitudeSidereal', () => {
  it('is the tropical longitude less the ayanamsa', () => {
    const jd = gregorianToJD(2025, 8, 17, 6)
    const state = new EphemerisState()
    expect(solarLongitudeSidereal(jd, state)).toBeCloseTo(mod360(solarLongitude(jd, state) - ayanamsa(jd, state)), 12)
  })

  it('cancels nutation applied to both terms', () => {
    const jd = gregorianToJD(2025, 11, 3)
    const state = new EphemerisState()
    const { dpsi } = nutationAt(jd, state)
    const mean = mod360(solarLongitude(jd, state) - dpsi - ayanamsa(jd, state))
    const apparent = mod360(solarLongitude(jd, state) - (ayanamsa(jd, state) + dpsi))
    expect(Math.abs(solarLongitudeSidereal(jd, state) - mod360(mean + dpsi))).toBeLessThan(1e-9)
    expect(Math.abs(mean - apparent)).toBeLessThan(1e-9)
  })

  it('is in the first degrees of Mesha on 2025 Apr 14', () => {
    const lon = solarLongitudeSidereal(gregorianToJD(2025, 4, 14, 12))
    expect(lon).toBeGreaterThan(0)
    expect(lon).toBeLessThan(1.5)
  })
})
