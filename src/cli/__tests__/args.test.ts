import { describe, expect, it } from 'vitest'
import { parseCliArgs } from '../args.js'
import { NEW_DELHI } from '../../config/index.js'

const today = { year: 2025, month: 1, day: 18 }

describe('parseCliArgs', () => {
  it('defaults to the current month at the default location', () => {
    expect(parseCliArgs([], today, NEW_DELHI)).toEqual({
      kind: 'run',
      request: { year: 2025, month: 1, location: NEW_DELHI },
    })
  })

  it('shows help', () => {
    expect(parseCliArgs(['-h'], today, NEW_DELHI)).toEqual({ kind: 'help' })
    expect(parseCliArgs(['-y', '2024', '--help'], today, NEW_DELHI)).toEqual({ kind: 'help' })
  })

  it('reads a single day', () => {
    const command = parseCliArgs(['-y', '2013', '-m', '8', '-d', '18'], today, NEW_DELHI)
    expect(command).toEqual({
      kind: 'run',
      request: { year: 2013, month: 8, day: 18, location: NEW_DELHI },
    })
  })

  it('reads a solar calendar', () => {
    const command = parseCliArgs(['-s', 'tamil', '-m', '4'], today, NEW_DELHI)
    expect(command.kind === 'run' && command.request.calendar).toBe('tamil')
  })

  it('reads a location and offset', () => {
    const command = parseCliArgs(['-l', '13.08,80.27', '-u', '-5'], today, NEW_DELHI)
    if (command.kind !== 'run') throw new Error('expected run')
    expect(command.request.location).toEqual({
      latitude: 13.08,
      longitude: 80.27,
      elevation: 0,
      utcOffset: -5,
      name: undefined,
    })
  })

  it('does not change the default location', () => {
    parseCliArgs(['-u', '0'], today, NEW_DELHI)
    expect(NEW_DELHI.utcOffset).toBe(5.5)
  })

  it('rejects a month outside 1-12', () => {
    expect(parseCliArgs(['-m', '13'], today, NEW_DELHI)).toEqual({ kind: 'error', message: 'Error: month must be 1-12' })
  })

  it('rejects an unknown solar calendar', () => {
    expect(parseCliArgs(['-s', 'foo'], today, NEW_DELHI)).toEqual({
      kind: 'error',
      message: "Error: unknown solar calendar type 'foo'\nValid types: tamil, bengali, odia, malayalam",
    })
  })

  it('rejects a malformed location', () => {
    expect(parseCliArgs(['-l', '13.08'], today, NEW_DELHI)).toEqual({
      kind: 'error',
      message: 'Error: invalid location format. Use LAT,LON',
    })
  })

  it('rejects a missing value and an unknown option', () => {
    expect(parseCliArgs(['-y'], today, NEW_DELHI)).toEqual({ kind: 'error', message: 'Missing value for -y' })
    expect(parseCliArgs(['-x', '1'], today, NEW_DELHI)).toEqual({ kind: 'error', message: 'Unknown option: -x' })
  })
})
