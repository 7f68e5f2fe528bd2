/**
 * Command-line option parsing for the panchang CLI.
 *
 *   -y YEAR  -m MONTH  -d DAY  -s CALENDAR  -l LAT,LON  -u OFFSET  -h
 */

import type { CivilDate, Location, SolarCalendarVariant } from '../types.js'
import { SOLAR_CALENDAR_VARIANTS } from '../types.js'
import { isSolarCalendarVariant } from '../solar/index.js'

export interface CliRequest {
  year: number
  month: number
  /** Omitted for a whole-month table */
  day?: number
  /** Solar calendar mode; lunisolar panchang when absent */
  calendar?: SolarCalendarVariant
  location: Location
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; request: CliRequest }
  | { kind: 'error'; message: string }

export const USAGE = `Usage: panchang [options]
  -y YEAR      Gregorian year (default: current)
  -m MONTH     Gregorian month 1-12 (default: current)
  -d DAY       Specific day (if omitted, shows full month)
  -s TYPE      Solar calendar: ${SOLAR_CALENDAR_VARIANTS.join(', ')}
               (if omitted, shows lunisolar panchang)
  -l LAT,LON   Location (default: New Delhi 28.6139,77.2090)
  -u OFFSET    UTC offset in hours (default: 5.5)
  -h           Show this help`

function parseInteger(text: string): number | null {
  return /^-?\d+$/.test(text) ? parseInt(text, 10) : null
}

function parseNumber(text: string): number | null {
  const n = Number(text)
  return text.trim() === '' || isNaN(n) ? null : n
}

/**
 * Parse CLI arguments (without the node and script paths).
 * `today` and `location` supply the defaults.
 */
export function parseCliArgs(args: readonly string[], today: CivilDate, location: Location): CliCommand {
  const request: CliRequest = { year: today.year, month: today.month, location: { ...location } }

  for (let i = 0; i < args.length; i++) {
    const flag = args[i]
    if (flag === '-h' || flag === '--help') return { kind: 'help' }

    const value = args[i + 1]
    if (value === undefined) return { kind: 'error', message: `Missing value for ${flag}` }
    i++

    switch (flag) {
      case '-y': {
        const year = parseInteger(value)
        if (year === null) return { kind: 'error', message: `Invalid year: ${value}` }
        request.year = year
        break
      }
      case '-m': {
        const month = parseInteger(value)
        if (month === null || month < 1 || month > 12) return { kind: 'error', message: 'Error: month must be 1-12' }
        request.month = month
        break
      }
      case '-d': {
        const day = parseInteger(value)
        if (day === null || day < 1) return { kind: 'error', message: `Invalid day: ${value}` }
        request.day = day
        break
      }
      case '-s': {
        if (!isSolarCalendarVariant(value)) {
          return {
            kind: 'error',
            message: `Error: unknown solar calendar type '${value}'\nValid types: ${SOLAR_CALENDAR_VARIANTS.join(', ')}`,
          }
        }
        request.calendar = value
        break
      }
      case '-l': {
        const parts = value.split(',')
        const lat = parts.length === 2 ? parseNumber(parts[0]) : null
        const lon = parts.length === 2 ? parseNumber(parts[1]) : null
        if (lat === null || lon === null) return { kind: 'error', message: 'Error: invalid location format. Use LAT,LON' }
        request.location = { ...request.location, latitude: lat, longitude: lon, name: undefined }
        break
      }
      case '-u': {
        const offset = parseNumber(value)
        if (offset === null) return { kind: 'error', message: `Invalid UTC offset: ${value}` }
        request.location = { ...request.location, utcOffset: offset }
        break
      }
      default:
        return { kind: 'error', message: `Unknown option: ${flag}` }
    }
  }

  return { kind: 'run', request }
}
