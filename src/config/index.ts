/**
 * config — Tunable constants for the calendar rules, validated with zod.
 *
 * The regional offsets are empirical: they absorb a fixed ~24″ difference
 * between this engine's ayanamsa and the almanac the rules were checked
 * against (about 10 minutes of sankranti timing). Only sankrantis landing
 * inside one of these windows are affected.
 */

import { z } from 'zod'
import type { Location } from '../types.js'
import { SettingsError } from '../errors/index.js'

// ─── Schemas ─────────────────────────────────────────────────────────────────

export const LocationZ = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  elevation: z.number().min(-500).max(9000).default(0),
  utcOffset: z.number().min(-14).max(14),
  name: z.string().optional(),
})

export const CalendarSettingsZ = z.object({
  /** Tamil critical time: minutes before sunset */
  tamilSunsetOffsetMinutes: z.number().min(0).max(60).default(8.0),
  /** Malayalam critical time: fraction of daylight after sunrise */
  malayalamDaytimeFraction: z.number().gt(0).lt(1).default(0.6),
  /** Malayalam critical time: minutes subtracted from the daylight fraction */
  malayalamOffsetMinutes: z.number().min(0).max(60).default(9.5),
  /** Bengali critical time: minutes after local midnight */
  bengaliMidnightWindowMinutes: z.number().min(0).max(60).default(24),
  /** Apply the tithi tie break to Bengali sankrantis before the critical time */
  bengaliTithiRule: z.boolean().default(true),
  /** Odia critical time: local clock hour on the civil day */
  odiaCutoffHour: z.number().min(0).max(24).default(22.2),
  defaultLocation: LocationZ.default({
    latitude: 28.6139,
    longitude: 77.209,
    elevation: 0,
    utcOffset: 5.5,
    name: 'New Delhi',
  }),
})

export type CalendarSettings = z.infer<typeof CalendarSettingsZ>
export type CalendarSettingsInput = z.input<typeof CalendarSettingsZ>
export type LocationInput = z.input<typeof LocationZ>

// ─── Resolution ──────────────────────────────────────────────────────────────

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
}

/** Fill in defaults for any omitted setting; throws SettingsError on invalid values. */
export function resolveSettings(input: CalendarSettingsInput = {}): CalendarSettings {
  const parsed = CalendarSettingsZ.safeParse(input)
  if (!parsed.success) throw new SettingsError(describeIssues(parsed.error))
  return parsed.data
}

/** Validate a caller-supplied location. */
export function parseLocation(input: LocationInput): Location {
  const parsed = LocationZ.safeParse(input)
  if (!parsed.success) throw new SettingsError(describeIssues(parsed.error))
  return parsed.data
}

export const DEFAULT_SETTINGS: CalendarSettings = resolveSettings()

/** New Delhi, UTC+5:30 */
export const NEW_DELHI: Location = DEFAULT_SETTINGS.defaultLocation
