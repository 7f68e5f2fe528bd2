// ─── Primitive geometry ──────────────────────────────────────────────────────

/** 3-element Cartesian direction (unit sphere unless stated otherwise) */
export type Vec3 = [number, number, number]

// ─── Time ────────────────────────────────────────────────────────────────────

/** A proleptic-Gregorian civil date */
export interface CivilDate {
  year: number
  /** 1-12 */
  month: number
  /** 1-31 */
  day: number
}

/** A civil date plus the fractional hour of the day (UT unless stated otherwise) */
export interface GregorianInstant extends CivilDate {
  hour: number
}

/** Local clock time rounded to the nearest second */
export interface ClockTime {
  hour: number
  minute: number
  second: number
}

/** Day of week, 0 = Sunday … 6 = Saturday */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6

// ─── Location ────────────────────────────────────────────────────────────────

/** Observer location. Immutable input to every rise/set and calendar query. */
export interface Location {
  /** Geodetic latitude in degrees (north positive) */
  latitude: number
  /** Longitude in degrees (east positive) */
  longitude: number
  /** Height above sea level in meters */
  elevation: number
  /** Fixed offset of local civil time from UTC, in hours (e.g. 5.5 for IST) */
  utcOffset: number
  /** Optional label for the location */
  name?: string
}

// ─── Ephemeris outputs ───────────────────────────────────────────────────────

/** Nutation angles in degrees */
export interface Nutation {
  /** Nutation in longitude (Δψ) */
  dpsi: number
  /** Nutation in obliquity (Δε) */
  deps: number
}

// ─── Lunisolar calendar ──────────────────────────────────────────────────────

/** Half of the lunar month: waxing (shukla) or waning (krishna) */
export type Paksha = 'shukla' | 'krishna'

/** Tithi active at a single instant */
export interface TithiMoment {
  /** 1-30 (1-15 shukla, 16-30 krishna) */
  index: number
  paksha: Paksha
  /** 1-15 within the paksha */
  pakshaTithi: number
  /** Lunar phase (moon − sun longitude) in degrees, [0, 360) */
  phase: number
}

/** Tithi governing a civil day, taken at local sunrise */
export interface TithiRecord extends TithiMoment {
  /** JD (UT) at which the tithi began */
  jdStart: number
  /** JD (UT) at which the tithi ends */
  jdEnd: number
  /** JD (UT) of local sunrise, or null on a polar day or night */
  sunriseJd: number | null
  /** JD (UT) the tithi was sampled at: sunrise, or local noon without one */
  sampledAt: number
  /** The following tithi is skipped: it neither starts nor ends across a sunrise */
  kshaya: boolean
  /** Same tithi index as at the previous civil day's sunrise */
  adhika: boolean
}

/** Lunar month (amanta: new moon to new moon) */
export interface MasaRecord {
  /** 1 = Chaitra … 12 = Phalguna */
  number: number
  name: string
  /** Intercalary month: both bracketing new moons fall in the same solar sign */
  adhika: boolean
  yearSaka: number
  yearVikram: number
  /** JD (UT) of the new moon that opened the month */
  jdNewMoonStart: number
  /** JD (UT) of the new moon that closes the month */
  jdNewMoonEnd: number
}

/** Lunisolar date of a civil day */
export interface HinduDate {
  yearSaka: number
  yearVikram: number
  masa: number
  masaName: string
  adhikaMasa: boolean
  paksha: Paksha
  /** 1-15 within the paksha */
  tithi: number
  adhikaTithi: boolean
}

/** Full panchang entry for a single civil day */
export interface PanchangDay {
  date: CivilDate
  weekday: Weekday
  /** JD (UT) of sunrise, or null on a polar day/night */
  sunriseJd: number | null
  /** JD (UT) of sunset, or null on a polar day/night */
  sunsetJd: number | null
  tithi: TithiRecord
  masa: MasaRecord
  hinduDate: HinduDate
}

// ─── Regional solar calendars ────────────────────────────────────────────────

/** The closed set of supported regional solar calendars */
export type SolarCalendarVariant = 'tamil' | 'bengali' | 'odia' | 'malayalam'

export const SOLAR_CALENDAR_VARIANTS: readonly SolarCalendarVariant[] = [
  'tamil',
  'bengali',
  'odia',
  'malayalam',
] as const

/** Fixed per-variant parameters */
export interface SolarCalendarInfo {
  /** Display name, e.g. "Tamil" */
  label: string
  /** Rashi whose sankranti begins the regional year (1 = Mesha, 5 = Simha) */
  firstRashi: number
  /** Gregorian year minus regional year, on or after the year-start day */
  yearOffsetOn: number
  /** Gregorian year minus regional year, before the year-start day */
  yearOffsetBefore: number
  era: string
  /** Regional month names, index 0 = month 1 */
  months: readonly string[]
}

/** A date in a regional solar calendar */
export interface SolarDate {
  /** Regional era year */
  year: number
  /** Regional month 1-12 */
  month: number
  /** Day within the solar month, 1-32 */
  day: number
  /** Sidereal sign 1-12 the month is named after */
  rashi: number
  /** JD (UT) of the sankranti that began the month */
  jdSankranti: number
}

// ─── Names ───────────────────────────────────────────────────────────────────

/** Sidereal signs, index 0 = rashi 1 */
export const RASHI_NAMES = [
  'Mesha', 'Vrishabha', 'Mithuna', 'Karka', 'Simha', 'Kanya',
  'Tula', 'Vrishchika', 'Dhanu', 'Makara', 'Kumbha', 'Meena',
] as const

/** Lunar months, index 0 = masa 1 */
export const MASA_NAMES = [
  'Chaitra', 'Vaishakha', 'Jyeshtha', 'Ashadha', 'Shravana', 'Bhadrapada',
  'Ashvina', 'Kartika', 'Margashirsha', 'Pausha', 'Magha', 'Phalguna',
] as const

/**
 * Tithi names within a paksha, index 0 = tithi 1.
 * The 15th is Purnima in the shukla paksha and Amavasya in the krishna paksha.
 */
export const TITHI_NAMES = [
  'Pratipada', 'Dwitiya', 'Tritiya', 'Chaturthi', 'Panchami',
  'Shashthi', 'Saptami', 'Ashtami', 'Navami', 'Dashami',
  'Ekadashi', 'Dwadashi', 'Trayodashi', 'Chaturdashi', 'Purnima',
] as const

export const WEEKDAY_NAMES = [
  'Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday',
] as const

export const WEEKDAY_SHORT = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const
