/**
 * errors — Typed failures raised by the engine.
 *
 * A polar day or night is not an error: rise/set returns null for it.
 */

/** A bisection bracket did not contain the sign change it was seeded for. */
export class BracketError extends Error {
  constructor(
    public quantity: string,
    public target: number,
    public lo: number,
    public hi: number,
  ) {
    super(`No ${quantity} crossing of ${target}° between JD ${lo.toFixed(5)} and JD ${hi.toFixed(5)}`)
    this.name = 'BracketError'
  }
}

/** An EphemerisState was entered while another computation still owned it. */
export class EphemerisStateBusyError extends Error {
  constructor(public stage: string, public owner: string) {
    super(`EphemerisState is in use by ${owner}; cannot start ${stage}`)
    this.name = 'EphemerisStateBusyError'
  }
}

/** Settings or a location failed validation. */
export class SettingsError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid settings: ${issues.join('; ')}`)
    this.name = 'SettingsError'
  }
}

/** A solar calendar name outside the supported set. */
export class UnknownCalendarError extends Error {
  constructor(public calendar: string) {
    super(`Unknown solar calendar: ${calendar}`)
    this.name = 'UnknownCalendarError'
  }
}
