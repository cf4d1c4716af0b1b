import type { UnixMs } from "./time"

/**
 * Source of wall-clock time.
 *
 * @remarks
 * Inject a Clock wherever timestamps or durations are computed so tests can
 * control time without fake timers.
 */
export interface Clock {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}
