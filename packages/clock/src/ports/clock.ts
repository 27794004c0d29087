import type { Milliseconds } from "./time"

/**
 * Source of the current time.
 *
 * @remarks
 * Injected wherever expiry is computed so tests can drive time explicitly
 * instead of waiting on real timers.
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
  nowMs(): Milliseconds
}
