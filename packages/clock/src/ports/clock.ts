import type { UtcOffsetMinutes } from "./time"

/**
 * Source of wall-clock time for log timestamps.
 *
 * @remarks
 * Timestamps are rendered in the zone reported by `utcOffsetMinutes`, so an
 * adapter decides what "local" means. A `null` offset means the local zone
 * could not be resolved and callers fall back to UTC.
 */
export interface Clock {
  now(): Date

  /** Offset of the local zone at `at`, or `null` when it cannot be resolved. */
  utcOffsetMinutes(at: Date): UtcOffsetMinutes | null
}
