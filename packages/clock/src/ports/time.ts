export type Milliseconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = number

/**
 * Minutes east of UTC, e.g. `120` for UTC+02:00 and `-300` for UTC-05:00.
 */
export type UtcOffsetMinutes = number
