import type { UtcOffsetMinutes } from "@rotolog/clock"

const MS_PER_MINUTE = 60_000

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0")
}

/**
 * Renders `at` as `YYYY-MM-DD HH:MM:SS.mmm` in the zone `offsetMinutes` east
 * of UTC.
 */
export function formatTimestamp(at: Date, offsetMinutes: UtcOffsetMinutes): string {
  const t = new Date(at.getTime() + offsetMinutes * MS_PER_MINUTE)

  const date = `${pad(t.getUTCFullYear(), 4)}-${pad(t.getUTCMonth() + 1)}-${pad(t.getUTCDate())}`
  const time = `${pad(t.getUTCHours())}:${pad(t.getUTCMinutes())}:${pad(t.getUTCSeconds())}`

  return `${date} ${time}.${pad(t.getUTCMilliseconds(), 3)}`
}
