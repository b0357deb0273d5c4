import type { Clock } from "../ports/clock"
import type { UtcOffsetMinutes } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  utcOffsetMinutes(at: Date): UtcOffsetMinutes | null {
    const offset = at.getTimezoneOffset()

    if (!Number.isFinite(offset)) return null

    // getTimezoneOffset() is minutes *west* of UTC
    return offset === 0 ? 0 : -offset
  }
}
