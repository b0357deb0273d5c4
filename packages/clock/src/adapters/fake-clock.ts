import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs, UtcOffsetMinutes } from "../ports/time"

export type FakeClockOptions = {
  /** @default 0 */
  startMs?: UnixMs

  /**
   * Fixed zone offset reported for every instant. `null` simulates a host
   * whose local zone cannot be resolved.
   *
   * @default 0
   */
  utcOffsetMinutes?: UtcOffsetMinutes | null
}

export class FakeClock implements Clock {
  private time: UnixMs
  private readonly offset: UtcOffsetMinutes | null

  constructor(opts: FakeClockOptions = {}) {
    this.time = opts.startMs ?? 0
    this.offset = opts.utcOffsetMinutes === undefined ? 0 : opts.utcOffsetMinutes
  }

  now(): Date {
    return new Date(this.time)
  }

  utcOffsetMinutes(_at: Date): UtcOffsetMinutes | null {
    return this.offset
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }
}
