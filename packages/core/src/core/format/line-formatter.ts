import type { Clock } from "@rotolog/clock"
import type { Level } from "../../ports/level"
import type { TimeZone } from "../../ports/logger-config"
import { formatTimestamp } from "./format-timestamp"
import { currentThreadTag } from "./thread-tag"

export type LineParts = {
  timestamp: string
  threadTag: number
  level: Level
  message: string
}

/**
 * `2024-03-01 12:00:00.000 [00042][ INFO] message\n`
 */
export function formatLine({ timestamp, threadTag, level, message }: LineParts): string {
  return `${timestamp} [${String(threadTag).padStart(5, "0")}][${level.padStart(5)}] ${message}\n`
}

export type LineFormatterDeps = {
  clock: Clock
  threadTag?: () => number
}

export class LineFormatter {
  private readonly threadTag: () => number

  constructor(
    private readonly deps: LineFormatterDeps,
    private readonly timeZone: TimeZone = "local",
  ) {
    this.threadTag = deps.threadTag ?? currentThreadTag
  }

  format(level: Level, message: string): string {
    const now = this.deps.clock.now()
    const offset = this.timeZone === "utc" ? 0 : (this.deps.clock.utcOffsetMinutes(now) ?? 0)

    return formatLine({
      timestamp: formatTimestamp(now, offset),
      threadTag: this.threadTag(),
      level,
      message,
    })
  }
}
