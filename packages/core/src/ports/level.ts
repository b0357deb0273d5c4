export const levels = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"] as const

/**
 * Tag printed in every line. Levels do not filter; `FATAL` also ends the
 * process after the line is written.
 */
export type Level = (typeof levels)[number]
