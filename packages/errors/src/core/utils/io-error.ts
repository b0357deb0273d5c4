import type { IoErrorDetails } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key]
  return typeof v === "string" ? v : undefined
}

/**
 * Type guard for errors raised by `node:fs` and friends.
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && isRecord(err) && typeof err.code === "string"
}

/**
 * Extract errno code, syscall and paths from a filesystem error.
 *
 * @returns `undefined` when `err` has no errno code.
 */
export function ioErrorDetails(err: unknown): IoErrorDetails | undefined {
  if (!(err instanceof Error) || !isRecord(err)) return undefined

  const errno = stringField(err, "code")
  if (!errno) return undefined

  const syscall = stringField(err, "syscall")
  const path = stringField(err, "path")
  const dest = stringField(err, "dest")

  return {
    errno,
    ...(syscall && { syscall }),
    ...(path && { path }),
    ...(dest && { dest }),
  }
}

/** `true` when `err` is a filesystem error with the given errno code. */
export function hasErrno(err: unknown, errno: string): boolean {
  return isErrnoException(err) && err.code === errno
}
