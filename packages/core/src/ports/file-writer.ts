export type RotationState = "idle" | "rotating"

/**
 * A size-bounded append-only log file.
 *
 * @remarks
 * Every operation is serialized by the writer; lines reach the file in the
 * order their calls obtained the writer's lock.
 */
export interface FileWriter {
  /** Path of the active file. */
  readonly activePath: string

  /** Bytes in the active file. */
  readonly size: number

  readonly rotationState: RotationState

  readonly isClosed: boolean

  /**
   * Rotates first when `bytes` would overflow the active file, then issues
   * one write.
   *
   * @returns Bytes the OS accepted, which may be fewer than `bytes.length`.
   */
  write(bytes: Uint8Array): Promise<number>

  /** Like `write`, but repeats until every byte is written. */
  writeAll(bytes: Uint8Array): Promise<void>

  /** Syncs the active file to storage. */
  flush(): Promise<void>

  /**
   * Rotates now.
   *
   * @returns `false` when another rotation was already running, the writer is
   * closed, or the rotation failed.
   */
  rotate(): Promise<boolean>

  /** Syncs and closes. Idempotent. */
  close(): Promise<void>
}
