import fs, { type FileHandle } from "node:fs/promises"
import path from "node:path"
import { hasErrno } from "@rotolog/errors"
import { MemoryLock, tryWithLock, withLock } from "@rotolog/lock"
import type { Logger } from "@rotolog/logger"
import { FileOpenError, RotationError, WriteError } from "../../errors/errors"
import type { FileWriter, RotationState } from "../../ports/file-writer"

export type RollingFileWriterOptions = {
  /**
   * Path without extension. The active file is `${basePath}.log`, backups
   * are `${basePath}.1.log` up to `${basePath}.${maxFiles - 1}.log`.
   */
  basePath: string

  maxSizeBytes: number

  /** Files kept, the active one included. At least 1. */
  maxFiles: number

  /** @default false */
  instantFlush?: boolean
}

export type RollingFileWriterDeps = {
  /** Receives rotation failures. */
  logger: Logger
}

const WRITE_KEY = "write"
const ROTATE_KEY = "rotate"

/**
 * Numeric index of a backup named `${stem}.${n}.log`, or `null` for any other
 * file name.
 */
export function backupIndex(stem: string, fileName: string): number | null {
  const prefix = `${stem}.`
  const suffix = ".log"

  if (!fileName.startsWith(prefix) || !fileName.endsWith(suffix)) return null

  const digits = fileName.slice(prefix.length, fileName.length - suffix.length)
  if (!/^\d+$/.test(digits)) return null

  return Number(digits)
}

async function renameIfExists(from: string, to: string): Promise<boolean> {
  try {
    await fs.rename(from, to)
    return true
  } catch (err) {
    if (hasErrno(err, "ENOENT")) return false
    throw err
  }
}

export class RollingFileWriter implements FileWriter {
  readonly activePath: string

  private readonly lock = new MemoryLock()
  private readonly logger: Logger
  private state: RotationState = "idle"
  private closed = false

  private constructor(
    private readonly opts: RollingFileWriterOptions,
    deps: RollingFileWriterDeps,
    private handle: FileHandle | null,
    private currentSize: number,
  ) {
    this.activePath = `${opts.basePath}.log`
    this.logger = deps.logger.child({ file: this.activePath, component: "rolling-file-writer" })
  }

  /**
   * Opens (or creates) the active file and continues counting from its
   * current length.
   *
   * @throws FileOpenError
   */
  static async open(
    opts: RollingFileWriterOptions,
    deps: RollingFileWriterDeps,
  ): Promise<RollingFileWriter> {
    const activePath = `${opts.basePath}.log`

    let handle: FileHandle | undefined
    try {
      handle = await fs.open(activePath, "a")
      const { size } = await handle.stat()

      return new RollingFileWriter(opts, deps, handle, size)
    } catch (err) {
      await handle?.close()
      throw new FileOpenError(activePath, { cause: err })
    }
  }

  get size(): number {
    return this.currentSize
  }

  get rotationState(): RotationState {
    return this.state
  }

  get isClosed(): boolean {
    return this.closed
  }

  backupPath(index: number): string {
    return `${this.opts.basePath}.${index}.log`
  }

  async write(bytes: Uint8Array): Promise<number> {
    return withLock(this.lock, WRITE_KEY, async () => {
      await this.rotateIfOverflowing(bytes.byteLength)

      const written = await this.writeOnce(bytes)
      if (this.opts.instantFlush) await this.sync()

      return written
    })
  }

  async writeAll(bytes: Uint8Array): Promise<void> {
    await withLock(this.lock, WRITE_KEY, async () => {
      await this.rotateIfOverflowing(bytes.byteLength)

      let offset = 0
      while (offset < bytes.byteLength) {
        const written = await this.writeOnce(bytes.subarray(offset))
        if (written === 0) {
          throw new WriteError(this.activePath, "the OS accepted no bytes")
        }
        offset += written
      }

      if (this.opts.instantFlush) await this.sync()
    })
  }

  async flush(): Promise<void> {
    await withLock(this.lock, WRITE_KEY, () => this.sync())
  }

  async rotate(): Promise<boolean> {
    const rotated = await tryWithLock(this.lock, ROTATE_KEY, () =>
      withLock(this.lock, WRITE_KEY, () => this.rotateHoldingLocks()),
    )

    return rotated ?? false
  }

  async close(): Promise<void> {
    await withLock(this.lock, WRITE_KEY, async () => {
      if (this.closed) return
      this.closed = true

      const handle = this.handle
      this.handle = null
      if (!handle) return

      try {
        await handle.sync()
      } finally {
        await handle.close()
      }
    })
  }

  private activeHandle(): FileHandle {
    if (this.closed) throw new WriteError(this.activePath, "writer is closed")
    if (!this.handle) throw new WriteError(this.activePath, "no active file")

    return this.handle
  }

  private async writeOnce(bytes: Uint8Array): Promise<number> {
    const handle = this.activeHandle()

    try {
      const { bytesWritten } = await handle.write(bytes)
      this.currentSize += bytesWritten

      return bytesWritten
    } catch (err) {
      throw new WriteError(this.activePath, "write failed", { cause: err })
    }
  }

  private async sync(): Promise<void> {
    const handle = this.activeHandle()

    try {
      await handle.sync()
    } catch (err) {
      throw new WriteError(this.activePath, "sync failed", { cause: err })
    }
  }

  // Caller holds WRITE_KEY. A rotation already running elsewhere means this
  // write goes to the current file.
  private async rotateIfOverflowing(incoming: number): Promise<void> {
    if (this.closed || this.currentSize + incoming <= this.opts.maxSizeBytes) return

    await tryWithLock(this.lock, ROTATE_KEY, () => this.rotateHoldingLocks())
  }

  private async rotateHoldingLocks(): Promise<boolean> {
    if (this.closed) return false

    this.state = "rotating"
    let ok = true

    try {
      await this.releaseActive()
      await this.shiftBackups()
      this.handle = await fs.open(this.activePath, "a")
      await this.pruneBeyondWindow()
    } catch (err) {
      ok = false
      this.report(err, "rotate")
    }

    try {
      await this.resync()
    } catch (err) {
      ok = false
      this.report(err, "reopen")
    }

    this.state = "idle"
    if (ok) this.logger.debug("rotated", { operation: "rotate" })

    return ok
  }

  private async releaseActive(): Promise<void> {
    const handle = this.handle
    if (!handle) return

    this.handle = null
    try {
      await handle.sync()
    } finally {
      await handle.close()
    }
  }

  private async shiftBackups(): Promise<void> {
    for (let i = this.opts.maxFiles - 1; i >= 1; i--) {
      await renameIfExists(this.backupPath(i), this.backupPath(i + 1))
    }

    await fs.rename(this.activePath, this.backupPath(1))
  }

  private async pruneBeyondWindow(): Promise<void> {
    const dir = path.dirname(this.opts.basePath)
    const stem = path.basename(this.opts.basePath)

    for (const name of await fs.readdir(dir)) {
      const index = backupIndex(stem, name)

      if (index !== null && index >= this.opts.maxFiles) {
        await fs.rm(path.join(dir, name), { force: true })
      }
    }
  }

  // Size comes from the file itself so a half-done rotation cannot leave a
  // stale count behind.
  private async resync(): Promise<void> {
    if (!this.handle) {
      this.handle = await fs.open(this.activePath, "a")
    }

    const { size } = await this.handle.stat()
    this.currentSize = size
  }

  private report(err: unknown, step: string): void {
    this.logger.error("rotation failed", {
      operation: "rotate",
      err: new RotationError(this.activePath, { cause: err, context: { step } }),
    })
  }
}
