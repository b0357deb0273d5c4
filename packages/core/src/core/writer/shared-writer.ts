import { HandleReleasedError } from "../../errors/errors"
import type { FileWriter } from "../../ports/file-writer"

type RefCell = {
  count: number
  readonly writer: FileWriter
}

/**
 * Reference-counted handle on one `FileWriter`.
 *
 * Every clone counts as an owner and must be released once; the last release
 * closes the writer. Ordering is the writer's business, the handle only
 * forwards.
 *
 * @example
 * ```typescript
 * const handle = SharedWriter.wrap(writer)
 * const forRelay = handle.clone()   // refCount 2
 *
 * await forRelay.release()          // refCount 1
 * await handle.release()            // writer closed
 * ```
 */
export class SharedWriter {
  private released = false

  private constructor(private readonly cell: RefCell) {}

  static wrap(writer: FileWriter): SharedWriter {
    return new SharedWriter({ count: 1, writer })
  }

  get refCount(): number {
    return this.cell.count
  }

  get isReleased(): boolean {
    return this.released
  }

  get activePath(): string {
    return this.cell.writer.activePath
  }

  /** @throws HandleReleasedError when called on a released handle */
  clone(): SharedWriter {
    this.assertLive()
    this.cell.count++

    return new SharedWriter(this.cell)
  }

  async write(bytes: Uint8Array): Promise<number> {
    return this.live().write(bytes)
  }

  async writeAll(bytes: Uint8Array): Promise<void> {
    return this.live().writeAll(bytes)
  }

  async flush(): Promise<void> {
    return this.live().flush()
  }

  async rotate(): Promise<boolean> {
    return this.live().rotate()
  }

  /** Idempotent per handle. */
  async release(): Promise<void> {
    if (this.released) return

    this.released = true
    this.cell.count--

    if (this.cell.count === 0) {
      await this.cell.writer.close()
    }
  }

  private assertLive(): void {
    if (this.released) throw new HandleReleasedError(this.cell.writer.activePath)
  }

  private live(): FileWriter {
    this.assertLive()
    return this.cell.writer
  }
}
