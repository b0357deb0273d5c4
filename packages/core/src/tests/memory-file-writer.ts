import { WriteError } from "../errors/errors"
import type { FileWriter, RotationState } from "../ports/file-writer"

/**
 * In-memory `FileWriter` whose writes can be paused and made to fail.
 */
export class MemoryFileWriter implements FileWriter {
  readonly rotationState: RotationState = "idle"
  readonly chunks: string[] = []

  /** Writes that have started, finished or not. */
  started = 0
  rotations = 0
  flushes = 0
  isClosed = false

  private gate: Promise<void> | null = null
  private openGate: (() => void) | null = null
  private readonly failing = new Set<string>()

  constructor(readonly activePath = "/memory/app.log") {}

  get size(): number {
    return Buffer.byteLength(this.text)
  }

  get text(): string {
    return this.chunks.join("")
  }

  /** Holds every write until `resume()`. */
  pause(): void {
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve
    })
  }

  resume(): void {
    this.openGate?.()
    this.gate = null
    this.openGate = null
  }

  /** Writes whose text contains `fragment` reject. */
  failOn(fragment: string): void {
    this.failing.add(fragment)
  }

  async write(bytes: Uint8Array): Promise<number> {
    this.started++
    await this.gate

    const text = Buffer.from(bytes).toString("utf8")

    if (this.isClosed) throw new WriteError(this.activePath, "writer is closed")
    for (const fragment of this.failing) {
      if (text.includes(fragment)) throw new WriteError(this.activePath, "injected failure")
    }

    this.chunks.push(text)
    return bytes.byteLength
  }

  async writeAll(bytes: Uint8Array): Promise<void> {
    await this.write(bytes)
  }

  async flush(): Promise<void> {
    this.flushes++
  }

  async rotate(): Promise<boolean> {
    this.rotations++
    return true
  }

  async close(): Promise<void> {
    this.isClosed = true
  }
}
