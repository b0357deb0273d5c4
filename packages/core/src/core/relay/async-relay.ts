import type { Logger } from "@rotolog/logger"
import { RelayClosedError, RelayFullError } from "../../errors/errors"
import type { OverflowPolicy } from "../../ports/logger-config"
import type { SharedWriter } from "../writer/shared-writer"

export type AsyncRelayOptions = {
  /** @default 10_000 */
  capacity?: number

  /** @default "block" */
  overflowPolicy?: OverflowPolicy
}

export type AsyncRelayDeps = {
  logger: Logger
}

export const DEFAULT_RELAY_CAPACITY = 10_000

/**
 * Bounded FIFO of rendered lines drained by a single consumer.
 *
 * The relay owns `handle` and releases it on shutdown. Lines are written in
 * enqueue order; a failed write is reported and the consumer moves on.
 */
export class AsyncRelay {
  readonly capacity: number
  readonly overflowPolicy: OverflowPolicy

  private readonly queue: Uint8Array[] = []
  private readonly spaceWaiters: (() => void)[] = []
  private readonly drainWaiters: { upTo: number; resolve: () => void }[] = []
  private readonly logger: Logger
  private readonly consumer: Promise<void>

  private wake: (() => void) | null = null
  // Lines accepted by enqueue, and lines written, failed or dropped since.
  private accepted = 0
  private settled = 0
  private closed = false
  private droppedCount = 0
  private stopping: Promise<void> | undefined

  constructor(
    private readonly handle: SharedWriter,
    opts: AsyncRelayOptions,
    deps: AsyncRelayDeps,
  ) {
    this.capacity = opts.capacity ?? DEFAULT_RELAY_CAPACITY
    this.overflowPolicy = opts.overflowPolicy ?? "block"
    this.logger = deps.logger.child({ file: handle.activePath, component: "async-relay" })
    this.consumer = this.consume()
  }

  /** Lines waiting to be written. */
  get pending(): number {
    return this.queue.length
  }

  /** Lines discarded by the `drop-oldest` policy. */
  get dropped(): number {
    return this.droppedCount
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * @throws RelayClosedError after `shutdown()`, including for a call that was
   * blocked waiting for space when shutdown began
   * @throws RelayFullError when full under the `error` policy
   */
  async enqueue(line: Uint8Array): Promise<void> {
    if (this.closed) throw new RelayClosedError()

    while (this.queue.length >= this.capacity) {
      switch (this.overflowPolicy) {
        case "error":
          throw new RelayFullError(this.capacity)

        case "drop-oldest":
          this.queue.shift()
          this.droppedCount++
          this.settle()
          this.logger.warn("queue full, dropped oldest line", { dropped: this.droppedCount })
          break

        case "block":
          await new Promise<void>((resolve) => this.spaceWaiters.push(resolve))
          if (this.closed) throw new RelayClosedError()
          break
      }
    }

    this.queue.push(line)
    this.accepted++
    this.signal()
  }

  /**
   * Resolves once every line accepted before the call has been written (or
   * has failed or been dropped). Lines enqueued later are not waited for.
   */
  drain(): Promise<void> {
    const upTo = this.accepted
    if (this.settled >= upTo) return Promise.resolve()

    return new Promise<void>((resolve) => this.drainWaiters.push({ upTo, resolve }))
  }

  /**
   * Stops accepting lines, writes everything already queued, then releases
   * the handle. Every call returns the same promise.
   */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.stop()
    }

    return this.stopping
  }

  private async stop(): Promise<void> {
    this.closed = true
    this.signal()

    await this.consumer

    for (const resolve of this.spaceWaiters.splice(0)) resolve()

    await this.handle.release()
  }

  private settle(): void {
    this.settled++

    // Waiters are pushed in non-decreasing `upTo` order.
    let ready = 0
    while (ready < this.drainWaiters.length && this.drainWaiters[ready].upTo <= this.settled) {
      ready++
    }

    for (const waiter of this.drainWaiters.splice(0, ready)) waiter.resolve()
  }

  private signal(): void {
    const wake = this.wake
    this.wake = null
    wake?.()
  }

  private async consume(): Promise<void> {
    for (;;) {
      const line = this.queue.shift()

      if (line === undefined) {
        if (this.closed) return

        await new Promise<void>((resolve) => {
          this.wake = resolve
        })
        continue
      }

      this.spaceWaiters.shift()?.()

      try {
        await this.handle.writeAll(line)
      } catch (err) {
        this.logger.error("queued line could not be written", { err })
      } finally {
        this.settle()
      }
    }
  }
}
