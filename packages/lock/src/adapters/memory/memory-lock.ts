import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import { MemoryLease } from "./memory-lock-lease"

type Waiter = (lease: MemoryLease) => void

type KeyState = {
  holder: MemoryLease
  queue: Waiter[]
}

/**
 * FIFO lock for a single process. Every key has at most one holder and a
 * queue of waiters; releasing hands the key directly to the head of the
 * queue, so no later `tryAcquire` can jump in between.
 */
export class MemoryLock implements Lock {
  private readonly keys = new Map<LockKey, KeyState>()

  public acquire(key: LockKey): Promise<LockLease> {
    const lease = this.tryAcquire(key)
    if (lease) return Promise.resolve(lease)

    return new Promise<LockLease>((resolve) => {
      this.stateOf(key).queue.push(resolve)
    })
  }

  public tryAcquire(key: LockKey): LockLease | null {
    if (this.keys.has(key)) return null

    const lease = this.createLease(key)
    this.keys.set(key, { holder: lease, queue: [] })

    return lease
  }

  private stateOf(key: LockKey): KeyState {
    const state = this.keys.get(key)
    if (!state) {
      throw new Error(`Lock state missing for held key ${key}`)
    }
    return state
  }

  private createLease(key: LockKey): MemoryLease {
    const lease: MemoryLease = new MemoryLease(key, {
      onRelease: () => this.handOff(key, lease),
    })
    return lease
  }

  private handOff(key: LockKey, released: MemoryLease): void {
    const state = this.keys.get(key)
    if (state?.holder !== released) return

    const next = state.queue.shift()

    if (!next) {
      this.keys.delete(key)
      return
    }

    const lease = this.createLease(key)
    state.holder = lease
    next(lease)
  }
}
