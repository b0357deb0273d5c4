import type { LockLease } from "./lock-lease"

export type LockKey = string

/**
 * In-process mutual exclusion keyed by name.
 *
 * Waiters on the same key are granted the lock in the order they called
 * `acquire`, so a lock is also an ordering point: whatever the holders do
 * happens in acquisition order.
 */
export interface Lock {
  /**
   * Acquire `key`, waiting behind earlier callers if it is held.
   * There is no timeout; the promise resolves once every earlier holder has
   * released.
   */
  acquire(key: LockKey): Promise<LockLease>

  /**
   * Acquire `key` only if nobody holds it or waits for it.
   *
   * @returns The lease, or `null` if the key is busy.
   */
  tryAcquire(key: LockKey): LockLease | null
}
