import type { LockKey } from "./lock"

export interface LockLease {
  /** The key this lease holds. */
  readonly key: LockKey

  /**
   * Hand the lock to the next waiter, if any. Idempotent.
   */
  release(): void
}
