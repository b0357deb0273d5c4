import type { Lock, LockKey } from "../ports/lock"

/**
 * Run `fn` while holding `key`, or skip it if `key` is busy.
 *
 * @returns `fn`'s result, or `null` when the lock was not free.
 */
export async function tryWithLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
): Promise<T | null> {
  const lease = lock.tryAcquire(key)

  if (!lease) {
    return null
  }

  try {
    return await fn()
  } finally {
    lease.release()
  }
}

/**
 * Run `fn` while holding `key`, waiting for earlier holders first.
 */
export async function withLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
): Promise<T> {
  const lease = await lock.acquire(key)

  try {
    return await fn()
  } finally {
    lease.release()
  }
}
