export { MemoryLease } from "./adapters/memory/memory-lock-lease"
export { MemoryLock } from "./adapters/memory/memory-lock"
export { tryWithLock, withLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
