import { createHash } from "node:crypto"
import { threadId } from "node:worker_threads"

export const THREAD_TAG_MODULUS = 10_000

/**
 * Folds a process id and worker thread id into `[0, 10000)`.
 *
 * @remarks
 * For telling interleaved lines apart by eye. Tags collide.
 */
export function computeThreadTag(pid: number, tid: number): number {
  const digest = createHash("sha256").update(`${pid}:${tid}`).digest()

  return digest.readUInt32BE(0) % THREAD_TAG_MODULUS
}

let current: number | undefined

/** Tag of the calling thread, computed once per thread. */
export function currentThreadTag(): number {
  if (current === undefined) {
    current = computeThreadTag(process.pid, threadId)
  }
  return current
}
