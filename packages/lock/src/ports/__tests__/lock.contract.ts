import type { Lock, LockKey } from "../lock"

export type LockHarness = {
  name: string
  make: () => Lock
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve))

function isFree(lock: Lock, key: LockKey): boolean {
  const lease = lock.tryAcquire(key)
  lease?.release()
  return lease !== null
}

export function describeLockContract(h: LockHarness) {
  describe(`${h.name} (Lock contract)`, () => {
    describe("tryAcquire", () => {
      it("returns a lease and excludes concurrent holders", () => {
        const lock = h.make()
        const key: LockKey = "contract:mutex"

        const a = lock.tryAcquire(key)
        expect(a?.key).toBe(key)
        expect(lock.tryAcquire(key)).toBeNull()

        a?.release()

        const c = lock.tryAcquire(key)
        expect(c).not.toBeNull()
        c?.release()
      })

      it("release is idempotent", () => {
        const lock = h.make()

        const lease = lock.tryAcquire("contract:idempotent")
        lease?.release()
        lease?.release()

        expect(isFree(lock, "contract:idempotent")).toBe(true)
      })

      it("keys are independent", () => {
        const lock = h.make()

        const a = lock.tryAcquire("key:a")
        const b = lock.tryAcquire("key:b")

        expect(a).not.toBeNull()
        expect(b).not.toBeNull()

        a?.release()
        b?.release()
      })

      it("fails while callers are queued, even between hand-offs", async () => {
        const lock = h.make()
        const key = "contract:queued"

        const held = lock.tryAcquire(key)
        const next = lock.acquire(key)

        held?.release()

        expect(lock.tryAcquire(key)).toBeNull()

        const lease = await next
        lease.release()

        expect(isFree(lock, key)).toBe(true)
      })
    })

    describe("acquire", () => {
      it("resolves immediately when free", async () => {
        const lock = h.make()

        const lease = await lock.acquire("contract:free")

        expect(isFree(lock, "contract:free")).toBe(false)
        lease.release()
      })

      it("waits until the holder releases", async () => {
        const lock = h.make()
        const key = "contract:wait"

        const held = await lock.acquire(key)
        let granted = false

        const pending = lock.acquire(key).then((lease) => {
          granted = true
          return lease
        })

        await tick()
        expect(granted).toBe(false)

        held.release()

        const lease = await pending
        expect(granted).toBe(true)
        lease.release()
      })

      it("grants waiters in FIFO order", async () => {
        const lock = h.make()
        const key = "contract:fifo"
        const order: number[] = []

        const first = await lock.acquire(key)

        const waiters = [1, 2, 3].map((n) =>
          lock.acquire(key).then((lease) => {
            order.push(n)
            lease.release()
          }),
        )

        first.release()
        await Promise.all(waiters)

        expect(order).toEqual([1, 2, 3])
        expect(isFree(lock, key)).toBe(true)
      })
    })
  })
}
