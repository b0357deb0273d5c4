import { describeLockContract } from "../../../ports/__tests__/lock.contract"
import { MemoryLock } from "../memory-lock"

describeLockContract({
  name: "MemoryLock",
  make: () => new MemoryLock(),
})
