import type { Lock, LockKey } from "../ports/lock"
import type { AcquireOptions } from "../ports/options"
import { LockTimeoutError } from "./errors"

/**
 * Waits for the lock, runs `fn` and releases the lease whether `fn`
 * resolved or threw.
 *
 * @throws {LockTimeoutError} when the lock stays held past the timeout.
 */
export async function withLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
  opts: AcquireOptions,
): Promise<T> {
  const lease = await lock.acquire(key, opts)

  if (!lease) throw new LockTimeoutError(key, opts.timeoutMs)

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}
