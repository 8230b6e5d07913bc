import type { LockLease } from "./lock-lease"
import type { AcquireOptions, TryAcquireOptions } from "./options"

export type LockKey = string

export interface Lock {
  /**
   * Acquire the lock for `key`, waiting up to `timeoutMs` while it is held
   * elsewhere.
   *
   * @returns The lease, or `null` if the wait timed out.
   */
  acquire(key: LockKey, opts: AcquireOptions): Promise<LockLease | null>

  /**
   * Single acquisition attempt.
   *
   * @returns The lease, or `null` if the lock is held.
   */
  tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null>
}
