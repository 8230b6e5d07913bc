import type { LockKey } from "./lock"

export interface LockLease {
  readonly key: LockKey

  /** Release the lock if this lease still owns it. Safe to call more than once. */
  release(): Promise<void>
}
