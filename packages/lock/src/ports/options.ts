import type { Milliseconds } from "./time"

export type MillisecondsTtl = { milliseconds: Milliseconds }
export type LockTtl = MillisecondsTtl

export type AcquireOptions = {
  /** How long the lease is valid before the store expires it. */
  ttl: LockTtl

  /** Max time to wait for acquisition. Falls back to `LockConfig.defaultTimeoutMs` if omitted. */
  timeoutMs?: Milliseconds
}

export type TryAcquireOptions = {
  ttl: LockTtl
}

export type LockConfig = {
  /** Used by `acquire()` when `timeoutMs` is omitted. */
  defaultTimeoutMs: Milliseconds

  /** Interval between acquisition attempts while waiting. */
  pollMs: Milliseconds
}
