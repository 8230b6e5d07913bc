export type { LockStoreClient } from "./adapters/redis/redis-client"
export {
  type KeyspacePrefix,
  RedisLock,
  type RedisLockConfig,
  type RedisLockDeps,
} from "./adapters/redis/redis-lock"
export { RedisLease, RELEASE_SCRIPT } from "./adapters/redis/redis-lock-lease"
export { LockTimeoutError } from "./core/errors"
export { type PollUntilResult, pollUntil } from "./core/polling/poll-until"
export { type Sleep, sleep } from "./core/polling/sleep"
export { type Clock, SystemClock } from "./core/time/clock"
export { withLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
export type { AcquireOptions, LockConfig, LockTtl, TryAcquireOptions } from "./ports/options"
export type { Milliseconds } from "./ports/time"
