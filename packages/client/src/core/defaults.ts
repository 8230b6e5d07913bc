import type { ConnectionPoolOptions } from "../ports/connection-pool"
import type { ClientLockOptions, ErrorPolicy } from "../ports/client-options"

export const DEFAULT_POOL_OPTIONS = {
  host: "localhost",
  port: 6379,
  db: 0,
  maxConnections: 10,
  timeoutMs: 20_000,
} as const satisfies ConnectionPoolOptions

export const DEFAULT_LOCK_OPTIONS = {
  ttlMs: 10_000,
  timeoutMs: 10_000,
  pollMs: 100,
} as const satisfies ClientLockOptions

export const DEFAULT_ERROR_POLICY: ErrorPolicy = "swallow"
