import type { Milliseconds } from "@keyspace/lock"

/**
 * What a failed store call turns into.
 * - `swallow`: logged, then the operation's soft-failure result.
 * - `propagate`: logged, then rethrown as an `OperationError`.
 */
export type ErrorPolicy = "swallow" | "propagate"

export const errorPolicies = ["swallow", "propagate"] as const satisfies readonly ErrorPolicy[]

export type ClientLockOptions = {
  /** Lease lifetime, so a crashed holder cannot wedge the namespace. */
  ttlMs: Milliseconds
  /** How long `set` and `sadd` wait for the namespace lock. */
  timeoutMs: Milliseconds
  pollMs: Milliseconds
}

export type NamespacedClientOptions = {
  namespace: string
  /** @default "swallow" */
  errorPolicy?: ErrorPolicy
  lock?: Partial<ClientLockOptions>
}

export type SubscribeOptions = {
  /** Ends the subscription. `subscribe()` then resolves. */
  signal?: AbortSignal
}

export type MessageHandler = (payload: string) => void | Promise<void>
