import { toAppError } from "@keyspace/errors"
import { type Lock, type LockConfig, type LockStoreClient, RedisLock, withLock } from "@keyspace/lock"
import type { LogMeta, Logger } from "@keyspace/logger"
import type {
  ClientLockOptions,
  ErrorPolicy,
  MessageHandler,
  NamespacedClientOptions,
  SubscribeOptions,
} from "../ports/client-options"
import type { ConnectionPool } from "../ports/connection-pool"
import type { PubSubMessage } from "../ports/pubsub-message"
import type { StoreConnection } from "../ports/store-connection"
import { DEFAULT_ERROR_POLICY, DEFAULT_LOCK_OPTIONS } from "./defaults"
import { ClientClosedError, ConnectionError, NotInitializedError, OperationError } from "./errors"
import { ChannelSubscription } from "./subscription/channel-subscription"

export type ClientState = "uninitialized" | "initializing" | "ready" | "closed"

export type CreateLock = (client: LockStoreClient, config: LockConfig) => Lock

export type NamespacedClientDeps = {
  pool: ConnectionPool
  logger: Logger
  /** Defaults to a `RedisLock` on the client's own connection. */
  createLock?: CreateLock
}

/** Connection and lock are held together or not at all. */
type Session = {
  connection: StoreConnection
  lock: Lock
}

type Operation = "get" | "set" | "keys" | "sadd" | "publish" | "subscribe"

const createRedisLock: CreateLock = (client, config) => new RedisLock({ client }, config)

/**
 * A handle bound to one namespace. It holds one pooled connection from
 * `init()` until `close()`, and serializes `set` and `sadd` across every
 * process through a store lock at `"<namespace>:lock"`.
 *
 * Construction performs no I/O.
 *
 * @example
 * ```ts
 * const client = await createNamespacedClient(
 *   { pool: manager.getPool(), logger },
 *   { namespace: "orders" },
 * )
 *
 * await client.set("order:1", "pending", 60)
 * await client.get("order:1") // "pending"
 * await client.close()
 * ```
 */
export class NamespacedClient {
  readonly namespace: string
  readonly lockKey: string
  readonly errorPolicy: ErrorPolicy

  private readonly lockOptions: ClientLockOptions
  private readonly logger: Logger

  private state: ClientState = "uninitialized"
  private session: Session | null = null
  private initializing: Promise<this> | null = null

  public constructor(
    private readonly deps: NamespacedClientDeps,
    options: NamespacedClientOptions,
  ) {
    this.namespace = options.namespace
    this.lockKey = `${options.namespace}:lock`
    this.errorPolicy = options.errorPolicy ?? DEFAULT_ERROR_POLICY
    this.lockOptions = {
      ttlMs: options.lock?.ttlMs ?? DEFAULT_LOCK_OPTIONS.ttlMs,
      timeoutMs: options.lock?.timeoutMs ?? DEFAULT_LOCK_OPTIONS.timeoutMs,
      pollMs: options.lock?.pollMs ?? DEFAULT_LOCK_OPTIONS.pollMs,
    }
    this.logger = deps.logger.child({ module: "namespaced-client", namespace: options.namespace })
  }

  get status(): ClientState {
    return this.state
  }

  /**
   * Acquires the client's connection and builds its lock. Concurrent calls
   * share one attempt; calling it on a ready client is a no-op and calling
   * it after `close()` starts over.
   *
   * @throws {ConnectionError} when no connection could be acquired. The
   * client is left uninitialized.
   */
  async init(): Promise<this> {
    if (this.state === "ready") return this

    this.initializing ??= this.connect().finally(() => {
      this.initializing = null
    })

    return this.initializing
  }

  /**
   * Returns the connection to the pool. The pool itself stays open. Closing
   * a client without a connection does nothing.
   */
  async close(): Promise<void> {
    if (this.initializing) {
      await this.initializing.catch((err: unknown) => {
        this.logger.debug("Close waited on a failed init", { err })
      })
    }

    const session = this.session
    if (!session) return

    this.session = null
    this.state = "closed"

    try {
      await this.deps.pool.release(session.connection)
    } catch (err) {
      this.logger.error("Failed to release connection", { err })
    }

    this.logger.info("Client closed")
  }

  /** Runs `fn` with an initialized client and closes it afterwards, also on error. */
  async use<T>(fn: (client: this) => Promise<T>): Promise<T> {
    await this.init()

    try {
      return await fn(this)
    } finally {
      await this.close()
    }
  }

  /** @returns the value, or `null` for a missing key. */
  async get(key: string): Promise<string | null> {
    const { connection } = this.requireSession()

    return this.run<string | null>("get", { key }, null, () => connection.get(key))
  }

  /**
   * Writes `value` under the namespace lock, with an expiry in whole seconds
   * when `ttlSeconds` is given.
   *
   * @throws {OperationError} for a `ttlSeconds` that is not a positive integer,
   * whatever the error policy.
   */
  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const session = this.requireSession()

    if (ttlSeconds !== undefined && (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0)) {
      throw new OperationError(`ttlSeconds must be a positive integer, got: ${ttlSeconds}`, {
        context: { namespace: this.namespace, operation: "set", key, ttlSeconds },
        isOperational: false,
      })
    }

    const opts = ttlSeconds === undefined ? undefined : { EX: ttlSeconds }

    await this.run<void>("set", { key }, undefined, () =>
      this.locked(session, async () => {
        await session.connection.set(key, value, opts)
      }),
    )
  }

  /**
   * Keys matching a store glob pattern, in no particular order. Scans the
   * whole keyspace in one blocking call on the store.
   */
  async keys(pattern: string): Promise<string[]> {
    const { connection } = this.requireSession()

    return this.run<string[]>("keys", { pattern }, [], () => connection.keys(pattern))
  }

  /** @returns how many of `values` were not already members. */
  async sadd(key: string, ...values: string[]): Promise<number> {
    const session = this.requireSession()

    if (values.length === 0) return 0

    return this.run<number>("sadd", { key }, 0, () =>
      this.locked(session, () => session.connection.sAdd(key, values)),
    )
  }

  async publish(channel: string, message: string): Promise<void> {
    const { connection } = this.requireSession()

    await this.run<void>("publish", { channel }, undefined, async () => {
      await connection.publish(channel, message)
    })
  }

  /**
   * Delivers each message published on `channel` to `onMessage`, one at a
   * time and in arrival order, until `signal` aborts or the connection ends.
   *
   * The subscription runs on a second pooled connection, since a connection
   * in subscriber mode cannot run other commands; it is returned to the pool
   * when the loop ends. An error thrown by `onMessage` ends the subscription
   * and is rethrown as is.
   */
  async subscribe(
    channel: string,
    onMessage: MessageHandler,
    opts: SubscribeOptions = {},
  ): Promise<void> {
    this.requireSession()

    const { signal } = opts
    if (signal?.aborted) return

    let connection: StoreConnection

    try {
      connection = await this.deps.pool.acquire()
    } catch (err) {
      return this.fail("subscribe", { channel }, err, undefined)
    }

    const subscription = new ChannelSubscription(connection, channel, signal)

    try {
      try {
        await subscription.open()
      } catch (err) {
        return this.fail("subscribe", { channel }, err, undefined)
      }

      this.logger.info("Subscribed", { operation: "subscribe", channel })

      while (true) {
        let message: PubSubMessage | null

        try {
          message = await subscription.next()
        } catch (err) {
          return this.fail("subscribe", { channel }, err, undefined)
        }

        if (message === null) return
        if (message.kind !== "message") continue

        await onMessage(message.payload)
      }
    } finally {
      await this.teardown(subscription, connection)
    }
  }

  private async teardown(
    subscription: ChannelSubscription,
    connection: StoreConnection,
  ): Promise<void> {
    try {
      await subscription.close()
      await this.deps.pool.release(connection)
    } catch (err) {
      this.logger.warn("Unsubscribe failed; discarding connection", {
        channel: subscription.channel,
        err,
      })
      await this.deps.pool.discard(connection).catch((discardErr: unknown) => {
        this.logger.error("Failed to discard connection", { err: discardErr })
      })
    }

    this.logger.info("Unsubscribed", { operation: "subscribe", channel: subscription.channel })
  }

  private async connect(): Promise<this> {
    this.state = "initializing"

    try {
      const connection = await this.deps.pool.acquire()

      try {
        const lock = (this.deps.createLock ?? createRedisLock)(connection, {
          defaultTimeoutMs: this.lockOptions.timeoutMs,
          pollMs: this.lockOptions.pollMs,
        })

        this.session = { connection, lock }
      } catch (err) {
        await this.deps.pool.release(connection)
        throw err
      }
    } catch (err) {
      this.state = "uninitialized"
      this.logger.error("Client failed to connect", { err })

      if (err instanceof ConnectionError) throw err

      throw new ConnectionError(`Client for namespace "${this.namespace}" failed to connect`, {
        cause: err,
        context: { namespace: this.namespace },
      })
    }

    this.state = "ready"
    this.logger.info("Client connected")

    return this
  }

  private requireSession(): Session {
    if (this.state === "closed") throw new ClientClosedError(this.namespace)
    if (this.state !== "ready" || !this.session) throw new NotInitializedError(this.namespace)

    return this.session
  }

  private locked<T>(session: Session, fn: () => Promise<T>): Promise<T> {
    return withLock(session.lock, this.lockKey, fn, {
      ttl: { milliseconds: this.lockOptions.ttlMs },
      timeoutMs: this.lockOptions.timeoutMs,
    })
  }

  private async run<T>(
    operation: Operation,
    meta: LogMeta,
    fallback: T,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      const result = await fn()
      this.logger.debug(`${operation} succeeded`, { operation, ...meta })

      return result
    } catch (err) {
      return this.fail(operation, meta, err, fallback)
    }
  }

  /** Applies the error policy: log, then the soft result or an `OperationError`. */
  private fail<T>(operation: Operation, meta: LogMeta, err: unknown, fallback: T): T {
    this.logger.error(`${operation} failed`, { operation, ...meta, err })

    if (this.errorPolicy === "swallow") return fallback

    const { message, isRetryable } = toAppError(err)

    throw new OperationError(`${operation} failed in namespace "${this.namespace}": ${message}`, {
      cause: err,
      context: { namespace: this.namespace, operation, ...meta },
      isRetryable,
    })
  }
}

/** Builds a client and runs `init()` on it. */
export async function createNamespacedClient(
  deps: NamespacedClientDeps,
  options: NamespacedClientOptions,
): Promise<NamespacedClient> {
  return await new NamespacedClient(deps, options).init()
}
