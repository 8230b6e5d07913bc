import type { Milliseconds } from "@keyspace/lock"
import type { StoreConnection } from "./store-connection"

export type ConnectionPoolOptions = {
  host: string
  port: number
  db: number
  maxConnections: number

  /** How long `acquire()` waits for a free connection once the pool is full. */
  timeoutMs: Milliseconds

  username?: string
  password?: string
}

export type ConnectionPoolStats = {
  total: number
  idle: number
  inUse: number
  waiting: number
}

export interface ConnectionPool {
  /**
   * Hands out an idle connection, opens a new one while below
   * `maxConnections`, or waits for a release.
   *
   * @throws {ConnectionError} when the pool is closed, the store is
   * unreachable or no connection frees up within `timeoutMs`.
   */
  acquire(): Promise<StoreConnection>

  /** Returns a connection. Connections that are no longer open are dropped. */
  release(connection: StoreConnection): Promise<void>

  /** Quits `connection` and forgets it, e.g. when it is stuck in subscriber mode. */
  discard(connection: StoreConnection): Promise<void>

  /** Quits every connection, idle or in use, and rejects pending waiters. */
  disconnect(): Promise<void>

  readonly closed: boolean

  stats(): ConnectionPoolStats
}
