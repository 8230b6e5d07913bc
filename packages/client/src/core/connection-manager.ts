import { createPinoLogger, type Logger } from "@keyspace/logger"
import { createRedisConnection } from "../adapters/redis/redis-connection"
import type { ConnectionPool, ConnectionPoolOptions } from "../ports/connection-pool"
import type { ConnectionFactory } from "../ports/store-connection"
import { DEFAULT_POOL_OPTIONS } from "./defaults"
import { BlockingConnectionPool } from "./pool/blocking-pool"

export type ConnectionManagerDeps = {
  logger: Logger
  /** Defaults to a node-redis client per connection. */
  createConnection?: ConnectionFactory
}

export type ConnectionManagerOptions = Partial<ConnectionPoolOptions>

/**
 * Owns one connection pool. Use `ConnectionManager.shared()` for the
 * process-wide instance or construct one and pass it around.
 */
export class ConnectionManager {
  private static sharedInstance: ConnectionManager | null = null

  readonly options: Readonly<ConnectionPoolOptions>

  private readonly pool: ConnectionPool
  private readonly logger: Logger
  private closing: Promise<void> | null = null

  public constructor(deps: ConnectionManagerDeps, options: ConnectionManagerOptions = {}) {
    this.options = Object.freeze(resolvePoolOptions(options))
    this.logger = deps.logger.child({ module: "connection-manager" })

    const createConnection =
      deps.createConnection ?? (() => createRedisConnection(this.options, this.logger))

    this.pool = new BlockingConnectionPool({ createConnection, logger: deps.logger }, this.options)
  }

  /**
   * Returns the process-wide manager, creating it on the first call. Options
   * and deps passed to later calls are ignored with a warning naming the
   * fields that differ. The instance lives for the rest of the process, also
   * after `close()`.
   */
  static shared(
    options: ConnectionManagerOptions = {},
    deps?: Partial<ConnectionManagerDeps>,
  ): ConnectionManager {
    const existing = ConnectionManager.sharedInstance

    if (existing) {
      const ignored = existing.differingOptions(options)

      if (ignored.length > 0) {
        existing.logger.warn("Shared connection manager already exists; options ignored", {
          ignored,
        })
      }

      return existing
    }

    const created = new ConnectionManager(
      {
        logger: deps?.logger ?? createPinoLogger(),
        ...(deps?.createConnection && { createConnection: deps.createConnection }),
      },
      options,
    )
    ConnectionManager.sharedInstance = created

    return created
  }

  getPool(): ConnectionPool {
    return this.pool
  }

  get closed(): boolean {
    return this.pool.closed
  }

  /** Disconnects every pooled connection. Later calls are no-ops. */
  async close(): Promise<void> {
    this.closing ??= this.disconnect()

    return this.closing
  }

  private async disconnect(): Promise<void> {
    try {
      await this.pool.disconnect()
      this.logger.info("Connection pool closed", {
        host: this.options.host,
        port: this.options.port,
        db: this.options.db,
      })
    } catch (err) {
      this.logger.error("Failed to close connection pool", { err })
    }
  }

  private differingOptions(options: ConnectionManagerOptions): string[] {
    return poolOptionKeys.filter(
      (key) => options[key] !== undefined && options[key] !== this.options[key],
    )
  }
}

const poolOptionKeys = [
  "host",
  "port",
  "db",
  "maxConnections",
  "timeoutMs",
  "username",
  "password",
] as const satisfies readonly (keyof ConnectionPoolOptions)[]

function resolvePoolOptions(options: ConnectionManagerOptions): ConnectionPoolOptions {
  return {
    host: options.host ?? DEFAULT_POOL_OPTIONS.host,
    port: options.port ?? DEFAULT_POOL_OPTIONS.port,
    db: options.db ?? DEFAULT_POOL_OPTIONS.db,
    maxConnections: options.maxConnections ?? DEFAULT_POOL_OPTIONS.maxConnections,
    timeoutMs: options.timeoutMs ?? DEFAULT_POOL_OPTIONS.timeoutMs,
    ...(options.username !== undefined && { username: options.username }),
    ...(options.password !== undefined && { password: options.password }),
  }
}
