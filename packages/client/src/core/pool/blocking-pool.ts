import type { Logger } from "@keyspace/logger"
import type {
  ConnectionPool,
  ConnectionPoolOptions,
  ConnectionPoolStats,
} from "../../ports/connection-pool"
import type { ConnectionFactory, StoreConnection } from "../../ports/store-connection"
import { ConnectionError } from "../errors"

export type BlockingConnectionPoolDeps = {
  createConnection: ConnectionFactory
  logger: Logger
}

type Waiter = {
  resolve: (connection: StoreConnection) => void
  reject: (err: unknown) => void
  timer: NodeJS.Timeout
}

/**
 * Opens connections lazily up to `maxConnections`. Once every connection is
 * in use, `acquire()` queues until one is released or `timeoutMs` passes.
 */
export class BlockingConnectionPool implements ConnectionPool {
  private readonly connections = new Set<StoreConnection>()
  private readonly idle: StoreConnection[] = []
  private readonly waiters: Waiter[] = []
  private opening = 0
  private isClosed = false

  private readonly logger: Logger

  public constructor(
    private readonly deps: BlockingConnectionPoolDeps,
    private readonly opts: Pick<ConnectionPoolOptions, "maxConnections" | "timeoutMs">,
  ) {
    if (!Number.isInteger(opts.maxConnections) || opts.maxConnections < 1) {
      throw new RangeError(
        `maxConnections must be a positive integer, got: ${opts.maxConnections}`,
      )
    }

    this.logger = deps.logger.child({ module: "connection-pool" })
  }

  get closed(): boolean {
    return this.isClosed
  }

  async acquire(): Promise<StoreConnection> {
    if (this.isClosed) throw new ConnectionError("Connection pool is closed")

    while (this.idle.length > 0) {
      const connection = this.idle.pop()

      if (connection?.isOpen) return connection
      if (connection) this.connections.delete(connection)
    }

    if (this.connections.size + this.opening < this.opts.maxConnections) {
      return await this.open()
    }

    return await this.wait()
  }

  async release(connection: StoreConnection): Promise<void> {
    if (!this.connections.has(connection) || this.isClosed) return

    if (!connection.isOpen) {
      this.connections.delete(connection)
      this.replenish()
      return
    }

    const waiter = this.waiters.shift()

    if (waiter) {
      clearTimeout(waiter.timer)
      waiter.resolve(connection)
      return
    }

    this.idle.push(connection)
  }

  async discard(connection: StoreConnection): Promise<void> {
    if (!this.connections.delete(connection)) return

    const at = this.idle.indexOf(connection)
    if (at !== -1) this.idle.splice(at, 1)

    try {
      if (connection.isOpen) await connection.quit()
    } finally {
      this.replenish()
    }
  }

  async disconnect(): Promise<void> {
    if (this.isClosed) return

    this.isClosed = true

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer)
      waiter.reject(new ConnectionError("Connection pool was closed while waiting"))
    }

    const connections = [...this.connections]
    this.connections.clear()
    this.idle.length = 0

    const results = await Promise.allSettled(
      connections.filter((c) => c.isOpen).map((c) => c.quit()),
    )
    const failures = results.filter((r): r is PromiseRejectedResult => r.status === "rejected")

    this.logger.debug("Pool disconnected", { connections: connections.length })

    if (failures.length > 0) {
      throw new ConnectionError(`Failed to quit ${failures.length} connection(s)`, {
        cause: failures[0]?.reason,
        context: { failed: failures.length },
      })
    }
  }

  stats(): ConnectionPoolStats {
    return {
      total: this.connections.size,
      idle: this.idle.length,
      inUse: this.connections.size - this.idle.length,
      waiting: this.waiters.length,
    }
  }

  private async open(): Promise<StoreConnection> {
    this.opening++

    const connection = this.deps.createConnection()

    try {
      await this.connectWithin(connection, this.opts.timeoutMs)
    } catch (err) {
      if (connection.isOpen) connection.destroy()

      throw new ConnectionError("Failed to connect to the store", { cause: err })
    } finally {
      this.opening--
    }

    if (this.isClosed) {
      await connection.quit()
      throw new ConnectionError("Connection pool is closed")
    }

    this.connections.add(connection)
    this.logger.debug("Opened connection", { total: this.connections.size })

    return connection
  }

  private async connectWithin(connection: StoreConnection, timeoutMs: number): Promise<void> {
    let timer: NodeJS.Timeout | undefined

    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Connect did not complete within ${timeoutMs}ms`)),
        timeoutMs,
      )
    })

    try {
      await Promise.race([connection.connect(), timedOut])
    } finally {
      clearTimeout(timer)
    }
  }

  private wait(): Promise<StoreConnection> {
    return new Promise<StoreConnection>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const at = this.waiters.indexOf(waiter)
          if (at !== -1) this.waiters.splice(at, 1)

          reject(
            new ConnectionError(
              `Timed out after ${this.opts.timeoutMs}ms waiting for a free connection`,
              { context: { maxConnections: this.opts.maxConnections } },
            ),
          )
        }, this.opts.timeoutMs),
      }

      this.waiters.push(waiter)
    })
  }

  /** A slot freed up without a connection to hand over: open one for the next waiter. */
  private replenish(): void {
    const waiter = this.waiters.shift()
    if (!waiter) return

    clearTimeout(waiter.timer)
    this.open().then(waiter.resolve, waiter.reject)
  }
}
