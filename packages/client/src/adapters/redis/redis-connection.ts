import type { Logger } from "@keyspace/logger"
import { createClient } from "redis"
import type { ConnectionPoolOptions } from "../../ports/connection-pool"
import type { StoreConnection } from "../../ports/store-connection"

export type RedisConnectionOptions = Pick<
  ConnectionPoolOptions,
  "host" | "port" | "db" | "username" | "password"
>

/** Upper bound on the delay between reconnect attempts. */
export const MAX_RECONNECT_DELAY_MS = 2_000

/**
 * Builds an unconnected node-redis client. Socket errors are logged here,
 * since a client without an `error` listener would crash the process.
 *
 * The first `connect()` fails on the first socket error instead of retrying,
 * so an unreachable store surfaces as a rejected `connect()`. Once the client
 * has been ready, dropped connections are retried with a capped linear delay.
 */
export function createRedisConnection(
  options: RedisConnectionOptions,
  logger: Logger,
): StoreConnection {
  let wasReady = false

  const client = createClient({
    socket: {
      host: options.host,
      port: options.port,
      reconnectStrategy: (retries: number, cause: Error) =>
        wasReady ? Math.min((retries + 1) * 100, MAX_RECONNECT_DELAY_MS) : cause,
    },
    database: options.db,
    ...(options.username !== undefined && { username: options.username }),
    ...(options.password !== undefined && { password: options.password }),
  })

  client.on("ready", () => {
    wasReady = true
  })

  client.on("error", (err: unknown) => {
    logger.error("Store connection error", { err, host: options.host, port: options.port })
  })

  return client as unknown as StoreConnection
}
