import { createPinoLogger, type Logger } from "@keyspace/logger"
import { ConnectionManager } from "../core/connection-manager"
import { createNamespacedClient, type NamespacedClient } from "../core/namespaced-client"
import type { ConnectionFactory } from "../ports/store-connection"
import type { ClientConfig } from "./config/schema"

export type ClientContextOverrides = {
  logger?: Logger
  createConnection?: ConnectionFactory
}

export type ClientContext = {
  config: ClientConfig
  logger: Logger
  connectionManager: ConnectionManager

  /** An initialized client for `namespace`, closed by `close()`. */
  client(namespace: string): Promise<NamespacedClient>

  /** Closes every client handed out, then the pool. */
  close(): Promise<void>
}

export function createClientContext(
  config: ClientConfig,
  overrides: ClientContextOverrides = {},
): ClientContext {
  const logger =
    overrides.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName },
    )

  const connectionManager = new ConnectionManager(
    {
      logger,
      ...(overrides.createConnection && { createConnection: overrides.createConnection }),
    },
    config.redis,
  )

  const clients = new Set<NamespacedClient>()

  return {
    config,
    logger,
    connectionManager,

    async client(namespace) {
      const client = await createNamespacedClient(
        { pool: connectionManager.getPool(), logger },
        { namespace, errorPolicy: config.client.errorPolicy, lock: config.client.lock },
      )
      clients.add(client)

      return client
    },

    async close() {
      for (const client of clients) await client.close()
      clients.clear()

      await connectionManager.close()
    },
  }
}
