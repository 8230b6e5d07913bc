import { type LogLevelName, logLevelNames } from "@keyspace/logger"
import { z } from "zod"
import type { ConnectionPoolOptions } from "../../ports/connection-pool"
import { type ClientLockOptions, type ErrorPolicy, errorPolicies } from "../../ports/client-options"

const port = z.coerce.number().int().min(1).max(65_535)
const ms = z.coerce.number().int().positive()

export const envSchema = z.object({
  REDIS_HOST: z.string().min(1).default("localhost"),
  REDIS_PORT: port.default(6379),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  REDIS_POOL_TIMEOUT_MS: ms.default(20_000),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  SERVICE_NAME: z.string().min(1).default("keyspace"),

  ERROR_POLICY: z.enum(errorPolicies).default("swallow"),
  LOCK_TTL_MS: ms.default(10_000),
  LOCK_TIMEOUT_MS: z.coerce.number().int().min(0).default(10_000),
  LOCK_POLL_MS: ms.default(100),
})

export type EnvConfig = z.infer<typeof envSchema>

export type ClientConfig = {
  redis: ConnectionPoolOptions

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  client: {
    errorPolicy: ErrorPolicy
    lock: ClientLockOptions
  }
}
