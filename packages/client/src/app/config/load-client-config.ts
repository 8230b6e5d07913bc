import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@keyspace/config"
import { type ClientConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): ClientConfig {
  return {
    redis: {
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      db: env.REDIS_DB,
      maxConnections: env.REDIS_MAX_CONNECTIONS,
      timeoutMs: env.REDIS_POOL_TIMEOUT_MS,
      ...(env.REDIS_USERNAME !== undefined && { username: env.REDIS_USERNAME }),
      ...(env.REDIS_PASSWORD !== undefined && { password: env.REDIS_PASSWORD }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    client: {
      errorPolicy: env.ERROR_POLICY,
      lock: {
        ttlMs: env.LOCK_TTL_MS,
        timeoutMs: env.LOCK_TIMEOUT_MS,
        pollMs: env.LOCK_POLL_MS,
      },
    },
  }
}

export type LoadClientConfigOptions = {
  /** Replaces the default `.env` + process environment sources. */
  sources?: ConfigSource[]
  env?: NodeJS.ProcessEnv
  cwd?: string
}

/**
 * Reads an optional `.env` file, then the environment; later sources win.
 *
 * @throws {ConfigError} when a value fails validation.
 */
export async function loadClientConfig(options: LoadClientConfigOptions = {}): Promise<ClientConfig> {
  const sources = options.sources ?? [
    new DotenvSource({ file: ".env", required: false, cwd: options.cwd ?? process.cwd() }),
    new EnvSource({ env: options.env ?? process.env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
