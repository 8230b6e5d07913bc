export {
  type LoadClientConfigOptions,
  loadClientConfig,
  mapEnvToConfig,
} from "./app/config/load-client-config"
export { type ClientConfig, type EnvConfig, envSchema } from "./app/config/schema"
export {
  type ClientContext,
  type ClientContextOverrides,
  createClientContext,
} from "./app/create-context"
export { createRedisConnection, type RedisConnectionOptions } from "./adapters/redis/redis-connection"
export {
  ConnectionManager,
  type ConnectionManagerDeps,
  type ConnectionManagerOptions,
} from "./core/connection-manager"
export { DEFAULT_ERROR_POLICY, DEFAULT_LOCK_OPTIONS, DEFAULT_POOL_OPTIONS } from "./core/defaults"
export {
  ClientClosedError,
  ConnectionError,
  NotInitializedError,
  OperationError,
} from "./core/errors"
export {
  type ClientState,
  type CreateLock,
  createNamespacedClient,
  NamespacedClient,
  type NamespacedClientDeps,
} from "./core/namespaced-client"
export { BlockingConnectionPool, type BlockingConnectionPoolDeps } from "./core/pool/blocking-pool"
export { ChannelSubscription } from "./core/subscription/channel-subscription"
export {
  type ClientLockOptions,
  type ErrorPolicy,
  errorPolicies,
  type MessageHandler,
  type NamespacedClientOptions,
  type SubscribeOptions,
} from "./ports/client-options"
export type {
  ConnectionPool,
  ConnectionPoolOptions,
  ConnectionPoolStats,
} from "./ports/connection-pool"
export type { ChannelMessage, PubSubMessage, SubscribeConfirmation } from "./ports/pubsub-message"
export type {
  ChannelListener,
  ConnectionFactory,
  StoreConnection,
  StoreSetOptions,
} from "./ports/store-connection"
