export { MemoryConnection, createMemoryConnectionFactory } from "./adapters/memory/memory-connection"
export {
  MemoryStore,
  type MemoryStoreOptions,
  StoreReplyError,
} from "./adapters/memory/memory-store"
export {
  createRedisConnectionFactory,
  RedisConnection,
  type RedisConnectionFactoryOptions,
} from "./adapters/redis/redis-connection"
export { createRedisCommandClient, type RedisCommandClient } from "./adapters/redis/redis-client"
export { loadServerConfig, type ServerConfig, serverConfigSchema } from "./config"
export {
  parseCommandBody,
  parsePathCommand,
  parsePipelineBody,
  type ParsedCommand,
} from "./core/command-parser"
export {
  createDispatcher,
  type DispatchRequest,
  type DispatchResponse,
  type Dispatcher,
  type DispatcherDeps,
} from "./core/dispatcher"
export { type Credential, TokenStore } from "./core/token-store"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export type { Connection, ConnectionContext, ConnectionFactory } from "./ports/connection"
export { createRestServer, type RestServer, type RestServerDeps, type RestServerOptions } from "./rest-server"
export { backingStoreCheck, registerCommandRoutes } from "./routes/commands"
export {
  type Application,
  type Context,
  createApp,
  createServer,
  type Middleware,
  Server,
} from "./server/server"
export type { ServerDependencies, ServerOptions } from "./server/server-options"
