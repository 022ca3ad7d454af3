import { errorMessage } from "@kvrest/errors"
import { createPinoLogger } from "@kvrest/logger"
import { createMemoryConnectionFactory } from "../adapters/memory/memory-connection"
import { createRedisConnectionFactory } from "../adapters/redis/redis-connection"
import { loadServerConfig, MEMORY_BACKEND } from "../config"
import { createRestServer } from "../rest-server"

async function main(): Promise<void> {
  const config = await loadServerConfig()
  const { value } = config

  const logger = createPinoLogger({}, { level: value.LOG_LEVEL, prettify: value.LOG_PRETTY })

  for (const key of config.unknownKeys()) {
    logger.warn("Unknown configuration key", { key })
  }

  const getConnection =
    value.REDIS_URL === MEMORY_BACKEND
      ? createMemoryConnectionFactory()
      : createRedisConnectionFactory({ url: value.REDIS_URL, logger })

  logger.info("Configuration loaded", {
    backend: value.REDIS_URL === MEMORY_BACKEND ? MEMORY_BACKEND : "redis",
    sources: config.sourcesUsed(),
  })

  const { server } = createRestServer(
    { logger, getConnection },
    {
      apiToken: value.API_TOKEN,
      host: value.HOST,
      port: value.PORT,
      shutdownTimeoutMs: value.SHUTDOWN_TIMEOUT_MS,
    },
  )

  await server.setupProcessHandlers().start()
}

main().catch((err: unknown) => {
  process.stderr.write(`kvrest: ${errorMessage(err)}\n`)
  process.exitCode = 1
})
