import { DotenvSource, EnvSource, type IConfig, loadConfig } from "@kvrest/config"
import { logLevelNames } from "@kvrest/logger"
import { z } from "zod"

export const ENV_PREFIX = "KVREST_"

export const MEMORY_BACKEND = "memory"

export const serverConfigSchema = z.object({
  API_TOKEN: z.string().min(1),

  /** `memory` for the in-process store, otherwise a Redis URL. */
  REDIS_URL: z.union([z.literal(MEMORY_BACKEND), z.string().regex(/^rediss?:\/\/.+/)]),

  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),

  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
})

export type ServerConfig = z.infer<typeof serverConfigSchema>

export type LoadServerConfigOptions = {
  env?: Record<string, string | undefined>

  /** Directory holding the optional `.env` file. */
  cwd?: string
}

/**
 * `.env` first, then the process environment; both read `KVREST_`-prefixed keys.
 */
export function loadServerConfig(
  options: LoadServerConfigOptions = {},
): Promise<IConfig<ServerConfig>> {
  return loadConfig({
    schema: serverConfigSchema,
    sources: [
      new DotenvSource({
        file: ".env",
        required: false,
        prefix: ENV_PREFIX,
        ...(options.cwd !== undefined && { cwd: options.cwd }),
      }),
      new EnvSource({
        prefix: ENV_PREFIX,
        ...(options.env !== undefined && { env: options.env }),
      }),
    ],
  })
}
