import { z } from "zod"
import { createPinoLogger, type PinoLoggerDeps } from "../adapters/pino/pino-logger"
import type { LogContextPatch } from "../ports/log-context"
import { logLevelNames } from "../ports/log-level"
import type { Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"

export const loggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  SERVICE_NAME: z.string().optional(),
})

export type LoggerEnv = z.infer<typeof loggerEnvSchema>

export function toLoggerOptions(env: LoggerEnv): LoggerOptions {
  return { level: env.LOG_LEVEL, prettify: env.LOG_PRETTY }
}

/**
 * Builds the process logger from validated environment values.
 *
 * @example
 * ```ts
 * const env = (await loadConfig({ schema: loggerEnvSchema })).value
 * const logger = createLogger(env)
 * ```
 */
export function createLogger(env: LoggerEnv, deps: PinoLoggerDeps = {}): Logger {
  const context: LogContextPatch = env.SERVICE_NAME ? { service: env.SERVICE_NAME } : {}

  return createPinoLogger(deps, toLoggerOptions(env), context)
}
