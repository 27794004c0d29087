import { type ConfigSource, loadConfig } from "@keyline/config"
import { z } from "zod"

export const redisConnectionSchema = z.object({
  REDIS_ADDR: z.string().min(1).default("localhost:6379"),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_ENABLE_TLS: z.stringbool().default(false),
  REDIS_IS_CLUSTER: z.stringbool().default(false),
  REDIS_MASTER_ONLY: z.stringbool().default(false),
  REDIS_KEY_PREFIX: z.string().default(""),
})

export type RedisConnectionEnv = z.infer<typeof redisConnectionSchema>

export type RedisConnectionConfig = {
  /** `host:port`; for a cluster, any one seed node. */
  addr: string
  db: number
  username?: string
  password?: string
  enableTls: boolean
  isCluster: boolean

  /**
   * Cluster only: route reads to primaries. When false, reads may be served
   * by replicas.
   */
  masterOnly: boolean

  /** Suggested `keyspacePrefix` for the adapters built on this connection. */
  keyPrefix: string
}

export function toRedisConnectionConfig(env: RedisConnectionEnv): RedisConnectionConfig {
  return {
    addr: env.REDIS_ADDR,
    db: env.REDIS_DB,
    ...(env.REDIS_USERNAME && { username: env.REDIS_USERNAME }),
    ...(env.REDIS_PASSWORD && { password: env.REDIS_PASSWORD }),
    enableTls: env.REDIS_ENABLE_TLS,
    isCluster: env.REDIS_IS_CLUSTER,
    masterOnly: env.REDIS_MASTER_ONLY,
    keyPrefix: env.REDIS_KEY_PREFIX,
  }
}

/**
 * Reads `REDIS_*` settings from `sources` (the process environment by
 * default).
 *
 * @throws ConfigValidationError when a value does not parse.
 */
export async function loadRedisConnectionConfig(
  sources?: readonly ConfigSource[],
): Promise<RedisConnectionConfig> {
  const config = await loadConfig({ schema: redisConnectionSchema, ...(sources && { sources }) })

  return toRedisConnectionConfig(config.value)
}
