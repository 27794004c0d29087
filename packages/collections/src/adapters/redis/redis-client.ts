import { createClient, createCluster } from "redis"
import type { RedisConnectionConfig } from "../../config/redis-connection"
import type { CollectionsClient } from "../../ports/collections-client"

/**
 * A collections client that also owns its connection.
 */
export type RedisCollectionsClient = CollectionsClient & {
  connect(): Promise<unknown>
  close(): Promise<void>
  readonly isOpen: boolean
}

export function toRedisUrl(connection: Pick<RedisConnectionConfig, "addr" | "enableTls">): string {
  return `${connection.enableTls ? "rediss" : "redis"}://${connection.addr}`
}

/**
 * Builds a node-redis client, or a cluster client when `isCluster` is set.
 *
 * @remarks
 * The caller owns `connect()` and `close()`. `db` is ignored for clusters,
 * which only have database 0.
 */
export function createRedisCollectionsClient(
  connection: RedisConnectionConfig,
): RedisCollectionsClient {
  const url = toRedisUrl(connection)
  const credentials = {
    ...(connection.username && { username: connection.username }),
    ...(connection.password && { password: connection.password }),
  }

  if (connection.isCluster) {
    return createCluster({
      rootNodes: [{ url }],
      defaults: credentials,
      useReplicas: !connection.masterOnly,
    }) as unknown as RedisCollectionsClient
  }

  return createClient({
    url,
    database: connection.db,
    ...credentials,
  }) as unknown as RedisCollectionsClient
}
