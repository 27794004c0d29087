import type { Logger } from "@keyline/logger"
import type { Codec } from "../../ports/codec"
import type { CollectionsClient } from "../../ports/collections-client"
import type { ContainerKey, KeyspacePrefix } from "../../ports/container-key"
import type { HashMap } from "../../ports/hash-map"
import type { ZQueue } from "../../ports/z-queue"
import { RedisHashMap } from "./redis-hash-map"
import { RedisZQueue } from "./redis-z-queue"

export type CollectionsFactoryOptions = {
  client: CollectionsClient
  keyspacePrefix?: KeyspacePrefix
  logger?: Logger
}

export type HashMapCodecs<K, V> = { field: Codec<K>; value: Codec<V> }

export type ZQueueSettings<T> = { member: Codec<T>; desc?: boolean }

/**
 * Binds one client, prefix and logger, and hands out adapters per key.
 *
 * @example
 * ```ts
 * const client = createRedisCollectionsClient(await loadRedisConnectionConfig())
 * await client.connect()
 *
 * const collections = createCollections({ client, keyspacePrefix: "app:" })
 * const scores = collections.zQueue("leaderboard", { member: stringCodec, desc: true })
 * ```
 */
export function createCollections(options: CollectionsFactoryOptions): {
  hashMap<K, V>(key: ContainerKey, codecs: HashMapCodecs<K, V>): HashMap<K, V>
  zQueue<T>(key: ContainerKey, settings: ZQueueSettings<T>): ZQueue<T>
} {
  const { client, keyspacePrefix, logger } = options

  return {
    hashMap: (key, codecs) =>
      new RedisHashMap({ client, logger, ...codecs }, { key, keyspacePrefix }),
    zQueue: (key, settings) =>
      new RedisZQueue(
        { client, logger, member: settings.member },
        { key, keyspacePrefix, desc: settings.desc },
      ),
  }
}

export function createHashMap<K, V>(
  options: CollectionsFactoryOptions & HashMapCodecs<K, V> & { key: ContainerKey },
): HashMap<K, V> {
  return createCollections(options).hashMap(options.key, options)
}

export function createZQueue<T>(
  options: CollectionsFactoryOptions & ZQueueSettings<T> & { key: ContainerKey },
): ZQueue<T> {
  return createCollections(options).zQueue(options.key, options)
}
