export { createCollections, createHashMap, createZQueue } from "./adapters/redis/create"
export type {
  CollectionsFactoryOptions,
  HashMapCodecs,
  ZQueueSettings,
} from "./adapters/redis/create"
export {
  createRedisCollectionsClient,
  type RedisCollectionsClient,
  toRedisUrl,
} from "./adapters/redis/redis-client"
export { RedisHashMap, type RedisHashMapDeps, type RedisHashMapOptions } from "./adapters/redis/redis-hash-map"
export { RedisZQueue, type RedisZQueueDeps, type RedisZQueueOptions } from "./adapters/redis/redis-z-queue"
export {
  MemoryCollectionsClient,
  type MemoryCollectionsClientDeps,
} from "./adapters/memory/memory-collections-client"
export { MemoryKeyspace } from "./adapters/memory/memory-keyspace"

export {
  loadRedisConnectionConfig,
  type RedisConnectionConfig,
  type RedisConnectionEnv,
  redisConnectionSchema,
  toRedisConnectionConfig,
} from "./config/redis-connection"

export { decodeWith } from "./core/codec/decode"
export { type JsonCodecOptions, jsonCodec } from "./core/codec/json-codec"
export {
  bigintCodec,
  booleanCodec,
  floatCodec,
  integerCodec,
  stringCodec,
} from "./core/codec/primitive-codecs"
export {
  ConversionError,
  type ConversionErrorOptions,
  MemberNotFoundError,
  RemoteStoreError,
  ValidationError,
} from "./core/errors"
export { members } from "./core/score"

export type { Codec } from "./ports/codec"
export type {
  CollectionCallOptions,
  CollectionTtl,
  CollectionWriteOptions,
} from "./ports/collection-options"
export type {
  CollectionsClient,
  CollectionsMulti,
  ScoredMember,
  ZRangeByScoreOptions,
} from "./ports/collections-client"
export type { ContainerKey, KeyspacePrefix } from "./ports/container-key"
export type { FieldFound, FieldNotFound, FieldResult, HashMap } from "./ports/hash-map"
export type {
  ScoreBound,
  ScoreBoundLiteral,
  ZElement,
  ZEmpty,
  ZPopped,
  ZPopResult,
  ZQueue,
} from "./ports/z-queue"
