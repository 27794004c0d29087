import type { Logger } from "@keyline/logger"
import { decodeAll, decodeWith } from "../../core/codec/decode"
import { RemoteStoreError } from "../../core/errors"
import { assertDelta, assertFinite } from "../../core/score"
import type { Codec } from "../../ports/codec"
import type { CollectionCallOptions, CollectionWriteOptions } from "../../ports/collection-options"
import type { CollectionsClient } from "../../ports/collections-client"
import type { FieldResult, HashMap } from "../../ports/hash-map"
import { RedisCollection, type RedisCollectionOptions, toNumberReply } from "./redis-collection"

export type RedisHashMapDeps<K, V> = {
  client: CollectionsClient
  field: Codec<K>
  value: Codec<V>
  logger?: Logger
}

export type RedisHashMapOptions = RedisCollectionOptions

export class RedisHashMap<K, V> extends RedisCollection implements HashMap<K, V> {
  private readonly fieldCodec: Codec<K>
  private readonly valueCodec: Codec<V>

  constructor(deps: RedisHashMapDeps<K, V>, opts: RedisHashMapOptions) {
    super(deps.client, opts, deps.logger, "hash-map")
    this.fieldCodec = deps.field
    this.valueCodec = deps.value
  }

  async set(field: K, value: V, opts?: Partial<CollectionWriteOptions>): Promise<void> {
    await this.setMany([[field, value]], opts)
  }

  async setMany(
    entries: Iterable<readonly [K, V]>,
    opts?: Partial<CollectionWriteOptions>,
  ): Promise<void> {
    const fields = new Map<string, string>()
    for (const [field, value] of entries) {
      fields.set(this.fieldCodec.encode(field), this.valueCodec.encode(value))
    }
    if (fields.size === 0) return

    await this.write("hSet", opts, (multi) => multi.hSet(this.key, fields))
  }

  async get(field: K, opts?: Partial<CollectionCallOptions>): Promise<FieldResult<V>> {
    const encoded = this.fieldCodec.encode(field)
    const raw = await this.call("hGet", opts, (c) => c.hGet(this.key, encoded))
    if (raw === null) return { kind: "not_found" }

    return { kind: "found", value: decodeWith(this.valueCodec, raw) }
  }

  async getMany(fields: readonly K[], opts?: Partial<CollectionCallOptions>): Promise<Map<K, V>> {
    if (fields.length === 0) return new Map()

    const encoded = fields.map((field) => this.fieldCodec.encode(field))
    const raws = await this.call("hmGet", opts, (c) => c.hmGet(this.key, encoded))

    const out = new Map<K, V>()
    for (const [i, field] of fields.entries()) {
      const raw = raws[i]
      if (raw === null || raw === undefined) continue
      out.set(field, decodeWith(this.valueCodec, raw))
    }
    return out
  }

  async getAll(opts?: Partial<CollectionCallOptions>): Promise<Map<K, V>> {
    const raw = await this.call("hGetAll", opts, (c) => c.hGetAll(this.key))

    const out = new Map<K, V>()
    for (const [field, value] of Object.entries(raw)) {
      out.set(decodeWith(this.fieldCodec, field), decodeWith(this.valueCodec, value))
    }
    return out
  }

  async delete(field: K, opts?: Partial<CollectionCallOptions>): Promise<void> {
    await this.deleteMany([field], opts)
  }

  async deleteMany(fields: readonly K[], opts?: Partial<CollectionCallOptions>): Promise<void> {
    if (fields.length === 0) return

    const encoded = fields.map((field) => this.fieldCodec.encode(field))
    await this.call("hDel", opts, (c) => c.hDel(this.key, encoded))
  }

  async exists(field: K, opts?: Partial<CollectionCallOptions>): Promise<boolean> {
    const encoded = this.fieldCodec.encode(field)
    const reply = await this.call("hExists", opts, (c) => c.hExists(this.key, encoded))
    return reply === 1
  }

  async length(opts?: Partial<CollectionCallOptions>): Promise<number> {
    return this.call("hLen", opts, (c) => c.hLen(this.key))
  }

  async keys(opts?: Partial<CollectionCallOptions>): Promise<K[]> {
    const raws = await this.call("hKeys", opts, (c) => c.hKeys(this.key))
    return decodeAll(this.fieldCodec, raws)
  }

  async values(opts?: Partial<CollectionCallOptions>): Promise<V[]> {
    const raws = await this.call("hVals", opts, (c) => c.hVals(this.key))
    return decodeAll(this.valueCodec, raws)
  }

  async incr(field: K, delta: number, opts?: Partial<CollectionWriteOptions>): Promise<number> {
    assertDelta(delta)

    const encoded = this.fieldCodec.encode(field)
    const [reply] = await this.write("hIncrBy", opts, (multi) =>
      multi.hIncrBy(this.key, encoded, delta),
    )
    return this.numberReply("hIncrBy", reply)
  }

  async incrFloat(field: K, delta: number, opts?: Partial<CollectionWriteOptions>): Promise<number> {
    assertFinite(delta)

    const encoded = this.fieldCodec.encode(field)
    const [reply] = await this.write("hIncrByFloat", opts, (multi) =>
      multi.hIncrByFloat(this.key, encoded, delta),
    )
    return this.numberReply("hIncrByFloat", reply)
  }

  private numberReply(command: string, reply: unknown): number {
    const value = toNumberReply(reply)
    if (value === undefined) {
      throw new RemoteStoreError(command, this.key, `unexpected reply ${JSON.stringify(reply)}`)
    }
    return value
  }
}
