import type { CollectionCallOptions, CollectionWriteOptions } from "./collection-options"

export type FieldFound<V> = {
  readonly kind: "found"
  readonly value: V
}

export type FieldNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a single field lookup.
 *
 * @remarks
 * A missing field is a normal outcome for a map lookup, not an error.
 */
export type FieldResult<V> = FieldFound<V> | FieldNotFound

/**
 * Typed access to one remote hash.
 *
 * @remarks
 * - Field names and values go through codecs; the adapter never caches.
 * - Writes that take a `ttl` refresh the hash's expiry in the same atomic
 *   batch, so the value and the expiry become visible together or not at all.
 * - Calls that decode several entries fail as a whole if any entry fails.
 */
export interface HashMap<K, V> {
  /** Full container key, including any keyspace prefix. */
  readonly key: string

  set(field: K, value: V, opts?: Partial<CollectionWriteOptions>): Promise<void>

  /**
   * Write several fields in one batch. Empty input resolves immediately.
   */
  setMany(
    entries: Iterable<readonly [K, V]>,
    opts?: Partial<CollectionWriteOptions>,
  ): Promise<void>

  get(field: K, opts?: Partial<CollectionCallOptions>): Promise<FieldResult<V>>

  /**
   * Fields that exist, keyed by the requested field. Absent fields are
   * omitted rather than reported as `not_found`.
   */
  getMany(fields: readonly K[], opts?: Partial<CollectionCallOptions>): Promise<Map<K, V>>

  getAll(opts?: Partial<CollectionCallOptions>): Promise<Map<K, V>>

  /** Removing an absent field is a no-op. */
  delete(field: K, opts?: Partial<CollectionCallOptions>): Promise<void>

  deleteMany(fields: readonly K[], opts?: Partial<CollectionCallOptions>): Promise<void>

  exists(field: K, opts?: Partial<CollectionCallOptions>): Promise<boolean>

  /** Number of fields in the hash. */
  length(opts?: Partial<CollectionCallOptions>): Promise<number>

  keys(opts?: Partial<CollectionCallOptions>): Promise<K[]>

  values(opts?: Partial<CollectionCallOptions>): Promise<V[]>

  /**
   * Atomically add `delta` to an integer field (absent fields start at 0).
   *
   * @returns The value after the increment.
   */
  incr(field: K, delta: number, opts?: Partial<CollectionWriteOptions>): Promise<number>

  /**
   * Float variant of {@link HashMap.incr}.
   */
  incrFloat(field: K, delta: number, opts?: Partial<CollectionWriteOptions>): Promise<number>
}
