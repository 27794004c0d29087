/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and the string form a Redis hash field, hash value or sorted-set member
 * is stored as.
 *
 * @remarks
 * - `encode` must be deterministic and round-trippable: for every supported
 *   value, `decode(encode(value))` equals `value`.
 * - `decode` throws a `ConversionError` when the string cannot be parsed
 *   into `T`. It is never called for an absent value; adapters report
 *   absence through their result types, so a missing field can always be
 *   told apart from a stored `0`, `""` or `false`.
 *
 * @example
 * ```ts
 * const userIdCodec: Codec<UserId> = {
 *   encode: (id) => id.value,
 *   decode: (raw) => UserId.parse(raw),
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): string

  decode(raw: string): T
}
