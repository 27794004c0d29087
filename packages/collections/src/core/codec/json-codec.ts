import superjson from "superjson"
import { type ZodType, z } from "zod"
import type { Codec } from "../../ports/codec"
import { ConversionError } from "../errors"

export type JsonCodecOptions<T> = {
  /**
   * Validates decoded values. Without a schema the decoded value is trusted
   * to be a `T`.
   */
  schema?: ZodType<T>
}

/**
 * Composite values as superjson text, so `Date`, `Map`, `Set` and `bigint`
 * survive a round trip.
 *
 * @example
 * ```ts
 * const sessionCodec = jsonCodec({ schema: sessionSchema })
 * const sessions = createHashMap(client, { key: "sessions", field: stringCodec, value: sessionCodec })
 * ```
 */
export function jsonCodec<T>(options: JsonCodecOptions<T> = {}): Codec<T> {
  return {
    encode: (value) => superjson.stringify(value),

    decode(raw) {
      let decoded: T
      try {
        if (!isSuperjsonPayload(JSON.parse(raw))) {
          throw new SyntaxError("Missing superjson envelope")
        }
        decoded = superjson.parse<T>(raw)
      } catch (err) {
        throw new ConversionError(`Cannot decode ${JSON.stringify(raw)} as json`, {
          raw,
          target: "json",
          cause: err,
        })
      }

      if (!options.schema) return decoded

      const result = options.schema.safeParse(decoded)
      if (!result.success) {
        throw new ConversionError(`Decoded json failed validation:\n${z.prettifyError(result.error)}`, {
          raw,
          target: "json",
          cause: result.error,
        })
      }
      return result.data
    },
  }
}

function isSuperjsonPayload(value: unknown): boolean {
  return typeof value === "object" && value !== null && !Array.isArray(value) && "json" in value
}
