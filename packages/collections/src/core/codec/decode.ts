import type { Codec } from "../../ports/codec"
import { ConversionError } from "../errors"

/**
 * Runs `codec.decode`, turning any foreign failure into a `ConversionError`.
 */
export function decodeWith<T>(codec: Codec<T>, raw: string): T {
  try {
    return codec.decode(raw)
  } catch (err) {
    if (err instanceof ConversionError) throw err

    throw new ConversionError(`Cannot decode ${JSON.stringify(raw)}`, { raw, cause: err })
  }
}

export function decodeAll<T>(codec: Codec<T>, raws: readonly string[]): T[] {
  return raws.map((raw) => decodeWith(codec, raw))
}
