import type { Codec } from "../../ports/codec"
import { ConversionError } from "../errors"

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

const TRUE_LITERALS = new Set(["1", "t", "T", "true", "TRUE", "True"])
const FALSE_LITERALS = new Set(["0", "f", "F", "false", "FALSE", "False"])

function invalid(raw: string, target: string): ConversionError {
  return new ConversionError(`Cannot decode ${JSON.stringify(raw)} as ${target}`, { raw, target })
}

export const stringCodec: Codec<string> = {
  encode: (value) => value,
  decode: (raw) => raw,
}

/**
 * Integers within `Number.MAX_SAFE_INTEGER`. Use {@link bigintCodec} for the
 * full 64-bit range.
 */
export const integerCodec: Codec<number> = {
  encode(value) {
    if (!Number.isSafeInteger(value)) {
      throw new ConversionError(`${value} is not a safe integer`, {
        target: "integer",
        isOperational: false,
      })
    }
    return String(value)
  },

  decode(raw) {
    if (!INTEGER.test(raw)) throw invalid(raw, "integer")

    const value = Number(raw)
    if (!Number.isSafeInteger(value)) throw invalid(raw, "integer")

    return value
  },
}

/**
 * Infinities are written as `inf` and `-inf`, the way the server prints
 * them in float replies.
 */
export const floatCodec: Codec<number> = {
  encode(value) {
    if (value === Infinity) return "inf"
    if (value === -Infinity) return "-inf"
    if (Object.is(value, -0)) return "-0"
    return String(value)
  },

  decode(raw) {
    switch (raw.toLowerCase()) {
      case "inf":
      case "+inf":
      case "infinity":
      case "+infinity":
        return Infinity
      case "-inf":
      case "-infinity":
        return -Infinity
      case "nan":
        return NaN
    }

    if (!DECIMAL.test(raw)) throw invalid(raw, "float")
    return Number(raw)
  },
}

export const bigintCodec: Codec<bigint> = {
  encode: (value) => value.toString(),

  decode(raw) {
    if (!INTEGER.test(raw)) throw invalid(raw, "bigint")

    const value = BigInt(raw)
    if (value < INT64_MIN || value > INT64_MAX) throw invalid(raw, "bigint")

    return value
  },
}

export const booleanCodec: Codec<boolean> = {
  encode: (value) => (value ? "true" : "false"),

  decode(raw) {
    if (TRUE_LITERALS.has(raw)) return true
    if (FALSE_LITERALS.has(raw)) return false
    throw invalid(raw, "boolean")
  },
}
