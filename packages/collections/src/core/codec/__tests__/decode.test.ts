import type { Codec } from "../../../ports/codec"
import { ConversionError } from "../../errors"
import { decodeAll, decodeWith } from "../decode"

describe("decodeWith", () => {
  it("returns the decoded value", () => {
    const upper: Codec<string> = { encode: (v) => v, decode: (raw) => raw.toUpperCase() }

    expect(decodeWith(upper, "abc")).toBe("ABC")
  })

  it("rethrows a ConversionError as is", () => {
    const original = new ConversionError("bad")
    const failing: Codec<string> = {
      encode: (v) => v,
      decode: () => {
        throw original
      },
    }

    expect(() => decodeWith(failing, "x")).toThrow(original)
  })

  it("wraps any other failure, keeping it as cause", () => {
    const cause = new RangeError("out of range")
    const failing: Codec<number> = {
      encode: String,
      decode: () => {
        throw cause
      },
    }

    let caught: unknown
    try {
      decodeWith(failing, "999")
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(ConversionError)
    expect(caught).toMatchObject({ message: 'Cannot decode "999"', context: { raw: "999" }, cause })
  })

  it("decodeAll fails on the first bad entry", () => {
    const digits: Codec<number> = {
      encode: String,
      decode: (raw) => {
        if (!/^\d+$/.test(raw)) throw new ConversionError(`not digits: ${raw}`)
        return Number(raw)
      },
    }

    expect(decodeAll(digits, ["1", "2"])).toStrictEqual([1, 2])
    expect(() => decodeAll(digits, ["1", "x", "y"])).toThrow("not digits: x")
  })
})
