import { ConversionError } from "../../errors"
import {
  bigintCodec,
  booleanCodec,
  floatCodec,
  integerCodec,
  stringCodec,
} from "../primitive-codecs"

describe("primitive codecs", () => {
  describe("stringCodec", () => {
    it("passes strings through, including the empty string", () => {
      expect(stringCodec.encode("")).toBe("")
      expect(stringCodec.decode("héllo wörld")).toBe("héllo wörld")
    })
  })

  describe("integerCodec", () => {
    it.each([0, -7, 42, Number.MAX_SAFE_INTEGER, Number.MIN_SAFE_INTEGER])("round-trips %d", (n) => {
      expect(integerCodec.decode(integerCodec.encode(n))).toBe(n)
    })

    it("accepts an explicit plus sign", () => {
      expect(integerCodec.decode("+15")).toBe(15)
    })

    it.each(["", "1.5", "1e3", " 1", "abc", "9007199254740993"])("rejects %j", (raw) => {
      expect(() => integerCodec.decode(raw)).toThrow(ConversionError)
    })

    it("refuses to encode a fraction", () => {
      expect(() => integerCodec.encode(0.5)).toThrow("0.5 is not a safe integer")
    })
  })

  describe("floatCodec", () => {
    it("round-trips finite values", () => {
      expect(floatCodec.decode(floatCodec.encode(3.14))).toBe(3.14)
      expect(floatCodec.decode(floatCodec.encode(-0.001))).toBe(-0.001)
    })

    it("keeps the sign of negative zero", () => {
      expect(floatCodec.encode(-0)).toBe("-0")
      expect(Object.is(floatCodec.decode(floatCodec.encode(-0)), -0)).toBe(true)
    })

    it("writes infinities the way the server prints them", () => {
      expect(floatCodec.encode(Infinity)).toBe("inf")
      expect(floatCodec.encode(-Infinity)).toBe("-inf")
    })

    it.each([
      ["inf", Infinity],
      ["+inf", Infinity],
      ["-inf", -Infinity],
      ["Infinity", Infinity],
      ["1e3", 1000],
      [".5", 0.5],
      ["10", 10],
    ])("decodes %j", (raw, expected) => {
      expect(floatCodec.decode(raw)).toBe(expected)
    })

    it("decodes nan", () => {
      expect(floatCodec.decode("nan")).toBeNaN()
    })

    it.each(["", "0x10", "1,5", "one"])("rejects %j", (raw) => {
      expect(() => floatCodec.decode(raw)).toThrow(ConversionError)
    })
  })

  describe("bigintCodec", () => {
    it("round-trips the int64 extremes", () => {
      const max = 9223372036854775807n
      const min = -9223372036854775808n

      expect(bigintCodec.decode(bigintCodec.encode(max))).toBe(max)
      expect(bigintCodec.decode(bigintCodec.encode(min))).toBe(min)
    })

    it("rejects values outside int64", () => {
      expect(() => bigintCodec.decode("9223372036854775808")).toThrow(ConversionError)
    })
  })

  describe("booleanCodec", () => {
    it("encodes as true/false", () => {
      expect(booleanCodec.encode(true)).toBe("true")
      expect(booleanCodec.encode(false)).toBe("false")
    })

    it.each(["1", "t", "T", "true", "TRUE", "True"])("decodes %j as true", (raw) => {
      expect(booleanCodec.decode(raw)).toBe(true)
    })

    it.each(["0", "f", "F", "false", "FALSE", "False"])("decodes %j as false", (raw) => {
      expect(booleanCodec.decode(raw)).toBe(false)
    })

    it("reports the raw value and target on failure", () => {
      let caught: unknown
      try {
        booleanCodec.decode("yes")
      } catch (err) {
        caught = err
      }

      expect(caught).toMatchObject({
        code: "conversion_failed",
        message: 'Cannot decode "yes" as boolean',
        context: { raw: "yes", target: "boolean" },
      })
    })
  })
})
