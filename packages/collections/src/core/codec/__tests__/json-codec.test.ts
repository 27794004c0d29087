import { z } from "zod"
import { ConversionError } from "../../errors"
import { jsonCodec } from "../json-codec"

type Session = {
  userId: string
  roles: Set<string>
  expiresAt: Date
}

describe("jsonCodec", () => {
  it("preserves Date, Set, Map and bigint through a round trip", () => {
    const codec = jsonCodec<{ at: Date; tags: Set<string>; counts: Map<string, number>; big: bigint }>()
    const value = {
      at: new Date("2024-01-15T10:30:00.000Z"),
      tags: new Set(["a", "b"]),
      counts: new Map([["x", 1]]),
      big: 12345678901234567890n,
    }

    expect(codec.decode(codec.encode(value))).toStrictEqual(value)
  })

  it("round-trips plain arrays and nulls", () => {
    const codec = jsonCodec<(number | null)[]>()

    expect(codec.decode(codec.encode([1, null, 3]))).toStrictEqual([1, null, 3])
  })

  it("rejects text that is not JSON", () => {
    expect(() => jsonCodec().decode("{not json")).toThrow(ConversionError)
  })

  it("rejects JSON that was not written by the codec", () => {
    expect(() => jsonCodec().decode('{"userId":"u1"}')).toThrow(ConversionError)
  })

  describe("with a schema", () => {
    const sessionSchema = z.object({
      userId: z.string().min(1),
      roles: z.set(z.string()),
      expiresAt: z.date(),
    })

    const codec = jsonCodec<Session>({ schema: sessionSchema })

    it("returns values that satisfy the schema", () => {
      const session: Session = {
        userId: "u1",
        roles: new Set(["admin"]),
        expiresAt: new Date("2024-02-01T00:00:00.000Z"),
      }

      expect(codec.decode(codec.encode(session))).toStrictEqual(session)
    })

    it("rejects values that fail validation", () => {
      const raw = jsonCodec<unknown>().encode({ userId: "", roles: new Set(), expiresAt: new Date(0) })

      const run = () => codec.decode(raw)

      expect(run).toThrow(ConversionError)
      expect(run).toThrow(/^Decoded json failed validation/)
    })
  })
})
