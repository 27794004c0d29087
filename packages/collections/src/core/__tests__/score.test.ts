import { ValidationError } from "../errors"
import {
  assertPagination,
  assertScore,
  formatBound,
  formatBoundLiteral,
  members,
} from "../score"

describe("score helpers", () => {
  describe("formatBound", () => {
    it.each([
      [-Infinity, "-inf"],
      [Infinity, "+inf"],
      [0, "0"],
      [-42, "-42"],
      [2.5, "2.5"],
    ])("formats %d as %s", (bound, expected) => {
      expect(formatBound(bound)).toBe(expected)
    })

    it("rejects NaN", () => {
      expect(() => formatBound(Number.NaN)).toThrow(ValidationError)
    })
  })

  it("formatBoundLiteral passes store syntax through", () => {
    expect(formatBoundLiteral("(5")).toBe("(5")
    expect(formatBoundLiteral("-inf")).toBe("-inf")
    expect(formatBoundLiteral(Infinity)).toBe("+inf")
  })

  it("assertScore accepts only safe integers", () => {
    expect(() => assertScore(Number.MAX_SAFE_INTEGER)).not.toThrow()
    expect(() => assertScore(-3)).not.toThrow()
    expect(() => assertScore(1.5)).toThrow("Score must be a safe integer, got 1.5")
    expect(() => assertScore(Infinity)).toThrow(ValidationError)
  })

  it("assertPagination allows count -1 and rejects the rest", () => {
    expect(() => assertPagination(0, -1)).not.toThrow()
    expect(() => assertPagination(3, 0)).not.toThrow()
    expect(() => assertPagination(-1, 1)).toThrow("Offset must be a non-negative integer, got -1")
    expect(() => assertPagination(0, -5)).toThrow("Count must be -1 or a non-negative integer, got -5")
  })

  it("members projects elements in order", () => {
    expect(
      members([
        { member: "x", score: 2 },
        { member: "y", score: 1 },
      ]),
    ).toStrictEqual(["x", "y"])
  })
})
