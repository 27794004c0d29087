import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    it("now() returns a Date", () => {
      const clock = h.make()

      expect(clock.now()).toBeInstanceOf(Date)
    })

    it("nowMs() returns a finite number", () => {
      const clock = h.make()

      expect(Number.isFinite(clock.nowMs())).toBe(true)
    })

    it("now() and nowMs() agree", () => {
      const clock = h.make()
      const date = clock.now()
      const ms = clock.nowMs()

      expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
    })
  })
}
