import { Duration, Timer, Timestamp } from "./time.js"

describe("time utilities", () => {
  it("a timer should track durations", async () => {
    const timer = Timer.startNew()
    expect(timer.running).toBe(true)

    await new Promise((resolve) => setTimeout(resolve, 20))

    const elapsed = timer.stop()
    expect(timer.running).toBe(false)
    expect(elapsed.milliseconds()).toBeGreaterThanOrEqual(15)
    expect(timer.stop()).toBe(Duration.ZERO)
    expect(timer.elapsed()).toBe(Duration.ZERO)
  })

  it("durations should convert between units", () => {
    const duration = Duration.ofMilli(1_500)

    expect(duration.seconds()).toBe(1.5)
    expect(duration.milliseconds()).toBe(1_500)
    expect(duration.microseconds()).toBe(1_500_000)
    expect(Duration.ofSeconds(2).toString()).toBe("2")
    expect(Duration.ofNano(2_500n).microseconds()).toBe(2)
  })

  it("timestamps should never produce negative differences", () => {
    const earlier = new Timestamp(1_000_000n)
    const later = new Timestamp(3_000_000n)

    expect(Timestamp.duration(earlier, later).milliseconds()).toBe(2)
    expect(later.difference(earlier)).toBe(Duration.ZERO)
  })
})
