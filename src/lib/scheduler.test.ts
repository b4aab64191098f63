import { beforeEach, describe, expect, it, vi } from "vitest"

const { schedule, stop } = vi.hoisted(() => ({ schedule: vi.fn(), stop: vi.fn() }))

vi.mock("node-cron", () => ({
  default: {
    schedule,
    validate: (expression: string) => expression.split(" ").length === 6,
  },
}))

import { AutoRefresh, toCronExpression } from "./scheduler"

describe("toCronExpression", () => {
  it("uses seconds under a minute and whole minutes above", () => {
    expect(toCronExpression(30)).toBe("*/30 * * * * *")
    expect(toCronExpression(60)).toBe("0 */1 * * * *")
    expect(toCronExpression(300)).toBe("0 */5 * * * *")
    expect(toCronExpression(0)).toBeNull()
    expect(toCronExpression(-5)).toBeNull()
  })
})

describe("AutoRefresh", () => {
  beforeEach(() => {
    schedule.mockReset()
    stop.mockReset()
    schedule.mockReturnValue({ stop })
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "error").mockImplementation(() => {})
  })

  it("schedules the callback and stops it", () => {
    const refresh = new AutoRefresh("landing page", async () => {}, "UTC")

    expect(refresh.start(30)).toBe(true)
    expect(schedule).toHaveBeenCalledWith("*/30 * * * * *", expect.any(Function), { timezone: "UTC" })
    expect(refresh.schedule).toBe("*/30 * * * * *")

    refresh.stop()
    expect(stop).toHaveBeenCalledTimes(1)
    expect(refresh.isScheduled).toBe(false)
  })

  it("treats an interval of 0 as off", () => {
    const refresh = new AutoRefresh("landing page", async () => {})
    expect(refresh.start(0)).toBe(false)
    expect(schedule).not.toHaveBeenCalled()
  })

  it("replaces the previous schedule on restart", () => {
    const refresh = new AutoRefresh("landing page", async () => {})
    refresh.start(30)
    refresh.start(120)

    expect(stop).toHaveBeenCalledTimes(1)
    expect(refresh.schedule).toBe("0 */2 * * * *")
  })

  it("skips a tick while the previous one is running", async () => {
    let release: () => void = () => {}
    const callback = vi.fn(() => new Promise<void>(resolve => { release = resolve }))
    const refresh = new AutoRefresh("landing page", callback)

    const first = refresh.tick()
    expect(refresh.isRefreshing).toBe(true)
    await expect(refresh.tick()).resolves.toBe(false)

    release()
    await expect(first).resolves.toBe(true)
    expect(callback).toHaveBeenCalledTimes(1)
    expect(refresh.isRefreshing).toBe(false)
  })

  it("runs the scheduled callback through the overlap guard", async () => {
    const callback = vi.fn(async () => {})
    new AutoRefresh("landing page", callback).start(10)

    const onTick: unknown = schedule.mock.calls[0][1]
    if (typeof onTick !== "function") throw new Error("no tick scheduled")
    await onTick()

    expect(callback).toHaveBeenCalledTimes(1)
  })

  it("logs a failing refresh and keeps going", async () => {
    const refresh = new AutoRefresh("landing page", async () => {
      throw new Error("boom")
    })

    await expect(refresh.tick()).resolves.toBe(true)
    expect(console.error).toHaveBeenCalledWith("[Scheduler] Refresh of landing page failed:", new Error("boom"))
    await expect(refresh.tick()).resolves.toBe(true)
  })
})
