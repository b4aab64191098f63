import path from "path"
import { describe, expect, it, vi } from "vitest"
import { DEFAULT_THRESHOLDS, loadConfig } from "./config"

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({})

    expect(config.dataDir).toBe(path.resolve("./data"))
    expect(config.defaultHoursBack).toBe(24)
    expect(config.autoRefreshSeconds).toBe(60)
    expect(config.locale).toBe("en-US")
    expect(config.thresholds).toEqual(DEFAULT_THRESHOLDS)
    expect(config.smtp.enabled).toBe(false)
    expect(config.smtp.port).toBe(587)
    expect(config.alertCooldownMinutes).toBe(15)
  })

  it("reads smtp settings and recipient lists", () => {
    const config = loadConfig({
      SMTP_ENABLED: "true",
      SMTP_HOST: "smtp.example.test",
      SMTP_PORT: "465",
      SMTP_USER: "monitor",
      SMTP_PASSWORD: "test secret",
      SMTP_FROM: "monitor@example.test",
      SMTP_RECIPIENTS: "dba@example.test, oncall@example.test,",
    })

    expect(config.smtp).toEqual({
      enabled: true,
      host: "smtp.example.test",
      port: 465,
      secure: true,
      username: "monitor",
      password: "testsecret",
      from: "monitor@example.test",
      recipients: ["dba@example.test", "oncall@example.test"],
    })
  })

  it("ignores invalid numbers with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    const config = loadConfig({ ALERT_CPU_PERCENT: "lots", DASHBOARD_HOURS_BACK: "0" })

    expect(config.thresholds.cpuPercent).toBe(90)
    expect(config.defaultHoursBack).toBe(24)
    expect(warn).toHaveBeenCalledTimes(2)
  })

  it("accepts overrides", () => {
    const config = loadConfig({ ALERT_BLOCKING_SECONDS: "45", DASHBOARD_AUTO_REFRESH_SECONDS: "0" })
    expect(config.thresholds.blockingSeconds).toBe(45)
    expect(config.autoRefreshSeconds).toBe(0)
  })
})
