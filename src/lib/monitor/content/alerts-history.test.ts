import fs from "fs/promises"
import os from "os"
import path from "path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { AlertLog, type NewAlertLogEntry } from "../../alert-log"
import { AlertsHistoryContent } from "./alerts-history"

function hoursAgo(hours: number) {
  return new Date(Date.now() - hours * 3600_000)
}

function entry(serverName: string, metricName: string, hours: number, overrides: Partial<NewAlertLogEntry> = {}): NewAlertLogEntry {
  return {
    serverId: serverName,
    serverName,
    metricName,
    currentValue: "",
    thresholdValue: "",
    alertSent: true,
    notificationType: "notification",
    sendError: null,
    alertTime: hoursAgo(hours),
    ...overrides,
  }
}

describe("AlertsHistoryContent", () => {
  let dataDir: string
  let log: AlertLog

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "alerts-history-"))
    log = new AlertLog(dataDir)
    log.record(entry("sql01", "High CPU", 1, { notificationType: "email", sendError: "Connection refused", alertSent: false }))
    log.record(entry("sql01", "CPU Resolved", 0.5))
    log.record(entry("sql02", "Deadlocks Detected", 2, { notificationType: "email" }))
    log.record(entry("sql02", "Blocking Detected", 30))
  })

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true })
  })

  it("does nothing before initialize", async () => {
    const tab = new AlertsHistoryContent()
    await tab.refreshAll()

    expect(tab.isInitialized).toBe(false)
    expect(tab.visible()).toEqual([])
    expect(await tab.dismissAll()).toBe(0)
  })

  it("derives status and severity for each row", async () => {
    const tab = new AlertsHistoryContent()
    tab.initialize(log)
    await tab.refreshAll()

    expect(tab.visible().map(r => [r.metricName, r.status, r.isResolved, r.isCritical])).toEqual([
      ["CPU Resolved", "Delivered", true, false],
      ["High CPU", "Failed", false, false],
      ["Deadlocks Detected", "Sent", false, true],
    ])
  })

  it("shows the whole log when hours back is 0", async () => {
    const tab = new AlertsHistoryContent()
    tab.initialize(log)
    tab.setHoursBack(0)
    await tab.refreshAll()

    expect(tab.visible()).toHaveLength(4)
    expect(tab.serverNames).toEqual(["sql01", "sql02"])
  })

  it("ANDs the server selection with column filters", async () => {
    const tab = new AlertsHistoryContent()
    tab.initialize(log)
    await tab.refreshAll()

    tab.setServerFilter("sql01")
    expect(tab.visible().map(r => r.metricName)).toEqual(["CPU Resolved", "High CPU"])

    tab.alerts.setTriState("isResolved", "false")
    expect(tab.visible().map(r => r.metricName)).toEqual(["High CPU"])

    tab.setServerFilter("")
    expect(tab.serverFilter).toBeNull()
    expect(tab.visible().map(r => r.metricName)).toEqual(["High CPU", "Deadlocks Detected"])
  })

  it("dismisses selected rows and saves the log", async () => {
    const tab = new AlertsHistoryContent()
    tab.initialize(log)
    await tab.refreshAll()
    const [resolved] = tab.visible()

    const hidden = await tab.dismiss([resolved])

    expect(hidden).toBe(1)
    expect(tab.visible().map(r => r.metricName)).toEqual(["High CPU", "Deadlocks Detected"])
    const saved: { metricName: string; hidden: boolean }[] = JSON.parse(await fs.readFile(path.join(dataDir, "alert_history.json"), "utf8"))
    expect(saved.filter(e => e.hidden).map(e => e.metricName)).toEqual(["CPU Resolved"])
  })

  it("dismisses everything in the window for the selected server", async () => {
    const tab = new AlertsHistoryContent()
    tab.initialize(log)
    tab.setServerFilter("sql01")

    expect(await tab.dismissAll()).toBe(2)

    tab.setServerFilter(null)
    expect(tab.visible().map(r => r.metricName)).toEqual(["Deadlocks Detected"])
    expect(log.getHistory(0).map(e => e.metricName)).toEqual(["Deadlocks Detected", "Blocking Detected"])
  })
})
