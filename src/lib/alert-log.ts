import fs from "fs/promises"
import path from "path"

export const MAX_ALERT_LOG_ENTRIES = 1000

export type NotificationType = "email" | "notification"

export interface AlertLogEntry {
  alertTime: Date
  serverId: string
  serverName: string
  metricName: string
  currentValue: string
  thresholdValue: string
  alertSent: boolean
  notificationType: NotificationType
  sendError: string | null
  hidden: boolean
}

export type NewAlertLogEntry = Omit<AlertLogEntry, "alertTime" | "hidden"> & { alertTime?: Date }

export interface AlertKey {
  alertTime: Date
  serverName: string
  metricName: string
}

export function alertStatus(entry: Pick<AlertLogEntry, "notificationType" | "alertSent" | "sendError">): string {
  if (entry.notificationType === "email") {
    if (entry.alertSent) return "Sent"
    return entry.sendError ? "Failed" : "Not sent"
  }
  return entry.alertSent ? "Delivered" : "Shown"
}

export function isResolvedAlert(metricName: string): boolean {
  return metricName.includes("Cleared") || metricName.includes("Resolved")
}

export function isCriticalAlert(metricName: string): boolean {
  return metricName.includes("Deadlock") || metricName.includes("Poison")
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

function toEntry(value: unknown): AlertLogEntry | null {
  if (!isRecord(value)) return null
  const alertTime = typeof value.alertTime === "string" ? new Date(value.alertTime) : null
  if (!alertTime || Number.isNaN(alertTime.getTime())) return null
  if (typeof value.serverName !== "string" || typeof value.metricName !== "string") return null

  return {
    alertTime,
    serverId: typeof value.serverId === "string" ? value.serverId : "",
    serverName: value.serverName,
    metricName: value.metricName,
    currentValue: typeof value.currentValue === "string" ? value.currentValue : "",
    thresholdValue: typeof value.thresholdValue === "string" ? value.thresholdValue : "",
    alertSent: value.alertSent === true,
    notificationType: value.notificationType === "email" ? "email" : "notification",
    sendError: typeof value.sendError === "string" ? value.sendError : null,
    hidden: value.hidden === true,
  }
}

function sameKey(entry: AlertLogEntry, key: AlertKey): boolean {
  return entry.alertTime.getTime() === key.alertTime.getTime()
    && entry.serverName === key.serverName
    && entry.metricName === key.metricName
}

/**
 * In-memory alert history, newest kept when the cap is reached.
 * Loaded from and saved to alert_history.json in the data directory.
 */
export class AlertLog {
  private entries: AlertLogEntry[] = []
  private readonly filePath: string

  constructor(dataDir: string, private readonly maxEntries = MAX_ALERT_LOG_ENTRIES) {
    this.filePath = path.join(dataDir, "alert_history.json")
  }

  get size() {
    return this.entries.length
  }

  record(input: NewAlertLogEntry): AlertLogEntry {
    const entry: AlertLogEntry = { ...input, alertTime: input.alertTime ?? new Date(), hidden: false }
    this.entries.push(entry)
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries)
    }
    return entry
  }

  // hoursBack of 0 covers the whole log
  getHistory(hoursBack = 24, limit = 50, now: Date = new Date()): AlertLogEntry[] {
    const cutoff = hoursBack > 0 ? now.getTime() - hoursBack * 3600_000 : -Infinity
    return this.entries
      .filter(e => !e.hidden && e.alertTime.getTime() >= cutoff)
      .sort((a, b) => b.alertTime.getTime() - a.alertTime.getTime())
      .slice(0, limit)
  }

  hide(keys: AlertKey[]): number {
    let hidden = 0
    for (const entry of this.entries) {
      if (!entry.hidden && keys.some(k => sameKey(entry, k))) {
        entry.hidden = true
        hidden++
      }
    }
    return hidden
  }

  hideAll(hoursBack: number, serverName?: string | null, now: Date = new Date()): number {
    const cutoff = hoursBack > 0 ? now.getTime() - hoursBack * 3600_000 : -Infinity
    let hidden = 0
    for (const entry of this.entries) {
      if (entry.hidden || entry.alertTime.getTime() < cutoff) continue
      if (serverName && entry.serverName !== serverName) continue
      entry.hidden = true
      hidden++
    }
    return hidden
  }

  async load(): Promise<void> {
    let json: string
    try {
      json = await fs.readFile(this.filePath, "utf8")
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return
      throw error
    }

    try {
      const parsed: unknown = JSON.parse(json)
      const items = Array.isArray(parsed) ? parsed : []
      this.entries = items
        .map(toEntry)
        .filter((e): e is AlertLogEntry => e !== null)
        .slice(-this.maxEntries)
    } catch (error) {
      console.warn(`[Alerts] Failed to load alert log, starting fresh: ${error instanceof Error ? error.message : error}`)
      this.entries = []
    }
  }

  async save(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.writeFile(this.filePath, JSON.stringify(this.entries, null, 2), "utf8")
    } catch (error) {
      console.error("[Alerts] Failed to save alert log:", error)
    }
  }
}
