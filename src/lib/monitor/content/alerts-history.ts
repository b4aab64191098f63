import { alertStatus, isCriticalAlert, isResolvedAlert, type AlertKey, type AlertLog, type AlertLogEntry } from "../../alert-log"
import { GridView } from "../../grid-filter"

export const DEFAULT_ALERT_HOURS_BACK = 24
export const ALERT_HISTORY_LIMIT = 500

export interface AlertHistoryRow extends AlertLogEntry {
  status: string
  isResolved: boolean
  isCritical: boolean
}

function toRow(entry: AlertLogEntry): AlertHistoryRow {
  return {
    ...entry,
    status: alertStatus(entry),
    isResolved: isResolvedAlert(entry.metricName),
    isCritical: isCriticalAlert(entry.metricName),
  }
}

/**
 * Alert history from the in-process alert log. The server selection is an
 * extra predicate ANDed with the grid's own filters.
 */
export class AlertsHistoryContent {
  readonly name = "AlertsHistory"
  readonly alerts = new GridView<AlertHistoryRow>("alerts")

  private log: AlertLog | null = null
  private hours = DEFAULT_ALERT_HOURS_BACK
  private server: string | null = null

  get isInitialized(): boolean {
    return this.log !== null
  }

  get hoursBack(): number {
    return this.hours
  }

  get serverFilter(): string | null {
    return this.server
  }

  initialize(log: AlertLog) {
    this.log = log
  }

  // 0 shows the whole log
  setHoursBack(hoursBack: number) {
    this.hours = Math.max(0, hoursBack)
  }

  setServerFilter(serverName: string | null) {
    this.server = serverName || null
  }

  get serverNames(): string[] {
    return Array.from(new Set(this.alerts.rows.map(r => r.serverName))).sort()
  }

  visible(now?: Date): AlertHistoryRow[] {
    const rows = this.alerts.visible(now)
    const server = this.server
    return server ? rows.filter(r => r.serverName === server) : rows
  }

  async refreshAll(): Promise<void> {
    const log = this.log
    if (!log) return

    try {
      this.alerts.load(log.getHistory(this.hours, ALERT_HISTORY_LIMIT).map(toRow))
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error(`[${this.name}] Error loading alert history: ${message}`)
      this.alerts.fail(message)
    }
  }

  async dismiss(keys: AlertKey[]): Promise<number> {
    const log = this.log
    if (!log || keys.length === 0) return 0

    const hidden = log.hide(keys)
    await log.save()
    await this.refreshAll()
    return hidden
  }

  async dismissAll(): Promise<number> {
    const log = this.log
    if (!log) return 0

    const hidden = log.hideAll(this.hours, this.server)
    await log.save()
    await this.refreshAll()
    return hidden
  }
}
