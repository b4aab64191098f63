import type { AlertThresholds } from "../config"
import type { ServerHealthStatus } from "./health"

export type AlertMetric =
  | "High CPU"
  | "Blocking Detected"
  | "Deadlocks Detected"
  | "Poison Wait"
  | "Long-Running Query"
  | "TempDB Space"

// Name recorded when a breached metric recovers
export const CLEARED_METRIC: Record<AlertMetric, string> = {
  "High CPU": "CPU Resolved",
  "Blocking Detected": "Blocking Cleared",
  "Deadlocks Detected": "Deadlocks Cleared",
  "Poison Wait": "Poison Waits Cleared",
  "Long-Running Query": "Long-Running Queries Cleared",
  "TempDB Space": "TempDB Space Resolved",
}

export interface AlertBreach {
  metric: AlertMetric
  currentValue: string
  thresholdValue: string
  message: string
}

export interface AlertEvent {
  kind: "alert" | "cleared"
  serverId: string
  serverName: string
  metric: string
  currentValue: string
  thresholdValue: string
  message: string
}

export function evaluateAlerts(status: ServerHealthStatus, thresholds: AlertThresholds): AlertBreach[] {
  const s = status.latest
  if (!s || status.isOnline !== true) return []

  const name = status.displayName
  const breaches: AlertBreach[] = []

  const cpu = status.totalCpuPercent
  if (cpu !== null && cpu >= thresholds.cpuPercent) {
    breaches.push({
      metric: "High CPU",
      currentValue: `${cpu}%`,
      thresholdValue: `${thresholds.cpuPercent}%`,
      message: `${name}: CPU at ${cpu}% (threshold: ${thresholds.cpuPercent}%)`,
    })
  }

  if (s.totalBlocked > 0 && s.longestBlockedSeconds >= thresholds.blockingSeconds) {
    breaches.push({
      metric: "Blocking Detected",
      currentValue: `${s.totalBlocked} blocked, longest ${s.longestBlockedSeconds.toFixed(0)}s`,
      thresholdValue: `${thresholds.blockingSeconds}s`,
      message: `${name}: ${s.totalBlocked} blocked session(s), longest ${s.longestBlockedSeconds.toFixed(0)}s`,
    })
  }

  const deadlocks = status.deadlocksSinceLastCheck
  if (deadlocks >= thresholds.deadlockCount && deadlocks > 0) {
    breaches.push({
      metric: "Deadlocks Detected",
      currentValue: `${deadlocks}`,
      thresholdValue: `${thresholds.deadlockCount}`,
      message: `${name}: ${deadlocks} deadlock(s) since last check`,
    })
  }

  if (s.poisonWaitAvgMs > 0 && s.poisonWaitAvgMs >= thresholds.poisonWaitAvgMs) {
    breaches.push({
      metric: "Poison Wait",
      currentValue: `${s.poisonWaitAvgMs.toFixed(0)}ms avg`,
      thresholdValue: `${thresholds.poisonWaitAvgMs}ms avg`,
      message: `${name}: poison wait avg ${s.poisonWaitAvgMs.toFixed(0)}ms/wait`,
    })
  }

  if (s.longestRunningQueryMinutes !== null && s.longestRunningQueryMinutes >= thresholds.longRunningQueryMinutes) {
    breaches.push({
      metric: "Long-Running Query",
      currentValue: `longest ${s.longestRunningQueryMinutes}m`,
      thresholdValue: `${thresholds.longRunningQueryMinutes}m`,
      message: `${name}: query running ${s.longestRunningQueryMinutes}m`,
    })
  }

  if (s.tempdbUsedPercent !== null && s.tempdbUsedPercent >= thresholds.tempdbUsedPercent) {
    breaches.push({
      metric: "TempDB Space",
      currentValue: `${s.tempdbUsedPercent.toFixed(0)}% used`,
      thresholdValue: `${thresholds.tempdbUsedPercent}%`,
      message: `${name}: TempDB ${s.tempdbUsedPercent.toFixed(0)}% used`,
    })
  }

  return breaches
}

/**
 * Remembers which metrics are breached per server. A metric yields an
 * "alert" event when it starts breaching and a "cleared" event when it
 * recovers; a metric that stays breached yields nothing.
 */
export class AlertStateTracker {
  private readonly active = new Map<string, Set<AlertMetric>>()

  update(status: ServerHealthStatus, breaches: AlertBreach[]): AlertEvent[] {
    const serverId = status.serverId
    const serverName = status.displayName
    const previous = this.active.get(serverId) ?? new Set<AlertMetric>()
    const current = new Set(breaches.map(b => b.metric))
    const events: AlertEvent[] = []

    for (const breach of breaches) {
      if (previous.has(breach.metric)) continue
      events.push({ kind: "alert", serverId, serverName, ...breach })
    }

    for (const metric of previous) {
      if (current.has(metric)) continue
      events.push({
        kind: "cleared",
        serverId,
        serverName,
        metric: CLEARED_METRIC[metric],
        currentValue: "",
        thresholdValue: "",
        message: `${serverName}: ${metric} no longer over threshold`,
      })
    }

    this.active.set(serverId, current)
    return events
  }

  isActive(serverId: string, metric: AlertMetric): boolean {
    return this.active.get(serverId)?.has(metric) ?? false
  }

  reset(serverId: string) {
    this.active.delete(serverId)
  }
}
