import { formatLastUpdated, formatMinutesAgo } from "../date-utils"
import type { ServerConnection } from "../servers"
import type { HealthSnapshot } from "./types"

export type HealthSeverity = "unknown" | "healthy" | "warning" | "critical"

const SEVERITY_RANK: Record<HealthSeverity, number> = {
  unknown: 0,
  healthy: 1,
  warning: 2,
  critical: 3,
}

export function worstSeverity(severities: HealthSeverity[]): HealthSeverity {
  return severities.reduce<HealthSeverity>(
    (worst, s) => (SEVERITY_RANK[s] > SEVERITY_RANK[worst] ? s : worst),
    "healthy"
  )
}

/**
 * Landing page card for one server. Holds the latest health snapshot and
 * derives a severity and display text per metric.
 */
export class ServerHealthStatus {
  isLoading = false
  isOnline: boolean | null = null
  errorMessage: string | null = null
  lastUpdated: Date | null = null

  private snapshot: HealthSnapshot | null = null
  private previousDeadlockCount = 0

  constructor(private connection: ServerConnection) {}

  get server(): ServerConnection {
    return this.connection
  }

  // Points the card at an edited server; a new instance starts over
  rebind(server: ServerConnection) {
    if (server.serverName !== this.connection.serverName) {
      this.snapshot = null
      this.previousDeadlockCount = 0
      this.isOnline = null
      this.errorMessage = null
      this.lastUpdated = null
    }
    this.connection = server
  }

  get serverId() {
    return this.server.id
  }

  get displayName() {
    return this.server.displayName
  }

  get latest(): HealthSnapshot | null {
    return this.snapshot
  }

  applySnapshot(snapshot: HealthSnapshot, at: Date = new Date()) {
    // First read: delta starts at 0
    this.previousDeadlockCount = this.snapshot ? this.snapshot.deadlockCount : snapshot.deadlockCount
    this.snapshot = snapshot
    this.isOnline = true
    this.errorMessage = null
    this.lastUpdated = at
  }

  markOffline(message: string, at: Date = new Date()) {
    this.isOnline = false
    this.errorMessage = message
    this.lastUpdated = at
  }

  lastUpdatedDisplay(now: Date = new Date()): string {
    return formatLastUpdated(this.lastUpdated, now)
  }

  // CPU

  get totalCpuPercent(): number | null {
    const s = this.snapshot
    if (!s || (s.cpuPercent === null && s.otherCpuPercent === null)) return null
    return (s.cpuPercent ?? 0) + (s.otherCpuPercent ?? 0)
  }

  get cpuSeverity(): HealthSeverity {
    const total = this.totalCpuPercent
    if (total === null) return "unknown"
    if (total >= 95) return "critical"
    if (total >= 80) return "warning"
    return "healthy"
  }

  get cpuDisplayText(): string {
    const total = this.totalCpuPercent
    return total === null ? "--" : `${total}%`
  }

  get cpuDetailText(): string {
    const s = this.snapshot
    if (!s || this.totalCpuPercent === null) return ""
    return `SQL: ${s.cpuPercent ?? 0}% Other: ${s.otherCpuPercent ?? 0}%`
  }

  // Memory

  get memorySeverity(): HealthSeverity {
    if (!this.snapshot) return "unknown"
    return this.snapshot.requestsWaitingForMemory > 0 ? "critical" : "healthy"
  }

  get memoryDisplayText(): string {
    const waiting = this.snapshot?.requestsWaitingForMemory ?? 0
    return waiting > 0 ? `${waiting} waiting` : "OK"
  }

  get memoryDetailText(): string {
    const s = this.snapshot
    if (!s || s.bufferPoolGb === null) return ""
    const bp = `BP: ${s.bufferPoolGb.toFixed(1)}GB`
    return s.grantedMemoryGb === null ? bp : `${bp}, QMG: ${s.grantedMemoryGb.toFixed(1)}GB`
  }

  // Blocking

  get blockingSeverity(): HealthSeverity {
    const s = this.snapshot
    if (!s) return "unknown"
    if (s.longestBlockedSeconds >= 60 || s.totalBlocked >= 5) return "critical"
    if (s.longestBlockedSeconds >= 10 || s.totalBlocked > 0) return "warning"
    return "healthy"
  }

  get blockingDisplayText(): string {
    return `${this.snapshot?.totalBlocked ?? 0}`
  }

  get blockingDetailText(): string {
    const s = this.snapshot
    if (s && s.totalBlocked > 0) return `max: ${s.longestBlockedSeconds.toFixed(0)}s`
    if (!s || s.lastBlockingMinutesAgo === null) return "Last: Unknown"
    return `Last: ${formatMinutesAgo(s.lastBlockingMinutesAgo)}`
  }

  // Threads

  private get threadsLow(): boolean {
    const s = this.snapshot
    return !!s && s.totalThreads > 0 && s.availableThreads < s.totalThreads * 0.1
  }

  get threadsSeverity(): HealthSeverity {
    const s = this.snapshot
    if (!s) return "unknown"
    if (s.requestsWaitingForThreads > 0) return "critical"
    if (s.threadsWaitingForCpu >= 20 || this.threadsLow) return "warning"
    return "healthy"
  }

  get threadsDisplayText(): string {
    const s = this.snapshot
    if (!s) return "OK"
    if (s.requestsWaitingForThreads > 0) return `${s.requestsWaitingForThreads} starved`
    if (s.threadsWaitingForCpu >= 20) return `${s.threadsWaitingForCpu} runnable`
    if (this.threadsLow) return "Low"
    return "OK"
  }

  get threadsDetailText(): string {
    const s = this.snapshot
    return s && s.totalThreads > 0 ? `Available: ${s.availableThreads}/${s.totalThreads}` : ""
  }

  // Deadlocks (cumulative counter)

  get deadlocksSinceLastCheck(): number {
    return this.snapshot ? this.snapshot.deadlockCount - this.previousDeadlockCount : 0
  }

  get deadlockSeverity(): HealthSeverity {
    const s = this.snapshot
    if (!s) return "unknown"
    if (this.deadlocksSinceLastCheck > 0) return "critical"
    if (s.lastDeadlockMinutesAgo !== null && s.lastDeadlockMinutesAgo <= 10) return "critical"
    if (s.lastDeadlockMinutesAgo !== null && s.lastDeadlockMinutesAgo <= 60) return "warning"
    return "healthy"
  }

  get deadlockDisplayText(): string {
    const delta = this.deadlocksSinceLastCheck
    return delta > 0 ? `+${delta}` : "0"
  }

  get deadlockDetailText(): string {
    const minutes = this.snapshot?.lastDeadlockMinutesAgo ?? null
    return minutes === null ? "Last: Unknown" : `Last: ${formatMinutesAgo(minutes)}`
  }

  // Collectors

  get collectorSeverity(): HealthSeverity {
    if (!this.snapshot) return "unknown"
    return this.snapshot.failedCollectorCount > 0 ? "warning" : "healthy"
  }

  get collectorDisplayText(): string {
    const failed = this.snapshot?.failedCollectorCount ?? 0
    return failed > 0 ? `${failed} failed` : "OK"
  }

  get collectorDetailText(): string {
    return `Healthy: ${this.snapshot?.healthyCollectorCount ?? 0}, Failing: ${this.snapshot?.failedCollectorCount ?? 0}`
  }

  // Waits

  get topWaitDisplayText(): string {
    const s = this.snapshot
    if (!s || !s.topWaitType) return "--"
    return `${s.topWaitType} (${s.topWaitDurationSeconds.toFixed(0)}s)`
  }

  // Connection

  get connectionSeverity(): HealthSeverity {
    if (this.isOnline === null) return "unknown"
    return this.isOnline ? "healthy" : "critical"
  }

  get connectionStatusText(): string {
    if (this.isOnline === null) return "Unknown"
    return this.isOnline ? "Online" : "Offline"
  }

  get overallSeverity(): HealthSeverity {
    if (this.isOnline !== true) return "critical"
    return worstSeverity([
      this.cpuSeverity,
      this.memorySeverity,
      this.blockingSeverity,
      this.threadsSeverity,
      this.deadlockSeverity,
      this.collectorSeverity,
    ])
  }
}
