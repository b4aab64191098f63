import type { HealthSnapshot } from "@/lib/monitor/types"
import type { ServerConnection } from "@/lib/servers"

export function healthSnapshot(overrides: Partial<HealthSnapshot> = {}): HealthSnapshot {
  return {
    cpuPercent: 20,
    otherCpuPercent: 5,
    bufferPoolGb: 12,
    grantedMemoryGb: 0.5,
    requestsWaitingForMemory: 0,
    totalBlocked: 0,
    longestBlockedSeconds: 0,
    lastBlockingMinutesAgo: null,
    totalThreads: 500,
    availableThreads: 400,
    threadsWaitingForCpu: 0,
    requestsWaitingForThreads: 0,
    deadlockCount: 0,
    lastDeadlockMinutesAgo: null,
    healthyCollectorCount: 12,
    failedCollectorCount: 0,
    topWaitType: null,
    topWaitDurationSeconds: 0,
    poisonWaitAvgMs: 0,
    longestRunningQueryMinutes: null,
    tempdbUsedPercent: null,
    ...overrides,
  }
}

export function serverConnection(overrides: Partial<ServerConnection> = {}): ServerConnection {
  return {
    id: "srv-1",
    serverName: "sql01",
    displayName: "sql01",
    authenticationType: "sql",
    encryptMode: "mandatory",
    trustServerCertificate: false,
    isFavorite: false,
    createdAt: new Date(Date.UTC(2026, 0, 1)),
    lastConnected: null,
    ...overrides,
  }
}
