import { beforeEach, describe, expect, it, vi } from "vitest"
import type { PlanExecutor } from "../../actual-plan"
import { fakeDatabaseService } from "@/test/fake-database-service"
import type { QuerySnapshotItem, QueryStatsItem } from "../types"
import { QueryPerformanceContent } from "./query-performance"

function snapshot(overrides: Partial<QuerySnapshotItem> = {}): QuerySnapshotItem {
  return {
    collectionTime: new Date(Date.UTC(2026, 2, 15, 12, 0, 0)),
    sessionId: 55,
    databaseName: "Sales",
    status: "running",
    elapsedMs: 1200,
    cpuMs: 900,
    logicalReads: 4000,
    waitType: null,
    blockingSessionId: null,
    queryText: "SELECT * FROM dbo.Orders",
    hasPlan: true,
    ...overrides,
  }
}

function stats(overrides: Partial<QueryStatsItem> = {}): QueryStatsItem {
  return {
    databaseName: "Sales",
    queryHash: "0x01",
    objectName: null,
    executionCount: 10,
    totalWorkerTimeMs: 100,
    avgWorkerTimeMs: 10,
    avgElapsedTimeMs: 12,
    avgLogicalReads: 50,
    lastExecutionTime: null,
    queryText: "SELECT 1",
    ...overrides,
  }
}

describe("QueryPerformanceContent", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {})
    vi.spyOn(console, "log").mockImplementation(() => {})
  })

  it("does nothing before initialize", async () => {
    const tab = new QueryPerformanceContent()
    await tab.refreshAll()

    expect(tab.isInitialized).toBe(false)
    expect(tab.activeQueries.isLoaded).toBe(false)
    expect(tab.activeQueries.visible()).toEqual([])
    expect(tab.lastRefreshed).toBeNull()
  })

  it("starts every fetch before any completes", async () => {
    let release: (rows: QuerySnapshotItem[]) => void = () => {}
    const getExecutionTrends = vi.fn(async () => [])
    const tab = new QueryPerformanceContent()
    tab.initialize(fakeDatabaseService({
      getQuerySnapshots: () => new Promise<QuerySnapshotItem[]>(resolve => { release = resolve }),
      getExecutionTrends,
    }))

    const refresh = tab.refreshAll()
    expect(getExecutionTrends).toHaveBeenCalledTimes(1)

    release([snapshot()])
    await refresh
    expect(tab.activeQueries.rows).toHaveLength(1)
    expect(tab.lastRefreshed).toBeInstanceOf(Date)
  })

  it("keeps sibling grids when one loader fails", async () => {
    const tab = new QueryPerformanceContent()
    tab.initialize(fakeDatabaseService({
      getQuerySnapshots: async () => [snapshot(), snapshot({ sessionId: 56 })],
      getQueryStats: async () => {
        throw new Error("Execution Timeout Expired")
      },
      getQueryDurationTrends: async () => {
        throw new Error("Connection reset")
      },
    }))

    await expect(tab.refreshAll()).resolves.toBeUndefined()

    expect(tab.activeQueries.rows).toHaveLength(2)
    expect(tab.queryStats.isLoaded).toBe(true)
    expect(tab.queryStats.rows).toEqual([])
    expect(tab.queryStats.error).toBe("Execution Timeout Expired")
    expect(tab.queryDurationChart.series).toEqual([])
    expect(tab.queryDurationChart.error).toBe("Connection reset")
    expect(console.error).toHaveBeenCalledWith("[QueryPerformance] Error loading query stats: Execution Timeout Expired")
    expect(console.error).toHaveBeenCalledWith("[QueryPerformance] Error loading query duration trends: Connection reset")
  })

  it("passes the time range to every fetch", async () => {
    const from = new Date(Date.UTC(2026, 2, 1))
    const to = new Date(Date.UTC(2026, 2, 2))
    const getQueryStats = vi.fn(async () => [stats()])
    const tab = new QueryPerformanceContent()
    tab.initialize(fakeDatabaseService({ getQueryStats }))

    tab.setTimeRange(4)
    await tab.refreshAll()
    tab.setTimeRange(24, from, to)
    await tab.refreshAll()

    expect(getQueryStats.mock.calls).toEqual([[4, null, null], [24, from, to]])
  })

  it("clears grid filters on refresh", async () => {
    const tab = new QueryPerformanceContent()
    tab.initialize(fakeDatabaseService({
      getQueryStats: async () => [stats({ databaseName: "Sales" }), stats({ databaseName: "HR" })],
    }))
    await tab.refreshAll()

    tab.queryStats.setFilter({ columnName: "databaseName", operator: "equals", value: "HR" })
    expect(tab.queryStats.visible()).toHaveLength(1)

    await tab.refreshAll()
    expect(tab.queryStats.status).toBe("unfiltered")
    expect(tab.queryStats.visible()).toHaveLength(2)
  })

  it("charts duration trends by time", async () => {
    const t1 = new Date(Date.UTC(2026, 2, 15, 12, 0))
    const t2 = new Date(Date.UTC(2026, 2, 15, 12, 5))
    const tab = new QueryPerformanceContent()
    tab.initialize(fakeDatabaseService({
      getQueryDurationTrends: async () => [
        { collectionTime: t2, avgDurationMs: 30 },
        { collectionTime: t1, avgDurationMs: 10 },
      ],
    }))

    await tab.refreshAll()

    expect(tab.queryDurationChart.series).toEqual([
      { name: "Query Duration", points: [{ time: t1, value: 10 }, { time: t2, value: 30 }] },
    ])
  })

  describe("actual plan capture", () => {
    // Executor that resolves cancelled when its signal aborts, as the mssql one does
    const waitForAbort: PlanExecutor = (_db, _query, signal) =>
      new Promise(resolve => {
        signal.addEventListener("abort", () => resolve({ status: "cancelled" }))
      })

    it("passes the row's database and query text", async () => {
      const executor = vi.fn<PlanExecutor>(async () => ({ status: "captured", planXml: "<ShowPlanXML/>" }))
      const tab = new QueryPerformanceContent()

      const result = await tab.captureActualPlan(snapshot(), executor)

      expect(result).toEqual({ status: "captured", planXml: "<ShowPlanXML/>" })
      expect(executor).toHaveBeenCalledWith("Sales", "SELECT * FROM dbo.Orders", expect.any(AbortSignal))
      expect(tab.isCapturingPlan).toBe(false)
    })

    it("cancels the running capture", async () => {
      const tab = new QueryPerformanceContent()
      const pending = tab.captureActualPlan(snapshot(), waitForAbort)
      expect(tab.isCapturingPlan).toBe(true)

      expect(tab.cancelPlanCapture()).toBe(true)

      await expect(pending).resolves.toEqual({ status: "cancelled" })
      expect(tab.isCapturingPlan).toBe(false)
      expect(console.error).not.toHaveBeenCalled()
    })

    it("aborts the previous capture when a new one starts", async () => {
      const tab = new QueryPerformanceContent()
      const first = tab.captureActualPlan(snapshot(), waitForAbort)
      const second = tab.captureActualPlan(snapshot({ queryText: "SELECT 2" }), async () => ({ status: "empty" }))

      await expect(first).resolves.toEqual({ status: "cancelled" })
      await expect(second).resolves.toEqual({ status: "empty" })
    })

    it("treats an executor that rejects after abort as cancelled", async () => {
      const tab = new QueryPerformanceContent()
      const pending = tab.captureActualPlan(snapshot(), (_db, _query, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("Operation cancelled by user.")))
        }))

      tab.cancelPlanCapture()

      await expect(pending).resolves.toEqual({ status: "cancelled" })
      expect(console.error).not.toHaveBeenCalled()
    })

    it("reports a failing executor", async () => {
      const tab = new QueryPerformanceContent()
      const result = await tab.captureActualPlan(snapshot(), async () => {
        throw new Error("Login failed")
      })

      expect(result).toEqual({ status: "failed", message: "Login failed" })
      expect(console.error).toHaveBeenCalledWith("[QueryPerformance] Error loading actual plan: Login failed")
    })

    it("has nothing to cancel when idle", () => {
      expect(new QueryPerformanceContent().cancelPlanCapture()).toBe(false)
    })
  })
})
