import type { PlanCaptureResult, PlanExecutor } from "../../actual-plan"
import { GridView } from "../../grid-filter"
import type { DatabaseService } from "../database-service"
import { aggregateTimeSeries } from "../series"
import type {
  DurationTrendItem,
  LongRunningQueryPattern,
  ProcedureStatsItem,
  QuerySnapshotItem,
  QueryStatsItem,
  QueryStoreItem,
  QueryStoreRegressionItem,
} from "../types"
import { ContentTab, emptyChart } from "./content-tab"

// Any grid row that carries runnable query text
export interface PlanSource {
  databaseName: string
  queryText: string
}

function durationSeries(name: string, rows: DurationTrendItem[]) {
  return [{ name, points: aggregateTimeSeries(rows, r => r.collectionTime, r => r.avgDurationMs) }]
}

export class QueryPerformanceContent extends ContentTab {
  readonly activeQueries = new GridView<QuerySnapshotItem>("activeQueries")
  readonly queryStats = new GridView<QueryStatsItem>("queryStats")
  readonly procedureStats = new GridView<ProcedureStatsItem>("procedureStats")
  readonly queryStore = new GridView<QueryStoreItem>("queryStore")
  readonly queryStoreRegressions = new GridView<QueryStoreRegressionItem>("queryStoreRegressions")
  readonly longRunningPatterns = new GridView<LongRunningQueryPattern>("longRunningPatterns")

  readonly queryDurationChart = emptyChart()
  readonly procedureDurationChart = emptyChart()
  readonly queryStoreDurationChart = emptyChart()
  readonly executionChart = emptyChart()

  private planController: AbortController | null = null

  constructor() {
    super("QueryPerformance")
  }

  protected loaders(db: DatabaseService): Promise<void>[] {
    const args = this.rangeArgs
    return [
      this.loadGrid(this.activeQueries, "active queries", () => db.getQuerySnapshots(...args)),
      this.loadGrid(this.queryStats, "query stats", () => db.getQueryStats(...args)),
      this.loadGrid(this.procedureStats, "procedure stats", () => db.getProcedureStats(...args)),
      this.loadGrid(this.queryStore, "query store", () => db.getQueryStoreData(...args)),
      this.loadGrid(this.queryStoreRegressions, "query store regressions", () => db.getQueryStoreRegressions(...args)),
      this.loadGrid(this.longRunningPatterns, "long-running query patterns", () => db.getLongRunningQueryPatterns(...args)),
      this.loadChart(this.queryDurationChart, "query duration trends", async () =>
        durationSeries("Query Duration", await db.getQueryDurationTrends(...args))),
      this.loadChart(this.procedureDurationChart, "procedure duration trends", async () =>
        durationSeries("Procedure Duration", await db.getProcedureDurationTrends(...args))),
      this.loadChart(this.queryStoreDurationChart, "query store duration trends", async () =>
        durationSeries("Query Store Duration", await db.getQueryStoreDurationTrends(...args))),
      this.loadChart(this.executionChart, "execution trends", async () => {
        const rows = await db.getExecutionTrends(...args)
        return [{ name: "Executions/sec", points: aggregateTimeSeries(rows, r => r.collectionTime, r => r.executionsPerSecond) }]
      }),
    ]
  }

  get isCapturingPlan(): boolean {
    return this.planController !== null
  }

  // Starting a capture aborts the one in flight
  async captureActualPlan(item: PlanSource, executor: PlanExecutor): Promise<PlanCaptureResult> {
    this.planController?.abort()
    const controller = new AbortController()
    this.planController = controller

    try {
      const result = await executor(item.databaseName, item.queryText, controller.signal)
      if (controller.signal.aborted) return { status: "cancelled" }
      if (result.status === "failed") {
        console.error(`[${this.name}] Actual plan capture failed: ${result.message}`)
      }
      return result
    } catch (error) {
      if (controller.signal.aborted) return { status: "cancelled" }
      return { status: "failed", message: this.logLoadError("actual plan", error) }
    } finally {
      if (this.planController === controller) this.planController = null
    }
  }

  cancelPlanCapture(): boolean {
    if (!this.planController) return false
    this.planController.abort()
    console.log(`[${this.name}] Actual plan capture cancelled`)
    return true
  }
}
