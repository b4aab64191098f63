import { GridView } from "../../grid-filter"
import type { DatabaseService } from "../database-service"
import { aggregateTimeSeries, defaultWaitTypes, groupSeries } from "../series"
import type {
  ChartSeries,
  FileIoLatencyItem,
  LatchStatsItem,
  SessionStatsItem,
  SpinlockStatsItem,
  TempdbStatsItem,
} from "../types"
import { ContentTab, emptyChart } from "./content-tab"

export const TOP_N_LATCHES = 5

export const DEFAULT_PERFMON_COUNTERS = [
  "Batch Requests/sec",
  "SQL Compilations/sec",
  "SQL Re-Compilations/sec",
  "Page life expectancy",
]

function latencySeries(rows: FileIoLatencyItem[], byDatabase: boolean): ChartSeries[] {
  const time = (r: FileIoLatencyItem) => r.collectionTime
  if (!byDatabase) {
    return [
      { name: "Read", points: aggregateTimeSeries(rows, time, r => r.readLatencyMs) },
      { name: "Write", points: aggregateTimeSeries(rows, time, r => r.writeLatencyMs) },
    ]
  }
  return [
    ...groupSeries(rows, r => `${r.databaseName} read`, time, r => r.readLatencyMs),
    ...groupSeries(rows, r => `${r.databaseName} write`, time, r => r.writeLatencyMs),
  ]
}

export class ResourceMetricsContent extends ContentTab {
  readonly latchStats = new GridView<LatchStatsItem>("latchStats")
  readonly spinlockStats = new GridView<SpinlockStatsItem>("spinlockStats")
  readonly tempdbStats = new GridView<TempdbStatsItem>("tempdbStats")
  readonly sessionStats = new GridView<SessionStatsItem>("sessionStats")

  readonly fileIoChart = emptyChart()
  readonly tempdbLatencyChart = emptyChart()
  readonly waitStatsChart = emptyChart()
  readonly perfmonChart = emptyChart()
  readonly serverTrendsChart = emptyChart()

  // Wait types with data in range, highest total first
  availableWaitTypes: string[] = []
  private selectedWaits: string[] | null = null
  private selectedCounters: string[] = [...DEFAULT_PERFMON_COUNTERS]

  constructor() {
    super("ResourceMetrics")
  }

  get selectedWaitTypes(): string[] {
    return this.selectedWaits ?? defaultWaitTypes(this.availableWaitTypes)
  }

  get selectedPerfmonCounters(): string[] {
    return this.selectedCounters
  }

  protected loaders(db: DatabaseService): Promise<void>[] {
    const args = this.rangeArgs
    return [
      this.loadGrid(this.latchStats, "latch stats", () => db.getLatchStatsTopN(TOP_N_LATCHES, ...args)),
      this.loadGrid(this.spinlockStats, "spinlock stats", () => db.getSpinlockStatsTopN(TOP_N_LATCHES, ...args)),
      this.loadGrid(this.tempdbStats, "tempdb stats", () => db.getTempdbStats(...args)),
      this.loadGrid(this.sessionStats, "session stats", () => db.getSessionStats(...args)),
      this.loadChart(this.fileIoChart, "file I/O latency", async () =>
        latencySeries(await db.getFileIoLatency(false, ...args), true)),
      this.loadChart(this.tempdbLatencyChart, "tempdb latency", async () =>
        latencySeries(await db.getFileIoLatency(true, ...args), false)),
      this.loadWaitStats(db, true),
      this.loadPerfmon(db),
      this.loadChart(this.serverTrendsChart, "server trends", async () => {
        const [cpu, memory, tempdb] = await Promise.all([
          db.getCpuUtilization(...args),
          db.getMemoryStats(...args),
          db.getTempdbStats(...args),
        ])
        return [
          { name: "CPU %", points: aggregateTimeSeries(cpu, r => r.collectionTime, r => r.sqlCpuPercent + r.otherCpuPercent) },
          { name: "Memory MB", points: aggregateTimeSeries(memory, r => r.collectionTime, r => r.totalMemoryMb) },
          { name: "TempDB %", points: aggregateTimeSeries(tempdb, r => r.collectionTime, r => r.usedPercent) },
        ]
      }),
    ]
  }

  async setSelectedWaitTypes(waitTypes: string[]): Promise<void> {
    this.selectedWaits = [...waitTypes]
    if (this.db) await this.loadWaitStats(this.db, false)
  }

  async setSelectedPerfmonCounters(counterNames: string[]): Promise<void> {
    this.selectedCounters = [...counterNames]
    if (this.db) await this.loadPerfmon(this.db)
  }

  private loadWaitStats(db: DatabaseService, refreshTypes: boolean): Promise<void> {
    const args = this.rangeArgs
    return this.loadChart(this.waitStatsChart, "wait stats", async () => {
      if (refreshTypes) {
        const totals = await db.getWaitTypeNames(...args)
        this.availableWaitTypes = [...totals]
          .sort((a, b) => b.totalWaitTimeMsPerSecond - a.totalWaitTimeMsPerSecond)
          .map(t => t.waitType)
      }
      const selected = this.selectedWaitTypes
      if (selected.length === 0) return []
      const rows = await db.getWaitStatsForTypes(selected, ...args)
      return groupSeries(rows, r => r.waitType, r => r.collectionTime, r => r.waitTimeMsPerSecond)
    })
  }

  private loadPerfmon(db: DatabaseService): Promise<void> {
    const args = this.rangeArgs
    return this.loadChart(this.perfmonChart, "perfmon counters", async () => {
      if (this.selectedCounters.length === 0) return []
      const rows = await db.getPerfmonStats(this.selectedCounters, ...args)
      return groupSeries(rows, r => r.counterName, r => r.collectionTime, r => r.value)
    })
  }
}
