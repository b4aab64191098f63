import type { GridView } from "../../grid-filter"
import type { DatabaseService } from "../database-service"
import { createTimeRange, type TimeRange } from "../time-range"
import type { ChartSeries } from "../types"

export interface ChartState {
  series: ChartSeries[]
  error: string | null
  loadedAt: Date | null
}

export function emptyChart(): ChartState {
  return { series: [], error: null, loadedAt: null }
}

export function hasData(chart: ChartState): boolean {
  return chart.series.some(s => s.points.length > 0)
}

/**
 * A dashboard tab bound to one server's DatabaseService. Each refresh runs
 * every loader concurrently; a loader that fails logs the error and leaves
 * its grid or chart empty without affecting the others.
 */
export abstract class ContentTab {
  protected db: DatabaseService | null = null
  private range: TimeRange = createTimeRange()
  lastRefreshed: Date | null = null

  constructor(readonly name: string) {}

  get isInitialized(): boolean {
    return this.db !== null
  }

  get timeRange(): TimeRange {
    return this.range
  }

  initialize(db: DatabaseService, hoursBack?: number) {
    this.db = db
    if (hoursBack !== undefined) this.setTimeRange(hoursBack)
  }

  setTimeRange(hoursBack: number, fromDate?: Date | null, toDate?: Date | null) {
    this.range = createTimeRange(hoursBack, fromDate, toDate)
  }

  async refreshAll(): Promise<void> {
    const db = this.db
    if (!db) return

    await Promise.all(this.loaders(db))
    this.lastRefreshed = new Date()
  }

  // One promise per grid or chart; each must settle without rejecting
  protected abstract loaders(db: DatabaseService): Promise<void>[]

  // hoursBack, fromDate, toDate as every range fetch takes them
  protected get rangeArgs(): [number, Date | null, Date | null] {
    return [this.range.hoursBack, this.range.fromDate, this.range.toDate]
  }

  protected async loadGrid<T>(grid: GridView<T>, what: string, fetch: () => Promise<T[]>): Promise<void> {
    try {
      grid.load(await fetch())
    } catch (error) {
      grid.fail(this.logLoadError(what, error))
    }
  }

  protected async loadChart(chart: ChartState, what: string, fetch: () => Promise<ChartSeries[]>): Promise<void> {
    try {
      chart.series = await fetch()
      chart.error = null
    } catch (error) {
      chart.series = []
      chart.error = this.logLoadError(what, error)
    }
    chart.loadedAt = new Date()
  }

  protected logLoadError(what: string, error: unknown): string {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`[${this.name}] Error loading ${what}: ${message}`)
    return message
  }
}
