import { GridView } from "../../grid-filter"
import type { DatabaseService } from "../database-service"
import { aggregateTimeSeries, groupSeries } from "../series"
import type { MemoryGrantStatsItem, MemoryPressureEventItem, MemoryStatsItem, PlanCacheStatsItem } from "../types"
import { ContentTab, emptyChart } from "./content-tab"

export const DEFAULT_CLERK_COUNT = 5

const OVERVIEW_SERIES: [string, (row: MemoryStatsItem) => number][] = [
  ["Buffer Pool", r => r.bufferPoolMb],
  ["Plan Cache", r => r.planCacheMb],
  ["Other", r => r.otherMemoryMb],
  ["Total", r => r.totalMemoryMb],
]

export class MemoryContent extends ContentTab {
  readonly memoryGrants = new GridView<MemoryGrantStatsItem>("memoryGrants")
  readonly planCache = new GridView<PlanCacheStatsItem>("planCache")
  readonly pressureEvents = new GridView<MemoryPressureEventItem>("pressureEvents")

  readonly overviewChart = emptyChart()
  readonly clerksChart = emptyChart()

  // Clerk types offered for selection, largest first
  availableClerkTypes: string[] = []
  private selectedClerks: string[] | null = null

  constructor() {
    super("Memory")
  }

  get selectedClerkTypes(): string[] {
    return this.selectedClerks ?? this.availableClerkTypes.slice(0, DEFAULT_CLERK_COUNT)
  }

  protected loaders(db: DatabaseService): Promise<void>[] {
    const args = this.rangeArgs
    return [
      this.loadGrid(this.memoryGrants, "memory grant stats", () => db.getMemoryGrantStats(...args)),
      this.loadGrid(this.planCache, "plan cache stats", () => db.getPlanCacheStats(...args)),
      this.loadGrid(this.pressureEvents, "memory pressure events", () => db.getMemoryPressureEvents(...args)),
      this.loadChart(this.overviewChart, "memory overview", async () => {
        const rows = await db.getMemoryStats(...args)
        return OVERVIEW_SERIES.map(([name, valueOf]) => ({
          name,
          points: aggregateTimeSeries(rows, r => r.collectionTime, valueOf),
        }))
      }),
      this.loadClerks(db, true),
    ]
  }

  // Re-queries only the clerk chart
  async setSelectedClerkTypes(clerkTypes: string[]): Promise<void> {
    this.selectedClerks = [...clerkTypes]
    if (this.db) await this.loadClerks(this.db, false)
  }

  private loadClerks(db: DatabaseService, refreshTypes: boolean): Promise<void> {
    const args = this.rangeArgs
    return this.loadChart(this.clerksChart, "memory clerks", async () => {
      if (refreshTypes) {
        this.availableClerkTypes = await db.getMemoryClerkTypes(...args)
      }
      const selected = this.selectedClerkTypes
      if (selected.length === 0) return []
      const rows = await db.getMemoryClerks(selected, ...args)
      return groupSeries(rows, r => r.clerkType, r => r.collectionTime, r => r.memoryMb)
    })
  }
}
