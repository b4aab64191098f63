import { GridView } from "../../grid-filter"
import type { DatabaseService } from "../database-service"
import type { DefaultTraceEventItem, TraceAnalysisItem } from "../types"
import { ContentTab } from "./content-tab"

export class DefaultTraceContent extends ContentTab {
  readonly events = new GridView<DefaultTraceEventItem>("defaultTraceEvents")
  readonly analysis = new GridView<TraceAnalysisItem>("traceAnalysis")

  // null shows every event
  private eventName: string | null = null

  constructor() {
    super("DefaultTrace")
  }

  get eventNameFilter(): string | null {
    return this.eventName
  }

  async setEventNameFilter(eventName: string | null): Promise<void> {
    this.eventName = eventName?.trim() || null
    if (this.db) await this.loadEvents(this.db)
  }

  protected loaders(db: DatabaseService): Promise<void>[] {
    return [
      this.loadEvents(db),
      this.loadGrid(this.analysis, "trace analysis", () => db.getTraceAnalysis(...this.rangeArgs)),
    ]
  }

  private loadEvents(db: DatabaseService): Promise<void> {
    const [hoursBack, fromDate, toDate] = this.rangeArgs
    return this.loadGrid(this.events, "default trace events", () =>
      db.getDefaultTraceEvents(hoursBack, fromDate, toDate, this.eventName))
  }
}
