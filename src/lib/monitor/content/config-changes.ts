import { GridView } from "../../grid-filter"
import type { DatabaseService } from "../database-service"
import type { DatabaseConfigChangeItem, ServerConfigChangeItem, TraceFlagChangeItem } from "../types"
import { ContentTab } from "./content-tab"

// Tri-state filters: requiresRestart, isDynamic, isAdvanced on server changes; isGlobal, isSession on trace flags
export class ConfigChangesContent extends ContentTab {
  readonly serverConfigChanges = new GridView<ServerConfigChangeItem>("serverConfigChanges")
  readonly databaseConfigChanges = new GridView<DatabaseConfigChangeItem>("databaseConfigChanges")
  readonly traceFlagChanges = new GridView<TraceFlagChangeItem>("traceFlagChanges")

  constructor() {
    super("ConfigChanges")
  }

  protected loaders(db: DatabaseService): Promise<void>[] {
    const args = this.rangeArgs
    return [
      this.loadGrid(this.serverConfigChanges, "server config changes", () => db.getServerConfigChanges(...args)),
      this.loadGrid(this.databaseConfigChanges, "database config changes", () => db.getDatabaseConfigChanges(...args)),
      this.loadGrid(this.traceFlagChanges, "trace flag changes", () => db.getTraceFlagChanges(...args)),
    ]
  }
}
