import { GridView } from "../../grid-filter"
import type { DatabaseService } from "../database-service"
import type {
  HealthParserCpuTaskItem,
  HealthParserIOIssueItem,
  HealthParserMemoryBrokerItem,
  HealthParserMemoryConditionItem,
  HealthParserMemoryNodeOomItem,
  HealthParserSchedulerIssueItem,
  HealthParserSevereErrorItem,
  HealthParserSystemHealthItem,
} from "../types"
import { ContentTab } from "./content-tab"

// system_health session events, one grid per event kind
export class SystemEventsContent extends ContentTab {
  readonly systemHealth = new GridView<HealthParserSystemHealthItem>("systemHealth")
  readonly severeErrors = new GridView<HealthParserSevereErrorItem>("severeErrors")
  readonly ioIssues = new GridView<HealthParserIOIssueItem>("ioIssues")
  readonly schedulerIssues = new GridView<HealthParserSchedulerIssueItem>("schedulerIssues")
  readonly memoryConditions = new GridView<HealthParserMemoryConditionItem>("memoryConditions")
  readonly cpuTasks = new GridView<HealthParserCpuTaskItem>("cpuTasks")
  readonly memoryBroker = new GridView<HealthParserMemoryBrokerItem>("memoryBroker")
  readonly memoryNodeOom = new GridView<HealthParserMemoryNodeOomItem>("memoryNodeOom")

  constructor() {
    super("SystemEvents")
  }

  protected loaders(db: DatabaseService): Promise<void>[] {
    const args = this.rangeArgs
    return [
      this.loadGrid(this.systemHealth, "system health", () => db.getHealthParserSystemHealth(...args)),
      this.loadGrid(this.severeErrors, "severe errors", () => db.getHealthParserSevereErrors(...args)),
      this.loadGrid(this.ioIssues, "I/O issues", () => db.getHealthParserIoIssues(...args)),
      this.loadGrid(this.schedulerIssues, "scheduler issues", () => db.getHealthParserSchedulerIssues(...args)),
      this.loadGrid(this.memoryConditions, "memory conditions", () => db.getHealthParserMemoryConditions(...args)),
      this.loadGrid(this.cpuTasks, "CPU tasks", () => db.getHealthParserCpuTasks(...args)),
      this.loadGrid(this.memoryBroker, "memory broker", () => db.getHealthParserMemoryBroker(...args)),
      this.loadGrid(this.memoryNodeOom, "memory node OOM", () => db.getHealthParserMemoryNodeOom(...args)),
    ]
  }
}
