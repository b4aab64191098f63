import type {
  CpuUtilizationItem,
  DatabaseConfigChangeItem,
  DefaultTraceEventItem,
  DurationTrendItem,
  ExecutionTrendItem,
  FileIoLatencyItem,
  HealthParserCpuTaskItem,
  HealthParserIOIssueItem,
  HealthParserMemoryBrokerItem,
  HealthParserMemoryConditionItem,
  HealthParserMemoryNodeOomItem,
  HealthParserSchedulerIssueItem,
  HealthParserSevereErrorItem,
  HealthParserSystemHealthItem,
  HealthSnapshot,
  LatchStatsItem,
  LongRunningQueryPattern,
  MemoryClerkItem,
  MemoryGrantStatsItem,
  MemoryPressureEventItem,
  MemoryStatsItem,
  PerfmonStatsItem,
  PlanCacheStatsItem,
  ProcedureStatsItem,
  QuerySnapshotItem,
  QueryStatsItem,
  QueryStoreItem,
  QueryStoreRegressionItem,
  ServerConfigChangeItem,
  SessionStatsItem,
  SpinlockStatsItem,
  TempdbStatsItem,
  TraceAnalysisItem,
  TraceFlagChangeItem,
  WaitStatsPoint,
  WaitTypeTotal,
} from "./types"

// Every range-based fetch takes the look-back window; explicit dates win when both are set
export type RangeFetch<T> = (hoursBack: number, fromDate?: Date | null, toDate?: Date | null) => Promise<T[]>

/**
 * Data access for one monitored server. The SQL behind it lives outside this
 * package; every method may reject on connectivity or query failure.
 */
export interface DatabaseService {
  // Query performance
  getQuerySnapshots: RangeFetch<QuerySnapshotItem>
  getQueryStats: RangeFetch<QueryStatsItem>
  getProcedureStats: RangeFetch<ProcedureStatsItem>
  getQueryStoreData: RangeFetch<QueryStoreItem>
  getQueryStoreRegressions: RangeFetch<QueryStoreRegressionItem>
  getLongRunningQueryPatterns: RangeFetch<LongRunningQueryPattern>
  getQueryDurationTrends: RangeFetch<DurationTrendItem>
  getProcedureDurationTrends: RangeFetch<DurationTrendItem>
  getQueryStoreDurationTrends: RangeFetch<DurationTrendItem>
  getExecutionTrends: RangeFetch<ExecutionTrendItem>

  // Memory
  getMemoryStats: RangeFetch<MemoryStatsItem>
  getMemoryGrantStats: RangeFetch<MemoryGrantStatsItem>
  getMemoryClerks(clerkTypes: string[], hoursBack: number, fromDate?: Date | null, toDate?: Date | null): Promise<MemoryClerkItem[]>
  getMemoryClerkTypes: RangeFetch<string>
  getPlanCacheStats: RangeFetch<PlanCacheStatsItem>
  getMemoryPressureEvents: RangeFetch<MemoryPressureEventItem>

  // Resource metrics
  getLatchStatsTopN(topN: number, hoursBack: number, fromDate?: Date | null, toDate?: Date | null): Promise<LatchStatsItem[]>
  getSpinlockStatsTopN(topN: number, hoursBack: number, fromDate?: Date | null, toDate?: Date | null): Promise<SpinlockStatsItem[]>
  getTempdbStats: RangeFetch<TempdbStatsItem>
  getSessionStats: RangeFetch<SessionStatsItem>
  getFileIoLatency(isTempDb: boolean, hoursBack: number, fromDate?: Date | null, toDate?: Date | null): Promise<FileIoLatencyItem[]>
  getWaitTypeNames: RangeFetch<WaitTypeTotal>
  getWaitStatsForTypes(waitTypes: string[], hoursBack: number, fromDate?: Date | null, toDate?: Date | null): Promise<WaitStatsPoint[]>
  getPerfmonStats(counterNames: string[], hoursBack: number, fromDate?: Date | null, toDate?: Date | null): Promise<PerfmonStatsItem[]>
  getCpuUtilization: RangeFetch<CpuUtilizationItem>

  // System health events
  getHealthParserSystemHealth: RangeFetch<HealthParserSystemHealthItem>
  getHealthParserSevereErrors: RangeFetch<HealthParserSevereErrorItem>
  getHealthParserIoIssues: RangeFetch<HealthParserIOIssueItem>
  getHealthParserSchedulerIssues: RangeFetch<HealthParserSchedulerIssueItem>
  getHealthParserMemoryConditions: RangeFetch<HealthParserMemoryConditionItem>
  getHealthParserCpuTasks: RangeFetch<HealthParserCpuTaskItem>
  getHealthParserMemoryBroker: RangeFetch<HealthParserMemoryBrokerItem>
  getHealthParserMemoryNodeOom: RangeFetch<HealthParserMemoryNodeOomItem>

  // Configuration changes
  getServerConfigChanges: RangeFetch<ServerConfigChangeItem>
  getDatabaseConfigChanges: RangeFetch<DatabaseConfigChangeItem>
  getTraceFlagChanges: RangeFetch<TraceFlagChangeItem>

  // Default trace
  getDefaultTraceEvents(hoursBack: number, fromDate?: Date | null, toDate?: Date | null, eventName?: string | null): Promise<DefaultTraceEventItem[]>
  getTraceAnalysis: RangeFetch<TraceAnalysisItem>

  // Landing page
  getHealthSnapshot(): Promise<HealthSnapshot>
}
