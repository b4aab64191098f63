// Monitoring row models, one per result set

// Query performance

export interface QuerySnapshotItem {
  collectionTime: Date
  sessionId: number
  databaseName: string
  status: string
  elapsedMs: number
  cpuMs: number
  logicalReads: number
  waitType: string | null
  blockingSessionId: number | null
  queryText: string
  hasPlan: boolean
}

export interface QueryStatsItem {
  databaseName: string
  queryHash: string
  objectName: string | null
  executionCount: number
  totalWorkerTimeMs: number
  avgWorkerTimeMs: number
  avgElapsedTimeMs: number
  avgLogicalReads: number
  lastExecutionTime: Date | null
  queryText: string
}

export interface ProcedureStatsItem {
  databaseName: string
  schemaName: string
  procedureName: string
  objectId: number
  executionCount: number
  avgElapsedTimeMs: number
  avgWorkerTimeMs: number
  avgLogicalReads: number
  lastExecutionTime: Date | null
}

export interface QueryStoreItem {
  databaseName: string
  queryId: number
  planId: number
  executionCount: number
  avgDurationMs: number
  avgCpuTimeMs: number
  avgLogicalReads: number
  isForcedPlan: boolean
  lastExecutionTime: Date | null
  queryText: string
}

export interface QueryStoreRegressionItem {
  databaseName: string
  queryId: number
  baselineDurationMs: number
  recentDurationMs: number
  regressionPercent: number
  planCount: number
  queryText: string
}

export interface LongRunningQueryPattern {
  databaseName: string
  queryHash: string
  occurrences: number
  avgDurationSeconds: number
  maxDurationSeconds: number
  lastSeen: Date
  queryText: string
}

export interface DurationTrendItem {
  collectionTime: Date
  avgDurationMs: number
}

export interface ExecutionTrendItem {
  collectionTime: Date
  executionsPerSecond: number
}

// Memory

export interface MemoryStatsItem {
  collectionTime: Date
  bufferPoolMb: number
  planCacheMb: number
  otherMemoryMb: number
  totalMemoryMb: number
}

export interface MemoryGrantStatsItem {
  collectionTime: Date
  poolId: number
  grantedMemoryMb: number
  usedMemoryMb: number
  waiterCount: number
  timeoutErrorCount: number
  forcedGrantCount: number
}

export interface MemoryClerkItem {
  collectionTime: Date
  clerkType: string
  memoryMb: number
}

export interface PlanCacheStatsItem {
  cacheType: string
  objectType: string
  planCount: number
  totalSizeMb: number
  singleUsePlans: number
  singleUseSizeMb: number
}

export interface MemoryPressureEventItem {
  eventTime: Date
  notification: string
  memoryUtilizationPercent: number
  isSystemLow: boolean
  isProcessLow: boolean
}

// Resource metrics

export interface LatchStatsItem {
  collectionTime: Date
  latchClass: string
  waitTimeMsPerSecond: number
  waitingRequestsCount: number
}

export interface SpinlockStatsItem {
  collectionTime: Date
  spinlockName: string
  collisionsPerSecond: number
  backoffs: number
}

export interface TempdbStatsItem {
  collectionTime: Date
  userObjectsMb: number
  internalObjectsMb: number
  versionStoreMb: number
  freeSpaceMb: number
  usedPercent: number
}

export interface SessionStatsItem {
  collectionTime: Date
  programName: string
  loginName: string
  sessionCount: number
  runningCount: number
  sleepingCount: number
}

export interface FileIoLatencyItem {
  collectionTime: Date
  databaseName: string
  fileType: "ROWS" | "LOG"
  readLatencyMs: number
  writeLatencyMs: number
}

export interface WaitStatsPoint {
  collectionTime: Date
  waitType: string
  waitTimeMsPerSecond: number
}

export interface WaitTypeTotal {
  waitType: string
  totalWaitTimeMsPerSecond: number
}

export interface PerfmonStatsItem {
  collectionTime: Date
  objectName: string
  counterName: string
  value: number
}

export interface CpuUtilizationItem {
  collectionTime: Date
  sqlCpuPercent: number
  otherCpuPercent: number
}

// System health events

export interface HealthParserSystemHealthItem {
  eventTime: Date
  state: string
  processUtilization: number
  pageFaults: number
  badPagesDetected: number
}

export interface HealthParserSevereErrorItem {
  eventTime: Date
  errorNumber: number
  severity: number
  state: number
  message: string
  databaseName: string | null
}

export interface HealthParserIOIssueItem {
  eventTime: Date
  state: string
  ioLatchTimeouts: number
  longestPendingRequestsMs: number
  filePath: string | null
}

export interface HealthParserSchedulerIssueItem {
  eventTime: Date
  nonYieldingTasksReported: number
  schedulerId: number | null
  isNonYield: boolean
}

export interface HealthParserMemoryConditionItem {
  eventTime: Date
  lastNotification: string
  outOfMemoryExceptions: number
  isAnyPoolOutOfMemory: boolean
  processOutOfMemoryPercent: number
}

export interface HealthParserCpuTaskItem {
  eventTime: Date
  maxWorkers: number
  workersCreated: number
  workersIdle: number
  tasksCompletedWithinInterval: number
  pendingTasks: number
  hasUnresolvableDeadlock: boolean
}

export interface HealthParserMemoryBrokerItem {
  eventTime: Date
  broker: string
  notification: string
  currentPages: number
  targetPages: number
}

export interface HealthParserMemoryNodeOomItem {
  eventTime: Date
  nodeId: number
  failedAllocationMb: number
  availablePhysicalMemoryMb: number
  message: string
}

// Configuration changes

export interface ServerConfigChangeItem {
  changeTime: Date
  configurationName: string
  oldValue: string
  newValue: string
  requiresRestart: boolean
  isDynamic: boolean
  isAdvanced: boolean
}

export interface DatabaseConfigChangeItem {
  changeTime: Date
  databaseName: string
  settingName: string
  oldValue: string
  newValue: string
}

export interface TraceFlagChangeItem {
  changeTime: Date
  traceFlag: number
  previousStatus: string
  newStatus: string
  isGlobal: boolean
  isSession: boolean
}

// Default trace

export interface DefaultTraceEventItem {
  eventTime: Date
  eventName: string
  databaseName: string | null
  loginName: string | null
  hostName: string | null
  objectName: string | null
  textData: string | null
}

export interface TraceAnalysisItem {
  eventName: string
  eventCount: number
  firstSeen: Date
  lastSeen: Date
  distinctLogins: number
}

// Landing page health snapshot

export interface HealthSnapshot {
  cpuPercent: number | null
  otherCpuPercent: number | null
  bufferPoolGb: number | null
  grantedMemoryGb: number | null
  requestsWaitingForMemory: number
  totalBlocked: number
  longestBlockedSeconds: number
  lastBlockingMinutesAgo: number | null
  totalThreads: number
  availableThreads: number
  threadsWaitingForCpu: number
  requestsWaitingForThreads: number
  deadlockCount: number
  lastDeadlockMinutesAgo: number | null
  healthyCollectorCount: number
  failedCollectorCount: number
  topWaitType: string | null
  topWaitDurationSeconds: number
  poisonWaitAvgMs: number
  longestRunningQueryMinutes: number | null
  tempdbUsedPercent: number | null
}

// Charts

export interface ChartPoint {
  time: Date
  value: number
}

export interface ChartSeries {
  name: string
  points: ChartPoint[]
}
