export { ContentTab, emptyChart, hasData } from "./content-tab"
export type { ChartState } from "./content-tab"
export { QueryPerformanceContent } from "./query-performance"
export type { PlanSource } from "./query-performance"
export { MemoryContent, DEFAULT_CLERK_COUNT } from "./memory"
export { ResourceMetricsContent, DEFAULT_PERFMON_COUNTERS, TOP_N_LATCHES } from "./resource-metrics"
export { SystemEventsContent } from "./system-events"
export { ConfigChangesContent } from "./config-changes"
export { DefaultTraceContent } from "./default-trace"
export { AlertsHistoryContent, ALERT_HISTORY_LIMIT, DEFAULT_ALERT_HOURS_BACK } from "./alerts-history"
export type { AlertHistoryRow } from "./alerts-history"
export { LandingPage } from "./landing-page"
export type { DatabaseServiceFactory, LandingPageOptions } from "./landing-page"
