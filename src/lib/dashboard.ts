import { AlertLog } from "./alert-log"
import { loadConfig, type DashboardConfig } from "./config"
import { configureDateDisplay } from "./date-utils"
import type { DatabaseService } from "./monitor/database-service"
import {
  AlertsHistoryContent,
  ConfigChangesContent,
  DefaultTraceContent,
  LandingPage,
  MemoryContent,
  QueryPerformanceContent,
  ResourceMetricsContent,
  SystemEventsContent,
  type DatabaseServiceFactory,
} from "./monitor/content"
import { AlertNotifier } from "./notifications"
import { ServerManager, credentialStoreFromEnv } from "./servers"

export interface ServerTabs {
  queryPerformance: QueryPerformanceContent
  memory: MemoryContent
  resourceMetrics: ResourceMetricsContent
  systemEvents: SystemEventsContent
  configChanges: ConfigChangesContent
  defaultTrace: DefaultTraceContent
}

export interface Dashboard {
  config: DashboardConfig
  servers: ServerManager
  alertLog: AlertLog
  notifier: AlertNotifier
  landingPage: LandingPage
  alertsHistory: AlertsHistoryContent
  openServer(service: DatabaseService): Promise<ServerTabs>
  stop(): Promise<void>
}

/**
 * Wires config, servers, alerting and the landing page, then runs the first
 * refresh and starts auto-refresh.
 */
export async function startDashboard(
  createService: DatabaseServiceFactory,
  env: Record<string, string | undefined> = process.env
): Promise<Dashboard> {
  console.log("[Dashboard] Starting...")

  const config = loadConfig(env)
  configureDateDisplay({ timezone: config.timezone, locale: config.locale })

  const servers = new ServerManager(config.dataDir, credentialStoreFromEnv(env))
  const alertLog = new AlertLog(config.dataDir)
  await alertLog.load()

  const notifier = new AlertNotifier(config.smtp, alertLog, { cooldownMinutes: config.alertCooldownMinutes })
  const landingPage = new LandingPage(servers, createService, {
    thresholds: config.thresholds,
    notifier,
    alertLog,
    timezone: config.timezone,
  })
  await landingPage.initialize()
  await landingPage.refreshAll()
  landingPage.startAutoRefresh(config.autoRefreshSeconds)

  const alertsHistory = new AlertsHistoryContent()
  alertsHistory.initialize(alertLog)
  await alertsHistory.refreshAll()

  console.log(`[Dashboard] Started with data directory ${config.dataDir}`)

  return {
    config,
    servers,
    alertLog,
    notifier,
    landingPage,
    alertsHistory,

    // Server detail tabs, all loaded for the configured look-back
    async openServer(service) {
      const tabs: ServerTabs = {
        queryPerformance: new QueryPerformanceContent(),
        memory: new MemoryContent(),
        resourceMetrics: new ResourceMetricsContent(),
        systemEvents: new SystemEventsContent(),
        configChanges: new ConfigChangesContent(),
        defaultTrace: new DefaultTraceContent(),
      }
      const all = Object.values(tabs)
      for (const tab of all) tab.initialize(service, config.defaultHoursBack)
      await Promise.all(all.map(tab => tab.refreshAll()))
      return tabs
    },

    async stop() {
      landingPage.stopAutoRefresh()
      await alertLog.save()
      console.log("[Dashboard] Stopped")
    },
  }
}
