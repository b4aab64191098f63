import type { AlertLog } from "../../alert-log"
import { DEFAULT_THRESHOLDS, type AlertThresholds } from "../../config"
import type { AlertNotifier } from "../../notifications"
import { AutoRefresh } from "../../scheduler"
import type { ServerConnection, ServerCredential, ServerManager } from "../../servers"
import { AlertStateTracker, evaluateAlerts, type AlertEvent } from "../alerts"
import type { DatabaseService } from "../database-service"
import { ServerHealthStatus } from "../health"

export type DatabaseServiceFactory = (server: ServerConnection, credential: ServerCredential | null) => DatabaseService

export interface LandingPageOptions {
  thresholds?: AlertThresholds
  notifier?: AlertNotifier | null
  alertLog?: AlertLog | null
  timezone?: string
}

/**
 * One health card per monitored server. Servers refresh independently:
 * a slow or failing server never holds up the others.
 */
export class LandingPage {
  private readonly statuses = new Map<string, ServerHealthStatus>()
  private readonly tracker = new AlertStateTracker()
  private readonly thresholds: AlertThresholds
  private readonly notifier: AlertNotifier | null
  private readonly alertLog: AlertLog | null
  private readonly autoRefresh: AutoRefresh
  private initialized = false

  constructor(
    private readonly servers: ServerManager,
    private readonly createService: DatabaseServiceFactory,
    options: LandingPageOptions = {}
  ) {
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS
    this.notifier = options.notifier ?? null
    this.alertLog = options.alertLog ?? null
    this.autoRefresh = new AutoRefresh("landing page", () => this.refreshAll(), options.timezone)
  }

  get isInitialized(): boolean {
    return this.initialized
  }

  // Cards in server list order (favorites first)
  get cards(): ServerHealthStatus[] {
    return this.servers.list()
      .map(s => this.statuses.get(s.id))
      .filter((s): s is ServerHealthStatus => s !== undefined)
  }

  get isAutoRefreshing(): boolean {
    return this.autoRefresh.isScheduled
  }

  async initialize(): Promise<void> {
    await this.servers.load()
    this.syncServers()
    this.initialized = true
    console.log(`[LandingPage] Initialized with ${this.statuses.size} server(s)`)
  }

  async refreshAll(): Promise<void> {
    if (!this.initialized) return

    this.syncServers()
    const events = await Promise.all(this.cards.map(status => this.refreshServer(status)))

    if (events.some(e => e.length > 0)) {
      await this.alertLog?.save()
    }
  }

  // Returns the alert events raised by this refresh
  async refreshServer(status: ServerHealthStatus): Promise<AlertEvent[]> {
    status.isLoading = true
    try {
      const service = this.createService(status.server, this.servers.getCredential(status.serverId))
      status.applySnapshot(await service.getHealthSnapshot())
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error(`[LandingPage] Error refreshing ${status.displayName}: ${message}`)
      status.markOffline(message)
      return []
    } finally {
      status.isLoading = false
    }

    return this.processAlerts(status)
  }

  startAutoRefresh(intervalSeconds: number): boolean {
    return this.autoRefresh.start(intervalSeconds)
  }

  stopAutoRefresh() {
    this.autoRefresh.stop()
  }

  private async processAlerts(status: ServerHealthStatus): Promise<AlertEvent[]> {
    const events = this.tracker.update(status, evaluateAlerts(status, this.thresholds))
    for (const event of events) {
      console.log(`[Alerts] ${event.metric}: ${event.message}`)
      if (this.notifier) await this.notifier.notify(event)
    }
    return events
  }

  // Adds cards for new servers, re-points edited ones and drops removed ones
  private syncServers() {
    const current = new Set<string>()
    for (const server of this.servers.list()) {
      current.add(server.id)
      const status = this.statuses.get(server.id)
      if (!status) {
        this.statuses.set(server.id, new ServerHealthStatus(server))
      } else if (status.server !== server) {
        if (status.server.serverName !== server.serverName) this.tracker.reset(server.id)
        status.rebind(server)
      }
    }
    for (const id of Array.from(this.statuses.keys())) {
      if (!current.has(id)) {
        this.statuses.delete(id)
        this.tracker.reset(id)
      }
    }
  }
}
