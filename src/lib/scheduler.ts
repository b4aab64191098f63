import cron from "node-cron"

// Six-field expression (with seconds) for a refresh interval; null means off
export function toCronExpression(intervalSeconds: number): string | null {
  if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) return null
  if (intervalSeconds < 60) {
    return `*/${Math.max(1, Math.round(intervalSeconds))} * * * * *`
  }
  return `0 */${Math.max(1, Math.round(intervalSeconds / 60))} * * * *`
}

/**
 * Runs a refresh callback on a cron schedule. A tick that fires while the
 * previous one is still running is skipped.
 */
export class AutoRefresh {
  private task: cron.ScheduledTask | null = null
  private inFlight = false
  private expression: string | null = null

  constructor(
    private readonly name: string,
    private readonly refresh: () => Promise<void>,
    private readonly timezone?: string
  ) {}

  get isScheduled(): boolean {
    return this.task !== null
  }

  get isRefreshing(): boolean {
    return this.inFlight
  }

  get schedule(): string | null {
    return this.expression
  }

  start(intervalSeconds: number): boolean {
    this.stop()

    const expression = toCronExpression(intervalSeconds)
    if (!expression) {
      console.log(`[Scheduler] Auto-refresh for ${this.name} is off`)
      return false
    }

    if (!cron.validate(expression)) {
      console.error(`[Scheduler] Invalid cron expression for ${this.name}: ${expression}`)
      return false
    }

    this.task = cron.schedule(expression, async () => {
      await this.tick()
    }, {
      timezone: this.timezone
    })
    this.expression = expression

    console.log(`[Scheduler] Auto-refresh for ${this.name} with cron: ${expression}`)
    return true
  }

  stop() {
    if (!this.task) return
    this.task.stop()
    this.task = null
    this.expression = null
    console.log(`[Scheduler] Stopped auto-refresh for ${this.name}`)
  }

  // Returns false when skipped because the previous tick is still running
  async tick(): Promise<boolean> {
    if (this.inFlight) {
      console.log(`[Scheduler] Previous refresh of ${this.name} still running, skipping`)
      return false
    }

    this.inFlight = true
    try {
      await this.refresh()
    } catch (error) {
      console.error(`[Scheduler] Refresh of ${this.name} failed:`, error)
    } finally {
      this.inFlight = false
    }
    return true
  }
}
