import path from "path"

export interface AlertThresholds {
  cpuPercent: number
  blockingSeconds: number
  deadlockCount: number
  poisonWaitAvgMs: number
  longRunningQueryMinutes: number
  tempdbUsedPercent: number
}

export interface SmtpSettings {
  enabled: boolean
  host: string
  port: number
  secure: boolean
  username: string
  password: string
  from: string
  recipients: string[]
}

export interface DashboardConfig {
  dataDir: string
  defaultHoursBack: number
  autoRefreshSeconds: number
  timezone: string
  locale: string
  thresholds: AlertThresholds
  smtp: SmtpSettings
  alertCooldownMinutes: number
}

export const DEFAULT_THRESHOLDS: AlertThresholds = {
  cpuPercent: 90,
  blockingSeconds: 30,
  deadlockCount: 1,
  poisonWaitAvgMs: 500,
  longRunningQueryMinutes: 30,
  tempdbUsedPercent: 80,
}

type Env = Record<string, string | undefined>

function readNumber(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === "") return fallback
  const value = Number(raw)
  if (!Number.isFinite(value) || value < min) {
    console.warn(`[Config] Ignoring invalid ${key}=${raw}, using ${fallback}`)
    return fallback
  }
  return value
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase()
  if (!raw) return fallback
  return raw === "true" || raw === "1" || raw === "yes"
}

function readList(env: Env, key: string): string[] {
  return (env[key] ?? "").split(",").map(e => e.trim()).filter(Boolean)
}

// Settings come from the environment; anything unset or invalid falls back to its default
export function loadConfig(env: Env = process.env): DashboardConfig {
  const smtpPort = readNumber(env, "SMTP_PORT", 587, 1)

  return {
    dataDir: path.resolve(env.DASHBOARD_DATA_DIR || "./data"),
    defaultHoursBack: readNumber(env, "DASHBOARD_HOURS_BACK", 24, 1),
    autoRefreshSeconds: readNumber(env, "DASHBOARD_AUTO_REFRESH_SECONDS", 60),
    timezone: env.DASHBOARD_TIMEZONE || Intl.DateTimeFormat().resolvedOptions().timeZone,
    locale: env.DASHBOARD_LOCALE || "en-US",
    thresholds: {
      cpuPercent: readNumber(env, "ALERT_CPU_PERCENT", DEFAULT_THRESHOLDS.cpuPercent),
      blockingSeconds: readNumber(env, "ALERT_BLOCKING_SECONDS", DEFAULT_THRESHOLDS.blockingSeconds),
      deadlockCount: readNumber(env, "ALERT_DEADLOCKS", DEFAULT_THRESHOLDS.deadlockCount, 1),
      poisonWaitAvgMs: readNumber(env, "ALERT_POISON_WAIT_MS", DEFAULT_THRESHOLDS.poisonWaitAvgMs),
      longRunningQueryMinutes: readNumber(env, "ALERT_LONG_QUERY_MINUTES", DEFAULT_THRESHOLDS.longRunningQueryMinutes),
      tempdbUsedPercent: readNumber(env, "ALERT_TEMPDB_PERCENT", DEFAULT_THRESHOLDS.tempdbUsedPercent),
    },
    smtp: {
      enabled: readBoolean(env, "SMTP_ENABLED", false),
      host: env.SMTP_HOST ?? "",
      port: smtpPort,
      secure: readBoolean(env, "SMTP_SECURE", smtpPort === 465),
      username: env.SMTP_USER ?? "",
      // App passwords are often pasted with spaces
      password: (env.SMTP_PASSWORD ?? "").replace(/\s/g, ""),
      from: env.SMTP_FROM ?? "",
      recipients: readList(env, "SMTP_RECIPIENTS"),
    },
    alertCooldownMinutes: readNumber(env, "ALERT_COOLDOWN_MINUTES", 15),
  }
}
