// Display settings for every formatted date; overridden from config at startup
let displayTimezone: string | undefined
let displayLocale = "en-US"

export function configureDateDisplay(settings: { timezone?: string; locale?: string }) {
  if (settings.timezone) displayTimezone = settings.timezone
  if (settings.locale) displayLocale = settings.locale
}

// Format date with the configured locale and timezone
export function formatDate(date: Date | string | null | undefined): string {
  if (!date) return "-"
  return new Date(date).toLocaleString(displayLocale, {
    timeZone: displayTimezone,
    day: "2-digit",
    month: "2-digit",
    year: "numeric",
    hour: "2-digit",
    minute: "2-digit"
  })
}

// Format time only
export function formatTime(date: Date | string | null | undefined): string {
  if (!date) return "-"
  return new Date(date).toLocaleTimeString(displayLocale, {
    timeZone: displayTimezone,
    hour: "2-digit",
    minute: "2-digit"
  })
}

// Format duration in seconds
export function formatDuration(seconds: number | null | undefined): string {
  if (seconds === null || seconds === undefined) return "-"
  if (seconds === 0) return "<1s"
  if (seconds < 60) return `${seconds}s`
  const mins = Math.floor(seconds / 60)
  const secs = seconds % 60
  if (mins < 60) return `${mins}m ${secs}s`
  const hours = Math.floor(mins / 60)
  const remainingMins = mins % 60
  return `${hours}h ${remainingMins}m`
}

// "just now", "5m ago", "3h ago", "2d ago", "1w ago"
export function formatMinutesAgo(minutes: number): string {
  if (minutes < 1) return "just now"
  if (minutes < 60) return `${Math.floor(minutes)}m ago`
  if (minutes < 1440) return `${Math.floor(minutes / 60)}h ago`
  if (minutes < 10080) return `${Math.floor(minutes / 1440)}d ago`
  return `${Math.floor(minutes / 10080)}w ago`
}

// Age of a refresh timestamp, e.g. "Just now" or "12m ago"
export function formatLastUpdated(date: Date | null | undefined, now: Date = new Date()): string {
  if (!date) return "Never"
  const elapsedSeconds = (now.getTime() - date.getTime()) / 1000
  if (elapsedSeconds < 60) return "Just now"
  if (elapsedSeconds < 3600) return `${Math.floor(elapsedSeconds / 60)}m ago`
  return `${Math.floor(elapsedSeconds / 3600)}h ago`
}
