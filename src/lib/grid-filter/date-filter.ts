// Quick filter text for date columns.
//   ">= 2026-01-01", "< yesterday", "2026-01-01..2026-01-31", "'2026-01-01'-'2026-01-10'"
//   "today", "yesterday", "tomorrow", "now", "last 7 days"
// Ranges include the whole end day. Unparseable text never excludes a row.

const LOCAL_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?$/
const ZONED_DATE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i
const LAST_N = /^last\s+(\d+)\s+(hour|hours|day|days|week|weeks|month|months)$/

export function matchesDateFilter(
  value: unknown,
  filterText: string | null | undefined,
  now: Date = new Date()
): boolean {
  if (value === null || value === undefined || !filterText || !filterText.trim()) return true

  const text = filterText.trim()
  const dateValue = toDate(value)
  if (!dateValue) return true
  const time = dateValue.getTime()

  if (text.includes("'-'") || text.includes("\"-\"")) {
    return evaluateQuotedRange(time, text)
  }

  if (text.includes("..")) {
    return evaluateRange(time, text, now)
  }

  for (const operator of [">=", "<=", ">", "<"] as const) {
    if (!text.startsWith(operator)) continue
    const threshold = parseDateExpression(text.slice(operator.length), now)
    if (!threshold) return true
    const limit = threshold.getTime()
    switch (operator) {
      case ">=":
        return time >= limit
      case "<=":
        return time <= limit
      case ">":
        return time > limit
      case "<":
        return time < limit
    }
  }

  const threshold = parseDateExpression(text, now)
  if (!threshold) return true

  const lower = text.toLowerCase()
  // "last 7 days" means everything since the threshold
  if (LAST_N.test(lower)) return time >= threshold.getTime()
  // today / yesterday / tomorrow match the whole calendar day
  if (lower === "today" || lower === "yesterday" || lower === "tomorrow") {
    return sameDay(dateValue, threshold)
  }
  return Math.abs(time - threshold.getTime()) < 1000
}

export function parseDateExpression(expression: string, now: Date = new Date()): Date | null {
  const text = stripQuotes(expression.trim())
  const lower = text.toLowerCase()

  switch (lower) {
    case "today":
      return startOfDay(now)
    case "yesterday":
      return addDays(startOfDay(now), -1)
    case "tomorrow":
      return addDays(startOfDay(now), 1)
    case "now":
      return new Date(now.getTime())
  }

  const last = LAST_N.exec(lower)
  if (last) {
    const count = Number(last[1])
    const unit = last[2]
    if (unit.startsWith("hour")) return new Date(now.getTime() - count * 60 * 60 * 1000)
    if (unit.startsWith("day")) return addDays(now, -count)
    if (unit.startsWith("week")) return addDays(now, -count * 7)
    const result = new Date(now.getTime())
    result.setMonth(result.getMonth() - count)
    return result
  }

  return parseAbsoluteDate(text)
}

// "YYYY-MM-DD[ HH:MM[:SS]]" is read as local time; ISO strings with a zone keep their zone
export function parseAbsoluteDate(text: string): Date | null {
  const match = LOCAL_DATE.exec(text.trim())
  if (match) {
    const [, y, mo, d, h, mi, s, ms] = match
    const date = new Date(
      Number(y),
      Number(mo) - 1,
      Number(d),
      Number(h ?? 0),
      Number(mi ?? 0),
      Number(s ?? 0),
      Number((ms ?? "0").padEnd(3, "0"))
    )
    // Reject rollovers like 2026-02-31
    if (date.getMonth() !== Number(mo) - 1 || date.getDate() !== Number(d)) return null
    return date
  }

  if (ZONED_DATE.test(text.trim())) {
    const parsed = new Date(text.trim())
    return Number.isNaN(parsed.getTime()) ? null : parsed
  }

  return null
}

function evaluateRange(time: number, text: string, now: Date): boolean {
  const parts = text.split("..")
  if (parts.length !== 2) return true

  const min = parseDateExpression(parts[0], now)
  const max = parseDateExpression(parts[1], now)
  if (!min || !max) return true

  return time >= startOfDay(min).getTime() && time <= endOfDay(max).getTime()
}

function evaluateQuotedRange(time: number, text: string): boolean {
  const delimiter = text.includes("'-'") ? "'-'" : "\"-\""
  const parts = text.split(delimiter)
  if (parts.length !== 2) return true

  const min = parseAbsoluteDate(parts[0].trim().replace(/^['"]+|['"]+$/g, ""))
  const max = parseAbsoluteDate(parts[1].trim().replace(/^['"]+|['"]+$/g, ""))
  if (!min || !max) return true

  return time >= startOfDay(min).getTime() && time <= endOfDay(max).getTime()
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value
  if (typeof value === "string") return parseAbsoluteDate(value)
  return null
}

function stripQuotes(text: string): string {
  if (text.length >= 2 && ((text.startsWith("'") && text.endsWith("'")) || (text.startsWith("\"") && text.endsWith("\"")))) {
    return text.slice(1, -1).trim()
  }
  return text
}

function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate())
}

function endOfDay(date: Date): Date {
  return new Date(addDays(startOfDay(date), 1).getTime() - 1)
}

// Calendar arithmetic so DST shifts keep the wall-clock time
function addDays(date: Date, days: number): Date {
  const result = new Date(date.getTime())
  result.setDate(result.getDate() + days)
  return result
}

function sameDay(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate()
}
