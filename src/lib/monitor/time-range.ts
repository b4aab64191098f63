export interface TimeRange {
  hoursBack: number
  fromDate: Date | null
  toDate: Date | null
}

export const DEFAULT_HOURS_BACK = 24

export function createTimeRange(hoursBack = DEFAULT_HOURS_BACK, fromDate?: Date | null, toDate?: Date | null): TimeRange {
  if (!Number.isFinite(hoursBack) || hoursBack <= 0) {
    throw new RangeError(`hoursBack must be a positive number, got ${hoursBack}`)
  }
  if (fromDate && toDate && fromDate.getTime() > toDate.getTime()) {
    throw new RangeError("fromDate must not be after toDate")
  }
  return { hoursBack, fromDate: fromDate ?? null, toDate: toDate ?? null }
}

// Effective window: explicit dates when both are set, otherwise the last hoursBack hours
export function resolveTimeRange(range: TimeRange, now: Date = new Date()): { start: Date; end: Date } {
  if (range.fromDate && range.toDate) {
    return { start: range.fromDate, end: range.toDate }
  }
  return {
    start: new Date(now.getTime() - range.hoursBack * 60 * 60 * 1000),
    end: now,
  }
}

export function describeTimeRange(range: TimeRange): string {
  if (range.fromDate && range.toDate) {
    return `${range.fromDate.toISOString()} to ${range.toDate.toISOString()}`
  }
  return range.hoursBack === 1 ? "Last hour" : `Last ${range.hoursBack} hours`
}
