import type { ChartPoint, ChartSeries } from "./types"

// Waits that signal resource exhaustion, always charted when present
export const POISON_WAITS = ["THREADPOOL", "RESOURCE_SEMAPHORE", "RESOURCE_SEMAPHORE_QUERY_COMPILE"]

export const USUAL_SUSPECT_WAITS = [
  "SOS_SCHEDULER_YIELD",
  "CXPACKET",
  "CXCONSUMER",
  "PAGEIOLATCH_SH",
  "PAGEIOLATCH_EX",
  "WRITELOG",
]

export const USUAL_SUSPECT_PREFIXES = ["PAGELATCH_"]

const MAX_DEFAULT_WAITS = 30
const MAX_TOP_WAITS = 10

// Sums values sharing a timestamp and orders points by time
export function aggregateTimeSeries<T>(
  rows: readonly T[],
  timeOf: (row: T) => Date,
  valueOf: (row: T) => number
): ChartPoint[] {
  const buckets = new Map<number, number>()
  for (const row of rows) {
    const time = timeOf(row).getTime()
    buckets.set(time, (buckets.get(time) ?? 0) + valueOf(row))
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => a - b)
    .map(([time, value]) => ({ time: new Date(time), value }))
}

// One series per key, in order of first appearance
export function groupSeries<T>(
  rows: readonly T[],
  keyOf: (row: T) => string,
  timeOf: (row: T) => Date,
  valueOf: (row: T) => number
): ChartSeries[] {
  const groups = new Map<string, T[]>()
  for (const row of rows) {
    const key = keyOf(row)
    const group = groups.get(key)
    if (group) {
      group.push(row)
    } else {
      groups.set(key, [row])
    }
  }

  return Array.from(groups.entries()).map(([name, groupRows]) => ({
    name,
    points: aggregateTimeSeries(groupRows, timeOf, valueOf),
  }))
}

/**
 * Wait types selected by default on the wait stats chart: poison waits and usual
 * suspects present in the data, then up to 10 more in the given order, 30 at most.
 * `available` must be sorted by total wait time, highest first.
 */
export function defaultWaitTypes(available: readonly string[]): string[] {
  const selected = new Map<string, string>()
  const add = (waitType: string) => {
    const key = waitType.toUpperCase()
    if (selected.has(key)) return false
    selected.set(key, waitType)
    return true
  }

  const byKey = new Map(available.map(w => [w.toUpperCase(), w] as const))

  for (const wait of [...POISON_WAITS, ...USUAL_SUSPECT_WAITS]) {
    const match = byKey.get(wait)
    if (match) add(match)
  }

  for (const prefix of USUAL_SUSPECT_PREFIXES) {
    for (const wait of available) {
      if (wait.toUpperCase().startsWith(prefix)) add(wait)
    }
  }

  let added = 0
  for (const wait of available) {
    if (selected.size >= MAX_DEFAULT_WAITS || added >= MAX_TOP_WAITS) break
    if (add(wait)) added++
  }

  return Array.from(selected.values())
}
