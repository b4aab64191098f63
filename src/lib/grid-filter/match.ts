import { matchesDateFilter } from "./date-filter"
import { matchesNumericFilter } from "./numeric-filter"
import { isFilterActive, type ColumnFilterState, type ColumnKind } from "./types"
import { MISSING, cellText, getCellValue, isBlank, parseLooseNumber } from "./values"

export type RowPredicate<T> = (row: T) => boolean

function splitTerms(value: string): string[] {
  return value
    .split(",")
    .map(term => term.trim())
    .filter(term => term !== "")
}

// equals / notEquals: numeric when both sides parse, otherwise case-insensitive text
function compareEquality(raw: unknown, term: string): number {
  // null sorts before any value
  if (raw === null || raw === undefined) return -1

  const left = parseLooseNumber(cellText(raw))
  const right = parseLooseNumber(term)
  if (left !== null && right !== null) {
    return left === right ? 0 : left < right ? -1 : 1
  }

  const a = cellText(raw).toLowerCase()
  const b = term.toLowerCase()
  return a === b ? 0 : a < b ? -1 : 1
}

function compareNumeric(raw: unknown, filterValue: string, compare: (a: number, b: number) => boolean): boolean {
  if (raw === null || raw === undefined) return false

  const left = parseLooseNumber(cellText(raw))
  const right = parseLooseNumber(filterValue)
  if (left === null || right === null) return false
  return compare(left, right)
}

export function matchesColumnFilter(row: unknown, filter: ColumnFilterState): boolean {
  if (!isFilterActive(filter)) return true

  const raw = getCellValue(row, filter.columnName)
  // Filters on a column the row does not have pass through
  if (raw === MISSING) return true

  if (filter.operator === "isEmpty") return isBlank(raw)
  if (filter.operator === "isNotEmpty") return !isBlank(raw)

  const terms = splitTerms(filter.value)
  if (terms.length === 0) return true

  const text = cellText(raw).toLowerCase()

  switch (filter.operator) {
    case "contains":
      return terms.some(term => text.includes(term.toLowerCase()))
    case "startsWith":
      return terms.some(term => text.startsWith(term.toLowerCase()))
    case "endsWith":
      return terms.some(term => text.endsWith(term.toLowerCase()))
    case "equals":
      return terms.some(term => compareEquality(raw, term) === 0)
    case "notEquals":
      return terms.every(term => compareEquality(raw, term) !== 0)
    case "greaterThan":
      return compareNumeric(raw, filter.value, (a, b) => a > b)
    case "greaterThanOrEqual":
      return compareNumeric(raw, filter.value, (a, b) => a >= b)
    case "lessThan":
      return compareNumeric(raw, filter.value, (a, b) => a < b)
    case "lessThanOrEqual":
      return compareNumeric(raw, filter.value, (a, b) => a <= b)
  }
}

function inferKind(value: unknown): ColumnKind {
  if (typeof value === "number" || typeof value === "bigint") return "number"
  if (value instanceof Date) return "date"
  return "text"
}

// Quick filter text typed into a column header, interpreted by the cell's type
export function matchesFilterText(
  row: unknown,
  columnName: string,
  filterText: string,
  kind?: ColumnKind,
  now?: Date
): boolean {
  if (!filterText.trim()) return true

  const raw = getCellValue(row, columnName)
  if (raw === MISSING) return true

  switch (kind ?? inferKind(raw)) {
    case "number":
      return matchesNumericFilter(raw, filterText)
    case "date":
      return matchesDateFilter(raw, filterText, now)
    case "text": {
      const value = cellText(raw).toLowerCase()
      const terms = splitTerms(filterText.toLowerCase())
      return terms.length === 0 || terms.some(term => value.includes(term))
    }
  }
}

// Rows passing every active filter and every extra predicate.
// With nothing active the input array itself is returned.
export function applyFilters<T>(
  rows: T[],
  filters: Iterable<ColumnFilterState>,
  extra: RowPredicate<T>[] = []
): T[] {
  const active = Array.from(filters).filter(isFilterActive)
  if (active.length === 0 && extra.length === 0) return rows

  return rows.filter(row => {
    for (const filter of active) {
      if (!matchesColumnFilter(row, filter)) return false
    }
    for (const predicate of extra) {
      if (!predicate(row)) return false
    }
    return true
  })
}
