// Column filter types shared by grids and the filter dialog

export const FILTER_OPERATORS = [
  "contains",
  "equals",
  "notEquals",
  "greaterThan",
  "greaterThanOrEqual",
  "lessThan",
  "lessThanOrEqual",
  "startsWith",
  "endsWith",
  "isEmpty",
  "isNotEmpty",
] as const

export type FilterOperator = (typeof FILTER_OPERATORS)[number]

export interface ColumnFilterState {
  columnName: string
  operator: FilterOperator
  value: string
}

// Booleans rendered as All / True / False combo filters
export type TriState = "all" | "true" | "false"

// Hint for quick filter text when the cell type alone is ambiguous
export type ColumnKind = "text" | "number" | "date"

const OPERATOR_LABELS: Record<FilterOperator, string> = {
  contains: "Contains",
  equals: "Equals (=)",
  notEquals: "Not Equals (!=)",
  greaterThan: "Greater Than (>)",
  greaterThanOrEqual: "Greater or Equal (>=)",
  lessThan: "Less Than (<)",
  lessThanOrEqual: "Less or Equal (<=)",
  startsWith: "Starts With",
  endsWith: "Ends With",
  isEmpty: "Is Empty",
  isNotEmpty: "Is Not Empty",
}

export function operatorLabel(operator: FilterOperator): string {
  return OPERATOR_LABELS[operator]
}

export function isFilterOperator(value: string): value is FilterOperator {
  return FILTER_OPERATORS.some(op => op === value)
}

export function createFilter(
  columnName: string,
  operator: FilterOperator = "contains",
  value = ""
): ColumnFilterState {
  return { columnName, operator, value }
}

// isEmpty / isNotEmpty need no value to be active
export function isFilterActive(filter: ColumnFilterState | null | undefined): boolean {
  if (!filter) return false
  return filter.value.trim() !== "" || filter.operator === "isEmpty" || filter.operator === "isNotEmpty"
}

// Display text for an active filter, e.g. "Contains 'abc'" or "> 5"
export function describeFilter(filter: ColumnFilterState): string {
  if (!isFilterActive(filter)) return ""

  const value = filter.value
  switch (filter.operator) {
    case "contains":
      return `Contains '${value}'`
    case "equals":
      return `= '${value}'`
    case "notEquals":
      return `!= '${value}'`
    case "greaterThan":
      return `> ${value}`
    case "greaterThanOrEqual":
      return `>= ${value}`
    case "lessThan":
      return `< ${value}`
    case "lessThanOrEqual":
      return `<= ${value}`
    case "startsWith":
      return `Starts with '${value}'`
    case "endsWith":
      return `Ends with '${value}'`
    case "isEmpty":
      return "Is Empty"
    case "isNotEmpty":
      return "Is Not Empty"
  }
}

export function matchesTriState(state: TriState, value: boolean | null | undefined): boolean {
  if (state === "all") return true
  return value === (state === "true")
}
