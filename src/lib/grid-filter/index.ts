export * from "./types"
export { MISSING, getCellValue, getNestedValue, isBlank, parseLooseNumber } from "./values"
export { matchesNumericFilter, parseNumericRange } from "./numeric-filter"
export { matchesDateFilter, parseDateExpression, parseAbsoluteDate } from "./date-filter"
export { applyFilters, matchesColumnFilter, matchesFilterText } from "./match"
export type { RowPredicate } from "./match"
export { GridView } from "./grid-view"
export type { BooleanKeys, GridStatus } from "./grid-view"
