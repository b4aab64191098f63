import { applyFilters, matchesFilterText, type RowPredicate } from "./match"
import { isFilterActive, matchesTriState, type ColumnFilterState, type ColumnKind, type TriState } from "./types"
import { getCellValue } from "./values"

export type GridStatus = "unfiltered" | "filtered"

interface QuickFilter {
  text: string
  kind?: ColumnKind
}

export type BooleanKeys<T> = {
  [K in keyof T]-?: T[K] extends boolean | null | undefined ? K : never
}[keyof T] & string

/**
 * Filter state for one grid: the unfiltered snapshot plus its filters.
 *
 * Visible rows are always derived from the snapshot, so removing a filter
 * restores rows without another fetch. Loading a new snapshot clears every
 * filter. Before the first load there is nothing to filter and `visible()`
 * is empty.
 */
export class GridView<T> {
  private all: T[] | null = null
  private readonly filters = new Map<string, ColumnFilterState>()
  private readonly quickFilters = new Map<string, QuickFilter>()
  private readonly triStates = new Map<string, TriState>()
  private lastError: string | null = null

  constructor(readonly name: string) {}

  load(rows: T[]): void {
    this.all = rows
    this.lastError = null
    this.clearFilters()
  }

  // A failed fetch leaves the grid empty and keeps the message for display
  fail(message: string): void {
    this.load([])
    this.lastError = message
  }

  get error(): string | null {
    return this.lastError
  }

  get isLoaded(): boolean {
    return this.all !== null
  }

  get rows(): readonly T[] {
    return this.all ?? []
  }

  setFilter(filter: ColumnFilterState): void {
    if (isFilterActive(filter)) {
      this.filters.set(filter.columnName, { ...filter })
    } else {
      this.filters.delete(filter.columnName)
    }
  }

  removeFilter(columnName: string): void {
    this.filters.delete(columnName)
  }

  getFilter(columnName: string): ColumnFilterState | undefined {
    return this.filters.get(columnName)
  }

  get columnFilters(): ColumnFilterState[] {
    return Array.from(this.filters.values())
  }

  setQuickFilter(columnName: string, text: string, kind?: ColumnKind): void {
    if (text.trim()) {
      this.quickFilters.set(columnName, { text, kind })
    } else {
      this.quickFilters.delete(columnName)
    }
  }

  getQuickFilter(columnName: string): string {
    return this.quickFilters.get(columnName)?.text ?? ""
  }

  setTriState(columnName: BooleanKeys<T>, state: TriState): void {
    if (state === "all") {
      this.triStates.delete(columnName)
    } else {
      this.triStates.set(columnName, state)
    }
  }

  getTriState(columnName: BooleanKeys<T>): TriState {
    return this.triStates.get(columnName) ?? "all"
  }

  clearFilters(): void {
    this.filters.clear()
    this.quickFilters.clear()
    this.triStates.clear()
  }

  get activeFilterCount(): number {
    return this.filters.size + this.quickFilters.size + this.triStates.size
  }

  get status(): GridStatus {
    return this.activeFilterCount === 0 ? "unfiltered" : "filtered"
  }

  visible(now?: Date): T[] {
    if (this.all === null) return []
    return applyFilters(this.all, this.filters.values(), this.extraPredicates(now))
  }

  private extraPredicates(now?: Date): RowPredicate<T>[] {
    const predicates: RowPredicate<T>[] = []

    for (const [columnName, state] of this.triStates) {
      predicates.push(row => {
        const value = getCellValue(row, columnName)
        return matchesTriState(state, typeof value === "boolean" ? value : null)
      })
    }

    for (const [columnName, quick] of this.quickFilters) {
      predicates.push(row => matchesFilterText(row, columnName, quick.text, quick.kind, now))
    }

    return predicates
  }
}
