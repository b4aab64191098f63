"use client"

import { useCallback, useMemo, useState } from "react"
import type { BooleanKeys, ColumnFilterState, ColumnKind, GridStatus, GridView, TriState } from "@/lib/grid-filter"

export interface GridViewState<T> {
  rows: T[]
  total: number
  status: GridStatus
  activeFilterCount: number
  error: string | null
  getFilter: (columnName: string) => ColumnFilterState | undefined
  setFilter: (filter: ColumnFilterState) => void
  removeFilter: (columnName: string) => void
  getQuickFilter: (columnName: string) => string
  setQuickFilter: (columnName: string, text: string, kind?: ColumnKind) => void
  getTriState: (columnName: BooleanKeys<T>) => TriState
  setTriState: (columnName: BooleanKeys<T>, state: TriState) => void
  clearFilters: () => void
}

// Re-renders on every filter change. Pass a new revision after the grid is reloaded.
export function useGridView<T>(grid: GridView<T>, revision?: unknown): GridViewState<T> {
  const [version, setVersion] = useState(0)

  const mutate = useCallback((change: () => void) => {
    change()
    setVersion(v => v + 1)
  }, [])

  const rows = useMemo(() => grid.visible(), [grid, version, revision])

  return {
    rows,
    total: grid.rows.length,
    status: grid.status,
    activeFilterCount: grid.activeFilterCount,
    error: grid.error,
    getFilter: columnName => grid.getFilter(columnName),
    setFilter: filter => mutate(() => grid.setFilter(filter)),
    removeFilter: columnName => mutate(() => grid.removeFilter(columnName)),
    getQuickFilter: columnName => grid.getQuickFilter(columnName),
    setQuickFilter: (columnName, text, kind) => mutate(() => grid.setQuickFilter(columnName, text, kind)),
    getTriState: columnName => grid.getTriState(columnName),
    setTriState: (columnName, state) => mutate(() => grid.setTriState(columnName, state)),
    clearFilters: () => mutate(() => grid.clearFilters()),
  }
}
