"use client"

import { useMemo, useState, type ReactNode } from "react"
import { ChevronDown, ChevronLeft, ChevronRight, ChevronUp, ChevronsUpDown, Filter, FilterX } from "lucide-react"
import { useGridView } from "@/hooks/use-grid-view"
import { formatDate } from "@/lib/date-utils"
import { describeFilter, getNestedValue, type BooleanKeys, type ColumnKind, type GridView, type TriState } from "@/lib/grid-filter"
import { cn } from "@/lib/utils"
import { ColumnFilterDialog } from "./column-filter-dialog"

interface BaseColumn<T> {
  header: string
  sortable?: boolean
  cell?: (item: T) => ReactNode
  // For sorting non-primitive values
  sortValue?: (item: T) => string | number | Date | null
  className?: string
}

interface ValueColumn<T> extends BaseColumn<T> {
  key: string
  kind?: ColumnKind
  triState?: false
}

// Boolean columns filter with an All / True / False combo instead of text
interface TriStateColumn<T> extends BaseColumn<T> {
  key: BooleanKeys<T>
  triState: true
}

export type GridColumn<T> = ValueColumn<T> | TriStateColumn<T>

interface DataGridProps<T> {
  grid: GridView<T>
  columns: GridColumn<T>[]
  // Changes whenever the grid is reloaded
  revision?: unknown
  locale?: string
  pageSize?: number
  pageSizeOptions?: number[]
  emptyMessage?: string
  loading?: boolean
  selectable?: boolean
  selectedIds?: string[]
  onSelectionChange?: (selectedIds: string[]) => void
  getRowId?: (item: T, index: number) => string
}

type SortDirection = "asc" | "desc" | null

const TRI_STATES: TriState[] = ["all", "true", "false"]

function isTriState(value: string): value is TriState {
  return TRI_STATES.some(s => s === value)
}

export function DataGrid<T extends object>({
  grid,
  columns,
  revision,
  locale = "en",
  pageSize: initialPageSize = 25,
  pageSizeOptions = [25, 50, 100, 500],
  emptyMessage = "No data found",
  loading = false,
  selectable = false,
  selectedIds = [],
  onSelectionChange,
  getRowId = (_item, index) => String(index),
}: DataGridProps<T>) {
  const view = useGridView(grid, revision)
  const [sortKey, setSortKey] = useState<string | null>(null)
  const [sortDirection, setSortDirection] = useState<SortDirection>(null)
  const [currentPage, setCurrentPage] = useState(1)
  const [pageSize, setPageSize] = useState(initialPageSize)
  const [filterColumn, setFilterColumn] = useState<string | null>(null)

  const rows = view.rows

  // Sort data
  const sortedData = useMemo(() => {
    if (!sortKey || !sortDirection) return rows

    const column = columns.find(col => col.key === sortKey)
    if (!column) return rows

    const direction = sortDirection === "asc" ? 1 : -1
    return [...rows].sort((a, b) => {
      const aVal = column.sortValue ? column.sortValue(a) : getNestedValue(a, sortKey)
      const bVal = column.sortValue ? column.sortValue(b) : getNestedValue(b, sortKey)

      // Nulls last in either direction
      const aNull = aVal === null || aVal === undefined
      const bNull = bVal === null || bVal === undefined
      if (aNull || bNull) return aNull === bNull ? 0 : aNull ? 1 : -1

      if (aVal instanceof Date && bVal instanceof Date) {
        return direction * (aVal.getTime() - bVal.getTime())
      }

      if (typeof aVal === "number" && typeof bVal === "number") {
        return direction * (aVal - bVal)
      }

      return direction * String(aVal).localeCompare(String(bVal), locale)
    })
  }, [rows, sortKey, sortDirection, columns, locale])

  const totalPages = Math.ceil(sortedData.length / pageSize)
  const page = Math.min(currentPage, Math.max(1, totalPages))

  // Paginate data
  const paginatedData = useMemo(() => {
    const start = (page - 1) * pageSize
    return sortedData.slice(start, start + pageSize)
  }, [sortedData, page, pageSize])

  const rowIds = paginatedData.map((item, i) => getRowId(item, (page - 1) * pageSize + i))
  const allVisibleSelected = selectable && rowIds.length > 0 && rowIds.every(id => selectedIds.includes(id))

  const toggleItemSelection = (itemId: string) => {
    if (selectedIds.includes(itemId)) {
      onSelectionChange?.(selectedIds.filter(id => id !== itemId))
    } else {
      onSelectionChange?.([...selectedIds, itemId])
    }
  }

  const toggleAllVisible = () => {
    if (allVisibleSelected) {
      onSelectionChange?.(selectedIds.filter(id => !rowIds.includes(id)))
    } else {
      onSelectionChange?.(Array.from(new Set([...selectedIds, ...rowIds])))
    }
  }

  const handleSort = (key: string) => {
    if (sortKey === key) {
      if (sortDirection === "asc") {
        setSortDirection("desc")
      } else if (sortDirection === "desc") {
        setSortKey(null)
        setSortDirection(null)
      }
    } else {
      setSortKey(key)
      setSortDirection("asc")
    }
  }

  const getSortIcon = (key: string) => {
    if (sortKey !== key) {
      return <ChevronsUpDown className="h-4 w-4 ml-1 opacity-50" />
    }
    if (sortDirection === "asc") {
      return <ChevronUp className="h-4 w-4 ml-1" />
    }
    return <ChevronDown className="h-4 w-4 ml-1" />
  }

  // Filter changes reset to the first page
  const withReset = (change: () => void) => {
    change()
    setCurrentPage(1)
  }

  const renderCell = (item: T, column: GridColumn<T>) => {
    if (column.cell) return column.cell(item)
    const value = getNestedValue(item, column.key)
    if (value instanceof Date) return formatDate(value)
    if (typeof value === "boolean") return value ? "Yes" : "No"
    return String(value ?? "-")
  }

  const renderQuickFilter = (column: GridColumn<T>) => {
    if (column.triState === true) {
      const key = column.key
      return (
        <select
          aria-label={`Filter ${column.header}`}
          value={view.getTriState(key)}
          onChange={(e) => {
            const state = e.target.value
            if (isTriState(state)) withReset(() => view.setTriState(key, state))
          }}
          className="w-full rounded border bg-background px-1 py-0.5 text-xs"
        >
          <option value="all">All</option>
          <option value="true">True</option>
          <option value="false">False</option>
        </select>
      )
    }

    const kind = column.kind
    return (
      <input
        aria-label={`Filter ${column.header}`}
        value={view.getQuickFilter(column.key)}
        onChange={(e) => withReset(() => view.setQuickFilter(column.key, e.target.value, kind))}
        placeholder={kind === "number" ? ">=10, 1-5" : kind === "date" ? "today, last 2 hours" : ""}
        className="w-full rounded border bg-background px-1 py-0.5 text-xs"
      />
    )
  }

  const colSpan = columns.length + (selectable ? 1 : 0)

  return (
    <div className="space-y-4">
      {/* Filter status and page size */}
      <div className="flex items-center justify-between gap-4">
        <div className="flex items-center gap-2 text-sm">
          {view.activeFilterCount > 0 ? (
            <>
              <span className="text-muted-foreground">
                {view.activeFilterCount} filter{view.activeFilterCount === 1 ? "" : "s"} active
              </span>
              <button
                type="button"
                onClick={() => withReset(view.clearFilters)}
                className="flex items-center gap-1 rounded border px-2 py-1 hover:bg-muted"
              >
                <FilterX className="h-4 w-4" />
                Clear filters
              </button>
            </>
          ) : (
            <span className="text-muted-foreground">No filters</span>
          )}
        </div>
        <div className="flex items-center gap-2">
          <span className="text-sm text-muted-foreground whitespace-nowrap">Rows per page:</span>
          <select
            aria-label="Rows per page"
            value={pageSize}
            onChange={(e) => {
              setPageSize(Number(e.target.value))
              setCurrentPage(1)
            }}
            className="rounded-md border bg-background px-2 py-1 text-sm"
          >
            {pageSizeOptions.map(size => (
              <option key={size} value={size}>
                {size}
              </option>
            ))}
          </select>
        </div>
      </div>

      {view.error && (
        <div role="alert" className="rounded-md border border-red-200 bg-red-50 px-4 py-2 text-sm text-red-700">
          {view.error}
        </div>
      )}

      {/* Table */}
      <div className="rounded-md border overflow-x-auto">
        <table className="w-full caption-bottom text-sm">
          <thead className="border-b">
            <tr>
              {selectable && (
                <th className="w-[40px] px-2">
                  <input
                    type="checkbox"
                    checked={allVisibleSelected}
                    onChange={toggleAllVisible}
                    aria-label="Select all"
                  />
                </th>
              )}
              {columns.map(column => {
                const filter = view.getFilter(column.key)
                return (
                  <th key={column.key} className={cn("relative h-10 px-2 text-left font-medium text-muted-foreground", column.className)}>
                    <div className="flex items-center gap-1">
                      {column.sortable !== false ? (
                        <button
                          type="button"
                          className="flex items-center hover:text-foreground transition-colors -ml-2 px-2 py-1 rounded"
                          onClick={() => handleSort(column.key)}
                        >
                          {column.header}
                          {getSortIcon(column.key)}
                        </button>
                      ) : (
                        column.header
                      )}
                      {column.triState !== true && (
                        <button
                          type="button"
                          aria-label={`Column filter ${column.header}`}
                          title={filter ? describeFilter(filter) : "Filter"}
                          onClick={() => setFilterColumn(filterColumn === column.key ? null : column.key)}
                          className={cn("rounded p-1 hover:bg-muted", filter ? "text-primary" : "opacity-50")}
                        >
                          <Filter className="h-3.5 w-3.5" />
                        </button>
                      )}
                    </div>
                    {filterColumn === column.key && (
                      <ColumnFilterDialog
                        columnName={column.key}
                        header={column.header}
                        filter={filter}
                        onApply={(f) => withReset(() => view.setFilter(f))}
                        onClear={() => withReset(() => view.removeFilter(column.key))}
                        onClose={() => setFilterColumn(null)}
                      />
                    )}
                  </th>
                )
              })}
            </tr>
            <tr>
              {selectable && <th />}
              {columns.map(column => (
                <th key={column.key} className="px-2 pb-2">
                  {renderQuickFilter(column)}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {loading ? (
              <tr>
                <td colSpan={colSpan} className="h-24 text-center">
                  <div className="flex items-center justify-center">
                    <div className="animate-spin rounded-full h-6 w-6 border-b-2 border-primary"></div>
                  </div>
                </td>
              </tr>
            ) : paginatedData.length === 0 ? (
              <tr>
                <td colSpan={colSpan} className="h-24 text-center text-muted-foreground">
                  {emptyMessage}
                </td>
              </tr>
            ) : (
              paginatedData.map((item, i) => {
                const itemId = rowIds[i]
                return (
                  <tr
                    key={itemId}
                    className={cn("border-b", selectable && selectedIds.includes(itemId) && "bg-muted/50")}
                  >
                    {selectable && (
                      <td className="w-[40px] px-2">
                        <input
                          type="checkbox"
                          checked={selectedIds.includes(itemId)}
                          onChange={() => toggleItemSelection(itemId)}
                          aria-label="Select row"
                        />
                      </td>
                    )}
                    {columns.map(column => (
                      <td key={column.key} className={cn("p-2", column.className)}>
                        {renderCell(item, column)}
                      </td>
                    ))}
                  </tr>
                )
              })
            )}
          </tbody>
        </table>
      </div>

      {/* Pagination */}
      {totalPages > 0 && (
        <div className="flex items-center justify-between">
          <p className="text-sm text-muted-foreground">
            Showing {((page - 1) * pageSize) + 1} to {Math.min(page * pageSize, sortedData.length)} of {sortedData.length} entries
            {view.status === "filtered" && ` (filtered from ${view.total} total)`}
          </p>
          <div className="flex items-center gap-2">
            <button
              type="button"
              onClick={() => setCurrentPage(1)}
              disabled={page === 1}
              className="rounded-md border px-3 py-1 text-sm disabled:opacity-50"
            >
              First
            </button>
            <button
              type="button"
              aria-label="Previous page"
              onClick={() => setCurrentPage(Math.max(1, page - 1))}
              disabled={page === 1}
              className="rounded-md border p-1 disabled:opacity-50"
            >
              <ChevronLeft className="h-4 w-4" />
            </button>
            <div className="flex items-center gap-1">
              {generatePageNumbers(page, totalPages).map((p, i) => (
                p === "..." ? (
                  <span key={`ellipsis-${i}`} className="px-2 text-muted-foreground">...</span>
                ) : (
                  <button
                    type="button"
                    key={p}
                    onClick={() => setCurrentPage(p)}
                    className={cn("w-8 rounded-md border py-1 text-sm", page === p && "bg-primary text-primary-foreground")}
                  >
                    {p}
                  </button>
                )
              ))}
            </div>
            <button
              type="button"
              aria-label="Next page"
              onClick={() => setCurrentPage(Math.min(totalPages, page + 1))}
              disabled={page === totalPages}
              className="rounded-md border p-1 disabled:opacity-50"
            >
              <ChevronRight className="h-4 w-4" />
            </button>
            <button
              type="button"
              onClick={() => setCurrentPage(totalPages)}
              disabled={page === totalPages}
              className="rounded-md border px-3 py-1 text-sm disabled:opacity-50"
            >
              Last
            </button>
          </div>
        </div>
      )}
    </div>
  )
}

// Generate page numbers with ellipsis
export function generatePageNumbers(current: number, total: number): (number | "...")[] {
  if (total <= 7) {
    return Array.from({ length: total }, (_, i) => i + 1)
  }

  if (current <= 3) {
    return [1, 2, 3, 4, 5, "...", total]
  }

  if (current >= total - 2) {
    return [1, "...", total - 4, total - 3, total - 2, total - 1, total]
  }

  return [1, "...", current - 1, current, current + 1, "...", total]
}
