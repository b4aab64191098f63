"use client"

import { useState } from "react"
import { Filter, X } from "lucide-react"
import {
  FILTER_OPERATORS,
  createFilter,
  isFilterOperator,
  operatorLabel,
  type ColumnFilterState,
  type FilterOperator,
} from "@/lib/grid-filter"

interface ColumnFilterDialogProps {
  columnName: string
  header: string
  filter?: ColumnFilterState
  onApply: (filter: ColumnFilterState) => void
  onClear: () => void
  onClose: () => void
}

// isEmpty / isNotEmpty take no value
function needsValue(operator: FilterOperator) {
  return operator !== "isEmpty" && operator !== "isNotEmpty"
}

export function ColumnFilterDialog({
  columnName,
  header,
  filter,
  onApply,
  onClear,
  onClose,
}: ColumnFilterDialogProps) {
  const [operator, setOperator] = useState<FilterOperator>(filter?.operator ?? "contains")
  const [value, setValue] = useState(filter?.value ?? "")

  const handleApply = () => {
    onApply(createFilter(columnName, operator, needsValue(operator) ? value : ""))
    onClose()
  }

  const handleClear = () => {
    onClear()
    onClose()
  }

  return (
    <div
      role="dialog"
      aria-label={`Filter ${header}`}
      className="absolute z-50 mt-1 w-72 rounded-lg border bg-background p-4 shadow-lg space-y-3"
    >
      <div className="flex items-center justify-between">
        <h3 className="flex items-center gap-2 text-sm font-semibold">
          <Filter className="h-4 w-4" />
          {header}
        </h3>
        <button
          type="button"
          onClick={onClose}
          aria-label="Close"
          className="rounded p-1 text-muted-foreground hover:text-foreground"
        >
          <X className="h-4 w-4" />
        </button>
      </div>

      <select
        aria-label="Operator"
        value={operator}
        onChange={(e) => {
          if (isFilterOperator(e.target.value)) setOperator(e.target.value)
        }}
        className="w-full rounded-md border bg-background px-3 py-2 text-sm"
      >
        {FILTER_OPERATORS.map(op => (
          <option key={op} value={op}>
            {operatorLabel(op)}
          </option>
        ))}
      </select>

      {needsValue(operator) && (
        <>
          <input
            aria-label="Value"
            value={value}
            onChange={(e) => setValue(e.target.value)}
            onKeyDown={(e) => {
              if (e.key === "Enter") handleApply()
            }}
            placeholder="Value"
            autoFocus
            className="w-full rounded-md border bg-background px-3 py-2 text-sm"
          />
          <p className="text-xs text-muted-foreground">Separate several values with commas</p>
        </>
      )}

      <div className="flex justify-end gap-2">
        <button
          type="button"
          onClick={handleClear}
          className="rounded-md border px-3 py-1.5 text-sm hover:bg-muted"
        >
          Clear
        </button>
        <button
          type="button"
          onClick={handleApply}
          className="rounded-md bg-primary px-3 py-1.5 text-sm text-primary-foreground hover:bg-primary/90"
        >
          Apply
        </button>
      </div>
    </div>
  )
}
