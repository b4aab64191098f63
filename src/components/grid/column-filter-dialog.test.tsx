// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from "vitest"
import { cleanup, fireEvent, render, screen } from "@testing-library/react"
import { ColumnFilterDialog } from "./column-filter-dialog"

describe("ColumnFilterDialog", () => {
  afterEach(cleanup)

  it("starts from the current filter", () => {
    render(
      <ColumnFilterDialog
        columnName="databaseName"
        header="Database"
        filter={{ columnName: "databaseName", operator: "startsWith", value: "Sales" }}
        onApply={vi.fn()}
        onClear={vi.fn()}
        onClose={vi.fn()}
      />
    )

    expect(screen.getByRole("dialog", { name: "Filter Database" })).toBeTruthy()
    expect(screen.getByLabelText("Value")).toHaveProperty("value", "Sales")
  })

  it("applies on Enter and closes", () => {
    const onApply = vi.fn()
    const onClose = vi.fn()
    render(<ColumnFilterDialog columnName="cpuMs" header="CPU (ms)" onApply={onApply} onClear={vi.fn()} onClose={onClose} />)

    fireEvent.change(screen.getByLabelText("Operator"), { target: { value: "greaterThan" } })
    fireEvent.change(screen.getByLabelText("Value"), { target: { value: "500" } })
    fireEvent.keyDown(screen.getByLabelText("Value"), { key: "Enter" })

    expect(onApply).toHaveBeenCalledWith({ columnName: "cpuMs", operator: "greaterThan", value: "500" })
    expect(onClose).toHaveBeenCalledTimes(1)
  })

  it("hides the value for empty checks", () => {
    const onApply = vi.fn()
    render(<ColumnFilterDialog columnName="waitType" header="Wait Type" onApply={onApply} onClear={vi.fn()} onClose={vi.fn()} />)

    fireEvent.change(screen.getByLabelText("Value"), { target: { value: "LCK" } })
    fireEvent.change(screen.getByLabelText("Operator"), { target: { value: "isEmpty" } })
    expect(screen.queryByLabelText("Value")).toBeNull()

    fireEvent.click(screen.getByText("Apply"))
    expect(onApply).toHaveBeenCalledWith({ columnName: "waitType", operator: "isEmpty", value: "" })
  })

  it("clears the column filter", () => {
    const onClear = vi.fn()
    const onClose = vi.fn()
    render(<ColumnFilterDialog columnName="status" header="Status" onApply={vi.fn()} onClear={onClear} onClose={onClose} />)

    fireEvent.click(screen.getByText("Clear"))

    expect(onClear).toHaveBeenCalledTimes(1)
    expect(onClose).toHaveBeenCalledTimes(1)
  })
})
