// @vitest-environment jsdom
import { afterEach, describe, expect, it } from "vitest"
import { cleanup, fireEvent, render, screen } from "@testing-library/react"
import { GridView } from "@/lib/grid-filter"
import { DataGrid, generatePageNumbers, type GridColumn } from "./data-grid"

interface ServerRow {
  name: string
  cpu: number
  online: boolean
}

const columns: GridColumn<ServerRow>[] = [
  { key: "name", header: "Name" },
  { key: "cpu", header: "CPU", kind: "number" },
  { key: "online", header: "Online", triState: true },
]

function loadedGrid() {
  const grid = new GridView<ServerRow>("servers")
  grid.load([
    { name: "alpha", cpu: 10, online: true },
    { name: "beta", cpu: 55, online: false },
    { name: "gamma", cpu: 80, online: true },
  ])
  return grid
}

function visibleNames() {
  return ["alpha", "beta", "gamma"].filter(name => screen.queryByText(name) !== null)
}

describe("DataGrid", () => {
  afterEach(cleanup)

  it("composes quick filters with tri-state filters", () => {
    const grid = loadedGrid()
    render(<DataGrid grid={grid} columns={columns} />)

    fireEvent.change(screen.getByLabelText("Filter CPU"), { target: { value: ">=50" } })
    expect(visibleNames()).toEqual(["beta", "gamma"])
    expect(screen.getByText("Showing 1 to 2 of 2 entries (filtered from 3 total)")).toBeTruthy()

    fireEvent.change(screen.getByLabelText("Filter Online"), { target: { value: "true" } })
    expect(visibleNames()).toEqual(["gamma"])
    expect(grid.activeFilterCount).toBe(2)
    expect(screen.getByText("2 filters active")).toBeTruthy()

    fireEvent.click(screen.getByText("Clear filters"))
    expect(visibleNames()).toEqual(["alpha", "beta", "gamma"])
    expect(grid.status).toBe("unfiltered")
  })

  it("applies a column filter from the dialog", () => {
    const grid = loadedGrid()
    render(<DataGrid grid={grid} columns={columns} />)

    fireEvent.click(screen.getByLabelText("Column filter Name"))
    fireEvent.change(screen.getByLabelText("Operator"), { target: { value: "notEquals" } })
    fireEvent.change(screen.getByLabelText("Value"), { target: { value: "alpha, gamma" } })
    fireEvent.click(screen.getByText("Apply"))

    expect(visibleNames()).toEqual(["beta"])
    expect(grid.getFilter("name")).toEqual({ columnName: "name", operator: "notEquals", value: "alpha, gamma" })
    expect(screen.getByLabelText("Column filter Name").getAttribute("title")).toBe("!= 'alpha, gamma'")
    expect(screen.queryByRole("dialog")).toBeNull()
  })

  it("sorts by the clicked column", () => {
    render(<DataGrid grid={loadedGrid()} columns={columns} />)

    fireEvent.click(screen.getByText("CPU"))
    fireEvent.click(screen.getByText("CPU"))

    const cells = screen.getAllByRole("row").slice(2).map(row => row.firstElementChild?.textContent)
    expect(cells).toEqual(["gamma", "beta", "alpha"])
  })

  it("keeps empty values last in both directions", () => {
    const grid = new GridView<{ name: string; cpu: number | null }>("cpu")
    grid.load([
      { name: "alpha", cpu: 10 },
      { name: "beta", cpu: null },
      { name: "gamma", cpu: 80 },
      { name: "delta", cpu: null },
    ])
    render(<DataGrid grid={grid} columns={[{ key: "name", header: "Name" }, { key: "cpu", header: "CPU", kind: "number" }]} />)
    const names = () => screen.getAllByRole("row").slice(2).map(row => row.firstElementChild?.textContent)

    fireEvent.click(screen.getByText("CPU"))
    expect(names()).toEqual(["alpha", "gamma", "beta", "delta"])

    fireEvent.click(screen.getByText("CPU"))
    expect(names()).toEqual(["gamma", "alpha", "beta", "delta"])
  })

  it("shows the load error with an empty grid", () => {
    const grid = new GridView<ServerRow>("servers")
    grid.fail("Execution Timeout Expired")
    render(<DataGrid grid={grid} columns={columns} emptyMessage="No servers" />)

    expect(screen.getByRole("alert").textContent).toBe("Execution Timeout Expired")
    expect(screen.getByText("No servers")).toBeTruthy()
  })
})

describe("generatePageNumbers", () => {
  it("lists every page up to seven", () => {
    expect(generatePageNumbers(1, 4)).toEqual([1, 2, 3, 4])
  })

  it("collapses the middle of long ranges", () => {
    expect(generatePageNumbers(2, 20)).toEqual([1, 2, 3, 4, 5, "...", 20])
    expect(generatePageNumbers(10, 20)).toEqual([1, "...", 9, 10, 11, "...", 20])
    expect(generatePageNumbers(19, 20)).toEqual([1, "...", 16, 17, 18, 19, 20])
  })
})
