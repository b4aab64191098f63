import { describe, expect, it } from "vitest"
import { matchesNumericFilter, parseNumericRange } from "./numeric-filter"

describe("matchesNumericFilter", () => {
  it("passes null values and blank filters", () => {
    expect(matchesNumericFilter(null, ">5")).toBe(true)
    expect(matchesNumericFilter(3, "   ")).toBe(true)
    expect(matchesNumericFilter(3, undefined)).toBe(true)
  })

  it("applies comparison operators", () => {
    expect(matchesNumericFilter(10, ">=10")).toBe(true)
    expect(matchesNumericFilter(9.5, ">=10")).toBe(false)
    expect(matchesNumericFilter(10, ">10")).toBe(false)
    expect(matchesNumericFilter(4, "< 5")).toBe(true)
    expect(matchesNumericFilter(5, "<=5")).toBe(true)
  })

  it("matches inclusive ranges with a dash or two dots", () => {
    expect(matchesNumericFilter(150, "100-200")).toBe(true)
    expect(matchesNumericFilter(200, "100-200")).toBe(true)
    expect(matchesNumericFilter(201, "100-200")).toBe(false)
    expect(matchesNumericFilter(3, "1..5")).toBe(true)
    expect(matchesNumericFilter(-75, "-100--50")).toBe(true)
    expect(matchesNumericFilter(-40, "-100--50")).toBe(false)
  })

  it("treats a bare number as an exact match within 0.01", () => {
    expect(matchesNumericFilter(42.004, "42")).toBe(true)
    expect(matchesNumericFilter(42.5, "42")).toBe(false)
    expect(matchesNumericFilter(-7, "-7")).toBe(true)
  })

  it("reads numeric strings from the cell", () => {
    expect(matchesNumericFilter("1,500", ">1000")).toBe(true)
  })

  it("does not exclude rows when the filter or value is unusable", () => {
    expect(matchesNumericFilter(5, "abc")).toBe(true)
    expect(matchesNumericFilter(5, ">abc")).toBe(true)
    expect(matchesNumericFilter("n/a", ">1")).toBe(true)
  })
})

describe("parseNumericRange", () => {
  it("splits on the first dash preceded by a digit", () => {
    expect(parseNumericRange("-100-200")).toEqual({ min: -100, max: 200 })
    expect(parseNumericRange("-100--50")).toEqual({ min: -100, max: -50 })
  })

  it("returns null for a plain negative number", () => {
    expect(parseNumericRange("-5")).toBeNull()
  })
})
