import { describe, expect, it } from "vitest"
import { matchesDateFilter, parseAbsoluteDate, parseDateExpression } from "./date-filter"

// Local wall-clock times keep these independent of the machine's timezone
const now = new Date(2026, 2, 15, 12, 0, 0)

describe("matchesDateFilter", () => {
  it("passes null values and blank filters", () => {
    expect(matchesDateFilter(null, "today", now)).toBe(true)
    expect(matchesDateFilter(new Date(2020, 0, 1), " ", now)).toBe(true)
  })

  it("compares against absolute dates", () => {
    const value = new Date(2026, 2, 10, 8, 30)
    expect(matchesDateFilter(value, ">= 2026-03-10", now)).toBe(true)
    expect(matchesDateFilter(value, "< 2026-03-10", now)).toBe(false)
    expect(matchesDateFilter(value, "> 2026-03-10 09:00", now)).toBe(false)
  })

  it("includes the whole end day in a range", () => {
    expect(matchesDateFilter(new Date(2026, 0, 10, 23, 59), "2026-01-01..2026-01-10", now)).toBe(true)
    expect(matchesDateFilter(new Date(2026, 0, 11, 0, 0), "2026-01-01..2026-01-10", now)).toBe(false)
    expect(matchesDateFilter(new Date(2026, 0, 10, 18, 0), "'2026-01-01'-'2026-01-10'", now)).toBe(true)
    expect(matchesDateFilter(new Date(2025, 11, 31, 23, 0), "'2026-01-01'-'2026-01-10'", now)).toBe(false)
  })

  it("matches relative day words against the whole calendar day", () => {
    expect(matchesDateFilter(new Date(2026, 2, 15, 1, 0), "today", now)).toBe(true)
    expect(matchesDateFilter(new Date(2026, 2, 14, 23, 0), "yesterday", now)).toBe(true)
    expect(matchesDateFilter(new Date(2026, 2, 14, 23, 0), "today", now)).toBe(false)
    expect(matchesDateFilter(new Date(2026, 2, 16, 9, 0), "tomorrow", now)).toBe(true)
  })

  it("treats a bare look-back as everything since the threshold", () => {
    expect(matchesDateFilter(new Date(2026, 2, 14, 13, 0), "last 24 hours", now)).toBe(true)
    expect(matchesDateFilter(new Date(2026, 2, 14, 11, 0), "last 24 hours", now)).toBe(false)
    expect(matchesDateFilter(new Date(2026, 2, 9, 12, 0), "last 1 week", now)).toBe(true)
  })

  it("supports relative words inside comparisons", () => {
    expect(matchesDateFilter(new Date(2026, 2, 13, 12, 0), "< yesterday", now)).toBe(true)
    expect(matchesDateFilter(new Date(2026, 2, 15, 0, 0), ">= today", now)).toBe(true)
  })

  it("matches an absolute timestamp within one second", () => {
    expect(matchesDateFilter(new Date(2026, 2, 1, 10, 0, 0, 500), "2026-03-01 10:00:00", now)).toBe(true)
    expect(matchesDateFilter(new Date(2026, 2, 1, 10, 0, 2), "2026-03-01 10:00:00", now)).toBe(false)
  })

  it("accepts date strings in the cell", () => {
    expect(matchesDateFilter("2026-03-15 08:00", "today", now)).toBe(true)
  })

  it("does not exclude rows for filter text it cannot read", () => {
    expect(matchesDateFilter(new Date(2026, 0, 1), "someday", now)).toBe(true)
    expect(matchesDateFilter(new Date(2026, 0, 1), ">= soon", now)).toBe(true)
    expect(matchesDateFilter(new Date(2026, 0, 1), "2026-01-01..later", now)).toBe(true)
  })
})

describe("parseDateExpression", () => {
  it("resolves relative words from the supplied clock", () => {
    expect(parseDateExpression("today", now)).toEqual(new Date(2026, 2, 15))
    expect(parseDateExpression("'yesterday'", now)).toEqual(new Date(2026, 2, 14))
    expect(parseDateExpression("last 2 months", now)).toEqual(new Date(2026, 0, 15, 12, 0, 0))
  })
})

describe("parseAbsoluteDate", () => {
  it("rejects impossible calendar dates", () => {
    expect(parseAbsoluteDate("2026-02-31")).toBeNull()
  })

  it("keeps explicit zones", () => {
    expect(parseAbsoluteDate("2026-03-01T10:00:00Z")?.toISOString()).toBe("2026-03-01T10:00:00.000Z")
  })
})
