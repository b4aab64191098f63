// Marks a column the row does not have, as opposed to a null cell
export const MISSING: unique symbol = Symbol("missing")

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

// Reads "a.b.c" style paths; MISSING when any segment is absent
export function getCellValue(row: unknown, path: string): unknown {
  let current: unknown = row
  for (const key of path.split(".")) {
    if (!isRecord(current) || !(key in current)) return MISSING
    current = current[key]
  }
  return current
}

// Same as getCellValue but folds MISSING into undefined, for display and sorting
export function getNestedValue(row: unknown, path: string): unknown {
  const value = getCellValue(row, path)
  return value === MISSING ? undefined : value
}

export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined) return true
  return typeof value === "string" && value.trim() === ""
}

// Number parsing that tolerates "1,234", "45%" and "$12"
export function parseLooseNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null
  if (typeof value === "bigint") return Number(value)
  if (typeof value !== "string") return null

  const cleaned = value.replace(/[,%$\s]/g, "")
  if (cleaned === "") return null
  const parsed = Number(cleaned)
  return Number.isFinite(parsed) ? parsed : null
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return ""
  if (value instanceof Date) return value.toISOString()
  return String(value)
}
