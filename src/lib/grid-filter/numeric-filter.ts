import { parseLooseNumber } from "./values"

// Quick filter text for numeric columns: ">=10", "<5", "100-200", "-100--50", "1..5" or an exact value.
// A cell that is not numeric, or filter text that does not parse, never excludes the row.
export function matchesNumericFilter(value: unknown, filterText: string | null | undefined): boolean {
  if (value === null || value === undefined || !filterText || !filterText.trim()) return true

  const text = filterText.trim()
  const numericValue = toNumber(value)
  if (numericValue === null) return true

  const range = parseNumericRange(text)
  if (range) {
    return numericValue >= range.min && numericValue <= range.max
  }

  const comparison = parseComparison(text)
  if (comparison) {
    if (comparison.threshold === null) return true
    switch (comparison.operator) {
      case ">=":
        return numericValue >= comparison.threshold
      case "<=":
        return numericValue <= comparison.threshold
      case ">":
        return numericValue > comparison.threshold
      case "<":
        return numericValue < comparison.threshold
    }
  }

  const exact = parseLooseNumber(text)
  if (exact === null) return true
  return Math.abs(numericValue - exact) < 0.01
}

export function parseNumericRange(text: string): { min: number; max: number } | null {
  // ".." is unambiguous, try it first
  const dotIdx = text.indexOf("..")
  if (dotIdx >= 0) {
    const min = parseLooseNumber(text.slice(0, dotIdx).trim())
    const max = parseLooseNumber(text.slice(dotIdx + 2).trim())
    return min !== null && max !== null ? { min, max } : null
  }

  // A separating dash has a digit right before it; any other dash is a sign
  for (let i = 1; i < text.length; i++) {
    if (text[i] === "-" && /\d/.test(text[i - 1])) {
      const min = parseLooseNumber(text.slice(0, i).trim())
      const max = parseLooseNumber(text.slice(i + 1).trim())
      if (min !== null && max !== null) return { min, max }
    }
  }

  return null
}

type ComparisonOperator = ">=" | "<=" | ">" | "<"

function parseComparison(text: string): { operator: ComparisonOperator; threshold: number | null } | null {
  const operators: ComparisonOperator[] = [">=", "<=", ">", "<"]
  for (const operator of operators) {
    if (text.startsWith(operator)) {
      return { operator, threshold: parseLooseNumber(text.slice(operator.length).trim()) }
    }
  }
  return null
}

function toNumber(value: unknown): number | null {
  if (typeof value === "boolean") return value ? 1 : 0
  if (typeof value === "string" || typeof value === "number" || typeof value === "bigint") {
    return parseLooseNumber(value)
  }
  return null
}
