import type sql from "mssql"
import { createConnection } from "./mssql"
import type { ServerConnection, ServerCredential } from "./servers"

export const SHOWPLAN_COLUMN = "Microsoft SQL Server 2005 XML Showplan"

export type PlanCaptureResult =
  | { status: "captured"; planXml: string }
  | { status: "empty" }
  | { status: "cancelled" }
  | { status: "failed"; message: string }

// The slice of mssql's ConnectionPool / Request used for plan capture
export interface PlanRequest {
  query(command: string): Promise<{ recordsets: unknown }>
  cancel(): void
}

export interface PlanConnection {
  request(): PlanRequest
}

export type PlanExecutor = (databaseName: string, queryText: string, signal: AbortSignal) => Promise<PlanCaptureResult>

function quoteName(name: string): string {
  return `[${name.replace(/]/g, "]]")}]`
}

export function buildPlanCaptureScript(databaseName: string, queryText: string): string {
  const lines = ["SET STATISTICS XML ON;"]
  if (databaseName.trim()) {
    lines.push(`USE ${quoteName(databaseName.trim())};`)
  }
  lines.push(queryText.trim(), "SET STATISTICS XML OFF;")
  return lines.join("\n")
}

function isShowPlan(value: unknown): value is string {
  return typeof value === "string" && value.trimStart().startsWith("<ShowPlanXML")
}

/**
 * Finds the plan in the result sets of a statistics-xml batch. Every statement
 * appends a one-row, one-column plan set after its data; the last one wins.
 */
export function extractPlanXml(recordsets: unknown): string | null {
  if (!Array.isArray(recordsets)) return null

  let planXml: string | null = null
  for (const recordset of recordsets) {
    if (!Array.isArray(recordset) || recordset.length === 0) continue
    const first: unknown = recordset[0]
    if (typeof first !== "object" || first === null) continue

    const values: unknown[] = Object.values(first)
    if (values.length !== 1) continue

    const value = SHOWPLAN_COLUMN in first ? Reflect.get(first, SHOWPLAN_COLUMN) : values[0]
    if (isShowPlan(value)) planXml = value
  }
  return planXml
}

export async function captureActualPlan(
  connection: PlanConnection,
  databaseName: string,
  queryText: string,
  signal?: AbortSignal
): Promise<PlanCaptureResult> {
  if (!queryText.trim()) {
    return { status: "failed", message: "No query text to execute" }
  }
  if (signal?.aborted) return { status: "cancelled" }

  const request = connection.request()
  const onAbort = () => request.cancel()
  signal?.addEventListener("abort", onAbort, { once: true })

  try {
    const result = await request.query(buildPlanCaptureScript(databaseName, queryText))
    if (signal?.aborted) return { status: "cancelled" }

    const planXml = extractPlanXml(result.recordsets)
    return planXml ? { status: "captured", planXml } : { status: "empty" }
  } catch (error) {
    if (signal?.aborted) {
      console.log("[Plan] Actual plan capture cancelled")
      return { status: "cancelled" }
    }
    console.error("[Plan] Actual plan capture failed:", error)
    return {
      status: "failed",
      message: error instanceof Error ? error.message : "Plan capture failed"
    }
  } finally {
    signal?.removeEventListener("abort", onAbort)
  }
}

// One pool per capture, closed when it settles
export function createPlanExecutor(server: ServerConnection, credential: ServerCredential | null): PlanExecutor {
  return async (databaseName, queryText, signal) => {
    let pool: sql.ConnectionPool | null = null
    try {
      pool = await createConnection(server, credential, databaseName || undefined)
      return await captureActualPlan(pool, databaseName, queryText, signal)
    } catch (error) {
      console.error(`[Plan] Could not connect to ${server.displayName}:`, error)
      return {
        status: "failed",
        message: error instanceof Error ? error.message : "Connection failed"
      }
    } finally {
      if (pool) await pool.close()
    }
  }
}
