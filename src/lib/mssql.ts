import sql from "mssql"
import type { ServerConnection, ServerCredential } from "./servers"

export interface ParsedServerName {
  host: string
  port?: number
  instanceName?: string
}

export interface ConnectionTestResult {
  success: boolean
  message: string
  version?: string
}

const CONNECT_TIMEOUT_MS = 15000
const REQUEST_TIMEOUT_MS = 120000

// Accepts "host", "host,port" and "host\instance"
export function parseServerName(serverName: string): ParsedServerName {
  const trimmed = serverName.trim()
  if (!trimmed) {
    throw new Error("Server name is required")
  }

  const commaIndex = trimmed.indexOf(",")
  if (commaIndex >= 0) {
    const host = trimmed.slice(0, commaIndex).trim()
    const port = Number(trimmed.slice(commaIndex + 1).trim())
    if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) {
      throw new Error(`Invalid server name: ${serverName}`)
    }
    return { host, port }
  }

  const slashIndex = trimmed.indexOf("\\")
  if (slashIndex >= 0) {
    const host = trimmed.slice(0, slashIndex).trim()
    const instanceName = trimmed.slice(slashIndex + 1).trim()
    if (!host || !instanceName) {
      throw new Error(`Invalid server name: ${serverName}`)
    }
    return { host, instanceName }
  }

  return { host: trimmed }
}

// "DOMAIN\user" for windows logins
function splitDomainUser(username: string): { domain: string; userName: string } {
  const slashIndex = username.indexOf("\\")
  if (slashIndex < 0) return { domain: "", userName: username }
  return { domain: username.slice(0, slashIndex), userName: username.slice(slashIndex + 1) }
}

export function buildConnectionConfig(
  server: ServerConnection,
  credential: ServerCredential | null,
  database = "master"
): sql.config {
  const parsed = parseServerName(server.serverName)

  if (!credential) {
    throw new Error(`No credentials stored for ${server.displayName}`)
  }

  const config: sql.config = {
    server: parsed.host,
    port: parsed.port,
    database,
    options: {
      encrypt: server.encryptMode !== "optional",
      trustServerCertificate: server.trustServerCertificate,
      instanceName: parsed.instanceName,
      appName: "SQL Performance Dashboard",
    },
    connectionTimeout: CONNECT_TIMEOUT_MS,
    requestTimeout: REQUEST_TIMEOUT_MS,
  }

  // A domain switches the driver to NTLM
  if (server.authenticationType === "windows") {
    const { domain, userName } = splitDomainUser(credential.username)
    config.domain = domain
    config.user = userName
  } else {
    config.user = credential.username
  }
  config.password = credential.password

  return config
}

export async function createConnection(
  server: ServerConnection,
  credential: ServerCredential | null,
  database?: string
): Promise<sql.ConnectionPool> {
  const pool = new sql.ConnectionPool(buildConnectionConfig(server, credential, database))
  await pool.connect()
  return pool
}

export async function testConnection(
  server: ServerConnection,
  credential: ServerCredential | null
): Promise<ConnectionTestResult> {
  let pool: sql.ConnectionPool | null = null
  try {
    pool = await createConnection(server, credential)
    const result = await pool.request().query<{ version: string }>("SELECT @@VERSION as version")
    console.log(`[SQL] Connection test succeeded for ${server.displayName}`)
    return {
      success: true,
      message: "Connection successful",
      version: result.recordset[0]?.version
    }
  } catch (error) {
    console.error(`[SQL] Connection test failed for ${server.displayName}:`, error)
    return {
      success: false,
      message: error instanceof Error ? error.message : "Connection failed"
    }
  } finally {
    if (pool) await pool.close()
  }
}
