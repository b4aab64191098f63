import fs from "fs/promises"
import path from "path"
import { randomUUID } from "crypto"

export type AuthenticationType = "sql" | "windows"
export type EncryptMode = "optional" | "mandatory" | "strict"

export interface ServerConnection {
  id: string
  serverName: string
  displayName: string
  authenticationType: AuthenticationType
  encryptMode: EncryptMode
  trustServerCertificate: boolean
  description?: string
  isFavorite: boolean
  createdAt: Date
  lastConnected: Date | null
}

export interface ServerCredential {
  username: string
  password: string
}

export interface NewServer {
  serverName: string
  displayName?: string
  authenticationType?: AuthenticationType
  encryptMode?: EncryptMode
  trustServerCertificate?: boolean
  description?: string
  isFavorite?: boolean
}

// Credentials live outside servers.json
export interface CredentialStore {
  get(serverId: string): ServerCredential | null
  set(serverId: string, credential: ServerCredential): void
  delete(serverId: string): void
}

export class MemoryCredentialStore implements CredentialStore {
  private readonly credentials = new Map<string, ServerCredential>()

  // Used for servers without stored credentials, e.g. from SQL_USERNAME / SQL_PASSWORD
  constructor(private readonly fallback: ServerCredential | null = null) {}

  get(serverId: string): ServerCredential | null {
    return this.credentials.get(serverId) ?? this.fallback
  }

  set(serverId: string, credential: ServerCredential): void {
    this.credentials.set(serverId, { ...credential })
  }

  delete(serverId: string): void {
    this.credentials.delete(serverId)
  }
}

export function credentialStoreFromEnv(env: Record<string, string | undefined> = process.env): MemoryCredentialStore {
  const username = env.SQL_USERNAME
  return new MemoryCredentialStore(username ? { username, password: env.SQL_PASSWORD ?? "" } : null)
}

const AUTH_TYPES: readonly AuthenticationType[] = ["sql", "windows"]
const ENCRYPT_MODES: readonly EncryptMode[] = ["optional", "mandatory", "strict"]

function parseDate(value: unknown): Date | null {
  if (typeof value !== "string" && typeof value !== "number") return null
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? null : date
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

function toServer(record: unknown): ServerConnection | null {
  if (!isRecord(record)) return null
  if (typeof record.id !== "string" || typeof record.serverName !== "string") return null

  const auth = AUTH_TYPES.find(a => a === record.authenticationType) ?? "windows"
  const encrypt = ENCRYPT_MODES.find(m => m === record.encryptMode) ?? "mandatory"

  return {
    id: record.id,
    serverName: record.serverName,
    displayName: typeof record.displayName === "string" && record.displayName ? record.displayName : record.serverName,
    authenticationType: auth,
    encryptMode: encrypt,
    trustServerCertificate: record.trustServerCertificate === true,
    description: typeof record.description === "string" ? record.description : undefined,
    isFavorite: record.isFavorite === true,
    createdAt: parseDate(record.createdAt) ?? new Date(),
    lastConnected: parseDate(record.lastConnected),
  }
}

/**
 * Monitored server list persisted to servers.json in the data directory.
 * Favorites sort first, then the most recently connected.
 */
export class ServerManager {
  private servers: ServerConnection[] = []
  private readonly filePath: string

  constructor(dataDir: string, private readonly credentials: CredentialStore = new MemoryCredentialStore()) {
    this.filePath = path.join(dataDir, "servers.json")
  }

  async load(): Promise<void> {
    let json: string
    try {
      json = await fs.readFile(this.filePath, "utf8")
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        this.servers = []
        return
      }
      throw error
    }

    try {
      const parsed: unknown = JSON.parse(json)
      const items = Array.isArray(parsed) ? parsed : []
      this.servers = items.map(toServer).filter((s): s is ServerConnection => s !== null)
    } catch (error) {
      console.warn(`[Servers] Failed to load servers.json: ${error instanceof Error ? error.message : error}. Starting with an empty list.`)
      this.servers = []
    }
  }

  list(): ServerConnection[] {
    return [...this.servers].sort((a, b) => {
      if (a.isFavorite !== b.isFavorite) return a.isFavorite ? -1 : 1
      return (b.lastConnected?.getTime() ?? 0) - (a.lastConnected?.getTime() ?? 0)
    })
  }

  get(id: string): ServerConnection | undefined {
    return this.servers.find(s => s.id === id)
  }

  // Windows servers only see the store's fallback (DOMAIN\user from the environment)
  getCredential(id: string): ServerCredential | null {
    if (!this.get(id)) return null
    return this.credentials.get(id)
  }

  async add(input: NewServer, credential?: ServerCredential): Promise<ServerConnection> {
    const serverName = input.serverName.trim()
    if (!serverName) throw new Error("Server name is required")

    const server: ServerConnection = {
      id: randomUUID(),
      serverName,
      displayName: input.displayName?.trim() || serverName,
      authenticationType: input.authenticationType ?? "windows",
      encryptMode: input.encryptMode ?? "mandatory",
      trustServerCertificate: input.trustServerCertificate ?? false,
      description: input.description,
      isFavorite: input.isFavorite ?? false,
      createdAt: new Date(),
      lastConnected: null,
    }

    this.servers.push(server)
    try {
      await this.save()
    } catch (error) {
      this.servers = this.servers.filter(s => s !== server)
      throw error
    }

    if (server.authenticationType === "sql" && credential) {
      this.credentials.set(server.id, credential)
    }

    console.log(`[Servers] Added ${server.displayName} (${server.serverName})`)
    return server
  }

  async update(id: string, changes: Partial<NewServer>, credential?: ServerCredential): Promise<ServerConnection> {
    const index = this.servers.findIndex(s => s.id === id)
    if (index < 0) throw new Error(`Server with ID ${id} not found`)

    const updated: ServerConnection = { ...this.servers[index] }
    if (changes.serverName !== undefined) {
      updated.serverName = changes.serverName.trim()
      if (!updated.serverName) throw new Error("Server name is required")
    }
    if (changes.displayName !== undefined) updated.displayName = changes.displayName.trim() || updated.serverName
    if (changes.authenticationType !== undefined) updated.authenticationType = changes.authenticationType
    if (changes.encryptMode !== undefined) updated.encryptMode = changes.encryptMode
    if (changes.trustServerCertificate !== undefined) updated.trustServerCertificate = changes.trustServerCertificate
    if (changes.description !== undefined) updated.description = changes.description
    if (changes.isFavorite !== undefined) updated.isFavorite = changes.isFavorite

    this.servers[index] = updated
    await this.save()

    if (updated.authenticationType === "windows") {
      this.credentials.delete(id)
    } else if (credential) {
      this.credentials.set(id, credential)
    }

    return updated
  }

  async remove(id: string): Promise<boolean> {
    const before = this.servers.length
    this.servers = this.servers.filter(s => s.id !== id)
    if (this.servers.length === before) return false

    await this.save()
    this.credentials.delete(id)
    return true
  }

  async markConnected(id: string, at: Date = new Date()): Promise<void> {
    const server = this.get(id)
    if (!server) return
    server.lastConnected = at
    await this.save()
  }

  private async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true })
    await fs.writeFile(this.filePath, JSON.stringify(this.servers, null, 2), "utf8")
  }
}
