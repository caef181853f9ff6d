import { parse } from 'smol-toml'
import { readFileSync, existsSync } from 'fs'

const validSslModes = ['disable', 'prefer', 'require', 'verify-full'] as const

export interface CompletionConfig {
  smart_completion: boolean
  debug: boolean
  keywords: string[]
  special_commands: string[]
}

export type SslMode = (typeof validSslModes)[number]

export interface DatabaseConfig {
  host: string
  port: number
  database: string
  username: string
  password?: string
  ssl_mode: SslMode
}

interface Config {
  completion: CompletionConfig
  database?: DatabaseConfig
}

const DEFAULT_COMPLETION: CompletionConfig = { smart_completion: true, debug: false, keywords: [], special_commands: [] }

let loadedConfig: Config = { completion: { ...DEFAULT_COMPLETION } }

export async function loadConfig(configPath: string): Promise<void> {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`)
  }

  const content = readFileSync(configPath, 'utf-8')
  const parsed: Record<string, unknown> = parse(content)

  const completion = parseCompletion(parsed.completion)
  const database = parsed.database === undefined ? undefined : parseDatabase(parsed.database)

  loadedConfig = { completion, database }
}

function parseCompletion(raw: unknown): CompletionConfig {
  if (raw === undefined) {
    return { ...DEFAULT_COMPLETION }
  }
  if (!isTable(raw)) {
    throw new Error('completion must be a table')
  }

  const completion: CompletionConfig = { ...DEFAULT_COMPLETION }

  if (raw.smart_completion !== undefined) {
    if (typeof raw.smart_completion !== 'boolean') {
      throw new Error('completion.smart_completion must be a boolean')
    }
    completion.smart_completion = raw.smart_completion
  }

  if (raw.debug !== undefined) {
    if (typeof raw.debug !== 'boolean') {
      throw new Error('completion.debug must be a boolean')
    }
    completion.debug = raw.debug
  }

  if (raw.keywords !== undefined) {
    completion.keywords = parseStringList(raw.keywords, 'completion.keywords')
  }

  if (raw.special_commands !== undefined) {
    completion.special_commands = parseStringList(raw.special_commands, 'completion.special_commands')
  }

  return completion
}

function parseDatabase(raw: unknown): DatabaseConfig {
  if (!isTable(raw)) {
    throw new Error('database must be a table')
  }

  // Validate required fields
  if (!raw.host || typeof raw.host !== 'string') {
    throw new Error('database.host is required (must be non-empty string)')
  }
  if (!raw.database || typeof raw.database !== 'string') {
    throw new Error('database.database is required (must be non-empty string)')
  }
  if (!raw.username || typeof raw.username !== 'string') {
    throw new Error('database.username is required (must be non-empty string)')
  }

  let port = 5432
  if (raw.port !== undefined) {
    if (typeof raw.port !== 'number' || !Number.isInteger(raw.port) || raw.port < 1 || raw.port > 65535) {
      throw new Error('database.port must be an integer between 1 and 65535')
    }
    port = raw.port
  }

  let password: string | undefined = undefined
  if (raw.password !== undefined) {
    if (typeof raw.password !== 'string') {
      throw new Error('database.password must be a string')
    }
    password = raw.password
  }

  let sslMode: SslMode = 'prefer'
  if (raw.ssl_mode !== undefined) {
    if (!isSslMode(raw.ssl_mode)) {
      throw new Error(`database.ssl_mode must be one of: ${validSslModes.join(', ')}`)
    }
    sslMode = raw.ssl_mode
  }

  return {
    host: raw.host,
    port,
    database: raw.database,
    username: raw.username,
    password,
    ssl_mode: sslMode,
  }
}

function parseStringList(raw: unknown, key: string): string[] {
  if (!Array.isArray(raw)) {
    throw new Error(`${key} must be an array of strings`)
  }
  const values: string[] = []
  for (const item of raw) {
    if (typeof item !== 'string') {
      throw new Error(`${key} must be an array of strings`)
    }
    values.push(item)
  }
  return values
}

function isSslMode(value: unknown): value is SslMode {
  return validSslModes.some((mode) => mode === value)
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function getCompletionConfig(): CompletionConfig {
  return loadedConfig.completion
}

export function getDatabaseConfig(): DatabaseConfig | undefined {
  return loadedConfig.database
}

export function resetConfig(): void {
  loadedConfig = { completion: { ...DEFAULT_COMPLETION } }
}
