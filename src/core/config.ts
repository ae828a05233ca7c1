import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { homedir } from 'node:os'

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export interface ListenConfig {
  host: string
  port: number
}

export interface EtcdConfig {
  hosts: string[]
}

export interface FluentdConfig {
  host: string
  port: number
}

export interface ClientConfig {
  url: string
}

export interface AppConfig {
  spiffeId: string
  server: ListenConfig
  metrics: ListenConfig
  etcd: EtcdConfig
  fluentd: FluentdConfig
  client: ClientConfig
  tokenExpirationSecs: number
  logLevel: LogLevel
}

export const CONFIG_PATH = resolve(homedir(), '.simple-secrets', 'config.json')

export const DEFAULT_SPIFFE_ID = 'spiffe://example.org/simple-secrets1'
export const DEFAULT_TOKEN_EXPIRATION_SECS = 600

export function resolveTilde(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return resolve(homedir(), p.slice(2))
  }
  return p
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parsePort(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > 65535) {
    throw new Error(`${field} must be an integer between 1 and 65535`)
  }
  return value
}

function parseListenConfig(raw: unknown, field: string, defaults: ListenConfig): ListenConfig {
  if (raw === undefined || raw === null) return { ...defaults }
  if (!isRecord(raw)) {
    throw new Error(`${field} must be an object`)
  }

  const host = raw.host !== undefined ? raw.host : defaults.host
  if (typeof host !== 'string' || host === '') {
    throw new Error(`${field}.host must be a non-empty string`)
  }

  const port = parsePort(raw.port !== undefined ? raw.port : defaults.port, `${field}.port`)

  return { host, port }
}

function parseEtcdConfig(raw: unknown): EtcdConfig {
  const defaults = defaultConfig().etcd
  if (raw === undefined || raw === null) return defaults
  if (!isRecord(raw)) {
    throw new Error('etcd must be an object')
  }

  const hosts = raw.hosts !== undefined ? raw.hosts : defaults.hosts
  if (
    !Array.isArray(hosts) ||
    hosts.length === 0 ||
    !hosts.every((h): h is string => typeof h === 'string' && h !== '')
  ) {
    throw new Error('etcd.hosts must be a non-empty array of strings')
  }

  return { hosts }
}

function parseClientConfig(raw: unknown): ClientConfig {
  const defaults = defaultConfig().client
  if (raw === undefined || raw === null) return defaults
  if (!isRecord(raw)) {
    throw new Error('client must be an object')
  }

  const url = raw.url !== undefined ? raw.url : defaults.url
  if (typeof url !== 'string' || url === '') {
    throw new Error('client.url must be a non-empty string')
  }

  return { url }
}

function parseSpiffeId(raw: unknown): string {
  if (raw === undefined) return DEFAULT_SPIFFE_ID
  if (typeof raw !== 'string' || !raw.startsWith('spiffe://')) {
    throw new Error('spiffeId must be a spiffe:// URI')
  }
  return raw
}

function parseLogLevel(raw: unknown): LogLevel {
  if (raw === undefined) return 'info'
  const level = LOG_LEVELS.find((l) => l === raw)
  if (level === undefined) {
    throw new Error(`logLevel must be one of ${LOG_LEVELS.join(', ')}`)
  }
  return level
}

/**
 * Splits a `host:port` forward address. The port is taken from the last colon
 * so bracketless IPv6 hosts are not supported.
 */
export function parseForwardAddr(addr: string): FluentdConfig {
  const idx = addr.lastIndexOf(':')
  if (idx <= 0) {
    throw new Error(`Invalid forward address "${addr}". Expected host:port`)
  }
  const host = addr.slice(0, idx)
  const port = Number(addr.slice(idx + 1))
  return { host, port: parsePort(port, 'FLUENTD_FORWARD_ADDR port') }
}

export function defaultConfig(): AppConfig {
  return {
    spiffeId: DEFAULT_SPIFFE_ID,
    server: { host: '0.0.0.0', port: 3000 },
    metrics: { host: '127.0.0.1', port: 3001 },
    etcd: { hosts: ['http://localhost:2379'] },
    fluentd: { host: '127.0.0.1', port: 24224 },
    client: { url: 'http://127.0.0.1:3000' },
    tokenExpirationSecs: DEFAULT_TOKEN_EXPIRATION_SECS,
    logLevel: 'info',
  }
}

export function parseConfig(raw: unknown): AppConfig {
  if (!isRecord(raw)) {
    throw new Error('Config must be a JSON object')
  }

  const defaults = defaultConfig()

  const tokenExpirationSecs =
    raw.tokenExpirationSecs !== undefined ? raw.tokenExpirationSecs : defaults.tokenExpirationSecs
  if (
    typeof tokenExpirationSecs !== 'number' ||
    !Number.isInteger(tokenExpirationSecs) ||
    tokenExpirationSecs <= 0
  ) {
    throw new Error('tokenExpirationSecs must be a positive integer')
  }

  return {
    spiffeId: parseSpiffeId(raw.spiffeId),
    server: parseListenConfig(raw.server, 'server', defaults.server),
    metrics: parseListenConfig(raw.metrics, 'metrics', defaults.metrics),
    etcd: parseEtcdConfig(raw.etcd),
    fluentd: parseListenConfig(raw.fluentd, 'fluentd', defaults.fluentd),
    client: parseClientConfig(raw.client),
    tokenExpirationSecs,
    logLevel: parseLogLevel(raw.logLevel),
  }
}

export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const result: AppConfig = { ...config }

  if (env.ETCD_CLUSTER_MEMBERS) {
    const hosts = env.ETCD_CLUSTER_MEMBERS.split(',')
      .map((h) => h.trim())
      .filter((h) => h !== '')
    if (hosts.length > 0) {
      result.etcd = { hosts }
    }
  }

  if (env.TOKEN_EXPIRATION_SECS !== undefined) {
    const raw = env.TOKEN_EXPIRATION_SECS
    const secs = /^\d+$/.test(raw) ? Number(raw) : 0
    result.tokenExpirationSecs =
      Number.isSafeInteger(secs) && secs > 0 ? secs : DEFAULT_TOKEN_EXPIRATION_SECS
  }

  if (env.FLUENTD_FORWARD_ADDR) {
    result.fluentd = parseForwardAddr(env.FLUENTD_FORWARD_ADDR)
  }

  if (env.SPIFFE_ID) {
    result.spiffeId = parseSpiffeId(env.SPIFFE_ID)
  }

  return result
}

export function loadConfig(
  configPath: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  let raw: string
  try {
    raw = readFileSync(configPath, 'utf-8')
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return applyEnvOverrides(defaultConfig(), env)
    }
    throw err
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`)
  }

  return applyEnvOverrides(parseConfig(parsed), env)
}

