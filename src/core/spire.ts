import { spawn } from 'node:child_process'
import { readFileSync } from 'node:fs'
import { constants } from 'node:os'

import type { ProcessResult } from './types.js'

export interface RegistrationEntry {
  parentId: string
  spiffeId: string
  selector: string
  ttlSeconds: number
}

export interface RegistrarOptions {
  composeCommand: string
  service: string
  spireDir: string
}

export interface RegistrationResult extends ProcessResult {
  entry: RegistrationEntry
}

export const DEFAULT_REGISTRAR_OPTIONS: RegistrarOptions = {
  composeCommand: 'docker-compose',
  service: 'spire-server',
  spireDir: '/opt/spire',
}

const SPIFFE_ID_PATTERN = /^spiffe:\/\/[^/\s]+(\/\S*)?$/
const SELECTOR_PATTERN = /^[^:\s]+:\S+$/

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function buildEntryCreateCommand(
  entry: RegistrationEntry,
  spireDir: string = DEFAULT_REGISTRAR_OPTIONS.spireDir,
): string {
  return [
    `cd ${spireDir} && ./spire-server entry create`,
    `-parentID ${entry.parentId}`,
    `-spiffeID ${entry.spiffeId}`,
    `-selector ${entry.selector}`,
    `-ttl ${String(entry.ttlSeconds)}`,
  ].join(' ')
}

export function buildComposeArgs(
  entry: RegistrationEntry,
  options: RegistrarOptions = DEFAULT_REGISTRAR_OPTIONS,
): string[] {
  return ['exec', options.service, 'sh', '-c', buildEntryCreateCommand(entry, options.spireDir)]
}

/** The invocation as it would be typed into a shell. */
export function formatComposeCommandLine(
  entry: RegistrationEntry,
  options: RegistrarOptions = DEFAULT_REGISTRAR_OPTIONS,
): string {
  return `${options.composeCommand} exec ${options.service} sh -c "${buildEntryCreateCommand(entry, options.spireDir)}"`
}

function parseEntry(raw: unknown, index: number): RegistrationEntry {
  const field = `entries[${String(index)}]`
  if (!isRecord(raw)) {
    throw new Error(`${field} must be an object`)
  }

  const { parentId, spiffeId, selector, ttlSeconds } = raw
  if (typeof parentId !== 'string' || !SPIFFE_ID_PATTERN.test(parentId)) {
    throw new Error(`${field}.parentId must be a spiffe:// URI`)
  }
  if (typeof spiffeId !== 'string' || !SPIFFE_ID_PATTERN.test(spiffeId)) {
    throw new Error(`${field}.spiffeId must be a spiffe:// URI`)
  }
  if (typeof selector !== 'string' || !SELECTOR_PATTERN.test(selector)) {
    throw new Error(`${field}.selector must look like type:value (e.g. unix:uid:0)`)
  }
  if (typeof ttlSeconds !== 'number' || !Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new Error(`${field}.ttlSeconds must be a positive integer`)
  }

  return { parentId, spiffeId, selector, ttlSeconds }
}

export function parseRegistrationEntries(raw: unknown): RegistrationEntry[] {
  if (!Array.isArray(raw)) {
    throw new Error('Registration entries must be a JSON array')
  }
  return raw.map((item: unknown, index) => parseEntry(item, index))
}

export function loadRegistrationEntries(filePath: string): RegistrationEntry[] {
  const data = readFileSync(filePath, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(data)
  } catch {
    throw new Error(`Invalid JSON in registration entries file: ${filePath}`)
  }
  return parseRegistrationEntries(parsed)
}

export class SpireRegistrar {
  private readonly options: RegistrarOptions

  constructor(options: Partial<RegistrarOptions> = {}) {
    this.options = { ...DEFAULT_REGISTRAR_OPTIONS, ...options }
  }

  /**
   * Runs `entry create` for each entry in order, one at a time. A failed entry
   * does not stop the ones after it.
   */
  async registerAll(entries: RegistrationEntry[]): Promise<RegistrationResult[]> {
    const results: RegistrationResult[] = []
    for (const entry of entries) {
      results.push(await this.register(entry))
    }
    return results
  }

  register(entry: RegistrationEntry): Promise<RegistrationResult> {
    return new Promise((resolve) => {
      const child = spawn(this.options.composeCommand, buildComposeArgs(entry, this.options), {
        stdio: 'inherit',
      })

      child.on('error', (err: Error) => {
        resolve({ entry, exitCode: null, error: `Spawn failure: ${err.message}` })
      })

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (exitCode === null && signal !== null) {
          // Report it the way a shell would: 128 plus the signal number.
          resolve({
            entry,
            exitCode: 128 + constants.signals[signal],
            error: `Terminated by ${signal}`,
          })
          return
        }
        resolve({ entry, exitCode })
      })
    })
  }
}

/** The overall exit code follows the last invocation, like a plain shell script. */
export function lastExitCode(results: RegistrationResult[]): number {
  const last = results.at(-1)
  if (last === undefined) return 0
  return last.exitCode ?? 1
}
