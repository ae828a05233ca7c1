import { createServer as createNetServer, type Server } from 'node:net'

import type { AuditRecord, AuditSink } from '../core/audit.js'
import type { KeyValueStore } from '../core/kv-store.js'
import type { Logger } from '../core/types.js'

export class MemoryStore implements KeyValueStore {
  readonly data = new Map<string, string>()
  readonly ttls = new Map<string, number>()
  failGet: (key: string) => boolean = () => false
  failSet: (key: string) => boolean = () => false
  closed = false

  async get(key: string): Promise<string | null> {
    if (this.failGet(key)) {
      throw new Error(`Unable to fetch etcd key ${key}`)
    }
    return this.data.get(key) ?? null
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (this.failSet(key)) {
      throw new Error(`Unable to update etcd key ${key}`)
    }
    this.data.set(key, value)
    if (ttlSeconds !== undefined) {
      this.ttls.set(key, ttlSeconds)
    }
  }

  close(): void {
    this.closed = true
  }
}

export class RecordingAuditSink implements AuditSink {
  readonly records: AuditRecord[] = []
  finalRecord: AuditRecord | null = null

  async post(record: AuditRecord): Promise<void> {
    this.records.push(record)
  }

  async close(final: AuditRecord): Promise<void> {
    this.finalRecord = final
  }
}

export function createTestLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger
}

export async function listenLocal(server: Server): Promise<number> {
  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve())
  })
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address')
  }
  return address.port
}

export async function closeServer(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()))
  })
}

/** A loopback port that was just released, so connecting to it is refused. */
export async function closedPort(): Promise<number> {
  const server = createNetServer()
  const port = await listenLocal(server)
  await closeServer(server)
  return port
}
