import fluentLogger from 'fluent-logger'

import type { FluentdConfig } from './config.js'
import type { Logger } from './types.js'

export type AuditEvent =
  | 'SERVER_START'
  | 'SERVER_STOP'
  | 'LOGIN_FAILURE_INVALID_PASSWORD'
  | 'LOGIN_FAILURE_TOKEN_CREATION_FAILURE'
  | 'TOKEN_CREATED'
  | 'LOGIN_SUCCESS'
  | 'SECRET_CREATE_FAILURE'
  | 'SECRET_CREATE_FAILURE_NO_TOKEN'
  | 'SECRET_CREATE_FAILURE_INVALID_TOKEN'
  | 'SECRET_CREATE_SUCCESS'
  | 'SECRET_FETCH_FAILURE_NO_TOKEN'
  | 'SECRET_FETCH_FAILURE_INVALID_TOKEN'
  | 'SECRET_FETCH_FAILURE_NOEXIST'
  | 'SECRET_FETCH_SUCCESS'

export type AuditRecord = Partial<Record<AuditEvent, string>>

export interface AuditSink {
  post(record: AuditRecord): Promise<void>
  /** Flushes `final` and closes the connection. */
  close(final: AuditRecord): Promise<void>
}

export interface FluentAuditSinkOptions {
  log: Logger
  /** How long a record may wait for fluentd before its delivery fails. */
  deliveryTimeoutMs?: number
  /** Oldest records are dropped past this many undelivered ones. */
  queueSizeLimit?: number
}

export const DEFAULT_DELIVERY_TIMEOUT_MS = 5_000
export const DEFAULT_QUEUE_SIZE_LIMIT = 1_000

// Sender settings that fluent-logger reads but its typings leave out.
interface SenderOptions extends fluentLogger.Options {
  enableReconnect?: boolean
  messageQueueSizeLimit?: number
}

type Settle = (err?: Error) => void

interface ErrorObservable {
  on(event: 'error', listener: (err: Error) => void): unknown
}

// The sender relays socket errors through an event emitter it does not declare.
function isErrorObservable(sender: object): sender is ErrorObservable {
  return 'on' in sender && typeof sender.on === 'function'
}

/**
 * Forwards audit records to fluentd, tagged with the instance SPIFFE ID.
 *
 * fluent-logger never invokes a record's callback when the connection fails, so
 * every delivery also fails on the sender's `error` event or after
 * `deliveryTimeoutMs`. The sender does not run its own reconnect timer; the next
 * record opens a new connection and flushes whatever is still queued.
 */
export class FluentAuditSink implements AuditSink {
  private readonly sender: fluentLogger.FluentSender<AuditRecord>
  private readonly pending = new Set<Settle>()
  private readonly deliveryTimeoutMs: number
  private closed = false

  constructor(tag: string, config: FluentdConfig, options: FluentAuditSinkOptions) {
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS

    const senderOptions: SenderOptions = {
      host: config.host,
      port: config.port,
      timeout: 3.0,
      enableReconnect: false,
      messageQueueSizeLimit: options.queueSizeLimit ?? DEFAULT_QUEUE_SIZE_LIMIT,
      internalLogger: {
        info: (message: unknown) => {
          options.log.info({ sink: 'fluentd' }, String(message))
        },
        error: (message: unknown, err?: unknown) => {
          options.log.error({ sink: 'fluentd', err }, String(message))
        },
      },
    }
    this.sender = fluentLogger.createFluentSender<AuditRecord>(tag, senderOptions)

    if (isErrorObservable(this.sender)) {
      this.sender.on('error', (err: Error) => {
        this.failPending(err)
      })
    }
  }

  post(record: AuditRecord): Promise<void> {
    return this.deliver((settle) => {
      this.sender.emit(record, settle)
    })
  }

  close(final: AuditRecord): Promise<void> {
    const delivery = this.deliver((settle) => {
      this.sender.end('shutdown', final, settle)
    })
    this.closed = true
    return delivery
  }

  private deliver(send: (settle: Settle) => void): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('Audit sink is closed'))
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        settle(
          new Error(
            `fluentd did not accept the audit record within ${String(this.deliveryTimeoutMs)}ms`,
          ),
        )
      }, this.deliveryTimeoutMs)

      const settle: Settle = (err) => {
        clearTimeout(timer)
        this.pending.delete(settle)
        if (err) {
          reject(err)
          return
        }
        resolve()
      }

      this.pending.add(settle)
      send(settle)
    })
  }

  private failPending(err: Error): void {
    for (const settle of [...this.pending]) {
      settle(err)
    }
  }
}

export class AuditLog {
  constructor(
    private readonly sink: AuditSink,
    private readonly log: Logger,
  ) {}

  /** Posts `{ [event]: message }` without holding up the caller. */
  record(event: AuditEvent, message: string): void {
    const record: AuditRecord = { [event]: message }
    this.sink.post(record).catch((err: unknown) => {
      this.log.error({ err, event }, 'Cannot post audit event to fluentd')
    })
  }

  close(event: AuditEvent, message: string): Promise<void> {
    return this.sink.close({ [event]: message })
  }
}
