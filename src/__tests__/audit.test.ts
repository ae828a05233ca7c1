/// <reference types="vitest/globals" />

import type fluentLogger from 'fluent-logger'

const { emit, end, on, createFluentSender } = vi.hoisted(() => {
  const emit = vi.fn()
  const end = vi.fn()
  const on = vi.fn((_event: string, _listener: (err: Error) => void) => undefined)
  const createFluentSender = vi.fn((_tag: string, _options: fluentLogger.Options) => ({
    emit,
    end,
    on,
  }))
  return { emit, end, on, createFluentSender }
})

vi.mock('fluent-logger', () => ({
  default: { createFluentSender },
}))

import { AuditLog, FluentAuditSink } from '../core/audit.js'
import { createTestLogger, RecordingAuditSink } from './fakes.js'

type Callback = (err?: Error) => void

function createSink(deliveryTimeoutMs?: number) {
  const log = createTestLogger()
  const sink = new FluentAuditSink(
    'spiffe://example.org/simple-secrets1',
    { host: '127.0.0.1', port: 24224 },
    { log, deliveryTimeoutMs },
  )
  return { sink, log }
}

describe('FluentAuditSink', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('creates a non-reconnecting sender with a bounded queue', () => {
    new FluentAuditSink(
      'spiffe://example.org/simple-secrets1',
      { host: 'fluentd', port: 24224 },
      { log: createTestLogger() },
    )

    expect(createFluentSender).toHaveBeenCalledWith(
      'spiffe://example.org/simple-secrets1',
      expect.objectContaining({
        host: 'fluentd',
        port: 24224,
        enableReconnect: false,
        messageQueueSizeLimit: 1000,
      }),
    )
    expect(on).toHaveBeenCalledWith('error', expect.any(Function))
  })

  it('resolves once fluentd accepts the record', async () => {
    emit.mockImplementation((_record: unknown, cb: Callback) => cb())
    const { sink } = createSink()

    await sink.post({ LOGIN_SUCCESS: 'Login success for user alice' })

    expect(emit).toHaveBeenCalledWith(
      { LOGIN_SUCCESS: 'Login success for user alice' },
      expect.any(Function),
    )
  })

  it('fails pending records when the sender reports a connection error', async () => {
    emit.mockImplementation(() => undefined)
    const { sink } = createSink()

    const first = sink.post({ SERVER_START: 'started' })
    const second = sink.post({ LOGIN_SUCCESS: 'Login success for user alice' })
    const onError = on.mock.calls[0][1]
    onError(new Error('connect ECONNREFUSED 127.0.0.1:24224'))

    await expect(first).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:24224')
    await expect(second).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:24224')
  })

  it('fails a record that fluentd never acknowledges', async () => {
    emit.mockImplementation(() => undefined)
    const { sink } = createSink(20)

    await expect(sink.post({ SERVER_START: 'started' })).rejects.toThrow(
      'fluentd did not accept the audit record within 20ms',
    )
  })

  it('sends the final record through end() on close', async () => {
    end.mockImplementation((_label: string, _record: unknown, cb: Callback) => cb())
    const { sink } = createSink()

    await sink.close({ SERVER_STOP: 'stopped' })

    expect(end).toHaveBeenCalledWith('shutdown', { SERVER_STOP: 'stopped' }, expect.any(Function))
  })

  it('settles close when the final record cannot be delivered', async () => {
    end.mockImplementation(() => undefined)
    const { sink } = createSink(20)

    await expect(sink.close({ SERVER_STOP: 'stopped' })).rejects.toThrow(
      'fluentd did not accept the audit record within 20ms',
    )
  })

  it('refuses records after close', async () => {
    end.mockImplementation((_label: string, _record: unknown, cb: Callback) => cb())
    const { sink } = createSink()
    await sink.close({ SERVER_STOP: 'stopped' })

    await expect(sink.post({ SERVER_START: 'started' })).rejects.toThrow('Audit sink is closed')
    expect(emit).not.toHaveBeenCalled()
  })

  it('routes the sender diagnostics to the server logger', () => {
    const { log } = createSink()
    const internalLogger = createFluentSender.mock.calls[0][1].internalLogger
    const failure = new Error('socket hang up')

    internalLogger?.error('Fluentd error', failure)
    internalLogger?.info('Established')

    expect(log.error).toHaveBeenCalledWith({ sink: 'fluentd', err: failure }, 'Fluentd error')
    expect(log.info).toHaveBeenCalledWith({ sink: 'fluentd' }, 'Established')
  })
})

describe('AuditLog', () => {
  it('posts a single-key record named after the event', () => {
    const sink = new RecordingAuditSink()
    const audit = new AuditLog(sink, createTestLogger())

    audit.record('TOKEN_CREATED', 'Session token abc for user alice created')

    expect(sink.records).toEqual([{ TOKEN_CREATED: 'Session token abc for user alice created' }])
  })

  it('logs delivery failures instead of throwing', async () => {
    const log = createTestLogger()
    const failure = new Error('fluentd unavailable')
    const sink = new RecordingAuditSink()
    sink.post = () => Promise.reject(failure)
    const audit = new AuditLog(sink, log)

    expect(() => audit.record('SERVER_START', 'started')).not.toThrow()
    await new Promise((resolve) => setImmediate(resolve))

    expect(log.error).toHaveBeenCalledWith(
      { err: failure, event: 'SERVER_START' },
      'Cannot post audit event to fluentd',
    )
  })
})
