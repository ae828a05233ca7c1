import Fastify, { type FastifyError, type FastifyInstance } from 'fastify'

import { AuditLog, FluentAuditSink, type AuditSink } from '../core/audit.js'
import type { AppConfig } from '../core/config.js'
import { EtcdStore, type KeyValueStore } from '../core/kv-store.js'
import { SecretMetrics } from '../core/metrics.js'
import { verifyPassword, type PasswordVerifier } from '../core/password.js'
import { SecretService } from '../core/secret-service.js'
import type {
  FetchSecretFailure,
  Logger,
  LoginFailure,
  SetSecretFailure,
} from '../core/types.js'
import { parseBasicAuth, readSessionToken } from './auth.js'
import { createMetricsServer } from './metrics.js'
import { lifecyclePlugin } from './plugin.js'

export interface ServerDeps {
  store: KeyValueStore
  createAuditSink: (log: Logger) => AuditSink
  metrics: SecretMetrics
  verifyPassword: PasswordVerifier
  generateToken?: () => string
}

interface SecretRoute {
  Params: { name: string }
}

interface SetSecretRoute {
  Params: { name: string; value: string }
}

const LOGIN_FAILURE_STATUS: Record<LoginFailure, number> = {
  unauthorized: 401,
  'token-creation-failed': 500,
}

const SET_FAILURE_RESPONSE: Record<SetSecretFailure, [number, string]> = {
  'no-token': [400, 'Token required'],
  'invalid-token': [401, 'Bad token'],
  'store-failed': [500, ''],
}

const FETCH_FAILURE_RESPONSE: Record<FetchSecretFailure, [number, string]> = {
  'no-token': [400, 'Token required'],
  'invalid-token': [401, 'Bad token'],
  'not-found': [400, 'Invalid secret'],
}

export function defaultDeps(config: AppConfig): ServerDeps {
  return {
    store: new EtcdStore(config.etcd.hosts),
    createAuditSink: (log) => new FluentAuditSink(config.spiffeId, config.fluentd, { log }),
    metrics: new SecretMetrics(),
    verifyPassword,
  }
}

export function createServer(config: AppConfig, deps: ServerDeps): FastifyInstance {
  const server = Fastify({
    logger: {
      level: config.logLevel,
    },
  })

  const service = new SecretService({
    store: deps.store,
    audit: new AuditLog(deps.createAuditSink(server.log), server.log),
    metrics: deps.metrics,
    verifyPassword: deps.verifyPassword,
    log: server.log,
    spiffeId: config.spiffeId,
    tokenExpirationSecs: config.tokenExpirationSecs,
    generateToken: deps.generateToken,
  })

  void server.register(lifecyclePlugin, { service, store: deps.store })

  server.get('/health', async () => {
    return { status: 'ok', uptime: process.uptime() }
  })

  server.get('/login', async (request, reply) => {
    const credentials = parseBasicAuth(request.headers.authorization)
    if (!credentials) {
      return reply.code(401).send()
    }

    const result = await service.login(credentials.username, credentials.password)
    if (!result.ok) {
      return reply.code(LOGIN_FAILURE_STATUS[result.reason]).send()
    }
    return reply.type('text/plain').send(result.value)
  })

  server.get<SecretRoute>('/get/:name', async (request, reply) => {
    const token = readSessionToken(request.url)
    const result = await service.fetchSecret(request.params.name, token)
    if (!result.ok) {
      const [status, message] = FETCH_FAILURE_RESPONSE[result.reason]
      return reply.code(status).type('text/plain').send(message)
    }
    return reply.type('text/plain').send(result.value)
  })

  server.post<SetSecretRoute>('/set/:name/:value', async (request, reply) => {
    const token = readSessionToken(request.url)
    const result = await service.setSecret(request.params.name, request.params.value, token)
    if (!result.ok) {
      const [status, message] = SET_FAILURE_RESPONSE[result.reason]
      return reply.code(status).type('text/plain').send(message)
    }
    return reply.type('text/plain').send(result.value)
  })

  server.setNotFoundHandler(async (_request, reply) => {
    await reply.status(404).send({ error: 'Not Found', statusCode: 404 })
  })

  server.setErrorHandler(async (error: FastifyError, _request, reply) => {
    const statusCode = error.statusCode ?? 500
    const message = statusCode >= 500 ? 'Internal Server Error' : error.message
    await reply.status(statusCode).send({ error: message, statusCode })
  })

  return server
}

export interface RunningServers {
  api: FastifyInstance
  metrics: FastifyInstance
}

export async function startServer(
  config: AppConfig,
  deps: ServerDeps = defaultDeps(config),
): Promise<RunningServers> {
  const api = createServer(config, deps)
  const metrics = createMetricsServer(deps.metrics, config.logLevel)

  const shutdown = async () => {
    api.log.info('Shutting down server...')
    await Promise.all([api.close(), metrics.close()])
    process.exit(0)
  }
  const onSignal = () => {
    void shutdown()
  }

  api.addHook('onClose', async () => {
    process.removeListener('SIGINT', onSignal)
    process.removeListener('SIGTERM', onSignal)
  })

  await api.listen({ host: config.server.host, port: config.server.port })
  await metrics.listen({ host: config.metrics.host, port: config.metrics.port })

  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  return { api, metrics }
}
