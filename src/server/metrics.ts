import Fastify, { type FastifyInstance } from 'fastify'

import type { LogLevel } from '../core/config.js'
import type { SecretMetrics } from '../core/metrics.js'

/** Prometheus scrape endpoint, served on its own (loopback) listener. */
export function createMetricsServer(metrics: SecretMetrics, logLevel: LogLevel): FastifyInstance {
  const server = Fastify({
    logger: {
      level: logLevel,
    },
  })

  server.get('/metrics', async (request, reply) => {
    let body: string
    try {
      body = await metrics.render()
    } catch (err: unknown) {
      request.log.error({ err }, 'Unable to encode prometheus metrics')
      return reply.code(500).send()
    }
    return reply.type(metrics.contentType).send(body)
  })

  server.setNotFoundHandler(async (_request, reply) => {
    await reply.status(404).send({ error: 'Not Found', statusCode: 404 })
  })

  return server
}
