import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'

import type { KeyValueStore } from '../core/kv-store.js'
import type { SecretService } from '../core/secret-service.js'

export interface LifecycleOptions {
  service: SecretService
  store: KeyValueStore
}

/** Announces the instance once it listens and releases etcd and fluentd on close. */
export const lifecyclePlugin = fp(
  async (fastify: FastifyInstance, opts: LifecycleOptions) => {
    fastify.addHook('onListen', async () => {
      opts.service.announceStart()
    })

    fastify.addHook('onClose', async () => {
      try {
        await opts.service.announceStop()
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Unable to flush audit log on shutdown')
      }
      opts.store.close()
    })
  },
  {
    name: 'secret-service-lifecycle',
  },
)
