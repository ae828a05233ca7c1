import { loadConfig } from '../core/config.js'
import { startServer } from './app.js'

// Container entry point: the config path may come from SIMPLE_SECRETS_CONFIG,
// everything else from the file and the usual environment overrides.
try {
  const config = loadConfig(process.env.SIMPLE_SECRETS_CONFIG)
  const { api } = await startServer(config)
  api.log.info(
    {
      spiffeId: config.spiffeId,
      etcd: config.etcd.hosts,
      fluentd: `${config.fluentd.host}:${String(config.fluentd.port)}`,
      metrics: `${config.metrics.host}:${String(config.metrics.port)}`,
    },
    'secret-server ready',
  )
} catch (err: unknown) {
  console.error(`Error: failed to start secret-server: ${err instanceof Error ? err.message : String(err)}`)
  process.exit(1)
}
