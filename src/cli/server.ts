import { Command } from 'commander'

import { loadConfig } from '../core/config.js'
import { startServer } from '../server/app.js'
import { errorMessage } from './prompt.js'

const server = new Command('server').description('Run the secrets server')

server
  .command('start')
  .description('Start the API and metrics listeners in the foreground')
  .option('--config <path>', 'Path to config file')
  .option('--spiffe-id <id>', 'SPIFFE ID of this instance (overrides config)')
  .action(async (opts: { config?: string; spiffeId?: string }) => {
    try {
      const config = loadConfig(opts.config)
      if (opts.spiffeId !== undefined) {
        if (!opts.spiffeId.startsWith('spiffe://')) {
          console.error('Error: --spiffe-id must be a spiffe:// URI')
          process.exitCode = 1
          return
        }
        config.spiffeId = opts.spiffeId
      }
      await startServer(config)
    } catch (err: unknown) {
      console.error(`Error: ${errorMessage(err)}`)
      process.exitCode = 1
    }
  })

export { server as serverCommand }
