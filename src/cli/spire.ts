import { Command } from 'commander'
import { fileURLToPath } from 'node:url'

import { resolveTilde } from '../core/config.js'
import {
  DEFAULT_REGISTRAR_OPTIONS,
  formatComposeCommandLine,
  lastExitCode,
  loadRegistrationEntries,
  SpireRegistrar,
  type RegistrarOptions,
  type RegistrationEntry,
} from '../core/spire.js'
import { errorMessage } from './prompt.js'

export const DEFAULT_ENTRIES_PATH = fileURLToPath(
  new URL('../../config/spire-entries.json', import.meta.url),
)

interface RegisterOptions {
  entries: string
  compose: string
  service: string
  spireDir: string
  dryRun: boolean
}

const spire = new Command('spire').description('Register SPIFFE identities with the SPIRE server')

spire
  .command('register')
  .description('Create the registration entries in the spire-server compose service')
  .option('--entries <file>', 'JSON file with registration entries', DEFAULT_ENTRIES_PATH)
  .option('--compose <command>', 'docker-compose executable', DEFAULT_REGISTRAR_OPTIONS.composeCommand)
  .option('--service <name>', 'compose service running spire-server', DEFAULT_REGISTRAR_OPTIONS.service)
  .option('--spire-dir <dir>', 'spire install directory inside the container', DEFAULT_REGISTRAR_OPTIONS.spireDir)
  .option('--dry-run', 'Print the commands without running them', false)
  .action(async (opts: RegisterOptions) => {
    let entries: RegistrationEntry[]
    try {
      entries = loadRegistrationEntries(resolveTilde(opts.entries))
    } catch (err: unknown) {
      console.error(`Error: ${errorMessage(err)}`)
      process.exitCode = 1
      return
    }

    const options: RegistrarOptions = {
      composeCommand: opts.compose,
      service: opts.service,
      spireDir: opts.spireDir,
    }

    if (opts.dryRun) {
      for (const entry of entries) {
        console.log(formatComposeCommandLine(entry, options))
      }
      return
    }

    const results = await new SpireRegistrar(options).registerAll(entries)
    for (const result of results) {
      if (result.error !== undefined) {
        console.error(`${result.entry.spiffeId}: ${result.error}`)
      }
    }
    process.exitCode = lastExitCode(results)
  })

export { spire as spireCommand }
