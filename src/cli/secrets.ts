import { Command } from 'commander'

import { SecretsClient } from '../core/client.js'
import { loadConfig } from '../core/config.js'
import { errorMessage, resolveValue } from './prompt.js'

interface ClientOptions {
  url?: string
  token?: string
}

function createClient(opts: ClientOptions): SecretsClient {
  return new SecretsClient(opts.url ?? loadConfig().client.url)
}

function requireToken(opts: ClientOptions): string {
  const token = opts.token ?? process.env.SIMPLE_SECRETS_TOKEN
  if (!token) {
    throw new Error('A session token is required. Pass --token or set SIMPLE_SECRETS_TOKEN')
  }
  return token
}

const secrets = new Command('secrets').description('Talk to a running secrets server')

secrets
  .command('login')
  .description('Log in and print a session token')
  .requiredOption('--username <username>', 'User name')
  .option('--password <password>', 'Password (reads from stdin if omitted)')
  .option('--url <url>', 'Server URL (defaults to client.url from config)')
  .action(async (opts: ClientOptions & { username: string; password?: string }) => {
    try {
      const password = await resolveValue(opts.password, 'Password: ')
      const token = await createClient(opts).login(opts.username, password)
      console.log(token)
    } catch (err: unknown) {
      console.error(`Error: ${errorMessage(err)}`)
      process.exitCode = 1
    }
  })

secrets
  .command('get')
  .description('Print the value of a secret')
  .argument('<name>', 'Secret name')
  .option('--token <token>', 'Session token (defaults to $SIMPLE_SECRETS_TOKEN)')
  .option('--url <url>', 'Server URL (defaults to client.url from config)')
  .action(async (name: string, opts: ClientOptions) => {
    try {
      const value = await createClient(opts).get(name, requireToken(opts))
      console.log(value)
    } catch (err: unknown) {
      console.error(`Error: ${errorMessage(err)}`)
      process.exitCode = 1
    }
  })

secrets
  .command('set')
  .description('Set a secret and print its UUID')
  .argument('<name>', 'Secret name')
  .option('--value <value>', 'Secret value (reads from stdin if omitted)')
  .option('--token <token>', 'Session token (defaults to $SIMPLE_SECRETS_TOKEN)')
  .option('--url <url>', 'Server URL (defaults to client.url from config)')
  .action(async (name: string, opts: ClientOptions & { value?: string }) => {
    try {
      const token = requireToken(opts)
      const value = await resolveValue(opts.value, 'Secret value: ')
      if (!value) {
        console.error('Error: secret value must not be empty')
        process.exitCode = 1
        return
      }
      const uuid = await createClient(opts).set(name, value, token)
      console.log(uuid)
    } catch (err: unknown) {
      console.error(`Error: ${errorMessage(err)}`)
      process.exitCode = 1
    }
  })

export { secrets as secretsCommand }
