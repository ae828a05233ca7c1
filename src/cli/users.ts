import { Command } from 'commander'

import { loadConfig } from '../core/config.js'
import { EtcdStore, userPasswordKey, type KeyValueStore } from '../core/kv-store.js'
import { hashPassword } from '../core/password.js'
import { errorMessage, resolveValue } from './prompt.js'

export async function addUser(
  store: KeyValueStore,
  username: string,
  password: string,
): Promise<void> {
  if (username === '' || username.includes('/')) {
    throw new Error(`Invalid username "${username}"`)
  }
  const encoded = await hashPassword(password)
  await store.set(userPasswordKey(username), encoded)
}

const users = new Command('users').description('Manage users allowed to log in')

users
  .command('add')
  .description('Store an argon2 password hash for a user in etcd')
  .argument('<username>', 'User name')
  .option('--password <password>', 'Password (reads from stdin if omitted)')
  .action(async (username: string, opts: { password?: string }) => {
    let store: KeyValueStore | undefined
    try {
      const password = await resolveValue(opts.password, 'Password: ')
      store = new EtcdStore(loadConfig().etcd.hosts)
      await addUser(store, username, password)
      console.log(`User ${username} saved`)
    } catch (err: unknown) {
      console.error(`Error: ${errorMessage(err)}`)
      process.exitCode = 1
    } finally {
      store?.close()
    }
  })

export { users as usersCommand }
