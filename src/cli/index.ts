#!/usr/bin/env node
import { Command } from 'commander'

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { secretsCommand } from './secrets.js'
import { serverCommand } from './server.js'
import { spireCommand } from './spire.js'
import { usersCommand } from './users.js'

const pkg = JSON.parse(
  readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf-8'),
) as { version: string }

const program = new Command()

program
  .name('simple-secrets')
  .description('etcd-backed secret server with SPIRE entry registration')
  .version(pkg.version)

program.addCommand(serverCommand)
program.addCommand(secretsCommand)
program.addCommand(usersCommand)
program.addCommand(spireCommand)

await program.parseAsync()
