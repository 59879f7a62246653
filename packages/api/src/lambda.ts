// ---------------------------------------------------------------------------
// Lambda entry point
//
// Wraps the Hono app with the AWS Lambda adapter. Configuration is read from
// the environment once per cold start; see config.ts for the variables.
// ---------------------------------------------------------------------------

import { handle } from 'hono/aws-lambda'
import { buildPermissionTable } from '@studioledger/domain'
import { createApp } from './app'
import { loadConfig } from './config'
import { getPool } from './db'
import { createPgStore } from './repositories/index'
import { createConsoleNotifier } from './services/notifier'

const config = loadConfig()

const app = createApp({
  store: createPgStore(getPool(config)),
  permissions: buildPermissionTable(),
  notifier: createConsoleNotifier(),
  config,
})

export const handler = handle(app)
