#!/usr/bin/env node
/**
 * Posts every recurring-rule period due up to today in the business time
 * zone. Meant for a daily scheduler; running it twice in a day adds nothing.
 *
 * Usage:
 *   npm run recurring:run --workspace @studioledger/api
 */

import { todayIn } from '@studioledger/domain'
import { loadConfig } from '../config'
import { closePool, getPool } from '../db'
import { createPgStore } from '../repositories/index'
import { generateRecurringTransactions } from '../services/recurring'

const GREEN = '\x1b[32m'
const RED = '\x1b[31m'
const RESET = '\x1b[0m'

const ok = (msg: string) => console.log(`  ${GREEN}✓${RESET} ${msg}`)
const fail = (msg: string) => console.error(`  ${RED}✗${RESET} ${msg}`)

async function main(): Promise<void> {
  const config = loadConfig()
  const today = todayIn(config.businessTimeZone)
  const store = createPgStore(getPool(config))
  try {
    const created = await generateRecurringTransactions(store, { today })
    ok(`${created} recurring entries created for ${today}`)
  } finally {
    await closePool()
  }
}

main().catch((err: unknown) => {
  if (err instanceof AggregateError) {
    for (const inner of err.errors) {
      fail(inner instanceof Error ? inner.message : String(inner))
    }
  }
  fail(err instanceof Error ? err.message : String(err))
  process.exit(1)
})
