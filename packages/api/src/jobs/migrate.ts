#!/usr/bin/env node
/**
 * Applies db/schema.sql to the database named by DATABASE_URL.
 *
 * Usage:
 *   npm run db:migrate --workspace @studioledger/api
 *
 * Every statement in the schema is idempotent, so re-running is harmless.
 */

import { readFile } from 'node:fs/promises'
import { loadConfig } from '../config'
import { closePool, getPool } from '../db'

const GREEN = '\x1b[32m'
const RED = '\x1b[31m'
const RESET = '\x1b[0m'

const ok = (msg: string) => console.log(`  ${GREEN}✓${RESET} ${msg}`)
const fail = (msg: string) => console.error(`  ${RED}✗${RESET} ${msg}`)

async function main(): Promise<void> {
  const config = loadConfig()
  const schema = await readFile(new URL('../../db/schema.sql', import.meta.url), 'utf8')
  const pool = getPool(config)
  try {
    await pool.query(schema)
    ok('Schema applied')
  } finally {
    await closePool()
  }
}

main().catch((err: unknown) => {
  fail(err instanceof Error ? err.message : String(err))
  process.exit(1)
})
