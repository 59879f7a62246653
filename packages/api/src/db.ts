import { Pool, types } from 'pg'
import type { QueryResult, QueryResultRow } from 'pg'
import type { AppConfig } from './config'

// ---------------------------------------------------------------------------
// PostgreSQL pool singleton
//
// One pool is created per process (or per Lambda cold start). In development
// and test the pool is re-used across hot reloads by attaching it to
// `globalThis`, preventing "too many clients" errors.
// ---------------------------------------------------------------------------

// DATE and NUMERIC come back as their text form so that no calendar date is
// shifted by a time zone and no amount passes through a float.
const DATE_OID = 1082
const NUMERIC_OID = 1700
types.setTypeParser(DATE_OID, (value: string) => value)
types.setTypeParser(NUMERIC_OID, (value: string) => value)

const globalForPg = globalThis as unknown as { pgPool: Pool | undefined }

let pool: Pool | undefined = globalForPg.pgPool

/**
 * @throws {Error} when no DATABASE_URL is configured.
 */
export function getPool(config: AppConfig): Pool {
  if (pool) return pool
  if (config.databaseUrl === undefined) {
    throw new Error('Missing required database environment variable (DATABASE_URL)')
  }
  pool = new Pool({ connectionString: config.databaseUrl, max: config.dbPoolMax })
  pool.on('error', (err) => {
    console.error('[db] idle client error', err)
  })
  if (config.nodeEnv !== 'production') {
    globalForPg.pgPool = pool
  }
  return pool
}

export async function closePool(): Promise<void> {
  const current = pool
  pool = undefined
  globalForPg.pgPool = undefined
  if (current) await current.end()
}

/**
 * The query surface shared by the pool and a checked-out client, so
 * repositories run unchanged inside or outside a transaction.
 */
export interface Db {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>
}
