import type { Pool, PoolClient } from 'pg'
import type { Db } from '../db'
import type { FinanceStore } from '../store'
import { createAdvanceRepository } from './advance.repository'
import { createDirectoryRepository } from './directory.repository'
import { createInvoiceRepository, createPaymentRepository, createReceiptRepository } from './invoice.repository'
import { createLedgerRepository, createRecurringRuleRepository } from './ledger.repository'
import { createBillPaymentRepository, createBillRepository, createExpenseClaimRepository } from './payables.repository'

// ---------------------------------------------------------------------------
// PostgreSQL-backed FinanceStore
// ---------------------------------------------------------------------------

function asDb(queryable: Pool | PoolClient): Db {
  return {
    query: (text, values) => queryable.query(text, values),
  }
}

function repositories(db: Db): Omit<FinanceStore, 'transaction'> {
  return {
    invoices: createInvoiceRepository(db),
    payments: createPaymentRepository(db),
    receipts: createReceiptRepository(db),
    advances: createAdvanceRepository(db),
    bills: createBillRepository(db),
    billPayments: createBillPaymentRepository(db),
    claims: createExpenseClaimRepository(db),
    ledger: createLedgerRepository(db),
    recurringRules: createRecurringRuleRepository(db),
    directory: createDirectoryRepository(db),
  }
}

/** A store bound to one checked-out client; nested transactions join it. */
function transactionStore(client: PoolClient): FinanceStore {
  const store: FinanceStore = {
    ...repositories(asDb(client)),
    transaction: (fn) => fn(store),
  }
  return store
}

export function createPgStore(pool: Pool): FinanceStore {
  return {
    ...repositories(asDb(pool)),
    async transaction(fn) {
      const client = await pool.connect()
      try {
        await client.query('BEGIN')
        const result = await fn(transactionStore(client))
        await client.query('COMMIT')
        return result
      } catch (err) {
        await client.query('ROLLBACK')
        throw err
      } finally {
        client.release()
      }
    },
  }
}
