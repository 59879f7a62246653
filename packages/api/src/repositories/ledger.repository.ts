import type { LedgerEntry, LedgerEntryDraft, LedgerOrigin, RecurringRule } from '@studioledger/domain'
import {
  amount,
  formatAmount,
  toAccountId,
  toBillPaymentId,
  toClientAdvanceId,
  toClientId,
  toExpenseClaimPaymentId,
  toIsoDate,
  toLedgerEntryId,
  toPaymentId,
  toProjectId,
  toRecurringRuleId,
  toUserId,
  toVendorId,
} from '@studioledger/domain'
import type { Db } from '../db'
import type { LedgerFilter, LedgerRepository, NewRecurringRule, RecurringRuleRepository } from '../store'
import { parseDirection, parseLedgerCategory } from './parsers'

// ---------------------------------------------------------------------------
// Ledger entries
// ---------------------------------------------------------------------------

type LedgerRow = {
  id: string
  entry_date: string
  description: string
  category: string
  debit: string
  credit: string
  account_id: string | null
  project_id: string | null
  client_id: string | null
  vendor_id: string | null
  person_id: string | null
  recorded_by: string | null
  remarks: string
  payment_id: string | null
  bill_payment_id: string | null
  client_advance_id: string | null
  expense_claim_payment_id: string | null
  recurring_rule_id: string | null
}

const LEDGER_COLUMNS = `id, entry_date, description, category, debit, credit, account_id, project_id, client_id,
  vendor_id, person_id, recorded_by, remarks, payment_id, bill_payment_id, client_advance_id,
  expense_claim_payment_id, recurring_rule_id`

/** The five origin columns, in table order, for a draft's origin. */
type OriginColumns = [string | null, string | null, string | null, string | null, string | null]

function originColumns(origin: LedgerOrigin | undefined): OriginColumns {
  if (origin === undefined) return [null, null, null, null, null]
  switch (origin.kind) {
    case 'payment':
      return [origin.paymentId, null, null, null, null]
    case 'bill_payment':
      return [null, origin.billPaymentId, null, null, null]
    case 'client_advance':
      return [null, null, origin.advanceId, null, null]
    case 'expense_claim_payment':
      return [null, null, null, origin.claimPaymentId, null]
    case 'recurring_rule':
      return [null, null, null, null, origin.ruleId]
  }
}

function originOf(row: LedgerRow): LedgerOrigin | undefined {
  if (row.payment_id != null) return { kind: 'payment', paymentId: toPaymentId(row.payment_id) }
  if (row.bill_payment_id != null) {
    return { kind: 'bill_payment', billPaymentId: toBillPaymentId(row.bill_payment_id) }
  }
  if (row.client_advance_id != null) {
    return { kind: 'client_advance', advanceId: toClientAdvanceId(row.client_advance_id) }
  }
  if (row.expense_claim_payment_id != null) {
    return { kind: 'expense_claim_payment', claimPaymentId: toExpenseClaimPaymentId(row.expense_claim_payment_id) }
  }
  if (row.recurring_rule_id != null) {
    // A recurring row's period is its entry date.
    return {
      kind: 'recurring_rule',
      ruleId: toRecurringRuleId(row.recurring_rule_id),
      runDate: toIsoDate(row.entry_date),
    }
  }
  return undefined
}

function mapEntry(row: LedgerRow): LedgerEntry {
  const origin = originOf(row)
  return {
    id: toLedgerEntryId(row.id),
    date: toIsoDate(row.entry_date),
    description: row.description,
    category: parseLedgerCategory(row.category),
    debit: amount(row.debit),
    credit: amount(row.credit),
    remarks: row.remarks,
    ...(row.account_id != null ? { accountId: toAccountId(row.account_id) } : {}),
    ...(row.project_id != null ? { projectId: toProjectId(row.project_id) } : {}),
    ...(row.client_id != null ? { clientId: toClientId(row.client_id) } : {}),
    ...(row.vendor_id != null ? { vendorId: toVendorId(row.vendor_id) } : {}),
    ...(row.person_id != null ? { personId: toUserId(row.person_id) } : {}),
    ...(row.recorded_by != null ? { recordedBy: toUserId(row.recorded_by) } : {}),
    ...(origin !== undefined ? { origin } : {}),
  }
}

function draftValues(draft: LedgerEntryDraft): unknown[] {
  return [
    draft.date,
    draft.description,
    draft.category,
    formatAmount(draft.debit),
    formatAmount(draft.credit),
    draft.accountId ?? null,
    draft.projectId ?? null,
    draft.clientId ?? null,
    draft.vendorId ?? null,
    draft.personId ?? null,
    draft.recordedBy ?? null,
    draft.remarks,
    ...originColumns(draft.origin),
  ]
}

export function createLedgerRepository(db: Db): LedgerRepository {
  return {
    async findById(id) {
      const { rows } = await db.query<LedgerRow>(`SELECT ${LEDGER_COLUMNS} FROM ledger_entries WHERE id = $1`, [id])
      const [row] = rows
      return row ? mapEntry(row) : null
    },

    async findByOrigin(origin) {
      const { text, values } = ((): { text: string; values: unknown[] } => {
        switch (origin.kind) {
          case 'payment':
            return { text: 'payment_id = $1', values: [origin.paymentId] }
          case 'bill_payment':
            return { text: 'bill_payment_id = $1', values: [origin.billPaymentId] }
          case 'client_advance':
            return { text: 'client_advance_id = $1', values: [origin.advanceId] }
          case 'expense_claim_payment':
            return { text: 'expense_claim_payment_id = $1', values: [origin.claimPaymentId] }
          case 'recurring_rule':
            return { text: 'recurring_rule_id = $1 AND entry_date = $2', values: [origin.ruleId, origin.runDate] }
        }
      })()
      const { rows } = await db.query<LedgerRow>(`SELECT ${LEDGER_COLUMNS} FROM ledger_entries WHERE ${text}`, values)
      const [row] = rows
      return row ? mapEntry(row) : null
    },

    async insert(draft) {
      const { rows } = await db.query<LedgerRow>(
        `INSERT INTO ledger_entries (entry_date, description, category, debit, credit, account_id, project_id,
                                     client_id, vendor_id, person_id, recorded_by, remarks, payment_id,
                                     bill_payment_id, client_advance_id, expense_claim_payment_id,
                                     recurring_rule_id)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)
         RETURNING ${LEDGER_COLUMNS}`,
        draftValues(draft),
      )
      const [row] = rows
      if (!row) throw new Error('Ledger insert returned no row')
      return mapEntry(row)
    },

    async update(id, draft) {
      const { rows } = await db.query<LedgerRow>(
        `UPDATE ledger_entries
            SET entry_date = $2, description = $3, category = $4, debit = $5, credit = $6, account_id = $7,
                project_id = $8, client_id = $9, vendor_id = $10, person_id = $11, recorded_by = $12,
                remarks = $13, payment_id = $14, bill_payment_id = $15, client_advance_id = $16,
                expense_claim_payment_id = $17, recurring_rule_id = $18
          WHERE id = $1
          RETURNING ${LEDGER_COLUMNS}`,
        [id, ...draftValues(draft)],
      )
      const [row] = rows
      if (!row) throw new Error(`Ledger entry ${id} not found`)
      return mapEntry(row)
    },

    async list(filter: LedgerFilter) {
      const { rows } = await db.query<LedgerRow>(
        `SELECT ${LEDGER_COLUMNS} FROM ledger_entries
          WHERE ($1::date IS NULL OR entry_date >= $1)
            AND ($2::date IS NULL OR entry_date < $2)
            AND ($3::text IS NULL OR category = $3)
            AND ($4::uuid IS NULL OR account_id = $4)
          ORDER BY entry_date DESC, id
          LIMIT $5 OFFSET $6`,
        [
          filter.from ?? null,
          filter.to ?? null,
          filter.category ?? null,
          filter.accountId ?? null,
          filter.limit ?? null,
          filter.offset ?? 0,
        ],
      )
      return rows.map(mapEntry)
    },
  }
}

// ---------------------------------------------------------------------------
// Recurring rules
// ---------------------------------------------------------------------------

type RuleRow = {
  id: string
  name: string
  is_active: boolean
  direction: string
  category: string
  description: string
  amount: string
  account_id: string | null
  project_id: string | null
  vendor_id: string | null
  day_of_month: number
  next_run_date: string
  notes: string
}

const RULE_COLUMNS = `id, name, is_active, direction, category, description, amount, account_id, project_id,
  vendor_id, day_of_month, next_run_date, notes`

function mapRule(row: RuleRow): RecurringRule {
  return {
    id: toRecurringRuleId(row.id),
    name: row.name,
    isActive: row.is_active,
    direction: parseDirection(row.direction),
    category: parseLedgerCategory(row.category),
    description: row.description,
    amount: amount(row.amount),
    dayOfMonth: row.day_of_month,
    nextRunDate: toIsoDate(row.next_run_date),
    notes: row.notes,
    ...(row.account_id != null ? { accountId: toAccountId(row.account_id) } : {}),
    ...(row.project_id != null ? { projectId: toProjectId(row.project_id) } : {}),
    ...(row.vendor_id != null ? { vendorId: toVendorId(row.vendor_id) } : {}),
  }
}

export function createRecurringRuleRepository(db: Db): RecurringRuleRepository {
  return {
    async create(input: NewRecurringRule) {
      const { rows } = await db.query<RuleRow>(
        `INSERT INTO recurring_rules (name, is_active, direction, category, description, amount, account_id,
                                      project_id, vendor_id, day_of_month, next_run_date, notes)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
         RETURNING ${RULE_COLUMNS}`,
        [
          input.name,
          input.isActive,
          input.direction,
          input.category,
          input.description,
          formatAmount(input.amount),
          input.accountId ?? null,
          input.projectId ?? null,
          input.vendorId ?? null,
          input.dayOfMonth,
          input.nextRunDate,
          input.notes,
        ],
      )
      const [row] = rows
      if (!row) throw new Error('Recurring rule insert returned no row')
      return mapRule(row)
    },

    async findById(id) {
      const { rows } = await db.query<RuleRow>(`SELECT ${RULE_COLUMNS} FROM recurring_rules WHERE id = $1`, [id])
      const [row] = rows
      return row ? mapRule(row) : null
    },

    async listDue(today) {
      const { rows } = await db.query<RuleRow>(
        `SELECT ${RULE_COLUMNS} FROM recurring_rules
          WHERE is_active AND next_run_date <= $1
          ORDER BY next_run_date, name`,
        [today],
      )
      return rows.map(mapRule)
    },

    async updateNextRunDate(id, nextRunDate) {
      await db.query('UPDATE recurring_rules SET next_run_date = $2 WHERE id = $1', [id, nextRunDate])
    },
  }
}
