import type { Bill, BillPayment, ExpenseClaim, ExpenseClaimPayment } from '@studioledger/domain'
import {
  amount,
  formatAmount,
  toAccountId,
  toBillId,
  toBillPaymentId,
  toExpenseClaimId,
  toExpenseClaimPaymentId,
  toIsoDate,
  toProjectId,
  toUserId,
  toVendorId,
} from '@studioledger/domain'
import type { Db } from '../db'
import type {
  BillPaymentRepository,
  BillRepository,
  ExpenseClaimRepository,
  NewBill,
  NewBillPayment,
  NewExpenseClaim,
  NewExpenseClaimPayment,
} from '../store'
import { parseBillCategory, parseBillStatus, parseClaimStatus } from './parsers'

// ---------------------------------------------------------------------------
// Row shapes
// ---------------------------------------------------------------------------

type BillRow = {
  id: string
  vendor_id: string
  project_id: string | null
  bill_number: string
  bill_date: string
  due_date: string | null
  amount: string
  status: string
  category: string
  description: string
  created_by: string | null
}

type BillPaymentRow = {
  id: string
  bill_id: string
  payment_date: string
  amount: string
  account_id: string | null
  method: string
  reference: string
  notes: string
  recorded_by: string | null
}

type ClaimRow = {
  id: string
  employee_id: string
  project_id: string | null
  expense_date: string
  amount: string
  category: string
  description: string
  status: string
  approved_by: string | null
  approved_at: string | null
}

type ClaimPaymentRow = {
  id: string
  claim_id: string
  payment_date: string
  amount: string
  account_id: string | null
  method: string
  reference: string
  notes: string
  recorded_by: string | null
}

const BILL_COLUMNS = `id, vendor_id, project_id, bill_number, bill_date, due_date, amount, status, category,
  description, created_by`
const BILL_PAYMENT_COLUMNS = 'id, bill_id, payment_date, amount, account_id, method, reference, notes, recorded_by'
const CLAIM_COLUMNS = `id, employee_id, project_id, expense_date, amount, category, description, status,
  approved_by, approved_at`
const CLAIM_PAYMENT_COLUMNS = 'id, claim_id, payment_date, amount, account_id, method, reference, notes, recorded_by'

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function mapBillPayment(row: BillPaymentRow): BillPayment {
  return {
    id: toBillPaymentId(row.id),
    billId: toBillId(row.bill_id),
    paymentDate: toIsoDate(row.payment_date),
    amount: amount(row.amount),
    method: row.method,
    reference: row.reference,
    notes: row.notes,
    ...(row.account_id != null ? { accountId: toAccountId(row.account_id) } : {}),
    ...(row.recorded_by != null ? { recordedBy: toUserId(row.recorded_by) } : {}),
  }
}

function mapBill(row: BillRow, payments: readonly BillPaymentRow[]): Bill {
  return {
    id: toBillId(row.id),
    vendorId: toVendorId(row.vendor_id),
    billNumber: row.bill_number,
    billDate: toIsoDate(row.bill_date),
    amount: amount(row.amount),
    status: parseBillStatus(row.status),
    category: parseBillCategory(row.category),
    description: row.description,
    payments: payments.map(mapBillPayment),
    ...(row.project_id != null ? { projectId: toProjectId(row.project_id) } : {}),
    ...(row.due_date != null ? { dueDate: toIsoDate(row.due_date) } : {}),
    ...(row.created_by != null ? { createdBy: toUserId(row.created_by) } : {}),
  }
}

function mapClaimPayment(row: ClaimPaymentRow): ExpenseClaimPayment {
  return {
    id: toExpenseClaimPaymentId(row.id),
    claimId: toExpenseClaimId(row.claim_id),
    paymentDate: toIsoDate(row.payment_date),
    amount: amount(row.amount),
    method: row.method,
    reference: row.reference,
    notes: row.notes,
    ...(row.account_id != null ? { accountId: toAccountId(row.account_id) } : {}),
    ...(row.recorded_by != null ? { recordedBy: toUserId(row.recorded_by) } : {}),
  }
}

function mapClaim(row: ClaimRow, payment: ClaimPaymentRow | undefined): ExpenseClaim {
  return {
    id: toExpenseClaimId(row.id),
    employeeId: toUserId(row.employee_id),
    expenseDate: toIsoDate(row.expense_date),
    amount: amount(row.amount),
    category: row.category,
    description: row.description,
    status: parseClaimStatus(row.status),
    ...(row.project_id != null ? { projectId: toProjectId(row.project_id) } : {}),
    ...(row.approved_by != null ? { approvedBy: toUserId(row.approved_by) } : {}),
    ...(row.approved_at != null ? { approvedAt: toIsoDate(row.approved_at) } : {}),
    ...(payment ? { payment: mapClaimPayment(payment) } : {}),
  }
}

// ---------------------------------------------------------------------------
// Bills
// ---------------------------------------------------------------------------

export function createBillRepository(db: Db): BillRepository {
  async function hydrate(rows: readonly BillRow[]): Promise<Bill[]> {
    if (rows.length === 0) return []
    const payments = await db.query<BillPaymentRow>(
      `SELECT ${BILL_PAYMENT_COLUMNS} FROM bill_payments WHERE bill_id = ANY($1) ORDER BY payment_date`,
      [rows.map((r) => r.id)],
    )
    return rows.map((row) =>
      mapBill(
        row,
        payments.rows.filter((p) => p.bill_id === row.id),
      ),
    )
  }

  async function findById(id: string): Promise<Bill | null> {
    const { rows } = await db.query<BillRow>(`SELECT ${BILL_COLUMNS} FROM bills WHERE id = $1`, [id])
    const [bill] = await hydrate(rows)
    return bill ?? null
  }

  return {
    async create(input: NewBill) {
      const { rows } = await db.query<BillRow>(
        `INSERT INTO bills (vendor_id, project_id, bill_number, bill_date, due_date, amount, status, category,
                            description, created_by)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         RETURNING ${BILL_COLUMNS}`,
        [
          input.vendorId,
          input.projectId ?? null,
          input.billNumber,
          input.billDate,
          input.dueDate ?? null,
          formatAmount(input.amount),
          input.status,
          input.category,
          input.description,
          input.createdBy ?? null,
        ],
      )
      const [row] = rows
      if (!row) throw new Error('Bill insert returned no row')
      return mapBill(row, [])
    },

    findById: (id) => findById(id),

    async listUnpaid() {
      const { rows } = await db.query<BillRow>(
        `SELECT ${BILL_COLUMNS} FROM bills WHERE status <> 'paid' ORDER BY COALESCE(due_date, bill_date)`,
      )
      return hydrate(rows)
    },

    async updateStatus(id, status) {
      await db.query('UPDATE bills SET status = $2 WHERE id = $1', [id, status])
    },
  }
}

export function createBillPaymentRepository(db: Db): BillPaymentRepository {
  return {
    async create(input: NewBillPayment) {
      const { rows } = await db.query<BillPaymentRow>(
        `INSERT INTO bill_payments (bill_id, payment_date, amount, account_id, method, reference, notes, recorded_by)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${BILL_PAYMENT_COLUMNS}`,
        [
          input.billId,
          input.paymentDate,
          formatAmount(input.amount),
          input.accountId ?? null,
          input.method,
          input.reference,
          input.notes,
          input.recordedBy ?? null,
        ],
      )
      const [row] = rows
      if (!row) throw new Error('Bill payment insert returned no row')
      return mapBillPayment(row)
    },

    async findById(id) {
      const { rows } = await db.query<BillPaymentRow>(
        `SELECT ${BILL_PAYMENT_COLUMNS} FROM bill_payments WHERE id = $1`,
        [id],
      )
      const [row] = rows
      return row ? mapBillPayment(row) : null
    },

    async update(payment) {
      const { rows } = await db.query<BillPaymentRow>(
        `UPDATE bill_payments
            SET payment_date = $2, amount = $3, account_id = $4, method = $5, reference = $6, notes = $7
          WHERE id = $1
          RETURNING ${BILL_PAYMENT_COLUMNS}`,
        [
          payment.id,
          payment.paymentDate,
          formatAmount(payment.amount),
          payment.accountId ?? null,
          payment.method,
          payment.reference,
          payment.notes,
        ],
      )
      const [row] = rows
      if (!row) throw new Error(`Bill payment ${payment.id} not found`)
      return mapBillPayment(row)
    },
  }
}

// ---------------------------------------------------------------------------
// Expense claims
// ---------------------------------------------------------------------------

export function createExpenseClaimRepository(db: Db): ExpenseClaimRepository {
  async function findById(id: string): Promise<ExpenseClaim | null> {
    const { rows } = await db.query<ClaimRow>(`SELECT ${CLAIM_COLUMNS} FROM expense_claims WHERE id = $1`, [id])
    const [row] = rows
    if (!row) return null
    const payment = await db.query<ClaimPaymentRow>(
      `SELECT ${CLAIM_PAYMENT_COLUMNS} FROM expense_claim_payments WHERE claim_id = $1`,
      [id],
    )
    return mapClaim(row, payment.rows[0])
  }

  return {
    async create(input: NewExpenseClaim) {
      const { rows } = await db.query<ClaimRow>(
        `INSERT INTO expense_claims (employee_id, project_id, expense_date, amount, category, description)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${CLAIM_COLUMNS}`,
        [
          input.employeeId,
          input.projectId ?? null,
          input.expenseDate,
          formatAmount(input.amount),
          input.category,
          input.description,
        ],
      )
      const [row] = rows
      if (!row) throw new Error('Expense claim insert returned no row')
      return mapClaim(row, undefined)
    },

    findById: (id) => findById(id),

    async update(claim) {
      await db.query(
        'UPDATE expense_claims SET status = $2, approved_by = $3, approved_at = $4 WHERE id = $1',
        [claim.id, claim.status, claim.approvedBy ?? null, claim.approvedAt ?? null],
      )
      const updated = await findById(claim.id)
      if (!updated) throw new Error(`Expense claim ${claim.id} not found`)
      return updated
    },

    async createPayment(input: NewExpenseClaimPayment) {
      const { rows } = await db.query<ClaimPaymentRow>(
        `INSERT INTO expense_claim_payments (claim_id, payment_date, amount, account_id, method, reference, notes,
                                             recorded_by)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${CLAIM_PAYMENT_COLUMNS}`,
        [
          input.claimId,
          input.paymentDate,
          formatAmount(input.amount),
          input.accountId ?? null,
          input.method,
          input.reference,
          input.notes,
          input.recordedBy ?? null,
        ],
      )
      const [row] = rows
      if (!row) throw new Error('Expense claim payment insert returned no row')
      return mapClaimPayment(row)
    },
  }
}
