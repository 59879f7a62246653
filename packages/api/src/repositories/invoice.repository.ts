import type {
  ClientAdvanceAllocation,
  Invoice,
  InvoiceLine,
  InvoiceStatus,
  Payment,
  Receipt,
} from '@studioledger/domain'
import {
  amount,
  formatAmount,
  toAccountId,
  toAllocationId,
  toClientAdvanceId,
  toClientId,
  toInvoiceId,
  toInvoiceLineId,
  toIsoDate,
  toLeadId,
  toPaymentId,
  toProjectId,
  toReceiptId,
  toUserId,
} from '@studioledger/domain'
import type { Db } from '../db'
import type {
  InvoiceRepository,
  NewInvoice,
  NewPayment,
  NewReceipt,
  PaymentRepository,
  ReceiptRepository,
} from '../store'
import { parseInvoiceStatus } from './parsers'

// ---------------------------------------------------------------------------
// Row shapes
// ---------------------------------------------------------------------------

type InvoiceRow = {
  id: string
  invoice_number: string
  project_id: string | null
  lead_id: string | null
  project_code: string | null
  client_id: string | null
  invoice_date: string
  due_date: string
  amount: string
  tax_percent: string
  discount_percent: string
  status: string
  description: string
}

type InvoiceLineRow = {
  id: string
  invoice_id: string
  description: string
  quantity: string
  unit_price: string
}

type PaymentRow = {
  id: string
  invoice_id: string
  payment_date: string
  amount: string
  account_id: string | null
  method: string
  reference: string
  notes: string
  received_by: string | null
  recorded_by: string | null
}

type AllocationRow = {
  id: string
  advance_id: string
  invoice_id: string
  amount: string
  allocated_by: string | null
  notes: string
}

type ReceiptRow = {
  id: string
  receipt_number: string
  receipt_date: string
  payment_id: string
  invoice_id: string
  project_id: string | null
  client_id: string | null
  lead_id: string | null
  amount: string
  method: string
  reference: string
  notes: string
  generated_by: string | null
}

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function mapLine(row: InvoiceLineRow): InvoiceLine {
  return {
    id: toInvoiceLineId(row.id),
    invoiceId: toInvoiceId(row.invoice_id),
    description: row.description,
    quantity: amount(row.quantity),
    unitPrice: amount(row.unit_price),
  }
}

export function mapPayment(row: PaymentRow): Payment {
  return {
    id: toPaymentId(row.id),
    invoiceId: toInvoiceId(row.invoice_id),
    paymentDate: toIsoDate(row.payment_date),
    amount: amount(row.amount),
    method: row.method,
    reference: row.reference,
    notes: row.notes,
    ...(row.account_id != null ? { accountId: toAccountId(row.account_id) } : {}),
    ...(row.received_by != null ? { receivedBy: toUserId(row.received_by) } : {}),
    ...(row.recorded_by != null ? { recordedBy: toUserId(row.recorded_by) } : {}),
  }
}

export function mapAllocation(row: AllocationRow): ClientAdvanceAllocation {
  return {
    id: toAllocationId(row.id),
    advanceId: toClientAdvanceId(row.advance_id),
    invoiceId: toInvoiceId(row.invoice_id),
    amount: amount(row.amount),
    notes: row.notes,
    ...(row.allocated_by != null ? { allocatedBy: toUserId(row.allocated_by) } : {}),
  }
}

function mapReceipt(row: ReceiptRow): Receipt {
  return {
    id: toReceiptId(row.id),
    receiptNumber: row.receipt_number,
    receiptDate: toIsoDate(row.receipt_date),
    paymentId: toPaymentId(row.payment_id),
    invoiceId: toInvoiceId(row.invoice_id),
    amount: amount(row.amount),
    method: row.method,
    reference: row.reference,
    notes: row.notes,
    ...(row.project_id != null ? { projectId: toProjectId(row.project_id) } : {}),
    ...(row.client_id != null ? { clientId: toClientId(row.client_id) } : {}),
    ...(row.lead_id != null ? { leadId: toLeadId(row.lead_id) } : {}),
    ...(row.generated_by != null ? { generatedBy: toUserId(row.generated_by) } : {}),
  }
}

function groupBy<T extends { invoice_id: string }>(rows: readonly T[]): Map<string, T[]> {
  const grouped = new Map<string, T[]>()
  for (const row of rows) {
    const bucket = grouped.get(row.invoice_id) ?? []
    bucket.push(row)
    grouped.set(row.invoice_id, bucket)
  }
  return grouped
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

// The client is resolved through the project, or the lead when there is none.
const SELECT_INVOICE = `
  SELECT i.id, i.invoice_number, i.project_id, i.lead_id, p.code AS project_code,
         COALESCE(p.client_id, l.client_id) AS client_id,
         i.invoice_date, i.due_date, i.amount, i.tax_percent, i.discount_percent,
         i.status, i.description
    FROM invoices i
    LEFT JOIN projects p ON p.id = i.project_id
    LEFT JOIN leads l ON l.id = i.lead_id`

const PAYMENT_COLUMNS = `id, invoice_id, payment_date, amount, account_id, method, reference, notes,
  received_by, recorded_by`

/** Loads lines, payments and allocations for a page of invoice rows. */
async function hydrate(db: Db, rows: readonly InvoiceRow[]): Promise<Invoice[]> {
  if (rows.length === 0) return []
  const ids = rows.map((r) => r.id)
  const [lines, payments, allocations] = await Promise.all([
    db.query<InvoiceLineRow>(
      `SELECT id, invoice_id, description, quantity, unit_price
         FROM invoice_lines WHERE invoice_id = ANY($1) ORDER BY position`,
      [ids],
    ),
    db.query<PaymentRow>(
      `SELECT ${PAYMENT_COLUMNS} FROM payments WHERE invoice_id = ANY($1) ORDER BY payment_date, created_at`,
      [ids],
    ),
    db.query<AllocationRow>(
      `SELECT id, advance_id, invoice_id, amount, allocated_by, notes
         FROM client_advance_allocations WHERE invoice_id = ANY($1)`,
      [ids],
    ),
  ])
  const linesBy = groupBy(lines.rows)
  const paymentsBy = groupBy(payments.rows)
  const allocationsBy = groupBy(allocations.rows)

  return rows.map((row) => ({
    id: toInvoiceId(row.id),
    invoiceNumber: row.invoice_number,
    invoiceDate: toIsoDate(row.invoice_date),
    dueDate: toIsoDate(row.due_date),
    amount: amount(row.amount),
    taxPercent: amount(row.tax_percent),
    discountPercent: amount(row.discount_percent),
    status: parseInvoiceStatus(row.status),
    description: row.description,
    lines: (linesBy.get(row.id) ?? []).map(mapLine),
    payments: (paymentsBy.get(row.id) ?? []).map(mapPayment),
    allocations: (allocationsBy.get(row.id) ?? []).map(mapAllocation),
    ...(row.project_id != null ? { projectId: toProjectId(row.project_id) } : {}),
    ...(row.lead_id != null ? { leadId: toLeadId(row.lead_id) } : {}),
    ...(row.client_id != null ? { clientId: toClientId(row.client_id) } : {}),
    ...(row.project_code != null ? { projectCode: row.project_code } : {}),
  }))
}

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

export function createInvoiceRepository(db: Db): InvoiceRepository {
  async function findById(id: string): Promise<Invoice | null> {
    const { rows } = await db.query<InvoiceRow>(`${SELECT_INVOICE} WHERE i.id = $1`, [id])
    const [invoice] = await hydrate(db, rows)
    return invoice ?? null
  }

  return {
    async create(input: NewInvoice) {
      const { rows } = await db.query<{ id: string }>(
        `INSERT INTO invoices (invoice_number, project_id, lead_id, invoice_date, due_date, amount,
                               tax_percent, discount_percent, status, description)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         RETURNING id`,
        [
          input.invoiceNumber,
          input.projectId ?? null,
          input.leadId ?? null,
          input.invoiceDate,
          input.dueDate,
          formatAmount(input.amount),
          formatAmount(input.taxPercent),
          formatAmount(input.discountPercent),
          input.status,
          input.description,
        ],
      )
      const id = rows[0]?.id
      if (id === undefined) throw new Error('Invoice insert returned no id')
      let position = 0
      for (const line of input.lines) {
        position += 1
        await db.query(
          `INSERT INTO invoice_lines (invoice_id, position, description, quantity, unit_price)
           VALUES ($1, $2, $3, $4, $5)`,
          [id, position, line.description, formatAmount(line.quantity), formatAmount(line.unitPrice)],
        )
      }
      const created = await findById(id)
      if (!created) throw new Error(`Invoice ${id} vanished after insert`)
      return created
    },

    findById: (id) => findById(id),

    async list(opts: { limit: number; offset: number; status?: InvoiceStatus }) {
      const { rows } = await db.query<InvoiceRow>(
        `${SELECT_INVOICE}
          WHERE ($1::text IS NULL OR i.status = $1)
          ORDER BY i.invoice_date DESC, i.created_at DESC
          LIMIT $2 OFFSET $3`,
        [opts.status ?? null, opts.limit, opts.offset],
      )
      return hydrate(db, rows)
    },

    async listUnpaid() {
      const { rows } = await db.query<InvoiceRow>(
        `${SELECT_INVOICE} WHERE i.status <> 'paid' ORDER BY i.due_date`,
      )
      return hydrate(db, rows)
    },

    async updateStatus(id, status) {
      await db.query('UPDATE invoices SET status = $2 WHERE id = $1', [id, status])
    },

    async delete(id) {
      await db.query('DELETE FROM invoices WHERE id = $1', [id])
    },

    async maxSequenceWithPrefix(prefix) {
      const { rows } = await db.query<{ max: string | null }>(
        `SELECT max(substring(invoice_number FROM length($1) + 2)::integer)::text AS max
           FROM invoices
          WHERE left(invoice_number, length($1) + 1) = $1 || '-'
            AND substring(invoice_number FROM length($1) + 2) ~ '^[0-9]+$'`,
        [prefix],
      )
      return Number(rows[0]?.max ?? '0')
    },
  }
}

export function createPaymentRepository(db: Db): PaymentRepository {
  async function findById(id: string): Promise<Payment | null> {
    const { rows } = await db.query<PaymentRow>(`SELECT ${PAYMENT_COLUMNS} FROM payments WHERE id = $1`, [id])
    const [row] = rows
    return row ? mapPayment(row) : null
  }

  return {
    async create(input: NewPayment) {
      const { rows } = await db.query<PaymentRow>(
        `INSERT INTO payments (invoice_id, payment_date, amount, account_id, method, reference, notes,
                               received_by, recorded_by)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING ${PAYMENT_COLUMNS}`,
        [
          input.invoiceId,
          input.paymentDate,
          formatAmount(input.amount),
          input.accountId ?? null,
          input.method,
          input.reference,
          input.notes,
          input.receivedBy ?? null,
          input.recordedBy ?? null,
        ],
      )
      const [row] = rows
      if (!row) throw new Error('Payment insert returned no row')
      return mapPayment(row)
    },

    findById: (id) => findById(id),

    async update(payment) {
      const { rows } = await db.query<PaymentRow>(
        `UPDATE payments
            SET payment_date = $2, amount = $3, account_id = $4, method = $5, reference = $6,
                notes = $7, received_by = $8
          WHERE id = $1
          RETURNING ${PAYMENT_COLUMNS}`,
        [
          payment.id,
          payment.paymentDate,
          formatAmount(payment.amount),
          payment.accountId ?? null,
          payment.method,
          payment.reference,
          payment.notes,
          payment.receivedBy ?? null,
        ],
      )
      const [row] = rows
      if (!row) throw new Error(`Payment ${payment.id} not found`)
      return mapPayment(row)
    },
  }
}

const RECEIPT_COLUMNS = `id, receipt_number, receipt_date, payment_id, invoice_id, project_id, client_id,
  lead_id, amount, method, reference, notes, generated_by`

export function createReceiptRepository(db: Db): ReceiptRepository {
  return {
    async create(input: NewReceipt) {
      const { rows } = await db.query<ReceiptRow>(
        `INSERT INTO receipts (receipt_number, receipt_date, payment_id, invoice_id, project_id, client_id,
                               lead_id, amount, method, reference, notes, generated_by)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
         RETURNING ${RECEIPT_COLUMNS}`,
        [
          input.receiptNumber,
          input.receiptDate,
          input.paymentId,
          input.invoiceId,
          input.projectId ?? null,
          input.clientId ?? null,
          input.leadId ?? null,
          formatAmount(input.amount),
          input.method,
          input.reference,
          input.notes,
          input.generatedBy ?? null,
        ],
      )
      const [row] = rows
      if (!row) throw new Error('Receipt insert returned no row')
      return mapReceipt(row)
    },

    async update(receipt) {
      const { rows } = await db.query<ReceiptRow>(
        `UPDATE receipts SET amount = $2, method = $3, reference = $4
          WHERE id = $1
          RETURNING ${RECEIPT_COLUMNS}`,
        [receipt.id, formatAmount(receipt.amount), receipt.method, receipt.reference],
      )
      const [row] = rows
      if (!row) throw new Error(`receipt ${receipt.id} does not exist`)
      return mapReceipt(row)
    },

    async findByPaymentId(paymentId) {
      const { rows } = await db.query<ReceiptRow>(
        `SELECT ${RECEIPT_COLUMNS} FROM receipts WHERE payment_id = $1`,
        [paymentId],
      )
      const [row] = rows
      return row ? mapReceipt(row) : null
    },

    async maxSequenceWithPrefix(prefix) {
      const { rows } = await db.query<{ max: string | null }>(
        `SELECT max(substring(receipt_number FROM length($1) + 2)::integer)::text AS max
           FROM receipts
          WHERE left(receipt_number, length($1) + 1) = $1 || '-'
            AND substring(receipt_number FROM length($1) + 2) ~ '^[0-9]+$'`,
        [prefix],
      )
      return Number(rows[0]?.max ?? '0')
    },
  }
}
