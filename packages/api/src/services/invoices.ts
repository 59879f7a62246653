import type {
  AccountId,
  Amount,
  ClientAdvanceAllocation,
  ClientAdvanceId,
  Invoice,
  InvoiceId,
  InvoiceStatus,
  InvoiceValuation,
  IsoDate,
  LeadId,
  LedgerEntry,
  Payment,
  PaymentId,
  ProjectId,
  Receipt,
  UserId,
} from '@studioledger/domain'
import {
  ZERO,
  appendSequence,
  canDeleteInvoice,
  invoiceNumberPrefix,
  invoiceStatusFor,
  receiptNumberPrefix,
  validateAllocation,
  validateInvoice,
  validatePaymentAmount,
  valueInvoice,
} from '@studioledger/domain'
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors'
import type { FinanceStore, NewInvoiceLine } from '../store'
import type { ServiceContext } from './context'
import { syncPaymentLedger } from './ledger-sync'
import { refreshInvoiceStatus } from './status'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function loadInvoice(store: FinanceStore, id: InvoiceId): Promise<Invoice> {
  const invoice = await store.invoices.findById(id)
  if (!invoice) throw new NotFoundError('Invoice')
  return invoice
}

function assertValid(errors: readonly string[]): void {
  if (errors.length > 0) throw new ValidationError(errors)
}

// ---------------------------------------------------------------------------
// Invoices
// ---------------------------------------------------------------------------

export type CreateInvoiceInput = {
  /** Generated as `INV-YYYYMM-NNN` when omitted. */
  invoiceNumber?: string
  projectId?: ProjectId
  leadId?: LeadId
  /** Defaults to the business date. */
  invoiceDate?: IsoDate
  dueDate: IsoDate
  amount?: Amount
  taxPercent?: Amount
  discountPercent?: Amount
  status?: InvoiceStatus
  description?: string
  lines?: readonly NewInvoiceLine[]
}

export async function createInvoice(
  store: FinanceStore,
  input: CreateInvoiceInput,
  ctx: ServiceContext,
): Promise<Invoice> {
  const invoiceDate = input.invoiceDate ?? ctx.today
  const draft = {
    ...(input.projectId !== undefined ? { projectId: input.projectId } : {}),
    ...(input.leadId !== undefined ? { leadId: input.leadId } : {}),
    invoiceDate,
    dueDate: input.dueDate,
    amount: input.amount ?? ZERO,
    taxPercent: input.taxPercent ?? ZERO,
    discountPercent: input.discountPercent ?? ZERO,
    lines: input.lines ?? [],
  }
  assertValid(validateInvoice(draft))

  return store.transaction(async (tx) => {
    if (input.projectId !== undefined && !(await tx.directory.findProject(input.projectId))) {
      throw new NotFoundError('Project')
    }
    if (input.leadId !== undefined && !(await tx.directory.findLead(input.leadId))) {
      throw new NotFoundError('Lead')
    }

    let invoiceNumber = input.invoiceNumber?.trim() ?? ''
    if (invoiceNumber === '') {
      const prefix = invoiceNumberPrefix(invoiceDate)
      invoiceNumber = appendSequence(prefix, (await tx.invoices.maxSequenceWithPrefix(prefix)) + 1)
    }

    return tx.invoices.create({
      ...draft,
      invoiceNumber,
      status: input.status ?? 'draft',
      description: input.description ?? '',
    })
  })
}

export interface InvoiceSummary {
  readonly invoice: Invoice
  readonly valuation: InvoiceValuation
  /** Status as of `today`; not persisted. */
  readonly status: InvoiceStatus
}

export async function getInvoiceSummary(store: FinanceStore, id: InvoiceId, today: IsoDate): Promise<InvoiceSummary> {
  const invoice = await loadInvoice(store, id)
  return { invoice, valuation: valueInvoice(invoice), status: invoiceStatusFor(invoice, today) }
}

/** @throws {ConflictError} once any payment has been recorded. */
export async function deleteInvoice(store: FinanceStore, id: InvoiceId): Promise<void> {
  await store.transaction(async (tx) => {
    const invoice = await loadInvoice(tx, id)
    if (!canDeleteInvoice(invoice)) {
      throw new ConflictError('An invoice with recorded payments cannot be deleted.')
    }
    await tx.invoices.delete(id)
  })
}

// ---------------------------------------------------------------------------
// Payments
// ---------------------------------------------------------------------------

export type RecordPaymentInput = {
  invoiceId: InvoiceId
  amount: Amount
  /** Defaults to the business date. */
  paymentDate?: IsoDate
  accountId?: AccountId
  method?: string
  reference?: string
  notes?: string
  receivedBy?: UserId
  /** A receipt is issued unless this is false. */
  generateReceipt?: boolean
}

export interface PaymentResult {
  readonly payment: Payment
  readonly invoice: Invoice
  readonly status: InvoiceStatus
  readonly ledgerEntry: LedgerEntry
  readonly receipt?: Receipt
}

async function settle(tx: FinanceStore, payment: Payment, ctx: ServiceContext): Promise<PaymentResult> {
  const synced = await syncPaymentLedger(tx, payment, ctx.today)
  if (!synced) throw new NotFoundError('Invoice')
  const invoice = await loadInvoice(tx, payment.invoiceId)
  return { payment, invoice, status: synced.invoiceStatus, ledgerEntry: synced.entry }
}

/**
 * Records a client payment, mirrors it into the cashbook, refreshes the
 * invoice status and issues a receipt, all in one transaction.
 */
export async function recordPayment(
  store: FinanceStore,
  input: RecordPaymentInput,
  ctx: ServiceContext,
): Promise<PaymentResult> {
  return store.transaction(async (tx) => {
    const invoice = await loadInvoice(tx, input.invoiceId)
    assertValid(validatePaymentAmount(invoice, input.amount))

    const payment = await tx.payments.create({
      invoiceId: invoice.id,
      paymentDate: input.paymentDate ?? ctx.today,
      amount: input.amount,
      method: input.method ?? '',
      reference: input.reference ?? '',
      notes: input.notes ?? '',
      ...(input.accountId !== undefined ? { accountId: input.accountId } : {}),
      ...(input.receivedBy !== undefined ? { receivedBy: input.receivedBy } : {}),
      ...(ctx.actorId !== undefined ? { recordedBy: ctx.actorId } : {}),
    })
    const result = await settle(tx, payment, ctx)
    if (input.generateReceipt === false) return result

    const { receipt } = await generateReceipt(tx, payment.id, ctx)
    return { ...result, receipt }
  })
}

export type UpdatePaymentInput = {
  amount?: Amount
  paymentDate?: IsoDate
  accountId?: AccountId
  method?: string
  reference?: string
  notes?: string
  receivedBy?: UserId
}

/**
 * Edits a payment, re-syncs the cashbook row it already owns and keeps its
 * receipt, if any, in step.
 */
export async function updatePayment(
  store: FinanceStore,
  id: PaymentId,
  changes: UpdatePaymentInput,
  ctx: ServiceContext,
): Promise<PaymentResult> {
  return store.transaction(async (tx) => {
    const current = await tx.payments.findById(id)
    if (!current) throw new NotFoundError('Payment')

    if (changes.amount !== undefined) {
      // The payment being edited does not count against its own limit.
      const invoice = await loadInvoice(tx, current.invoiceId)
      const others = { ...invoice, payments: invoice.payments.filter((p) => p.id !== id) }
      assertValid(validatePaymentAmount(others, changes.amount))
    }

    const updated = await tx.payments.update({ ...current, ...changes })
    const result = await settle(tx, updated, ctx)
    const receipt = await tx.receipts.findByPaymentId(id)
    if (!receipt) return result
    return {
      ...result,
      receipt: await tx.receipts.update({
        ...receipt,
        amount: updated.amount,
        method: updated.method,
        reference: updated.reference,
      }),
    }
  })
}

// ---------------------------------------------------------------------------
// Receipts
// ---------------------------------------------------------------------------

export interface ReceiptResult {
  readonly receipt: Receipt
  /** False when the payment already had a receipt. */
  readonly created: boolean
}

/** Issues the receipt for a payment. A payment never gets a second one. */
export async function generateReceipt(
  store: FinanceStore,
  paymentId: PaymentId,
  ctx: ServiceContext,
): Promise<ReceiptResult> {
  return store.transaction(async (tx) => {
    const existing = await tx.receipts.findByPaymentId(paymentId)
    if (existing) return { receipt: existing, created: false }

    const payment = await tx.payments.findById(paymentId)
    if (!payment) throw new NotFoundError('Payment')
    const invoice = await loadInvoice(tx, payment.invoiceId)

    const prefix = receiptNumberPrefix(ctx.receiptPrefix, invoice.projectCode, ctx.today)
    const sequence = (await tx.receipts.maxSequenceWithPrefix(prefix)) + 1
    const receipt = await tx.receipts.create({
      receiptNumber: appendSequence(prefix, sequence),
      receiptDate: ctx.today,
      paymentId: payment.id,
      invoiceId: invoice.id,
      amount: payment.amount,
      method: payment.method,
      reference: payment.reference,
      notes: '',
      ...(invoice.projectId !== undefined ? { projectId: invoice.projectId } : {}),
      ...(invoice.clientId !== undefined ? { clientId: invoice.clientId } : {}),
      ...(invoice.leadId !== undefined ? { leadId: invoice.leadId } : {}),
      ...(ctx.actorId !== undefined ? { generatedBy: ctx.actorId } : {}),
    })
    return { receipt, created: true }
  })
}

// ---------------------------------------------------------------------------
// Advance allocation
// ---------------------------------------------------------------------------

export type AllocateAdvanceInput = {
  invoiceId: InvoiceId
  advanceId: ClientAdvanceId
  amount: Amount
  notes?: string
}

export interface AllocationResult {
  readonly allocation: ClientAdvanceAllocation
  readonly invoice: Invoice
  readonly status: InvoiceStatus
}

/**
 * Applies part of a client advance to an invoice.
 *
 * Balances are checked without row locks; two concurrent allocations against
 * the same advance can together exceed it.
 */
export async function allocateAdvance(
  store: FinanceStore,
  input: AllocateAdvanceInput,
  ctx: ServiceContext,
): Promise<AllocationResult> {
  return store.transaction(async (tx) => {
    const invoice = await loadInvoice(tx, input.invoiceId)
    const advance = await tx.advances.findById(input.advanceId)
    if (!advance) throw new NotFoundError('Client advance')
    assertValid(validateAllocation(advance, invoice, input.amount))

    const allocation = await tx.advances.createAllocation({
      advanceId: advance.id,
      invoiceId: invoice.id,
      amount: input.amount,
      notes: input.notes ?? '',
      ...(ctx.actorId !== undefined ? { allocatedBy: ctx.actorId } : {}),
    })
    const status = await refreshInvoiceStatus(tx, invoice.id, { save: true, today: ctx.today })
    return { allocation, invoice: await loadInvoice(tx, invoice.id), status }
  })
}
