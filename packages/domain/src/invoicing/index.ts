// ---------------------------------------------------------------------------
// Invoicing bounded context
// Invoices raised against projects or leads, the payments and advance
// allocations that settle them, and the receipts issued for payments.
// ---------------------------------------------------------------------------

import type {
  AccountId,
  Amount,
  Brand,
  ClientId,
  IsoDate,
  LeadId,
  ProjectId,
  UserId,
} from '../shared/types'
import {
  ZERO,
  clampAmount,
  compareDates,
  isZeroOrLess,
  nonNegative,
  percentOf,
  round2,
  sumAmounts,
} from '../shared/types'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies an Invoice aggregate. */
export type InvoiceId = Brand<string, 'InvoiceId'>

export type InvoiceLineId = Brand<string, 'InvoiceLineId'>

/** Uniquely identifies a Payment received against an Invoice. */
export type PaymentId = Brand<string, 'PaymentId'>

export type ReceiptId = Brand<string, 'ReceiptId'>

/** Uniquely identifies a ClientAdvance (retainer). */
export type ClientAdvanceId = Brand<string, 'ClientAdvanceId'>

export type AllocationId = Brand<string, 'AllocationId'>

export const toInvoiceId = (raw: string): InvoiceId => raw as InvoiceId
export const toInvoiceLineId = (raw: string): InvoiceLineId => raw as InvoiceLineId
export const toPaymentId = (raw: string): PaymentId => raw as PaymentId
export const toReceiptId = (raw: string): ReceiptId => raw as ReceiptId
export const toClientAdvanceId = (raw: string): ClientAdvanceId => raw as ClientAdvanceId
export const toAllocationId = (raw: string): AllocationId => raw as AllocationId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

/**
 * Coarse lifecycle status of an Invoice. It is always recomputed from the
 * balance and due date, never transitioned incrementally.
 */
export type InvoiceStatus = 'draft' | 'sent' | 'paid' | 'overdue'

export const INVOICE_STATUSES: readonly InvoiceStatus[] = ['draft', 'sent', 'paid', 'overdue'] as const

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * @invariant `quantity` must be > 0 and `unitPrice` ≥ 0.
 */
export interface InvoiceLine {
  readonly id: InvoiceLineId
  readonly invoiceId: InvoiceId
  readonly description: string
  readonly quantity: Amount
  readonly unitPrice: Amount
}

/**
 * A record of money received against an Invoice.
 *
 * @invariant `amount` must be > 0.
 */
export interface Payment {
  readonly id: PaymentId
  readonly invoiceId: InvoiceId
  readonly paymentDate: IsoDate
  readonly amount: Amount
  readonly accountId?: AccountId
  readonly method: string
  readonly reference: string
  readonly notes: string
  readonly receivedBy?: UserId
  readonly recordedBy?: UserId
}

/** Applies part of a ClientAdvance to an Invoice. */
export interface ClientAdvanceAllocation {
  readonly id: AllocationId
  readonly advanceId: ClientAdvanceId
  readonly invoiceId: InvoiceId
  readonly amount: Amount
  readonly allocatedBy?: UserId
  readonly notes: string
}

/**
 * The Invoice aggregate root.
 *
 * Every derived figure (subtotal, tax, outstanding …) is computed from the
 * invoice's lines, payments and allocations and never stored.
 *
 * @invariant At least one of `projectId` / `leadId` is set.
 * @invariant `dueDate` ≥ `invoiceDate`.
 * @invariant An invoice cannot be deleted once payments exist against it.
 */
export interface Invoice {
  readonly id: InvoiceId
  readonly invoiceNumber: string
  readonly projectId?: ProjectId
  readonly leadId?: LeadId
  /** Resolved through the project, or the lead when there is no project. */
  readonly clientId?: ClientId
  /** Code of the billed project, used when numbering receipts. */
  readonly projectCode?: string
  readonly invoiceDate: IsoDate
  readonly dueDate: IsoDate
  /** Flat amount, used only when the invoice has no lines. */
  readonly amount: Amount
  readonly taxPercent: Amount
  readonly discountPercent: Amount
  readonly status: InvoiceStatus
  readonly description: string
  readonly lines: readonly InvoiceLine[]
  readonly payments: readonly Payment[]
  readonly allocations: readonly ClientAdvanceAllocation[]
}

/**
 * Proof of payment given to the client, generated from exactly one Payment.
 * Invoice, project, client and lead references are copied from the invoice at
 * generation time.
 */
export interface Receipt {
  readonly id: ReceiptId
  readonly receiptNumber: string
  readonly receiptDate: IsoDate
  readonly paymentId: PaymentId
  readonly invoiceId: InvoiceId
  readonly projectId?: ProjectId
  readonly clientId?: ClientId
  readonly leadId?: LeadId
  readonly amount: Amount
  readonly method: string
  readonly reference: string
  readonly notes: string
  readonly generatedBy?: UserId
}

/**
 * A standalone client payment (retainer) that can later be applied to
 * invoices of the same project or client.
 */
export interface ClientAdvance {
  readonly id: ClientAdvanceId
  readonly clientId: ClientId
  readonly projectId?: ProjectId
  readonly receivedDate: IsoDate
  readonly amount: Amount
  readonly accountId?: AccountId
  readonly method: string
  readonly reference: string
  readonly notes: string
  readonly receivedBy?: UserId
  readonly recordedBy?: UserId
  readonly allocations: readonly ClientAdvanceAllocation[]
}

// ---------------------------------------------------------------------------
// Valuation
// ---------------------------------------------------------------------------

export function lineTotal(line: Pick<InvoiceLine, 'quantity' | 'unitPrice'>): Amount {
  return round2(line.quantity.times(line.unitPrice))
}

/**
 * Sum of line totals, falling back to the flat `amount` when the invoice has
 * no lines or its lines sum to zero.
 */
export function calculateSubtotal(invoice: Pick<Invoice, 'lines' | 'amount'>): Amount {
  const linesTotal = sumAmounts(invoice.lines.map(lineTotal))
  return linesTotal.isZero() ? round2(invoice.amount) : linesTotal
}

/** Clamped to [0, subtotal] so a discount above 100% cannot go negative. */
export function calculateDiscountAmount(invoice: Pick<Invoice, 'lines' | 'amount' | 'discountPercent'>): Amount {
  const subtotal = calculateSubtotal(invoice)
  return clampAmount(percentOf(subtotal, invoice.discountPercent), ZERO, nonNegative(subtotal))
}

export function calculateTaxableAmount(invoice: Pick<Invoice, 'lines' | 'amount' | 'discountPercent'>): Amount {
  return nonNegative(calculateSubtotal(invoice).minus(calculateDiscountAmount(invoice)))
}

export function calculateTotalWithTax(
  invoice: Pick<Invoice, 'lines' | 'amount' | 'discountPercent' | 'taxPercent'>,
): Amount {
  const taxable = calculateTaxableAmount(invoice)
  return round2(taxable.plus(percentOf(taxable, invoice.taxPercent)))
}

export function calculateAmountReceived(invoice: Pick<Invoice, 'payments'>): Amount {
  return sumAmounts(invoice.payments.map((p) => p.amount))
}

export function calculateAdvanceApplied(invoice: Pick<Invoice, 'allocations'>): Amount {
  return sumAmounts(invoice.allocations.map((a) => a.amount))
}

export function calculateAmountSettled(invoice: Pick<Invoice, 'payments' | 'allocations'>): Amount {
  return round2(calculateAmountReceived(invoice).plus(calculateAdvanceApplied(invoice)))
}

/**
 * Remaining balance after payments and applied advances. Never negative,
 * even when the invoice has been over-settled.
 */
export function calculateOutstanding(invoice: Invoice): Amount {
  return nonNegative(calculateTotalWithTax(invoice).minus(calculateAmountSettled(invoice)))
}

/** Every derived figure of an invoice, computed in one pass. */
export interface InvoiceValuation {
  readonly subtotal: Amount
  readonly discountAmount: Amount
  readonly taxableAmount: Amount
  readonly taxAmount: Amount
  readonly totalWithTax: Amount
  readonly amountReceived: Amount
  readonly advanceApplied: Amount
  readonly amountSettled: Amount
  readonly outstanding: Amount
}

export function valueInvoice(invoice: Invoice): InvoiceValuation {
  const subtotal = calculateSubtotal(invoice)
  const discountAmount = calculateDiscountAmount(invoice)
  const taxableAmount = calculateTaxableAmount(invoice)
  const totalWithTax = calculateTotalWithTax(invoice)
  const amountReceived = calculateAmountReceived(invoice)
  const advanceApplied = calculateAdvanceApplied(invoice)
  const amountSettled = calculateAmountSettled(invoice)
  return {
    subtotal,
    discountAmount,
    taxableAmount,
    taxAmount: round2(totalWithTax.minus(taxableAmount)),
    totalWithTax,
    amountReceived,
    advanceApplied,
    amountSettled,
    outstanding: nonNegative(totalWithTax.minus(amountSettled)),
  }
}

// ---------------------------------------------------------------------------
// Status machine
// ---------------------------------------------------------------------------

export interface InvoiceBalances {
  readonly outstanding: Amount
  readonly dueDate: IsoDate
  readonly currentStatus: InvoiceStatus
}

/**
 * Derives the invoice status from its current balance, evaluated in order:
 * settled → `paid`; past due → `overdue`; still a draft → `sent`; otherwise
 * the current status is kept.
 *
 * Neither `paid` nor `overdue` is sticky: evaluating against an earlier
 * `today` can move an overdue invoice back to its prior state.
 */
export function computeInvoiceStatus(balances: InvoiceBalances, today: IsoDate): InvoiceStatus {
  if (isZeroOrLess(balances.outstanding)) return 'paid'
  if (compareDates(balances.dueDate, today) < 0) return 'overdue'
  if (balances.currentStatus === 'draft') return 'sent'
  return balances.currentStatus
}

export function invoiceStatusFor(invoice: Invoice, today: IsoDate): InvoiceStatus {
  return computeInvoiceStatus(
    { outstanding: calculateOutstanding(invoice), dueDate: invoice.dueDate, currentStatus: invoice.status },
    today,
  )
}

// ---------------------------------------------------------------------------
// Rules and validation
// ---------------------------------------------------------------------------

/**
 * @rule An invoice cannot be deleted once payments exist against it.
 */
export function canDeleteInvoice(invoice: Pick<Invoice, 'payments'>): boolean {
  return invoice.payments.length === 0
}

export interface InvoiceDraft {
  readonly projectId?: string
  readonly leadId?: string
  readonly invoiceDate: IsoDate
  readonly dueDate: IsoDate
  readonly amount: Amount
  readonly taxPercent: Amount
  readonly discountPercent: Amount
  readonly lines: readonly Pick<InvoiceLine, 'description' | 'quantity' | 'unitPrice'>[]
}

/**
 * Validates an invoice before it is persisted and returns a list of
 * human-readable error messages. An empty array means the invoice is valid.
 */
export function validateInvoice(draft: InvoiceDraft): readonly string[] {
  const errors: string[] = []
  if (!draft.projectId && !draft.leadId) errors.push('Select a project or a lead to bill.')
  if (compareDates(draft.dueDate, draft.invoiceDate) < 0) {
    errors.push('Due date cannot be earlier than the invoice date.')
  }
  if (draft.amount.isNegative()) errors.push('Amount cannot be negative.')
  if (draft.taxPercent.isNegative()) errors.push('Tax percent cannot be negative.')
  if (draft.discountPercent.isNegative()) errors.push('Discount percent cannot be negative.')
  draft.lines.forEach((line, index) => {
    if (line.description.trim() === '') errors.push(`Line ${index + 1}: description is required.`)
    if (isZeroOrLess(line.quantity)) errors.push(`Line ${index + 1}: quantity must be greater than zero.`)
    if (line.unitPrice.isNegative()) errors.push(`Line ${index + 1}: unit price cannot be negative.`)
  })
  return errors
}

/**
 * Validates a payment amount against the invoice it settles.
 */
export function validatePaymentAmount(invoice: Invoice, paymentAmount: Amount): readonly string[] {
  if (isZeroOrLess(paymentAmount)) return ['Amount must be greater than zero.']
  const outstanding = calculateOutstanding(invoice)
  if (isZeroOrLess(outstanding)) return ['This invoice is already settled.']
  if (paymentAmount.greaterThan(outstanding)) {
    return [`Cannot record more than the outstanding balance (${outstanding.toFixed(2)}).`]
  }
  return []
}

// ---------------------------------------------------------------------------
// Client advances
// ---------------------------------------------------------------------------

export function calculateAllocatedAmount(advance: Pick<ClientAdvance, 'allocations'>): Amount {
  return sumAmounts(advance.allocations.map((a) => a.amount))
}

/** `amount − allocated`; may be negative only after a concurrent over-allocation. */
export function calculateAvailableAmount(advance: Pick<ClientAdvance, 'amount' | 'allocations'>): Amount {
  return round2(advance.amount.minus(calculateAllocatedAmount(advance)))
}

/**
 * An advance may settle an invoice of the same project, or any invoice billed
 * to the same client.
 */
export function isAdvanceEligible(advance: ClientAdvance, invoice: Invoice): boolean {
  if (advance.projectId !== undefined && advance.projectId === invoice.projectId) return true
  return invoice.clientId !== undefined && advance.clientId === invoice.clientId
}

/**
 * Validates an allocation at the time it is created. Balances are read
 * without locking, so two concurrent allocations can both pass.
 */
export function validateAllocation(
  advance: ClientAdvance,
  invoice: Invoice,
  allocationAmount: Amount,
): readonly string[] {
  const errors: string[] = []
  if (isZeroOrLess(allocationAmount)) {
    errors.push('Allocation amount must be greater than zero.')
    return errors
  }
  if (!isAdvanceEligible(advance, invoice)) {
    errors.push('This advance does not belong to the invoice project or client.')
  }
  const outstanding = calculateOutstanding(invoice)
  if (allocationAmount.greaterThan(outstanding)) {
    errors.push(`Allocation exceeds the invoice outstanding balance (${outstanding.toFixed(2)}).`)
  }
  const available = calculateAvailableAmount(advance)
  if (allocationAmount.greaterThan(available)) {
    errors.push(`Allocation exceeds the advance available balance (${available.toFixed(2)}).`)
  }
  return errors
}

// ---------------------------------------------------------------------------
// Receipts
// ---------------------------------------------------------------------------

/**
 * The prefix shared by every receipt issued for the same project on the same
 * day, e.g. `RCT-100-NVRT-20240131`. Invoices without a project use `GEN`.
 */
export function receiptNumberPrefix(prefix: string, projectCode: string | undefined, receiptDate: IsoDate): string {
  const scope = projectCode && projectCode.trim() !== '' ? projectCode.trim().toUpperCase() : 'GEN'
  return `${prefix}-${scope}-${receiptDate.replaceAll('-', '')}`
}

/** Appends the 1-based sequence, zero-padded to three digits. */
export function appendSequence(scopePrefix: string, sequence: number): string {
  return `${scopePrefix}-${String(sequence).padStart(3, '0')}`
}

/**
 * Reads the sequence back out of a number issued under `scopePrefix`.
 * Returns undefined for numbers from another scope or with a non-numeric tail.
 */
export function sequenceOf(scopePrefix: string, number: string): number | undefined {
  if (!number.startsWith(`${scopePrefix}-`)) return undefined
  const tail = number.slice(scopePrefix.length + 1)
  return /^\d+$/.test(tail) ? Number(tail) : undefined
}

/** The next sequence after the highest one already issued. */
export function nextSequence(scopePrefix: string, issued: Iterable<string>): number {
  let highest = 0
  for (const number of issued) {
    const sequence = sequenceOf(scopePrefix, number)
    if (sequence !== undefined && sequence > highest) highest = sequence
  }
  return highest + 1
}

/** Invoices are numbered per month, e.g. `INV-202401-004`. */
export function invoiceNumberPrefix(invoiceDate: IsoDate): string {
  return `INV-${invoiceDate.slice(0, 7).replace('-', '')}`
}
