// ---------------------------------------------------------------------------
// Settlement ledger sync
//
// Every settlement event owns at most one cashbook row, found by its origin.
// Syncing inserts the row the first time and overwrites it afterwards, so
// saving the same event twice never adds a second movement.
// ---------------------------------------------------------------------------

import type {
  BillPayment,
  BillStatus,
  ClientAdvance,
  ExpenseClaimPayment,
  InvoiceStatus,
  IsoDate,
  LedgerEntry,
  OriginatedLedgerEntryDraft,
  Payment,
} from '@studioledger/domain'
import {
  billPaymentLedgerEntry,
  clientAdvanceLedgerEntry,
  expenseClaimPaymentLedgerEntry,
  paymentLedgerEntry,
  sameLedgerContent,
  validateLedgerEntry,
} from '@studioledger/domain'
import { ValidationError } from '../lib/errors'
import type { FinanceStore } from '../store'
import { refreshBillStatus, refreshInvoiceStatus } from './status'

/** Upserts the row for `draft.origin`. */
export async function syncLedgerEntry(store: FinanceStore, draft: OriginatedLedgerEntryDraft): Promise<LedgerEntry> {
  const errors = validateLedgerEntry(draft)
  if (errors.length > 0) throw new ValidationError(errors)

  const existing = await store.ledger.findByOrigin(draft.origin)
  if (!existing) return store.ledger.insert(draft)
  if (sameLedgerContent(existing, draft)) return existing
  return store.ledger.update(existing.id, draft)
}

// ---------------------------------------------------------------------------
// Source-specific sync. Each returns null when the event has lost the record
// it settles; nothing is written in that case.
// ---------------------------------------------------------------------------

export interface PaymentSync {
  readonly entry: LedgerEntry
  readonly invoiceStatus: InvoiceStatus
}

export async function syncPaymentLedger(
  store: FinanceStore,
  payment: Payment,
  today: IsoDate,
): Promise<PaymentSync | null> {
  const invoice = await store.invoices.findById(payment.invoiceId)
  if (!invoice) return null
  const entry = await syncLedgerEntry(store, paymentLedgerEntry(payment, invoice))
  const invoiceStatus = await refreshInvoiceStatus(store, invoice.id, { save: true, today })
  return { entry, invoiceStatus }
}

export interface BillPaymentSync {
  readonly entry: LedgerEntry
  readonly billStatus: BillStatus
}

export async function syncBillPaymentLedger(
  store: FinanceStore,
  billPayment: BillPayment,
  today: IsoDate,
): Promise<BillPaymentSync | null> {
  const bill = await store.bills.findById(billPayment.billId)
  if (!bill) return null
  const entry = await syncLedgerEntry(store, billPaymentLedgerEntry(billPayment, bill))
  const billStatus = await refreshBillStatus(store, bill.id, { save: true, today })
  return { entry, billStatus }
}

export async function syncClientAdvanceLedger(store: FinanceStore, advance: ClientAdvance): Promise<LedgerEntry> {
  return syncLedgerEntry(store, clientAdvanceLedgerEntry(advance))
}

/** Also marks the claim `paid`. */
export async function syncExpenseClaimPaymentLedger(
  store: FinanceStore,
  claimPayment: ExpenseClaimPayment,
): Promise<LedgerEntry | null> {
  const claim = await store.claims.findById(claimPayment.claimId)
  if (!claim) return null
  const entry = await syncLedgerEntry(store, expenseClaimPaymentLedgerEntry(claimPayment, claim))
  if (claim.status !== 'paid') {
    await store.claims.update({ ...claim, status: 'paid' })
  }
  return entry
}
