import type { BillId, BillStatus, InvoiceId, InvoiceStatus, IsoDate } from '@studioledger/domain'
import { billStatusFor, invoiceStatusFor } from '@studioledger/domain'
import { NotFoundError } from '../lib/errors'
import type { FinanceStore } from '../store'

export interface RefreshOptions {
  /** Persist the computed status when it differs from the stored one. */
  readonly save: boolean
  readonly today: IsoDate
}

export async function refreshInvoiceStatus(
  store: FinanceStore,
  id: InvoiceId,
  opts: RefreshOptions,
): Promise<InvoiceStatus> {
  const invoice = await store.invoices.findById(id)
  if (!invoice) throw new NotFoundError('Invoice')
  const status = invoiceStatusFor(invoice, opts.today)
  if (opts.save && status !== invoice.status) {
    await store.invoices.updateStatus(id, status)
  }
  return status
}

export async function refreshBillStatus(store: FinanceStore, id: BillId, opts: RefreshOptions): Promise<BillStatus> {
  const bill = await store.bills.findById(id)
  if (!bill) throw new NotFoundError('Bill')
  const status = billStatusFor(bill, opts.today)
  if (opts.save && status !== bill.status) {
    await store.bills.updateStatus(id, status)
  }
  return status
}
