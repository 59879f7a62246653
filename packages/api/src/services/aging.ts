import type { AgingReport, Bill, BillStatus, Invoice, InvoiceStatus, IsoDate } from '@studioledger/domain'
import {
  billStatusFor,
  bucketByAge,
  calculateBillOutstanding,
  calculateOutstanding,
  invoiceStatusFor,
} from '@studioledger/domain'
import type { FinanceStore } from '../store'

// Aging reads statuses as of `today` without writing them back.

export interface AgedInvoice {
  readonly invoice: Invoice
  readonly status: InvoiceStatus
}

export interface AgedBill {
  readonly bill: Bill
  readonly status: BillStatus
}

export async function invoiceAging(store: FinanceStore, today: IsoDate): Promise<AgingReport<AgedInvoice>> {
  const invoices = await store.invoices.listUnpaid()
  return bucketByAge(
    invoices.map((invoice) => ({
      item: { invoice, status: invoiceStatusFor(invoice, today) },
      dueDate: invoice.dueDate,
      outstanding: calculateOutstanding(invoice),
    })),
    today,
  )
}

/** Bills without a due date age from their bill date. */
export async function billAging(store: FinanceStore, today: IsoDate): Promise<AgingReport<AgedBill>> {
  const bills = await store.bills.listUnpaid()
  return bucketByAge(
    bills.map((bill) => ({
      item: { bill, status: billStatusFor(bill, today) },
      dueDate: bill.dueDate ?? bill.billDate,
      outstanding: calculateBillOutstanding(bill),
    })),
    today,
  )
}
