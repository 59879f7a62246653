// ---------------------------------------------------------------------------
// Settlement notifications
//
// Handlers announce settlement events after the transaction commits. Delivery
// lives outside this service; the default notifier only logs. A notifier
// failure never changes the HTTP response.
// ---------------------------------------------------------------------------

import type { Bill, ClientAdvanceAllocation, ExpenseClaim, Invoice, Payment, Receipt } from '@studioledger/domain'
import { formatAmount } from '@studioledger/domain'

export interface SettlementNotifier {
  paymentRecorded(event: { payment: Payment; invoice: Invoice }): Promise<void>
  receiptGenerated(event: { receipt: Receipt }): Promise<void>
  billPaid(event: { bill: Bill }): Promise<void>
  advanceApplied(event: { allocation: ClientAdvanceAllocation; invoice: Invoice }): Promise<void>
  claimPaid(event: { claim: ExpenseClaim }): Promise<void>
}

export function createConsoleNotifier(): SettlementNotifier {
  return {
    async paymentRecorded({ payment, invoice }) {
      console.log(`[notify] payment ${formatAmount(payment.amount)} recorded for invoice ${invoice.invoiceNumber}`)
    },
    async receiptGenerated({ receipt }) {
      console.log(`[notify] receipt ${receipt.receiptNumber} generated`)
    },
    async billPaid({ bill }) {
      console.log(`[notify] bill ${bill.billNumber || bill.id} paid in full`)
    },
    async advanceApplied({ allocation, invoice }) {
      console.log(`[notify] advance ${formatAmount(allocation.amount)} applied to invoice ${invoice.invoiceNumber}`)
    },
    async claimPaid({ claim }) {
      console.log(`[notify] expense claim ${claim.id} reimbursed`)
    },
  }
}

/**
 * Runs one notification, logging instead of propagating any failure.
 */
export async function notifySafely(event: string, send: () => Promise<void>): Promise<void> {
  try {
    await send()
  } catch (err) {
    console.error(`[notify] ${event} failed`, err)
  }
}
