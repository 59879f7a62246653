import type {
  BillCategory,
  BillStatus,
  ExpenseClaimStatus,
  InvoiceStatus,
  LedgerCategory,
  LedgerDirection,
} from '@studioledger/domain'
import { BILL_CATEGORIES, BILL_STATUSES, INVOICE_STATUSES, LEDGER_CATEGORIES } from '@studioledger/domain'

// Narrow the text columns that hold enumerations. An unknown value means the
// database was written by something other than this service.

function parseOneOf<T extends string>(column: string, allowed: readonly T[], raw: string): T {
  const match = allowed.find((value) => value === raw)
  if (match === undefined) throw new Error(`Unexpected ${column} value in database: ${raw}`)
  return match
}

const CLAIM_STATUSES: readonly ExpenseClaimStatus[] = ['submitted', 'approved', 'rejected', 'paid']
const DIRECTIONS: readonly LedgerDirection[] = ['debit', 'credit']

export const parseInvoiceStatus = (raw: string): InvoiceStatus => parseOneOf('invoice status', INVOICE_STATUSES, raw)
export const parseBillStatus = (raw: string): BillStatus => parseOneOf('bill status', BILL_STATUSES, raw)
export const parseBillCategory = (raw: string): BillCategory => parseOneOf('bill category', BILL_CATEGORIES, raw)
export const parseClaimStatus = (raw: string): ExpenseClaimStatus => parseOneOf('claim status', CLAIM_STATUSES, raw)
export const parseLedgerCategory = (raw: string): LedgerCategory =>
  parseOneOf('ledger category', LEDGER_CATEGORIES, raw)
export const parseDirection = (raw: string): LedgerDirection => parseOneOf('direction', DIRECTIONS, raw)
