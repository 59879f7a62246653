// ---------------------------------------------------------------------------
// Ledger bounded context
// The cashbook: one row per cash movement. Rows mirroring a settlement event
// carry that event as their origin, which is the key used to keep exactly one
// row per event.
// ---------------------------------------------------------------------------

import type {
  AccountId,
  Amount,
  Brand,
  ClientId,
  IsoDate,
  ProjectId,
  UserId,
  VendorId,
} from '../shared/types'
import { ZERO, isZeroOrLess, round2, sumAmounts } from '../shared/types'
import type { ClientAdvance, ClientAdvanceId, Invoice, Payment, PaymentId } from '../invoicing/index'
import type {
  Bill,
  BillPayment,
  BillPaymentId,
  ExpenseClaim,
  ExpenseClaimPayment,
  ExpenseClaimPaymentId,
} from '../payables/index'
import type { RecurringRule, RecurringRuleId } from '../recurring/index'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

export type LedgerEntryId = Brand<string, 'LedgerEntryId'>

export const toLedgerEntryId = (raw: string): LedgerEntryId => raw as LedgerEntryId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

export type LedgerCategory =
  | 'client_payment'
  | 'client_advance'
  | 'project_expense'
  | 'office_expense'
  | 'reimbursement'
  | 'salary'
  | 'transfer'
  | 'other_income'
  | 'other_expense'
  | 'misc'

export const LEDGER_CATEGORIES: readonly LedgerCategory[] = [
  'client_payment',
  'client_advance',
  'project_expense',
  'office_expense',
  'reimbursement',
  'salary',
  'transfer',
  'other_income',
  'other_expense',
  'misc',
] as const

/** `credit` is money in, `debit` is money out. */
export type LedgerDirection = 'debit' | 'credit'

/**
 * The settlement event a ledger row mirrors. At most one per row.
 */
export type LedgerOrigin =
  | { readonly kind: 'payment'; readonly paymentId: PaymentId }
  | { readonly kind: 'bill_payment'; readonly billPaymentId: BillPaymentId }
  | { readonly kind: 'client_advance'; readonly advanceId: ClientAdvanceId }
  | { readonly kind: 'expense_claim_payment'; readonly claimPaymentId: ExpenseClaimPaymentId }
  | { readonly kind: 'recurring_rule'; readonly ruleId: RecurringRuleId; readonly runDate: IsoDate }

export type LedgerOriginKind = LedgerOrigin['kind']

/**
 * The idempotency key of an origin, e.g. `payment:42` or
 * `recurring_rule:7:2024-02-28`. Two origins are the same event iff their
 * keys are equal.
 */
export function originKey(origin: LedgerOrigin): string {
  switch (origin.kind) {
    case 'payment':
      return `payment:${origin.paymentId}`
    case 'bill_payment':
      return `bill_payment:${origin.billPaymentId}`
    case 'client_advance':
      return `client_advance:${origin.advanceId}`
    case 'expense_claim_payment':
      return `expense_claim_payment:${origin.claimPaymentId}`
    case 'recurring_rule':
      return `recurring_rule:${origin.ruleId}:${origin.runDate}`
  }
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * Everything a ledger row records, minus its identity.
 *
 * @invariant `debit` and `credit` are never both non-zero.
 */
export interface LedgerEntryDraft {
  readonly date: IsoDate
  readonly description: string
  readonly category: LedgerCategory
  readonly debit: Amount
  readonly credit: Amount
  readonly accountId?: AccountId
  readonly projectId?: ProjectId
  readonly clientId?: ClientId
  readonly vendorId?: VendorId
  /** Staff member the movement concerns (salary, reimbursement). */
  readonly personId?: UserId
  readonly recordedBy?: UserId
  readonly remarks: string
  readonly origin?: LedgerOrigin
}

/** A draft mirroring a settlement event, which can be synced by origin. */
export interface OriginatedLedgerEntryDraft extends LedgerEntryDraft {
  readonly origin: LedgerOrigin
}

export interface LedgerEntry extends LedgerEntryDraft {
  readonly id: LedgerEntryId
}

/** Descriptions are stored in a 255-character column. */
export const DESCRIPTION_MAX_LENGTH = 255

function truncateDescription(text: string): string {
  return text.slice(0, DESCRIPTION_MAX_LENGTH)
}

/** Splits a signed movement into its debit/credit columns. */
export function postAmount(direction: LedgerDirection, value: Amount): Pick<LedgerEntryDraft, 'debit' | 'credit'> {
  const rounded = round2(value)
  return direction === 'credit' ? { debit: ZERO, credit: rounded } : { debit: rounded, credit: ZERO }
}

// ---------------------------------------------------------------------------
// Derivation from settlement events
// ---------------------------------------------------------------------------

/**
 * Client payment against an invoice → credit.
 */
export function paymentLedgerEntry(
  payment: Payment,
  invoice: Pick<Invoice, 'invoiceNumber' | 'projectId' | 'clientId'>,
): OriginatedLedgerEntryDraft {
  return {
    date: payment.paymentDate,
    description: truncateDescription(`Payment received for invoice ${invoice.invoiceNumber}`),
    category: 'client_payment',
    ...postAmount('credit', payment.amount),
    ...(payment.accountId !== undefined ? { accountId: payment.accountId } : {}),
    ...(invoice.projectId !== undefined ? { projectId: invoice.projectId } : {}),
    ...(invoice.clientId !== undefined ? { clientId: invoice.clientId } : {}),
    ...(payment.recordedBy !== undefined ? { recordedBy: payment.recordedBy } : {}),
    remarks: payment.reference,
    origin: { kind: 'payment', paymentId: payment.id },
  }
}

/**
 * Vendor bill payment → debit, booked under the bill's own category.
 */
export function billPaymentLedgerEntry(
  billPayment: BillPayment,
  bill: Pick<Bill, 'billNumber' | 'vendorId' | 'projectId' | 'category'>,
): OriginatedLedgerEntryDraft {
  const label = bill.billNumber !== '' ? `Bill payment ${bill.billNumber}` : 'Bill payment'
  return {
    date: billPayment.paymentDate,
    description: truncateDescription(label),
    category: bill.category,
    ...postAmount('debit', billPayment.amount),
    ...(billPayment.accountId !== undefined ? { accountId: billPayment.accountId } : {}),
    ...(bill.projectId !== undefined ? { projectId: bill.projectId } : {}),
    vendorId: bill.vendorId,
    ...(billPayment.recordedBy !== undefined ? { recordedBy: billPayment.recordedBy } : {}),
    remarks: billPayment.reference,
    origin: { kind: 'bill_payment', billPaymentId: billPayment.id },
  }
}

/**
 * Retainer received from a client → credit.
 */
export function clientAdvanceLedgerEntry(advance: ClientAdvance): OriginatedLedgerEntryDraft {
  return {
    date: advance.receivedDate,
    description: truncateDescription('Client advance received'),
    category: 'client_advance',
    ...postAmount('credit', advance.amount),
    ...(advance.accountId !== undefined ? { accountId: advance.accountId } : {}),
    ...(advance.projectId !== undefined ? { projectId: advance.projectId } : {}),
    clientId: advance.clientId,
    ...(advance.recordedBy !== undefined ? { recordedBy: advance.recordedBy } : {}),
    remarks: advance.reference,
    origin: { kind: 'client_advance', advanceId: advance.id },
  }
}

/**
 * Reimbursement of an approved expense claim → debit.
 */
export function expenseClaimPaymentLedgerEntry(
  claimPayment: ExpenseClaimPayment,
  claim: Pick<ExpenseClaim, 'employeeId' | 'projectId' | 'description'>,
): OriginatedLedgerEntryDraft {
  return {
    date: claimPayment.paymentDate,
    description: truncateDescription(`Expense reimbursement: ${claim.description}`),
    category: 'reimbursement',
    ...postAmount('debit', claimPayment.amount),
    ...(claimPayment.accountId !== undefined ? { accountId: claimPayment.accountId } : {}),
    ...(claim.projectId !== undefined ? { projectId: claim.projectId } : {}),
    personId: claim.employeeId,
    ...(claimPayment.recordedBy !== undefined ? { recordedBy: claimPayment.recordedBy } : {}),
    remarks: claimPayment.reference,
    origin: { kind: 'expense_claim_payment', claimPaymentId: claimPayment.id },
  }
}

/**
 * One period of a recurring rule, dated at the run date.
 */
export function recurringLedgerEntry(
  rule: RecurringRule,
  runDate: IsoDate,
  recordedBy?: UserId,
): OriginatedLedgerEntryDraft {
  return {
    date: runDate,
    description: truncateDescription(rule.description !== '' ? rule.description : rule.name),
    category: rule.category,
    ...postAmount(rule.direction, rule.amount),
    ...(rule.accountId !== undefined ? { accountId: rule.accountId } : {}),
    ...(rule.projectId !== undefined ? { projectId: rule.projectId } : {}),
    ...(rule.vendorId !== undefined ? { vendorId: rule.vendorId } : {}),
    ...(recordedBy !== undefined ? { recordedBy } : {}),
    remarks: `Recurring: ${rule.name}`,
    origin: { kind: 'recurring_rule', ruleId: rule.id, runDate },
  }
}

export interface SalaryPaymentInput {
  readonly date: IsoDate
  readonly personId: UserId
  readonly personName: string
  readonly amount: Amount
  readonly accountId?: AccountId
  readonly recordedBy?: UserId
  readonly remarks?: string
}

/**
 * Manual salary payout → debit. Salary rows have no origin; each call records
 * a new movement.
 */
export function salaryLedgerEntry(input: SalaryPaymentInput): LedgerEntryDraft {
  return {
    date: input.date,
    description: truncateDescription(`Salary: ${input.personName}`),
    category: 'salary',
    ...postAmount('debit', input.amount),
    ...(input.accountId !== undefined ? { accountId: input.accountId } : {}),
    personId: input.personId,
    ...(input.recordedBy !== undefined ? { recordedBy: input.recordedBy } : {}),
    remarks: input.remarks ?? '',
  }
}

// ---------------------------------------------------------------------------
// Validation and summaries
// ---------------------------------------------------------------------------

export function validateLedgerEntry(draft: LedgerEntryDraft): readonly string[] {
  const errors: string[] = []
  if (draft.debit.isNegative() || draft.credit.isNegative()) errors.push('Debit and credit cannot be negative.')
  if (!draft.debit.isZero() && !draft.credit.isZero()) errors.push('Enter either a debit or a credit, not both.')
  if (isZeroOrLess(draft.debit) && isZeroOrLess(draft.credit)) errors.push('Enter a debit or a credit amount.')
  if (draft.description.trim() === '') errors.push('Description is required.')
  return errors
}

/**
 * True when two drafts would produce the same stored row. Used to skip
 * no-op writes when re-syncing an unchanged event.
 */
export function sameLedgerContent(a: LedgerEntryDraft, b: LedgerEntryDraft): boolean {
  return (
    a.date === b.date &&
    a.description === b.description &&
    a.category === b.category &&
    a.debit.equals(b.debit) &&
    a.credit.equals(b.credit) &&
    a.accountId === b.accountId &&
    a.projectId === b.projectId &&
    a.clientId === b.clientId &&
    a.vendorId === b.vendorId &&
    a.personId === b.personId &&
    a.recordedBy === b.recordedBy &&
    a.remarks === b.remarks &&
    (a.origin === undefined ? b.origin === undefined : b.origin !== undefined && originKey(a.origin) === originKey(b.origin))
  )
}

export interface CashbookSummary {
  readonly totalDebit: Amount
  readonly totalCredit: Amount
  /** `totalCredit − totalDebit` */
  readonly net: Amount
}

export function summarizeCashbook(entries: readonly Pick<LedgerEntryDraft, 'debit' | 'credit'>[]): CashbookSummary {
  const totalDebit = sumAmounts(entries.map((e) => e.debit))
  const totalCredit = sumAmounts(entries.map((e) => e.credit))
  return { totalDebit, totalCredit, net: round2(totalCredit.minus(totalDebit)) }
}
