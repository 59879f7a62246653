// ---------------------------------------------------------------------------
// Payables bounded context
// Vendor bills and their payments, plus staff expense claims that are
// reimbursed once approved.
// ---------------------------------------------------------------------------

import type { AccountId, Amount, Brand, IsoDate, ProjectId, UserId, VendorId } from '../shared/types'
import { compareDates, isZeroOrLess, nonNegative, sumAmounts } from '../shared/types'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

export type BillId = Brand<string, 'BillId'>
export type BillPaymentId = Brand<string, 'BillPaymentId'>
export type ExpenseClaimId = Brand<string, 'ExpenseClaimId'>
export type ExpenseClaimPaymentId = Brand<string, 'ExpenseClaimPaymentId'>

export const toBillId = (raw: string): BillId => raw as BillId
export const toBillPaymentId = (raw: string): BillPaymentId => raw as BillPaymentId
export const toExpenseClaimId = (raw: string): ExpenseClaimId => raw as ExpenseClaimId
export const toExpenseClaimPaymentId = (raw: string): ExpenseClaimPaymentId => raw as ExpenseClaimPaymentId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

export type BillStatus = 'unpaid' | 'partial' | 'paid' | 'overdue'

export const BILL_STATUSES: readonly BillStatus[] = ['unpaid', 'partial', 'paid', 'overdue'] as const

/** Bills are booked against a project or as general office overhead. */
export type BillCategory = 'project_expense' | 'office_expense' | 'misc'

export const BILL_CATEGORIES: readonly BillCategory[] = ['project_expense', 'office_expense', 'misc'] as const

export type ExpenseClaimStatus = 'submitted' | 'approved' | 'rejected' | 'paid'

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * @invariant `amount` must be > 0.
 */
export interface BillPayment {
  readonly id: BillPaymentId
  readonly billId: BillId
  readonly paymentDate: IsoDate
  readonly amount: Amount
  readonly accountId?: AccountId
  readonly method: string
  readonly reference: string
  readonly notes: string
  readonly recordedBy?: UserId
}

/**
 * A vendor invoice. Flat amount only; settled by BillPayments.
 */
export interface Bill {
  readonly id: BillId
  readonly vendorId: VendorId
  readonly projectId?: ProjectId
  readonly billNumber: string
  readonly billDate: IsoDate
  /** A bill without a due date never becomes overdue. */
  readonly dueDate?: IsoDate
  readonly amount: Amount
  readonly status: BillStatus
  readonly category: BillCategory
  readonly description: string
  readonly createdBy?: UserId
  readonly payments: readonly BillPayment[]
}

export interface ExpenseClaimPayment {
  readonly id: ExpenseClaimPaymentId
  readonly claimId: ExpenseClaimId
  readonly paymentDate: IsoDate
  readonly amount: Amount
  readonly accountId?: AccountId
  readonly method: string
  readonly reference: string
  readonly notes: string
  readonly recordedBy?: UserId
}

/**
 * Money a staff member spent on behalf of the firm.
 *
 * @invariant A claim is paid at most once, and only after approval.
 */
export interface ExpenseClaim {
  readonly id: ExpenseClaimId
  readonly employeeId: UserId
  readonly projectId?: ProjectId
  readonly expenseDate: IsoDate
  readonly amount: Amount
  readonly category: string
  readonly description: string
  readonly status: ExpenseClaimStatus
  readonly approvedBy?: UserId
  readonly approvedAt?: IsoDate
  readonly payment?: ExpenseClaimPayment
}

// ---------------------------------------------------------------------------
// Valuation
// ---------------------------------------------------------------------------

export function calculateAmountPaid(bill: Pick<Bill, 'payments'>): Amount {
  return sumAmounts(bill.payments.map((p) => p.amount))
}

export function calculateBillOutstanding(bill: Pick<Bill, 'amount' | 'payments'>): Amount {
  return nonNegative(bill.amount.minus(calculateAmountPaid(bill)))
}

// ---------------------------------------------------------------------------
// Status machine
// ---------------------------------------------------------------------------

export interface BillBalances {
  readonly amount: Amount
  readonly outstanding: Amount
  readonly dueDate?: IsoDate
}

/**
 * Derives the bill status, evaluated in order: settled → `paid`; partly
 * settled → `partial`; past due → `overdue`; otherwise `unpaid`.
 *
 * `partial` wins over `overdue`: a part-paid bill past its due date is
 * reported `partial`.
 */
export function computeBillStatus(balances: BillBalances, today: IsoDate): BillStatus {
  if (isZeroOrLess(balances.outstanding)) return 'paid'
  if (balances.outstanding.lessThan(balances.amount)) return 'partial'
  if (balances.dueDate !== undefined && compareDates(balances.dueDate, today) < 0) return 'overdue'
  return 'unpaid'
}

export function billStatusFor(bill: Bill, today: IsoDate): BillStatus {
  return computeBillStatus(
    {
      amount: bill.amount,
      outstanding: calculateBillOutstanding(bill),
      ...(bill.dueDate !== undefined ? { dueDate: bill.dueDate } : {}),
    },
    today,
  )
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface BillDraft {
  readonly billDate: IsoDate
  readonly dueDate?: IsoDate
  readonly amount: Amount
}

export function validateBill(draft: BillDraft): readonly string[] {
  const errors: string[] = []
  if (isZeroOrLess(draft.amount)) errors.push('Amount must be greater than zero.')
  if (draft.dueDate !== undefined && compareDates(draft.dueDate, draft.billDate) < 0) {
    errors.push('Due date cannot be earlier than the bill date.')
  }
  return errors
}

export function validateBillPaymentAmount(bill: Bill, paymentAmount: Amount): readonly string[] {
  if (isZeroOrLess(paymentAmount)) return ['Amount must be greater than zero.']
  const outstanding = calculateBillOutstanding(bill)
  if (isZeroOrLess(outstanding)) return ['This bill is already settled.']
  if (paymentAmount.greaterThan(outstanding)) {
    return [`Cannot record more than the outstanding balance (${outstanding.toFixed(2)}).`]
  }
  return []
}

export function validateExpenseClaim(draft: Pick<ExpenseClaim, 'amount' | 'description'>): readonly string[] {
  const errors: string[] = []
  if (isZeroOrLess(draft.amount)) errors.push('Amount must be greater than zero.')
  if (draft.description.trim() === '') errors.push('Description is required.')
  return errors
}

/** Only a submitted claim can be approved or rejected. */
export function canDecideClaim(claim: Pick<ExpenseClaim, 'status'>): boolean {
  return claim.status === 'submitted'
}

/**
 * @rule A claim is reimbursable only once approved and not yet paid.
 */
export function canPayClaim(claim: Pick<ExpenseClaim, 'status' | 'payment'>): boolean {
  return claim.status === 'approved' && claim.payment === undefined
}
