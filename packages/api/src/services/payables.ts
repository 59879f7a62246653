import type {
  AccountId,
  Amount,
  Bill,
  BillCategory,
  BillId,
  BillPayment,
  BillPaymentId,
  BillStatus,
  ExpenseClaim,
  ExpenseClaimId,
  IsoDate,
  LedgerEntry,
  ProjectId,
  UserId,
  VendorId,
} from '@studioledger/domain'
import {
  canDecideClaim,
  canPayClaim,
  computeBillStatus,
  validateBill,
  validateBillPaymentAmount,
  validateExpenseClaim,
} from '@studioledger/domain'
import { NotFoundError, PreconditionError, ValidationError } from '../lib/errors'
import type { FinanceStore } from '../store'
import type { ServiceContext } from './context'
import { syncBillPaymentLedger, syncExpenseClaimPaymentLedger } from './ledger-sync'

function assertValid(errors: readonly string[]): void {
  if (errors.length > 0) throw new ValidationError(errors)
}

async function loadBill(store: FinanceStore, id: BillId): Promise<Bill> {
  const bill = await store.bills.findById(id)
  if (!bill) throw new NotFoundError('Bill')
  return bill
}

// ---------------------------------------------------------------------------
// Vendor bills
// ---------------------------------------------------------------------------

export type CreateBillInput = {
  vendorId: VendorId
  projectId?: ProjectId
  billNumber?: string
  /** Defaults to the business date. */
  billDate?: IsoDate
  dueDate?: IsoDate
  amount: Amount
  category?: BillCategory
  description?: string
}

export async function createBill(store: FinanceStore, input: CreateBillInput, ctx: ServiceContext): Promise<Bill> {
  const billDate = input.billDate ?? ctx.today
  assertValid(
    validateBill({
      billDate,
      amount: input.amount,
      ...(input.dueDate !== undefined ? { dueDate: input.dueDate } : {}),
    }),
  )
  const category: BillCategory = input.category ?? 'project_expense'
  const fields = {
    vendorId: input.vendorId,
    billNumber: input.billNumber ?? '',
    billDate,
    amount: input.amount,
    category,
    description: input.description ?? '',
    ...(input.projectId !== undefined ? { projectId: input.projectId } : {}),
    ...(input.dueDate !== undefined ? { dueDate: input.dueDate } : {}),
    ...(ctx.actorId !== undefined ? { createdBy: ctx.actorId } : {}),
  }
  // A new bill has nothing paid, so only its due date can move it off `unpaid`.
  const status = computeBillStatus(
    {
      amount: input.amount,
      outstanding: input.amount,
      ...(input.dueDate !== undefined ? { dueDate: input.dueDate } : {}),
    },
    ctx.today,
  )
  return store.bills.create({ ...fields, status })
}

export async function getBill(store: FinanceStore, id: BillId): Promise<Bill> {
  return loadBill(store, id)
}

export type RecordBillPaymentInput = {
  billId: BillId
  amount: Amount
  paymentDate?: IsoDate
  accountId?: AccountId
  method?: string
  reference?: string
  notes?: string
}

export interface BillPaymentResult {
  readonly payment: BillPayment
  readonly bill: Bill
  readonly status: BillStatus
  readonly ledgerEntry: LedgerEntry
}

async function settleBill(tx: FinanceStore, payment: BillPayment, today: IsoDate): Promise<BillPaymentResult> {
  const synced = await syncBillPaymentLedger(tx, payment, today)
  if (!synced) throw new NotFoundError('Bill')
  return { payment, bill: await loadBill(tx, payment.billId), status: synced.billStatus, ledgerEntry: synced.entry }
}

export async function recordBillPayment(
  store: FinanceStore,
  input: RecordBillPaymentInput,
  ctx: ServiceContext,
): Promise<BillPaymentResult> {
  return store.transaction(async (tx) => {
    const bill = await loadBill(tx, input.billId)
    assertValid(validateBillPaymentAmount(bill, input.amount))
    const payment = await tx.billPayments.create({
      billId: bill.id,
      paymentDate: input.paymentDate ?? ctx.today,
      amount: input.amount,
      method: input.method ?? '',
      reference: input.reference ?? '',
      notes: input.notes ?? '',
      ...(input.accountId !== undefined ? { accountId: input.accountId } : {}),
      ...(ctx.actorId !== undefined ? { recordedBy: ctx.actorId } : {}),
    })
    return settleBill(tx, payment, ctx.today)
  })
}

export type UpdateBillPaymentInput = Partial<Omit<RecordBillPaymentInput, 'billId'>>

export async function updateBillPayment(
  store: FinanceStore,
  id: BillPaymentId,
  changes: UpdateBillPaymentInput,
  ctx: ServiceContext,
): Promise<BillPaymentResult> {
  return store.transaction(async (tx) => {
    const current = await tx.billPayments.findById(id)
    if (!current) throw new NotFoundError('Bill payment')
    if (changes.amount !== undefined) {
      const bill = await loadBill(tx, current.billId)
      const others = { ...bill, payments: bill.payments.filter((p) => p.id !== id) }
      assertValid(validateBillPaymentAmount(others, changes.amount))
    }
    const updated = await tx.billPayments.update({ ...current, ...changes })
    return settleBill(tx, updated, ctx.today)
  })
}

// ---------------------------------------------------------------------------
// Expense claims
// ---------------------------------------------------------------------------

export type CreateExpenseClaimInput = {
  /** Defaults to the acting user. */
  employeeId?: UserId
  projectId?: ProjectId
  expenseDate?: IsoDate
  amount: Amount
  category?: string
  description: string
}

export async function createExpenseClaim(
  store: FinanceStore,
  input: CreateExpenseClaimInput,
  ctx: ServiceContext,
): Promise<ExpenseClaim> {
  assertValid(validateExpenseClaim(input))
  const employeeId = input.employeeId ?? ctx.actorId
  if (employeeId === undefined) throw new ValidationError(['Select the employee who incurred the expense.'])
  if (!(await store.directory.findStaff(employeeId))) throw new NotFoundError('Employee')
  return store.claims.create({
    employeeId,
    expenseDate: input.expenseDate ?? ctx.today,
    amount: input.amount,
    category: input.category ?? '',
    description: input.description,
    ...(input.projectId !== undefined ? { projectId: input.projectId } : {}),
  })
}

export type ClaimDecision = 'approve' | 'reject'

export async function decideExpenseClaim(
  store: FinanceStore,
  id: ExpenseClaimId,
  decision: ClaimDecision,
  ctx: ServiceContext,
): Promise<ExpenseClaim> {
  return store.transaction(async (tx) => {
    const claim = await tx.claims.findById(id)
    if (!claim) throw new NotFoundError('Expense claim')
    if (!canDecideClaim(claim)) throw new PreconditionError(`Claim is already ${claim.status}.`)
    return tx.claims.update({
      ...claim,
      status: decision === 'approve' ? 'approved' : 'rejected',
      approvedAt: ctx.today,
      ...(ctx.actorId !== undefined ? { approvedBy: ctx.actorId } : {}),
    })
  })
}

export type PayExpenseClaimInput = {
  paymentDate?: IsoDate
  accountId?: AccountId
  method?: string
  reference?: string
  notes?: string
}

export interface ClaimPaymentResult {
  readonly claim: ExpenseClaim
  readonly ledgerEntry: LedgerEntry
}

/** Reimburses an approved claim in full. */
export async function payExpenseClaim(
  store: FinanceStore,
  id: ExpenseClaimId,
  input: PayExpenseClaimInput,
  ctx: ServiceContext,
): Promise<ClaimPaymentResult> {
  return store.transaction(async (tx) => {
    const claim = await tx.claims.findById(id)
    if (!claim) throw new NotFoundError('Expense claim')
    if (!canPayClaim(claim)) {
      throw new PreconditionError(
        claim.payment ? 'Claim has already been paid.' : 'Only approved claims can be paid.',
      )
    }
    const payment = await tx.claims.createPayment({
      claimId: claim.id,
      paymentDate: input.paymentDate ?? ctx.today,
      amount: claim.amount,
      method: input.method ?? '',
      reference: input.reference ?? '',
      notes: input.notes ?? '',
      ...(input.accountId !== undefined ? { accountId: input.accountId } : {}),
      ...(ctx.actorId !== undefined ? { recordedBy: ctx.actorId } : {}),
    })
    const ledgerEntry = await syncExpenseClaimPaymentLedger(tx, payment)
    if (!ledgerEntry) throw new NotFoundError('Expense claim')
    const paid = await tx.claims.findById(id)
    if (!paid) throw new NotFoundError('Expense claim')
    return { claim: paid, ledgerEntry }
  })
}
