// ---------------------------------------------------------------------------
// Persistence port
//
// Services depend on FinanceStore only. The PostgreSQL implementation lives in
// repositories/; tests use an in-memory implementation of the same interface.
// ---------------------------------------------------------------------------

import type {
  AccountId,
  Amount,
  Bill,
  BillId,
  BillPayment,
  BillPaymentId,
  BillStatus,
  ClientAdvance,
  ClientAdvanceAllocation,
  ClientAdvanceId,
  ClientId,
  ExpenseClaim,
  ExpenseClaimId,
  ExpenseClaimPayment,
  Invoice,
  InvoiceId,
  InvoiceLine,
  InvoiceStatus,
  IsoDate,
  LeadId,
  LedgerCategory,
  LedgerEntry,
  LedgerEntryDraft,
  LedgerEntryId,
  LedgerOrigin,
  Payment,
  PaymentId,
  ProjectId,
  Receipt,
  RecurringRule,
  RecurringRuleId,
  StaffMember,
  UserId,
} from '@studioledger/domain'

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export type NewInvoiceLine = Pick<InvoiceLine, 'description' | 'quantity' | 'unitPrice'>

export type NewInvoice = {
  invoiceNumber: string
  projectId?: ProjectId
  leadId?: LeadId
  invoiceDate: IsoDate
  dueDate: IsoDate
  amount: Amount
  taxPercent: Amount
  discountPercent: Amount
  status: InvoiceStatus
  description: string
  lines: readonly NewInvoiceLine[]
}

export type NewPayment = Omit<Payment, 'id'>
export type NewReceipt = Omit<Receipt, 'id'>
export type NewClientAdvance = Omit<ClientAdvance, 'id' | 'allocations'>
export type NewAllocation = Omit<ClientAdvanceAllocation, 'id'>

export type NewBill = Omit<Bill, 'id' | 'payments' | 'status'> & { status: BillStatus }
export type NewBillPayment = Omit<BillPayment, 'id'>

export type NewExpenseClaim = Omit<ExpenseClaim, 'id' | 'payment' | 'approvedBy' | 'approvedAt' | 'status'>
export type NewExpenseClaimPayment = Omit<ExpenseClaimPayment, 'id'>

export type NewRecurringRule = Omit<RecurringRule, 'id'>

export type LedgerFilter = {
  from?: IsoDate
  /** Exclusive upper bound. */
  to?: IsoDate
  category?: LedgerCategory
  accountId?: AccountId
  limit?: number
  offset?: number
}

export type ListOptions = { limit: number; offset: number }

// ---------------------------------------------------------------------------
// Read models for records owned outside the finance core
// ---------------------------------------------------------------------------

export interface ProjectRef {
  readonly id: ProjectId
  readonly code: string
  readonly clientId: ClientId
}

export interface LeadRef {
  readonly id: LeadId
  readonly clientId?: ClientId
}

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

export interface InvoiceRepository {
  create(input: NewInvoice): Promise<Invoice>
  /** Loads the invoice with its lines, payments and allocations. */
  findById(id: InvoiceId): Promise<Invoice | null>
  list(opts: ListOptions & { status?: InvoiceStatus }): Promise<Invoice[]>
  /** Every invoice whose stored status is not `paid`. */
  listUnpaid(): Promise<Invoice[]>
  updateStatus(id: InvoiceId, status: InvoiceStatus): Promise<void>
  /** Deletes the invoice and its lines. */
  delete(id: InvoiceId): Promise<void>
  /** Highest numeric suffix issued under `prefix`, or 0. */
  maxSequenceWithPrefix(prefix: string): Promise<number>
}

export interface PaymentRepository {
  create(input: NewPayment): Promise<Payment>
  findById(id: PaymentId): Promise<Payment | null>
  /** Writes every mutable field of the payment. */
  update(payment: Payment): Promise<Payment>
}

export interface ReceiptRepository {
  create(input: NewReceipt): Promise<Receipt>
  findByPaymentId(paymentId: PaymentId): Promise<Receipt | null>
  /** Writes the fields copied from the payment: amount, method and reference. */
  update(receipt: Receipt): Promise<Receipt>
  /** Highest numeric suffix issued under `prefix`, or 0. */
  maxSequenceWithPrefix(prefix: string): Promise<number>
}

export interface AdvanceRepository {
  create(input: NewClientAdvance): Promise<ClientAdvance>
  /** Loads the advance with its allocations. */
  findById(id: ClientAdvanceId): Promise<ClientAdvance | null>
  update(advance: ClientAdvance): Promise<ClientAdvance>
  createAllocation(input: NewAllocation): Promise<ClientAdvanceAllocation>
}

export interface BillRepository {
  create(input: NewBill): Promise<Bill>
  /** Loads the bill with its payments. */
  findById(id: BillId): Promise<Bill | null>
  listUnpaid(): Promise<Bill[]>
  updateStatus(id: BillId, status: BillStatus): Promise<void>
}

export interface BillPaymentRepository {
  create(input: NewBillPayment): Promise<BillPayment>
  findById(id: BillPaymentId): Promise<BillPayment | null>
  update(payment: BillPayment): Promise<BillPayment>
}

export interface ExpenseClaimRepository {
  create(input: NewExpenseClaim): Promise<ExpenseClaim>
  /** Loads the claim with its payment, if any. */
  findById(id: ExpenseClaimId): Promise<ExpenseClaim | null>
  /** Writes status and approval fields. */
  update(claim: ExpenseClaim): Promise<ExpenseClaim>
  createPayment(input: NewExpenseClaimPayment): Promise<ExpenseClaimPayment>
}

export interface LedgerRepository {
  findById(id: LedgerEntryId): Promise<LedgerEntry | null>
  findByOrigin(origin: LedgerOrigin): Promise<LedgerEntry | null>
  insert(draft: LedgerEntryDraft): Promise<LedgerEntry>
  update(id: LedgerEntryId, draft: LedgerEntryDraft): Promise<LedgerEntry>
  list(filter: LedgerFilter): Promise<LedgerEntry[]>
}

export interface RecurringRuleRepository {
  create(input: NewRecurringRule): Promise<RecurringRule>
  findById(id: RecurringRuleId): Promise<RecurringRule | null>
  /** Active rules whose cursor is on or before `today`. */
  listDue(today: IsoDate): Promise<RecurringRule[]>
  updateNextRunDate(id: RecurringRuleId, nextRunDate: IsoDate): Promise<void>
}

export interface DirectoryRepository {
  findProject(id: ProjectId): Promise<ProjectRef | null>
  findLead(id: LeadId): Promise<LeadRef | null>
  findStaff(id: UserId): Promise<StaffMember | null>
  listStaff(): Promise<StaffMember[]>
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface FinanceStore {
  readonly invoices: InvoiceRepository
  readonly payments: PaymentRepository
  readonly receipts: ReceiptRepository
  readonly advances: AdvanceRepository
  readonly bills: BillRepository
  readonly billPayments: BillPaymentRepository
  readonly claims: ExpenseClaimRepository
  readonly ledger: LedgerRepository
  readonly recurringRules: RecurringRuleRepository
  readonly directory: DirectoryRepository
  /**
   * Runs `fn` atomically. Any error thrown inside rolls back every write made
   * through the store passed to `fn`. Nested calls join the outer transaction.
   */
  transaction<T>(fn: (tx: FinanceStore) => Promise<T>): Promise<T>
}
