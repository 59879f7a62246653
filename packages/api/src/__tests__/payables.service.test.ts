import { describe, it, expect, beforeEach } from 'vitest'
import {
  amount,
  formatAmount,
  toBillId,
  toClientId,
  toIsoDate,
  toProjectId,
  toUserId,
  toVendorId,
} from '@studioledger/domain'
import { NotFoundError, PreconditionError, ValidationError } from '../lib/errors'
import type { ServiceContext } from '../services/context'
import { getClientAdvance, recordClientAdvance, updateClientAdvance } from '../services/advances'
import { allocateAdvance, createInvoice } from '../services/invoices'
import {
  createBill,
  createExpenseClaim,
  decideExpenseClaim,
  getBill,
  payExpenseClaim,
  recordBillPayment,
  updateBillPayment,
} from '../services/payables'
import { createMemoryStore, type MemoryStore } from './memory-store'

const ctx: ServiceContext = { today: toIsoDate('2024-03-10'), actorId: toUserId('user-9'), receiptPrefix: 'RCT' }
const vendorId = toVendorId('vendor-1')

let store: MemoryStore

beforeEach(() => {
  store = createMemoryStore()
})

// ---------------------------------------------------------------------------
// Bills
// ---------------------------------------------------------------------------

describe('createBill', () => {
  it('starts a bill unpaid under project expenses', async () => {
    const bill = await createBill(
      store,
      { vendorId, billNumber: 'B-17', amount: amount(1000), dueDate: toIsoDate('2024-03-31') },
      ctx,
    )
    expect(bill.status).toBe('unpaid')
    expect(bill.category).toBe('project_expense')
    expect(bill.billDate).toBe('2024-03-10')
    expect(bill.createdBy).toBe('user-9')
  })

  it('starts a bill already past its due date as overdue', async () => {
    const bill = await createBill(
      store,
      { vendorId, amount: amount(1000), billDate: toIsoDate('2024-02-01'), dueDate: toIsoDate('2024-03-01') },
      ctx,
    )
    expect(bill.status).toBe('overdue')
  })

  it('rejects a non-positive amount', async () => {
    await expect(createBill(store, { vendorId, amount: amount(0) }, ctx)).rejects.toMatchObject({
      messages: ['Amount must be greater than zero.'],
    })
  })
})

describe('recordBillPayment', () => {
  async function overdueBill() {
    return createBill(
      store,
      {
        vendorId,
        billNumber: 'B-17',
        amount: amount(1000),
        billDate: toIsoDate('2024-02-01'),
        dueDate: toIsoDate('2024-03-01'),
        category: 'office_expense',
      },
      ctx,
    )
  }

  it('reports a part-paid overdue bill as partial', async () => {
    const bill = await overdueBill()
    const result = await recordBillPayment(store, { billId: bill.id, amount: amount(400) }, ctx)

    expect(result.status).toBe('partial')
    expect((await getBill(store, bill.id)).status).toBe('partial')
  })

  it('posts the payment as a debit under the bill category', async () => {
    const bill = await overdueBill()
    const { ledgerEntry } = await recordBillPayment(
      store,
      { billId: bill.id, amount: amount(400), reference: 'CHQ-1' },
      ctx,
    )

    expect(formatAmount(ledgerEntry.debit)).toBe('400.00')
    expect(formatAmount(ledgerEntry.credit)).toBe('0.00')
    expect(ledgerEntry.category).toBe('office_expense')
    expect(ledgerEntry.vendorId).toBe('vendor-1')
    expect(ledgerEntry.description).toBe('Bill payment B-17')
    expect(ledgerEntry.remarks).toBe('CHQ-1')
    expect(ledgerEntry.origin).toEqual({ kind: 'bill_payment', billPaymentId: 'bill-payment-1' })
  })

  it('marks the bill paid once settled', async () => {
    const bill = await overdueBill()
    await recordBillPayment(store, { billId: bill.id, amount: amount(400) }, ctx)
    const result = await recordBillPayment(store, { billId: bill.id, amount: amount(600) }, ctx)

    expect(result.status).toBe('paid')
    expect(store.ledgerRows()).toHaveLength(2)
  })

  it('refuses more than the outstanding balance', async () => {
    const bill = await overdueBill()
    await recordBillPayment(store, { billId: bill.id, amount: amount(400) }, ctx)
    await expect(recordBillPayment(store, { billId: bill.id, amount: amount(601) }, ctx)).rejects.toMatchObject({
      messages: ['Cannot record more than the outstanding balance (600.00).'],
    })
  })

  it('raises NotFoundError for an unknown bill', async () => {
    await expect(
      recordBillPayment(store, { billId: toBillId('bill-404'), amount: amount(1) }, ctx),
    ).rejects.toBeInstanceOf(NotFoundError)
  })

  it('rewrites the same row when a payment is edited', async () => {
    const bill = await overdueBill()
    const { payment, ledgerEntry } = await recordBillPayment(store, { billId: bill.id, amount: amount(400) }, ctx)

    const result = await updateBillPayment(store, payment.id, { amount: amount(1000) }, ctx)

    expect(result.status).toBe('paid')
    expect(result.ledgerEntry.id).toBe(ledgerEntry.id)
    expect(store.ledgerRows()).toHaveLength(1)
    expect(formatAmount(result.ledgerEntry.debit)).toBe('1000.00')
  })
})

// ---------------------------------------------------------------------------
// Expense claims
// ---------------------------------------------------------------------------

describe('expense claims', () => {
  beforeEach(() => {
    store.seedStaff({ id: 'user-9', name: 'Asha Rao', monthlySalary: '50000' })
  })

  async function submittedClaim() {
    return createExpenseClaim(store, { amount: amount(250), description: 'Site visit taxi' }, ctx)
  }

  it('files a claim for the acting staff member', async () => {
    const claim = await submittedClaim()
    expect(claim.employeeId).toBe('user-9')
    expect(claim.status).toBe('submitted')
    expect(claim.expenseDate).toBe('2024-03-10')
  })

  it('needs an employee when nobody is acting', async () => {
    const attempt = createExpenseClaim(
      store,
      { amount: amount(250), description: 'Site visit taxi' },
      { today: ctx.today, receiptPrefix: 'RCT' },
    )
    await expect(attempt).rejects.toMatchObject({ messages: ['Select the employee who incurred the expense.'] })
  })

  it('rejects an unknown employee', async () => {
    const attempt = createExpenseClaim(
      store,
      { employeeId: toUserId('user-404'), amount: amount(250), description: 'Site visit taxi' },
      ctx,
    )
    await expect(attempt).rejects.toThrow('Employee not found')
  })

  it('records who approved the claim and when', async () => {
    const claim = await submittedClaim()
    const approved = await decideExpenseClaim(store, claim.id, 'approve', ctx)

    expect(approved.status).toBe('approved')
    expect(approved.approvedBy).toBe('user-9')
    expect(approved.approvedAt).toBe('2024-03-10')
  })

  it('decides a claim only once', async () => {
    const claim = await submittedClaim()
    await decideExpenseClaim(store, claim.id, 'reject', ctx)

    const attempt = decideExpenseClaim(store, claim.id, 'approve', ctx)
    await expect(attempt).rejects.toBeInstanceOf(PreconditionError)
    await expect(attempt).rejects.toThrow('Claim is already rejected.')
  })

  it('pays only approved claims', async () => {
    const claim = await submittedClaim()
    await expect(payExpenseClaim(store, claim.id, {}, ctx)).rejects.toThrow('Only approved claims can be paid.')
  })

  it('reimburses an approved claim in full and marks it paid', async () => {
    const claim = await submittedClaim()
    await decideExpenseClaim(store, claim.id, 'approve', ctx)

    const { claim: paid, ledgerEntry } = await payExpenseClaim(store, claim.id, { reference: 'NEFT-3' }, ctx)

    expect(paid.status).toBe('paid')
    expect(formatAmount(paid.payment?.amount ?? amount(0))).toBe('250.00')
    expect(ledgerEntry.category).toBe('reimbursement')
    expect(ledgerEntry.personId).toBe('user-9')
    expect(ledgerEntry.description).toBe('Expense reimbursement: Site visit taxi')
    expect(formatAmount(ledgerEntry.debit)).toBe('250.00')
  })

  it('never pays a claim twice', async () => {
    const claim = await submittedClaim()
    await decideExpenseClaim(store, claim.id, 'approve', ctx)
    await payExpenseClaim(store, claim.id, {}, ctx)

    await expect(payExpenseClaim(store, claim.id, {}, ctx)).rejects.toThrow('Claim has already been paid.')
    expect(store.ledgerRows()).toHaveLength(1)
  })
})

// ---------------------------------------------------------------------------
// Client advances
// ---------------------------------------------------------------------------

describe('client advances', () => {
  beforeEach(() => {
    store.seedProject({ id: 'project-1', code: 'NVRT', clientId: 'client-1' })
  })

  it('posts a received advance as a credit against the client', async () => {
    const { advance, ledgerEntry } = await recordClientAdvance(
      store,
      { clientId: toClientId('client-1'), projectId: toProjectId('project-1'), amount: amount(5000) },
      ctx,
    )

    expect(advance.receivedDate).toBe('2024-03-10')
    expect(ledgerEntry.category).toBe('client_advance')
    expect(ledgerEntry.clientId).toBe('client-1')
    expect(ledgerEntry.projectId).toBe('project-1')
    expect(formatAmount(ledgerEntry.credit)).toBe('5000.00')
  })

  it('refuses a project that belongs to another client', async () => {
    const attempt = recordClientAdvance(
      store,
      { clientId: toClientId('client-2'), projectId: toProjectId('project-1'), amount: amount(5000) },
      ctx,
    )
    await expect(attempt).rejects.toBeInstanceOf(ValidationError)
    await expect(attempt).rejects.toMatchObject({ messages: ['The project belongs to a different client.'] })
  })

  it('refuses a zero amount', async () => {
    await expect(
      recordClientAdvance(store, { clientId: toClientId('client-1'), amount: amount(0) }, ctx),
    ).rejects.toMatchObject({ messages: ['Amount must be greater than zero.'] })
  })

  it('rewrites its cashbook row when edited', async () => {
    const { advance, ledgerEntry } = await recordClientAdvance(
      store,
      { clientId: toClientId('client-1'), amount: amount(5000) },
      ctx,
    )

    const updated = await updateClientAdvance(store, advance.id, { amount: amount(4500), reference: 'RTGS-9' })

    expect(updated.ledgerEntry.id).toBe(ledgerEntry.id)
    expect(formatAmount(updated.ledgerEntry.credit)).toBe('4500.00')
    expect(updated.ledgerEntry.remarks).toBe('RTGS-9')
    expect(store.ledgerRows()).toHaveLength(1)
    expect(formatAmount((await getClientAdvance(store, advance.id)).amount)).toBe('4500.00')
  })

  it('refuses to cut the amount below what is already allocated', async () => {
    const { advance } = await recordClientAdvance(store, { clientId: toClientId('client-1'), amount: amount(500) }, ctx)
    const invoice = await createInvoice(
      store,
      { projectId: toProjectId('project-1'), dueDate: toIsoDate('2024-03-31'), amount: amount(1000) },
      ctx,
    )
    await allocateAdvance(store, { invoiceId: invoice.id, advanceId: advance.id, amount: amount(400) }, ctx)

    const attempt = updateClientAdvance(store, advance.id, { amount: amount(100) })

    await expect(attempt).rejects.toBeInstanceOf(ValidationError)
    await expect(attempt).rejects.toMatchObject({
      messages: ['Amount cannot be less than the 400.00 already allocated.'],
    })
    expect(formatAmount((await getClientAdvance(store, advance.id)).amount)).toBe('500.00')
    await expect(updateClientAdvance(store, advance.id, { amount: amount(400) })).resolves.toMatchObject({
      advance: { id: advance.id },
    })
  })

  it('refuses to move the advance to a project of another client', async () => {
    store.seedProject({ id: 'project-2', code: 'HLTN', clientId: 'client-2' })
    const { advance } = await recordClientAdvance(
      store,
      { clientId: toClientId('client-1'), projectId: toProjectId('project-1'), amount: amount(500) },
      ctx,
    )

    const attempt = updateClientAdvance(store, advance.id, { projectId: toProjectId('project-2') })

    await expect(attempt).rejects.toMatchObject({ messages: ['The project belongs to a different client.'] })
    expect((await getClientAdvance(store, advance.id)).projectId).toBe('project-1')
  })
})
