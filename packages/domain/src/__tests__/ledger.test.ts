import { describe, it, expect } from 'vitest'
import {
  amount,
  ZERO,
  toIsoDate,
  toAccountId,
  toClientId,
  toProjectId,
  toUserId,
  toVendorId,
  toPaymentId,
  toInvoiceId,
  toClientAdvanceId,
  toBillId,
  toBillPaymentId,
  toExpenseClaimPaymentId,
  toExpenseClaimId,
  toRecurringRuleId,
  originKey,
  paymentLedgerEntry,
  billPaymentLedgerEntry,
  clientAdvanceLedgerEntry,
  expenseClaimPaymentLedgerEntry,
  recurringLedgerEntry,
  salaryLedgerEntry,
  validateLedgerEntry,
  sameLedgerContent,
  summarizeCashbook,
  type Payment,
  type RecurringRule,
} from '../index'

const payment: Payment = {
  id: toPaymentId('42'),
  invoiceId: toInvoiceId('inv-1'),
  paymentDate: toIsoDate('2024-01-20'),
  amount: amount(1100),
  accountId: toAccountId('acc-bank'),
  method: 'bank_transfer',
  reference: 'UTR-9',
  notes: '',
  recordedBy: toUserId('u-fin'),
}

const rule: RecurringRule = {
  id: toRecurringRuleId('7'),
  name: 'Studio rent',
  isActive: true,
  direction: 'debit',
  category: 'office_expense',
  description: '',
  amount: amount(25000),
  vendorId: toVendorId('v-landlord'),
  dayOfMonth: 31,
  nextRunDate: toIsoDate('2024-01-31'),
  notes: '',
}

describe('originKey', () => {
  it('keys an event-backed origin by its id', () => {
    expect(originKey({ kind: 'payment', paymentId: toPaymentId('42') })).toBe('payment:42')
  })

  it('keys a recurring origin by rule and run date', () => {
    expect(originKey({ kind: 'recurring_rule', ruleId: toRecurringRuleId('7'), runDate: toIsoDate('2024-02-28') })).toBe(
      'recurring_rule:7:2024-02-28',
    )
  })
})

describe('paymentLedgerEntry', () => {
  it('posts a client payment as a credit mirroring the payment', () => {
    const entry = paymentLedgerEntry(payment, {
      invoiceNumber: 'INV-001',
      projectId: toProjectId('p-1'),
      clientId: toClientId('c-1'),
    })
    expect(entry.credit.toFixed(2)).toBe('1100.00')
    expect(entry.debit.toFixed(2)).toBe('0.00')
    expect(entry.date).toBe('2024-01-20')
    expect(entry.category).toBe('client_payment')
    expect(entry.description).toBe('Payment received for invoice INV-001')
    expect(entry.accountId).toBe('acc-bank')
    expect(entry.clientId).toBe('c-1')
    expect(entry.remarks).toBe('UTR-9')
    expect(entry.origin).toEqual({ kind: 'payment', paymentId: '42' })
  })
})

describe('billPaymentLedgerEntry', () => {
  it('posts a debit under the bill category with the vendor attached', () => {
    const entry = billPaymentLedgerEntry(
      {
        id: toBillPaymentId('bp-1'),
        billId: toBillId('bill-1'),
        paymentDate: toIsoDate('2024-03-10'),
        amount: amount(400),
        method: 'upi',
        reference: '',
        notes: '',
      },
      { billNumber: 'B-100', vendorId: toVendorId('v-1'), category: 'office_expense' },
    )
    expect(entry.debit.toFixed(2)).toBe('400.00')
    expect(entry.credit.toFixed(2)).toBe('0.00')
    expect(entry.category).toBe('office_expense')
    expect(entry.vendorId).toBe('v-1')
    expect(entry.description).toBe('Bill payment B-100')
  })
})

describe('clientAdvanceLedgerEntry', () => {
  it('posts an advance as a credit against the client', () => {
    const entry = clientAdvanceLedgerEntry({
      id: toClientAdvanceId('adv-1'),
      clientId: toClientId('c-1'),
      receivedDate: toIsoDate('2024-01-05'),
      amount: amount(500),
      method: 'cash',
      reference: 'RET-1',
      notes: '',
      allocations: [],
    })
    expect(entry.credit.toFixed(2)).toBe('500.00')
    expect(entry.category).toBe('client_advance')
    expect(entry.clientId).toBe('c-1')
    expect(entry.projectId).toBeUndefined()
  })
})

describe('expenseClaimPaymentLedgerEntry', () => {
  it('posts a reimbursement debit against the employee', () => {
    const entry = expenseClaimPaymentLedgerEntry(
      {
        id: toExpenseClaimPaymentId('cp-1'),
        claimId: toExpenseClaimId('claim-1'),
        paymentDate: toIsoDate('2024-03-05'),
        amount: amount(250),
        method: 'cash',
        reference: '',
        notes: '',
      },
      { employeeId: toUserId('u-1'), description: 'Site travel' },
    )
    expect(entry.debit.toFixed(2)).toBe('250.00')
    expect(entry.category).toBe('reimbursement')
    expect(entry.personId).toBe('u-1')
    expect(entry.description).toBe('Expense reimbursement: Site travel')
  })
})

describe('recurringLedgerEntry', () => {
  it('falls back to the rule name when the description is blank', () => {
    const entry = recurringLedgerEntry(rule, toIsoDate('2024-02-28'))
    expect(entry.description).toBe('Studio rent')
    expect(entry.remarks).toBe('Recurring: Studio rent')
    expect(entry.debit.toFixed(2)).toBe('25000.00')
    expect(entry.date).toBe('2024-02-28')
  })

  it('posts a credit rule as a credit', () => {
    const entry = recurringLedgerEntry({ ...rule, direction: 'credit', description: 'Retainer' }, rule.nextRunDate)
    expect(entry.credit.toFixed(2)).toBe('25000.00')
    expect(entry.debit.toFixed(2)).toBe('0.00')
    expect(entry.description).toBe('Retainer')
  })
})

describe('salaryLedgerEntry', () => {
  it('posts salary as a debit without an origin', () => {
    const entry = salaryLedgerEntry({
      date: toIsoDate('2024-03-31'),
      personId: toUserId('u-2'),
      personName: 'Asha',
      amount: amount(40000),
    })
    expect(entry.category).toBe('salary')
    expect(entry.debit.toFixed(2)).toBe('40000.00')
    expect(entry.description).toBe('Salary: Asha')
    expect(entry.origin).toBeUndefined()
  })
})

describe('validateLedgerEntry', () => {
  const base = recurringLedgerEntry(rule, rule.nextRunDate)

  it('accepts a derived entry', () => {
    expect(validateLedgerEntry(base)).toEqual([])
  })

  it('rejects an entry with both debit and credit', () => {
    expect(validateLedgerEntry({ ...base, credit: amount(1) })).toEqual(['Enter either a debit or a credit, not both.'])
  })

  it('rejects an entry with neither', () => {
    expect(validateLedgerEntry({ ...base, debit: ZERO })).toEqual(['Enter a debit or a credit amount.'])
  })
})

describe('sameLedgerContent', () => {
  const invoice = { invoiceNumber: 'INV-001', clientId: toClientId('c-1') }

  it('treats two derivations of the same payment as identical', () => {
    expect(sameLedgerContent(paymentLedgerEntry(payment, invoice), paymentLedgerEntry(payment, invoice))).toBe(true)
  })

  it('detects a changed amount', () => {
    const edited = { ...payment, amount: amount(1000) }
    expect(sameLedgerContent(paymentLedgerEntry(payment, invoice), paymentLedgerEntry(edited, invoice))).toBe(false)
  })
})

describe('summarizeCashbook', () => {
  it('nets credits against debits', () => {
    const summary = summarizeCashbook([
      { debit: amount(0), credit: amount(1100) },
      { debit: amount('250.25'), credit: amount(0) },
      { debit: amount(400), credit: amount(0) },
    ])
    expect(summary.totalCredit.toFixed(2)).toBe('1100.00')
    expect(summary.totalDebit.toFixed(2)).toBe('650.25')
    expect(summary.net.toFixed(2)).toBe('449.75')
  })
})
