import type { AccountId, Amount, IsoDate, LedgerEntry, MonthKey, PayrollSummary, UserId } from '@studioledger/domain'
import { monthRange, salaryLedgerEntry, summarizePayroll, validateLedgerEntry } from '@studioledger/domain'
import { NotFoundError, ValidationError } from '../lib/errors'
import type { FinanceStore } from '../store'
import type { ServiceContext } from './context'

export type RecordSalaryPaymentInput = {
  personId: UserId
  amount: Amount
  date?: IsoDate
  accountId?: AccountId
  remarks?: string
}

/** Posts a salary payout. Unlike settlement rows, each call adds a new one. */
export async function recordSalaryPayment(
  store: FinanceStore,
  input: RecordSalaryPaymentInput,
  ctx: ServiceContext,
): Promise<LedgerEntry> {
  const person = await store.directory.findStaff(input.personId)
  if (!person) throw new NotFoundError('Staff member')

  const draft = salaryLedgerEntry({
    date: input.date ?? ctx.today,
    personId: person.id,
    personName: person.name,
    amount: input.amount,
    ...(input.accountId !== undefined ? { accountId: input.accountId } : {}),
    ...(ctx.actorId !== undefined ? { recordedBy: ctx.actorId } : {}),
    ...(input.remarks !== undefined ? { remarks: input.remarks } : {}),
  })
  const errors = validateLedgerEntry(draft)
  if (errors.length > 0) throw new ValidationError(errors)
  return store.ledger.insert(draft)
}

export async function getPayrollSummary(store: FinanceStore, month: MonthKey): Promise<PayrollSummary> {
  const { start, end } = monthRange(month)
  const [staff, entries] = await Promise.all([
    store.directory.listStaff(),
    store.ledger.list({ from: start, to: end, category: 'salary' }),
  ])
  return summarizePayroll(staff, entries, month)
}
