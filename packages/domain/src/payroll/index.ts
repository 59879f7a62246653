// ---------------------------------------------------------------------------
// Payroll bounded context
// Monthly salary due per staff member, reconciled against salary rows posted
// to the ledger.
// ---------------------------------------------------------------------------

import type { Amount, MonthKey, UserId } from '../shared/types'
import { monthOf, nonNegative, round2, sumAmounts } from '../shared/types'
import type { LedgerEntryDraft } from '../ledger/index'

export interface StaffMember {
  readonly id: UserId
  readonly name: string
  readonly monthlySalary: Amount
}

export interface PayrollLine {
  readonly personId: UserId
  readonly name: string
  readonly salary: Amount
  readonly paid: Amount
  /** `max(salary − paid, 0)` */
  readonly due: Amount
}

export interface PayrollSummary {
  readonly month: MonthKey
  readonly lines: readonly PayrollLine[]
  readonly totalSalary: Amount
  readonly totalPaid: Amount
  readonly totalDue: Amount
}

/**
 * Only debits in the `salary` category dated inside `month` count as paid.
 */
export function summarizePayroll(
  staff: readonly StaffMember[],
  entries: readonly Pick<LedgerEntryDraft, 'date' | 'category' | 'debit' | 'personId'>[],
  month: MonthKey,
): PayrollSummary {
  const paidByPerson = new Map<UserId, Amount[]>()
  for (const entry of entries) {
    if (entry.category !== 'salary' || entry.personId === undefined) continue
    if (monthOf(entry.date) !== month) continue
    const paid = paidByPerson.get(entry.personId) ?? []
    paid.push(entry.debit)
    paidByPerson.set(entry.personId, paid)
  }

  const lines = staff.map((member): PayrollLine => {
    const salary = round2(member.monthlySalary)
    const paid = sumAmounts(paidByPerson.get(member.id) ?? [])
    return { personId: member.id, name: member.name, salary, paid, due: nonNegative(salary.minus(paid)) }
  })

  return {
    month,
    lines,
    totalSalary: sumAmounts(lines.map((l) => l.salary)),
    totalPaid: sumAmounts(lines.map((l) => l.paid)),
    totalDue: sumAmounts(lines.map((l) => l.due)),
  }
}
