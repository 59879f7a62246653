import { describe, it, expect } from 'vitest'
import {
  amount,
  toIsoDate,
  toMonthKey,
  toUserId,
  bucketFor,
  bucketByAge,
  summarizePayroll,
} from '../index'

describe('bucketFor', () => {
  it('puts boundary days in the lower bucket', () => {
    expect(bucketFor(0)).toBe('0-30')
    expect(bucketFor(30)).toBe('0-30')
    expect(bucketFor(31)).toBe('31-60')
    expect(bucketFor(90)).toBe('61-90')
    expect(bucketFor(91)).toBe('90+')
  })
})

describe('bucketByAge', () => {
  const today = toIsoDate('2024-06-30')

  it('groups open items by days overdue and totals each bucket', () => {
    const report = bucketByAge(
      [
        { item: 'A', dueDate: toIsoDate('2024-07-15'), outstanding: amount(100) },
        { item: 'B', dueDate: toIsoDate('2024-05-01'), outstanding: amount(250) },
        { item: 'C', dueDate: toIsoDate('2024-01-01'), outstanding: amount(50) },
        { item: 'D', dueDate: toIsoDate('2024-01-01'), outstanding: amount(0) },
      ],
      today,
    )
    expect(report.buckets['0-30'].map((e) => e.item)).toEqual(['A'])
    expect(report.buckets['0-30'][0]?.daysOverdue).toBe(0)
    expect(report.buckets['31-60'].map((e) => e.item)).toEqual(['B'])
    expect(report.buckets['31-60'][0]?.daysOverdue).toBe(60)
    expect(report.buckets['90+'].map((e) => e.item)).toEqual(['C'])
    expect(report.totals['0-30'].toFixed(2)).toBe('100.00')
    expect(report.totals['61-90'].toFixed(2)).toBe('0.00')
    expect(report.grandTotal.toFixed(2)).toBe('400.00')
  })
})

describe('summarizePayroll', () => {
  const month = toMonthKey('2024-03')
  const asha = toUserId('u-asha')
  const ravi = toUserId('u-ravi')

  it('reconciles salary rows in the month against each salary', () => {
    const summary = summarizePayroll(
      [
        { id: asha, name: 'Asha', monthlySalary: amount(40000) },
        { id: ravi, name: 'Ravi', monthlySalary: amount(30000) },
      ],
      [
        { date: toIsoDate('2024-03-05'), category: 'salary', debit: amount(15000), personId: asha },
        { date: toIsoDate('2024-03-31'), category: 'salary', debit: amount(25000), personId: asha },
        { date: toIsoDate('2024-04-01'), category: 'salary', debit: amount(30000), personId: ravi },
        { date: toIsoDate('2024-03-10'), category: 'reimbursement', debit: amount(500), personId: ravi },
        { date: toIsoDate('2024-03-12'), category: 'salary', debit: amount(32000), personId: ravi },
      ],
      month,
    )
    expect(summary.lines.map((l) => [l.name, l.paid.toFixed(2), l.due.toFixed(2)])).toEqual([
      ['Asha', '40000.00', '0.00'],
      ['Ravi', '32000.00', '0.00'],
    ])
    expect(summary.totalSalary.toFixed(2)).toBe('70000.00')
    expect(summary.totalPaid.toFixed(2)).toBe('72000.00')
    expect(summary.totalDue.toFixed(2)).toBe('0.00')
  })

  it('reports the unpaid remainder as due', () => {
    const summary = summarizePayroll([{ id: asha, name: 'Asha', monthlySalary: amount(40000) }], [], month)
    expect(summary.lines[0]?.due.toFixed(2)).toBe('40000.00')
    expect(summary.totalDue.toFixed(2)).toBe('40000.00')
  })
})
