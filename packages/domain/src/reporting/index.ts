// ---------------------------------------------------------------------------
// Reporting bounded context
// Receivable and payable aging.
// ---------------------------------------------------------------------------

import type { Amount, IsoDate } from '../shared/types'
import { daysBetween, isZeroOrLess, sumAmounts } from '../shared/types'

export type AgingBucket = '0-30' | '31-60' | '61-90' | '90+'

export const AGING_BUCKETS: readonly AgingBucket[] = ['0-30', '31-60', '61-90', '90+'] as const

export interface AgingItem<T> {
  readonly item: T
  readonly dueDate: IsoDate
  readonly outstanding: Amount
}

export interface AgedItem<T> extends AgingItem<T> {
  readonly daysOverdue: number
}

export interface AgingReport<T> {
  readonly buckets: Readonly<Record<AgingBucket, readonly AgedItem<T>[]>>
  readonly totals: Readonly<Record<AgingBucket, Amount>>
  readonly grandTotal: Amount
}

export function bucketFor(daysOverdue: number): AgingBucket {
  if (daysOverdue <= 30) return '0-30'
  if (daysOverdue <= 60) return '31-60'
  if (daysOverdue <= 90) return '61-90'
  return '90+'
}

/**
 * Groups open items by days past due as of `today`. Items not yet due count
 * as zero days overdue; settled items are left out.
 */
export function bucketByAge<T>(items: readonly AgingItem<T>[], today: IsoDate): AgingReport<T> {
  const buckets: Record<AgingBucket, AgedItem<T>[]> = { '0-30': [], '31-60': [], '61-90': [], '90+': [] }
  for (const entry of items) {
    if (isZeroOrLess(entry.outstanding)) continue
    const daysOverdue = Math.max(daysBetween(entry.dueDate, today), 0)
    buckets[bucketFor(daysOverdue)].push({ ...entry, daysOverdue })
  }
  const total = (bucket: AgingBucket): Amount => sumAmounts(buckets[bucket].map((e) => e.outstanding))
  const totals: Record<AgingBucket, Amount> = {
    '0-30': total('0-30'),
    '31-60': total('31-60'),
    '61-90': total('61-90'),
    '90+': total('90+'),
  }
  return { buckets, totals, grandTotal: sumAmounts(AGING_BUCKETS.map((bucket) => totals[bucket])) }
}
