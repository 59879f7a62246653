// ---------------------------------------------------------------------------
// Recurring bounded context
// Monthly rules (rent, subscriptions, retainers) that post one ledger row per
// elapsed period.
// ---------------------------------------------------------------------------

import type { AccountId, Amount, Brand, IsoDate, ProjectId, VendorId } from '../shared/types'
import { addMonthsClamped, compareDates, isZeroOrLess, withDayOfMonth } from '../shared/types'
import type { LedgerCategory, LedgerDirection } from '../ledger/index'

export type RecurringRuleId = Brand<string, 'RecurringRuleId'>

export const toRecurringRuleId = (raw: string): RecurringRuleId => raw as RecurringRuleId

/** Days 29–31 do not exist in every month, so rules stop at 28. */
export const MAX_RULE_DAY = 28

/**
 * @invariant `dayOfMonth` is within 1–28.
 * @invariant `nextRunDate` only ever moves forward, in whole-month steps.
 */
export interface RecurringRule {
  readonly id: RecurringRuleId
  readonly name: string
  readonly isActive: boolean
  readonly direction: LedgerDirection
  readonly category: LedgerCategory
  readonly description: string
  readonly amount: Amount
  readonly accountId?: AccountId
  readonly projectId?: ProjectId
  readonly vendorId?: VendorId
  readonly dayOfMonth: number
  readonly nextRunDate: IsoDate
  readonly notes: string
}

// ---------------------------------------------------------------------------
// Cursor arithmetic
// ---------------------------------------------------------------------------

/** Adds whole months; the day is clamped to 28. */
export function addMonth(date: IsoDate, months = 1): IsoDate {
  return addMonthsClamped(date, months)
}

/**
 * The run date after `runDate`: first of the next month, then the rule's day,
 * clamped to 28. `2024-01-31` with day 31 → `2024-02-28`.
 */
export function advanceRunDate(runDate: IsoDate, dayOfMonth: number): IsoDate {
  const firstOfNext = addMonth(withDayOfMonth(runDate, 1), 1)
  return withDayOfMonth(firstOfNext, Math.min(Math.max(dayOfMonth, 1), MAX_RULE_DAY))
}

export interface RecurringRunPlan {
  /** Every period due on or before `today`, oldest first. */
  readonly runDates: readonly IsoDate[]
  readonly nextRunDate: IsoDate
}

/**
 * Lists the periods a rule owes as of `today` and where its cursor ends up.
 * Inactive rules and rules not yet due owe nothing.
 */
export function planRecurringRun(
  rule: Pick<RecurringRule, 'isActive' | 'dayOfMonth' | 'nextRunDate'>,
  today: IsoDate,
): RecurringRunPlan {
  const runDates: IsoDate[] = []
  if (!rule.isActive) return { runDates, nextRunDate: rule.nextRunDate }

  let cursor = rule.nextRunDate
  while (compareDates(cursor, today) <= 0) {
    runDates.push(cursor)
    cursor = advanceRunDate(cursor, rule.dayOfMonth)
  }
  return { runDates, nextRunDate: cursor }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export type RecurringRuleDraft = Pick<RecurringRule, 'name' | 'amount' | 'dayOfMonth' | 'nextRunDate'>

export function validateRecurringRule(draft: RecurringRuleDraft): readonly string[] {
  const errors: string[] = []
  if (draft.name.trim() === '') errors.push('Name is required.')
  if (isZeroOrLess(draft.amount)) errors.push('Amount must be greater than zero.')
  if (!Number.isInteger(draft.dayOfMonth) || draft.dayOfMonth < 1 || draft.dayOfMonth > MAX_RULE_DAY) {
    errors.push(`Day of month must be between 1 and ${MAX_RULE_DAY}.`)
  }
  return errors
}
