// ---------------------------------------------------------------------------
// Recurring rule expansion
//
// Each due rule owes one cashbook row per period up to today. Rows are keyed
// by (rule, run date), so re-running for the same day creates nothing new.
// ---------------------------------------------------------------------------

import type {
  AccountId,
  Amount,
  IsoDate,
  LedgerCategory,
  LedgerDirection,
  ProjectId,
  RecurringRule,
  UserId,
  VendorId,
} from '@studioledger/domain'
import { planRecurringRun, recurringLedgerEntry, validateRecurringRule } from '@studioledger/domain'
import { ValidationError } from '../lib/errors'
import type { FinanceStore } from '../store'
import type { ServiceContext } from './context'

export type CreateRecurringRuleInput = {
  name: string
  direction: LedgerDirection
  category: LedgerCategory
  amount: Amount
  dayOfMonth: number
  /** First period to post. */
  nextRunDate: IsoDate
  isActive?: boolean
  description?: string
  accountId?: AccountId
  projectId?: ProjectId
  vendorId?: VendorId
  notes?: string
}

export async function createRecurringRule(
  store: FinanceStore,
  input: CreateRecurringRuleInput,
): Promise<RecurringRule> {
  const errors = validateRecurringRule(input)
  if (errors.length > 0) throw new ValidationError(errors)
  return store.recurringRules.create({
    name: input.name.trim(),
    isActive: input.isActive ?? true,
    direction: input.direction,
    category: input.category,
    description: input.description ?? '',
    amount: input.amount,
    dayOfMonth: input.dayOfMonth,
    nextRunDate: input.nextRunDate,
    notes: input.notes ?? '',
    ...(input.accountId !== undefined ? { accountId: input.accountId } : {}),
    ...(input.projectId !== undefined ? { projectId: input.projectId } : {}),
    ...(input.vendorId !== undefined ? { vendorId: input.vendorId } : {}),
  })
}

export interface RecurringRunOptions {
  readonly today: IsoDate
  readonly actorId?: UserId
}

/** Posts the periods one rule owes; returns how many rows were created. */
async function runRule(tx: FinanceStore, rule: RecurringRule, opts: RecurringRunOptions): Promise<number> {
  const plan = planRecurringRun(rule, opts.today)
  let created = 0
  for (const runDate of plan.runDates) {
    const draft = recurringLedgerEntry(rule, runDate, opts.actorId)
    if (await tx.ledger.findByOrigin(draft.origin)) continue
    await tx.ledger.insert(draft)
    created += 1
  }
  if (plan.nextRunDate !== rule.nextRunDate) {
    await tx.recurringRules.updateNextRunDate(rule.id, plan.nextRunDate)
  }
  return created
}

/**
 * Expands every due rule. Each rule commits on its own, so one failing rule
 * leaves the others posted; the failure is rethrown after the rest have run.
 */
export async function generateRecurringTransactions(
  store: FinanceStore,
  opts: RecurringRunOptions,
): Promise<number> {
  const rules = await store.recurringRules.listDue(opts.today)
  let created = 0
  const failures: Error[] = []
  for (const rule of rules) {
    try {
      created += await store.transaction((tx) => runRule(tx, rule, opts))
    } catch (err) {
      failures.push(err instanceof Error ? err : new Error(String(err)))
    }
  }
  if (failures.length > 0) {
    throw new AggregateError(failures, `${failures.length} recurring rule(s) failed; ${created} entries created`)
  }
  return created
}

/** Context adapter for callers holding a ServiceContext. */
export function recurringRunOptions(ctx: ServiceContext): RecurringRunOptions {
  return { today: ctx.today, ...(ctx.actorId !== undefined ? { actorId: ctx.actorId } : {}) }
}
