import type {
  AccountId,
  Amount,
  ClientId,
  IsoDate,
  LedgerCategory,
  LedgerDirection,
  LedgerEntry,
  LedgerEntryDraft,
  LedgerEntryId,
  ProjectId,
  UserId,
  VendorId,
} from '@studioledger/domain'
import { postAmount, validateLedgerEntry } from '@studioledger/domain'
import { NotFoundError, PreconditionError, ValidationError } from '../lib/errors'
import type { FinanceStore } from '../store'
import type { ServiceContext } from './context'

export type RecordLedgerEntryInput = {
  date?: IsoDate
  description: string
  category: LedgerCategory
  direction: LedgerDirection
  amount: Amount
  accountId?: AccountId
  projectId?: ProjectId
  clientId?: ClientId
  vendorId?: VendorId
  personId?: UserId
  remarks?: string
}

export type UpdateLedgerEntryInput = Partial<RecordLedgerEntryInput>

function directionOf(entry: Pick<LedgerEntryDraft, 'credit'>): LedgerDirection {
  return entry.credit.isZero() ? 'debit' : 'credit'
}

function toDraft({ id: _id, ...draft }: LedgerEntry): LedgerEntryDraft {
  return draft
}

function assertValid(draft: LedgerEntryDraft): void {
  const errors = validateLedgerEntry(draft)
  if (errors.length > 0) throw new ValidationError(errors)
}

/**
 * Posts a cashbook row typed in by hand. Such rows carry no origin, so the
 * settlement sync never touches them.
 */
export async function recordLedgerEntry(
  store: FinanceStore,
  input: RecordLedgerEntryInput,
  ctx: ServiceContext,
): Promise<LedgerEntry> {
  const draft: LedgerEntryDraft = {
    date: input.date ?? ctx.today,
    description: input.description,
    category: input.category,
    ...postAmount(input.direction, input.amount),
    ...(input.accountId !== undefined ? { accountId: input.accountId } : {}),
    ...(input.projectId !== undefined ? { projectId: input.projectId } : {}),
    ...(input.clientId !== undefined ? { clientId: input.clientId } : {}),
    ...(input.vendorId !== undefined ? { vendorId: input.vendorId } : {}),
    ...(input.personId !== undefined ? { personId: input.personId } : {}),
    ...(ctx.actorId !== undefined ? { recordedBy: ctx.actorId } : {}),
    remarks: input.remarks ?? '',
  }
  assertValid(draft)
  return store.ledger.insert(draft)
}

/**
 * Edits a hand-entered row. Rows posted from a payment, advance or recurring
 * rule follow their source and are refused here. An amount without a
 * direction keeps the row on its current side.
 */
export async function updateLedgerEntry(
  store: FinanceStore,
  id: LedgerEntryId,
  changes: UpdateLedgerEntryInput,
): Promise<LedgerEntry> {
  return store.transaction(async (tx) => {
    const current = await tx.ledger.findById(id)
    if (!current) throw new NotFoundError('Ledger entry')
    if (current.origin !== undefined) {
      throw new PreconditionError('Entries posted from a payment or rule cannot be edited here.')
    }

    const direction = changes.direction ?? directionOf(current)
    const value = changes.amount ?? current.debit.plus(current.credit)
    const draft: LedgerEntryDraft = {
      ...toDraft(current),
      ...(changes.date !== undefined ? { date: changes.date } : {}),
      ...(changes.description !== undefined ? { description: changes.description } : {}),
      ...(changes.category !== undefined ? { category: changes.category } : {}),
      ...postAmount(direction, value),
      ...(changes.accountId !== undefined ? { accountId: changes.accountId } : {}),
      ...(changes.projectId !== undefined ? { projectId: changes.projectId } : {}),
      ...(changes.clientId !== undefined ? { clientId: changes.clientId } : {}),
      ...(changes.vendorId !== undefined ? { vendorId: changes.vendorId } : {}),
      ...(changes.personId !== undefined ? { personId: changes.personId } : {}),
      ...(changes.remarks !== undefined ? { remarks: changes.remarks } : {}),
    }
    assertValid(draft)
    return tx.ledger.update(id, draft)
  })
}
