import type {
  AccountId,
  Amount,
  ClientAdvance,
  ClientAdvanceId,
  ClientId,
  IsoDate,
  LedgerEntry,
  ProjectId,
  UserId,
} from '@studioledger/domain'
import { calculateAllocatedAmount, formatAmount, isZeroOrLess } from '@studioledger/domain'
import { NotFoundError, ValidationError } from '../lib/errors'
import type { FinanceStore } from '../store'
import type { ServiceContext } from './context'
import { syncClientAdvanceLedger } from './ledger-sync'

export type RecordClientAdvanceInput = {
  clientId: ClientId
  projectId?: ProjectId
  amount: Amount
  /** Defaults to the business date. */
  receivedDate?: IsoDate
  accountId?: AccountId
  method?: string
  reference?: string
  notes?: string
  receivedBy?: UserId
}

export type UpdateClientAdvanceInput = Partial<Omit<RecordClientAdvanceInput, 'clientId'>>

export interface AdvanceResult {
  readonly advance: ClientAdvance
  readonly ledgerEntry: LedgerEntry
}

function assertPositive(value: Amount): void {
  if (isZeroOrLess(value)) throw new ValidationError(['Amount must be greater than zero.'])
}

async function assertProjectOfClient(tx: FinanceStore, projectId: ProjectId, clientId: ClientId): Promise<void> {
  const project = await tx.directory.findProject(projectId)
  if (!project) throw new NotFoundError('Project')
  if (project.clientId !== clientId) {
    throw new ValidationError(['The project belongs to a different client.'])
  }
}

export async function recordClientAdvance(
  store: FinanceStore,
  input: RecordClientAdvanceInput,
  ctx: ServiceContext,
): Promise<AdvanceResult> {
  assertPositive(input.amount)
  return store.transaction(async (tx) => {
    if (input.projectId !== undefined) await assertProjectOfClient(tx, input.projectId, input.clientId)
    const advance = await tx.advances.create({
      clientId: input.clientId,
      receivedDate: input.receivedDate ?? ctx.today,
      amount: input.amount,
      method: input.method ?? '',
      reference: input.reference ?? '',
      notes: input.notes ?? '',
      ...(input.projectId !== undefined ? { projectId: input.projectId } : {}),
      ...(input.accountId !== undefined ? { accountId: input.accountId } : {}),
      ...(input.receivedBy !== undefined ? { receivedBy: input.receivedBy } : {}),
      ...(ctx.actorId !== undefined ? { recordedBy: ctx.actorId } : {}),
    })
    const ledgerEntry = await syncClientAdvanceLedger(tx, advance)
    return { advance, ledgerEntry }
  })
}

/**
 * Edits an advance and rewrites its cashbook row in place. The amount cannot
 * drop below what has already been allocated to invoices.
 */
export async function updateClientAdvance(
  store: FinanceStore,
  id: ClientAdvanceId,
  changes: UpdateClientAdvanceInput,
): Promise<AdvanceResult> {
  if (changes.amount !== undefined) assertPositive(changes.amount)
  return store.transaction(async (tx) => {
    const current = await tx.advances.findById(id)
    if (!current) throw new NotFoundError('Client advance')
    if (changes.projectId !== undefined && changes.projectId !== current.projectId) {
      await assertProjectOfClient(tx, changes.projectId, current.clientId)
    }
    if (changes.amount !== undefined) {
      const allocated = calculateAllocatedAmount(current)
      if (changes.amount.lessThan(allocated)) {
        throw new ValidationError([`Amount cannot be less than the ${formatAmount(allocated)} already allocated.`])
      }
    }
    const advance = await tx.advances.update({ ...current, ...changes })
    const ledgerEntry = await syncClientAdvanceLedger(tx, advance)
    return { advance, ledgerEntry }
  })
}

export async function getClientAdvance(store: FinanceStore, id: ClientAdvanceId): Promise<ClientAdvance> {
  const advance = await store.advances.findById(id)
  if (!advance) throw new NotFoundError('Client advance')
  return advance
}
