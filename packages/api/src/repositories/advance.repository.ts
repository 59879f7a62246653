import type { ClientAdvance } from '@studioledger/domain'
import {
  amount,
  formatAmount,
  toAccountId,
  toClientAdvanceId,
  toClientId,
  toIsoDate,
  toProjectId,
  toUserId,
} from '@studioledger/domain'
import type { Db } from '../db'
import type { AdvanceRepository, NewAllocation, NewClientAdvance } from '../store'
import { mapAllocation } from './invoice.repository'

type AdvanceRow = {
  id: string
  client_id: string
  project_id: string | null
  received_date: string
  amount: string
  account_id: string | null
  method: string
  reference: string
  notes: string
  received_by: string | null
  recorded_by: string | null
}

type AllocationRow = {
  id: string
  advance_id: string
  invoice_id: string
  amount: string
  allocated_by: string | null
  notes: string
}

const ADVANCE_COLUMNS = `id, client_id, project_id, received_date, amount, account_id, method, reference, notes,
  received_by, recorded_by`

const ALLOCATION_COLUMNS = 'id, advance_id, invoice_id, amount, allocated_by, notes'

function mapAdvance(row: AdvanceRow, allocations: readonly AllocationRow[]): ClientAdvance {
  return {
    id: toClientAdvanceId(row.id),
    clientId: toClientId(row.client_id),
    receivedDate: toIsoDate(row.received_date),
    amount: amount(row.amount),
    method: row.method,
    reference: row.reference,
    notes: row.notes,
    allocations: allocations.map(mapAllocation),
    ...(row.project_id != null ? { projectId: toProjectId(row.project_id) } : {}),
    ...(row.account_id != null ? { accountId: toAccountId(row.account_id) } : {}),
    ...(row.received_by != null ? { receivedBy: toUserId(row.received_by) } : {}),
    ...(row.recorded_by != null ? { recordedBy: toUserId(row.recorded_by) } : {}),
  }
}

export function createAdvanceRepository(db: Db): AdvanceRepository {
  async function findById(id: string): Promise<ClientAdvance | null> {
    const { rows } = await db.query<AdvanceRow>(`SELECT ${ADVANCE_COLUMNS} FROM client_advances WHERE id = $1`, [id])
    const [row] = rows
    if (!row) return null
    const allocations = await db.query<AllocationRow>(
      `SELECT ${ALLOCATION_COLUMNS} FROM client_advance_allocations WHERE advance_id = $1`,
      [id],
    )
    return mapAdvance(row, allocations.rows)
  }

  return {
    async create(input: NewClientAdvance) {
      const { rows } = await db.query<AdvanceRow>(
        `INSERT INTO client_advances (client_id, project_id, received_date, amount, account_id, method,
                                      reference, notes, received_by, recorded_by)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         RETURNING ${ADVANCE_COLUMNS}`,
        [
          input.clientId,
          input.projectId ?? null,
          input.receivedDate,
          formatAmount(input.amount),
          input.accountId ?? null,
          input.method,
          input.reference,
          input.notes,
          input.receivedBy ?? null,
          input.recordedBy ?? null,
        ],
      )
      const [row] = rows
      if (!row) throw new Error('Client advance insert returned no row')
      return mapAdvance(row, [])
    },

    findById: (id) => findById(id),

    async update(advance) {
      await db.query(
        `UPDATE client_advances
            SET client_id = $2, project_id = $3, received_date = $4, amount = $5, account_id = $6,
                method = $7, reference = $8, notes = $9, received_by = $10
          WHERE id = $1`,
        [
          advance.id,
          advance.clientId,
          advance.projectId ?? null,
          advance.receivedDate,
          formatAmount(advance.amount),
          advance.accountId ?? null,
          advance.method,
          advance.reference,
          advance.notes,
          advance.receivedBy ?? null,
        ],
      )
      const updated = await findById(advance.id)
      if (!updated) throw new Error(`Client advance ${advance.id} not found`)
      return updated
    },

    async createAllocation(input: NewAllocation) {
      const { rows } = await db.query<AllocationRow>(
        `INSERT INTO client_advance_allocations (advance_id, invoice_id, amount, allocated_by, notes)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${ALLOCATION_COLUMNS}`,
        [input.advanceId, input.invoiceId, formatAmount(input.amount), input.allocatedBy ?? null, input.notes],
      )
      const [row] = rows
      if (!row) throw new Error('Allocation insert returned no row')
      return mapAllocation(row)
    },
  }
}
