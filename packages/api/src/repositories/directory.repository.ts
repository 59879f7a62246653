import type { StaffMember } from '@studioledger/domain'
import { amount, toClientId, toLeadId, toProjectId, toUserId } from '@studioledger/domain'
import type { Db } from '../db'
import type { DirectoryRepository } from '../store'

// Projects, leads and staff are maintained by the CRM side; finance only reads them.

type StaffRow = { id: string; full_name: string; monthly_salary: string }

function mapStaff(row: StaffRow): StaffMember {
  return { id: toUserId(row.id), name: row.full_name, monthlySalary: amount(row.monthly_salary) }
}

export function createDirectoryRepository(db: Db): DirectoryRepository {
  return {
    async findProject(id) {
      const { rows } = await db.query<{ id: string; code: string; client_id: string }>(
        'SELECT id, code, client_id FROM projects WHERE id = $1',
        [id],
      )
      const [row] = rows
      return row ? { id: toProjectId(row.id), code: row.code, clientId: toClientId(row.client_id) } : null
    },

    async findLead(id) {
      const { rows } = await db.query<{ id: string; client_id: string | null }>(
        'SELECT id, client_id FROM leads WHERE id = $1',
        [id],
      )
      const [row] = rows
      if (!row) return null
      return {
        id: toLeadId(row.id),
        ...(row.client_id != null ? { clientId: toClientId(row.client_id) } : {}),
      }
    },

    async findStaff(id) {
      const { rows } = await db.query<StaffRow>(
        'SELECT id, full_name, monthly_salary FROM users WHERE id = $1',
        [id],
      )
      const [row] = rows
      return row ? mapStaff(row) : null
    },

    async listStaff() {
      const { rows } = await db.query<StaffRow>(
        'SELECT id, full_name, monthly_salary FROM users WHERE is_active ORDER BY full_name',
      )
      return rows.map(mapStaff)
    },
  }
}
