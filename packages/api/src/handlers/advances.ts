// ---------------------------------------------------------------------------
// Client advances handler: retainers received ahead of invoicing
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { ClientAdvance } from '@studioledger/domain'
import {
  calculateAllocatedAmount,
  calculateAvailableAmount,
  toAccountId,
  toClientAdvanceId,
  toClientId,
  toProjectId,
  toUserId,
} from '@studioledger/domain'
import type { AppEnv } from '../types'
import { errorResponse } from '../lib/errors'
import { respond, serviceContext } from '../lib/respond'
import { getClientAdvance, recordClientAdvance, updateClientAdvance } from '../services/advances'
import { AmountField, DateField, IdField, TextField } from './schemas'

const AdvanceFields = {
  projectId: IdField.optional(),
  amount: AmountField,
  receivedDate: DateField.optional(),
  accountId: IdField.optional(),
  method: TextField.max(50).optional(),
  reference: TextField.max(100).optional(),
  notes: TextField.optional(),
  receivedBy: IdField.optional(),
}

const RecordAdvanceBody = z.object({ clientId: IdField, ...AdvanceFields })

const UpdateAdvanceBody = z.object(AdvanceFields).partial()

function withBalances(advance: ClientAdvance) {
  return {
    ...advance,
    allocatedAmount: calculateAllocatedAmount(advance),
    availableAmount: calculateAvailableAmount(advance),
  }
}

export const advancesHandler = new Hono<AppEnv>()

advancesHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = RecordAdvanceBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const { advance, ledgerEntry } = await recordClientAdvance(
        c.get('store'),
        {
          clientId: toClientId(body.clientId),
          amount: body.amount,
          ...(body.projectId !== undefined ? { projectId: toProjectId(body.projectId) } : {}),
          ...(body.receivedDate !== undefined ? { receivedDate: body.receivedDate } : {}),
          ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
          ...(body.method !== undefined ? { method: body.method } : {}),
          ...(body.reference !== undefined ? { reference: body.reference } : {}),
          ...(body.notes !== undefined ? { notes: body.notes } : {}),
          ...(body.receivedBy !== undefined ? { receivedBy: toUserId(body.receivedBy) } : {}),
        },
        serviceContext(c),
      )
      return respond(c, { data: { advance: withBalances(advance), ledgerEntry } }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

advancesHandler.get('/:id', async (c) => {
  try {
    const advance = await getClientAdvance(c.get('store'), toClientAdvanceId(c.req.param('id')))
    return respond(c, { data: withBalances(advance) })
  } catch (err) {
    return errorResponse(c, err)
  }
})

advancesHandler.patch(
  '/:id',
  validator('json', (value, c) => {
    const r = UpdateAdvanceBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const { advance, ledgerEntry } = await updateClientAdvance(
        c.get('store'),
        toClientAdvanceId(c.req.param('id')),
        {
          ...(body.amount !== undefined ? { amount: body.amount } : {}),
          ...(body.projectId !== undefined ? { projectId: toProjectId(body.projectId) } : {}),
          ...(body.receivedDate !== undefined ? { receivedDate: body.receivedDate } : {}),
          ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
          ...(body.method !== undefined ? { method: body.method } : {}),
          ...(body.reference !== undefined ? { reference: body.reference } : {}),
          ...(body.notes !== undefined ? { notes: body.notes } : {}),
          ...(body.receivedBy !== undefined ? { receivedBy: toUserId(body.receivedBy) } : {}),
        },
      )
      return respond(c, { data: { advance: withBalances(advance), ledgerEntry } })
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)
