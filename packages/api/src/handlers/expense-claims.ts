// ---------------------------------------------------------------------------
// Expense claims handler: submit, decide, reimburse
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import { toAccountId, toExpenseClaimId, toProjectId, toUserId } from '@studioledger/domain'
import type { AppEnv } from '../types'
import { errorResponse } from '../lib/errors'
import { respond, serviceContext } from '../lib/respond'
import { notifySafely } from '../services/notifier'
import { createExpenseClaim, decideExpenseClaim, payExpenseClaim } from '../services/payables'
import { AmountField, DateField, IdField, TextField } from './schemas'

const CreateClaimBody = z.object({
  employeeId: IdField.optional(),
  projectId: IdField.optional(),
  expenseDate: DateField.optional(),
  amount: AmountField,
  category: TextField.max(50).optional(),
  description: TextField,
})

const DecisionBody = z.object({ decision: z.enum(['approve', 'reject']) })

const PayClaimBody = z.object({
  paymentDate: DateField.optional(),
  accountId: IdField.optional(),
  method: TextField.max(50).optional(),
  reference: TextField.max(100).optional(),
  notes: TextField.optional(),
})

export const expenseClaimsHandler = new Hono<AppEnv>()

expenseClaimsHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateClaimBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const claim = await createExpenseClaim(
        c.get('store'),
        {
          amount: body.amount,
          description: body.description,
          ...(body.employeeId !== undefined ? { employeeId: toUserId(body.employeeId) } : {}),
          ...(body.projectId !== undefined ? { projectId: toProjectId(body.projectId) } : {}),
          ...(body.expenseDate !== undefined ? { expenseDate: body.expenseDate } : {}),
          ...(body.category !== undefined ? { category: body.category } : {}),
        },
        serviceContext(c),
      )
      return respond(c, { data: claim }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

expenseClaimsHandler.post(
  '/:id/decision',
  validator('json', (value, c) => {
    const r = DecisionBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const { decision } = c.req.valid('json')
      const claim = await decideExpenseClaim(
        c.get('store'),
        toExpenseClaimId(c.req.param('id')),
        decision,
        serviceContext(c),
      )
      return respond(c, { data: claim })
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

expenseClaimsHandler.post(
  '/:id/pay',
  validator('json', (value, c) => {
    const r = PayClaimBody.safeParse(value ?? {})
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const result = await payExpenseClaim(
        c.get('store'),
        toExpenseClaimId(c.req.param('id')),
        {
          ...(body.paymentDate !== undefined ? { paymentDate: body.paymentDate } : {}),
          ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
          ...(body.method !== undefined ? { method: body.method } : {}),
          ...(body.reference !== undefined ? { reference: body.reference } : {}),
          ...(body.notes !== undefined ? { notes: body.notes } : {}),
        },
        serviceContext(c),
      )
      const notifier = c.get('notifier')
      await notifySafely('claimPaid', () => notifier.claimPaid({ claim: result.claim }))
      return respond(c, { data: result }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)
