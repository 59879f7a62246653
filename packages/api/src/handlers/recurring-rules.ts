// ---------------------------------------------------------------------------
// Recurring rules handler: standing cashbook rules and their expansion
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import { MAX_RULE_DAY, toAccountId, toProjectId, toVendorId } from '@studioledger/domain'
import type { AppEnv } from '../types'
import { errorResponse } from '../lib/errors'
import { respond, serviceContext } from '../lib/respond'
import { createRecurringRule, generateRecurringTransactions, recurringRunOptions } from '../services/recurring'
import { AmountField, CategoryField, DateField, IdField, TextField } from './schemas'

const CreateRuleBody = z.object({
  name: TextField.min(1).max(100),
  direction: z.enum(['debit', 'credit']),
  category: CategoryField,
  amount: AmountField,
  dayOfMonth: z.number().int().min(1).max(MAX_RULE_DAY),
  nextRunDate: DateField,
  isActive: z.boolean().optional(),
  description: TextField.max(255).optional(),
  accountId: IdField.optional(),
  projectId: IdField.optional(),
  vendorId: IdField.optional(),
  notes: TextField.optional(),
})

export const recurringRulesHandler = new Hono<AppEnv>()

recurringRulesHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateRuleBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const rule = await createRecurringRule(c.get('store'), {
        name: body.name,
        direction: body.direction,
        category: body.category,
        amount: body.amount,
        dayOfMonth: body.dayOfMonth,
        nextRunDate: body.nextRunDate,
        ...(body.isActive !== undefined ? { isActive: body.isActive } : {}),
        ...(body.description !== undefined ? { description: body.description } : {}),
        ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
        ...(body.projectId !== undefined ? { projectId: toProjectId(body.projectId) } : {}),
        ...(body.vendorId !== undefined ? { vendorId: toVendorId(body.vendorId) } : {}),
        ...(body.notes !== undefined ? { notes: body.notes } : {}),
      })
      return respond(c, { data: rule }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

// Posts every period due up to today. Safe to call repeatedly.
recurringRulesHandler.post('/run', async (c) => {
  try {
    const created = await generateRecurringTransactions(c.get('store'), recurringRunOptions(serviceContext(c)))
    return respond(c, { data: { created, runDate: c.get('today') } })
  } catch (err) {
    return errorResponse(c, err)
  }
})
