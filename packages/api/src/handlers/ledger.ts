// ---------------------------------------------------------------------------
// Ledger handler: cashbook rows, salary payouts, payroll reconciliation
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import {
  LEDGER_CATEGORIES,
  isIsoDate,
  monthOf,
  summarizeCashbook,
  toAccountId,
  toClientId,
  toLedgerEntryId,
  toProjectId,
  toUserId,
  toVendorId,
} from '@studioledger/domain'
import type { AppEnv } from '../types'
import type { LedgerFilter } from '../store'
import { errorResponse } from '../lib/errors'
import { respond, serviceContext } from '../lib/respond'
import { recordLedgerEntry, updateLedgerEntry } from '../services/ledger'
import { getPayrollSummary, recordSalaryPayment } from '../services/payroll'
import { AmountField, CategoryField, DateField, IdField, MonthField, TextField, pageParams } from './schemas'

const EntryFields = {
  date: DateField.optional(),
  accountId: IdField.optional(),
  projectId: IdField.optional(),
  clientId: IdField.optional(),
  vendorId: IdField.optional(),
  personId: IdField.optional(),
  remarks: TextField.optional(),
}

const CreateEntryBody = z.object({
  description: TextField.min(1).max(255),
  category: CategoryField,
  direction: z.enum(['debit', 'credit']),
  amount: AmountField,
  ...EntryFields,
})

const UpdateEntryBody = z.object({
  description: TextField.min(1).max(255).optional(),
  category: CategoryField.optional(),
  direction: z.enum(['debit', 'credit']).optional(),
  amount: AmountField.optional(),
  ...EntryFields,
})

type EntryLinks = Pick<z.infer<typeof UpdateEntryBody>, keyof typeof EntryFields>

function entryLinks(body: EntryLinks) {
  return {
    ...(body.date !== undefined ? { date: body.date } : {}),
    ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
    ...(body.projectId !== undefined ? { projectId: toProjectId(body.projectId) } : {}),
    ...(body.clientId !== undefined ? { clientId: toClientId(body.clientId) } : {}),
    ...(body.vendorId !== undefined ? { vendorId: toVendorId(body.vendorId) } : {}),
    ...(body.personId !== undefined ? { personId: toUserId(body.personId) } : {}),
    ...(body.remarks !== undefined ? { remarks: body.remarks } : {}),
  }
}

const SalaryBody = z.object({
  personId: IdField,
  amount: AmountField,
  date: DateField.optional(),
  accountId: IdField.optional(),
  remarks: TextField.optional(),
})

export const ledgerHandler = new Hono<AppEnv>()

/**
 * GET /transactions?from=&to=&category=&accountId=&limit=&offset=
 *
 * `to` is exclusive. The summary covers every row matching the filter, not
 * only the returned page.
 */
ledgerHandler.get('/transactions', async (c) => {
  const from = c.req.query('from')
  const to = c.req.query('to')
  const rawCategory = c.req.query('category')
  const accountId = c.req.query('accountId')

  if ((from !== undefined && !isIsoDate(from)) || (to !== undefined && !isIsoDate(to))) {
    return c.json({ error: 'from and to must be YYYY-MM-DD dates', code: 'VALIDATION_ERROR' }, 400)
  }
  const category = LEDGER_CATEGORIES.find((value) => value === rawCategory)
  if (rawCategory !== undefined && category === undefined) {
    return c.json({ error: `Unknown category: ${rawCategory}`, code: 'VALIDATION_ERROR' }, 400)
  }

  const filter: LedgerFilter = {
    ...(from !== undefined ? { from } : {}),
    ...(to !== undefined ? { to } : {}),
    ...(category !== undefined ? { category } : {}),
    ...(accountId ? { accountId: toAccountId(accountId) } : {}),
  }
  const { limit, offset } = pageParams((name) => c.req.query(name))

  try {
    const ledger = c.get('store').ledger
    const [entries, matching] = await Promise.all([
      ledger.list({ ...filter, limit, offset }),
      ledger.list(filter),
    ])
    return respond(c, {
      data: entries,
      summary: summarizeCashbook(matching),
      meta: { count: entries.length, limit, offset },
    })
  } catch (err) {
    return errorResponse(c, err)
  }
})

// POST /transactions posts a hand-entered row with no settlement origin
ledgerHandler.post(
  '/transactions',
  validator('json', (value, c) => {
    const r = CreateEntryBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const entry = await recordLedgerEntry(
        c.get('store'),
        {
          description: body.description,
          category: body.category,
          direction: body.direction,
          amount: body.amount,
          ...entryLinks(body),
        },
        serviceContext(c),
      )
      return respond(c, { data: entry }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

ledgerHandler.patch(
  '/transactions/:id',
  validator('json', (value, c) => {
    const r = UpdateEntryBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const entry = await updateLedgerEntry(c.get('store'), toLedgerEntryId(c.req.param('id')), {
        ...(body.description !== undefined ? { description: body.description } : {}),
        ...(body.category !== undefined ? { category: body.category } : {}),
        ...(body.direction !== undefined ? { direction: body.direction } : {}),
        ...(body.amount !== undefined ? { amount: body.amount } : {}),
        ...entryLinks(body),
      })
      return respond(c, { data: entry })
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

ledgerHandler.post(
  '/salary',
  validator('json', (value, c) => {
    const r = SalaryBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const entry = await recordSalaryPayment(
        c.get('store'),
        {
          personId: toUserId(body.personId),
          amount: body.amount,
          ...(body.date !== undefined ? { date: body.date } : {}),
          ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
          ...(body.remarks !== undefined ? { remarks: body.remarks } : {}),
        },
        serviceContext(c),
      )
      return respond(c, { data: entry }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

// GET /payroll?month=YYYY-MM, defaulting to the current month
ledgerHandler.get('/payroll', async (c) => {
  const parsed = MonthField.safeParse(c.req.query('month') ?? monthOf(c.get('today')))
  if (!parsed.success) {
    return c.json({ error: parsed.error.message, code: 'VALIDATION_ERROR' }, 400)
  }
  try {
    return respond(c, { data: await getPayrollSummary(c.get('store'), parsed.data) })
  } catch (err) {
    return errorResponse(c, err)
  }
})
