// ---------------------------------------------------------------------------
// Bills handler: vendor bills and the payments that settle them
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { Bill } from '@studioledger/domain'
import {
  calculateAmountPaid,
  calculateBillOutstanding,
  toAccountId,
  toBillId,
  toBillPaymentId,
  toProjectId,
  toVendorId,
} from '@studioledger/domain'
import type { AppEnv } from '../types'
import { errorResponse } from '../lib/errors'
import { respond, serviceContext } from '../lib/respond'
import { billAging } from '../services/aging'
import { notifySafely } from '../services/notifier'
import { createBill, getBill, recordBillPayment, updateBillPayment } from '../services/payables'
import { AmountField, DateField, IdField, TextField } from './schemas'

const CreateBillBody = z.object({
  vendorId: IdField,
  projectId: IdField.optional(),
  billNumber: TextField.max(50).optional(),
  billDate: DateField.optional(),
  dueDate: DateField.optional(),
  amount: AmountField,
  category: z.enum(['project_expense', 'office_expense', 'misc']).optional(),
  description: TextField.optional(),
})

const BillPaymentFields = {
  amount: AmountField,
  paymentDate: DateField.optional(),
  accountId: IdField.optional(),
  method: TextField.max(50).optional(),
  reference: TextField.max(100).optional(),
  notes: TextField.optional(),
}

const RecordBillPaymentBody = z.object(BillPaymentFields)

const UpdateBillPaymentBody = z.object(BillPaymentFields).partial()

function withBalances(bill: Bill) {
  return { ...bill, amountPaid: calculateAmountPaid(bill), outstanding: calculateBillOutstanding(bill) }
}

export const billsHandler = new Hono<AppEnv>()

billsHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateBillBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const bill = await createBill(
        c.get('store'),
        {
          vendorId: toVendorId(body.vendorId),
          amount: body.amount,
          ...(body.projectId !== undefined ? { projectId: toProjectId(body.projectId) } : {}),
          ...(body.billNumber !== undefined ? { billNumber: body.billNumber } : {}),
          ...(body.billDate !== undefined ? { billDate: body.billDate } : {}),
          ...(body.dueDate !== undefined ? { dueDate: body.dueDate } : {}),
          ...(body.category !== undefined ? { category: body.category } : {}),
          ...(body.description !== undefined ? { description: body.description } : {}),
        },
        serviceContext(c),
      )
      return respond(c, { data: withBalances(bill) }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

billsHandler.get('/aging', async (c) => {
  try {
    return respond(c, { data: await billAging(c.get('store'), c.get('today')) })
  } catch (err) {
    return errorResponse(c, err)
  }
})

billsHandler.get('/:id', async (c) => {
  try {
    const bill = await getBill(c.get('store'), toBillId(c.req.param('id')))
    return respond(c, { data: withBalances(bill) })
  } catch (err) {
    return errorResponse(c, err)
  }
})

billsHandler.post(
  '/:id/payments',
  validator('json', (value, c) => {
    const r = RecordBillPaymentBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const result = await recordBillPayment(
        c.get('store'),
        {
          billId: toBillId(c.req.param('id')),
          amount: body.amount,
          ...(body.paymentDate !== undefined ? { paymentDate: body.paymentDate } : {}),
          ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
          ...(body.method !== undefined ? { method: body.method } : {}),
          ...(body.reference !== undefined ? { reference: body.reference } : {}),
          ...(body.notes !== undefined ? { notes: body.notes } : {}),
        },
        serviceContext(c),
      )
      if (result.status === 'paid') {
        const notifier = c.get('notifier')
        await notifySafely('billPaid', () => notifier.billPaid({ bill: result.bill }))
      }
      return respond(c, { data: { ...result, bill: withBalances(result.bill) } }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

billsHandler.patch(
  '/payments/:paymentId',
  validator('json', (value, c) => {
    const r = UpdateBillPaymentBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const result = await updateBillPayment(
        c.get('store'),
        toBillPaymentId(c.req.param('paymentId')),
        {
          ...(body.amount !== undefined ? { amount: body.amount } : {}),
          ...(body.paymentDate !== undefined ? { paymentDate: body.paymentDate } : {}),
          ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
          ...(body.method !== undefined ? { method: body.method } : {}),
          ...(body.reference !== undefined ? { reference: body.reference } : {}),
          ...(body.notes !== undefined ? { notes: body.notes } : {}),
        },
        serviceContext(c),
      )
      return respond(c, { data: { ...result, bill: withBalances(result.bill) } })
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)
