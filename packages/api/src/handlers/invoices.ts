// ---------------------------------------------------------------------------
// Invoices handler: invoices, client payments, receipts, advance allocation
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { Invoice } from '@studioledger/domain'
import {
  INVOICE_STATUSES,
  toAccountId,
  toClientAdvanceId,
  toInvoiceId,
  toLeadId,
  toPaymentId,
  toProjectId,
  toUserId,
  valueInvoice,
} from '@studioledger/domain'
import type { AppEnv } from '../types'
import { errorResponse } from '../lib/errors'
import { respond, serviceContext } from '../lib/respond'
import { notifySafely } from '../services/notifier'
import { invoiceAging } from '../services/aging'
import { refreshInvoiceStatus } from '../services/status'
import {
  allocateAdvance,
  createInvoice,
  deleteInvoice,
  generateReceipt,
  getInvoiceSummary,
  recordPayment,
  updatePayment,
} from '../services/invoices'
import { AmountField, DateField, IdField, TextField, pageParams } from './schemas'

const InvoiceLineBody = z.object({
  description: TextField,
  quantity: AmountField.default(1),
  unitPrice: AmountField,
})

const CreateInvoiceBody = z.object({
  invoiceNumber: TextField.optional(),
  projectId: IdField.optional(),
  leadId: IdField.optional(),
  invoiceDate: DateField.optional(),
  dueDate: DateField,
  amount: AmountField.optional(),
  taxPercent: AmountField.optional(),
  discountPercent: AmountField.optional(),
  status: z.enum(['draft', 'sent']).optional(),
  description: TextField.optional(),
  lines: z.array(InvoiceLineBody).optional(),
})

const PaymentFields = {
  amount: AmountField,
  paymentDate: DateField.optional(),
  accountId: IdField.optional(),
  method: TextField.max(50).optional(),
  reference: TextField.max(100).optional(),
  notes: TextField.optional(),
  receivedBy: IdField.optional(),
}

const RecordPaymentBody = z.object({ ...PaymentFields, generateReceipt: z.boolean().optional() })

const UpdatePaymentBody = z.object(PaymentFields).partial()

const AllocateBody = z.object({
  advanceId: IdField,
  amount: AmountField,
  notes: TextField.optional(),
})

function withValuation(invoice: Invoice) {
  return { ...invoice, valuation: valueInvoice(invoice) }
}

export const invoicesHandler = new Hono<AppEnv>()

invoicesHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateInvoiceBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const invoice = await createInvoice(
        c.get('store'),
        {
          dueDate: body.dueDate,
          ...(body.invoiceNumber !== undefined ? { invoiceNumber: body.invoiceNumber } : {}),
          ...(body.projectId !== undefined ? { projectId: toProjectId(body.projectId) } : {}),
          ...(body.leadId !== undefined ? { leadId: toLeadId(body.leadId) } : {}),
          ...(body.invoiceDate !== undefined ? { invoiceDate: body.invoiceDate } : {}),
          ...(body.amount !== undefined ? { amount: body.amount } : {}),
          ...(body.taxPercent !== undefined ? { taxPercent: body.taxPercent } : {}),
          ...(body.discountPercent !== undefined ? { discountPercent: body.discountPercent } : {}),
          ...(body.status !== undefined ? { status: body.status } : {}),
          ...(body.description !== undefined ? { description: body.description } : {}),
          ...(body.lines !== undefined ? { lines: body.lines } : {}),
        },
        serviceContext(c),
      )
      return respond(c, { data: withValuation(invoice) }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

invoicesHandler.get('/', async (c) => {
  const { limit, offset } = pageParams((name) => c.req.query(name))
  const rawStatus = c.req.query('status')
  const status = INVOICE_STATUSES.find((s) => s === rawStatus)
  if (rawStatus !== undefined && status === undefined) {
    return c.json({ error: `Unknown status: ${rawStatus}`, code: 'VALIDATION_ERROR' }, 400)
  }
  try {
    const invoices = await c.get('store').invoices.list({ limit, offset, ...(status ? { status } : {}) })
    return respond(c, { data: invoices.map(withValuation), meta: { count: invoices.length, limit, offset } })
  } catch (err) {
    return errorResponse(c, err)
  }
})

invoicesHandler.get('/aging', async (c) => {
  try {
    return respond(c, { data: await invoiceAging(c.get('store'), c.get('today')) })
  } catch (err) {
    return errorResponse(c, err)
  }
})

invoicesHandler.get('/:id', async (c) => {
  try {
    const summary = await getInvoiceSummary(c.get('store'), toInvoiceId(c.req.param('id')), c.get('today'))
    return respond(c, {
      data: { ...summary.invoice, valuation: summary.valuation, currentStatus: summary.status },
    })
  } catch (err) {
    return errorResponse(c, err)
  }
})

invoicesHandler.delete('/:id', async (c) => {
  try {
    await deleteInvoice(c.get('store'), toInvoiceId(c.req.param('id')))
    return c.body(null, 204)
  } catch (err) {
    return errorResponse(c, err)
  }
})

invoicesHandler.post('/:id/refresh-status', async (c) => {
  const id = toInvoiceId(c.req.param('id'))
  try {
    const status = await refreshInvoiceStatus(c.get('store'), id, { save: true, today: c.get('today') })
    return respond(c, { data: { id, status } })
  } catch (err) {
    return errorResponse(c, err)
  }
})

invoicesHandler.post(
  '/:id/payments',
  validator('json', (value, c) => {
    const r = RecordPaymentBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const result = await recordPayment(
        c.get('store'),
        {
          invoiceId: toInvoiceId(c.req.param('id')),
          amount: body.amount,
          ...(body.paymentDate !== undefined ? { paymentDate: body.paymentDate } : {}),
          ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
          ...(body.method !== undefined ? { method: body.method } : {}),
          ...(body.reference !== undefined ? { reference: body.reference } : {}),
          ...(body.notes !== undefined ? { notes: body.notes } : {}),
          ...(body.receivedBy !== undefined ? { receivedBy: toUserId(body.receivedBy) } : {}),
          ...(body.generateReceipt !== undefined ? { generateReceipt: body.generateReceipt } : {}),
        },
        serviceContext(c),
      )

      const notifier = c.get('notifier')
      await notifySafely('paymentRecorded', () =>
        notifier.paymentRecorded({ payment: result.payment, invoice: result.invoice }),
      )
      const { receipt } = result
      if (receipt) {
        await notifySafely('receiptGenerated', () => notifier.receiptGenerated({ receipt }))
      }
      return respond(c, { data: { ...result, invoice: withValuation(result.invoice) } }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

invoicesHandler.patch(
  '/payments/:paymentId',
  validator('json', (value, c) => {
    const r = UpdatePaymentBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const result = await updatePayment(
        c.get('store'),
        toPaymentId(c.req.param('paymentId')),
        {
          ...(body.amount !== undefined ? { amount: body.amount } : {}),
          ...(body.paymentDate !== undefined ? { paymentDate: body.paymentDate } : {}),
          ...(body.accountId !== undefined ? { accountId: toAccountId(body.accountId) } : {}),
          ...(body.method !== undefined ? { method: body.method } : {}),
          ...(body.reference !== undefined ? { reference: body.reference } : {}),
          ...(body.notes !== undefined ? { notes: body.notes } : {}),
          ...(body.receivedBy !== undefined ? { receivedBy: toUserId(body.receivedBy) } : {}),
        },
        serviceContext(c),
      )
      return respond(c, { data: { ...result, invoice: withValuation(result.invoice) } })
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

invoicesHandler.post('/payments/:paymentId/receipt', async (c) => {
  try {
    const { receipt, created } = await generateReceipt(
      c.get('store'),
      toPaymentId(c.req.param('paymentId')),
      serviceContext(c),
    )
    if (created) {
      const notifier = c.get('notifier')
      await notifySafely('receiptGenerated', () => notifier.receiptGenerated({ receipt }))
    }
    return respond(c, { data: receipt, meta: { created } }, created ? 201 : 200)
  } catch (err) {
    return errorResponse(c, err)
  }
})

invoicesHandler.post(
  '/:id/allocations',
  validator('json', (value, c) => {
    const r = AllocateBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const result = await allocateAdvance(
        c.get('store'),
        {
          invoiceId: toInvoiceId(c.req.param('id')),
          advanceId: toClientAdvanceId(body.advanceId),
          amount: body.amount,
          ...(body.notes !== undefined ? { notes: body.notes } : {}),
        },
        serviceContext(c),
      )
      const notifier = c.get('notifier')
      await notifySafely('advanceApplied', () =>
        notifier.advanceApplied({ allocation: result.allocation, invoice: result.invoice }),
      )
      return respond(c, { data: { ...result, invoice: withValuation(result.invoice) } }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)
