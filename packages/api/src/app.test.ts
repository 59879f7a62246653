/**
 * HTTP tests for the finance routes.
 *
 * The app runs against the in-memory store, so no database is required.
 * These tests cover status codes, response shapes, request validation and
 * amount serialisation end to end.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { buildPermissionTable, toIsoDate } from '@studioledger/domain'
import { createApp } from './app'
import { loadConfig } from './config'
import type { SettlementNotifier } from './services/notifier'
import { createMemoryStore, type MemoryStore } from './__tests__/memory-store'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let store: MemoryStore
let notifier: SettlementNotifier

function buildApp() {
  return createApp({
    store,
    permissions: buildPermissionTable(),
    notifier,
    config: loadConfig({ NODE_ENV: 'test' }),
    today: () => toIsoDate('2024-03-10'),
  })
}

type Init = { method?: string; headers?: Record<string, string>; body?: string }

function asActor(role: string, init: Init = {}): RequestInit {
  return { ...init, headers: { 'X-Actor-Id': 'user-9', 'X-Actor-Role': role, ...init.headers } }
}

function postJson(role: string, body: unknown): RequestInit {
  return asActor(role, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  })
}

async function json(res: Response): Promise<Record<string, unknown>> {
  return (await res.json()) as Record<string, unknown>
}

beforeEach(() => {
  store = createMemoryStore()
  store.seedProject({ id: 'project-1', code: 'NVRT', clientId: 'client-1' })
  notifier = {
    paymentRecorded: vi.fn(async () => undefined),
    receiptGenerated: vi.fn(async () => undefined),
    billPaid: vi.fn(async () => undefined),
    advanceApplied: vi.fn(async () => undefined),
    claimPaid: vi.fn(async () => undefined),
  }
})

afterEach(() => {
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Public routes
// ---------------------------------------------------------------------------

describe('GET /health', () => {
  it('answers without an actor', async () => {
    const res = await buildApp().request('/health')
    expect(res.status).toBe(200)
    expect((await json(res))['status']).toBe('ok')
  })
})

describe('unknown routes', () => {
  it('returns 404 NOT_FOUND', async () => {
    const res = await buildApp().request('/nowhere')
    expect(res.status).toBe(404)
    expect(await json(res)).toEqual({ error: 'Not found', code: 'NOT_FOUND' })
  })
})

// ---------------------------------------------------------------------------
// Access
// ---------------------------------------------------------------------------

describe('access control', () => {
  it('returns 401 ACTOR_REQUIRED without an actor id', async () => {
    const res = await buildApp().request('/api/v1/bills/aging')
    expect(res.status).toBe(401)
    expect((await json(res))['code']).toBe('ACTOR_REQUIRED')
  })

  it('returns 401 ACTOR_INVALID for a role nobody holds', async () => {
    const res = await buildApp().request('/api/v1/bills/aging', asActor('wizard'))
    expect(res.status).toBe(401)
    expect((await json(res))['code']).toBe('ACTOR_INVALID')
  })

  it('returns 403 FORBIDDEN when the role lacks the capability', async () => {
    const res = await buildApp().request('/api/v1/ledger/transactions', asActor('designer'))
    expect(res.status).toBe(403)
    expect(await json(res)).toEqual({ error: 'Missing capability: finance', code: 'FORBIDDEN' })
  })

  it('lets a managing director read the cashbook but not invoices', async () => {
    const app = buildApp()
    expect((await app.request('/api/v1/ledger/transactions', asActor('managing_director'))).status).toBe(200)
    expect((await app.request('/api/v1/invoices/aging', asActor('managing_director'))).status).toBe(403)
  })
})

// ---------------------------------------------------------------------------
// Invoices and payments
// ---------------------------------------------------------------------------

describe('POST /api/v1/invoices', () => {
  it('returns 400 VALIDATION_ERROR when the due date is missing', async () => {
    const res = await buildApp().request('/api/v1/invoices', postJson('finance', { projectId: 'project-1' }))
    expect(res.status).toBe(400)
    expect((await json(res))['code']).toBe('VALIDATION_ERROR')
  })

  it('reports service rule failures as details', async () => {
    const res = await buildApp().request('/api/v1/invoices', postJson('finance', { dueDate: '2024-03-31', amount: 10 }))
    expect(res.status).toBe(400)
    const body = await json(res)
    expect(body['code']).toBe('VALIDATION_ERROR')
    expect(body['details']).toEqual(['Select a project or a lead to bill.'])
  })

  it('creates a numbered draft with its valuation as 2-dp strings', async () => {
    const res = await buildApp().request(
      '/api/v1/invoices',
      postJson('finance', { projectId: 'project-1', dueDate: '2024-03-31', amount: 1000, taxPercent: '10' }),
    )
    expect(res.status).toBe(201)
    const data = (await json(res))['data'] as Record<string, unknown>
    expect(data['invoiceNumber']).toBe('INV-202403-001')
    expect(data['status']).toBe('draft')
    expect(data['amount']).toBe('1000.00')
    const valuation = data['valuation'] as Record<string, unknown>
    expect(valuation['totalWithTax']).toBe('1100.00')
    expect(valuation['outstanding']).toBe('1100.00')
  })
})

describe('POST /api/v1/invoices/:id/payments', () => {
  async function createInvoice(app: ReturnType<typeof buildApp>): Promise<string> {
    const res = await app.request(
      '/api/v1/invoices',
      postJson('finance', { projectId: 'project-1', dueDate: '2024-03-31', amount: 1000, taxPercent: 10 }),
    )
    const data = (await json(res))['data'] as Record<string, unknown>
    return String(data['id'])
  }

  it('settles the invoice, issues a receipt and posts the cashbook row', async () => {
    const app = buildApp()
    const id = await createInvoice(app)

    const res = await app.request(`/api/v1/invoices/${id}/payments`, postJson('finance', { amount: '1100' }))

    expect(res.status).toBe(201)
    const data = (await json(res))['data'] as Record<string, unknown>
    expect(data['status']).toBe('paid')
    expect((data['payment'] as Record<string, unknown>)['amount']).toBe('1100.00')
    expect((data['receipt'] as Record<string, unknown>)['receiptNumber']).toBe('RCT-NVRT-20240310-001')
    expect((data['ledgerEntry'] as Record<string, unknown>)['credit']).toBe('1100.00')
    expect(notifier.paymentRecorded).toHaveBeenCalledTimes(1)
    expect(notifier.receiptGenerated).toHaveBeenCalledTimes(1)

    const cashbook = await app.request('/api/v1/ledger/transactions', asActor('accountant'))
    const rows = (await json(cashbook))['data'] as Record<string, unknown>[]
    expect(rows.map((row) => row['category'])).toEqual(['client_payment'])
  })

  it('returns 400 when the payment exceeds the outstanding balance', async () => {
    const app = buildApp()
    const id = await createInvoice(app)

    const res = await app.request(`/api/v1/invoices/${id}/payments`, postJson('finance', { amount: 1100.01 }))

    expect(res.status).toBe(400)
    expect((await json(res))['details']).toEqual(['Cannot record more than the outstanding balance (1100.00).'])
    expect(store.ledgerRows()).toHaveLength(0)
    expect(notifier.paymentRecorded).not.toHaveBeenCalled()
  })

  it('still answers 201 when a notification fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    vi.mocked(notifier.paymentRecorded).mockRejectedValueOnce(new Error('mail relay down'))
    const app = buildApp()
    const id = await createInvoice(app)

    const res = await app.request(`/api/v1/invoices/${id}/payments`, postJson('finance', { amount: 500 }))

    expect(res.status).toBe(201)
    expect(((await json(res))['data'] as Record<string, unknown>)['status']).toBe('sent')
  })

  it('returns 404 for an unknown invoice', async () => {
    const res = await buildApp().request('/api/v1/invoices/invoice-404/payments', postJson('finance', { amount: 5 }))
    expect(res.status).toBe(404)
    expect(await json(res)).toEqual({ error: 'Invoice not found', code: 'NOT_FOUND' })
  })
})

// ---------------------------------------------------------------------------
// Manual cashbook rows
// ---------------------------------------------------------------------------

describe('/api/v1/ledger/transactions', () => {
  it('posts a hand-entered row and lets it be edited', async () => {
    const app = buildApp()
    const created = await app.request(
      '/api/v1/ledger/transactions',
      postJson('accountant', { description: 'Courier charges', category: 'office_expense', direction: 'debit', amount: '250' }),
    )
    expect(created.status).toBe(201)
    const entry = (await json(created))['data'] as Record<string, unknown>
    expect(entry['debit']).toBe('250.00')
    expect(entry['date']).toBe('2024-03-10')
    expect(entry['recordedBy']).toBe('user-9')

    const res = await app.request(
      `/api/v1/ledger/transactions/${String(entry['id'])}`,
      asActor('accountant', {
        method: 'PATCH',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ amount: 275, remarks: 'two parcels' }),
      }),
    )

    expect(res.status).toBe(200)
    const data = (await json(res))['data'] as Record<string, unknown>
    expect(data['debit']).toBe('275.00')
    expect(data['remarks']).toBe('two parcels')
  })

  it('returns 400 for an unknown category', async () => {
    const res = await buildApp().request(
      '/api/v1/ledger/transactions',
      postJson('accountant', { description: 'Tea', category: 'snacks', direction: 'debit', amount: 40 }),
    )
    expect(res.status).toBe(400)
    expect((await json(res))['code']).toBe('VALIDATION_ERROR')
    expect(store.ledgerRows()).toHaveLength(0)
  })

  it('returns 422 when editing a row posted from a payment', async () => {
    const app = buildApp()
    const invoice = await app.request(
      '/api/v1/invoices',
      postJson('finance', { projectId: 'project-1', dueDate: '2024-03-31', amount: 1000 }),
    )
    const invoiceId = String(((await json(invoice))['data'] as Record<string, unknown>)['id'])
    const paid = await app.request(`/api/v1/invoices/${invoiceId}/payments`, postJson('finance', { amount: 100 }))
    const ledgerEntry = ((await json(paid))['data'] as Record<string, unknown>)['ledgerEntry'] as Record<string, unknown>

    const res = await app.request(
      `/api/v1/ledger/transactions/${String(ledgerEntry['id'])}`,
      asActor('accountant', {
        method: 'PATCH',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ amount: 1 }),
      }),
    )

    expect(res.status).toBe(422)
    expect(await json(res)).toEqual({
      error: 'Entries posted from a payment or rule cannot be edited here.',
      code: 'PRECONDITION_FAILED',
    })
  })
})

// ---------------------------------------------------------------------------
// Recurring rules
// ---------------------------------------------------------------------------

describe('POST /api/v1/recurring-rules/run', () => {
  it('posts the due periods for the business date', async () => {
    const app = buildApp()
    const created = await app.request(
      '/api/v1/recurring-rules',
      postJson('accountant', {
        name: 'Studio rent',
        direction: 'debit',
        category: 'office_expense',
        amount: 45000,
        dayOfMonth: 28,
        nextRunDate: '2024-02-28',
      }),
    )
    expect(created.status).toBe(201)

    const res = await app.request('/api/v1/recurring-rules/run', asActor('accountant', { method: 'POST' }))

    expect(res.status).toBe(200)
    expect((await json(res))['data']).toEqual({ created: 1, runDate: '2024-03-10' })
  })
})
