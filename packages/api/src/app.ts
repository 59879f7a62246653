import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import { todayIn } from '@studioledger/domain'
import type { AppDeps, AppEnv } from './types'
import { actorMiddleware, requireCapability } from './middleware/actor'
import { invoicesHandler } from './handlers/invoices'
import { advancesHandler } from './handlers/advances'
import { billsHandler } from './handlers/bills'
import { expenseClaimsHandler } from './handlers/expense-claims'
import { ledgerHandler } from './handlers/ledger'
import { recurringRulesHandler } from './handlers/recurring-rules'

/**
 * Builds the HTTP application around its dependencies. The Lambda entry point
 * passes the pg-backed store; tests pass an in-memory one.
 */
export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>()

  // -------------------------------------------------------------------------
  // Global middleware (applies to all routes including /health)
  // -------------------------------------------------------------------------
  app.use('*', logger())
  app.use('*', cors())
  app.use('*', async (c, next) => {
    c.set('store', deps.store)
    c.set('permissions', deps.permissions)
    c.set('notifier', deps.notifier)
    c.set('config', deps.config)
    c.set('today', deps.today?.() ?? todayIn(deps.config.businessTimeZone))
    await next()
  })

  // -------------------------------------------------------------------------
  // Public routes: no actor required
  // -------------------------------------------------------------------------
  app.get('/health', (c) => {
    return c.json({ status: 'ok' as const, timestamp: new Date().toISOString() })
  })

  // -------------------------------------------------------------------------
  // Actor-protected API: every route under /api/v1 needs X-Actor-Id and
  // X-Actor-Role. Invoices need the `invoices` capability; every other
  // finance surface needs `finance`.
  // -------------------------------------------------------------------------
  const v1 = new Hono<AppEnv>()
  v1.use('*', actorMiddleware)

  v1.use('/invoices/*', requireCapability('invoices'))
  v1.route('/invoices', invoicesHandler)

  for (const path of ['/advances', '/bills', '/expense-claims', '/ledger', '/recurring-rules']) {
    v1.use(`${path}/*`, requireCapability('finance'))
  }
  v1.route('/advances', advancesHandler)
  v1.route('/bills', billsHandler)
  v1.route('/expense-claims', expenseClaimsHandler)
  v1.route('/ledger', ledgerHandler)
  v1.route('/recurring-rules', recurringRulesHandler)

  app.route('/api/v1', v1)

  // -------------------------------------------------------------------------
  // 404 fallback
  // -------------------------------------------------------------------------
  app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404))

  return app
}
