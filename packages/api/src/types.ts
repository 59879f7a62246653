// ---------------------------------------------------------------------------
// Hono application types
// ---------------------------------------------------------------------------

import type { Actor, IsoDate, PermissionTable } from '@studioledger/domain'
import type { AppConfig } from './config'
import type { SettlementNotifier } from './services/notifier'
import type { FinanceStore } from './store'

/**
 * Everything the app needs from the outside world. Built once by the entry
 * point (or a test) and passed to `createApp`.
 */
export type AppDeps = {
  store: FinanceStore
  /** Resolved once at start-up; never rebuilt per request. */
  permissions: PermissionTable
  notifier: SettlementNotifier
  config: AppConfig
  /** The business date. Defaults to today in `config.businessTimeZone`. */
  today?: () => IsoDate
}

/**
 * Variables injected into Hono context. `store`, `notifier`, `config` and
 * `today` are set for every request; `actor` is set by the actor middleware on
 * every route under /api/v1, which aborts with 401 before reaching the handler
 * when the caller cannot be identified.
 */
export type AppVariables = {
  store: FinanceStore
  permissions: PermissionTable
  notifier: SettlementNotifier
  config: AppConfig
  today: IsoDate
  actor: Actor
}

/** Hono environment type used when constructing the app and all sub-routers. */
export type AppEnv = { Variables: AppVariables }
