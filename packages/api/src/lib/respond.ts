import type { Context } from 'hono'
import { Decimal } from 'decimal.js'
import { formatAmount } from '@studioledger/domain'
import type { AppEnv } from '../types'
import type { ServiceContext } from '../services/context'

// JSON.stringify calls Decimal#toJSON before the replacer runs, so the
// replacer looks the original value up on its holder.
function amountReplacer(this: unknown, key: string, value: unknown): unknown {
  const raw: unknown = typeof this === 'object' && this !== null ? Reflect.get(this, key) : undefined
  return Decimal.isDecimal(raw) ? formatAmount(raw) : value
}

/** Serialises a success body with every amount as a fixed 2-dp string. */
export function respond(c: Pick<Context, 'header' | 'body'>, body: unknown, status: 200 | 201 = 200): Response {
  c.header('Content-Type', 'application/json; charset=UTF-8')
  return c.body(JSON.stringify(body, amountReplacer), status)
}

export function serviceContext(c: Pick<Context<AppEnv>, 'get'>): ServiceContext {
  return {
    today: c.get('today'),
    actorId: c.get('actor').id,
    receiptPrefix: c.get('config').receiptPrefix,
  }
}
