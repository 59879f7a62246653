// ---------------------------------------------------------------------------
// Actor middleware
//
// Identifies the staff member making the request from the X-Actor-Id and
// X-Actor-Role headers, which an authenticating gateway sets in front of this
// service. Populates `actor` in the Hono context; requests without a usable
// identity abort with 401.
// ---------------------------------------------------------------------------

import type { Context, MiddlewareHandler, Next } from 'hono'
import type { Capability } from '@studioledger/domain'
import { hasCapability, isRole, toUserId } from '@studioledger/domain'
import type { AppEnv } from '../types'

export async function actorMiddleware(c: Context<AppEnv>, next: Next): Promise<Response | void> {
  const id = c.req.header('x-actor-id')?.trim() ?? ''
  const role = c.req.header('x-actor-role')?.trim().toLowerCase() ?? ''

  if (!id) {
    return c.json({ error: 'X-Actor-Id header is required', code: 'ACTOR_REQUIRED' }, 401)
  }
  if (!isRole(role)) {
    return c.json({ error: `Unknown role: ${role || '(none)'}`, code: 'ACTOR_INVALID' }, 401)
  }

  c.set('actor', {
    id: toUserId(id),
    role,
    isSuperuser: c.req.header('x-actor-superuser') === 'true',
  })
  await next()
}

/**
 * Rejects with 403 unless the actor's role holds `capability` in the
 * permission table the app was built with.
 */
export function requireCapability(capability: Capability): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (!hasCapability(c.get('permissions'), c.get('actor'), capability)) {
      return c.json({ error: `Missing capability: ${capability}`, code: 'FORBIDDEN' }, 403)
    }
    await next()
  }
}
