// ---------------------------------------------------------------------------
// Application errors
//
// Services throw these; handlers translate them into the `{ error, code }`
// JSON body used by every route. Anything else becomes a 500.
// ---------------------------------------------------------------------------

import type { Context } from 'hono'

export type ErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'CONFLICT' | 'PRECONDITION_FAILED'

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly status: 400 | 404 | 409 | 422
}

/** Input failed a domain rule before anything was written. */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const
  readonly status = 400 as const

  constructor(readonly messages: readonly string[]) {
    super(messages.join(' '))
    this.name = 'ValidationError'
  }
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const
  readonly status = 404 as const

  constructor(entity: string) {
    super(`${entity} not found`)
    this.name = 'NotFoundError'
  }
}

export class ConflictError extends AppError {
  readonly code = 'CONFLICT' as const
  readonly status = 409 as const

  constructor(message: string) {
    super(message)
    this.name = 'ConflictError'
  }
}

/** The target exists but is not in a state that allows the operation. */
export class PreconditionError extends AppError {
  readonly code = 'PRECONDITION_FAILED' as const
  readonly status = 422 as const

  constructor(message: string) {
    super(message)
    this.name = 'PreconditionError'
  }
}

/**
 * Maps a thrown value to the JSON error response. Unknown errors are logged
 * and reported without detail.
 */
export function errorResponse(c: Pick<Context, 'json'>, err: unknown): Response {
  if (err instanceof ValidationError) {
    return c.json({ error: err.message, code: err.code, details: err.messages }, err.status)
  }
  if (err instanceof AppError) {
    return c.json({ error: err.message, code: err.code }, err.status)
  }
  console.error('[api] unhandled error', err)
  return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500)
}
