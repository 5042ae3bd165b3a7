// ---------------------------------------------------------------------------
// Error → HTTP response mapping shared by all handlers
// ---------------------------------------------------------------------------

import type { Context } from 'hono'
import type { ZodError } from 'zod'
import { StoreTimeoutError, type UserError } from '@user-registry/domain'

/** 400 / 409 / 404 for the errors a MutationPolicy returns. */
export function userErrorResponse(c: Context, error: UserError): Response {
  switch (error.code) {
    case 'VALIDATION_ERROR':
      return c.json(
        { error: error.message, code: error.code, details: error.details.map((d) => ({ ...d })) },
        400,
      )
    case 'CONFLICT':
      return c.json({ error: error.message, code: error.code }, 409)
    case 'NOT_FOUND':
      return c.json({ error: 'User not found', code: error.code }, 404)
  }
}

/** 400 for a request body that does not have the expected shape. */
export function shapeErrorResponse(c: Context, error: ZodError): Response {
  const details = error.issues.map((i) => ({ field: i.path.join('.') || 'body', message: i.message }))
  return c.json(
    { error: details.map((d) => `${d.field}: ${d.message}`).join('; '), code: 'VALIDATION_ERROR', details },
    400,
  )
}

/**
 * 504 when the store missed its deadline, 500 for anything else. The cause is
 * logged server-side and never returned to the caller.
 */
export function serverErrorResponse(c: Context, err: unknown): Response {
  if (err instanceof StoreTimeoutError) {
    console.error(`${c.req.method} ${c.req.path}: ${err.message}`)
    return c.json({ error: 'Store did not respond in time', code: 'STORE_TIMEOUT' }, 504)
  }
  console.error(`${c.req.method} ${c.req.path}: unexpected error`, err)
  return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500)
}
