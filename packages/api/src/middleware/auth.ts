// ---------------------------------------------------------------------------
// Bearer authentication middleware
//
// Verifies an HS256 JWT supplied in the Authorization: Bearer header against
// the configured shared secret. Issuing tokens is someone else's job; this
// only checks them.
//
// On failure, returns 401. Error responses never leak verification details.
// ---------------------------------------------------------------------------

import type { Context, MiddlewareHandler, Next } from 'hono'
import { errors, jwtVerify } from 'jose'
import type { AppEnv } from '../types'

/** Builds the middleware for a given shared secret. */
export function bearerAuth(secret: string): MiddlewareHandler<AppEnv> {
  const key = new TextEncoder().encode(secret)

  return async (c: Context<AppEnv>, next: Next): Promise<Response | void> => {
    const authHeader = c.req.header('Authorization')
    if (!authHeader?.startsWith('Bearer ')) {
      return c.json({ error: 'Missing or malformed Authorization header', code: 'UNAUTHORIZED' }, 401)
    }
    const token = authHeader.slice(7)

    try {
      await jwtVerify(token, key, { algorithms: ['HS256'] })
    } catch (err) {
      if (err instanceof errors.JWTExpired) {
        return c.json({ error: 'Token has expired', code: 'TOKEN_EXPIRED' }, 401)
      }
      return c.json({ error: 'Invalid or unverifiable token', code: 'UNAUTHORIZED' }, 401)
    }

    await next()
  }
}
