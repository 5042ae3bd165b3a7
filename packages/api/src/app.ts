import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import { logger } from 'hono/logger'
import type { UserOperations } from '@user-registry/domain'
import type { AppEnv } from './types'
import { bearerAuth } from './middleware/auth'
import { usersHandler } from './handlers/users'
import { serverErrorResponse } from './lib/responses'

export interface AppDeps {
  /** Policy every /users handler delegates to. */
  users: UserOperations
  /** HS256 secret; when null, /users is open. */
  authSecret?: string | null
  /** Per-request access log via hono/logger. */
  logRequests?: boolean
}

/**
 * Builds the HTTP surface. Trailing slashes are optional on every route, so
 * `/users/` and `/users` are the same endpoint.
 */
export function createApp({ users, authSecret = null, logRequests = true }: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>({ strict: false })

  // -------------------------------------------------------------------------
  // Global middleware (applies to all routes including /health)
  // -------------------------------------------------------------------------
  if (logRequests) app.use('*', logger())
  app.use('*', cors())

  // -------------------------------------------------------------------------
  // Public routes — never authenticated
  // -------------------------------------------------------------------------
  app.get('/health', (c) => c.json({ status: 'ok' as const }))

  // -------------------------------------------------------------------------
  // User API. '/users/*' also matches '/users' itself.
  // -------------------------------------------------------------------------
  app.use('/users/*', async (c, next) => {
    c.set('users', users)
    await next()
  })
  if (authSecret !== null) app.use('/users/*', bearerAuth(authSecret))
  app.route('/users', usersHandler)

  // -------------------------------------------------------------------------
  // Fallbacks
  // -------------------------------------------------------------------------
  app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404))

  app.onError((err, c) => {
    // hono/validator raises 400 for a body that is not valid JSON.
    if (err instanceof HTTPException) {
      const code = err.status === 400 ? 'VALIDATION_ERROR' : 'HTTP_ERROR'
      return c.json({ error: err.message, code }, err.status)
    }
    return serverErrorResponse(c, err)
  })

  return app
}
