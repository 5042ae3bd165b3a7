// ---------------------------------------------------------------------------
// Hono application types
// ---------------------------------------------------------------------------

import type { UserOperations } from '@user-registry/domain'

/**
 * Variables injected into Hono context for every route under /users.
 * Handlers never construct the policy themselves; createApp sets it once per
 * request so tests can swap in a policy over any store.
 */
export type AppVariables = {
  /** The mutation policy all user handlers delegate to. */
  users: UserOperations
}

/** Hono environment type used when constructing the app and all sub-routers. */
export type AppEnv = { Variables: AppVariables }

/** Body of every non-2xx JSON response. */
export type ErrorBody = {
  error: string
  code: string
  details?: { field: string; message: string }[]
}
