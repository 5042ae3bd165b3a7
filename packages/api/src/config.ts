// ---------------------------------------------------------------------------
// Runtime configuration
//
// The environment is parsed once, at startup, into an AppConfig struct that
// is passed explicitly to the store and the app factory. Nothing else in the
// package reads process.env.
//
//   PORT                        HTTP port (default 3000)
//   USER_STORE                  "mongo" (default) or "memory"
//   MONGO_URI / MONGO_DB        required when USER_STORE=mongo
//   MONGO_COLLECTION            collection name (default "users")
//   MONGO_ALLOW_LOCAL_FALLBACK  opt-in: use localhost when the URI host does not resolve
//   STORE_TIMEOUT_MS            deadline per store call (default 5000)
//   AUTH_JWT_SECRET             when set, /users requires an HS256 bearer token
//   NODE_ENV                    development | production | test
// ---------------------------------------------------------------------------

import { z } from 'zod'
import { DEFAULT_STORE_TIMEOUT_MS } from '@user-registry/domain'

const TRUTHY = new Set(['1', 'true', 'yes', 'on'])

const flag = z
  .string()
  .optional()
  .transform((v) => TRUTHY.has((v ?? '').trim().toLowerCase()))

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
    USER_STORE: z.enum(['mongo', 'memory']).default('mongo'),
    MONGO_URI: z.string().optional(),
    MONGO_DB: z.string().optional(),
    MONGO_COLLECTION: z.string().default('users'),
    MONGO_ALLOW_LOCAL_FALLBACK: flag,
    STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_STORE_TIMEOUT_MS),
    AUTH_JWT_SECRET: z.string().optional(),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .superRefine((env, ctx) => {
    if (env.USER_STORE !== 'mongo') return
    if (env.MONGO_URI === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['MONGO_URI'], message: 'Required when USER_STORE=mongo' })
    }
    if (env.MONGO_DB === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['MONGO_DB'], message: 'Required when USER_STORE=mongo' })
    }
  })

export interface MongoStoreConfig {
  readonly kind: 'mongo'
  readonly uri: string
  readonly dbName: string
  readonly collection: string
  /** Swap an unresolvable URI host for localhost. Off unless explicitly enabled. */
  readonly allowLocalFallback: boolean
}

export interface MemoryStoreConfig {
  readonly kind: 'memory'
}

export type StoreConfig = MongoStoreConfig | MemoryStoreConfig

export interface AppConfig {
  readonly port: number
  readonly store: StoreConfig
  readonly storeTimeoutMs: number
  /** HS256 secret for bearer tokens; null leaves /users open. */
  readonly authSecret: string | null
  readonly nodeEnv: 'development' | 'production' | 'test'
}

export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

/**
 * Builds an AppConfig from environment variables. Empty strings count as
 * unset.
 *
 * @throws {ConfigError} listing every invalid or missing variable.
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''))
  const parsed = EnvSchema.safeParse(present)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`))
  }
  const e = parsed.data

  let store: StoreConfig
  if (e.USER_STORE === 'mongo' && e.MONGO_URI !== undefined && e.MONGO_DB !== undefined) {
    store = {
      kind: 'mongo',
      uri: e.MONGO_URI,
      dbName: e.MONGO_DB,
      collection: e.MONGO_COLLECTION,
      allowLocalFallback: e.MONGO_ALLOW_LOCAL_FALLBACK,
    }
  } else {
    store = { kind: 'memory' }
  }

  return {
    port: e.PORT,
    store,
    storeTimeoutMs: e.STORE_TIMEOUT_MS,
    authSecret: e.AUTH_JWT_SECRET ?? null,
    nodeEnv: e.NODE_ENV,
  }
}
