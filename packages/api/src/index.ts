// ---------------------------------------------------------------------------
// @user-registry/api — public API (the server entry lives in server.ts)
// ---------------------------------------------------------------------------

export { createApp, type AppDeps } from './app'
export { loadConfig, ConfigError, type AppConfig, type StoreConfig, type MongoStoreConfig } from './config'
export { openStore, connectMongoStore, type OpenStore } from './db'
export { MongoUserStore, type UserDocument } from './repositories/user.repository'
export type { AppEnv, ErrorBody } from './types'
