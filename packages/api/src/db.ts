import { MongoClient } from 'mongodb'
import { InMemoryUserStore, type UserStore } from '@user-registry/domain'
import type { AppConfig, MongoStoreConfig } from './config'
import { resolveMongoUri, type HostLookup } from './lib/resolve-host'
import { MongoUserStore, type UserDocument } from './repositories/user.repository'

// ---------------------------------------------------------------------------
// Store wiring
//
// One MongoClient per process, created from the explicit store config. The
// memory store needs no connection and is used for local runs and tests.
// ---------------------------------------------------------------------------

export interface OpenStore {
  readonly store: UserStore
  /** Releases the connection pool, if any. */
  close(): Promise<void>
}

/** Connects to MongoDB and returns a store bound to the configured collection. */
export async function connectMongoStore(
  config: MongoStoreConfig,
  timeoutMs: number,
  lookupHost?: HostLookup,
): Promise<OpenStore> {
  const uri = await resolveMongoUri(config.uri, config.allowLocalFallback, lookupHost)
  const client = new MongoClient(uri, { serverSelectionTimeoutMS: timeoutMs })
  await client.connect()
  const collection = client.db(config.dbName).collection<UserDocument>(config.collection)
  return {
    store: new MongoUserStore(collection, timeoutMs),
    close: () => client.close(),
  }
}

export async function openStore(config: AppConfig): Promise<OpenStore> {
  if (config.store.kind === 'memory') {
    return { store: new InMemoryUserStore(), close: async () => undefined }
  }
  return connectMongoStore(config.store, config.storeTimeoutMs)
}
