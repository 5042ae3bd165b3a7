import type { Collection } from 'mongodb'
import { HttpTransport, type TransportOptions } from './http'
import { HealthApi } from './health'
import { UsersApi } from './users'
import { UserDbHelper, type StoredUser } from './db-helper'

export interface RegistryClientOptions extends TransportOptions {
  /** When given, `db` is a UserDbHelper over this collection. */
  collection?: Collection<StoredUser>
}

/**
 * Entry point for talking to a running registry: `users` and `health` wrap
 * the HTTP endpoints, `db` (optional) reads the store directly.
 */
export class RegistryClient {
  readonly users: UsersApi
  readonly health: HealthApi
  readonly db: UserDbHelper | null

  constructor({ collection, ...transport }: RegistryClientOptions) {
    const http = new HttpTransport(transport)
    this.users = new UsersApi(http)
    this.health = new HealthApi(http)
    this.db = collection ? new UserDbHelper(collection) : null
  }
}
