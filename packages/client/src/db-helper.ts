// ---------------------------------------------------------------------------
// Direct store access for test assertions and cleanup
//
// Reads and deletes bypass the HTTP API entirely, so a test can check what
// was actually persisted and remove the users it created.
// ---------------------------------------------------------------------------

import type { Collection } from 'mongodb'
import type { User } from './users'

/** Stored shape of a user document; `_id` is the national id. */
export type StoredUser = {
  _id: string
  name: string
  phone: string
  address: string
}

export class UserDbHelper {
  constructor(private readonly collection: Collection<StoredUser>) {}

  async getUserById(id: string): Promise<User | null> {
    const doc = await this.collection.findOne({ _id: id })
    if (!doc) return null
    return { id: doc._id, name: doc.name, phone: doc.phone, address: doc.address }
  }

  /** True when every id is stored. An empty list is trivially true. */
  async usersExist(ids: Iterable<string>): Promise<boolean> {
    const unique = [...new Set(ids)]
    if (unique.length === 0) return true
    const count = await this.collection.countDocuments({ _id: { $in: unique } })
    return count === unique.length
  }

  /** Returns how many documents were removed. */
  async deleteUsersByIds(ids: Iterable<string>): Promise<number> {
    const unique = [...new Set(ids)]
    if (unique.length === 0) return 0
    const result = await this.collection.deleteMany({ _id: { $in: unique } })
    return result.deletedCount
  }
}
