import { MongoServerError, type Collection, type WithId } from 'mongodb'
import {
  toNationalId,
  type NationalId,
  type UserFields,
  type UserRecord,
  type UserStore,
} from '@user-registry/domain'

// ---------------------------------------------------------------------------
// Stored shape — one document per user, keyed by national id
// ---------------------------------------------------------------------------

export type UserDocument = {
  _id: string
  name: string
  phone: string
  address: string
}

const DUPLICATE_KEY = 11000

export const DEFAULT_MAX_TIME_MS = 5_000

// ---------------------------------------------------------------------------
// Mappers — documents → domain types
// ---------------------------------------------------------------------------

function mapUser(doc: WithId<UserDocument>): UserRecord {
  return { id: storedId(doc._id), name: doc.name, phone: doc.phone, address: doc.address }
}

/** Ids were checked on the way in; a stored id failing the checksum means the collection was edited by hand. */
function storedId(raw: string): NationalId {
  const id = toNationalId(raw)
  if (id === null) throw new Error(`Stored user has an invalid id: ${raw}`)
  return id
}

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === DUPLICATE_KEY
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

/**
 * UserStore over a MongoDB collection. Every method is one single-document
 * command, which MongoDB applies atomically, and each carries `maxTimeMS` so
 * the server abandons work the caller has stopped waiting for.
 */
export class MongoUserStore implements UserStore {
  constructor(
    private readonly collection: Collection<UserDocument>,
    private readonly maxTimeMS: number = DEFAULT_MAX_TIME_MS,
  ) {}

  /** Relies on the built-in unique `_id` index to reject duplicates. */
  async insert(record: UserRecord): Promise<boolean> {
    try {
      await this.collection.insertOne(
        { _id: record.id, name: record.name, phone: record.phone, address: record.address },
        { maxTimeMS: this.maxTimeMS },
      )
      return true
    } catch (error) {
      if (isDuplicateKeyError(error)) return false
      throw error
    }
  }

  async findById(id: NationalId): Promise<UserRecord | null> {
    const doc = await this.collection.findOne({ _id: id }, { maxTimeMS: this.maxTimeMS })
    return doc ? mapUser(doc) : null
  }

  async list(): Promise<UserRecord[]> {
    const docs = await this.collection.find({}, { sort: { _id: 1 }, maxTimeMS: this.maxTimeMS }).toArray()
    return docs.map(mapUser)
  }

  async listIds(): Promise<NationalId[]> {
    const docs = await this.collection
      .find({}, { projection: { _id: 1 }, sort: { _id: 1 }, maxTimeMS: this.maxTimeMS })
      .toArray()
    return docs.map((doc) => storedId(doc._id))
  }

  async update(id: NationalId, changes: Partial<UserFields>): Promise<UserRecord | null> {
    // An empty $set is rejected by the server.
    if (Object.keys(changes).length === 0) return this.findById(id)
    const doc = await this.collection.findOneAndUpdate(
      { _id: id },
      { $set: changes },
      { returnDocument: 'after', maxTimeMS: this.maxTimeMS },
    )
    return doc ? mapUser(doc) : null
  }

  async remove(id: NationalId): Promise<boolean> {
    const result = await this.collection.deleteOne({ _id: id }, { maxTimeMS: this.maxTimeMS })
    return result.deletedCount === 1
  }
}
