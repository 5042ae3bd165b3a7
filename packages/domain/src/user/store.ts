import type { NationalId } from './national-id'
import type { UserFields, UserRecord } from './record'

/**
 * Persistence contract for UserRecord.
 *
 * Every method touches at most one record and must apply atomically: a write
 * is either fully visible or not at all. Implementations report absence and
 * duplicates through their return values; anything thrown is treated as an
 * infrastructure failure.
 */
export interface UserStore {
  /** Persists a new record. Resolves false when the id is already taken. */
  insert(record: UserRecord): Promise<boolean>
  findById(id: NationalId): Promise<UserRecord | null>
  /** All records in primary-key order. */
  list(): Promise<UserRecord[]>
  /** All ids in primary-key order. */
  listIds(): Promise<NationalId[]>
  /** Applies `changes` and returns the updated record, or null when absent. */
  update(id: NationalId, changes: Partial<UserFields>): Promise<UserRecord | null>
  /** Resolves false when there was nothing to remove. */
  remove(id: NationalId): Promise<boolean>
}
