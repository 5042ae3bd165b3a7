import type { NationalId } from './national-id'
import type { UserFields, UserRecord } from './record'
import type { UserStore } from './store'

const byId = (a: UserRecord, b: UserRecord): number => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)

/**
 * Map-backed UserStore for tests and the `memory` store mode.
 * Each method completes within a single tick, so every write is atomic.
 */
export class InMemoryUserStore implements UserStore {
  private readonly rows = new Map<NationalId, UserRecord>()

  constructor(seed: readonly UserRecord[] = []) {
    for (const record of seed) this.rows.set(record.id, record)
  }

  async insert(record: UserRecord): Promise<boolean> {
    if (this.rows.has(record.id)) return false
    this.rows.set(record.id, { ...record })
    return true
  }

  async findById(id: NationalId): Promise<UserRecord | null> {
    const row = this.rows.get(id)
    return row ? { ...row } : null
  }

  async list(): Promise<UserRecord[]> {
    return [...this.rows.values()].sort(byId).map((row) => ({ ...row }))
  }

  async listIds(): Promise<NationalId[]> {
    return (await this.list()).map((row) => row.id)
  }

  async update(id: NationalId, changes: Partial<UserFields>): Promise<UserRecord | null> {
    const row = this.rows.get(id)
    if (!row) return null
    const next: UserRecord = { ...row, ...changes, id: row.id }
    this.rows.set(id, next)
    return { ...next }
  }

  async remove(id: NationalId): Promise<boolean> {
    return this.rows.delete(id)
  }

  /** Number of stored records. */
  get size(): number {
    return this.rows.size
  }
}
