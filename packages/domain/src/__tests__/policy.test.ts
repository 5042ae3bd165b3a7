import { describe, it, expect, beforeEach } from 'vitest'
import {
  InMemoryUserStore,
  MutationPolicy,
  StoreTimeoutError,
  ConflictError,
  NotFoundError,
  ValidationError,
  type CreateUserInput,
  type NationalId,
  type Result,
  type UserError,
  type UserRecord,
} from '../index'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ID = '123456782'
const OTHER_ID = '000000018'

function makeInput(overrides: Partial<CreateUserInput> = {}): CreateUserInput {
  return { id: ID, name: 'A', phone: '+972501234567', address: 'X', ...overrides }
}

function unwrap<T>(r: Result<T, UserError>): T {
  if (!r.ok) throw new Error(`expected ok, got ${r.error.code}: ${r.error.message}`)
  return r.value
}

function unwrapErr<T>(r: Result<T, UserError>): UserError {
  if (r.ok) throw new Error('expected an error result')
  return r.error
}

/** A store whose every call hangs, for deadline tests. */
class HangingStore extends InMemoryUserStore {
  override insert(): Promise<boolean> {
    return new Promise<boolean>(() => undefined)
  }

  override findById(): Promise<UserRecord | null> {
    return new Promise<UserRecord | null>(() => undefined)
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('MutationPolicy', () => {
  let store: InMemoryUserStore
  let policy: MutationPolicy

  beforeEach(() => {
    store = new InMemoryUserStore()
    policy = new MutationPolicy(store)
  })

  // ── create ────────────────────────────────────────────────────────────────

  describe('create', () => {
    it('persists and returns the record', async () => {
      const user = unwrap(await policy.create(makeInput()))
      expect(user).toEqual({ id: ID, name: 'A', phone: '+972501234567', address: 'X' })
      expect(store.size).toBe(1)
    })

    it('trims string fields before storing', async () => {
      const user = unwrap(await policy.create(makeInput({ id: ` ${ID} `, name: '  A  ', address: ' X ' })))
      expect(user).toEqual({ id: ID, name: 'A', phone: '+972501234567', address: 'X' })
    })

    it('fails with ConflictError on a second create with the same id', async () => {
      unwrap(await policy.create(makeInput()))
      const error = unwrapErr(await policy.create(makeInput({ name: 'B' })))
      expect(error).toBeInstanceOf(ConflictError)
      expect(error.code).toBe('CONFLICT')
      const stored = unwrap(await policy.get(ID))
      expect(stored.name).toBe('A')
    })

    it('rejects a bad id checksum', async () => {
      const error = unwrapErr(await policy.create(makeInput({ id: '123789456' })))
      expect(error).toBeInstanceOf(ValidationError)
      expect(error instanceof ValidationError && error.details).toEqual([
        { field: 'id', message: 'Invalid Israeli ID checksum' },
      ])
      expect(store.size).toBe(0)
    })

    it('rejects a phone without a country code', async () => {
      const error = unwrapErr(await policy.create(makeInput({ phone: '0501234567' })))
      expect(error.code).toBe('VALIDATION_ERROR')
      expect(store.size).toBe(0)
    })

    it('rejects blank and oversized fields, reporting all of them', async () => {
      const error = unwrapErr(await policy.create(makeInput({ name: '   ', address: 'x'.repeat(256) })))
      expect(error instanceof ValidationError && error.details.map((d) => d.field)).toEqual(['name', 'address'])
    })

    it('reports id and field errors together', async () => {
      const error = unwrapErr(await policy.create(makeInput({ id: '12', phone: 'abcdefg' })))
      expect(error instanceof ValidationError && error.details.map((d) => d.field)).toEqual(['id', 'phone'])
    })
  })

  // ── get / list ────────────────────────────────────────────────────────────

  describe('get and list', () => {
    it('returns NotFoundError for an absent id', async () => {
      expect(unwrapErr(await policy.get(ID))).toBeInstanceOf(NotFoundError)
    })

    it('returns NotFoundError for a malformed id', async () => {
      expect(unwrapErr(await policy.get('not-an-id')).code).toBe('NOT_FOUND')
    })

    it('lists records in primary-key order, stable between calls', async () => {
      unwrap(await policy.create(makeInput()))
      unwrap(await policy.create(makeInput({ id: OTHER_ID, name: 'B' })))
      const first = await policy.list()
      expect(first.map((u) => u.id)).toEqual([OTHER_ID, ID])
      expect(await policy.list()).toEqual(first)
    })

    it('lists ids', async () => {
      unwrap(await policy.create(makeInput()))
      unwrap(await policy.create(makeInput({ id: OTHER_ID })))
      expect(await policy.listIds()).toEqual([OTHER_ID, ID])
    })

    it('lists nothing when the store is empty', async () => {
      expect(await policy.list()).toEqual([])
    })
  })

  // ── replace ───────────────────────────────────────────────────────────────

  describe('replace', () => {
    beforeEach(async () => {
      unwrap(await policy.create(makeInput()))
    })

    it('overwrites name, phone and address and keeps the id', async () => {
      const body = { name: 'B', phone: '+972521234567', address: 'Y' }
      const user = unwrap(await policy.replace(ID, body))
      expect(user).toEqual({ id: ID, ...body })
      expect(unwrap(await policy.get(ID))).toEqual({ id: ID, ...body })
    })

    it('accepts a body that repeats the current id', async () => {
      const user = unwrap(await policy.replace(ID, { id: ID, name: 'B', phone: '+972501234567', address: 'Y' }))
      expect(user.id).toBe(ID)
    })

    it('compares a numeric body id by its string form', async () => {
      const user = unwrap(await policy.replace(ID, { id: 123456782, name: 'B', phone: '+972501234567', address: 'Y' }))
      expect(user.name).toBe('B')
    })

    it('rejects a body id that differs from the path id', async () => {
      const error = unwrapErr(
        await policy.replace(ID, { id: OTHER_ID, name: 'B', phone: '+972501234567', address: 'Y' }),
      )
      expect(error instanceof ValidationError && error.details).toEqual([
        { field: 'id', message: 'Updating id is not allowed.' },
      ])
      expect(unwrap(await policy.get(ID)).name).toBe('A')
      expect(unwrapErr(await policy.get(OTHER_ID)).code).toBe('NOT_FOUND')
    })

    it('validates the phone', async () => {
      const error = unwrapErr(await policy.replace(ID, { name: 'B', phone: '0501234567', address: 'Y' }))
      expect(error.code).toBe('VALIDATION_ERROR')
      expect(unwrap(await policy.get(ID)).phone).toBe('+972501234567')
    })

    it('returns NotFoundError when the record is absent', async () => {
      const error = unwrapErr(await policy.replace(OTHER_ID, { name: 'B', phone: '+972501234567', address: 'Y' }))
      expect(error).toBeInstanceOf(NotFoundError)
    })

    it('reports an absent record before validating the body', async () => {
      const error = unwrapErr(await policy.replace(OTHER_ID, { name: 'B', phone: 'abc', address: 'Y' }))
      expect(error).toBeInstanceOf(NotFoundError)
    })

    it('reports an absent record before comparing the body id', async () => {
      const error = unwrapErr(await policy.replace(OTHER_ID, { id: ID, name: 'B', phone: '+972501234567', address: 'Y' }))
      expect(error).toBeInstanceOf(NotFoundError)
    })
  })

  // ── partialUpdate ─────────────────────────────────────────────────────────

  describe('partialUpdate', () => {
    beforeEach(async () => {
      unwrap(await policy.create(makeInput()))
    })

    it('applies only the supplied fields', async () => {
      const user = unwrap(await policy.partialUpdate(ID, { address: 'Y' }))
      expect(user).toEqual({ id: ID, name: 'A', phone: '+972501234567', address: 'Y' })
    })

    it.each([
      ['the current id', ID],
      ['another id', OTHER_ID],
      ['null', null],
      ['a number', 123456782],
    ])('rejects a body containing id set to %s', async (_label, id) => {
      const error = unwrapErr(await policy.partialUpdate(ID, { id, address: 'Y' }))
      expect(error instanceof ValidationError && error.details).toEqual([
        { field: 'id', message: 'id may not be changed' },
      ])
      expect(unwrap(await policy.get(ID)).address).toBe('X')
    })

    it('reports an absent record before rejecting an id key', async () => {
      expect(unwrapErr(await policy.partialUpdate(OTHER_ID, { id: OTHER_ID }))).toBeInstanceOf(NotFoundError)
    })

    it('reports an absent record before validating the fields', async () => {
      expect(unwrapErr(await policy.partialUpdate(OTHER_ID, { phone: 'abc' }))).toBeInstanceOf(NotFoundError)
    })

    it('validates a supplied phone before applying anything', async () => {
      const error = unwrapErr(await policy.partialUpdate(ID, { phone: 'abcdefg', name: 'B' }))
      expect(error.code).toBe('VALIDATION_ERROR')
      expect(unwrap(await policy.get(ID))).toEqual({ id: ID, name: 'A', phone: '+972501234567', address: 'X' })
    })

    it('rejects a blank name', async () => {
      expect(unwrapErr(await policy.partialUpdate(ID, { name: ' ' })).code).toBe('VALIDATION_ERROR')
    })

    it('returns the current record for an empty body', async () => {
      expect(unwrap(await policy.partialUpdate(ID, {}))).toEqual(makeInput())
    })

    it('returns NotFoundError when the record is absent', async () => {
      expect(unwrapErr(await policy.partialUpdate(OTHER_ID, { address: 'Y' }))).toBeInstanceOf(NotFoundError)
    })
  })

  // ── delete ────────────────────────────────────────────────────────────────

  describe('delete', () => {
    it('removes the record; a later get fails with NotFoundError', async () => {
      unwrap(await policy.create(makeInput()))
      unwrap(await policy.delete(ID))
      expect(unwrapErr(await policy.get(ID))).toBeInstanceOf(NotFoundError)
    })

    it('fails on a repeated delete', async () => {
      unwrap(await policy.create(makeInput()))
      unwrap(await policy.delete(ID))
      expect(unwrapErr(await policy.delete(ID))).toBeInstanceOf(NotFoundError)
    })

    it('allows the id to be created again after deletion', async () => {
      unwrap(await policy.create(makeInput()))
      unwrap(await policy.delete(ID))
      expect(unwrap(await policy.create(makeInput({ name: 'C' }))).name).toBe('C')
    })
  })

  // ── deadlines ─────────────────────────────────────────────────────────────

  describe('store deadline', () => {
    it('rejects with StoreTimeoutError when the store hangs', async () => {
      const slow = new MutationPolicy(new HangingStore(), { timeoutMs: 10 })
      await expect(slow.create(makeInput())).rejects.toBeInstanceOf(StoreTimeoutError)
      await expect(slow.get(ID)).rejects.toThrow('Store operation "findById" timed out after 10ms')
    })

    it('does not touch the store for requests that fail validation', async () => {
      const slow = new MutationPolicy(new HangingStore(), { timeoutMs: 10 })
      expect(unwrapErr(await slow.create(makeInput({ id: '123456780' }))).code).toBe('VALIDATION_ERROR')
    })
  })

  // ── end-to-end lifecycle ──────────────────────────────────────────────────

  it('walks Absent → Present → Present → Absent', async () => {
    const created = unwrap(await policy.create(makeInput()))
    expect(created.id).toBe(ID)

    const patched = unwrap(await policy.partialUpdate(ID, { address: 'Y' }))
    expect(patched).toEqual({ id: ID, name: 'A', phone: '+972501234567', address: 'Y' })

    unwrap(await policy.delete(ID))
    expect(unwrapErr(await policy.get(ID)).code).toBe('NOT_FOUND')
  })

  it('exposes ids as NationalId values', async () => {
    unwrap(await policy.create(makeInput()))
    const ids: NationalId[] = await policy.listIds()
    expect(ids).toEqual([ID])
  })
})
