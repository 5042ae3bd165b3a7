// ---------------------------------------------------------------------------
// MutationPolicy — the rules for creating, replacing, patching and deleting
// users.
//
// State machine for a single id:
//   Absent ──create──▶ Present ──replace / partialUpdate──▶ Present
//   Present ──delete──▶ Absent
//
// Anything else fails: create on Present is a ConflictError; get, replace,
// partialUpdate and delete on Absent are NotFoundErrors. Replace and
// partialUpdate look the record up before validating the body, so Absent
// wins over an invalid body. Create validates before touching the store.
//
// Every store call targets one record and is bounded by `timeoutMs`.
// ---------------------------------------------------------------------------

import { ConflictError, NotFoundError, ValidationError, type FieldError, type UserError } from '../shared/errors'
import { err, ok, withDeadline, type Result } from '../shared/types'
import { isValidNationalId, type NationalId } from './national-id'
import {
  normalizeUserFields,
  validateNationalIdField,
  validateUserFields,
  type CreateUserInput,
  type PartialUserInput,
  type ReplaceUserInput,
  type UserFields,
  type UserRecord,
} from './record'
import type { UserStore } from './store'

export const DEFAULT_STORE_TIMEOUT_MS = 5_000

/** A partial-update payload as decoded from the wire, which may smuggle in an `id`. */
export type PartialUpdateBody = PartialUserInput & { readonly id?: unknown }

/**
 * The complete operation set for the User resource. Server-side policy and
 * any alternative implementation must provide every member; the compiler
 * checks completeness through `implements`.
 */
export interface UserOperations {
  create(input: CreateUserInput): Promise<Result<UserRecord, UserError>>
  get(id: string): Promise<Result<UserRecord, UserError>>
  /** Listing cannot fail for a domain reason. */
  list(): Promise<UserRecord[]>
  listIds(): Promise<NationalId[]>
  replace(id: string, body: ReplaceUserInput): Promise<Result<UserRecord, UserError>>
  partialUpdate(id: string, body: PartialUpdateBody): Promise<Result<UserRecord, UserError>>
  delete(id: string): Promise<Result<void, UserError>>
}

export interface MutationPolicyOptions {
  /** Deadline for each store call. Defaults to DEFAULT_STORE_TIMEOUT_MS. */
  readonly timeoutMs?: number
}

export class MutationPolicy implements UserOperations {
  private readonly timeoutMs: number

  constructor(
    private readonly store: UserStore,
    options: MutationPolicyOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS
  }

  async create(input: CreateUserInput): Promise<Result<UserRecord, UserError>> {
    const id = input.id.trim()
    const fields = normalizeUserFields(input)
    const errors: FieldError[] = [...validateNationalIdField(id), ...validateUserFields(fields)]
    if (errors.length > 0 || !isValidNationalId(id) || !isComplete(fields)) {
      return err(new ValidationError(errors))
    }

    const record: UserRecord = { id, ...fields }
    const inserted = await this.call('insert', () => this.store.insert(record))
    if (!inserted) return err(new ConflictError(id))
    return ok(record)
  }

  async get(id: string): Promise<Result<UserRecord, UserError>> {
    const record = await this.find(id)
    return record ? ok(record) : err(new NotFoundError(id))
  }

  async list(): Promise<UserRecord[]> {
    return this.call('list', () => this.store.list())
  }

  async listIds(): Promise<NationalId[]> {
    return this.call('listIds', () => this.store.listIds())
  }

  /**
   * Overwrites name, phone and address. Clients that always send the id may
   * do so, but it must equal the path id.
   */
  async replace(id: string, body: ReplaceUserInput): Promise<Result<UserRecord, UserError>> {
    const existing = await this.find(id)
    if (existing === null) return err(new NotFoundError(id))

    if (body.id !== undefined && String(body.id) !== existing.id) {
      return err(ValidationError.of('id', 'Updating id is not allowed.'))
    }
    const fields = normalizeUserFields(body)
    const errors = validateUserFields(fields)
    if (errors.length > 0 || !isComplete(fields)) return err(new ValidationError(errors))

    return this.applyUpdate(existing.id, fields)
  }

  /**
   * Applies only the supplied fields. The body may not mention `id` at all,
   * not even with the current value.
   */
  async partialUpdate(id: string, body: PartialUpdateBody): Promise<Result<UserRecord, UserError>> {
    const existing = await this.find(id)
    if (existing === null) return err(new NotFoundError(id))

    if ('id' in body) {
      return err(ValidationError.of('id', 'id may not be changed'))
    }
    const fields = normalizeUserFields(body)
    const errors = validateUserFields(fields)
    if (errors.length > 0) return err(new ValidationError(errors))
    if (Object.keys(fields).length === 0) return ok(existing)

    return this.applyUpdate(existing.id, fields)
  }

  async delete(id: string): Promise<Result<void, UserError>> {
    if (!isValidNationalId(id)) return err(new NotFoundError(id))
    const removed = await this.call('remove', () => this.store.remove(id))
    return removed ? ok(undefined) : err(new NotFoundError(id))
  }

  /** Null for an absent record, and for a path id that cannot name one. */
  private async find(id: string): Promise<UserRecord | null> {
    if (!isValidNationalId(id)) return null
    return this.call('findById', () => this.store.findById(id))
  }

  /** NotFound here means the record was deleted between lookup and update. */
  private async applyUpdate(id: NationalId, changes: Partial<UserFields>): Promise<Result<UserRecord, UserError>> {
    const updated = await this.call('update', () => this.store.update(id, changes))
    return updated ? ok(updated) : err(new NotFoundError(id))
  }

  private call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    return withDeadline(operation, this.timeoutMs, run())
  }
}

function isComplete(fields: Partial<UserFields>): fields is UserFields {
  return fields.name !== undefined && fields.phone !== undefined && fields.address !== undefined
}
