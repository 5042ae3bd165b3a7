// ---------------------------------------------------------------------------
// The User entity and its field constraints.
// ---------------------------------------------------------------------------

import type { FieldError } from '../shared/errors'
import { nationalIdChecksum, type NationalId, NATIONAL_ID_MAX_LENGTH, NATIONAL_ID_MIN_LENGTH } from './national-id'
import { isValidPhone } from './phone'

// ---------------------------------------------------------------------------
// Entity
// ---------------------------------------------------------------------------

export const NAME_MAX_LENGTH = 100
export const PHONE_MAX_LENGTH = 20
export const ADDRESS_MAX_LENGTH = 255

/**
 * A registered user, keyed by national id.
 *
 * @invariant `id` passes the national-id checksum and never changes after creation.
 * @invariant `phone` passed isValidPhone when it was written.
 * @invariant `name` and `address` are non-blank and within their length limits.
 */
export interface UserRecord {
  readonly id: NationalId
  readonly name: string
  readonly phone: string
  readonly address: string
}

/** The mutable part of a UserRecord. */
export type UserFields = Omit<UserRecord, 'id'>

/** Payload for creating a user; the caller chooses the id. */
export interface CreateUserInput {
  readonly id: string
  readonly name: string
  readonly phone: string
  readonly address: string
}

/**
 * Full replacement of the mutable fields. `id` may be echoed back by clients
 * that always send it; it must then match the target record.
 */
export interface ReplaceUserInput {
  readonly id?: string | number
  readonly name: string
  readonly phone: string
  readonly address: string
}

/**
 * Partial update. Typed without `id`, but payloads decoded from the wire may
 * still carry one, so the policy checks for the key at runtime.
 */
export interface PartialUserInput {
  readonly name?: string
  readonly phone?: string
  readonly address?: string
}

// ---------------------------------------------------------------------------
// Field validation
// ---------------------------------------------------------------------------

/** Returns the errors for a national id field. An empty array means valid. */
export function validateNationalIdField(id: string): readonly FieldError[] {
  if (id === '') return [{ field: 'id', message: 'id is required' }]
  const checksum = nationalIdChecksum(id)
  if (checksum === null) {
    return [
      {
        field: 'id',
        message: `id must be a string of ${NATIONAL_ID_MIN_LENGTH}-${NATIONAL_ID_MAX_LENGTH} digits`,
      },
    ]
  }
  if (checksum % 10 !== 0) return [{ field: 'id', message: 'Invalid Israeli ID checksum' }]
  return []
}

function checkText(field: string, value: string, max: number, errors: FieldError[]): void {
  if (value === '') {
    errors.push({ field, message: `${field} may not be blank` })
  } else if (value.length > max) {
    errors.push({ field, message: `${field} must be at most ${max} characters` })
  }
}

/**
 * Validates the mutable fields and returns a list of errors.
 * An empty array means the fields are valid. Fields absent from a partial
 * input are not checked.
 */
export function validateUserFields(fields: Partial<UserFields>): readonly FieldError[] {
  const errors: FieldError[] = []
  if (fields.name !== undefined) checkText('name', fields.name, NAME_MAX_LENGTH, errors)
  if (fields.phone !== undefined) {
    if (fields.phone === '' || fields.phone.length > PHONE_MAX_LENGTH) {
      checkText('phone', fields.phone, PHONE_MAX_LENGTH, errors)
    } else if (!isValidPhone(fields.phone)) {
      errors.push({
        field: 'phone',
        message: 'Phone number must be in valid international format (e.g., +972...)',
      })
    }
  }
  if (fields.address !== undefined) checkText('address', fields.address, ADDRESS_MAX_LENGTH, errors)
  return errors
}

/**
 * Trims the supplied mutable fields, dropping the ones that are absent.
 * Whitespace around a value is never significant.
 */
export function normalizeUserFields(input: PartialUserInput): Partial<UserFields> {
  return {
    ...(input.name !== undefined ? { name: input.name.trim() } : {}),
    ...(input.phone !== undefined ? { phone: input.phone.trim() } : {}),
    ...(input.address !== undefined ? { address: input.address.trim() } : {}),
  }
}
