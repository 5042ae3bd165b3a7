// ---------------------------------------------------------------------------
// Domain error taxonomy
//
// Every failure a caller can fix by changing the request is one of these.
// They are returned inside a Result, never thrown, and the HTTP layer maps
// each `code` to a status:
//   VALIDATION_ERROR → 400
//   CONFLICT         → 409
//   NOT_FOUND        → 404
// ---------------------------------------------------------------------------

/** A single rejected field and why. */
export interface FieldError {
  readonly field: string
  readonly message: string
}

export class ValidationError extends Error {
  readonly code = 'VALIDATION_ERROR' as const

  constructor(public readonly details: readonly FieldError[]) {
    super(details.map((d) => `${d.field}: ${d.message}`).join('; ') || 'Invalid request')
    this.name = 'ValidationError'
  }

  /** Shorthand for a single-field failure. */
  static of(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }])
  }
}

export class ConflictError extends Error {
  readonly code = 'CONFLICT' as const

  constructor(public readonly id: string) {
    super(`User with id ${id} already exists`)
    this.name = 'ConflictError'
  }
}

export class NotFoundError extends Error {
  readonly code = 'NOT_FOUND' as const

  constructor(public readonly id: string) {
    super(`User ${id} not found`)
    this.name = 'NotFoundError'
  }
}

/** Every error a MutationPolicy operation may return. */
export type UserError = ValidationError | ConflictError | NotFoundError

export type UserErrorCode = UserError['code']
