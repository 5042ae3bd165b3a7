// ---------------------------------------------------------------------------
// Shared primitives used across the domain.
// Nothing in this file may import from the user module.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Branding utility
// ---------------------------------------------------------------------------

/** Nominal / branded type: prevents accidental substitution of e.g. a raw path segment for a checked id. */
export type Brand<T, B extends string> = T & { readonly __brand: B }

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

/**
 * Outcome of an operation that can fail for a reason the caller must handle.
 * Domain failures travel in `error`; only infrastructure faults are thrown.
 */
export type Result<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E }

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

// ---------------------------------------------------------------------------
// Deadlines
// ---------------------------------------------------------------------------

/**
 * Raised when a store call does not settle within its deadline.
 * Infrastructure failure, so it is thrown rather than returned.
 */
export class StoreTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Store operation "${operation}" timed out after ${timeoutMs}ms`)
    this.name = 'StoreTimeoutError'
  }
}

/**
 * Settles with `promise`, or rejects with StoreTimeoutError once `timeoutMs`
 * elapses. The timer is always cleared so nothing keeps the process alive.
 */
export async function withDeadline<T>(operation: string, timeoutMs: number, promise: Promise<T>): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StoreTimeoutError(operation, timeoutMs)), timeoutMs)
  })
  try {
    return await Promise.race([promise, deadline])
  } finally {
    clearTimeout(timer)
  }
}
