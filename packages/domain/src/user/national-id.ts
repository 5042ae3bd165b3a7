// ---------------------------------------------------------------------------
// Israeli national ID (Teudat Zehut) checksum
//
// The id is left-padded with zeros to nine digits. Digits at even positions
// (0-based, from the left) are weighted 1, odd positions 2. A weighted product
// above 9 has 9 subtracted from it (the same as summing its two digits). The
// id is valid when the sum of the adjusted products is a multiple of 10.
// ---------------------------------------------------------------------------

import type { Brand } from '../shared/types'

/** A string that has passed isValidNationalId. */
export type NationalId = Brand<string, 'NationalId'>

export const NATIONAL_ID_MIN_LENGTH = 5
export const NATIONAL_ID_MAX_LENGTH = 9

const PADDED_LENGTH = 9
const DIGITS_ONLY = /^[0-9]+$/

/**
 * Weighted checksum of the zero-padded id, or null when `id` is not 5–9
 * ASCII digits. A valid id has `checksum % 10 === 0`.
 */
export function nationalIdChecksum(id: string): number | null {
  if (!DIGITS_ONLY.test(id)) return null
  if (id.length < NATIONAL_ID_MIN_LENGTH || id.length > NATIONAL_ID_MAX_LENGTH) return null

  const padded = id.padStart(PADDED_LENGTH, '0')
  let total = 0
  for (let idx = 0; idx < padded.length; idx++) {
    const product = Number(padded[idx]) * (idx % 2 === 0 ? 1 : 2)
    total += product > 9 ? product - 9 : product
  }
  return total
}

export function isValidNationalId(id: string): id is NationalId {
  const checksum = nationalIdChecksum(id)
  return checksum !== null && checksum % 10 === 0
}

/**
 * Narrows a raw string to NationalId, or returns null when it fails the
 * checksum. The only sanctioned way to obtain a NationalId from input.
 */
export function toNationalId(raw: string): NationalId | null {
  return isValidNationalId(raw) ? raw : null
}

/**
 * Returns a random nine-digit id that passes the checksum.
 *
 * Eight digits are drawn at random and the check digit is found by trying
 * 0–9. The last position carries weight 1, so exactly one digit works.
 */
export function generateNationalId(random: () => number = Math.random): NationalId {
  let body = ''
  for (let i = 0; i < PADDED_LENGTH - 1; i++) {
    body += String(Math.floor(random() * 10) % 10)
  }
  for (let check = 0; check <= 9; check++) {
    const candidate = `${body}${check}`
    if (isValidNationalId(candidate)) return candidate
  }
  throw new Error(`Failed to compute a check digit for ${body}`)
}
