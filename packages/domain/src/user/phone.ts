import { parsePhoneNumberWithError } from 'libphonenumber-js'

const GENERATE_ATTEMPTS = 100

/**
 * True when `phone` is an international number (leading `+` and country
 * code) that is both possible (right length for its region) and valid (in an
 * assigned range). No default region is applied, so national-format input
 * such as "0501234567" is rejected. Never throws.
 */
export function isValidPhone(phone: string): boolean {
  try {
    const parsed = parsePhoneNumberWithError(phone)
    return parsed.isPossible() && parsed.isValid()
  } catch {
    return false
  }
}

/**
 * Random valid Israeli mobile number in E.164 form, e.g. "+972501234567".
 * Test-fixture helper.
 *
 * @throws {Error} when no valid number turns up within a bounded number of draws.
 */
export function generatePhoneNumber(random: () => number = Math.random): string {
  for (let attempt = 0; attempt < GENERATE_ATTEMPTS; attempt++) {
    const subscriber = String(1_000_000 + Math.floor(random() * 9_000_000))
    const candidate = `+97250${subscriber}`
    if (isValidPhone(candidate)) return candidate
  }
  throw new Error(`Failed to generate a valid phone number after ${GENERATE_ATTEMPTS} attempts`)
}
