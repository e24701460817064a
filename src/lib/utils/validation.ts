/**
 * Validation utilities for addresses and hex data coming from configuration,
 * embedded artifacts and RPC responses.
 */

const ADDRESS_REGEX = /^0x[a-fA-F0-9]{40}$/

export function isAddressString(value: unknown): value is string {
  return typeof value === 'string' && ADDRESS_REGEX.test(value)
}

/**
 * Validates a 20-byte, 0x-prefixed hex address. Checksums are not enforced.
 */
export function validateAddress(value: unknown, label: string): string {
  if (typeof value !== 'string') {
    throw new Error(`Invalid address for ${label}: expected string, got ${typeof value}`)
  }

  if (!ADDRESS_REGEX.test(value)) {
    throw new Error(`Invalid address format for ${label}: ${value}`)
  }

  return value
}

/**
 * Validates a 0x-prefixed hex string with an even number of digits.
 */
export function validateHexData(value: unknown, label: string): string {
  if (typeof value !== 'string') {
    throw new Error(`Invalid hex data for ${label}: expected string, got ${typeof value}`)
  }

  if (!value.startsWith('0x')) {
    throw new Error(`Invalid hex data for ${label}: must start with '0x'`)
  }

  const digits = value.slice(2)
  const idx = digits.search(/[^a-fA-F0-9]/)
  if (idx >= 0) {
    throw new Error(`Invalid hex data for ${label}: non-hex character at index ${idx} ('${digits[idx]}')`)
  }

  if (digits.length % 2 !== 0) {
    throw new Error(`Invalid hex data for ${label}: odd number of hex digits`)
  }

  return value
}
