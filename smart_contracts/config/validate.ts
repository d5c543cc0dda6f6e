/**
 * Input validation for configuration and client-side helpers.
 * Throws ValidationError naming the offending field.
 */

import { ALGORAND_ZERO_ADDRESS_STRING, isValidAddress } from 'algosdk'

export class ValidationError extends Error {
  constructor(
    readonly field: string,
    message: string
  ) {
    super(`${field}: ${message}`)
    this.name = 'ValidationError'
  }
}

export function validateAddress(address: string, field = 'address'): string {
  if (!isValidAddress(address) || address === ALGORAND_ZERO_ADDRESS_STRING) {
    throw new ValidationError(field, `not a valid non-zero address: "${address}"`)
  }
  return address
}

export function validateBasisPoints(value: bigint, field = 'bps', max = 10_000n): bigint {
  if (value < 0n || value > max) {
    throw new ValidationError(field, `must be between 0 and ${max}, got ${value}`)
  }
  return value
}

export function validatePositiveAmount(amount: bigint, field = 'amount'): bigint {
  if (amount <= 0n) {
    throw new ValidationError(field, `must be positive, got ${amount}`)
  }
  return amount
}

export function validateHandle(handle: string, field = 'handle'): string {
  if (handle.length === 0) {
    throw new ValidationError(field, 'must not be empty')
  }
  return handle
}

/**
 * Parse an integer setting. Accepts plain digits only ("250", not "2.5e2").
 */
export function parseBigIntSetting(raw: string, field: string): bigint {
  const trimmed = raw.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(field, `expected a non-negative integer, got "${raw}"`)
  }
  return BigInt(trimmed)
}
