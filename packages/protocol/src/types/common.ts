// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Opaque string identifier
 */
export type Id = string;

/**
 * An identity that can submit requests or receive decrypt authorization.
 * Typically a wallet address, but any non-zero string is accepted.
 */
export type Principal = string;

/**
 * Names the policy a predicate is evaluated against.
 * Must be non-zero (see isZeroContextKey).
 */
export type ContextKey = string;

/**
 * Stable external identifier of a ciphertext:
 * `0x` followed by 64 hex characters (32 bytes).
 */
export type Handle = string;

export const HANDLE_BYTES = 32;

export const HANDLE_PATTERN = /^0x[0-9a-f]{64}$/;

export const ZERO_PRINCIPAL: Principal = '0x0000000000000000000000000000000000000000';

/**
 * Check if a string is a well-formed ciphertext handle.
 */
export function isHandle(value: string): value is Handle {
  return HANDLE_PATTERN.test(value);
}

/**
 * Zero-like values: empty, whitespace, "0", or 0x-prefixed all-zero hex.
 */
function isZeroLike(value: string): boolean {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === '') return true;
  if (/^0+$/.test(trimmed)) return true;
  return /^0x0*$/.test(trimmed);
}

/**
 * A context key is unusable when it is empty or encodes zero.
 */
export function isZeroContextKey(key: ContextKey): boolean {
  return isZeroLike(key);
}

/**
 * The zero principal can never hold admin rights or receive grants.
 */
export function isZeroPrincipal(principal: Principal): boolean {
  return isZeroLike(principal);
}
