// Ciphertext types - opaque references to values held by the encrypted runtime

import type { Handle } from './common.js';

/**
 * Value kinds the encrypted runtime understands.
 */
export type CiphertextKind = 'bool' | 'uint8' | 'uint16' | 'uint32' | 'uint64';

export type NumericKind = Exclude<CiphertextKind, 'bool'>;

export const NUMERIC_KINDS: readonly NumericKind[] = ['uint8', 'uint16', 'uint32', 'uint64'];

export const CIPHERTEXT_KINDS: readonly CiphertextKind[] = ['bool', ...NUMERIC_KINDS];

/**
 * Bit width of each kind. Plaintext constants lifted into a kind
 * must fit in this many bits.
 */
export const KIND_BITS: Record<CiphertextKind, number> = {
  bool: 1,
  uint8: 8,
  uint16: 16,
  uint32: 32,
  uint64: 64,
};

/**
 * Width of every content / interest mask in the system.
 */
export const MASK_WIDTH = 32;

export const MASK_KIND = 'uint32' satisfies NumericKind;

/**
 * Largest plaintext mask value.
 */
export const MAX_MASK = 0xffffffff;

/**
 * An opaque encrypted value. The engine never sees the plaintext,
 * only the handle and the declared kind.
 */
export type Ciphertext<K extends CiphertextKind = CiphertextKind> = {
  readonly handle: Handle;
  readonly kind: K;
};

export type BoolCiphertext = Ciphertext<'bool'>;

export type NumericCiphertext = Ciphertext<NumericKind>;

/**
 * A reference to a ciphertext produced off-engine (by a client encryptor),
 * not yet verified by the runtime.
 */
export type ExternalReference = {
  handle: Handle;
  kind: CiphertextKind;
};

/**
 * One or more external references plus exactly one proof that validates
 * all of them jointly. Partial validation is not supported.
 */
export type InputBundle = {
  references: ExternalReference[];
  proof: string;
};

export function isNumericKind(kind: CiphertextKind): kind is NumericKind {
  return kind !== 'bool';
}

export function isBoolCiphertext(ct: Ciphertext): ct is BoolCiphertext {
  return ct.kind === 'bool';
}

export function isNumericCiphertext(ct: Ciphertext): ct is NumericCiphertext {
  return isNumericKind(ct.kind);
}

/**
 * Largest plaintext value representable in a kind.
 */
export function maxValueForKind(kind: CiphertextKind): bigint {
  return (1n << BigInt(KIND_BITS[kind])) - 1n;
}
