// Bitmask intersection: (a & b) != 0, computed as gt(a & b, 0)

import type { BoolCiphertext, Ciphertext, ContentMask } from '@cloak/protocol';
import { MASK_KIND } from '@cloak/protocol';
import type { CiphertextAlgebra } from '../algebra/index.js';

export type MaskCiphertext = Ciphertext<typeof MASK_KIND>;

/**
 * Ciphertext view of a stored mask. Plaintext masks are lifted, so both
 * representations flow through the same comparison.
 */
export async function maskToCiphertext(
  algebra: CiphertextAlgebra,
  mask: ContentMask
): Promise<MaskCiphertext> {
  if (mask.isPlain) {
    return algebra.lift(mask.plainMask, MASK_KIND);
  }
  return mask.encMask;
}

/**
 * True when the two masks share at least one set bit.
 */
export async function evaluateMatch(
  algebra: CiphertextAlgebra,
  a: MaskCiphertext,
  b: MaskCiphertext
): Promise<BoolCiphertext> {
  const intersection = await algebra.bitwiseAnd(a, b);
  const zero = await algebra.lift(0, MASK_KIND);
  return algebra.gt(intersection, zero);
}
