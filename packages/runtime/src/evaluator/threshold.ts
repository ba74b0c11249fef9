// Threshold gate: select(AND_i attr_i >= threshold_i, valueIfTrue, valueIfFalse)

import type { BoolCiphertext, NumericCiphertext, ThresholdGateParams } from '@cloak/protocol';
import type { CiphertextAlgebra } from '../algebra/index.js';
import { ValidationError } from '../errors.js';

/**
 * Evaluate a threshold gate over one attribute per threshold.
 *
 * Every comparison and both payout values are always evaluated; the
 * result is chosen obliviously by select.
 */
export async function evaluateThresholdGate(
  algebra: CiphertextAlgebra,
  params: ThresholdGateParams,
  attributes: readonly NumericCiphertext[]
): Promise<NumericCiphertext> {
  if (attributes.length !== params.thresholds.length) {
    throw new ValidationError(
      `Expected ${params.thresholds.length} attributes, got ${attributes.length}`,
      { field: 'attributes' }
    );
  }

  let cond: BoolCiphertext | null = null;
  for (let i = 0; i < attributes.length; i++) {
    const meets = await algebra.ge(attributes[i], params.thresholds[i]);
    cond = cond ? await algebra.and(cond, meets) : meets;
  }

  // No thresholds: the gate is always open
  const gate = cond ?? (await algebra.trueLiteral());

  return algebra.select(gate, params.valueIfTrue, params.valueIfFalse);
}
