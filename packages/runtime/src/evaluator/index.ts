// Predicate Evaluator
//
// Composes the algebra into the three supported predicates. Nothing in
// this directory reads plaintext or branches on an encrypted value.

import type { Ciphertext, CiphertextKind, Policy } from '@cloak/protocol';
import type { CiphertextAlgebra } from '../algebra/index.js';
import { expectKind, expectNumeric } from '../algebra/index.js';
import { evaluateThresholdGate } from './threshold.js';
import { evaluateEligibility, ELIGIBILITY_ATTRIBUTE_KINDS } from './eligibility.js';
import { ValidationError } from '../errors.js';

export { evaluateThresholdGate } from './threshold.js';
export { evaluateMatch, maskToCiphertext, type MaskCiphertext } from './match.js';
export {
  evaluateEligibility,
  ELIGIBILITY_ATTRIBUTE_KINDS,
  type EligibilityAttributes,
} from './eligibility.js';

/**
 * Kinds a submission against this policy must carry, in bundle order.
 */
export function attributeKindsFor(policy: Policy): CiphertextKind[] {
  if (policy.kind === 'threshold_gate') {
    return policy.thresholds.map((t) => t.kind);
  }
  return [...ELIGIBILITY_ATTRIBUTE_KINDS];
}

export type EvaluatePolicyOptions = {
  allowListCap?: number;
};

/**
 * Evaluate a policy against verified attributes, dispatching on kind.
 */
export async function evaluatePolicy(
  algebra: CiphertextAlgebra,
  policy: Policy,
  attributes: readonly Ciphertext[],
  options: EvaluatePolicyOptions = {}
): Promise<Ciphertext> {
  switch (policy.kind) {
    case 'threshold_gate':
      return evaluateThresholdGate(
        algebra,
        policy,
        attributes.map((a) => expectNumeric(a, 'threshold_gate'))
      );

    case 'eligibility': {
      if (attributes.length !== ELIGIBILITY_ATTRIBUTE_KINDS.length) {
        throw new ValidationError(
          `Expected ${ELIGIBILITY_ATTRIBUTE_KINDS.length} attributes, got ${attributes.length}`,
          { field: 'attributes' }
        );
      }
      const [age, country, invite] = attributes;
      return evaluateEligibility(
        algebra,
        policy,
        {
          age: expectKind(age, 'uint8', 'eligibility.age'),
          country: expectKind(country, 'uint16', 'eligibility.country'),
          invite: expectKind(invite, 'uint8', 'eligibility.invite'),
        },
        options.allowListCap
      );
    }
  }
}
