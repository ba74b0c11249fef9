// Registration types - one evaluated result per (context, principal)

import type { ContextKey, Principal, Timestamp } from './common.js';
import type { Ciphertext } from './ciphertext.js';
import type { PolicyKind } from './policies.js';

/**
 * A principal's submission against a policy.
 *
 * Re-submission by the same principal overwrites the result in place.
 * There is no cleared state: once registered, a registration stays.
 */
export type Registration = {
  contextKey: ContextKey;
  principal: Principal;
  policyKind: PolicyKind;

  /** Bonus value for threshold gates, eligibility verdict otherwise */
  result: Ciphertext;

  exists: true;

  /** Number of times this principal has submitted against the context */
  submissionCount: number;

  createdAt: Timestamp;
  updatedAt: Timestamp;
};
