// Policy types - confidential decision rules published by the admin

import type { ContextKey, Principal, Timestamp } from './common.js';
import type { NumericCiphertext } from './ciphertext.js';

/**
 * The policy shapes the evaluator knows how to compose.
 * Bitmask matching is driven by Content records, not by a Policy.
 */
export type PolicyKind = 'threshold_gate' | 'eligibility';

/**
 * How the policy's ciphertext parameters were produced:
 * - encrypted: submitted by the admin as a proof-backed bundle
 * - plain: lifted from plaintext constants (developer mode only)
 */
export type PolicyMode = 'encrypted' | 'plain';

/**
 * Default maximum number of allow-list entries.
 * Bounds the OR-fold the eligibility predicate performs.
 */
export const DEFAULT_ALLOW_LIST_CAP = 16;

/**
 * Fields every policy carries regardless of kind.
 */
type PolicyBase = {
  contextKey: ContextKey;

  /** 1 on first publish, incremented on every overwrite */
  version: number;

  /** Set once by disclose_policy; never cleared */
  publiclyDisclosed: boolean;

  updatedBy: Principal;
  createdAt: Timestamp;
  updatedAt: Timestamp;
};

/**
 * Threshold-gate parameters.
 *
 * A submission of k attributes is compared pairwise against the k
 * thresholds; when every attribute meets its threshold the result is
 * valueIfTrue, otherwise valueIfFalse.
 */
export type ThresholdGateParams = {
  thresholds: NumericCiphertext[];
  valueIfTrue: NumericCiphertext;
  valueIfFalse: NumericCiphertext;
  mode: PolicyMode;
};

/**
 * Multi-factor eligibility parameters. These are plaintext structural
 * configuration, not secrets.
 */
export type EligibilityParams = {
  minAge: number;
  requireInvite: boolean;
  allowedCountries: number[];
};

export type ThresholdGatePolicy = PolicyBase & { kind: 'threshold_gate' } & ThresholdGateParams;

export type EligibilityPolicy = PolicyBase & { kind: 'eligibility' } & EligibilityParams;

export type Policy = ThresholdGatePolicy | EligibilityPolicy;

/**
 * Kind-specific part of a policy, as written by the boundary.
 */
export type PolicyParams =
  | ({ kind: 'threshold_gate' } & ThresholdGateParams)
  | ({ kind: 'eligibility' } & EligibilityParams);

export function isThresholdGatePolicy(policy: Policy): policy is ThresholdGatePolicy {
  return policy.kind === 'threshold_gate';
}

export function isEligibilityPolicy(policy: Policy): policy is EligibilityPolicy {
  return policy.kind === 'eligibility';
}
