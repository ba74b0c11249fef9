import type { ContextKey, Policy, PolicyKind, PolicyParams, Principal } from '@cloak/protocol';

/**
 * Input for publishing (or overwriting) the policy of a context
 */
export type UpsertPolicyInput = {
  contextKey: ContextKey;
  params: PolicyParams;
  updatedBy: Principal;
};

/**
 * Filter for listing Policies
 */
export type PolicyFilter = {
  kind?: PolicyKind;
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for Policy operations.
 *
 * Exactly one Policy exists per context key. Publishing again overwrites
 * the parameters in place and bumps the version; policies are never deleted.
 */
export interface PolicyRepository {
  /**
   * Get the Policy for a context
   * @returns Policy or null if none was ever published
   */
  get(contextKey: ContextKey): Promise<Policy | null>;

  /**
   * Publish or overwrite the Policy for a context.
   * New parameters start undisclosed, so an overwrite resets publiclyDisclosed.
   */
  upsert(input: UpsertPolicyInput): Promise<Policy>;

  /**
   * Mark the Policy's parameters as publicly disclosed
   * @returns Updated Policy or null if not found
   */
  markDisclosed(contextKey: ContextKey): Promise<Policy | null>;

  /**
   * List Policies ordered by context key
   */
  list(filter?: PolicyFilter): Promise<Policy[]>;
}
