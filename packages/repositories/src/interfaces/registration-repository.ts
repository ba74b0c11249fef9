import type {
  Ciphertext,
  ContextKey,
  PolicyKind,
  Principal,
  Registration,
} from '@cloak/protocol';

/**
 * Input for recording a principal's evaluated result
 */
export type UpsertRegistrationInput = {
  contextKey: ContextKey;
  principal: Principal;
  policyKind: PolicyKind;
  result: Ciphertext;
};

/**
 * Repository interface for Registration operations.
 *
 * Registrations are keyed by (context key, principal). Re-submission
 * overwrites the result (last write wins). There is no delete.
 */
export interface RegistrationRepository {
  /**
   * @returns Registration or null if the principal never submitted
   */
  get(contextKey: ContextKey, principal: Principal): Promise<Registration | null>;

  upsert(input: UpsertRegistrationInput): Promise<Registration>;

  /**
   * All registrations recorded against a context
   */
  listByContext(contextKey: ContextKey): Promise<Registration[]>;
}
