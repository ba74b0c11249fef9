// Contract of the external encrypted-value runtime
//
// The engine never performs homomorphic arithmetic or proof checking
// itself. Everything below is delegated to an implementation of this
// interface; the algebra adapter only checks kinds and logs.

import type {
  BoolCiphertext,
  Ciphertext,
  CiphertextKind,
  InputBundle,
  NumericCiphertext,
  NumericKind,
  Principal,
} from '@cloak/protocol';

export type ComparisonOp = 'eq' | 'ne' | 'ge' | 'gt' | 'le' | 'lt';

export type LogicalOp = 'and' | 'or';

export interface CiphertextRuntime {
  /**
   * Whether trivialEncrypt accepts the 'bool' kind. Runtimes without
   * native boolean literals get them synthesized from comparisons.
   */
  readonly supportsBooleanLiterals: boolean;

  /**
   * Inject a public constant as a ciphertext. The value is known to
   * everyone; only the result handle is opaque.
   */
  trivialEncrypt<K extends CiphertextKind>(value: bigint, kind: K): Promise<Ciphertext<K>>;

  /**
   * Verify one proof over all references jointly and return the
   * usable ciphertexts in reference order.
   *
   * @throws InvalidProofError when the proof does not cover the references for this submitter
   * @throws UnknownCiphertextError when a reference names no ciphertext
   */
  verifyInputs(bundle: InputBundle, submitter: Principal): Promise<Ciphertext[]>;

  compare(op: ComparisonOp, a: NumericCiphertext, b: NumericCiphertext): Promise<BoolCiphertext>;

  logical(op: LogicalOp, p: BoolCiphertext, q: BoolCiphertext): Promise<BoolCiphertext>;

  bitwiseAnd<K extends NumericKind>(a: Ciphertext<K>, b: Ciphertext<K>): Promise<Ciphertext<K>>;

  /**
   * Oblivious selection: both branches are already evaluated.
   */
  select<K extends CiphertextKind>(
    cond: BoolCiphertext,
    ifTrue: Ciphertext<K>,
    ifFalse: Ciphertext<K>
  ): Promise<Ciphertext<K>>;
}
