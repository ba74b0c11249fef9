// Ciphertext Algebra Adapter
//
// A thin, kind-checked layer over the external runtime. The predicate
// evaluator composes only these primitives; nothing here branches on an
// encrypted value.

import {
  isNumericCiphertext,
  isNumericKind,
  maxValueForKind,
} from '@cloak/protocol';
import type {
  BoolCiphertext,
  Ciphertext,
  CiphertextKind,
  InputBundle,
  NumericCiphertext,
  NumericKind,
  Principal,
} from '@cloak/protocol';
import type { CiphertextRuntime, ComparisonOp } from './runtime.js';
import type { EngineLogger } from '../logger.js';
import { createScopedLogger, silentLogger } from '../logger.js';
import {
  IncompatibleCiphertextError,
  InvalidProofError,
  ValidationError,
} from '../errors.js';

/**
 * Narrow a verified ciphertext to the kind a caller requires.
 */
export function expectKind<K extends CiphertextKind>(
  ct: Ciphertext,
  kind: K,
  operation: string
): Ciphertext<K> {
  if (ct.kind !== kind) {
    throw new IncompatibleCiphertextError(operation, [ct.kind], `expected ${kind}`);
  }
  return { handle: ct.handle, kind };
}

export function expectNumeric(ct: Ciphertext, operation: string): NumericCiphertext {
  if (!isNumericCiphertext(ct)) {
    throw new IncompatibleCiphertextError(operation, [ct.kind], 'expected a numeric kind');
  }
  return ct;
}

export class CiphertextAlgebra {
  private readonly logger: EngineLogger;

  constructor(
    private readonly runtime: CiphertextRuntime,
    logger: EngineLogger = silentLogger
  ) {
    this.logger = createScopedLogger(logger, 'algebra');
  }

  /**
   * Lift a public constant into a ciphertext of the given kind.
   *
   * @throws ValidationError when the constant is negative, fractional or too wide
   */
  async lift<K extends CiphertextKind>(constant: number | bigint, kind: K): Promise<Ciphertext<K>> {
    if (typeof constant === 'number' && !Number.isInteger(constant)) {
      throw new ValidationError(`Cannot lift non-integer ${constant}`, {
        details: { kind },
      });
    }

    const value = BigInt(constant);
    if (value < 0n || value > maxValueForKind(kind)) {
      throw new ValidationError(`Constant ${value} does not fit in ${kind}`, {
        details: { kind },
      });
    }

    const ct = await this.runtime.trivialEncrypt(value, kind);
    this.logger.debug('lift', { kind, output: ct.handle });
    return ct;
  }

  eq(a: NumericCiphertext, b: NumericCiphertext): Promise<BoolCiphertext> {
    return this.compare('eq', a, b);
  }

  ge(a: NumericCiphertext, b: NumericCiphertext): Promise<BoolCiphertext> {
    return this.compare('ge', a, b);
  }

  gt(a: NumericCiphertext, b: NumericCiphertext): Promise<BoolCiphertext> {
    return this.compare('gt', a, b);
  }

  async and(p: BoolCiphertext, q: BoolCiphertext): Promise<BoolCiphertext> {
    this.assertBool('and', p, q);
    const ct = await this.runtime.logical('and', p, q);
    this.logger.debug('and', { inputs: [p.handle, q.handle], output: ct.handle });
    return ct;
  }

  async or(p: BoolCiphertext, q: BoolCiphertext): Promise<BoolCiphertext> {
    this.assertBool('or', p, q);
    const ct = await this.runtime.logical('or', p, q);
    this.logger.debug('or', { inputs: [p.handle, q.handle], output: ct.handle });
    return ct;
  }

  async bitwiseAnd<K extends NumericKind>(a: Ciphertext<K>, b: Ciphertext<K>): Promise<Ciphertext<K>> {
    if (!isNumericKind(a.kind) || a.kind !== b.kind) {
      throw new IncompatibleCiphertextError(
        'bitwiseAnd',
        [a.kind, b.kind],
        'operands must share one numeric kind'
      );
    }
    const ct = await this.runtime.bitwiseAnd(a, b);
    this.logger.debug('bitwiseAnd', { inputs: [a.handle, b.handle], output: ct.handle });
    return ct;
  }

  /**
   * Choose between two already-evaluated ciphertexts. Both branches are
   * always computed by the caller.
   */
  async select<K extends CiphertextKind>(
    cond: BoolCiphertext,
    ifTrue: Ciphertext<K>,
    ifFalse: Ciphertext<K>
  ): Promise<Ciphertext<K>> {
    if (cond.kind !== 'bool') {
      throw new IncompatibleCiphertextError('select', [cond.kind], 'condition must be bool');
    }
    if (ifTrue.kind !== ifFalse.kind) {
      throw new IncompatibleCiphertextError(
        'select',
        [ifTrue.kind, ifFalse.kind],
        'branches must share one kind'
      );
    }
    const ct = await this.runtime.select(cond, ifTrue, ifFalse);
    this.logger.debug('select', {
      inputs: [cond.handle, ifTrue.handle, ifFalse.handle],
      output: ct.handle,
    });
    return ct;
  }

  async trueLiteral(): Promise<BoolCiphertext> {
    if (this.runtime.supportsBooleanLiterals) {
      return this.runtime.trivialEncrypt(1n, 'bool');
    }
    const zero = await this.lift(0, 'uint8');
    return this.eq(zero, zero);
  }

  async falseLiteral(): Promise<BoolCiphertext> {
    if (this.runtime.supportsBooleanLiterals) {
      return this.runtime.trivialEncrypt(0n, 'bool');
    }
    const zero = await this.lift(0, 'uint8');
    return this.gt(zero, zero);
  }

  /**
   * Convert a proof-backed bundle into usable ciphertexts, one per
   * expected kind. Structural problems are rejected before the runtime
   * is asked to verify the proof.
   *
   * @throws InvalidProofError
   */
  async fromBundle(
    bundle: InputBundle,
    submitter: Principal,
    expectedKinds: readonly CiphertextKind[]
  ): Promise<Ciphertext[]> {
    if (bundle.proof.trim() === '') {
      throw new InvalidProofError('proof is empty');
    }
    if (bundle.references.length === 0) {
      throw new InvalidProofError('bundle has no references');
    }

    const seen = new Set<string>();
    for (const ref of bundle.references) {
      if (seen.has(ref.handle)) {
        throw new InvalidProofError(`duplicate reference ${ref.handle}`);
      }
      seen.add(ref.handle);
    }

    if (bundle.references.length !== expectedKinds.length) {
      throw new InvalidProofError(
        `expected ${expectedKinds.length} references, got ${bundle.references.length}`
      );
    }

    bundle.references.forEach((ref, i) => {
      if (ref.kind !== expectedKinds[i]) {
        throw new InvalidProofError(`reference ${i} is ${ref.kind}, expected ${expectedKinds[i]}`);
      }
    });

    const cts = await this.runtime.verifyInputs(bundle, submitter);
    if (cts.length !== expectedKinds.length) {
      throw new InvalidProofError(
        `runtime returned ${cts.length} ciphertexts for ${expectedKinds.length} references`
      );
    }

    this.logger.debug('fromBundle', {
      submitter,
      handles: cts.map((ct) => ct.handle),
    });
    return cts;
  }

  private async compare(
    op: ComparisonOp,
    a: NumericCiphertext,
    b: NumericCiphertext
  ): Promise<BoolCiphertext> {
    if (!isNumericKind(a.kind) || a.kind !== b.kind) {
      throw new IncompatibleCiphertextError(op, [a.kind, b.kind], 'operands must share one numeric kind');
    }
    const ct = await this.runtime.compare(op, a, b);
    this.logger.debug(op, { inputs: [a.handle, b.handle], output: ct.handle });
    return ct;
  }

  private assertBool(operation: string, p: BoolCiphertext, q: BoolCiphertext): void {
    if (p.kind !== 'bool' || q.kind !== 'bool') {
      throw new IncompatibleCiphertextError(operation, [p.kind, q.kind], 'operands must be bool');
    }
  }
}
