// In-process reference runtime
//
// Keeps plaintexts in a map behind sha256-derived handles. It stands in
// for the client encryptor (encryptInputs), the encrypted runtime
// (CiphertextRuntime) and the decryption oracle (reveal) during local
// development and tests. It provides no confidentiality.

import { createHash } from 'node:crypto';
import { maxValueForKind } from '@cloak/protocol';
import type {
  BoolCiphertext,
  Ciphertext,
  CiphertextKind,
  ExternalReference,
  Handle,
  InputBundle,
  NumericCiphertext,
  NumericKind,
  Principal,
} from '@cloak/protocol';
import type { CiphertextRuntime, ComparisonOp, LogicalOp } from './runtime.js';
import {
  IncompatibleCiphertextError,
  InvalidProofError,
  UnknownCiphertextError,
  ValidationError,
} from '../errors.js';

export type RuntimeTraceEntry = {
  op: string;
  inputs: Handle[];
  output: Handle;
};

export type PlainInput = {
  value: number | bigint;
  kind: CiphertextKind;
};

export type InMemoryCiphertextRuntimeOptions = {
  /** Defaults to true */
  supportsBooleanLiterals?: boolean;

  /** Mixed into every handle so two runtimes never share handles */
  seed?: string;
};

export interface InMemoryCiphertextRuntime extends CiphertextRuntime {
  /**
   * Encrypt values on behalf of a submitter and produce the bundle a
   * client would send, with a proof bound to that submitter.
   */
  encryptInputs(submitter: Principal, values: PlainInput[]): InputBundle;

  /**
   * Decrypt a handle. Stands in for the off-engine oracle, which
   * consults the ACL before answering; this method does not.
   */
  reveal(handle: Handle): bigint;

  /** Every primitive evaluated so far, in order */
  readonly trace: readonly RuntimeTraceEntry[];

  /** Number of ciphertexts held */
  readonly size: number;
}

type StoredValue = {
  kind: CiphertextKind;
  value: bigint;
};

function sha256Hex(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * The proof a client encryptor would attach: binds the submitter to the
 * exact references, in order.
 */
export function proofFor(submitter: Principal, references: ExternalReference[]): string {
  const body = references.map((r) => `${r.handle}:${r.kind}`).join(',');
  return `0x${sha256Hex(`proof:${submitter}:${body}`)}`;
}

/**
 * Create the in-process reference runtime.
 *
 * @example
 * ```typescript
 * const runtime = createInMemoryCiphertextRuntime();
 * const bundle = runtime.encryptInputs('alice', [{ value: 20, kind: 'uint8' }]);
 * const [age] = await runtime.verifyInputs(bundle, 'alice');
 * runtime.reveal(age.handle); // 20n
 * ```
 */
export function createInMemoryCiphertextRuntime(
  options: InMemoryCiphertextRuntimeOptions = {}
): InMemoryCiphertextRuntime {
  const supportsBooleanLiterals = options.supportsBooleanLiterals ?? true;
  const seed = options.seed ?? 'cloak';
  const store = new Map<Handle, StoredValue>();
  const trace: RuntimeTraceEntry[] = [];
  let counter = 0;

  function put<K extends CiphertextKind>(kind: K, value: bigint, label: string): Ciphertext<K> {
    counter += 1;
    const handle = `0x${sha256Hex(`${seed}:${counter}:${label}`)}`;
    store.set(handle, { kind, value });
    return { handle, kind };
  }

  function read(ct: Ciphertext, op: string): bigint {
    const stored = store.get(ct.handle);
    if (!stored) {
      throw new UnknownCiphertextError(ct.handle);
    }
    if (stored.kind !== ct.kind) {
      throw new IncompatibleCiphertextError(
        op,
        [ct.kind, stored.kind],
        'declared kind differs from the stored kind'
      );
    }
    return stored.value;
  }

  function record<K extends CiphertextKind>(
    op: string,
    inputs: Ciphertext[],
    output: Ciphertext<K>
  ): Ciphertext<K> {
    trace.push({ op, inputs: inputs.map((i) => i.handle), output: output.handle });
    return output;
  }

  function checkWidth(value: bigint, kind: CiphertextKind): void {
    if (value < 0n || value > maxValueForKind(kind)) {
      throw new ValidationError(`Value ${value} does not fit in ${kind}`, {
        details: { kind },
      });
    }
  }

  const compareOps: Record<ComparisonOp, (a: bigint, b: bigint) => boolean> = {
    eq: (a, b) => a === b,
    ne: (a, b) => a !== b,
    ge: (a, b) => a >= b,
    gt: (a, b) => a > b,
    le: (a, b) => a <= b,
    lt: (a, b) => a < b,
  };

  const logicalOps: Record<LogicalOp, (p: bigint, q: bigint) => bigint> = {
    and: (p, q) => p & q,
    or: (p, q) => p | q,
  };

  return {
    supportsBooleanLiterals,

    get trace() {
      return trace;
    },

    get size() {
      return store.size;
    },

    async trivialEncrypt<K extends CiphertextKind>(value: bigint, kind: K): Promise<Ciphertext<K>> {
      if (kind === 'bool' && !supportsBooleanLiterals) {
        throw new IncompatibleCiphertextError(
          'trivialEncrypt',
          [kind],
          'runtime has no boolean literals'
        );
      }
      checkWidth(value, kind);
      return record('trivialEncrypt', [], put(kind, value, 'trivial'));
    },

    async verifyInputs(bundle: InputBundle, submitter: Principal): Promise<Ciphertext[]> {
      if (bundle.proof !== proofFor(submitter, bundle.references)) {
        throw new InvalidProofError('proof does not validate the references for this submitter');
      }

      return bundle.references.map((ref) => {
        const stored = store.get(ref.handle);
        if (!stored) {
          throw new UnknownCiphertextError(ref.handle);
        }
        if (stored.kind !== ref.kind) {
          throw new InvalidProofError(`reference ${ref.handle} is not a ${ref.kind}`);
        }
        return { handle: ref.handle, kind: stored.kind };
      });
    },

    async compare(
      op: ComparisonOp,
      a: NumericCiphertext,
      b: NumericCiphertext
    ): Promise<BoolCiphertext> {
      const result = compareOps[op](read(a, op), read(b, op)) ? 1n : 0n;
      return record(op, [a, b], put('bool', result, op));
    },

    async logical(op: LogicalOp, p: BoolCiphertext, q: BoolCiphertext): Promise<BoolCiphertext> {
      const result = logicalOps[op](read(p, op), read(q, op));
      return record(op, [p, q], put('bool', result, op));
    },

    async bitwiseAnd<K extends NumericKind>(a: Ciphertext<K>, b: Ciphertext<K>): Promise<Ciphertext<K>> {
      const result = read(a, 'bitwiseAnd') & read(b, 'bitwiseAnd');
      return record('bitwiseAnd', [a, b], put(a.kind, result, 'bitwiseAnd'));
    },

    async select<K extends CiphertextKind>(
      cond: BoolCiphertext,
      ifTrue: Ciphertext<K>,
      ifFalse: Ciphertext<K>
    ): Promise<Ciphertext<K>> {
      const c = read(cond, 'select');
      const t = read(ifTrue, 'select');
      const f = read(ifFalse, 'select');
      return record('select', [cond, ifTrue, ifFalse], put(ifTrue.kind, c === 1n ? t : f, 'select'));
    },

    encryptInputs(submitter: Principal, values: PlainInput[]): InputBundle {
      const references: ExternalReference[] = values.map(({ value, kind }) => {
        const v = BigInt(value);
        checkWidth(v, kind);
        const { handle } = put(kind, v, `input:${submitter}`);
        return { handle, kind };
      });
      return { references, proof: proofFor(submitter, references) };
    },

    reveal(handle: Handle): bigint {
      const stored = store.get(handle);
      if (!stored) {
        throw new UnknownCiphertextError(handle);
      }
      return stored.value;
    },
  };
}
