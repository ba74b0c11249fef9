// Tests for the ciphertext algebra adapter

import { describe, it, expect, beforeEach } from 'vitest';
import { CiphertextAlgebra, expectKind, expectNumeric } from './algebra.js';
import { createInMemoryCiphertextRuntime } from './in-memory-runtime.js';
import type { InMemoryCiphertextRuntime } from './in-memory-runtime.js';
import { createCapturingLogger } from '../logger.js';
import {
  IncompatibleCiphertextError,
  InvalidProofError,
  ValidationError,
} from '../errors.js';

describe('CiphertextAlgebra', () => {
  let runtime: InMemoryCiphertextRuntime;
  let algebra: CiphertextAlgebra;

  beforeEach(() => {
    runtime = createInMemoryCiphertextRuntime();
    algebra = new CiphertextAlgebra(runtime);
  });

  describe('lift', () => {
    it('lifts constants that fit the kind', async () => {
      const ct = await algebra.lift(255, 'uint8');
      expect(ct.kind).toBe('uint8');
      expect(runtime.reveal(ct.handle)).toBe(255n);
    });

    it('rejects constants wider than the kind', async () => {
      await expect(algebra.lift(256, 'uint8')).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects negative and fractional constants', async () => {
      await expect(algebra.lift(-1, 'uint32')).rejects.toBeInstanceOf(ValidationError);
      await expect(algebra.lift(1.5, 'uint32')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('comparisons and logic', () => {
    it('computes eq, ge and gt', async () => {
      const three = await algebra.lift(3, 'uint16');
      const five = await algebra.lift(5, 'uint16');

      expect(runtime.reveal((await algebra.eq(three, three)).handle)).toBe(1n);
      expect(runtime.reveal((await algebra.ge(three, five)).handle)).toBe(0n);
      expect(runtime.reveal((await algebra.ge(five, five)).handle)).toBe(1n);
      expect(runtime.reveal((await algebra.gt(five, three)).handle)).toBe(1n);
    });

    it('computes and / or', async () => {
      const t = await algebra.trueLiteral();
      const f = await algebra.falseLiteral();

      expect(runtime.reveal((await algebra.and(t, f)).handle)).toBe(0n);
      expect(runtime.reveal((await algebra.or(t, f)).handle)).toBe(1n);
    });

    it('refuses to compare operands of different kinds', async () => {
      const a = await algebra.lift(1, 'uint8');
      const b = await algebra.lift(1, 'uint16');

      await expect(algebra.eq(a, b)).rejects.toBeInstanceOf(IncompatibleCiphertextError);
      // Rejected before reaching the runtime
      expect(runtime.trace.map((t) => t.op)).toEqual(['trivialEncrypt', 'trivialEncrypt']);
    });

    it('bitwise-ands masks', async () => {
      const a = await algebra.lift(0b1100, 'uint32');
      const b = await algebra.lift(0b1010, 'uint32');
      const and = await algebra.bitwiseAnd(a, b);

      expect(and.kind).toBe('uint32');
      expect(runtime.reveal(and.handle)).toBe(0b1000n);
    });
  });

  describe('select', () => {
    it('returns the branch the condition picks', async () => {
      const yes = await algebra.lift(100, 'uint64');
      const no = await algebra.lift(7, 'uint64');

      const picked = await algebra.select(await algebra.trueLiteral(), yes, no);
      expect(runtime.reveal(picked.handle)).toBe(100n);

      const other = await algebra.select(await algebra.falseLiteral(), yes, no);
      expect(runtime.reveal(other.handle)).toBe(7n);
    });

    it('produces a fresh handle rather than returning a branch', async () => {
      const yes = await algebra.lift(1, 'uint64');
      const no = await algebra.lift(2, 'uint64');
      const picked = await algebra.select(await algebra.trueLiteral(), yes, no);

      expect(picked.handle).not.toBe(yes.handle);
    });
  });

  describe('boolean literals', () => {
    it('use native literals when the runtime has them', async () => {
      await algebra.trueLiteral();
      expect(runtime.trace.map((t) => t.op)).toEqual(['trivialEncrypt']);
    });

    it('synthesize literals from comparisons otherwise', async () => {
      const plain = createInMemoryCiphertextRuntime({ supportsBooleanLiterals: false });
      const fallback = new CiphertextAlgebra(plain);

      const t = await fallback.trueLiteral();
      const f = await fallback.falseLiteral();

      expect(t.kind).toBe('bool');
      expect(plain.reveal(t.handle)).toBe(1n);
      expect(plain.reveal(f.handle)).toBe(0n);
      expect(plain.trace.map((e) => e.op)).toEqual(['trivialEncrypt', 'eq', 'trivialEncrypt', 'gt']);
    });

    it('agree in meaning under both strategies', async () => {
      const plain = createInMemoryCiphertextRuntime({ supportsBooleanLiterals: false });
      const fallback = new CiphertextAlgebra(plain);

      for (const [alg, rt] of [
        [algebra, runtime],
        [fallback, plain],
      ] as const) {
        const t = await alg.trueLiteral();
        const f = await alg.falseLiteral();
        expect(rt.reveal((await alg.and(t, t)).handle)).toBe(1n);
        expect(rt.reveal((await alg.and(t, f)).handle)).toBe(0n);
        expect(rt.reveal((await alg.or(f, f)).handle)).toBe(0n);
      }
    });
  });

  describe('fromBundle', () => {
    it('returns verified ciphertexts in reference order', async () => {
      const bundle = runtime.encryptInputs('alice', [
        { value: 20, kind: 'uint8' },
        { value: 840, kind: 'uint16' },
      ]);

      const cts = await algebra.fromBundle(bundle, 'alice', ['uint8', 'uint16']);
      expect(cts.map((ct) => runtime.reveal(ct.handle))).toEqual([20n, 840n]);
    });

    it('rejects an empty proof', async () => {
      const bundle = runtime.encryptInputs('alice', [{ value: 1, kind: 'uint8' }]);
      await expect(
        algebra.fromBundle({ ...bundle, proof: '' }, 'alice', ['uint8'])
      ).rejects.toThrow('Invalid input proof: proof is empty');
    });

    it('rejects duplicate references', async () => {
      const bundle = runtime.encryptInputs('alice', [{ value: 1, kind: 'uint8' }]);
      const ref = bundle.references[0];
      await expect(
        algebra.fromBundle({ references: [ref, ref], proof: bundle.proof }, 'alice', [
          'uint8',
          'uint8',
        ])
      ).rejects.toThrow(`Invalid input proof: duplicate reference ${ref.handle}`);
    });

    it('rejects a count mismatch', async () => {
      const bundle = runtime.encryptInputs('alice', [{ value: 1, kind: 'uint8' }]);
      await expect(algebra.fromBundle(bundle, 'alice', ['uint8', 'uint16'])).rejects.toThrow(
        'Invalid input proof: expected 2 references, got 1'
      );
    });

    it('rejects a kind mismatch', async () => {
      const bundle = runtime.encryptInputs('alice', [{ value: 1, kind: 'uint8' }]);
      await expect(algebra.fromBundle(bundle, 'alice', ['uint32'])).rejects.toThrow(
        'Invalid input proof: reference 0 is uint8, expected uint32'
      );
    });

    it('rejects a bundle replayed by another submitter', async () => {
      const bundle = runtime.encryptInputs('alice', [{ value: 1, kind: 'uint8' }]);
      await expect(algebra.fromBundle(bundle, 'mallory', ['uint8'])).rejects.toBeInstanceOf(
        InvalidProofError
      );
    });
  });

  it('logs every primitive at debug level', async () => {
    const logger = createCapturingLogger();
    const logged = new CiphertextAlgebra(runtime, logger);

    const a = await logged.lift(1, 'uint8');
    await logged.ge(a, a);

    expect(logger.entries.map((e) => `${e.level}:${e.message}`)).toEqual([
      'debug:algebra.lift',
      'debug:algebra.ge',
    ]);
  });
});

describe('kind narrowing', () => {
  const ct = { handle: `0x${'c'.repeat(64)}`, kind: 'uint32' as const };

  it('expectKind passes matching kinds through', () => {
    expect(expectKind(ct, 'uint32', 'test')).toEqual(ct);
  });

  it('expectKind rejects other kinds', () => {
    expect(() => expectKind(ct, 'bool', 'test')).toThrow(IncompatibleCiphertextError);
  });

  it('expectNumeric rejects bool', () => {
    expect(() => expectNumeric({ handle: ct.handle, kind: 'bool' }, 'test')).toThrow(
      'test cannot take (bool): expected a numeric kind'
    );
  });
});
