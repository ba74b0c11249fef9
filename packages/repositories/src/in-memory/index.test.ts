// Tests for the in-memory repository context

import { describe, it, expect, beforeEach } from 'vitest';
import type { Ciphertext } from '@cloak/protocol';
import { createInMemoryRepositoryContext } from './index.js';
import type { InMemoryRepositoryContext } from './index.js';

const HANDLE_A = `0x${'a'.repeat(64)}`;
const HANDLE_B = `0x${'b'.repeat(64)}`;

const result: Ciphertext = { handle: HANDLE_A, kind: 'uint64' };

describe('createInMemoryRepositoryContext', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  describe('policies', () => {
    it('versions overwrites and resets disclosure', async () => {
      const params = {
        kind: 'eligibility' as const,
        minAge: 18,
        requireInvite: false,
        allowedCountries: [250],
      };

      const first = await repos.policies.upsert({ contextKey: 'kyc', params, updatedBy: 'admin' });
      expect(first.version).toBe(1);

      const disclosed = await repos.policies.markDisclosed('kyc');
      expect(disclosed?.publiclyDisclosed).toBe(true);

      const second = await repos.policies.upsert({
        contextKey: 'kyc',
        params: { ...params, minAge: 21 },
        updatedBy: 'admin',
      });
      expect(second.version).toBe(2);
      expect(second.publiclyDisclosed).toBe(false);
      expect(second.createdAt).toBe(first.createdAt);
      expect(second.kind === 'eligibility' && second.minAge).toBe(21);
    });

    it('returns null when disclosing a missing policy', async () => {
      expect(await repos.policies.markDisclosed('missing')).toBeNull();
    });

    it('lists policies by context key and kind', async () => {
      await repos.policies.upsert({
        contextKey: 'b',
        params: { kind: 'eligibility', minAge: 1, requireInvite: false, allowedCountries: [] },
        updatedBy: 'admin',
      });
      await repos.policies.upsert({
        contextKey: 'a',
        params: {
          kind: 'threshold_gate',
          thresholds: [],
          valueIfTrue: { handle: HANDLE_A, kind: 'uint64' },
          valueIfFalse: { handle: HANDLE_B, kind: 'uint64' },
          mode: 'plain',
        },
        updatedBy: 'admin',
      });

      const all = await repos.policies.list();
      expect(all.map((p) => p.contextKey)).toEqual(['a', 'b']);

      const gates = await repos.policies.list({ kind: 'threshold_gate' });
      expect(gates.map((p) => p.contextKey)).toEqual(['a']);
    });
  });

  describe('registrations', () => {
    it('overwrites in place and counts submissions', async () => {
      await repos.registrations.upsert({
        contextKey: 'kyc',
        principal: 'alice',
        policyKind: 'eligibility',
        result,
      });
      const second = await repos.registrations.upsert({
        contextKey: 'kyc',
        principal: 'alice',
        policyKind: 'eligibility',
        result: { handle: HANDLE_B, kind: 'bool' },
      });

      expect(second.submissionCount).toBe(2);
      expect(second.result.handle).toBe(HANDLE_B);
      expect(await repos.registrations.listByContext('kyc')).toHaveLength(1);
      expect(await repos.registrations.get('kyc', 'bob')).toBeNull();
    });
  });

  describe('contents', () => {
    it('assigns sequential ids starting at 1', async () => {
      const first = await repos.contents.create({
        author: 'author',
        mask: { isPlain: true, plainMask: 1 },
      });
      const second = await repos.contents.create({
        author: 'author',
        mask: { isPlain: true, plainMask: 2 },
      });

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
    });

    it('distinguishes never-created from cleared', async () => {
      const content = await repos.contents.create({
        author: 'author',
        mask: { isPlain: true, plainMask: 5 },
      });

      expect(await repos.contents.presence(99)).toBe('none');
      expect(await repos.contents.presence(content.id)).toBe('active');

      const cleared = await repos.contents.clear(content.id, { isPlain: true, plainMask: 0 });
      expect(cleared?.status).toBe('cleared');
      expect(cleared?.exists).toBe(false);
      expect(cleared?.mask).toEqual({ isPlain: true, plainMask: 0 });
      expect(await repos.contents.presence(content.id)).toBe('cleared');
    });

    it('refuses to update or clear cleared content', async () => {
      const content = await repos.contents.create({
        author: 'author',
        mask: { isPlain: true, plainMask: 5 },
      });
      await repos.contents.clear(content.id, { isPlain: true, plainMask: 0 });

      expect(await repos.contents.updateMask(content.id, { isPlain: true, plainMask: 7 })).toBeNull();
      expect(await repos.contents.clear(content.id, { isPlain: true, plainMask: 0 })).toBeNull();
    });

    it('hides cleared content from listings unless asked', async () => {
      await repos.contents.create({ author: 'a', mask: { isPlain: true, plainMask: 1 } });
      const second = await repos.contents.create({ author: 'b', mask: { isPlain: true, plainMask: 2 } });
      await repos.contents.clear(second.id, { isPlain: true, plainMask: 0 });

      expect((await repos.contents.list()).map((c) => c.id)).toEqual([1]);
      expect((await repos.contents.list({ includeCleared: true })).map((c) => c.id)).toEqual([1, 2]);
      expect((await repos.contents.list({ author: 'b', includeCleared: true })).map((c) => c.id)).toEqual([2]);
    });

    it('overwrites match results per principal', async () => {
      await repos.contents.upsertMatch({
        contentId: 1,
        principal: 'bob',
        result: { handle: HANDLE_A, kind: 'bool' },
      });
      const second = await repos.contents.upsertMatch({
        contentId: 1,
        principal: 'bob',
        result: { handle: HANDLE_B, kind: 'bool' },
      });

      expect(second.submissionCount).toBe(2);
      expect((await repos.contents.getMatch(1, 'bob'))?.result.handle).toBe(HANDLE_B);
      expect(await repos.contents.getMatch(1, 'carol')).toBeNull();
    });
  });

  describe('acl', () => {
    it('records each grant once', async () => {
      expect(await repos.acl.addGrant(HANDLE_A, 'alice', 'engine')).toBe(true);
      expect(await repos.acl.addGrant(HANDLE_A, 'alice', 'engine')).toBe(false);
      expect(await repos.acl.addGrant(HANDLE_A, 'bob', 'engine')).toBe(true);

      expect((await repos.acl.getGrants(HANDLE_A)).map((g) => g.principal)).toEqual(['alice', 'bob']);
      expect(await repos.acl.hasGrant(HANDLE_A, 'carol')).toBe(false);
      expect(await repos.acl.getHandlesFor('alice')).toEqual([HANDLE_A]);
    });

    it('records each disclosure once', async () => {
      expect(await repos.acl.addDisclosure(HANDLE_A, 'alice')).toBe(true);
      expect(await repos.acl.addDisclosure(HANDLE_A, 'bob')).toBe(false);
      expect((await repos.acl.getDisclosure(HANDLE_A))?.disclosedBy).toBe('alice');
      expect(await repos.acl.getDisclosure(HANDLE_B)).toBeNull();
    });
  });

  describe('transaction', () => {
    it('commits when the function resolves', async () => {
      await repos.transaction(async (tx) => {
        await tx.admin.set('admin');
        await tx.acl.addGrant(HANDLE_A, 'alice', 'engine');
      });

      expect(await repos.admin.get()).toBe('admin');
      expect(await repos.acl.hasGrant(HANDLE_A, 'alice')).toBe(true);
    });

    it('rolls back every store when the function throws', async () => {
      await repos.admin.set('admin');

      await expect(
        repos.transaction(async (tx) => {
          await tx.admin.set('mallory');
          await tx.contents.create({ author: 'a', mask: { isPlain: true, plainMask: 1 } });
          await tx.acl.addGrant(HANDLE_A, 'alice', 'engine');
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await repos.admin.get()).toBe('admin');
      expect(await repos.contents.presence(1)).toBe('none');
      expect(await repos.acl.hasGrant(HANDLE_A, 'alice')).toBe(false);

      // The sequence is restored too
      const next = await repos.contents.create({ author: 'a', mask: { isPlain: true, plainMask: 1 } });
      expect(next.id).toBe(1);
    });
  });

  it('clear() empties every store', async () => {
    await repos.admin.set('admin');
    await repos.contents.create({ author: 'a', mask: { isPlain: true, plainMask: 1 } });
    repos.clear();

    expect(await repos.admin.get()).toBeNull();
    expect(repos._data.contents.size).toBe(0);
    expect(repos._data.sequence.nextContentId).toBe(1);
  });
});
