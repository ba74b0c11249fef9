// Tests for the in-memory audit store

import { describe, it, expect, beforeEach } from 'vitest';
import type { AuditEntry } from '@cloak/protocol';
import { createInMemoryAuditStore } from './audit.js';
import type { AuditStore } from './audit.js';

function createEntry(id: string, overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    id,
    timestamp: '2024-01-01T00:00:00Z',
    actor: { principal: '0xadmin', method: 'api' },
    operationType: 'set_eligibility_policy',
    resourceType: 'policy',
    resourceId: 'kyc',
    details: {},
    success: true,
    ...overrides,
  };
}

describe('createInMemoryAuditStore', () => {
  let store: AuditStore;

  beforeEach(async () => {
    store = createInMemoryAuditStore();
    await store.append(createEntry('a1', { timestamp: '2024-01-01T00:00:00Z' }));
    await store.append(
      createEntry('a2', {
        timestamp: '2024-01-02T00:00:00Z',
        actor: { principal: '0xalice', method: 'api' },
        operationType: 'submit_eligibility',
        resourceType: 'registration',
      })
    );
    await store.append(
      createEntry('a3', {
        timestamp: '2024-01-03T00:00:00Z',
        success: false,
        errorCode: 'NOT_AUTHORIZED',
      })
    );
  });

  it('gets entries by id', async () => {
    expect((await store.get('a2'))?.operationType).toBe('submit_eligibility');
    expect(await store.get('missing')).toBeNull();
  });

  it('returns the most recent entries first', async () => {
    const entries = await store.query();
    expect(entries.map((e) => e.id)).toEqual(['a3', 'a2', 'a1']);
  });

  it('breaks timestamp ties by reverse append order', async () => {
    const tied = createInMemoryAuditStore();
    await tied.append(createEntry('t1'));
    await tied.append(createEntry('t2'));

    expect((await tied.query()).map((e) => e.id)).toEqual(['t2', 't1']);
  });

  it('filters by principal', async () => {
    const entries = await store.getByPrincipal('0xadmin');
    expect(entries.map((e) => e.id)).toEqual(['a3', 'a1']);
  });

  it('filters by resource', async () => {
    const entries = await store.getByResource('policy', 'kyc');
    expect(entries.map((e) => e.id)).toEqual(['a3', 'a1']);
  });

  it('combines query filters', async () => {
    const failed = await store.query({ resourceType: 'policy', success: false });
    expect(failed.map((e) => e.id)).toEqual(['a3']);

    const byType = await store.query({ operationType: 'submit_eligibility' });
    expect(byType.map((e) => e.id)).toEqual(['a2']);
  });

  it('applies time windows and pagination', async () => {
    const window = await store.query({
      since: '2024-01-02T00:00:00Z',
      until: '2024-01-03T00:00:00Z',
    });
    expect(window.map((e) => e.id)).toEqual(['a3', 'a2']);

    const page = await store.query({ limit: 1, offset: 1 });
    expect(page.map((e) => e.id)).toEqual(['a2']);
  });
});
