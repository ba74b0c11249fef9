// Tests for the access control ledger

import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryRepositoryContext } from '@cloak/repositories';
import type { InMemoryRepositoryContext } from '@cloak/repositories';
import type { Ciphertext } from '@cloak/protocol';
import { AccessControlLedger } from './ledger.js';
import type { AclFact } from './ledger.js';
import { InvalidPrincipalError } from '../errors.js';

const ct: Ciphertext = { handle: `0x${'a'.repeat(64)}`, kind: 'bool' };

describe('AccessControlLedger', () => {
  let repos: InMemoryRepositoryContext;
  let facts: AclFact[];
  let ledger: AccessControlLedger;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
    facts = [];
    ledger = new AccessControlLedger(repos.acl, {
      engineIdentity: 'engine',
      actor: 'alice',
      onFact: (fact) => facts.push(fact),
    });
  });

  it('grants idempotently and reports only new facts', async () => {
    expect(await ledger.grant(ct, 'alice')).toBe(true);
    expect(await ledger.grant(ct, 'alice')).toBe(false);

    expect(facts).toEqual([{ type: 'granted', handle: ct.handle, principal: 'alice' }]);
    expect((await repos.acl.getGrants(ct.handle))[0].grantedBy).toBe('alice');
  });

  it('grants the engine identity through grantSelf', async () => {
    await ledger.grantSelf(ct);
    expect(await ledger.isGranted(ct.handle, 'engine')).toBe(true);
  });

  it('refuses grants to the zero principal', async () => {
    await expect(ledger.grant(ct, '0x0000000000000000000000000000000000000000')).rejects.toBeInstanceOf(
      InvalidPrincipalError
    );
  });

  it('lets only grantees decrypt until disclosure', async () => {
    await ledger.grant(ct, 'alice');

    expect(await ledger.canDecrypt(ct.handle, 'alice')).toBe(true);
    expect(await ledger.canDecrypt(ct.handle, 'bob')).toBe(false);

    expect(await ledger.disclosePublicly(ct)).toBe(true);
    expect(await ledger.disclosePublicly(ct)).toBe(false);

    expect(await ledger.canDecrypt(ct.handle, 'bob')).toBe(true);
    expect(facts.filter((f) => f.type === 'disclosed')).toHaveLength(1);
  });

  it('summarizes facts per handle', async () => {
    await ledger.grantSelf(ct);
    await ledger.grant(ct, 'alice');

    const summary = await ledger.facts(ct.handle);
    expect(summary).toEqual({
      handle: ct.handle,
      principals: ['engine', 'alice'],
      publiclyDisclosed: false,
      disclosure: undefined,
    });
  });

  it('defaults the recorded actor to the engine identity', async () => {
    const engineLedger = new AccessControlLedger(repos.acl, { engineIdentity: 'engine' });
    await engineLedger.disclosePublicly(ct);
    expect((await repos.acl.getDisclosure(ct.handle))?.disclosedBy).toBe('engine');
  });
});
