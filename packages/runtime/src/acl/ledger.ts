// Access Control Ledger
//
// Records which principal may ask the decryption oracle to reveal which
// ciphertext, and which ciphertexts anyone may reveal. Facts only ever
// accumulate: there is no revoke.

import { isZeroPrincipal } from '@cloak/protocol';
import type { AclFacts, Ciphertext, Handle, Principal } from '@cloak/protocol';
import type { AclRepository } from '@cloak/repositories';
import { InvalidPrincipalError } from '../errors.js';

/**
 * A fact newly added to the ledger.
 */
export type AclFact =
  | { type: 'granted'; handle: Handle; principal: Principal }
  | { type: 'disclosed'; handle: Handle; disclosedBy: Principal };

export type AclFactListener = (fact: AclFact) => void;

export type AccessControlLedgerOptions = {
  /** Principal used by grantSelf */
  engineIdentity: Principal;

  /** Recorded as grantedBy / disclosedBy; defaults to the engine identity */
  actor?: Principal;

  /** Called once per fact that was not already present */
  onFact?: AclFactListener;
};

export class AccessControlLedger {
  private readonly actor: Principal;

  constructor(
    private readonly acl: AclRepository,
    private readonly options: AccessControlLedgerOptions
  ) {
    this.actor = options.actor ?? options.engineIdentity;
  }

  get engineIdentity(): Principal {
    return this.options.engineIdentity;
  }

  /**
   * Authorize a principal to request decryption of a ciphertext.
   *
   * @returns true when the grant is new, false when it already existed
   * @throws InvalidPrincipalError for the zero principal
   */
  async grant(ciphertext: Ciphertext, principal: Principal): Promise<boolean> {
    if (isZeroPrincipal(principal)) {
      throw new InvalidPrincipalError(principal, 'grantee');
    }

    const added = await this.acl.addGrant(ciphertext.handle, principal, this.actor);
    if (added) {
      this.options.onFact?.({ type: 'granted', handle: ciphertext.handle, principal });
    }
    return added;
  }

  /**
   * Let the engine keep operating on a value it stores.
   */
  grantSelf(ciphertext: Ciphertext): Promise<boolean> {
    return this.grant(ciphertext, this.options.engineIdentity);
  }

  /**
   * Make a ciphertext decryptable by anyone. Cannot be undone.
   */
  async disclosePublicly(ciphertext: Ciphertext): Promise<boolean> {
    const added = await this.acl.addDisclosure(ciphertext.handle, this.actor);
    if (added) {
      this.options.onFact?.({
        type: 'disclosed',
        handle: ciphertext.handle,
        disclosedBy: this.actor,
      });
    }
    return added;
  }

  isGranted(handle: Handle, principal: Principal): Promise<boolean> {
    return this.acl.hasGrant(handle, principal);
  }

  async isPubliclyDisclosed(handle: Handle): Promise<boolean> {
    return (await this.acl.getDisclosure(handle)) !== null;
  }

  /**
   * The question the decryption oracle asks before revealing a value.
   */
  async canDecrypt(handle: Handle, principal: Principal): Promise<boolean> {
    if (await this.isPubliclyDisclosed(handle)) {
      return true;
    }
    return this.isGranted(handle, principal);
  }

  async facts(handle: Handle): Promise<AclFacts> {
    const [grants, disclosure] = await Promise.all([
      this.acl.getGrants(handle),
      this.acl.getDisclosure(handle),
    ]);

    return {
      handle,
      principals: grants.map((g) => g.principal),
      publiclyDisclosed: disclosure !== null,
      disclosure: disclosure ?? undefined,
    };
  }
}
