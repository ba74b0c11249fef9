import type { AclDisclosure, AclGrant, Handle, Principal } from '@cloak/protocol';

/**
 * Repository interface for the Access Control Ledger's facts.
 *
 * Both grants and disclosures are append-only. Adding an existing fact
 * is a no-op that reports `false`.
 */
export interface AclRepository {
  /**
   * Record that a principal may request decryption of a handle
   * @returns true if the grant is new
   */
  addGrant(handle: Handle, principal: Principal, grantedBy: Principal): Promise<boolean>;

  hasGrant(handle: Handle, principal: Principal): Promise<boolean>;

  /**
   * All grants for a handle, in the order they were added
   */
  getGrants(handle: Handle): Promise<AclGrant[]>;

  /**
   * All handles a principal may decrypt
   */
  getHandlesFor(principal: Principal): Promise<Handle[]>;

  /**
   * Mark a handle as publicly disclosed
   * @returns true if the handle was not disclosed before
   */
  addDisclosure(handle: Handle, disclosedBy: Principal): Promise<boolean>;

  getDisclosure(handle: Handle): Promise<AclDisclosure | null>;
}
