// Access control types - who may ask the decryption oracle for which value

import type { Handle, Principal, Timestamp } from './common.js';

/**
 * A decrypt authorization fact. Grants are monotonic: the engine
 * offers no way to remove one.
 */
export type AclGrant = {
  handle: Handle;
  principal: Principal;
  grantedAt: Timestamp;

  /** The principal whose invocation produced the grant */
  grantedBy: Principal;
};

/**
 * Marks a ciphertext as readable by anyone. One-way.
 */
export type AclDisclosure = {
  handle: Handle;
  disclosedAt: Timestamp;
  disclosedBy: Principal;
};

/**
 * Everything the decryption oracle needs to know about one handle.
 */
export type AclFacts = {
  handle: Handle;
  principals: Principal[];
  publiclyDisclosed: boolean;
  disclosure?: AclDisclosure;
};
