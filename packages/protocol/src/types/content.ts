// Content types - author-owned masks for bitmask-intersection matching

import type { Principal, Timestamp } from './common.js';
import type { Ciphertext, BoolCiphertext } from './ciphertext.js';

/**
 * Content lifecycle:
 *
 *   (none) -> active -> active (update) -> cleared
 *
 * cleared is terminal. A new Content may be created independently.
 */
export type ContentStatus = 'active' | 'cleared';

/**
 * Reported by status lookups so audits can tell "never created"
 * apart from "created and retracted".
 */
export type ContentPresence = 'none' | ContentStatus;

/**
 * The mask is stored either as plaintext (developer mode) or as a
 * ciphertext. Exactly one representation is authoritative.
 */
export type ContentMask =
  | { isPlain: true; plainMask: number }
  | { isPlain: false; encMask: Ciphertext<'uint32'> };

export type Content = {
  /** Sequential, starting at 1 */
  id: number;
  author: Principal;
  mask: ContentMask;
  status: ContentStatus;

  /** false once cleared */
  exists: boolean;

  createdAt: Timestamp;
  updatedAt: Timestamp;
  clearedAt?: Timestamp;
};

/**
 * A principal's match verdict against one Content.
 * Re-submission overwrites in place.
 */
export type MatchResult = {
  contentId: number;
  principal: Principal;
  result: BoolCiphertext;
  submissionCount: number;
  createdAt: Timestamp;
  updatedAt: Timestamp;
};
