import type {
  BoolCiphertext,
  Content,
  ContentMask,
  ContentPresence,
  MatchResult,
  Principal,
} from '@cloak/protocol';

/**
 * Input for creating a new Content
 */
export type CreateContentInput = {
  author: Principal;
  mask: ContentMask;
};

/**
 * Input for recording a principal's match verdict
 */
export type UpsertMatchInput = {
  contentId: number;
  principal: Principal;
  result: BoolCiphertext;
};

/**
 * Filter for listing Contents
 */
export type ContentFilter = {
  author?: Principal;
  includeCleared?: boolean;
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for Content and its match results.
 *
 * Content ids are sequential and never reused. Clearing is a terminal
 * transition: the record stays (so "cleared" differs from "never existed")
 * but cannot be updated or reactivated.
 */
export interface ContentRepository {
  /**
   * Create a Content with the next sequential id
   */
  create(input: CreateContentInput): Promise<Content>;

  /**
   * Get a Content by id, whether active or cleared
   * @returns Content or null if the id was never assigned
   */
  get(id: number): Promise<Content | null>;

  /**
   * Replace the mask of an active Content
   * @returns Updated Content or null if not found or cleared
   */
  updateMask(id: number, mask: ContentMask): Promise<Content | null>;

  /**
   * Overwrite the mask with a zero value and move to the cleared state
   * @returns Cleared Content or null if not found or already cleared
   */
  clear(id: number, zeroMask: ContentMask): Promise<Content | null>;

  presence(id: number): Promise<ContentPresence>;

  list(filter?: ContentFilter): Promise<Content[]>;

  getMatch(contentId: number, principal: Principal): Promise<MatchResult | null>;

  upsertMatch(input: UpsertMatchInput): Promise<MatchResult>;
}
