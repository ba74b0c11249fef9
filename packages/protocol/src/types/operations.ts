// Boundary operation types
//
// Every mutation of engine state is expressed as one of these operations
// and flows through the boundary, which provides:
// - Authorization (admin-only, author-only checks)
// - Atomic commit (state, grants and notifications, or nothing)
// - Audit logging (who invoked what, with which outcome)

import type { ContextKey, Handle, Id, Principal, Timestamp } from './common.js';
import type { InputBundle } from './ciphertext.js';
import type { Policy } from './policies.js';
import type { Registration } from './registrations.js';
import type { Content, MatchResult } from './content.js';

// ============================================================================
// Audit Entry
// ============================================================================

/**
 * Audit entry recorded for every boundary invocation, successful or not.
 */
export type AuditEntry = {
  id: Id;
  timestamp: Timestamp;
  actor: AuditActor;

  /** 'invalid' when the payload failed schema validation */
  operationType: OperationType | 'invalid';
  resourceType: ResourceType | 'invalid';

  /** Context key, content id or principal the operation targeted */
  resourceId?: string;

  /** Operation-specific details (never plaintext values) */
  details: Record<string, unknown>;

  success: boolean;
  error?: string;
  errorCode?: EngineErrorCode;
};

export type AuditActor = {
  principal: Principal;

  /** How this operation was initiated */
  method: 'api' | 'cli' | 'system';
};

// ============================================================================
// Operation Types
// ============================================================================

export type OperationType =
  // Admin surface
  | 'set_threshold_policy'
  | 'set_threshold_policy_plain'
  | 'set_eligibility_policy'
  | 'disclose_policy'
  | 'transfer_admin'
  // Participant surface
  | 'submit_threshold'
  | 'submit_eligibility'
  | 'disclose_result'
  // Content (bitmask matching)
  | 'create_content'
  | 'create_content_plain'
  | 'update_content'
  | 'update_content_plain'
  | 'clear_content'
  | 'submit_match'
  | 'disclose_match';

export type ResourceType = 'policy' | 'admin' | 'registration' | 'content' | 'match';

/**
 * Stable failure codes surfaced to callers so automation can tell
 * "policy missing" from "not authorized" from "malformed input".
 */
export type EngineErrorCode =
  | 'POLICY_NOT_FOUND'
  | 'NOT_AUTHORIZED'
  | 'INVALID_PROOF'
  | 'ALLOW_LIST_TOO_LARGE'
  | 'INVALID_CONTEXT_KEY'
  | 'REGISTRATION_NOT_FOUND'
  | 'CONTENT_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'POLICY_KIND_MISMATCH'
  | 'DEVELOPER_MODE_DISABLED'
  | 'INVALID_PRINCIPAL'
  | 'INCOMPATIBLE_CIPHERTEXT'
  | 'UNKNOWN_CIPHERTEXT'
  | 'ALREADY_INITIALIZED'
  | 'INTERNAL_ERROR';

// ============================================================================
// Operation Inputs
// ============================================================================

export type OperationBase = {
  actor: {
    principal: Principal;
    method?: AuditActor['method'];
  };
};

// --- Admin Operations ---

/**
 * Bundle layout: k threshold references, then valueIfTrue, then valueIfFalse.
 */
export type SetThresholdPolicyOperation = OperationBase & {
  type: 'set_threshold_policy';
  contextKey: ContextKey;
  bundle: InputBundle;
};

export type SetThresholdPolicyPlainOperation = OperationBase & {
  type: 'set_threshold_policy_plain';
  contextKey: ContextKey;
  thresholds: number[];
  valueIfTrue: number;
  valueIfFalse: number;
};

export type SetEligibilityPolicyOperation = OperationBase & {
  type: 'set_eligibility_policy';
  contextKey: ContextKey;
  minAge: number;
  requireInvite: boolean;
  allowedCountries: number[];
};

export type DisclosePolicyOperation = OperationBase & {
  type: 'disclose_policy';
  contextKey: ContextKey;
};

export type TransferAdminOperation = OperationBase & {
  type: 'transfer_admin';
  newAdmin: Principal;
};

// --- Participant Operations ---

/**
 * Bundle layout: one attribute per policy threshold, in policy order.
 */
export type SubmitThresholdOperation = OperationBase & {
  type: 'submit_threshold';
  contextKey: ContextKey;
  bundle: InputBundle;
};

/**
 * Bundle layout: age (uint8), country (uint16), invite (uint8).
 */
export type SubmitEligibilityOperation = OperationBase & {
  type: 'submit_eligibility';
  contextKey: ContextKey;
  bundle: InputBundle;
};

export type DiscloseResultOperation = OperationBase & {
  type: 'disclose_result';
  contextKey: ContextKey;
};

// --- Content Operations ---

/**
 * Bundle layout: one uint32 mask.
 */
export type CreateContentOperation = OperationBase & {
  type: 'create_content';
  bundle: InputBundle;
};

export type CreateContentPlainOperation = OperationBase & {
  type: 'create_content_plain';
  mask: number;
};

export type UpdateContentOperation = OperationBase & {
  type: 'update_content';
  contentId: number;
  bundle: InputBundle;
};

export type UpdateContentPlainOperation = OperationBase & {
  type: 'update_content_plain';
  contentId: number;
  mask: number;
};

export type ClearContentOperation = OperationBase & {
  type: 'clear_content';
  contentId: number;
};

/**
 * Bundle layout: one uint32 mask.
 */
export type SubmitMatchOperation = OperationBase & {
  type: 'submit_match';
  contentId: number;
  bundle: InputBundle;
};

export type DiscloseMatchOperation = OperationBase & {
  type: 'disclose_match';
  contentId: number;
};

/**
 * Union of all boundary operations.
 */
export type Operation =
  | SetThresholdPolicyOperation
  | SetThresholdPolicyPlainOperation
  | SetEligibilityPolicyOperation
  | DisclosePolicyOperation
  | TransferAdminOperation
  | SubmitThresholdOperation
  | SubmitEligibilityOperation
  | DiscloseResultOperation
  | CreateContentOperation
  | CreateContentPlainOperation
  | UpdateContentOperation
  | UpdateContentPlainOperation
  | ClearContentOperation
  | SubmitMatchOperation
  | DiscloseMatchOperation;

// ============================================================================
// Operation Results
// ============================================================================

/**
 * Data returned by each operation on success.
 */
export type OperationDataMap = {
  set_threshold_policy: { policy: Policy };
  set_threshold_policy_plain: { policy: Policy };
  set_eligibility_policy: { policy: Policy };
  disclose_policy: { policy: Policy; disclosed: Handle[] };
  transfer_admin: { previousAdmin: Principal; admin: Principal };
  submit_threshold: { registration: Registration; handle: Handle };
  submit_eligibility: { registration: Registration; handle: Handle };
  disclose_result: { handle: Handle };
  create_content: { content: Content };
  create_content_plain: { content: Content };
  update_content: { content: Content };
  update_content_plain: { content: Content };
  clear_content: { content: Content };
  submit_match: { match: MatchResult; handle: Handle };
  disclose_match: { handle: Handle };
};

export type OperationData<T extends OperationType> = OperationDataMap[T];

export type OperationSuccess<T> = {
  success: true;
  data: T;
  audit: AuditEntry;
};

export type OperationFailure = {
  success: false;
  error: string;
  code: EngineErrorCode;
  audit: AuditEntry;
};

export type OperationResult<T = unknown> = OperationSuccess<T> | OperationFailure;
