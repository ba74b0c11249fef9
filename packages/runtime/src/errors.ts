// Engine error types
//
// Every failure the engine reports carries a stable code. The boundary
// turns these into `{ success: false, code }` results; read accessors
// throw them as-is.

import type {
  CiphertextKind,
  ContextKey,
  EngineErrorCode,
  Handle,
  PolicyKind,
  Principal,
} from '@cloak/protocol';

/**
 * Base class for all engine errors.
 * Provides structured error information for debugging and logging.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends EngineError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

export class PolicyNotFoundError extends EngineError {
  readonly contextKey: ContextKey;

  constructor(contextKey: ContextKey) {
    super('POLICY_NOT_FOUND', `Policy not found: ${contextKey}`);
    this.name = 'PolicyNotFoundError';
    this.contextKey = contextKey;
  }
}

/**
 * The caller is not the admin, author or owner the operation requires.
 */
export class NotAuthorizedError extends EngineError {
  readonly principal: Principal;
  readonly required: 'admin' | 'author' | 'owner';

  constructor(principal: Principal, required: 'admin' | 'author' | 'owner', message?: string) {
    super('NOT_AUTHORIZED', message ?? `${principal} is not the ${required}`);
    this.name = 'NotAuthorizedError';
    this.principal = principal;
    this.required = required;
  }
}

/**
 * The input bundle is malformed, or its proof does not validate the
 * references for this submitter.
 */
export class InvalidProofError extends EngineError {
  readonly reason: string;

  constructor(reason: string) {
    super('INVALID_PROOF', `Invalid input proof: ${reason}`);
    this.name = 'InvalidProofError';
    this.reason = reason;
  }
}

export class AllowListTooLargeError extends EngineError {
  readonly length: number;
  readonly cap: number;

  constructor(length: number, cap: number) {
    super('ALLOW_LIST_TOO_LARGE', `Allow-list has ${length} entries (cap ${cap})`);
    this.name = 'AllowListTooLargeError';
    this.length = length;
    this.cap = cap;
  }
}

export class InvalidContextKeyError extends EngineError {
  readonly contextKey: string;

  constructor(contextKey: string) {
    super('INVALID_CONTEXT_KEY', `Context key must be non-zero: "${contextKey}"`);
    this.name = 'InvalidContextKeyError';
    this.contextKey = contextKey;
  }
}

/**
 * No registration (or match result) exists for the principal.
 */
export class RegistrationNotFoundError extends EngineError {
  readonly scope: string;
  readonly principal: Principal;

  constructor(scope: string, principal: Principal) {
    super('REGISTRATION_NOT_FOUND', `No result for ${principal} in ${scope}`);
    this.name = 'RegistrationNotFoundError';
    this.scope = scope;
    this.principal = principal;
  }
}

/**
 * The content id was never assigned, or the content has been cleared.
 */
export class ContentNotFoundError extends EngineError {
  readonly contentId: number;

  constructor(contentId: number) {
    super('CONTENT_NOT_FOUND', `Content not found: ${contentId}`);
    this.name = 'ContentNotFoundError';
    this.contentId = contentId;
  }
}

export class PolicyKindMismatchError extends EngineError {
  readonly contextKey: ContextKey;
  readonly expected: PolicyKind;
  readonly actual: PolicyKind;

  constructor(contextKey: ContextKey, expected: PolicyKind, actual: PolicyKind) {
    super(
      'POLICY_KIND_MISMATCH',
      `Policy ${contextKey} is ${actual}, operation requires ${expected}`
    );
    this.name = 'PolicyKindMismatchError';
    this.contextKey = contextKey;
    this.expected = expected;
    this.actual = actual;
  }
}

export class DeveloperModeDisabledError extends EngineError {
  readonly operationType: string;

  constructor(operationType: string) {
    super(
      'DEVELOPER_MODE_DISABLED',
      `${operationType} takes plaintext input and requires developer mode`
    );
    this.name = 'DeveloperModeDisabledError';
    this.operationType = operationType;
  }
}

/**
 * The zero principal was supplied where a real identity is required.
 */
export class InvalidPrincipalError extends EngineError {
  readonly principal: string;

  constructor(principal: string, role: string) {
    super('INVALID_PRINCIPAL', `${role} must be a non-zero principal`);
    this.name = 'InvalidPrincipalError';
    this.principal = principal;
  }
}

/**
 * Operands of an algebra primitive have kinds it cannot combine.
 */
export class IncompatibleCiphertextError extends EngineError {
  readonly operation: string;
  readonly kinds: CiphertextKind[];

  constructor(operation: string, kinds: CiphertextKind[], expectation: string) {
    super(
      'INCOMPATIBLE_CIPHERTEXT',
      `${operation} cannot take (${kinds.join(', ')}): ${expectation}`
    );
    this.name = 'IncompatibleCiphertextError';
    this.operation = operation;
    this.kinds = kinds;
  }
}

export class UnknownCiphertextError extends EngineError {
  readonly handle: Handle;

  constructor(handle: Handle) {
    super('UNKNOWN_CIPHERTEXT', `Unknown ciphertext handle: ${handle}`);
    this.name = 'UnknownCiphertextError';
    this.handle = handle;
  }
}

export class AlreadyInitializedError extends EngineError {
  readonly admin: Principal;

  constructor(admin: Principal) {
    super('ALREADY_INITIALIZED', `Engine already initialized with admin ${admin}`);
    this.name = 'AlreadyInitializedError';
    this.admin = admin;
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
