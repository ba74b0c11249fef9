// @cloak/runtime
// Confidential predicate evaluation behind a single commit boundary

// Error types
export {
  EngineError,
  ValidationError,
  PolicyNotFoundError,
  NotAuthorizedError,
  InvalidProofError,
  AllowListTooLargeError,
  InvalidContextKeyError,
  RegistrationNotFoundError,
  ContentNotFoundError,
  PolicyKindMismatchError,
  DeveloperModeDisabledError,
  InvalidPrincipalError,
  IncompatibleCiphertextError,
  UnknownCiphertextError,
  AlreadyInitializedError,
  isEngineError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  createScopedLogger,
  type EngineLogger,
  type LogEntry,
} from './logger.js';

// Configuration
export {
  DEFAULT_ENGINE_IDENTITY,
  resolveEngineConfig,
  loadEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from './config.js';

// Ciphertext algebra
export {
  CiphertextAlgebra,
  expectKind,
  expectNumeric,
  createInMemoryCiphertextRuntime,
  proofFor,
  type CiphertextRuntime,
  type ComparisonOp,
  type LogicalOp,
  type InMemoryCiphertextRuntime,
  type InMemoryCiphertextRuntimeOptions,
  type PlainInput,
  type RuntimeTraceEntry,
} from './algebra/index.js';

// Access control
export {
  AccessControlLedger,
  type AccessControlLedgerOptions,
  type AclFact,
  type AclFactListener,
} from './acl/index.js';

// Predicate evaluation
export {
  attributeKindsFor,
  evaluatePolicy,
  evaluateThresholdGate,
  evaluateEligibility,
  evaluateMatch,
  maskToCiphertext,
  ELIGIBILITY_ATTRIBUTE_KINDS,
  type EligibilityAttributes,
  type EvaluatePolicyOptions,
  type MaskCiphertext,
} from './evaluator/index.js';

// Boundary
export {
  Boundary,
  createBoundary,
  createInMemoryAuditStore,
  NotificationBus,
  type BoundaryOptions,
  type OperationOf,
  type AuditStore,
  type AuditQueryOptions,
  type AuditQueryFilter,
  type NotificationHandler,
  type NotificationOf,
} from './boundary/index.js';
