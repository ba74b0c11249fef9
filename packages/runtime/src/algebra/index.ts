// Ciphertext Algebra Adapter and runtime contract

export type { CiphertextRuntime, ComparisonOp, LogicalOp } from './runtime.js';
export { CiphertextAlgebra, expectKind, expectNumeric } from './algebra.js';
export {
  createInMemoryCiphertextRuntime,
  proofFor,
  type InMemoryCiphertextRuntime,
  type InMemoryCiphertextRuntimeOptions,
  type PlainInput,
  type RuntimeTraceEntry,
} from './in-memory-runtime.js';
