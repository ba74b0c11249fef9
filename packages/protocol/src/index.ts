// @cloak/protocol
// Shared types and operation validation for the confidential evaluation engine

export * from './types/index.js';
export * from './validation/index.js';
