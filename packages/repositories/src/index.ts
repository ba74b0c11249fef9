// @cloak/repositories
// Repository interfaces and implementations for substrate-independent data access.
//
// This package defines the contract for engine state. Implementations
// (Postgres, in-memory) fulfill these contracts, allowing the runtime
// to work with any storage backend.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - Every boundary invocation runs inside TransactionalRepositoryContext.transaction

export * from './interfaces/index.js';
export { createInMemoryRepositoryContext } from './in-memory/index.js';
export type { InMemoryDataStore, InMemoryRepositoryContext } from './in-memory/index.js';
export * as postgres from './postgres/index.js';
