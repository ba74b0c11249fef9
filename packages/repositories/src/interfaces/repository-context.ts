import type { PolicyRepository } from './policy-repository.js';
import type { RegistrationRepository } from './registration-repository.js';
import type { ContentRepository } from './content-repository.js';
import type { AclRepository } from './acl-repository.js';
import type { AdminRepository } from './admin-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the dependency injection point for the runtime: pass a
 * RepositoryContext to the boundary and swap implementations
 * (Postgres, in-memory) without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = postgres.createTransactionalPgRepositoryContext(db);
 * const boundary = createBoundary({ repos, runtime });
 * ```
 */
export interface RepositoryContext {
  readonly policies: PolicyRepository;
  readonly registrations: RegistrationRepository;
  readonly contents: ContentRepository;
  readonly acl: AclRepository;
  readonly admin: AdminRepository;
}

/**
 * Work executed against the repositories of one transaction.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   * All repository operations within the function are atomic.
   *
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
