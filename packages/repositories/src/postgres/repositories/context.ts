import type { Database, Executor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgPolicyRepository } from './policy-repository.js';
import { PgRegistrationRepository } from './registration-repository.js';
import { PgContentRepository } from './content-repository.js';
import { PgAclRepository } from './acl-repository.js';
import { PgAdminRepository } from './admin-repository.js';

function buildRepositories(db: Executor): RepositoryContext {
  return {
    policies: new PgPolicyRepository(db),
    registrations: new PgRegistrationRepository(db),
    contents: new PgContentRepository(db),
    acl: new PgAclRepository(db),
    admin: new PgAdminRepository(db),
  };
}

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 * const policy = await repos.policies.get('bonus-2024');
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return buildRepositories(db);
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * The boundary runs every invocation through `transaction`, so state
 * writes and ACL grants of one invocation commit or roll back together.
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly policies: PgPolicyRepository;
  readonly registrations: PgRegistrationRepository;
  readonly contents: PgContentRepository;
  readonly acl: PgAclRepository;
  readonly admin: PgAdminRepository;

  constructor(private db: Database) {
    this.policies = new PgPolicyRepository(db);
    this.registrations = new PgRegistrationRepository(db);
    this.contents = new PgContentRepository(db);
    this.acl = new PgAclRepository(db);
    this.admin = new PgAdminRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    // The tx handle is itself a PgDatabase, so the repositories take it as-is
    return this.db.transaction(async (tx) => fn(buildRepositories(tx)));
  }
}
