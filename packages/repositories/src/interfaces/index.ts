// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  PolicyRepository,
  UpsertPolicyInput,
  PolicyFilter,
} from './policy-repository.js';

export type {
  RegistrationRepository,
  UpsertRegistrationInput,
} from './registration-repository.js';

export type {
  ContentRepository,
  CreateContentInput,
  UpsertMatchInput,
  ContentFilter,
} from './content-repository.js';

export type { AclRepository } from './acl-repository.js';

export type { AdminRepository } from './admin-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
