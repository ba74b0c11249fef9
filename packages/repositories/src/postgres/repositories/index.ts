// Postgres repository implementations
export { PgPolicyRepository } from './policy-repository.js';
export { PgRegistrationRepository } from './registration-repository.js';
export { PgContentRepository } from './content-repository.js';
export { PgAclRepository } from './acl-repository.js';
export { PgAdminRepository } from './admin-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
