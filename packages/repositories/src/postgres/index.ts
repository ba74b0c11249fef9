// Postgres substrate: drizzle schema, connection factory and repositories
export { createDatabase } from './db.js';
export type { Database, DatabaseConfig, Executor } from './db.js';
export * as schema from './schema/index.js';
export * from './repositories/index.js';
