import { pgTable, text, timestamp, primaryKey, index } from 'drizzle-orm/pg-core';

/**
 * ACL grants table - append-only decrypt authorizations.
 *
 * No revoke column: grants are monotonic.
 */
export const aclGrants = pgTable(
  'acl_grants',
  {
    handle: text('handle').notNull(),
    principal: text('principal').notNull(),
    grantedBy: text('granted_by').notNull(),
    grantedAt: timestamp('granted_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.handle, table.principal] }),
    index('acl_grants_principal_idx').on(table.principal),
  ]
);

/**
 * ACL disclosures table - handles readable by anyone.
 */
export const aclDisclosures = pgTable('acl_disclosures', {
  handle: text('handle').primaryKey(),
  disclosedBy: text('disclosed_by').notNull(),
  disclosedAt: timestamp('disclosed_at', { withTimezone: true }).notNull().defaultNow(),
});
