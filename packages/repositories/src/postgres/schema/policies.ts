import { pgTable, text, timestamp, jsonb, integer, boolean, index } from 'drizzle-orm/pg-core';
import type { PolicyKind, PolicyParams } from '@cloak/protocol';

/**
 * Policies table - one row per context key.
 *
 * Kind-specific parameters (ciphertext references or plaintext structure)
 * live in a single jsonb column; rows are overwritten in place, never deleted.
 */
export const policies = pgTable(
  'policies',
  {
    contextKey: text('context_key').primaryKey(),
    kind: text('kind', { enum: ['threshold_gate', 'eligibility'] })
      .notNull()
      .$type<PolicyKind>(),
    params: jsonb('params').$type<PolicyParams>().notNull(),
    version: integer('version').notNull().default(1),
    publiclyDisclosed: boolean('publicly_disclosed').notNull().default(false),
    updatedBy: text('updated_by').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('policies_kind_idx').on(table.kind)]
);
