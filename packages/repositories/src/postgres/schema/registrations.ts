import { pgTable, text, timestamp, jsonb, integer, primaryKey, index } from 'drizzle-orm/pg-core';
import type { Ciphertext, PolicyKind } from '@cloak/protocol';
import { policies } from './policies.js';

/**
 * Registrations table - the evaluated result for (context, principal).
 */
export const registrations = pgTable(
  'registrations',
  {
    contextKey: text('context_key')
      .notNull()
      .references(() => policies.contextKey),
    principal: text('principal').notNull(),
    policyKind: text('policy_kind', { enum: ['threshold_gate', 'eligibility'] })
      .notNull()
      .$type<PolicyKind>(),
    result: jsonb('result').$type<Ciphertext>().notNull(),
    submissionCount: integer('submission_count').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.contextKey, table.principal] }),
    index('registrations_principal_idx').on(table.principal),
  ]
);
