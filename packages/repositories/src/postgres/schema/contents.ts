import {
  pgTable,
  serial,
  text,
  timestamp,
  jsonb,
  integer,
  boolean,
  bigint,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';
import type { BoolCiphertext, Ciphertext, ContentStatus } from '@cloak/protocol';

/**
 * Contents table - author-owned masks.
 *
 * is_plain selects which of plain_mask / enc_mask is authoritative.
 * Cleared rows are kept so "cleared" stays distinguishable from "never created".
 */
export const contents = pgTable(
  'contents',
  {
    id: serial('id').primaryKey(),
    author: text('author').notNull(),
    isPlain: boolean('is_plain').notNull(),
    plainMask: bigint('plain_mask', { mode: 'number' }),
    encMask: jsonb('enc_mask').$type<Ciphertext<'uint32'>>(),
    status: text('status', { enum: ['active', 'cleared'] })
      .notNull()
      .default('active')
      .$type<ContentStatus>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    clearedAt: timestamp('cleared_at', { withTimezone: true }),
  },
  (table) => [
    index('contents_author_idx').on(table.author),
    index('contents_status_idx').on(table.status),
  ]
);

/**
 * Content matches table - a principal's match verdict against one content.
 */
export const contentMatches = pgTable(
  'content_matches',
  {
    contentId: integer('content_id')
      .notNull()
      .references(() => contents.id),
    principal: text('principal').notNull(),
    result: jsonb('result').$type<BoolCiphertext>().notNull(),
    submissionCount: integer('submission_count').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.contentId, table.principal] })]
);
