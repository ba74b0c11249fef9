import { pgTable, text, timestamp, integer } from 'drizzle-orm/pg-core';

/**
 * Engine admin table - a single row (id = 1) holding the admin principal.
 */
export const engineAdmin = pgTable('engine_admin', {
  id: integer('id').primaryKey(),
  admin: text('admin').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const ADMIN_ROW_ID = 1;
