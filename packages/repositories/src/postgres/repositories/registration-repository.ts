import { eq, and, sql } from 'drizzle-orm';
import type { Executor } from '../db.js';
import { registrations } from '../schema/index.js';
import type {
  RegistrationRepository,
  UpsertRegistrationInput,
} from '../../interfaces/index.js';
import type { ContextKey, Principal, Registration } from '@cloak/protocol';
import { rowToRegistration } from './mappers.js';

export class PgRegistrationRepository implements RegistrationRepository {
  constructor(private db: Executor) {}

  async get(contextKey: ContextKey, principal: Principal): Promise<Registration | null> {
    const [row] = await this.db
      .select()
      .from(registrations)
      .where(
        and(
          eq(registrations.contextKey, contextKey),
          eq(registrations.principal, principal)
        )
      );
    return row ? rowToRegistration(row) : null;
  }

  async upsert(input: UpsertRegistrationInput): Promise<Registration> {
    const now = new Date();

    const [row] = await this.db
      .insert(registrations)
      .values({
        contextKey: input.contextKey,
        principal: input.principal,
        policyKind: input.policyKind,
        result: input.result,
        submissionCount: 1,
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: [registrations.contextKey, registrations.principal],
        set: {
          policyKind: input.policyKind,
          result: input.result,
          submissionCount: sql`${registrations.submissionCount} + 1`,
          updatedAt: now,
        },
      })
      .returning();

    return rowToRegistration(row);
  }

  async listByContext(contextKey: ContextKey): Promise<Registration[]> {
    const rows = await this.db
      .select()
      .from(registrations)
      .where(eq(registrations.contextKey, contextKey));
    return rows.map(rowToRegistration);
  }
}
