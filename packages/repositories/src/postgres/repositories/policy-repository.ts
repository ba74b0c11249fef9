import { eq, asc, sql } from 'drizzle-orm';
import type { Executor } from '../db.js';
import { policies } from '../schema/index.js';
import type {
  PolicyRepository,
  UpsertPolicyInput,
  PolicyFilter,
} from '../../interfaces/index.js';
import type { ContextKey, Policy } from '@cloak/protocol';
import { rowToPolicy } from './mappers.js';

export class PgPolicyRepository implements PolicyRepository {
  constructor(private db: Executor) {}

  async get(contextKey: ContextKey): Promise<Policy | null> {
    const [row] = await this.db
      .select()
      .from(policies)
      .where(eq(policies.contextKey, contextKey));
    return row ? rowToPolicy(row) : null;
  }

  async upsert(input: UpsertPolicyInput): Promise<Policy> {
    const now = new Date();

    const [row] = await this.db
      .insert(policies)
      .values({
        contextKey: input.contextKey,
        kind: input.params.kind,
        params: input.params,
        version: 1,
        publiclyDisclosed: false,
        updatedBy: input.updatedBy,
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: policies.contextKey,
        set: {
          kind: input.params.kind,
          params: input.params,
          version: sql`${policies.version} + 1`,
          publiclyDisclosed: false,
          updatedBy: input.updatedBy,
          updatedAt: now,
        },
      })
      .returning();

    return rowToPolicy(row);
  }

  async markDisclosed(contextKey: ContextKey): Promise<Policy | null> {
    const [row] = await this.db
      .update(policies)
      .set({ publiclyDisclosed: true, updatedAt: new Date() })
      .where(eq(policies.contextKey, contextKey))
      .returning();

    return row ? rowToPolicy(row) : null;
  }

  async list(filter?: PolicyFilter): Promise<Policy[]> {
    let query = this.db
      .select()
      .from(policies)
      .where(filter?.kind ? eq(policies.kind, filter.kind) : undefined)
      .orderBy(asc(policies.contextKey))
      .$dynamic();

    if (filter?.limit) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToPolicy);
  }
}
