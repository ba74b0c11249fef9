import { eq, and, asc, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { Executor } from '../db.js';
import { contents, contentMatches } from '../schema/index.js';
import type {
  ContentRepository,
  CreateContentInput,
  UpsertMatchInput,
  ContentFilter,
} from '../../interfaces/index.js';
import type {
  Content,
  ContentMask,
  ContentPresence,
  MatchResult,
  Principal,
} from '@cloak/protocol';
import { maskToColumns, rowToContent, rowToMatch } from './mappers.js';

export class PgContentRepository implements ContentRepository {
  constructor(private db: Executor) {}

  async create(input: CreateContentInput): Promise<Content> {
    const now = new Date();

    const [row] = await this.db
      .insert(contents)
      .values({
        author: input.author,
        ...maskToColumns(input.mask),
        status: 'active',
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    return rowToContent(row);
  }

  async get(id: number): Promise<Content | null> {
    const [row] = await this.db.select().from(contents).where(eq(contents.id, id));
    return row ? rowToContent(row) : null;
  }

  async updateMask(id: number, mask: ContentMask): Promise<Content | null> {
    const [row] = await this.db
      .update(contents)
      .set({ ...maskToColumns(mask), updatedAt: new Date() })
      .where(and(eq(contents.id, id), eq(contents.status, 'active')))
      .returning();

    return row ? rowToContent(row) : null;
  }

  async clear(id: number, zeroMask: ContentMask): Promise<Content | null> {
    const now = new Date();

    const [row] = await this.db
      .update(contents)
      .set({
        ...maskToColumns(zeroMask),
        status: 'cleared',
        updatedAt: now,
        clearedAt: now,
      })
      .where(and(eq(contents.id, id), eq(contents.status, 'active')))
      .returning();

    return row ? rowToContent(row) : null;
  }

  async presence(id: number): Promise<ContentPresence> {
    const [row] = await this.db
      .select({ status: contents.status })
      .from(contents)
      .where(eq(contents.id, id));
    return row?.status ?? 'none';
  }

  async list(filter?: ContentFilter): Promise<Content[]> {
    const conditions: SQL[] = [];

    if (filter?.author) {
      conditions.push(eq(contents.author, filter.author));
    }

    // By default, exclude cleared content
    if (!filter?.includeCleared) {
      conditions.push(eq(contents.status, 'active'));
    }

    let query = this.db
      .select()
      .from(contents)
      .where(and(...conditions))
      .orderBy(asc(contents.id))
      .$dynamic();

    if (filter?.limit) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToContent);
  }

  async getMatch(contentId: number, principal: Principal): Promise<MatchResult | null> {
    const [row] = await this.db
      .select()
      .from(contentMatches)
      .where(
        and(eq(contentMatches.contentId, contentId), eq(contentMatches.principal, principal))
      );
    return row ? rowToMatch(row) : null;
  }

  async upsertMatch(input: UpsertMatchInput): Promise<MatchResult> {
    const now = new Date();

    const [row] = await this.db
      .insert(contentMatches)
      .values({
        contentId: input.contentId,
        principal: input.principal,
        result: input.result,
        submissionCount: 1,
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: [contentMatches.contentId, contentMatches.principal],
        set: {
          result: input.result,
          submissionCount: sql`${contentMatches.submissionCount} + 1`,
          updatedAt: now,
        },
      })
      .returning();

    return rowToMatch(row);
  }
}
