import { eq } from 'drizzle-orm';
import type { Executor } from '../db.js';
import { engineAdmin, ADMIN_ROW_ID } from '../schema/index.js';
import type { AdminRepository } from '../../interfaces/index.js';
import type { Principal } from '@cloak/protocol';

export class PgAdminRepository implements AdminRepository {
  constructor(private db: Executor) {}

  async get(): Promise<Principal | null> {
    const [row] = await this.db
      .select({ admin: engineAdmin.admin })
      .from(engineAdmin)
      .where(eq(engineAdmin.id, ADMIN_ROW_ID));

    return row?.admin ?? null;
  }

  async set(admin: Principal): Promise<void> {
    const now = new Date();

    await this.db
      .insert(engineAdmin)
      .values({ id: ADMIN_ROW_ID, admin, updatedAt: now })
      .onConflictDoUpdate({
        target: engineAdmin.id,
        set: { admin, updatedAt: now },
      });
  }
}
