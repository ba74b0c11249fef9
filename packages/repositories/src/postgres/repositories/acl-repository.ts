import { eq, and, asc } from 'drizzle-orm';
import type { Executor } from '../db.js';
import { aclGrants, aclDisclosures } from '../schema/index.js';
import type { AclRepository } from '../../interfaces/index.js';
import type { AclDisclosure, AclGrant, Handle, Principal } from '@cloak/protocol';
import { rowToDisclosure, rowToGrant } from './mappers.js';

export class PgAclRepository implements AclRepository {
  constructor(private db: Executor) {}

  async addGrant(handle: Handle, principal: Principal, grantedBy: Principal): Promise<boolean> {
    const rows = await this.db
      .insert(aclGrants)
      .values({ handle, principal, grantedBy, grantedAt: new Date() })
      .onConflictDoNothing()
      .returning({ handle: aclGrants.handle });

    return rows.length > 0;
  }

  async hasGrant(handle: Handle, principal: Principal): Promise<boolean> {
    const rows = await this.db
      .select({ handle: aclGrants.handle })
      .from(aclGrants)
      .where(and(eq(aclGrants.handle, handle), eq(aclGrants.principal, principal)))
      .limit(1);

    return rows.length > 0;
  }

  async getGrants(handle: Handle): Promise<AclGrant[]> {
    const rows = await this.db
      .select()
      .from(aclGrants)
      .where(eq(aclGrants.handle, handle))
      .orderBy(asc(aclGrants.grantedAt));

    return rows.map(rowToGrant);
  }

  async getHandlesFor(principal: Principal): Promise<Handle[]> {
    const rows = await this.db
      .select({ handle: aclGrants.handle })
      .from(aclGrants)
      .where(eq(aclGrants.principal, principal));

    return rows.map((r) => r.handle);
  }

  async addDisclosure(handle: Handle, disclosedBy: Principal): Promise<boolean> {
    const rows = await this.db
      .insert(aclDisclosures)
      .values({ handle, disclosedBy, disclosedAt: new Date() })
      .onConflictDoNothing()
      .returning({ handle: aclDisclosures.handle });

    return rows.length > 0;
  }

  async getDisclosure(handle: Handle): Promise<AclDisclosure | null> {
    const [row] = await this.db
      .select()
      .from(aclDisclosures)
      .where(eq(aclDisclosures.handle, handle));

    return row ? rowToDisclosure(row) : null;
  }
}
