// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
// - Running the engine inside a single process
//
// Data does not persist between restarts. Transactions snapshot every store
// and restore the snapshot when the transaction function throws.

import type {
  AclDisclosure,
  AclGrant,
  Content,
  Handle,
  MatchResult,
  Policy,
  Principal,
  Registration,
} from '@cloak/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  PolicyRepository,
  RegistrationRepository,
  ContentRepository,
  AclRepository,
  AdminRepository,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  policies: Map<string, Policy>;
  registrations: Map<string, Registration>;
  contents: Map<number, Content>;
  matches: Map<string, MatchResult>;
  grants: Map<Handle, AclGrant[]>;
  disclosures: Map<Handle, AclDisclosure>;
  admin: { current: Principal | null };
  sequence: { nextContentId: number };
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

/**
 * Composite key for (context, principal) and (content, principal) stores.
 */
function compositeKey(scope: string | number, principal: Principal): string {
  return `${scope}\u0000${principal}`;
}

function paginate<T>(items: T[], limit?: number, offset?: number): T[] {
  let result = items;
  if (offset) {
    result = result.slice(offset);
  }
  if (limit) {
    result = result.slice(0, limit);
  }
  return result;
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * await repos.transaction(async (tx) => {
 *   await tx.admin.set('0xadmin');
 *   await tx.contents.create({ author: '0xauthor', mask: { isPlain: true, plainMask: 1 } });
 * });
 *
 * console.log(repos._data.contents.size);
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const data: InMemoryDataStore = {
    policies: new Map(),
    registrations: new Map(),
    contents: new Map(),
    matches: new Map(),
    grants: new Map(),
    disclosures: new Map(),
    admin: { current: null },
    sequence: { nextContentId: 1 },
  };

  // Policy repository
  const policyRepo: PolicyRepository = {
    async get(contextKey) {
      return data.policies.get(contextKey) ?? null;
    },
    async upsert(input) {
      const existing = data.policies.get(input.contextKey);
      const now = new Date().toISOString();
      const policy: Policy = {
        ...input.params,
        contextKey: input.contextKey,
        version: existing ? existing.version + 1 : 1,
        publiclyDisclosed: false,
        updatedBy: input.updatedBy,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };
      data.policies.set(input.contextKey, policy);
      return policy;
    },
    async markDisclosed(contextKey) {
      const existing = data.policies.get(contextKey);
      if (!existing) return null;
      const policy: Policy = {
        ...existing,
        publiclyDisclosed: true,
        updatedAt: new Date().toISOString(),
      };
      data.policies.set(contextKey, policy);
      return policy;
    },
    async list(filter) {
      let result = Array.from(data.policies.values()).sort((a, b) =>
        a.contextKey.localeCompare(b.contextKey)
      );
      if (filter?.kind) {
        result = result.filter((p) => p.kind === filter.kind);
      }
      return paginate(result, filter?.limit, filter?.offset);
    },
  };

  // Registration repository
  const registrationRepo: RegistrationRepository = {
    async get(contextKey, principal) {
      return data.registrations.get(compositeKey(contextKey, principal)) ?? null;
    },
    async upsert(input) {
      const key = compositeKey(input.contextKey, input.principal);
      const existing = data.registrations.get(key);
      const now = new Date().toISOString();
      const registration: Registration = {
        contextKey: input.contextKey,
        principal: input.principal,
        policyKind: input.policyKind,
        result: input.result,
        exists: true,
        submissionCount: (existing?.submissionCount ?? 0) + 1,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };
      data.registrations.set(key, registration);
      return registration;
    },
    async listByContext(contextKey) {
      return Array.from(data.registrations.values()).filter(
        (r) => r.contextKey === contextKey
      );
    },
  };

  // Content repository
  const contentRepo: ContentRepository = {
    async create(input) {
      const id = data.sequence.nextContentId;
      data.sequence.nextContentId = id + 1;
      const now = new Date().toISOString();
      const content: Content = {
        id,
        author: input.author,
        mask: input.mask,
        status: 'active',
        exists: true,
        createdAt: now,
        updatedAt: now,
      };
      data.contents.set(id, content);
      return content;
    },
    async get(id) {
      return data.contents.get(id) ?? null;
    },
    async updateMask(id, mask) {
      const existing = data.contents.get(id);
      if (!existing || existing.status === 'cleared') return null;
      const content: Content = {
        ...existing,
        mask,
        updatedAt: new Date().toISOString(),
      };
      data.contents.set(id, content);
      return content;
    },
    async clear(id, zeroMask) {
      const existing = data.contents.get(id);
      if (!existing || existing.status === 'cleared') return null;
      const now = new Date().toISOString();
      const content: Content = {
        ...existing,
        mask: zeroMask,
        status: 'cleared',
        exists: false,
        updatedAt: now,
        clearedAt: now,
      };
      data.contents.set(id, content);
      return content;
    },
    async presence(id) {
      return data.contents.get(id)?.status ?? 'none';
    },
    async list(filter) {
      let result = Array.from(data.contents.values()).sort((a, b) => a.id - b.id);
      if (filter?.author) {
        result = result.filter((c) => c.author === filter.author);
      }
      if (!filter?.includeCleared) {
        result = result.filter((c) => c.status === 'active');
      }
      return paginate(result, filter?.limit, filter?.offset);
    },
    async getMatch(contentId, principal) {
      return data.matches.get(compositeKey(contentId, principal)) ?? null;
    },
    async upsertMatch(input) {
      const key = compositeKey(input.contentId, input.principal);
      const existing = data.matches.get(key);
      const now = new Date().toISOString();
      const match: MatchResult = {
        contentId: input.contentId,
        principal: input.principal,
        result: input.result,
        submissionCount: (existing?.submissionCount ?? 0) + 1,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };
      data.matches.set(key, match);
      return match;
    },
  };

  // ACL repository
  const aclRepo: AclRepository = {
    async addGrant(handle, principal, grantedBy) {
      const grants = data.grants.get(handle) ?? [];
      if (grants.some((g) => g.principal === principal)) {
        return false;
      }
      const grant: AclGrant = {
        handle,
        principal,
        grantedBy,
        grantedAt: new Date().toISOString(),
      };
      data.grants.set(handle, [...grants, grant]);
      return true;
    },
    async hasGrant(handle, principal) {
      return (data.grants.get(handle) ?? []).some((g) => g.principal === principal);
    },
    async getGrants(handle) {
      return [...(data.grants.get(handle) ?? [])];
    },
    async getHandlesFor(principal) {
      const handles: Handle[] = [];
      for (const [handle, grants] of data.grants) {
        if (grants.some((g) => g.principal === principal)) {
          handles.push(handle);
        }
      }
      return handles;
    },
    async addDisclosure(handle, disclosedBy) {
      if (data.disclosures.has(handle)) {
        return false;
      }
      data.disclosures.set(handle, {
        handle,
        disclosedBy,
        disclosedAt: new Date().toISOString(),
      });
      return true;
    },
    async getDisclosure(handle) {
      return data.disclosures.get(handle) ?? null;
    },
  };

  // Admin repository
  const adminRepo: AdminRepository = {
    async get() {
      return data.admin.current;
    },
    async set(admin) {
      data.admin.current = admin;
    },
  };

  const context: RepositoryContext = {
    policies: policyRepo,
    registrations: registrationRepo,
    contents: contentRepo,
    acl: aclRepo,
    admin: adminRepo,
  };

  return {
    ...context,
    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      const snapshot = snapshotStore(data);
      try {
        return await fn(context);
      } catch (error) {
        restoreStore(data, snapshot);
        throw error;
      }
    },
    _data: data,
    clear() {
      data.policies.clear();
      data.registrations.clear();
      data.contents.clear();
      data.matches.clear();
      data.grants.clear();
      data.disclosures.clear();
      data.admin.current = null;
      data.sequence.nextContentId = 1;
    },
  };
}

/**
 * Copy every store. Records are replaced rather than mutated by the
 * repositories above, so copying the maps is enough.
 */
function snapshotStore(data: InMemoryDataStore): InMemoryDataStore {
  return {
    policies: new Map(data.policies),
    registrations: new Map(data.registrations),
    contents: new Map(data.contents),
    matches: new Map(data.matches),
    grants: new Map(data.grants),
    disclosures: new Map(data.disclosures),
    admin: { ...data.admin },
    sequence: { ...data.sequence },
  };
}

function restoreMap<K, V>(target: Map<K, V>, source: Map<K, V>): void {
  target.clear();
  for (const [key, value] of source) {
    target.set(key, value);
  }
}

function restoreStore(data: InMemoryDataStore, snapshot: InMemoryDataStore): void {
  restoreMap(data.policies, snapshot.policies);
  restoreMap(data.registrations, snapshot.registrations);
  restoreMap(data.contents, snapshot.contents);
  restoreMap(data.matches, snapshot.matches);
  restoreMap(data.grants, snapshot.grants);
  restoreMap(data.disclosures, snapshot.disclosures);
  data.admin.current = snapshot.admin.current;
  data.sequence.nextContentId = snapshot.sequence.nextContentId;
}
