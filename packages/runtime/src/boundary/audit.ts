// Boundary Audit Store
//
// Stores one audit entry per boundary invocation, successful or not.
// For testing and development, an in-memory store is provided.

import type { AuditEntry, Id, Principal, ResourceType } from '@cloak/protocol';

/**
 * Interface for storing and querying audit entries.
 */
export interface AuditStore {
  append(entry: AuditEntry): Promise<void>;

  get(id: Id): Promise<AuditEntry | null>;

  /**
   * Query audit entries by invoking principal.
   */
  getByPrincipal(principal: Principal, options?: AuditQueryOptions): Promise<AuditEntry[]>;

  /**
   * Query audit entries by resource.
   */
  getByResource(
    resourceType: ResourceType,
    resourceId: string,
    options?: AuditQueryOptions
  ): Promise<AuditEntry[]>;

  /**
   * Query all audit entries with optional filters.
   */
  query(filter?: AuditQueryFilter): Promise<AuditEntry[]>;
}

/**
 * Options for querying audit entries.
 */
export type AuditQueryOptions = {
  limit?: number;
  offset?: number;

  /** Start time filter (inclusive) */
  since?: string;

  /** End time filter (inclusive) */
  until?: string;
};

export type AuditQueryFilter = AuditQueryOptions & {
  principal?: Principal;
  resourceType?: AuditEntry['resourceType'];
  resourceId?: string;
  operationType?: AuditEntry['operationType'];
  success?: boolean;
};

/**
 * Create an in-memory audit store for testing and development.
 *
 * Entries are returned most recent first.
 */
export function createInMemoryAuditStore(): AuditStore {
  const entries: AuditEntry[] = [];

  return {
    async append(entry: AuditEntry): Promise<void> {
      entries.push(entry);
    },

    async get(id: Id): Promise<AuditEntry | null> {
      return entries.find((e) => e.id === id) ?? null;
    },

    async getByPrincipal(principal: Principal, options?: AuditQueryOptions): Promise<AuditEntry[]> {
      return filterAndPaginate(
        entries.filter((e) => e.actor.principal === principal),
        options
      );
    },

    async getByResource(
      resourceType: ResourceType,
      resourceId: string,
      options?: AuditQueryOptions
    ): Promise<AuditEntry[]> {
      return filterAndPaginate(
        entries.filter((e) => e.resourceType === resourceType && e.resourceId === resourceId),
        options
      );
    },

    async query(filter?: AuditQueryFilter): Promise<AuditEntry[]> {
      let result = [...entries];

      if (filter?.principal) {
        result = result.filter((e) => e.actor.principal === filter.principal);
      }

      if (filter?.resourceType) {
        result = result.filter((e) => e.resourceType === filter.resourceType);
      }

      if (filter?.resourceId) {
        result = result.filter((e) => e.resourceId === filter.resourceId);
      }

      if (filter?.operationType) {
        result = result.filter((e) => e.operationType === filter.operationType);
      }

      if (filter?.success !== undefined) {
        result = result.filter((e) => e.success === filter.success);
      }

      return filterAndPaginate(result, filter);
    },
  };
}

/**
 * Apply time filtering and pagination to a list of audit entries.
 */
function filterAndPaginate(entries: AuditEntry[], options?: AuditQueryOptions): AuditEntry[] {
  let result = entries;

  if (options?.since) {
    const since = new Date(options.since);
    result = result.filter((e) => new Date(e.timestamp) >= since);
  }

  if (options?.until) {
    const until = new Date(options.until);
    result = result.filter((e) => new Date(e.timestamp) <= until);
  }

  // Most recent first; entries appended in the same millisecond keep reverse append order
  result = result
    .map((entry, index) => ({ entry, index }))
    .sort(
      (a, b) =>
        new Date(b.entry.timestamp).getTime() - new Date(a.entry.timestamp).getTime() ||
        b.index - a.index
    )
    .map(({ entry }) => entry);

  if (options?.offset) {
    result = result.slice(options.offset);
  }

  if (options?.limit) {
    result = result.slice(0, options.limit);
  }

  return result;
}
