// Row <-> domain conversions shared by the Postgres repositories

import type {
  AclDisclosure,
  AclGrant,
  Ciphertext,
  Content,
  ContentMask,
  MatchResult,
  Policy,
  Registration,
} from '@cloak/protocol';
import type {
  policies,
  registrations,
  contents,
  contentMatches,
  aclGrants,
  aclDisclosures,
} from '../schema/index.js';

export function rowToPolicy(row: typeof policies.$inferSelect): Policy {
  return {
    ...row.params,
    contextKey: row.contextKey,
    version: row.version,
    publiclyDisclosed: row.publiclyDisclosed,
    updatedBy: row.updatedBy,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export function rowToRegistration(row: typeof registrations.$inferSelect): Registration {
  return {
    contextKey: row.contextKey,
    principal: row.principal,
    policyKind: row.policyKind,
    result: row.result,
    exists: true,
    submissionCount: row.submissionCount,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

/**
 * Split a mask into the two mutually exclusive columns.
 */
export function maskToColumns(mask: ContentMask): {
  isPlain: boolean;
  plainMask: number | null;
  encMask: Ciphertext<'uint32'> | null;
} {
  if (mask.isPlain) {
    return { isPlain: true, plainMask: mask.plainMask, encMask: null };
  }
  return { isPlain: false, plainMask: null, encMask: mask.encMask };
}

export function rowToContent(row: typeof contents.$inferSelect): Content {
  return {
    id: row.id,
    author: row.author,
    mask: columnsToMask(row),
    status: row.status,
    exists: row.status === 'active',
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
    clearedAt: row.clearedAt?.toISOString(),
  };
}

function columnsToMask(row: typeof contents.$inferSelect): ContentMask {
  if (row.isPlain) {
    return { isPlain: true, plainMask: row.plainMask ?? 0 };
  }
  if (!row.encMask) {
    throw new Error(`Content ${row.id} is marked encrypted but has no enc_mask`);
  }
  return { isPlain: false, encMask: row.encMask };
}

export function rowToMatch(row: typeof contentMatches.$inferSelect): MatchResult {
  return {
    contentId: row.contentId,
    principal: row.principal,
    result: row.result,
    submissionCount: row.submissionCount,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export function rowToGrant(row: typeof aclGrants.$inferSelect): AclGrant {
  return {
    handle: row.handle,
    principal: row.principal,
    grantedBy: row.grantedBy,
    grantedAt: row.grantedAt.toISOString(),
  };
}

export function rowToDisclosure(row: typeof aclDisclosures.$inferSelect): AclDisclosure {
  return {
    handle: row.handle,
    disclosedBy: row.disclosedBy,
    disclosedAt: row.disclosedAt.toISOString(),
  };
}
