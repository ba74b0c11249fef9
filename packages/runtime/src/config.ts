// Engine configuration
//
// Defaults suit a production deployment: plaintext entry points are off
// and every invocation is audited. loadEngineConfig reads the CLOAK_*
// environment variables on top of those defaults.

import { z } from 'zod';
import {
  DEFAULT_ALLOW_LIST_CAP,
  isZeroPrincipal,
} from '@cloak/protocol';
import type { AuditEntry, Principal } from '@cloak/protocol';
import { InvalidPrincipalError, ValidationError } from './errors.js';

export const DEFAULT_ENGINE_IDENTITY: Principal = 'cloak:engine';

export type EngineConfig = {
  /** Maximum allow-list length accepted for eligibility policies */
  allowListCap: number;

  /** Enables the plaintext (*_plain) entry points */
  developerMode: boolean;

  /** Principal the engine grants itself on every value it keeps */
  engineIdentity: Principal;

  auditEnabled: boolean;

  /** Run each invocation inside repos.transaction when available */
  transactionsEnabled: boolean;

  /** Called after each audit entry is stored */
  onAudit: (entry: AuditEntry) => void | Promise<void>;
};

export type EngineConfigInput = Partial<EngineConfig>;

/**
 * Fill defaults and check the values that would otherwise fail late.
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const config: EngineConfig = {
    allowListCap: input.allowListCap ?? DEFAULT_ALLOW_LIST_CAP,
    developerMode: input.developerMode ?? false,
    engineIdentity: input.engineIdentity ?? DEFAULT_ENGINE_IDENTITY,
    auditEnabled: input.auditEnabled ?? true,
    transactionsEnabled: input.transactionsEnabled ?? true,
    onAudit: input.onAudit ?? (() => {}),
  };

  if (!Number.isInteger(config.allowListCap) || config.allowListCap < 0) {
    throw new ValidationError('allowListCap must be a non-negative integer', {
      field: 'allowListCap',
      details: { value: config.allowListCap },
    });
  }

  if (isZeroPrincipal(config.engineIdentity)) {
    throw new InvalidPrincipalError(config.engineIdentity, 'engineIdentity');
  }

  return config;
}

const flagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  CLOAK_ALLOW_LIST_CAP: z.coerce.number().int().nonnegative().optional(),
  CLOAK_DEVELOPER_MODE: flagSchema.optional(),
  CLOAK_ENGINE_IDENTITY: z.string().min(1).optional(),
  CLOAK_AUDIT_ENABLED: flagSchema.optional(),
});

/**
 * Build a config from environment variables.
 *
 * @param env - Defaults to process.env
 * @param overrides - Applied after the environment (e.g. an onAudit hook)
 * @throws ValidationError listing every invalid variable
 */
export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: EngineConfigInput = {}
): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid environment: ${issues.map((i) => i.variable).join(', ')}`,
      { details: { issues } }
    );
  }

  const vars = parsed.data;
  return resolveEngineConfig({
    allowListCap: vars.CLOAK_ALLOW_LIST_CAP,
    developerMode: vars.CLOAK_DEVELOPER_MODE,
    engineIdentity: vars.CLOAK_ENGINE_IDENTITY,
    auditEnabled: vars.CLOAK_AUDIT_ENABLED,
    ...overrides,
  });
}
