// Operation Validation
//
// Structural validation of boundary operations coming from untyped callers
// (RPC, CLI, queued messages). Semantic checks (zero principals and
// context keys, admin identity, policy existence, allow-list cap) are
// made by the boundary so they surface with their own error codes.

import { z } from 'zod';
import type { Operation } from '../types/operations.js';
import { MAX_MASK } from '../types/ciphertext.js';
import { HANDLE_PATTERN } from '../types/common.js';

const principalSchema = z.string();

const contextKeySchema = z.string();

const actorSchema = z.object({
  principal: principalSchema,
  method: z.enum(['api', 'cli', 'system']).optional(),
});

export const handleSchema = z
  .string()
  .regex(HANDLE_PATTERN, 'handle must be 0x followed by 64 lowercase hex characters');

export const ciphertextKindSchema = z.enum(['bool', 'uint8', 'uint16', 'uint32', 'uint64']);

export const inputBundleSchema = z.object({
  references: z
    .array(z.object({ handle: handleSchema, kind: ciphertextKindSchema }))
    .min(1, 'bundle must reference at least one ciphertext'),
  proof: z.string().min(1, 'proof must not be empty'),
});

const contentIdSchema = z.number().int().positive();

const maskSchema = z.number().int().min(0).max(MAX_MASK);

const uint32Schema = z.number().int().min(0).max(0xffffffff);

export const operationSchema: z.ZodType<Operation> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('set_threshold_policy'),
    actor: actorSchema,
    contextKey: contextKeySchema,
    bundle: inputBundleSchema,
  }),
  z.object({
    type: z.literal('set_threshold_policy_plain'),
    actor: actorSchema,
    contextKey: contextKeySchema,
    thresholds: z.array(uint32Schema),
    valueIfTrue: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    valueIfFalse: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  }),
  z.object({
    type: z.literal('set_eligibility_policy'),
    actor: actorSchema,
    contextKey: contextKeySchema,
    minAge: z.number().int().min(0).max(255),
    requireInvite: z.boolean(),
    // Length is checked against the configured cap by the boundary
    allowedCountries: z.array(z.number().int().min(0).max(65535)),
  }),
  z.object({
    type: z.literal('disclose_policy'),
    actor: actorSchema,
    contextKey: contextKeySchema,
  }),
  z.object({
    type: z.literal('transfer_admin'),
    actor: actorSchema,
    newAdmin: principalSchema,
  }),
  z.object({
    type: z.literal('submit_threshold'),
    actor: actorSchema,
    contextKey: contextKeySchema,
    bundle: inputBundleSchema,
  }),
  z.object({
    type: z.literal('submit_eligibility'),
    actor: actorSchema,
    contextKey: contextKeySchema,
    bundle: inputBundleSchema,
  }),
  z.object({
    type: z.literal('disclose_result'),
    actor: actorSchema,
    contextKey: contextKeySchema,
  }),
  z.object({
    type: z.literal('create_content'),
    actor: actorSchema,
    bundle: inputBundleSchema,
  }),
  z.object({
    type: z.literal('create_content_plain'),
    actor: actorSchema,
    mask: maskSchema,
  }),
  z.object({
    type: z.literal('update_content'),
    actor: actorSchema,
    contentId: contentIdSchema,
    bundle: inputBundleSchema,
  }),
  z.object({
    type: z.literal('update_content_plain'),
    actor: actorSchema,
    contentId: contentIdSchema,
    mask: maskSchema,
  }),
  z.object({
    type: z.literal('clear_content'),
    actor: actorSchema,
    contentId: contentIdSchema,
  }),
  z.object({
    type: z.literal('submit_match'),
    actor: actorSchema,
    contentId: contentIdSchema,
    bundle: inputBundleSchema,
  }),
  z.object({
    type: z.literal('disclose_match'),
    actor: actorSchema,
    contentId: contentIdSchema,
  }),
]);

/**
 * A single structural problem with an operation.
 */
export type OperationValidationError = {
  path: string;
  message: string;
};

export type OperationValidationResult =
  | { valid: true; operation: Operation; errors: [] }
  | { valid: false; errors: OperationValidationError[] };

/**
 * Validate an untyped operation payload.
 *
 * @param input - Anything received from outside the process
 * @returns The typed operation, or every problem found
 */
export function validateOperation(input: unknown): OperationValidationResult {
  const parsed = operationSchema.safeParse(input);
  if (parsed.success) {
    return { valid: true, operation: parsed.data, errors: [] };
  }

  return {
    valid: false,
    errors: parsed.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : 'operation',
      message: issue.message,
    })),
  };
}
