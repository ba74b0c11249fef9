// Boundary - the commit point of the engine
//
// Every state mutation flows through execute(), which:
// 1. Validates the operation (structure, principals, context keys, developer mode)
// 2. Authorizes the caller (admin-only operations here; author checks in handlers)
// 3. Runs the handler inside one repository transaction
// 4. Appends an audit entry, successful or not
// 5. Publishes notifications, only once the transaction has committed
//
// Invocations are serialized: each one starts after the previous has
// fully finished, so none observes a half-finished sibling.

import { randomUUID } from 'node:crypto';
import {
  MASK_KIND,
  ZERO_PRINCIPAL,
  isNumericKind,
  isZeroContextKey,
  isZeroPrincipal,
  validateOperation,
} from '@cloak/protocol';
import type {
  AclFacts,
  AuditEntry,
  BoolCiphertext,
  Ciphertext,
  ClearContentOperation,
  Content,
  ContentPresence,
  ContextKey,
  CreateContentOperation,
  CreateContentPlainOperation,
  DiscloseMatchOperation,
  DisclosePolicyOperation,
  DiscloseResultOperation,
  EngineErrorCode,
  EngineNotification,
  Handle,
  MatchResult,
  NumericCiphertext,
  Operation,
  OperationDataMap,
  OperationResult,
  OperationType,
  OperationValidationResult,
  Policy,
  PolicyKind,
  PolicyParams,
  Principal,
  Registration,
  SetEligibilityPolicyOperation,
  SetThresholdPolicyOperation,
  SetThresholdPolicyPlainOperation,
  SubmitEligibilityOperation,
  SubmitMatchOperation,
  SubmitThresholdOperation,
  ThresholdGateParams,
  TransferAdminOperation,
  UpdateContentOperation,
  UpdateContentPlainOperation,
} from '@cloak/protocol';
import type {
  ContentFilter,
  PolicyFilter,
  RepositoryContext,
  TransactionalRepositoryContext,
} from '@cloak/repositories';
import { CiphertextAlgebra, expectKind, expectNumeric } from '../algebra/index.js';
import type { CiphertextRuntime } from '../algebra/index.js';
import { AccessControlLedger } from '../acl/index.js';
import type { AclFact } from '../acl/index.js';
import {
  attributeKindsFor,
  evaluateMatch,
  evaluatePolicy,
  maskToCiphertext,
} from '../evaluator/index.js';
import { resolveEngineConfig } from '../config.js';
import type { EngineConfig, EngineConfigInput } from '../config.js';
import type { EngineLogger } from '../logger.js';
import { consoleLogger } from '../logger.js';
import {
  AllowListTooLargeError,
  AlreadyInitializedError,
  ContentNotFoundError,
  DeveloperModeDisabledError,
  IncompatibleCiphertextError,
  InvalidContextKeyError,
  InvalidPrincipalError,
  NotAuthorizedError,
  PolicyKindMismatchError,
  PolicyNotFoundError,
  RegistrationNotFoundError,
  ValidationError,
  isEngineError,
} from '../errors.js';
import type { AuditStore } from './audit.js';
import { createInMemoryAuditStore } from './audit.js';
import { NotificationBus } from './notifications.js';

export type OperationOf<K extends OperationType> = Extract<Operation, { type: K }>;

type OperationMap = { [K in OperationType]: OperationOf<K> };

/**
 * What a handler sees while its invocation is in flight.
 */
type InvocationContext = {
  repos: RepositoryContext;
  ledger: AccessControlLedger;
  actor: Principal;
  emit(notification: EngineNotification): void;
};

type OperationHandlers = {
  [K in OperationType]: (
    operation: OperationMap[K],
    ctx: InvocationContext
  ) => Promise<OperationDataMap[K]>;
};

const ADMIN_OPERATIONS: ReadonlySet<OperationType> = new Set<OperationType>([
  'set_threshold_policy',
  'set_threshold_policy_plain',
  'set_eligibility_policy',
  'disclose_policy',
  'transfer_admin',
]);

const DEVELOPER_MODE_OPERATIONS: ReadonlySet<OperationType> = new Set<OperationType>([
  'set_threshold_policy_plain',
  'create_content_plain',
  'update_content_plain',
]);

/**
 * Options for creating a Boundary instance.
 */
export type BoundaryOptions = {
  /** Repository context (must support transactions for atomic invocations) */
  repos: RepositoryContext | TransactionalRepositoryContext;

  /** The encrypted-value runtime the algebra delegates to */
  runtime: CiphertextRuntime;

  /** Defaults to an in-memory store */
  auditStore?: AuditStore;

  /** Defaults to a new bus logging through the boundary's logger */
  notifications?: NotificationBus;

  /** Defaults to consoleLogger */
  logger?: EngineLogger;

  config?: EngineConfigInput;
};

/**
 * Check if a repository context supports transactions.
 */
function isTransactional(
  repos: RepositoryContext | TransactionalRepositoryContext
): repos is TransactionalRepositoryContext {
  return 'transaction' in repos && typeof repos.transaction === 'function';
}

/**
 * Boundary - the commit point of the engine
 *
 * @example
 * ```ts
 * const boundary = createBoundary({
 *   repos: createInMemoryRepositoryContext(),
 *   runtime: createInMemoryCiphertextRuntime(),
 * });
 * await boundary.initialize('0xadmin');
 *
 * const result = await boundary.execute({
 *   type: 'set_eligibility_policy',
 *   actor: { principal: '0xadmin' },
 *   contextKey: 'kyc',
 *   minAge: 18,
 *   requireInvite: true,
 *   allowedCountries: [840],
 * });
 *
 * if (result.success) {
 *   console.log('Policy version', result.data.policy.version);
 * }
 * ```
 */
export class Boundary {
  private readonly repos: RepositoryContext | TransactionalRepositoryContext;
  private readonly algebra: CiphertextAlgebra;
  private readonly auditStore: AuditStore;
  private readonly bus: NotificationBus;
  private readonly logger: EngineLogger;
  private readonly config: EngineConfig;
  private readonly handlers: OperationHandlers;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: BoundaryOptions) {
    this.repos = options.repos;
    this.logger = options.logger ?? consoleLogger;
    this.algebra = new CiphertextAlgebra(options.runtime, this.logger);
    this.auditStore = options.auditStore ?? createInMemoryAuditStore();
    this.bus = options.notifications ?? new NotificationBus(this.logger);
    this.config = resolveEngineConfig(options.config);

    this.handlers = {
      set_threshold_policy: (op, ctx) => this.setThresholdPolicy(op, ctx),
      set_threshold_policy_plain: (op, ctx) => this.setThresholdPolicyPlain(op, ctx),
      set_eligibility_policy: (op, ctx) => this.setEligibilityPolicy(op, ctx),
      disclose_policy: (op, ctx) => this.disclosePolicy(op, ctx),
      transfer_admin: (op, ctx) => this.transferAdmin(op, ctx),
      submit_threshold: (op, ctx) => this.submit(op, 'threshold_gate', ctx),
      submit_eligibility: (op, ctx) => this.submit(op, 'eligibility', ctx),
      disclose_result: (op, ctx) => this.discloseResult(op, ctx),
      create_content: (op, ctx) => this.createContent(op, ctx),
      create_content_plain: (op, ctx) => this.createContentPlain(op, ctx),
      update_content: (op, ctx) => this.updateContent(op, ctx),
      update_content_plain: (op, ctx) => this.updateContentPlain(op, ctx),
      clear_content: (op, ctx) => this.clearContent(op, ctx),
      submit_match: (op, ctx) => this.submitMatch(op, ctx),
      disclose_match: (op, ctx) => this.discloseMatch(op, ctx),
    };
  }

  get notifications(): NotificationBus {
    return this.bus;
  }

  get audit(): AuditStore {
    return this.auditStore;
  }

  get engineIdentity(): Principal {
    return this.config.engineIdentity;
  }

  /**
   * Set the deployment's admin. Allowed exactly once.
   *
   * @throws InvalidPrincipalError for the zero principal
   * @throws AlreadyInitializedError when an admin is already set
   */
  initialize(admin: Principal): Promise<void> {
    return this.enqueue(async () => {
      if (isZeroPrincipal(admin)) {
        throw new InvalidPrincipalError(admin, 'admin');
      }

      await this.withTransaction(async (repos) => {
        const existing = await repos.admin.get();
        if (existing) {
          throw new AlreadyInitializedError(existing);
        }
        await repos.admin.set(admin);
      });

      this.logger.info('Engine initialized', { admin });
      await this.bus.publish({
        ...this.envelope(),
        type: 'admin_transferred',
        payload: { previousAdmin: ZERO_PRINCIPAL, admin },
      });
    });
  }

  /**
   * Execute a boundary operation.
   *
   * Never throws for engine errors: failures come back as
   * `{ success: false, code }` with the audit entry that recorded them.
   */
  execute<K extends OperationType>(
    operation: OperationMap[K] & { type: K }
  ): Promise<OperationResult<OperationDataMap[K]>> {
    return this.enqueue(() => this.run<K>(operation));
  }

  // --- Read accessors ---

  getAdmin(): Promise<Principal | null> {
    return this.enqueue(() => this.repos.admin.get());
  }

  /**
   * @throws InvalidContextKeyError
   * @throws PolicyNotFoundError
   */
  getPolicy(contextKey: ContextKey): Promise<Policy> {
    return this.enqueue(async () => {
      if (isZeroContextKey(contextKey)) {
        throw new InvalidContextKeyError(contextKey);
      }
      const policy = await this.repos.policies.get(contextKey);
      if (!policy) {
        throw new PolicyNotFoundError(contextKey);
      }
      return policy;
    });
  }

  /**
   * Published policies ordered by context key.
   */
  listPolicies(filter?: PolicyFilter): Promise<Policy[]> {
    return this.enqueue(() => this.repos.policies.list(filter));
  }

  /**
   * Every principal's registration for a context. Results stay sealed;
   * reading one still needs a grant on its handle.
   *
   * @throws InvalidContextKeyError
   */
  listRegistrations(contextKey: ContextKey): Promise<Registration[]> {
    return this.enqueue(async () => {
      if (isZeroContextKey(contextKey)) {
        throw new InvalidContextKeyError(contextKey);
      }
      return this.repos.registrations.listByContext(contextKey);
    });
  }

  /**
   * The principal's evaluated result for a context.
   *
   * @throws RegistrationNotFoundError
   */
  getResult(contextKey: ContextKey, principal: Principal): Promise<Ciphertext> {
    return this.enqueue(async () => {
      if (isZeroContextKey(contextKey)) {
        throw new InvalidContextKeyError(contextKey);
      }
      const registration = await this.repos.registrations.get(contextKey, principal);
      if (!registration) {
        throw new RegistrationNotFoundError(contextKey, principal);
      }
      return registration.result;
    });
  }

  /**
   * @throws ContentNotFoundError when never created or already cleared
   */
  getContent(contentId: number): Promise<Content> {
    return this.enqueue(async () => {
      const content = await this.repos.contents.get(contentId);
      if (!content || content.status === 'cleared') {
        throw new ContentNotFoundError(contentId);
      }
      return content;
    });
  }

  /**
   * Contents ordered by id. Cleared content is left out unless asked for.
   */
  listContent(filter?: ContentFilter): Promise<Content[]> {
    return this.enqueue(() => this.repos.contents.list(filter));
  }

  getContentStatus(contentId: number): Promise<ContentPresence> {
    return this.enqueue(() => this.repos.contents.presence(contentId));
  }

  /**
   * @throws RegistrationNotFoundError when the principal never matched this content
   */
  getMatch(contentId: number, principal: Principal): Promise<BoolCiphertext> {
    return this.enqueue(async () => {
      const match = await this.repos.contents.getMatch(contentId, principal);
      if (!match) {
        throw new RegistrationNotFoundError(`content ${contentId}`, principal);
      }
      return match.result;
    });
  }

  getAclFacts(handle: Handle): Promise<AclFacts> {
    return this.enqueue(() => this.readLedger().facts(handle));
  }

  canDecrypt(handle: Handle, principal: Principal): Promise<boolean> {
    return this.enqueue(() => this.readLedger().canDecrypt(handle, principal));
  }

  /**
   * Handles the principal holds an explicit grant on. Public disclosure
   * does not add to this list.
   */
  getHandlesFor(principal: Principal): Promise<Handle[]> {
    return this.enqueue(() => this.repos.acl.getHandlesFor(principal));
  }

  // --- Invocation pipeline ---

  private enqueue<R>(task: () => Promise<R>): Promise<R> {
    const run = this.tail.then(task);
    // Failures reach the caller through `run`; the queue itself keeps going
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async run<K extends OperationType>(
    operation: OperationMap[K] & { type: K }
  ): Promise<OperationResult<OperationDataMap[K]>> {
    const startTime = Date.now();
    const op: Operation = operation;

    // Untyped callers can send anything, so metadata comes from the parsed payload
    const validation = validateOperation(op);
    const metadata = validation.valid
      ? getOperationMetadata(validation.operation)
      : describeInvalidPayload(op);
    const { operationType, resourceType, resourceId } = metadata;

    const auditEntry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      actor: {
        principal: op.actor?.principal ?? '',
        method: op.actor?.method ?? 'api',
      },
      operationType,
      resourceType,
      resourceId,
      details: metadata.details ?? {},
      success: false,
    };

    try {
      this.validate(op, validation);
      await this.authorize(op);

      const pending: EngineNotification[] = [];
      const data = await this.withTransaction((repos) =>
        this.dispatch<K>(
          operation.type,
          operation,
          this.createContext(repos, op.actor.principal, pending)
        )
      );

      auditEntry.success = true;
      auditEntry.details = {
        durationMs: Date.now() - startTime,
        result: sanitizeForAudit(data),
      };
      await this.recordAudit(auditEntry);

      this.logger.info('Operation committed', {
        operationType,
        actor: auditEntry.actor.principal,
        resourceId,
        notifications: pending.length,
      });

      for (const notification of pending) {
        await this.bus.publish(notification);
      }

      return { success: true, data, audit: auditEntry };
    } catch (error) {
      const code: EngineErrorCode = isEngineError(error) ? error.code : 'INTERNAL_ERROR';
      const message = error instanceof Error ? error.message : String(error);

      auditEntry.success = false;
      auditEntry.error = message;
      auditEntry.errorCode = code;
      auditEntry.details = {
        ...auditEntry.details,
        durationMs: Date.now() - startTime,
        errorType: error instanceof Error ? error.name : 'UnknownError',
      };
      await this.recordAudit(auditEntry);

      if (code === 'INTERNAL_ERROR') {
        this.logger.error('Operation failed', { operationType, error: message });
      } else {
        this.logger.warn('Operation rejected', { operationType, code, error: message });
      }

      return { success: false, error: message, code, audit: auditEntry };
    }
  }

  private dispatch<K extends OperationType>(
    type: K,
    operation: OperationMap[K],
    ctx: InvocationContext
  ): Promise<OperationDataMap[K]> {
    const handler = this.handlers[type];
    return handler(operation, ctx);
  }

  private async withTransaction<R>(fn: (repos: RepositoryContext) => Promise<R>): Promise<R> {
    if (this.config.transactionsEnabled && isTransactional(this.repos)) {
      return this.repos.transaction(fn);
    }
    return fn(this.repos);
  }

  /**
   * Store the entry and hand it to onAudit. Runs after the outcome is
   * settled, so a failing store or hook is logged and never changes it.
   */
  private async recordAudit(entry: AuditEntry): Promise<void> {
    if (!this.config.auditEnabled) {
      return;
    }
    try {
      await this.auditStore.append(entry);
      await this.config.onAudit(entry);
    } catch (error) {
      this.reportAuditError(entry, error);
    }
  }

  private reportAuditError(entry: AuditEntry, error: unknown): void {
    this.logger.error('Audit delivery failed', {
      auditId: entry.id,
      operationType: entry.operationType,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  private createContext(
    repos: RepositoryContext,
    actor: Principal,
    pending: EngineNotification[]
  ): InvocationContext {
    const emit = (notification: EngineNotification) => {
      pending.push(notification);
    };

    const ledger = new AccessControlLedger(repos.acl, {
      engineIdentity: this.config.engineIdentity,
      actor,
      onFact: (fact) => emit(this.factToNotification(fact)),
    });

    return { repos, ledger, actor, emit };
  }

  private readLedger(): AccessControlLedger {
    return new AccessControlLedger(this.repos.acl, {
      engineIdentity: this.config.engineIdentity,
    });
  }

  /**
   * Validate operation input.
   */
  private validate(op: Operation, validation: OperationValidationResult): void {
    if (!validation.valid) {
      const [first] = validation.errors;
      throw new ValidationError(`${first.path}: ${first.message}`, {
        field: first.path,
        details: { errors: validation.errors },
      });
    }

    if (isZeroPrincipal(op.actor.principal)) {
      throw new InvalidPrincipalError(op.actor.principal, 'actor');
    }

    if ('contextKey' in op && isZeroContextKey(op.contextKey)) {
      throw new InvalidContextKeyError(op.contextKey);
    }

    if (DEVELOPER_MODE_OPERATIONS.has(op.type) && !this.config.developerMode) {
      throw new DeveloperModeDisabledError(op.type);
    }
  }

  /**
   * Check admin-only operations. Author and owner checks need the
   * resource and happen in the handlers.
   */
  private async authorize(op: Operation): Promise<void> {
    if (!ADMIN_OPERATIONS.has(op.type)) {
      return;
    }
    const admin = await this.repos.admin.get();
    if (!admin || admin !== op.actor.principal) {
      throw new NotAuthorizedError(op.actor.principal, 'admin');
    }
  }

  private envelope(): { id: string; timestamp: string } {
    return { id: randomUUID(), timestamp: new Date().toISOString() };
  }

  private factToNotification(fact: AclFact): EngineNotification {
    switch (fact.type) {
      case 'granted':
        return {
          ...this.envelope(),
          type: 'acl_granted',
          payload: { handle: fact.handle, principal: fact.principal },
        };
      case 'disclosed':
        return {
          ...this.envelope(),
          type: 'publicly_disclosed',
          payload: { handle: fact.handle, disclosedBy: fact.disclosedBy },
        };
    }
  }

  // --- Policy Handlers ---

  private async setThresholdPolicy(
    op: SetThresholdPolicyOperation,
    ctx: InvocationContext
  ): Promise<{ policy: Policy }> {
    const references = op.bundle.references;
    if (references.length < 3) {
      throw new ValidationError(
        'threshold bundle needs at least one threshold, then valueIfTrue and valueIfFalse',
        { field: 'bundle.references' }
      );
    }

    const kinds = references.map((ref, i) => {
      if (!isNumericKind(ref.kind)) {
        throw new IncompatibleCiphertextError(
          'set_threshold_policy',
          [ref.kind],
          `reference ${i} must be numeric`
        );
      }
      return ref.kind;
    });

    const cts = (await this.algebra.fromBundle(op.bundle, ctx.actor, kinds)).map((ct) =>
      expectNumeric(ct, 'set_threshold_policy')
    );
    const [valueIfTrue, valueIfFalse] = cts.slice(-2);

    return this.writeThresholdPolicy(
      op.contextKey,
      { thresholds: cts.slice(0, -2), valueIfTrue, valueIfFalse, mode: 'encrypted' },
      ctx
    );
  }

  private async setThresholdPolicyPlain(
    op: SetThresholdPolicyPlainOperation,
    ctx: InvocationContext
  ): Promise<{ policy: Policy }> {
    if (op.thresholds.length === 0) {
      throw new ValidationError('threshold gate needs at least one threshold', {
        field: 'thresholds',
      });
    }

    const thresholds: NumericCiphertext[] = [];
    for (const threshold of op.thresholds) {
      thresholds.push(await this.algebra.lift(threshold, 'uint32'));
    }
    const valueIfTrue = await this.algebra.lift(op.valueIfTrue, 'uint64');
    const valueIfFalse = await this.algebra.lift(op.valueIfFalse, 'uint64');

    return this.writeThresholdPolicy(
      op.contextKey,
      { thresholds, valueIfTrue, valueIfFalse, mode: 'plain' },
      ctx
    );
  }

  private async writeThresholdPolicy(
    contextKey: ContextKey,
    params: ThresholdGateParams,
    ctx: InvocationContext
  ): Promise<{ policy: Policy }> {
    if (params.valueIfTrue.kind !== params.valueIfFalse.kind) {
      throw new IncompatibleCiphertextError(
        'set_threshold_policy',
        [params.valueIfTrue.kind, params.valueIfFalse.kind],
        'valueIfTrue and valueIfFalse must share one kind'
      );
    }

    // Engine keeps operating on the parameters; the admin may decrypt them
    for (const ct of [...params.thresholds, params.valueIfTrue, params.valueIfFalse]) {
      await ctx.ledger.grantSelf(ct);
      await ctx.ledger.grant(ct, ctx.actor);
    }

    return this.writePolicy(contextKey, { kind: 'threshold_gate', ...params }, ctx);
  }

  private async setEligibilityPolicy(
    op: SetEligibilityPolicyOperation,
    ctx: InvocationContext
  ): Promise<{ policy: Policy }> {
    if (op.allowedCountries.length > this.config.allowListCap) {
      throw new AllowListTooLargeError(op.allowedCountries.length, this.config.allowListCap);
    }

    return this.writePolicy(
      op.contextKey,
      {
        kind: 'eligibility',
        minAge: op.minAge,
        requireInvite: op.requireInvite,
        allowedCountries: [...op.allowedCountries],
      },
      ctx
    );
  }

  private async writePolicy(
    contextKey: ContextKey,
    params: PolicyParams,
    ctx: InvocationContext
  ): Promise<{ policy: Policy }> {
    const policy = await ctx.repos.policies.upsert({
      contextKey,
      params,
      updatedBy: ctx.actor,
    });

    ctx.emit({
      ...this.envelope(),
      type: 'policy_updated',
      payload: {
        contextKey,
        kind: policy.kind,
        version: policy.version,
        updatedBy: ctx.actor,
      },
    });

    return { policy };
  }

  private async disclosePolicy(
    op: DisclosePolicyOperation,
    ctx: InvocationContext
  ): Promise<{ policy: Policy; disclosed: Handle[] }> {
    const existing = await ctx.repos.policies.get(op.contextKey);
    if (!existing) {
      throw new PolicyNotFoundError(op.contextKey);
    }

    const cts = policyCiphertexts(existing);
    for (const ct of cts) {
      await ctx.ledger.disclosePublicly(ct);
    }

    const policy = await ctx.repos.policies.markDisclosed(op.contextKey);
    if (!policy) {
      throw new PolicyNotFoundError(op.contextKey);
    }

    return { policy, disclosed: cts.map((ct) => ct.handle) };
  }

  private async transferAdmin(
    op: TransferAdminOperation,
    ctx: InvocationContext
  ): Promise<{ previousAdmin: Principal; admin: Principal }> {
    if (isZeroPrincipal(op.newAdmin)) {
      throw new InvalidPrincipalError(op.newAdmin, 'newAdmin');
    }

    await ctx.repos.admin.set(op.newAdmin);

    ctx.emit({
      ...this.envelope(),
      type: 'admin_transferred',
      payload: { previousAdmin: ctx.actor, admin: op.newAdmin },
    });

    return { previousAdmin: ctx.actor, admin: op.newAdmin };
  }

  // --- Participant Handlers ---

  private async submit(
    op: SubmitThresholdOperation | SubmitEligibilityOperation,
    expectedKind: PolicyKind,
    ctx: InvocationContext
  ): Promise<OperationDataMap['submit_threshold']> {
    const policy = await ctx.repos.policies.get(op.contextKey);
    if (!policy) {
      throw new PolicyNotFoundError(op.contextKey);
    }
    if (policy.kind !== expectedKind) {
      throw new PolicyKindMismatchError(op.contextKey, expectedKind, policy.kind);
    }

    const attributes = await this.algebra.fromBundle(
      op.bundle,
      ctx.actor,
      attributeKindsFor(policy)
    );
    const result = await evaluatePolicy(this.algebra, policy, attributes, {
      allowListCap: this.config.allowListCap,
    });

    await ctx.ledger.grantSelf(result);
    await ctx.ledger.grant(result, ctx.actor);

    const registration = await ctx.repos.registrations.upsert({
      contextKey: op.contextKey,
      principal: ctx.actor,
      policyKind: policy.kind,
      result,
    });

    ctx.emit({
      ...this.envelope(),
      type: 'result_computed',
      payload: {
        principal: ctx.actor,
        handle: result.handle,
        resourceType: 'registration',
        resourceId: op.contextKey,
      },
    });

    return { registration, handle: result.handle };
  }

  private async discloseResult(
    op: DiscloseResultOperation,
    ctx: InvocationContext
  ): Promise<{ handle: Handle }> {
    const registration = await ctx.repos.registrations.get(op.contextKey, ctx.actor);
    if (!registration) {
      throw new RegistrationNotFoundError(op.contextKey, ctx.actor);
    }

    await ctx.ledger.disclosePublicly(registration.result);
    return { handle: registration.result.handle };
  }

  // --- Content Handlers ---

  private async createContent(
    op: CreateContentOperation,
    ctx: InvocationContext
  ): Promise<{ content: Content }> {
    const encMask = await this.maskFromBundle(op, ctx);

    await ctx.ledger.grantSelf(encMask);
    await ctx.ledger.grant(encMask, ctx.actor);

    const content = await ctx.repos.contents.create({
      author: ctx.actor,
      mask: { isPlain: false, encMask },
    });
    this.emitContentCreated(content, ctx);
    return { content };
  }

  private async createContentPlain(
    op: CreateContentPlainOperation,
    ctx: InvocationContext
  ): Promise<{ content: Content }> {
    const content = await ctx.repos.contents.create({
      author: ctx.actor,
      mask: { isPlain: true, plainMask: op.mask },
    });
    this.emitContentCreated(content, ctx);
    return { content };
  }

  private async updateContent(
    op: UpdateContentOperation,
    ctx: InvocationContext
  ): Promise<{ content: Content }> {
    const existing = await this.loadEditableContent(op.contentId, ctx);
    const encMask = await this.maskFromBundle(op, ctx);

    await ctx.ledger.grantSelf(encMask);
    await ctx.ledger.grant(encMask, existing.author);

    return this.replaceMask(op.contentId, { isPlain: false, encMask }, ctx);
  }

  private async updateContentPlain(
    op: UpdateContentPlainOperation,
    ctx: InvocationContext
  ): Promise<{ content: Content }> {
    await this.loadEditableContent(op.contentId, ctx);
    return this.replaceMask(op.contentId, { isPlain: true, plainMask: op.mask }, ctx);
  }

  private async clearContent(
    op: ClearContentOperation,
    ctx: InvocationContext
  ): Promise<{ content: Content }> {
    const existing = await this.loadEditableContent(op.contentId, ctx);

    // Nothing is deleted: the mask is overwritten with a fresh zero
    const zero = await this.algebra.lift(0, MASK_KIND);
    await ctx.ledger.grantSelf(zero);
    await ctx.ledger.grant(zero, existing.author);

    const content = await ctx.repos.contents.clear(op.contentId, {
      isPlain: false,
      encMask: zero,
    });
    if (!content) {
      throw new ContentNotFoundError(op.contentId);
    }

    ctx.emit({
      ...this.envelope(),
      type: 'content_cleared',
      payload: { contentId: content.id, clearedBy: ctx.actor },
    });
    return { content };
  }

  private async submitMatch(
    op: SubmitMatchOperation,
    ctx: InvocationContext
  ): Promise<{ match: MatchResult; handle: Handle }> {
    const content = await ctx.repos.contents.get(op.contentId);
    if (!content || content.status === 'cleared') {
      throw new ContentNotFoundError(op.contentId);
    }

    const interest = await this.maskFromBundle(op, ctx);
    const contentMask = await maskToCiphertext(this.algebra, content.mask);
    const result = await evaluateMatch(this.algebra, contentMask, interest);

    await ctx.ledger.grantSelf(result);
    await ctx.ledger.grant(result, ctx.actor);

    const match = await ctx.repos.contents.upsertMatch({
      contentId: op.contentId,
      principal: ctx.actor,
      result,
    });

    ctx.emit({
      ...this.envelope(),
      type: 'result_computed',
      payload: {
        principal: ctx.actor,
        handle: result.handle,
        resourceType: 'match',
        resourceId: String(op.contentId),
      },
    });

    return { match, handle: result.handle };
  }

  private async discloseMatch(
    op: DiscloseMatchOperation,
    ctx: InvocationContext
  ): Promise<{ handle: Handle }> {
    const match = await ctx.repos.contents.getMatch(op.contentId, ctx.actor);
    if (!match) {
      throw new RegistrationNotFoundError(`content ${op.contentId}`, ctx.actor);
    }

    await ctx.ledger.disclosePublicly(match.result);
    return { handle: match.result.handle };
  }

  private async maskFromBundle(
    op: CreateContentOperation | UpdateContentOperation | SubmitMatchOperation,
    ctx: InvocationContext
  ): Promise<Ciphertext<typeof MASK_KIND>> {
    const [ct] = await this.algebra.fromBundle(op.bundle, ctx.actor, [MASK_KIND]);
    return expectKind(ct, MASK_KIND, op.type);
  }

  /**
   * Active content the actor may change: its author, or the admin.
   */
  private async loadEditableContent(contentId: number, ctx: InvocationContext): Promise<Content> {
    const content = await ctx.repos.contents.get(contentId);
    if (!content || content.status === 'cleared') {
      throw new ContentNotFoundError(contentId);
    }

    if (ctx.actor !== content.author) {
      const admin = await ctx.repos.admin.get();
      if (ctx.actor !== admin) {
        throw new NotAuthorizedError(ctx.actor, 'author');
      }
    }

    return content;
  }

  private async replaceMask(
    contentId: number,
    mask: Content['mask'],
    ctx: InvocationContext
  ): Promise<{ content: Content }> {
    const content = await ctx.repos.contents.updateMask(contentId, mask);
    if (!content) {
      throw new ContentNotFoundError(contentId);
    }

    ctx.emit({
      ...this.envelope(),
      type: 'content_updated',
      payload: { contentId, updatedBy: ctx.actor, isPlain: mask.isPlain },
    });
    return { content };
  }

  private emitContentCreated(content: Content, ctx: InvocationContext): void {
    ctx.emit({
      ...this.envelope(),
      type: 'content_created',
      payload: { contentId: content.id, author: content.author, isPlain: content.mask.isPlain },
    });
  }
}

/**
 * Create a new Boundary instance.
 */
export function createBoundary(options: BoundaryOptions): Boundary {
  return new Boundary(options);
}

// --- Helper Functions ---

/**
 * Ciphertexts a policy keeps, in disclosure order.
 */
function policyCiphertexts(policy: Policy): NumericCiphertext[] {
  if (policy.kind === 'threshold_gate') {
    return [...policy.thresholds, policy.valueIfTrue, policy.valueIfFalse];
  }
  return [];
}

type AuditMetadata = {
  operationType: AuditEntry['operationType'];
  resourceType: AuditEntry['resourceType'];
  resourceId?: string;
  details?: Record<string, unknown>;
};

/**
 * Get metadata about an operation for auditing.
 */
function getOperationMetadata(operation: Operation): AuditMetadata {
  switch (operation.type) {
    case 'set_threshold_policy':
    case 'set_threshold_policy_plain':
    case 'set_eligibility_policy':
    case 'disclose_policy':
      return {
        operationType: operation.type,
        resourceType: 'policy',
        resourceId: operation.contextKey,
      };
    case 'transfer_admin':
      return {
        operationType: operation.type,
        resourceType: 'admin',
        resourceId: operation.newAdmin,
      };
    case 'submit_threshold':
    case 'submit_eligibility':
    case 'disclose_result':
      return {
        operationType: operation.type,
        resourceType: 'registration',
        resourceId: operation.contextKey,
      };
    case 'create_content':
    case 'create_content_plain':
      return { operationType: operation.type, resourceType: 'content' };
    case 'update_content':
    case 'update_content_plain':
    case 'clear_content':
      return {
        operationType: operation.type,
        resourceType: 'content',
        resourceId: String(operation.contentId),
      };
    case 'submit_match':
    case 'disclose_match':
      return {
        operationType: operation.type,
        resourceType: 'match',
        resourceId: String(operation.contentId),
      };
  }
}

/**
 * Audit metadata for a payload that failed schema validation.
 */
function describeInvalidPayload(input: unknown): AuditMetadata {
  const attemptedType =
    typeof input === 'object' && input !== null && 'type' in input ? input.type : undefined;
  return {
    operationType: 'invalid',
    resourceType: 'invalid',
    details: typeof attemptedType === 'string' ? { attemptedType } : {},
  };
}

const SUMMARY_FIELDS = ['id', 'contextKey', 'contentId', 'principal', 'version', 'handle'];

/**
 * Reduce a result to identifiers for the audit log. Masks, ciphertext
 * parameters and other payloads are left out.
 */
function sanitizeForAudit(result: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  const entries: Array<[string, unknown]> = Object.entries(result);

  for (const [key, value] of entries) {
    if (Array.isArray(value)) {
      sanitized[key] = `[Array(${value.length})]`;
    } else if (typeof value === 'object' && value !== null) {
      const fields = new Map<string, unknown>(Object.entries(value));
      const summary: Record<string, unknown> = {};
      for (const field of SUMMARY_FIELDS) {
        if (fields.has(field)) {
          summary[field] = fields.get(field);
        }
      }
      sanitized[key] = summary;
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
