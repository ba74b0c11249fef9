// Notification types - structured facts for off-chain observers
//
// Notifications are published only after an invocation commits.
// The decryption-request flow consumes acl_granted / publicly_disclosed
// together with the ACL accessors; the engine itself never reads them.

import type { ContextKey, Handle, Id, Principal, Timestamp } from './common.js';
import type { PolicyKind } from './policies.js';
import type { ResourceType } from './operations.js';

type NotificationBase<T extends string, P> = {
  id: Id;
  type: T;
  timestamp: Timestamp;
  payload: P;
};

export type PolicyUpdatedNotification = NotificationBase<
  'policy_updated',
  { contextKey: ContextKey; kind: PolicyKind; version: number; updatedBy: Principal }
>;

export type AdminTransferredNotification = NotificationBase<
  'admin_transferred',
  { previousAdmin: Principal; admin: Principal }
>;

export type ResultComputedNotification = NotificationBase<
  'result_computed',
  {
    principal: Principal;
    handle: Handle;
    resourceType: Extract<ResourceType, 'registration' | 'match'>;
    /** Context key for registrations, content id for matches */
    resourceId: string;
  }
>;

export type ContentCreatedNotification = NotificationBase<
  'content_created',
  { contentId: number; author: Principal; isPlain: boolean }
>;

export type ContentUpdatedNotification = NotificationBase<
  'content_updated',
  { contentId: number; updatedBy: Principal; isPlain: boolean }
>;

export type ContentClearedNotification = NotificationBase<
  'content_cleared',
  { contentId: number; clearedBy: Principal }
>;

export type AclGrantedNotification = NotificationBase<
  'acl_granted',
  { handle: Handle; principal: Principal }
>;

export type PubliclyDisclosedNotification = NotificationBase<
  'publicly_disclosed',
  { handle: Handle; disclosedBy: Principal }
>;

export type EngineNotification =
  | PolicyUpdatedNotification
  | AdminTransferredNotification
  | ResultComputedNotification
  | ContentCreatedNotification
  | ContentUpdatedNotification
  | ContentClearedNotification
  | AclGrantedNotification
  | PubliclyDisclosedNotification;

export type NotificationType = EngineNotification['type'];

export type NotificationPayload<T extends NotificationType> = Extract<
  EngineNotification,
  { type: T }
>['payload'];
