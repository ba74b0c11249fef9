// In-memory notification bus
//
// The boundary publishes here only after an invocation commits. Off-engine
// observers (indexers, the decryption-request flow) subscribe per type or
// to everything. A failing handler is logged and never affects the engine
// or the other handlers.

import type { EngineNotification, NotificationType } from '@cloak/protocol';
import type { EngineLogger } from '../logger.js';
import { silentLogger } from '../logger.js';

export type NotificationOf<T extends NotificationType> = Extract<EngineNotification, { type: T }>;

export type NotificationHandler<N extends EngineNotification = EngineNotification> = (
  notification: N
) => void | Promise<void>;

type Subscription = {
  type: NotificationType | '*';
  handler: NotificationHandler;
};

function isNotificationOfType<T extends NotificationType>(
  notification: EngineNotification,
  type: T
): notification is NotificationOf<T> {
  return notification.type === type;
}

export class NotificationBus {
  private subscriptions = new Set<Subscription>();

  constructor(private readonly logger: EngineLogger = silentLogger) {}

  /**
   * Subscribe to one notification type.
   *
   * @returns Unsubscribe function
   */
  subscribe<T extends NotificationType>(
    type: T,
    handler: NotificationHandler<NotificationOf<T>>
  ): () => void {
    return this.add({
      type,
      handler: (notification) =>
        isNotificationOfType(notification, type) ? handler(notification) : undefined,
    });
  }

  /**
   * Subscribe to every notification.
   *
   * @returns Unsubscribe function
   */
  subscribeAll(handler: NotificationHandler): () => void {
    return this.add({ type: '*', handler });
  }

  /**
   * Deliver a notification to every matching subscriber and wait for
   * async handlers to settle.
   */
  async publish(notification: EngineNotification): Promise<void> {
    const pending: Promise<void>[] = [];

    for (const sub of this.subscriptions) {
      if (sub.type !== '*' && sub.type !== notification.type) {
        continue;
      }
      try {
        const result = sub.handler(notification);
        if (result instanceof Promise) {
          pending.push(result);
        }
      } catch (error) {
        this.reportHandlerError(notification, error);
      }
    }

    const settled = await Promise.allSettled(pending);
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        this.reportHandlerError(notification, outcome.reason);
      }
    }
  }

  subscriberCount(type?: NotificationType): number {
    if (!type) {
      return this.subscriptions.size;
    }
    let count = 0;
    for (const sub of this.subscriptions) {
      if (sub.type === type || sub.type === '*') {
        count++;
      }
    }
    return count;
  }

  private add(subscription: Subscription): () => void {
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  private reportHandlerError(notification: EngineNotification, error: unknown): void {
    this.logger.error('Notification handler failed', {
      notificationId: notification.id,
      type: notification.type,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
