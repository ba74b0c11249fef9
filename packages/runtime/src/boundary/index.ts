// Boundary - the commit point of the engine

export {
  Boundary,
  createBoundary,
  type BoundaryOptions,
  type OperationOf,
} from './boundary.js';

export {
  createInMemoryAuditStore,
  type AuditStore,
  type AuditQueryOptions,
  type AuditQueryFilter,
} from './audit.js';

export {
  NotificationBus,
  type NotificationHandler,
  type NotificationOf,
} from './notifications.js';
