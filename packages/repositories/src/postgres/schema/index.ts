// Re-export all schema tables
export * from './policies.js';
export * from './registrations.js';
export * from './contents.js';
export * from './acl.js';
export * from './admin.js';
