// Re-export all protocol types

export * from './common.js';
export * from './ciphertext.js';
export * from './policies.js';
export * from './registrations.js';
export * from './content.js';
export * from './acl.js';
export * from './operations.js';
export * from './notifications.js';
