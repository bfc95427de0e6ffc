// triage-inbox core types
// Simple, focused types matching the cache schema and the wire payloads

export * from './errors.js';
export * from './notifications.js';
export * from './pull-requests.js';
export * from './github.js';
export * from './sync.js';
export * from './messages.js';
export * from './config.js';
