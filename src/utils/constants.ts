/**
 * Shared constants for triage-inbox
 */

export const APP_NAME = 'triage-inbox';

// GitHub endpoints
export const DEFAULT_API_BASE_URL = 'https://api.github.com';
export const DEFAULT_TOKEN_COMMAND = ['gh', 'auth', 'token'];
export const REQUEST_TIMEOUT_MS = 60000; // GraphQL batch queries can be slow

// Sync limits
export const DEFAULT_MAX_NOTIFICATIONS = 1000;
export const PRELOAD_COUNT = 20;
export const PRELOAD_CONCURRENCY = 5;

// GraphQL nodes per batched lookup; GitHub rejects queries above 500
export const GRAPHQL_BATCH_SIZE = 100;
export const GRAPHQL_MAX_NODES = 500;

// Warn when the remaining request budget drops below this
export const RATE_LIMIT_WARNING_THRESHOLD = 100;

// Worker channels
export const REQUEST_CHANNEL_CAPACITY = 256;
export const RESPONSE_CHANNEL_CAPACITY = 1024;

// Cache file
export const DATABASE_FILENAME = 'notifications.db';
export const SQLITE_BUSY_TIMEOUT_MS = 5000;
