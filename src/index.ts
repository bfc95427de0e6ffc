/**
 * triage-inbox
 * Library entry point for front ends built on the cache and worker bus
 */

export * from './types/index.js';
export { DatabaseManager, LATEST_SCHEMA_VERSION, type DatabaseConfig, type SqlResult } from './database/index.js';
export type { Migration } from './database/migrations.js';
export { computePriority, comparePriority, type Priority, type PriorityInput } from './priority.js';
export { GitHubClient, parseNextLink, type FetchLike, type GitHubClientOptions, type PullRequestRef } from './github/client.js';
export { getGitHubToken, resolveGitHubToken, clearTokenCache } from './github/credentials.js';
export { parseSubjectUrl, toHtmlUrl, commentsUrlFor, formatRef, parseRef } from './github/subject.js';
export { syncNotifications, type SyncOptions } from './sync.js';
export { Channel, ChannelClosedError } from './worker/channel.js';
export { Semaphore } from './worker/semaphore.js';
export {
  GitHubBackend,
  loadComments,
  preloadComments,
  type GitHubBackendOptions,
  type PreloadOutcome,
  type TriageBackend,
} from './worker/backend.js';
export { TriageWorker } from './worker/worker.js';
export { WorkerBus, startWorker, type WorkerHandle } from './worker/bus.js';
export { InboxView, type InboxBus, type DismissOutcome } from './inbox.js';
export { loadConfig, resolveConfig, saveConfig, setConfigValue, expandCommand, getConfigPath } from './utils/config.js';
export { log, rootLogger } from './logger.js';
