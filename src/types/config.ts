// ====================
// Configuration Types
// ====================

export type UserCommandMode = 'foreground' | 'background';

/**
 * User-defined command run against the selected item.
 * args, cwd and env values may contain {owner}, {repo}, {number} placeholders.
 */
export interface UserCommand {
  name: string;
  args: string[];
  mode: UserCommandMode;
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Shape of config.json; every field is optional
 */
export interface TriageLocalConfig {
  apiBaseUrl?: string;
  graphqlUrl?: string;
  tokenCommand?: string[];
  maxNotifications?: number;
  preloadCount?: number;
  preloadConcurrency?: number;
  graphqlBatchSize?: number;
  requestTimeoutMs?: number;
  dataDir?: string;
  commands?: UserCommand[];
}

/**
 * Fully resolved configuration (defaults + file + environment)
 */
export interface TriageConfig {
  apiBaseUrl: string;
  graphqlUrl: string;
  tokenCommand: string[];
  maxNotifications: number;
  preloadCount: number;
  preloadConcurrency: number;
  graphqlBatchSize: number;
  requestTimeoutMs: number;
  dataDir: string;
  commands: UserCommand[];
}
