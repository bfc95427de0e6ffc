/**
 * GitHub credential acquisition
 *
 * A token in the environment wins; otherwise the credential helper
 * (default `gh auth token`) runs once and its output is kept for the process.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { AuthError, errorMessage } from '../types/index.js';
import { log } from '../logger.js';

const execFileAsync = promisify(execFile);

export type TokenCommandRunner = (command: string, args: string[]) => Promise<{ stdout: string }>;

export interface TokenOptions {
  tokenCommand: string[];
  env?: Record<string, string | undefined>;
  run?: TokenCommandRunner;
}

const defaultRunner: TokenCommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { timeout: 10000 });
  return { stdout };
};

/**
 * Resolve a token without caching
 */
export async function resolveGitHubToken(options: TokenOptions): Promise<string> {
  const env = options.env ?? process.env;
  const fromEnv = (env.GITHUB_TOKEN || env.GH_TOKEN || '').trim();
  if (fromEnv) {
    return fromEnv;
  }

  const [command, ...args] = options.tokenCommand;
  if (!command) {
    throw new AuthError('No credential helper configured');
  }

  const run = options.run ?? defaultRunner;
  let stdout: string;
  try {
    ({ stdout } = await run(command, args));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new AuthError(`Credential helper '${command}' not found. Install it or set GITHUB_TOKEN`);
    }
    throw new AuthError(`'${options.tokenCommand.join(' ')}' failed. Run: gh auth login`, {
      error: errorMessage(error),
    });
  }

  const token = stdout.trim();
  if (!token) {
    throw new AuthError(`'${options.tokenCommand.join(' ')}' returned empty output`);
  }
  log.github.debug({ command }, 'obtained token from credential helper');
  return token;
}

let cachedToken: Promise<string> | null = null;

/**
 * Process-wide token; the helper runs at most once unless it failed
 */
export function getGitHubToken(options: TokenOptions): Promise<string> {
  if (!cachedToken) {
    cachedToken = resolveGitHubToken(options).catch((error: unknown) => {
      cachedToken = null;
      throw error;
    });
  }
  return cachedToken;
}

export function clearTokenCache(): void {
  cachedToken = null;
}
