#!/usr/bin/env node
/**
 * triage CLI
 * Sync, list and act on GitHub notifications from the local cache
 */

import { spawn } from 'node:child_process';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import { DatabaseManager } from '../database/index.js';
import { GitHubClient } from '../github/client.js';
import { getGitHubToken } from '../github/credentials.js';
import { parseRef, parseSubjectUrl } from '../github/subject.js';
import { InboxView } from '../inbox.js';
import { GitHubBackend, type GitHubBackendOptions } from '../worker/backend.js';
import { startWorker, type WorkerHandle } from '../worker/bus.js';
import { SETTABLE_KEYS, expandCommand, getConfigPath, loadConfig, setConfigValue } from '../utils/config.js';
import {
  TriageError,
  ValidationError,
  errorMessage,
  type PriorityTier,
  type TriageConfig,
  type WorkerResponse,
} from '../types/index.js';
import { log } from '../logger.js';
import {
  formatComment,
  formatFile,
  formatNotificationLine,
  formatSyncSummary,
  formatThread,
} from './format.js';

// Read version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : '0.0.0';

const program = new Command();

// ====================
// Helpers
// ====================

function openStore(config: TriageConfig, readonly = false): DatabaseManager {
  return new DatabaseManager({ dataDir: config.dataDir, readonly });
}

function createClient(config: TriageConfig): GitHubClient {
  return new GitHubClient({
    tokenProvider: () => getGitHubToken({ tokenCommand: config.tokenCommand }),
    apiBaseUrl: config.apiBaseUrl,
    graphqlUrl: config.graphqlUrl,
    graphqlBatchSize: config.graphqlBatchSize,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}

/**
 * Writer connection plus a running worker; the worker is stopped and the store closed afterwards
 */
async function withWorker<T>(
  config: TriageConfig,
  fn: (handle: WorkerHandle, db: DatabaseManager) => Promise<T>,
  onSyncProgress?: GitHubBackendOptions['onSyncProgress']
): Promise<T> {
  const db = openStore(config);
  const backend = new GitHubBackend(db, createClient(config), {
    preloadConcurrency: config.preloadConcurrency,
    preloadCount: config.preloadCount,
    maxNotifications: config.maxNotifications,
    onSyncProgress,
  });
  const handle = startWorker(backend);
  try {
    return await fn(handle, db);
  } finally {
    await handle.worker.stop();
    db.close();
  }
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new ValidationError(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}

function parseTier(value: string): PriorityTier {
  if (value === 'blocking' || value === 'action' || value === 'fyi') return value;
  throw new ValidationError(`Tier must be blocking, action or fyi, got '${value}'`);
}

function reportFailure(response: WorkerResponse): boolean {
  if (response.type !== 'error-result') return false;
  console.error(chalk.yellow(`  ${response.code}: ${response.error}`));
  return true;
}

function fail(error: unknown): never {
  if (error instanceof TriageError) {
    console.error(chalk.red(`\n${error.message}`) + chalk.dim(` (${error.code})\n`));
  } else {
    console.error(chalk.red(`\n${errorMessage(error)}\n`));
  }
  log.cli.debug({ error: errorMessage(error) }, 'command failed');
  process.exit(1);
}

program
  .name('triage')
  .description('Local-first triage for GitHub notifications')
  .version(version);

// ====================
// sync
// ====================

program
  .command('sync')
  .description('Fetch notifications from GitHub into the local cache')
  .option('--max <n>', 'Maximum notifications to fetch', parsePositiveInt)
  .option('--json', 'Output the summary as JSON')
  .action(async (options: { max?: number; json?: boolean }) => {
    const config = loadConfig();
    const spinner = options.json ? null : ora('Syncing notifications...').start();

    try {
      const response = await withWorker(
        config,
        ({ bus }) => bus.request({ type: 'sync', maxNotifications: options.max ?? config.maxNotifications }),
        (stage, current, total) => {
          if (spinner) spinner.text = `Syncing notifications: ${stage} (${current}/${total})`;
        }
      );
      if (response.type === 'error-result') {
        throw new TriageError(response.error, response.code);
      }
      if (response.type !== 'sync-result') {
        throw new TriageError(`Unexpected worker response: ${response.type}`, 'INTERNAL_ERROR');
      }
      const result = response.result;

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      if (result.rateLimit) {
        spinner?.warn(chalk.yellow('Sync halted by rate limit'));
      } else if (result.listError) {
        spinner?.warn(chalk.yellow('Sync stopped early'));
      } else {
        spinner?.succeed(chalk.green('Sync complete'));
      }
      console.log(boxen(formatSyncSummary(result), { padding: 1, borderStyle: 'round' }));
    } catch (error) {
      spinner?.fail(chalk.red('Sync failed'));
      fail(error);
    }
  });

// ====================
// ls
// ====================

program
  .command('ls')
  .description('List cached notifications in priority order')
  .option('--json', 'Output as JSON')
  .option('-f, --filter <text>', 'Match title or owner/repo')
  .option('-r, --reason <reason>', 'Only this reason')
  .option('-t, --tier <tier>', 'Only this tier (blocking, action, fyi)', parseTier)
  .option('-n, --limit <n>', 'Show at most n', parsePositiveInt)
  .action((options: { json?: boolean; filter?: string; reason?: string; tier?: PriorityTier; limit?: number }) => {
    const config = loadConfig();
    const db = openStore(config, true);
    try {
      const rows = db.listNotifications({
        filterText: options.filter,
        filterReason: options.reason,
        tier: options.tier,
        limit: options.limit,
      });

      if (options.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      if (rows.length === 0) {
        console.log(chalk.dim('\nInbox is empty.\n'));
        return;
      }
      for (const row of rows) {
        console.log(formatNotificationLine(row));
      }
    } finally {
      db.close();
    }
  });

// ====================
// stats
// ====================

program
  .command('stats')
  .description('Counts by tier, repository and reason')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const config = loadConfig();
    const db = openStore(config, true);
    try {
      const stats = db.getNotificationStats();
      if (options.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      const section = (title: string, entries: Array<{ label: string; count: number }>): string =>
        `${chalk.bold(title)}\n` + entries.map((e) => `  ${String(e.count).padStart(4)}  ${e.label}`).join('\n');

      const lastSync = db.getSyncMeta('last_sync_completed_at');
      console.log(boxen(
        `${chalk.bold('Total:')} ${stats.total}\n` +
        `${chalk.dim('Last sync:')} ${lastSync ?? 'never'}\n\n` +
        [section('By tier', stats.by_tier), section('By repository', stats.by_repo), section('By reason', stats.by_reason)].join('\n\n'),
        { padding: 1, borderStyle: 'round' }
      ));
    } finally {
      db.close();
    }
  });

// ====================
// show
// ====================

program
  .command('show <id>')
  .description('Show one notification with its comments')
  .option('--pr', 'Also load pull request detail, review threads and files')
  .option('--refresh', 'Fetch secondary data again even when cached')
  .action(async (id: string, options: { pr?: boolean; refresh?: boolean }) => {
    const config = loadConfig();
    try {
      await withWorker(config, async ({ bus }, db) => {
        const notification = db.getNotification(id);
        if (!notification) {
          throw new ValidationError(`Notification ${id} is not in the cache. Run: triage sync`);
        }
        reportFailure(await bus.request({ type: 'mark-viewed', notificationId: id }));

        const isPr = parseSubjectUrl(notification.subject_url)?.kind === 'pull_request';
        const spinner = ora('Loading...');

        if (options.refresh || notification.secondary_loaded === 0) {
          spinner.start('Loading comments...');
          reportFailure(await bus.request({ type: 'fetch-comments', notificationId: id }));
          spinner.stop();
        }
        if (options.pr && isPr && (options.refresh || !db.getPrDetails(id))) {
          spinner.start('Loading pull request...');
          reportFailure(await bus.request({ type: 'fetch-pr-detail', notificationId: id }));
          spinner.stop();
        }

        console.log(boxen(
          `${chalk.bold(notification.subject_title)}\n` +
          `${chalk.cyan(`${notification.repo_owner}/${notification.repo_name}`)} ${chalk.dim(notification.subject_type)}\n` +
          `${chalk.dim('Reason:')} ${notification.reason}  ${chalk.dim('State:')} ${notification.subject_state}` +
          (notification.ci_status ? `  ${chalk.dim('CI:')} ${notification.ci_status}` : '') + '\n' +
          (notification.html_url ? chalk.dim(notification.html_url) : ''),
          { padding: 1, borderStyle: 'round' }
        ));

        const details = options.pr ? db.getPrDetails(id) : null;
        if (details) {
          const labels: unknown = JSON.parse(details.labels_json);
          console.log(chalk.bold(`\n#${details.pr_number} by ${details.author}`) +
            chalk.dim(`  ${details.head_ref ?? '?'} -> ${details.base_ref ?? '?'}`));
          if (Array.isArray(labels) && labels.length > 0) {
            console.log(chalk.dim(`Labels: ${labels.join(', ')}`));
          }
          if (details.body) console.log(`\n${details.body}`);
        }

        const comments = db.getComments(id);
        console.log(chalk.bold(`\nComments (${comments.length})`));
        for (const comment of comments) {
          console.log(`\n${formatComment(comment)}`);
        }

        if (details) {
          const threads = db.getReviewThreads(id);
          console.log(chalk.bold(`\nReview threads (${threads.length})`));
          for (const thread of threads) {
            console.log(`\n${formatThread(thread)}`);
          }
          const files = db.getPrFiles(id);
          console.log(chalk.bold(`\nFiles (${files.length})`));
          for (const file of files) {
            console.log(formatFile(file));
          }
        }
        console.log();
      });
    } catch (error) {
      fail(error);
    }
  });

// ====================
// done
// ====================

program
  .command('done [ref]')
  .description('Mark notifications read on GitHub and remove them locally (ref: owner/repo#number or an id)')
  .option('-r, --reason <reason>', 'Every notification with this reason')
  .action(async (ref: string | undefined, options: { reason?: string }) => {
    const config = loadConfig();
    try {
      await withWorker(config, async ({ bus }, db) => {
        let ids: string[];
        if (options.reason) {
          ids = db.getNotificationIdsByReason(options.reason);
        } else if (ref) {
          const parsed = parseRef(ref);
          ids = parsed
            ? db.getNotificationIdsByRef(parsed.owner, parsed.repo, parsed.number)
            : db.getNotification(ref) ? [ref] : [];
        } else {
          throw new ValidationError('Give a ref (owner/repo#number or id) or --reason');
        }

        if (ids.length === 0) {
          console.log(chalk.yellow('\nNo matching notifications.\n'));
          return;
        }

        const inbox = new InboxView(db, bus);
        const spinner = ora(`Marking ${ids.length} notification(s) done...`).start();
        const requestId = inbox.dismiss(ids);
        const response = await bus.waitFor(requestId);
        const outcome = inbox.applyResponse(response);

        if (response.type === 'mark-done-result') {
          if (outcome === 'confirmed') {
            spinner.succeed(chalk.green(`Marked ${response.notificationIds.length} notification(s) done`));
          } else {
            spinner.warn(chalk.yellow(`Marked ${response.notificationIds.length} of ${ids.length} done`));
            for (const failure of response.errors) {
              console.error(chalk.yellow(`  ${failure.notificationId}: ${failure.error}`));
            }
          }
        } else {
          spinner.fail(chalk.red('Mark done failed'));
          reportFailure(response);
        }
      });
    } catch (error) {
      fail(error);
    }
  });

// ====================
// sql
// ====================

program
  .command('sql <query>')
  .description('Run SQL against the cache (read-only unless --write)')
  .option('--json', 'Output rows as JSON')
  .option('--write', 'Allow statements that modify the cache')
  .action((query: string, options: { json?: boolean; write?: boolean }) => {
    const config = loadConfig();
    try {
      const db = openStore(config, !options.write);
      try {
        const result = db.executeSql(query, { allowWrite: options.write });
        if (!result.columns) {
          console.log(chalk.green('OK'));
          return;
        }
        const columns = result.columns;
        if (options.json) {
          const objects = result.rows.map((row) => Object.fromEntries(columns.map((c, i) => [c, row[i]])));
          console.log(JSON.stringify(objects, null, 2));
          return;
        }
        console.log(chalk.bold(columns.join('\t')));
        for (const row of result.rows) {
          console.log(row.map((v) => (v === null ? chalk.dim('NULL') : String(v))).join('\t'));
        }
        console.log(chalk.dim(`(${result.rows.length} row${result.rows.length === 1 ? '' : 's'})`));
      } finally {
        db.close();
      }
    } catch (error) {
      fail(error);
    }
  });

// ====================
// run
// ====================

program
  .command('run <name> <id>')
  .description('Run a configured command against a notification ({owner}, {repo}, {number} are filled in)')
  .action((name: string, id: string) => {
    const config = loadConfig();
    try {
      const command = config.commands.find((c) => c.name === name);
      if (!command) {
        const known = config.commands.map((c) => c.name).join(', ') || 'none configured';
        throw new ValidationError(`Unknown command '${name}' (available: ${known})`);
      }

      const db = openStore(config, true);
      const notification = db.getNotification(id);
      db.close();
      const ref = parseSubjectUrl(notification?.subject_url);
      if (!ref) {
        throw new ValidationError(`Notification ${id} has no pull request or issue to run against`);
      }

      const expanded = expandCommand(command, ref);
      const [executable, ...args] = expanded.args;
      const background = expanded.mode === 'background';
      const child = spawn(executable, args, {
        cwd: expanded.cwd,
        env: { ...process.env, ...expanded.env },
        stdio: background ? 'ignore' : 'inherit',
        detached: background,
      });
      child.on('error', (error) => fail(error));
      if (background) {
        child.unref();
        console.log(chalk.dim(`Started '${name}' in the background`));
      } else {
        child.on('exit', (code) => {
          process.exitCode = code ?? 1;
        });
      }
    } catch (error) {
      fail(error);
    }
  });

// ====================
// config
// ====================

const configCommand = program.command('config').description('Show or change settings in config.json');

configCommand
  .command('show', { isDefault: true })
  .description('Print the resolved configuration')
  .action(() => {
    try {
      console.log(chalk.dim(getConfigPath()));
      console.log(JSON.stringify(loadConfig(), null, 2));
    } catch (error) {
      fail(error);
    }
  });

configCommand
  .command('set <key> [value]')
  .description(`Set a setting, or remove it when no value is given (${SETTABLE_KEYS.join(', ')})`)
  .action((key: string, value: string | undefined) => {
    try {
      setConfigValue(key, value);
      console.log(chalk.green(value === undefined ? `Removed ${key}` : `Set ${key}`));
    } catch (error) {
      fail(error);
    }
  });

void program.parseAsync(process.argv).catch(fail);
