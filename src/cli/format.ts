/**
 * Terminal formatting for the triage CLI
 */

import chalk from 'chalk';
import type { Comment, Notification, PriorityTier, PrFile, ReviewThread, SyncResult } from '../types/index.js';

const TIER_LABELS: Record<PriorityTier, string> = {
  blocking: 'BLOCK',
  action: 'ACT',
  fyi: 'FYI',
};

export function tierBadge(tier: PriorityTier): string {
  const label = TIER_LABELS[tier].padEnd(5);
  switch (tier) {
    case 'blocking':
      return chalk.red.bold(label);
    case 'action':
      return chalk.yellow(label);
    case 'fyi':
      return chalk.dim(label);
  }
}

export function truncate(text: string, width: number): string {
  if (text.length <= width) return text;
  return `${text.slice(0, Math.max(0, width - 3))}...`;
}

/**
 * One list line: tier, score, repo, title, reason, id
 */
export function formatNotificationLine(notification: Notification): string {
  const repo = `${notification.repo_owner}/${notification.repo_name}`;
  const state = notification.subject_state !== 'unknown' ? chalk.dim(` [${notification.subject_state}]`) : '';
  const ci = notification.ci_status ? chalk.dim(` ci:${notification.ci_status}`) : '';
  return (
    `${tierBadge(notification.priority_tier)} ${String(notification.priority_score).padStart(4)}  ` +
    `${chalk.cyan(truncate(repo, 30))}  ${truncate(notification.subject_title, 60)}${state}${ci}  ` +
    `${chalk.dim(notification.reason)} ${chalk.dim(`#${notification.notification_id}`)}`
  );
}

/**
 * Human wait time until a reset, e.g. "4m 10s"
 */
export function formatWait(resetAt: Date | null, now: Date = new Date()): string {
  if (!resetAt) return 'unknown';
  const seconds = Math.max(0, Math.ceil((resetAt.getTime() - now.getTime()) / 1000));
  const minutes = Math.floor(seconds / 60);
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds % 60}s`;
}

export function formatSyncSummary(result: SyncResult, now: Date = new Date()): string {
  const lines = [
    `${chalk.cyan('New:')}     ${result.new}`,
    `${chalk.cyan('Updated:')} ${result.updated}`,
    `${chalk.cyan('Purged:')}  ${result.purged}`,
    `${chalk.cyan('Total:')}   ${result.total}`,
  ];
  if (result.preloaded > 0) {
    lines.push(`${chalk.dim('Preloaded comments for')} ${result.preloaded}`);
  }
  if (result.enrichFailures > 0) {
    lines.push(chalk.yellow(`${result.enrichFailures} subject(s) could not be resolved`));
  }
  if (result.skipped > 0) {
    lines.push(chalk.yellow(`${result.skipped} malformed notification(s) skipped`));
  }
  if (result.listError) {
    lines.push(chalk.yellow(`Listing stopped early: ${result.listError}`));
  }
  if (result.rateLimit) {
    lines.push(
      chalk.yellow(
        `Rate limited during ${result.rateLimit.stage}; resets in ${formatWait(result.rateLimit.resetAt, now)}`
      )
    );
  }
  return lines.join('\n');
}

export function formatComment(comment: Comment): string {
  return `${chalk.bold(comment.author)} ${chalk.dim(comment.created_at)}\n${comment.body}`;
}

export function formatThread(thread: ReviewThread): string {
  const location = thread.path ? `${thread.path}${thread.line !== null ? `:${thread.line}` : ''}` : '(general)';
  const status = thread.is_resolved ? chalk.green('resolved') : chalk.yellow('open');
  const header = `${chalk.cyan(location)} ${status} ${chalk.dim(thread.thread_id)}`;
  const body = thread.comments
    .map((c) => `  ${chalk.bold(c.author)} ${chalk.dim(`(${c.comment_id})`)}: ${c.body}`)
    .join('\n');
  return `${header}\n${body}`;
}

export function formatFile(file: PrFile): string {
  const counts = `${chalk.green(`+${file.additions}`)} ${chalk.red(`-${file.deletions}`)}`;
  const binary = file.patch === null ? chalk.dim(' (no diff)') : '';
  return `${file.status.padEnd(9)} ${file.filename} ${counts}${binary}`;
}
