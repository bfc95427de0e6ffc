/**
 * Ingestion boundary for REST payloads
 *
 * Upstream JSON is untyped; everything past this module works with typed
 * projections. The raw notification object is kept verbatim next to them.
 */

import {
  ValidationError,
  err,
  ok,
  type CommentInput,
  type GitHubNotification,
  type JsonObject,
  type PrFileInput,
  type Result,
  type SubjectType,
} from '../types/index.js';

export const DELETED_USER = '[deleted]';

// ====================
// Narrowing helpers
// ====================

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk nested objects; any missing step yields undefined
 */
export function pathOf(value: unknown, ...keys: string[]): unknown {
  let current: unknown = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function arrayAt(value: unknown, ...keys: string[]): unknown[] {
  const found = pathOf(value, ...keys);
  return Array.isArray(found) ? found : [];
}

export function stringAt(value: unknown, ...keys: string[]): string | null {
  const found = pathOf(value, ...keys);
  return typeof found === 'string' ? found : null;
}

export function numberAt(value: unknown, ...keys: string[]): number | null {
  const found = pathOf(value, ...keys);
  return typeof found === 'number' ? found : null;
}

function requireString(obj: JsonObject, key: string, context: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${context}: field '${key}' must be a string`, { key });
  }
  return value;
}

/**
 * GitHub ids arrive as strings on some endpoints and numbers on others
 */
function requireId(obj: JsonObject, key: string, context: string): string {
  const value = obj[key];
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  throw new ValidationError(`${context}: field '${key}' must be an id`, { key });
}

function loginOf(value: unknown): string {
  return stringAt(value, 'login') ?? DELETED_USER;
}

// ====================
// Notifications
// ====================

function toSubjectType(upstream: string): SubjectType {
  return upstream === 'PullRequest' || upstream === 'Issue' ? upstream : 'Other';
}

export function parseNotification(raw: unknown): GitHubNotification {
  if (!isRecord(raw)) {
    throw new ValidationError('Notification payload must be an object');
  }
  const id = requireId(raw, 'id', 'notification');
  const context = `notification ${id}`;

  const repository = raw.repository;
  const subject = raw.subject;
  if (!isRecord(repository) || !isRecord(subject)) {
    throw new ValidationError(`${context}: missing repository or subject`, { id });
  }

  const owner = stringAt(repository, 'owner', 'login');
  const name = requireString(repository, 'name', context);
  if (!owner) {
    throw new ValidationError(`${context}: repository owner missing`, { id });
  }

  const upstreamSubjectType = requireString(subject, 'type', context);
  const subjectUrl = subject.url;

  return {
    id,
    repoOwner: owner,
    repoName: name,
    subjectType: toSubjectType(upstreamSubjectType),
    upstreamSubjectType,
    subjectTitle: requireString(subject, 'title', context),
    subjectUrl: typeof subjectUrl === 'string' ? subjectUrl : null,
    reason: requireString(raw, 'reason', context),
    updatedAt: requireString(raw, 'updated_at', context),
    // Absent means unread
    unread: raw.unread !== false,
    raw,
  };
}

/**
 * Parse a page of notifications. Each element stands alone: a malformed one
 * becomes an error entry and the rest of the page still parses.
 */
export function parseNotificationList(body: unknown): Array<Result<GitHubNotification, ValidationError>> {
  if (!Array.isArray(body)) {
    throw new ValidationError('Notification list response must be an array');
  }
  return body.map((raw) => {
    try {
      return ok(parseNotification(raw));
    } catch (error) {
      if (error instanceof ValidationError) return err(error);
      throw error;
    }
  });
}

// ====================
// Comments & files
// ====================

export function parseComment(raw: unknown): CommentInput {
  if (!isRecord(raw)) {
    throw new ValidationError('Comment payload must be an object');
  }
  const commentId = requireId(raw, 'id', 'comment');
  const context = `comment ${commentId}`;
  const createdAt = requireString(raw, 'created_at', context);
  return {
    comment_id: commentId,
    author: loginOf(raw.user),
    body: typeof raw.body === 'string' ? raw.body : '',
    created_at: createdAt,
    updated_at: stringAt(raw, 'updated_at') ?? createdAt,
  };
}

export function parsePrFile(raw: unknown): PrFileInput {
  if (!isRecord(raw)) {
    throw new ValidationError('File payload must be an object');
  }
  const filename = requireString(raw, 'filename', 'file');
  const patch = raw.patch;
  return {
    filename,
    status: requireString(raw, 'status', `file ${filename}`),
    additions: numberAt(raw, 'additions') ?? 0,
    deletions: numberAt(raw, 'deletions') ?? 0,
    // Absent for binary and oversized diffs
    patch: typeof patch === 'string' ? patch : null,
  };
}

export function parseArray<T>(body: unknown, parse: (raw: unknown) => T, what: string): T[] {
  if (!Array.isArray(body)) {
    throw new ValidationError(`${what} response must be an array`);
  }
  return body.map(parse);
}
