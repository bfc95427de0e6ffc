// ====================
// GitHub Payload Types
// ====================
// Typed projections of the upstream JSON. The raw payload is always kept
// alongside so new fields can be extracted later without re-fetching.

import type { CiStatus, NotificationReason, SubjectState, SubjectType } from './notifications.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Subject reference parsed from an API URL, tagged by subject kind
 */
export type SubjectRef =
  | { kind: 'pull_request'; owner: string; repo: string; number: number }
  | { kind: 'issue'; owner: string; repo: string; number: number };

export interface GitHubNotification {
  id: string;
  repoOwner: string;
  repoName: string;
  subjectType: SubjectType;
  upstreamSubjectType: string;
  subjectTitle: string;
  subjectUrl: string | null;
  reason: NotificationReason;
  updatedAt: string;
  unread: boolean;
  raw: JsonObject;
}

export interface GitHubComment {
  id: string;
  author: string;
  body: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * (state, checks) resolved for one subject by the batched lookup
 */
export interface SubjectDetails {
  state: SubjectState;
  ciStatus: CiStatus | null;
  author: string | null;
}

export interface RateLimitInfo {
  remaining: number | null;
  resetAt: Date | null;
}

export interface ListPage {
  notifications: GitHubNotification[];
  /** Malformed entries left out of notifications */
  skipped: number;
  rateLimit: RateLimitInfo;
}
