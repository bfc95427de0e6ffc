/**
 * Shared fixtures: notification rows, raw payloads and an in-process fetch stand-in
 */

import { DatabaseManager } from '../src/database/index.js';
import { GitHubClient, type FetchLike } from '../src/github/client.js';
import type { JsonObject, NotificationUpsert } from '../src/types/index.js';

export const API = 'https://api.github.test';
export const GRAPHQL = `${API}/graphql`;

export function memoryDb(): DatabaseManager {
  return new DatabaseManager({ memory: true });
}

export function makeRow(overrides: Partial<NotificationUpsert> = {}): NotificationUpsert {
  const id = overrides.notification_id ?? '1';
  return {
    notification_id: id,
    repo_owner: 'acme',
    repo_name: 'widgets',
    subject_type: 'PullRequest',
    subject_title: `Subject ${id}`,
    subject_url: `${API}/repos/acme/widgets/pulls/${id}`,
    html_url: `https://github.test/acme/widgets/pull/${id}`,
    reason: 'subscribed',
    updated_at: '2024-01-01T00:00:00Z',
    unread: 1,
    priority_score: 100,
    priority_tier: 'fyi',
    raw_json: '{}',
    ci_status: null,
    subject_state: 'unknown',
    is_own: 0,
    ...overrides,
  };
}

export interface RawNotificationInput {
  id: string;
  reason?: string;
  updatedAt?: string;
  type?: string;
  url?: string | null;
  owner?: string;
  repo?: string;
  title?: string;
}

export function rawNotification(input: RawNotificationInput): JsonObject {
  const owner = input.owner ?? 'acme';
  const repo = input.repo ?? 'widgets';
  const type = input.type ?? 'PullRequest';
  const defaultUrl = `${API}/repos/${owner}/${repo}/${type === 'Issue' ? 'issues' : 'pulls'}/${input.id}`;
  return {
    id: input.id,
    unread: true,
    reason: input.reason ?? 'subscribed',
    updated_at: input.updatedAt ?? '2024-01-01T00:00:00Z',
    subject: {
      title: input.title ?? `Subject ${input.id}`,
      url: input.url === undefined ? defaultUrl : input.url,
      type,
    },
    repository: { name: repo, owner: { login: owner } },
  };
}

// ====================
// Fake fetch
// ====================

export interface FakeReply {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface RecordedCall {
  url: string;
  method: string;
  body: unknown;
  headers: Record<string, string>;
}

export type FakeHandler = (call: RecordedCall) => FakeReply | Promise<FakeReply>;

function headersOf(init: RequestInit | undefined): Record<string, string> {
  const headers = init?.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) return {};
  return { ...headers };
}

/**
 * fetch stand-in that records every call and answers from a handler
 */
export function fakeFetch(handler: FakeHandler): { fetch: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetch: FetchLike = async (input, init) => {
    const rawBody = init?.body;
    const call: RecordedCall = {
      url: input,
      method: init?.method ?? 'GET',
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : null,
      headers: headersOf(init),
    };
    calls.push(call);
    const reply = await handler(call);
    const status = reply.status ?? 200;
    const text = reply.body === undefined ? '' : JSON.stringify(reply.body);
    return new Response(status === 204 || status === 205 ? null : text, {
      status,
      headers: { 'content-type': 'application/json', ...reply.headers },
    });
  };
  return { fetch, calls };
}

export function testClient(fetch: FetchLike, overrides: { graphqlBatchSize?: number } = {}): GitHubClient {
  return new GitHubClient({
    token: 'test-secret',
    apiBaseUrl: API,
    fetch,
    ...overrides,
  });
}

/**
 * Query text of a GraphQL call, or '' for REST calls
 */
export function graphqlQuery(call: RecordedCall): string {
  const body = call.body;
  if (typeof body === 'object' && body !== null && 'query' in body && typeof body.query === 'string') {
    return body.query;
  }
  return '';
}
