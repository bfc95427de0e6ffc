/**
 * GitHub API client
 * REST for notifications, comments, files and writes; GraphQL for batched
 * subject lookups, PR metadata and review threads.
 */

import {
  AuthError,
  PartialFetchError,
  RateLimitedError,
  RemoteMutationError,
  RemoteRequestError,
  TriageError,
  errorMessage,
  type CommentInput,
  type GitHubNotification,
  type ListPage,
  type PrDetailsInput,
  type PrFileInput,
  type PrReviewInput,
  type RateLimitInfo,
  type Result,
  type ReviewCommentInput,
  type ReviewEvent,
  type SubjectDetails,
  type SubjectRef,
} from '../types/index.js';
import {
  DEFAULT_API_BASE_URL,
  GRAPHQL_BATCH_SIZE,
  GRAPHQL_MAX_NODES,
  RATE_LIMIT_WARNING_THRESHOLD,
  REQUEST_TIMEOUT_MS,
} from '../utils/constants.js';
import { log } from '../logger.js';
import { parseArray, parseComment, parseNotificationList, parsePrFile, stringAt, numberAt } from './payloads.js';
import {
  PR_METADATA_QUERY,
  RESOLVE_THREAD_MUTATION,
  REVIEW_THREADS_QUERY,
  UNRESOLVE_THREAD_MUTATION,
  buildSubjectDetailsQuery,
  parseGraphQLErrors,
  parsePrMetadataResponse,
  parseReviewThreadsResponse,
  parseSubjectDetailsResponse,
} from './graphql.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type PullRequestRef = Pick<SubjectRef, 'owner' | 'repo' | 'number'>;

export interface GitHubClientOptions {
  /** Fixed token; skips the provider */
  token?: string;
  /** Called once, on authenticate() or the first request */
  tokenProvider?: () => Promise<string>;
  apiBaseUrl?: string;
  graphqlUrl?: string;
  graphqlBatchSize?: number;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
}

export interface SubjectDetailsBatch {
  results: Map<string, Result<SubjectDetails, PartialFetchError>>;
  viewerLogin: string | null;
  /** Set when the budget ran out part way; ids without a result were never queried */
  rateLimited: RateLimitedError | null;
}

interface RequestOptions {
  method?: string;
  body?: unknown;
}

interface ApiResponse {
  data: unknown;
  headers: Headers;
  rateLimit: RateLimitInfo;
}

/**
 * Extract the rel="next" URL from a Link header
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  const match = /<([^>]+)>;\s*rel="next"/.exec(header);
  return match ? match[1] : null;
}

function readRateLimit(headers: Headers): RateLimitInfo {
  const remaining = headers.get('x-ratelimit-remaining');
  const reset = headers.get('x-ratelimit-reset');
  return {
    remaining: remaining !== null && remaining !== '' ? parseInt(remaining, 10) : null,
    resetAt: reset ? new Date(parseInt(reset, 10) * 1000) : null,
  };
}

export class GitHubClient {
  private token: string | null;
  private readonly tokenProvider: (() => Promise<string>) | null;
  private readonly apiBaseUrl: string;
  private readonly graphqlUrl: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: GitHubClientOptions = {}) {
    this.token = options.token ?? null;
    this.tokenProvider = options.tokenProvider ?? null;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.graphqlUrl = options.graphqlUrl ?? `${this.apiBaseUrl}/graphql`;
    this.batchSize = Math.min(options.graphqlBatchSize ?? GRAPHQL_BATCH_SIZE, GRAPHQL_MAX_NODES);
    this.timeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Resolve the bearer token. Throws AuthError before any network call when none is usable.
   */
  async authenticate(): Promise<void> {
    await this.getToken();
  }

  private async getToken(): Promise<string> {
    if (this.token) return this.token;
    if (!this.tokenProvider) {
      throw new AuthError('No GitHub token available. Set GITHUB_TOKEN or run: gh auth login');
    }
    this.token = await this.tokenProvider();
    return this.token;
  }

  // ====================
  // Transport
  // ====================

  private async makeRequest(url: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const method = options.method ?? 'GET';
    const token = await this.getToken();

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${token}`,
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RemoteRequestError(`${method} ${url} failed: ${errorMessage(error)}`, 0, url);
    }

    const text = await response.text();
    const rateLimit = readRateLimit(response.headers);
    this.checkRateLimit(response, text, rateLimit);

    if (!response.ok) {
      let message = `${response.status} ${response.statusText}`.trim();
      const parsedMessage = text ? stringAt(safeJson(text), 'message') : null;
      if (parsedMessage) message = `${message}: ${parsedMessage}`;
      throw new RemoteRequestError(`GitHub API ${method} ${url} returned ${message}`, response.status, url);
    }

    return { data: text ? safeJson(text) : null, headers: response.headers, rateLimit };
  }

  private checkRateLimit(response: Response, text: string, rateLimit: RateLimitInfo): void {
    if (rateLimit.remaining !== null && rateLimit.remaining < RATE_LIMIT_WARNING_THRESHOLD) {
      log.github.warn({ remaining: rateLimit.remaining }, 'GitHub API rate limit low');
    }

    if (response.status !== 403 && response.status !== 429) return;

    const retryAfterHeader = response.headers.get('retry-after');
    const exhausted =
      rateLimit.remaining === 0 || retryAfterHeader !== null || text.toLowerCase().includes('rate limit');
    if (!exhausted) return;

    let retryAfterSeconds: number | null = retryAfterHeader ? parseInt(retryAfterHeader, 10) : null;
    let resetAt = rateLimit.resetAt;
    if (retryAfterSeconds !== null && !Number.isNaN(retryAfterSeconds)) {
      resetAt = new Date(Date.now() + retryAfterSeconds * 1000);
    } else if (resetAt) {
      retryAfterSeconds = Math.max(0, Math.ceil((resetAt.getTime() - Date.now()) / 1000));
    } else {
      retryAfterSeconds = null;
    }

    throw new RateLimitedError('GitHub API rate limit exceeded', resetAt, retryAfterSeconds, {
      status: response.status,
    });
  }

  private async graphql(query: string, variables?: Record<string, unknown>): Promise<unknown> {
    const { data } = await this.makeRequest(this.graphqlUrl, {
      method: 'POST',
      body: variables ? { query, variables } : { query },
    });
    const errors = parseGraphQLErrors(data);
    if (errors.length > 0) {
      log.github.warn({ errors: errors.map((e) => e.message) }, 'GraphQL errors');
    }
    return data;
  }

  /**
   * Follow Link rel="next" until exhausted
   */
  private async *paginate(firstUrl: string): AsyncGenerator<ApiResponse> {
    let next: string | null = firstUrl;
    while (next) {
      const response = await this.makeRequest(next);
      yield response;
      next = parseNextLink(response.headers.get('link'));
    }
  }

  private repoUrl(ref: PullRequestRef, suffix: string): string {
    return `${this.apiBaseUrl}/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.repo)}${suffix}`;
  }

  // ====================
  // Notifications
  // ====================

  /**
   * Notification pages updated since the given timestamp (all when absent)
   */
  async *listNotificationPages(since?: string | null): AsyncGenerator<ListPage> {
    const params = new URLSearchParams({ per_page: '50' });
    if (since) params.set('since', since);

    for await (const page of this.paginate(`${this.apiBaseUrl}/notifications?${params.toString()}`)) {
      const notifications: GitHubNotification[] = [];
      let skipped = 0;
      for (const result of parseNotificationList(page.data)) {
        if (result.ok) {
          notifications.push(result.value);
        } else {
          skipped++;
          log.github.warn({ error: result.error.message }, 'skipping malformed notification');
        }
      }
      yield { notifications, skipped, rateLimit: page.rateLimit };
    }
  }

  async markAsRead(threadId: string): Promise<void> {
    try {
      await this.makeRequest(`${this.apiBaseUrl}/notifications/threads/${encodeURIComponent(threadId)}`, {
        method: 'PATCH',
      });
    } catch (error) {
      throw toMutationError(error, 'Failed to mark notification as read', { threadId });
    }
  }

  // ====================
  // Subject details (batched)
  // ====================

  /**
   * Resolve (state, checks) for each subject, one GraphQL request per chunk of
   * graphqlBatchSize nodes, sequentially. A failed node or chunk only affects its own ids.
   */
  async fetchSubjectDetails(subjects: Map<string, SubjectRef>): Promise<SubjectDetailsBatch> {
    const results = new Map<string, Result<SubjectDetails, PartialFetchError>>();
    let viewerLogin: string | null = null;
    const entries = [...subjects.entries()];

    for (let start = 0; start < entries.length; start += this.batchSize) {
      const chunk = new Map(entries.slice(start, start + this.batchSize));
      const { query, aliases, rejected } = buildSubjectDetailsQuery(chunk);
      for (const [id, error] of rejected) {
        results.set(id, { ok: false, error });
      }
      if (aliases.size === 0) continue;

      let body: unknown;
      try {
        body = await this.graphql(query);
      } catch (error) {
        if (error instanceof RateLimitedError) {
          return { results, viewerLogin, rateLimited: error };
        }
        if (error instanceof AuthError) throw error;
        // Whole chunk failed; record it per id and move on
        log.github.warn({ error: errorMessage(error), size: aliases.size }, 'subject details batch failed');
        for (const id of aliases.values()) {
          results.set(id, { ok: false, error: new PartialFetchError(errorMessage(error), id) });
        }
        continue;
      }

      const parsed = parseSubjectDetailsResponse(body, aliases);
      viewerLogin = viewerLogin ?? parsed.viewerLogin;
      for (const [id, result] of parsed.results) {
        results.set(id, result);
      }
    }

    return { results, viewerLogin, rateLimited: null };
  }

  // ====================
  // Secondary data
  // ====================

  async fetchComments(commentsUrl: string): Promise<CommentInput[]> {
    const separator = commentsUrl.includes('?') ? '&' : '?';
    const comments: CommentInput[] = [];
    for await (const page of this.paginate(`${commentsUrl}${separator}per_page=100`)) {
      comments.push(...parseArray(page.data, parseComment, 'Comments'));
    }
    return comments;
  }

  async fetchPrMetadata(ref: PullRequestRef): Promise<PrDetailsInput> {
    const body = await this.graphql(PR_METADATA_QUERY, { owner: ref.owner, repo: ref.repo, number: ref.number });
    return parsePrMetadataResponse(body);
  }

  /**
   * All review thread comments (cursor pagination) plus the PR's reviews
   */
  async fetchReviewThreads(
    ref: PullRequestRef
  ): Promise<{ reviewComments: ReviewCommentInput[]; reviews: PrReviewInput[] }> {
    const reviewComments: ReviewCommentInput[] = [];
    let reviews: PrReviewInput[] | null = null;
    let cursor: string | null = null;

    do {
      const variables: Record<string, unknown> = { owner: ref.owner, repo: ref.repo, number: ref.number };
      if (cursor) variables.threadsCursor = cursor;

      const page = parseReviewThreadsResponse(await this.graphql(REVIEW_THREADS_QUERY, variables));
      reviewComments.push(...page.comments);
      // Reviews are not paged by the threads cursor; the first page has them
      reviews = reviews ?? page.reviews;
      cursor = page.hasNextPage ? page.endCursor : null;
    } while (cursor);

    return { reviewComments, reviews: reviews ?? [] };
  }

  async fetchPrFiles(ref: PullRequestRef): Promise<PrFileInput[]> {
    const files: PrFileInput[] = [];
    for await (const page of this.paginate(this.repoUrl(ref, `/pulls/${ref.number}/files?per_page=100`))) {
      files.push(...parseArray(page.data, parsePrFile, 'Files'));
    }
    return files;
  }

  // ====================
  // Mutations
  // ====================

  /**
   * Reply to a review comment; returns the new comment's id
   */
  async postReviewReply(ref: PullRequestRef, commentId: number, body: string): Promise<string> {
    try {
      const { data } = await this.makeRequest(this.repoUrl(ref, `/pulls/${ref.number}/comments/${commentId}/replies`), {
        method: 'POST',
        body: { body },
      });
      const id = numberAt(data, 'id');
      return id !== null ? String(id) : '';
    } catch (error) {
      throw toMutationError(error, 'Failed to post review reply', { commentId });
    }
  }

  async submitReview(ref: PullRequestRef, event: ReviewEvent, body?: string): Promise<void> {
    const payload: Record<string, string> = { event };
    if (body) payload.body = body;
    try {
      await this.makeRequest(this.repoUrl(ref, `/pulls/${ref.number}/reviews`), { method: 'POST', body: payload });
    } catch (error) {
      throw toMutationError(error, 'Failed to submit review', { event });
    }
  }

  async resolveReviewThread(threadId: string): Promise<void> {
    await this.threadMutation(RESOLVE_THREAD_MUTATION, threadId, 'resolve');
  }

  async unresolveReviewThread(threadId: string): Promise<void> {
    await this.threadMutation(UNRESOLVE_THREAD_MUTATION, threadId, 'unresolve');
  }

  private async threadMutation(mutation: string, threadId: string, action: string): Promise<void> {
    let body: unknown;
    try {
      body = await this.graphql(mutation, { threadId });
    } catch (error) {
      throw toMutationError(error, `Failed to ${action} review thread`, { threadId });
    }
    const [first] = parseGraphQLErrors(body);
    if (first) {
      throw new RemoteMutationError(`Failed to ${action} review thread: ${first.message}`, { threadId });
    }
  }
}

function safeJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

/**
 * Rate limits and auth failures keep their identity; anything else becomes a mutation error
 */
function toMutationError(error: unknown, message: string, details: Record<string, unknown>): TriageError {
  if (error instanceof RateLimitedError || error instanceof AuthError || error instanceof RemoteMutationError) {
    return error;
  }
  return new RemoteMutationError(`${message}: ${errorMessage(error)}`, details);
}
