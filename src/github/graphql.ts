/**
 * GraphQL queries and response parsers
 *
 * Subject details for many notifications are fetched in one query: subjects are
 * grouped per repository and each node gets an alias that maps back to its
 * notification id. Owner and repo names are interpolated into the query text,
 * so they are validated first.
 */

import {
  PartialFetchError,
  ValidationError,
  err,
  ok,
  type CiStatus,
  type DiffSide,
  type PrDetailsInput,
  type PrReviewInput,
  type Result,
  type ReviewCommentInput,
  type SubjectDetails,
  type SubjectRef,
  type SubjectState,
} from '../types/index.js';
import { DELETED_USER, arrayAt, isRecord, numberAt, pathOf, stringAt } from './payloads.js';

// ====================
// Subject details batch
// ====================

const PR_FRAGMENT = `fragment PrDetails on PullRequest {
  state
  merged
  author { login }
  commits(last: 1) { nodes { commit { statusCheckRollup { state } } } }
}`;

const ISSUE_FRAGMENT = `fragment IssueDetails on Issue {
  state
  author { login }
}`;

const GRAPHQL_IDENTIFIER_RE = /^[a-zA-Z0-9._-]+$/;
const ALIAS_SAFE_RE = /^\w+$/;

export function validateIdentifier(value: string): string {
  if (!GRAPHQL_IDENTIFIER_RE.test(value)) {
    throw new ValidationError(`Invalid GraphQL identifier: ${JSON.stringify(value)}`, { value });
  }
  return value;
}

export interface SubjectDetailsQuery {
  query: string;
  /** GraphQL alias -> notification id */
  aliases: Map<string, string>;
  /** Subjects left out because their owner or repo cannot go into a query */
  rejected: Map<string, PartialFetchError>;
}

/**
 * Build one query covering every subject given. Callers chunk to the node cap.
 * A repository whose name fails validation is left out; its ids land in rejected.
 */
export function buildSubjectDetailsQuery(subjects: Map<string, SubjectRef>): SubjectDetailsQuery {
  const byRepo = new Map<string, Array<[string, SubjectRef]>>();
  for (const [id, ref] of subjects) {
    const key = `${ref.owner}/${ref.repo}`;
    const group = byRepo.get(key);
    if (group) {
      group.push([id, ref]);
    } else {
      byRepo.set(key, [[id, ref]]);
    }
  }

  const aliases = new Map<string, string>();
  const rejected = new Map<string, PartialFetchError>();
  const repoBlocks: string[] = [];
  let hasPr = false;
  let hasIssue = false;
  let nodeIndex = 0;
  let repoIndex = 0;

  for (const group of byRepo.values()) {
    const { owner, repo } = group[0][1];
    try {
      validateIdentifier(owner);
      validateIdentifier(repo);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      for (const [id] of group) {
        rejected.set(id, new PartialFetchError(error.message, id, { owner, repo }));
      }
      continue;
    }

    const nodes: string[] = [];
    for (const [id, ref] of group) {
      const suffix = ALIAS_SAFE_RE.test(id) ? id : `n${nodeIndex}`;
      nodeIndex++;
      if (ref.kind === 'pull_request') {
        const alias = `pr_${suffix}`;
        nodes.push(`    ${alias}: pullRequest(number: ${ref.number}) { ...PrDetails }`);
        aliases.set(alias, id);
        hasPr = true;
      } else {
        const alias = `issue_${suffix}`;
        nodes.push(`    ${alias}: issue(number: ${ref.number}) { ...IssueDetails }`);
        aliases.set(alias, id);
        hasIssue = true;
      }
    }

    repoBlocks.push(`  r${repoIndex}: repository(owner: "${owner}", name: "${repo}") {\n${nodes.join('\n')}\n  }`);
    repoIndex++;
  }

  const parts: string[] = [];
  if (hasPr) parts.push(PR_FRAGMENT);
  if (hasIssue) parts.push(ISSUE_FRAGMENT);
  parts.push(`query {\n  viewer { login }\n${repoBlocks.join('\n')}\n}`);

  return { query: parts.join('\n'), aliases, rejected };
}

function parsePrNode(node: unknown): SubjectDetails {
  const state = (stringAt(node, 'state') ?? '').toUpperCase();
  let subjectState: SubjectState = 'unknown';
  if (pathOf(node, 'merged') === true) {
    subjectState = 'merged';
  } else if (state === 'OPEN') {
    subjectState = 'open';
  } else if (state === 'CLOSED') {
    subjectState = 'closed';
  }

  let ciStatus: CiStatus | null = null;
  const [lastCommit] = arrayAt(node, 'commits', 'nodes');
  const rollup = (stringAt(lastCommit, 'commit', 'statusCheckRollup', 'state') ?? '').toLowerCase();
  if (rollup === 'success' || rollup === 'failure' || rollup === 'pending' || rollup === 'error') {
    ciStatus = rollup;
  }

  return { state: subjectState, ciStatus, author: stringAt(node, 'author', 'login') };
}

function parseIssueNode(node: unknown): SubjectDetails {
  const state = (stringAt(node, 'state') ?? '').toUpperCase();
  const subjectState: SubjectState = state === 'OPEN' ? 'open' : state === 'CLOSED' ? 'closed' : 'unknown';
  return { state: subjectState, ciStatus: null, author: stringAt(node, 'author', 'login') };
}

export interface GraphQLErrorEntry {
  message: string;
  path: string[];
}

export function parseGraphQLErrors(body: unknown): GraphQLErrorEntry[] {
  return arrayAt(body, 'errors').map((entry) => ({
    message: stringAt(entry, 'message') ?? 'Unknown GraphQL error',
    path: arrayAt(entry, 'path').map(String),
  }));
}

export interface SubjectDetailsParse {
  results: Map<string, Result<SubjectDetails, PartialFetchError>>;
  viewerLogin: string | null;
}

/**
 * Map a batch response back to notification ids. Every aliased id gets an entry:
 * a null or missing node becomes a PartialFetchError for that id alone.
 */
export function parseSubjectDetailsResponse(body: unknown, aliases: Map<string, string>): SubjectDetailsParse {
  const results = new Map<string, Result<SubjectDetails, PartialFetchError>>();

  const nodeErrors = new Map<string, string>();
  for (const error of parseGraphQLErrors(body)) {
    const alias = error.path[1];
    if (alias) nodeErrors.set(alias, error.message);
  }

  const data = pathOf(body, 'data');
  if (isRecord(data)) {
    for (const repoData of Object.values(data)) {
      if (!isRecord(repoData)) continue;
      for (const [alias, node] of Object.entries(repoData)) {
        const id = aliases.get(alias);
        if (id === undefined) continue;
        if (!isRecord(node)) {
          const message = nodeErrors.get(alias) ?? 'Subject not found or not accessible';
          results.set(id, err(new PartialFetchError(message, id, { alias })));
        } else if (alias.startsWith('pr_')) {
          results.set(id, ok(parsePrNode(node)));
        } else {
          results.set(id, ok(parseIssueNode(node)));
        }
      }
    }
  }

  for (const [alias, id] of aliases) {
    if (!results.has(id)) {
      const message = nodeErrors.get(alias) ?? 'Subject missing from response';
      results.set(id, err(new PartialFetchError(message, id, { alias })));
    }
  }

  return { results, viewerLogin: stringAt(body, 'data', 'viewer', 'login') };
}

// ====================
// Pull request detail
// ====================

export const PR_METADATA_QUERY = `query($owner: String!, $repo: String!, $number: Int!) {
  repository(owner: $owner, name: $repo) {
    pullRequest(number: $number) {
      number
      author { login }
      body
      labels(first: 50) { nodes { name } }
      baseRefName
      headRefName
    }
  }
}`;

export const REVIEW_THREADS_QUERY = `query($owner: String!, $repo: String!, $number: Int!, $threadsCursor: String) {
  repository(owner: $owner, name: $repo) {
    pullRequest(number: $number) {
      reviewThreads(first: 100, after: $threadsCursor) {
        pageInfo { hasNextPage endCursor }
        nodes {
          id
          isResolved
          path
          line
          diffSide
          comments(first: 100) {
            nodes {
              id
              databaseId
              author { login }
              body
              path
              diffHunk
              line
              createdAt
              updatedAt
              pullRequestReview { id }
              replyTo { databaseId }
            }
          }
        }
      }
      reviews(first: 100) {
        nodes {
          id
          author { login }
          state
          body
          submittedAt
        }
      }
    }
  }
}`;

export const RESOLVE_THREAD_MUTATION = `mutation($threadId: ID!) {
  resolveReviewThread(input: {threadId: $threadId}) {
    thread { id isResolved }
  }
}`;

export const UNRESOLVE_THREAD_MUTATION = `mutation($threadId: ID!) {
  unresolveReviewThread(input: {threadId: $threadId}) {
    thread { id isResolved }
  }
}`;

function requirePullRequest(body: unknown): unknown {
  const pr = pathOf(body, 'data', 'repository', 'pullRequest');
  if (!isRecord(pr)) {
    const [first] = parseGraphQLErrors(body);
    throw new ValidationError(first?.message ?? 'Pull request not found in response');
  }
  return pr;
}

export function parsePrMetadataResponse(body: unknown): PrDetailsInput {
  const pr = requirePullRequest(body);
  const number = numberAt(pr, 'number');
  if (number === null) {
    throw new ValidationError('Pull request metadata is missing its number');
  }
  const labels = arrayAt(pr, 'labels', 'nodes')
    .map((label) => stringAt(label, 'name'))
    .filter((name): name is string => name !== null);

  return {
    pr_number: number,
    author: stringAt(pr, 'author', 'login') ?? DELETED_USER,
    body: stringAt(pr, 'body'),
    labels_json: JSON.stringify(labels),
    base_ref: stringAt(pr, 'baseRefName'),
    head_ref: stringAt(pr, 'headRefName'),
  };
}

export interface ReviewThreadsPage {
  comments: ReviewCommentInput[];
  reviews: PrReviewInput[];
  hasNextPage: boolean;
  endCursor: string | null;
}

function toDiffSide(value: string | null): DiffSide | null {
  return value === 'LEFT' || value === 'RIGHT' ? value : null;
}

/**
 * Flatten threads into comments; each comment carries its thread id and the
 * thread's resolution state. Comment ids are REST database ids so replies can
 * target them.
 */
export function parseReviewThreadsResponse(body: unknown): ReviewThreadsPage {
  const pr = requirePullRequest(body);

  const comments: ReviewCommentInput[] = [];
  for (const thread of arrayAt(pr, 'reviewThreads', 'nodes')) {
    const threadId = stringAt(thread, 'id');
    const isResolved = pathOf(thread, 'isResolved') === true ? 1 : 0;
    const side = toDiffSide(stringAt(thread, 'diffSide'));

    for (const comment of arrayAt(thread, 'comments', 'nodes')) {
      const databaseId = numberAt(comment, 'databaseId');
      const nodeId = stringAt(comment, 'id');
      const createdAt = stringAt(comment, 'createdAt');
      if ((databaseId === null && nodeId === null) || createdAt === null) {
        throw new ValidationError('Review comment is missing its id or timestamp', { threadId });
      }
      const replyTo = numberAt(comment, 'replyTo', 'databaseId');

      comments.push({
        comment_id: databaseId !== null ? String(databaseId) : String(nodeId),
        review_id: stringAt(comment, 'pullRequestReview', 'id'),
        thread_id: threadId,
        author: stringAt(comment, 'author', 'login') ?? DELETED_USER,
        body: stringAt(comment, 'body') ?? '',
        path: stringAt(comment, 'path') ?? stringAt(thread, 'path'),
        diff_hunk: stringAt(comment, 'diffHunk'),
        line: numberAt(comment, 'line') ?? numberAt(thread, 'line'),
        side,
        in_reply_to_id: replyTo !== null ? String(replyTo) : null,
        is_resolved: isResolved,
        created_at: createdAt,
        updated_at: stringAt(comment, 'updatedAt') ?? createdAt,
      });
    }
  }

  const reviews: PrReviewInput[] = [];
  for (const review of arrayAt(pr, 'reviews', 'nodes')) {
    const reviewId = stringAt(review, 'id');
    if (reviewId === null) continue;
    reviews.push({
      review_id: reviewId,
      author: stringAt(review, 'author', 'login') ?? DELETED_USER,
      state: stringAt(review, 'state') ?? 'COMMENTED',
      body: stringAt(review, 'body') ?? '',
      submitted_at: stringAt(review, 'submittedAt'),
    });
  }

  return {
    comments,
    reviews,
    hasNextPage: pathOf(pr, 'reviewThreads', 'pageInfo', 'hasNextPage') === true,
    endCursor: stringAt(pr, 'reviewThreads', 'pageInfo', 'endCursor'),
  };
}
