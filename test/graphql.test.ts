import { describe, expect, it } from 'vitest';
import {
  buildSubjectDetailsQuery,
  parsePrMetadataResponse,
  parseReviewThreadsResponse,
  parseSubjectDetailsResponse,
  validateIdentifier,
} from '../src/github/graphql.js';
import { ValidationError, type SubjectRef } from '../src/types/index.js';

function subjects(): Map<string, SubjectRef> {
  return new Map<string, SubjectRef>([
    ['1', { kind: 'pull_request', owner: 'acme', repo: 'widgets', number: 1 }],
    ['2', { kind: 'issue', owner: 'acme', repo: 'widgets', number: 2 }],
    ['x-y', { kind: 'pull_request', owner: 'other', repo: 'repo.js', number: 3 }],
  ]);
}

describe('buildSubjectDetailsQuery', () => {
  it('groups nodes per repository under stable aliases', () => {
    const { query, aliases } = buildSubjectDetailsQuery(subjects());

    expect([...aliases]).toEqual([
      ['pr_1', '1'],
      ['issue_2', '2'],
      ['pr_n2', 'x-y'],
    ]);
    expect(query).toContain('viewer { login }');
    expect(query).toContain('r0: repository(owner: "acme", name: "widgets") {');
    expect(query).toContain('r1: repository(owner: "other", name: "repo.js") {');
    expect(query).toContain('    pr_1: pullRequest(number: 1) { ...PrDetails }');
    expect(query).toContain('    issue_2: issue(number: 2) { ...IssueDetails }');
    expect(query).toContain('fragment PrDetails on PullRequest');
    expect(query).toContain('fragment IssueDetails on Issue');
  });

  it('omits fragments nothing uses', () => {
    const { query } = buildSubjectDetailsQuery(
      new Map<string, SubjectRef>([['9', { kind: 'issue', owner: 'acme', repo: 'widgets', number: 9 }]])
    );
    expect(query).not.toContain('fragment PrDetails');
  });

  it('refuses identifiers that could break out of the query', () => {
    expect(() => validateIdentifier('acme") { x } #')).toThrow(ValidationError);
    expect(validateIdentifier('repo.js')).toBe('repo.js');
  });

  it('leaves out repositories with unusable names and keeps the rest', () => {
    const mixed = new Map<string, SubjectRef>([
      ['1', { kind: 'issue', owner: 'acme") { x } #', repo: 'widgets', number: 1 }],
      ['2', { kind: 'issue', owner: 'acme', repo: 'widgets', number: 2 }],
    ]);

    const { query, aliases, rejected } = buildSubjectDetailsQuery(mixed);

    expect([...aliases]).toEqual([['issue_2', '2']]);
    expect(query).toContain('r0: repository(owner: "acme", name: "widgets") {');
    expect(query).not.toContain('{ x }');
    expect([...rejected.keys()]).toEqual(['1']);
    expect(rejected.get('1')?.itemId).toBe('1');
    expect(rejected.get('1')?.message).toContain('Invalid GraphQL identifier');
  });
});

describe('parseSubjectDetailsResponse', () => {
  it('maps nodes back to ids and isolates failed nodes', () => {
    const { aliases } = buildSubjectDetailsQuery(subjects());
    const body = {
      data: {
        viewer: { login: 'me' },
        r0: {
          pr_1: {
            state: 'OPEN',
            merged: false,
            author: { login: 'me' },
            commits: { nodes: [{ commit: { statusCheckRollup: { state: 'SUCCESS' } } }] },
          },
          issue_2: null,
        },
      },
      errors: [{ message: 'Could not resolve to an Issue', path: ['r0', 'issue_2'] }],
    };

    const { results, viewerLogin } = parseSubjectDetailsResponse(body, aliases);

    expect(viewerLogin).toBe('me');
    expect(results.get('1')).toEqual({ ok: true, value: { state: 'open', ciStatus: 'success', author: 'me' } });

    const missing = results.get('2');
    expect(missing?.ok).toBe(false);
    if (missing && !missing.ok) {
      expect(missing.error.message).toBe('Could not resolve to an Issue');
      expect(missing.error.itemId).toBe('2');
    }

    const absent = results.get('x-y');
    expect(absent?.ok).toBe(false);
    if (absent && !absent.ok) {
      expect(absent.error.message).toBe('Subject missing from response');
    }
  });

  it('reports merged pull requests and ignores unknown rollup states', () => {
    const aliases = new Map([['pr_5', '5']]);
    const body = {
      data: {
        r0: {
          pr_5: {
            state: 'MERGED',
            merged: true,
            author: null,
            commits: { nodes: [{ commit: { statusCheckRollup: { state: 'EXPECTED' } } }] },
          },
        },
      },
    };
    expect(parseSubjectDetailsResponse(body, aliases).results.get('5')).toEqual({
      ok: true,
      value: { state: 'merged', ciStatus: null, author: null },
    });
  });
});

describe('parsePrMetadataResponse', () => {
  it('extracts metadata and label names', () => {
    const body = {
      data: {
        repository: {
          pullRequest: {
            number: 7,
            author: { login: 'octo' },
            body: 'Adds widgets',
            labels: { nodes: [{ name: 'bug' }, { name: 'ui' }] },
            baseRefName: 'main',
            headRefName: 'feature',
          },
        },
      },
    };
    expect(parsePrMetadataResponse(body)).toEqual({
      pr_number: 7,
      author: 'octo',
      body: 'Adds widgets',
      labels_json: '["bug","ui"]',
      base_ref: 'main',
      head_ref: 'feature',
    });
  });

  it('surfaces the GraphQL error when the pull request is missing', () => {
    const body = { data: { repository: { pullRequest: null } }, errors: [{ message: 'Not found', path: [] }] };
    expect(() => parsePrMetadataResponse(body)).toThrow('Not found');
  });
});

describe('parseReviewThreadsResponse', () => {
  it('flattens threads into comments keyed by database id', () => {
    const body = {
      data: {
        repository: {
          pullRequest: {
            reviewThreads: {
              pageInfo: { hasNextPage: true, endCursor: 'cursor-1' },
              nodes: [
                {
                  id: 'T1',
                  isResolved: true,
                  path: 'src/a.ts',
                  line: 4,
                  diffSide: 'LEFT',
                  comments: {
                    nodes: [
                      {
                        id: 'C_node_1',
                        databaseId: 101,
                        author: { login: 'rev' },
                        body: 'nit',
                        path: 'src/a.ts',
                        diffHunk: '@@ -1 +1 @@',
                        line: null,
                        createdAt: '2024-01-01T00:00:00Z',
                        updatedAt: '2024-01-01T00:00:00Z',
                        pullRequestReview: { id: 'R1' },
                        replyTo: null,
                      },
                      {
                        id: 'C_node_2',
                        databaseId: 102,
                        author: null,
                        body: 'done',
                        createdAt: '2024-01-02T00:00:00Z',
                        pullRequestReview: null,
                        replyTo: { databaseId: 101 },
                      },
                    ],
                  },
                },
              ],
            },
            reviews: { nodes: [{ id: 'R1', author: { login: 'rev' }, state: 'COMMENTED', body: '', submittedAt: null }] },
          },
        },
      },
    };

    const page = parseReviewThreadsResponse(body);

    expect(page.hasNextPage).toBe(true);
    expect(page.endCursor).toBe('cursor-1');
    expect(page.reviews).toEqual([{ review_id: 'R1', author: 'rev', state: 'COMMENTED', body: '', submitted_at: null }]);
    expect(page.comments).toEqual([
      {
        comment_id: '101',
        review_id: 'R1',
        thread_id: 'T1',
        author: 'rev',
        body: 'nit',
        path: 'src/a.ts',
        diff_hunk: '@@ -1 +1 @@',
        line: 4,
        side: 'LEFT',
        in_reply_to_id: null,
        is_resolved: 1,
        created_at: '2024-01-01T00:00:00Z',
        updated_at: '2024-01-01T00:00:00Z',
      },
      {
        comment_id: '102',
        review_id: null,
        thread_id: 'T1',
        author: '[deleted]',
        body: 'done',
        path: 'src/a.ts',
        diff_hunk: null,
        line: 4,
        side: 'LEFT',
        in_reply_to_id: '101',
        is_resolved: 1,
        created_at: '2024-01-02T00:00:00Z',
        updated_at: '2024-01-02T00:00:00Z',
      },
    ]);
  });
});
