/**
 * Subject URL helpers
 */

import type { SubjectRef } from '../types/index.js';

const SUBJECT_URL_RE = /^https?:\/\/[^/]+(?:\/api\/v3)?\/repos\/([^/]+)\/([^/]+)\/(pulls|issues)\/(\d+)$/;

/**
 * Parse an API subject URL (".../repos/{owner}/{repo}/pulls/{n}" or ".../issues/{n}").
 * Returns null for null URLs and anything else (commits, releases, discussions).
 */
export function parseSubjectUrl(url: string | null | undefined): SubjectRef | null {
  if (!url) return null;
  const match = SUBJECT_URL_RE.exec(url);
  if (!match) return null;

  const [, owner, repo, kind, number] = match;
  return {
    kind: kind === 'pulls' ? 'pull_request' : 'issue',
    owner,
    repo,
    number: parseInt(number, 10),
  };
}

/**
 * Browser URL for an API subject URL
 */
export function toHtmlUrl(subjectUrl: string | null | undefined): string | null {
  if (!subjectUrl) return null;

  let url = subjectUrl
    .replace('://api.github.com/repos/', '://github.com/')
    .replace('/api/v3/repos/', '/');
  url = url.replace(/\/pulls\/(\d+)$/, '/pull/$1');
  return url;
}

/**
 * Conversation comments endpoint for a subject; PR conversations live under /issues
 */
export function commentsUrlFor(subjectUrl: string | null | undefined): string | null {
  if (!subjectUrl || !parseSubjectUrl(subjectUrl)) return null;
  return `${subjectUrl.replace(/\/pulls\/(\d+)$/, '/issues/$1')}/comments`;
}

/**
 * owner/repo#number, the form the CLI accepts
 */
export function formatRef(ref: Pick<SubjectRef, 'owner' | 'repo' | 'number'>): string {
  return `${ref.owner}/${ref.repo}#${ref.number}`;
}

export function parseRef(text: string): { owner: string; repo: string; number: number } | null {
  const match = /^([A-Za-z0-9._-]+)\/([A-Za-z0-9._-]+)#(\d+)$/.exec(text.trim());
  if (!match) return null;
  return { owner: match[1], repo: match[2], number: parseInt(match[3], 10) };
}
