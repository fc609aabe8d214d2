import { InvalidRepositoryUrlError } from './errors';
import type { RepositoryRef } from './types';

// scheme://[user@]host/owner/repo(.git) or user@host:owner/repo(.git)
const URL_FORMS = [
  /^(?:https?|ssh):\/\/(?:[^@/:\s]+@)?[^/:\s]+\/([^/:\s]+)\/([^/:\s]+?)(?:\.git)?\/?$/,
  /^[^@/:\s]+@[^/:\s]+:([^/:\s]+)\/([^/:\s]+?)(?:\.git)?\/?$/,
];

// "." and ".." would be collapsed by URL resolution and retarget the request
const DOTS_ONLY = /^\.+$/;

/**
 * Extract owner and repository name from a git remote URL.
 *
 * Supported forms:
 * - https://hostname/owner/repository.git
 * - git@hostname:owner/repository.git
 */
export function parseRepositoryUrl(url: string): RepositoryRef {
  const trimmed = url.trim();

  for (const form of URL_FORMS) {
    const match = form.exec(trimmed);
    if (!match) continue;

    const [, owner, repo] = match;
    if (owner && repo && repo !== '.git' && !DOTS_ONLY.test(owner) && !DOTS_ONLY.test(repo)) {
      return { owner, repo };
    }
  }

  throw new InvalidRepositoryUrlError(url);
}
