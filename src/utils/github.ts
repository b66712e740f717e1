import type { RemoteLocation } from '@/types';
import { GITHUB_HOST, GITHUB_NOREPLY_DOMAIN } from '@/utils/constants';
import { removeTrailingCharacters } from '@/utils/string';

const SCP_REMOTE_REGEX = /^(?:[\w.-]+@)?([^:/]+):(?!\/)(.+)$/;

/**
 * Breaks a git remote URL into host, owner and repository name.
 *
 * Supports the SCP-like SSH syntax (`git@github.com:owner/repo.git`) as well as `https://`,
 * `http://`, `ssh://` and `git://` URLs. Credentials and ports are dropped; a trailing `.git` and
 * trailing slashes are removed from the repository name. Nested paths (GitLab subgroups) keep
 * everything but the last segment as the owner.
 *
 * @param {string} url - The remote URL as configured in git.
 * @returns {RemoteLocation | null} The parsed location, or `null` when the URL has no owner/repo path.
 *
 * @example
 * ```typescript
 * parseRemoteUrl('git@github.com:octo-org/widgets.git');
 * // → { host: 'github.com', owner: 'octo-org', repo: 'widgets', webUrl: 'https://github.com/octo-org/widgets' }
 * ```
 */
export function parseRemoteUrl(url: string): RemoteLocation | null {
  const trimmed = url.trim();
  let host: string;
  let path: string;

  const scpMatch = SCP_REMOTE_REGEX.exec(trimmed);
  if (!trimmed.includes('://') && scpMatch) {
    host = scpMatch[1];
    path = scpMatch[2];
  } else {
    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      return null;
    }
    host = parsed.hostname;
    path = parsed.pathname;
  }

  const segments = removeTrailingCharacters(path, ['/'])
    .replace(/\.git$/, '')
    .split('/')
    .filter(Boolean);
  if (!host || segments.length < 2) {
    return null;
  }

  const repo = segments[segments.length - 1];
  const owner = segments.slice(0, -1).join('/');

  return { host, owner, repo, webUrl: `https://${host}/${owner}/${repo}` };
}

/**
 * Whether a remote host is served by GitHub: github.com or the server the workflow runs against.
 */
export function isGitHubHost(host: string, serverHost: string): boolean {
  const normalized = host.toLowerCase();
  return normalized === GITHUB_HOST || normalized === serverHost.toLowerCase();
}

/**
 * Extracts the login from a GitHub noreply address.
 *
 * Both the current (`{id}+{login}@users.noreply.github.com`) and the legacy
 * (`{login}@users.noreply.github.com`) formats are recognized.
 *
 * @returns The login, or `null` for any other address.
 */
export function getLoginFromNoreplyEmail(mail: string): string | null {
  const [localPart, domain] = mail.split('@');
  if (!localPart || domain?.toLowerCase() !== GITHUB_NOREPLY_DOMAIN) {
    return null;
  }

  const login = localPart.includes('+') ? localPart.slice(localPart.indexOf('+') + 1) : localPart;
  return login || null;
}
