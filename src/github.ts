import type { IdentityLookup, OctokitRestApi, RemoteCommitRecord, RemoteHistory, Repo } from '@/types';
import { REMOTE_HISTORY_PAGE_SIZE } from '@/utils/constants';
import { getLoginFromNoreplyEmail } from '@/utils/github';
import { debug } from '@actions/core';
import { RequestError } from '@octokit/request-error';

/**
 * Builds an error message for a failed API request, including the HTTP status when available.
 */
function formatRequestError(action: string, error: unknown): string {
  if (error instanceof RequestError) {
    return `${action}: ${error.message.trim()} (status: ${error.status})`;
  }
  if (error instanceof Error) {
    return `${action}: ${error.message.trim()}`;
  }
  return `${action}: ${String(error).trim()}`;
}

/**
 * Reads the login of a user object from the API. Commits by unlinked identities carry `null` or an
 * empty object instead.
 */
function getLogin(user: unknown): string {
  if (typeof user === 'object' && user !== null && 'login' in user && typeof user.login === 'string') {
    return user.login;
  }
  return '';
}

/**
 * Commit history of a repository hosted on GitHub, read through the REST API.
 */
export class GitHubCommitHistory implements RemoteHistory {
  public readonly pageSize: number = REMOTE_HISTORY_PAGE_SIZE;

  private readonly octokit: OctokitRestApi;
  private readonly repo: Repo;

  constructor(octokit: OctokitRestApi, repo: Repo) {
    this.octokit = octokit;
    this.repo = repo;
  }

  /**
   * @throws {Error} When the request fails. The message carries the HTTP status.
   */
  public async listCommitPage(head: string, page: number): Promise<RemoteCommitRecord[]> {
    const { owner, repo } = this.repo;

    try {
      const { data } = await this.octokit.rest.repos.listCommits({
        owner,
        repo,
        sha: head,
        per_page: this.pageSize,
        page,
      });

      debug(`Fetched ${data.length} commits of ${owner}/${repo} (page ${page})`);

      return data.map((commit) => ({
        sha: commit.sha,
        authorMail: commit.commit.author?.email ?? '',
        authorLogin: getLogin(commit.author),
        committerMail: commit.commit.committer?.email ?? '',
        committerLogin: getLogin(commit.committer),
      }));
    } catch (error) {
      throw new Error(formatRequestError(`Failed to list commits of ${owner}/${repo}`, error), { cause: error });
    }
  }
}

/**
 * Finds GitHub logins for commit email addresses.
 *
 * GitHub noreply addresses carry the login and need no request; any other address is looked up
 * with the user search API, which only matches public email addresses.
 */
export class GitHubIdentityLookup implements IdentityLookup {
  private readonly octokit: OctokitRestApi;

  constructor(octokit: OctokitRestApi) {
    this.octokit = octokit;
  }

  /**
   * @throws {Error} When the search request fails. The message carries the HTTP status.
   */
  public async findHandle(mail: string): Promise<string | null> {
    const noreplyLogin = getLoginFromNoreplyEmail(mail);
    if (noreplyLogin !== null) {
      return noreplyLogin;
    }

    try {
      const { data } = await this.octokit.rest.search.users({ q: `${mail} in:email`, per_page: 1 });
      return data.items.length > 0 ? data.items[0].login : null;
    } catch (error) {
      throw new Error(formatRequestError(`Failed to search users by email ${mail}`, error), { cause: error });
    }
  }
}
