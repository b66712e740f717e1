import type { Api } from '@octokit/plugin-rest-endpoint-methods';

/**
 * GitHub API and repository related types
 */

/**
 * Octokit with the REST endpoint methods. Commit history is read one page at a time, so that a walk
 * can stop at the page holding the start of the range.
 */
export type OctokitRestApi = Api;

/**
 * Interface representing the repository structure of a hosted repo in the form of the owner and name.
 */
export interface Repo {
  /**
   * The owner of the repository, typically a user or an organization.
   */
  owner: string;

  /**
   * The name of the repository.
   */
  repo: string;
}

/**
 * A git remote URL broken into its parts.
 */
export interface RemoteLocation extends Repo {
  /**
   * Hostname of the server (e.g. `github.com`).
   */
  host: string;

  /**
   * Web URL of the repository (e.g. `https://github.com/owner/repo`).
   */
  webUrl: string;
}
