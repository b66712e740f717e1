import type { OctokitRestApi } from '@/types/github.types';

/**
 * Context and runtime related types
 */

/**
 * Interface representing the runtime context of this GitHub Action.
 */
export interface Context {
  /**
   * An instance of the Octokit class with the REST API plugin enabled.
   * This instance is authenticated using the configured token.
   */
  octokit: OctokitRestApi;

  /**
   * Hostname of the GitHub server the workflow runs against (e.g. `github.com`).
   */
  serverHost: string;

  /**
   * The workspace directory where the repository is checked out during the workflow run.
   */
  workspaceDir: string;

  /**
   * Absolute path of the repository the changelog is generated for.
   */
  repositoryDir: string;
}
