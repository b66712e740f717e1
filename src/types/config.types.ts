import type { ReleaseType } from '@/types/common.types';

/**
 * Configuration related types
 */

/**
 * Configuration interface used for defining key GitHub Action input configuration.
 */
export interface Config {
  /**
   * Tag or commit-ish the changelog starts from (exclusive). When empty, the most recent semver tag
   * reachable from `to` is used, falling back to the root commit.
   */
  from: string;

  /**
   * Tag or commit-ish the changelog ends at (inclusive). Defaults to `HEAD`.
   */
  to: string;

  /**
   * Prefix placed in front of computed versions (e.g. `v` → `v1.2.0`) and stripped from tags
   * before their version is parsed.
   */
  tagPrefix: string;

  /**
   * Name of the git remote whose URL is used to build compare and commit links, and to decide
   * whether contributor handles can be resolved through the GitHub API.
   */
  remote: string;

  /**
   * Path of the repository relative to the workspace directory.
   */
  path: string;

  /**
   * The GitHub token (`GITHUB_TOKEN`) used for API authentication. When empty, no API requests are
   * made and contributors are listed by name and email only.
   */
  githubToken: string;

  /**
   * File, relative to the repository, that the rendered changelog is prepended to. Empty to skip.
   */
  changelogFile: string;

  /**
   * Whether commit emoji (`:sparkles:`, pictographs) are kept in front of rendered descriptions.
   */
  useEmoji: boolean;

  /**
   * Release type forced onto the newest untagged segment. Empty to use the type derived from the
   * segment's commits.
   */
  releaseType: ReleaseType | '';
}
