/**
 * Commit and contributor types
 */

/**
 * A person credited on a commit.
 *
 * Two authors with the same `mail` are the same contributor, even when their names differ
 * between commits.
 */
export interface Author {
  /** Display name from the commit metadata (or the co-author trailer) */
  name: string;
  /** Email address, the identity key (exact string match) */
  mail: string;
  /** Public platform username without the `@`, empty when unknown */
  handle: string;
}

/**
 * Result of parsing a commit subject line.
 */
export interface ConventionalCommitResult {
  /** Cosmetic marker in front of the type (`:sparkles:` or a pictograph), empty when absent */
  emoji: string;
  /** The commit type (e.g., 'feat', 'fix', 'chore') */
  type: string;
  /** The scope without parentheses, empty when absent */
  scope: string;
  /** Whether the subject carries the `!` breaking marker */
  breaking: boolean;
  /** The text after `: ` */
  description: string;
}

/**
 * A classified commit. Created once per commit and never mutated afterwards.
 */
export interface Commit {
  /** Full hex object id */
  readonly hash: string;
  readonly emoji: string;
  readonly type: string;
  readonly scope: string;
  readonly description: string;
  readonly isBreaking: boolean;
  /** Primary author first, co-authors in trailer order */
  readonly authors: readonly Author[];
}
