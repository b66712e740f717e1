/**
 * Regular expression that matches release tags following Semantic Versioning 2.0.0.
 *
 * An optional `v` or `ver` prefix is allowed in front of `MAJOR.MINOR.PATCH`, followed by an
 * optional pre-release (`-alpha.1`) and optional build metadata (`+build.5`). Numeric identifiers
 * may not carry leading zeros.
 *
 * Named groups: `prefix`, `major`, `minor`, `patch`, `prerelease`, `buildmetadata`.
 */
export const SEMVER_TAG_REGEX =
  /^(?<prefix>v|ver)?(?<major>0|[1-9]\d*)\.(?<minor>0|[1-9]\d*)\.(?<patch>0|[1-9]\d*)(?:-(?<prerelease>(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+(?<buildmetadata>[0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/;

/**
 * Release type constants for semantic versioning
 */
export const RELEASE_TYPE = {
  MAJOR: 'major',
  MINOR: 'minor',
  PATCH: 'patch',
} as const;

/**
 * Version every segment starts from when its older boundary carries no tag.
 */
export const INITIAL_VERSION = '0.0.0';

/**
 * Commit types with a dedicated changelog section, in the order the sections are rendered.
 */
export const COMMIT_TYPE = {
  FEAT: 'feat',
  FIX: 'fix',
  DOCS: 'docs',
  STYLE: 'style',
  REFACTOR: 'refactor',
  PERF: 'perf',
  TEST: 'test',
  BUILD: 'build',
  CI: 'ci',
  CHORE: 'chore',
  REVERT: 'revert',
} as const;

/**
 * Bucket used at render time for every type outside {@link COMMIT_TYPE}.
 */
export const OTHER_COMMIT_TYPE = 'other';

/**
 * Changelog section headings keyed by commit type. Breaking changes and the catch-all bucket have
 * their own headings.
 */
export const SECTION_HEADINGS = {
  breaking: ':boom: Breaking Changes',
  feat: ':sparkles: Features',
  fix: ':bug: Bug Fixes',
  docs: ':memo: Documentation',
  style: ':art: Styles',
  refactor: ':recycle: Code Refactoring',
  perf: ':zap: Performance Improvements',
  test: ':rotating_light: Tests',
  build: ':hammer: Build',
  ci: ':green_heart: Continuous Integration',
  chore: ':wrench: Chores',
  revert: ':rewind: Reverts',
  other: ':package: Others',
} as const;

export const CONTRIBUTORS_HEADING = ':busts_in_silhouette: Contributors';

/**
 * Error kinds raised by the changelog engine. All of them abort the run.
 */
export const ERROR_KIND = {
  NOT_A_REPOSITORY: 'NotARepository',
  REPOSITORY_NOT_CLEAN: 'RepositoryNotClean',
  HAS_UNTRACKED_CHANGES: 'HasUntrackedChanges',
  EMPTY_REPOSITORY: 'EmptyRepository',
  EMPTY_RANGE: 'EmptyRange',
  UNRESOLVABLE_REF: 'UnresolvableRef',
  REMOTE_HISTORY_FETCH_FAILURE: 'RemoteHistoryFetchFailure',
} as const;

// Length of abbreviated commit ids in names and links
export const SHORT_HASH_LENGTH = 7;

/**
 * Matches issue or pull request references such as `#42`. Descriptions containing one are rendered
 * without a commit link.
 */
export const ISSUE_REFERENCE_REGEX = /#\d+/;

/**
 * Trailer key that credits additional authors in a commit body.
 */
export const CO_AUTHOR_TRAILER = 'Co-authored-by';

export const GITHUB_HOST = 'github.com';
export const GITHUB_NOREPLY_DOMAIN = 'users.noreply.github.com';

// Commits per remote history page (maximum allowed by the GitHub API)
export const REMOTE_HISTORY_PAGE_SIZE = 100;

// Parallel identity lookups per run
export const IDENTITY_LOOKUP_CONCURRENCY = 4;
