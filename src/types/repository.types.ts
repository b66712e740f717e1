/**
 * Repository gateway types. The engine only talks to version control through these.
 */

/**
 * Metadata of a single commit as stored in the repository.
 */
export interface RawCommit {
  /** Full hex object id */
  id: string;
  /** First line of the message */
  subject: string;
  /** The message without its subject line, trimmed */
  body: string;
  authorName: string;
  authorMail: string;
  committerName: string;
  committerMail: string;
}

/**
 * A tag as listed by the repository, already peeled to the commit it points at.
 */
export interface TagRef {
  name: string;
  commitId: string;
}

/**
 * Read-only access to a version-control repository.
 */
export interface RepositoryGateway {
  /**
   * Resolves a ref name, tag or commit-ish to a full commit id.
   * @throws {ChangelogError} `UnresolvableRef` when the name does not denote a commit.
   */
  resolveRef(name: string): string;

  /**
   * Lists tags pointing at commits, most recent first.
   */
  listTags(): TagRef[];

  /**
   * Lists the commits reachable from `toId` but not from `fromId`, newest first. When `fromId`
   * is `null` the whole history of `toId` is listed.
   */
  walkRange(fromId: string | null, toId: string): string[];

  /**
   * Reads the metadata of one commit.
   */
  getCommit(id: string): RawCommit;

  /**
   * Returns the oldest commit reachable from `id`.
   */
  findRootCommit(id: string): string;
}

/**
 * Bidirectional mapping between semver tags and the commits they point at.
 */
export interface TagIndex {
  /** Commit id → tag name (one tag per commit) */
  commitToTag: Map<string, string>;
  /** Tag name → commit id */
  tagToCommit: Map<string, string>;
}
