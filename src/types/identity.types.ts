/**
 * Identity lookup types
 */

/**
 * Resolves a contributor's public handle from their email address.
 */
export interface IdentityLookup {
  /**
   * @returns The handle, or `null` when no account matches the address.
   * @throws When the lookup itself fails; callers treat this as a missing handle.
   */
  findHandle(mail: string): Promise<string | null>;
}

/**
 * Identity information carried by one commit of a remote history page.
 */
export interface RemoteCommitRecord {
  sha: string;
  authorMail: string;
  /** Login of the account linked to the author, empty when unlinked */
  authorLogin: string;
  committerMail: string;
  /** Login of the account linked to the committer, empty when unlinked */
  committerLogin: string;
}

/**
 * Paginated commit listing of a hosted copy of the repository.
 */
export interface RemoteHistory {
  /** Number of records in a full page. A shorter page is the last one. */
  readonly pageSize: number;

  /**
   * Fetches one page of the history of `head`, newest first. Pages start at 1.
   */
  listCommitPage(head: string, page: number): Promise<RemoteCommitRecord[]>;
}
