import { debug, endGroup, info, startGroup, warning } from '@actions/core';
import type { IdentityLookup, RemoteCommitRecord, RemoteHistory } from '@/types';
import { ERROR_KIND, IDENTITY_LOOKUP_CONCURRENCY } from '@/utils/constants';
import { ChangelogError, getErrorMessage } from '@/utils/errors';
import pLimit from 'p-limit';

/**
 * Maps contributor email addresses to public handles for the duration of one run.
 *
 * Handles come from two places: {@link IdentityResolver.seed} records logins found in remote
 * commit metadata, and {@link IdentityResolver.resolve} asks the identity lookup for everything
 * else. Once a mail has a non-empty handle it never changes. A failed or empty lookup is cached as
 * `''` and not retried.
 */
export class IdentityResolver {
  private readonly handles: Map<string, string> = new Map();
  private readonly inFlight: Map<string, Promise<string>> = new Map();
  private readonly lookup: IdentityLookup | null;
  private readonly concurrency: number;

  /**
   * @param lookup - Account lookup, or `null` to resolve only what was seeded
   * @param concurrency - Maximum number of lookups running at once in {@link resolveAll}
   */
  constructor(lookup: IdentityLookup | null, concurrency: number = IDENTITY_LOOKUP_CONCURRENCY) {
    this.lookup = lookup;
    this.concurrency = concurrency;
  }

  /**
   * Number of mails with a cached result, empty handles included.
   */
  public get size(): number {
    return this.handles.size;
  }

  /**
   * Returns the cached handle of `mail` without triggering a lookup.
   */
  public getCached(mail: string): string | undefined {
    return this.handles.get(mail);
  }

  /**
   * Records a handle surfaced by commit metadata. Empty handles are ignored, and a non-empty cached
   * handle is kept.
   */
  public seed(mail: string, handle: string): void {
    if (mail === '' || handle === '') {
      return;
    }
    this.remember(mail, handle);
  }

  /**
   * Resolves the handle of one mail. Concurrent calls for the same mail share one lookup.
   *
   * @returns The handle, or `''` when none is known
   */
  public async resolve(mail: string): Promise<string> {
    const cached = this.handles.get(mail);
    if (cached !== undefined) {
      return cached;
    }

    const pending = this.inFlight.get(mail);
    if (pending) {
      return pending;
    }

    const request = this.lookupHandle(mail).finally(() => {
      this.inFlight.delete(mail);
    });
    this.inFlight.set(mail, request);

    return request;
  }

  /**
   * Resolves every distinct mail with bounded parallelism.
   *
   * @returns Handles keyed by mail, in first-seen order
   */
  public async resolveAll(mails: Iterable<string>): Promise<Map<string, string>> {
    const unique = [...new Set(mails)];
    const limit = pLimit(this.concurrency);
    const handles = await Promise.all(unique.map((mail) => limit(() => this.resolve(mail))));

    return new Map(unique.map((mail, index) => [mail, handles[index]]));
  }

  private async lookupHandle(mail: string): Promise<string> {
    if (!this.lookup) {
      return this.remember(mail, '');
    }

    try {
      const handle = (await this.lookup.findHandle(mail)) ?? '';
      if (handle === '') {
        debug(`No account found for ${mail}`);
      }
      return this.remember(mail, handle);
    } catch (error) {
      warning(`Failed to look up account for ${mail}: ${getErrorMessage(error)}`);
      return this.remember(mail, '');
    }
  }

  private remember(mail: string, handle: string): string {
    const current = this.handles.get(mail);
    if (current) {
      return current;
    }

    this.handles.set(mail, handle);
    return handle;
  }
}

/**
 * Seeds the resolver with the author and committer logins of a remote copy of the history.
 *
 * Pages of `head`'s history are fetched one after another until a page is shorter than the page
 * size or contains the `sentinel` commit (the start of the range being rendered).
 *
 * @returns The number of remote commit records read
 * @throws {ChangelogError} `RemoteHistoryFetchFailure` when any page cannot be fetched. Nothing is
 *   seeded in that case.
 */
export async function collectRemoteIdentities(
  history: RemoteHistory,
  head: string,
  sentinel: string,
  resolver: IdentityResolver,
): Promise<number> {
  console.time('Elapsed time reading remote history');
  startGroup('Reading remote commit history');

  try {
    const logins: Array<[string, string]> = [];
    let records = 0;

    for (let page = 1; ; page++) {
      let commits: RemoteCommitRecord[];
      try {
        commits = await history.listCommitPage(head, page);
      } catch (error) {
        throw new ChangelogError(
          ERROR_KIND.REMOTE_HISTORY_FETCH_FAILURE,
          `Failed to fetch remote history page ${page}: ${getErrorMessage(error)}`,
          { cause: error },
        );
      }

      records += commits.length;
      for (const commit of commits) {
        logins.push([commit.authorMail, commit.authorLogin], [commit.committerMail, commit.committerLogin]);
      }

      if (commits.length < history.pageSize || commits.some((commit) => commit.sha === sentinel)) {
        break;
      }
    }

    for (const [mail, login] of logins) {
      resolver.seed(mail, login);
    }

    info(`Read ${records} remote commit${records !== 1 ? 's' : ''}, ${resolver.size} known contributor${resolver.size !== 1 ? 's' : ''}`);

    return records;
  } finally {
    console.timeEnd('Elapsed time reading remote history');
    endGroup();
  }
}
