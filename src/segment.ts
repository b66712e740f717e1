import { debug, endGroup, info, startGroup } from '@actions/core';
import { classifyCommit } from '@/commit-analyzer';
import type { IdentityResolver } from '@/identity';
import type { Author, Commit, RepositoryGateway, Segment } from '@/types';
import { shortHash } from '@/utils/string';

/**
 * Builds one segment from the commits reachable from `toBoundary` but not from `fromBoundary`.
 *
 * Commits are classified in traversal order (newest first); subjects that are not conventional
 * commits are skipped. Once every commit is classified, the distinct author mails are resolved to
 * handles and the immutable segment is assembled:
 *
 * - `commitsByType` keeps each bucket in traversal order
 * - `contributors` is keyed by mail in traversal order; the first name seen for a mail wins
 * - `hasBreaking` is true when any classified commit is breaking
 *
 * @param fromBoundary - Older boundary commit id (excluded)
 * @param toBoundary - Newer boundary commit id (included)
 * @param gateway - Repository to walk
 * @param resolver - Run-scoped identity cache
 */
export async function aggregateSegment(
  fromBoundary: string,
  toBoundary: string,
  gateway: RepositoryGateway,
  resolver: IdentityResolver,
): Promise<Segment> {
  startGroup(`Aggregating commits ${shortHash(fromBoundary)}..${shortHash(toBoundary)}`);

  try {
    const classified: Commit[] = [];

    for (const id of gateway.walkRange(fromBoundary, toBoundary)) {
      const raw = gateway.getCommit(id);
      const commit = classifyCommit(raw);
      if (commit === null) {
        debug(`Skipping non-conventional commit ${shortHash(id)}: ${raw.subject}`);
        continue;
      }
      classified.push(commit);
    }

    const mails = classified.flatMap((commit) => commit.authors.map((author) => author.mail)).filter(Boolean);
    const handles = await resolver.resolveAll(mails);

    const commitsByType = new Map<string, Commit[]>();
    const contributors = new Map<string, Author>();
    let hasBreaking = false;

    for (const commit of classified) {
      const authors = commit.authors.map((author) =>
        Object.freeze({ ...author, handle: handles.get(author.mail) ?? '' }),
      );
      const resolved: Commit = Object.freeze({ ...commit, authors: Object.freeze(authors) });

      const bucket = commitsByType.get(resolved.type);
      if (bucket) {
        bucket.push(resolved);
      } else {
        commitsByType.set(resolved.type, [resolved]);
      }

      if (resolved.isBreaking) {
        hasBreaking = true;
      }

      for (const author of authors) {
        if (!contributors.has(author.mail)) {
          contributors.set(author.mail, author);
        }
      }
    }

    info(
      `Classified ${classified.length} commit${classified.length !== 1 ? 's' : ''} from ${contributors.size} contributor${contributors.size !== 1 ? 's' : ''}${hasBreaking ? ' (breaking)' : ''}`,
    );

    return Object.freeze({ fromBoundary, toBoundary, hasBreaking, commitsByType, contributors });
  } finally {
    endGroup();
  }
}

/**
 * Builds the segments bounded by consecutive entries of `boundaries` (newest first).
 *
 * @returns One segment per boundary pair, newest first
 */
export async function aggregateSegments(
  boundaries: readonly string[],
  gateway: RepositoryGateway,
  resolver: IdentityResolver,
): Promise<Segment[]> {
  console.time('Elapsed time aggregating segments');

  try {
    const segments: Segment[] = [];
    for (let index = 0; index < boundaries.length - 1; index++) {
      segments.push(await aggregateSegment(boundaries[index + 1], boundaries[index], gateway, resolver));
    }

    return segments;
  } finally {
    console.timeEnd('Elapsed time aggregating segments');
  }
}
