import { debug, endGroup, info, startGroup } from '@actions/core';
import type { RepositoryGateway, TagIndex } from '@/types';
import { ERROR_KIND } from '@/utils/constants';
import { ChangelogError } from '@/utils/errors';
import { shortHash } from '@/utils/string';

/**
 * Endpoints of the requested commit range. An empty `from` means "since the previous release".
 */
export interface RangeRequest {
  from: string;
  to: string;
}

/**
 * Resolves a tag name or commit-ish to a commit id, consulting the tag index first.
 */
function resolveEndpoint(name: string, gateway: RepositoryGateway, tagIndex: TagIndex): string {
  return tagIndex.tagToCommit.get(name) ?? gateway.resolveRef(name);
}

/**
 * Finds the default start of a range: the first tagged commit in the history of `HEAD`, `HEAD`
 * included, or the root commit when none is tagged. A tagged `HEAD` is its own previous release.
 */
export function findPreviousRelease(gateway: RepositoryGateway, tagIndex: TagIndex): string {
  const headId = gateway.resolveRef('HEAD');

  for (const id of gateway.walkRange(null, headId)) {
    if (tagIndex.commitToTag.has(id)) {
      debug(`Previous release: ${tagIndex.commitToTag.get(id)} (${shortHash(id)})`);
      return id;
    }
  }

  const root = gateway.findRootCommit(headId);
  debug(`No previous release found, starting from root commit ${shortHash(root)}`);
  return root;
}

/**
 * Resolves the requested range into segment boundaries.
 *
 * The result lists commit ids newest first: `to`, then every tagged commit strictly inside the
 * range in traversal order, then `from`. Consecutive entries bound one segment.
 *
 * @throws {ChangelogError} `EmptyRange` when `from` and `to` resolve to the same commit or no
 *   commit lies between them, `UnresolvableRef` when an endpoint does not resolve.
 */
export function resolveBoundaries(request: RangeRequest, gateway: RepositoryGateway, tagIndex: TagIndex): string[] {
  startGroup('Resolving commit range');

  try {
    const toId = resolveEndpoint(request.to || 'HEAD', gateway, tagIndex);
    const fromId = request.from
      ? resolveEndpoint(request.from, gateway, tagIndex)
      : findPreviousRelease(gateway, tagIndex);

    if (fromId === toId) {
      throw new ChangelogError(ERROR_KIND.EMPTY_RANGE, 'No commits between from and to.');
    }

    const commits = gateway.walkRange(fromId, toId);
    if (commits.length === 0) {
      throw new ChangelogError(ERROR_KIND.EMPTY_RANGE, 'No commits between from and to.');
    }

    const internal = commits.filter((id) => id !== toId && tagIndex.commitToTag.has(id));
    const boundaries = [toId, ...internal, fromId];

    info(`Range ${shortHash(fromId)}..${shortHash(toId)}: ${commits.length} commits`);
    info(`Segments: ${boundaries.length - 1}`);
    debug(JSON.stringify(boundaries, null, 2));

    return boundaries;
  } finally {
    endGroup();
  }
}
