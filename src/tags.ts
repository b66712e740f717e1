import { debug, endGroup, info, startGroup } from '@actions/core';
import type { RepositoryGateway, TagIndex } from '@/types';
import { SEMVER_TAG_REGEX } from '@/utils/constants';
import semver from 'semver';

/**
 * Keeps versions that `semver` parses as well; the pattern alone admits components beyond
 * `Number.MAX_SAFE_INTEGER`.
 */
function toParsableVersion(version: string): string | null {
  return semver.valid(version) === null ? null : version;
}

/**
 * Returns the bare `MAJOR.MINOR.PATCH[-pre][+build]` part of a release tag.
 *
 * The configured tag prefix is stripped first; otherwise a `v` or `ver` prefix is accepted.
 *
 * @param tagName - Tag name such as `v1.2.3`, `ver2.0.0-rc.1` or `release-1.0.0` (with prefix `release-`)
 * @param tagPrefix - Configured tag prefix, may be empty
 * @returns The version string, or `null` when the tag is not a SemVer release tag or its version
 *   cannot be parsed
 */
export function getTagVersion(tagName: string, tagPrefix: string): string | null {
  if (tagPrefix !== '' && tagName.startsWith(tagPrefix)) {
    const stripped = tagName.slice(tagPrefix.length);
    const match = SEMVER_TAG_REGEX.exec(stripped);
    if (match?.groups && !match.groups.prefix) {
      return toParsableVersion(stripped);
    }
  }

  const match = SEMVER_TAG_REGEX.exec(tagName);
  if (!match?.groups) {
    return null;
  }

  return toParsableVersion(tagName.slice((match.groups.prefix ?? '').length));
}

/**
 * Checks whether a tag name is a SemVer release tag.
 */
export function isSemverTag(tagName: string, tagPrefix: string): boolean {
  return getTagVersion(tagName, tagPrefix) !== null;
}

/**
 * Builds the bidirectional tag index of a repository.
 *
 * Only tags whose name is a SemVer version (optionally prefixed) are kept. When several tags point
 * at the same commit, the lexicographically smallest name is recorded for the commit; every tag
 * still maps to its commit.
 *
 * @param gateway - Repository to read tags from
 * @param tagPrefix - Configured tag prefix
 */
export function buildTagIndex(gateway: RepositoryGateway, tagPrefix: string): TagIndex {
  console.time('Elapsed time indexing tags');
  startGroup('Indexing repository tags');

  try {
    const commitToTag = new Map<string, string>();
    const tagToCommit = new Map<string, string>();

    for (const { name, commitId } of gateway.listTags()) {
      if (!isSemverTag(name, tagPrefix)) {
        debug(`Skipping non-release tag: ${name}`);
        continue;
      }

      tagToCommit.set(name, commitId);

      const existing = commitToTag.get(commitId);
      if (existing === undefined || name < existing) {
        commitToTag.set(commitId, name);
      }
    }

    info(`Found ${tagToCommit.size} release tag${tagToCommit.size !== 1 ? 's' : ''}.`);
    debug(JSON.stringify(Object.fromEntries(commitToTag), null, 2));

    return { commitToTag, tagToCommit };
  } finally {
    console.timeEnd('Elapsed time indexing tags');
    endGroup();
  }
}
