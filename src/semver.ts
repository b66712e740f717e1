import { getTagVersion } from '@/tags';
import type { ReleaseType, Segment, SegmentNames, TagIndex, VersionCandidates, VersionProposal } from '@/types';
import { COMMIT_TYPE, INITIAL_VERSION, RELEASE_TYPE } from '@/utils/constants';
import { shortHash } from '@/utils/string';
import semver from 'semver';
import type { SemVer } from 'semver';

/**
 * Parses the version carried by a release tag.
 *
 * @param tagName - Tag such as `v1.2.3` or `release-1.2.3`
 * @param tagPrefix - Configured tag prefix
 * @returns The parsed version, or `null` when the tag is not a SemVer release tag
 */
export function parseTagVersion(tagName: string, tagPrefix: string): SemVer | null {
  const version = getTagVersion(tagName, tagPrefix);
  return version === null ? null : semver.parse(version);
}

function increment(version: string, releaseType: ReleaseType): string {
  const next = semver.inc(version, releaseType);
  if (next === null) {
    throw new Error(`Unable to increment invalid version '${version}'`);
  }
  return next;
}

/**
 * Computes the three successor versions of `fromVersion`.
 *
 * Pre-release and build metadata of `fromVersion` are dropped before incrementing, so
 * `1.2.0-rc.1` yields `2.0.0`, `1.3.0` and `1.2.1`.
 */
export function computeVersionCandidates(fromVersion: SemVer): VersionCandidates {
  const core = `${fromVersion.major}.${fromVersion.minor}.${fromVersion.patch}`;

  return {
    [RELEASE_TYPE.MAJOR]: increment(core, RELEASE_TYPE.MAJOR),
    [RELEASE_TYPE.MINOR]: increment(core, RELEASE_TYPE.MINOR),
    [RELEASE_TYPE.PATCH]: increment(core, RELEASE_TYPE.PATCH),
  };
}

/**
 * Determines the release type a segment calls for: `major` when it contains a breaking change,
 * `minor` when it contains a feature, `patch` otherwise.
 */
export function selectReleaseType(segment: Segment): ReleaseType {
  if (segment.hasBreaking) {
    return RELEASE_TYPE.MAJOR;
  }

  const features = segment.commitsByType.get(COMMIT_TYPE.FEAT);
  if (features !== undefined && features.length > 0) {
    return RELEASE_TYPE.MINOR;
  }

  return RELEASE_TYPE.PATCH;
}

/**
 * @throws {Error} When `fromTag` does not carry a version. Indexed tags always do.
 */
function getFromVersion(fromTag: string | undefined, tagPrefix: string): SemVer {
  if (fromTag === undefined) {
    return new semver.SemVer(INITIAL_VERSION);
  }

  const version = parseTagVersion(fromTag, tagPrefix);
  if (version === null) {
    throw new Error(`Tag '${fromTag}' does not carry a valid version`);
  }
  return version;
}

/**
 * Builds the version proposal of a segment that starts at `fromTag` (or at an untagged commit).
 *
 * @param releaseTypeOverride - Forces the selected release type when not empty
 */
export function proposeVersion(
  segment: Segment,
  fromTag: string | undefined,
  tagPrefix: string,
  releaseTypeOverride: ReleaseType | '' = '',
): VersionProposal {
  const fromVersion = getFromVersion(fromTag, tagPrefix);

  return {
    fromVersion: fromVersion.version,
    releaseType: releaseTypeOverride || selectReleaseType(segment),
    candidates: computeVersionCandidates(fromVersion),
  };
}

/**
 * Names the boundaries of a segment.
 *
 * - `fromName` is the older boundary's tag, or its short hash when untagged
 * - when the newer boundary is tagged, `toName` is that tag and no version is proposed
 * - otherwise `toName` is the tag prefix followed by the proposed version
 *
 * @param segment - The segment to name
 * @param tagIndex - Tags of the repository
 * @param tagPrefix - Prefix put in front of proposed versions and stripped from existing tags
 * @param releaseTypeOverride - Forces the release type of a proposed version when not empty
 */
export function getSegmentNames(
  segment: Segment,
  tagIndex: TagIndex,
  tagPrefix: string,
  releaseTypeOverride: ReleaseType | '' = '',
): SegmentNames {
  const fromTag = tagIndex.commitToTag.get(segment.fromBoundary);
  const toTag = tagIndex.commitToTag.get(segment.toBoundary);
  const fromName = fromTag ?? shortHash(segment.fromBoundary);

  if (toTag !== undefined) {
    return { fromName, toName: toTag, proposal: null };
  }

  const proposal = proposeVersion(segment, fromTag, tagPrefix, releaseTypeOverride);

  return {
    fromName,
    toName: `${tagPrefix}${proposal.candidates[proposal.releaseType]}`,
    proposal,
  };
}
