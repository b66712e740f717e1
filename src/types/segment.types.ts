import type { ReleaseType } from '@/types/common.types';
import type { Author, Commit } from '@/types/commit.types';

/**
 * A contiguous, tag-bounded slice of history rendered as one changelog entry.
 */
export interface Segment {
  /** Older boundary commit id (exclusive) */
  readonly fromBoundary: string;
  /** Newer boundary commit id (inclusive) */
  readonly toBoundary: string;
  /** True when any contained commit is breaking */
  readonly hasBreaking: boolean;
  /** Commits keyed by type, each list in traversal order */
  readonly commitsByType: ReadonlyMap<string, readonly Commit[]>;
  /** Distinct contributors keyed by mail, in traversal order */
  readonly contributors: ReadonlyMap<string, Author>;
}

/**
 * The three successor versions of a segment's starting version, without prefix.
 */
export type VersionCandidates = Record<ReleaseType, string>;

/**
 * Version decision for a segment whose newer boundary is not tagged yet.
 */
export interface VersionProposal {
  /** Starting version without prefix (`0.0.0` when the older boundary is untagged) */
  fromVersion: string;
  /** Release type derived from the segment's commits */
  releaseType: ReleaseType;
  candidates: VersionCandidates;
}

/**
 * Display names of a segment's boundaries.
 */
export interface SegmentNames {
  fromName: string;
  toName: string;
  /** `null` when the newer boundary is already tagged and no version was computed */
  proposal: VersionProposal | null;
}
