import type { COMMIT_TYPE, ERROR_KIND, RELEASE_TYPE } from '@/utils/constants';

/**
 * Common types used across the application
 */

/**
 * Represents the semantic release type associated with a version bump.
 *
 * This type is derived from the `RELEASE_TYPE` constant object,
 * ensuring that only valid predefined release types can be used.
 *
 * @see {@link RELEASE_TYPE} for the available release type values
 */
export type ReleaseType = (typeof RELEASE_TYPE)[keyof typeof RELEASE_TYPE];

/**
 * A commit type token that has a dedicated changelog section.
 *
 * @see {@link COMMIT_TYPE} for the available values
 */
export type KnownCommitType = (typeof COMMIT_TYPE)[keyof typeof COMMIT_TYPE];

/**
 * Identifies the failure behind a {@link ChangelogError}.
 *
 * @see {@link ERROR_KIND} for the available values
 */
export type ErrorKind = (typeof ERROR_KIND)[keyof typeof ERROR_KIND];
