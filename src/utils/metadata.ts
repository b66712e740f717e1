import type { ActionInputMetadata, Config } from '@/types';
import { getBooleanInput, getInput } from '@actions/core';

/**
 * Factory functions to reduce duplication in ACTION_INPUTS metadata definitions.
 */
const requiredString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'string',
});

const optionalString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'string',
});

const requiredBoolean = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'boolean',
});

/**
 * Complete mapping of all GitHub Action inputs to their metadata.
 * This is the single source of truth for input configuration.
 * Note: defaults come from action.yml at runtime
 */
export const ACTION_INPUTS: Record<string, ActionInputMetadata> = {
  from: optionalString('from'),
  to: requiredString('to'),
  'tag-prefix': optionalString('tagPrefix'),
  remote: requiredString('remote'),
  path: requiredString('path'),
  github_token: requiredString('githubToken'),
  'changelog-file': optionalString('changelogFile'),
  'use-emoji': requiredBoolean('useEmoji'),
  'release-type': optionalString('releaseType'),
} as const;

/**
 * Creates a config object by reading inputs using GitHub Actions API and converting them
 * according to the metadata definitions.
 *
 * Values are not validated here; see `initializeConfig()` in config.ts.
 */
export function createConfigFromInputs(): Config {
  const values: Record<string, string | boolean> = {};

  for (const [inputName, metadata] of Object.entries(ACTION_INPUTS)) {
    const { configKey, required, type } = metadata;

    try {
      values[configKey] = type === 'boolean' ? getBooleanInput(inputName, { required }) : getInput(inputName, { required });
    } catch (error) {
      throw new Error(
        `Failed to process input '${inputName}': ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  return {
    from: String(values.from ?? ''),
    to: String(values.to ?? ''),
    tagPrefix: String(values.tagPrefix ?? ''),
    remote: String(values.remote ?? ''),
    path: String(values.path ?? ''),
    githubToken: String(values.githubToken ?? ''),
    changelogFile: String(values.changelogFile ?? ''),
    useEmoji: values.useEmoji === true,
    releaseType: toReleaseTypeInput(String(values.releaseType ?? '')),
  };
}

/**
 * Narrows the raw `release-type` input (case-insensitive). Empty means "derive from commits".
 *
 * @throws {TypeError} When the value is not a release type.
 */
function toReleaseTypeInput(value: string): Config['releaseType'] {
  const normalized = value.toLowerCase();
  if (normalized === 'major' || normalized === 'minor' || normalized === 'patch' || normalized === '') {
    return normalized;
  }

  throw new TypeError(`Invalid release-type '${value}'. Must be one of: major, minor, patch`);
}
