import type { Config } from '@/types';
import { createConfigFromInputs } from '@/utils/metadata';
import { endGroup, info, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * Resets the singleton so that the next config access reads the (mocked) inputs again.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different config variations
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

/**
 * Lazy-initialized configuration object. This is kept separate from the exported
 * config to allow testing utilities to be imported without triggering initialization.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    const instance = createConfigFromInputs();

    // Required inputs are already non-empty; the prefix is optional but is used verbatim in tag names
    if (/\s/.test(instance.tagPrefix)) {
      throw new TypeError(`Tag prefix cannot contain whitespace. Got: '${instance.tagPrefix}'`);
    }

    info(`From: ${instance.from || '(latest tag)'}`);
    info(`To: ${instance.to}`);
    info(`Tag Prefix: ${instance.tagPrefix}`);
    info(`Remote: ${instance.remote}`);
    info(`Path: ${instance.path}`);
    info(`Changelog File: ${instance.changelogFile || '(disabled)'}`);
    info(`Use Emoji: ${instance.useEmoji}`);
    info(`Release Type: ${instance.releaseType || '(from commits)'}`);

    configInstance = instance;
    return configInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}

// Property access on `config` reads through to the lazily initialized instance
export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return getConfig()[prop as keyof Config];
  },
});
