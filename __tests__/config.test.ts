import { clearConfigForTesting, config, getConfig } from '@/config';
import { getActionDefaults } from '@/tests/helpers/action-defaults';
import {
  booleanInputs,
  clearEnvironmentInput,
  getConfigKey,
  optionalInputs,
  requiredInputs,
  setupTestInputs,
} from '@/tests/helpers/inputs';
import { endGroup, getBooleanInput, getInput, info, startGroup } from '@actions/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';

// We globally mock config to facilitate majority of testing; however,
// this test case needs to explicitly test core functionality so we reset the
// mock implementation for this test.
vi.unmock('@/config');

describe('config', () => {
  beforeEach(() => {
    // The config is cached. To ensure each test starts with a clean slate, we implicity clear it.
    clearConfigForTesting();
    setupTestInputs();
  });

  describe('input validation', () => {
    for (const input of requiredInputs) {
      it(`should throw error when required input "${input}" is missing`, () => {
        clearEnvironmentInput(input);
        expect(() => getConfig()).toThrow(
          new Error(`Failed to process input '${input}': Input required and not supplied: ${input}`),
        );
        expect(getInput).toHaveBeenCalled();
      });
    }

    for (const input of optionalInputs) {
      it(`should handle optional input "${input}" when not present`, () => {
        clearEnvironmentInput(input);

        expect(getConfig()[getConfigKey(input)]).toBe('');
      });
    }

    for (const input of booleanInputs) {
      it(`should throw error when input "${input}" has an invalid boolean value`, () => {
        setupTestInputs({ [input]: 'invalid-boolean' });
        expect(() => getConfig()).toThrow(
          new Error(
            `Failed to process input '${input}': Input does not meet YAML 1.2 "Core Schema" specification: ${input}\nSupport boolean input list: \`true | True | TRUE | false | False | FALSE\``,
          ),
        );
        expect(getBooleanInput).toHaveBeenCalled();
      });
    }

    it('should throw error when the tag prefix contains whitespace', () => {
      setupTestInputs({ 'tag-prefix': 'release v' });
      expect(() => getConfig()).toThrow(new TypeError("Tag prefix cannot contain whitespace. Got: 'release v'"));
    });

    it('should throw error when the release type is invalid', () => {
      setupTestInputs({ 'release-type': 'breaking' });
      expect(() => getConfig()).toThrow(
        new TypeError("Invalid release-type 'breaking'. Must be one of: major, minor, patch"),
      );
    });
  });

  describe('initialization', () => {
    it('should initialize with the action defaults', () => {
      const defaults = getActionDefaults();
      setupTestInputs({
        to: defaults.to ?? null,
        'tag-prefix': defaults['tag-prefix'] ?? null,
        remote: defaults.remote ?? null,
        path: defaults.path ?? null,
        'use-emoji': defaults['use-emoji'] ?? null,
      });

      expect(getConfig()).toEqual({
        from: '',
        to: 'HEAD',
        tagPrefix: 'v',
        remote: 'origin',
        path: '.',
        githubToken: 'test-token',
        changelogFile: '',
        useEmoji: false,
        releaseType: '',
      });
    });

    it('should maintain singleton instance across calls', () => {
      const firstInstance = getConfig();
      const secondInstance = getConfig();

      expect(firstInstance).toBe(secondInstance);
      expect(startGroup).toHaveBeenCalledTimes(1);
    });

    it('should read values through the config proxy', () => {
      setupTestInputs({ from: 'v2.0.0', 'release-type': 'MAJOR' });

      expect(config.from).toBe('v2.0.0');
      expect(config.releaseType).toBe('major');
    });

    it('should log the configuration in a group', () => {
      getConfig();

      expect(startGroup).toHaveBeenCalledWith('Initializing Config');
      expect(info).toHaveBeenCalledWith('From: (latest tag)');
      expect(info).toHaveBeenCalledWith('To: HEAD');
      expect(info).toHaveBeenCalledWith('Changelog File: (disabled)');
      expect(info).toHaveBeenCalledWith('Release Type: (from commits)');
      expect(endGroup).toHaveBeenCalledTimes(1);
    });
  });
});
