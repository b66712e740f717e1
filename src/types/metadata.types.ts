import type { Config } from '@/types/config.types';

/**
 * Metadata definition for GitHub Action inputs that enables dynamic configuration mapping.
 *
 * Each entry maps one input declared in action.yml onto a property of {@link Config} and tells
 * `createConfigFromInputs()` how to read it.
 *
 * @see {@link https://docs.github.com/en/actions/reference/metadata-syntax-for-github-actions#inputs} GitHub Actions input reference
 */
export interface ActionInputMetadata {
  /**
   * The config property name this input maps to.
   */
  configKey: keyof Config;

  /**
   * Whether this input is required by the GitHub Action.
   * When true, the action will fail if the input is not provided.
   */
  required: boolean;

  /**
   * The expected data type of the input.
   * - 'string': Direct string value, trimmed
   * - 'boolean': Parsed using getBooleanInput for proper true/false handling
   */
  type: 'string' | 'boolean';
}
