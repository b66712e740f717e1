import { resolve } from 'node:path';
import { config } from '@/config';
import type { Context } from '@/types';
import { endGroup, info, startGroup } from '@actions/core';
import { Octokit } from '@octokit/core';
import { restEndpointMethods } from '@octokit/plugin-rest-endpoint-methods';
import { version } from '../package.json';

// The context object will be initialized lazily
let contextInstance: Context | null = null;

const DEFAULT_SERVER_URL = 'https://github.com';
const DEFAULT_API_URL = 'https://api.github.com';

/**
 * Clears the cached context instance during testing.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different context variations
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Lazily initializes the runtime context: workspace location, repository directory and an
 * authenticated Octokit client. Unlike the config, nothing here is required; outside of a
 * workflow run the current directory and github.com are assumed.
 *
 * @returns {Context} The context object.
 */
function initializeContext(): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const workspaceDir = process.env.GITHUB_WORKSPACE || process.cwd();
    const serverUrl = process.env.GITHUB_SERVER_URL || DEFAULT_SERVER_URL;
    const apiUrl = process.env.GITHUB_API_URL || DEFAULT_API_URL;

    // Extend Octokit with REST API methods using the plugin
    const OctokitRestApi = Octokit.plugin(restEndpointMethods);

    contextInstance = {
      octokit: new OctokitRestApi({
        auth: config.githubToken ? `token ${config.githubToken}` : undefined,
        baseUrl: apiUrl,
        userAgent: `[octokit] conventional-changelog-action/${version}`,
      }),
      serverHost: new URL(serverUrl).hostname,
      workspaceDir,
      repositoryDir: resolve(workspaceDir, config.path),
    };

    info(`Server Host: ${contextInstance.serverHost}`);
    info(`API URL: ${apiUrl}`);
    info(`Workspace Directory: ${contextInstance.workspaceDir}`);
    info(`Repository Directory: ${contextInstance.repositoryDir}`);

    return contextInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the context that initializes on first use
export const getContext = (): Context => {
  return initializeContext();
};

// Property access on `context` reads through to the lazily initialized instance
export const context: Context = new Proxy({} as Context, {
  get(_target, prop) {
    return getContext()[prop as keyof Context];
  },
});
