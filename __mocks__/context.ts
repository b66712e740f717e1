import { createOctokitStub } from '@/tests/helpers/octokit';
import type { OctokitStub } from '@/tests/helpers/octokit';
import type { Context } from '@/types';

/**
 * Context interface with added utility methods
 */
export interface ContextWithMethods extends Context {
  set: (overrides?: Partial<Context>) => void;
  reset: () => void;
  /** Replaces the Octokit client with a fresh in-process stub and returns the stub */
  useOctokitStub: () => OctokitStub;
}

/**
 * Default context values
 */
function createDefaultContext(): Context {
  return {
    octokit: createOctokitStub().octokit,
    serverHost: 'github.com',
    workspaceDir: '/workspace',
    repositoryDir: '/workspace',
  };
}

// Store the current context configuration
let currentContext: Context = createDefaultContext();

/**
 * Context proxy handler
 */
const contextProxyHandler: ProxyHandler<ContextWithMethods> = {
  get(_target: ContextWithMethods, prop: string | symbol): unknown {
    if (prop === 'set') {
      return (overrides: Partial<Context> = {}) => {
        currentContext = { ...currentContext, ...overrides };
      };
    }
    if (prop === 'reset') {
      return () => {
        currentContext = createDefaultContext();
      };
    }
    if (prop === 'useOctokitStub') {
      return () => {
        const stub = createOctokitStub();
        currentContext = { ...currentContext, octokit: stub.octokit };
        return stub;
      };
    }
    if (typeof prop === 'string' && prop in currentContext) {
      return currentContext[prop as keyof Context];
    }

    return undefined;
  },
};

/**
 * Create and export the context mock directly with the proxy
 */
export const context = new Proxy({} as ContextWithMethods, contextProxyHandler);

/**
 * Returns the current context configuration
 */
export function getContext(): Context {
  return currentContext;
}

/**
 * No-op counterpart of the real module's cache reset.
 */
export function clearContextForTesting(): void {}
