import type { Config } from '@/types';

/**
 * Configuration interface with added utility methods
 */
interface ConfigWithMethods extends Config {
  set: (overrides: Partial<Config>) => void;
  resetDefaults: () => void;
}

/**
 * Default configuration object.
 */
const defaultConfig: Config = {
  from: '',
  to: 'HEAD',
  tagPrefix: 'v',
  remote: 'origin',
  path: '.',
  githubToken: 'test-token',
  changelogFile: '',
  useEmoji: false,
  releaseType: '',
};

// Store the actual configuration data
let currentConfig: Config = { ...defaultConfig };

/**
 * Config proxy handler. Reads go to the current configuration; `set()` and `resetDefaults()`
 * change it between tests.
 */
const configProxyHandler: ProxyHandler<ConfigWithMethods> = {
  get(_target: ConfigWithMethods, prop: string | symbol): unknown {
    if (prop === 'set') {
      return (overrides: Partial<Config> = {}) => {
        currentConfig = { ...currentConfig, ...overrides };
      };
    }
    if (prop === 'resetDefaults') {
      return () => {
        currentConfig = { ...defaultConfig };
      };
    }
    if (typeof prop === 'string' && prop in currentConfig) {
      return currentConfig[prop as keyof Config];
    }

    return undefined;
  },
};

/**
 * Returns the current configuration.
 */
export function getConfig(): Config {
  return currentConfig;
}

/**
 * No-op counterpart of the real module's cache reset.
 */
export function clearConfigForTesting(): void {}

/**
 * Create and export the config object directly with the proxy
 */
export const config: ConfigWithMethods = new Proxy({} as ConfigWithMethods, configProxyHandler);
