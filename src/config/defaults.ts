/**
 * Default configuration values
 */

import type { ValidatorConfig } from './types.js';

export const DEFAULT_CONFIG: ValidatorConfig = {
  environment: 'development',
  profile: 'runtime',
  nodeTypes: [],
  credentials: undefined,
  ignore: {
    codes: [],
    categories: [],
  },
};

/**
 * A fresh copy of the defaults, safe to mutate. The environment is applied
 * later by `loadConfig` from env vars and CLI options.
 */
export function getDefaultConfig(): ValidatorConfig {
  return {
    ...DEFAULT_CONFIG,
    nodeTypes: [...DEFAULT_CONFIG.nodeTypes],
    ignore: {
      codes: [...DEFAULT_CONFIG.ignore.codes],
      categories: [...DEFAULT_CONFIG.ignore.categories],
    },
  };
}
