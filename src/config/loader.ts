/**
 * Configuration loader
 *
 * Loads configuration from files, environment variables, and CLI arguments,
 * merging them in order of precedence.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'js-yaml';
import { z } from 'zod';
import {
  ENVIRONMENTS,
  FALSE_POSITIVE_CATEGORIES,
  VALIDATION_PROFILES,
  type Environment,
  type ValidationProfile,
} from '../constants.js';
import { CredentialStore } from '../credentials/credential-store.js';
import { NodeTypeRegistry } from '../registry/node-type-registry.js';
import { ConfigError, getErrorMessage } from '../utils/error-utils.js';
import type { TValidateOptions } from '../validator.js';
import { getDefaultConfig } from './defaults.js';
import type { CliConfigOverrides, PartialValidatorConfig, ValidatorConfig } from './types.js';

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'n8n-graph-validator.config.yaml',
  'n8n-graph-validator.config.yml',
  'n8n-graph-validator.config.json',
];

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'NGV_';

const configFileSchema = z
  .object({
    environment: z.enum(ENVIRONMENTS).optional(),
    profile: z.enum(VALIDATION_PROFILES).optional(),
    nodeTypes: z.array(z.string()).optional(),
    credentials: z.string().optional(),
    ignore: z
      .object({
        codes: z.array(z.string()).optional(),
        categories: z.array(z.enum(FALSE_POSITIVE_CATEGORIES)).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Load configuration with the following precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export function loadConfig(cliOverrides?: CliConfigOverrides, configPath?: string): ValidatorConfig {
  let config = getDefaultConfig();

  // Load config file if it exists
  const fileConfig = loadConfigFile(configPath);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  // Apply environment variable overrides
  config = mergeConfig(config, loadEnvConfig());

  // Apply CLI overrides (highest precedence)
  if (cliOverrides) {
    config = mergeConfig(config, convertCliOverrides(cliOverrides));
  }

  return config;
}

/**
 * Map an environment name or common alias to an Environment.
 * Returns undefined for values that name no environment (e.g. NODE_ENV=test).
 */
export function parseEnvironment(value: string): Environment | undefined {
  switch (value.toLowerCase()) {
    case 'production':
    case 'prod':
      return 'production';
    case 'staging':
    case 'stage':
      return 'staging';
    case 'development':
    case 'dev':
      return 'development';
    default:
      return undefined;
  }
}

export function parseProfile(value: string): ValidationProfile | undefined {
  return VALIDATION_PROFILES.find((profile) => profile === value);
}

/**
 * Find the config file: the explicit path, or the first default name in cwd
 */
function loadConfigFile(configPath?: string): PartialValidatorConfig | null {
  if (configPath) {
    const absolutePath = path.resolve(configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError(`Config file not found: ${absolutePath}`, absolutePath);
    }
    return loadConfigFromPath(absolutePath);
  }

  // Search for config file in current directory
  const cwd = process.cwd();
  for (const fileName of CONFIG_FILE_NAMES) {
    const configFilePath = path.join(cwd, fileName);
    if (fs.existsSync(configFilePath)) {
      return loadConfigFromPath(configFilePath);
    }
  }

  return null;
}

/**
 * Load configuration from a specific file path. Relative catalog and
 * credential paths are resolved against the file's directory.
 */
export function loadConfigFromPath(filePath: string): PartialValidatorConfig {
  let data: unknown;
  try {
    // JSON is a subset of YAML, so one parser covers every supported extension
    data = YAML.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${getErrorMessage(error)}`, filePath, {
      cause: error,
    });
  }

  const parsed = configFileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigError(`Invalid config file ${filePath}${where}: ${issue.message}`, filePath);
  }

  const baseDir = path.dirname(filePath);
  const { nodeTypes, credentials, ...rest } = parsed.data;
  return {
    ...rest,
    nodeTypes: nodeTypes?.map((file) => path.resolve(baseDir, file)),
    credentials: credentials === undefined ? undefined : path.resolve(baseDir, credentials),
  };
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(): PartialValidatorConfig {
  const config: PartialValidatorConfig = {};

  const explicitEnv = process.env[`${ENV_PREFIX}ENV`];
  if (explicitEnv) {
    const environment = parseEnvironment(explicitEnv);
    if (!environment) {
      throw new ConfigError(
        `Invalid ${ENV_PREFIX}ENV "${explicitEnv}"; expected one of ${ENVIRONMENTS.join(', ')}`,
        `${ENV_PREFIX}ENV`
      );
    }
    config.environment = environment;
  } else if (process.env.NODE_ENV) {
    config.environment = parseEnvironment(process.env.NODE_ENV);
  }

  const profile = process.env[`${ENV_PREFIX}PROFILE`];
  if (profile) {
    config.profile = parseProfile(profile);
    if (!config.profile) {
      throw new ConfigError(
        `Invalid ${ENV_PREFIX}PROFILE "${profile}"; expected one of ${VALIDATION_PROFILES.join(', ')}`,
        `${ENV_PREFIX}PROFILE`
      );
    }
  }

  const nodeTypes = process.env[`${ENV_PREFIX}NODE_TYPES`];
  if (nodeTypes) {
    config.nodeTypes = nodeTypes
      .split(',')
      .map((file) => file.trim())
      .filter((file) => file.length > 0);
  }

  const credentials = process.env[`${ENV_PREFIX}CREDENTIALS`];
  if (credentials) {
    config.credentials = credentials;
  }

  return config;
}

/**
 * Convert CLI overrides to partial config
 */
function convertCliOverrides(overrides: CliConfigOverrides): PartialValidatorConfig {
  const config: PartialValidatorConfig = {};

  if (overrides.env) config.environment = overrides.env;
  if (overrides.profile) config.profile = overrides.profile;
  if (overrides.nodeTypes) config.nodeTypes = overrides.nodeTypes;
  if (overrides.credentials) config.credentials = overrides.credentials;

  if (overrides.ignore || overrides.ignoreCategory) {
    config.ignore = {};
    if (overrides.ignore) config.ignore.codes = overrides.ignore;
    if (overrides.ignoreCategory) config.ignore.categories = overrides.ignoreCategory;
  }

  return config;
}

function union<T>(base: T[], extra: T[] | undefined): T[] {
  return [...new Set([...base, ...(extra ?? [])])];
}

/**
 * Merge a partial config into a complete one. Scalars are replaced;
 * catalog files and ignore lists accumulate across sources.
 */
function mergeConfig(base: ValidatorConfig, override: PartialValidatorConfig): ValidatorConfig {
  return {
    environment: override.environment ?? base.environment,
    profile: override.profile ?? base.profile,
    nodeTypes: union(base.nodeTypes, override.nodeTypes),
    credentials: override.credentials ?? base.credentials,
    ignore: {
      codes: union(base.ignore.codes, override.ignore?.codes),
      categories: union(base.ignore.categories, override.ignore?.categories),
    },
  };
}

/**
 * Turn a loaded config into validator options, reading the catalog and
 * credential files it names. Throws ConfigError for unreadable files.
 */
export function createValidateOptions(config: ValidatorConfig): TValidateOptions {
  let registry: NodeTypeRegistry | undefined;
  if (config.nodeTypes.length > 0) {
    registry = NodeTypeRegistry.withBuiltins();
    for (const file of config.nodeTypes) {
      registry.loadFromFile(file);
    }
  }

  return {
    registry,
    credentials: config.credentials ? CredentialStore.loadFromFile(config.credentials) : undefined,
    environment: config.environment,
    profile: config.profile,
    ignore: {
      codes: config.ignore.codes,
      categories: config.ignore.categories,
    },
  };
}
