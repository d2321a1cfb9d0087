/**
 * Configuration types for the validator CLI and API helpers
 */

import type { Environment, FalsePositiveCategory, ValidationProfile } from '../constants.js';

/**
 * Complete validator configuration
 */
export interface ValidatorConfig {
  /** Target environment; credential errors are warnings outside production */
  environment: Environment;

  /** Which checks run and how warnings are treated */
  profile: ValidationProfile;

  /** Node type catalog files loaded on top of the built-in catalog */
  nodeTypes: string[];

  /** Credential inventory file; existence checks are skipped without one */
  credentials?: string;

  /** Warnings to suppress */
  ignore: IgnoreConfig;
}

export interface IgnoreConfig {
  codes: string[];
  categories: FalsePositiveCategory[];
}

/**
 * Partial configuration (for merging)
 */
export type PartialValidatorConfig = Partial<Omit<ValidatorConfig, 'ignore'>> & {
  ignore?: Partial<IgnoreConfig>;
};

/**
 * CLI options that override config
 */
export interface CliConfigOverrides {
  env?: Environment;
  profile?: ValidationProfile;
  nodeTypes?: string[];
  credentials?: string;
  ignore?: string[];
  ignoreCategory?: FalsePositiveCategory[];
}
