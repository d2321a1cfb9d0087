export { loadConfig, loadConfigFromPath, createValidateOptions, parseEnvironment, parseProfile, CONFIG_FILE_NAMES } from './loader.js';
export { DEFAULT_CONFIG, getDefaultConfig } from './defaults.js';
export type { ValidatorConfig, PartialValidatorConfig, IgnoreConfig, CliConfigOverrides } from './types.js';
