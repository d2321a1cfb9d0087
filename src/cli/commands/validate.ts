/**
 * Validate command - validates n8n workflow JSON files
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { validateWorkflowFile } from '../../api/index.js';
import type { TValidationError, TWorkflowValidationResult } from '../../ast/types.js';
import { createValidateOptions, loadConfig, parseEnvironment, parseProfile } from '../../config/loader.js';
import type { CliConfigOverrides } from '../../config/types.js';
import {
  ENVIRONMENTS,
  FALSE_POSITIVE_CATEGORIES,
  VALIDATION_PROFILES,
  isFalsePositiveCategory,
  type FalsePositiveCategory,
} from '../../constants.js';
import { formatFriendlyDiagnostics } from '../../friendly-errors.js';
import { ConfigError, getErrorMessage } from '../../utils/error-utils.js';
import { logger } from '../utils/logger.js';

export interface ValidateOptions {
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  strict?: boolean;
  profile?: string;
  env?: string;
  nodeTypes?: string[];
  credentials?: string;
  ignore?: string[];
  ignoreCategory?: string[];
  config?: string;
}

interface JsonValidationItem {
  message: string;
  severity: 'error' | 'warning';
  code: string;
  node?: string;
  property?: string;
  falsePositive?: string;
}

interface JsonValidationResult {
  file: string;
  valid: boolean;
  errors: JsonValidationItem[];
  warnings: JsonValidationItem[];
  suppressed: number;
}

/**
 * Map CLI flags onto config overrides. `--strict` is shorthand for
 * `--profile strict` and loses to an explicit profile.
 */
export function toConfigOverrides(options: ValidateOptions): CliConfigOverrides {
  const overrides: CliConfigOverrides = {};

  if (options.env) {
    overrides.env = parseEnvironment(options.env);
    if (!overrides.env) {
      throw new ConfigError(`Invalid --env "${options.env}"; expected one of ${ENVIRONMENTS.join(', ')}`, '--env');
    }
  }

  if (options.profile) {
    overrides.profile = parseProfile(options.profile);
    if (!overrides.profile) {
      throw new ConfigError(
        `Invalid --profile "${options.profile}"; expected one of ${VALIDATION_PROFILES.join(', ')}`,
        '--profile'
      );
    }
  } else if (options.strict) {
    overrides.profile = 'strict';
  }

  if (options.nodeTypes) overrides.nodeTypes = options.nodeTypes;
  if (options.credentials) overrides.credentials = options.credentials;
  if (options.ignore) overrides.ignore = options.ignore;

  if (options.ignoreCategory) {
    const categories: FalsePositiveCategory[] = [];
    for (const category of options.ignoreCategory) {
      if (!isFalsePositiveCategory(category)) {
        throw new ConfigError(
          `Invalid --ignore-category "${category}"; expected one of ${FALSE_POSITIVE_CATEGORIES.join(', ')}`,
          '--ignore-category'
        );
      }
      categories.push(category);
    }
    overrides.ignoreCategory = categories;
  }

  return overrides;
}

/**
 * Expand a file, directory or glob into workflow JSON files
 */
export async function findWorkflowFiles(input: string): Promise<string[]> {
  let pattern = input;
  if (fs.existsSync(input) && fs.statSync(input).isDirectory()) {
    pattern = path.join(input, '**/*.json');
  }

  // glob patterns always use forward slashes
  const matches = await glob(pattern.split(path.sep).join('/'), { absolute: true, nodir: true });
  return matches.filter((file) => file.endsWith('.json')).sort();
}

function toJsonItem(diagnostic: TValidationError): JsonValidationItem {
  return {
    message: diagnostic.message,
    severity: diagnostic.type,
    code: diagnostic.code,
    ...(diagnostic.node !== undefined && { node: diagnostic.node }),
    ...(diagnostic.property !== undefined && { property: diagnostic.property }),
    ...(diagnostic.falsePositive !== undefined && { falsePositive: diagnostic.falsePositive }),
  };
}

export async function validateCommand(input: string, options: ValidateOptions = {}): Promise<void> {
  const { verbose = false, quiet = false, json = false } = options;

  try {
    const config = loadConfig(toConfigOverrides(options), options.config);
    const validateOptions = createValidateOptions(config);

    const files = await findWorkflowFiles(input);
    if (files.length === 0) {
      if (json) {
        logger.json({ error: `No workflow files found matching: ${input}` });
      } else {
        logger.error(`No workflow files found matching: ${input}`);
      }
      process.exitCode = 1;
      return;
    }

    if (!json) {
      logger.section('Validating Workflows');
      logger.info(`Found ${files.length} file(s)`);
      logger.debug(`Environment: ${config.environment}, profile: ${config.profile}`);
      logger.newline();
    }

    let totalErrors = 0;
    let totalWarnings = 0;
    let validFiles = 0;
    const jsonResults: JsonValidationResult[] = [];

    for (let i = 0; i < files.length; i++) {
      const file = files[i];
      const fileName = path.basename(file);

      if (!json) {
        logger.progress(i + 1, files.length, fileName);
      }

      let result: TWorkflowValidationResult;
      try {
        result = validateWorkflowFile(file, validateOptions);
      } catch (error) {
        if (json) {
          jsonResults.push({
            file,
            valid: false,
            errors: [{ message: getErrorMessage(error), severity: 'error', code: 'FILE_ERROR' }],
            warnings: [],
            suppressed: 0,
          });
        } else {
          logger.error(`Failed to validate ${fileName}: ${getErrorMessage(error)}`);
        }
        totalErrors++;
        continue;
      }

      totalErrors += result.errors.length;
      totalWarnings += result.warnings.length;
      if (result.valid) validFiles++;

      if (json) {
        jsonResults.push({
          file,
          valid: result.valid,
          errors: result.errors.map(toJsonItem),
          warnings: result.warnings.map(toJsonItem),
          suppressed: result.suppressed.length,
        });
        continue;
      }

      if (result.errors.length > 0) {
        logger.error(`Validation errors in ${fileName}:`);
        logger.log(formatFriendlyDiagnostics(result.errors));
      }

      if (result.warnings.length > 0 && !quiet) {
        logger.warn(`Warnings in ${fileName}:`);
        logger.log(formatFriendlyDiagnostics(result.warnings));
      }

      if (verbose) {
        const { statistics } = result;
        logger.log(
          `  ${statistics.totalNodes} node(s), ${statistics.validConnections} valid connection(s), ` +
            `${statistics.expressionsValidated} expression(s), ${result.suppressed.length} suppressed`
        );
        if (result.valid) {
          logger.success(`  ${fileName} is valid`);
        }
      }
    }

    if (json) {
      logger.json({
        valid: totalErrors === 0,
        totalFiles: files.length,
        validFiles,
        totalErrors,
        totalWarnings,
        results: jsonResults,
      });
    } else {
      logger.newline();
      logger.section('Validation Summary');
      logger.success(`${validFiles} of ${files.length} file(s) valid`);

      if (totalWarnings > 0 && !quiet) {
        logger.warn(`${totalWarnings} warning(s) found`);
      }

      if (totalErrors > 0) {
        logger.error(`${totalErrors} error(s) found`);
      } else {
        logger.success('All workflows are valid!');
      }
    }

    if (totalErrors > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (json) {
      logger.json({ error: getErrorMessage(error) });
    } else {
      logger.error(`Validation failed: ${getErrorMessage(error)}`);
    }
    process.exitCode = 1;
  }
}
