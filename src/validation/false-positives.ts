/**
 * Post-processing of raw diagnostics: environment downgrades, ignore
 * overrides and validation profiles.
 *
 * Order:
 * 1. Outside production, credential errors become `dev-credentials` warnings.
 * 2. Warnings matching `ignore` move to `suppressed`.
 * 3. The profile runs last:
 *    - `minimal` suppresses every remaining warning
 *    - `ai-friendly` suppresses warnings that carry a false-positive category
 *    - `strict` promotes uncategorized warnings to errors
 *
 * Errors are never suppressed.
 */

import type { TValidationError } from '../ast/types.js';
import type { Environment, FalsePositiveCategory, ValidationProfile } from '../constants.js';

export type TIgnoreOptions = {
  codes?: string[];
  categories?: FalsePositiveCategory[];
};

export type TClassificationOptions = {
  environment: Environment;
  profile: ValidationProfile;
  ignore?: TIgnoreOptions;
};

export type TClassifiedDiagnostics = {
  errors: TValidationError[];
  warnings: TValidationError[];
  suppressed: TValidationError[];
};

const CREDENTIAL_CODES = new Set(['CREDENTIAL_NOT_FOUND', 'CREDENTIAL_TYPE_MISMATCH']);

function isIgnored(warning: TValidationError, ignore: TIgnoreOptions | undefined): boolean {
  if (!ignore) return false;
  if (ignore.codes?.includes(warning.code)) return true;
  return warning.falsePositive !== undefined && (ignore.categories?.includes(warning.falsePositive) ?? false);
}

export function classifyDiagnostics(
  rawErrors: TValidationError[],
  rawWarnings: TValidationError[],
  options: TClassificationOptions
): TClassifiedDiagnostics {
  const errors: TValidationError[] = [];
  let warnings: TValidationError[] = [...rawWarnings];
  const suppressed: TValidationError[] = [];

  for (const error of rawErrors) {
    if (options.environment !== 'production' && CREDENTIAL_CODES.has(error.code)) {
      warnings.push({ ...error, type: 'warning', falsePositive: 'dev-credentials' });
    } else {
      errors.push(error);
    }
  }

  warnings = warnings.filter((warning) => {
    if (!isIgnored(warning, options.ignore)) return true;
    suppressed.push(warning);
    return false;
  });

  switch (options.profile) {
    case 'minimal':
      suppressed.push(...warnings);
      warnings = [];
      break;
    case 'ai-friendly':
      warnings = warnings.filter((warning) => {
        if (!warning.falsePositive) return true;
        suppressed.push(warning);
        return false;
      });
      break;
    case 'strict':
      warnings = warnings.filter((warning) => {
        if (warning.falsePositive) return true;
        errors.push({ ...warning, type: 'error' });
        return false;
      });
      break;
    case 'runtime':
      break;
  }

  return { errors, warnings, suppressed };
}
