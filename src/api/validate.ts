/**
 * Public API wrapper for workflow validation
 *
 * Parses the raw document first, then hands the normalized workflow to
 * the shared WorkflowValidator.
 */

import * as fs from 'fs';
import type { TNode, TWorkflowValidationResult } from '../ast/types.js';
import { parseWorkflow } from '../parser.js';
import { getErrorMessage, WorkflowFileError } from '../utils/error-utils.js';
import { validator, type TNodeValidationResult, type TValidateOptions } from '../validator.js';

const EMPTY_STATISTICS = {
  totalNodes: 0,
  enabledNodes: 0,
  triggerNodes: 0,
  validConnections: 0,
  invalidConnections: 0,
  expressionsValidated: 0,
} as const;

/**
 * Validates a workflow document (usually `JSON.parse` output).
 *
 * A document that does not have the workflow shape yields `MALFORMED_WORKFLOW`
 * errors and no further checks.
 */
export function validateWorkflow(input: unknown, options: TValidateOptions = {}): TWorkflowValidationResult {
  const parsed = parseWorkflow(input);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.errors,
      warnings: [],
      suppressed: [],
      statistics: { ...EMPTY_STATISTICS },
    };
  }
  return validator.validate(parsed.workflow, options);
}

/**
 * Reads and validates a workflow JSON file.
 *
 * @throws WorkflowFileError when the file cannot be read or is not JSON
 */
export function validateWorkflowFile(filePath: string, options: TValidateOptions = {}): TWorkflowValidationResult {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new WorkflowFileError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, filePath, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new WorkflowFileError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`, filePath, { cause: error });
  }

  return validateWorkflow(data, options);
}

/**
 * Validates one node without graph context: type, typeVersion, properties,
 * expressions and credentials.
 */
export function validateNode(node: TNode, options: TValidateOptions = {}): TNodeValidationResult {
  return validator.validateNode(node, options);
}
