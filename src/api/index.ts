/**
 * @module api
 *
 * ## Parse → Validate pipeline
 *
 * ```
 * workflow JSON
 *       ↓
 *   parseWorkflow()     → TWorkflow
 *       ↓
 *   validateWorkflow()  → TWorkflowValidationResult
 * ```
 *
 * `validateWorkflow()` runs both steps; `validateWorkflowFile()` also reads the file.
 */

export { validateWorkflow, validateWorkflowFile, validateNode } from './validate.js';
export { parseWorkflow, type TParseResult } from '../parser.js';
