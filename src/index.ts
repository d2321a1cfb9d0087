/**
 * n8n-graph-validator
 *
 * Static validation of n8n workflow graphs: node types, properties,
 * expressions, credentials, connections and AI wiring.
 */

// Library API
export * from './api/index.js';
export { WorkflowValidator, validator, type TValidateOptions, type TNodeValidationResult } from './validator.js';

// Workflow model
export type {
  TWorkflow,
  TNode,
  TCredentialReference,
  TConnection,
  TValidationError,
  TValidationStatistics,
  TWorkflowValidationResult,
  TValidationRule,
  TRuleContext,
} from './ast/types.js';

// Node type schemas
export { NodeTypeRegistry, getBuiltinRegistry, parseNodeTypeCatalog } from './registry/node-type-registry.js';
export { getVisibleProperties, getRequiredProperties, isPropertyVisible } from './registry/display-options.js';
export type * from './registry/types.js';

// Credentials
export { CredentialStore, type TCredentialRecord } from './credentials/credential-store.js';

// Expressions
export {
  validateExpressionValue,
  validateParameterExpressions,
  type TExpressionIssue,
  type TExpressionIssueCode,
} from './expressions/expression-validator.js';

// Classification
export { classifyDiagnostics, type TIgnoreOptions } from './validation/false-positives.js';
export { aiValidationRules } from './validation/ai-rules.js';

// Friendly errors
export { getFriendlyError, getFriendlyErrorCodes, formatFriendlyDiagnostics, type TFriendlyError } from './friendly-errors.js';

// Docs lint
export { checkNodeTypeReferences, scanExampleFile, lintDocument, type TDocLintIssue } from './docs-lint/index.js';

// Configuration
export * from './config/index.js';

// Errors
export { WorkflowFileError, ConfigError, getErrorMessage } from './utils/error-utils.js';

export * from './constants.js';
