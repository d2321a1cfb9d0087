/**
 * Utility functions for consistent error handling across the codebase.
 */

/**
 * Extracts a string message from any error value.
 * Handles Error instances, strings, numbers, null, undefined, and objects.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Thrown when a workflow file cannot be read or is not valid JSON.
 * Validation findings are never thrown; they are returned as diagnostics.
 */
export class WorkflowFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'WorkflowFileError';
  }

  static isWorkflowFileError(error: unknown): error is WorkflowFileError {
    return (
      error instanceof WorkflowFileError ||
      (error instanceof Error && error.name === 'WorkflowFileError')
    );
  }
}

/**
 * Thrown when a configuration, node type schema or credential file is invalid.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
