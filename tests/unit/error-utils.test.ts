/**
 * Tests for error-utils.ts
 */

import { ConfigError, WorkflowFileError, getErrorMessage } from '../../src/utils/error-utils.js';

describe('getErrorMessage', () => {
  it('should extract message from Error instance', () => {
    expect(getErrorMessage(new TypeError('Cannot read property'))).toBe('Cannot read property');
  });

  it('should stringify non-Error values', () => {
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(null)).toBe('null');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });
});

describe('WorkflowFileError', () => {
  it('should keep the file path and cause', () => {
    const cause = new SyntaxError('Unexpected token');
    const error = new WorkflowFileError('Invalid JSON in flow.json: Unexpected token', 'flow.json', { cause });

    expect(error.name).toBe('WorkflowFileError');
    expect(error.filePath).toBe('flow.json');
    expect(error.cause).toBe(cause);
  });

  it('should recognize instances and look-alikes', () => {
    const lookAlike = new Error('copied across realms');
    lookAlike.name = 'WorkflowFileError';

    expect(WorkflowFileError.isWorkflowFileError(new WorkflowFileError('x', 'a.json'))).toBe(true);
    expect(WorkflowFileError.isWorkflowFileError(lookAlike)).toBe(true);
    expect(WorkflowFileError.isWorkflowFileError(new Error('other'))).toBe(false);
    expect(WorkflowFileError.isWorkflowFileError('WorkflowFileError')).toBe(false);
  });
});

describe('ConfigError', () => {
  it('should name its source', () => {
    const error = new ConfigError('Invalid NGV_PROFILE "loose"', 'NGV_PROFILE');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigError');
    expect(error.source).toBe('NGV_PROFILE');
  });
});
