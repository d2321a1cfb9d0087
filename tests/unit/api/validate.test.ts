/**
 * Tests for the public validation API
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { validateNode, validateWorkflow, validateWorkflowFile } from '../../../src/api/index.js';
import { WorkflowFileError } from '../../../src/utils/error-utils.js';
import { makeHttpRequest } from '../../helpers/test-fixtures.js';

const FIXTURES = fileURLToPath(new URL('../../fixtures/workflows', import.meta.url));
const tempDir = path.join(os.tmpdir(), `ngv-api-test-${process.pid}`);

beforeAll(() => fs.mkdirSync(tempDir, { recursive: true }));
afterAll(() => fs.rmSync(tempDir, { recursive: true, force: true }));

describe('validateWorkflow', () => {
  it('should validate an export-shaped document', () => {
    const data: unknown = JSON.parse(fs.readFileSync(path.join(FIXTURES, 'valid-http.json'), 'utf8'));

    const result = validateWorkflow(data);

    expect(result.valid).toBe(true);
    expect(result.statistics.totalNodes).toBe(2);
    expect(result.statistics.validConnections).toBe(1);
  });

  it('should stop at malformed documents', () => {
    const result = validateWorkflow({ connections: {} });

    expect(result).toEqual({
      valid: false,
      errors: [{ type: 'error', code: 'MALFORMED_WORKFLOW', message: 'nodes: Required' }],
      warnings: [],
      suppressed: [],
      statistics: {
        totalNodes: 0,
        enabledNodes: 0,
        triggerNodes: 0,
        validConnections: 0,
        invalidConnections: 0,
        expressionsValidated: 0,
      },
    });
  });
});

describe('validateWorkflowFile', () => {
  it('should read and validate a file', () => {
    const result = validateWorkflowFile(path.join(FIXTURES, 'outdated-version.json'));

    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => w.code)).toEqual(['OUTDATED_TYPE_VERSION']);
  });

  it('should throw WorkflowFileError for a missing file', () => {
    const file = path.join(tempDir, 'missing.json');

    expect(() => validateWorkflowFile(file)).toThrow(WorkflowFileError);
    expect(() => validateWorkflowFile(file)).toThrow(`Cannot read ${file}: `);
  });

  it('should throw WorkflowFileError for invalid JSON', () => {
    const file = path.join(tempDir, 'broken.json');
    fs.writeFileSync(file, 'nodes: []');

    expect(() => validateWorkflowFile(file)).toThrow(`Invalid JSON in ${file}: `);
  });
});

describe('validateNode', () => {
  it('should validate a single node', () => {
    const result = validateNode(makeHttpRequest('HTTP Request', { method: 'FETCH' }));

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(['INVALID_OPTION_VALUE']);
  });
});
