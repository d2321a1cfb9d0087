/**
 * Tests for the node type registry and property visibility
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { NodeTypeRegistry, getBuiltinRegistry, parseNodeTypeCatalog } from '../../../src/registry/node-type-registry.js';
import { matchesDisplayOptions } from '../../../src/registry/display-options.js';
import type { TNodeTypeSchema } from '../../../src/registry/types.js';
import { ConfigError } from '../../../src/utils/error-utils.js';

const tempDir = path.join(os.tmpdir(), `ngv-registry-test-${process.pid}`);

beforeAll(() => fs.mkdirSync(tempDir, { recursive: true }));
afterAll(() => fs.rmSync(tempDir, { recursive: true, force: true }));

const widgetSchema: TNodeTypeSchema = {
  type: 'n8n-nodes-acme.widget',
  displayName: 'Widget',
  versions: [1, 2],
  inputs: ['main'],
  outputs: ['main'],
  properties: [
    { name: 'legacyMode', type: 'boolean', default: false, displayOptions: { show: { '@version': [1] } } },
    {
      name: 'format',
      type: 'options',
      default: 'json',
      options: [
        { name: 'JSON', value: 'json' },
        { name: 'CSV', value: 'csv' },
      ],
      displayOptions: { hide: { '@version': [1] } },
    },
  ],
};

function names(properties: Array<{ name: string }>): string[] {
  return properties.map((p) => p.name);
}

describe('NodeTypeRegistry', () => {
  describe('built-in catalog', () => {
    it('should load every built-in schema', () => {
      const registry = getBuiltinRegistry();

      expect(registry.size).toBe(24);
      expect(registry.has('n8n-nodes-base.httpRequest')).toBe(true);
      expect(registry.has('@n8n/n8n-nodes-langchain.agent')).toBe(true);
    });

    it('should share one built-in registry', () => {
      expect(getBuiltinRegistry()).toBe(getBuiltinRegistry());
    });

    it('should give each withBuiltins() call its own registry', () => {
      const a = NodeTypeRegistry.withBuiltins();
      a.register(widgetSchema);

      expect(NodeTypeRegistry.withBuiltins().has(widgetSchema.type)).toBe(false);
      expect(getBuiltinRegistry().has(widgetSchema.type)).toBe(false);
    });
  });

  describe('resolve', () => {
    const registry = getBuiltinRegistry();

    it('should find a canonical type', () => {
      const resolution = registry.resolve('n8n-nodes-base.set');

      expect(resolution.kind).toBe('found');
    });

    it('should map a short prefix to the canonical package', () => {
      const resolution = registry.resolve('nodes-base.set');

      expect(resolution).toEqual({
        kind: 'short-prefix',
        canonicalType: 'n8n-nodes-base.set',
        schema: registry.get('n8n-nodes-base.set'),
      });
    });

    it('should map the short LangChain prefix', () => {
      const resolution = registry.resolve('nodes-langchain.agent');

      expect(resolution.kind).toBe('short-prefix');
      if (resolution.kind !== 'short-prefix') return;
      expect(resolution.canonicalType).toBe('@n8n/n8n-nodes-langchain.agent');
    });

    it('should flag a type without a package', () => {
      expect(registry.resolve('httpRequest').kind).toBe('invalid-format');
    });

    it('should suggest the closest known type', () => {
      const resolution = registry.resolve('n8n-nodes-base.httpRequets');

      expect(resolution.kind).toBe('unknown');
      if (resolution.kind !== 'unknown') return;
      expect(resolution.suggestions[0]).toBe('n8n-nodes-base.httpRequest');
    });
  });

  describe('getRequiredProperties', () => {
    const registry = getBuiltinRegistry();
    const slack = 'n8n-nodes-base.slack';

    it('should follow the resource/operation chain for Slack message posts', () => {
      const required = registry.getRequiredProperties(slack, {
        resource: 'message',
        operation: 'post',
        select: 'channel',
      });

      expect(names(required)).toEqual(['select', 'channelId', 'text']);
    });

    it('should use defaults for unset gate properties', () => {
      expect(names(registry.getRequiredProperties(slack, {}))).toEqual(['select', 'text']);
    });

    it('should switch to the operation list of another resource', () => {
      const required = registry.getRequiredProperties(slack, { resource: 'channel', operation: 'create' });

      expect(names(required)).toEqual(['channelName']);
    });

    it('should treat an expression gate as satisfiable', () => {
      const required = registry.getRequiredProperties(slack, {
        resource: 'message',
        operation: 'post',
        select: '={{ $json.target }}',
      });

      expect(names(required)).toEqual(['select', 'channelId', 'user', 'text']);
    });

    it('should return nothing for an unknown type', () => {
      expect(registry.getRequiredProperties('n8n-nodes-base.nope', {})).toEqual([]);
    });
  });

  describe('getVisibleProperties', () => {
    const registry = new NodeTypeRegistry([widgetSchema]);

    it('should evaluate @version gates', () => {
      expect(names(registry.getVisibleProperties(widgetSchema.type, {}, 1))).toEqual(['legacyMode']);
      expect(names(registry.getVisibleProperties(widgetSchema.type, {}, 2))).toEqual(['format']);
    });

    it('should use the latest version when none is given', () => {
      expect(names(registry.getVisibleProperties(widgetSchema.type, {}))).toEqual(['format']);
    });

    it('should close cyclic gates instead of looping', () => {
      const cyclic = new NodeTypeRegistry([
        {
          ...widgetSchema,
          type: 'n8n-nodes-acme.cyclic',
          properties: [
            { name: 'a', type: 'string', displayOptions: { show: { b: ['x'] } } },
            { name: 'b', type: 'string', displayOptions: { show: { a: ['y'] } } },
          ],
        },
      ]);

      expect(cyclic.getVisibleProperties('n8n-nodes-acme.cyclic', {})).toEqual([]);
    });
  });

  describe('loadFromFile', () => {
    it('should register every schema in a catalog file', () => {
      const file = path.join(tempDir, 'widgets.json');
      fs.writeFileSync(file, JSON.stringify({ nodeTypes: [widgetSchema] }));
      const registry = new NodeTypeRegistry();

      const loaded = registry.loadFromFile(file);

      expect(loaded).toHaveLength(1);
      expect(registry.get('n8n-nodes-acme.widget')?.versions).toEqual([1, 2]);
    });

    it('should throw ConfigError for a missing file', () => {
      const registry = new NodeTypeRegistry();

      expect(() => registry.loadFromFile(path.join(tempDir, 'missing.json'))).toThrow(ConfigError);
    });

    it('should name the offending path of an invalid catalog', () => {
      expect(() => parseNodeTypeCatalog({ nodeTypes: [{ ...widgetSchema, type: 'Bad Type' }] }, 'custom.json')).toThrow(
        'Invalid custom.json at nodeTypes.0.type: must look like <package>.<camelCase>'
      );
    });
  });
});

describe('matchesDisplayOptions', () => {
  const schema = getBuiltinRegistry().get('n8n-nodes-base.webhook');

  it('should hide a property when a hide gate matches', () => {
    if (!schema) throw new Error('webhook schema missing');
    const ctx = { schema, parameters: { responseMode: 'responseNode' } };

    expect(matchesDisplayOptions({ hide: { responseMode: ['responseNode'] } }, ctx)).toBe(false);
    expect(matchesDisplayOptions({ hide: { responseMode: ['lastNode'] } }, ctx)).toBe(true);
  });

  it('should treat missing display options as visible', () => {
    if (!schema) throw new Error('webhook schema missing');

    expect(matchesDisplayOptions(undefined, { schema, parameters: {} })).toBe(true);
  });
});
