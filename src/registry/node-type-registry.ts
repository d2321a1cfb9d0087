/**
 * Node type registry
 *
 * Holds the node type schemas the validator checks configurations against.
 * The built-in catalog covers common core and LangChain nodes; callers add
 * their own (community nodes, newer versions) with `register` / `loadFromFile`.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  AI_CONNECTION_TYPES,
  MAIN_CONNECTION_TYPE,
  NODE_TYPE_PATTERN,
  SHORT_PACKAGE_PREFIXES,
} from '../constants.js';
import { ConfigError, getErrorMessage } from '../utils/error-utils.js';
import { findClosestMatches } from '../utils/string-distance.js';
import {
  getRequiredProperties,
  getVisibleProperties,
  type TVisibilityContext,
} from './display-options.js';
import type { TNodeTypeSchema, TPropertySchema, TTypeResolution } from './types.js';

const BUILTIN_CATALOG_PATH = fileURLToPath(new URL('../../data/node-types.json', import.meta.url));

const connectionTypeSchema = z.union([z.literal(MAIN_CONNECTION_TYPE), z.enum(AI_CONNECTION_TYPES)]);

const displayOptionsSchema = z.object({
  show: z.record(z.array(z.unknown())).optional(),
  hide: z.record(z.array(z.unknown())).optional(),
});

const propertySchema = z.object({
  name: z.string().min(1),
  displayName: z.string().optional(),
  type: z.enum([
    'string',
    'number',
    'boolean',
    'options',
    'multiOptions',
    'collection',
    'fixedCollection',
    'json',
    'dateTime',
    'color',
    'resourceLocator',
    'notice',
  ]),
  required: z.boolean().optional(),
  default: z.unknown().optional(),
  options: z
    .array(z.object({ name: z.string(), value: z.union([z.string(), z.number(), z.boolean()]) }))
    .optional(),
  displayOptions: displayOptionsSchema.optional(),
  deprecated: z.boolean().optional(),
});

const nodeTypeSchema = z.object({
  type: z.string().regex(NODE_TYPE_PATTERN, 'must look like <package>.<camelCase>'),
  displayName: z.string(),
  versions: z.array(z.number().positive()).min(1),
  isTrigger: z.boolean().optional(),
  inputs: z.array(connectionTypeSchema),
  outputs: z.array(connectionTypeSchema),
  requiredInputs: z.array(connectionTypeSchema).optional(),
  properties: z.array(propertySchema),
  credentials: z
    .array(
      z.object({
        name: z.string().min(1),
        required: z.boolean().optional(),
        displayOptions: displayOptionsSchema.optional(),
      })
    )
    .optional(),
});

const catalogSchema = z.object({ nodeTypes: z.array(nodeTypeSchema) });

/**
 * Parse a catalog document (`{ nodeTypes: [...] }`) into schemas.
 * Throws ConfigError naming the first offending path.
 */
export function parseNodeTypeCatalog(data: unknown, source = 'node type catalog'): TNodeTypeSchema[] {
  const result = catalogSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigError(`Invalid ${source}${where}: ${issue.message}`, source);
  }
  return result.data.nodeTypes;
}

export class NodeTypeRegistry {
  private readonly schemas = new Map<string, TNodeTypeSchema>();

  constructor(schemas: Iterable<TNodeTypeSchema> = []) {
    for (const schema of schemas) {
      this.register(schema);
    }
  }

  /** Registry preloaded with the built-in catalog */
  static withBuiltins(): NodeTypeRegistry {
    const registry = new NodeTypeRegistry();
    registry.loadFromFile(BUILTIN_CATALOG_PATH);
    return registry;
  }

  /** Add or replace a schema; later registrations win */
  register(schema: TNodeTypeSchema): void {
    this.schemas.set(schema.type, schema);
  }

  loadFromFile(filePath: string): TNodeTypeSchema[] {
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Cannot read node types from ${filePath}: ${getErrorMessage(error)}`, filePath, {
        cause: error,
      });
    }
    const schemas = parseNodeTypeCatalog(data, filePath);
    schemas.forEach((schema) => this.register(schema));
    return schemas;
  }

  get(type: string): TNodeTypeSchema | undefined {
    return this.schemas.get(type);
  }

  has(type: string): boolean {
    return this.schemas.has(type);
  }

  get types(): string[] {
    return [...this.schemas.keys()];
  }

  get size(): number {
    return this.schemas.size;
  }

  /**
   * Resolve a raw type string from a workflow.
   *
   * Short prefixes (`nodes-base.set`) are recognised but reported: the n8n
   * API rejects them, so the caller must emit the canonical name.
   */
  resolve(type: string): TTypeResolution {
    const schema = this.schemas.get(type);
    if (schema) {
      return { kind: 'found', schema };
    }

    const dot = type.lastIndexOf('.');
    if (dot > 0) {
      const prefix = type.slice(0, dot);
      const canonicalPackage = SHORT_PACKAGE_PREFIXES[prefix];
      if (canonicalPackage) {
        const canonicalType = `${canonicalPackage}${type.slice(dot)}`;
        return { kind: 'short-prefix', canonicalType, schema: this.schemas.get(canonicalType) };
      }
    }

    if (!NODE_TYPE_PATTERN.test(type)) {
      return { kind: 'invalid-format' };
    }

    return { kind: 'unknown', suggestions: findClosestMatches(type, this.schemas.keys()) };
  }

  getVisibleProperties(
    type: string,
    parameters: Record<string, unknown>,
    typeVersion?: number
  ): TPropertySchema[] {
    const ctx = this.contextFor(type, parameters, typeVersion);
    return ctx ? getVisibleProperties(ctx) : [];
  }

  /**
   * Properties required for the given configuration, e.g. for Slack with
   * `{ resource: 'message', operation: 'post', select: 'channel' }` this
   * includes `channelId`.
   */
  getRequiredProperties(
    type: string,
    parameters: Record<string, unknown>,
    typeVersion?: number
  ): TPropertySchema[] {
    const ctx = this.contextFor(type, parameters, typeVersion);
    return ctx ? getRequiredProperties(ctx) : [];
  }

  private contextFor(
    type: string,
    parameters: Record<string, unknown>,
    typeVersion?: number
  ): TVisibilityContext | undefined {
    const schema = this.schemas.get(type);
    return schema ? { schema, parameters, typeVersion } : undefined;
  }
}

let builtinRegistry: NodeTypeRegistry | undefined;

/** Shared registry over the built-in catalog, loaded on first use */
export function getBuiltinRegistry(): NodeTypeRegistry {
  builtinRegistry ??= NodeTypeRegistry.withBuiltins();
  return builtinRegistry;
}
