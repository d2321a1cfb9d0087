/**
 * Node-info command - shows a node type's properties, optionally for a
 * given parameter configuration
 */

import { NodeTypeRegistry, getBuiltinRegistry } from '../../registry/node-type-registry.js';
import type { TNodeTypeSchema, TPropertySchema } from '../../registry/types.js';
import { ConfigError, getErrorMessage } from '../../utils/error-utils.js';
import { logger } from '../utils/logger.js';

export interface NodeInfoOptions {
  set?: string[];
  typeVersion?: number;
  nodeTypes?: string[];
  json?: boolean;
}

interface JsonProperty {
  name: string;
  displayName?: string;
  type: string;
  required: boolean;
  default?: unknown;
  options?: Array<string | number | boolean>;
}

/**
 * Parse `key=value` pairs. Values that are valid JSON (numbers, booleans,
 * objects) keep their JSON type; anything else is a string.
 */
export function parseSetOptions(pairs: string[]): Record<string, unknown> {
  const parameters: Record<string, unknown> = {};

  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new ConfigError(`Invalid --set "${pair}"; expected key=value`, '--set');
    }
    const key = pair.slice(0, eq);
    const raw = pair.slice(eq + 1);
    try {
      parameters[key] = JSON.parse(raw);
    } catch {
      parameters[key] = raw;
    }
  }

  return parameters;
}

/** Commander collector for repeatable options */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function resolveSchema(registry: NodeTypeRegistry, type: string): TNodeTypeSchema {
  const resolution = registry.resolve(type);
  switch (resolution.kind) {
    case 'found':
      return resolution.schema;
    case 'short-prefix':
      if (resolution.schema) return resolution.schema;
      throw new ConfigError(`Unknown node type "${resolution.canonicalType}"`);
    case 'unknown': {
      const hint = resolution.suggestions.length > 0 ? ` Did you mean "${resolution.suggestions[0]}"?` : '';
      throw new ConfigError(`Unknown node type "${type}".${hint}`);
    }
    case 'invalid-format':
      throw new ConfigError(`"${type}" is not a node type of the form <package>.<nodeName>`);
  }
}

function toJsonProperty(property: TPropertySchema, required: boolean): JsonProperty {
  return {
    name: property.name,
    ...(property.displayName !== undefined && { displayName: property.displayName }),
    type: property.type,
    required,
    ...(property.default !== undefined && { default: property.default }),
    ...(property.options && { options: property.options.map((option) => option.value) }),
  };
}

function describeProperty(property: TPropertySchema, required: boolean): string {
  const flags: string[] = [property.type];
  if (required) flags.push('required');
  if (property.deprecated) flags.push('deprecated');
  let line = `  ${property.name} (${flags.join(', ')})`;
  if (property.default !== undefined && property.default !== '') {
    line += ` default ${JSON.stringify(property.default)}`;
  }
  if (property.options) {
    line += ` one of ${property.options.map((option) => JSON.stringify(option.value)).join(', ')}`;
  }
  return line;
}

export function nodeInfoCommand(type: string, options: NodeInfoOptions = {}): void {
  const { json = false } = options;

  try {
    let registry = getBuiltinRegistry();
    if (options.nodeTypes && options.nodeTypes.length > 0) {
      registry = NodeTypeRegistry.withBuiltins();
      for (const file of options.nodeTypes) {
        registry.loadFromFile(file);
      }
    }

    const schema = resolveSchema(registry, type);
    const parameters = parseSetOptions(options.set ?? []);
    const typeVersion = options.typeVersion ?? Math.max(...schema.versions);

    const visible = registry.getVisibleProperties(schema.type, parameters, typeVersion);
    const required = new Set(
      registry.getRequiredProperties(schema.type, parameters, typeVersion).map((property) => property.name)
    );

    if (json) {
      logger.json({
        type: schema.type,
        displayName: schema.displayName,
        versions: schema.versions,
        typeVersion,
        inputs: schema.inputs,
        outputs: schema.outputs,
        credentials: (schema.credentials ?? []).map((credential) => credential.name),
        parameters,
        properties: visible.map((property) => toJsonProperty(property, required.has(property.name))),
      });
      return;
    }

    logger.section(`${schema.displayName} (${schema.type})`);
    logger.log(`Versions: ${schema.versions.join(', ')} (showing ${typeVersion})`);
    logger.log(`Inputs: ${schema.inputs.join(', ') || 'none'}`);
    logger.log(`Outputs: ${schema.outputs.join(', ') || 'none'}`);
    if (schema.credentials && schema.credentials.length > 0) {
      logger.log(`Credentials: ${schema.credentials.map((credential) => credential.name).join(', ')}`);
    }
    logger.newline();
    logger.log(`Properties visible for ${JSON.stringify(parameters)}:`);
    for (const property of visible) {
      logger.log(describeProperty(property, required.has(property.name)));
    }
  } catch (error) {
    if (json) {
      logger.json({ error: getErrorMessage(error) });
    } else {
      logger.error(getErrorMessage(error));
    }
    process.exitCode = 1;
  }
}
