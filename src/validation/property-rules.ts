/**
 * Node configuration checks against the node's type schema:
 * required properties, value types, option lists, unknown / hidden /
 * deprecated properties and `typeVersion`.
 */

import type { TNode, TValidationError } from '../ast/types.js';
import { EXPRESSION_PREFIX } from '../constants.js';
import { isPropertyVisible, getRequiredProperties, type TVisibilityContext } from '../registry/display-options.js';
import type { TNodeTypeSchema, TPropertySchema } from '../registry/types.js';
import { didYouMean } from '../utils/string-distance.js';

export type TPropertyCheckOptions = {
  /** Only check required properties (the `minimal` profile) */
  requiredOnly?: boolean;
  /** The node feeds an agent through an `ai_tool` edge */
  isAiTool?: boolean;
};

function isExpression(value: unknown): boolean {
  return typeof value === 'string' && value.startsWith(EXPRESSION_PREFIX);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * True for values n8n treats as "not set": missing, null, '', empty
 * collections, and resource locators without a value.
 */
export function isEmptyParameterValue(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) {
    if ('value' in value && ('__rl' in value || 'mode' in value)) {
      return isEmptyParameterValue(value.value);
    }
    return Object.keys(value).length === 0;
  }
  return false;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/** Expected-type label when `value` does not fit `property`, else undefined */
function typeMismatch(value: unknown, property: TPropertySchema): string | undefined {
  switch (property.type) {
    case 'string':
    case 'dateTime':
    case 'color':
      return typeof value === 'string' ? undefined : 'a string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value) ? undefined : 'a number';
    case 'boolean':
      return typeof value === 'boolean' ? undefined : 'a boolean';
    case 'options':
      return ['string', 'number', 'boolean'].includes(typeof value) ? undefined : 'a single option value';
    case 'multiOptions':
      return Array.isArray(value) ? undefined : 'an array of option values';
    case 'collection':
    case 'fixedCollection':
      return isPlainObject(value) ? undefined : 'an object';
    case 'json':
      return typeof value === 'string' || typeof value === 'object' ? undefined : 'a JSON string or object';
    case 'resourceLocator':
      return typeof value === 'string' || isPlainObject(value) ? undefined : 'a string or resource locator object';
    case 'notice':
      return undefined;
  }
}

function formatDefault(value: unknown): string {
  if (isPlainObject(value) && 'value' in value) return JSON.stringify(value.value);
  return JSON.stringify(value);
}

function checkRequired(
  node: TNode,
  ctx: TVisibilityContext,
  options: TPropertyCheckOptions
): TValidationError[] {
  const diagnostics: TValidationError[] = [];

  for (const property of getRequiredProperties(ctx)) {
    if (!isEmptyParameterValue(node.parameters[property.name])) continue;

    const label = property.displayName ? ` (${property.displayName})` : '';
    if (!isEmptyParameterValue(property.default)) {
      diagnostics.push({
        type: 'warning',
        code: 'MISSING_REQUIRED_PROPERTY',
        message: `Node "${node.name}" does not set required property "${property.name}"${label}; n8n falls back to its default ${formatDefault(property.default)}`,
        node: node.name,
        property: property.name,
        falsePositive: 'optional-default',
      });
    } else if (options.isAiTool) {
      diagnostics.push({
        type: 'warning',
        code: 'MISSING_REQUIRED_PROPERTY',
        message: `Tool node "${node.name}" does not set required property "${property.name}"${label}; the agent must supply it at run time (e.g. with $fromAI())`,
        node: node.name,
        property: property.name,
        falsePositive: 'ai-tool-flexibility',
      });
    } else {
      diagnostics.push({
        type: 'error',
        code: 'MISSING_REQUIRED_PROPERTY',
        message: `Node "${node.name}" is missing required property "${property.name}"${label}`,
        node: node.name,
        property: property.name,
      });
    }
  }

  return diagnostics;
}

function checkOptionValues(
  node: TNode,
  name: string,
  value: unknown,
  definitions: TPropertySchema[]
): TValidationError | undefined {
  const allowed = definitions.flatMap((def) => (def.options ?? []).map((option) => option.value));
  if (allowed.length === 0) return undefined;

  const values = Array.isArray(value) ? value : [value];
  const invalid = values.filter((v) => !isExpression(v) && !allowed.some((a) => a === v));
  if (invalid.length === 0) return undefined;

  const candidates = allowed.map(String);
  const first = String(invalid[0]);
  return {
    type: 'error',
    code: 'INVALID_OPTION_VALUE',
    message: `Property "${name}" on node "${node.name}" has invalid value ${JSON.stringify(invalid[0])}. Allowed: ${candidates.map((c) => JSON.stringify(c)).join(', ')}.${didYouMean(first, candidates)}`,
    node: node.name,
    property: name,
  };
}

function checkConfiguredProperties(node: TNode, schema: TNodeTypeSchema, ctx: TVisibilityContext): TValidationError[] {
  const diagnostics: TValidationError[] = [];
  const propertyNames = new Set(schema.properties.map((p) => p.name));

  for (const [name, value] of Object.entries(node.parameters)) {
    const definitions = schema.properties.filter((p) => p.name === name);

    if (definitions.length === 0) {
      diagnostics.push({
        type: 'error',
        code: 'UNKNOWN_PROPERTY',
        message: `Node "${node.name}" has unknown property "${name}" for type "${schema.type}".${didYouMean(name, propertyNames)}`,
        node: node.name,
        property: name,
      });
      continue;
    }

    const visible = definitions.filter((def) => isPropertyVisible(def, ctx));

    if (definitions.some((def) => def.deprecated)) {
      diagnostics.push({
        type: 'warning',
        code: 'DEPRECATED_PROPERTY',
        message: `Property "${name}" on node "${node.name}" is deprecated`,
        node: node.name,
        property: name,
        falsePositive: 'deprecated-property',
      });
    } else if (visible.length === 0) {
      diagnostics.push({
        type: 'warning',
        code: 'HIDDEN_PROPERTY',
        message: `Property "${name}" on node "${node.name}" is hidden for the current configuration and will be ignored`,
        node: node.name,
        property: name,
      });
      continue;
    }

    if (value === null || value === undefined || isExpression(value)) continue;

    const checked = visible.length > 0 ? visible : definitions;
    const expected = typeMismatch(value, checked[0]);
    if (expected) {
      diagnostics.push({
        type: 'error',
        code: 'PROPERTY_TYPE_MISMATCH',
        message: `Property "${name}" on node "${node.name}" expects ${expected} but got ${describeValue(value)}`,
        node: node.name,
        property: name,
      });
      continue;
    }

    if (checked[0].type === 'options' || checked[0].type === 'multiOptions') {
      const invalid = checkOptionValues(node, name, value, checked);
      if (invalid) diagnostics.push(invalid);
    }
  }

  return diagnostics;
}

/**
 * Check a node's parameters against its schema. Diagnostics follow schema
 * order for required properties, then parameter order for the rest.
 */
export function checkNodeProperties(
  node: TNode,
  schema: TNodeTypeSchema,
  options: TPropertyCheckOptions = {}
): TValidationError[] {
  const ctx: TVisibilityContext = { schema, parameters: node.parameters, typeVersion: node.typeVersion };
  const diagnostics = checkRequired(node, ctx, options);
  if (!options.requiredOnly) {
    diagnostics.push(...checkConfiguredProperties(node, schema, ctx));
  }
  return diagnostics;
}

export function checkTypeVersion(node: TNode, schema: TNodeTypeSchema): TValidationError[] {
  const latest = Math.max(...schema.versions);

  if (node.typeVersion === undefined) {
    return [
      {
        type: 'error',
        code: 'MISSING_TYPE_VERSION',
        message: `Node "${node.name}" has no typeVersion; the latest for "${schema.type}" is ${latest}`,
        node: node.name,
      },
    ];
  }

  if (!schema.versions.includes(node.typeVersion)) {
    return [
      {
        type: 'error',
        code: 'INVALID_TYPE_VERSION',
        message: `Node "${node.name}" uses typeVersion ${node.typeVersion}, which "${schema.type}" does not have. Supported: ${schema.versions.join(', ')}`,
        node: node.name,
      },
    ];
  }

  if (node.typeVersion < latest) {
    return [
      {
        type: 'warning',
        code: 'OUTDATED_TYPE_VERSION',
        message: `Node "${node.name}" uses typeVersion ${node.typeVersion} of "${schema.type}"; the latest is ${latest}`,
        node: node.name,
      },
    ];
  }

  return [];
}
