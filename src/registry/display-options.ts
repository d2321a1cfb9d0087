/**
 * Property visibility resolution.
 *
 * n8n node properties are gated by the values of their siblings
 * (`displayOptions.show` / `displayOptions.hide`). A property is only part of
 * the node's effective configuration - and only required - while it is visible.
 * Gates chain: Slack's `channelId` is shown for `select=channel`, and `select`
 * itself is only shown for `operation=post`, so `channelId` is visible only
 * when the whole chain holds.
 */

import { EXPRESSION_PREFIX } from '../constants.js';
import type { TDisplayOptions, TNodeTypeSchema, TPropertySchema } from './types.js';

const VERSION_KEY = '@version';

export type TVisibilityContext = {
  schema: TNodeTypeSchema;
  parameters: Record<string, unknown>;
  typeVersion?: number;
};

function isExpressionValue(value: unknown): boolean {
  return typeof value === 'string' && value.startsWith(EXPRESSION_PREFIX);
}

/** Definitions of a property name; n8n repeats names (e.g. `operation` per resource) */
function definitionsOf(schema: TNodeTypeSchema, name: string): TPropertySchema[] {
  return schema.properties.filter((p) => p.name === name);
}

/**
 * The value a sibling takes for gate evaluation: the configured value, or the
 * default of its first visible definition.
 */
export function resolveParameterValue(
  name: string,
  ctx: TVisibilityContext,
  seen: Set<string> = new Set()
): unknown {
  if (Object.prototype.hasOwnProperty.call(ctx.parameters, name)) {
    return ctx.parameters[name];
  }
  const visible = definitionsOf(ctx.schema, name).find((def) => isVisible(def, ctx, seen));
  return visible?.default;
}

function gateMatches(
  key: string,
  allowed: unknown[],
  ctx: TVisibilityContext,
  seen: Set<string>
): boolean {
  if (key === VERSION_KEY) {
    const version = ctx.typeVersion ?? Math.max(...ctx.schema.versions);
    return allowed.includes(version);
  }
  const value = resolveParameterValue(key, ctx, seen);
  // Expressions are resolved at run time; assume the gate can be satisfied
  if (isExpressionValue(value)) return true;
  return allowed.includes(value);
}

/**
 * Evaluate a display-options block against the node's current parameters.
 */
export function matchesDisplayOptions(
  displayOptions: TDisplayOptions | undefined,
  ctx: TVisibilityContext,
  seen: Set<string> = new Set()
): boolean {
  if (!displayOptions) return true;

  for (const [key, allowed] of Object.entries(displayOptions.show ?? {})) {
    if (!gateMatches(key, allowed, ctx, seen)) return false;
    // A gate on a hidden controller never opens
    if (key !== VERSION_KEY && !isNameVisible(key, ctx, seen)) return false;
  }

  for (const [key, hidden] of Object.entries(displayOptions.hide ?? {})) {
    if (key === VERSION_KEY) {
      const version = ctx.typeVersion ?? Math.max(...ctx.schema.versions);
      if (hidden.includes(version)) return false;
      continue;
    }
    const value = resolveParameterValue(key, ctx, seen);
    if (!isExpressionValue(value) && hidden.includes(value)) return false;
  }

  return true;
}

function isVisible(property: TPropertySchema, ctx: TVisibilityContext, seen: Set<string>): boolean {
  // Cyclic gates (a shows b, b shows a) are treated as closed
  const key = `${property.name}\u0000${JSON.stringify(property.displayOptions ?? null)}`;
  if (seen.has(key)) return false;
  const next = new Set(seen);
  next.add(key);
  return matchesDisplayOptions(property.displayOptions, ctx, next);
}

function isNameVisible(name: string, ctx: TVisibilityContext, seen: Set<string>): boolean {
  const definitions = definitionsOf(ctx.schema, name);
  // Gates may reference names outside the schema (older exports); don't block on them
  if (definitions.length === 0) return true;
  return definitions.some((def) => isVisible(def, ctx, seen));
}

export function isPropertyVisible(property: TPropertySchema, ctx: TVisibilityContext): boolean {
  return isVisible(property, ctx, new Set());
}

/**
 * All property definitions visible for the current configuration.
 * When a name has several definitions, every visible one is returned.
 */
export function getVisibleProperties(ctx: TVisibilityContext): TPropertySchema[] {
  return ctx.schema.properties.filter((p) => isPropertyVisible(p, ctx));
}

/**
 * Properties that must be set for the current resource/operation combination.
 * Notices are display-only and never required.
 */
export function getRequiredProperties(ctx: TVisibilityContext): TPropertySchema[] {
  const seenNames = new Set<string>();
  const required: TPropertySchema[] = [];
  for (const property of getVisibleProperties(ctx)) {
    if (!property.required || property.type === 'notice') continue;
    if (seenNames.has(property.name)) continue;
    seenNames.add(property.name);
    required.push(property);
  }
  return required;
}
