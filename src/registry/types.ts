import type { ConnectionType } from '../constants.js';

/**
 * Node type schema - what a node of a given type may be configured with.
 *
 * Schemas are data: the built-in catalog lives in `data/node-types.json` and
 * callers register more from their own JSON files.
 */
export type TNodeTypeSchema = {
  /** Canonical type, e.g. `n8n-nodes-base.slack` */
  type: string;
  displayName: string;
  /** Supported `typeVersion` values; the highest is the latest */
  versions: number[];
  isTrigger?: boolean;
  /** Input ports, one entry per input index, e.g. Merge → `['main', 'main']` */
  inputs: ConnectionType[];
  /** Output ports, one entry per output index, e.g. If → `['main', 'main']` */
  outputs: ConnectionType[];
  /** Input types that must have at least one incoming edge (e.g. an agent's language model) */
  requiredInputs?: ConnectionType[];
  properties: TPropertySchema[];
  credentials?: TCredentialRequirement[];
};

export type TPropertyType =
  | 'string'
  | 'number'
  | 'boolean'
  | 'options'
  | 'multiOptions'
  | 'collection'
  | 'fixedCollection'
  | 'json'
  | 'dateTime'
  | 'color'
  | 'resourceLocator'
  | 'notice';

export type TPropertySchema = {
  name: string;
  displayName?: string;
  type: TPropertyType;
  required?: boolean;
  default?: unknown;
  /** Allowed values for `options` / `multiOptions` */
  options?: TPropertyOption[];
  displayOptions?: TDisplayOptions;
  deprecated?: boolean;
};

export type TPropertyOption = {
  name: string;
  value: string | number | boolean;
};

/**
 * Visibility gates keyed by sibling property name.
 *
 * `show: { resource: ['message'], operation: ['post'] }` makes a property
 * visible only when both siblings hold one of the listed values. The key
 * `@version` matches against the node's `typeVersion`.
 */
export type TDisplayOptions = {
  show?: Record<string, unknown[]>;
  hide?: Record<string, unknown[]>;
};

export type TCredentialRequirement = {
  /** Credential type, e.g. `slackApi` */
  name: string;
  required?: boolean;
  displayOptions?: TDisplayOptions;
};

/** How a raw type string was matched against the registry */
export type TTypeResolution =
  | { kind: 'found'; schema: TNodeTypeSchema }
  | { kind: 'short-prefix'; canonicalType: string; schema?: TNodeTypeSchema }
  | { kind: 'invalid-format' }
  | { kind: 'unknown'; suggestions: string[] };
