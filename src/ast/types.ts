import type { ConnectionType, FalsePositiveCategory } from '../constants.js';
import type { TNodeTypeSchema } from '../registry/types.js';

/**
 * Workflow - the normalized graph the validator works on.
 *
 * An n8n workflow is a directed graph where:
 * - `nodes` are units of work, identified by a unique `name`
 * - `connections` are typed edges from a node's output port to a node's input port
 *
 * ```
 * ┌──────────────────────────────────────────────────────────────┐
 * │                          WORKFLOW                            │
 * │  ┌──────────────┐   main    ┌──────────────┐                 │
 * │  │ Webhook      │──────────►│ AI Agent     │                 │
 * │  └──────────────┘           └──────▲───────┘                 │
 * │                   ai_languageModel │                          │
 * │                             ┌──────┴───────┐                 │
 * │                             │ OpenAI Model │                 │
 * │                             └──────────────┘                 │
 * └──────────────────────────────────────────────────────────────┘
 * ```
 *
 * Both the n8n export shape (connections keyed by source node name) and the
 * edge-list shape (`sourcePort`/`targetPort`) normalize into this structure;
 * see `parseWorkflow`.
 */
export type TWorkflow = {
  name?: string;
  nodes: TNode[];
  connections: TConnection[];
  settings?: Record<string, unknown>;
};

export type TNode = {
  id?: string;
  /** Unique within a workflow; connections refer to nodes by name */
  name: string;
  /** e.g. `n8n-nodes-base.httpRequest`, `@n8n/n8n-nodes-langchain.agent` */
  type: string;
  typeVersion?: number;
  position?: [number, number];
  parameters: Record<string, unknown>;
  /** Credential type → reference */
  credentials?: Record<string, TCredentialReference>;
  disabled?: boolean;
  notes?: string;
};

export type TCredentialReference = {
  id?: string;
  name?: string;
};

/**
 * One directed, typed edge.
 *
 * `sourceType` is the output port type the edge leaves from; `targetType` is
 * the input port type it enters. In a well-formed workflow they are equal.
 */
export type TConnection = {
  source: string;
  sourceType: string;
  sourceIndex: number;
  target: string;
  targetType: string;
  targetIndex: number;
};

export type TValidationError = {
  type: 'error' | 'warning';
  code: string;
  message: string;
  /** Name of the node the diagnostic is about */
  node?: string;
  /** Parameter path inside the node, e.g. `options.timeout` */
  property?: string;
  connection?: TConnection;
  /** Set when the diagnostic matches one of the documented false-positive patterns */
  falsePositive?: FalsePositiveCategory;
};

export type TValidationStatistics = {
  totalNodes: number;
  enabledNodes: number;
  triggerNodes: number;
  validConnections: number;
  invalidConnections: number;
  expressionsValidated: number;
};

export type TWorkflowValidationResult = {
  valid: boolean;
  errors: TValidationError[];
  warnings: TValidationError[];
  /** Warnings removed by an `ignore` override or the active profile */
  suppressed: TValidationError[];
  statistics: TValidationStatistics;
};

/**
 * A custom rule run after the built-in checks.
 * Rules see the normalized workflow and return their own diagnostics.
 */
export type TValidationRule = {
  name: string;
  validate: (workflow: TWorkflow, context: TRuleContext) => TValidationError[];
};

/** Lookup helpers handed to validation rules */
export type TRuleContext = {
  /** First node with this name */
  getNode: (name: string) => TNode | undefined;
  /** Resolved schema for a node, if its type is known */
  getSchema: (node: TNode) => TNodeTypeSchema | undefined;
  incoming: (nodeName: string, type?: ConnectionType) => TConnection[];
  outgoing: (nodeName: string, type?: ConnectionType) => TConnection[];
};
