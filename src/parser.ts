/**
 * Workflow parser
 *
 * Checks the shape of a workflow document and normalizes it into `TWorkflow`.
 * Two connection layouts are accepted:
 *
 * ```
 * n8n export                                  edge list
 * ─────────────────────────────────────────   ───────────────────────────────────────
 * "connections": {                            "connections": [
 *   "Webhook": {                                { "source": "Webhook",
 *     "main": [                                   "target": "Set",
 *       [{ "node": "Set",                         "sourcePort": "main",
 *          "type": "main", "index": 0 }]          "targetPort": "main" }
 *     ]                                       ]
 *   }
 * }
 * ```
 *
 * Only the shape is checked here. Graph rules (unique names, known nodes,
 * acyclic main edges) belong to the validator.
 */

import { z } from 'zod';
import { MAIN_CONNECTION_TYPE } from './constants.js';
import type { TConnection, TValidationError, TWorkflow } from './ast/types.js';

const credentialReferenceSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
});

const nodeSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1, 'node name must not be empty'),
  type: z.string().min(1, 'node type must not be empty'),
  typeVersion: z.number().positive().optional(),
  position: z.tuple([z.number(), z.number()]).optional(),
  parameters: z.record(z.unknown()).default({}),
  credentials: z.record(credentialReferenceSchema).optional(),
  disabled: z.boolean().optional(),
  notes: z.string().optional(),
});

const exportTargetSchema = z.object({
  node: z.string(),
  type: z.string().default(MAIN_CONNECTION_TYPE),
  index: z.number().int().nonnegative().default(0),
});

/** `{ [source]: { [outputType]: [ [targets of output 0], [targets of output 1], ... ] } }` */
const exportConnectionsSchema = z.record(
  z.record(z.array(z.array(exportTargetSchema).nullable()))
);

const edgeListSchema = z.array(
  z.object({
    source: z.string(),
    target: z.string(),
    sourcePort: z.string().optional(),
    targetPort: z.string().optional(),
    sourceIndex: z.number().int().nonnegative().optional(),
    targetIndex: z.number().int().nonnegative().optional(),
  })
);

const workflowSchema = z.object({
  name: z.string().optional(),
  nodes: z.array(nodeSchema),
  connections: z.unknown().optional(),
  settings: z.record(z.unknown()).optional(),
});

export type TParseResult =
  | { success: true; workflow: TWorkflow }
  | { success: false; errors: TValidationError[] };

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

function toMalformed(issues: z.ZodIssue[], prefix: Array<string | number> = []): TValidationError[] {
  return issues.map((issue) => {
    const path = formatPath([...prefix, ...issue.path]);
    return {
      type: 'error',
      code: 'MALFORMED_WORKFLOW',
      message: path ? `${path}: ${issue.message}` : issue.message,
    };
  });
}

function fromExportShape(connections: z.infer<typeof exportConnectionsSchema>): TConnection[] {
  const result: TConnection[] = [];
  for (const [source, byType] of Object.entries(connections)) {
    for (const [sourceType, outputs] of Object.entries(byType)) {
      outputs.forEach((targets, sourceIndex) => {
        for (const target of targets ?? []) {
          result.push({
            source,
            sourceType,
            sourceIndex,
            target: target.node,
            targetType: target.type,
            targetIndex: target.index,
          });
        }
      });
    }
  }
  return result;
}

function fromEdgeList(edges: z.infer<typeof edgeListSchema>): TConnection[] {
  return edges.map((edge) => ({
    source: edge.source,
    sourceType: edge.sourcePort ?? MAIN_CONNECTION_TYPE,
    sourceIndex: edge.sourceIndex ?? 0,
    target: edge.target,
    targetType: edge.targetPort ?? MAIN_CONNECTION_TYPE,
    targetIndex: edge.targetIndex ?? 0,
  }));
}

/**
 * Parse an unknown value (usually `JSON.parse` output) into a workflow.
 * Shape problems come back as `MALFORMED_WORKFLOW` errors, one per issue.
 */
export function parseWorkflow(input: unknown): TParseResult {
  const parsed = workflowSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, errors: toMalformed(parsed.error.issues) };
  }

  const { connections: rawConnections, ...rest } = parsed.data;
  let connections: TConnection[] = [];

  if (Array.isArray(rawConnections)) {
    const edges = edgeListSchema.safeParse(rawConnections);
    if (!edges.success) {
      return { success: false, errors: toMalformed(edges.error.issues, ['connections']) };
    }
    connections = fromEdgeList(edges.data);
  } else if (rawConnections !== undefined && rawConnections !== null) {
    const exported = exportConnectionsSchema.safeParse(rawConnections);
    if (!exported.success) {
      return { success: false, errors: toMalformed(exported.error.issues, ['connections']) };
    }
    connections = fromExportShape(exported.data);
  }

  return { success: true, workflow: { ...rest, connections } };
}
