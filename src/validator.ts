import type {
  TConnection,
  TNode,
  TRuleContext,
  TValidationError,
  TValidationRule,
  TValidationStatistics,
  TWorkflow,
  TWorkflowValidationResult,
} from './ast/types.js';
import {
  MAIN_CONNECTION_TYPE,
  isConnectionType,
  isCorePackageType,
  isStickyNoteType,
  looksLikeTriggerType,
  type ConnectionType,
  type Environment,
  type ValidationProfile,
} from './constants.js';
import type { CredentialStore } from './credentials/credential-store.js';
import { validateParameterExpressions } from './expressions/expression-validator.js';
import { getBuiltinRegistry, type NodeTypeRegistry } from './registry/node-type-registry.js';
import type { TNodeTypeSchema, TTypeResolution } from './registry/types.js';
import { didYouMean } from './utils/string-distance.js';
import { aiValidationRules, expectedAiType } from './validation/ai-rules.js';
import { checkNodeCredentials } from './validation/credential-rules.js';
import { classifyDiagnostics, type TIgnoreOptions } from './validation/false-positives.js';
import { checkNodeProperties, checkTypeVersion } from './validation/property-rules.js';

// Re-export TValidationError for convenience
export type { TValidationError } from './ast/types.js';

export type TValidateOptions = {
  /** Node type schemas; defaults to the built-in catalog */
  registry?: NodeTypeRegistry;
  /** Credential inventory; existence checks are skipped without one */
  credentials?: CredentialStore;
  /** @default 'development' */
  environment?: Environment;
  /** @default 'runtime' */
  profile?: ValidationProfile;
  /** Warnings to move to `suppressed` */
  ignore?: TIgnoreOptions;
  /** Extra rules, run after the built-in checks */
  rules?: TValidationRule[];
};

export type TNodeValidationResult = Omit<TWorkflowValidationResult, 'statistics'>;

export class WorkflowValidator {
  private errors: TValidationError[] = [];
  private warnings: TValidationError[] = [];
  private registry: NodeTypeRegistry | undefined;
  private credentials: CredentialStore | undefined;
  private profile: ValidationProfile = 'runtime';
  /** Set for single-node validation, where there is no graph to look at */
  private standalone = false;

  private nodesByName = new Map<string, TNode>();
  private nodesById = new Map<string, TNode>();
  private resolutions = new Map<TNode, TTypeResolution>();
  private schemas = new Map<TNode, TNodeTypeSchema>();
  private connections: TConnection[] = [];

  private expressionsValidated = 0;
  private validConnections = 0;
  private invalidConnections = 0;

  /**
   * Validate a parsed workflow.
   *
   * Checks run in a fixed order: structure, node types, properties,
   * expressions, credentials, connections, AI wiring, cycles, then custom
   * rules. Diagnostics within a check follow node order, then edge order.
   */
  validate(workflow: TWorkflow, options: TValidateOptions = {}): TWorkflowValidationResult {
    this.reset(options, false);
    this.indexNodes(workflow);

    this.validateStructure(workflow);
    this.validateNodeTypes(workflow);
    this.validateProperties(workflow);
    this.validateExpressions(workflow, new Set(this.nodesByName.keys()));
    this.validateCredentials(workflow);
    this.validateConnections(workflow);
    this.validateMissingConnections(workflow);
    this.runRules(workflow, aiValidationRules);
    this.validateCycles(workflow);
    this.runRules(workflow, options.rules ?? []);

    const classified = classifyDiagnostics(this.errors, this.warnings, {
      environment: options.environment ?? 'development',
      profile: this.profile,
      ignore: options.ignore,
    });

    return {
      valid: classified.errors.length === 0,
      ...classified,
      statistics: this.collectStatistics(workflow),
    };
  }

  /**
   * Validate one node on its own: type, typeVersion, properties, expressions
   * and credentials. Graph checks and node-reference checks are skipped.
   */
  validateNode(node: TNode, options: TValidateOptions = {}): TNodeValidationResult {
    this.reset(options, true);
    const workflow: TWorkflow = { nodes: [node], connections: [] };
    this.indexNodes(workflow);

    this.validateNodeTypes(workflow);
    this.validateProperties(workflow);
    this.validateExpressions(workflow, undefined);
    this.validateCredentials(workflow);

    const classified = classifyDiagnostics(this.errors, this.warnings, {
      environment: options.environment ?? 'development',
      profile: this.profile,
      ignore: options.ignore,
    });
    return { valid: classified.errors.length === 0, ...classified };
  }

  private reset(options: TValidateOptions, standalone: boolean): void {
    this.errors = [];
    this.warnings = [];
    this.registry = options.registry ?? getBuiltinRegistry();
    this.credentials = options.credentials;
    this.profile = options.profile ?? 'runtime';
    this.standalone = standalone;
    this.nodesByName = new Map();
    this.nodesById = new Map();
    this.resolutions = new Map();
    this.schemas = new Map();
    this.connections = [];
    this.expressionsValidated = 0;
    this.validConnections = 0;
    this.invalidConnections = 0;
  }

  private report(diagnostics: TValidationError[]): void {
    for (const diagnostic of diagnostics) {
      if (diagnostic.type === 'error') {
        this.errors.push(diagnostic);
      } else {
        this.warnings.push(diagnostic);
      }
    }
  }

  private indexNodes(workflow: TWorkflow): void {
    const registry = this.getRegistry();
    this.connections = workflow.connections;
    for (const node of workflow.nodes) {
      if (!this.nodesByName.has(node.name)) this.nodesByName.set(node.name, node);
      if (node.id && !this.nodesById.has(node.id)) this.nodesById.set(node.id, node);

      const resolution = registry.resolve(node.type);
      this.resolutions.set(node, resolution);
      if (resolution.kind === 'found') {
        this.schemas.set(node, resolution.schema);
      } else if (resolution.kind === 'short-prefix' && resolution.schema) {
        this.schemas.set(node, resolution.schema);
      }
    }
  }

  private getRegistry(): NodeTypeRegistry {
    this.registry ??= getBuiltinRegistry();
    return this.registry;
  }

  private isTrigger(node: TNode): boolean {
    return this.schemas.get(node)?.isTrigger ?? looksLikeTriggerType(node.type);
  }

  private incoming(nodeName: string, type?: ConnectionType): TConnection[] {
    return this.connections.filter(
      (c) => c.target === nodeName && (type === undefined || c.targetType === type)
    );
  }

  private outgoing(nodeName: string, type?: ConnectionType): TConnection[] {
    return this.connections.filter(
      (c) => c.source === nodeName && (type === undefined || c.sourceType === type)
    );
  }

  private isAiTool(node: TNode): boolean {
    if (this.standalone) {
      return this.schemas.get(node)?.outputs.includes('ai_tool') ?? false;
    }
    return this.outgoing(node.name, 'ai_tool').length > 0;
  }

  private validateStructure(workflow: TWorkflow): void {
    if (workflow.nodes.length === 0) {
      this.errors.push({
        type: 'error',
        code: 'NO_NODES',
        message: 'Workflow has no nodes',
      });
      return;
    }

    const nameCounts = new Map<string, number>();
    const idCounts = new Map<string, number>();
    for (const node of workflow.nodes) {
      nameCounts.set(node.name, (nameCounts.get(node.name) ?? 0) + 1);
      if (node.id) idCounts.set(node.id, (idCounts.get(node.id) ?? 0) + 1);
    }

    for (const [name, count] of nameCounts) {
      if (count > 1) {
        this.errors.push({
          type: 'error',
          code: 'DUPLICATE_NODE_NAME',
          message: `Node name "${name}" is used by ${count} nodes; node names must be unique`,
          node: name,
        });
      }
    }

    for (const [id, count] of idCounts) {
      if (count > 1) {
        this.errors.push({
          type: 'error',
          code: 'DUPLICATE_NODE_ID',
          message: `Node id "${id}" is used by ${count} nodes; node ids must be unique`,
          node: workflow.nodes.find((n) => n.id === id)?.name,
        });
      }
    }

    const hasTrigger = workflow.nodes.some(
      (node) => !node.disabled && !isStickyNoteType(node.type) && this.isTrigger(node)
    );
    if (!hasTrigger) {
      this.warnings.push({
        type: 'warning',
        code: 'NO_TRIGGER_NODE',
        message: 'Workflow has no enabled trigger node, so it never starts on its own',
      });
    }
  }

  private validateNodeTypes(workflow: TWorkflow): void {
    const registry = this.getRegistry();

    for (const node of workflow.nodes) {
      const resolution = this.resolutions.get(node);
      if (!resolution) continue;

      switch (resolution.kind) {
        case 'found':
          break;
        case 'short-prefix':
          this.errors.push({
            type: 'error',
            code: 'INVALID_NODE_TYPE_PREFIX',
            message: `Node "${node.name}" uses type "${node.type}"; n8n requires the full package name "${resolution.canonicalType}"`,
            node: node.name,
          });
          break;
        case 'invalid-format': {
          const shortName = node.type.slice(node.type.lastIndexOf('.') + 1).toLowerCase();
          const sameShortName = registry.types.find(
            (t) => t.slice(t.lastIndexOf('.') + 1).toLowerCase() === shortName
          );
          const hint = sameShortName ? ` Did you mean "${sameShortName}"?` : didYouMean(node.type, registry.types);
          this.errors.push({
            type: 'error',
            code: 'INVALID_NODE_TYPE_FORMAT',
            message: `Node "${node.name}" has type "${node.type}", which is not of the form <package>.<nodeName>.${hint}`,
            node: node.name,
          });
          break;
        }
        case 'unknown':
          if (isCorePackageType(node.type)) {
            const hint = resolution.suggestions.length > 0 ? ` Did you mean "${resolution.suggestions[0]}"?` : '';
            this.errors.push({
              type: 'error',
              code: 'UNKNOWN_NODE_TYPE',
              message: `Node "${node.name}" references unknown node type "${node.type}".${hint}`,
              node: node.name,
            });
          } else {
            this.warnings.push({
              type: 'warning',
              code: 'COMMUNITY_NODE_UNVERIFIED',
              message: `Node "${node.name}" uses community node type "${node.type}", which has no schema; its configuration is not checked`,
              node: node.name,
              falsePositive: 'community-node',
            });
          }
          break;
      }

      const schema = this.schemas.get(node);
      if (schema && !node.disabled) {
        this.report(checkTypeVersion(node, schema));
      }
    }
  }

  private validateProperties(workflow: TWorkflow): void {
    for (const node of workflow.nodes) {
      const schema = this.schemas.get(node);
      if (!schema || node.disabled) continue;
      this.report(
        checkNodeProperties(node, schema, {
          requiredOnly: this.profile === 'minimal',
          isAiTool: this.isAiTool(node),
        })
      );
    }
  }

  private validateExpressions(workflow: TWorkflow, nodeNames: ReadonlySet<string> | undefined): void {
    if (this.profile === 'minimal') return;

    for (const node of workflow.nodes) {
      if (!this.schemas.has(node) || node.disabled) continue;
      const report = validateParameterExpressions(node.parameters, { nodeNames });
      this.expressionsValidated += report.expressionsValidated;

      for (const issue of report.issues) {
        this.report([
          {
            type: issue.severity,
            code: issue.code,
            message: `Node "${node.name}", property "${issue.property}": ${issue.message}`,
            node: node.name,
            property: issue.property,
            falsePositive: issue.code === 'EXPRESSION_UNGUARDED_PATH' ? 'runtime-expression' : undefined,
          },
        ]);
      }
    }
  }

  private validateCredentials(workflow: TWorkflow): void {
    if (this.profile === 'minimal') return;

    for (const node of workflow.nodes) {
      const schema = this.schemas.get(node);
      if (!schema || node.disabled) continue;
      this.report(checkNodeCredentials(node, schema, this.credentials));
    }
  }

  /** Reports a connection end that names no node; returns false when it does */
  private reportUnknownEnd(connection: TConnection, end: 'source' | 'target'): boolean {
    const name = connection[end];
    if (this.nodesByName.has(name)) return false;

    const byId = this.nodesById.get(name);
    if (byId) {
      this.errors.push({
        type: 'error',
        code: 'CONNECTION_USES_NODE_ID',
        message: `Connection ${end} "${name}" is a node id; connections must use node names ("${byId.name}")`,
        node: byId.name,
        connection,
      });
      return true;
    }

    this.errors.push({
      type: 'error',
      code: end === 'source' ? 'UNKNOWN_SOURCE_NODE' : 'UNKNOWN_TARGET_NODE',
      message: `Connection ${end} "${name}" does not exist.${didYouMean(name, this.nodesByName.keys())}`,
      connection,
    });
    return true;
  }

  private validateConnections(workflow: TWorkflow): void {
    for (const connection of workflow.connections) {
      const label = `Connection "${connection.source}" -> "${connection.target}"`;
      const unknownSource = this.reportUnknownEnd(connection, 'source');
      const unknownTarget = this.reportUnknownEnd(connection, 'target');
      const source = this.nodesByName.get(connection.source);
      const target = this.nodesByName.get(connection.target);
      if (unknownSource || unknownTarget || !source || !target) {
        this.invalidConnections++;
        continue;
      }

      const problems: TValidationError[] = [];
      const invalid = (code: string, message: string) =>
        problems.push({ type: 'error', code, message: `${label}: ${message}`, node: connection.target, connection });

      const sourceSchema = this.schemas.get(source);
      const targetSchema = this.schemas.get(target);
      const unknownTypes = [...new Set([connection.sourceType, connection.targetType])].filter(
        (type) => !isConnectionType(type)
      );

      if (unknownTypes.length > 0) {
        invalid('INVALID_CONNECTION_TYPE', `unknown connection type "${unknownTypes[0]}"`);
      } else if (expectedAiType(connection, sourceSchema, targetSchema)) {
        // Reported by the AI wiring rules; the edge still does not work
        this.invalidConnections++;
        continue;
      } else if (connection.sourceType !== connection.targetType) {
        invalid(
          'INVALID_CONNECTION_TYPE',
          `leaves "${connection.source}" as "${connection.sourceType}" but enters "${connection.target}" as "${connection.targetType}"`
        );
      } else {
        if (sourceSchema) {
          const count = sourceSchema.outputs.filter((t) => t === connection.sourceType).length;
          if (count === 0) {
            invalid('INVALID_CONNECTION_TYPE', `"${connection.source}" has no "${connection.sourceType}" output`);
          } else if (connection.sourceIndex >= count) {
            invalid(
              'INVALID_OUTPUT_INDEX',
              `output index ${connection.sourceIndex} does not exist; "${connection.source}" has ${count} "${connection.sourceType}" output(s)`
            );
          }
        }
        if (targetSchema) {
          const count = targetSchema.inputs.filter((t) => t === connection.targetType).length;
          if (count === 0) {
            invalid('INVALID_CONNECTION_TYPE', `"${connection.target}" accepts no "${connection.targetType}" input`);
          } else if (connection.targetIndex >= count) {
            invalid(
              'INVALID_INPUT_INDEX',
              `input index ${connection.targetIndex} does not exist; "${connection.target}" has ${count} "${connection.targetType}" input(s)`
            );
          }
        }
      }

      if (problems.length > 0) {
        this.errors.push(...problems);
        this.invalidConnections++;
        continue;
      }

      this.validConnections++;
      if (target.disabled && !source.disabled) {
        this.warnings.push({
          type: 'warning',
          code: 'CONNECTION_TO_DISABLED_NODE',
          message: `${label} leads to a disabled node; items stop there`,
          node: connection.target,
          connection,
        });
      }
    }
  }

  /**
   * Every enabled non-trigger node needs an incoming main edge. AI sub-nodes
   * hang off their parent instead, so any outgoing AI edge is enough for them.
   */
  private validateMissingConnections(workflow: TWorkflow): void {
    for (const node of workflow.nodes) {
      if (node.disabled || isStickyNoteType(node.type) || this.isTrigger(node)) continue;

      const hasMainInput = this.incoming(node.name, MAIN_CONNECTION_TYPE).some((c) =>
        this.nodesByName.has(c.source)
      );
      if (hasMainInput) continue;

      const schema = this.schemas.get(node);
      const isSubNode = schema !== undefined && schema.outputs.length > 0 && !schema.outputs.includes(MAIN_CONNECTION_TYPE);
      if (isSubNode) {
        const wiredOut = this.outgoing(node.name).some((c) => this.nodesByName.has(c.target));
        if (wiredOut) continue;
        this.errors.push({
          type: 'error',
          code: 'MISSING_CONNECTION',
          message: `Sub-node "${node.name}" is not connected to any parent node`,
          node: node.name,
        });
        continue;
      }

      this.errors.push({
        type: 'error',
        code: 'MISSING_CONNECTION',
        message: `Node "${node.name}" has no incoming connection, so it never runs`,
        node: node.name,
      });
    }
  }

  /**
   * Detect cycles among main edges. Each cycle is reported once, starting at
   * the node where the DFS first re-entered it.
   */
  private validateCycles(workflow: TWorkflow): void {
    const adjacency = new Map<string, string[]>();
    for (const c of workflow.connections) {
      if (c.sourceType !== MAIN_CONNECTION_TYPE || c.targetType !== MAIN_CONNECTION_TYPE) continue;
      if (!this.nodesByName.has(c.source) || !this.nodesByName.has(c.target)) continue;
      const next = adjacency.get(c.source) ?? [];
      if (!next.includes(c.target)) next.push(c.target);
      adjacency.set(c.source, next);
    }

    const visited = new Set<string>();
    const recursionStack = new Set<string>();
    const reportedCycles = new Set<string>();

    const reportCycle = (cyclePath: string[]) => {
      const cycleKey = [...new Set(cyclePath)].sort().join('\u0000');
      if (reportedCycles.has(cycleKey)) return;
      reportedCycles.add(cycleKey);
      this.errors.push({
        type: 'error',
        code: 'CIRCULAR_DEPENDENCY',
        message: `Circular dependency: ${cyclePath.join(' -> ')}`,
        node: cyclePath[0],
      });
    };

    // Iterative DFS; long chains would overflow the call stack
    const dfs = (start: string): void => {
      if (visited.has(start)) return;
      const path: string[] = [start];
      const stack: Array<{ nodeName: string; next: number }> = [{ nodeName: start, next: 0 }];
      recursionStack.add(start);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const successors = adjacency.get(frame.nodeName) ?? [];

        if (frame.next < successors.length) {
          const next = successors[frame.next];
          frame.next++;
          if (recursionStack.has(next)) {
            reportCycle([...path.slice(path.indexOf(next)), next]);
          } else if (!visited.has(next)) {
            recursionStack.add(next);
            path.push(next);
            stack.push({ nodeName: next, next: 0 });
          }
          continue;
        }

        stack.pop();
        path.pop();
        recursionStack.delete(frame.nodeName);
        visited.add(frame.nodeName);
      }
    };

    for (const nodeName of this.nodesByName.keys()) {
      dfs(nodeName);
    }
  }

  private createRuleContext(): TRuleContext {
    return {
      getNode: (name) => this.nodesByName.get(name),
      getSchema: (node) => this.schemas.get(node),
      incoming: (nodeName, type) => this.incoming(nodeName, type),
      outgoing: (nodeName, type) => this.outgoing(nodeName, type),
    };
  }

  private runRules(workflow: TWorkflow, rules: TValidationRule[]): void {
    if (rules.length === 0) return;
    const ctx = this.createRuleContext();
    for (const rule of rules) {
      this.report(rule.validate(workflow, ctx));
    }
  }

  private collectStatistics(workflow: TWorkflow): TValidationStatistics {
    const enabled = workflow.nodes.filter((n) => !n.disabled);
    return {
      totalNodes: workflow.nodes.length,
      enabledNodes: enabled.length,
      triggerNodes: enabled.filter((n) => !isStickyNoteType(n.type) && this.isTrigger(n)).length,
      validConnections: this.validConnections,
      invalidConnections: this.invalidConnections,
      expressionsValidated: this.expressionsValidated,
    };
  }
}

export const validator = new WorkflowValidator();
