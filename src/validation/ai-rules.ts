/**
 * AI wiring rules
 *
 * LangChain-style nodes are wired with typed `ai_*` edges that point from the
 * sub-node (model, memory, tool, parser) to its parent (agent, chain):
 *
 * ```
 * [OpenAI Chat Model] --ai_languageModel--> [AI Agent] <--ai_tool-- [Code Tool]
 * ```
 *
 * Rules:
 * 1. INVALID_AI_CONNECTION - an AI edge typed as `main` on either end
 * 2. MISSING_AI_INPUT - a schema-required AI input has no edge
 * 3. AI_AGENT_NO_TOOLS - an agent that accepts tools has none (warning)
 */

import type { TConnection, TRuleContext, TValidationError, TValidationRule, TWorkflow } from '../ast/types.js';
import {
  MAIN_CONNECTION_TYPE,
  isAiConnectionType,
  type AiConnectionType,
} from '../constants.js';
import type { TNodeTypeSchema } from '../registry/types.js';

/**
 * The AI type an edge should carry when it was typed `main` by mistake,
 * or undefined when the edge is not an AI edge in disguise.
 */
export function expectedAiType(
  connection: TConnection,
  sourceSchema?: TNodeTypeSchema,
  targetSchema?: TNodeTypeSchema
): AiConnectionType | undefined {
  const { sourceType, targetType } = connection;

  if (isAiConnectionType(sourceType) && targetType === MAIN_CONNECTION_TYPE) return sourceType;
  if (isAiConnectionType(targetType) && sourceType === MAIN_CONNECTION_TYPE) return targetType;
  if (sourceType !== MAIN_CONNECTION_TYPE || targetType !== MAIN_CONNECTION_TYPE) return undefined;

  // main -> main out of a pure sub-node
  if (!sourceSchema || sourceSchema.outputs.includes(MAIN_CONNECTION_TYPE)) return undefined;
  const aiOutputs = sourceSchema.outputs.filter(isAiConnectionType);
  if (aiOutputs.length === 0) return undefined;
  return aiOutputs.find((type) => targetSchema?.inputs.includes(type)) ?? aiOutputs[0];
}

export const invalidAiConnectionRule: TValidationRule = {
  name: 'INVALID_AI_CONNECTION',
  validate(workflow: TWorkflow, ctx: TRuleContext): TValidationError[] {
    const errors: TValidationError[] = [];

    for (const connection of workflow.connections) {
      const source = ctx.getNode(connection.source);
      const target = ctx.getNode(connection.target);
      if (!source || !target) continue;

      const expected = expectedAiType(connection, ctx.getSchema(source), ctx.getSchema(target));
      if (!expected) continue;

      errors.push({
        type: 'error',
        code: 'INVALID_AI_CONNECTION',
        message: `Connection "${connection.source}" -> "${connection.target}" is typed "main"; this AI edge must use "${expected}" on both ends`,
        node: connection.target,
        connection,
      });
    }

    return errors;
  },
};

export const missingAiInputRule: TValidationRule = {
  name: 'MISSING_AI_INPUT',
  validate(workflow: TWorkflow, ctx: TRuleContext): TValidationError[] {
    const errors: TValidationError[] = [];

    for (const node of workflow.nodes) {
      if (node.disabled) continue;
      const schema = ctx.getSchema(node);
      for (const required of schema?.requiredInputs ?? []) {
        if (ctx.incoming(node.name, required).length > 0) continue;
        errors.push({
          type: 'error',
          code: 'MISSING_AI_INPUT',
          message: `Node "${node.name}" has no "${required}" connection; connect a sub-node through its "${required}" output`,
          node: node.name,
        });
      }
    }

    return errors;
  },
};

export const agentWithoutToolsRule: TValidationRule = {
  name: 'AI_AGENT_NO_TOOLS',
  validate(workflow: TWorkflow, ctx: TRuleContext): TValidationError[] {
    const warnings: TValidationError[] = [];

    for (const node of workflow.nodes) {
      if (node.disabled) continue;
      if (!ctx.getSchema(node)?.inputs.includes('ai_tool')) continue;
      if (ctx.incoming(node.name, 'ai_tool').length > 0) continue;
      warnings.push({
        type: 'warning',
        code: 'AI_AGENT_NO_TOOLS',
        message: `Agent "${node.name}" has no tools connected; it can only answer from the language model`,
        node: node.name,
      });
    }

    return warnings;
  },
};

export const aiValidationRules: TValidationRule[] = [
  invalidAiConnectionRule,
  missingAiInputRule,
  agentWithoutToolsRule,
];
