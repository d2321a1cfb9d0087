/**
 * Shared test fixtures and factories for validator tests
 * Provides reusable nodes and workflows built from the built-in catalog
 */

import type { TConnection, TNode, TWorkflow } from '../../src/ast/types.js';

/**
 * Create a node. Defaults to a `noOp` at its only typeVersion.
 */
export function makeNode(name: string, overrides: Partial<TNode> = {}): TNode {
  return {
    id: `${name.toLowerCase().replace(/\s+/g, '-')}-id`,
    name,
    type: 'n8n-nodes-base.noOp',
    typeVersion: 1,
    position: [0, 0],
    parameters: {},
    ...overrides,
  };
}

export function makeManualTrigger(name: string = 'Manual Trigger'): TNode {
  return makeNode(name, { type: 'n8n-nodes-base.manualTrigger', typeVersion: 1 });
}

export function makeWebhook(name: string = 'Webhook', parameters: Record<string, unknown> = {}): TNode {
  return makeNode(name, {
    type: 'n8n-nodes-base.webhook',
    typeVersion: 2.1,
    parameters: { path: 'orders', ...parameters },
  });
}

export function makeHttpRequest(name: string = 'HTTP Request', parameters: Record<string, unknown> = {}): TNode {
  return makeNode(name, {
    type: 'n8n-nodes-base.httpRequest',
    typeVersion: 4.2,
    parameters: { url: 'https://example.com/api', ...parameters },
  });
}

/**
 * Main edge from `source` to `target`
 */
export function mainEdge(source: string, target: string, sourceIndex = 0, targetIndex = 0): TConnection {
  return { source, sourceType: 'main', sourceIndex, target, targetType: 'main', targetIndex };
}

/**
 * AI edge from a sub-node to its parent, typed the same on both ends
 */
export function aiEdge(source: string, target: string, type: string): TConnection {
  return { source, sourceType: type, sourceIndex: 0, target, targetType: type, targetIndex: 0 };
}

export function makeWorkflow(nodes: TNode[], connections: TConnection[] = []): TWorkflow {
  return { name: 'Test workflow', nodes, connections };
}

/**
 * Trigger → HTTP Request, valid under every profile
 */
export function makeLinearWorkflow(): TWorkflow {
  return makeWorkflow([makeManualTrigger(), makeHttpRequest()], [mainEdge('Manual Trigger', 'HTTP Request')]);
}

/**
 * Chat trigger → agent with a model, a memory and a tool
 */
export function makeAgentWorkflow(): TWorkflow {
  return makeWorkflow(
    [
      makeNode('Chat', { type: '@n8n/n8n-nodes-langchain.chatTrigger', typeVersion: 1.1 }),
      makeNode('Agent', { type: '@n8n/n8n-nodes-langchain.agent', typeVersion: 1.9 }),
      makeNode('Model', {
        type: '@n8n/n8n-nodes-langchain.lmChatOpenAi',
        typeVersion: 1.2,
        credentials: { openAiApi: { id: 'cred-openai', name: 'OpenAI account' } },
      }),
      makeNode('Memory', { type: '@n8n/n8n-nodes-langchain.memoryBufferWindow', typeVersion: 1.3 }),
      makeNode('Calculator', {
        type: '@n8n/n8n-nodes-langchain.toolCode',
        typeVersion: 1.1,
        parameters: { name: 'calculator', description: 'Adds numbers', jsCode: 'return 1 + 1;' },
      }),
    ],
    [
      mainEdge('Chat', 'Agent'),
      aiEdge('Model', 'Agent', 'ai_languageModel'),
      aiEdge('Memory', 'Agent', 'ai_memory'),
      aiEdge('Calculator', 'Agent', 'ai_tool'),
    ]
  );
}

export function codes(diagnostics: Array<{ code: string }>): string[] {
  return diagnostics.map((d) => d.code);
}
