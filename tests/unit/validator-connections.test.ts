/**
 * Tests for connection, AI wiring and cycle checks
 */

import { validator } from '../../src/validator.js';
import {
  aiEdge,
  codes,
  makeAgentWorkflow,
  makeHttpRequest,
  makeManualTrigger,
  makeNode,
  makeWorkflow,
  mainEdge,
} from '../helpers/test-fixtures.js';

describe('connection checks', () => {
  it('should report an unknown target with a suggestion', () => {
    const workflow = makeWorkflow([makeManualTrigger(), makeHttpRequest()], [mainEdge('Manual Trigger', 'HTTP Reqest')]);

    const result = validator.validate(workflow);

    expect(codes(result.errors)).toEqual(['UNKNOWN_TARGET_NODE', 'MISSING_CONNECTION']);
    expect(result.errors[0].message).toBe('Connection target "HTTP Reqest" does not exist. Did you mean "HTTP Request"?');
    expect(result.statistics.invalidConnections).toBe(1);
    expect(result.statistics.validConnections).toBe(0);
  });

  it('should report an unknown source', () => {
    const workflow = makeWorkflow(
      [makeManualTrigger(), makeHttpRequest()],
      [mainEdge('Manual Trigger', 'HTTP Request'), mainEdge('Ghost', 'HTTP Request')]
    );

    const result = validator.validate(workflow);

    expect(result.errors).toEqual([
      {
        type: 'error',
        code: 'UNKNOWN_SOURCE_NODE',
        message: 'Connection source "Ghost" does not exist.',
        connection: mainEdge('Ghost', 'HTTP Request'),
      },
    ]);
  });

  it('should point out connections that use node ids', () => {
    const workflow = makeWorkflow(
      [makeManualTrigger(), makeHttpRequest()],
      [mainEdge('manual-trigger-id', 'HTTP Request')]
    );

    const result = validator.validate(workflow);

    expect(codes(result.errors)).toEqual(['CONNECTION_USES_NODE_ID', 'MISSING_CONNECTION']);
    expect(result.errors[0].message).toBe(
      'Connection source "manual-trigger-id" is a node id; connections must use node names ("Manual Trigger")'
    );
    expect(result.errors[0].node).toBe('Manual Trigger');
  });

  it('should reject an unknown connection type', () => {
    const workflow = makeWorkflow(
      [makeManualTrigger(), makeHttpRequest()],
      [aiEdge('Manual Trigger', 'HTTP Request', 'mian')]
    );

    const result = validator.validate(workflow);

    expect(codes(result.errors)).toEqual(['INVALID_CONNECTION_TYPE', 'MISSING_CONNECTION']);
    expect(result.errors[0].message).toBe(
      'Connection "Manual Trigger" -> "HTTP Request": unknown connection type "mian"'
    );
  });

  it('should reject an output index the source does not have', () => {
    const workflow = makeWorkflow(
      [makeManualTrigger(), makeNode('If', { type: 'n8n-nodes-base.if', typeVersion: 2.2 }), makeNode('Noop')],
      [mainEdge('Manual Trigger', 'If'), mainEdge('If', 'Noop', 2)]
    );

    const result = validator.validate(workflow);

    expect(result.errors.map((e) => e.message)).toEqual([
      'Connection "If" -> "Noop": output index 2 does not exist; "If" has 2 "main" output(s)',
    ]);
  });

  it('should accept both outputs of an If node', () => {
    const workflow = makeWorkflow(
      [
        makeManualTrigger(),
        makeNode('If', { type: 'n8n-nodes-base.if', typeVersion: 2.2 }),
        makeNode('Yes'),
        makeNode('No'),
      ],
      [mainEdge('Manual Trigger', 'If'), mainEdge('If', 'Yes', 0), mainEdge('If', 'No', 1)]
    );

    const result = validator.validate(workflow);

    expect(result.valid).toBe(true);
    expect(result.statistics.validConnections).toBe(3);
  });

  it('should reject an input index the target does not have', () => {
    const workflow = makeWorkflow(
      [makeManualTrigger(), makeNode('Merge', { type: 'n8n-nodes-base.merge', typeVersion: 3 })],
      [mainEdge('Manual Trigger', 'Merge', 0, 2)]
    );

    const result = validator.validate(workflow);

    expect(result.errors.map((e) => e.message)).toEqual([
      'Connection "Manual Trigger" -> "Merge": input index 2 does not exist; "Merge" has 2 "main" input(s)',
    ]);
  });

  it('should reject an edge into a node without inputs', () => {
    const workflow = makeWorkflow(
      [makeManualTrigger(), makeManualTrigger('Second Trigger')],
      [mainEdge('Manual Trigger', 'Second Trigger')]
    );

    const result = validator.validate(workflow);

    expect(result.errors.map((e) => e.message)).toEqual([
      'Connection "Manual Trigger" -> "Second Trigger": "Second Trigger" accepts no "main" input',
    ]);
  });

  it('should warn about an edge into a disabled node', () => {
    const workflow = makeWorkflow(
      [makeManualTrigger(), { ...makeHttpRequest(), disabled: true }],
      [mainEdge('Manual Trigger', 'HTTP Request')]
    );

    const result = validator.validate(workflow);

    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => w.message)).toEqual([
      'Connection "Manual Trigger" -> "HTTP Request" leads to a disabled node; items stop there',
    ]);
    expect(result.statistics.enabledNodes).toBe(1);
  });
});

describe('missing connections', () => {
  it('should report a node nothing leads to', () => {
    const result = validator.validate(makeWorkflow([makeManualTrigger(), makeNode('Noop')]));

    expect(result.errors).toEqual([
      {
        type: 'error',
        code: 'MISSING_CONNECTION',
        message: 'Node "Noop" has no incoming connection, so it never runs',
        node: 'Noop',
      },
    ]);
  });

  it('should ignore sticky notes and disabled nodes', () => {
    const workflow = makeWorkflow([
      makeManualTrigger(),
      makeNode('Note', { type: 'n8n-nodes-base.stickyNote', parameters: { content: 'Remember to retry' } }),
      makeNode('Parked', { disabled: true }),
    ]);

    const result = validator.validate(workflow);

    expect(result.errors).toEqual([]);
  });

  it('should report a sub-node that is not attached to a parent', () => {
    const workflow = makeAgentWorkflow();
    workflow.connections = workflow.connections.filter((c) => c.source !== 'Memory');

    const result = validator.validate(workflow);

    expect(result.errors).toEqual([
      {
        type: 'error',
        code: 'MISSING_CONNECTION',
        message: 'Sub-node "Memory" is not connected to any parent node',
        node: 'Memory',
      },
    ]);
  });
});

describe('AI wiring', () => {
  it('should reject an AI edge typed main', () => {
    const workflow = makeAgentWorkflow();
    workflow.connections[1] = mainEdge('Model', 'Agent');

    const result = validator.validate(workflow);

    expect(result.errors.map((e) => e.message)).toEqual([
      'Connection "Model" -> "Agent" is typed "main"; this AI edge must use "ai_languageModel" on both ends',
      'Node "Agent" has no "ai_languageModel" connection; connect a sub-node through its "ai_languageModel" output',
    ]);
    expect(result.statistics.invalidConnections).toBe(1);
    expect(result.statistics.validConnections).toBe(3);
  });

  it('should reject an AI output that enters a main input', () => {
    const workflow = makeAgentWorkflow();
    workflow.connections[1] = { ...aiEdge('Model', 'Agent', 'ai_languageModel'), targetType: 'main' };

    const result = validator.validate(workflow);

    expect(result.errors.map((e) => e.message)).toEqual([
      'Connection "Model" -> "Agent" is typed "main"; this AI edge must use "ai_languageModel" on both ends',
      'Node "Agent" has no "ai_languageModel" connection; connect a sub-node through its "ai_languageModel" output',
    ]);
    expect(result.statistics.invalidConnections).toBe(1);
    expect(result.statistics.validConnections).toBe(3);
  });

  it('should reject a main output that enters an AI input', () => {
    const workflow = makeAgentWorkflow();
    workflow.connections[1] = { ...aiEdge('Model', 'Agent', 'ai_languageModel'), sourceType: 'main' };

    const result = validator.validate(workflow);

    expect(result.errors).toEqual([
      {
        type: 'error',
        code: 'INVALID_AI_CONNECTION',
        message:
          'Connection "Model" -> "Agent" is typed "main"; this AI edge must use "ai_languageModel" on both ends',
        node: 'Agent',
        connection: workflow.connections[1],
      },
    ]);
    expect(result.statistics.invalidConnections).toBe(1);
    expect(result.statistics.validConnections).toBe(3);
  });

  it('should warn about an agent without tools', () => {
    const workflow = makeAgentWorkflow();
    workflow.nodes = workflow.nodes.filter((n) => n.name !== 'Calculator');
    workflow.connections = workflow.connections.filter((c) => c.source !== 'Calculator');

    const result = validator.validate(workflow);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      {
        type: 'warning',
        code: 'AI_AGENT_NO_TOOLS',
        message: 'Agent "Agent" has no tools connected; it can only answer from the language model',
        node: 'Agent',
      },
    ]);
  });
});

describe('cycle detection', () => {
  it('should report a cycle once', () => {
    const workflow = makeWorkflow(
      [makeManualTrigger(), makeNode('A'), makeNode('B')],
      [mainEdge('Manual Trigger', 'A'), mainEdge('A', 'B'), mainEdge('B', 'A')]
    );

    const result = validator.validate(workflow);

    expect(result.errors).toEqual([
      { type: 'error', code: 'CIRCULAR_DEPENDENCY', message: 'Circular dependency: A -> B -> A', node: 'A' },
    ]);
  });

  it('should treat a self-loop as a cycle', () => {
    const workflow = makeWorkflow(
      [makeManualTrigger(), makeNode('A')],
      [mainEdge('Manual Trigger', 'A'), mainEdge('A', 'A')]
    );

    const result = validator.validate(workflow);

    expect(result.errors.map((e) => e.message)).toEqual(['Circular dependency: A -> A']);
  });

  it('should walk a long chain without overflowing the stack', () => {
    const steps = Array.from({ length: 12_000 }, (_, i) => makeNode(`Step ${i}`));
    const edges = steps.map((node, i) => mainEdge(i === 0 ? 'Manual Trigger' : steps[i - 1].name, node.name));
    const workflow = makeWorkflow([makeManualTrigger(), ...steps], edges);

    const result = validator.validate(workflow);

    expect(result.errors).toEqual([]);
    expect(result.statistics.validConnections).toBe(12_000);
  }, 30_000);

  it('should ignore AI edges when looking for cycles', () => {
    const result = validator.validate(makeAgentWorkflow());

    expect(codes(result.errors)).toEqual([]);
  });
});
