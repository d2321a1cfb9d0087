/**
 * Friendly error messages for the workflow validator.
 *
 * Maps validator error codes to plain-language explanations with
 * contextual details extracted from the original diagnostic.
 */

export interface TFriendlyError {
  /** Short title (3-5 words) */
  title: string;
  /** What went wrong, with node and property names from the diagnostic */
  explanation: string;
  /** Actionable suggestion for fixing the issue */
  fix: string;
  /** Original validator error code */
  code: string;
}

interface ValidatorError {
  code: string;
  message: string;
  node?: string;
  property?: string;
}

// ── Helpers to extract contextual info from error messages ──────────────

function extractQuoted(message: string): string[] {
  const matches = message.match(/"([^"]+)"/g);
  return matches ? matches.map((m) => m.replace(/"/g, '')) : [];
}

function extractSuggestion(message: string): string | null {
  const match = message.match(/Did you mean "([^"]+)"\?/);
  return match ? match[1] : null;
}

function extractCyclePath(message: string): string | null {
  const match = message.match(/:\s*(.+ -> .+)/);
  return match ? match[1] : null;
}

/** Text after the last `": "` separator, i.e. the expression checker's own message */
function extractDetail(message: string): string {
  const index = message.lastIndexOf('": ');
  return index === -1 ? message : message.slice(index + 3);
}

function nodeOf(error: ValidatorError, fallbackIndex = 0): string {
  return error.node ?? extractQuoted(error.message)[fallbackIndex] ?? 'unknown';
}

function propertyOf(error: ValidatorError): string {
  return error.property ?? 'unknown';
}

type ErrorMapper = (error: ValidatorError) => TFriendlyError;

const errorMappers: Record<string, ErrorMapper> = {
  // ── Structure ──────────────────────────────────────────────────────────

  MALFORMED_WORKFLOW(error) {
    return {
      title: 'Malformed Workflow JSON',
      explanation: `The workflow document does not have the expected shape: ${error.message}.`,
      fix: 'Export the workflow again from n8n, or make sure it has a "nodes" array and a "connections" object (or an edge list).',
      code: error.code,
    };
  },

  NO_NODES(error) {
    return {
      title: 'Empty Workflow',
      explanation: 'The workflow has no nodes, so there is nothing to run.',
      fix: 'Add at least a trigger node and one node that does the work.',
      code: error.code,
    };
  },

  DUPLICATE_NODE_NAME(error) {
    const name = nodeOf(error);
    return {
      title: 'Duplicate Node Name',
      explanation: `More than one node is called '${name}'. Connections and expressions refer to nodes by name, so n8n cannot tell them apart.`,
      fix: `Rename all but one of the '${name}' nodes (e.g. '${name} 1') and update connections and $('${name}') references.`,
      code: error.code,
    };
  },

  DUPLICATE_NODE_ID(error) {
    const id = extractQuoted(error.message)[0] ?? 'unknown';
    return {
      title: 'Duplicate Node ID',
      explanation: `Node id '${id}' appears on more than one node. n8n rejects imports with repeated ids.`,
      fix: 'Give each node a fresh UUID, or drop the id fields and let n8n assign them.',
      code: error.code,
    };
  },

  NO_TRIGGER_NODE(error) {
    return {
      title: 'No Trigger Node',
      explanation: 'The workflow has no enabled trigger, so it can never start by itself.',
      fix: 'Add a trigger such as a Webhook, Schedule Trigger, Chat Trigger or Manual Trigger and connect it to the first node.',
      code: error.code,
    };
  },

  // ── Node types ─────────────────────────────────────────────────────────

  UNKNOWN_NODE_TYPE(error) {
    const quoted = extractQuoted(error.message);
    const type = quoted[1] ?? 'unknown';
    const suggestion = extractSuggestion(error.message);
    return {
      title: 'Unknown Node Type',
      explanation: `Node '${nodeOf(error)}' uses type '${type}', which is not a known n8n node type.`,
      fix: suggestion
        ? `Did you mean '${suggestion}'? Fix the spelling of the type string.`
        : 'Check the type string against the node catalog, or register the schema with --node-types.',
      code: error.code,
    };
  },

  INVALID_NODE_TYPE_PREFIX(error) {
    const quoted = extractQuoted(error.message);
    const canonical = quoted[2] ?? 'the full package name';
    return {
      title: 'Short Node Type Prefix',
      explanation: `Node '${nodeOf(error)}' uses the short type '${quoted[1] ?? 'unknown'}'. n8n only accepts the full package name.`,
      fix: `Change the type to '${canonical}'.`,
      code: error.code,
    };
  },

  INVALID_NODE_TYPE_FORMAT(error) {
    const quoted = extractQuoted(error.message);
    const suggestion = extractSuggestion(error.message);
    return {
      title: 'Invalid Node Type',
      explanation: `Node '${nodeOf(error)}' has type '${quoted[1] ?? 'unknown'}', which is not of the form <package>.<nodeName>.`,
      fix: suggestion
        ? `Use '${suggestion}'.`
        : "Use the package-qualified type, e.g. 'n8n-nodes-base.httpRequest' or '@n8n/n8n-nodes-langchain.agent'.",
      code: error.code,
    };
  },

  COMMUNITY_NODE_UNVERIFIED(error) {
    const type = extractQuoted(error.message)[1] ?? 'unknown';
    return {
      title: 'Unverified Community Node',
      explanation: `Node '${nodeOf(error)}' uses community node '${type}'. No schema is available, so its parameters were not checked.`,
      fix: 'Make sure the package is installed on the target instance. Register its schema with --node-types to check it, or ignore the community-node category.',
      code: error.code,
    };
  },

  MISSING_TYPE_VERSION(error) {
    return {
      title: 'Missing typeVersion',
      explanation: `Node '${nodeOf(error)}' has no typeVersion. n8n needs it to pick the parameter layout.`,
      fix: 'Add "typeVersion" to the node, normally the latest version of its type.',
      code: error.code,
    };
  },

  INVALID_TYPE_VERSION(error) {
    const supported = error.message.match(/Supported: (.+)$/)?.[1] ?? 'see the node catalog';
    return {
      title: 'Invalid typeVersion',
      explanation: `Node '${nodeOf(error)}' uses a typeVersion its node type does not have.`,
      fix: `Use one of the supported versions: ${supported}.`,
      code: error.code,
    };
  },

  OUTDATED_TYPE_VERSION(error) {
    const latest = error.message.match(/latest is ([\d.]+)/)?.[1] ?? 'the latest version';
    return {
      title: 'Outdated Node Version',
      explanation: `Node '${nodeOf(error)}' uses an older typeVersion. It still runs, but newer options may be missing.`,
      fix: `Upgrade to typeVersion ${latest} in the editor when convenient, and re-check its parameters.`,
      code: error.code,
    };
  },

  // ── Properties ─────────────────────────────────────────────────────────

  MISSING_REQUIRED_PROPERTY(error) {
    const property = propertyOf(error);
    return {
      title: 'Missing Required Property',
      explanation: `Node '${nodeOf(error)}' needs '${property}' for its current resource and operation, but it is not set.`,
      fix: `Set '${property}' on the node. It may only have become required through another setting (e.g. operation or select).`,
      code: error.code,
    };
  },

  PROPERTY_TYPE_MISMATCH(error) {
    const expected = error.message.match(/expects (.+) but got (\w+)/);
    return {
      title: 'Property Type Mismatch',
      explanation: `Property '${propertyOf(error)}' on node '${nodeOf(error, 1)}' expects ${expected?.[1] ?? 'another type'} but got ${expected?.[2] ?? 'something else'}.`,
      fix: 'Change the value to the expected type, e.g. true instead of "true", or use an expression starting with "=".',
      code: error.code,
    };
  },

  INVALID_OPTION_VALUE(error) {
    const allowed = error.message.match(/Allowed: (.+?)\.(?: Did you mean|$)/)?.[1] ?? 'see the node catalog';
    const suggestion = extractSuggestion(error.message);
    return {
      title: 'Invalid Option Value',
      explanation: `Property '${propertyOf(error)}' on node '${nodeOf(error, 1)}' is set to a value that is not one of its options.`,
      fix: suggestion ? `Did you mean '${suggestion}'? Allowed values: ${allowed}.` : `Use one of: ${allowed}.`,
      code: error.code,
    };
  },

  UNKNOWN_PROPERTY(error) {
    const property = propertyOf(error);
    const suggestion = extractSuggestion(error.message);
    return {
      title: 'Unknown Property',
      explanation: `Node '${nodeOf(error)}' sets '${property}', which its node type does not have.`,
      fix: suggestion
        ? `Did you mean '${suggestion}'? Rename the parameter.`
        : `Remove '${property}' or check it against the node's typeVersion.`,
      code: error.code,
    };
  },

  HIDDEN_PROPERTY(error) {
    const property = propertyOf(error);
    return {
      title: 'Property Ignored',
      explanation: `'${property}' on node '${nodeOf(error, 1)}' only applies to another resource or operation, so n8n ignores it here.`,
      fix: `Remove '${property}', or change the setting that shows it (usually resource or operation).`,
      code: error.code,
    };
  },

  DEPRECATED_PROPERTY(error) {
    return {
      title: 'Deprecated Property',
      explanation: `'${propertyOf(error)}' on node '${nodeOf(error, 1)}' is deprecated and may be removed in a later version.`,
      fix: 'Move to the replacement option shown in the n8n editor, or ignore the deprecated-property category if you rely on it.',
      code: error.code,
    };
  },

  // ── Expressions ────────────────────────────────────────────────────────

  MALFORMED_EXPRESSION(error) {
    return {
      title: 'Malformed Expression',
      explanation: `The expression in '${propertyOf(error)}' on node '${nodeOf(error)}' is invalid: ${extractDetail(error.message)}`,
      fix: 'Balance every "{{" with "}}". Refer to existing nodes by exact name, and use bracket notation for reserved or hyphenated keys ($json["first-name"]).',
      code: error.code,
    };
  },

  EXPRESSION_MISSING_PREFIX(error) {
    return {
      title: 'Expression Not Evaluated',
      explanation: `'${propertyOf(error)}' on node '${nodeOf(error)}' contains "{{ }}" but does not start with "=". n8n sends it as literal text.`,
      fix: 'Prefix the value with "=", e.g. "={{ $json.email }}".',
      code: error.code,
    };
  },

  EXPRESSION_UNGUARDED_PATH(error) {
    const path = extractQuoted(extractDetail(error.message))[0] ?? 'the path';
    return {
      title: 'Unguarded Nested Path',
      explanation: `'${path}' in node '${nodeOf(error)}' reads a nested field. It throws when a parent field is missing from an item.`,
      fix: 'Use optional chaining ($json.a?.b) or a fallback ($json.a?.b ?? ""). Ignore the runtime-expression category if the field is always present.',
      code: error.code,
    };
  },

  // ── Credentials ────────────────────────────────────────────────────────

  MISSING_CREDENTIALS(error) {
    const type = extractQuoted(error.message)[1] ?? 'unknown';
    return {
      title: 'Missing Credentials',
      explanation: `Node '${nodeOf(error)}' needs a '${type}' credential for its current authentication setting.`,
      fix: `Add "credentials": { "${type}": { "id": "...", "name": "..." } } to the node.`,
      code: error.code,
    };
  },

  UNEXPECTED_CREDENTIAL_TYPE(error) {
    const type = extractQuoted(error.message)[1] ?? 'unknown';
    const suggestion = extractSuggestion(error.message);
    return {
      title: 'Unexpected Credential Type',
      explanation: `Node '${nodeOf(error)}' sets a '${type}' credential, which its node type does not use.`,
      fix: suggestion ? `Did you mean '${suggestion}'?` : `Remove the '${type}' entry or change the node's authentication setting.`,
      code: error.code,
    };
  },

  CREDENTIAL_NOT_FOUND(error) {
    return {
      title: 'Credential Not Found',
      explanation: `Node '${nodeOf(error)}' points at a credential that does not exist on the target instance.`,
      fix: 'Create the credential in n8n, or update the id/name on the node. In development this is only a warning.',
      code: error.code,
    };
  },

  CREDENTIAL_TYPE_MISMATCH(error) {
    const quoted = extractQuoted(error.message);
    return {
      title: 'Credential Type Mismatch',
      explanation: `Node '${nodeOf(error)}' uses credential '${quoted[1] ?? 'unknown'}' as '${quoted[2] ?? 'unknown'}', but that credential is of type '${quoted[3] ?? 'unknown'}'.`,
      fix: 'Select a credential of the type the node expects.',
      code: error.code,
    };
  },

  // ── Connections ────────────────────────────────────────────────────────

  UNKNOWN_SOURCE_NODE(error) {
    const name = extractQuoted(error.message)[0] ?? 'unknown';
    const suggestion = extractSuggestion(error.message);
    return {
      title: 'Unknown Source Node',
      explanation: `A connection starts at '${name}', but no node has that name.`,
      fix: suggestion ? `Did you mean '${suggestion}'?` : 'Rename the connection key to an existing node name.',
      code: error.code,
    };
  },

  UNKNOWN_TARGET_NODE(error) {
    const name = extractQuoted(error.message)[0] ?? 'unknown';
    const suggestion = extractSuggestion(error.message);
    return {
      title: 'Unknown Target Node',
      explanation: `A connection leads to '${name}', but no node has that name.`,
      fix: suggestion ? `Did you mean '${suggestion}'?` : 'Point the connection at an existing node name.',
      code: error.code,
    };
  },

  CONNECTION_USES_NODE_ID(error) {
    const quoted = extractQuoted(error.message);
    return {
      title: 'Connection Uses Node ID',
      explanation: `A connection refers to node id '${quoted[0] ?? 'unknown'}'. n8n connections use node names, not ids.`,
      fix: `Replace the id with the node name '${quoted[1] ?? nodeOf(error)}'.`,
      code: error.code,
    };
  },

  INVALID_CONNECTION_TYPE(error) {
    const quoted = extractQuoted(error.message);
    return {
      title: 'Invalid Connection Type',
      explanation: `The connection from '${quoted[0] ?? 'unknown'}' to '${quoted[1] ?? 'unknown'}' uses a port type one of the nodes does not have.`,
      fix: 'Use "main" between regular nodes, and the matching ai_* type on both ends between a sub-node and its parent.',
      code: error.code,
    };
  },

  INVALID_OUTPUT_INDEX(error) {
    const quoted = extractQuoted(error.message);
    return {
      title: 'Invalid Output Index',
      explanation: `The connection leaves '${quoted[0] ?? 'unknown'}' from an output that node does not have.`,
      fix: 'Use an output index below the number of outputs (If has 2: true=0, false=1).',
      code: error.code,
    };
  },

  INVALID_INPUT_INDEX(error) {
    const quoted = extractQuoted(error.message);
    return {
      title: 'Invalid Input Index',
      explanation: `The connection enters '${quoted[1] ?? 'unknown'}' at an input that node does not have.`,
      fix: 'Use an input index below the number of inputs (Merge has 2; most nodes have 1).',
      code: error.code,
    };
  },

  CONNECTION_TO_DISABLED_NODE(error) {
    return {
      title: 'Connection to Disabled Node',
      explanation: `Items flow into '${nodeOf(error)}', which is disabled, so nothing after it runs.`,
      fix: 'Enable the node, or remove it and reconnect the nodes around it.',
      code: error.code,
    };
  },

  MISSING_CONNECTION(error) {
    const name = nodeOf(error);
    return {
      title: 'Disconnected Node',
      explanation: `Node '${name}' has no incoming connection, so it never runs.`,
      fix: `Connect a preceding node's output to '${name}', or delete it if it is left over.`,
      code: error.code,
    };
  },

  CIRCULAR_DEPENDENCY(error) {
    const cyclePath = extractCyclePath(error.message);
    return {
      title: 'Circular Dependency',
      explanation: cyclePath
        ? `These nodes form a loop: ${cyclePath}. Items would circle forever.`
        : 'The main connections form a loop.',
      fix: 'Break the loop by removing one connection. For batch processing, use Loop Over Items with an explicit done branch.',
      code: error.code,
    };
  },

  // ── AI wiring ──────────────────────────────────────────────────────────

  INVALID_AI_CONNECTION(error) {
    const quoted = extractQuoted(error.message);
    const expected = quoted[3] ?? 'ai_*';
    return {
      title: 'Wrong AI Connection Type',
      explanation: `The connection from '${quoted[0] ?? 'unknown'}' to '${quoted[1] ?? 'unknown'}' is typed "main", but it links an AI sub-node to its parent.`,
      fix: `Use "${expected}" as the connection type on both ends (the outer key in "connections" and "type" in the target entry).`,
      code: error.code,
    };
  },

  MISSING_AI_INPUT(error) {
    const type = extractQuoted(error.message)[1] ?? 'ai_languageModel';
    return {
      title: 'Missing AI Sub-node',
      explanation: `Node '${nodeOf(error)}' needs a sub-node on its '${type}' input and has none.`,
      fix: type === 'ai_languageModel'
        ? 'Add a chat model node (e.g. OpenAI Chat Model) and connect it with an ai_languageModel connection.'
        : `Connect a matching sub-node with a '${type}' connection.`,
      code: error.code,
    };
  },

  AI_AGENT_NO_TOOLS(error) {
    return {
      title: 'Agent Without Tools',
      explanation: `Agent '${nodeOf(error)}' has no tools, so it can only answer from the language model.`,
      fix: 'Connect tool sub-nodes with ai_tool connections, or use a Basic LLM Chain if no tools are needed.',
      code: error.code,
    };
  },

  // ── Documentation lint ─────────────────────────────────────────────────

  DOC_INVALID_NODE_TYPE(error) {
    const type = extractQuoted(error.message)[0] ?? 'unknown';
    return {
      title: 'Invalid Node Type in Docs',
      explanation: `The documentation mentions '${type}', which does not follow the <package>.<camelCase> naming pattern.`,
      fix: "Write the full type, e.g. 'n8n-nodes-base.httpRequest'.",
      code: error.code,
    };
  },

  DOC_EXAMPLE_SECRET(error) {
    const key = extractQuoted(error.message)[0] ?? 'unknown';
    return {
      title: 'Secret in Example File',
      explanation: `'${key}' in a committed example file holds what looks like a real value.`,
      fix: `Replace it with a placeholder such as <your-${key.toLowerCase()}> and rotate the secret if it was real.`,
      code: error.code,
    };
  },
};

// ── Public API ─────────────────────────────────────────────────────────

/**
 * Get a friendly error object for a validator error, or null if the code is unmapped.
 */
export function getFriendlyError(error: ValidatorError): TFriendlyError | null {
  const mapper = errorMappers[error.code];
  if (!mapper) return null;
  return mapper(error);
}

/** Codes with a friendly mapping */
export function getFriendlyErrorCodes(): string[] {
  return Object.keys(errorMappers);
}

/**
 * Format all validation errors/warnings with friendly messages.
 * Falls back to the original message for unmapped error codes.
 */
export function formatFriendlyDiagnostics(
  errors: Array<ValidatorError & { type: 'error' | 'warning' }>
): string {
  if (errors.length === 0) return '';

  const lines: string[] = [];

  for (const error of errors) {
    const friendly = getFriendlyError(error);
    const severity = error.type === 'error' ? 'ERROR' : 'WARNING';

    if (friendly) {
      lines.push(`[${severity}] ${friendly.title}`);
      lines.push(`  ${friendly.explanation}`);
      lines.push(`  How to fix: ${friendly.fix}`);
      lines.push(`  Code: ${friendly.code}`);
    } else {
      lines.push(`[${severity}] ${error.code}`);
      lines.push(`  ${error.message}`);
    }

    lines.push('');
  }

  return lines.join('\n');
}
