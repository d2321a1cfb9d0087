/**
 * # n8n Graph Validator Constants
 *
 * Package prefixes, connection types and identifier lists shared by the
 * registry, the expression checker and the validator.
 *
 * ## Connection types
 *
 * Every edge in an n8n workflow has a connection type on both ends:
 *
 * ```
 * ┌───────────────────┬──────────────────────────────────────────────────┐
 * │ main              │ Item data flowing from one node to the next      │
 * │ ai_languageModel  │ Chat model sub-node → agent / chain              │
 * │ ai_tool           │ Tool sub-node → agent                            │
 * │ ai_memory         │ Memory sub-node → agent                          │
 * │ ai_outputParser   │ Output parser sub-node → chain                   │
 * │ ai_* (others)     │ Embeddings, vector stores, retrievers, ...       │
 * └───────────────────┴──────────────────────────────────────────────────┘
 * ```
 *
 * Sub-nodes point *at* their parent: a chat model node has an `ai_languageModel`
 * output and the agent has an `ai_languageModel` input. Only `main` edges carry
 * execution order, so only `main` edges are considered for cycles and for the
 * "every non-trigger node has an incoming edge" rule.
 */

export const MAIN_CONNECTION_TYPE = 'main' as const;

export const AI_CONNECTION_TYPES = [
  'ai_agent',
  'ai_chain',
  'ai_document',
  'ai_embedding',
  'ai_languageModel',
  'ai_memory',
  'ai_outputParser',
  'ai_retriever',
  'ai_reranker',
  'ai_textSplitter',
  'ai_tool',
  'ai_vectorStore',
] as const;

export type AiConnectionType = (typeof AI_CONNECTION_TYPES)[number];
export type ConnectionType = typeof MAIN_CONNECTION_TYPE | AiConnectionType;

export const CONNECTION_TYPES: readonly ConnectionType[] = [MAIN_CONNECTION_TYPE, ...AI_CONNECTION_TYPES];

export function isAiConnectionType(value: string): value is AiConnectionType {
  return AI_CONNECTION_TYPES.some((type) => type === value);
}

export function isConnectionType(value: string): value is ConnectionType {
  return value === MAIN_CONNECTION_TYPE || isAiConnectionType(value);
}

// ── Node type naming ──────────────────────────────────────────────────

export const CORE_PACKAGES = {
  BASE: 'n8n-nodes-base',
  LANGCHAIN: '@n8n/n8n-nodes-langchain',
} as const;

/** Short prefixes that some tools emit; n8n itself only accepts the full package name. */
export const SHORT_PACKAGE_PREFIXES: Record<string, string> = {
  'nodes-base': CORE_PACKAGES.BASE,
  'nodes-langchain': CORE_PACKAGES.LANGCHAIN,
  'n8n-nodes-langchain': CORE_PACKAGES.LANGCHAIN,
};

/**
 * `<package>.<camelCase>`, where package is an npm name (optionally scoped).
 * Community packages follow the same shape, e.g. `n8n-nodes-mcp.mcpClient`.
 */
export const NODE_TYPE_PATTERN = /^(@[a-z0-9][a-z0-9-]*\/)?[a-z0-9][a-z0-9-]*\.[a-z][a-zA-Z0-9]*$/;

export function isCorePackageType(type: string): boolean {
  return type.startsWith(`${CORE_PACKAGES.BASE}.`) || type.startsWith(`${CORE_PACKAGES.LANGCHAIN}.`);
}

export const STICKY_NOTE_TYPE = 'n8n-nodes-base.stickyNote';

export function isStickyNoteType(type: string): boolean {
  return type === STICKY_NOTE_TYPE;
}

/**
 * Name-based trigger detection, used when a node type has no schema.
 * Schemas carry an explicit `isTrigger` flag that takes precedence.
 */
export function looksLikeTriggerType(type: string): boolean {
  const shortName = type.slice(type.lastIndexOf('.') + 1);
  return /trigger$/i.test(shortName) || shortName === 'webhook' || shortName === 'start';
}

// ── Expressions ───────────────────────────────────────────────────────

/** Parameter values starting with this character are evaluated as expressions */
export const EXPRESSION_PREFIX = '=';

export const KNOWN_EXPRESSION_VARIABLES = new Set([
  '$',
  '$binary',
  '$data',
  '$env',
  '$evaluateExpression',
  '$execution',
  '$fromAI',
  '$fromai',
  '$if',
  '$ifEmpty',
  '$input',
  '$item',
  '$itemIndex',
  '$items',
  '$jmespath',
  '$json',
  '$max',
  '$min',
  '$node',
  '$now',
  '$pageCount',
  '$parameter',
  '$position',
  '$prevNode',
  '$request',
  '$response',
  '$runIndex',
  '$secrets',
  '$today',
  '$vars',
  '$workflow',
]);

/** JavaScript reserved words that cannot follow a `.` in n8n's expression sandbox without brackets */
export const RESERVED_IDENTIFIERS = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default',
  'delete', 'do', 'else', 'enum', 'export', 'extends', 'false', 'finally', 'for',
  'function', 'if', 'import', 'in', 'instanceof', 'new', 'null', 'return',
  'super', 'switch', 'this', 'throw', 'true', 'try', 'typeof', 'var', 'void',
  'while', 'with', 'yield',
]);

// ── Validation vocabulary ─────────────────────────────────────────────

export const ENVIRONMENTS = ['development', 'staging', 'production'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export const VALIDATION_PROFILES = ['minimal', 'runtime', 'ai-friendly', 'strict'] as const;
export type ValidationProfile = (typeof VALIDATION_PROFILES)[number];

/**
 * The six documented situations in which a warning is commonly a false
 * positive and may be knowingly overridden.
 */
export const FALSE_POSITIVE_CATEGORIES = [
  'optional-default',
  'dev-credentials',
  'runtime-expression',
  'community-node',
  'deprecated-property',
  'ai-tool-flexibility',
] as const;
export type FalsePositiveCategory = (typeof FALSE_POSITIVE_CATEGORIES)[number];

export function isFalsePositiveCategory(value: string): value is FalsePositiveCategory {
  return FALSE_POSITIVE_CATEGORIES.some((category) => category === value);
}
