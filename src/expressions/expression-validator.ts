/**
 * Expression checks for node parameters.
 *
 * n8n evaluates a parameter as an expression when its string value starts
 * with `=`; the dynamic parts sit between `{{` and `}}`:
 *
 *   "={{ $json.customer?.email }}"
 *   "=Hello {{ $('Webhook').item.json.name }}!"
 *
 * Checks per expression value:
 * - `{{` / `}}` are balanced (braces and quotes inside a block are respected)
 * - no block is empty
 * - every `$variable` is one n8n knows
 * - `$node["X"]`, `$node.X` and `$('X')` name nodes that exist in the workflow
 * - reserved words and hyphenated keys are not reached with dot access
 * - nested `$json` paths use optional chaining (warning only)
 */

import {
  EXPRESSION_PREFIX,
  KNOWN_EXPRESSION_VARIABLES,
  RESERVED_IDENTIFIERS,
} from '../constants.js';
import { didYouMean } from '../utils/string-distance.js';

export type TExpressionIssueCode =
  | 'MALFORMED_EXPRESSION'
  | 'EXPRESSION_MISSING_PREFIX'
  | 'EXPRESSION_UNGUARDED_PATH';

export type TExpressionIssue = {
  code: TExpressionIssueCode;
  severity: 'error' | 'warning';
  message: string;
  /** Parameter path, e.g. `options.headers[0].value` */
  property: string;
};

export type TExpressionContext = {
  /** Node names in the workflow; omit to skip node-reference checks */
  nodeNames?: ReadonlySet<string>;
};

export type TExpressionReport = {
  issues: TExpressionIssue[];
  /** Number of parameter values that were evaluated as expressions */
  expressionsValidated: number;
};

/** Parameters holding source code; `{{` inside them is code, not an expression */
const CODE_PARAMETER_NAMES = new Set(['jsCode', 'pythonCode', 'functionCode', 'code']);

const NODE_BRACKET_REF = /\$node\[\s*(["'`])((?:\\.|(?!\1)[^\\])*)\1\s*\]/g;
const NODE_DOT_REF = /\$node\.([A-Za-z_$][\w$]*)/g;
const NODE_CALL_REF = /\$\(\s*(["'`])((?:\\.|(?!\1)[^\\])*)\1/g;
const STRING_LITERAL = /(["'`])(?:\\.|(?!\1)[^\\])*\1/g;
const VARIABLE_REF = /(^|[^\w$.])(\$[A-Za-z_][\w$]*)/g;
const DOT_ACCESS = /(?:\?\.|\.)\s*([A-Za-z_$][\w$]*)/g;
const HYPHENATED_KEY = /\.([A-Za-z_][\w]*(?:-[A-Za-z_][\w]*)+)(?![\w$])/g;
const JSON_ROOT = /(?:^|[^\w$])\$json\b|\.json\b/g;

export type TBlockScan = {
  blocks: string[];
  problems: string[];
};

/**
 * Split an expression body into its `{{ }}` blocks, reporting delimiter problems.
 *
 * Single braces outside blocks are literal text (JSON bodies such as
 * `={ "user": { "id": {{ $json.id }} } }`), so a `}` only counts as a stray
 * delimiter once every literal `{` before it has been closed.
 */
export function scanExpressionBlocks(body: string): TBlockScan {
  const blocks: string[] = [];
  const problems: string[] = [];
  let literalDepth = 0;
  let i = 0;

  while (i < body.length) {
    if (body.startsWith('{{', i)) {
      const start = i + 2;
      let j = start;
      let depth = 0;
      let quote: string | null = null;
      let closed = false;

      while (j < body.length) {
        const ch = body[j];
        if (quote) {
          if (ch === '\\') {
            j += 2;
            continue;
          }
          if (ch === quote) quote = null;
          j++;
          continue;
        }
        if (ch === '"' || ch === "'" || ch === '`') {
          quote = ch;
        } else if (ch === '{') {
          depth++;
        } else if (ch === '}') {
          if (depth === 0 && body[j + 1] === '}') {
            closed = true;
            break;
          }
          if (depth > 0) depth--;
        }
        j++;
      }

      if (!closed) {
        problems.push(`Unclosed "{{" at position ${i}`);
        break;
      }
      blocks.push(body.slice(start, j));
      i = j + 2;
      continue;
    }

    const ch = body[i];
    if (ch === '{') {
      literalDepth++;
    } else if (ch === '}') {
      if (literalDepth > 0) {
        literalDepth--;
      } else if (body[i + 1] === '}') {
        problems.push(`"}}" at position ${i} has no matching "{{"`);
        i += 2;
        continue;
      }
    }
    i++;
  }

  return { blocks, problems };
}

/** Blank out string literal contents, keeping positions aligned with the source */
function maskStrings(code: string): string {
  return code.replace(STRING_LITERAL, (literal) => literal[0] + ' '.repeat(literal.length - 2) + literal[0]);
}

function checkNodeReferences(block: string, ctx: TExpressionContext): string[] {
  const nodeNames = ctx.nodeNames;
  if (!nodeNames) return [];
  const problems: string[] = [];
  const report = (name: string, syntax: string) => {
    if (!nodeNames.has(name)) {
      problems.push(`${syntax} references node "${name}" which does not exist in the workflow.${didYouMean(name, nodeNames)}`);
    }
  };

  for (const match of block.matchAll(NODE_BRACKET_REF)) {
    report(match[2], '$node[...]');
  }
  for (const match of block.matchAll(NODE_CALL_REF)) {
    report(match[2], '$(...)');
  }
  for (const match of maskStrings(block).matchAll(NODE_DOT_REF)) {
    report(match[1], '$node.<name>');
  }
  return problems;
}

function checkVariables(code: string): string[] {
  const problems: string[] = [];
  for (const match of code.matchAll(VARIABLE_REF)) {
    const variable = match[2];
    if (!KNOWN_EXPRESSION_VARIABLES.has(variable)) {
      problems.push(`Unknown variable "${variable}".${didYouMean(variable, KNOWN_EXPRESSION_VARIABLES)}`);
    }
  }
  return problems;
}

function checkReservedAccess(code: string): string[] {
  const problems: string[] = [];
  for (const match of code.matchAll(DOT_ACCESS)) {
    const key = match[1];
    if (RESERVED_IDENTIFIERS.has(key)) {
      problems.push(`Reserved word "${key}" used with dot access; write ["${key}"] instead`);
    }
  }
  for (const match of code.matchAll(HYPHENATED_KEY)) {
    const key = match[1];
    problems.push(`Key "${key}" is not a valid identifier; write ["${key}"] instead`);
  }
  return problems;
}

/**
 * Find `$json.a.b`-style paths that are two or more levels deep without any
 * optional chaining. Method calls end a path (`$json.name.trim()` is one level).
 * `masked` is `source` with string contents blanked; paths are cut from `source`.
 */
function findUnguardedPaths(source: string, masked: string): string[] {
  const paths: string[] = [];
  for (const match of masked.matchAll(JSON_ROOT)) {
    const matchStart = match.index ?? 0;
    const isMemberRoot = match[0].startsWith('.');
    let chainStart = matchStart + match[0].indexOf(isMemberRoot ? '.' : '$');
    if (isMemberRoot) {
      // Walk back to the start of `$input.item` / `$('Node').item`
      while (chainStart > 0 && /[\w$.[\]()"'`?]/.test(masked[chainStart - 1])) chainStart--;
    }

    let i = matchStart + match[0].length;
    let segments = 0;
    let guarded = false;

    while (i < masked.length) {
      if (masked.startsWith('?.', i)) {
        guarded = true;
        i += 2;
        if (masked[i] === '[') continue;
      } else if (masked[i] === '.') {
        i += 1;
      } else if (masked[i] === '[') {
        const close = masked.indexOf(']', i);
        if (close === -1) break;
        segments++;
        i = close + 1;
        continue;
      } else {
        break;
      }

      const ident = /^[A-Za-z_$][\w$]*/.exec(masked.slice(i));
      if (!ident) break;
      const after = i + ident[0].length;
      if (masked[after] === '(') break;
      segments++;
      i = after;
    }

    if (segments >= 2 && !guarded) {
      paths.push(source.slice(chainStart, i));
    }
  }
  return paths;
}

/**
 * Validate a single parameter value. Returns null when the value is not an
 * expression at all.
 */
export function validateExpressionValue(
  value: string,
  property: string,
  ctx: TExpressionContext = {}
): TExpressionIssue[] | null {
  const hasPrefix = value.startsWith(EXPRESSION_PREFIX);
  const hasDelimiters = value.includes('{{');
  if (!hasPrefix && !hasDelimiters) return null;

  const issues: TExpressionIssue[] = [];
  const malformed = (message: string) =>
    issues.push({ code: 'MALFORMED_EXPRESSION', severity: 'error', message, property });

  if (!hasPrefix) {
    issues.push({
      code: 'EXPRESSION_MISSING_PREFIX',
      severity: 'warning',
      message: `Value contains "{{ }}" but does not start with "=", so n8n treats it as literal text`,
      property,
    });
  }

  const body = hasPrefix ? value.slice(EXPRESSION_PREFIX.length) : value;
  const { blocks, problems } = scanExpressionBlocks(body);
  problems.forEach(malformed);

  for (const block of blocks) {
    if (block.trim() === '') {
      malformed('Empty expression "{{ }}"');
      continue;
    }
    checkNodeReferences(block, ctx).forEach(malformed);
    const masked = maskStrings(block);
    checkVariables(masked).forEach(malformed);
    checkReservedAccess(masked).forEach(malformed);

    for (const path of findUnguardedPaths(block, masked)) {
      issues.push({
        code: 'EXPRESSION_UNGUARDED_PATH',
        severity: 'warning',
        message: `"${path}" reads a nested field without optional chaining; it fails when a parent field is missing. Use "?." (e.g. $json.a?.b)`,
        property,
      });
    }
  }

  return issues;
}

function joinPath(parent: string, key: string | number): string {
  if (typeof key === 'number') return `${parent}[${key}]`;
  return parent ? `${parent}.${key}` : key;
}

/**
 * Walk a node's parameters (nested objects and arrays included) and validate
 * every expression value found.
 */
export function validateParameterExpressions(
  parameters: Record<string, unknown>,
  ctx: TExpressionContext = {}
): TExpressionReport {
  const issues: TExpressionIssue[] = [];
  let expressionsValidated = 0;

  const visit = (value: unknown, path: string, key: string | number) => {
    if (typeof value === 'string') {
      if (typeof key === 'string' && CODE_PARAMETER_NAMES.has(key) && !value.startsWith(EXPRESSION_PREFIX)) {
        return;
      }
      const found = validateExpressionValue(value, path, ctx);
      if (found) {
        expressionsValidated++;
        issues.push(...found);
      }
      return;
    }
    if (Array.isArray(value)) {
      value.forEach((item, index) => visit(item, joinPath(path, index), index));
      return;
    }
    if (value !== null && typeof value === 'object') {
      for (const [childKey, child] of Object.entries(value)) {
        visit(child, joinPath(path, childKey), childKey);
      }
    }
  };

  for (const [key, value] of Object.entries(parameters)) {
    visit(value, key, key);
  }

  return { issues, expressionsValidated };
}
