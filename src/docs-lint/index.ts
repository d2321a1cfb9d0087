/**
 * Documentation lint
 *
 * Two checks for docs that ship next to workflows:
 * - node type strings quoted in markdown follow `<package>.<camelCase>`
 * - committed `*.example` files hold placeholders, never real secrets
 */

import * as path from 'path';
import { CORE_PACKAGES } from '../constants.js';

export type TDocLintCode = 'DOC_INVALID_NODE_TYPE' | 'DOC_EXAMPLE_SECRET';

export type TDocLintIssue = {
  type: 'error';
  code: TDocLintCode;
  message: string;
  /** 1-based */
  line: number;
  file?: string;
};

const CORE_TYPE_PREFIXES = [`${CORE_PACKAGES.BASE}.`, `${CORE_PACKAGES.LANGCHAIN}.`];
const CORE_TYPE_PATTERN = /^(n8n-nodes-base|@n8n\/n8n-nodes-langchain)\.[a-z][a-zA-Z0-9]*$/;
const INLINE_CODE = /`([^`\n]+)`/g;

const SECRET_KEY_PARTS = ['key', 'token', 'secret', 'password', 'apikey'];

const ENV_ASSIGNMENT = /^\s*(?:export\s+)?([A-Za-z_][\w.-]*)\s*=\s*(.*)$/;
const JSON_ASSIGNMENT = /"([^"]+)"\s*:\s*"((?:\\.|[^"\\])*)"/g;
const YAML_ASSIGNMENT = /^\s*(?:-\s+)?([A-Za-z_][\w.-]*)\s*:\s*(.*)$/;

/**
 * Every inline-code string that starts with a core package prefix must be a
 * well-formed node type, e.g. `n8n-nodes-base.httpRequest`.
 */
export function checkNodeTypeReferences(text: string): TDocLintIssue[] {
  const issues: TDocLintIssue[] = [];
  text.split(/\r?\n/).forEach((content, index) => {
    for (const match of content.matchAll(INLINE_CODE)) {
      const value = match[1].trim();
      if (!CORE_TYPE_PREFIXES.some((prefix) => value.startsWith(prefix))) continue;
      if (CORE_TYPE_PATTERN.test(value)) continue;
      issues.push({
        type: 'error',
        code: 'DOC_INVALID_NODE_TYPE',
        message: `Node type "${value}" does not match <package>.<camelCase>`,
        line: index + 1,
      });
    }
  });
  return issues;
}

export function isSecretKey(key: string): boolean {
  const normalized = key.toLowerCase().replace(/[^a-z0-9]/g, '');
  return SECRET_KEY_PARTS.some((part) => normalized.includes(part));
}

export function isPlaceholderValue(raw: string): boolean {
  const value = raw.trim().replace(/^(["'])(.*)\1$/, '$2').trim();
  if (value === '') return true;
  if (/^<.*>$/.test(value)) return true;
  if (/^\$\{.*\}$/.test(value)) return true;
  const lower = value.toLowerCase();
  if (lower.startsWith('your')) return true;
  if (/^(changeme|example|placeholder)/.test(lower)) return true;
  return /^x{3,}/.test(lower);
}

function stripInlineComment(value: string): string {
  return value.replace(/\s+#.*$/, '');
}

/**
 * Flag secret-looking assignments (`KEY=value`, `"key": "value"`,
 * `key: value`) whose value is not a placeholder.
 */
export function scanExampleFile(content: string): TDocLintIssue[] {
  const issues: TDocLintIssue[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) return;

    const assignments: Array<[string, string]> = [];
    const jsonMatches = [...line.matchAll(JSON_ASSIGNMENT)];
    if (jsonMatches.length > 0) {
      jsonMatches.forEach((m) => assignments.push([m[1], m[2]]));
    } else {
      const env = ENV_ASSIGNMENT.exec(line);
      const yaml = env ? null : YAML_ASSIGNMENT.exec(line);
      const match = env ?? yaml;
      if (match) assignments.push([match[1], stripInlineComment(match[2])]);
    }

    for (const [key, value] of assignments) {
      if (!isSecretKey(key) || isPlaceholderValue(value)) continue;
      issues.push({
        type: 'error',
        code: 'DOC_EXAMPLE_SECRET',
        message: `"${key}" holds a value that looks like a real secret`,
        line: index + 1,
      });
    }
  });

  return issues;
}

export function isExampleFile(filePath: string): boolean {
  const base = path.basename(filePath);
  return base.endsWith('.example') || base.includes('.example.');
}

export function isMarkdownFile(filePath: string): boolean {
  return /\.mdx?$/i.test(filePath);
}

/** Run the checks that apply to a file, based on its name */
export function lintDocument(filePath: string, content: string): TDocLintIssue[] {
  const issues: TDocLintIssue[] = [];
  if (isMarkdownFile(filePath)) issues.push(...checkNodeTypeReferences(content));
  if (isExampleFile(filePath)) issues.push(...scanExampleFile(content));
  return issues.map((issue) => ({ ...issue, file: filePath }));
}
