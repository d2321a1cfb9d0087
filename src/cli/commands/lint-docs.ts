/**
 * Lint-docs command - checks markdown node type references and example files
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { isExampleFile, isMarkdownFile, lintDocument, type TDocLintIssue } from '../../docs-lint/index.js';
import { getFriendlyError } from '../../friendly-errors.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { logger } from '../utils/logger.js';

export interface LintDocsOptions {
  json?: boolean;
}

/**
 * Expand a file, directory or glob into the files the doc checks apply to
 */
export async function findDocumentFiles(input: string): Promise<string[]> {
  let pattern = input;
  if (fs.existsSync(input) && fs.statSync(input).isDirectory()) {
    pattern = path.join(input, '**/*');
  }

  const matches = await glob(pattern.split(path.sep).join('/'), {
    absolute: true,
    nodir: true,
    dot: true,
    ignore: ['**/node_modules/**'],
  });
  return matches.filter((file) => isMarkdownFile(file) || isExampleFile(file)).sort();
}

export async function lintDocsCommand(input: string, options: LintDocsOptions = {}): Promise<void> {
  const { json = false } = options;

  try {
    const files = await findDocumentFiles(input);
    if (files.length === 0) {
      if (json) {
        logger.json({ error: `No markdown or example files found matching: ${input}` });
      } else {
        logger.error(`No markdown or example files found matching: ${input}`);
      }
      process.exitCode = 1;
      return;
    }

    const issues: TDocLintIssue[] = [];
    for (const file of files) {
      issues.push(...lintDocument(file, fs.readFileSync(file, 'utf8')));
    }

    if (json) {
      logger.json({ valid: issues.length === 0, totalFiles: files.length, issues });
    } else {
      logger.section('Linting Docs');
      for (const issue of issues) {
        const where = `${path.relative(process.cwd(), issue.file ?? '')}:${issue.line}`;
        const friendly = getFriendlyError(issue);
        logger.error(`${where} ${issue.message}`);
        if (friendly) {
          logger.info(`    How to fix: ${friendly.fix}`);
        }
      }
      if (issues.length === 0) {
        logger.success(`${files.length} file(s) checked, no issues`);
      } else {
        logger.error(`${issues.length} issue(s) in ${files.length} file(s)`);
      }
    }

    if (issues.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (json) {
      logger.json({ error: getErrorMessage(error) });
    } else {
      logger.error(`Doc lint failed: ${getErrorMessage(error)}`);
    }
    process.exitCode = 1;
  }
}
