#!/usr/bin/env node
/**
 * n8n-graph-validator CLI
 * Command-line interface for validating n8n workflow files and their docs
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import { validateCommand, type ValidateOptions } from './commands/validate.js';
import { collect, nodeInfoCommand, type NodeInfoOptions } from './commands/node-info.js';
import { lintDocsCommand, type LintDocsOptions } from './commands/lint-docs.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      fs.readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf8')
    );
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch (error) {
    logger.debug(`Cannot read package version: ${getErrorMessage(error)}`);
  }
  return '0.0.0-dev';
}

function parseTypeVersion(value: string): number {
  const version = Number(value);
  if (!Number.isFinite(version) || version <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return version;
}

const program = new Command();

program
  .name('n8n-graph-validator')
  .description('Validate n8n workflow graphs before they are imported or deployed')
  .version(readVersion(), '-v, --version', 'Output the current version');

program.configureOutput({
  writeErr: (str) => {
    const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
    if (trimmed) {
      logger.error(trimmed);
    }
  },
  writeOut: (str) => process.stdout.write(str),
});

// Validate command
program
  .command('validate <input>')
  .description('Validate workflow JSON files (a file, a directory or a glob)')
  .option('--verbose', 'Verbose output', false)
  .option('-q, --quiet', 'Suppress warnings', false)
  .option('--json', 'Output results as JSON', false)
  .option('--strict', 'Shorthand for --profile strict', false)
  .option('-p, --profile <profile>', 'Validation profile: minimal, runtime, ai-friendly, strict')
  .option('-e, --env <environment>', 'Target environment: development, staging, production')
  .option('--node-types <files...>', 'Extra node type catalog files')
  .option('--credentials <file>', 'Credential inventory file')
  .option('--ignore <codes...>', 'Warning codes to suppress')
  .option('--ignore-category <categories...>', 'False-positive categories to suppress')
  .option('-c, --config <path>', 'Config file (default: n8n-graph-validator.config.{yaml,yml,json})')
  .action(async (input: string, options: ValidateOptions) => {
    try {
      await validateCommand(input, options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

// Node-info command
program
  .command('node-info <type>')
  .description("Show a node type's properties, optionally for a given configuration")
  .option('-s, --set <key=value>', 'Parameter value; repeat for several', collect)
  .option('--type-version <version>', 'typeVersion to evaluate (default: latest)', parseTypeVersion)
  .option('--node-types <files...>', 'Extra node type catalog files')
  .option('--json', 'Output as JSON', false)
  .action((type: string, options: NodeInfoOptions) => {
    try {
      nodeInfoCommand(type, options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

// Lint-docs command
program
  .command('lint-docs <input>')
  .description('Check node type references in markdown and secrets in *.example files')
  .option('--json', 'Output results as JSON', false)
  .action(async (input: string, options: LintDocsOptions) => {
    try {
      await lintDocsCommand(input, options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

program.on('--help', () => {
  logger.newline();
  logger.section('Examples');
  logger.log("  $ n8n-graph-validator validate 'workflows/**/*.json'");
  logger.log('  $ n8n-graph-validator validate workflows/ --env production --credentials creds.json');
  logger.log('  $ n8n-graph-validator validate flow.json --profile ai-friendly --json');
  logger.log('  $ n8n-graph-validator node-info n8n-nodes-base.slack --set resource=message --set operation=post');
  logger.log('  $ n8n-graph-validator lint-docs docs/');
  logger.newline();
});

// Parse arguments
program.parse(process.argv);

// Show help if no command specified
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
