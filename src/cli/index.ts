#!/usr/bin/env node
/**
 * toolloop CLI - Runs scripted tool-calling conversations and manages the
 * local workspace
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { runCommand } from './commands/run.js';
import { configCommand } from './commands/config.js';
import { logsCommand } from './commands/logs.js';

function readVersion(): string {
  const packagePath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
  }
  return '0.1.0';
}

/**
 * Creates and configures the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('toolloop')
    .description('Drive a model through tool-calling rounds until it answers')
    .version(readVersion(), '-v, --version', 'Display version number');

  program.addCommand(runCommand());
  program.addCommand(configCommand());
  program.addCommand(logsCommand());

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
