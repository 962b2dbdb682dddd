#!/usr/bin/env node

/**
 * shapecast CLI - infer type declarations from line-delimited JSON
 */

import { Command } from 'commander';
import { createInferCommand } from './commands/infer.js';
import { logger } from '../utils/logger.js';

const pkg = {
  name: 'shapecast',
  version: '0.1.0',
  description: 'Infer static type declarations from line-delimited JSON arrays',
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version);

  // `shapecast file.jsonl` runs infer
  program.addCommand(createInferCommand(), { isDefault: true });

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

// Run CLI
main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error('Unexpected error', { error: message });
  console.error(JSON.stringify({
    status: 'error',
    error: {
      code: 'UNEXPECTED_ERROR',
      message,
    },
  }, null, 2));
  process.exit(1);
});
