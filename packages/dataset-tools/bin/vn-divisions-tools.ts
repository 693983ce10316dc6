#!/usr/bin/env tsx
/**
 * Dataset Tools CLI Entry Point
 *
 * Converts the government CSV exports into the canonical dataset files and
 * validates a dataset directory before it is published.
 *
 * @module vn-divisions-tools
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { registerConvertCommands } from '../src/cli/commands/convert/index.js';
import { registerValidateCommand } from '../src/cli/commands/validate/index.js';
import { EXIT_CODES, initializeContext, type GlobalOptions } from '../src/cli/lib/context.js';

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('vn-divisions-tools')
    .description('Build and check the Vietnam administrative divisions dataset')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .vn-divisionsrc)')
    .hook('preAction', async (thisCommand) => {
      try {
        await initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        console.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerConvertCommands(program);
  registerValidateCommand(program);

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
