#!/usr/bin/env tsx
/**
 * Bulk Geocoder CLI Entry Point
 *
 * @module bulk-geocoder-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { CLI_NAME } from '../src/cli/index.js';

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(here, '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    console.error(
      `Could not read package version: ${error instanceof Error ? error.message : String(error)}`
    );
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Geocode CSV files in bulk with resumable, rate-limited provider calls')
    .version(getVersion(), '-V, --version', 'Output the version number');

  registerCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
