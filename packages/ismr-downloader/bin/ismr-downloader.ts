#!/usr/bin/env node
/**
 * ismr-downloader CLI Entry Point
 *
 * Bulk download of ISMR query tool data: chunked requests per station,
 * shared rate limit and token, per-run reports.
 *
 * @module ismr-downloader-cli
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES } from '../src/cli/lib/context.js';

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));

  // Source layout (bin/) or compiled layout (dist/bin/)
  for (const packageJsonPath of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    if (!existsSync(packageJsonPath)) continue;
    try {
      const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    } catch (error) {
      console.error(
        `Cannot read ${packageJsonPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('ismr-downloader')
    .description('Download ISMR query tool data in rate-limited, resumable chunks')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON lines (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .ismrrc, searched upward)');

  registerCommands(program);

  return program;
}

async function main(): Promise<void> {
  // .env values never override variables already set in the environment
  loadDotenv();

  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(EXIT_CODES.ERRORS);
});
