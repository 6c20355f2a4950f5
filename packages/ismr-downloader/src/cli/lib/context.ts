/**
 * Command context: exit codes, global options, config + logger setup and
 * error-to-exit-code mapping shared by all commands.
 *
 * @module cli/lib/context
 */

import type { Command } from 'commander';
import { AuthError, ConfigError, InvalidRangeError } from '../../core/errors.js';
import type { RunSummary } from '../../core/types.js';
import { loadConfig, type ConfigOverrides, type DownloaderConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Run finished with failed or not-attempted chunks */
  INCOMPLETE: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  AUTH_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global Options
// ============================================================================

export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
}

/**
 * Read the program-level flags visible to a subcommand
 */
export function readGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    verbose: opts.verbose === true ? true : undefined,
    json: opts.json === true ? true : undefined,
    config: typeof opts.config === 'string' ? opts.config : undefined,
  };
}

export interface CommandContext {
  readonly config: DownloaderConfig;
  readonly logger: CLILogger;
}

export interface ContextSources {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
}

/**
 * Load configuration and build the logger it asks for
 *
 * @throws {ConfigError}
 */
export function createCommandContext(
  globals: GlobalOptions,
  overrides: ConfigOverrides = {},
  sources: ContextSources = {}
): CommandContext {
  const config = loadConfig({
    configPath: globals.config,
    overrides: { ...overrides, verbose: globals.verbose, json: globals.json },
    env: sources.env,
    cwd: sources.cwd,
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  return { config, logger };
}

// ============================================================================
// Exit Code Mapping
// ============================================================================

export function exitCodeForSummary(summary: RunSummary): ExitCode {
  if (summary.halt && summary.halt.reason !== 'maintenance') {
    return EXIT_CODES.AUTH_ERROR;
  }
  if (summary.failed > 0 || summary.notAttempted > 0) {
    return EXIT_CODES.INCOMPLETE;
  }
  return EXIT_CODES.SUCCESS;
}

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigError || error instanceof InvalidRangeError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof AuthError) {
    return EXIT_CODES.AUTH_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

/**
 * Log a command failure and return its exit code
 *
 * Without a logger (configuration never loaded) the message goes to stderr.
 */
export function reportFailure(
  logger: Pick<CLILogger, 'error'> | null,
  error: unknown
): ExitCode {
  const exitCode = exitCodeForError(error);
  const message =
    error instanceof ConfigError
      ? error.getSummary()
      : error instanceof Error
        ? error.message
        : String(error);

  if (logger) {
    logger.error(message, {
      error: error instanceof Error ? error.name : 'Error',
      exitCode,
      ...(error instanceof AuthError && error.status !== undefined ? { status: error.status } : {}),
    });
  } else {
    const label = exitCode === EXIT_CODES.CONFIG_ERROR ? 'Configuration error' : 'Error';
    console.error(`${label}: ${message}`);
  }

  return exitCode;
}

// ============================================================================
// TLS
// ============================================================================

/**
 * Turn off certificate verification for this process when configured
 *
 * Native fetch has no per-request switch; the process-wide setting also
 * covers the temporary artifact URLs.
 */
export function applyTlsSetting(config: DownloaderConfig, logger: CLILogger): void {
  if (!config.insecureTls) return;

  process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
  logger.warn('TLS certificate verification is disabled');
}
