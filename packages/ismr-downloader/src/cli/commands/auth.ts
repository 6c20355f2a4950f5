/**
 * Auth Commands
 *
 * - login: exchange ISMR_EMAIL / ISMR_PASSWORD for a token and cache it
 * - status: show the cached token's expiry
 * - clear: delete the cached token
 */

import type { Command } from 'commander';
import { FileTokenCache } from '../../auth/token-cache.js';
import { TokenStore } from '../../auth/token-store.js';
import { IsmrApiClient } from '../../acquisition/ismr-api-client.js';
import { systemClock, type Clock } from '../../core/clock.js';
import { HTTPClient } from '../../core/http-client.js';
import { formatInstant } from '../../core/time-range.js';
import { formatDuration } from '../lib/logger.js';
import { requireCredentials } from '../lib/config.js';
import {
  applyTlsSetting,
  createCommandContext,
  readGlobalOptions,
  reportFailure,
  EXIT_CODES,
  type CommandContext,
  type ContextSources,
  type ExitCode,
  type GlobalOptions,
} from '../lib/context.js';

export interface AuthOptions {
  readonly tokenCache?: string;
  readonly baseUrl?: string;
  readonly insecure?: boolean;
}

export interface AuthDependencies extends ContextSources {
  readonly clock?: Clock;
}

/**
 * Register all auth subcommands
 */
export function registerAuthCommands(program: Command): void {
  const auth = program.command('auth').description('Manage the cached API token');

  auth
    .command('login')
    .description('Authenticate now and cache a fresh token')
    .option('--token-cache <path>', 'Token cache file')
    .option('--base-url <url>', 'API base URL')
    .option('--insecure', 'Disable TLS certificate verification')
    .action(async (options: AuthOptions, command: Command) => {
      process.exitCode = await executeLogin(options, readGlobalOptions(command));
    });

  auth
    .command('status')
    .description('Show the cached token expiry')
    .option('--token-cache <path>', 'Token cache file')
    .action(async (options: AuthOptions, command: Command) => {
      process.exitCode = await executeStatus(options, readGlobalOptions(command));
    });

  auth
    .command('clear')
    .description('Delete the cached token')
    .option('--token-cache <path>', 'Token cache file')
    .action(async (options: AuthOptions, command: Command) => {
      process.exitCode = await executeClear(options, readGlobalOptions(command));
    });
}

function openContext(
  options: AuthOptions,
  globals: GlobalOptions,
  sources: ContextSources
): CommandContext {
  return createCommandContext(
    globals,
    { tokenCache: options.tokenCache, baseUrl: options.baseUrl, insecure: options.insecure },
    sources
  );
}

/**
 * Force a credential exchange and persist the token
 */
export async function executeLogin(
  options: AuthOptions,
  globals: GlobalOptions,
  deps: AuthDependencies = {}
): Promise<ExitCode> {
  let context: CommandContext;
  try {
    context = openContext(options, globals, deps);
  } catch (error) {
    return reportFailure(null, error);
  }

  const { config, logger } = context;

  try {
    const credentials = requireCredentials(config);
    logger.commandStart('auth login', { email: credentials.email });
    applyTlsSetting(config, logger);

    const api = new IsmrApiClient({
      apiBaseUrl: config.apiBaseUrl,
      email: credentials.email,
      password: credentials.password,
      mode: config.mode,
      http: new HTTPClient({ timeoutMs: config.requestTimeoutMs }),
    });
    const store = new TokenStore({
      authenticator: api,
      cache: new FileTokenCache(config.tokenCache),
      clock: deps.clock,
    });

    store.forceReauth();
    const token = await store.getValidToken();

    logger.commandEnd(true, {
      expiresAt: formatInstant(token.expiresAt),
      cache: config.tokenCache,
    });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(logger, error);
  }
}

/**
 * Report whether a usable token is cached
 */
export async function executeStatus(
  options: AuthOptions,
  globals: GlobalOptions,
  deps: AuthDependencies = {}
): Promise<ExitCode> {
  let context: CommandContext;
  try {
    context = openContext(options, globals, deps);
  } catch (error) {
    return reportFailure(null, error);
  }

  const { config, logger } = context;
  const now = (deps.clock ?? systemClock).now();

  try {
    const token = await new FileTokenCache(config.tokenCache).load();

    if (!token) {
      logger.info('No cached token', { cache: config.tokenCache });
    } else if (token.expiresAt <= now) {
      logger.warn('Cached token expired', { expiresAt: formatInstant(token.expiresAt) });
    } else {
      logger.info('Cached token valid', {
        expiresAt: formatInstant(token.expiresAt),
        remaining: formatDuration(token.expiresAt - now),
      });
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(logger, error);
  }
}

/**
 * Remove the token cache file
 */
export async function executeClear(
  options: AuthOptions,
  globals: GlobalOptions,
  deps: ContextSources = {}
): Promise<ExitCode> {
  let context: CommandContext;
  try {
    context = openContext(options, globals, deps);
  } catch (error) {
    return reportFailure(null, error);
  }

  const { config, logger } = context;

  try {
    await new FileTokenCache(config.tokenCache).clear();
    logger.info('Token cache cleared', { cache: config.tokenCache });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(logger, error);
  }
}
