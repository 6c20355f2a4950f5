/**
 * Commands Index
 *
 * Registers every subcommand on the program.
 */

import type { Command } from 'commander';
import { registerAuthCommands } from './auth.js';
import { registerDownloadCommand } from './download.js';
import { registerPlanCommand } from './plan.js';

export { executeDownload, type DownloadOptions } from './download.js';
export { executePlan, planRows, type PlanOptions, type PlanRow } from './plan.js';
export { executeLogin, executeStatus, executeClear, type AuthOptions } from './auth.js';

export function registerCommands(program: Command): void {
  registerDownloadCommand(program);
  registerPlanCommand(program);
  registerAuthCommands(program);
}
