/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import type { ContextFactory } from '../lib/context.js';
import { registerDescribeCommand } from './describe.js';
import { registerSummarizeCommand } from './summarize.js';

export { executeSummarize, registerSummarizeCommand } from './summarize.js';
export { executeDescribe, registerDescribeCommand } from './describe.js';

/**
 * Register every command on the program
 */
export function registerCommands(program: Command, createContext: ContextFactory): void {
  registerSummarizeCommand(program, createContext);
  registerDescribeCommand(program, createContext);
}
