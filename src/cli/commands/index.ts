/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - emit: Write the documents of an emit plan transactionally
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerEmitCommand } from './emit.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerEmitCommand(program);
}

/**
 * Get help text for all available commands.
 *
 * @returns Array of command help entries
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [{ name: 'emit <plan>', description: 'Write all documents of an emit plan, or none of them' }];
}
