/**
 * CLI Commands Registry
 *
 * Available commands:
 * - process: Clean, analyze and store text
 * - clean: Preview cleaning
 * - analyze: Preview cleaning and scoring
 * - show: Read a stored record
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerProcessCommand } from './process.js';
import { registerCleanCommand } from './clean.js';
import { registerAnalyzeCommand } from './analyze.js';
import { registerShowCommand } from './show.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerProcessCommand(program);
  registerCleanCommand(program);
  registerAnalyzeCommand(program);
  registerShowCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'process [text...]', description: 'Clean, analyze and store text' },
    { name: 'clean <text...>', description: 'Show what cleaning does to text, without storing it' },
    { name: 'analyze <text...>', description: 'Clean and score text, without storing it' },
    { name: 'show <storageId>', description: 'Show a stored record' },
  ];
}
