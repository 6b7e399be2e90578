/**
 * Shared Command Helpers
 *
 * @module cli/commands/shared
 */

import { createRawText, type RawText } from '../../schemas/records.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';

/**
 * Join positional words into one text, the way a shell splits them.
 */
export function joinWords(words: readonly string[]): string {
  return words.join(' ');
}

/**
 * Build a RawText tagged as coming from the CLI.
 */
export function cliRawText(content: string, source: string): RawText {
  return createRawText({ content, source, metadata: { via: 'cli' } });
}

/**
 * Run a command body, report anything it throws, and set the exit code.
 *
 * @param body - Resolves with the exit code to report
 * @param cleanup - Always awaited after the body
 */
export async function runCommand(
  base: BaseCommand,
  body: () => Promise<ExitCode>,
  cleanup?: () => Promise<void>
): Promise<ExitCode> {
  let code: ExitCode;
  try {
    code = await body();
  } catch (error) {
    code = base.failWith(error);
  } finally {
    if (cleanup) {
      await cleanup();
    }
  }
  if (code !== EXIT_CODES.SUCCESS) {
    base.exitWith(code);
  }
  return code;
}
