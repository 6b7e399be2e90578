/**
 * Show Command
 *
 * Reads one stored record back by storage id.
 *
 * @module cli/commands/show
 */

import { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { openStore } from '../runtime.js';
import { formatStoredRecord } from '../formatters/result-summary.js';
import type { StoreConnector } from '../../storage/connector.js';
import { runCommand } from './shared.js';

export interface ShowOptions {
  json?: boolean;
}

/**
 * Register the show command.
 */
export function registerShowCommand(program: Command): void {
  program
    .command('show <storageId>')
    .description('Show a stored record')
    .option('--json', 'Print the record as JSON')
    .action(async (storageId: string, options: ShowOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await handleShow(storageId, options, base);
    });
}

/**
 * Handle the show command.
 *
 * @param connectorFactory - Opens the store; tests pass a prepared connector
 */
export async function handleShow(
  storageId: string,
  options: ShowOptions,
  base: BaseCommand,
  connectorFactory: (base: BaseCommand) => StoreConnector = (b) => openStore(b.options).connector
): Promise<ExitCode> {
  let connector: StoreConnector | undefined;
  return runCommand(
    base,
    async () => {
      const store = connectorFactory(base);
      connector = store;
      base.debug(`Looking up ${storageId} in ${store.name}`);

      const record = await store.findById(storageId);
      if (!record) {
        base.error(`No record with storage id ${storageId}`);
        return EXIT_CODES.NOT_FOUND;
      }

      if (options.json) {
        base.json(record);
      } else {
        base.info(formatStoredRecord(record));
      }
      return EXIT_CODES.SUCCESS;
    },
    async () => {
      await connector?.close();
    }
  );
}
