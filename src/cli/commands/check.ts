import { Command } from 'commander';
import { createConnectionManager } from '../../manager.js';
import { ConnectionFailedError } from '../../errors.js';
import {
  resolveConnectionSettings,
  toManagerOptions,
  createCliDebugConfig,
  createStatusSpinner,
  handleError,
  isJsonMode,
  printResult,
  printJson,
  marks,
} from '../utils/index.js';
import type { CheckJsonOutput, CheckOptions } from '../types.js';
import { addConnectionOptions } from './connection-options.js';

export const checkCommand = addConnectionOptions(
  new Command('check').description('Open a connection and report its status')
)
  .addHelpText('after', `
Examples:
  $ db-session check -d app -H localhost -u app -p secret
  $ db-session check --driver postgres --retries 3 --json
`)
  .action(async (options: CheckOptions) => {
    const spinner = createStatusSpinner('Connecting...');

    try {
      const settings = resolveConnectionSettings(options);

      spinner.start();
      const manager = await createConnectionManager(toManagerOptions(settings, createCliDebugConfig()));

      await manager.use(async (db) => {
        if (db.hasConnectionError) {
          throw new ConnectionFailedError(db.target, db.connectionAttempts);
        }

        spinner.succeed(`Connected to ${db}`);

        if (isJsonMode()) {
          const json = db.toJSON();
          const jsonOutput: CheckJsonOutput = {
            target: db.target,
            database: json.database,
            driver: json.driver,
            status: json.status,
            attempts: db.connectionAttempts,
            ...(json.instance !== undefined && { instance: json.instance }),
          };
          printJson(jsonOutput);
          return;
        }

        printResult(marks.ok(`${db.driverName} ${db.target} is reachable`));
        printResult(marks.dim(`  attempts: ${db.connectionAttempts}`));
      });
    } catch (err) {
      spinner.fail(err instanceof Error ? err.message : String(err));
      handleError(err);
    }
  });
