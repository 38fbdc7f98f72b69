import { Command } from 'commander';
import { createConnectionManager } from '../../manager.js';
import {
  resolveConnectionSettings,
  toManagerOptions,
  createCliDebugConfig,
  createStatusSpinner,
  formatRows,
  isOutputFormat,
  OUTPUT_FORMATS,
  CLIErrors,
  handleError,
  isJsonMode,
  printResult,
  printDetail,
  printJson,
} from '../utils/index.js';
import type { QueryJsonOutput, QueryOptions } from '../types.js';
import { addConnectionOptions } from './connection-options.js';

export const queryCommand = addConnectionOptions(
  new Command('query')
    .description('Execute a SQL statement and print the rows')
    .argument('<sql>', 'SQL statement to execute')
    .option('-f, --format <format>', 'Output format: table, json, csv', 'table')
)
  .addHelpText('after', `
Examples:
  $ db-session query "SELECT id, name FROM users" -d app -H localhost -u app -p secret
  $ DB_NAME=app DB_HOST=localhost DB_USER=app db-session query "SELECT 1" --format csv
  $ db-session query "SELECT * FROM orders" --json | jq '.rowCount'
`)
  .action(async (sql: string, options: QueryOptions) => {
    const spinner = createStatusSpinner('Connecting...');

    try {
      const format = options.format;
      if (!isOutputFormat(format)) {
        throw CLIErrors.invalidFormat(format, OUTPUT_FORMATS);
      }

      const settings = resolveConnectionSettings(options);
      printDetail(`Using ${settings.driver} driver for ${settings.host}`);

      spinner.start();
      const manager = await createConnectionManager(toManagerOptions(settings, createCliDebugConfig()));

      await manager.use(async (db) => {
        spinner.text = 'Running query...';
        const outcome = await db.query(sql);

        if (!outcome.ok) {
          throw CLIErrors.queryFailed(outcome.error.message);
        }

        spinner.succeed(`${outcome.rows.length} row${outcome.rows.length === 1 ? '' : 's'} from ${db}`);

        if (isJsonMode()) {
          const jsonOutput: QueryJsonOutput = {
            target: db.toString(),
            rowCount: outcome.rows.length,
            rows: outcome.rows,
          };
          printJson(jsonOutput);
          return;
        }

        printResult(formatRows(outcome.rows, format));
      });
    } catch (err) {
      spinner.fail(err instanceof Error ? err.message : String(err));
      handleError(err);
    }
  });
