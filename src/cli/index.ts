#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { queryCommand, checkCommand } from './commands/index.js';
import { configureOutput } from './utils/output.js';
import type { GlobalFlags } from './types.js';

// Handle graceful exit on SIGINT (Ctrl+C)
process.on('SIGINT', () => {
  console.log(chalk.cyan('\n\n  Interrupted.\n'));
  process.exit(130);
});

const program = new Command();

program
  .name('db-session')
  .description('Run SQL against one database connection with bounded connect retries')
  .version('0.1.0')
  .option('--json', 'Output as JSON (machine-readable)')
  .option('-v, --verbose', 'Show verbose output')
  .option('-q, --quiet', 'Only show errors')
  .option('--no-color', 'Disable colored output')
  .hook('preAction', (thisCommand) => {
    configureOutput(thisCommand.opts<GlobalFlags>());
  });

program.addHelpText('after', `
Examples:
  $ db-session check -d app -H localhost -u app -p secret
  $ db-session query "SELECT id, name FROM users" --format csv
  $ db-session query "SELECT 1" --json | jq '.rows'

Environment:
  DB_NAME, DB_HOST, DB_USER, DB_PASSWORD, DB_PORT, DB_INSTANCE, DB_DRIVER
`);

program.addCommand(queryCommand);
program.addCommand(checkCommand);

await program.parseAsync();
