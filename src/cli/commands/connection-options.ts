import type { Command } from 'commander';

/**
 * Add the connection flags every command accepts
 */
export function addConnectionOptions(command: Command): Command {
  return command
    .option('-d, --database <name>', 'Database name (env: DB_NAME)')
    .option('-H, --host <host>', 'Server host (env: DB_HOST)')
    .option('-u, --user <user>', 'Login user (env: DB_USER)')
    .option('-p, --password <password>', 'Login password (env: DB_PASSWORD)')
    .option('-P, --port <port>', 'Server port, defaults to the driver port (env: DB_PORT)')
    .option('--instance <label>', 'Informational instance label (env: DB_INSTANCE)')
    .option('--driver <driver>', 'Driver: mysql or postgres (env: DB_DRIVER)')
    .option('--retries <count>', 'Attempt limit; one fewer connection attempts are made');
}
