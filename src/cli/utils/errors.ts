import { ConnectionFailedError, CursorCreationError } from '../../errors.js';
import { marks, isJsonMode } from './output.js';

/**
 * CLI Error with actionable suggestions
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly example?: string
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines: string[] = [marks.fail(this.message)];

    if (this.suggestion) {
      lines.push('');
      lines.push(marks.dim('  Suggestion: ') + this.suggestion);
    }

    if (this.example) {
      lines.push('');
      lines.push(marks.dim('  Example:'));
      lines.push(marks.example('    ' + this.example));
    }

    return lines.join('\n');
  }

  /**
   * Format as JSON for machine-readable output
   */
  toJSON(): { error: string; suggestion?: string; example?: string } {
    return {
      error: this.message,
      suggestion: this.suggestion,
      example: this.example,
    };
  }
}

/**
 * Common CLI errors with pre-defined suggestions
 */
export const CLIErrors = {
  invalidConnectionConfig: (problems: string[]) =>
    new CLIError(
      `Invalid connection settings: ${problems.join('; ')}`,
      'Pass the connection flags or set DB_NAME, DB_HOST, DB_USER and DB_PASSWORD',
      'db-session query "SELECT 1" --database app --host localhost --user app --password secret'
    ),

  connectionFailed: (reason: string) =>
    new CLIError(
      `Database connection failed: ${reason}`,
      'Check the host, port and credentials, and ensure the database is running',
      'db-session check --host localhost --port 3306'
    ),

  cursorFailed: (reason: string) =>
    new CLIError(
      `Could not create a cursor: ${reason}`,
      'The connection opened but is no longer usable; retry the command'
    ),

  queryFailed: (reason: string) =>
    new CLIError(
      `Query failed: ${reason}`,
      'Check the SQL for syntax errors or missing tables'
    ),

  invalidFormat: (format: string, validFormats: readonly string[]) =>
    new CLIError(
      `Invalid format: '${format}'`,
      `Valid formats are: ${validFormats.join(', ')}`,
      `db-session query "SELECT 1" --format=${validFormats[0]}`
    ),
};

/**
 * Map library errors onto CLI errors with suggestions
 */
export function toCLIError(err: unknown): CLIError | Error {
  if (err instanceof CLIError) return err;
  if (err instanceof ConnectionFailedError) return CLIErrors.connectionFailed(err.message);
  if (err instanceof CursorCreationError) return CLIErrors.cursorFailed(err.message);
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Handle an error and exit the process
 */
export function handleError(err: unknown): never {
  const cliError = toCLIError(err);

  if (isJsonMode()) {
    if (cliError instanceof CLIError) {
      console.log(JSON.stringify(cliError.toJSON(), null, 2));
    } else {
      console.log(JSON.stringify({ error: cliError.message }, null, 2));
    }
    process.exit(1);
  }

  if (cliError instanceof CLIError) {
    console.error(cliError.format());
  } else {
    console.error(marks.fail(cliError.message));
  }

  process.exit(1);
}
