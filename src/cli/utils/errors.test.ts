import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { CLIError, CLIErrors, handleError, toCLIError } from './errors.js';
import { configureOutput } from './output.js';
import { ConnectionFailedError, CursorCreationError } from '../../errors.js';

describe('CLIError', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  it('should format the message with a suggestion', () => {
    const error = new CLIError('Something broke', 'Try again');

    expect(error.format()).toBe('✗ Something broke\n\n  Suggestion: Try again');
  });

  it('should serialize to JSON', () => {
    const error = CLIErrors.queryFailed('syntax error');

    expect(error.toJSON()).toEqual({
      error: 'Query failed: syntax error',
      suggestion: 'Check the SQL for syntax errors or missing tables',
      example: undefined,
    });
  });
});

describe('toCLIError', () => {
  it('should map connection failures', () => {
    const error = toCLIError(new ConnectionFailedError('db.local:3306', 4));

    expect(error).toBeInstanceOf(CLIError);
    expect(error.message).toBe(
      'Database connection failed: [db-session] Connection to db.local:3306 failed after 4 attempts'
    );
  });

  it('should map cursor failures', () => {
    const error = toCLIError(new CursorCreationError('db.local:3306', new Error('out of memory')));

    expect(error.message).toBe(
      'Could not create a cursor: [db-session] Cursor creation failed on db.local:3306: out of memory'
    );
  });

  it('should wrap thrown values that are not errors', () => {
    expect(toCLIError('boom').message).toBe('boom');
  });
});

describe('handleError', () => {
  beforeEach(() => {
    chalk.level = 0;
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    configureOutput({}, false);
  });

  it('should print the error and exit with 1', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    configureOutput({}, false);

    expect(() => handleError(new Error('bad things'))).toThrow('process.exit');
    expect(consoleError).toHaveBeenCalledWith('✗ bad things');
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should print JSON in JSON mode', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    configureOutput({ json: true }, false);

    expect(() => handleError(new Error('bad things'))).toThrow('process.exit');
    expect(consoleLog).toHaveBeenCalledWith(JSON.stringify({ error: 'bad things' }, null, 2));
  });
});
