import ora from 'ora';
import chalk from 'chalk';
import type { DebugConfig, DebugContext } from '../../types.js';
import type { GlobalFlags } from '../types.js';

/**
 * How command results reach the terminal
 *
 * `json` prints only the machine-readable result on stdout; manager log
 * lines and spinners are suppressed so the output stays parseable.
 */
export interface OutputSettings {
  mode: 'text' | 'json';
  verbose: boolean;
  quiet: boolean;
  interactive: boolean;
}

/**
 * The part of an ora spinner the commands drive
 */
export interface Spinner {
  text: string;
  start(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
}

let settings: OutputSettings = {
  mode: 'text',
  verbose: false,
  quiet: false,
  interactive: process.stdout.isTTY ?? false,
};

/**
 * Apply the global flags; `interactive` defaults to whether stdout is a TTY
 */
export function configureOutput(
  flags: GlobalFlags,
  interactive: boolean = process.stdout.isTTY ?? false
): OutputSettings {
  settings = {
    mode: flags.json === true ? 'json' : 'text',
    verbose: flags.verbose === true,
    quiet: flags.quiet === true,
    interactive,
  };

  if (flags.color === false || !interactive) {
    chalk.level = 0;
  }

  return settings;
}

export function getOutputSettings(): OutputSettings {
  return settings;
}

export function isJsonMode(): boolean {
  return settings.mode === 'json';
}

const silentSpinner: Spinner = {
  text: '',
  start: () => silentSpinner,
  succeed: () => silentSpinner,
  fail: () => silentSpinner,
};

/**
 * Spinner for the connect/query phase; silent unless a human is watching
 */
export function createStatusSpinner(text: string): Spinner {
  if (!settings.interactive || settings.quiet || isJsonMode()) {
    return silentSpinner;
  }
  return ora({ text, color: 'cyan' });
}

/**
 * Print a result line (suppressed by --quiet and --json)
 */
export function printResult(text: string): void {
  if (isJsonMode() || settings.quiet) return;
  console.log(text);
}

/**
 * Print the JSON document for --json
 */
export function printJson(data: unknown): void {
  if (!isJsonMode()) return;
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print a detail line shown with --verbose only
 */
export function printDetail(text: string): void {
  if (!settings.verbose || isJsonMode()) return;
  console.log(chalk.dim(`[debug] ${text}`));
}

/**
 * Print a problem on stderr
 */
export function printProblem(text: string): void {
  if (isJsonMode()) return;
  console.error(marks.fail(text));
}

export const marks = {
  ok: (text: string): string => chalk.green('✓ ') + text,
  fail: (text: string): string => chalk.red('✗ ') + text,
  dim: (text: string): string => chalk.dim(text),
  example: (text: string): string => chalk.cyan(text),
};

/**
 * Route one manager log line: errors to stderr, the rest as verbose detail
 */
export function printManagerEvent(message: string, context: DebugContext): void {
  if (context.level === 'error') {
    printProblem(message);
  } else {
    printDetail(message);
  }
}

/**
 * Logger settings for managers created by a command
 *
 * Connection errors always show (outside --json); connect attempts, queries
 * and results only with --verbose.
 */
export function createCliDebugConfig(): DebugConfig {
  return {
    enabled: !isJsonMode(),
    level: settings.verbose ? 'debug' : 'error',
    logger: printManagerEvent,
  };
}
