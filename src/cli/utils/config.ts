import { z } from 'zod';
import type { ConnectionManagerOptions, DebugConfig } from '../../types.js';
import type { ConnectionFlags } from '../types.js';
import { CLIErrors } from './errors.js';

const DRIVER_NAMES = ['mysql', 'postgres'] as const;

/**
 * Connection settings after flags and environment are merged
 */
const ConnectionSettingsSchema = z.object({
  database: z.string({ required_error: 'database is required (--database or DB_NAME)' }).min(1),
  host: z.string({ required_error: 'host is required (--host or DB_HOST)' }).min(1),
  username: z.string({ required_error: 'user is required (--user or DB_USER)' }).min(1),
  password: z.string().default(''),
  port: z.coerce.number().int().min(1).max(65535).optional(),
  instance: z.string().optional(),
  driver: z.enum(DRIVER_NAMES).default('mysql'),
  retries: z.coerce.number().int().min(1).optional(),
});

export type ConnectionSettings = z.infer<typeof ConnectionSettingsSchema>;

/**
 * Merge connection flags with DB_* environment variables; flags win
 *
 * @throws CLIError listing every invalid or missing setting
 */
export function resolveConnectionSettings(
  flags: ConnectionFlags,
  env: NodeJS.ProcessEnv = process.env
): ConnectionSettings {
  const result = ConnectionSettingsSchema.safeParse({
    database: flags.database ?? env.DB_NAME,
    host: flags.host ?? env.DB_HOST,
    username: flags.user ?? env.DB_USER,
    password: flags.password ?? env.DB_PASSWORD,
    port: flags.port ?? env.DB_PORT,
    instance: flags.instance ?? env.DB_INSTANCE,
    driver: flags.driver ?? env.DB_DRIVER,
    retries: flags.retries,
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw CLIErrors.invalidConnectionConfig(problems);
  }

  return result.data;
}

/**
 * Build manager options from resolved settings
 */
export function toManagerOptions(settings: ConnectionSettings, debugConfig: DebugConfig): ConnectionManagerOptions {
  return {
    database: settings.database,
    host: settings.host,
    username: settings.username,
    password: settings.password,
    driver: settings.driver,
    debug: debugConfig,
    ...(settings.port !== undefined && { port: settings.port }),
    ...(settings.instance !== undefined && { instance: settings.instance }),
    ...(settings.retries !== undefined && { retry: { maxConnectionRetries: settings.retries } }),
  };
}
