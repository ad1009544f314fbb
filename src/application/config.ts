import { hostname } from 'node:os';
import { z } from 'zod';
import { CollectorUrl, DispatchError } from '../domain/index.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Empty strings are treated as "not set". */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v === '' ? undefined : v));

/**
 * Zod schema for the environment variables the client reads.
 *
 * Everything has a default, so an empty environment is valid.
 */
export const envSchema = z.object({
  ECHO_COLLECTOR: optionalText.pipe(z.enum([CollectorUrl.Stage, CollectorUrl.Prod]).default(CollectorUrl.Stage)),
  LOG_LEVEL: optionalText.pipe(z.enum(LOG_LEVELS).default('info')),
  ECHO_APPLICATION_VERSION: optionalText,
  ECHO_DATA_CENTER: optionalText,
  HOSTNAME: optionalText,
});

export interface EchoConfig {
  readonly collector: CollectorUrl;
  readonly logLevel: LogLevel;
  readonly applicationVersion: string | undefined;
  readonly dataCenter: string | undefined;
  readonly host: string;
}

/**
 * Reads client configuration from the environment.
 *
 * Throws a `config` DispatchError listing every invalid variable.
 */
export function loadEchoConfig(env: NodeJS.ProcessEnv = process.env): EchoConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new DispatchError('config', detail, { cause: parsed.error });
  }

  const vars = parsed.data;
  return {
    collector: vars.ECHO_COLLECTOR,
    logLevel: vars.LOG_LEVEL,
    applicationVersion: vars.ECHO_APPLICATION_VERSION,
    dataCenter: vars.ECHO_DATA_CENTER,
    host: vars.HOSTNAME ?? hostname(),
  };
}

/** Returns a required variable, or throws a `config` DispatchError. */
export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new DispatchError('config', `${name} is not set`);
  }
  return value;
}
