import { z } from 'zod';
import { ConfigurationError } from '../../domain/model/ApiError.js';
import type { LogThreshold } from '../logging/JsonLogger.js';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
    message: `Expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`,
  })
  .transform((value) => TRUE_VALUES.includes(value));

/** Environment variables understood by `CloudnsClient.fromEnv()`. Every one is optional. */
const envSchema = z.object({
  CLOUDNS_API_AUTH_ID: z.string().optional(),
  CLOUDNS_API_SUB_AUTH_ID: z.string().optional(),
  CLOUDNS_API_SUB_AUTH_USER: z.string().optional(),
  CLOUDNS_API_AUTH_PASSWORD: z.string().optional(),
  CLOUDNS_API_DEBUG: booleanFlag.optional(),
  CLOUDNS_API_TESTING: booleanFlag.optional(),
  CLOUDNS_API_BASE_URL: z.string().url().optional(),
  CLOUDNS_API_TIMEOUT: z.coerce.number().int().positive().optional(),
  CLOUDNS_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
});

export interface EnvSettings {
  readonly authId?: string;
  readonly subAuthId?: string;
  readonly subAuthUser?: string;
  readonly authPassword?: string;
  readonly debug?: boolean;
  readonly testing?: boolean;
  readonly baseUrl?: string;
  readonly timeout?: number;
  readonly logLevel?: LogThreshold;
}

function withoutBlanks(env: Readonly<Record<string, string | undefined>>): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[name] = value;
    }
  }
  return present;
}

/**
 * Read client settings from environment variables. Unset and blank variables
 * are ignored; a malformed value throws `ConfigurationError` naming the variable.
 */
export function loadEnvSettings(env: Readonly<Record<string, string | undefined>> = process.env): EnvSettings {
  const parsed = envSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new ConfigurationError(`Invalid value for ${variable}: ${issue?.message ?? 'invalid value'}`);
  }

  const vars = parsed.data;
  return {
    authId: vars.CLOUDNS_API_AUTH_ID,
    subAuthId: vars.CLOUDNS_API_SUB_AUTH_ID,
    subAuthUser: vars.CLOUDNS_API_SUB_AUTH_USER,
    authPassword: vars.CLOUDNS_API_AUTH_PASSWORD,
    debug: vars.CLOUDNS_API_DEBUG,
    testing: vars.CLOUDNS_API_TESTING,
    baseUrl: vars.CLOUDNS_API_BASE_URL,
    timeout: vars.CLOUDNS_API_TIMEOUT,
    logLevel: vars.CLOUDNS_LOG_LEVEL,
  };
}
