/**
 * Environment configuration
 *
 * Parsed once at startup; an invalid value stops the process.
 */

import { z } from 'zod';

export const API_ROLES = ['gateway', 'auditor', 'admin'] as const;

export type ApiRole = (typeof API_ROLES)[number];

const ApiKeysSchema = z
  .string()
  .default('')
  .transform((value, ctx) => {
    const keys = new Map<string, ApiRole>();
    for (const entry of value.split(',').map((part) => part.trim()).filter(Boolean)) {
      const separator = entry.lastIndexOf(':');
      const key = entry.slice(0, separator);
      const role = API_ROLES.find((candidate) => candidate === entry.slice(separator + 1));
      if (separator <= 0 || !role) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'API_KEYS entries must look like key:gateway, key:auditor or key:admin',
        });
        return z.NEVER;
      }
      keys.set(key, role);
    }
    return keys;
  });

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  SEALED_BALLOT_DATA_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  API_KEYS: ApiKeysSchema,
  IDENTITY_TOKEN_TTL_HOURS: z.coerce.number().positive().default(168),
  BALLOT_TOKEN_TTL_MINUTES: z.coerce.number().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  TALLY_PAGE_SIZE: z.coerce.number().int().positive().max(5000).default(500),
});

export interface AppConfig {
  port: number;
  host: string;
  /** Unset means in-memory storage */
  dataDir: string | undefined;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  apiKeys: Map<string, ApiRole>;
  identityTokenTtlHours: number;
  ballotTokenTtlMinutes: number;
  rateLimitMax: number;
  tallyPageSize: number;
}

/**
 * Read configuration from environment variables
 *
 * @throws ZodError when a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    dataDir: parsed.SEALED_BALLOT_DATA_DIR,
    logLevel: parsed.LOG_LEVEL,
    apiKeys: parsed.API_KEYS,
    identityTokenTtlHours: parsed.IDENTITY_TOKEN_TTL_HOURS,
    ballotTokenTtlMinutes: parsed.BALLOT_TOKEN_TTL_MINUTES,
    rateLimitMax: parsed.RATE_LIMIT_MAX,
    tallyPageSize: parsed.TALLY_PAGE_SIZE,
  };
}
