import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

loadDotenv();

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Read when the library loads, so it never throws: an unknown `LOG_LEVEL`
 * falls back to `info` and any `NODE_ENV` is accepted.
 */
const loggerEnvSchema = z.object({
  NODE_ENV: z.string().optional().catch(undefined),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).catch('info'),
});

export type LoggerEnvironment = z.infer<typeof loggerEnvSchema>;

export function getLoggerEnv(): LoggerEnvironment {
  return loggerEnvSchema.parse(process.env);
}

const envSchema = z.object({
  GRAPHQL_ENDPOINT: z.string().url('GraphQL endpoint must be a valid URL').optional(),
  GRAPHQL_TIMEOUT: z.coerce.number().int().positive().default(30000),
  GRAPHQL_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  GRAPHQL_RETRY_SCOPE: z.enum(['call', 'client']).default('call'),
  GRAPHQL_TOKEN: z.string().min(1).optional(),

  OAUTH_CLIENT_ID: z.string().min(1).optional(),
  OAUTH_CLIENT_SECRET: z.string().min(1).optional(),
  OAUTH_TOKEN_URL: z.string().url('OAuth Token URL must be a valid URL').optional(),
  OAUTH_SCOPE: z.string().optional(),
});

export type Environment = z.infer<typeof envSchema>;

let cachedEnv: Environment | null = null;

export function getEnv(): Environment {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    const errorMessages = result.error.errors.map(
      (err) => `${err.path.join('.')}: ${err.message}`
    );
    throw new ConfigurationError(
      `Environment validation failed:\n${errorMessages.join('\n')}`,
      { issues: errorMessages }
    );
  }

  cachedEnv = result.data;
  return cachedEnv;
}

// Tests mutate process.env between cases.
export function resetEnv(): void {
  cachedEnv = null;
}
