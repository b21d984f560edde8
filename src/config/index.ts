import { z } from 'zod';
import { EnvConfig } from '../types';

/**
 * Environment variable schema
 * Every variable has a default except NAME_TABLES_PATH, which is optional.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  NAME_TABLES_PATH: z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined)),
  MAX_CANDIDATES: z.coerce.number().int().positive().default(10000),
  // body-parser size string, e.g. 512kb or 2mb
  JSON_BODY_LIMIT: z
    .string()
    .regex(/^\d+(b|kb|mb)$/i, 'Expected a size such as 512kb or 1mb')
    .default('1mb'),
});

/**
 * Parse and validate environment variables.
 * Exits the process with a readable message when the environment is invalid.
 */
const parseEnv = (): EnvConfig => {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const issues = result.error.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    // eslint-disable-next-line no-console
    console.error(`❌ Invalid environment configuration:\n${issues}`);
    process.exit(1);
  }

  return result.data;
};

export const env: EnvConfig = parseEnv();

export default env;
