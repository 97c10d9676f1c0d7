import { z, ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Flat-file storage
  DATA_DIR: z.string().min(1).default('./data'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Commission defaults
  DEFAULT_COMMISSION_RATE: z.coerce
    .number()
    .min(0, { message: 'DEFAULT_COMMISSION_RATE cannot be negative' })
    .default(0.5),
  COMPANY_NAME: z.string().default('Locksmith Services'),
  JOB_MARKER: z.string().trim().min(1).default('alpha job'),

  // Rate limiting (API)
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(120),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses environment variables, throwing ConfigError with every issue
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(
        'Environment validation failed',
        error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    throw error;
  }
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv();
  } catch (error) {
    if (error instanceof ConfigError && Array.isArray(error.details)) {
      console.error('❌ Environment validation failed:');
      error.details.forEach((issue) => {
        console.error(`  - ${String(issue)}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
