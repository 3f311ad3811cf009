/**
 * Environment Configuration Validation
 *
 * This module provides centralized validation of environment variables.
 * Variables supply the defaults for the CLI and the `serve` mode; flags
 * given on the command line take precedence over them.
 *
 * Invalid values fail fast with a ConfigurationError listing every problem,
 * which the CLI reports as an invocation error.
 */
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';

const EnvSchema = z.object({
  // Service declaration file
  READINESS_CONFIG: z.string().min(1).default('readiness.json'),

  // CLI defaults
  READINESS_FORMAT: z.enum(['text', 'json']).default('text'),
  READINESS_CONCURRENCY: z.coerce.number().int().positive().default(4),
  READINESS_DEADLINE_SECONDS: z.coerce.number().positive().optional(),
  READINESS_POLICY: z.enum(['strict', 'lenient']).default('strict'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // `readiness serve`
  PORT: z.coerce.number().int().min(0).max(65535).default(8890),
  HOST: z.string().min(1).default('0.0.0.0'),
});

/**
 * Defines the shape of the application's configuration.
 */
export type AppConfig = Readonly<z.infer<typeof EnvSchema>>;

/**
 * Picks the variables this module knows about, treating empty strings as unset
 * so that `READINESS_DEADLINE_SECONDS=` in a .env file means "no deadline".
 */
function pickDefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Validates the environment and loads the configuration.
 * Should be called once at startup, after dotenv is loaded.
 *
 * @returns A frozen configuration object with validated environment variables.
 * @throws ConfigurationError when a variable has an invalid value.
 */
export function validateAndLoadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(pickDefined(env));
  if (!result.success) {
    throw new ConfigurationError(
      'Environment configuration validation failed',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return Object.freeze(result.data);
}
