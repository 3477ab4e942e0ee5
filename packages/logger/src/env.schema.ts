import { z } from 'zod';

import { LOG_LEVELS, type LogLevel } from './logger.js';

export const loggerEnvSchema = z.object({
  CLEARLEDGER_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  CLEARLEDGER_LOG_COLOR: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate the logging environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Level to run with: `--verbose` lowers the configured level to debug, never raises it.
 */
export function resolveLogLevel(configured: LogLevel, verbose: boolean): LogLevel {
  if (!verbose) return configured;
  return configured === 'trace' ? 'trace' : 'debug';
}
