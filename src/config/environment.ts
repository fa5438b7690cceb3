/**
 * Centralized environment variable configuration
 * Validates and provides typed access to all environment variables
 */

import { z } from 'zod';
import { HASH_CONFIG, VALIDATION_PATTERNS } from '../constants.js';

const EnvironmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Hashing
  MERKLE_HASH_ALGORITHM: z.string()
    .regex(VALIDATION_PATTERNS.ALGORITHM, 'Invalid hash algorithm name')
    .default(HASH_CONFIG.DEFAULT_ALGORITHM),

  // Logging configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().min(1).optional()
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let cachedEnv: Environment | null = null;

/**
 * Get validated environment configuration
 * Caches the result for performance
 */
export function getEnvironment(): Environment {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = EnvironmentSchema.parse(process.env);
    return cachedEnv;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

export function resetEnvironment(): void {
  cachedEnv = null;
}
