/**
 * Backend Environment Variable Validation
 *
 * Validates the environment at startup with zod. Every variable has a
 * default, so a bare checkout starts against the local directories.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', 'True', 'False', '1', '0'])
  .transform((val) => val === 'true' || val === 'True' || val === '1');

const backendEnvSchema = z.object({
  // Server Configuration
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // CORS
  ENABLE_CORS: booleanFlag.default('false'),
  CORS_ORIGINS: z.string().default('*'),

  // Rate limiting (requests per minute per IP)
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),

  // Directories and files
  TEMPLATES_DIR: z.string().min(1).default('./templates'),
  CONTRACTS_DIR: z.string().min(1).default('./contracts'),
  KEYSTORE_DIR: z.string().min(1).default('./keystore'),
  NETWORKS_FILE: z.string().min(1).default('./networks.json'),

  // Chain access
  CHAIN_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  PUBLICATION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  EXPLORER_API_KEY: z.string().optional(),

  // Feature Flags
  STRICT_TEMPLATES: booleanFlag.default('false'),
});

/**
 * Parsed and validated backend environment variables
 */
export type BackendEnv = z.infer<typeof backendEnvSchema>;

/**
 * Get validated backend environment variables
 *
 * @throws {Error} If environment variables are invalid
 */
export function getBackendEnv(source: NodeJS.ProcessEnv = process.env): BackendEnv {
  const result = backendEnvSchema.safeParse(source);
  if (!result.success) {
    const invalidVars = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
    throw new Error(`Invalid backend environment variables:\n${invalidVars}`);
  }
  return result.data;
}

/** Comma-separated allow-list; `*` allows every origin. */
export function parseCorsOrigins(value: string): string[] | '*' {
  const origins = value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.length === 0 || origins.includes('*') ? '*' : origins;
}
