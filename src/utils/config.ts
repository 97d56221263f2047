/**
 * Configuration management
 * Loads and validates environment configuration
 */

import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables
config();

export const DEFAULT_RPC_URL = 'http://rpc.cellframe.net/connect';

const ConfigSchema = z.object({
  // Ledger RPC
  CELLFRAME_RPC_URL: z.string().url().default(DEFAULT_RPC_URL),
  CELLFRAME_NETWORK: z.string().min(1).default('Backbone'),
  CELLFRAME_CHAIN: z.string().min(1).default('main'),

  // Transport
  RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

/**
 * Get validated configuration
 * Throws if configuration is invalid
 */
export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = ConfigSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new Error(`Invalid configuration:\n${errors.join('\n')}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads process.env
 */
export function resetConfig(): void {
  cachedConfig = null;
}

