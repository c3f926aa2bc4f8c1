import { ConfigError } from './errors.js';

export const DEFAULT_MDB_URL = 'http://localhost:22338';

export interface MdbClientConfig {
  url: string;
  userId: string;
  correlationId?: string;
  sourceSystem?: string;
  batchId?: string;
  forceHost?: string;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Read client configuration from the environment
 */
export function loadConfig(env: Env = process.env): MdbClientConfig {
  const userId = optional(env, 'MDB_USER_ID');
  if (!userId) {
    throw new ConfigError('MDB_USER_ID must be set');
  }

  const url = optional(env, 'MDB_URL') ?? DEFAULT_MDB_URL;
  try {
    new URL(url);
  } catch {
    throw new ConfigError(`MDB_URL is not a valid URL: ${url}`);
  }

  return {
    url,
    userId,
    correlationId: optional(env, 'MDB_CORRELATION_ID'),
    sourceSystem: optional(env, 'MDB_SOURCE_SYSTEM'),
    batchId: optional(env, 'MDB_BATCH_ID'),
    forceHost: optional(env, 'MDB_FORCE_HOST')
  };
}
