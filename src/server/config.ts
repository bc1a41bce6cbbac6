import dotenv from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const configSchema = z.object({
  POS_SYNC_DATA_DIR: z.string().trim().min(1).default('./data-local'),
  POS_SYNC_DB_FILE: z.string().trim().min(1).default('pos-sync.sqlite3'),
  POS_SYNC_HOST: z.string().trim().min(1).default('127.0.0.1'),
  POS_SYNC_PORT: intFromEnv(8080, 0, 65535),
  POS_SYNC_BUSY_TIMEOUT_MS: intFromEnv(2000, 0, 60_000),
  POS_SYNC_LOCK_RETRIES: intFromEnv(3, 1, 20),
  POS_SYNC_LOCK_BACKOFF_MS: intFromEnv(100, 0, 10_000),
  POS_SYNC_RATES_DIR: z.string().trim().min(1).default('./data'),
  POS_SYNC_MAX_BODY_BYTES: intFromEnv(2 * 1024 * 1024, 1024, 64 * 1024 * 1024),
});

export interface ServerConfig {
  dataDir: string;
  dbPath: string;
  host: string;
  port: number;
  busyTimeoutMs: number;
  lockRetries: number;
  lockBackoffMs: number;
  ratesDir: string;
  maxBodyBytes: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A `config.env` inside the data directory takes precedence over a `.env` in the working directory.
 */
export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): void {
  const dataDir = path.resolve(env.POS_SYNC_DATA_DIR || './data-local');
  const runtimeEnvPath = path.join(dataDir, 'config.env');

  if (fs.existsSync(runtimeEnvPath)) {
    dotenv.config({ path: runtimeEnvPath, processEnv: env });
    return;
  }

  dotenv.config({ processEnv: env });
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  Object.entries(env).forEach(([key, value]) => {
    cleaned[key] = value === undefined || value.trim() === '' ? undefined : value;
  });
  return cleaned;
}

export function readServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = configSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }

  const values = parsed.data;
  const dataDir = path.resolve(values.POS_SYNC_DATA_DIR);
  return {
    dataDir,
    dbPath: path.join(dataDir, values.POS_SYNC_DB_FILE),
    host: values.POS_SYNC_HOST,
    port: values.POS_SYNC_PORT,
    busyTimeoutMs: values.POS_SYNC_BUSY_TIMEOUT_MS,
    lockRetries: values.POS_SYNC_LOCK_RETRIES,
    lockBackoffMs: values.POS_SYNC_LOCK_BACKOFF_MS,
    ratesDir: path.resolve(values.POS_SYNC_RATES_DIR),
    maxBodyBytes: values.POS_SYNC_MAX_BODY_BYTES,
  };
}
