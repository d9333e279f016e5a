import dotenv from 'dotenv';
import { ServerConfig, StorageConfig } from '../types/index.js';

dotenv.config();

function intFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : fallback;
}

// Ports and timeouts: zero or negative means "use the default"
function positiveIntFromEnv(value: string | undefined, fallback: number): number {
  const parsed = intFromEnv(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

function optionalFromEnv(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

export function loadServerConfig(): ServerConfig {
  return {
    port: positiveIntFromEnv(process.env.PORT, 3000),
    host: process.env.HOST || '0.0.0.0',
  };
}

export function loadStorageConfig(): StorageConfig {
  const ttlSeconds = intFromEnv(process.env.REDIS_TTL_SECONDS, 0);

  return {
    backend: optionalFromEnv(process.env.BACKEND),
    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: positiveIntFromEnv(process.env.REDIS_PORT, 6379),
      username: optionalFromEnv(process.env.REDIS_USERNAME),
      password: optionalFromEnv(process.env.REDIS_PASSWORD),
      db: intFromEnv(process.env.REDIS_DB, 0),
      ttlSeconds: ttlSeconds > 0 ? ttlSeconds : undefined,
      connectTimeoutMs: positiveIntFromEnv(process.env.REDIS_CONNECT_TIMEOUT_MS, 5000),
      commandTimeoutMs: positiveIntFromEnv(process.env.REDIS_COMMAND_TIMEOUT_MS, 5000),
      maxRetriesPerRequest: intFromEnv(process.env.REDIS_MAX_RETRIES_PER_REQUEST, 1),
    },
    gcs: {
      bucket: process.env.GCS_BUCKET || 'notes',
      prefix: process.env.GCS_PREFIX || '',
      projectId: optionalFromEnv(process.env.GCS_PROJECT_ID),
      keyFilename: optionalFromEnv(process.env.GCS_KEY_FILENAME),
      apiEndpoint: optionalFromEnv(process.env.GCS_API_ENDPOINT),
      timeoutMs: positiveIntFromEnv(process.env.GCS_TIMEOUT_MS, 10000),
      maxRetries: intFromEnv(process.env.GCS_MAX_RETRIES, 3),
    },
  };
}
