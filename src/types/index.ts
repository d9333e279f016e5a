/**
 * Core type definitions for notes-api
 */

export interface Note {
  id: string;
  title: string;
  content: string;
}

/**
 * Body of a create or full-replacement update. The id comes from the path
 * or is generated, never from the body.
 */
export interface CreateNoteRequest {
  title: string;
  content: string;
}

export type BackendKind = 'memory' | 'redis' | 'gcs';

export interface RedisConfig {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db: number;
  ttlSeconds?: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  maxRetriesPerRequest: number;
}

export interface GcsConfig {
  bucket: string;
  prefix: string;
  projectId?: string;
  keyFilename?: string;
  apiEndpoint?: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface StorageConfig {
  /** Raw backend selector as configured; resolved by the BackendProvider. */
  backend?: string;
  redis: RedisConfig;
  gcs: GcsConfig;
}

export interface ServerConfig {
  port: number;
  host: string;
}
