import { Redis } from 'ioredis';

import {
  BackendUnavailableError,
  NoteNotFoundError,
  type BackendOperation,
} from '../core/errors.js';
import { decodeNotePayload, encodeNotePayload } from '../core/note-codec.js';
import type { CreateNoteRequest, Note, RedisConfig } from '../types/index.js';
import logger from '../utils/logger.js';
import type { NoteBackend } from './note-backend.js';

const SCAN_PAGE_SIZE = 100;

/**
 * Redis-backed NoteBackend implementation.
 * Each note is a string value holding the JSON payload, keyed by its id.
 */
export class RedisNoteBackend implements NoteBackend {
  private readonly client: Redis;
  private readonly ttlSeconds?: number;

  constructor(config: RedisConfig) {
    this.ttlSeconds = config.ttlSeconds;
    this.client = new Redis({
      host: config.host,
      port: config.port,
      username: config.username,
      password: config.password,
      db: config.db,
      connectTimeout: config.connectTimeoutMs,
      commandTimeout: config.commandTimeoutMs,
      maxRetriesPerRequest: config.maxRetriesPerRequest,
    });

    this.client.on('error', (error: Error) => {
      logger.warn({ error, host: config.host, port: config.port }, 'Redis connection error');
    });
  }

  async get(id: string): Promise<Note> {
    const payload = await this.run('get', { id }, () => this.client.get(id));
    if (payload === null) {
      throw new NoteNotFoundError(id);
    }
    try {
      return decodeNotePayload(id, payload);
    } catch (error) {
      logger.error({ error, id }, 'Stored Redis payload is not a note');
      throw new BackendUnavailableError('redis', 'get', error);
    }
  }

  async set(id: string, request: CreateNoteRequest): Promise<void> {
    const payload = encodeNotePayload(request);
    const ttl = this.ttlSeconds;
    await this.run('set', { id }, () =>
      ttl ? this.client.set(id, payload, 'EX', ttl) : this.client.set(id, payload)
    );
  }

  /**
   * Walks the whole keyspace with SCAN. Unbounded on large databases.
   */
  async keys(): Promise<string[]> {
    return this.run('keys', {}, async () => {
      const keys = new Set<string>();
      let cursor = '0';
      do {
        const [next, batch] = await this.client.scan(cursor, 'MATCH', '*', 'COUNT', SCAN_PAGE_SIZE);
        batch.forEach((key) => keys.add(key));
        cursor = next;
      } while (cursor !== '0');
      return Array.from(keys);
    });
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (error) {
      logger.warn({ error }, 'Redis QUIT failed, disconnecting');
      this.client.disconnect();
    }
  }

  private async run<T>(
    operation: BackendOperation,
    context: Record<string, unknown>,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      logger.error({ error, operation, ...context }, 'Redis command failed');
      throw new BackendUnavailableError('redis', operation, error);
    }
  }
}
