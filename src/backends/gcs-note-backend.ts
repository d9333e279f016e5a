import { Storage, type Bucket } from '@google-cloud/storage';

import { BackendUnavailableError, NoteNotFoundError } from '../core/errors.js';
import { decodeNotePayload, encodeNotePayload } from '../core/note-codec.js';
import type { CreateNoteRequest, GcsConfig, Note } from '../types/index.js';
import logger from '../utils/logger.js';
import type { NoteBackend } from './note-backend.js';

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 404;
}

/**
 * Google Cloud Storage NoteBackend implementation.
 *
 * One object per note, named `<prefix><id>`, holding the JSON payload.
 * The id is recovered from the object name on listing.
 */
export class GcsNoteBackend implements NoteBackend {
  private readonly bucket: Bucket;
  private readonly prefix: string;

  constructor(config: GcsConfig) {
    const storage = new Storage({
      projectId: config.projectId,
      keyFilename: config.keyFilename,
      apiEndpoint: config.apiEndpoint,
      timeout: config.timeoutMs,
      retryOptions: { maxRetries: config.maxRetries },
    });
    this.bucket = storage.bucket(config.bucket);
    this.prefix = config.prefix;
  }

  async get(id: string): Promise<Note> {
    const objectName = this.objectName(id);
    let payload: string;
    try {
      const [contents] = await this.bucket.file(objectName).download();
      payload = contents.toString('utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new NoteNotFoundError(id);
      }
      logger.error({ error, id, objectName }, 'Failed to download note object');
      throw new BackendUnavailableError('gcs', 'get', error);
    }

    try {
      return decodeNotePayload(id, payload);
    } catch (error) {
      logger.error({ error, id, objectName }, 'Stored GCS object is not a note');
      throw new BackendUnavailableError('gcs', 'get', error);
    }
  }

  async set(id: string, request: CreateNoteRequest): Promise<void> {
    const objectName = this.objectName(id);
    try {
      await this.bucket.file(objectName).save(encodeNotePayload(request), {
        contentType: 'application/json',
        resumable: false,
      });
    } catch (error) {
      logger.error({ error, id, objectName }, 'Failed to upload note object');
      throw new BackendUnavailableError('gcs', 'set', error);
    }
  }

  /**
   * Lists every object under the prefix. Unbounded on large buckets.
   */
  async keys(): Promise<string[]> {
    try {
      const [files] = await this.bucket.getFiles({ prefix: this.prefix || undefined });
      return files
        .map((file) => file.name.slice(this.prefix.length))
        .filter((id) => id.length > 0);
    } catch (error) {
      logger.error({ error, bucket: this.bucket.name, prefix: this.prefix }, 'Failed to list note objects');
      throw new BackendUnavailableError('gcs', 'keys', error);
    }
  }

  async close(): Promise<void> {}

  private objectName(id: string): string {
    return `${this.prefix}${id}`;
  }
}
