import type { CreateNoteRequest, Note } from '../types/index.js';

/**
 * Storage abstraction for notes.
 * Implementations keep data in memory, in Redis, or in a GCS bucket.
 */
export interface NoteBackend {
  /**
   * Return the note stored under id.
   * Rejects with NoteNotFoundError if there is none.
   */
  get(id: string): Promise<Note>;

  /**
   * Create or fully overwrite the note stored under id.
   */
  set(id: string, request: CreateNoteRequest): Promise<void>;

  /**
   * List every known note id. Order is unspecified.
   */
  keys(): Promise<string[]>;

  /**
   * Release connections held by the backend. Called once at shutdown.
   */
  close(): Promise<void>;
}
