import { v4 as uuidv4 } from 'uuid';

import type { BackendProvider } from '../backends/backend-provider.js';
import type { NoteBackend } from '../backends/note-backend.js';
import { NoteNotFoundError } from '../core/errors.js';
import type { CreateNoteRequest, Note } from '../types/index.js';
import logger from '../utils/logger.js';

/**
 * Note operations exposed over HTTP.
 * Resolves the active backend through the provider on every call.
 */
export class NoteService {
  private backends: BackendProvider;
  private generateId: () => string;
  private readonly maxParallelGets = 8;

  constructor(backends: BackendProvider, generateId: () => string = () => uuidv4()) {
    this.backends = backends;
    this.generateId = generateId;
  }

  /**
   * Fetch every note, at most maxParallelGets at a time. The key listing
   * itself stays unbounded. Keys that vanish between listing and fetching
   * (an expired Redis entry, say) are skipped.
   */
  async listNotes(): Promise<Note[]> {
    const backend = await this.backends.get();
    const ids = await backend.keys();

    const notes: Array<Note | null> = new Array(ids.length).fill(null);
    let index = 0;
    const limit = Math.min(this.maxParallelGets, ids.length);
    const runners = Array.from({ length: limit }, async () => {
      while (index < ids.length) {
        const current = index++;
        notes[current] = await this.fetchIfPresent(backend, ids[current]);
      }
    });
    await Promise.all(runners);

    return notes.filter((note): note is Note => note !== null);
  }

  async getNote(id: string): Promise<Note> {
    const backend = await this.backends.get();
    return backend.get(id);
  }

  async updateNote(id: string, request: CreateNoteRequest): Promise<void> {
    const backend = await this.backends.get();
    await backend.set(id, request);
  }

  async createNote(request: CreateNoteRequest): Promise<string> {
    const backend = await this.backends.get();
    const id = this.generateId();
    await backend.set(id, request);
    logger.info({ id, title: request.title }, 'Note created');
    return id;
  }

  private async fetchIfPresent(backend: NoteBackend, id: string): Promise<Note | null> {
    try {
      return await backend.get(id);
    } catch (error) {
      if (error instanceof NoteNotFoundError) {
        logger.debug({ id }, 'Note disappeared while listing');
        return null;
      }
      throw error;
    }
  }
}
