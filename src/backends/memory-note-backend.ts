import { NoteNotFoundError } from '../core/errors.js';
import type { CreateNoteRequest, Note } from '../types/index.js';
import type { NoteBackend } from './note-backend.js';

/**
 * In-memory NoteBackend implementation.
 * Contents are lost when the process exits.
 */
export class MemoryNoteBackend implements NoteBackend {
  // Handlers run on a single thread and no method awaits between reading
  // and writing the map, so mutations never interleave.
  private notes = new Map<string, Note>();

  async get(id: string): Promise<Note> {
    const note = this.notes.get(id);
    if (!note) {
      throw new NoteNotFoundError(id);
    }
    return { ...note };
  }

  async set(id: string, request: CreateNoteRequest): Promise<void> {
    this.notes.set(id, { id, title: request.title, content: request.content });
  }

  async keys(): Promise<string[]> {
    return Array.from(this.notes.keys());
  }

  async close(): Promise<void> {}
}
