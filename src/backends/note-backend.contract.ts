import { describe, expect, it } from 'vitest';

import { NoteNotFoundError } from '../core/errors.js';
import type { NoteBackend } from './note-backend.js';

/**
 * Behaviour every NoteBackend must share, run against each implementation.
 */
export function describeNoteBackendContract(name: string, createBackend: () => NoteBackend) {
  describe(`${name} contract`, () => {
    it('rejects get for an id that was never set', async () => {
      const backend = createBackend();
      await expect(backend.get('never-set')).rejects.toBeInstanceOf(NoteNotFoundError);
    });

    it('returns what was set', async () => {
      const backend = createBackend();
      await backend.set('note-1', { title: 'Groceries', content: 'eggs, milk' });

      expect(await backend.get('note-1')).toEqual({
        id: 'note-1',
        title: 'Groceries',
        content: 'eggs, milk',
      });
    });

    it('fully overwrites an existing note', async () => {
      const backend = createBackend();
      await backend.set('note-1', { title: 'first', content: 'one' });
      await backend.set('note-1', { title: 'second', content: '' });

      expect(await backend.get('note-1')).toEqual({ id: 'note-1', title: 'second', content: '' });
    });

    it('lists exactly the ids that were set', async () => {
      const backend = createBackend();
      expect(await backend.keys()).toEqual([]);

      await backend.set('b', { title: 'B', content: 'bee' });
      await backend.set('a', { title: 'A', content: 'ay' });
      await backend.set('a', { title: 'A2', content: 'ay again' });

      expect((await backend.keys()).sort()).toEqual(['a', 'b']);
    });

    it('keeps unicode and JSON-like content intact', async () => {
      const backend = createBackend();
      const content = '{"nested": true}\nzweite Zeile ✓';
      await backend.set('note-u', { title: 'Ünïcødé', content });

      const note = await backend.get('note-u');
      expect(note.title).toBe('Ünïcødé');
      expect(note.content).toBe(content);
    });
  });
}
