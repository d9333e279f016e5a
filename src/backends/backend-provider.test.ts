import { describe, expect, it, vi } from 'vitest';

import type { StorageConfig } from '../types/index.js';
import { BackendProvider, resolveBackendKind, type BackendFactories } from './backend-provider.js';
import { MemoryNoteBackend } from './memory-note-backend.js';
import type { NoteBackend } from './note-backend.js';

function storageConfig(backend?: string): StorageConfig {
  return {
    backend,
    redis: {
      host: 'localhost',
      port: 6379,
      db: 0,
      connectTimeoutMs: 100,
      commandTimeoutMs: 100,
      maxRetriesPerRequest: 1,
    },
    gcs: {
      bucket: 'notes-test',
      prefix: '',
      timeoutMs: 100,
      maxRetries: 0,
    },
  };
}

/**
 * Factories that build memory backends and count constructions per kind.
 */
function countingFactories() {
  const built: string[] = [];
  const factories: BackendFactories = {
    memory: () => {
      built.push('memory');
      return new MemoryNoteBackend();
    },
    redis: () => {
      built.push('redis');
      return new MemoryNoteBackend();
    },
    gcs: () => {
      built.push('gcs');
      return new MemoryNoteBackend();
    },
  };
  return { built, factories };
}

describe('resolveBackendKind', () => {
  it.each([
    ['memory', 'memory'],
    ['remote-cache', 'redis'],
    ['redis', 'redis'],
    ['object-store', 'gcs'],
    ['gcs', 'gcs'],
    ['  Redis ', 'redis'],
    ['OBJECT-STORE', 'gcs'],
  ])('maps %j to %s', (name, kind) => {
    expect(resolveBackendKind(name)).toBe(kind);
  });

  it.each([undefined, '', 'postgres', 'constructor', '__proto__'])(
    'falls back to memory for %j',
    (name) => {
      expect(resolveBackendKind(name)).toBe('memory');
    }
  );
});

describe('BackendProvider', () => {
  it('builds the configured backend on first use only', async () => {
    const { built, factories } = countingFactories();
    const readConfig = vi.fn(() => storageConfig('gcs'));
    const provider = new BackendProvider({ readConfig, factories });

    expect(readConfig).not.toHaveBeenCalled();

    const first = await provider.get();
    const second = await provider.get();

    expect(first).toBe(second);
    expect(built).toEqual(['gcs']);
    expect(readConfig).toHaveBeenCalledTimes(1);
  });

  it('builds exactly one instance for concurrent first callers', async () => {
    let constructions = 0;
    const provider = new BackendProvider({
      readConfig: () => storageConfig('redis'),
      factories: {
        redis: async () => {
          constructions++;
          // Yield so every caller arrives while construction is pending
          await new Promise((resolve) => setTimeout(resolve, 5));
          return new MemoryNoteBackend();
        },
      },
    });

    const backends = await Promise.all(Array.from({ length: 20 }, () => provider.get()));

    expect(constructions).toBe(1);
    expect(new Set(backends).size).toBe(1);
  });

  it('does not re-read configuration after the backend is ready', async () => {
    const { built, factories } = countingFactories();
    let selection = 'redis';
    const provider = new BackendProvider({
      readConfig: () => storageConfig(selection),
      factories,
    });

    await provider.get();
    selection = 'gcs';
    await provider.get();

    expect(built).toEqual(['redis']);
  });

  it('defaults to a memory backend without configuration', async () => {
    const provider = new BackendProvider({ readConfig: () => storageConfig() });

    const backend = await provider.get();
    expect(backend).toBeInstanceOf(MemoryNoteBackend);

    await backend.set('a', { title: 'A', content: 'alpha' });
    expect(await backend.get('a')).toEqual({ id: 'a', title: 'A', content: 'alpha' });
    expect(await backend.keys()).toEqual(['a']);
  });

  it('falls back to memory for an unrecognized selection', async () => {
    const { built, factories } = countingFactories();
    const provider = new BackendProvider({
      readConfig: () => storageConfig('cassandra'),
      factories,
    });

    await provider.get();

    expect(built).toEqual(['memory']);
  });

  it('retries construction after a failure', async () => {
    let attempts = 0;
    const provider = new BackendProvider({
      readConfig: () => storageConfig('redis'),
      factories: {
        redis: () => {
          attempts++;
          if (attempts === 1) {
            throw new Error('invalid credentials file');
          }
          return new MemoryNoteBackend();
        },
      },
    });

    await expect(provider.get()).rejects.toThrow('invalid credentials file');
    const backend = await provider.get();

    expect(backend).toBeInstanceOf(MemoryNoteBackend);
    expect(attempts).toBe(2);
  });

  describe('close', () => {
    it('closes the constructed backend', async () => {
      const close = vi.fn(async () => {});
      const stub: NoteBackend = {
        get: vi.fn(),
        set: vi.fn(),
        keys: vi.fn(async () => []),
        close,
      };
      const provider = new BackendProvider({
        readConfig: () => storageConfig(),
        factories: { memory: () => stub },
      });

      await provider.get();
      await provider.close();

      expect(close).toHaveBeenCalledTimes(1);
    });

    it('does not construct a backend just to close it', async () => {
      const { built, factories } = countingFactories();
      const provider = new BackendProvider({ readConfig: () => storageConfig(), factories });

      await provider.close();

      expect(built).toEqual([]);
    });
  });
});
