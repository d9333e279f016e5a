import type { BackendKind, StorageConfig } from '../types/index.js';
import logger from '../utils/logger.js';
import { GcsNoteBackend } from './gcs-note-backend.js';
import { MemoryNoteBackend } from './memory-note-backend.js';
import type { NoteBackend } from './note-backend.js';
import { RedisNoteBackend } from './redis-note-backend.js';

export type BackendFactory = (config: StorageConfig) => NoteBackend | Promise<NoteBackend>;

export type BackendFactories = Record<BackendKind, BackendFactory>;

export const defaultBackendFactories: BackendFactories = {
  memory: () => new MemoryNoteBackend(),
  redis: (config) => new RedisNoteBackend(config.redis),
  gcs: (config) => new GcsNoteBackend(config.gcs),
};

const BACKEND_ALIASES = new Map<string, BackendKind>([
  ['memory', 'memory'],
  ['remote-cache', 'redis'],
  ['redis', 'redis'],
  ['object-store', 'gcs'],
  ['gcs', 'gcs'],
]);

/**
 * Map a configured backend name to a backend kind.
 * Missing or unrecognized names select the memory backend.
 */
export function resolveBackendKind(name: string | undefined): BackendKind {
  const normalized = (name ?? '').trim().toLowerCase();
  return BACKEND_ALIASES.get(normalized) ?? 'memory';
}

export interface BackendProviderOptions {
  /** Read on first use only. */
  readConfig: () => StorageConfig;
  factories?: Partial<BackendFactories>;
}

/**
 * Lazily builds the configured NoteBackend, at most once per provider.
 *
 * The pending construction is cached synchronously on the first call, so
 * concurrent first callers share a single instance. A failed construction
 * is cleared so the next call can retry; a successful one is kept for the
 * life of the provider.
 */
export class BackendProvider {
  private readonly readConfig: () => StorageConfig;
  private readonly factories: BackendFactories;
  private instance?: Promise<NoteBackend>;

  constructor(options: BackendProviderOptions) {
    this.readConfig = options.readConfig;
    this.factories = { ...defaultBackendFactories, ...options.factories };
  }

  get(): Promise<NoteBackend> {
    if (!this.instance) {
      this.instance = this.construct().catch((error: unknown) => {
        this.instance = undefined;
        throw error;
      });
    }
    return this.instance;
  }

  /**
   * Close the backend if one was built. Nothing is constructed here.
   */
  async close(): Promise<void> {
    if (!this.instance) {
      return;
    }
    const backend = await this.instance;
    await backend.close();
  }

  private async construct(): Promise<NoteBackend> {
    const config = this.readConfig();
    const kind = resolveBackendKind(config.backend);
    logger.info({ configured: config.backend ?? null, kind }, 'Selecting note backend');

    try {
      return await this.factories[kind](config);
    } catch (error) {
      logger.error({ error, kind }, 'Failed to construct note backend');
      throw error;
    }
  }
}
