import {
  EmbeddingCacheEntry,
  EmbeddingCacheStore,
} from '../interfaces/embedding-cache.interface';

/**
 * Map-backed store with least-recently-used eviction
 */
export class InMemoryEmbeddingCacheStore implements EmbeddingCacheStore {
  private readonly entries = new Map<string, EmbeddingCacheEntry>();

  constructor(private readonly maxEntries: number) {}

  async get(fingerprint: string): Promise<EmbeddingCacheEntry | null> {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      return null;
    }
    // re-insert to mark as most recently used
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    return entry;
  }

  async set(entry: EmbeddingCacheEntry): Promise<void> {
    this.entries.delete(entry.fingerprint);
    this.entries.set(entry.fingerprint, entry);

    while (this.entries.size > Math.max(1, this.maxEntries)) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  async delete(fingerprint: string): Promise<void> {
    this.entries.delete(fingerprint);
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}
