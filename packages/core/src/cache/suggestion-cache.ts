/**
 * SuggestionCache
 *
 * Remembers the resolved path per file signature so unchanged files are never sent to the oracle
 * twice. Reads are served from memory; every write is persisted before store() settles.
 *
 * Workflow Context:
 * - open(): Called once per scan; loads the durable store
 * - lookup(): Checked by the orchestrator before any oracle call
 * - store(): Called once per file when it resolves
 * - invalidateAll(): Wipes memory and the durable store
 */
import type { SuggestionRecord } from '../contracts';
import { Mutex } from './mutex';
import type { SuggestionStore } from './suggestion-store';

export class SuggestionCache {
  private records = new Map<string, SuggestionRecord>();
  private writeLock = new Mutex();

  private constructor(private backend: SuggestionStore) {}

  /**
   * Load every record from the store. An unreadable store yields an empty cache.
   */
  static async open(backend: SuggestionStore): Promise<SuggestionCache> {
    const cache = new SuggestionCache(backend);
    try {
      for (const record of await backend.readAll()) {
        cache.records.set(record.signature, record);
      }
      console.log(`[SuggestionCache] Loaded ${cache.records.size} entries from ${backend.location}`);
    } catch (error) {
      console.error(`[SuggestionCache] Failed to load ${backend.location}, starting empty:`, error);
    }
    return cache;
  }

  get size(): number {
    return this.records.size;
  }

  get location(): string {
    return this.backend.location;
  }

  lookup(signature: string): SuggestionRecord | undefined {
    return this.records.get(signature);
  }

  /**
   * Overwrite the record for a signature and persist it.
   * Resolves false when persistence fails; the in-memory value is kept either way.
   */
  async store(signature: string, record: SuggestionRecord): Promise<boolean> {
    const entry: SuggestionRecord = { ...record, signature };
    this.records.set(signature, entry);
    try {
      await this.writeLock.runExclusive(() => this.backend.put(entry));
      return true;
    } catch (error) {
      console.error(`[SuggestionCache] Failed to persist ${signature}:`, error);
      return false;
    }
  }

  /**
   * Drop every record. Resolves false when the durable store could not be cleared;
   * memory is emptied either way.
   */
  async invalidateAll(): Promise<boolean> {
    this.records.clear();
    try {
      await this.writeLock.runExclusive(() => this.backend.clear());
    } catch (error) {
      console.error(`[SuggestionCache] Failed to clear ${this.backend.location}:`, error);
      return false;
    }
    console.log(`[SuggestionCache] Invalidated all entries in ${this.backend.location}`);
    return true;
  }

  close(): void {
    this.backend.close?.();
  }
}
