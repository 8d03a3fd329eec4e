import { CacheEntry, CasToken, KeyValueStore } from './KeyValueStore';
import { isExpired, resolveExpiry } from './expiration';
import { isValidAdjustment, toCounter } from './counters';
import { storeLogger } from '../utils/logger';

export interface StoredItem {
  value: unknown;
  expiresAt: number | null;
  revision: number;
}

export interface MemoryStoreOptions {
  /** Maximum number of entries before least-recently-used ones are evicted. */
  limit?: number;
  /** Millisecond clock, injectable for expiry tests. */
  clock?: () => number;
}

/**
 * In-process key/value store. Values go in and come out as structured
 * clones, so callers never share references with the store.
 */
export class MemoryStore implements KeyValueStore {
  // Map insertion order doubles as recency order for eviction
  protected items = new Map<string, StoredItem>();
  protected readonly limit: number;
  protected readonly clock: () => number;
  protected log = storeLogger;
  private revision = 0;

  constructor(options: MemoryStoreOptions = {}) {
    this.limit = options.limit && options.limit > 0 ? options.limit : Infinity;
    this.clock = options.clock ?? Date.now;
  }

  async get(key: string): Promise<CacheEntry | null> {
    const item = this.lookup(key);
    if (!item) return null;
    return { value: structuredClone(item.value), token: String(item.revision) };
  }

  async getMulti(keys: string[]): Promise<Map<string, CacheEntry>> {
    const results = new Map<string, CacheEntry>();
    for (const key of keys) {
      const entry = await this.get(key);
      if (entry) {
        results.set(key, entry);
      }
    }
    return results;
  }

  async set(key: string, value: unknown, expire = 0): Promise<boolean> {
    this.store(key, value, expire);
    return true;
  }

  async setMulti(items: Map<string, unknown>, expire = 0): Promise<Map<string, boolean>> {
    const results = new Map<string, boolean>();
    for (const [key, value] of items) {
      results.set(key, await this.set(key, value, expire));
    }
    return results;
  }

  async delete(key: string): Promise<boolean> {
    if (!this.lookup(key)) {
      return false;
    }
    this.remove(key);
    return true;
  }

  async deleteMulti(keys: string[]): Promise<Map<string, boolean>> {
    const results = new Map<string, boolean>();
    for (const key of keys) {
      results.set(key, await this.delete(key));
    }
    return results;
  }

  async add(key: string, value: unknown, expire = 0): Promise<boolean> {
    if (this.lookup(key)) {
      return false;
    }
    this.store(key, value, expire);
    return true;
  }

  async replace(key: string, value: unknown, expire = 0): Promise<boolean> {
    if (!this.lookup(key)) {
      return false;
    }
    this.store(key, value, expire);
    return true;
  }

  async cas(token: CasToken, key: string, value: unknown, expire = 0): Promise<boolean> {
    const item = this.lookup(key);
    if (!item || String(item.revision) !== token) {
      this.log.debug({ key, token, action: 'cas_mismatch' }, 'CAS token does not match current revision');
      return false;
    }
    this.store(key, value, expire);
    return true;
  }

  async increment(key: string, offset = 1, initial = 0, expire = 0): Promise<number | false> {
    return this.adjust(key, offset, initial, expire, 1);
  }

  async decrement(key: string, offset = 1, initial = 0, expire = 0): Promise<number | false> {
    return this.adjust(key, offset, initial, expire, -1);
  }

  async touch(key: string, expire: number): Promise<boolean> {
    const item = this.lookup(key);
    if (!item) {
      return false;
    }
    this.store(key, item.value, expire);
    return true;
  }

  async flush(): Promise<boolean> {
    this.log.debug({ size: this.items.size, action: 'flush' }, 'Flushing store');
    this.items.clear();
    return true;
  }

  get size(): number {
    return this.items.size;
  }

  /** Returns the live item for a key, dropping it first if it has expired. */
  protected lookup(key: string): StoredItem | null {
    const item = this.items.get(key);
    if (!item) return null;

    if (isExpired(item.expiresAt, this.clock())) {
      this.expire(key);
      return null;
    }

    // Refresh recency
    this.items.delete(key);
    this.items.set(key, item);
    return item;
  }

  protected store(key: string, value: unknown, expire: number): void {
    const now = this.clock();
    const expiresAt = resolveExpiry(expire, now);
    if (isExpired(expiresAt, now)) {
      this.remove(key);
      return;
    }

    this.items.delete(key);
    this.items.set(key, {
      value: structuredClone(value),
      expiresAt,
      revision: ++this.revision,
    });
    this.evict();
  }

  protected remove(key: string): void {
    this.items.delete(key);
  }

  /** Called when a read finds an item past its expiry. */
  protected expire(key: string): void {
    this.items.delete(key);
  }

  private adjust(key: string, offset: number, initial: number, expire: number, direction: 1 | -1): number | false {
    if (!isValidAdjustment(offset, initial)) {
      return false;
    }

    const item = this.lookup(key);
    if (!item) {
      this.store(key, initial, expire);
      return initial;
    }

    const current = toCounter(item.value);
    if (current === null || current < 0) {
      return false;
    }

    const next = Math.max(0, current + direction * offset);
    this.store(key, next, expire);
    return next;
  }

  private evict(): void {
    while (this.items.size > this.limit) {
      const oldest = this.items.keys().next();
      if (oldest.done) break;
      this.items.delete(oldest.value);
      this.log.debug({ key: oldest.value, limit: this.limit, action: 'evict' }, 'Evicted least recently used key');
    }
  }
}
