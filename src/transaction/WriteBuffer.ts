import { KeyValueStore } from '../store/KeyValueStore';
import { MemoryStore } from '../store/MemoryStore';
import { bufferLogger } from '../utils/logger';

export type Presence = 'unknown' | 'present' | 'tombstoned';

/**
 * Local store a transaction writes to before anything reaches the backend.
 * Besides values it remembers which keys are known to be gone, so reads
 * can tell "deleted in this transaction" apart from "never seen".
 */
export interface LocalBuffer extends KeyValueStore {
  isTombstoned(key: string): boolean;
  tombstone(keys: string[]): Promise<boolean>;
}

/**
 * Non-evicting in-memory buffer. Uncommitted writes must never be dropped,
 * even if that means unbounded growth for the lifetime of a transaction.
 *
 * Deletes, writes with a negative expiry and items whose expiry passes all
 * turn into tombstones; only `flush` returns keys to `unknown`.
 */
export class WriteBuffer extends MemoryStore implements LocalBuffer {
  private tombstones = new Set<string>();

  constructor(clock?: () => number) {
    super({ clock });
    this.log = bufferLogger;
  }

  presence(key: string): Presence {
    if (this.lookup(key)) return 'present';
    return this.tombstones.has(key) ? 'tombstoned' : 'unknown';
  }

  isTombstoned(key: string): boolean {
    return this.presence(key) === 'tombstoned';
  }

  async tombstone(keys: string[]): Promise<boolean> {
    for (const key of keys) {
      this.remove(key);
    }
    return true;
  }

  async flush(): Promise<boolean> {
    this.tombstones.clear();
    return super.flush();
  }

  protected store(key: string, value: unknown, expire: number): void {
    this.tombstones.delete(key);
    super.store(key, value, expire);
  }

  protected remove(key: string): void {
    super.remove(key);
    this.tombstones.add(key);
  }

  protected expire(key: string): void {
    this.remove(key);
  }
}
