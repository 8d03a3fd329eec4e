/**
 * Opaque compare-and-swap token. Backends issue their own; a transaction
 * hands out synthetic ones bound to a snapshot of the value read.
 */
export type CasToken = string;

export interface CacheEntry<T = unknown> {
  readonly value: T;
  readonly token: CasToken;
}

/**
 * Capability set shared by backend stores, the local write buffer and
 * transactions.
 *
 * `expire` follows the memcached convention: 0 never expires, a negative
 * value is already expired, anything under 30 days is relative seconds and
 * anything above is an absolute Unix timestamp (seconds).
 *
 * Failures are reported as `false` (or `null` for reads), never thrown.
 */
export interface KeyValueStore {
  get(key: string): Promise<CacheEntry | null>;

  /** Resolves only the keys that were found, each with its own token. */
  getMulti(keys: string[]): Promise<Map<string, CacheEntry>>;

  set(key: string, value: unknown, expire?: number): Promise<boolean>;
  setMulti(items: Map<string, unknown>, expire?: number): Promise<Map<string, boolean>>;

  /** Resolves `true` when the key existed. */
  delete(key: string): Promise<boolean>;
  deleteMulti(keys: string[]): Promise<Map<string, boolean>>;

  add(key: string, value: unknown, expire?: number): Promise<boolean>;
  replace(key: string, value: unknown, expire?: number): Promise<boolean>;
  cas(token: CasToken, key: string, value: unknown, expire?: number): Promise<boolean>;

  increment(key: string, offset?: number, initial?: number, expire?: number): Promise<number | false>;
  decrement(key: string, offset?: number, initial?: number, expire?: number): Promise<number | false>;

  touch(key: string, expire: number): Promise<boolean>;
  flush(): Promise<boolean>;
}
