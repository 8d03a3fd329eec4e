import { CacheEntry, CasToken, KeyValueStore } from '../store/KeyValueStore';
import { isValidAdjustment, toCounter } from '../store/counters';
import { LocalBuffer } from './WriteBuffer';
import { TokenTable } from './TokenTable';
import { DeferredAction, DeferredEntry, createEntry, replay } from './DeferredAction';
import { createTransactionLogger, createTimer } from '../utils/logger';
import { TransactionStateError, UncommittedTransactionError } from '../utils/errors';
import { txMetrics } from '../monitoring/metrics';

export type TransactionState = 'active' | 'committing';

let nextTxnId = 1;

/**
 * Buffers writes to a backend store until `commit()`.
 *
 * Every write lands in the local buffer right away, so reads in the same
 * transaction see it, and is recorded as a deferred action. Commit replays
 * those actions in order; the first failure stops the replay and every key
 * touched so far is deleted from the backend.
 *
 * A transaction is single-owner and must end in `commit()` or `rollback()`
 * before `close()`. Either one empties the local buffer, after which the
 * instance can be reused.
 */
export class Transaction implements KeyValueStore {
  public readonly id = nextTxnId++;

  private deferred: DeferredEntry[] = [];
  private tokens = new TokenTable();
  private touched = new Set<string>();
  // Set by an uncommitted flush; the backend is about to be wiped
  private suspendReads = false;
  private status: TransactionState = 'active';
  private log = createTransactionLogger(this.id);

  constructor(
    private readonly local: LocalBuffer,
    private readonly backend: KeyValueStore
  ) {}

  get state(): TransactionState {
    return this.status;
  }

  /** Number of deferred actions awaiting commit. */
  get pending(): number {
    return this.deferred.length;
  }

  get readsSuspended(): boolean {
    return this.suspendReads;
  }

  /**
   * Reads through the local buffer to the backend. Every hit gets a new
   * token; a miss resolves `null` and mints none, so a later `cas` on that
   * key always fails rather than matching against "absent".
   */
  async get(key: string): Promise<CacheEntry | null> {
    this.assertActive('get');

    let entry = await this.local.get(key);
    if (!entry) {
      if (this.suspendReads || this.local.isTombstoned(key)) {
        return null;
      }

      txMetrics.backendReads.inc({ operation: 'get' });
      entry = await this.backend.get(key);
      if (!entry) {
        return null;
      }
    }

    return { value: entry.value, token: this.tokens.issue(key, entry.value) };
  }

  async getMulti(keys: string[]): Promise<Map<string, CacheEntry>> {
    this.assertActive('getMulti');

    const unique = Array.from(new Set(keys));
    const found = await this.local.getMulti(unique);

    if (!this.suspendReads) {
      const missing = unique.filter(key => !found.has(key) && !this.local.isTombstoned(key));
      if (missing.length > 0) {
        txMetrics.backendReads.inc({ operation: 'getMulti' });
        const fetched = await this.backend.getMulti(missing);
        for (const [key, entry] of fetched) {
          found.set(key, entry);
        }
      }
    }

    const results = new Map<string, CacheEntry>();
    for (const key of unique) {
      const entry = found.get(key);
      if (entry) {
        results.set(key, { value: entry.value, token: this.tokens.issue(key, entry.value) });
      }
    }
    return results;
  }

  async set(key: string, value: unknown, expire = 0): Promise<boolean> {
    this.assertActive('set');

    if (!(await this.local.set(key, value, expire))) {
      return false;
    }
    this.defer({ kind: 'set', key, value: structuredClone(value), expire });
    return true;
  }

  /** The returned map reflects the local buffer; backend outcomes only surface at commit. */
  async setMulti(items: Map<string, unknown>, expire = 0): Promise<Map<string, boolean>> {
    this.assertActive('setMulti');

    const outcome = await this.local.setMulti(items, expire);

    const accepted = new Map<string, unknown>();
    for (const [key, value] of items) {
      if (outcome.get(key) === true) {
        accepted.set(key, structuredClone(value));
      }
    }
    if (accepted.size > 0) {
      this.defer({ kind: 'setMulti', items: accepted, expire });
    }

    return outcome;
  }

  async delete(key: string): Promise<boolean> {
    this.assertActive('delete');

    // Existence is judged on this transaction's view, buffered writes included
    if (!(await this.get(key))) {
      return false;
    }

    // Tombstone rather than forget, or reads would fall through to the stale backend value
    if (!(await this.local.tombstone([key]))) {
      return false;
    }
    this.defer({ kind: 'delete', key });
    return true;
  }

  async deleteMulti(keys: string[]): Promise<Map<string, boolean>> {
    this.assertActive('deleteMulti');

    const found = await this.getMulti(keys);
    const results = new Map<string, boolean>();
    for (const key of keys) {
      results.set(key, found.has(key));
    }

    const existing = Array.from(found.keys());
    if (existing.length === 0) {
      return results;
    }

    if (!(await this.local.tombstone(existing))) {
      return new Map(keys.map(key => [key, false]));
    }
    this.defer({ kind: 'deleteMulti', keys: existing });
    return results;
  }

  async add(key: string, value: unknown, expire = 0): Promise<boolean> {
    this.assertActive('add');

    if (await this.get(key)) {
      return false;
    }
    if (!(await this.local.set(key, value, expire))) {
      return false;
    }
    this.defer({ kind: 'add', key, value: structuredClone(value), expire });
    return true;
  }

  async replace(key: string, value: unknown, expire = 0): Promise<boolean> {
    this.assertActive('replace');

    if (!(await this.get(key))) {
      return false;
    }
    if (!(await this.local.set(key, value, expire))) {
      return false;
    }
    this.defer({ kind: 'replace', key, value: structuredClone(value), expire });
    return true;
  }

  /**
   * `token` must come from this transaction's own `get`/`getMulti`. The local
   * check runs now; the real CAS is re-validated against the backend at
   * commit, and a value changed by another writer in between fails the
   * whole commit.
   */
  async cas(token: CasToken, key: string, value: unknown, expire = 0): Promise<boolean> {
    this.assertActive('cas');

    const expected = this.tokens.lookup(token);
    if (!expected || expected.key !== key) {
      this.log.debug({ key, token, action: 'cas_unknown_token' }, 'CAS with unknown token');
      return false;
    }

    const current = await this.get(key);
    if (!current || !TokenTable.matches(expected, current.value)) {
      this.log.debug({ key, token, action: 'cas_stale' }, 'CAS value changed since token was issued');
      return false;
    }

    if (!(await this.local.set(key, value, expire))) {
      return false;
    }
    this.defer({ kind: 'cas', key, value: structuredClone(value), expire, expected });
    return true;
  }

  async increment(key: string, offset = 1, initial = 0, expire = 0): Promise<number | false> {
    this.assertActive('increment');
    return this.adjust('increment', key, offset, initial, expire);
  }

  async decrement(key: string, offset = 1, initial = 0, expire = 0): Promise<number | false> {
    this.assertActive('decrement');
    return this.adjust('decrement', key, offset, initial, expire);
  }

  async touch(key: string, expire: number): Promise<boolean> {
    this.assertActive('touch');

    const current = await this.get(key);
    if (!current) {
      return false;
    }
    if (!(await this.local.set(key, current.value, expire))) {
      return false;
    }
    this.defer({ kind: 'touch', key, expire });
    return true;
  }

  async flush(): Promise<boolean> {
    this.assertActive('flush');

    if (!(await this.local.flush())) {
      return false;
    }

    // Pending writes are moot once everything is wiped
    const discarded = this.deferred.length;
    this.clear();
    this.suspendReads = true;
    this.defer({ kind: 'flush' });

    this.log.debug({ discarded, action: 'flush' }, 'Flush buffered, backend reads suspended');
    return true;
  }

  /**
   * Replays deferred actions in order. Resolves `false` after rolling back
   * when an action reports failure; if an action throws, rolls back and
   * rethrows.
   */
  async commit(): Promise<boolean> {
    this.assertActive('commit');
    this.status = 'committing';

    const timer = createTimer('commit');
    const stopClock = txMetrics.commitDuration.startTimer();
    const total = this.deferred.length;

    this.log.debug({ tx: this.summary(), action: 'commit_start' }, 'Starting commit');

    for (const [index, entry] of this.deferred.entries()) {
      // Record keys first so a failing action's keys are invalidated too
      for (const key of entry.keys) {
        this.touched.add(key);
      }

      let success: boolean;
      try {
        success = await replay(entry.action, this.backend);
      } catch (error) {
        txMetrics.actionsReplayed.inc({ kind: entry.action.kind, outcome: 'error' });
        this.log.error({
          error,
          kind: entry.action.kind,
          keys: entry.keys,
          index,
          action: 'commit_error'
        }, 'Deferred action threw during commit');
        stopClock();
        await this.abort('replay_error');
        throw error;
      }

      txMetrics.actionsReplayed.inc({ kind: entry.action.kind, outcome: success ? 'ok' : 'failed' });

      if (!success) {
        this.log.warn({
          kind: entry.action.kind,
          keys: entry.keys,
          index,
          total,
          action: 'commit_failed'
        }, 'Deferred action failed, rolling back');
        stopClock();
        await this.abort('replay_failed');
        return false;
      }
    }

    await this.reset();
    this.status = 'active';
    stopClock();
    txMetrics.transactionsCommitted.inc();

    timer.log(this.log, 'info', 'Transaction committed', { actions: total, action: 'commit_complete' });
    return true;
  }

  /** Discards deferred work and invalidates any keys a partial commit wrote. */
  async rollback(): Promise<boolean> {
    this.assertActive('rollback');
    await this.abort('requested');
    return true;
  }

  /**
   * Lifecycle check callers run when they are done with the transaction.
   * Throws if work was left neither committed nor rolled back.
   */
  close(): void {
    if (this.deferred.length > 0) {
      this.log.error({ tx: this.summary(), action: 'close_uncommitted' }, 'Transaction closed with uncommitted work');
      throw new UncommittedTransactionError(this.deferred.length);
    }
  }

  private async adjust(
    kind: 'increment' | 'decrement',
    key: string,
    offset: number,
    initial: number,
    expire: number
  ): Promise<number | false> {
    if (!isValidAdjustment(offset, initial)) {
      return false;
    }

    const current = await this.get(key);
    // With no value anywhere, pick a baseline that lands on `initial`
    const base = current
      ? toCounter(current.value)
      : kind === 'increment' ? initial - offset : initial + offset;
    if (base === null) {
      return false;
    }

    const value = Math.max(0, kind === 'increment' ? base + offset : base - offset);
    if (!(await this.local.set(key, value, expire))) {
      return false;
    }
    this.defer({ kind, key, offset, initial, expire });
    return value;
  }

  private async abort(reason: 'requested' | 'replay_failed' | 'replay_error'): Promise<void> {
    const keys = Array.from(this.touched);
    const discarded = this.deferred.length;

    if (keys.length > 0) {
      try {
        await this.backend.deleteMulti(keys);
      } catch (error) {
        // Rollback always completes; the failed invalidation is reported, not raised
        this.log.error({ error, keys, action: 'rollback_invalidation_failed' }, 'Failed to invalidate keys during rollback');
      }
    }

    await this.reset();
    this.status = 'active';
    txMetrics.transactionsRolledBack.inc({ reason });

    this.log.warn({ reason, keys, discarded, action: 'rollback' }, 'Transaction rolled back');
  }

  private defer(action: DeferredAction): void {
    this.deferred.push(createEntry(action));
  }

  // The buffer only holds this transaction's opinion; once that is published
  // or discarded, reads go back to the backend
  private async reset(): Promise<void> {
    if (!(await this.local.flush())) {
      this.log.warn({ action: 'buffer_reset_failed' }, 'Local buffer could not be cleared');
    }
    this.clear();
  }

  private clear(): void {
    this.deferred = [];
    this.tokens.clear();
    this.touched.clear();
    this.suspendReads = false;
  }

  private assertActive(operation: string): void {
    if (this.status !== 'active') {
      throw new TransactionStateError(`Cannot ${operation} while transaction ${this.id} is ${this.status}`);
    }
  }

  private summary(): { id: number; state: TransactionState; pending: number } {
    return { id: this.id, state: this.status, pending: this.deferred.length };
  }
}
