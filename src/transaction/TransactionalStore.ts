import { CacheEntry, CasToken, KeyValueStore } from '../store/KeyValueStore';
import { Transaction } from './Transaction';
import { WriteBuffer } from './WriteBuffer';
import { logger } from '../utils/logger';
import { TransactionStateError } from '../utils/errors';
import { txMetrics } from '../monitoring/metrics';

/**
 * Key/value store with begin/commit/rollback on top of any backend.
 *
 * Transactions nest: each `begin()` opens a transaction whose backend is
 * the one below it, so committing an inner transaction only publishes its
 * writes to the outer one. Outside any transaction, operations go straight
 * to the backend.
 */
export class TransactionalStore implements KeyValueStore {
  private transactions: Transaction[] = [];
  private log = logger.child({ component: 'transactional-store' });

  constructor(private readonly cache: KeyValueStore) {}

  /** Begin a new (possibly nested) transaction */
  begin(): Transaction {
    const txn = new Transaction(new WriteBuffer(), this.current());
    this.transactions.push(txn);

    txMetrics.transactionsStarted.inc();
    txMetrics.activeTransactions.inc();

    this.log.debug({
      txId: txn.id,
      depth: this.transactions.length,
      action: 'begin'
    }, `Transaction ${txn.id} started`);

    return txn;
  }

  /** Commit the innermost transaction */
  async commit(): Promise<boolean> {
    const txn = this.pop('commit');
    try {
      return await txn.commit();
    } finally {
      txMetrics.activeTransactions.dec();
    }
  }

  /** Roll back the innermost transaction */
  async rollback(): Promise<boolean> {
    const txn = this.pop('rollback');
    try {
      return await txn.rollback();
    } finally {
      txMetrics.activeTransactions.dec();
    }
  }

  get depth(): number {
    return this.transactions.length;
  }

  get(key: string): Promise<CacheEntry | null> {
    return this.current().get(key);
  }

  getMulti(keys: string[]): Promise<Map<string, CacheEntry>> {
    return this.current().getMulti(keys);
  }

  set(key: string, value: unknown, expire = 0): Promise<boolean> {
    return this.current().set(key, value, expire);
  }

  setMulti(items: Map<string, unknown>, expire = 0): Promise<Map<string, boolean>> {
    return this.current().setMulti(items, expire);
  }

  delete(key: string): Promise<boolean> {
    return this.current().delete(key);
  }

  deleteMulti(keys: string[]): Promise<Map<string, boolean>> {
    return this.current().deleteMulti(keys);
  }

  add(key: string, value: unknown, expire = 0): Promise<boolean> {
    return this.current().add(key, value, expire);
  }

  replace(key: string, value: unknown, expire = 0): Promise<boolean> {
    return this.current().replace(key, value, expire);
  }

  cas(token: CasToken, key: string, value: unknown, expire = 0): Promise<boolean> {
    return this.current().cas(token, key, value, expire);
  }

  increment(key: string, offset = 1, initial = 0, expire = 0): Promise<number | false> {
    return this.current().increment(key, offset, initial, expire);
  }

  decrement(key: string, offset = 1, initial = 0, expire = 0): Promise<number | false> {
    return this.current().decrement(key, offset, initial, expire);
  }

  touch(key: string, expire: number): Promise<boolean> {
    return this.current().touch(key, expire);
  }

  flush(): Promise<boolean> {
    return this.current().flush();
  }

  private current(): KeyValueStore {
    return this.transactions[this.transactions.length - 1] ?? this.cache;
  }

  private pop(operation: 'commit' | 'rollback'): Transaction {
    const txn = this.transactions.pop();
    if (!txn) {
      this.log.warn({ action: operation }, `${operation} called with no open transaction`);
      throw new TransactionStateError(`No transaction to ${operation}`);
    }
    return txn;
  }
}
