export type { CacheEntry, CasToken, KeyValueStore } from './store/KeyValueStore';
export type { MemoryStoreOptions } from './store/MemoryStore';
export type { LocalBuffer, Presence } from './transaction/WriteBuffer';
export type { TokenSnapshot } from './transaction/TokenTable';
export type { DeferredAction, DeferredEntry, DeferredKind } from './transaction/DeferredAction';
export type { TransactionState } from './transaction/Transaction';
export type { AppConfig, LogLevel } from './config/config';

export { MemoryStore } from './store/MemoryStore';
export { WriteBuffer } from './transaction/WriteBuffer';
export { TokenTable } from './transaction/TokenTable';
export { affectedKeys, replay } from './transaction/DeferredAction';
export { Transaction } from './transaction/Transaction';
export { TransactionalStore } from './transaction/TransactionalStore';
export { CacheTransactionError, TransactionStateError, UncommittedTransactionError } from './utils/errors';
export { DEFAULT_CONFIG, loadConfig } from './config/config';
export { logger, setLogLevel, createTransactionLogger } from './utils/logger';
export { register, txMetrics } from './monitoring/metrics';
export { startMetricsServer } from './monitoring/metrics-server';
