// src/monitoring/metrics.ts
import client from 'prom-client';

// Create metrics registry
const register = new client.Registry();

// Add default Node.js metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register });

export const txMetrics = {
  transactionsStarted: new client.Counter({
    name: 'cache_txn_transactions_total',
    help: 'Transactions begun through a transactional store',
    registers: [register]
  }),

  transactionsCommitted: new client.Counter({
    name: 'cache_txn_transactions_committed_total',
    help: 'Transactions whose deferred log replayed successfully',
    registers: [register]
  }),

  transactionsRolledBack: new client.Counter({
    name: 'cache_txn_transactions_rolled_back_total',
    help: 'Transactions rolled back, explicitly or after a failed replay',
    labelNames: ['reason'] as const, // requested, replay_failed, replay_error
    registers: [register]
  }),

  actionsReplayed: new client.Counter({
    name: 'cache_txn_deferred_actions_replayed_total',
    help: 'Deferred actions replayed against the backend at commit',
    labelNames: ['kind', 'outcome'] as const,
    registers: [register]
  }),

  backendReads: new client.Counter({
    name: 'cache_txn_backend_reads_total',
    help: 'Reads that fell through the local buffer to the backend',
    labelNames: ['operation'] as const, // get, getMulti
    registers: [register]
  }),

  commitDuration: new client.Histogram({
    name: 'cache_txn_commit_duration_seconds',
    help: 'How long replaying a deferred log takes',
    buckets: [0.001, 0.01, 0.1, 0.5, 1, 5], // seconds
    registers: [register]
  }),

  activeTransactions: new client.Gauge({
    name: 'cache_txn_active_transactions',
    help: 'Transactions currently open on transactional stores',
    registers: [register]
  })
};

export { register };
