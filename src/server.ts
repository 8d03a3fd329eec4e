// src/server.ts - demo run against an in-process backend
import { loadConfig } from './config/config';
import { logger, setLogLevel } from './utils/logger';
import { startMetricsServer } from './monitoring/metrics-server';
import { MemoryStore } from './store/MemoryStore';
import { TransactionalStore } from './transaction/TransactionalStore';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  startMetricsServer(config.metricsPort, config.serviceName);
  logger.info({
    action: 'startup',
    environment: config.environment,
    metricsPort: config.metricsPort,
    storeLimit: config.storeLimit
  }, `${config.serviceName} demo starting`);

  const backend = new MemoryStore({ limit: config.storeLimit });
  const store = new TransactionalStore(backend);

  // 1: buffered writes only reach the backend on commit
  logger.info({ scenario: 1 }, '--- Deferred writes ---');
  store.begin();
  await store.set('user:1', { name: 'Alice', visits: 1 });
  await store.set('user:1', { name: 'Alice', visits: 2 });
  logger.info({ backend: await backend.get('user:1') }, 'Backend before commit');
  await store.commit();
  logger.info({ backend: await backend.get('user:1') }, 'Backend after commit (later write wins)');

  // 2: a delete hides the backend value until commit
  logger.info({ scenario: 2 }, '--- Tombstones ---');
  store.begin();
  await store.delete('user:1');
  logger.info({ visible: await store.get('user:1') }, 'Read after uncommitted delete');
  await store.rollback();
  logger.info({ backend: await backend.get('user:1') }, 'Backend after rollback (untouched)');

  // 3: a concurrent writer invalidates a deferred CAS
  logger.info({ scenario: 3 }, '--- Deferred CAS conflict ---');
  store.begin();
  const read = await store.get('user:1');
  if (read) {
    await store.cas(read.token, 'user:1', { name: 'Alice', visits: 3 });
  }
  await store.increment('counter', 5, 10);
  await backend.set('user:1', { name: 'Alice', visits: 99 });
  const committed = await store.commit();
  logger.info({
    committed,
    user: await backend.get('user:1'),
    counter: await backend.get('counter')
  }, 'Commit outcome after external write');

  logger.info({
    action: 'shutdown',
    memoryUsage: process.memoryUsage(),
    uptime: process.uptime()
  }, `Demo complete; metrics at http://localhost:${config.metricsPort}/metrics (Ctrl+C to exit)`);
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Demo failed');
  process.exitCode = 1;
});
