import { Queue } from 'bullmq';
import IORedis from 'ioredis';
import { Pool } from 'pg';
import { createConsoleLogger, defaultRegistry } from '@pathprobe/scanner-engine';
import type { ScanResult, ScanTarget } from '@pathprobe/shared-types';
import { createApp } from './app';
import { loadConfig } from './config';
import { BullScanQueue, SCAN_QUEUE_NAME } from './queue';
import { PgScanStore } from './store';
import { createScanWorker } from './worker';

const logger = createConsoleLogger('Backend');

async function main(): Promise<void> {
  const config = loadConfig();
  const redisConnection = new IORedis({
    host: config.redis.host,
    port: config.redis.port,
    maxRetriesPerRequest: null, // Requerido por los workers de BullMQ
  });
  const pgPool = new Pool(config.db);

  const store = new PgScanStore(pgPool);
  await store.ensureSchema();

  const scanQueue = new Queue<ScanTarget, ScanResult>(SCAN_QUEUE_NAME, { connection: redisConnection });
  // Esto debería correr en un proceso separado en producción
  const scanWorker = createScanWorker(redisConnection, config.workerConcurrency, {
    store,
    logger: createConsoleLogger('Worker'),
    scanOptions: { timeoutMs: config.probeTimeoutMs },
  });

  const app = createApp({
    queue: new BullScanQueue(scanQueue),
    store,
    registry: defaultRegistry(),
  });
  const server = app.listen(config.port, () => {
    logger.info(`Backend API escuchando en http://localhost:${config.port}`);
    logger.info('Worker esperando trabajos...');
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    logger.info('SIGTERM signal received: closing HTTP server and worker');
    server.close();
    Promise.all([scanWorker.close(), scanQueue.close()])
      .then(() => redisConnection.quit())
      .then(() => pgPool.end())
      .then(() => {
        logger.info('Cleanup complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Error durante el cierre:', error);
        process.exit(1);
      });
  });
}

main().catch((error: unknown) => {
  logger.error('No se pudo iniciar el backend:', error);
  process.exit(1);
});
