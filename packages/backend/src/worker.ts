import { Worker } from 'bullmq';
import type IORedis from 'ioredis';
import { runScan, type ScanOptions, type Logger } from '@pathprobe/scanner-engine';
import type { ScanResult, ScanTarget } from '@pathprobe/shared-types';
import { SCAN_QUEUE_NAME } from './queue';
import type { ScanStore } from './store';

export interface WorkerDeps {
  store: ScanStore;
  logger: Logger;
  scanOptions?: ScanOptions;
}

/** Ejecuta el escaneo de un trabajo y guarda el resultado */
export async function processScanJob(
  jobId: string,
  target: ScanTarget,
  { store, logger, scanOptions }: WorkerDeps
): Promise<ScanResult> {
  logger.info(`Procesando trabajo ${jobId} para target: ${target.id}`);
  try {
    const result = await runScan(target, scanOptions);
    await store.saveResult(jobId, result);
    logger.info(`Trabajo ${jobId} completado y guardado.`);
    return result;
  } catch (error) {
    logger.error(`Trabajo ${jobId} falló:`, error);
    throw error; // Re-lanza para que BullMQ maneje el fallo
  }
}

export function createScanWorker(
  connection: IORedis,
  concurrency: number,
  deps: WorkerDeps
): Worker<ScanTarget, ScanResult> {
  const worker = new Worker<ScanTarget, ScanResult>(
    SCAN_QUEUE_NAME,
    async (job) => processScanJob(job.id ?? job.data.id, job.data, deps),
    { connection, concurrency }
  );

  worker.on('completed', (job, result) => {
    deps.logger.info(`Job ${job.id} completed with result: ${result.reports.length} findings`);
  });
  worker.on('failed', (job, err) => {
    deps.logger.error(`Job ${job?.id} failed with error ${err.message}`);
  });
  return worker;
}
