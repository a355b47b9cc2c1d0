import type { Queue } from 'bullmq';
import type { ScanResult, ScanTarget } from '@pathprobe/shared-types';

export const SCAN_QUEUE_NAME = 'scan-jobs';

export interface ScanQueue {
  /** Encola el escaneo y devuelve el ID del trabajo */
  enqueue(target: ScanTarget): Promise<string>;
}

export class BullScanQueue implements ScanQueue {
  constructor(private readonly queue: Queue<ScanTarget, ScanResult>) {}

  async enqueue(target: ScanTarget): Promise<string> {
    const job = await this.queue.add(`scan-${target.id}`, target, { jobId: target.id });
    return job.id ?? target.id;
  }
}
