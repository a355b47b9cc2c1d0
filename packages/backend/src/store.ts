import type { Pool } from 'pg';
import type { DetectionReport, ScanResult, ScanTarget } from '@pathprobe/shared-types';

export type ScanStatus = ScanResult['status'];

export interface ScanRow {
  id: string;
  status: ScanStatus;
  target: ScanTarget;
  findings: DetectionReport[] | null;
  error: string | null;
  completed_at: Date | null;
}

export interface ScanStore {
  /** No pisa una fila existente: el worker puede guardar el resultado antes que esto */
  createQueued(jobId: string, target: ScanTarget): Promise<void>;
  saveResult(jobId: string, result: ScanResult): Promise<void>;
  find(jobId: string): Promise<ScanRow | undefined>;
}

interface ScanRecord {
  id: string;
  status: ScanStatus;
  target: ScanTarget | string;
  findings: DetectionReport[] | string | null;
  error: string | null;
  completed_at: Date | null;
}

function parseJson<T>(value: T | string): T {
  // jsonb ya llega parseado; json/text llega como string
  return typeof value === 'string' ? JSON.parse(value) : value;
}

export class PgScanStore implements ScanStore {
  constructor(private readonly pool: Pool) {}

  async ensureSchema(): Promise<void> {
    await this.pool.query(
      `CREATE TABLE IF NOT EXISTS scan_results (
        id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        target JSONB NOT NULL,
        findings JSONB,
        error TEXT,
        completed_at TIMESTAMPTZ
      )`
    );
  }

  async createQueued(jobId: string, target: ScanTarget): Promise<void> {
    await this.pool.query(
      'INSERT INTO scan_results(id, status, target) VALUES($1, $2, $3) ON CONFLICT (id) DO NOTHING',
      [jobId, 'Queued', JSON.stringify(target)]
    );
  }

  async saveResult(jobId: string, result: ScanResult): Promise<void> {
    await this.pool.query(
      `INSERT INTO scan_results(id, status, target, findings, error, completed_at)
       VALUES($1, $2, $3, $4, $5, $6)
       ON CONFLICT (id) DO UPDATE SET
         status = EXCLUDED.status,
         findings = EXCLUDED.findings,
         error = EXCLUDED.error,
         completed_at = EXCLUDED.completed_at`,
      [
        jobId,
        result.status,
        JSON.stringify(result.target),
        JSON.stringify(result.reports),
        result.error ?? null,
        result.completedAt ?? null,
      ]
    );
  }

  async find(jobId: string): Promise<ScanRow | undefined> {
    const dbResult = await this.pool.query<ScanRecord>(
      'SELECT id, status, target, findings, error, completed_at FROM scan_results WHERE id = $1',
      [jobId]
    );
    const row = dbResult.rows[0];
    if (!row) return undefined;
    return {
      ...row,
      target: parseJson(row.target),
      findings: row.findings === null ? null : parseJson(row.findings),
    };
  }
}
