import express, { type Express } from 'express';
import {
  ScanConfigError,
  createConsoleLogger,
  createId,
  parseScanRequest,
  type DetectorRegistry,
  type Logger,
} from '@pathprobe/scanner-engine';
import type { ScanTarget } from '@pathprobe/shared-types';
import type { ScanQueue } from './queue';
import type { ScanStore } from './store';

export interface AppDeps {
  queue: ScanQueue;
  store: ScanStore;
  registry: DetectorRegistry;
  logger?: Logger;
}

export function createApp({ queue, store, registry, logger = createConsoleLogger('Api') }: AppDeps): Express {
  const app = express();
  app.use(express.json());

  app.get('/', (_req, res) => {
    res.send('pathprobe Backend API');
  });

  app.get('/detectors', (_req, res) => {
    res.status(200).send(registry.list());
  });

  // Endpoint para iniciar un escaneo (ej. llamado por el CLI o UI)
  app.post('/scans', async (req, res) => {
    let target: ScanTarget;
    try {
      const { targetInfo, services } = parseScanRequest(req.body);
      target = { id: createId(), targetInfo, services };
    } catch (error) {
      if (error instanceof ScanConfigError) {
        res.status(400).send({ error: error.message, field: error.field });
      } else {
        logger.error('Body de escaneo inválido:', error);
        res.status(400).send({ error: 'Body de escaneo inválido' });
      }
      return;
    }

    try {
      const jobId = await queue.enqueue(target);
      logger.info(`Trabajo añadido a la cola con ID: ${jobId}`);
      await store.createQueued(jobId, target);
      res.status(202).send({ message: 'Escaneo encolado', jobId });
    } catch (error) {
      logger.error('Error al encolar trabajo:', error);
      res.status(500).send({ error: 'Error interno al encolar escaneo' });
    }
  });

  // Endpoint para obtener resultados de un escaneo
  app.get('/scans/:jobId', async (req, res) => {
    try {
      const row = await store.find(req.params.jobId);
      if (row) {
        res.status(200).send(row);
      } else {
        res.status(404).send({ message: 'Escaneo no encontrado' });
      }
    } catch (error) {
      logger.error('Error al obtener escaneo:', error);
      res.status(500).send({ error: 'Error interno al obtener escaneo' });
    }
  });

  return app;
}
