import type {
  DetectionReport,
  ScanResult,
  ScanTarget,
} from '@pathprobe/shared-types'
import { systemClock, type Clock } from './clock'
import { DetectorRegistry, defaultRegistry } from './detectors/registry'
import { AxiosHttpClient, type HttpClient } from './httpClient'
import { createConsoleLogger, type Logger } from './logger'
import { createId, getErrorMessage } from './utils'

export interface ScanOptions {
  httpClient?: HttpClient
  clock?: Clock
  logger?: Logger
  registry?: DetectorRegistry
  timeoutMs?: number
}

export async function runScan(
  target: ScanTarget,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const logger = options.logger ?? createConsoleLogger('Engine')
  const clock = options.clock ?? systemClock
  const httpClient =
    options.httpClient ?? new AxiosHttpClient({ timeoutMs: options.timeoutMs })
  const registry = options.registry ?? defaultRegistry()

  logger.info(
    `Iniciando escaneo para el target ${target.id} (${target.services.length} servicios)`
  )
  const startTime = clock.now()
  const reports: DetectionReport[] = []
  const failures: string[] = []

  const detectors = registry.create({
    httpClient,
    clock,
    logger: options.logger,
  })
  for (const detector of detectors) {
    const name = detector.pluginInfo.name
    try {
      const { detectionReports } = await detector.detect(
        target.targetInfo,
        target.services
      )
      logger.info(`${name}: ${detectionReports.length} hallazgos`)
      reports.push(...detectionReports)
    } catch (error) {
      // Un detector roto no detiene al resto
      logger.error(`El detector ${name} falló:`, error)
      failures.push(`${name}: ${getErrorMessage(error)}`)
    }
  }

  const result: ScanResult = {
    scanId: createId(),
    target,
    status: failures.length > 0 ? 'Failed' : 'Completed',
    reports,
    error: failures.length > 0 ? failures.join('; ') : undefined,
    startedAt: startTime,
    completedAt: clock.now(),
  }

  logger.info(
    `Escaneo finalizado. Estado: ${result.status}. Hallazgos: ${result.reports.length}.`
  )
  return result
}

export { systemClock } from './clock'
export type { Clock } from './clock'
export { AxiosHttpClient, get } from './httpClient'
export type { HttpClient, HttpRequest, HttpResponse } from './httpClient'
export { createConsoleLogger } from './logger'
export type { Logger } from './logger'
export {
  DuplicateDetectorError,
  HttpTransportError,
  ScanConfigError,
} from './errors'
export {
  buildWebApplicationRootUrl,
  buildWebUriAuthority,
  isPlainHttp,
  isWebService,
} from './networkService'
export { DetectorRegistry, defaultRegistry } from './detectors/registry'
export type { DetectorDeps, DetectorFactory, VulnDetector } from './detectors/types'
export {
  VULNERABILITY_PATH,
  buildDetectionReport,
  createApacheCve202142013Detector,
  isServiceVulnerable,
} from './detectors/apacheCve202142013'
export { parseScanRequest } from './scanRequest'
export type { ScanRequest } from './scanRequest'
export { createId, getErrorMessage } from './utils'
