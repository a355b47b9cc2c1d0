import type {
  DetectionReportList,
  NetworkService,
  PluginInfo,
  TargetInfo,
} from '@pathprobe/shared-types'
import type { Clock } from '../clock'
import type { HttpClient } from '../httpClient'
import type { Logger } from '../logger'

/** Capacidades que se inyectan a cada detector */
export interface DetectorDeps {
  httpClient: HttpClient
  clock: Clock
  logger: Logger
}

export interface VulnDetector {
  readonly pluginInfo: PluginInfo
  detect(
    targetInfo: TargetInfo,
    matchedServices: readonly NetworkService[]
  ): Promise<DetectionReportList>
}

export type DetectorFactory = (deps: DetectorDeps) => VulnDetector
