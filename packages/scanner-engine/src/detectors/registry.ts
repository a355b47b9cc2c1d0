import type { PluginInfo } from '@pathprobe/shared-types'
import { DuplicateDetectorError } from '../errors'
import { createConsoleLogger, type Logger } from '../logger'
import {
  createApacheCve202142013Detector,
  pluginInfo as apacheCve202142013Info,
} from './apacheCve202142013'
import type { DetectorDeps, DetectorFactory, VulnDetector } from './types'

export type RegistryDeps = Omit<DetectorDeps, 'logger'> & { logger?: Logger }

export class DetectorRegistry {
  private readonly entries = new Map<
    string,
    { info: PluginInfo; factory: DetectorFactory }
  >()

  register(info: PluginInfo, factory: DetectorFactory): this {
    if (this.entries.has(info.name)) {
      throw new DuplicateDetectorError(info.name)
    }
    this.entries.set(info.name, { info, factory })
    return this
  }

  list(): PluginInfo[] {
    return [...this.entries.values()].map((entry) => entry.info)
  }

  /** Instancia todos los detectores; sin logger, cada uno usa uno propio con su nombre */
  create(deps: RegistryDeps): VulnDetector[] {
    return [...this.entries.values()].map(({ info, factory }) =>
      factory({
        httpClient: deps.httpClient,
        clock: deps.clock,
        logger: deps.logger ?? createConsoleLogger(info.name),
      })
    )
  }
}

export function defaultRegistry(): DetectorRegistry {
  return new DetectorRegistry().register(
    apacheCve202142013Info,
    createApacheCve202142013Detector
  )
}
