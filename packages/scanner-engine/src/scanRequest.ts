import { isIP } from 'net'
import type {
  NetworkEndpoint,
  NetworkService,
  TargetInfo,
  TransportProtocol,
} from '@pathprobe/shared-types'
import { ScanConfigError } from './errors'

export interface ScanRequest {
  targetInfo: TargetInfo
  services: NetworkService[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(
  source: Record<string, unknown>,
  key: string,
  field: string
): string | undefined {
  const value = source[key]
  if (value === undefined) return undefined
  if (typeof value !== 'string' || !value.trim()) {
    throw new ScanConfigError(`${field}.${key}`, 'debe ser un string no vacío')
  }
  return value.trim()
}

function endpointFromHost(host: string): NetworkEndpoint {
  return isIP(host) ? { ip: host } : { hostname: host }
}

function parseEndpoint(
  source: Record<string, unknown>,
  field: string
): NetworkEndpoint {
  const endpoint: NetworkEndpoint = {}
  const ip = optionalString(source, 'ip', field)
  const hostname = optionalString(source, 'hostname', field)
  if (ip !== undefined) {
    if (!isIP(ip)) throw new ScanConfigError(`${field}.ip`, 'no es una IP válida')
    endpoint.ip = ip
  }
  if (hostname !== undefined) endpoint.hostname = hostname
  return endpoint
}

function parseService(
  input: unknown,
  field: string,
  defaultEndpoint: NetworkEndpoint | undefined
): NetworkService {
  if (!isRecord(input)) {
    throw new ScanConfigError(field, 'debe ser un objeto')
  }
  const port = input.port
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ScanConfigError(`${field}.port`, 'debe ser un entero entre 1 y 65535')
  }

  const transport = input.transportProtocol ?? 'TCP'
  if (transport !== 'TCP' && transport !== 'UDP') {
    throw new ScanConfigError(`${field}.transportProtocol`, 'debe ser TCP o UDP')
  }
  const transportProtocol: TransportProtocol = transport

  let endpoint = parseEndpoint(input, field)
  if (!endpoint.ip && !endpoint.hostname) {
    if (!defaultEndpoint) {
      throw new ScanConfigError(field, 'falta "ip" o "hostname" (o un "host" global)')
    }
    endpoint = { ...defaultEndpoint }
  }

  const service: NetworkService = { ...endpoint, port, transportProtocol }
  const serviceName = optionalString(input, 'serviceName', field)
  if (serviceName !== undefined) service.serviceName = serviceName
  const softwareName = optionalString(input, 'softwareName', field)
  if (softwareName !== undefined) service.softwareName = softwareName
  const applicationRoot = optionalString(input, 'applicationRoot', field)
  if (applicationRoot !== undefined) service.applicationRoot = applicationRoot

  const sslVersions = input.supportedSslVersions
  if (sslVersions !== undefined) {
    if (!Array.isArray(sslVersions) || !sslVersions.every((v) => typeof v === 'string')) {
      throw new ScanConfigError(
        `${field}.supportedSslVersions`,
        'debe ser un array de strings'
      )
    }
    service.supportedSslVersions = sslVersions
  }
  return service
}

function uniqueEndpoints(endpoints: NetworkEndpoint[]): NetworkEndpoint[] {
  const seen = new Map<string, NetworkEndpoint>()
  for (const { ip, hostname } of endpoints) {
    const key = `${ip ?? ''}|${hostname ?? ''}`
    if (!seen.has(key)) {
      const endpoint: NetworkEndpoint = {}
      if (ip) endpoint.ip = ip
      if (hostname) endpoint.hostname = hostname
      seen.set(key, endpoint)
    }
  }
  return [...seen.values()]
}

/**
 * Valida la configuración de un escaneo (archivo JSON del CLI o body de `POST /scans`).
 * Los servicios sin `ip`/`hostname` heredan el `host` global; sin `targetInfo`
 * explícito se deriva de los endpoints de los servicios.
 */
export function parseScanRequest(input: unknown): ScanRequest {
  if (!isRecord(input)) {
    throw new ScanConfigError('request', 'debe ser un objeto JSON')
  }
  const host = optionalString(input, 'host', 'request')
  const defaultEndpoint = host !== undefined ? endpointFromHost(host) : undefined

  if (!Array.isArray(input.services) || input.services.length === 0) {
    throw new ScanConfigError('services', 'debe ser un array no vacío')
  }
  const services = input.services.map((service: unknown, index: number) =>
    parseService(service, `services[${index}]`, defaultEndpoint)
  )

  let targetInfo: TargetInfo
  if (input.targetInfo !== undefined) {
    const rawTarget = input.targetInfo
    if (!isRecord(rawTarget) || !Array.isArray(rawTarget.networkEndpoints)) {
      throw new ScanConfigError('targetInfo', 'debe tener un array "networkEndpoints"')
    }
    targetInfo = {
      networkEndpoints: rawTarget.networkEndpoints.map(
        (endpoint: unknown, index: number) => {
          const field = `targetInfo.networkEndpoints[${index}]`
          if (!isRecord(endpoint)) throw new ScanConfigError(field, 'debe ser un objeto')
          return parseEndpoint(endpoint, field)
        }
      ),
    }
  } else {
    targetInfo = {
      networkEndpoints: uniqueEndpoints(
        defaultEndpoint ? [defaultEndpoint, ...services] : services
      ),
    }
  }

  return { targetInfo, services }
}
