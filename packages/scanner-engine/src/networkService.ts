import { isIPv6 } from 'net'
import type { NetworkService } from '@pathprobe/shared-types'

const WEB_SERVICE_NAMES = new Set([
  'http',
  'https',
  'http-alt',
  'https-alt',
  'http-proxy',
  'http-mgmt',
  'radan-http',
  'ssl/http',
  'ssl/https',
])

const TLS_SERVICE_NAMES = new Set(['https', 'https-alt', 'ssl/http', 'ssl/https'])

function normalizedName(service: NetworkService): string {
  return (service.serviceName ?? '').trim().toLowerCase()
}

export function isWebService(service: NetworkService): boolean {
  return WEB_SERVICE_NAMES.has(normalizedName(service))
}

/** Servicio web sin TLS: ni nombre de variante SSL ni versiones SSL soportadas */
export function isPlainHttp(service: NetworkService): boolean {
  return (
    isWebService(service) &&
    !TLS_SERVICE_NAMES.has(normalizedName(service)) &&
    (service.supportedSslVersions ?? []).length === 0
  )
}

export function buildWebUriAuthority(service: NetworkService): string {
  let host = service.hostname || service.ip
  if (!host) {
    throw new Error(
      `El servicio en el puerto ${service.port} no tiene hostname ni IP`
    )
  }
  if (!service.hostname && isIPv6(host)) {
    host = `[${host}]`
  }
  return `${host}:${service.port}`
}

/** URL raíz de la aplicación web del servicio, siempre terminada en `/` */
export function buildWebApplicationRootUrl(service: NetworkService): string {
  const scheme = isPlainHttp(service) ? 'http://' : 'https://'
  let rootUrl = scheme + buildWebUriAuthority(service)
  const applicationRoot = (service.applicationRoot ?? '').trim()
  if (applicationRoot) {
    rootUrl += applicationRoot.startsWith('/')
      ? applicationRoot
      : `/${applicationRoot}`
  }
  return rootUrl.endsWith('/') ? rootUrl : `${rootUrl}/`
}
