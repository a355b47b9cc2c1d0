import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import type { NetworkService, TargetInfo } from '@pathprobe/shared-types'
import {
  buildDetectionReport,
  createApacheCve202142013Detector,
  isServiceVulnerable,
  pluginInfo,
} from '../src/detectors/apacheCve202142013'
import { HttpTransportError } from '../src/errors'
import {
  FIXED_MILLIS,
  TRAVERSAL_SUFFIX,
  fakeHttpClient,
  fixedClock,
  httpService,
  recordingLogger,
} from './fakes'

const PASSWD = 'root:x:0:0:root:/root:/bin/bash\ndaemon:x:1:1::/usr/sbin:/usr/sbin/nologin\n'
const DENIED =
  "<html><body><h1>Forbidden</h1><p>You don't have permission to access this resource.</p></body></html>"
const targetInfo: TargetInfo = { networkEndpoints: [{ ip: '10.0.0.5' }] }

async function verdict(status: number, server: string | undefined, body: string) {
  const { client } = fakeHttpClient({ status, server, body })
  return isServiceVulnerable(httpService, {
    httpClient: client,
    logger: recordingLogger(),
  })
}

describe('isServiceVulnerable', () => {
  test('Apache 2.4.49 devolviendo /etc/passwd es vulnerable', async () => {
    const { client, requests } = fakeHttpClient({
      status: 200,
      server: 'Apache/2.4.49 (Unix)',
      body: PASSWD,
    })
    const vulnerable = await isServiceVulnerable(httpService, {
      httpClient: client,
      logger: recordingLogger(),
    })
    assert.equal(vulnerable, true)
    assert.equal(requests.length, 1)
    assert.deepEqual(requests[0], {
      method: 'GET',
      url: `http://10.0.0.5:80/${TRAVERSAL_SUFFIX}`,
      headers: {},
    })
  })

  test('Apache 2.4.50 con contraseña "*" es vulnerable', async () => {
    assert.equal(await verdict(200, 'Apache/2.4.50', 'root:*:0:0:root:/root:/bin/sh'), true)
  })

  test('403 con "require all denied" no es vulnerable', async () => {
    assert.equal(await verdict(403, 'Apache/2.4.49', DENIED), false)
  })

  test('versión fuera del rango vulnerable no es vulnerable', async () => {
    assert.equal(await verdict(200, 'Apache/2.4.48', PASSWD), false)
    assert.equal(await verdict(200, 'Apache/2.4.51', PASSWD), false)
    assert.equal(await verdict(200, 'nginx/1.25.3', PASSWD), false)
  })

  test('sin header Server no es vulnerable', async () => {
    assert.equal(await verdict(200, undefined, PASSWD), false)
  })

  test('200 sin el patrón de /etc/passwd no es vulnerable', async () => {
    assert.equal(await verdict(200, 'Apache/2.4.49', '<html>It works!</html>'), false)
    assert.equal(await verdict(200, 'Apache/2.4.49', 'root:!:0:0:root:/root:/bin/bash'), false)
  })

  test('otros status no son vulnerables aunque el body coincida', async () => {
    assert.equal(await verdict(500, 'Apache/2.4.49', PASSWD), false)
    assert.equal(await verdict(403, 'Apache/2.4.49', PASSWD), false)
  })

  test('un fallo de red da false y un único warning', async () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 10.0.0.5:80'), {
      code: 'ECONNREFUSED',
    })
    const url = `http://10.0.0.5:80/${TRAVERSAL_SUFFIX}`
    const { client } = fakeHttpClient(new HttpTransportError(url, cause))
    const logger = recordingLogger()

    const vulnerable = await isServiceVulnerable(httpService, {
      httpClient: client,
      logger,
    })

    assert.equal(vulnerable, false)
    assert.deepEqual(logger.warnings, [
      [`No se pudo consultar '${url}'.`, `connect ECONNREFUSED 10.0.0.5:80 (${url})`],
    ])
    assert.deepEqual(logger.errors, [])
  })

  test('un error que no es de transporte se propaga sin warning', async () => {
    const { client } = fakeHttpClient(new TypeError('bug in client'))
    const logger = recordingLogger()

    await assert.rejects(
      isServiceVulnerable(httpService, { httpClient: client, logger }),
      TypeError
    )
    assert.deepEqual(logger.warnings, [])
  })
})

describe('buildDetectionReport', () => {
  test('sella la hora del reloj inyectado y los metadatos del CVE', () => {
    const report = buildDetectionReport(targetInfo, httpService, fixedClock)

    assert.equal(report.detectionTimestamp, FIXED_MILLIS)
    assert.equal(report.detectionStatus, 'VULNERABILITY_VERIFIED')
    assert.equal(report.targetInfo, targetInfo)
    assert.equal(report.networkService, httpService)
    assert.deepEqual(report.vulnerability.mainId, {
      publisher: 'TSUNAMI_COMMUNITY',
      value: 'CVE_2021_42013',
    })
    assert.equal(report.vulnerability.severity, 'HIGH')
    assert.equal(
      report.vulnerability.title,
      'Path Traversal and Remote Code Execution in Apache HTTP Server 2.4.49 and 2.4.50'
    )
    assert.equal(report.vulnerability.recommendation, 'Update 2.4.51 released.')
    assert.ok(Object.isFrozen(report))
    assert.ok(Object.isFrozen(report.vulnerability))
  })
})

describe('createApacheCve202142013Detector', () => {
  const sshService: NetworkService = {
    ip: '10.0.0.5',
    port: 22,
    transportProtocol: 'TCP',
    serviceName: 'ssh',
  }
  const httpsService: NetworkService = {
    hostname: 'web.example.test',
    port: 443,
    transportProtocol: 'TCP',
    serviceName: 'https',
  }

  test('solo sondea servicios web y reporta los vulnerables', async () => {
    const { client, requests } = fakeHttpClient((request) =>
      request.url.startsWith('https://')
        ? { status: 200, server: 'Apache/2.4.50 (Debian)', body: PASSWD }
        : { status: 403, server: 'Apache/2.4.49', body: DENIED }
    )
    const detector = createApacheCve202142013Detector({
      httpClient: client,
      clock: fixedClock,
      logger: recordingLogger(),
    })

    const { detectionReports } = await detector.detect(targetInfo, [
      httpService,
      sshService,
      httpsService,
    ])

    assert.deepEqual(
      requests.map((r) => r.url),
      [
        `http://10.0.0.5:80/${TRAVERSAL_SUFFIX}`,
        `https://web.example.test:443/${TRAVERSAL_SUFFIX}`,
      ]
    )
    assert.equal(detectionReports.length, 1)
    assert.equal(detectionReports[0].networkService, httpsService)
    assert.equal(detectionReports[0].detectionTimestamp, FIXED_MILLIS)
  })

  test('no sondea nada si no hay servicios web', async () => {
    const { client, requests } = fakeHttpClient({ status: 200, server: 'Apache/2.4.49', body: PASSWD })
    const detector = createApacheCve202142013Detector({
      httpClient: client,
      clock: fixedClock,
      logger: recordingLogger(),
    })

    const { detectionReports } = await detector.detect(targetInfo, [sshService])

    assert.equal(requests.length, 0)
    assert.deepEqual(detectionReports, [])
  })

  test('expone la información del plugin', () => {
    assert.equal(pluginInfo.name, 'ApacheHttpServerCVE202142013VulnDetector')
    assert.equal(pluginInfo.type, 'VULN_DETECTION')
  })
})
