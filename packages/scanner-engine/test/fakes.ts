import type { NetworkService } from '@pathprobe/shared-types'
import type { Clock } from '../src/clock'
import type { HttpClient, HttpRequest } from '../src/httpClient'
import type { Logger } from '../src/logger'

export interface CannedResponse {
  status: number
  server?: string
  body: string
}

export function fakeHttpClient(
  reply: CannedResponse | Error | ((request: HttpRequest) => CannedResponse)
): { client: HttpClient; requests: HttpRequest[] } {
  const requests: HttpRequest[] = []
  const client: HttpClient = {
    async send(request) {
      requests.push(request)
      if (reply instanceof Error) throw reply
      const canned = typeof reply === 'function' ? reply(request) : reply
      return {
        status: canned.status,
        header: (name) =>
          name.toLowerCase() === 'server' ? canned.server : undefined,
        bodyString: canned.body,
      }
    },
  }
  return { client, requests }
}

export interface RecordingLogger extends Logger {
  infos: unknown[][]
  warnings: unknown[][]
  errors: unknown[][]
}

export function recordingLogger(): RecordingLogger {
  const infos: unknown[][] = []
  const warnings: unknown[][] = []
  const errors: unknown[][] = []
  return {
    infos,
    warnings,
    errors,
    info: (message, ...details) => infos.push([message, ...details]),
    warn: (message, ...details) => warnings.push([message, ...details]),
    error: (message, ...details) => errors.push([message, ...details]),
  }
}

export const FIXED_MILLIS = 1700000000000

export const fixedClock: Clock = {
  now: () => new Date(FIXED_MILLIS),
}

export const httpService: NetworkService = {
  ip: '10.0.0.5',
  port: 80,
  transportProtocol: 'TCP',
  serviceName: 'http',
}

export const TRAVERSAL_SUFFIX =
  'cgi-bin/.%%32%65/%%32%65%%32%65/%%32%65%%32%65/%%32%65%%32%65/%%32%65%%32%65/etc/passwd'
