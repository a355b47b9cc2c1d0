import axios from 'axios'
import type { AxiosInstance, AxiosResponse } from 'axios'
import { HttpTransportError } from './errors'

const DEFAULT_TIMEOUT_MS = 10000

export interface HttpRequest {
  method: 'GET' | 'HEAD' | 'POST'
  url: string
  headers: Record<string, string>
}

export interface HttpResponse {
  status: number
  header(name: string): string | undefined
  bodyString: string
}

/**
 * Capacidad HTTP que reciben los detectores.
 * Los status no-2xx son respuestas; solo los fallos de transporte rechazan
 * con {@link HttpTransportError}.
 */
export interface HttpClient {
  send(request: HttpRequest): Promise<HttpResponse>
}

export function get(url: string): HttpRequest {
  return { method: 'GET', url, headers: {} }
}

export interface AxiosHttpClientOptions {
  timeoutMs?: number
}

export class AxiosHttpClient implements HttpClient {
  private readonly http: AxiosInstance

  constructor(options: AxiosHttpClientOptions = {}) {
    this.http = axios.create({
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRedirects: 0,
      responseType: 'text',
      // El body se devuelve tal cual, sin intentar parsear JSON
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    })
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
      })
      return toHttpResponse(response)
    } catch (error) {
      throw new HttpTransportError(request.url, error)
    }
  }
}

function toHttpResponse(response: AxiosResponse<unknown>): HttpResponse {
  const headers = new Map<string, string>()
  for (const [name, value] of Object.entries(response.headers)) {
    if (Array.isArray(value)) {
      headers.set(name.toLowerCase(), value.join(', '))
    } else if (value !== undefined && value !== null) {
      headers.set(name.toLowerCase(), String(value))
    }
  }
  return {
    status: response.status,
    header: (name) => headers.get(name.toLowerCase()),
    bodyString: typeof response.data === 'string' ? response.data : '',
  }
}
