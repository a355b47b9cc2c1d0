import { randomUUID } from 'crypto'
import { AxiosError } from 'axios'
import { HttpTransportError } from './errors'

/** Helper para obtener un mensaje de error legible */
export function getErrorMessage(error: unknown): string {
  if (error instanceof HttpTransportError) {
    return `${getErrorMessage(error.cause)} (${error.url})`
  }
  if (error instanceof AxiosError) {
    // El timeout va primero: axios también rellena `code` en ese caso
    if (
      error.code === 'ECONNABORTED' ||
      error.code === 'ETIMEDOUT' ||
      error.message.toLowerCase().includes('timeout')
    ) {
      return 'Timeout de la petición'
    }
    if (error.response?.statusText)
      return `HTTP Error ${error.response.status}: ${error.response.statusText}`
    if (error.code) return `Network Error: ${error.code}`
  }
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Error desconocido'
}

/** Genera un ID único para escaneos y trabajos */
export function createId(): string {
  return randomUUID()
}
