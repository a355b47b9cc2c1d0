/** Fallo de transporte al enviar una petición (timeout, conexión rechazada, respuesta malformada) */
export class HttpTransportError extends Error {
  readonly code: string
  readonly url: string

  constructor(url: string, cause: unknown) {
    super(`Falló la petición a ${url}`, { cause })
    this.name = 'HttpTransportError'
    this.url = url
    this.code = extractCode(cause)
  }
}

export class DuplicateDetectorError extends Error {
  constructor(name: string) {
    super(`Ya existe un detector registrado con el nombre: ${name}`)
    this.name = 'DuplicateDetectorError'
  }
}

/** Configuración de escaneo inválida (archivo del CLI o body de la API) */
export class ScanConfigError extends Error {
  readonly field: string

  constructor(field: string, message: string) {
    super(`${field}: ${message}`)
    this.name = 'ScanConfigError'
    this.field = field
  }
}

function extractCode(cause: unknown): string {
  if (
    typeof cause === 'object' &&
    cause !== null &&
    'code' in cause &&
    typeof cause.code === 'string'
  ) {
    return cause.code
  }
  return 'UNKNOWN'
}
