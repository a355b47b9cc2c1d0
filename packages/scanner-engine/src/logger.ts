export interface Logger {
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

/** Logger sobre `console` que antepone `[scope]` a cada línea */
export function createConsoleLogger(scope: string): Logger {
  const prefix = `[${scope}]`
  return {
    info: (message, ...details) => console.log(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) =>
      console.error(`${prefix} ${message}`, ...details),
  }
}
