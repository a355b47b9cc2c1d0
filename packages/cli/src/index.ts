import { Command, InvalidArgumentError } from 'commander'
import fs from 'fs'
import path from 'path'
import {
  createId,
  defaultRegistry,
  getErrorMessage,
  parseScanRequest,
  runScan,
} from '@pathprobe/scanner-engine'
import type { ScanResult, ScanTarget, Severity } from '@pathprobe/shared-types'

export interface CliOptions {
  config?: string
  timeout?: number
  json?: boolean
  output?: string
  listDetectors?: boolean
}

const severityOrder: Record<Severity, number> = {
  CRITICAL: 4,
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
  MINIMAL: 0,
}

function parseTimeout(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Debe ser un entero positivo (ms).')
  }
  return parsed
}

/** Lee y valida el archivo de configuración JSON del escaneo */
export function loadScanTarget(configPath: string): ScanTarget {
  const resolved = path.resolve(configPath)
  if (!fs.existsSync(resolved)) {
    throw new Error(`El archivo de configuración no existe en: ${resolved}`)
  }
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'))
  const { targetInfo, services } = parseScanRequest(raw)
  return { id: createId(), targetInfo, services }
}

/** Formatea el resultado para la terminal, hallazgos ordenados por severidad */
export function formatResult(result: ScanResult): string[] {
  const lines = ['--- ✅ Resultados del Escaneo ---', `Estado: ${result.status}`]
  if (result.error) {
    lines.push(`Error durante el escaneo: ${result.error}`)
  }
  if (result.reports.length === 0) {
    lines.push('👍 No se encontraron vulnerabilidades con los detectores actuales.')
    return lines
  }
  lines.push('🚨 Hallazgos:')
  const sorted = [...result.reports].sort(
    (a, b) =>
      severityOrder[b.vulnerability.severity] -
      severityOrder[a.vulnerability.severity]
  )
  for (const report of sorted) {
    const { severity, mainId, title, recommendation } = report.vulnerability
    const { hostname, ip, port } = report.networkService
    lines.push(
      `  [${severity.padEnd(8)}] ${mainId.value} en ${hostname ?? ip}:${port} - ${title}`
    )
    lines.push(`     -> Recomendación: ${recommendation}`)
  }
  return lines
}

/** Código de salida: 1 si hay errores o hallazgos HIGH/CRITICAL */
export function exitCodeFor(result: ScanResult): number {
  if (result.status === 'Failed') return 1
  const hasCriticalOrHigh = result.reports.some(
    (r) => severityOrder[r.vulnerability.severity] >= severityOrder.HIGH
  )
  return hasCriticalOrHigh ? 1 : 0
}

async function main(options: CliOptions): Promise<number> {
  if (options.listDetectors) {
    for (const info of defaultRegistry().list()) {
      console.log(`${info.name} v${info.version} - ${info.description}`)
    }
    return 0
  }
  if (!options.config) {
    console.error('❌ Error: falta la opción -c, --config <path>.')
    return 1
  }

  let scanTarget: ScanTarget
  try {
    console.log(` Cargando configuración desde: ${path.resolve(options.config)}`)
    scanTarget = loadScanTarget(options.config)
  } catch (error) {
    console.error('❌ Error leyendo o parseando el archivo de configuración:')
    console.error(getErrorMessage(error))
    return 1
  }

  const result = await runScan(scanTarget, { timeoutMs: options.timeout })

  if (options.output) {
    fs.writeFileSync(
      path.resolve(options.output),
      JSON.stringify(result, null, 2),
      'utf-8'
    )
    console.log(`Resultado guardado en: ${path.resolve(options.output)}`)
  }
  if (options.json) {
    console.log(JSON.stringify(result, null, 2))
  } else {
    for (const line of formatResult(result)) console.log(line)
  }
  return exitCodeFor(result)
}

export function buildProgram(): Command {
  return new Command()
    .name('pathprobe')
    .description('Detector de path traversal en Apache HTTP Server (CVE-2021-42013)')
    .version('0.1.0')
    .option('-c, --config <path>', 'Ruta al archivo de configuración JSON del escaneo')
    .option('--timeout <ms>', 'Timeout de cada petición en ms', parseTimeout)
    .option('--json', 'Imprime el resultado completo en JSON')
    .option('-o, --output <path>', 'Guarda el resultado JSON en un archivo')
    .option('--list-detectors', 'Lista los detectores registrados')
    .action(async (options: CliOptions) => {
      try {
        process.exitCode = await main(options)
      } catch (error) {
        console.error('❌ Error inesperado ejecutando el escaneo:')
        console.error(getErrorMessage(error))
        process.exitCode = 1
      }
    })
}

if (require.main === module) {
  if (!process.argv.slice(2).length) {
    buildProgram().outputHelp()
  } else {
    buildProgram()
      .parseAsync(process.argv)
      .catch((error: unknown) => {
        console.error(getErrorMessage(error))
        process.exitCode = 1
      })
  }
}
