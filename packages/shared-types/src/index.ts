export type TransportProtocol = 'TCP' | 'UDP'

export interface NetworkEndpoint {
  ip?: string
  hostname?: string
}

export interface NetworkService extends NetworkEndpoint {
  port: number
  transportProtocol: TransportProtocol
  serviceName?: string // Ej: 'http', 'https', 'ssl/http'
  softwareName?: string
  supportedSslVersions?: string[]
  applicationRoot?: string // Raíz de la app web, ej: '/portal'
}

export interface TargetInfo {
  networkEndpoints: NetworkEndpoint[]
}

export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW' | 'MINIMAL'

export type DetectionStatus =
  | 'VULNERABILITY_VERIFIED'
  | 'SUSPECTED_VULNERABLE'
  | 'VULNERABILITY_PRESENT'

export interface VulnerabilityId {
  publisher: string
  value: string
}

export interface Vulnerability {
  mainId: VulnerabilityId
  severity: Severity
  title: string
  description: string
  recommendation: string
}

export interface DetectionReport {
  targetInfo: TargetInfo
  networkService: NetworkService
  detectionTimestamp: number // ms desde epoch
  detectionStatus: DetectionStatus
  vulnerability: Vulnerability
}

export interface DetectionReportList {
  detectionReports: DetectionReport[]
}

export interface PluginInfo {
  type: 'VULN_DETECTION'
  name: string
  version: string
  description: string
  author: string
}

export interface ScanTarget {
  id: string
  targetInfo: TargetInfo
  services: NetworkService[]
}

export interface ScanResult {
  scanId: string
  target: ScanTarget
  status: 'Queued' | 'Running' | 'Completed' | 'Failed'
  reports: DetectionReport[]
  error?: string
  startedAt?: Date
  completedAt?: Date
}
