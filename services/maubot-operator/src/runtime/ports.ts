/**
 * Capabilities the event-dispatch runtime hands to the operator at construction.
 * Nothing here knows how relation data or the process supervisor is transported.
 */

export type RelationData = Readonly<Record<string, string>>

export interface RelationUnit {
  readonly name: string
  readonly data: RelationData
}

export interface RelationSnapshot {
  readonly id: number
  /** Remote application name, null until the remote side has joined. */
  readonly app: string | null
  readonly appData: RelationData
  readonly units: readonly RelationUnit[]
}

export interface RelationDataAccessor {
  relations(name: string): readonly RelationSnapshot[]
  writeAppData(name: string, data: RelationData): Promise<void>
}

export type ServiceStartup = 'enabled' | 'disabled'
export type ServiceAction = 'restart' | 'shutdown' | 'ignore'

export interface SupervisorService {
  override: 'replace' | 'merge'
  summary: string
  command: string
  startup: ServiceStartup
  'working-dir'?: string
  after?: string[]
  environment?: Record<string, string>
  'on-failure'?: ServiceAction
}

export interface SupervisorCheck {
  override: 'replace' | 'merge'
  level: 'alive' | 'ready'
  period: string
  threshold: number
  http: { url: string }
}

export interface SupervisorLogTarget {
  override: 'replace' | 'merge'
  type: 'loki'
  location: string
  services: string[]
}

export interface SupervisorLayer {
  summary: string
  description: string
  services: Record<string, SupervisorService>
  checks?: Record<string, SupervisorCheck>
  'log-targets'?: Record<string, SupervisorLogTarget>
}

export interface SupervisorPlan {
  services: Record<string, SupervisorService>
  checks: Record<string, SupervisorCheck>
  'log-targets': Record<string, SupervisorLogTarget>
}

export interface ServiceInfo {
  name: string
  running: boolean
}

export interface WorkloadContainer {
  readonly name: string
  canConnect(): Promise<boolean>
  /** Resolves to null when the file does not exist. */
  pull(path: string): Promise<string | null>
  push(path: string, content: string): Promise<void>
  makeDirs(path: string): Promise<void>
  getPlan(): Promise<SupervisorPlan>
  addLayer(label: string, layer: SupervisorLayer, options: { combine: boolean }): Promise<void>
  replan(): Promise<void>
  restart(service: string): Promise<void>
  stop(service: string): Promise<void>
  getService(name: string): Promise<ServiceInfo | null>
}

export type UnitStatus =
  | { state: 'waiting'; reason: string }
  | { state: 'blocked'; reason: string }
  | { state: 'active' }

export interface StatusReporter {
  setStatus(status: UnitStatus): void
}

export interface ActionReporter {
  setResults(results: Record<string, string>): void
  fail(message: string): void
}

export interface OptionsSource {
  options(): Readonly<Record<string, unknown>>
}

export interface UnitIdentity {
  readonly unitName: string
  readonly appName: string
  readonly modelName: string
  isLeader(): boolean
}
