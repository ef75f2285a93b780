import { DEFAULT_CONFIG_PATH } from '@/config'
import type {
  SupervisorCheck,
  SupervisorLayer,
  SupervisorLogTarget,
  SupervisorPlan,
  SupervisorService,
} from '@/runtime/ports'

import type { WorkloadConfig } from './config-builder'
import {
  BLACKBOX_PORT,
  BLACKBOX_SERVICE,
  DATA_DIR,
  MAUBOT_HEALTH_URL,
  MAUBOT_SERVICE,
  NGINX_SERVICE,
  PROXY_HEALTH_PATH,
  PROXY_PORT,
} from './constants'

export interface ReadinessProbe {
  readonly name: string
  readonly url: string
  readonly period: string
  readonly threshold: number
}

export interface LayerDefinition {
  readonly name: string
  readonly summary: string
  readonly command: string
  readonly environment: Readonly<Record<string, string>>
  readonly workingDir?: string
  readonly after?: readonly string[]
  readonly readiness: ReadinessProbe
  readonly restartPolicy: 'restart' | 'ignore'
}

export interface LayerPlan {
  readonly workload: LayerDefinition
  readonly proxy: LayerDefinition
  readonly probe: LayerDefinition
  readonly logTarget?: { readonly name: string; readonly endpoint: string }
}

export const FEDERATION_ENV_KEYS = ['MAUBOT_HOMESERVER_NAME', 'MAUBOT_HOMESERVER_URL', 'MAUBOT_HOMESERVER_SECRET'] as const

const readiness = (service: string, url: string): ReadinessProbe => ({
  name: `${service}-ready`,
  url,
  period: '10s',
  threshold: 3,
})

const workloadEnvironment = (config: WorkloadConfig, configPath: string): Record<string, string> => ({
  MAUBOT_CONFIG: configPath,
  MAUBOT_PUBLIC_URL: config.publicUrl,
  MAUBOT_DATABASE_URL: config.databaseUrl,
  ...(config.homeserver
    ? {
        MAUBOT_HOMESERVER_NAME: config.homeserver.name,
        MAUBOT_HOMESERVER_URL: config.homeserver.url,
        MAUBOT_HOMESERVER_SECRET: config.homeserver.secret,
      }
    : {}),
})

export const planLayers = (config: WorkloadConfig, configPath: string = DEFAULT_CONFIG_PATH): LayerPlan => ({
  workload: {
    name: MAUBOT_SERVICE,
    summary: 'maubot',
    command: `python3 -m maubot -c ${configPath}`,
    environment: workloadEnvironment(config, configPath),
    workingDir: DATA_DIR,
    readiness: readiness(MAUBOT_SERVICE, MAUBOT_HEALTH_URL),
    restartPolicy: 'restart',
  },
  proxy: {
    name: NGINX_SERVICE,
    summary: 'nginx',
    command: "/usr/sbin/nginx -g 'daemon off;'",
    environment: {},
    after: [MAUBOT_SERVICE],
    readiness: readiness(NGINX_SERVICE, `http://localhost:${PROXY_PORT}${PROXY_HEALTH_PATH}`),
    restartPolicy: 'restart',
  },
  probe: {
    name: BLACKBOX_SERVICE,
    summary: 'blackbox-exporter',
    command: '/usr/bin/blackbox_exporter --config.file=/etc/blackbox.yaml',
    environment: {},
    readiness: readiness(BLACKBOX_SERVICE, `http://localhost:${BLACKBOX_PORT}/-/healthy`),
    restartPolicy: 'restart',
  },
  ...(config.logging ? { logTarget: { name: 'loki', endpoint: config.logging.endpoint } } : {}),
})

const toService = (definition: LayerDefinition): SupervisorService => ({
  override: 'replace',
  summary: definition.summary,
  command: definition.command,
  startup: 'enabled',
  ...(definition.workingDir ? { 'working-dir': definition.workingDir } : {}),
  ...(definition.after ? { after: [...definition.after] } : {}),
  ...(Object.keys(definition.environment).length > 0 ? { environment: { ...definition.environment } } : {}),
  'on-failure': definition.restartPolicy,
})

// Checks only report; none carries on-check-failure, so a failing probe never restarts anything.
const toCheck = (probe: ReadinessProbe): SupervisorCheck => ({
  override: 'replace',
  level: 'ready',
  period: probe.period,
  threshold: probe.threshold,
  http: { url: probe.url },
})

export const toSupervisorLayer = (plan: LayerPlan): SupervisorLayer => {
  const definitions = [plan.workload, plan.proxy, plan.probe]
  const layer: SupervisorLayer = {
    summary: 'maubot layer',
    description: 'supervisor layer for maubot, its reverse proxy and its blackbox probe',
    services: Object.fromEntries(definitions.map((definition) => [definition.name, toService(definition)])),
    checks: Object.fromEntries(definitions.map((definition) => [definition.readiness.name, toCheck(definition.readiness)])),
  }
  if (plan.logTarget) {
    const target: SupervisorLogTarget = {
      override: 'replace',
      type: 'loki',
      location: plan.logTarget.endpoint,
      services: definitions.map((definition) => definition.name),
    }
    layer['log-targets'] = { [plan.logTarget.name]: target }
  }
  return layer
}

export const DETACH_ALL_SERVICES = '-all'

/**
 * Layers combine into the plan, so a log target the new layer no longer names
 * keeps forwarding until it is overridden. Each such target still attached to a
 * service gets a merge entry that detaches every service from it.
 */
export const detachStaleLogTargets = (layer: SupervisorLayer, plan: SupervisorPlan): SupervisorLayer => {
  const planned = layer['log-targets'] ?? {}
  const stale = Object.entries(plan['log-targets']).filter(
    ([name, target]) =>
      planned[name] === undefined && target.services.some((service) => service !== DETACH_ALL_SERVICES),
  )
  if (stale.length === 0) return layer

  const detached = stale.map(([name, target]): [string, SupervisorLogTarget] => [
    name,
    { ...target, override: 'merge', services: [DETACH_ALL_SERVICES] },
  ])
  return { ...layer, 'log-targets': { ...planned, ...Object.fromEntries(detached) } }
}
