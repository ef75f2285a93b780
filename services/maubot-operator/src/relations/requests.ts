import { Effect, Either } from 'effect'

import { AppLogger } from '@/logger'
import type { RelationData, RelationDataAccessor, UnitIdentity } from '@/runtime/ports'
import { errorMessage } from '@/utils/errors'
import { BLACKBOX_PORT, PROBE_TARGET_URL, PROXY_PORT } from '@/workload/constants'

import { METRICS_ENDPOINT_RELATION, RELATION_NAMES } from './types'

export interface ScrapeJob {
  job_name: string
  metrics_path: string
  params: Record<string, string[]>
  static_configs: { targets: string[] }[]
  relabel_configs: { source_labels?: string[]; target_label: string; replacement?: string }[]
}

export const exporterAddress = (identity: UnitIdentity) =>
  `${identity.unitName.replace('/', '-')}.${identity.appName}-endpoints.${identity.modelName}.svc.cluster.local:${BLACKBOX_PORT}`

/** Blackbox probe job: Prometheus asks the unit's exporter to probe the workload. */
export const buildScrapeJobs = (identity: UnitIdentity): ScrapeJob[] => [
  {
    job_name: 'blackbox_maubot',
    metrics_path: '/probe',
    params: { module: ['http_2xx'] },
    static_configs: [{ targets: [PROBE_TARGET_URL] }],
    relabel_configs: [
      { source_labels: ['__address__'], target_label: '__param_target' },
      { source_labels: ['__param_target'], target_label: 'instance' },
      { source_labels: ['__param_target'], target_label: 'probe_target' },
      { target_label: '__address__', replacement: exporterAddress(identity) },
    ],
  },
]

export const buildRelationRequests = (identity: UnitIdentity): Record<string, RelationData> => ({
  [RELATION_NAMES.database]: { database: identity.appName },
  [RELATION_NAMES.ingress]: {
    model: JSON.stringify(identity.modelName),
    name: JSON.stringify(identity.appName),
    port: String(PROXY_PORT),
    'strip-prefix': 'false',
    'redirect-https': 'false',
    scheme: JSON.stringify('http'),
  },
  [METRICS_ENDPOINT_RELATION]: {
    scrape_jobs: JSON.stringify(buildScrapeJobs(identity)),
    scrape_metadata: JSON.stringify({
      model: identity.modelName,
      application: identity.appName,
      unit: identity.unitName,
    }),
  },
})

/**
 * Publishes what this application asks of its related applications. Only the
 * leader may write application data; write failures are logged and skipped.
 */
export const publishRelationRequests = (relations: RelationDataAccessor, identity: UnitIdentity) =>
  Effect.gen(function* () {
    const log = yield* AppLogger
    const written: string[] = []
    if (!identity.isLeader()) {
      yield* log.debug('not the leader, skipping relation requests')
      return written
    }

    for (const [name, data] of Object.entries(buildRelationRequests(identity))) {
      if (relations.relations(name).length === 0) continue
      const outcome = yield* Effect.either(
        Effect.tryPromise({ try: () => relations.writeAppData(name, data), catch: errorMessage }),
      )
      if (Either.isLeft(outcome)) {
        yield* log.warn('failed to publish relation request', { relation: name, detail: outcome.left })
        continue
      }
      written.push(name)
    }
    if (written.length > 0) {
      yield* log.debug('relation requests published', { relations: written })
    }
    return written
  })
