import type { DatabaseFact, FactSet, RelationKind } from '@/relations/types'
import { trimTrailingSlash } from '@/utils/records'

import type { StaticOptions } from './options'

export interface HomeserverBlock {
  readonly name: string
  readonly url: string
  readonly secret: string
}

export interface WorkloadConfig {
  readonly publicUrl: string
  readonly databaseUrl: string
  readonly homeserver?: HomeserverBlock
  readonly logging?: { readonly endpoint: string }
}

export type BuildResult = { ok: true; config: WorkloadConfig } | { ok: false; missing: RelationKind }

export const buildDatabaseUrl = (fact: DatabaseFact) => {
  const user = encodeURIComponent(fact.user)
  const password = encodeURIComponent(fact.password)
  const database = encodeURIComponent(fact.databaseName)
  return `postgresql://${user}:${password}@${fact.host}:${fact.port}/${database}`
}

/**
 * Derives the workload configuration from the facts currently published.
 * The database is the only hard dependency and is checked before anything else.
 */
export const buildWorkloadConfig = (facts: FactSet, options: StaticOptions): BuildResult => {
  if (!facts.database) {
    return { ok: false, missing: 'database' }
  }

  const publicUrl = trimTrailingSlash(facts.ingress?.externalUrl ?? options.publicUrl)
  const config: WorkloadConfig = {
    publicUrl,
    databaseUrl: buildDatabaseUrl(facts.database),
    ...(facts.federation
      ? {
          homeserver: {
            name: facts.federation.homeserverName,
            url: facts.federation.homeserverUrl,
            secret: facts.federation.sharedSecret,
          },
        }
      : {}),
    ...(facts.logging ? { logging: { endpoint: facts.logging.endpoint } } : {}),
  }

  return { ok: true, config }
}
