export type RelationKind = 'database' | 'ingress' | 'federation' | 'logging'

export const RELATION_NAMES = {
  database: 'postgresql',
  ingress: 'ingress',
  federation: 'matrix-auth',
  logging: 'logging',
} as const satisfies Record<RelationKind, string>

export const METRICS_ENDPOINT_RELATION = 'metrics-endpoint'
export const DEFAULT_HOMESERVER_NAME = 'synapse'

export interface DatabaseFact {
  readonly kind: 'database'
  readonly host: string
  readonly port: number
  readonly user: string
  readonly password: string
  readonly databaseName: string
}

export interface IngressFact {
  readonly kind: 'ingress'
  readonly externalUrl: string
}

export interface FederationFact {
  readonly kind: 'federation'
  readonly homeserverName: string
  readonly homeserverUrl: string
  readonly sharedSecret: string
}

export interface LoggingFact {
  readonly kind: 'logging'
  readonly endpoint: string
}

export type DependencyFact = DatabaseFact | IngressFact | FederationFact | LoggingFact

export type FactOf<K extends RelationKind> = Extract<DependencyFact, { kind: K }>

export type FactSet = {
  readonly [K in RelationKind]?: FactOf<K>
}

export type ReadResult<F> = { status: 'present'; fact: F } | { status: 'absent' }

export interface MalformedDataError {
  readonly type: 'malformed-data'
  readonly kind: RelationKind
  readonly relationId: number
  readonly detail: string
}
