import { Either, Schema } from 'effect'

import type { RelationData, RelationDataAccessor, RelationSnapshot, RelationUnit } from '@/runtime/ports'

import {
  DEFAULT_HOMESERVER_NAME,
  type DatabaseFact,
  type FactOf,
  type FactSet,
  type FederationFact,
  type IngressFact,
  type LoggingFact,
  type MalformedDataError,
  RELATION_NAMES,
  type ReadResult,
  type RelationKind,
} from './types'

// Left carries a human-readable detail; Right(null) means nothing was published yet.
type Decoded<F> = Either.Either<F | null, string>

const UrlPayloadSchema = Schema.parseJson(Schema.Struct({ url: Schema.String }))
const decodeUrlPayload = Schema.decodeUnknownEither(UrlPayloadSchema)

const DATABASE_FIELDS = ['endpoints', 'database', 'username', 'password'] as const
const FEDERATION_FIELDS = ['homeserver', 'shared_secret'] as const
const SERVER_NAME_PATTERN = /^[A-Za-z0-9._-]+$/

const hasAny = (data: RelationData, fields: readonly string[]) => fields.some((field) => data[field] !== undefined)

const requireField = (data: RelationData, field: string): Either.Either<string, string> => {
  const value = data[field]
  return value !== undefined && value.trim().length > 0
    ? Either.right(value)
    : Either.left(`missing or empty field: ${field}`)
}

const parseAbsoluteUrl = (value: string, field: string): Either.Either<string, string> => {
  let parsed: URL
  try {
    parsed = new URL(value.trim())
  } catch {
    return Either.left(`${field} is not an absolute URL`)
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return Either.left(`${field} must use http or https`)
  }
  return Either.right(value.trim())
}

const parseEndpoint = (value: string): Either.Either<{ host: string; port: number }, string> => {
  const separator = value.lastIndexOf(':')
  if (separator <= 0) {
    return Either.left(`invalid endpoint: ${value}`)
  }
  const host = value.slice(0, separator)
  const rawPort = value.slice(separator + 1)
  const port = Number.parseInt(rawPort, 10)
  if (!/^\d+$/.test(rawPort) || port < 1 || port > 65_535) {
    return Either.left(`invalid port in endpoint: ${value}`)
  }
  return Either.right({ host, port })
}

const decodeUrlField = (raw: string, field: string) =>
  decodeUrlPayload(raw).pipe(
    Either.mapLeft(() => `${field} is not a JSON object with a url`),
    Either.flatMap(({ url }) => parseAbsoluteUrl(url, `${field}.url`)),
  )

export const decodeDatabaseData = (data: RelationData): Decoded<DatabaseFact> => {
  if (!hasAny(data, DATABASE_FIELDS)) return Either.right(null)
  return Either.gen(function* () {
    const endpoints = yield* requireField(data, 'endpoints')
    const databaseName = yield* requireField(data, 'database')
    const user = yield* requireField(data, 'username')
    const password = yield* requireField(data, 'password')
    const primary = endpoints.split(',')[0]?.trim() ?? ''
    const { host, port } = yield* parseEndpoint(primary)
    return { kind: 'database', host, port, user, password, databaseName } as const
  })
}

export const decodeIngressData = (data: RelationData): Decoded<IngressFact> => {
  const raw = data.ingress
  if (raw === undefined) return Either.right(null)
  return decodeUrlField(raw, 'ingress').pipe(Either.map((externalUrl) => ({ kind: 'ingress', externalUrl }) as const))
}

export const decodeFederationData = (data: RelationData): Decoded<FederationFact> => {
  if (!hasAny(data, FEDERATION_FIELDS)) return Either.right(null)
  return Either.gen(function* () {
    const rawUrl = yield* requireField(data, 'homeserver')
    const homeserverUrl = yield* parseAbsoluteUrl(rawUrl, 'homeserver')
    const sharedSecret = yield* requireField(data, 'shared_secret')
    const serverName = data.server_name?.trim()
    if (serverName !== undefined && !SERVER_NAME_PATTERN.test(serverName)) {
      return yield* Either.left(`invalid server_name: ${data.server_name}`)
    }
    return {
      kind: 'federation',
      homeserverName: serverName ?? DEFAULT_HOMESERVER_NAME,
      homeserverUrl,
      sharedSecret,
    } as const
  })
}

export const decodeLoggingData = (data: RelationData): Decoded<LoggingFact> => {
  const raw = data.endpoint
  if (raw === undefined) return Either.right(null)
  return decodeUrlField(raw, 'endpoint').pipe(Either.map((endpoint) => ({ kind: 'logging', endpoint }) as const))
}

const firstComplete = <T, F>(items: readonly T[], decode: (item: T) => Decoded<F>): Decoded<F> => {
  let firstError: string | null = null
  for (const item of items) {
    const decoded = decode(item)
    if (Either.isLeft(decoded)) {
      firstError ??= decoded.left
      continue
    }
    if (decoded.right) return Either.right(decoded.right)
  }
  return firstError === null ? Either.right(null) : Either.left(firstError)
}

const decoders: { [K in RelationKind]: (snapshot: RelationSnapshot) => Decoded<FactOf<K>> } = {
  database: (snapshot) => decodeDatabaseData(snapshot.appData),
  ingress: (snapshot) => decodeIngressData(snapshot.appData),
  federation: (snapshot) => decodeFederationData(snapshot.appData),
  logging: (snapshot) => firstComplete(snapshot.units, (unit: RelationUnit) => decodeLoggingData(unit.data)),
}

/**
 * Reads one dependency kind from its relation snapshots.
 *
 * The first snapshot with a complete payload wins. A malformed payload is only
 * reported when no snapshot yields a complete one; snapshots whose remote side
 * has not joined are skipped.
 */
export const readRelation = <K extends RelationKind>(
  kind: K,
  snapshots: readonly RelationSnapshot[],
): Either.Either<ReadResult<FactOf<K>>, MalformedDataError> => {
  const decode = decoders[kind]
  let firstError: MalformedDataError | null = null
  for (const snapshot of snapshots) {
    if (!snapshot.app) continue
    const decoded = decode(snapshot)
    if (Either.isLeft(decoded)) {
      firstError ??= { type: 'malformed-data', kind, relationId: snapshot.id, detail: decoded.left }
      continue
    }
    if (decoded.right) {
      return Either.right({ status: 'present' as const, fact: decoded.right })
    }
  }
  return firstError ? Either.left(firstError) : Either.right({ status: 'absent' as const })
}

const factOf = <F>(result: ReadResult<F>): F | undefined => (result.status === 'present' ? result.fact : undefined)

export const readFacts = (accessor: RelationDataAccessor): Either.Either<FactSet, MalformedDataError> =>
  Either.gen(function* () {
    const database = yield* readRelation('database', accessor.relations(RELATION_NAMES.database))
    const ingress = yield* readRelation('ingress', accessor.relations(RELATION_NAMES.ingress))
    const federation = yield* readRelation('federation', accessor.relations(RELATION_NAMES.federation))
    const logging = yield* readRelation('logging', accessor.relations(RELATION_NAMES.logging))
    return {
      database: factOf(database),
      ingress: factOf(ingress),
      federation: factOf(federation),
      logging: factOf(logging),
    }
  })
