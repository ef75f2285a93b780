import { Either } from 'effect'
import { describe, expect, it } from 'vitest'

import { readFacts, readRelation } from '@/relations/reader'
import type { RelationSnapshot } from '@/runtime/ports'
import { createFakeRelations } from '@/test-utils/fake-runtime'

const snapshot = (overrides: Partial<RelationSnapshot> = {}): RelationSnapshot => ({
  id: 1,
  app: 'postgresql-k8s',
  appData: {},
  units: [],
  ...overrides,
})

const settle = <R, L>(result: Either.Either<R, L>) =>
  Either.match(result, {
    onLeft: (left) => ({ left }),
    onRight: (right) => ({ right }),
  })

const databaseData = {
  endpoints: 'db:5432,db-replica:5432',
  database: 'maubot',
  username: 'u',
  password: 'p',
}

describe('readRelation', () => {
  it('returns absent when no relation exists', () => {
    expect(settle(readRelation('database', []))).toEqual({ right: { status: 'absent' } })
  })

  it('returns absent while the remote side has written nothing', () => {
    expect(settle(readRelation('database', [snapshot()]))).toEqual({ right: { status: 'absent' } })
  })

  it('skips relations whose remote application has not joined', () => {
    const result = readRelation('database', [snapshot({ app: null, appData: databaseData })])

    expect(settle(result)).toEqual({ right: { status: 'absent' } })
  })

  it('decodes the primary database endpoint', () => {
    const result = readRelation('database', [snapshot({ appData: databaseData })])

    expect(settle(result)).toEqual({
      right: {
        status: 'present',
        fact: { kind: 'database', host: 'db', port: 5432, user: 'u', password: 'p', databaseName: 'maubot' },
      },
    })
  })

  it('rejects an empty database password as malformed', () => {
    const result = readRelation('database', [snapshot({ id: 7, appData: { ...databaseData, password: '' } })])

    expect(settle(result)).toEqual({
      left: {
        type: 'malformed-data',
        kind: 'database',
        relationId: 7,
        detail: 'missing or empty field: password',
      },
    })
  })

  it('rejects partially written database data', () => {
    const result = readRelation('database', [snapshot({ appData: { database: 'maubot' } })])

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.detail).toBe('missing or empty field: endpoints')
    }
  })

  it('rejects endpoints without a valid port', () => {
    const result = readRelation('database', [snapshot({ appData: { ...databaseData, endpoints: 'db:notaport' } })])

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.detail).toBe('invalid port in endpoint: db:notaport')
    }
  })

  it('decodes the ingress url', () => {
    const result = readRelation('ingress', [
      snapshot({ app: 'traefik', appData: { ingress: JSON.stringify({ url: 'https://bots.example.org' }) } }),
    ])

    expect(settle(result)).toEqual({
      right: { status: 'present', fact: { kind: 'ingress', externalUrl: 'https://bots.example.org' } },
    })
  })

  it('rejects an ingress payload that is not JSON', () => {
    const result = readRelation('ingress', [snapshot({ app: 'traefik', appData: { ingress: 'https://x' } })])

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left).toMatchObject({ kind: 'ingress', detail: 'ingress is not a JSON object with a url' })
    }
  })

  it('rejects an ingress url that is not absolute', () => {
    const result = readRelation('ingress', [
      snapshot({ app: 'traefik', appData: { ingress: JSON.stringify({ url: '/maubot' }) } }),
    ])

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.detail).toBe('ingress.url is not an absolute URL')
    }
  })

  it('decodes federation data with the default homeserver name', () => {
    const result = readRelation('federation', [
      snapshot({
        app: 'synapse',
        appData: { homeserver: 'https://matrix.example.org', shared_secret: 'test-secret' },
      }),
    ])

    expect(settle(result)).toEqual({
      right: {
        status: 'present',
        fact: {
          kind: 'federation',
          homeserverName: 'synapse',
          homeserverUrl: 'https://matrix.example.org',
          sharedSecret: 'test-secret',
        },
      },
    })
  })

  it('rejects a federation server name that cannot be used in a path', () => {
    const result = readRelation('federation', [
      snapshot({
        app: 'synapse',
        appData: { homeserver: 'https://matrix.example.org', shared_secret: 'test-secret', server_name: 'a/b' },
      }),
    ])

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.detail).toBe('invalid server_name: a/b')
    }
  })

  it('uses the first logging unit with a complete endpoint', () => {
    const endpoint = (url: string) => JSON.stringify({ url })
    const result = readRelation('logging', [
      snapshot({
        app: 'loki',
        units: [
          { name: 'loki/0', data: {} },
          { name: 'loki/1', data: { endpoint: endpoint('http://loki-1:3100/loki/api/v1/push') } },
          { name: 'loki/2', data: { endpoint: endpoint('http://loki-2:3100/loki/api/v1/push') } },
        ],
      }),
    ])

    expect(settle(result)).toEqual({
      right: { status: 'present', fact: { kind: 'logging', endpoint: 'http://loki-1:3100/loki/api/v1/push' } },
    })
  })

  it('prefers a complete relation over an earlier malformed one', () => {
    const endpoint = JSON.stringify({ url: 'http://loki:3100/loki/api/v1/push' })
    const result = readRelation('logging', [
      snapshot({ id: 1, app: 'loki-a', units: [{ name: 'loki-a/0', data: { endpoint: 'garbage' } }] }),
      snapshot({ id: 2, app: 'loki-b', units: [{ name: 'loki-b/0', data: { endpoint } }] }),
    ])

    expect(Either.isRight(result)).toBe(true)
  })
})

describe('readFacts', () => {
  it('collects every available fact', () => {
    const relations = createFakeRelations({
      postgresql: [snapshot({ appData: databaseData })],
      ingress: [snapshot({ app: 'traefik', appData: { ingress: JSON.stringify({ url: 'https://bots.example.org' }) } })],
    })

    const result = readFacts(relations)

    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right.database?.host).toBe('db')
      expect(result.right.ingress?.externalUrl).toBe('https://bots.example.org')
      expect(result.right.federation).toBeUndefined()
      expect(result.right.logging).toBeUndefined()
    }
  })

  it('fails on the first malformed kind', () => {
    const relations = createFakeRelations({
      postgresql: [snapshot({ appData: databaseData })],
      'matrix-auth': [snapshot({ id: 3, app: 'synapse', appData: { homeserver: 'nope', shared_secret: 's' } })],
    })

    const result = readFacts(relations)

    expect(settle(result)).toEqual({
      left: {
        type: 'malformed-data',
        kind: 'federation',
        relationId: 3,
        detail: 'homeserver is not an absolute URL',
      },
    })
  })
})
