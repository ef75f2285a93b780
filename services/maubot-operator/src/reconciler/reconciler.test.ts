import { Effect, Either } from 'effect'
import { describe, expect, it } from 'vitest'
import { parse } from 'yaml'

import { AppLoggerLayer } from '@/logger'
import { createReconciler, planMatches, type Reconciler } from '@/reconciler/reconciler'
import type { RelationSnapshot } from '@/runtime/ports'
import {
  createFakeContainer,
  createFakeRelations,
  createOptions,
  createStatusRecorder,
} from '@/test-utils/fake-runtime'
import { parseConfigDocument, serializeConfigDocument, withAdmin } from '@/workload/config-document'

const EXAMPLE_CONFIG = `database: sqlite:maubot.db
server:
  hostname: 0.0.0.0
  port: 29316
  public_url: https://example.com
admins:
  root: ""
`

const databaseSnapshot = (password = 'p'): RelationSnapshot => ({
  id: 1,
  app: 'postgresql-k8s',
  appData: { endpoints: 'db:5432', database: 'maubot', username: 'u', password },
  units: [],
})

const ingressSnapshot: RelationSnapshot = {
  id: 2,
  app: 'traefik',
  appData: { ingress: JSON.stringify({ url: 'https://bots.example.org' }) },
  units: [],
}

const loggingSnapshot: RelationSnapshot = {
  id: 3,
  app: 'loki',
  appData: {},
  units: [{ name: 'loki/0', data: { endpoint: JSON.stringify({ url: 'http://loki:3100/loki/api/v1/push' }) } }],
}

const setup = (relations: Record<string, RelationSnapshot[]> = {}, options: Record<string, unknown> = {}) => {
  const container = createFakeContainer('maubot', { '/example-config.yaml': EXAMPLE_CONFIG })
  const fakeRelations = createFakeRelations(relations)
  const status = createStatusRecorder()
  const reconciler = createReconciler({
    container,
    relations: fakeRelations,
    options: createOptions(options),
    status,
  })
  return { container, relations: fakeRelations, status, reconciler }
}

const run = (reconciler: Reconciler) => Effect.runPromise(reconciler.reconcile().pipe(Effect.provide(AppLoggerLayer)))

const readConfigFile = (files: Map<string, string>) => parse(files.get('/data/config.yaml') ?? '')

describe('reconciler', () => {
  it('waits for the container before reading anything', async () => {
    const { container, status, reconciler } = setup({ postgresql: [databaseSnapshot()] })
    container.connected = false

    expect(await run(reconciler)).toEqual({ state: 'waiting', reason: 'container' })
    expect(status.current()).toEqual({ state: 'waiting', reason: 'container' })
    expect(container.calls.push).toBe(0)
  })

  it('waits for the database whatever else is related', async () => {
    const { container, reconciler } = setup({ ingress: [ingressSnapshot] })

    expect(await run(reconciler)).toEqual({ state: 'waiting', reason: 'database' })
    expect(container.calls.addLayer).toBe(0)
    expect(container.calls.stop).toEqual([])
  })

  it('reports the missing database before an invalid option', async () => {
    const { reconciler } = setup({}, { 'public-url': 'ftp://maubot.local' })

    expect(await run(reconciler)).toEqual({ state: 'waiting', reason: 'database' })
  })

  it('stops the workload while the database is gone and starts it again once it returns', async () => {
    const { container, relations, reconciler } = setup({ postgresql: [databaseSnapshot()] })
    await run(reconciler)

    relations.set('postgresql', [])
    expect(await run(reconciler)).toEqual({ state: 'waiting', reason: 'database' })
    expect(container.calls.stop).toEqual(['maubot'])
    expect(container.running.has('maubot')).toBe(false)

    await run(reconciler)
    expect(container.calls.stop).toEqual(['maubot'])

    relations.set('postgresql', [databaseSnapshot()])
    expect(await run(reconciler)).toEqual({ state: 'active' })
    expect(container.running.has('maubot')).toBe(true)
    expect(container.calls.push).toBe(1)
    expect(container.calls.restart).toEqual([])
  })

  it('blocks on a database payload with an empty password', async () => {
    const { reconciler } = setup({ postgresql: [databaseSnapshot('')] })

    expect(await run(reconciler)).toEqual({ state: 'blocked', reason: 'invalid relation: database' })
  })

  it('blocks on an invalid public-url option', async () => {
    const { reconciler } = setup({ postgresql: [databaseSnapshot()] }, { 'public-url': 'ftp://maubot.local' })

    expect(await run(reconciler)).toEqual({ state: 'blocked', reason: 'invalid config: public-url' })
  })

  it('becomes active with the database alone', async () => {
    const { container, status, reconciler } = setup({ postgresql: [databaseSnapshot()] })

    expect(await run(reconciler)).toEqual({ state: 'active' })
    expect(status.current()).toEqual({ state: 'active' })
    expect(readConfigFile(container.files)).toMatchObject({
      database: 'postgresql://u:p@db:5432/maubot',
      server: { hostname: '0.0.0.0', port: 29316, public_url: 'https://maubot.local' },
    })
    expect(container.layers.get('maubot')?.services.maubot?.environment?.MAUBOT_DATABASE_URL).toBe(
      'postgresql://u:p@db:5432/maubot',
    )
    expect([...container.directories]).toEqual(['/data/plugins', '/data/trash', '/data/dbs'])
    expect([...container.running].sort()).toEqual(['blackbox', 'maubot', 'nginx'])
    expect(container.calls.restart).toEqual([])
  })

  it('writes the file and layer once across repeated reconciliations', async () => {
    const { container, reconciler } = setup({ postgresql: [databaseSnapshot()] })

    await run(reconciler)
    await run(reconciler)

    expect(container.calls.push).toBe(1)
    expect(container.calls.addLayer).toBe(1)
    expect(container.calls.replan).toBe(1)
  })

  it('keeps admins and restarts the workload when the file changes', async () => {
    const { container, relations, reconciler } = setup({ postgresql: [databaseSnapshot()] })
    await run(reconciler)

    const document = Either.getOrThrow(parseConfigDocument(container.files.get('/data/config.yaml') ?? ''))
    container.files.set('/data/config.yaml', serializeConfigDocument(withAdmin(document, 'alice', 'generated')))
    relations.set('ingress', [ingressSnapshot])

    expect(await run(reconciler)).toEqual({ state: 'active' })
    expect(readConfigFile(container.files)).toMatchObject({
      admins: { root: '', alice: 'generated' },
      server: { public_url: 'https://bots.example.org' },
    })
    expect(container.calls.restart).toEqual(['maubot'])
  })

  it('blocks when applying the configuration fails', async () => {
    const { container, reconciler } = setup({ postgresql: [databaseSnapshot()] })
    container.failOn.add('push')

    expect(await run(reconciler)).toEqual({ state: 'blocked', reason: 'apply-failed' })
    expect(container.calls.addLayer).toBe(0)
  })

  it('starts from an empty document when neither the configuration nor its template exist', async () => {
    const { container, reconciler } = setup({ postgresql: [databaseSnapshot()] })
    container.files.clear()

    expect(await run(reconciler)).toEqual({ state: 'active' })
    expect(readConfigFile(container.files)).toEqual({
      database: 'postgresql://u:p@db:5432/maubot',
      server: { public_url: 'https://maubot.local' },
    })
  })

  it('detaches the services from the log sink once the logging relation is removed', async () => {
    const { container, relations, reconciler } = setup({
      postgresql: [databaseSnapshot()],
      logging: [loggingSnapshot],
    })
    await run(reconciler)
    expect(readConfigFile(container.files).loki).toEqual({ push_url: 'http://loki:3100/loki/api/v1/push' })

    relations.set('logging', [])
    expect(await run(reconciler)).toEqual({ state: 'active' })

    expect(readConfigFile(container.files).loki).toBeUndefined()
    const plan = await container.getPlan()
    expect(plan['log-targets'].loki).toEqual({
      override: 'merge',
      type: 'loki',
      location: 'http://loki:3100/loki/api/v1/push',
      services: ['-all'],
    })
    expect(container.calls.addLayer).toBe(2)

    await run(reconciler)
    expect(container.calls.addLayer).toBe(2)
  })

  it('recovers once the cause of a block is gone', async () => {
    const { container, reconciler } = setup({ postgresql: [databaseSnapshot()] })
    container.failOn.add('replan')
    await run(reconciler)

    container.failOn.clear()
    expect(await run(reconciler)).toEqual({ state: 'active' })
    expect(reconciler.status()).toEqual({ state: 'active' })
    expect([...container.running].sort()).toEqual(['blackbox', 'maubot', 'nginx'])
  })

  it('blocks on request and keeps the reported status in step', async () => {
    const { status, reconciler } = setup({ postgresql: [databaseSnapshot()] })

    expect(await Effect.runPromise(reconciler.block('apply-failed').pipe(Effect.provide(AppLoggerLayer)))).toEqual({
      state: 'blocked',
      reason: 'apply-failed',
    })
    expect(status.current()).toEqual({ state: 'blocked', reason: 'apply-failed' })
    expect(reconciler.status()).toEqual({ state: 'blocked', reason: 'apply-failed' })
  })
})

describe('planMatches', () => {
  it('ignores entries the layer does not mention', () => {
    const layer = {
      summary: 'maubot layer',
      description: 'test',
      services: {
        maubot: { override: 'replace' as const, summary: 'maubot', command: 'run', startup: 'enabled' as const },
      },
    }
    const plan = {
      services: {
        ...layer.services,
        other: { override: 'replace' as const, summary: 'other', command: 'other', startup: 'enabled' as const },
      },
      checks: {},
      'log-targets': {},
    }

    expect(planMatches(layer, plan)).toBe(true)
    expect(planMatches(layer, { ...plan, services: {} })).toBe(false)
  })
})
