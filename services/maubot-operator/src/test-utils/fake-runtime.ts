import type {
  ActionReporter,
  OptionsSource,
  RelationData,
  RelationDataAccessor,
  RelationSnapshot,
  ServiceInfo,
  StatusReporter,
  SupervisorLayer,
  SupervisorPlan,
  UnitIdentity,
  UnitStatus,
  WorkloadContainer,
} from '@/runtime/ports'

export type FakeRelations = RelationDataAccessor & {
  set: (name: string, snapshots: RelationSnapshot[]) => void
  written: Map<string, RelationData>
  writes: number
}

export const createFakeRelations = (initial: Record<string, RelationSnapshot[]> = {}): FakeRelations => {
  const relations = new Map<string, RelationSnapshot[]>(Object.entries(initial))
  const fake: FakeRelations = {
    written: new Map<string, RelationData>(),
    writes: 0,
    relations: (name) => relations.get(name) ?? [],
    writeAppData: async (name, data) => {
      fake.writes += 1
      fake.written.set(name, { ...(fake.written.get(name) ?? {}), ...data })
    },
    set: (name, snapshots) => {
      relations.set(name, snapshots)
    },
  }
  return fake
}

type FailingOperation = 'push' | 'addLayer' | 'replan' | 'restart' | 'stop' | 'makeDirs'

export type FakeContainer = WorkloadContainer & {
  connected: boolean
  files: Map<string, string>
  directories: Set<string>
  layers: Map<string, SupervisorLayer>
  running: Set<string>
  calls: { push: number; addLayer: number; replan: number; restart: string[]; stop: string[] }
  failOn: Set<FailingOperation>
  assertConnected: (operation?: FailingOperation) => void
}

const emptyPlan = (): SupervisorPlan => ({ services: {}, checks: {}, 'log-targets': {} })

/**
 * In-memory stand-in for the workload container. Layers with the same label are
 * combined entry by entry, the way the supervisor does it.
 */
export const createFakeContainer = (name = 'maubot', files: Record<string, string> = {}): FakeContainer => {
  const fake: FakeContainer = {
    name,
    connected: true,
    files: new Map(Object.entries(files)),
    directories: new Set<string>(),
    layers: new Map<string, SupervisorLayer>(),
    running: new Set<string>(),
    calls: { push: 0, addLayer: 0, replan: 0, restart: [], stop: [] },
    failOn: new Set<FailingOperation>(),
    canConnect: async () => fake.connected,
    pull: async (path) => {
      fake.assertConnected()
      return fake.files.get(path) ?? null
    },
    push: async (path, content) => {
      fake.assertConnected('push')
      fake.calls.push += 1
      fake.files.set(path, content)
    },
    makeDirs: async (path) => {
      fake.assertConnected('makeDirs')
      fake.directories.add(path)
    },
    getPlan: async () => {
      fake.assertConnected()
      const plan = emptyPlan()
      for (const layer of fake.layers.values()) {
        Object.assign(plan.services, layer.services)
        Object.assign(plan.checks, layer.checks ?? {})
        Object.assign(plan['log-targets'], layer['log-targets'] ?? {})
      }
      return plan
    },
    addLayer: async (label, layer, options) => {
      fake.assertConnected('addLayer')
      fake.calls.addLayer += 1
      const existing = fake.layers.get(label)
      if (existing && !options.combine) {
        throw new Error(`layer "${label}" already exists`)
      }
      fake.layers.set(
        label,
        existing
          ? {
              ...layer,
              services: { ...existing.services, ...layer.services },
              checks: { ...(existing.checks ?? {}), ...(layer.checks ?? {}) },
              'log-targets': { ...(existing['log-targets'] ?? {}), ...(layer['log-targets'] ?? {}) },
            }
          : layer,
      )
    },
    replan: async () => {
      fake.assertConnected('replan')
      fake.calls.replan += 1
      const plan = await fake.getPlan()
      for (const [serviceName, service] of Object.entries(plan.services)) {
        if (service.startup === 'enabled') fake.running.add(serviceName)
      }
    },
    restart: async (service) => {
      fake.assertConnected('restart')
      const plan = await fake.getPlan()
      if (!plan.services[service]) {
        throw new Error(`service "${service}" does not exist`)
      }
      fake.calls.restart.push(service)
      fake.running.add(service)
    },
    stop: async (service) => {
      fake.assertConnected('stop')
      const plan = await fake.getPlan()
      if (!plan.services[service]) {
        throw new Error(`service "${service}" does not exist`)
      }
      fake.calls.stop.push(service)
      fake.running.delete(service)
    },
    getService: async (serviceName): Promise<ServiceInfo | null> => {
      fake.assertConnected()
      const plan = await fake.getPlan()
      if (!plan.services[serviceName]) return null
      return { name: serviceName, running: fake.running.has(serviceName) }
    },
    assertConnected: (operation) => {
      if (!fake.connected) throw new Error('cannot connect to container')
      if (operation && fake.failOn.has(operation)) throw new Error(`${operation} failed`)
    },
  }
  return fake
}

export const createStatusRecorder = (): StatusReporter & { statuses: UnitStatus[]; current: () => UnitStatus | null } => {
  const statuses: UnitStatus[] = []
  return {
    statuses,
    setStatus: (status) => {
      statuses.push(status)
    },
    current: () => statuses.at(-1) ?? null,
  }
}

export type ActionRecorder = ActionReporter & {
  results: Record<string, string> | null
  failure: string | null
}

export const createActionRecorder = (): ActionRecorder => {
  const recorder: ActionRecorder = {
    results: null,
    failure: null,
    setResults: (results) => {
      recorder.results = results
    },
    fail: (message) => {
      recorder.failure = message
    },
  }
  return recorder
}

export const createOptions = (options: Record<string, unknown> = {}): OptionsSource => ({
  options: () => options,
})

export const createUnitIdentity = (leader = true): UnitIdentity => ({
  unitName: 'maubot/0',
  appName: 'maubot',
  modelName: 'chat',
  isLeader: () => leader,
})
