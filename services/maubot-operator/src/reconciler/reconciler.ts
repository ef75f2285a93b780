import { Effect, Either } from 'effect'

import { DEFAULT_CONFIG_PATH, DEFAULT_EXAMPLE_CONFIG_PATH } from '@/config'
import { AppLogger } from '@/logger'
import { readFacts } from '@/relations/reader'
import type { MalformedDataError, RelationKind } from '@/relations/types'
import type {
  OptionsSource,
  RelationDataAccessor,
  StatusReporter,
  SupervisorLayer,
  SupervisorPlan,
  UnitStatus,
  WorkloadContainer,
} from '@/runtime/ports'
import { errorMessage } from '@/utils/errors'
import { stableStringify } from '@/utils/records'
import { buildWorkloadConfig, type WorkloadConfig } from '@/workload/config-builder'
import { parseConfigDocument, renderConfigDocument } from '@/workload/config-document'
import { DATA_SUBDIRS, LAYER_LABEL, MAUBOT_SERVICE } from '@/workload/constants'
import { detachStaleLogTargets, planLayers, toSupervisorLayer } from '@/workload/layer-planner'
import { decodeOptions, type InvalidOptionError } from '@/workload/options'

import { createUnitStatusActor, describeUnitStatus, getUnitStatus, transitionUnitStatus } from './status-machine'

export interface ApplyFailedError {
  readonly type: 'apply-failed'
  readonly step: string
  readonly detail: string
}

export type ReconcileStop =
  | { readonly type: 'container-unreachable' }
  | { readonly type: 'not-ready'; readonly missing: RelationKind }
  | MalformedDataError
  | InvalidOptionError
  | ApplyFailedError

export interface ReconcilerDependencies {
  container: WorkloadContainer
  relations: RelationDataAccessor
  options: OptionsSource
  status: StatusReporter
  configPath?: string
  exampleConfigPath?: string
}

export interface Reconciler {
  reconcile(): Effect.Effect<UnitStatus, never, AppLogger>
  /** Blocks the unit without reconciling, for failures outside the pipeline. */
  block(reason: string): Effect.Effect<UnitStatus, never, AppLogger>
  status(): UnitStatus
}

/** Everything one reconciliation derives before it touches the container. */
interface ReconcileContext {
  readonly config: WorkloadConfig
  readonly layer: SupervisorLayer
  readonly currentText: string | null
  readonly renderedText: string
  readonly plan: SupervisorPlan
  readonly workloadRunning: boolean
}

const unreachable: ReconcileStop = { type: 'container-unreachable' }
const notReady = (missing: RelationKind): ReconcileStop => ({ type: 'not-ready', missing })
const applyFailed = (step: string, detail: string): ApplyFailedError => ({ type: 'apply-failed', step, detail })

const attempt = <A>(step: string, run: () => Promise<A>) =>
  Effect.tryPromise({ try: run, catch: (error) => applyFailed(step, errorMessage(error)) })

export const statusForStop = (stop: ReconcileStop): UnitStatus => {
  switch (stop.type) {
    case 'container-unreachable':
      return { state: 'waiting', reason: 'container' }
    case 'not-ready':
      return { state: 'waiting', reason: stop.missing }
    case 'malformed-data':
      return { state: 'blocked', reason: `invalid relation: ${stop.kind}` }
    case 'invalid-config':
      return { state: 'blocked', reason: `invalid config: ${stop.option}` }
    case 'apply-failed':
      return { state: 'blocked', reason: 'apply-failed' }
  }
}

const sameEntries = <T>(planned: Record<string, T> | undefined, current: Record<string, T>) =>
  Object.entries(planned ?? {}).every(([name, entry]) => stableStringify(current[name]) === stableStringify(entry))

export const planMatches = (layer: SupervisorLayer, plan: SupervisorPlan) =>
  sameEntries(layer.services, plan.services) &&
  sameEntries(layer.checks, plan.checks) &&
  sameEntries(layer['log-targets'], plan['log-targets'])

const logStop = (stop: ReconcileStop) =>
  Effect.gen(function* () {
    const log = yield* AppLogger
    switch (stop.type) {
      case 'malformed-data':
        yield* log.warn('relation data is malformed', {
          kind: stop.kind,
          relationId: stop.relationId,
          detail: stop.detail,
        })
        return
      case 'invalid-config':
        yield* log.warn('charm option is invalid', { option: stop.option, detail: stop.detail })
        return
      case 'apply-failed':
        yield* log.error('failed to apply workload configuration', { step: stop.step, detail: stop.detail })
        return
      default:
        yield* log.debug('workload is not ready', { stop: stop.type })
    }
  })

export const createReconciler = (dependencies: ReconcilerDependencies): Reconciler => {
  const {
    container,
    relations,
    options,
    status,
    configPath = DEFAULT_CONFIG_PATH,
    exampleConfigPath = DEFAULT_EXAMPLE_CONFIG_PATH,
  } = dependencies
  const actor = createUnitStatusActor()

  const readBaseText = Effect.gen(function* () {
    const current = yield* attempt('read-config', () => container.pull(configPath))
    if (current !== null) return { current, base: current }
    const example = yield* attempt('read-example-config', () => container.pull(exampleConfigPath))
    if (example === null) {
      const log = yield* AppLogger
      yield* log.warn('no configuration template found, starting from an empty document', {
        path: exampleConfigPath,
      })
      return { current: null, base: '' }
    }
    return { current: null, base: example }
  })

  const isRunning = (service: string) =>
    attempt('read-service', () => container.getService(service)).pipe(Effect.map((info) => info?.running ?? false))

  const prepare = (config: WorkloadConfig) =>
    Effect.gen(function* () {
      const { current, base } = yield* readBaseText
      const document = yield* parseConfigDocument(base).pipe(
        Either.mapLeft((detail) => applyFailed('parse-config', detail)),
      )
      const plan = yield* attempt('read-plan', () => container.getPlan())
      const context: ReconcileContext = {
        config,
        layer: detachStaleLogTargets(toSupervisorLayer(planLayers(config, configPath)), plan),
        currentText: current,
        renderedText: renderConfigDocument(document, config),
        plan,
        workloadRunning: yield* isRunning(MAUBOT_SERVICE),
      }
      return context
    })

  // Without a database the workload would keep serving from a stale DSN.
  const stopWorkload = Effect.gen(function* () {
    const log = yield* AppLogger
    if (!(yield* isRunning(MAUBOT_SERVICE))) return
    yield* attempt('stop', () => container.stop(MAUBOT_SERVICE))
    yield* log.info('workload stopped until a database is related')
  }).pipe(
    Effect.catchAll((error) =>
      Effect.flatMap(AppLogger, (log) =>
        log.warn('failed to stop the workload', { step: error.step, detail: error.detail }),
      ),
    ),
  )

  const apply = (context: ReconcileContext) =>
    Effect.gen(function* () {
      const fileChanged = context.currentText !== context.renderedText

      for (const directory of DATA_SUBDIRS) {
        yield* attempt('make-dirs', () => container.makeDirs(directory))
      }
      if (fileChanged) {
        yield* attempt('push-config', () => container.push(configPath, context.renderedText))
      }
      yield* attempt('add-layer', () => container.addLayer(LAYER_LABEL, context.layer, { combine: true }))
      yield* attempt('replan', () => container.replan())
      // replan starts a stopped service with the new file; a running one only rereads it on restart
      if (fileChanged && context.workloadRunning) {
        yield* attempt('restart', () => container.restart(MAUBOT_SERVICE))
      }
      return fileChanged
    })

  const pipeline = Effect.gen(function* () {
    const log = yield* AppLogger
    const reachable = yield* Effect.tryPromise(() => container.canConnect()).pipe(
      Effect.catchAll(() => Effect.succeed(false)),
    )
    if (!reachable) {
      return yield* Effect.fail(unreachable)
    }

    const facts = yield* readFacts(relations)
    if (!facts.database) {
      yield* stopWorkload
      return yield* Effect.fail(notReady('database'))
    }
    const staticOptions = yield* decodeOptions(options.options())
    const built = buildWorkloadConfig(facts, staticOptions)
    if (!built.ok) {
      return yield* Effect.fail(notReady(built.missing))
    }

    const context = yield* prepare(built.config)
    if (
      context.currentText === context.renderedText &&
      context.workloadRunning &&
      planMatches(context.layer, context.plan)
    ) {
      yield* log.debug('workload configuration is up to date')
      return
    }

    const fileChanged = yield* apply(context)
    yield* log.info('workload configuration applied', {
      fileChanged,
      publicUrl: context.config.publicUrl,
      federation: context.config.homeserver !== undefined,
      logging: context.config.logging !== undefined,
    })
  })

  const publish = (next: UnitStatus) =>
    Effect.gen(function* () {
      const log = yield* AppLogger
      if (transitionUnitStatus(actor, next)) {
        yield* log.info('unit status changed', { status: describeUnitStatus(next) })
      }
      status.setStatus(getUnitStatus(actor))
      return getUnitStatus(actor)
    })

  return {
    reconcile: () =>
      pipeline.pipe(
        Effect.as<UnitStatus>({ state: 'active' }),
        Effect.catchAll((stop: ReconcileStop) => logStop(stop).pipe(Effect.as(statusForStop(stop)))),
        Effect.flatMap(publish),
      ),
    block: (reason) => publish({ state: 'blocked', reason }),
    status: () => getUnitStatus(actor),
  }
}
