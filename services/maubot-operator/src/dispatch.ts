import { Cause, Effect } from 'effect'

import { type AccountActions, reportCreateAdmin, reportRegisterClientAccount } from '@/actions/account-actions'
import type { ActionParams } from '@/actions/types'
import { AppLogger } from '@/logger'
import type { Reconciler } from '@/reconciler/reconciler'
import { publishRelationRequests } from '@/relations/requests'
import { METRICS_ENDPOINT_RELATION, RELATION_NAMES } from '@/relations/types'
import type { ActionReporter, RelationDataAccessor, UnitIdentity } from '@/runtime/ports'
import { MAUBOT_SERVICE } from '@/workload/constants'

interface OperatorEventPayloads {
  'config-changed': object
  'upgrade-charm': object
  'leader-elected': object
  'pebble-ready': { container: string }
  'relation-joined': { relation: string }
  'relation-changed': { relation: string }
  'relation-departed': { relation: string }
  'relation-broken': { relation: string }
  action: { name: string; params: ActionParams; reporter: ActionReporter }
}

export type OperatorEventType = keyof OperatorEventPayloads

export type OperatorEvent<K extends OperatorEventType = OperatorEventType> = {
  [P in K]: { type: P } & OperatorEventPayloads[P]
}[K]

type EventHandlers = {
  [K in OperatorEventType]: (event: OperatorEventPayloads[K]) => Effect.Effect<void, never, AppLogger>
}

export interface DispatcherDependencies {
  reconciler: Reconciler
  actions: AccountActions
  relations: RelationDataAccessor
  identity: UnitIdentity
}

const REQUEST_RELATIONS: readonly string[] = [RELATION_NAMES.database, RELATION_NAMES.ingress, METRICS_ENDPOINT_RELATION]

export const createDispatcher = (dependencies: DispatcherDependencies) => {
  const { reconciler, actions, relations, identity } = dependencies

  const reconcile = Effect.asVoid(Effect.suspend(() => reconciler.reconcile()))
  const publishRequests = Effect.asVoid(Effect.suspend(() => publishRelationRequests(relations, identity)))

  const onRelationEvent = (event: { relation: string }) =>
    REQUEST_RELATIONS.includes(event.relation) ? Effect.zipRight(publishRequests, reconcile) : reconcile

  const handlers: EventHandlers = {
    'config-changed': () => reconcile,
    'upgrade-charm': () => Effect.zipRight(publishRequests, reconcile),
    'leader-elected': () => Effect.zipRight(publishRequests, reconcile),
    'pebble-ready': (event) =>
      event.container === MAUBOT_SERVICE
        ? reconcile
        : Effect.flatMap(AppLogger, (log) => log.debug('ignoring pebble-ready', { container: event.container })),
    'relation-joined': onRelationEvent,
    'relation-changed': onRelationEvent,
    'relation-departed': () => reconcile,
    'relation-broken': () => reconcile,
    action: (event) => {
      switch (event.name) {
        case 'create-admin':
          return actions
            .createAdmin(event.params)
            .pipe(Effect.flatMap((result) => Effect.sync(() => reportCreateAdmin(event.reporter, result))))
        case 'register-client-account':
          return actions
            .registerClientAccount(event.params)
            .pipe(Effect.flatMap((result) => Effect.sync(() => reportRegisterClientAccount(event.reporter, result))))
        default:
          return Effect.sync(() => event.reporter.fail(`unknown action: ${event.name}`))
      }
    },
  }

  const route = <K extends OperatorEventType>(type: K, payload: OperatorEventPayloads[K]) => handlers[type](payload)

  /** Runs one event to completion; a defect in a handler blocks the unit instead of escaping. */
  const dispatch = (event: OperatorEvent) =>
    Effect.gen(function* () {
      const log = yield* AppLogger
      yield* log.debug('dispatching event', { event: event.type })
      yield* route(event.type, event)
    }).pipe(
      Effect.catchAllDefect((defect) =>
        Effect.gen(function* () {
          const log = yield* AppLogger
          yield* log.error('event handler crashed', { event: event.type, detail: Cause.pretty(Cause.die(defect)) })
          yield* reconciler.block('apply-failed')
        }),
      ),
    )

  return { dispatch }
}

export type Dispatcher = ReturnType<typeof createDispatcher>
