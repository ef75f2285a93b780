import { assign, createActor, setup } from 'xstate'

import type { UnitStatus } from '@/runtime/ports'

type UnitStatusContext = { reason: string }

type UnitStatusEvent = { type: 'WAIT'; reason: string } | { type: 'BLOCK'; reason: string } | { type: 'ACTIVATE' }

const initialContext: UnitStatusContext = { reason: 'container' }
const eventShape: UnitStatusEvent = { type: 'ACTIVATE' }
const machineTypes: { context: UnitStatusContext; events: UnitStatusEvent } = { context: initialContext, events: eventShape }

const unitStatusMachine = setup({
  types: machineTypes,
  actions: {
    recordReason: assign({ reason: ({ event }) => ('reason' in event ? event.reason : '') }),
  },
}).createMachine({
  id: 'unitStatus',
  initial: 'waiting',
  context: initialContext,
  on: {
    WAIT: { target: '.waiting', actions: 'recordReason' },
    BLOCK: { target: '.blocked', actions: 'recordReason' },
    ACTIVATE: { target: '.active', actions: 'recordReason' },
  },
  states: {
    waiting: {},
    blocked: {},
    active: {},
  },
})

export type UnitStatusActor = ReturnType<typeof createUnitStatusActor>

export const createUnitStatusActor = () => {
  const actor = createActor(unitStatusMachine)
  actor.start()
  return actor
}

export const getUnitStatus = (actor: UnitStatusActor): UnitStatus => {
  const snapshot = actor.getSnapshot()
  if (snapshot.matches('active')) return { state: 'active' }
  if (snapshot.matches('blocked')) return { state: 'blocked', reason: snapshot.context.reason }
  return { state: 'waiting', reason: snapshot.context.reason }
}

/** Moves the actor to the given status; returns whether anything changed. */
export const transitionUnitStatus = (actor: UnitStatusActor, status: UnitStatus) => {
  const before = getUnitStatus(actor)
  if (status.state === 'active') {
    actor.send({ type: 'ACTIVATE' })
  } else if (status.state === 'blocked') {
    actor.send({ type: 'BLOCK', reason: status.reason })
  } else {
    actor.send({ type: 'WAIT', reason: status.reason })
  }
  return describeUnitStatus(before) !== describeUnitStatus(getUnitStatus(actor))
}

export const describeUnitStatus = (status: UnitStatus) =>
  status.state === 'active' ? 'active' : `${status.state}(${status.reason})`
