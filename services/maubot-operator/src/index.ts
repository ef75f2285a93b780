export {
  type AccountActions,
  createAccountActions,
  generatePassword,
  reportCreateAdmin,
  reportRegisterClientAccount,
} from './actions/account-actions'
export { createMaubotApi, type MaubotApi, type MaubotApiOptions } from './actions/maubot-api'
export type * from './actions/types'
export { loadConfig, type OperatorConfig } from './config'
export { createDispatcher, type Dispatcher, type OperatorEvent, type OperatorEventType } from './dispatch'
export { AppLogger, AppLoggerLayer, logger, makeAppLogger, resolveLoggerSettings } from './logger'
export { createMaubotOperator, type MaubotOperator, type MaubotOperatorOptions, type OperatorRuntime } from './operator'
export { createReconciler, type Reconciler, type ReconcileStop } from './reconciler/reconciler'
export { readFacts, readRelation } from './relations/reader'
export { buildRelationRequests, buildScrapeJobs, publishRelationRequests } from './relations/requests'
export type * from './relations/types'
export { RELATION_NAMES } from './relations/types'
export type * from './runtime/ports'
export { buildWorkloadConfig, type WorkloadConfig } from './workload/config-builder'
export { detachStaleLogTargets, planLayers, toSupervisorLayer } from './workload/layer-planner'
