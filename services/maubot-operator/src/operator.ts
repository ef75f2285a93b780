import { Effect, Layer } from 'effect'

import { createAccountActions } from '@/actions/account-actions'
import { createMaubotApi } from '@/actions/maubot-api'
import type { FetchLike } from '@/actions/types'
import { loadConfig, type OperatorConfig } from '@/config'
import { createDispatcher, type OperatorEvent } from '@/dispatch'
import { AppLogger, AppLoggerLayer } from '@/logger'
import { createReconciler } from '@/reconciler/reconciler'
import type {
  OptionsSource,
  RelationDataAccessor,
  StatusReporter,
  UnitIdentity,
  UnitStatus,
  WorkloadContainer,
} from '@/runtime/ports'

export interface OperatorRuntime {
  container: WorkloadContainer
  relations: RelationDataAccessor
  options: OptionsSource
  status: StatusReporter
  identity: UnitIdentity
}

export interface MaubotOperatorOptions {
  config?: OperatorConfig
  fetchImplementation?: FetchLike | null
  loggerLayer?: Layer.Layer<AppLogger>
  generatePassword?: () => string
}

export interface MaubotOperator {
  handle(event: OperatorEvent): Promise<void>
  status(): UnitStatus
}

export const createMaubotOperator = (runtime: OperatorRuntime, options: MaubotOperatorOptions = {}): MaubotOperator => {
  const config = options.config ?? loadConfig()
  const loggerLayer = options.loggerLayer ?? AppLoggerLayer

  const reconciler = createReconciler({
    container: runtime.container,
    relations: runtime.relations,
    options: runtime.options,
    status: runtime.status,
    configPath: config.configPath,
    exampleConfigPath: config.exampleConfigPath,
  })
  const actions = createAccountActions({
    container: runtime.container,
    api: createMaubotApi({
      baseUrl: config.maubotApiUrl,
      timeoutMs: config.apiTimeoutMs,
      ...(options.fetchImplementation !== undefined ? { fetchImplementation: options.fetchImplementation } : {}),
    }),
    configPath: config.configPath,
    ...(options.generatePassword ? { generatePassword: options.generatePassword } : {}),
  })
  const dispatcher = createDispatcher({
    reconciler,
    actions,
    relations: runtime.relations,
    identity: runtime.identity,
  })

  return {
    handle: (event) => Effect.runPromise(dispatcher.dispatch(event).pipe(Effect.provide(loggerLayer))),
    status: () => reconciler.status(),
  }
}
