import { randomBytes } from 'node:crypto'

import { Effect, Either } from 'effect'

import { DEFAULT_CONFIG_PATH } from '@/config'
import { AppLogger } from '@/logger'
import type { ActionReporter, WorkloadContainer } from '@/runtime/ports'
import { errorMessage } from '@/utils/errors'
import { asString } from '@/utils/records'
import {
  type ConfigDocument,
  parseConfigDocument,
  readAdmins,
  readHomeserverNames,
  serializeConfigDocument,
  withAdmin,
} from '@/workload/config-document'
import { MAUBOT_SERVICE, RESERVED_ADMIN_NAME } from '@/workload/constants'

import type { MaubotApi } from './maubot-api'
import type {
  ActionAuthReason,
  ActionCallReason,
  ActionError,
  ActionParams,
  ActionResult,
  ApiFailure,
  CreateAdminOutput,
  RegisterAccountOutput,
} from './types'

export interface AccountActionDependencies {
  container: WorkloadContainer
  api: MaubotApi
  configPath?: string
  generatePassword?: () => string
}

export interface AccountActions {
  createAdmin(params: ActionParams): Effect.Effect<ActionResult<CreateAdminOutput>, never, AppLogger>
  registerClientAccount(params: ActionParams): Effect.Effect<ActionResult<RegisterAccountOutput>, never, AppLogger>
}

export const generatePassword = () => randomBytes(10).toString('base64url')

const authError = (reason: ActionAuthReason, detail: string): ActionError => ({ type: 'auth-error', reason, detail })
const callError = (reason: ActionCallReason, detail: string): ActionError => ({ type: 'call-error', reason, detail })

const describeApiFailure = (failure: ApiFailure) => {
  switch (failure.reason) {
    case 'http-error':
      return `HTTP ${failure.status ?? 'error'}${failure.detail ? `: ${failure.detail}` : ''}`
    case 'no-fetch':
      return 'no fetch implementation available'
    default:
      return failure.detail ?? failure.reason
  }
}

const requireParam = (params: ActionParams, name: string): Either.Either<string, ActionError> => {
  const value = asString(params[name])
  return value === null ? Either.left(callError('invalid-params', `missing parameter: ${name}`)) : Either.right(value)
}

const settle = <T>(effect: Effect.Effect<T, ActionError, AppLogger>, action: string) =>
  effect.pipe(
    Effect.map((output): ActionResult<T> => ({ ok: true, output })),
    Effect.catchAll((error) =>
      Effect.gen(function* () {
        const log = yield* AppLogger
        yield* log.warn('action failed', { action, type: error.type, reason: error.reason, detail: error.detail })
        const result: ActionResult<T> = { ok: false, error }
        return result
      }),
    ),
  )

export const createAccountActions = (dependencies: AccountActionDependencies): AccountActions => {
  const { container, api, configPath = DEFAULT_CONFIG_PATH } = dependencies
  const nextPassword = dependencies.generatePassword ?? generatePassword

  // Reachable, planned and running; any error reaching the container counts as not ready.
  const workloadReady = Effect.tryPromise(async () => {
    if (!(await container.canConnect())) return false
    const plan = await container.getPlan()
    if (!plan.services[MAUBOT_SERVICE]) return false
    const service = await container.getService(MAUBOT_SERVICE)
    return service?.running ?? false
  }).pipe(
    Effect.catchAll((error) =>
      Effect.gen(function* () {
        const log = yield* AppLogger
        yield* log.debug('workload readiness check failed', { detail: errorMessage(error.error) })
        return false
      }),
    ),
  )

  const readDocument = (reason: ActionCallReason) =>
    Effect.gen(function* () {
      const text = yield* Effect.tryPromise({
        try: () => container.pull(configPath),
        catch: (error) => callError(reason, errorMessage(error)),
      })
      if (text === null) {
        return yield* Effect.fail(callError(reason, `configuration file not found at ${configPath}`))
      }
      return yield* parseConfigDocument(text).pipe(Either.mapLeft((detail) => callError(reason, detail)))
    })

  const writeDocument = (document: ConfigDocument) =>
    Effect.tryPromise({
      try: async () => {
        await container.push(configPath, serializeConfigDocument(document))
        await container.restart(MAUBOT_SERVICE)
      },
      catch: (error) => callError('apply-failed', errorMessage(error)),
    })

  // An admin whose login could not be confirmed is removed again.
  const revertAdmin = (document: ConfigDocument, name: string) =>
    writeDocument(document).pipe(
      Effect.catchAll((error) =>
        Effect.flatMap(AppLogger, (log) =>
          log.error('failed to remove unconfirmed admin', { name, detail: error.detail }),
        ),
      ),
    )

  const createAdmin = (params: ActionParams) =>
    Effect.gen(function* () {
      const log = yield* AppLogger
      const name = yield* requireParam(params, 'name')
      if (name === RESERVED_ADMIN_NAME) {
        return yield* Effect.fail(
          callError('reserved-name', `${RESERVED_ADMIN_NAME} is reserved, please choose a different name`),
        )
      }
      if (!(yield* workloadReady)) {
        return yield* Effect.fail(callError('workload-not-ready', 'maubot is not ready'))
      }

      const document = yield* readDocument('apply-failed')
      if (Object.hasOwn(readAdmins(document), name)) {
        return yield* Effect.fail(callError('already-exists', `${name} already exists`))
      }

      const password = nextPassword()
      yield* writeDocument(withAdmin(document, name, password))

      const login = yield* api.login(name, password)
      if (!login.ok) {
        yield* revertAdmin(document, name)
        return yield* Effect.fail(callError(login.reason, describeApiFailure(login)))
      }

      yield* log.info('admin created', { name })
      const output: CreateAdminOutput = { name, password }
      return output
    })

  const registerClientAccount = (params: ActionParams) =>
    Effect.gen(function* () {
      const log = yield* AppLogger
      const adminName = yield* requireParam(params, 'admin-name')
      const adminPassword = yield* requireParam(params, 'admin-password')
      const accountName = yield* requireParam(params, 'account-name')
      const requestedServer = asString(params.homeserver)

      if (!(yield* workloadReady)) {
        return yield* Effect.fail(authError('workload-not-ready', 'maubot is not ready'))
      }

      const document = yield* readDocument('config-unreadable')
      const homeservers = readHomeserverNames(document)
      const server = requestedServer ?? homeservers[0]
      if (server === undefined || !homeservers.includes(server)) {
        return yield* Effect.fail(callError('federation-required', 'matrix-auth integration is required'))
      }
      if (!Object.hasOwn(readAdmins(document), adminName)) {
        return yield* Effect.fail(authError('unknown-admin', `${adminName} not found in admin users`))
      }

      const login = yield* api.login(adminName, adminPassword)
      if (!login.ok) {
        return yield* Effect.fail(authError(login.reason, describeApiFailure(login)))
      }

      const password = nextPassword()
      const registered = yield* api.registerAccount(login.token, server, accountName, password)
      if (!registered.ok) {
        return yield* Effect.fail(callError(registered.reason, describeApiFailure(registered)))
      }

      yield* log.info('client account registered', { server, userId: registered.account.userId })
      const output: RegisterAccountOutput = { ...registered.account, password }
      return output
    })

  return {
    createAdmin: (params) => settle(createAdmin(params), 'create-admin'),
    registerClientAccount: (params) => settle(registerClientAccount(params), 'register-client-account'),
  }
}

export const ACTION_ERROR_PREFIX = 'error while interacting with Maubot'

const failureMessage = (error: ActionError) => `${ACTION_ERROR_PREFIX}: ${error.detail}`

export const reportCreateAdmin = (reporter: ActionReporter, result: ActionResult<CreateAdminOutput>) => {
  if (result.ok) {
    reporter.setResults({ 'user-id': result.output.name, password: result.output.password, error: '' })
    return
  }
  const message = failureMessage(result.error)
  reporter.setResults({ 'user-id': '', password: '', error: message })
  reporter.fail(message)
}

export const reportRegisterClientAccount = (reporter: ActionReporter, result: ActionResult<RegisterAccountOutput>) => {
  if (result.ok) {
    reporter.setResults({
      'user-id': result.output.userId,
      password: result.output.password,
      'access-token': result.output.accessToken,
      'device-id': result.output.deviceId,
      error: '',
    })
    return
  }
  const message = failureMessage(result.error)
  reporter.setResults({ 'user-id': '', password: '', 'access-token': '', 'device-id': '', error: message })
  reporter.fail(message)
}
