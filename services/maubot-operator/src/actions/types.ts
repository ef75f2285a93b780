export interface FetchInit {
  method?: string
  headers?: Record<string, string>
  body?: string
  signal?: AbortSignal
}

export interface FetchResponse {
  ok: boolean
  status: number
  text(): Promise<string>
}

export type FetchLike = (input: string, init?: FetchInit) => Promise<FetchResponse>

export type ApiFailureReason = 'no-fetch' | 'network-error' | 'http-error' | 'invalid-response'

export interface ApiFailure {
  ok: false
  reason: ApiFailureReason
  status?: number
  detail?: string
}

export type LoginResult = { ok: true; token: string } | ApiFailure

export interface RegisteredAccount {
  userId: string
  accessToken: string
  deviceId: string
}

export type RegisterAccountResult = { ok: true; account: RegisteredAccount } | ApiFailure

export type ActionAuthReason = 'workload-not-ready' | 'unknown-admin' | ApiFailureReason

export type ActionCallReason =
  | 'invalid-params'
  | 'reserved-name'
  | 'workload-not-ready'
  | 'already-exists'
  | 'apply-failed'
  | 'config-unreadable'
  | 'federation-required'
  | ApiFailureReason

export interface ActionAuthError {
  readonly type: 'auth-error'
  readonly reason: ActionAuthReason
  readonly detail: string
}

export interface ActionCallError {
  readonly type: 'call-error'
  readonly reason: ActionCallReason
  readonly detail: string
}

export type ActionError = ActionAuthError | ActionCallError

export type ActionResult<T> = { ok: true; output: T } | { ok: false; error: ActionError }

export interface CreateAdminOutput {
  name: string
  password: string
}

export interface RegisterAccountOutput {
  userId: string
  password: string
  accessToken: string
  deviceId: string
}

export type ActionName = 'create-admin' | 'register-client-account'

export type ActionParams = Readonly<Record<string, unknown>>
