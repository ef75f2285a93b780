import { Effect, Either, Schema } from 'effect'

import { DEFAULT_API_TIMEOUT_MS, DEFAULT_MAUBOT_API_URL } from '@/config'
import { toError } from '@/utils/errors'
import { trimTrailingSlash } from '@/utils/records'

import type { ApiFailure, FetchLike, FetchResponse, LoginResult, RegisterAccountResult } from './types'

const globalFetch = typeof globalThis.fetch === 'function' ? (globalThis.fetch.bind(globalThis) as FetchLike) : null

const LoginResponse = Schema.parseJson(Schema.Struct({ token: Schema.NonEmptyString }))
const RegisterResponse = Schema.parseJson(
  Schema.Struct({
    user_id: Schema.String,
    access_token: Schema.String,
    device_id: Schema.String,
  }),
)

const decodeLoginResponse = Schema.decodeUnknownEither(LoginResponse)
const decodeRegisterResponse = Schema.decodeUnknownEither(RegisterResponse)

export interface MaubotApiOptions {
  baseUrl?: string
  timeoutMs?: number
  fetchImplementation?: FetchLike | null
}

export interface MaubotApi {
  login(username: string, password: string): Effect.Effect<LoginResult>
  registerAccount(token: string, server: string, username: string, password: string): Effect.Effect<RegisterAccountResult>
}

type TextResult = { ok: true; text: string } | ApiFailure

const readResponseText = (response: FetchResponse) =>
  Effect.tryPromise({
    try: () => response.text(),
    catch: toError,
  })

const summarize = (value: string, maxLength = 200) => {
  const normalized = value.replace(/\s+/g, ' ').trim()
  return normalized.length > maxLength ? `${normalized.slice(0, maxLength - 1)}…` : normalized
}

export const createMaubotApi = (options: MaubotApiOptions = {}): MaubotApi => {
  const {
    baseUrl = DEFAULT_MAUBOT_API_URL,
    timeoutMs = DEFAULT_API_TIMEOUT_MS,
    fetchImplementation = globalFetch,
  } = options
  const root = trimTrailingSlash(baseUrl)

  const post = (path: string, payload: unknown, headers: Record<string, string> = {}): Effect.Effect<TextResult> => {
    const fetchFn = fetchImplementation
    if (!fetchFn) {
      return Effect.succeed({ ok: false, reason: 'no-fetch' } as const)
    }

    return Effect.tryPromise({
      try: () =>
        fetchFn(`${root}${path}`, {
          method: 'POST',
          headers: {
            Accept: 'application/json',
            'Content-Type': 'application/json',
            ...headers,
          },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(timeoutMs),
        }),
      catch: toError,
    }).pipe(
      Effect.flatMap((response) =>
        readResponseText(response).pipe(
          Effect.map((text): TextResult => {
            if (response.ok) {
              return { ok: true, text }
            }
            return { ok: false, reason: 'http-error', status: response.status, detail: summarize(text) }
          }),
        ),
      ),
      Effect.catchAll((error) =>
        Effect.succeed<TextResult>({
          ok: false,
          reason: 'network-error',
          detail: error.message,
        }),
      ),
    )
  }

  return {
    login: (username, password) =>
      post('/v1/auth/login', { username, password }).pipe(
        Effect.map((result): LoginResult => {
          if (!result.ok) return result
          return Either.match(decodeLoginResponse(result.text), {
            onLeft: (): LoginResult => ({ ok: false, reason: 'invalid-response', detail: 'login response has no token' }),
            onRight: ({ token }): LoginResult => ({ ok: true, token }),
          })
        }),
      ),
    registerAccount: (token, server, username, password) =>
      post(
        `/v1/client/auth/${encodeURIComponent(server)}/register`,
        { username, password },
        { Authorization: `Bearer ${token}` },
      ).pipe(
        Effect.map((result): RegisterAccountResult => {
          if (!result.ok) return result
          return Either.match(decodeRegisterResponse(result.text), {
            onLeft: (): RegisterAccountResult => ({
              ok: false,
              reason: 'invalid-response',
              detail: 'registration response is missing user_id, access_token or device_id',
            }),
            onRight: (body): RegisterAccountResult => ({
              ok: true,
              account: { userId: body.user_id, accessToken: body.access_token, deviceId: body.device_id },
            }),
          })
        }),
      ),
  }
}
