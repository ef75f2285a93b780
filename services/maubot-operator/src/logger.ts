import { Effect, Layer } from 'effect'
import pino, { type Logger, multistream } from 'pino'
import { pinoLoki } from 'pino-loki'

export interface LokiSettings {
  readonly host: string
  readonly basicAuth?: { username: string; password: string }
}

export interface LoggerSettings {
  readonly level: string
  readonly service: string
  readonly namespace: string
  readonly loki?: LokiSettings
}

/** Reads the operator's logging environment; Loki forwarding is opt-in. */
export const resolveLoggerSettings = (env: NodeJS.ProcessEnv = process.env): LoggerSettings => {
  const lokiEndpoint = env.MAUBOT_OPERATOR_LOKI_ENDPOINT
  const basicAuth = parseLokiBasicAuth(env.MAUBOT_OPERATOR_LOKI_BASIC_AUTH)
  return {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : 'info'),
    service: env.MAUBOT_OPERATOR_SERVICE_NAME ?? 'maubot-operator',
    namespace: env.JUJU_MODEL_NAME ?? 'default',
    ...(lokiEndpoint && !isTruthy(env.MAUBOT_OPERATOR_LOKI_DISABLED)
      ? { loki: { host: lokiEndpoint, ...(basicAuth ? { basicAuth } : {}) } }
      : {}),
  }
}

const settings = resolveLoggerSettings()
const { level, service, namespace } = settings

const destinations: { stream: NodeJS.WritableStream }[] = [{ stream: process.stdout }]

if (settings.loki) {
  try {
    destinations.push({
      stream: pinoLoki({
        host: settings.loki.host,
        batching: true,
        interval: 5,
        timeout: 5000,
        replaceTimestamp: true,
        labels: { service, namespace },
        basicAuth: settings.loki.basicAuth,
      }),
    })
  } catch (error) {
    console.warn('failed to initialise pino-loki transport', error)
  }
}

export const logger = pino(
  {
    level,
    base: {
      service,
      namespace,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['password', 'token', 'sharedSecret', 'databaseUrl', '*.password', '*.token', '*.sharedSecret'],
      censor: '[redacted]',
    },
  },
  multistream(destinations),
)

export type LogFields = Record<string, unknown>

export interface AppLoggerService {
  readonly debug: (message: string, fields?: LogFields) => Effect.Effect<void>
  readonly info: (message: string, fields?: LogFields) => Effect.Effect<void>
  readonly warn: (message: string, fields?: LogFields) => Effect.Effect<void>
  readonly error: (message: string, fields?: LogFields) => Effect.Effect<void>
}

export class AppLogger extends Effect.Tag('@maubot-operator/AppLogger')<AppLogger, AppLoggerService>() {}

export const makeAppLogger = (base: Logger = logger): AppLoggerService => ({
  debug: (message, fields) => Effect.sync(() => base.debug(fields ?? {}, message)),
  info: (message, fields) => Effect.sync(() => base.info(fields ?? {}, message)),
  warn: (message, fields) => Effect.sync(() => base.warn(fields ?? {}, message)),
  error: (message, fields) => Effect.sync(() => base.error(fields ?? {}, message)),
})

export const AppLoggerLayer = Layer.sync(AppLogger, () => makeAppLogger(logger))

function isTruthy(value?: string) {
  if (!value) {
    return false
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase())
}

function parseLokiBasicAuth(value?: string) {
  if (!value) {
    return undefined
  }
  const direct = parseUserPass(value)
  if (direct) {
    return direct
  }
  try {
    const decoded = Buffer.from(value, 'base64').toString('utf8')
    return parseUserPass(decoded)
  } catch {
    return undefined
  }
}

function parseUserPass(value: string) {
  const [username, ...rest] = value.split(':')
  if (!username || rest.length === 0) {
    return undefined
  }
  const password = rest.join(':')
  if (!password) {
    return undefined
  }
  return { username, password }
}
