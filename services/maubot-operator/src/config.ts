export const DEFAULT_MAUBOT_API_URL = 'http://localhost:29316/_matrix/maubot'
export const DEFAULT_API_TIMEOUT_MS = 5_000
export const DEFAULT_CONFIG_PATH = '/data/config.yaml'
export const DEFAULT_EXAMPLE_CONFIG_PATH = '/example-config.yaml'

export interface OperatorConfig {
  maubotApiUrl: string
  apiTimeoutMs: number
  configPath: string
  exampleConfigPath: string
}

const readOptional = (env: NodeJS.ProcessEnv, name: string): string | null => {
  const value = env[name]?.trim()
  return value && value.length > 0 ? value : null
}

const parseHttpUrl = (name: string, value: string): string => {
  let parsed: URL
  try {
    parsed = new URL(value)
  } catch {
    throw new Error(`${name} must be an absolute URL, got: ${value}`)
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`${name} must use http or https, got: ${parsed.protocol}`)
  }
  return value.endsWith('/') ? value.slice(0, -1) : value
}

const parsePositiveInt = (name: string, value: string): number => {
  const parsed = Number.parseInt(value, 10)
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== value) {
    throw new Error(`${name} must be a positive integer, got: ${value}`)
  }
  return parsed
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): OperatorConfig => {
  const apiUrl = readOptional(env, 'MAUBOT_API_URL')
  const timeout = readOptional(env, 'MAUBOT_API_TIMEOUT_MS')

  return {
    maubotApiUrl: apiUrl ? parseHttpUrl('MAUBOT_API_URL', apiUrl) : DEFAULT_MAUBOT_API_URL,
    apiTimeoutMs: timeout ? parsePositiveInt('MAUBOT_API_TIMEOUT_MS', timeout) : DEFAULT_API_TIMEOUT_MS,
    configPath: readOptional(env, 'MAUBOT_CONFIG_PATH') ?? DEFAULT_CONFIG_PATH,
    exampleConfigPath: readOptional(env, 'MAUBOT_EXAMPLE_CONFIG_PATH') ?? DEFAULT_EXAMPLE_CONFIG_PATH,
  }
}
