import { describe, expect, it } from 'vitest'

import { resolveLoggerSettings } from '@/logger'

describe('resolveLoggerSettings', () => {
  it('logs to stdout only by default', () => {
    expect(resolveLoggerSettings({})).toEqual({ level: 'info', service: 'maubot-operator', namespace: 'default' })
  })

  it('reads the operator loki settings and the model name', () => {
    const settings = resolveLoggerSettings({
      LOG_LEVEL: 'debug',
      JUJU_MODEL_NAME: 'chat',
      MAUBOT_OPERATOR_SERVICE_NAME: 'maubot-operator-0',
      MAUBOT_OPERATOR_LOKI_ENDPOINT: 'http://loki:3100',
      MAUBOT_OPERATOR_LOKI_BASIC_AUTH: 'operator:test-secret',
    })

    expect(settings).toEqual({
      level: 'debug',
      service: 'maubot-operator-0',
      namespace: 'chat',
      loki: { host: 'http://loki:3100', basicAuth: { username: 'operator', password: 'test-secret' } },
    })
  })

  it('accepts base64 credentials and honours the disable switch', () => {
    const encoded = Buffer.from('operator:test-secret').toString('base64')

    expect(
      resolveLoggerSettings({ MAUBOT_OPERATOR_LOKI_ENDPOINT: 'http://loki:3100', MAUBOT_OPERATOR_LOKI_BASIC_AUTH: encoded })
        .loki,
    ).toEqual({ host: 'http://loki:3100', basicAuth: { username: 'operator', password: 'test-secret' } })
    expect(
      resolveLoggerSettings({ MAUBOT_OPERATOR_LOKI_ENDPOINT: 'http://loki:3100', MAUBOT_OPERATOR_LOKI_DISABLED: 'true' })
        .loki,
    ).toBeUndefined()
  })

  it('ignores the shared infrastructure variables', () => {
    expect(
      resolveLoggerSettings({ LGTM_LOKI_ENDPOINT: 'http://loki:3100', OTEL_SERVICE_NAME: 'other', POD_NAMESPACE: 'ns' }),
    ).toEqual({ level: 'info', service: 'maubot-operator', namespace: 'default' })
  })
})
