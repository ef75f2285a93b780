import { Either } from 'effect'
import { parse, stringify } from 'yaml'

import { asRecord } from '@/utils/records'

import type { WorkloadConfig } from './config-builder'

export type ConfigDocument = Record<string, unknown>

export const parseConfigDocument = (text: string): Either.Either<ConfigDocument, string> => {
  let parsed: unknown
  try {
    parsed = parse(text)
  } catch (error) {
    return Either.left(error instanceof Error ? error.message : String(error))
  }
  if (parsed === null || parsed === undefined) return Either.right({})
  const record = asRecord(parsed)
  return record ? Either.right(record) : Either.left('configuration file is not a mapping')
}

// Keys outside database, server.public_url, homeservers and loki belong to the
// workload (admins, plugin settings) and are carried over untouched.
export const applyWorkloadConfig = (base: ConfigDocument, config: WorkloadConfig): ConfigDocument => {
  const next: ConfigDocument = { ...base }
  next.database = config.databaseUrl
  next.server = { ...(asRecord(base.server) ?? {}), public_url: config.publicUrl }

  if (config.homeserver) {
    next.homeservers = {
      [config.homeserver.name]: { url: config.homeserver.url, secret: config.homeserver.secret },
    }
  } else {
    delete next.homeservers
  }

  if (config.logging) {
    next.loki = { push_url: config.logging.endpoint }
  } else {
    delete next.loki
  }

  return next
}

export const serializeConfigDocument = (document: ConfigDocument) => stringify(document)

export const renderConfigDocument = (base: ConfigDocument, config: WorkloadConfig) =>
  serializeConfigDocument(applyWorkloadConfig(base, config))

export const readAdmins = (document: ConfigDocument): Record<string, string> => {
  const admins = asRecord(document.admins) ?? {}
  return Object.fromEntries(
    Object.entries(admins).map(([name, password]) => [name, typeof password === 'string' ? password : '']),
  )
}

export const withAdmin = (document: ConfigDocument, name: string, password: string): ConfigDocument => ({
  ...document,
  admins: { ...(asRecord(document.admins) ?? {}), [name]: password },
})

export const readHomeserverNames = (document: ConfigDocument): string[] =>
  Object.keys(asRecord(document.homeservers) ?? {})
