import { Either, Schema } from 'effect'

export const DEFAULT_PUBLIC_URL = 'https://maubot.local'

const OptionsSchema = Schema.Struct({
  'public-url': Schema.optionalWith(Schema.String, { default: () => DEFAULT_PUBLIC_URL }),
})

const decodeRawOptions = Schema.decodeUnknownEither(OptionsSchema)

export interface StaticOptions {
  readonly publicUrl: string
}

export interface InvalidOptionError {
  readonly type: 'invalid-config'
  readonly option: string
  readonly detail: string
}

const invalid = (option: string, detail: string): InvalidOptionError => ({ type: 'invalid-config', option, detail })

export const decodeOptions = (raw: Readonly<Record<string, unknown>>): Either.Either<StaticOptions, InvalidOptionError> =>
  decodeRawOptions(raw).pipe(
    Either.mapLeft(() => invalid('public-url', 'must be a string')),
    Either.flatMap((decoded): Either.Either<StaticOptions, InvalidOptionError> => {
      const value = decoded['public-url'].trim()
      let parsed: URL
      try {
        parsed = new URL(value)
      } catch {
        return Either.left(invalid('public-url', `not an absolute URL: ${value}`))
      }
      if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        return Either.left(invalid('public-url', `must use http or https: ${value}`))
      }
      return Either.right({ publicUrl: value })
    }),
  )
