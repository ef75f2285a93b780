export const asString = (value: unknown) => (typeof value === 'string' && value.trim().length > 0 ? value.trim() : null)

export const asRecord = (value: unknown) =>
  value && typeof value === 'object' && !Array.isArray(value) ? (value as Record<string, unknown>) : null

export const trimTrailingSlash = (value: string): string => (value.endsWith('/') ? value.slice(0, -1) : value)

const sortKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(sortKeys)
  const record = asRecord(value)
  if (!record) return value
  return Object.fromEntries(
    Object.keys(record)
      .sort()
      .filter((key) => record[key] !== undefined)
      .map((key) => [key, sortKeys(record[key])]),
  )
}

export const stableStringify = (value: unknown) => JSON.stringify(sortKeys(value))
