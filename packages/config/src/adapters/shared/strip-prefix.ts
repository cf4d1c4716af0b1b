/**
 * Keep only keys starting with `prefix`, with the prefix removed.
 * Without a prefix the record is copied as is.
 */
export function stripPrefix<V>(values: Readonly<Record<string, V>>, prefix?: string): Record<string, V> {
  if (prefix === undefined || prefix === "") return { ...values }

  const out: Record<string, V> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      out[key.slice(prefix.length)] = value
    }
  }

  return out
}
