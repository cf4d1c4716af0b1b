import type { CacheKey } from "../ports/cache-key"
import type { CacheNamespace, KeyPart } from "../ports/cache-namespace"

const SEPARATOR = ":"

// Parts may contain the separator (player names); escape it so keys stay unambiguous.
function encodePart(part: KeyPart): string {
  return String(part).replaceAll("%", "%25").replaceAll(SEPARATOR, "%3A")
}

export function createNamespace(name: string, version = 1): CacheNamespace {
  if (name.length === 0 || name.includes(SEPARATOR)) {
    throw new RangeError(`Invalid cache namespace name: "${name}"`)
  }

  if (!Number.isSafeInteger(version) || version < 1) {
    throw new RangeError(`Cache namespace version must be a positive integer (got ${version})`)
  }

  const prefix = `${name}${SEPARATOR}v${version}`

  return {
    prefix,
    key(...parts: readonly KeyPart[]): CacheKey {
      return [prefix, ...parts.map(encodePart)].join(SEPARATOR)
    },
  }
}
