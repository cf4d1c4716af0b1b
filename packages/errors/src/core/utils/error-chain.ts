function getCause(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain starting at `err` (inclusive).
 *
 * Stops at `maxDepth` entries or when a value repeats.
 *
 * @example
 * ```ts
 * const codes = errorChain(err).flatMap((e) => (hasCode(e) ? [e.code] : []))
 * ```
 */
export function errorChain(err: unknown, maxDepth = 20): unknown[] {
  const chain: unknown[] = []
  const seen = new Set<unknown>()

  let current = err

  while (current !== undefined && current !== null && chain.length < maxDepth) {
    if (seen.has(current)) break
    seen.add(current)

    chain.push(current)
    current = getCause(current)
  }

  return chain
}
