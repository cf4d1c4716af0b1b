export type LinkedSignal = {
  signal: AbortSignal
  dispose(): void
}

/**
 * An AbortSignal that aborts with the reason of whichever input aborts first.
 * Call `dispose()` once the guarded work is done to detach the listeners.
 */
export function linkSignals(signals: readonly (AbortSignal | undefined)[]): LinkedSignal {
  const controller = new AbortController()
  const cleanups: (() => void)[] = []

  for (const signal of signals) {
    if (signal === undefined) continue

    if (signal.aborted) {
      controller.abort(signal.reason)
      break
    }

    const onAbort = () => controller.abort(signal.reason)
    signal.addEventListener("abort", onAbort, { once: true })
    cleanups.push(() => signal.removeEventListener("abort", onAbort))
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const cleanup of cleanups) cleanup()
      cleanups.length = 0
    },
  }
}
