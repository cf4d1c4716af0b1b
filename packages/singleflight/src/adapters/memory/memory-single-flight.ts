import type {
  FlightOptions,
  FlightResult,
  InFlightKey,
  Singleflight,
} from "../../ports/single-flight"

interface InFlight<T> {
  promise: Promise<T>
  followerCount: number
}

export class MemorySingleflight<T = unknown> implements Singleflight<T> {
  private readonly flights = new Map<InFlightKey, InFlight<T>>()

  async run(
    key: InFlightKey,
    fn: () => Promise<T>,
    options: FlightOptions = {},
  ): Promise<FlightResult<T>> {
    options.signal?.throwIfAborted()

    const existing = this.flights.get(key)

    if (existing) {
      existing.followerCount++
      const value = await waitFor(existing.promise, options.signal)

      return { value, isLeader: false, sharedWith: existing.followerCount, source: "inflight" }
    }

    const flight = this.start(key, fn)
    const value = await waitFor(flight.promise, options.signal)

    return { value, isLeader: true, sharedWith: flight.followerCount, source: "leader" }
  }

  tryRun(
    key: InFlightKey,
    fn: () => Promise<T>,
    options?: FlightOptions,
  ): Promise<FlightResult<T>> | undefined {
    if (this.flights.has(key)) return undefined

    return this.run(key, fn, options)
  }

  forget(key: InFlightKey): void {
    this.flights.delete(key)
  }

  forgetAll(): void {
    this.flights.clear()
  }

  has(key: InFlightKey): boolean {
    return this.flights.has(key)
  }

  get size(): number {
    return this.flights.size
  }

  // The flight settles on its own; no caller owns it.
  private start(key: InFlightKey, fn: () => Promise<T>): InFlight<T> {
    const flight: InFlight<T> = {
      promise: Promise.resolve()
        .then(fn)
        .finally(() => {
          if (this.flights.get(key) === flight) this.flights.delete(key)
        }),
      followerCount: 0,
    }

    this.flights.set(key, flight)

    return flight
  }
}

function waitFor<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason)

    signal.addEventListener("abort", onAbort, { once: true })

    void promise
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort))
  })
}
