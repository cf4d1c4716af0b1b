export type InFlightKey = string

/**
 * - "leader": this caller started the work
 * - "inflight": this caller joined work another caller started
 */
export type FlightSource = "leader" | "inflight"

export interface FlightResult<T> {
  value: T

  isLeader: boolean

  /** Followers that joined the flight so far (leader excluded). */
  sharedWith: number

  source: FlightSource
}

export type FlightOptions = Readonly<{
  /**
   * Stops this caller from waiting. The flight keeps running for everyone else
   * and the caller's promise rejects with `signal.reason`.
   */
  signal?: AbortSignal
}>

/**
 * Deduplicates concurrent work per key.
 *
 * Calls to `run()` for a key while a flight is in progress join it and settle
 * with the same value or the same error instance. The next call after the
 * flight settles starts fresh.
 *
 * @example
 * ```ts
 * const group = new MemorySingleflight<Player>()
 *
 * // one request, three results
 * const [a, b, c] = await Promise.all([
 *   group.run("player:42", () => fetchPlayer(42)),
 *   group.run("player:42", () => fetchPlayer(42)),
 *   group.run("player:42", () => fetchPlayer(42)),
 * ])
 *
 * a.isLeader // true
 * b.value === a.value // true
 * ```
 */
export interface Singleflight<T = unknown> {
  run(key: InFlightKey, fn: () => Promise<T>, options?: FlightOptions): Promise<FlightResult<T>>

  /**
   * Like `run()`, but returns `undefined` when a flight for `key` is already
   * in progress.
   */
  tryRun(
    key: InFlightKey,
    fn: () => Promise<T>,
    options?: FlightOptions,
  ): Promise<FlightResult<T>> | undefined

  /**
   * Detach the current flight for `key`. Its waiters still get its outcome; the
   * next caller starts a new flight.
   */
  forget(key: InFlightKey): void

  forgetAll(): void

  has(key: InFlightKey): boolean

  readonly size: number
}
