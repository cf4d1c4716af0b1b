export type QueryValue = string | number | boolean

export type TransportRequest = Readonly<{
  method: "GET"
  /** Relative to the base URL, e.g. `"player/details"`. */
  path: string
  params?: Readonly<Record<string, QueryValue>>
  signal?: AbortSignal
}>

export type TransportResponse = Readonly<{
  status: number
  /** Decoded JSON body; `undefined` when the body was empty. */
  data: unknown
}>

/**
 * Issues requests against the statistics service.
 *
 * @remarks
 * Implementations resolve with any HTTP response they received and leave
 * status interpretation to the caller. They reject with `TransportError` when
 * no response arrived (network failure, timeout, closed session) and with
 * `DecodeError` when a successful body is not JSON.
 */
export interface Transport {
  open(): Promise<void>

  request(req: TransportRequest): Promise<TransportResponse>

  /**
   * Aborts in-flight requests. Idempotent; later requests fail.
   */
  close(): Promise<void>
}
