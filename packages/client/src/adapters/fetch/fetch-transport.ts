import { type Clock, type Milliseconds, SystemClock } from "@loungekit/clock"
import { createNullLogger, type Logger } from "@loungekit/logger"
import { DecodeError, TransportError } from "../../model/client.errors"
import type { Transport, TransportRequest, TransportResponse } from "../../ports/transport"
import { linkSignals } from "./link-signals"

export const DEFAULT_BASE_URL = "https://www.mk8dx-lounge.com/api/"

export type FetchTransportOptions = {
  /** @default DEFAULT_BASE_URL */
  baseUrl?: string
  /** Per request, body included. */
  timeoutMs: Milliseconds
  /** Sent as `Authorization: Bearer <token>`. */
  token?: string
  userAgent?: string
}

export type FetchTransportDeps = {
  logger?: Logger
  clock?: Clock
}

type State = { kind: "idle" } | { kind: "open"; session: AbortController } | { kind: "closed" }

/**
 * {@link Transport} over the platform `fetch`.
 */
export class FetchTransport implements Transport {
  private state: State = { kind: "idle" }
  private closing?: Promise<void>

  private readonly baseUrl: URL
  private readonly logger: Logger
  private readonly clock: Clock

  constructor(
    private readonly opts: FetchTransportOptions,
    deps: FetchTransportDeps = {},
  ) {
    if (!Number.isFinite(opts.timeoutMs) || opts.timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive number (got ${opts.timeoutMs})`)
    }

    const base = opts.baseUrl ?? DEFAULT_BASE_URL
    this.baseUrl = new URL(base.endsWith("/") ? base : `${base}/`)
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "transport" })
    this.clock = deps.clock ?? new SystemClock()
  }

  async open(): Promise<void> {
    if (this.state.kind === "closed") throw TransportError.closed()
    if (this.state.kind === "open") return

    this.state = { kind: "open", session: new AbortController() }
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    if (this.state.kind !== "open") throw TransportError.closed(req.path)

    const session = this.state.session.signal
    const timeout = new AbortController()
    const timer = setTimeout(() => timeout.abort(), this.opts.timeoutMs)
    const linked = linkSignals([session, timeout.signal, req.signal])
    const startedAt = this.clock.nowMs()

    try {
      const response = await fetch(this.url(req), {
        method: req.method,
        headers: this.headers(),
        signal: linked.signal,
      })
      const text = await response.text()
      const durationMs = this.clock.nowMs() - startedAt

      this.logger.debug("request completed", {
        method: req.method,
        path: req.path,
        status: response.status,
        durationMs,
      })

      return { status: response.status, data: this.body(req.path, response, text) }
    } catch (err) {
      if (err instanceof DecodeError) throw err

      if (req.signal?.aborted === true) throw req.signal.reason

      const failure = session.aborted
        ? TransportError.closed(req.path)
        : timeout.signal.aborted
          ? TransportError.timeout(req.path, this.opts.timeoutMs)
          : TransportError.network(req.path, err)

      this.logger.warn("request failed", { method: req.method, path: req.path, err: failure })

      throw failure
    } finally {
      clearTimeout(timer)
      linked.dispose()
    }
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown()

    return this.closing
  }

  private async shutdown(): Promise<void> {
    const previous = this.state
    this.state = { kind: "closed" }

    if (previous.kind === "open") previous.session.abort(TransportError.closed())
  }

  private url(req: TransportRequest): URL {
    const url = new URL(req.path.replace(/^\/+/, ""), this.baseUrl)

    for (const [key, value] of Object.entries(req.params ?? {})) {
      url.searchParams.set(key, String(value))
    }

    return url
  }

  private headers(): Record<string, string> {
    return {
      accept: "application/json",
      ...(this.opts.userAgent !== undefined && { "user-agent": this.opts.userAgent }),
      ...(this.opts.token !== undefined && { authorization: `Bearer ${this.opts.token}` }),
    }
  }

  private body(path: string, response: Response, text: string): unknown {
    if (text.trim() === "") return undefined

    try {
      return JSON.parse(text)
    } catch (err) {
      if (response.ok) throw DecodeError.invalidJson(path, err)

      // non-2xx bodies may be HTML error pages
      return text
    }
  }
}
