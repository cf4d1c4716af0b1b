import type { Transport, TransportRequest, TransportResponse } from "../../ports/transport"

export type StubResponder = (req: TransportRequest) => TransportResponse | Promise<TransportResponse>

/**
 * In-process transport. Records every request and answers through `respond`.
 */
export class StubTransport implements Transport {
  readonly requests: TransportRequest[] = []
  opened = 0
  closed = 0

  constructor(private respond: StubResponder = () => ({ status: 404, data: undefined })) {}

  answer(respond: StubResponder): void {
    this.respond = respond
  }

  async open(): Promise<void> {
    this.opened++
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    this.requests.push(req)

    return this.respond(req)
  }

  async close(): Promise<void> {
    this.closed++
  }

  paths(): string[] {
    return this.requests.map((req) => req.path)
  }
}

export function ok(data: unknown): TransportResponse {
  return { status: 200, data }
}

export function status(code: number, data?: unknown): TransportResponse {
  return { status: code, data }
}

export type Deferred<T> = {
  promise: Promise<T>
  resolve(value: T): void
  reject(err: unknown): void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  let reject: (err: unknown) => void = () => {}

  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })

  return { promise, resolve, reject }
}
