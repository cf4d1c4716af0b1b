import { FakeClock } from "@loungekit/clock"
import type { Logger } from "@loungekit/logger"
import type { Mock as MockFn } from "vitest"
import { mock } from "vitest-mock-extended"
import { DecodeError, TransportError } from "../../../model/client.errors"
import type { Mock } from "../../../tests/mock"
import { DEFAULT_BASE_URL, FetchTransport, type FetchTransportOptions } from "../fetch-transport"

describe("FetchTransport", () => {
  let fetchMock: MockFn<typeof fetch>
  let logger: Mock<Logger>

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>()
    vi.stubGlobal("fetch", fetchMock)
    logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  async function openTransport(opts: Partial<FetchTransportOptions> = {}): Promise<FetchTransport> {
    const transport = new FetchTransport({ timeoutMs: 1000, ...opts }, { logger, clock: new FakeClock(0) })
    await transport.open()
    return transport
  }

  function respond(body: string, status = 200): void {
    fetchMock.mockImplementation(async () => new Response(body, { status }))
  }

  // Settles only when the request signal aborts.
  function hang(): void {
    fetchMock.mockImplementation((_input, init) => {
      const signal = init?.signal

      return new Promise<Response>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(signal.reason))
      })
    })
  }

  describe("requests", () => {
    it("builds the url from base, path and params", async () => {
      respond("{}")
      const transport = await openTransport({ baseUrl: "https://lounge.test/api" })

      await transport.request({
        method: "GET",
        path: "player",
        params: { name: "Foo Bar", season: 12, includeDeleted: false },
      })

      const [input] = fetchMock.mock.calls[0] ?? []
      expect(String(input)).toBe("https://lounge.test/api/player?name=Foo+Bar&season=12&includeDeleted=false")
    })

    it("uses the public endpoint by default", async () => {
      respond("{}")
      const transport = await openTransport()

      await transport.request({ method: "GET", path: "table/list" })

      const [input] = fetchMock.mock.calls[0] ?? []
      expect(String(input)).toBe(`${DEFAULT_BASE_URL}table/list`)
    })

    it("sends accept, user-agent and bearer token headers", async () => {
      respond("{}")
      const transport = await openTransport({ token: "test-secret", userAgent: "loungekit-test" })

      await transport.request({ method: "GET", path: "player" })

      const [, init] = fetchMock.mock.calls[0] ?? []
      expect(init).toEqual({
        method: "GET",
        headers: {
          accept: "application/json",
          "user-agent": "loungekit-test",
          authorization: "Bearer test-secret",
        },
        signal: expect.any(AbortSignal),
      })
    })

    it("omits the authorization header without a token", async () => {
      respond("{}")
      const transport = await openTransport()

      await transport.request({ method: "GET", path: "player" })

      const [, init] = fetchMock.mock.calls[0] ?? []
      expect(init?.headers).toEqual({ accept: "application/json" })
    })
  })

  describe("responses", () => {
    it("decodes a JSON body", async () => {
      respond('{"id":1,"name":"Foo"}')
      const transport = await openTransport()

      expect(await transport.request({ method: "GET", path: "player" })).toEqual({
        status: 200,
        data: { id: 1, name: "Foo" },
      })
    })

    it("reads an empty body as undefined", async () => {
      respond("")
      const transport = await openTransport()

      expect(await transport.request({ method: "GET", path: "player" })).toEqual({ status: 200, data: undefined })
    })

    it("fails with DecodeError for invalid JSON on success", async () => {
      respond("<html>")
      const transport = await openTransport()

      const err = await transport.request({ method: "GET", path: "player" }).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(DecodeError)
      expect(err).toMatchObject({ context: { path: "player" } })
    })

    it("returns error statuses with their raw body", async () => {
      respond("<html>not found</html>", 404)
      const transport = await openTransport()

      expect(await transport.request({ method: "GET", path: "player" })).toEqual({
        status: 404,
        data: "<html>not found</html>",
      })
    })

    it("logs completed requests", async () => {
      respond("{}")
      const transport = await openTransport()

      await transport.request({ method: "GET", path: "player" })

      expect(logger.child).toHaveBeenCalledWith({ module: "transport" })
      expect(logger.debug).toHaveBeenCalledWith("request completed", {
        method: "GET",
        path: "player",
        status: 200,
        durationMs: 0,
      })
    })
  })

  describe("failures", () => {
    it("wraps network errors", async () => {
      const cause = new TypeError("fetch failed")
      fetchMock.mockRejectedValue(cause)
      const transport = await openTransport()

      const err = await transport.request({ method: "GET", path: "player" }).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(TransportError)
      expect(err).toMatchObject({ isRetryable: true, cause, context: { reason: "network", path: "player" } })
      expect(logger.warn).toHaveBeenCalledWith("request failed", { method: "GET", path: "player", err })
    })

    it("times out slow requests", async () => {
      hang()
      const transport = await openTransport({ timeoutMs: 5 })

      await expect(transport.request({ method: "GET", path: "player" })).rejects.toMatchObject({
        code: "transport_error",
        isRetryable: true,
        context: { reason: "timeout", timeoutMs: 5 },
      })
    })

    it("rejects with the caller's abort reason", async () => {
      hang()
      const transport = await openTransport()
      const controller = new AbortController()
      const reason = new Error("caller gave up")

      const pending = transport.request({ method: "GET", path: "player", signal: controller.signal })
      controller.abort(reason)

      await expect(pending).rejects.toBe(reason)
    })

    it("rejects invalid timeouts", () => {
      expect(() => new FetchTransport({ timeoutMs: 0 })).toThrow(RangeError)
    })
  })

  describe("lifecycle", () => {
    it("refuses requests before open", async () => {
      const transport = new FetchTransport({ timeoutMs: 1000 })

      await expect(transport.request({ method: "GET", path: "player" })).rejects.toMatchObject({
        context: { reason: "closed", path: "player" },
      })
      expect(fetchMock).not.toHaveBeenCalled()
    })

    it("aborts in-flight requests on close", async () => {
      hang()
      const transport = await openTransport()

      const pending = transport.request({ method: "GET", path: "player" })
      await transport.close()

      await expect(pending).rejects.toMatchObject({ context: { reason: "closed", path: "player" } })
    })

    it("closes once and stays closed", async () => {
      const transport = await openTransport()

      const first = transport.close()

      expect(transport.close()).toBe(first)
      await first
      await expect(transport.open()).rejects.toBeInstanceOf(TransportError)
      await expect(transport.request({ method: "GET", path: "player" })).rejects.toBeInstanceOf(TransportError)
    })
  })
})
