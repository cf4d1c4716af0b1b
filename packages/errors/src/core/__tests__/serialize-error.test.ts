import { BaseError } from "../base-error"
import { serializeError } from "../serialize-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2026-01-02T00:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("omits the stack unless asked", () => {
    const err = new BaseError("x", { code: "x" })

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
  })

  it("reports string throws as the message", () => {
    expect(serializeError("bad")).toEqual({
      name: "NonErrorThrown",
      code: "unknown",
      message: "bad",
      context: {},
      timestamp: "2026-01-02T00:00:00.000Z",
      isRetryable: false,
      isOperational: false,
    })
  })

  it("keeps other thrown values in context", () => {
    const result = serializeError({ status: 500 })

    expect(result.message).toBe("Unknown error")
    expect(result.context).toEqual({ value: { status: 500 } })
  })

  it("marks plain errors as non-operational", () => {
    const result = serializeError(new TypeError("nope"))

    expect(result.name).toBe("TypeError")
    expect(result.code).toBe("unknown")
    expect(result.isOperational).toBe(false)
  })
})
