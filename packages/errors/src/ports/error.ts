export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (identifiers, inputs, statuses).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, machine-readable code. Branch on this, never on the message. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same call may succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, missing entity, network
   * trouble); `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
