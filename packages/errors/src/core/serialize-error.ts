import type { AppError, SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a consistent, JSON-safe shape.
 *
 * - AppErrors keep their code, context and flags
 * - Plain Errors get code `"unknown"` and are treated as non-operational
 * - Anything else is reported as `NonErrorThrown` with the value in context
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (isAppError(err)) {
    return {
      ...describe(err, includeStack),
      code: err.code,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      ...withCause(err, options),
    }
  }

  if (err instanceof Error) {
    return {
      ...describe(err, includeStack),
      code: "unknown",
      context: {},
      timestamp: new Date().toISOString(),
      isRetryable: false,
      isOperational: false,
      ...withCause(err, options),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    timestamp: new Date().toISOString(),
    isRetryable: false,
    isOperational: false,
  }
}

function describe(err: Error | AppError, includeStack: boolean) {
  return {
    name: err.name,
    message: err.message,
    ...(includeStack && err.stack !== undefined && { stack: err.stack }),
  }
}

function withCause(err: Error, options?: SerializeOptions): { cause?: SerializedError } {
  return err.cause === undefined ? {} : { cause: serializeError(err.cause, options) }
}
