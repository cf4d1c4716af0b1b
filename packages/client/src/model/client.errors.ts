import { BaseError } from "@loungekit/errors"
import type { z } from "zod"

export type InvalidArgumentErrorCode = "invalid_argument"

export class InvalidArgumentError extends BaseError<InvalidArgumentErrorCode> {
  static because(argument: string, reason: string, value?: unknown): InvalidArgumentError {
    return new InvalidArgumentError(`Invalid ${argument}: ${reason}`, {
      code: "invalid_argument",
      context: { argument, ...(value !== undefined && { value }) },
    })
  }
}

export type NotFoundErrorCode = "not_found"

export class NotFoundError extends BaseError<NotFoundErrorCode> {
  static forRequest(entity: string, path: string, params: Readonly<Record<string, unknown>>): NotFoundError {
    return new NotFoundError(`No ${entity} found for ${path}`, {
      code: "not_found",
      context: { entity, path, params: { ...params } },
    })
  }
}

export type TransportErrorCode = "transport_error"

export class TransportError extends BaseError<TransportErrorCode> {
  static network(path: string, cause: unknown): TransportError {
    return new TransportError(`Request to ${path} failed`, {
      code: "transport_error",
      context: { path, reason: "network" },
      cause,
      isRetryable: true,
    })
  }

  static timeout(path: string, timeoutMs: number): TransportError {
    return new TransportError(`Request to ${path} timed out after ${timeoutMs}ms`, {
      code: "transport_error",
      context: { path, reason: "timeout", timeoutMs },
      isRetryable: true,
    })
  }

  static status(path: string, status: number, body?: unknown): TransportError {
    return new TransportError(`Request to ${path} failed with status ${status}`, {
      code: "transport_error",
      context: { path, reason: "status", status, ...(body !== undefined && { body }) },
      isRetryable: status >= 500 || status === 429,
    })
  }

  static closed(path?: string): TransportError {
    return new TransportError("Client session is not open", {
      code: "transport_error",
      context: { reason: "closed", ...(path !== undefined && { path }) },
    })
  }
}

export type DecodeErrorCode = "decode_error"

export class DecodeError extends BaseError<DecodeErrorCode> {
  static invalidJson(path: string, cause: unknown): DecodeError {
    return new DecodeError(`Response from ${path} is not valid JSON`, {
      code: "decode_error",
      context: { path },
      cause,
    })
  }

  static schemaMismatch(entity: string, error: z.ZodError): DecodeError {
    return new DecodeError(`Response does not match the ${entity} shape`, {
      code: "decode_error",
      context: {
        entity,
        issues: error.issues.map((issue) => ({ path: issue.path.map(String), message: issue.message })),
      },
      cause: error,
    })
  }
}

export type LoungeClientError = InvalidArgumentError | NotFoundError | TransportError | DecodeError
