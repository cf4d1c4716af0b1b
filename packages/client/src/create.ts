import type { CreateReadThroughCacheOptions } from "@loungekit/cache"
import { SystemClock } from "@loungekit/clock"
import { createPinoLogger } from "@loungekit/logger"
import { FetchTransport } from "./adapters/fetch/fetch-transport"
import type { ClientConfig } from "./config/schema"
import { LoungeClient, type LoungeClientDeps, type LoungeClientOptions } from "./core/lounge-client"
import { TransportError } from "./model/client.errors"

export type CreateLoungeClientOverrides = Partial<LoungeClientDeps> & Pick<LoungeClientOptions, "sessionId">

/**
 * Wires a client from config: fetch transport, pino logger, system clock.
 * Any of them can be swapped through `overrides`.
 */
export function createLoungeClient(config: ClientConfig, overrides: CreateLoungeClientOverrides = {}): LoungeClient {
  const clock = overrides.clock ?? new SystemClock()
  const logger =
    overrides.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName },
    )
  const transport =
    overrides.transport ??
    new FetchTransport(
      {
        baseUrl: config.transport.baseUrl,
        timeoutMs: config.transport.timeoutMs,
        userAgent: config.transport.userAgent,
        ...(config.transport.token !== undefined && { token: config.transport.token }),
      },
      { logger, clock },
    )

  return new LoungeClient(
    { transport, logger, clock },
    {
      cache: cacheOptions(config.cache),
      ...(overrides.sessionId !== undefined && { sessionId: overrides.sessionId }),
    },
  )
}

export function isRetryableTransportError(err: unknown): boolean {
  return err instanceof TransportError && err.isRetryable
}

function cacheOptions(cache: ClientConfig["cache"]): CreateReadThroughCacheOptions {
  return {
    eviction: cache.eviction,
    ...(cache.ttlMs !== undefined && { ttl: { kind: "milliseconds" as const, milliseconds: cache.ttlMs } }),
    ...(cache.maxEntries !== undefined && { maxEntries: cache.maxEntries }),
    ...(cache.serveStaleOnError && { serveStaleOnError: isRetryableTransportError }),
  }
}
