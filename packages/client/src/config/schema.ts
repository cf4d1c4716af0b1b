import { type CacheEvictionPolicy, cacheEvictionPolicies } from "@loungekit/cache"
import type { Milliseconds } from "@loungekit/clock"
import { type LogLevelName, logLevelNames } from "@loungekit/logger"
import { z } from "zod/mini"
import { DEFAULT_BASE_URL } from "../adapters/fetch/fetch-transport"

const positiveInt = z.coerce.number().check(
  z.positive(),
  z.refine((n) => Number.isInteger(n), { error: "must be an integer" }),
)

/** Keys as read from the environment, `LOUNGE_` prefix stripped. */
export const envSchema = z.object({
  SERVICE_NAME: z._default(z.string(), "loungekit"),

  BASE_URL: z._default(z.url(), DEFAULT_BASE_URL),
  TIMEOUT_MS: z._default(positiveInt, 10_000),
  TOKEN: z.optional(z.string().check(z.minLength(1))),
  USER_AGENT: z._default(z.string(), "loungekit"),

  CACHE_TTL_MS: z.optional(positiveInt),
  CACHE_MAX_ENTRIES: z.optional(positiveInt),
  CACHE_EVICTION: z._default(z.enum(cacheEvictionPolicies), "lru"),
  SERVE_STALE_ON_ERROR: z._default(z.stringbool(), false),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type ClientConfig = {
  transport: {
    baseUrl: string
    timeoutMs: Milliseconds
    token?: string
    userAgent: string
  }
  cache: {
    /** Entries never expire without it. */
    ttlMs?: Milliseconds
    maxEntries?: number
    eviction: CacheEvictionPolicy
    /** Answer with an expired entry when its refresh fails with a retryable transport error. */
    serveStaleOnError: boolean
  }
  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}

export function mapEnvToConfig(env: EnvConfig): ClientConfig {
  return {
    transport: {
      baseUrl: env.BASE_URL,
      timeoutMs: env.TIMEOUT_MS,
      userAgent: env.USER_AGENT,
      ...(env.TOKEN !== undefined && { token: env.TOKEN }),
    },
    cache: {
      eviction: env.CACHE_EVICTION,
      serveStaleOnError: env.SERVE_STALE_ON_ERROR,
      ...(env.CACHE_TTL_MS !== undefined && { ttlMs: env.CACHE_TTL_MS }),
      ...(env.CACHE_MAX_ENTRIES !== undefined && { maxEntries: env.CACHE_MAX_ENTRIES }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}
