import type { Milliseconds, Seconds } from "@studydash/cache"
import { type LogLevelName, logLevelNames } from "@studydash/logger"
import { z } from "zod/mini"

const isWhole = z.refine<number>((n: number) => Number.isInteger(n), "Expected a whole number")

const positiveInt = z.coerce.number().check(isWhole, z.positive())

export const cacheBackendKinds = ["redis", "memory"] as const

export type CacheBackendKind = (typeof cacheBackendKinds)[number]

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "study-dashboard"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REDIS_HOST: z._default(z.string(), "localhost"),
  REDIS_PORT: z._default(positiveInt, 6379),
  REDIS_DB: z._default(z.coerce.number().check(isWhole, z.nonnegative()), 0),
  REDIS_PASSWORD: z.optional(z.string()),
  REDIS_CONNECT_TIMEOUT_MS: z._default(positiveInt, 5000),
  REDIS_CONNECT_RETRIES: z._default(z.coerce.number().check(isWhole, z.nonnegative()), 3),

  CACHE_BACKEND: z._default(z.enum(cacheBackendKinds), "redis"),
  CACHE_NAMESPACE: z._default(z.string().check(z.regex(/^[^:]+$/)), "study_tracker"),
  CACHE_DELETE_BATCH_SIZE: z._default(positiveInt, 500),
  CACHE_USER_TTL_SECONDS: z._default(positiveInt, 3600),
  CACHE_KNOWLEDGE_MAP_TTL_SECONDS: z._default(positiveInt, 3600),
  CACHE_ANALYSIS_TTL_SECONDS: z._default(positiveInt, 1800),
  CACHE_STATS_TTL_SECONDS: z._default(positiveInt, 3600),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  redis: {
    host: string
    port: number
    database: number
    password?: string
    connectTimeoutMs: Milliseconds
    connectRetries: number
  }

  cache: {
    backend: CacheBackendKind
    namespace: string
    deleteBatchSize: number
    ttl: {
      user: Seconds
      knowledgeMap: Seconds
      analysis: Seconds
      studyStats: Seconds
    }
  }
}
