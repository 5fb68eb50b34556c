export { MemoryCacheBackend, type MemoryCacheBackendDeps } from "./adapters/memory/memory-cache-backend"
export { parseRedisInfo, toCacheStats } from "./adapters/redis/parse-redis-info"
export {
  DEFAULT_DELETE_BATCH_SIZE,
  RedisCacheBackend,
  type RedisCacheBackendOptions,
} from "./adapters/redis/redis-cache-backend"
export {
  connectRedisClients,
  createReconnectStrategy,
  createRedisClients,
  DEFAULT_CONNECT_RETRIES,
  quitRedisClients,
  type ReconnectState,
  type RedisBytesClient,
  type RedisCacheClients,
  type RedisConnectionOptions,
  type RedisTextClient,
} from "./adapters/redis/redis-client"
export { createJsonCodec } from "./core/codec/json-codec"
export { createSuperjsonCodec } from "./core/codec/superjson-codec"
export { CacheInvalidator, type CacheInvalidatorDeps } from "./core/invalidation/cache-invalidator"
export { DependencyGraph, type DependencyNode } from "./core/invalidation/dependency-graph"
export { createCacheNamespace } from "./core/namespace/create-cache-namespace"
export { escapeGlob, globToRegExp, matchesGlob } from "./core/pattern/glob-pattern"
export { CacheStore, type CacheStoreDeps } from "./core/store/cache-store"
export type { ReadThrough } from "./core/through/read-through"
export { type Clock, SystemClock } from "./core/time/clock"
export { CacheError, type CacheErrorCode, type CacheOperation } from "./errors/cache-error"
export type { CacheBackend } from "./ports/cache-backend"
export type { CacheCategory } from "./ports/cache-category"
export type { CacheIdentifier, CacheKey, CacheKeyPattern } from "./ports/cache-key"
export type { CacheNamespace } from "./ports/cache-namespace"
export type {
  CacheDeleteResult,
  CacheFailure,
  CacheHit,
  CacheInvalidationResult,
  CacheMiss,
  CacheOk,
  CacheReadResult,
  CacheStatsResult,
  CacheWriteResult,
} from "./ports/cache-result"
export type { CacheStats } from "./ports/cache-stats"
export type { BinaryCodec, CacheCodec, PayloadFormat, TextCodec } from "./ports/codec"
export type { Milliseconds, Seconds } from "./ports/time"
