import {
  type CacheBackend,
  createRedisClients,
  MemoryCacheBackend,
  RedisCacheBackend,
  type RedisCacheClients,
} from "@studydash/cache"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraClients = {
  cacheBackend: CacheBackend

  /** Unopened connections; `null` when the memory backend is configured. */
  redisClients: RedisCacheClients | null
}

export function createDefaultInfraClients(
  config: AppConfig,
  core: CoreServices,
): InfraClients {
  if (config.cache.backend === "memory") {
    core.logger.warn("Using the in-process cache backend; entries are not shared")

    return { cacheBackend: new MemoryCacheBackend({ clock: core.clock }), redisClients: null }
  }

  const redisClients = createRedisClients(
    {
      host: config.redis.host,
      port: config.redis.port,
      database: config.redis.database,
      connectTimeoutMs: config.redis.connectTimeoutMs,
      connectRetries: config.redis.connectRetries,
      ...(config.redis.password !== undefined && { password: config.redis.password }),
    },
    core.logger,
  )

  const cacheBackend = new RedisCacheBackend(redisClients, {
    deleteBatchSize: config.cache.deleteBatchSize,
  })

  return { cacheBackend, redisClients }
}
