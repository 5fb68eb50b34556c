import type { CacheIdentifier } from "../../ports/cache-key"
import type { CacheCategory } from "../../ports/cache-category"
import type { Seconds } from "../../ports/time"

/**
 * Cache-aside read: serve from cache, otherwise load from the system of
 * record and repopulate. Loader errors reach the caller; cache errors do not.
 */
export interface ReadThrough {
  getThrough<T>(
    category: CacheCategory<T>,
    identifier: CacheIdentifier,
    loader: () => Promise<T>,
    ttl?: Seconds,
  ): Promise<T>
}
