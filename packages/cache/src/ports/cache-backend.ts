import type { CacheKey, CacheKeyPattern } from "./cache-key"
import type { CacheStats } from "./cache-stats"
import type { Seconds } from "./time"

/**
 * The remote key-value service the store writes to.
 *
 * @remarks
 * - Every write carries a TTL; expiry is the backend's job.
 * - Text and binary payloads may use separate connections but share one
 *   keyspace: a key written as text can be deleted by key or pattern like
 *   any other.
 * - Adapters throw on transport errors. Turning those into results is the
 *   store's policy, not the adapter's.
 */
export interface CacheBackend {
  setText(key: CacheKey, value: string, ttl: Seconds): Promise<void>
  getText(key: CacheKey): Promise<string | null>

  setBytes(key: CacheKey, value: Uint8Array, ttl: Seconds): Promise<void>
  getBytes(key: CacheKey): Promise<Uint8Array | null>

  /** Returns how many of `keys` existed. */
  delete(keys: readonly CacheKey[]): Promise<number>

  keys(pattern: CacheKeyPattern): Promise<CacheKey[]>

  /** Drops every key in the backend's logical database. */
  flush(): Promise<void>

  stats(): Promise<CacheStats>
}
