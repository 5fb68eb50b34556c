import type { CacheError } from "../errors/cache-error"
import type { CacheStats } from "./cache-stats"

export type CacheHit<T> = {
  kind: "hit"
  value: T
}

/**
 * Key absent, expired, or holding a payload that no longer decodes.
 */
export type CacheMiss = {
  kind: "miss"
}

/**
 * The backend could not be reached or rejected the command. Callers treat
 * it like a miss; it is kept apart so it can be observed.
 */
export type CacheFailure = {
  kind: "failed"
  error: CacheError
}

export type CacheOk = {
  kind: "ok"
}

export type CacheReadResult<T> = CacheHit<T> | CacheMiss | CacheFailure

export type CacheWriteResult = CacheOk | CacheFailure

export type CacheDeleteResult = (CacheOk & { deleted: number }) | CacheFailure

export type CacheStatsResult = (CacheOk & { stats: CacheStats }) | CacheFailure

/**
 * Outcome of an invalidation. `targets` lists every key and pattern that was
 * attempted; `deleted` counts keys the backend actually removed, which can
 * be non-zero on failure since deletes are not transactional.
 */
export type CacheInvalidationResult =
  | { kind: "ok"; targets: readonly string[]; deleted: number }
  | { kind: "failed"; targets: readonly string[]; deleted: number; error: CacheError }
