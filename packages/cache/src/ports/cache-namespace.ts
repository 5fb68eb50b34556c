import type { CacheIdentifier, CacheKey, CacheKeyPattern } from "./cache-key"

/**
 * Builds keys and patterns under one fixed application prefix, so every
 * writer and every invalidation agrees on the key format.
 */
export interface CacheNamespace {
  readonly prefix: string

  /** `{prefix}:{category}:{identifier}` */
  key(category: string, identifier: CacheIdentifier): CacheKey

  /**
   * Same shape as {@link CacheNamespace.key}, but both segments may hold
   * glob syntax and are used verbatim.
   */
  pattern(category: string, identifier: string): CacheKeyPattern
}
