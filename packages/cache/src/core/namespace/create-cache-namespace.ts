import type { CacheIdentifier, CacheKey, CacheKeyPattern } from "../../ports/cache-key"
import type { CacheNamespace } from "../../ports/cache-namespace"

const SEPARATOR = ":"

class PrefixedCacheNamespace implements CacheNamespace {
  constructor(readonly prefix: string) {}

  key(category: string, identifier: CacheIdentifier): CacheKey {
    return [this.prefix, category, String(identifier)].join(SEPARATOR)
  }

  pattern(category: string, identifier: string): CacheKeyPattern {
    return [this.prefix, category, identifier].join(SEPARATOR)
  }
}

export function createCacheNamespace(prefix: string): CacheNamespace {
  if (prefix.length === 0 || prefix.includes(SEPARATOR)) {
    throw new RangeError(`Cache namespace must be a non-empty string without ":", got "${prefix}"`)
  }

  return new PrefixedCacheNamespace(prefix)
}
