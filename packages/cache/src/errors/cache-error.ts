import { BaseError } from "@studydash/errors"
import type { CacheKey, CacheKeyPattern } from "../ports/cache-key"
import type { Seconds } from "../ports/time"

export type CacheErrorCode =
  | "backend_unavailable"
  | "encode_failed"
  | "decode_failed"
  | "invalid_ttl"

export type CacheOperation = "get" | "set" | "delete" | "keys" | "flush" | "stats"

export class CacheError extends BaseError<CacheErrorCode> {
  static backendUnavailable(
    operation: CacheOperation,
    cause: unknown,
    target?: { key?: CacheKey; pattern?: CacheKeyPattern; keyCount?: number },
  ): CacheError {
    return new CacheError(`Cache backend failed during ${operation}`, {
      code: "backend_unavailable",
      cause,
      context: { operation, ...target },
      isRetryable: true,
    })
  }

  static encodeFailed(key: CacheKey, category: string, cause: unknown): CacheError {
    return new CacheError(`Could not encode value for ${key}`, {
      code: "encode_failed",
      cause,
      context: { key, category },
    })
  }

  static decodeFailed(key: CacheKey, category: string, cause: unknown): CacheError {
    return new CacheError(`Could not decode cached value for ${key}`, {
      code: "decode_failed",
      cause,
      context: { key, category },
    })
  }

  static invalidTtl(key: CacheKey, ttl: Seconds): CacheError {
    return new CacheError(`TTL must be a positive whole number of seconds, got ${ttl}`, {
      code: "invalid_ttl",
      context: { key, ttl },
      isOperational: false,
    })
  }
}
