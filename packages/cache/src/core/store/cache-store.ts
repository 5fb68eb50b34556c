import type { Logger } from "@studydash/logger"
import { CacheError, type CacheOperation } from "../../errors/cache-error"
import type { CacheBackend } from "../../ports/cache-backend"
import type { CacheCategory } from "../../ports/cache-category"
import type { CacheIdentifier, CacheKey, CacheKeyPattern } from "../../ports/cache-key"
import type { CacheNamespace } from "../../ports/cache-namespace"
import type {
  CacheDeleteResult,
  CacheReadResult,
  CacheStatsResult,
  CacheWriteResult,
} from "../../ports/cache-result"
import type { Seconds } from "../../ports/time"
import { escapeGlob } from "../pattern/glob-pattern"
import type { ReadThrough } from "../through/read-through"

export type CacheStoreDeps = {
  backend: CacheBackend
  namespace: CacheNamespace
  logger: Logger
}

type EncodedPayload = { format: "text"; data: string } | { format: "binary"; data: Uint8Array }

type Encoded = { ok: true; payload: EncodedPayload } | { ok: false; error: CacheError }

/**
 * Namespaced, TTL-bound cache over a {@link CacheBackend}.
 *
 * Every operation resolves: backend, encode and decode failures are logged
 * and come back as `failed` (or `miss`) results.
 */
export class CacheStore implements ReadThrough {
  private readonly log: Logger

  public constructor(private readonly deps: CacheStoreDeps) {
    this.log = deps.logger.child({ module: "cache-store", namespace: deps.namespace.prefix })
  }

  get namespace(): CacheNamespace {
    return this.deps.namespace
  }

  keyFor(category: string, identifier: CacheIdentifier): CacheKey {
    return this.deps.namespace.key(category, identifier)
  }

  patternFor(categoryPattern: string, identifierPattern: string): CacheKeyPattern {
    return this.deps.namespace.pattern(categoryPattern, identifierPattern)
  }

  async set<T>(
    category: CacheCategory<T>,
    identifier: CacheIdentifier,
    value: T,
    ttl: Seconds = category.defaultTtl,
  ): Promise<CacheWriteResult> {
    const key = this.keyFor(category.name, identifier)

    if (!Number.isInteger(ttl) || ttl <= 0) {
      const error = CacheError.invalidTtl(key, ttl)
      this.log.error(error.message, { key, category: category.name, err: error })
      return { kind: "failed", error }
    }

    const encoded = this.encode(category, key, value)
    if (!encoded.ok) {
      this.log.error("Failed to encode cache value", {
        key,
        category: category.name,
        err: encoded.error,
      })
      return { kind: "failed", error: encoded.error }
    }

    try {
      const { payload } = encoded
      if (payload.format === "text") {
        await this.deps.backend.setText(key, payload.data, ttl)
      } else {
        await this.deps.backend.setBytes(key, payload.data, ttl)
      }

      return { kind: "ok" }
    } catch (err) {
      return this.backendFailure("set", err, { key }, category.name)
    }
  }

  async get<T>(category: CacheCategory<T>, identifier: CacheIdentifier): Promise<CacheReadResult<T>> {
    const key = this.keyFor(category.name, identifier)
    const { codec } = category

    try {
      if (codec.format === "text") {
        const text = await this.deps.backend.getText(key)
        if (text === null) return { kind: "miss" }

        return this.decode(category.name, key, () => codec.decode(text))
      }

      const bytes = await this.deps.backend.getBytes(key)
      if (bytes === null) return { kind: "miss" }

      return this.decode(category.name, key, () => codec.decode(bytes))
    } catch (err) {
      return this.backendFailure("get", err, { key }, category.name)
    }
  }

  async getThrough<T>(
    category: CacheCategory<T>,
    identifier: CacheIdentifier,
    loader: () => Promise<T>,
    ttl?: Seconds,
  ): Promise<T> {
    const cached = await this.get(category, identifier)
    if (cached.kind === "hit") return cached.value

    const value = await loader()
    await this.set(category, identifier, value, ttl)

    return value
  }

  /**
   * Deletes every key, in any category, whose identifier starts with
   * `identifier`: `{namespace}:*:{identifier}*`.
   */
  async invalidateDomain(identifier: CacheIdentifier): Promise<CacheDeleteResult> {
    return this.deleteMatching(this.patternFor("*", `${escapeGlob(String(identifier))}*`))
  }

  async deleteKeys(keys: readonly CacheKey[]): Promise<CacheDeleteResult> {
    if (keys.length === 0) return { kind: "ok", deleted: 0 }

    try {
      const deleted = await this.deps.backend.delete(keys)
      this.log.info("Deleted cache keys", { requested: keys.length, deleted })

      return { kind: "ok", deleted }
    } catch (err) {
      return this.backendFailure("delete", err, { keyCount: keys.length })
    }
  }

  /**
   * Resolves `pattern` with one `KEYS` and removes the matches. Writers
   * racing with this call may leave fresh matches behind.
   */
  async deleteMatching(pattern: CacheKeyPattern): Promise<CacheDeleteResult> {
    let matched: CacheKey[]
    try {
      matched = await this.deps.backend.keys(pattern)
    } catch (err) {
      return this.backendFailure("keys", err, { pattern })
    }

    if (matched.length === 0) {
      this.log.debug("No cache keys matched pattern", { pattern })
      return { kind: "ok", deleted: 0 }
    }

    try {
      const deleted = await this.deps.backend.delete(matched)
      this.log.info("Deleted cache keys matching pattern", {
        pattern,
        matched: matched.length,
        deleted,
      })

      return { kind: "ok", deleted }
    } catch (err) {
      return this.backendFailure("delete", err, { pattern, keyCount: matched.length })
    }
  }

  async clearAll(): Promise<CacheWriteResult> {
    try {
      await this.deps.backend.flush()
      this.log.warn("Cleared every cache entry")

      return { kind: "ok" }
    } catch (err) {
      return this.backendFailure("flush", err)
    }
  }

  async stats(): Promise<CacheStatsResult> {
    try {
      const stats = await this.deps.backend.stats()

      return { kind: "ok", stats }
    } catch (err) {
      return this.backendFailure("stats", err)
    }
  }

  private encode<T>(category: CacheCategory<T>, key: CacheKey, value: T): Encoded {
    const { codec } = category

    try {
      const payload: EncodedPayload =
        codec.format === "text"
          ? { format: "text", data: codec.encode(value) }
          : { format: "binary", data: codec.encode(value) }

      return { ok: true, payload }
    } catch (err) {
      return { ok: false, error: CacheError.encodeFailed(key, category.name, err) }
    }
  }

  private decode<T>(category: string, key: CacheKey, run: () => T): CacheReadResult<T> {
    try {
      return { kind: "hit", value: run() }
    } catch (err) {
      const error = CacheError.decodeFailed(key, category, err)
      this.log.warn("Discarding undecodable cache entry", { key, category, err: error })

      return { kind: "miss" }
    }
  }

  private backendFailure(
    operation: CacheOperation,
    cause: unknown,
    target?: { key?: CacheKey; pattern?: CacheKeyPattern; keyCount?: number },
    category?: string,
  ): { kind: "failed"; error: CacheError } {
    const error = CacheError.backendUnavailable(operation, cause, target)
    this.log.error(error.message, {
      ...target,
      ...(category !== undefined && { category }),
      err: error,
    })

    return { kind: "failed", error }
  }
}
