import { globToRegExp } from "../../core/pattern/glob-pattern"
import type { Clock } from "../../core/time/clock"
import type { CacheBackend } from "../../ports/cache-backend"
import type { CacheKey, CacheKeyPattern } from "../../ports/cache-key"
import type { CacheStats } from "../../ports/cache-stats"
import type { Milliseconds, Seconds } from "../../ports/time"

const MS_PER_DAY = 86_400_000

export type MemoryCacheBackendDeps = {
  clock: Clock
}

type MemoryEntry = {
  payload: string | Uint8Array
  expiresAtMs: Milliseconds
}

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * In-process stand-in for Redis with the same keyspace rules: one map for
 * text and binary payloads, expiry driven by the injected clock, `KEYS`-style
 * glob matching.
 */
export class MemoryCacheBackend implements CacheBackend {
  private readonly entries = new Map<CacheKey, MemoryEntry>()
  private readonly startedAtMs: Milliseconds

  public constructor(private readonly deps: MemoryCacheBackendDeps) {
    this.startedAtMs = deps.clock.nowMs()
  }

  async setText(key: CacheKey, value: string, ttl: Seconds): Promise<void> {
    this.setEntry(key, value, ttl)
  }

  async getText(key: CacheKey): Promise<string | null> {
    const entry = this.liveEntry(key)
    if (entry === undefined) return null

    return typeof entry.payload === "string" ? entry.payload : decoder.decode(entry.payload)
  }

  async setBytes(key: CacheKey, value: Uint8Array, ttl: Seconds): Promise<void> {
    this.setEntry(key, value.slice(), ttl)
  }

  async getBytes(key: CacheKey): Promise<Uint8Array | null> {
    const entry = this.liveEntry(key)
    if (entry === undefined) return null

    return typeof entry.payload === "string"
      ? encoder.encode(entry.payload)
      : entry.payload.slice()
  }

  async delete(keys: readonly CacheKey[]): Promise<number> {
    let deleted = 0

    for (const key of new Set(keys)) {
      if (this.liveEntry(key) !== undefined) {
        this.entries.delete(key)
        deleted++
      }
    }

    return deleted
  }

  async keys(pattern: CacheKeyPattern): Promise<CacheKey[]> {
    const matcher = globToRegExp(pattern)
    const out: CacheKey[] = []

    for (const key of [...this.entries.keys()]) {
      if (this.liveEntry(key) !== undefined && matcher.test(key)) out.push(key)
    }

    return out
  }

  async flush(): Promise<void> {
    this.entries.clear()
  }

  async stats(): Promise<CacheStats> {
    this.purgeExpired()

    let bytesUsed = 0
    for (const [key, entry] of this.entries) {
      bytesUsed += key.length + this.payloadSize(entry.payload)
    }

    return {
      memoryUsed: `${bytesUsed}B`,
      clientCount: 1,
      keyCount: this.entries.size,
      uptimeDays: Math.floor((this.deps.clock.nowMs() - this.startedAtMs) / MS_PER_DAY),
    }
  }

  private setEntry(key: CacheKey, payload: string | Uint8Array, ttl: Seconds): void {
    this.entries.set(key, {
      payload,
      expiresAtMs: this.deps.clock.nowMs() + ttl * 1000,
    })
  }

  private liveEntry(key: CacheKey): MemoryEntry | undefined {
    const entry = this.entries.get(key)
    if (entry === undefined) return undefined

    if (entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.entries.delete(key)
      return undefined
    }

    return entry
  }

  private purgeExpired(): void {
    for (const key of [...this.entries.keys()]) {
      this.liveEntry(key)
    }
  }

  private payloadSize(payload: string | Uint8Array): number {
    return typeof payload === "string" ? encoder.encode(payload).byteLength : payload.byteLength
  }
}
