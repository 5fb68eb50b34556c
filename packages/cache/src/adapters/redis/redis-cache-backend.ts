import type { CacheBackend } from "../../ports/cache-backend"
import type { CacheKey, CacheKeyPattern } from "../../ports/cache-key"
import type { CacheStats } from "../../ports/cache-stats"
import type { Seconds } from "../../ports/time"
import { toCacheStats } from "./parse-redis-info"
import type { RedisCacheClients } from "./redis-client"

export type RedisCacheBackendOptions = {
  /**
   * Maximum number of keys sent in one `DEL`. Larger deletes are split
   * into several commands.
   */
  deleteBatchSize: number
}

export const DEFAULT_DELETE_BATCH_SIZE = 500

export class RedisCacheBackend implements CacheBackend {
  public constructor(
    private readonly clients: RedisCacheClients,
    private readonly opts: RedisCacheBackendOptions = {
      deleteBatchSize: DEFAULT_DELETE_BATCH_SIZE,
    },
  ) {
    if (!Number.isInteger(opts.deleteBatchSize) || opts.deleteBatchSize < 1) {
      throw new RangeError(
        `deleteBatchSize must be a positive integer, got ${opts.deleteBatchSize}`,
      )
    }
  }

  async setText(key: CacheKey, value: string, ttl: Seconds): Promise<void> {
    await this.clients.text.setEx(key, ttl, value)
  }

  async getText(key: CacheKey): Promise<string | null> {
    return this.clients.text.get(key)
  }

  async setBytes(key: CacheKey, value: Uint8Array, ttl: Seconds): Promise<void> {
    await this.clients.bytes.setEx(
      key,
      ttl,
      Buffer.from(value.buffer, value.byteOffset, value.byteLength),
    )
  }

  async getBytes(key: CacheKey): Promise<Uint8Array | null> {
    const buffer = await this.clients.bytes.get(key)
    if (buffer === null) return null

    return new Uint8Array(buffer)
  }

  async delete(keys: readonly CacheKey[]): Promise<number> {
    if (keys.length === 0) return 0

    let deleted = 0
    for (const batch of this.chunks(keys, this.opts.deleteBatchSize)) {
      deleted += await this.clients.text.del(batch)
    }

    return deleted
  }

  async keys(pattern: CacheKeyPattern): Promise<CacheKey[]> {
    return this.clients.text.keys(pattern)
  }

  async flush(): Promise<void> {
    await this.clients.text.flushDb()
  }

  async stats(): Promise<CacheStats> {
    const [info, keyCount] = await Promise.all([
      this.clients.text.info(),
      this.clients.text.dbSize(),
    ])

    return toCacheStats(info, keyCount)
  }

  private *chunks<T>(items: readonly T[], size: number): Generator<readonly T[]> {
    for (let i = 0; i < items.length; i += size) {
      yield items.slice(i, i + size)
    }
  }
}
