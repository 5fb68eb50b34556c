import type { RedisBytesClient, RedisCacheClients, RedisTextClient } from "../../adapters/redis/redis-client"
import { globToRegExp } from "../../core/pattern/glob-pattern"
import type { Clock } from "../../core/time/clock"
import type { Milliseconds } from "../../ports/time"

type StoredValue = {
  value: Buffer
  expiresAtMs: Milliseconds
}

/**
 * In-process Redis keyspace shared by a fake text and bytes connection.
 * Set `down` to make every command reject the way node-redis does with the
 * offline queue disabled.
 */
export class FakeRedisServer {
  down = false
  connectedClients = 0

  private readonly store = new Map<string, StoredValue>()

  public constructor(private readonly clock: Clock) {}

  get size(): number {
    return this.liveKeys().length
  }

  read(key: string): Buffer | null {
    this.assertUp()
    const entry = this.store.get(key)
    if (entry === undefined) return null

    if (entry.expiresAtMs <= this.clock.nowMs()) {
      this.store.delete(key)
      return null
    }

    return entry.value
  }

  write(key: string, seconds: number, value: Buffer): void {
    this.assertUp()
    this.store.set(key, { value: Buffer.from(value), expiresAtMs: this.clock.nowMs() + seconds * 1000 })
  }

  del(keys: readonly string[]): number {
    this.assertUp()
    let removed = 0
    for (const key of keys) {
      if (this.read(key) !== null) {
        this.store.delete(key)
        removed++
      }
    }

    return removed
  }

  keys(pattern: string): string[] {
    this.assertUp()
    const matcher = globToRegExp(pattern)

    return this.liveKeys().filter((k) => matcher.test(k))
  }

  flush(): void {
    this.assertUp()
    this.store.clear()
  }

  info(): string {
    this.assertUp()
    return [
      "# Server",
      "redis_version:7.2.4",
      "uptime_in_days:3",
      "",
      "# Clients",
      `connected_clients:${this.connectedClients}`,
      "",
      "# Memory",
      "used_memory:1090000",
      "used_memory_human:1.04M",
      "",
    ].join("\r\n")
  }

  private liveKeys(): string[] {
    return [...this.store.keys()].filter((k) => this.read(k) !== null)
  }

  private assertUp(): void {
    if (this.down) throw new Error("The client is closed")
  }
}

class FakeConnection {
  isOpen = false

  public constructor(protected readonly server: FakeRedisServer) {}

  async connect(): Promise<void> {
    this.isOpen = true
    this.server.connectedClients++
  }

  async quit(): Promise<void> {
    this.isOpen = false
    this.server.connectedClients--
  }

  on(_event: "error", _listener: (err: unknown) => void): this {
    return this
  }
}

export class FakeRedisTextClient extends FakeConnection implements RedisTextClient {
  async get(key: string): Promise<string | null> {
    return this.server.read(key)?.toString("utf8") ?? null
  }

  async setEx(key: string, seconds: number, value: string): Promise<string> {
    this.server.write(key, seconds, Buffer.from(value, "utf8"))
    return "OK"
  }

  async del(keys: readonly string[]): Promise<number> {
    return this.server.del(keys)
  }

  async keys(pattern: string): Promise<string[]> {
    return this.server.keys(pattern)
  }

  async flushDb(): Promise<string> {
    this.server.flush()
    return "OK"
  }

  async info(): Promise<string> {
    return this.server.info()
  }

  async dbSize(): Promise<number> {
    return this.server.size
  }
}

export class FakeRedisBytesClient extends FakeConnection implements RedisBytesClient {
  async get(key: string): Promise<Buffer | null> {
    const value = this.server.read(key)
    return value === null ? null : Buffer.from(value)
  }

  async setEx(key: string, seconds: number, value: Buffer): Promise<string> {
    this.server.write(key, seconds, value)
    return "OK"
  }
}

export function createFakeRedisClients(clock: Clock): {
  server: FakeRedisServer
  clients: RedisCacheClients & { text: FakeRedisTextClient; bytes: FakeRedisBytesClient }
} {
  const server = new FakeRedisServer(clock)

  return {
    server,
    clients: { text: new FakeRedisTextClient(server), bytes: new FakeRedisBytesClient(server) },
  }
}
