import type { Logger } from "@studydash/logger"
import { createClient, RESP_TYPES } from "redis"

type RedisConnection = {
  isOpen: boolean
  connect(): Promise<unknown>
  quit(): Promise<unknown>
  on(event: "error", listener: (err: unknown) => void): unknown
}

/**
 * String-decoding connection. Carries text payloads and every keyspace
 * command (`DEL`, `KEYS`, `FLUSHDB`, `INFO`, `DBSIZE`).
 */
export type RedisTextClient = RedisConnection & {
  get(key: string): Promise<string | null>
  setEx(key: string, seconds: number, value: string): Promise<unknown>
  del(keys: readonly string[]): Promise<number>
  keys(pattern: string): Promise<string[]>
  flushDb(): Promise<unknown>
  info(section?: string): Promise<string>
  dbSize(): Promise<number>
}

/**
 * Raw connection: blob replies arrive as `Buffer`, untouched by any
 * string decoding.
 */
export type RedisBytesClient = RedisConnection & {
  get(key: string): Promise<Buffer | null>
  setEx(key: string, seconds: number, value: Buffer): Promise<unknown>
}

export type RedisCacheClients = {
  text: RedisTextClient
  bytes: RedisBytesClient
}

export type RedisConnectionOptions = {
  host: string
  port: number
  database: number
  password?: string
  connectTimeoutMs: number
  /** Reconnect attempts allowed before the first successful connect. */
  connectRetries?: number
}

export const DEFAULT_CONNECT_RETRIES = 3
export const MAX_RECONNECT_DELAY_MS = 2_000

export type ReconnectState = {
  ready: boolean
}

/**
 * `socket.reconnectStrategy` for node-redis. Until the connection has been
 * ready once, gives up after `maxRetries` attempts so `connect()` rejects
 * with the last cause. Afterwards it keeps retrying with capped exponential
 * backoff.
 */
export function createReconnectStrategy(
  state: ReconnectState,
  maxRetries: number = DEFAULT_CONNECT_RETRIES,
): (retries: number, cause: Error) => number | Error {
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`)
  }

  return (retries, cause) => {
    if (!state.ready && retries >= maxRetries) return cause

    return Math.min(50 * 2 ** retries, MAX_RECONNECT_DELAY_MS)
  }
}

/**
 * Creates both connections, unopened. Commands issued while disconnected
 * reject immediately instead of queueing.
 */
export function createRedisClients(
  opts: RedisConnectionOptions,
  logger: Logger,
): RedisCacheClients {
  const log = logger.child({ module: "redis" })

  const text = createConnection(opts, (err) =>
    log.error("Redis text connection error", { err }),
  ) as unknown as RedisTextClient
  const bytes = createConnection(opts, (err) =>
    log.error("Redis bytes connection error", { err }),
  ).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient

  return { text, bytes }
}

function createConnection(opts: RedisConnectionOptions, onError: (err: unknown) => void) {
  const state: ReconnectState = { ready: false }

  const client = createClient({
    socket: {
      host: opts.host,
      port: opts.port,
      connectTimeout: opts.connectTimeoutMs,
      reconnectStrategy: createReconnectStrategy(state, opts.connectRetries),
    },
    database: opts.database,
    disableOfflineQueue: true,
    ...(opts.password !== undefined && { password: opts.password }),
  })

  client.on("ready", () => {
    state.ready = true
  })
  client.on("error", onError)

  return client
}

export async function connectRedisClients(clients: RedisCacheClients): Promise<void> {
  await Promise.all(
    [clients.text, clients.bytes].map(async (c) => {
      if (!c.isOpen) await c.connect()
    }),
  )
}

export async function quitRedisClients(clients: RedisCacheClients): Promise<void> {
  await Promise.all(
    [clients.text, clients.bytes].map(async (c) => {
      if (c.isOpen) await c.quit()
    }),
  )
}
