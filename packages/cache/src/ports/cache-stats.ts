export type CacheStats = {
  /** Human-readable memory figure as reported by the backend, e.g. `1.04M`. */
  memoryUsed: string
  clientCount: number
  keyCount: number
  uptimeDays: number
}
