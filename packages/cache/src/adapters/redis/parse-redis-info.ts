import type { CacheStats } from "../../ports/cache-stats"

/**
 * Reads the `field:value` lines of an `INFO` reply into a map, skipping
 * `# Section` headers.
 */
export function parseRedisInfo(info: string): Map<string, string> {
  const fields = new Map<string, string>()

  for (const rawLine of info.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (line === "" || line.startsWith("#")) continue

    const sep = line.indexOf(":")
    if (sep <= 0) continue

    fields.set(line.slice(0, sep), line.slice(sep + 1))
  }

  return fields
}

function toInt(value: string | undefined): number {
  const n = Number.parseInt(value ?? "", 10)

  return Number.isNaN(n) ? 0 : n
}

export function toCacheStats(info: string, keyCount: number): CacheStats {
  const fields = parseRedisInfo(info)

  return {
    memoryUsed: fields.get("used_memory_human") ?? "0B",
    clientCount: toInt(fields.get("connected_clients")),
    keyCount,
    uptimeDays: toInt(fields.get("uptime_in_days")),
  }
}
