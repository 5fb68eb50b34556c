export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> | T[P] : T[P]
}

/**
 * Deep-merges `overrides` into `base`. Only plain objects are merged;
 * class instances, arrays, maps and functions replace the base value.
 */
export function applyOverrides<T extends object>(base: T, overrides?: DeepPartial<T>): T {
  if (overrides === undefined) return base

  return mergeRecords(base, overrides) as T
}

function mergeRecords(base: object, overrides: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue

    const current = result[key]
    result[key] = isPlainObject(current) && isPlainObject(value) ? mergeRecords(current, value) : value
  }

  return result
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
