/**
 * A fully qualified key as stored in the backend:
 * `{namespace}:{category}:{identifier}`.
 *
 * @example
 * ```ts
 * const key: CacheKey = "study_tracker:analysis:trend:7"
 * ```
 */
export type CacheKey = string

/**
 * A Redis glob over fully qualified keys (`*`, `?`, `[...]`, `\` escapes).
 *
 * @example
 * ```ts
 * const everyAnalysisOfUser7: CacheKeyPattern = "study_tracker:analysis:*:7"
 * ```
 */
export type CacheKeyPattern = string

/**
 * The last key segment: usually a user or map id.
 */
export type CacheIdentifier = string | number
